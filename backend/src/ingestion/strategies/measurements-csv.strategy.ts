import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import {
  IParser,
  ParsedRow,
  ParseOptions,
  ParserError,
} from '../interfaces/parser.interface';
import {
  DERIVED_COLUMNS,
  Measurement,
  RawRow,
  REQUIRED_COLUMNS,
} from '../dto/measurement.dto';
import { coerceNumber, coerceSerial } from '../utils/coercion';
import {
  coerceCalendarDate,
  coerceTimestamp,
  deriveCalendarKeys,
} from '../utils/timestamp';

const RESERVED_COLUMNS: ReadonlySet<string> = new Set<string>([
  ...REQUIRED_COLUMNS,
  ...DERIVED_COLUMNS,
]);

/**
 * Build a Measurement from one raw row.
 *
 * Never throws: unparseable numbers and timestamps become null. Returns null
 * only when the row has no serial, since such a reading cannot be attributed
 * to any device.
 */
export function parseMeasurement(row: RawRow): Measurement | null {
  const serial = coerceSerial(row['serial']);
  if (serial === null) {
    return null;
  }

  const timestamp = coerceTimestamp(row['timestamp']);
  const { date, hour } = deriveCalendarKeys(timestamp);

  const extra: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (!RESERVED_COLUMNS.has(column)) {
      extra[column] = value;
    }
  }

  return Object.freeze({
    serial,
    timestamp,
    date,
    hour,
    gridPurchase: coerceNumber(row['grid_purchase']),
    gridFeedin: coerceNumber(row['grid_feedin']),
    directConsumption: coerceNumber(row['direct_consumption']),
    extra: Object.freeze(extra),
  });
}

/**
 * Measurements CSV Parser Strategy
 *
 * Handles the delimited meter export with one reading per row:
 *
 * ```
 * serial;timestamp;date;grid_purchase;grid_feedin;direct_consumption
 * BAT1;2024-01-01 03:15:00;2024-01-01;5;0;1.25
 * ```
 *
 * Column order is free and further columns are passed through. The separator
 * and quoting are fixed per run (double quotes, RFC 4180 escaping); nothing
 * is auto-detected.
 */
@Injectable()
export class MeasurementsCsvParser implements IParser {
  private readonly logger = new Logger(MeasurementsCsvParser.name);

  readonly name = 'measurements-csv';
  readonly description = 'Delimited meter readings export';

  async *parse(
    fileBuffer: Buffer,
    options: ParseOptions,
  ): AsyncGenerator<ParsedRow> {
    const { headers, rows } = await this.readCsvRows(fileBuffer, options);

    if (headers.length === 0) {
      throw new ParserError(this.name, 'File is empty or has no header row');
    }
    this.assertRequiredColumns(headers);

    this.logger.debug(`Read ${rows.length} data rows`);

    for (let i = 0; i < rows.length; i++) {
      const rowNumber = i + 1;
      const measurement = parseMeasurement(rows[i]);

      if (measurement) {
        yield {
          kind: 'measurement',
          rowNumber,
          measurement,
          sourceDate: coerceCalendarDate(rows[i]['date']),
        };
      } else {
        yield { kind: 'rejected', rowNumber, reason: 'missing serial' };
      }
    }
  }

  /**
   * Read the header and all non-blank rows using csv-parser
   */
  private async readCsvRows(
    fileBuffer: Buffer,
    options: ParseOptions,
  ): Promise<{ headers: string[]; rows: RawRow[] }> {
    let headers: string[] = [];
    const rows: RawRow[] = [];

    const stream = Readable.from(fileBuffer).pipe(
      csvParser({
        separator: options.delimiter,
        mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
      }),
    );
    stream.on('headers', (names: string[]) => {
      headers = names;
    });

    for await (const row of stream) {
      const rawRow = this.toRawRow(row);
      if (Object.values(rawRow).some((value) => value.trim() !== '')) {
        rows.push(rawRow);
      }
    }

    return { headers, rows };
  }

  private assertRequiredColumns(headers: string[]): void {
    const present = new Set(headers);
    const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));

    if (missing.length > 0) {
      throw new ParserError(
        this.name,
        `Missing required column(s): ${missing.join(', ')}. Found: ${headers.join(', ')}`,
      );
    }
  }

  /**
   * Keep only string cells; csv-parser emits plain objects of strings
   */
  private toRawRow(row: unknown): RawRow {
    const rawRow: Record<string, string> = {};
    if (typeof row !== 'object' || row === null) {
      return rawRow;
    }
    for (const [column, value] of Object.entries(row)) {
      if (typeof value === 'string') {
        rawRow[column] = value;
      }
    }
    return rawRow;
  }
}
