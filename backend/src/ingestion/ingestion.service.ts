import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { IParser } from './interfaces/parser.interface';
import { MeasurementsCsvParser } from './strategies/measurements-csv.strategy';
import { Measurement } from './dto/measurement.dto';
import { toError } from '../common/error.utils';

/**
 * Ingestion Result Summary
 */
export interface IngestionResult {
  parserUsed: string;
  measurements: readonly Measurement[];
  rowsRead: number;
  rowsRejected: number;
  unknownTimestamps: number;
  /** Rows whose raw `date` column names another day than their timestamp */
  dateColumnMismatches: number;
}

/**
 * Raised when the input location cannot be read at all.
 */
export class InputReadError extends Error {
  constructor(
    public readonly inputPath: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Cannot read input file ${inputPath}${originalError ? `: ${originalError.message}` : ''}`,
    );
    this.name = 'InputReadError';
  }
}

/**
 * IngestionService - Reads one input snapshot into typed measurements
 *
 * Field-level problems never fail the run: they surface as unknown values on
 * the measurement. Rows without a serial are dropped and counted. Structural
 * problems (unreadable file, missing columns) propagate to the caller.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly parser: IParser;

  /** Only the first few row warnings of a file are logged */
  private readonly MAX_ROW_WARNINGS = 5;

  constructor(measurementsCsvParser: MeasurementsCsvParser) {
    this.parser = measurementsCsvParser;
  }

  /**
   * Read and parse the file at `inputPath`
   *
   * @throws InputReadError if the file cannot be read
   * @throws ParserError if the file structure is invalid
   */
  async ingestFile(
    inputPath: string,
    delimiter: string,
  ): Promise<IngestionResult> {
    let fileBuffer: Buffer;
    try {
      fileBuffer = await readFile(inputPath);
    } catch (error) {
      throw new InputReadError(
        inputPath,
        toError(error),
      );
    }

    this.logger.log(`Using parser '${this.parser.name}' for file: ${inputPath}`);

    const measurements: Measurement[] = [];
    const result: IngestionResult = {
      parserUsed: this.parser.name,
      measurements,
      rowsRead: 0,
      rowsRejected: 0,
      unknownTimestamps: 0,
      dateColumnMismatches: 0,
    };
    let warnings = 0;

    for await (const parsed of this.parser.parse(fileBuffer, { delimiter })) {
      result.rowsRead++;

      if (parsed.kind === 'rejected') {
        result.rowsRejected++;
        if (warnings++ < this.MAX_ROW_WARNINGS) {
          this.logger.warn(`Row ${parsed.rowNumber}: rejected (${parsed.reason})`);
        }
        continue;
      }

      const { measurement, sourceDate } = parsed;
      measurements.push(measurement);

      if (measurement.timestamp === null) {
        result.unknownTimestamps++;
      } else if (sourceDate !== null && sourceDate !== measurement.date) {
        result.dateColumnMismatches++;
      }
    }

    if (result.dateColumnMismatches > 0) {
      this.logger.warn(
        `${result.dateColumnMismatches} row(s) carry a date column that differs from their timestamp; the timestamp was used`,
      );
    }

    this.logger.log(
      `Ingestion complete: ${measurements.length}/${result.rowsRead} rows parsed (${result.rowsRejected} rejected, ${result.unknownTimestamps} without timestamp)`,
    );

    return result;
  }
}
