import Papa from 'papaparse';
import {
  Measurement,
  REQUIRED_COLUMNS,
} from '../ingestion/dto/measurement.dto';
import { formatTimestamp } from '../ingestion/utils/timestamp';
import { DeviceSummary, HourlyBucket } from '../processing/dto/aggregates.dto';

export const HOURLY_COLUMNS = [
  'date',
  'hour',
  'grid_purchase_total',
  'grid_feedin_total',
  'is_peak_feedin_hour',
] as const;

export const SUMMARY_COLUMNS = [
  'serial',
  'grid_purchase_total',
  'grid_feedin_total',
] as const;

/** Unknown values are written as empty fields, never as 0 */
function cell(value: string | number | null): string {
  if (value === null) return '';
  return typeof value === 'number' ? String(value) : value;
}

function toCsv(fields: readonly string[], data: string[][], delimiter: string): string {
  const body = Papa.unparse(
    { fields: [...fields], data },
    { delimiter, newline: '\n', quotes: false },
  );
  // Header-only output already ends with the newline
  return body.endsWith('\n') ? body : `${body}\n`;
}

/**
 * Pass-through columns in the order they first appear
 */
export function collectExtraColumns(measurements: readonly Measurement[]): string[] {
  const columns = new Set<string>();
  for (const m of measurements) {
    for (const column of Object.keys(m.extra)) {
      columns.add(column);
    }
  }
  return [...columns];
}

/**
 * Cleaned records: required columns, pass-through columns, then `hour`.
 * `date` is the date derived from the timestamp.
 */
export function serializeMeasurements(
  measurements: readonly Measurement[],
  delimiter: string,
): string {
  const extraColumns = collectExtraColumns(measurements);
  const fields = [...REQUIRED_COLUMNS, ...extraColumns, 'hour'];

  const data = measurements.map((m) => [
    m.serial,
    m.timestamp === null ? '' : formatTimestamp(m.timestamp),
    cell(m.date),
    cell(m.gridPurchase),
    cell(m.gridFeedin),
    cell(m.directConsumption),
    ...extraColumns.map((column) => m.extra[column] ?? ''),
    cell(m.hour),
  ]);

  return toCsv(fields, data, delimiter);
}

export function serializeHourlyBuckets(
  buckets: readonly HourlyBucket[],
  delimiter: string,
): string {
  const data = buckets.map((b) => [
    b.date,
    cell(b.hour),
    cell(b.gridPurchaseTotal),
    cell(b.gridFeedinTotal),
    String(b.isPeakFeedinHour),
  ]);
  return toCsv(HOURLY_COLUMNS, data, delimiter);
}

export function serializeDeviceSummaries(
  summaries: readonly DeviceSummary[],
  delimiter: string,
): string {
  const data = summaries.map((s) => [
    s.serial,
    cell(s.gridPurchaseTotal),
    cell(s.gridFeedinTotal),
  ]);
  return toCsv(SUMMARY_COLUMNS, data, delimiter);
}
