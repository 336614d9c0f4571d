/**
 * Shared test data constants and builders
 */
import type { Measurement } from '../../src/ingestion/dto/measurement.dto';

export const DEFAULT_SERIAL = 'BAT1';
export const DEFAULT_TIMESTAMP = '2024-01-01 03:15:00';
export const DEFAULT_DATE = '2024-01-01';

/**
 * Semicolon-separated meter export lines
 * (serial;timestamp;date;grid_purchase;grid_feedin;direct_consumption)
 */
export const meterCsv = {
  row: (opts: {
    serial?: string;
    timestamp?: string;
    date?: string;
    purchase?: string;
    feedin?: string;
    consumption?: string;
  }) =>
    [
      opts.serial ?? DEFAULT_SERIAL,
      opts.timestamp ?? DEFAULT_TIMESTAMP,
      opts.date ?? DEFAULT_DATE,
      opts.purchase ?? '0',
      opts.feedin ?? '0',
      opts.consumption ?? '0',
    ].join(';'),
};

/**
 * Build a measurement with date and hour derived from the given timestamp.
 * Only pass normalized timestamps ("2024-01-01T03:15:00.000", optionally
 * followed by an offset) or null.
 */
export function buildMeasurement(
  overrides: Partial<Omit<Measurement, 'date' | 'hour'>> = {},
): Measurement {
  const timestamp =
    overrides.timestamp === undefined
      ? '2024-01-01T03:15:00.000'
      : overrides.timestamp;

  return Object.freeze({
    serial: overrides.serial ?? DEFAULT_SERIAL,
    timestamp,
    date: timestamp === null ? null : timestamp.slice(0, 10),
    hour: timestamp === null ? null : Number(timestamp.slice(11, 13)),
    gridPurchase:
      overrides.gridPurchase === undefined ? 0 : overrides.gridPurchase,
    gridFeedin: overrides.gridFeedin === undefined ? 0 : overrides.gridFeedin,
    directConsumption:
      overrides.directConsumption === undefined
        ? 0
        : overrides.directConsumption,
    extra: Object.freeze({ ...(overrides.extra ?? {}) }),
  });
}
