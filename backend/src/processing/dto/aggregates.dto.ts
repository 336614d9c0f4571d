/**
 * One row of the hourly aggregation, keyed by (date, hour).
 * Totals treat unknown readings as zero and are therefore always numeric.
 */
export interface HourlyBucket {
  readonly date: string;
  readonly hour: number;
  readonly gridPurchaseTotal: number;
  readonly gridFeedinTotal: number;
  /** True for every hour that reaches the date's maximum feed-in (ties included) */
  readonly isPeakFeedinHour: boolean;
}

/**
 * Lifetime grid totals of one device.
 */
export interface DeviceSummary {
  readonly serial: string;
  readonly gridPurchaseTotal: number;
  readonly gridFeedinTotal: number;
}
