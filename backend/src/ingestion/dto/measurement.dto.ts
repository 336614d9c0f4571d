/**
 * Raw row as read from the delimited input: column name -> text value.
 */
export type RawRow = Readonly<Record<string, string>>;

/**
 * Columns every input file must carry. Any further columns are passed
 * through to the cleaned output untouched.
 */
export const REQUIRED_COLUMNS = [
  'serial',
  'timestamp',
  'date',
  'grid_purchase',
  'grid_feedin',
  'direct_consumption',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/**
 * Columns computed from the timestamp. An input column of the same name is
 * not passed through; the derived value is written instead.
 */
export const DERIVED_COLUMNS = ['hour'] as const;

/**
 * Measurement - canonical, typed energy reading of one device
 *
 * `null` marks a value that could not be determined from the source text.
 * It is never replaced by zero at this level, so "missing" stays
 * distinguishable from a measured zero until the aggregators sum.
 *
 * `date` and `hour` are derived together from `timestamp`; both are null
 * exactly when `timestamp` is null.
 */
export interface Measurement {
  readonly serial: string;

  /**
   * Wall-clock reading "2024-01-01T03:15:00.000", with the source offset
   * appended ("2024-06-01T01:30:00.000+02:00") when it had one
   */
  readonly timestamp: string | null;

  /** Calendar date "YYYY-MM-DD" of `timestamp` */
  readonly date: string | null;

  /** Hour of day 0-23 of `timestamp` */
  readonly hour: number | null;

  readonly gridPurchase: number | null;
  readonly gridFeedin: number | null;
  readonly directConsumption: number | null;

  /** Input columns beyond the required ones, verbatim */
  readonly extra: Readonly<Record<string, string>>;
}
