import { Measurement } from '../dto/measurement.dto';

/**
 * Options shared by every parser strategy.
 */
export interface ParseOptions {
  /** Single-character field separator of the input file */
  delimiter: string;
}

/**
 * Outcome for one data row of the input.
 *
 * A row either becomes a Measurement (possibly with unknown fields) or is
 * rejected outright when it cannot be attributed to a device.
 */
export type ParsedRow =
  | {
      kind: 'measurement';
      /** 1-based data row number, header excluded */
      rowNumber: number;
      measurement: Measurement;
      /** Calendar date read from the raw `date` column, for diagnostics only */
      sourceDate: string | null;
    }
  | {
      kind: 'rejected';
      rowNumber: number;
      reason: string;
    };

/**
 * IParser Interface - Strategy for turning an input file into measurements
 *
 * Implementations read the whole buffer, check its structure first and only
 * then yield rows, so a structurally broken file fails before any row is
 * handed to the caller.
 */
export interface IParser {
  /**
   * Unique identifier for this parser, used in logs and errors.
   */
  readonly name: string;

  /**
   * Human-readable description of the accepted format.
   */
  readonly description: string;

  /**
   * Parse the file buffer and yield one result per data row.
   *
   * @throws ParserError if the file is empty or misses required columns
   */
  parse(fileBuffer: Buffer, options: ParseOptions): AsyncGenerator<ParsedRow>;
}

/**
 * Custom error for parser-specific failures.
 */
export class ParserError extends Error {
  constructor(
    public readonly parserName: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${parserName}] ${message}`);
    this.name = 'ParserError';
  }
}
