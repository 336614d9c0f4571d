import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type {
  ParsedRow,
  ParseOptions,
} from '../../src/ingestion/interfaces/parser.interface';
import { createMeasurementsCsv } from './csv-builder';

/**
 * Helper to collect all rows from async generator
 */
export async function collectRows(
  generator: AsyncGenerator<ParsedRow>,
): Promise<ParsedRow[]> {
  const results: ParsedRow[] = [];
  for await (const row of generator) {
    results.push(row);
  }
  return results;
}

/**
 * Parser interface for parseAndCollect helper
 */
interface Parser {
  parse(buffer: Buffer, options: ParseOptions): AsyncGenerator<ParsedRow>;
}

/**
 * Higher-level helper: parse data lines under the default header
 */
export async function parseAndCollect(
  parser: Parser,
  dataLines: string[],
): Promise<ParsedRow[]> {
  return collectRows(
    parser.parse(createMeasurementsCsv(dataLines), { delimiter: ';' }),
  );
}

/**
 * Fresh temporary directory per test; remove with removeTempDir
 */
export function createTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'meter-pipeline-'));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}
