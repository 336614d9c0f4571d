// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService, InputReadError } from './ingestion.service';
export type { IngestionResult } from './ingestion.service';
export { parseMeasurement } from './strategies/measurements-csv.strategy';
export { REQUIRED_COLUMNS } from './dto/measurement.dto';
export type { Measurement, RawRow } from './dto/measurement.dto';
export { ParserError } from './interfaces/parser.interface';
export type { IParser, ParsedRow, ParseOptions } from './interfaces/parser.interface';
