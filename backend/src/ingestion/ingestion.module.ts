import { Module } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import { MeasurementsCsvParser } from './strategies/measurements-csv.strategy';

/**
 * IngestionModule
 *
 * Reads an input snapshot into typed measurements.
 *
 * Components:
 * - IngestionService: reads the file, runs the parser, counts rejects
 * - MeasurementsCsvParser: strategy for the delimited meter export
 */
@Module({
  providers: [IngestionService, MeasurementsCsvParser],
  exports: [IngestionService],
})
export class IngestionModule {}
