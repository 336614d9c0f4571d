import { Injectable, Logger } from '@nestjs/common';
import { Measurement } from '../ingestion/dto/measurement.dto';

export interface CleaningResult {
  records: readonly Measurement[];
  duplicatesRemoved: number;
  emptyRecordsRemoved: number;
}

/**
 * Identity of a measurement over every field, unknowns included.
 * Strings are quoted by JSON, so "null" text never collides with null.
 */
function measurementKey(m: Measurement): string {
  return JSON.stringify([
    m.serial,
    m.timestamp,
    m.date,
    m.hour,
    m.gridPurchase,
    m.gridFeedin,
    m.directConsumption,
    Object.entries(m.extra),
  ]);
}

function hasEnergyReading(m: Measurement): boolean {
  return (
    m.gridPurchase !== null ||
    m.gridFeedin !== null ||
    m.directConsumption !== null
  );
}

/**
 * CleaningService - Deduplication and completeness filter
 *
 * Applied in order:
 * 1. Drop records equal in every field to an earlier record (first wins)
 * 2. Drop records whose three energy readings are all unknown
 *
 * Both filters are stable, so survivors keep their input order, and running
 * the service on its own output removes nothing.
 */
@Injectable()
export class CleaningService {
  private readonly logger = new Logger(CleaningService.name);

  clean(measurements: readonly Measurement[]): CleaningResult {
    const seen = new Set<string>();
    const unique: Measurement[] = [];

    for (const measurement of measurements) {
      const key = measurementKey(measurement);
      if (!seen.has(key)) {
        seen.add(key);
        unique.push(measurement);
      }
    }

    const records = unique.filter(hasEnergyReading);
    const result: CleaningResult = {
      records,
      duplicatesRemoved: measurements.length - unique.length,
      emptyRecordsRemoved: unique.length - records.length,
    };

    this.logger.debug(
      `Cleaned ${measurements.length} -> ${records.length} records (${result.duplicatesRemoved} duplicates, ${result.emptyRecordsRemoved} without readings)`,
    );

    return result;
  }
}
