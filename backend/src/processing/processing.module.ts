import { Module } from '@nestjs/common';
import { CleaningService } from './cleaning.service';
import { HourlyAggregationService } from './hourly-aggregation.service';
import { DeviceSummaryService } from './device-summary.service';

/**
 * ProcessingModule
 *
 * Pure, stateless stages between ingestion and output:
 * - CleaningService: dedupe + drop records without readings
 * - HourlyAggregationService: (date, hour) totals with daily peak flag
 * - DeviceSummaryService: per-serial totals ranked by purchase
 */
@Module({
  providers: [CleaningService, HourlyAggregationService, DeviceSummaryService],
  exports: [CleaningService, HourlyAggregationService, DeviceSummaryService],
})
export class ProcessingModule {}
