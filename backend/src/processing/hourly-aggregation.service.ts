import { Injectable, Logger } from '@nestjs/common';
import { Measurement } from '../ingestion/dto/measurement.dto';
import { HourlyBucket } from './dto/aggregates.dto';

interface BucketTotals {
  date: string;
  hour: number;
  gridPurchaseTotal: number;
  gridFeedinTotal: number;
}

/**
 * HourlyAggregationService - Grid totals per (date, hour) with peak flag
 *
 * Records without a known timestamp cannot be attributed to an hour and are
 * left out of this aggregation (they still count towards device totals).
 * Unknown readings add nothing to a sum.
 *
 * Peak rule: within a date, every hour whose feed-in total equals the date's
 * maximum is flagged, so tied hours are all peaks.
 */
@Injectable()
export class HourlyAggregationService {
  private readonly logger = new Logger(HourlyAggregationService.name);

  aggregate(measurements: readonly Measurement[]): HourlyBucket[] {
    const buckets = new Map<string, BucketTotals>();
    let unattributed = 0;

    for (const m of measurements) {
      if (m.date === null || m.hour === null) {
        unattributed++;
        continue;
      }

      const key = `${m.date}|${m.hour}`;
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = {
          date: m.date,
          hour: m.hour,
          gridPurchaseTotal: 0,
          gridFeedinTotal: 0,
        };
        buckets.set(key, bucket);
      }
      bucket.gridPurchaseTotal += m.gridPurchase ?? 0;
      bucket.gridFeedinTotal += m.gridFeedin ?? 0;
    }

    const maxFeedinByDate = new Map<string, number>();
    for (const bucket of buckets.values()) {
      const currentMax = maxFeedinByDate.get(bucket.date);
      if (currentMax === undefined || bucket.gridFeedinTotal > currentMax) {
        maxFeedinByDate.set(bucket.date, bucket.gridFeedinTotal);
      }
    }

    const rows = [...buckets.values()]
      .sort((a, b) => {
        if (a.date !== b.date) return a.date < b.date ? -1 : 1;
        return a.hour - b.hour;
      })
      .map((bucket) => ({
        ...bucket,
        isPeakFeedinHour:
          bucket.gridFeedinTotal === maxFeedinByDate.get(bucket.date),
      }));

    this.logger.debug(
      `Aggregated ${measurements.length - unattributed} records into ${rows.length} hourly buckets over ${maxFeedinByDate.size} day(s); ${unattributed} without timestamp skipped`,
    );

    return rows;
  }
}
