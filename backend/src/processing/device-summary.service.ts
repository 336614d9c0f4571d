import { Injectable, Logger } from '@nestjs/common';
import { Measurement } from '../ingestion/dto/measurement.dto';
import { DeviceSummary } from './dto/aggregates.dto';

/**
 * DeviceSummaryService - Lifetime grid totals per serial
 *
 * Ordered by purchase total descending, then serial ascending (plain code
 * unit order, independent of locale) so equal totals always list the same way.
 */
@Injectable()
export class DeviceSummaryService {
  private readonly logger = new Logger(DeviceSummaryService.name);

  summarize(measurements: readonly Measurement[]): DeviceSummary[] {
    const totals = new Map<
      string,
      { gridPurchaseTotal: number; gridFeedinTotal: number }
    >();

    for (const m of measurements) {
      const current = totals.get(m.serial) ?? {
        gridPurchaseTotal: 0,
        gridFeedinTotal: 0,
      };
      current.gridPurchaseTotal += m.gridPurchase ?? 0;
      current.gridFeedinTotal += m.gridFeedin ?? 0;
      totals.set(m.serial, current);
    }

    const summaries = [...totals.entries()]
      .map(([serial, sums]) => ({ serial, ...sums }))
      .sort((a, b) => {
        if (b.gridPurchaseTotal !== a.gridPurchaseTotal) {
          return b.gridPurchaseTotal - a.gridPurchaseTotal;
        }
        if (a.serial === b.serial) return 0;
        return a.serial < b.serial ? -1 : 1;
      });

    this.logger.debug(`Summarized ${summaries.length} device(s)`);

    return summaries;
  }
}
