import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { pipelineConfig } from '../config/pipeline.config';
import { IngestionService } from '../ingestion/ingestion.service';
import { CleaningService } from '../processing/cleaning.service';
import { HourlyAggregationService } from '../processing/hourly-aggregation.service';
import { DeviceSummaryService } from '../processing/device-summary.service';
import { OutputService } from '../output/output.service';
import {
  serializeDeviceSummaries,
  serializeHourlyBuckets,
  serializeMeasurements,
} from '../output/csv-serializers';
import { errorMessage } from '../common/error.utils';

/**
 * Run report
 */
export interface PipelineResult {
  success: boolean;
  inputPath: string;
  rowsRead: number;
  rowsRejected: number;
  recordsParsed: number;
  duplicatesRemoved: number;
  emptyRecordsRemoved: number;
  recordsCleaned: number;
  unknownTimestamps: number;
  dateColumnMismatches: number;
  hourlyBuckets: number;
  devices: number;
  outputs: string[];
  errors: string[];
  durationMs: number;
}

/**
 * PipelineService - One batch run over one input snapshot
 *
 * Parse -> Clean -> {Hourly, Device} -> Write. Every stage takes the previous
 * stage's output and returns a new sequence; nothing is shared between runs.
 *
 * A run either publishes all three outputs or none. Failures are caught here,
 * logged and reported with `success: false`; retrying is up to the caller.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: ConfigType<typeof pipelineConfig>,
    private readonly ingestionService: IngestionService,
    private readonly cleaningService: CleaningService,
    private readonly hourlyAggregationService: HourlyAggregationService,
    private readonly deviceSummaryService: DeviceSummaryService,
    private readonly outputService: OutputService,
  ) {}

  async run(): Promise<PipelineResult> {
    const startTime = Date.now();
    const { inputPath, inputDelimiter, outputDelimiter, outputs } = this.config;
    const result: PipelineResult = {
      success: false,
      inputPath,
      rowsRead: 0,
      rowsRejected: 0,
      recordsParsed: 0,
      duplicatesRemoved: 0,
      emptyRecordsRemoved: 0,
      recordsCleaned: 0,
      unknownTimestamps: 0,
      dateColumnMismatches: 0,
      hourlyBuckets: 0,
      devices: 0,
      outputs: [],
      errors: [],
      durationMs: 0,
    };

    try {
      const ingestion = await this.ingestionService.ingestFile(
        inputPath,
        inputDelimiter,
      );
      result.rowsRead = ingestion.rowsRead;
      result.rowsRejected = ingestion.rowsRejected;
      result.recordsParsed = ingestion.measurements.length;
      result.unknownTimestamps = ingestion.unknownTimestamps;
      result.dateColumnMismatches = ingestion.dateColumnMismatches;

      const cleaning = this.cleaningService.clean(ingestion.measurements);
      result.duplicatesRemoved = cleaning.duplicatesRemoved;
      result.emptyRecordsRemoved = cleaning.emptyRecordsRemoved;
      result.recordsCleaned = cleaning.records.length;

      const buckets = this.hourlyAggregationService.aggregate(cleaning.records);
      const summaries = this.deviceSummaryService.summarize(cleaning.records);
      result.hourlyBuckets = buckets.length;
      result.devices = summaries.length;

      result.outputs = await this.outputService.publish([
        {
          path: outputs.cleaned,
          content: serializeMeasurements(cleaning.records, outputDelimiter),
        },
        {
          path: outputs.hourly,
          content: serializeHourlyBuckets(buckets, outputDelimiter),
        },
        {
          path: outputs.summary,
          content: serializeDeviceSummaries(summaries, outputDelimiter),
        },
      ]);

      result.success = true;
      this.logger.log(
        `Run complete: ${result.recordsCleaned}/${result.rowsRead} rows kept, ${result.hourlyBuckets} hourly buckets, ${result.devices} device(s)`,
      );
    } catch (error) {
      const message = errorMessage(error);
      result.errors.push(message);
      this.logger.error(`Run failed for ${inputPath}: ${message}`);
    }

    result.durationMs = Date.now() - startTime;
    return result;
  }
}
