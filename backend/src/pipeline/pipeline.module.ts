import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { pipelineConfig } from '../config/pipeline.config';
import { IngestionModule } from '../ingestion/ingestion.module';
import { ProcessingModule } from '../processing/processing.module';
import { OutputModule } from '../output/output.module';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [
    ConfigModule.forFeature(pipelineConfig),
    IngestionModule,
    ProcessingModule,
    OutputModule,
  ],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}
