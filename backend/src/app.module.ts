import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validatePipelineEnv } from './config/pipeline.config';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validatePipelineEnv,
    }),
    PipelineModule,
  ],
})
export class AppModule {}
