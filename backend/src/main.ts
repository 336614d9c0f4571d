import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/pipeline.config';
import { PipelineService } from './pipeline/pipeline.service';
import { errorMessage } from './common/error.utils';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(resolveLogLevels(app.get(ConfigService).get<string>('LOG_LEVEL')));

  const result = await app.get(PipelineService).run();
  await app.close();

  logger.log(
    `Finished in ${result.durationMs} ms: ${result.success ? 'success' : 'failed'}`,
  );
  if (!result.success) {
    process.exitCode = 1;
  }
}

bootstrap().catch((error: unknown) => {
  Logger.flush();
  logger.error(
    `Pipeline could not start: ${errorMessage(error)}`,
  );
  process.exitCode = 1;
});
