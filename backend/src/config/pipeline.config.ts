import { LogLevel } from '@nestjs/common';
import { registerAs } from '@nestjs/config';
import * as path from 'node:path';
import { z } from 'zod';

const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error'];

const delimiter = z
  .string()
  .length(1, 'must be a single character')
  .refine((value) => !['"', '\r', '\n'].includes(value), {
    message: 'cannot be a quote or line break',
  });

/**
 * Environment accepted by the pipeline
 */
export const PipelineEnvSchema = z.object({
  INPUT_PATH: z.string().trim().min(1),
  OUTPUT_DIR: z.string().trim().min(1).default('.'),
  CLEANED_OUTPUT_PATH: z.string().trim().min(1).optional(),
  HOURLY_OUTPUT_PATH: z.string().trim().min(1).optional(),
  SUMMARY_OUTPUT_PATH: z.string().trim().min(1).optional(),
  INPUT_DELIMITER: delimiter.default(';'),
  OUTPUT_DELIMITER: delimiter.default(','),
  LOG_LEVEL: z.enum(['verbose', 'debug', 'log', 'warn', 'error']).default('log'),
});

export type PipelineEnv = z.infer<typeof PipelineEnvSchema>;

export interface PipelineConfig {
  inputPath: string;
  inputDelimiter: string;
  outputDelimiter: string;
  outputs: {
    cleaned: string;
    hourly: string;
    summary: string;
  };
}

export const DEFAULT_OUTPUT_FILENAMES = {
  cleaned: 'cleaned_measurements.csv',
  hourly: 'hourly_grid_totals_with_peak_flag.csv',
  summary: 'summary_by_serial.csv',
} as const;

/**
 * Validate raw environment values. Used as the ConfigModule `validate` hook,
 * so a bad configuration stops the application before any file is read.
 */
export function validatePipelineEnv(config: Record<string, unknown>): PipelineEnv {
  const parsed = PipelineEnvSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${issues}`);
  }
  return parsed.data;
}

export function resolvePipelineConfig(env: PipelineEnv): PipelineConfig {
  return {
    inputPath: env.INPUT_PATH,
    inputDelimiter: env.INPUT_DELIMITER,
    outputDelimiter: env.OUTPUT_DELIMITER,
    outputs: {
      cleaned:
        env.CLEANED_OUTPUT_PATH ??
        path.join(env.OUTPUT_DIR, DEFAULT_OUTPUT_FILENAMES.cleaned),
      hourly:
        env.HOURLY_OUTPUT_PATH ??
        path.join(env.OUTPUT_DIR, DEFAULT_OUTPUT_FILENAMES.hourly),
      summary:
        env.SUMMARY_OUTPUT_PATH ??
        path.join(env.OUTPUT_DIR, DEFAULT_OUTPUT_FILENAMES.summary),
    },
  };
}

/**
 * Log levels printed for a minimum level, e.g. 'warn' -> ['warn', 'error']
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(index === -1 ? LOG_LEVELS.indexOf('log') : index);
}

export const pipelineConfig = registerAs('pipeline', () =>
  resolvePipelineConfig(validatePipelineEnv(process.env)),
);
