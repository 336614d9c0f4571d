import * as path from 'node:path';
import {
  resolveLogLevels,
  resolvePipelineConfig,
  validatePipelineEnv,
} from './pipeline.config';

describe('pipeline config', () => {
  describe('validatePipelineEnv', () => {
    it('should apply defaults', () => {
      expect(validatePipelineEnv({ INPUT_PATH: 'data.csv' })).toEqual({
        INPUT_PATH: 'data.csv',
        OUTPUT_DIR: '.',
        INPUT_DELIMITER: ';',
        OUTPUT_DELIMITER: ',',
        LOG_LEVEL: 'log',
      });
    });

    it('should require an input path', () => {
      expect(() => validatePipelineEnv({})).toThrow(
        /^Invalid pipeline configuration: INPUT_PATH: /,
      );
    });

    it('should reject multi-character delimiters', () => {
      expect(() =>
        validatePipelineEnv({ INPUT_PATH: 'data.csv', INPUT_DELIMITER: ';;' }),
      ).toThrow(
        'Invalid pipeline configuration: INPUT_DELIMITER: must be a single character',
      );
    });

    it('should reject a quote as delimiter', () => {
      expect(() =>
        validatePipelineEnv({ INPUT_PATH: 'data.csv', OUTPUT_DELIMITER: '"' }),
      ).toThrow(
        'Invalid pipeline configuration: OUTPUT_DELIMITER: cannot be a quote or line break',
      );
    });

    it('should reject unknown log levels', () => {
      expect(() =>
        validatePipelineEnv({ INPUT_PATH: 'data.csv', LOG_LEVEL: 'loud' }),
      ).toThrow(/LOG_LEVEL/);
    });

    it('should ignore unrelated environment variables', () => {
      const env = validatePipelineEnv({ INPUT_PATH: 'data.csv', HOME: '/root' });

      expect(env).not.toHaveProperty('HOME');
    });
  });

  describe('resolvePipelineConfig', () => {
    it('should place default file names in the output directory', () => {
      const config = resolvePipelineConfig(
        validatePipelineEnv({ INPUT_PATH: 'in.csv', OUTPUT_DIR: 'out' }),
      );

      expect(config).toEqual({
        inputPath: 'in.csv',
        inputDelimiter: ';',
        outputDelimiter: ',',
        outputs: {
          cleaned: path.join('out', 'cleaned_measurements.csv'),
          hourly: path.join('out', 'hourly_grid_totals_with_peak_flag.csv'),
          summary: path.join('out', 'summary_by_serial.csv'),
        },
      });
    });

    it('should let explicit paths override the output directory', () => {
      const config = resolvePipelineConfig(
        validatePipelineEnv({
          INPUT_PATH: 'in.csv',
          OUTPUT_DIR: 'out',
          SUMMARY_OUTPUT_PATH: '/tmp/summary.csv',
        }),
      );

      expect(config.outputs.summary).toBe('/tmp/summary.csv');
      expect(config.outputs.cleaned).toBe(
        path.join('out', 'cleaned_measurements.csv'),
      );
    });
  });

  describe('resolveLogLevels', () => {
    it('should include the given level and everything more severe', () => {
      expect(resolveLogLevels('warn')).toEqual(['warn', 'error']);
      expect(resolveLogLevels('verbose')).toEqual([
        'verbose',
        'debug',
        'log',
        'warn',
        'error',
      ]);
    });

    it('should fall back to log', () => {
      expect(resolveLogLevels(undefined)).toEqual(['log', 'warn', 'error']);
    });
  });
});
