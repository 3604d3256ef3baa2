/**
 * @fileoverview Tests for environment-driven logger configuration
 */

import { describe, it, expect } from 'vitest';
import { ConfigValidationError } from '@tickline/contracts';
import { loadLoggerConfig } from '../src/config.js';

describe('loadLoggerConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadLoggerConfig({})).toEqual({ level: 'info', json: true, filePath: undefined });
  });

  it('should map LOG_LEVEL, LOG_FORMAT and LOG_FILE', () => {
    const config = loadLoggerConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'pretty',
      LOG_FILE: './logs/tickline.log',
    });

    expect(config).toEqual({ level: 'debug', json: false, filePath: './logs/tickline.log' });
  });

  it('should ignore empty variables', () => {
    expect(loadLoggerConfig({ LOG_LEVEL: '' }).level).toBe('info');
  });

  it('should reject unknown levels', () => {
    expect(() => loadLoggerConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigValidationError);

    try {
      loadLoggerConfig({ LOG_LEVEL: 'verbose', LOG_FORMAT: 'xml' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        const issues = error.data?.['issues'];
        expect(Array.isArray(issues) ? issues.length : 0).toBe(2);
      }
    }
  });
});
