/**
 * Runtime configuration tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULTS, loadConfig, parseLogLevel } from '../src/runtime/config.js';

describe('loadConfig', () => {
  it('should read LOG_LEVEL', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });

  it('should default to info', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      serviceName: DEFAULTS.serviceName,
      serviceVersion: DEFAULTS.serviceVersion,
    });
  });
});

describe('parseLogLevel', () => {
  it('should ignore case', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
  });

  it('should fall back to the default for unknown levels', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
