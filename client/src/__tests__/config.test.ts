import { describe, it, expect } from '@jest/globals';
import { DEFAULT_BASE_URL, loadConfig } from '../config';

describe('loadConfig', () => {
  it('reads settings from the environment', () => {
    const config = loadConfig({
      JOB_SERVICE_URL: 'http://jobs.test/',
      JOB_SERVICE_TIMEOUT_MS: '1500',
      JOB_SERVICE_LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({ baseUrl: 'http://jobs.test/', timeoutMs: 1500, logLevel: 'debug' });
  });

  it('uses defaults for unset variables', () => {
    expect(loadConfig({})).toEqual({ baseUrl: DEFAULT_BASE_URL, timeoutMs: 30000, logLevel: 'info' });
  });

  it('falls back to the default timeout for values that are not positive integers', () => {
    expect(loadConfig({ JOB_SERVICE_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(30000);
    expect(loadConfig({ JOB_SERVICE_TIMEOUT_MS: '-5' }).timeoutMs).toBe(30000);
    expect(loadConfig({ JOB_SERVICE_TIMEOUT_MS: '2.5' }).timeoutMs).toBe(30000);
  });

  it('ignores an unknown log level', () => {
    expect(loadConfig({ JOB_SERVICE_LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });
});
