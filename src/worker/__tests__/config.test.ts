import { describe, it, expect, vi } from 'vitest';
import { getLoggableConfig, loadWorkerConfig, parseIntEnv } from '../config';
import { ValidationError } from '../../utils/errors';

const baseEnv = {
  VERBATIM_AUTH_TOKEN: 'test-token',
  VERBATIM_DATASET: 'acme/support',
  VERBATIM_SOURCE_NAME: 'Zendesk',
};

describe('loadWorkerConfig', () => {
  it('should fill in defaults', () => {
    expect(loadWorkerConfig({}, baseEnv)).toEqual({
      authToken: 'test-token',
      datasetName: 'acme/support',
      sourceName: 'Zendesk',
      baseUrl: 'https://reinfer.io',
      pollIntervalMs: 1000,
      maxConsecutiveFailures: 5,
      logLevel: 'info',
      serviceName: 'verbatim-sync',
    });
  });

  it('should read optional values from the environment', () => {
    const config = loadWorkerConfig(
      {},
      {
        ...baseEnv,
        VERBATIM_BASE_URL: 'http://localhost:8080',
        VERBATIM_POLL_INTERVAL: '250',
        VERBATIM_MAX_FAILURES: '2',
        LOG_LEVEL: 'debug',
        SERVICE_NAME: 'zendesk-sync',
      }
    );

    expect(config).toMatchObject({
      baseUrl: 'http://localhost:8080',
      pollIntervalMs: 250,
      maxConsecutiveFailures: 2,
      logLevel: 'debug',
      serviceName: 'zendesk-sync',
    });
  });

  it('should let overrides win and ignore undefined ones', () => {
    const config = loadWorkerConfig(
      { sourceName: 'Feefo', authToken: undefined, pollIntervalMs: 0 },
      baseEnv
    );

    expect(config.sourceName).toBe('Feefo');
    expect(config.authToken).toBe('test-token');
    expect(config.pollIntervalMs).toBe(0);
  });

  it('should require a token', () => {
    expect(() => loadWorkerConfig({}, { ...baseEnv, VERBATIM_AUTH_TOKEN: '' })).toThrow(
      'config.authToken: An authentication token is required'
    );
  });

  it('should require an owner in the dataset name', () => {
    expect(() => loadWorkerConfig({ datasetName: 'support' }, baseEnv)).toThrow(ValidationError);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadWorkerConfig({}, { ...baseEnv, LOG_LEVEL: 'loud' })).toThrow(
      'config.logLevel: Unknown log level'
    );
  });
});

describe('parseIntEnv', () => {
  it('should fall back on values that are not integers', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(parseIntEnv({ WAIT: 'soon' }, 'WAIT', 7)).toBe(7);
    expect(parseIntEnv({}, 'WAIT', 7)).toBe(7);
    expect(parseIntEnv({ WAIT: '42' }, 'WAIT', 7)).toBe(42);
  });
});

describe('getLoggableConfig', () => {
  it('should leave out the token', () => {
    const loggable = getLoggableConfig(loadWorkerConfig({}, baseEnv));

    expect(loggable).not.toHaveProperty('authToken');
    expect(loggable).toMatchObject({ datasetName: 'acme/support', sourceName: 'Zendesk' });
  });
});
