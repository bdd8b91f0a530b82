import { describe, it, expect } from 'vitest';
import { configFromEnv, loadConfig } from '../config.js';

describe('config', () => {
  it('fills every default', () => {
    expect(loadConfig({}, {})).toEqual({
      baseUrl: 'https://www.addgene.org',
      vendor: 'addgene',
      concurrency: 4,
      requestsPerSecond: 2,
      timeoutMs: 20_000,
      maxAttempts: 623,
      baseDelayMs: 60_000,
      scaleMs: 10_000,
      sequenceAttempts: 3,
      userAgent: expect.stringContaining('Mozilla/5.0'),
    });
  });

  it('reads PLASMID_HARVEST_* variables', () => {
    const config = loadConfig(
      {},
      {
        PLASMID_HARVEST_CONCURRENCY: '8',
        PLASMID_HARVEST_RATE: '0.5',
        PLASMID_HARVEST_BASE_URL: 'http://localhost:8080',
      }
    );
    expect(config.concurrency).toBe(8);
    expect(config.requestsPerSecond).toBe(0.5);
    expect(config.baseUrl).toBe('http://localhost:8080');
  });

  it('lets explicit overrides beat the environment', () => {
    expect(loadConfig({ concurrency: 2 }, { PLASMID_HARVEST_CONCURRENCY: '8' }).concurrency).toBe(2);
  });

  it('ignores undefined overrides', () => {
    const config = loadConfig({ concurrency: undefined }, { PLASMID_HARVEST_CONCURRENCY: '8' });
    expect(config.concurrency).toBe(8);
  });

  it('rejects concurrency above the cap', () => {
    expect(() => loadConfig({ concurrency: 17 }, {})).toThrow(/concurrency/);
  });

  it('reports unparseable numeric variables', () => {
    expect(() => loadConfig({}, { PLASMID_HARVEST_TIMEOUT_MS: 'soon' })).toThrow(
      /^Invalid harvest config:\ntimeoutMs: /
    );
  });

  it('skips blank variables', () => {
    expect(configFromEnv({ PLASMID_HARVEST_VENDOR: '  ', PLASMID_HARVEST_MAX_ATTEMPTS: '5' })).toEqual({
      maxAttempts: 5,
    });
  });
});
