import { describe, it, expect } from 'vitest';

const EXPECTED_EXPORTS = [
  'harvest',
  'runHarvest',
  'indexByName',
  'parseIdList',
  'idRange',
  'RetryPolicy',
  'RateLimiter',
  'fetchDocuments',
  'extractAttributes',
  'resolveSequence',
  'registerVendor',
  'getVendorProfile',
  'loadConfig',
  'createSink',
  'CsvSink',
  'JsonSink',
  'SqliteSink',
  'readCsvRecord',
  'toSafeFileName',
  'closeAllSessions',
] as const;

describe('public API exports', () => {
  it.each(EXPECTED_EXPORTS)('exports %s as a function', async (name) => {
    const exported = new Map(Object.entries(await import('../index.js')));
    expect(typeof exported.get(name)).toBe('function');
  });
});
