/**
 * plasmid-harvest - Resilient retrieval and extraction of plasmid records from
 * vendor web pages, with pluggable CSV, JSON and SQLite sinks.
 *
 * @module plasmid-harvest
 */
export { harvest, harvestOne, runHarvest } from './harvest/harvester.js';
export { assembleRecord, indexByName } from './harvest/record.js';
export { parseIdList, idRange, normalizeIds, isValidId } from './harvest/ids.js';
export { RetryPolicy, defaultSleep } from './retry/retry-policy.js';
export {
  TransientTransportError,
  RetryExhaustedError,
  HttpStatusError,
  ResponseTooLargeError,
  PersistenceError,
  isTransientError,
} from './retry/errors.js';
export { fetchDocuments, fetchPage, isRetryableStatus } from './fetch/document-fetcher.js';
export { RateLimiter, unlimited } from './fetch/rate-limiter.js';
export { httpRequest, getSession, closeAllSessions } from './fetch/http-client.js';
export {
  extractAttributes,
  extractName,
  extractTextField,
  extractNumericField,
  isNotFound,
  parseBasePairs,
} from './extract/field-extractor.js';
export {
  resolveSequence,
  decodeSequencePayload,
  sizeFromSequenceHeader,
} from './sequence/sequence-resolver.js';
export {
  getVendorProfile,
  registerVendor,
  unregisterVendor,
  getRegisteredVendors,
  DEFAULT_VENDOR,
} from './vendors/registry.js';
export { ADDGENE, ADDGENE_FIELD_RULES } from './vendors/addgene.js';
export { loadConfig, configFromEnv, HarvestConfigSchema } from './config.js';
export {
  createSink,
  CsvSink,
  JsonSink,
  SqliteSink,
  MemorySink,
  readCsvRecord,
  toSafeFileName,
  recordFilePath,
} from './sinks/index.js';
export type {
  PlasmidRecord,
  PlasmidAttributes,
  TextField,
  HarvestOutcome,
  HarvestSummary,
  HarvestResult,
  HarvestStage,
  SkipReason,
  FailureReason,
} from './harvest/types.js';
export type { HarvestOptions, TaskContext } from './harvest/harvester.js';
export type { HarvestConfig, HarvestConfigInput } from './config.js';
export type { RetryPolicyOptions, SleepFn } from './retry/retry-policy.js';
export type { RateGate } from './fetch/rate-limiter.js';
export type { FetchedDocuments } from './fetch/document-fetcher.js';
export type { HttpResponse } from './fetch/http-client.js';
export type { VendorProfile, FieldRule } from './vendors/types.js';
export type { RecordSink, SinkKind, SqliteWriteMode } from './sinks/index.js';
