/**
 * Sink module barrel exports and factory
 */
import { CsvSink } from './csv-sink.js';
import { JsonSink } from './json-sink.js';
import { SqliteSink, type SqliteWriteMode } from './sqlite-sink.js';
import { MemorySink } from './memory-sink.js';
import type { RecordSink, SinkKind } from './types.js';

export { CsvSink, readCsvRecord, toCsvRow, CSV_COLUMNS } from './csv-sink.js';
export { JsonSink } from './json-sink.js';
export { SqliteSink, toSqliteRow, DEFAULT_TABLE } from './sqlite-sink.js';
export { MemorySink } from './memory-sink.js';
export { toSafeFileName, recordFilePath, SYMBOL_SUBSTITUTES } from './filename.js';
export type { RecordSink, SinkKind } from './types.js';
export type { SqliteWriteMode, SqliteSinkOptions } from './sqlite-sink.js';

export interface CreateSinkOptions {
  /** Output directory for file sinks */
  out?: string;
  /** Database file for the sqlite sink */
  db?: string;
  mode?: SqliteWriteMode;
}

export function createSink(kind: SinkKind, options: CreateSinkOptions = {}): RecordSink {
  switch (kind) {
    case 'csv':
      return new CsvSink({ root: options.out ?? '.' });
    case 'json':
      return new JsonSink({ root: options.out ?? '.' });
    case 'sqlite':
      return new SqliteSink({ path: options.db, mode: options.mode });
    case 'memory':
      return new MemorySink();
  }
}
