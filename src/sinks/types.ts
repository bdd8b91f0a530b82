/**
 * Persistence targets for assembled records.
 */
import type { PlasmidRecord } from '../harvest/types.js';

export type SinkKind = 'csv' | 'json' | 'sqlite' | 'memory';

export interface RecordSink {
  readonly kind: SinkKind;
  /** Persist one record. Throws when the target rejects it. */
  write(record: PlasmidRecord): Promise<void>;
  close(): Promise<void>;
}
