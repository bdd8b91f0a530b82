/**
 * Keeps records in memory, in write order.
 */
import type { PlasmidRecord } from '../harvest/types.js';
import type { RecordSink } from './types.js';

export class MemorySink implements RecordSink {
  readonly kind = 'memory';
  readonly records: PlasmidRecord[] = [];

  async write(record: PlasmidRecord): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {}
}
