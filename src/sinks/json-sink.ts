/**
 * JSON document sink: {root}/plasmids/{safe}/{safe}.json per record, absent
 * values kept as null.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { PlasmidRecord } from '../harvest/types.js';
import { recordFilePath } from './filename.js';
import type { RecordSink } from './types.js';
import { logger } from '../logger.js';

export interface JsonSinkOptions {
  root: string;
}

export class JsonSink implements RecordSink {
  readonly kind = 'json';
  private readonly root: string;

  constructor(options: JsonSinkOptions) {
    this.root = options.root;
  }

  pathFor(name: string): string {
    return recordFilePath(this.root, name, 'json');
  }

  async write(record: PlasmidRecord): Promise<void> {
    const jsonPath = this.pathFor(record.name);
    await mkdir(dirname(jsonPath), { recursive: true });
    await writeFile(jsonPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    logger.debug({ id: record.id, path: jsonPath }, 'Wrote JSON record');
  }

  async close(): Promise<void> {}
}
