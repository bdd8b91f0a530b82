/**
 * Relational sink backed by better-sqlite3.
 *
 * The table is created on first write if absent; rows are keyed by the vendor
 * identifier. All values are bound as parameters and absent values go in as NULL.
 */
import Database from 'better-sqlite3';
import type { PlasmidRecord } from '../harvest/types.js';
import type { RecordSink } from './types.js';
import { logger } from '../logger.js';

/**
 * upsert: a repeated id updates the existing row.
 * insert: a repeated id is rejected by the primary key.
 */
export type SqliteWriteMode = 'upsert' | 'insert';

export interface SqliteSinkOptions {
  /** Database file; ignored when `database` is given */
  path?: string;
  /** Existing connection (not closed by the sink) */
  database?: Database.Database;
  table?: string;
  mode?: SqliteWriteMode;
}

export const DEFAULT_TABLE = 'plasmids';

interface SqliteRow {
  id: number;
  name: string;
  vendor: string;
  url: string;
  size: number | null;
  backbone: string | null;
  vector_type: string | null;
  marker: string | null;
  resistance: string | null;
  growth_temperature: string | null;
  growth_strain: string | null;
  growth_instructions: string | null;
  copy_number: string | null;
  gene_insert: string | null;
  sequence: string | null;
}

const COLUMNS = [
  'id',
  'name',
  'vendor',
  'url',
  'size',
  'backbone',
  'vector_type',
  'marker',
  'resistance',
  'growth_temperature',
  'growth_strain',
  'growth_instructions',
  'copy_number',
  'gene_insert',
  'sequence',
] as const satisfies ReadonlyArray<keyof SqliteRow>;

export function toSqliteRow(record: PlasmidRecord): SqliteRow {
  return {
    id: record.id,
    name: record.name,
    vendor: record.vendor,
    url: record.vendorUrl,
    size: record.sizeBasePairs,
    backbone: record.backbone,
    vector_type: record.vectorType,
    marker: record.marker,
    resistance: record.resistance,
    growth_temperature: record.growthTemperature,
    growth_strain: record.growthStrain,
    growth_instructions: record.growthInstructions,
    copy_number: record.copyNumber,
    gene_insert: record.geneInsert,
    sequence: record.sequencePayload,
  };
}

export class SqliteSink implements RecordSink {
  readonly kind = 'sqlite';
  readonly table: string;
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly mode: SqliteWriteMode;
  private insert: Database.Statement<[SqliteRow]> | null = null;

  constructor(options: SqliteSinkOptions = {}) {
    this.table = options.table ?? DEFAULT_TABLE;
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(this.table)) {
      throw new Error(`Invalid table name: ${this.table}`);
    }
    this.mode = options.mode ?? 'upsert';

    if (options.database) {
      this.db = options.database;
      this.ownsDatabase = false;
    } else {
      this.db = new Database(options.path ?? 'plasmids.db');
      this.ownsDatabase = true;
    }
  }

  /** Create the table if it does not exist yet. Safe to call repeatedly. */
  ensureTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        vendor TEXT NOT NULL,
        url TEXT NOT NULL,
        size INTEGER,
        backbone TEXT,
        vector_type TEXT,
        marker TEXT,
        resistance TEXT,
        growth_temperature TEXT,
        growth_strain TEXT,
        growth_instructions TEXT,
        copy_number TEXT,
        gene_insert TEXT,
        sequence TEXT
      )
    `);
  }

  private statement(): Database.Statement<[SqliteRow]> {
    if (this.insert) return this.insert;

    this.ensureTable();
    const columns = COLUMNS.join(', ');
    const params = COLUMNS.map((column) => `@${column}`).join(', ');
    const updates = COLUMNS.filter((column) => column !== 'id')
      .map((column) => `${column} = excluded.${column}`)
      .join(', ');
    const conflict = this.mode === 'upsert' ? ` ON CONFLICT(id) DO UPDATE SET ${updates}` : '';

    this.insert = this.db.prepare<SqliteRow>(
      `INSERT INTO ${this.table} (${columns}) VALUES (${params})${conflict}`
    );
    return this.insert;
  }

  async write(record: PlasmidRecord): Promise<void> {
    const result = this.statement().run(toSqliteRow(record));
    logger.debug({ id: record.id, table: this.table, changes: result.changes }, 'Wrote SQLite row');
  }

  async close(): Promise<void> {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }
}
