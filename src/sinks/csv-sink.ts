/**
 * Flat-file sink: one directory per plasmid holding a one-row CSV of its
 * attributes and, when downloaded, the GenBank file.
 *
 * Absent values are written as empty cells and read back as null.
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { TEXT_FIELDS, type PlasmidRecord, type TextField } from '../harvest/types.js';
import { parseBasePairs } from '../extract/field-extractor.js';
import { recordFilePath } from './filename.js';
import type { RecordSink } from './types.js';
import { logger } from '../logger.js';

export const CSV_COLUMNS = [
  'id',
  'name',
  'vendor',
  'vendorUrl',
  'sizeBasePairs',
  ...TEXT_FIELDS,
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

const CsvRowsSchema = z.array(z.record(z.string())).length(1);

export function toCsvRow(record: PlasmidRecord): CsvRow {
  return {
    id: String(record.id),
    name: record.name,
    vendor: record.vendor,
    vendorUrl: record.vendorUrl,
    sizeBasePairs: record.sizeBasePairs === null ? '' : String(record.sizeBasePairs),
    backbone: record.backbone ?? '',
    vectorType: record.vectorType ?? '',
    marker: record.marker ?? '',
    resistance: record.resistance ?? '',
    growthTemperature: record.growthTemperature ?? '',
    growthStrain: record.growthStrain ?? '',
    growthInstructions: record.growthInstructions ?? '',
    copyNumber: record.copyNumber ?? '',
    geneInsert: record.geneInsert ?? '',
  };
}

export interface CsvSinkOptions {
  /** Directory under which plasmids/ is created */
  root: string;
}

export class CsvSink implements RecordSink {
  readonly kind = 'csv';
  private readonly root: string;

  constructor(options: CsvSinkOptions) {
    this.root = options.root;
  }

  /** Path of the CSV file for a record name. */
  pathFor(name: string): string {
    return recordFilePath(this.root, name, 'csv');
  }

  async write(record: PlasmidRecord): Promise<void> {
    const csvPath = this.pathFor(record.name);
    await mkdir(dirname(csvPath), { recursive: true });

    const csv = stringify([toCsvRow(record)], { header: true, columns: [...CSV_COLUMNS] });
    await writeFile(csvPath, csv, 'utf-8');

    if (record.sequencePayload !== null) {
      const sequencePath = recordFilePath(this.root, record.name, 'gb');
      await writeFile(sequencePath, record.sequencePayload, 'utf-8');
    }
    logger.debug({ id: record.id, path: csvPath }, 'Wrote CSV record');
  }

  async close(): Promise<void> {}
}

function emptyToNull(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Read a record written by CsvSink. The GenBank file beside it, if any,
 * becomes the sequence payload.
 */
export async function readCsvRecord(csvPath: string): Promise<PlasmidRecord> {
  const content = await readFile(csvPath, 'utf-8');
  const [row] = CsvRowsSchema.parse(parse(content, { columns: true, skip_empty_lines: true }));

  const id = Number(row.id);
  const name = row.name;
  if (!Number.isSafeInteger(id) || !name) {
    throw new Error(`Malformed plasmid CSV: ${csvPath}`);
  }

  const text = (field: TextField): string | null => emptyToNull(row[field]);

  return Object.freeze({
    id,
    name,
    vendor: row.vendor ?? '',
    vendorUrl: row.vendorUrl ?? '',
    backbone: text('backbone'),
    vectorType: text('vectorType'),
    marker: text('marker'),
    resistance: text('resistance'),
    growthTemperature: text('growthTemperature'),
    growthStrain: text('growthStrain'),
    growthInstructions: text('growthInstructions'),
    copyNumber: text('copyNumber'),
    geneInsert: text('geneInsert'),
    sizeBasePairs: parseBasePairs(emptyToNull(row.sizeBasePairs)),
    sequencePayload: await readOptional(csvPath.replace(/\.csv$/, '.gb')),
  });
}
