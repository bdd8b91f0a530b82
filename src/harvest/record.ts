/**
 * Record assembly and batch-level views over assembled records.
 */
import { sizeFromSequenceHeader } from '../sequence/sequence-resolver.js';
import type { PlasmidAttributes, PlasmidRecord } from './types.js';

export interface RecordParts {
  id: number;
  name: string;
  vendor: string;
  vendorUrl: string;
  attributes: PlasmidAttributes;
  sequencePayload: string | null;
}

/**
 * Build the immutable record for one identifier.
 * A missing size falls back to the GenBank LOCUS line of the sequence payload.
 */
export function assembleRecord(parts: RecordParts): PlasmidRecord {
  const name = parts.name.trim();
  if (name.length === 0) {
    throw new Error(`Plasmid ${parts.id} has no name`);
  }

  const { attributes } = parts;
  return Object.freeze({
    id: parts.id,
    name,
    vendor: parts.vendor,
    vendorUrl: parts.vendorUrl,
    backbone: attributes.backbone,
    vectorType: attributes.vectorType,
    marker: attributes.marker,
    resistance: attributes.resistance,
    growthTemperature: attributes.growthTemperature,
    growthStrain: attributes.growthStrain,
    growthInstructions: attributes.growthInstructions,
    copyNumber: attributes.copyNumber,
    geneInsert: attributes.geneInsert,
    sizeBasePairs: attributes.sizeBasePairs ?? sizeFromSequenceHeader(parts.sequencePayload),
    sequencePayload: parts.sequencePayload,
  });
}

/**
 * Key records by name. When two identifiers resolve to the same name the later
 * record wins.
 */
export function indexByName(records: readonly PlasmidRecord[]): Map<string, PlasmidRecord> {
  const byName = new Map<string, PlasmidRecord>();
  for (const record of records) {
    byName.set(record.name, record);
  }
  return byName;
}
