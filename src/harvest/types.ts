/**
 * Types for the harvest module
 */

/** Optional text attributes, in extraction order. */
export const TEXT_FIELDS = [
  'backbone',
  'vectorType',
  'marker',
  'resistance',
  'growthTemperature',
  'growthStrain',
  'growthInstructions',
  'copyNumber',
  'geneInsert',
] as const;

export type TextField = (typeof TEXT_FIELDS)[number];

/** Attributes read from the detail page. `null` means absent, never `''`. */
export type PlasmidAttributes = { readonly [K in TextField]: string | null } & {
  readonly sizeBasePairs: number | null;
};

export interface PlasmidRecord extends PlasmidAttributes {
  readonly id: number;
  readonly name: string;
  readonly vendor: string;
  readonly vendorUrl: string;
  /** Annotated sequence file, decoded to text */
  readonly sequencePayload: string | null;
}

/** Per-identifier processing stages. */
export type HarvestStage =
  | 'fetching'
  | 'checking_existence'
  | 'extracting'
  | 'discarded'
  | 'assembled'
  | 'persisted';

export type SkipReason = 'not_found' | 'no_name' | 'unsupported_vendor';

export type FailureReason = 'transport' | 'persistence';

export type HarvestOutcome =
  | { status: 'persisted'; id: number; record: PlasmidRecord; latencyMs: number }
  | { status: 'skipped'; id: number; reason: SkipReason; latencyMs: number }
  | {
      status: 'failed';
      id: number;
      reason: FailureReason;
      error: string;
      /** Set when the record was assembled but the sink rejected it */
      record?: PlasmidRecord;
      latencyMs: number;
    };

export interface HarvestSummary {
  type: 'summary';
  total: number;
  persisted: number;
  skipped: number;
  failed: number;
  durationMs: number;
  cancelled: boolean;
}

export interface HarvestResult {
  /** Every assembled record, in completion order */
  records: PlasmidRecord[];
  outcomes: HarvestOutcome[];
  /** Assembled records the sink rejected */
  persistenceFailures: Array<{ record: PlasmidRecord; error: string }>;
  summary: HarvestSummary;
}
