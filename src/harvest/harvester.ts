/**
 * Batch harvest orchestrator. An AsyncGenerator that yields one outcome per
 * identifier and a final HarvestSummary.
 *
 * Per identifier: fetching → checking_existence → extracting →
 * (discarded | assembled) → persisted. Each identifier is an independent task
 * on a sliding window of `concurrency` slots; all outbound requests share one
 * rate gate, and retry state lives inside each task. Records reach the sink
 * one at a time, from the generator loop.
 */
import { loadConfig, type HarvestConfig, type HarvestConfigInput } from '../config.js';
import { fetchDocuments } from '../fetch/document-fetcher.js';
import { RateLimiter, type RateGate } from '../fetch/rate-limiter.js';
import { extractAttributes, extractName, isNotFound } from '../extract/field-extractor.js';
import type { FieldRunner } from '../extract/field-extractor.js';
import { resolveSequence } from '../sequence/sequence-resolver.js';
import { RetryPolicy, type SleepFn } from '../retry/retry-policy.js';
import { PersistenceError } from '../retry/errors.js';
import type { RecordSink } from '../sinks/types.js';
import { assembleRecord } from './record.js';
import { normalizeIds } from './ids.js';
import type {
  HarvestOutcome,
  HarvestResult,
  HarvestStage,
  HarvestSummary,
  PlasmidRecord,
} from './types.js';
import { logger } from '../logger.js';
import type { Logger } from 'pino';

export interface HarvestOptions {
  config?: Partial<HarvestConfigInput>;
  /** Receives each assembled record exactly once */
  sink?: RecordSink;
  /** Once aborted, no new identifiers start; in-flight ones finish */
  signal?: AbortSignal;
  retryPolicy?: RetryPolicy;
  gate?: RateGate;
  /** Used by the default retry policy and rate gate */
  sleep?: SleepFn;
}

export interface TaskContext {
  config: HarvestConfig;
  policy: RetryPolicy;
  gate: RateGate;
  sink?: RecordSink;
}

type EarlyOutcome = Exclude<HarvestOutcome, { status: 'persisted' }>;

/**
 * Fetch, check existence and extract one identifier. Returns the assembled
 * record, or the outcome that ended processing early.
 */
async function assemble(
  id: number,
  ctx: TaskContext,
  log: Logger,
  latency: () => number
): Promise<PlasmidRecord | EarlyOutcome> {
  let stage: HarvestStage = 'fetching';
  try {
    const docs = await ctx.policy.run(
      () =>
        fetchDocuments(id, {
          vendor: ctx.config.vendor,
          baseUrl: ctx.config.baseUrl,
          gate: ctx.gate,
          timeoutMs: ctx.config.timeoutMs,
        }),
      `fetch:${id}`
    );
    if (!docs) {
      return { status: 'skipped', id, reason: 'unsupported_vendor', latencyMs: latency() };
    }

    stage = 'checking_existence';
    if (docs.detailStatus === 404 || isNotFound(docs.detail, docs.profile)) {
      log.info({ stage: 'discarded' }, 'Plasmid not found, skipping');
      return { status: 'skipped', id, reason: 'not_found', latencyMs: latency() };
    }

    const name = extractName(docs.detail, docs.profile);
    if (!name) {
      log.info({ stage: 'discarded' }, 'No plasmid name on page, skipping');
      return { status: 'skipped', id, reason: 'no_name', latencyMs: latency() };
    }

    stage = 'extracting';
    const sequencePayload = await ctx.policy.run(
      () =>
        resolveSequence(docs.sequence, {
          linkSelector: docs.profile.sequenceLinkSelector,
          pageUrl: docs.sequenceUrl,
          attempts: ctx.config.sequenceAttempts,
          userAgent: ctx.config.userAgent,
          gate: ctx.gate,
          timeoutMs: ctx.config.timeoutMs,
        }),
      `sequence:${id}`
    );

    const runField: FieldRunner = (label, extract) => ctx.policy.run(extract, `${label}:${id}`);
    const attributes = await extractAttributes(docs.detail, docs.profile, runField);

    return assembleRecord({
      id,
      name,
      vendor: docs.profile.tag,
      vendorUrl: docs.detailUrl,
      attributes,
      sequencePayload,
    });
  } catch (error) {
    log.error({ stage, error: String(error) }, 'Plasmid harvest failed');
    return { status: 'failed', id, reason: 'transport', error: String(error), latencyMs: latency() };
  }
}

interface AssembledTask {
  id: number;
  result: PlasmidRecord | EarlyOutcome;
  log: Logger;
  latency: () => number;
}

async function assembleTask(id: number, ctx: TaskContext): Promise<AssembledTask> {
  const startTime = Date.now();
  const log = logger.child({ id });
  const latency = () => Date.now() - startTime;
  const result = await assemble(id, ctx, log, latency);
  return { id, result, log, latency };
}

/** Hand a fully assembled record to the sink. Never throws. */
async function persist(
  record: PlasmidRecord,
  ctx: TaskContext,
  log: Logger,
  latency: () => number
): Promise<HarvestOutcome> {
  if (ctx.sink) {
    try {
      await ctx.sink.write(record);
    } catch (error) {
      const failure = new PersistenceError(record.id, error);
      log.error(
        { stage: 'assembled', sink: ctx.sink.kind, error: failure.message },
        'Sink rejected record'
      );
      return {
        status: 'failed',
        id: record.id,
        reason: 'persistence',
        error: failure.message,
        record,
        latencyMs: latency(),
      };
    }
  }

  log.info({ stage: 'persisted', name: record.name }, 'Plasmid harvested');
  return { status: 'persisted', id: record.id, record, latencyMs: latency() };
}

function settle(task: AssembledTask, ctx: TaskContext): Promise<HarvestOutcome> | EarlyOutcome {
  return 'status' in task.result ? task.result : persist(task.result, ctx, task.log, task.latency);
}

/**
 * Process one identifier end to end, handing the record to the sink once it is
 * fully assembled. Never throws; every path ends in an outcome.
 */
export async function harvestOne(id: number, ctx: TaskContext): Promise<HarvestOutcome> {
  return settle(await assembleTask(id, ctx), ctx);
}

/**
 * Harvest a list of identifiers.
 * Yields outcomes in completion order, then a summary.
 */
export async function* harvest(
  ids: Iterable<number>,
  options: HarvestOptions = {}
): AsyncGenerator<HarvestOutcome | HarvestSummary> {
  const config = loadConfig(options.config);
  const queue = normalizeIds(ids);
  const harvestStartTime = Date.now();

  const ctx: TaskContext = {
    config,
    policy:
      options.retryPolicy ??
      new RetryPolicy({
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.baseDelayMs,
        scaleMs: config.scaleMs,
        sleep: options.sleep,
      }),
    gate:
      options.gate ??
      new RateLimiter({ requestsPerSecond: config.requestsPerSecond, sleep: options.sleep }),
    sink: options.sink,
  };

  logger.info(
    { total: queue.length, vendor: config.vendor, concurrency: config.concurrency },
    'Starting harvest'
  );

  let persisted = 0;
  let skipped = 0;
  let failed = 0;
  let next = 0;
  // Workers only assemble; this loop is the single caller of sink.write
  const inflight = new Map<number, Promise<AssembledTask>>();

  function enqueue(): void {
    while (inflight.size < config.concurrency && next < queue.length && !options.signal?.aborted) {
      const id = queue[next++];
      inflight.set(id, assembleTask(id, ctx));
    }
  }

  enqueue();

  while (inflight.size > 0) {
    const task = await Promise.race(inflight.values());
    inflight.delete(task.id);

    const outcome = await settle(task, ctx);
    if (outcome.status === 'persisted') persisted++;
    else if (outcome.status === 'skipped') skipped++;
    else failed++;
    yield outcome;

    enqueue();
  }

  const cancelled = next < queue.length;
  if (cancelled) {
    logger.warn({ remaining: queue.length - next }, 'Harvest cancelled before all identifiers ran');
  }

  const summary: HarvestSummary = {
    type: 'summary',
    total: persisted + skipped + failed,
    persisted,
    skipped,
    failed,
    durationMs: Date.now() - harvestStartTime,
    cancelled,
  };
  logger.info(summary, 'Harvest complete');
  yield summary;
}

/**
 * Run a harvest to completion and collect its results.
 * The returned collections belong to this call only.
 */
export async function runHarvest(
  ids: Iterable<number>,
  options: HarvestOptions = {}
): Promise<HarvestResult> {
  const records: PlasmidRecord[] = [];
  const outcomes: HarvestOutcome[] = [];
  const persistenceFailures: HarvestResult['persistenceFailures'] = [];
  let summary: HarvestSummary | undefined;

  for await (const item of harvest(ids, options)) {
    if ('type' in item) {
      summary = item;
      continue;
    }
    outcomes.push(item);
    if (item.status === 'persisted') {
      records.push(item.record);
    } else if (item.status === 'failed' && item.record) {
      records.push(item.record);
      persistenceFailures.push({ record: item.record, error: item.error });
    }
  }

  if (!summary) {
    throw new Error('Harvest ended without a summary');
  }
  return { records, outcomes, persistenceFailures, summary };
}
