#!/usr/bin/env node
/**
 * CLI entry point for plasmid-harvest
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { closeAllSessions } from './fetch/http-client.js';
import { harvest } from './harvest/harvester.js';
import { idRange, normalizeIds, parseIdList } from './harvest/ids.js';
import type { HarvestOutcome, HarvestSummary } from './harvest/types.js';
import { createSink, type RecordSink } from './sinks/index.js';
import type { HarvestConfigInput } from './config.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return typeof pkg.version === 'string' ? pkg.version : 'unknown';
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export type SinkChoice = 'csv' | 'json' | 'sqlite' | 'none';

export interface CliOptions {
  ids: number[];
  sink: SinkChoice;
  out: string;
  db: string;
  insertOnly: boolean;
  json: boolean;
  quiet: boolean;
  config: Partial<HarvestConfigInput>;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

const SINK_CHOICES: readonly SinkChoice[] = ['csv', 'json', 'sqlite', 'none'];

function isSinkChoice(value: string): value is SinkChoice {
  return SINK_CHOICES.some((choice) => choice === value);
}

/** Parse a strictly positive number; integers only unless `fractional`. */
function positive(value: string, fractional = false): number | null {
  const pattern = fractional ? /^\d+(\.\d+)?$/ : /^\d+$/;
  if (!pattern.test(value)) return null;
  const n = Number(value);
  return n > 0 ? n : null;
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const ranges: number[][] = [];
  const config: Partial<HarvestConfigInput> = {};
  let sink: SinkChoice = 'csv';
  let out = '.';
  let db = 'plasmids.db';
  let insertOnly = false;
  let json = false;
  let quiet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const needsValue = (): string | null => (i + 1 < args.length ? args[++i] : null);

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--json':
        json = true;
        break;
      case '-q':
      case '--quiet':
        quiet = true;
        break;
      case '--insert-only':
        insertOnly = true;
        break;
      case '--range': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--range requires a value' };
        const match = /^(\d+)-(\d+)$/.exec(v);
        if (!match) return { kind: 'error', message: '--range must look like <start>-<end>' };
        try {
          ranges.push(idRange(Number(match[1]), Number(match[2])));
        } catch (error) {
          return { kind: 'error', message: error instanceof Error ? error.message : String(error) };
        }
        break;
      }
      case '--vendor': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--vendor requires a value' };
        config.vendor = v;
        break;
      }
      case '--base-url': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--base-url requires a value' };
        if (!/^https?:\/\//i.test(v)) {
          return { kind: 'error', message: '--base-url must start with http:// or https://' };
        }
        config.baseUrl = v;
        break;
      }
      case '--sink': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--sink requires a value' };
        if (!isSinkChoice(v)) {
          return { kind: 'error', message: `--sink must be one of ${SINK_CHOICES.join(', ')}` };
        }
        sink = v;
        break;
      }
      case '--out': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--out requires a value' };
        out = v;
        break;
      }
      case '--db': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--db requires a value' };
        db = v;
        break;
      }
      case '--concurrency': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--concurrency requires a value' };
        const n = positive(v);
        if (n === null) {
          return { kind: 'error', message: '--concurrency must be a positive integer' };
        }
        config.concurrency = n;
        break;
      }
      case '--rate': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--rate requires a value' };
        const n = positive(v, true);
        if (n === null) return { kind: 'error', message: '--rate must be a positive number' };
        config.requestsPerSecond = n;
        break;
      }
      case '--timeout': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--timeout requires a value' };
        const n = positive(v);
        if (n === null) {
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        }
        config.timeoutMs = n;
        break;
      }
      case '--max-attempts': {
        const v = needsValue();
        if (v === null) return { kind: 'error', message: '--max-attempts requires a value' };
        const n = positive(v);
        if (n === null) {
          return { kind: 'error', message: '--max-attempts must be a positive integer' };
        }
        config.maxAttempts = n;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  let ids: number[];
  try {
    ids = normalizeIds([...parseIdList(positional.join(' ')), ...ranges.flat()]);
  } catch (error) {
    return { kind: 'error', message: error instanceof Error ? error.message : String(error) };
  }

  if (ids.length === 0) {
    return { kind: 'error', message: 'Missing plasmid identifiers (give <id...> or --range)' };
  }

  return {
    kind: 'ok',
    opts: { ids, sink, out, db, insertOnly, json, quiet, config },
    warnings,
  };
}

function printUsage(): void {
  console.log(`Usage: plasmid-harvest <id...> [options]
       plasmid-harvest --range <start>-<end> [options]

Fetches each plasmid's detail page and GenBank file, extracts its attributes,
and writes one record per plasmid found.

Options:
  --range <a>-<b>     Identifiers from a (inclusive) to b (exclusive), repeatable
  --vendor <tag>      Vendor profile (default: addgene)
  --base-url <url>    Vendor site root (default: the vendor's own)
  --sink <kind>       csv | json | sqlite | none (default: csv)
  --out <dir>         Output root for csv/json sinks (default: .)
  --db <file>         SQLite database file (default: plasmids.db)
  --insert-only       SQLite: reject repeated identifiers instead of updating
  --concurrency <n>   Identifiers processed in parallel (default: 4, max: 16)
  --rate <n>          Max requests per second across all tasks (default: 2)
  --timeout <ms>      Request timeout in milliseconds (default: 20000)
  --max-attempts <n>  Attempts per operation on transient failures (default: 623)
  --json              One JSON line per outcome, then the summary
  -q, --quiet         Print only the names of harvested plasmids
  -v, --version       Show version number
  -h, --help          Show this help message

Environment:
  PLASMID_HARVEST_BASE_URL, PLASMID_HARVEST_VENDOR, PLASMID_HARVEST_CONCURRENCY,
  PLASMID_HARVEST_RATE, PLASMID_HARVEST_TIMEOUT_MS, PLASMID_HARVEST_MAX_ATTEMPTS,
  PLASMID_HARVEST_BASE_DELAY_MS, PLASMID_HARVEST_SCALE_MS, PLASMID_HARVEST_USER_AGENT
  LOG_LEVEL (default: info), NODE_ENV=development for pretty logs on stderr`);
}

/** One human-readable line per outcome. */
export function formatOutcome(outcome: HarvestOutcome): string {
  switch (outcome.status) {
    case 'persisted':
      return `${outcome.id}\tok\t${outcome.record.name}`;
    case 'skipped':
      return `${outcome.id}\tskipped\t${outcome.reason}`;
    case 'failed':
      return `${outcome.id}\tfailed\t${outcome.reason}: ${outcome.error}`;
  }
}

export function formatSummary(summary: HarvestSummary): string {
  const cancelled = summary.cancelled ? ' (cancelled)' : '';
  return (
    `Harvest complete: ${summary.persisted} harvested, ${summary.skipped} skipped, ` +
    `${summary.failed} failed of ${summary.total}, ${summary.durationMs}ms${cancelled}`
  );
}

function openSink(opts: CliOptions): RecordSink | undefined {
  if (opts.sink === 'none') return undefined;
  return createSink(opts.sink, {
    out: opts.out,
    db: opts.db,
    mode: opts.insertOnly ? 'insert' : 'upsert',
  });
}

/** Returns the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(argv);

  switch (result.kind) {
    case 'version':
      console.log(`plasmid-harvest ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.error('Interrupted, finishing in-flight plasmids...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const sink = openSink(opts);
  let failed = 0;

  try {
    for await (const item of harvest(opts.ids, {
      config: opts.config,
      sink,
      signal: controller.signal,
    })) {
      if ('type' in item) {
        if (opts.json) console.log(JSON.stringify(item));
        else console.error(`\n${formatSummary(item)}`);
        failed = item.failed;
        continue;
      }

      if (opts.json) {
        console.log(JSON.stringify(item));
      } else if (opts.quiet) {
        if (item.status === 'persisted') console.log(item.record.name);
      } else {
        console.log(formatOutcome(item));
      }
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
    await sink?.close();
    closeAllSessions();
  }

  return failed > 0 ? 1 : 0;
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's native library keeps the event loop alive; exit explicitly.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
