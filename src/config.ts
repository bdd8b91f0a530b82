/**
 * Harvest configuration: defaults, then PLASMID_HARVEST_* environment variables,
 * then explicit overrides (CLI flags or library callers).
 */
import { z } from 'zod';
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_SCALE_MS,
} from './retry/retry-policy.js';
import { DEFAULT_REQUESTS_PER_SECOND } from './fetch/rate-limiter.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './fetch/constants.js';
import { BROWSER_USER_AGENT, DEFAULT_SEQUENCE_ATTEMPTS } from './sequence/sequence-resolver.js';
import { ADDGENE } from './vendors/addgene.js';

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 16;

export const HarvestConfigSchema = z.object({
  baseUrl: z.string().url().default(ADDGENE.defaultBaseUrl),
  vendor: z.string().min(1).default(ADDGENE.tag),
  concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
  requestsPerSecond: z.number().positive().default(DEFAULT_REQUESTS_PER_SECOND),
  timeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  baseDelayMs: z.number().nonnegative().default(DEFAULT_BASE_DELAY_MS),
  scaleMs: z.number().nonnegative().default(DEFAULT_SCALE_MS),
  sequenceAttempts: z.number().int().min(1).default(DEFAULT_SEQUENCE_ATTEMPTS),
  userAgent: z.string().min(1).default(BROWSER_USER_AGENT),
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type HarvestConfigInput = z.input<typeof HarvestConfigSchema>;

const ENV_PREFIX = 'PLASMID_HARVEST_';

/** Environment variable suffix → config key, and whether the value is numeric. */
const ENV_KEYS: Array<[suffix: string, key: keyof HarvestConfig, numeric: boolean]> = [
  ['BASE_URL', 'baseUrl', false],
  ['VENDOR', 'vendor', false],
  ['CONCURRENCY', 'concurrency', true],
  ['RATE', 'requestsPerSecond', true],
  ['TIMEOUT_MS', 'timeoutMs', true],
  ['MAX_ATTEMPTS', 'maxAttempts', true],
  ['BASE_DELAY_MS', 'baseDelayMs', true],
  ['SCALE_MS', 'scaleMs', true],
  ['USER_AGENT', 'userAgent', false],
];

/**
 * Read config values from the environment. Numeric values that do not parse
 * are passed through as NaN so validation reports them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [suffix, key, numeric] of ENV_KEYS) {
    const raw = env[`${ENV_PREFIX}${suffix}`]?.trim();
    if (!raw) continue;
    values[key] = numeric ? Number(raw) : raw;
  }
  return values;
}

/**
 * Build a validated config. Throws an Error naming every invalid key.
 */
export function loadConfig(
  overrides: Partial<HarvestConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): HarvestConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = HarvestConfigSchema.safeParse({ ...configFromEnv(env), ...defined });

  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new Error(`Invalid harvest config:\n${problems.join('\n')}`);
  }
  return result.data;
}
