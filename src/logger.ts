/**
 * Harvest logging. Every line is JSON on stderr, tagged with
 * `service: 'plasmid-harvest'`, so stdout stays free for harvest results and
 * `plasmid-harvest ... > out.tsv` captures nothing but outcomes.
 *
 * LOG_LEVEL picks the level (default info). With NODE_ENV=development the
 * pino-pretty transport is used when it is installed.
 */
import { createRequire } from 'node:module';
import pino, { type Logger, type LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

const STDERR = 2;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  return requested && isLogLevel(requested) ? requested : 'info';
}

/** pino-pretty is a dev dependency; an install without it logs plain JSON. */
function canPrettyPrint(env: NodeJS.ProcessEnv): boolean {
  if (env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options: LoggerOptions = {
    level: resolveLogLevel(env),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: { service: 'plasmid-harvest' },
  };

  if (!canPrettyPrint(env)) {
    return pino(options, pino.destination(STDERR));
  }
  return pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
        destination: STDERR,
      },
    },
  });
}

export const logger = createLogger();
