import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

interface CapturedOptions {
  level?: string;
  base?: Record<string, unknown>;
  formatters?: { level?: (label: string) => Record<string, string> };
  transport?: unknown;
}

// Capture the options passed to pino
let capturedOptions: CapturedOptions | undefined;
let capturedDestination: unknown;

vi.mock('pino', () => {
  const mockPino = Object.assign(
    vi.fn((opts: CapturedOptions, destination?: unknown) => {
      capturedOptions = opts;
      capturedDestination = destination;
      return { level: opts?.level ?? 'info' };
    }),
    { destination: vi.fn((fd: number) => `mock-destination-${fd}`) }
  );
  return { default: mockPino };
});

describe('logger', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
    capturedOptions = undefined;
    capturedDestination = undefined;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('log level', () => {
    it('defaults to info when LOG_LEVEL is not set', async () => {
      delete process.env.LOG_LEVEL;
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('info');
    });

    it('honours a valid LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'warn';
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('warn');
    });

    it('falls back to info for an unknown level', async () => {
      process.env.LOG_LEVEL = 'chatty';
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('info');
    });

    it('is case-insensitive', async () => {
      process.env.LOG_LEVEL = 'DEBUG';
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('debug');
    });
  });

  describe('createLogger', () => {
    it('reads the level from the given environment', async () => {
      const { createLogger, resolveLogLevel } = await import('../logger.js');
      createLogger({ LOG_LEVEL: 'Error' });
      expect(capturedOptions?.level).toBe('error');
      expect(resolveLogLevel({})).toBe('info');
    });
  });

  describe('destination', () => {
    it('writes JSON logs to stderr outside development', async () => {
      process.env.NODE_ENV = 'production';
      await import('../logger.js');
      expect(capturedOptions?.transport).toBeUndefined();
      expect(capturedDestination).toBe('mock-destination-2');
    });
  });

  describe('logger instance', () => {
    it('tags every line with the service name', async () => {
      await import('../logger.js');
      expect(capturedOptions?.base).toEqual({ service: 'plasmid-harvest' });
    });

    it('formats the level as its label', async () => {
      await import('../logger.js');
      expect(capturedOptions?.formatters?.level?.('warn')).toEqual({ level: 'warn' });
    });

    it('exports logger as a named export', async () => {
      const mod = await import('../logger.js');
      expect(mod.logger).toBeDefined();
    });
  });
});
