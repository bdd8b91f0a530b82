import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockGet = vi.fn();
const mockClose = vi.fn();
const mockSessionOptions: Record<string, unknown>[] = [];

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('httpcloak', () => ({
  default: {
    Session: class MockSession {
      get = mockGet;
      close = mockClose;
      constructor(opts?: Record<string, unknown>) {
        mockSessionOptions.push(opts ?? {});
      }
    },
    Preset: {
      CHROME_143: 'chrome_143',
      FIREFOX_133: 'firefox_133',
    },
  },
}));

import {
  MAX_RESPONSE_SIZE,
  closeAllSessions,
  getSession,
  httpRequest,
} from '../fetch/http-client.js';

const PAGE_URL = 'https://www.addgene.org/42888/';

describe('fetch/http-client', () => {
  beforeEach(() => {
    closeAllSessions();
    vi.clearAllMocks();
    mockSessionOptions.length = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('getSession', () => {
    it('creates one session per preset with the default fingerprint', () => {
      const first = getSession();
      const second = getSession();

      expect(first).toBe(second);
      expect(mockSessionOptions).toEqual([{ preset: 'chrome_143', timeout: 10 }]);
    });

    it('keeps separate sessions for separate presets', () => {
      const chrome = getSession('chrome_143');
      const firefox = getSession('firefox_133');

      expect(chrome).not.toBe(firefox);
      expect(mockSessionOptions).toHaveLength(2);
    });
  });

  describe('closeAllSessions', () => {
    it('closes every cached session', () => {
      getSession('chrome_143');
      getSession('firefox_133');

      closeAllSessions();

      expect(mockClose).toHaveBeenCalledTimes(2);
    });

    it('keeps going when a close fails', () => {
      getSession('chrome_143');
      getSession('firefox_133');
      mockClose.mockImplementationOnce(() => {
        throw new Error('already closed');
      });

      expect(() => closeAllSessions()).not.toThrow();
      expect(mockClose).toHaveBeenCalledTimes(2);
    });
  });

  describe('httpRequest', () => {
    it('returns the body and status of a successful response', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        headers: { 'content-type': 'text/html' },
        text: '<html>ok</html>',
      });

      await expect(httpRequest(PAGE_URL)).resolves.toEqual({
        success: true,
        statusCode: 200,
        body: '<html>ok</html>',
        headers: { 'content-type': 'text/html' },
      });
    });

    it('reads text exposed as a method', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        headers: {},
        text() {
          return 'LOCUS';
        },
      });

      const response = await httpRequest(PAGE_URL);
      expect(response.body).toBe('LOCUS');
    });

    it('reports a non-2xx status as unsuccessful', async () => {
      mockGet.mockResolvedValue({ ok: false, statusCode: 404, headers: {}, text: 'gone' });

      const response = await httpRequest(PAGE_URL);
      expect(response.success).toBe(false);
      expect(response.statusCode).toBe(404);
    });

    it('sends no-cache and merges caller headers', async () => {
      mockGet.mockResolvedValue({ ok: true, statusCode: 200, headers: {}, text: '' });

      await httpRequest(PAGE_URL, { headers: { 'User-Agent': 'test-agent' } });

      expect(mockGet).toHaveBeenCalledWith(PAGE_URL, {
        headers: { 'Cache-Control': 'no-cache', 'User-Agent': 'test-agent' },
      });
    });

    it('turns a transport failure into status 0', async () => {
      mockGet.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(httpRequest(PAGE_URL)).resolves.toEqual({
        success: false,
        statusCode: 0,
        headers: {},
        error: 'Error: connect ECONNREFUSED',
      });
    });

    it('rejects a declared Content-Length over the limit', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        headers: { 'content-length': String(MAX_RESPONSE_SIZE + 1) },
        text: '',
      });

      await expect(httpRequest(PAGE_URL)).resolves.toEqual({
        success: false,
        statusCode: 200,
        headers: {},
        error: 'response_too_large',
      });
    });

    it('rejects a body over the limit', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        headers: {},
        text: 'a'.repeat(MAX_RESPONSE_SIZE + 1),
      });

      const response = await httpRequest(PAGE_URL);
      expect(response.error).toBe('response_too_large');
    });

    it('times out a request that never answers', async () => {
      vi.useFakeTimers();
      mockGet.mockReturnValue(new Promise(() => {}));

      const pending = httpRequest(PAGE_URL, { timeoutMs: 1_000 });
      await vi.advanceTimersByTimeAsync(1_000);

      await expect(pending).resolves.toEqual({
        success: false,
        statusCode: 0,
        headers: {},
        error: `Error: Request timeout after 1000ms for ${PAGE_URL}`,
      });
    });
  });
});
