/**
 * Shared httpcloak client with browser fingerprints.
 * Every outbound request of the harvester goes through httpRequest().
 */
import httpcloak from 'httpcloak';
import { logger } from '../logger.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, MAX_RESPONSE_SIZE } from './constants.js';

export { MAX_RESPONSE_SIZE };

/** Session metadata for lifecycle management */
interface SessionMetadata {
  session: httpcloak.Session;
  created: number;
  requestCount: number;
  inFlightRequests: number;
}

/** Session cache keyed by TLS preset */
const sessionCache = new Map<string, SessionMetadata>();

const SESSION_TIMEOUT_SEC = 10;
const SESSION_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const SESSION_MAX_REQUESTS = 10000;

const DEFAULT_PRESET = httpcloak.Preset.CHROME_143;

export interface HttpResponse {
  success: boolean;
  /** 0 when the request never produced an HTTP response */
  statusCode: number;
  /** Body as returned by httpcloak (one char per byte for binary payloads) */
  body?: string;
  headers: Record<string, string>;
  error?: string;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Get or create the httpcloak session for a TLS preset.
 * Sessions are recycled after 1 hour or 10,000 requests once idle.
 */
export function getSession(preset?: string): httpcloak.Session {
  const presetValue = preset ?? DEFAULT_PRESET;
  const metadata = sessionCache.get(presetValue);

  if (metadata) {
    const age = Date.now() - metadata.created;
    const needsRecycling =
      age > SESSION_MAX_AGE_MS || metadata.requestCount >= SESSION_MAX_REQUESTS;

    if (!needsRecycling || metadata.inFlightRequests > 0) {
      metadata.requestCount++;
      metadata.inFlightRequests++;
      return metadata.session;
    }

    logger.info(
      { preset: presetValue, age: Math.floor(age / 1000), requests: metadata.requestCount },
      'Recycling aged httpcloak session'
    );
    closeQuietly(metadata.session, presetValue);
    sessionCache.delete(presetValue);
  }

  logger.debug({ preset: presetValue }, 'Creating httpcloak session');
  const session = new httpcloak.Session({ preset: presetValue, timeout: SESSION_TIMEOUT_SEC });
  sessionCache.set(presetValue, {
    session,
    created: Date.now(),
    requestCount: 1,
    inFlightRequests: 1,
  });
  return session;
}

function closeQuietly(session: httpcloak.Session, preset: string): void {
  try {
    session.close();
  } catch (error) {
    logger.warn({ preset, error: String(error) }, 'Error closing httpcloak session');
  }
}

/**
 * Close all httpcloak sessions.
 * Call this before the process exits.
 */
export function closeAllSessions(): void {
  for (const [preset, metadata] of sessionCache) {
    closeQuietly(metadata.session, preset);
  }
  sessionCache.clear();
}

/** Create a timeout promise that rejects after the specified timeout. */
function createRequestTimeout(
  url: string,
  timeoutMs: number
): { promise: Promise<never>; cancel: () => void } {
  let timeoutId: NodeJS.Timeout | undefined;
  const promise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new Error(`Request timeout after ${timeoutMs}ms for ${url}`)),
      timeoutMs
    );
  });
  return { promise, cancel: () => clearTimeout(timeoutId) };
}

function failure(statusCode: number, error: string): HttpResponse {
  return { success: false, statusCode, headers: {}, error };
}

/**
 * Make an HTTP GET request with a browser fingerprint.
 * Never throws: transport failures come back with statusCode 0 and an error string.
 */
export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const preset = DEFAULT_PRESET;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  let metadata: SessionMetadata | undefined;

  try {
    const session = getSession(preset);
    metadata = sessionCache.get(preset);

    // no-cache keeps CDNs from answering 304 with an empty body
    const headers: Record<string, string> = {
      'Cache-Control': 'no-cache',
      ...options.headers,
    };

    logger.debug({ url, headers }, 'Making httpcloak request');

    const timeout = createRequestTimeout(url, timeoutMs);
    try {
      const response = await Promise.race([session.get(url, { headers }), timeout.promise]);

      const contentLength = response.headers?.['content-length'];
      if (contentLength) {
        const size = parseInt(contentLength, 10);
        if (!isNaN(size) && size > MAX_RESPONSE_SIZE) {
          logger.warn(
            { url, contentLength: size, limit: MAX_RESPONSE_SIZE },
            'Content-Length exceeds size limit'
          );
          return failure(response.statusCode, 'response_too_large');
        }
      }

      // httpcloak sometimes exposes text as a function, sometimes as a property
      const textValue: unknown = response.text;
      const body =
        typeof textValue === 'function'
          ? String(textValue.call(response))
          : typeof textValue === 'string'
            ? textValue
            : '';

      if (body.length > MAX_RESPONSE_SIZE) {
        logger.warn({ url, size: body.length, limit: MAX_RESPONSE_SIZE }, 'Response exceeds size limit');
        return failure(response.statusCode, 'response_too_large');
      }

      logger.debug(
        { url, statusCode: response.statusCode, bodyLength: body.length },
        'httpcloak request complete'
      );

      return {
        success: response.ok,
        statusCode: response.statusCode,
        body,
        headers: response.headers ?? {},
      };
    } finally {
      timeout.cancel();
    }
  } catch (error) {
    logger.warn({ url, error: String(error) }, 'httpcloak request failed');
    return failure(0, String(error));
  } finally {
    if (metadata) {
      metadata.inFlightRequests--;
    }
  }
}
