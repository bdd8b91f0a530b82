/**
 * Locate and download the annotated sequence (GenBank) file linked from a
 * vendor's sequence page.
 *
 * A missing link is a normal outcome (pooled kits have no single sequence),
 * so every failure path here resolves to null instead of throwing.
 */
import { fetchPage, isRetryableStatus } from '../fetch/document-fetcher.js';
import { unlimited, type RateGate } from '../fetch/rate-limiter.js';
import { logger } from '../logger.js';

export const DEFAULT_SEQUENCE_ATTEMPTS = 3;

/** The vendor rejects default client identification on file downloads. */
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36';

export interface ResolveSequenceOptions {
  linkSelector: string;
  /** URL the sequence page was fetched from; relative hrefs resolve against it */
  pageUrl: string;
  attempts?: number;
  userAgent?: string;
  gate?: RateGate;
  timeoutMs?: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Decode raw bytes as UTF-8. Invalid sequences become U+FFFD and NUL bytes are
 * dropped so the text is safe for any text column.
 */
export function decodeSequencePayload(bytes: Uint8Array): string {
  return utf8.decode(bytes).replace(/\0/g, '');
}

/**
 * Base-pair count from a GenBank LOCUS line ("LOCUS  name  5428 bp ...").
 * Reads the third whitespace token of the first line; null when not numeric.
 */
export function sizeFromSequenceHeader(payload: string | null): number | null {
  if (!payload) return null;
  const firstLine = payload.split(/\r?\n/, 1)[0] ?? '';
  const token = firstLine.trim().split(/\s+/)[2];
  if (!token || !/^\d+$/.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}

/** Absolute download URL of the sequence file, or null if the page has none. */
export function findSequenceLink(
  document: Document,
  linkSelector: string,
  pageUrl: string
): string | null {
  const href = document.querySelector(linkSelector)?.getAttribute('href')?.trim();
  if (!href) return null;
  try {
    const resolved = new URL(href, pageUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Download and decode the sequence file referenced by the sequence page.
 * Gives up after `attempts` failed downloads and returns null.
 */
export async function resolveSequence(
  document: Document,
  options: ResolveSequenceOptions
): Promise<string | null> {
  const attempts = options.attempts ?? DEFAULT_SEQUENCE_ATTEMPTS;
  const gate = options.gate ?? unlimited;

  const url = findSequenceLink(document, options.linkSelector, options.pageUrl);
  if (!url) {
    logger.debug({ pageUrl: options.pageUrl }, 'No sequence file link on page');
    return null;
  }

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const response = await fetchPage(url, gate, options.timeoutMs, {
      'User-Agent': options.userAgent ?? BROWSER_USER_AGENT,
    });

    if (response.success && response.body !== undefined) {
      // httpcloak hands back one char per byte
      return decodeSequencePayload(Buffer.from(response.body, 'latin1'));
    }

    const retryable =
      response.error !== 'response_too_large' && isRetryableStatus(response.statusCode);
    logger.warn(
      { url, attempt, attempts, statusCode: response.statusCode, error: response.error },
      'Sequence download failed'
    );
    if (!retryable) break;
  }

  return null;
}
