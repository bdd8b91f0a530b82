/**
 * Fetch and parse the detail and sequence pages for one identifier.
 */
import { parseHTML } from 'linkedom';
import { httpRequest, type HttpResponse } from './http-client.js';
import { unlimited, type RateGate } from './rate-limiter.js';
import { getVendorProfile, buildVendorUrl } from '../vendors/registry.js';
import type { VendorProfile } from '../vendors/types.js';
import {
  HttpStatusError,
  ResponseTooLargeError,
  TransientTransportError,
} from '../retry/errors.js';
import { logger } from '../logger.js';

export interface FetchDocumentsOptions {
  vendor: string;
  /** Defaults to the vendor's own base URL */
  baseUrl?: string;
  gate?: RateGate;
  timeoutMs?: number;
}

export interface FetchedDocuments {
  profile: VendorProfile;
  detail: Document;
  sequence: Document;
  detailUrl: string;
  sequenceUrl: string;
  detailStatus: number;
}

/** Statuses worth retrying: request timeout, rate limiting, server errors. */
export function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 0 || statusCode === 408 || statusCode === 429 || statusCode >= 500;
}

/**
 * Turn an HttpResponse into a parsed document or throw a classified error.
 */
function toDocument(url: string, response: HttpResponse): Document {
  if (response.error === 'response_too_large') {
    throw new ResponseTooLargeError(url);
  }
  if (isRetryableStatus(response.statusCode)) {
    throw new TransientTransportError(
      response.error ?? `HTTP ${response.statusCode} for ${url}`,
      url,
      response.statusCode
    );
  }
  const { document } = parseHTML(response.body ?? '');
  return document;
}

/** GET one page behind the shared gate. */
export async function fetchPage(
  url: string,
  gate: RateGate,
  timeoutMs?: number,
  headers?: Record<string, string>
): Promise<HttpResponse> {
  await gate.acquire();
  return httpRequest(url, { timeoutMs, headers });
}

/**
 * Retrieve the detail and sequence documents for an identifier.
 *
 * Returns null for an unregistered vendor tag. A 404 detail page is returned
 * as-is so the caller can treat it as not-found; a failed sequence page yields
 * an empty document (no sequence link).
 */
export async function fetchDocuments(
  id: number,
  options: FetchDocumentsOptions
): Promise<FetchedDocuments | null> {
  const profile = getVendorProfile(options.vendor);
  if (!profile) {
    logger.warn({ id, vendor: options.vendor }, 'No profile registered for vendor');
    return null;
  }

  const gate = options.gate ?? unlimited;
  const baseUrl = options.baseUrl ?? profile.defaultBaseUrl;
  const detailUrl = buildVendorUrl(baseUrl, profile.detailPath, id);
  const sequenceUrl = buildVendorUrl(baseUrl, profile.sequencePath, id);

  const detailResponse = await fetchPage(detailUrl, gate, options.timeoutMs);
  const detail = toDocument(detailUrl, detailResponse);
  if (!detailResponse.success && detailResponse.statusCode !== 404) {
    throw new HttpStatusError(detailUrl, detailResponse.statusCode);
  }

  const sequenceResponse = await fetchPage(sequenceUrl, gate, options.timeoutMs);
  let sequence = toDocument(sequenceUrl, sequenceResponse);
  if (!sequenceResponse.success) {
    logger.debug(
      { id, url: sequenceUrl, statusCode: sequenceResponse.statusCode },
      'Sequence page unavailable'
    );
    sequence = parseHTML('<html><body></body></html>').document;
  }

  return {
    profile,
    detail,
    sequence,
    detailUrl,
    sequenceUrl,
    detailStatus: detailResponse.statusCode,
  };
}
