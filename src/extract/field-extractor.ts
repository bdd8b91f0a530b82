/**
 * Label-driven attribute extraction from a vendor detail page.
 *
 * Every attribute is independent: a missing label or a failing rule resolves
 * that attribute to null and leaves the others alone. Nothing here throws.
 */
import { logger } from '../logger.js';
import type { PlasmidAttributes, TextField } from '../harvest/types.js';
import type { FieldRule, VendorProfile } from '../vendors/types.js';

/** Tokens made only of separator punctuation (e.g. a stray ":" after a label). */
const PUNCTUATION_TOKEN = /^[:;,|]+$/;

/**
 * Runs one field extraction. The harvester passes the retry policy here; the
 * default just calls through.
 */
export type FieldRunner = <T>(label: string, extract: () => T) => Promise<T>;

const directRunner: FieldRunner = async (_label, extract) => extract();

function normalizeWhitespace(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

function tokenize(text: string | null | undefined): string[] {
  return (text ?? '').split(/\s+/).filter(Boolean);
}

/**
 * Find the field container holding an element whose text is exactly the label.
 */
export function findFieldContainer(
  document: Document,
  fieldSelector: string,
  label: string
): Element | null {
  const wanted = normalizeWhitespace(label);
  for (const container of document.querySelectorAll(fieldSelector)) {
    for (const element of container.querySelectorAll('*')) {
      if (normalizeWhitespace(element.textContent) === wanted) {
        return container;
      }
    }
  }
  return null;
}

/**
 * Value tokens of a field: container text minus the label tokens at the front,
 * `skipTrailing` tokens at the back, and bare punctuation.
 * Returns null when the label is absent.
 */
function fieldTokens(document: Document, fieldSelector: string, rule: FieldRule): string[] | null {
  const container = findFieldContainer(document, fieldSelector, rule.label);
  if (!container) return null;

  const tokens = tokenize(container.textContent);
  const labelTokens = tokenize(rule.label).length;
  const end = tokens.length - (rule.skipTrailing ?? 0);
  if (end <= labelTokens) return [];

  return tokens.slice(labelTokens, end).filter((token) => !PUNCTUATION_TOKEN.test(token));
}

function safely<T>(rule: FieldRule, extract: () => T | null): T | null {
  try {
    return extract();
  } catch (error) {
    logger.debug({ field: rule.key, label: rule.label, error: String(error) }, 'Field rule failed');
    return null;
  }
}

/** Text value of a labeled field, or null when absent or empty. */
export function extractTextField(
  document: Document,
  fieldSelector: string,
  rule: FieldRule
): string | null {
  return safely(rule, () => {
    const tokens = fieldTokens(document, fieldSelector, rule);
    if (!tokens || tokens.length === 0) return null;
    return tokens.join(' ');
  });
}

/** Parse a base-pair count such as "5428" or "5,428". */
export function parseBasePairs(text: string | null): number | null {
  if (text === null) return null;
  const compact = text.replace(/[,\s]/g, '');
  if (!/^\d+$/.test(compact)) return null;
  const value = Number(compact);
  return Number.isSafeInteger(value) ? value : null;
}

/** Numeric value of a labeled field; non-numeric text resolves to null. */
export function extractNumericField(
  document: Document,
  fieldSelector: string,
  rule: FieldRule
): number | null {
  return safely(rule, () => parseBasePairs(extractTextField(document, fieldSelector, rule)));
}

/** Resolved plasmid name, or null when the page has none (e.g. a pooled kit). */
export function extractName(document: Document, profile: VendorProfile): string | null {
  try {
    const name = normalizeWhitespace(document.querySelector(profile.nameSelector)?.textContent);
    return name.length > 0 ? name : null;
  } catch (error) {
    logger.debug({ error: String(error) }, 'Name lookup failed');
    return null;
  }
}

/** Whether the page is the vendor's "no such identifier" page. */
export function isNotFound(document: Document, profile: VendorProfile): boolean {
  for (const element of document.querySelectorAll(profile.notFoundSelector)) {
    if (profile.notFoundPattern.test(normalizeWhitespace(element.textContent))) {
      return true;
    }
  }
  return false;
}

function emptyTextAttributes(): Record<TextField, string | null> {
  return {
    backbone: null,
    vectorType: null,
    marker: null,
    resistance: null,
    growthTemperature: null,
    growthStrain: null,
    growthInstructions: null,
    copyNumber: null,
    geneInsert: null,
  };
}

/**
 * Evaluate the profile's field table in order. Fields without a rule stay null.
 */
export async function extractAttributes(
  document: Document,
  profile: VendorProfile,
  run: FieldRunner = directRunner
): Promise<PlasmidAttributes> {
  const text = emptyTextAttributes();
  let sizeBasePairs: number | null = null;

  for (const rule of profile.fields) {
    const label = `field:${rule.key}`;
    if (rule.key === 'sizeBasePairs') {
      sizeBasePairs = await run(label, () =>
        extractNumericField(document, profile.fieldSelector, rule)
      );
    } else {
      text[rule.key] = await run(label, () =>
        extractTextField(document, profile.fieldSelector, rule)
      );
    }
  }

  return { ...text, sizeBasePairs };
}
