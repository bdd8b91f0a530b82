/**
 * Identifier list helpers
 */

export function isValidId(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

/**
 * Validate identifiers and drop repeats, keeping first occurrence order.
 * Throws RangeError on the first invalid identifier.
 */
export function normalizeIds(ids: Iterable<number>): number[] {
  const seen = new Set<number>();
  const result: number[] = [];
  for (const id of ids) {
    if (!isValidId(id)) {
      throw new RangeError(`Invalid plasmid identifier: ${id}`);
    }
    if (seen.has(id)) continue;
    seen.add(id);
    result.push(id);
  }
  return result;
}

/** Parse "42888, 26248 22222" into identifiers. */
export function parseIdList(input: string): number[] {
  const tokens = input.split(/[\s,]+/).filter(Boolean);
  return normalizeIds(
    tokens.map((token) => {
      if (!/^\d+$/.test(token)) {
        throw new RangeError(`Invalid plasmid identifier: ${token}`);
      }
      return Number(token);
    })
  );
}

/** Identifiers from start (inclusive) to end (exclusive). */
export function idRange(start: number, end: number): number[] {
  if (!isValidId(start) || !Number.isSafeInteger(end) || end < start) {
    throw new RangeError(`Invalid identifier range: ${start}-${end}`);
  }
  const ids: number[] = [];
  for (let id = start; id < end; id++) {
    ids.push(id);
  }
  return ids;
}
