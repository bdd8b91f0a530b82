import { describe, it, expect } from 'vitest';
import { idRange, isValidId, normalizeIds, parseIdList } from '../harvest/ids.js';

describe('harvest/ids', () => {
  describe('parseIdList', () => {
    it('splits on commas and whitespace', () => {
      expect(parseIdList('42888, 26248 22222\n10')).toEqual([42888, 26248, 22222, 10]);
    });

    it('drops repeats, keeping the first position', () => {
      expect(parseIdList('7 5 7 6 5')).toEqual([7, 5, 6]);
    });

    it('returns an empty list for blank input', () => {
      expect(parseIdList('  ,  ')).toEqual([]);
    });

    it('rejects non-numeric tokens', () => {
      expect(() => parseIdList('12 abc')).toThrow('Invalid plasmid identifier: abc');
      expect(() => parseIdList('-3')).toThrow(RangeError);
    });

    it('rejects zero', () => {
      expect(() => parseIdList('0')).toThrow('Invalid plasmid identifier: 0');
    });
  });

  describe('idRange', () => {
    it('includes the start and excludes the end', () => {
      expect(idRange(3, 6)).toEqual([3, 4, 5]);
    });

    it('is empty when start equals end', () => {
      expect(idRange(5, 5)).toEqual([]);
    });

    it('rejects reversed or non-positive ranges', () => {
      expect(() => idRange(6, 5)).toThrow('Invalid identifier range: 6-5');
      expect(() => idRange(0, 3)).toThrow(RangeError);
    });
  });

  describe('normalizeIds', () => {
    it('rejects fractional and unsafe identifiers', () => {
      expect(() => normalizeIds([1.5])).toThrow(RangeError);
      expect(() => normalizeIds([Number.MAX_SAFE_INTEGER + 1])).toThrow(RangeError);
    });

    it('accepts any iterable', () => {
      expect(normalizeIds(new Set([3, 1, 2]))).toEqual([3, 1, 2]);
    });
  });

  it('isValidId accepts positive safe integers only', () => {
    expect(isValidId(1)).toBe(true);
    expect(isValidId(0)).toBe(false);
    expect(isValidId(-1)).toBe(false);
    expect(isValidId(Number.NaN)).toBe(false);
  });
});
