import { describe, it, expect } from 'vitest';
import { assembleRecord, indexByName } from '../harvest/record.js';
import type { PlasmidAttributes } from '../harvest/types.js';
import { makeRecord } from './test-helpers.js';

const EMPTY_ATTRIBUTES: PlasmidAttributes = {
  backbone: null,
  vectorType: null,
  marker: null,
  resistance: null,
  growthTemperature: null,
  growthStrain: null,
  growthInstructions: null,
  copyNumber: null,
  geneInsert: null,
  sizeBasePairs: null,
};

describe('harvest/record', () => {
  describe('assembleRecord', () => {
    const parts = {
      id: 7,
      name: '  pSeven  ',
      vendor: 'addgene',
      vendorUrl: 'https://www.addgene.org/7/',
      attributes: { ...EMPTY_ATTRIBUTES, backbone: 'pUC19' },
      sequencePayload: null,
    };

    it('builds a frozen record with a trimmed name', () => {
      const record = assembleRecord(parts);
      expect(Object.isFrozen(record)).toBe(true);
      expect(record).toEqual({
        id: 7,
        name: 'pSeven',
        vendor: 'addgene',
        vendorUrl: 'https://www.addgene.org/7/',
        ...EMPTY_ATTRIBUTES,
        backbone: 'pUC19',
        sequencePayload: null,
      });
    });

    it('rejects a blank name', () => {
      expect(() => assembleRecord({ ...parts, name: '   ' })).toThrow('Plasmid 7 has no name');
    });

    it('recovers a missing size from the sequence LOCUS line', () => {
      const record = assembleRecord({
        ...parts,
        sequencePayload: 'LOCUS       pSeven   3012 bp    DNA     circular\n//\n',
      });
      expect(record.sizeBasePairs).toBe(3012);
    });

    it('keeps the page size over the sequence header', () => {
      const record = assembleRecord({
        ...parts,
        attributes: { ...EMPTY_ATTRIBUTES, sizeBasePairs: 3000 },
        sequencePayload: 'LOCUS       pSeven   3012 bp\n',
      });
      expect(record.sizeBasePairs).toBe(3000);
    });

    it('leaves the size null when the header is not numeric', () => {
      const record = assembleRecord({ ...parts, sequencePayload: 'LOCUS pSeven\n' });
      expect(record.sizeBasePairs).toBeNull();
    });
  });

  describe('indexByName', () => {
    it('keys records by name', () => {
      const a = makeRecord({ id: 1, name: 'pA' });
      const b = makeRecord({ id: 2, name: 'pB' });
      const index = indexByName([a, b]);
      expect([...index.keys()]).toEqual(['pA', 'pB']);
      expect(index.get('pB')).toBe(b);
    });

    it('lets the later record win a shared name', () => {
      const first = makeRecord({ id: 1, name: 'pDup' });
      const second = makeRecord({ id: 2, name: 'pDup' });
      expect(indexByName([first, second]).get('pDup')?.id).toBe(2);
    });
  });
});
