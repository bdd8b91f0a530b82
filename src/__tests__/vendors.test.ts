import { describe, it, expect, afterEach } from 'vitest';
import {
  DEFAULT_VENDOR,
  buildVendorUrl,
  getRegisteredVendors,
  getVendorProfile,
  registerVendor,
  unregisterVendor,
} from '../vendors/registry.js';
import { ADDGENE } from '../vendors/addgene.js';
import { VendorProfileSchema, type VendorProfile } from '../vendors/types.js';

const MIRROR: VendorProfile = {
  ...ADDGENE,
  tag: 'test-mirror',
  defaultBaseUrl: 'https://mirror.example.test',
  detailPath: 'plasmid/{id}',
  sequencePath: 'plasmid/{id}/files',
};

describe('vendors', () => {
  afterEach(() => {
    unregisterVendor('test-mirror');
  });

  it('ships a valid Addgene profile as the default', () => {
    expect(DEFAULT_VENDOR).toBe('addgene');
    expect(VendorProfileSchema.safeParse(ADDGENE).success).toBe(true);
    expect(getRegisteredVendors()).toEqual(['addgene']);
  });

  it('looks up tags case-insensitively', () => {
    expect(getVendorProfile(' AddGene ')).toBe(ADDGENE);
  });

  it('returns null for an unknown tag', () => {
    expect(getVendorProfile('nowhere')).toBeNull();
  });

  it('registers and removes additional vendors', () => {
    registerVendor(MIRROR);
    expect(getVendorProfile('test-mirror')?.defaultBaseUrl).toBe('https://mirror.example.test');
    expect(unregisterVendor('test-mirror')).toBe(true);
    expect(getVendorProfile('test-mirror')).toBeNull();
  });

  it('rejects a profile whose path lacks the id placeholder', () => {
    expect(() => registerVendor({ ...MIRROR, detailPath: 'plasmid/' })).toThrow(
      'Invalid vendor profile "test-mirror"'
    );
  });

  it('rejects a profile without field rules', () => {
    expect(() => registerVendor({ ...MIRROR, fields: [] })).toThrow(/Invalid vendor profile/);
  });

  it('builds URLs from the templates', () => {
    expect(buildVendorUrl(MIRROR.defaultBaseUrl, MIRROR.sequencePath, 12)).toBe(
      'https://mirror.example.test/plasmid/12/files'
    );
  });
});
