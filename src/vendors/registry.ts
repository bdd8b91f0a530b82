/**
 * Vendor registry.
 *
 * Only Addgene ships today. Other vendors plug in by registering a profile with
 * their own URL templates and field table; unknown tags resolve to null.
 */
import { ADDGENE } from './addgene.js';
import { VendorProfileSchema, type VendorProfile } from './types.js';

const VENDORS = new Map<string, VendorProfile>([[ADDGENE.tag, ADDGENE]]);

export const DEFAULT_VENDOR = ADDGENE.tag;

/** Get the profile for a vendor tag (case-insensitive), or null if unknown. */
export function getVendorProfile(tag: string): VendorProfile | null {
  return VENDORS.get(tag.trim().toLowerCase()) ?? null;
}

/**
 * Register (or replace) a vendor profile. Throws if the profile is invalid.
 */
export function registerVendor(profile: VendorProfile): void {
  const result = VendorProfileSchema.safeParse(profile);
  if (!result.success) {
    throw new Error(`Invalid vendor profile "${profile.tag}": ${result.error.message}`);
  }
  VENDORS.set(result.data.tag, result.data);
}

/** Remove a registered vendor. Returns whether it existed. */
export function unregisterVendor(tag: string): boolean {
  return VENDORS.delete(tag);
}

export function getRegisteredVendors(): string[] {
  return [...VENDORS.keys()];
}

/** Join a base URL and a path template for one identifier. */
export function buildVendorUrl(baseUrl: string, pathTemplate: string, id: number): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/${pathTemplate.replaceAll('{id}', String(id))}`;
}
