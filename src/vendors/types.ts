/**
 * Vendor profile: how to address a vendor's pages and where each attribute lives.
 */
import { z } from 'zod';
import { TEXT_FIELDS } from '../harvest/types.js';

const FIELD_KEYS = [...TEXT_FIELDS, 'sizeBasePairs'] as const;

export const FieldRuleSchema = z.object({
  key: z.enum(FIELD_KEYS),
  /** Exact text of the label element */
  label: z.string().min(1),
  /** Tokens to drop from the end of the field text (layout-specific trailers) */
  skipTrailing: z.number().int().nonnegative().optional(),
});

export type FieldRule = z.infer<typeof FieldRuleSchema>;

export const VendorProfileSchema = z.object({
  tag: z.string().regex(/^[a-z0-9-]+$/, 'tag must be lowercase alphanumeric'),
  defaultBaseUrl: z.string().url(),
  /** Path templates appended to the base URL; `{id}` is replaced by the identifier */
  detailPath: z.string().includes('{id}'),
  sequencePath: z.string().includes('{id}'),
  nameSelector: z.string().min(1),
  /** Container holding one label and its content */
  fieldSelector: z.string().min(1),
  notFoundSelector: z.string().min(1),
  notFoundPattern: z.instanceof(RegExp),
  sequenceLinkSelector: z.string().min(1),
  fields: z.array(FieldRuleSchema).min(1),
});

export type VendorProfile = z.infer<typeof VendorProfileSchema>;
