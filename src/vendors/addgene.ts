/**
 * Addgene plasmid pages.
 *
 * Detail page fields look like:
 *   <li class="field"><div class="field-label">Vector backbone</div>
 *     <div class="field-content">pcDNA3.1 <a>(Search Vector Database)</a></div></li>
 */
import type { FieldRule, VendorProfile } from './types.js';

export const ADDGENE_FIELD_RULES: readonly FieldRule[] = [
  // trailing "(Search Vector Database)" link
  { key: 'backbone', label: 'Vector backbone', skipTrailing: 3 },
  { key: 'vectorType', label: 'Vector type' },
  { key: 'marker', label: 'Selectable markers' },
  { key: 'resistance', label: 'Bacterial Resistance(s)' },
  { key: 'growthTemperature', label: 'Growth Temperature' },
  { key: 'growthStrain', label: 'Growth Strain(s)' },
  { key: 'growthInstructions', label: 'Growth instructions' },
  { key: 'copyNumber', label: 'Copy number' },
  { key: 'geneInsert', label: 'Gene/Insert name' },
  { key: 'sizeBasePairs', label: 'Total vector size (bp)' },
];

export const ADDGENE: VendorProfile = {
  tag: 'addgene',
  defaultBaseUrl: 'https://www.addgene.org',
  detailPath: '{id}/',
  sequencePath: '{id}/sequences/',
  nameSelector: 'span.material-name',
  fieldSelector: 'li.field',
  notFoundSelector: 'h1',
  notFoundPattern: /^(page|plasmid) not found$/i,
  sequenceLinkSelector: 'a.genbank-file-download[href]',
  fields: [...ADDGENE_FIELD_RULES],
};
