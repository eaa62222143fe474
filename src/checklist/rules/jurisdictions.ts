/**
 * Jurisdiction Packs
 *
 * Documents required by the local registries, tax authorities and regulators
 * of the target's jurisdiction. International covers cross-border targets
 * (foreign subsidiaries, multi-country merger control, sanctions exposure).
 */

import type { DocumentTemplate, Jurisdiction } from '../types/index.js';
import { freezePack } from './freeze-pack.js';

const portugalRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.rcbe_declaration', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.pt_tax_clearance', category: 'Tax', required: true, priority: 'High' },
  { key: 'doc.act_labour_records', category: 'HR', required: false, priority: 'Medium' },
]);

const spainRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.es_commercial_registry_extract', category: 'Legal', required: true, priority: 'High' },
  { key: 'doc.es_tax_clearance', category: 'Tax', required: true, priority: 'High' },
  { key: 'doc.es_foreign_investment_screening', category: 'Compliance', required: false, priority: 'Medium' },
]);

const internationalRules: readonly DocumentTemplate[] = freezePack([
  { key: 'doc.cross_border_merger_control', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.sanctions_screening', category: 'Compliance', required: true, priority: 'High' },
  { key: 'doc.withholding_tax_analysis', category: 'Tax', required: true, priority: 'Medium' },
  { key: 'doc.foreign_subsidiaries_documents', category: 'Legal', required: true, priority: 'Medium' },
]);

export const jurisdictionRules: Readonly<Record<Jurisdiction, readonly DocumentTemplate[]>> = Object.freeze({
  'Portugal': portugalRules,
  'Spain': spainRules,
  'International': internationalRules,
});
