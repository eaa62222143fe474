/**
 * Barrel export for the rule base.
 *
 * Combines the base pack and the three axis packs into a single frozen
 * `ruleBase`. Also exports the individual packs for targeted testing.
 *
 * Template counts:
 * - base-pack:       28
 * - deal-types:       6-8 per deal type
 * - sectors:          8-10 per sector
 * - jurisdictions:    3-4 per jurisdiction
 * ---
 * Every combination resolves to 45-50 documents.
 */

import type { DocumentTemplate, RuleBase } from '../types/index.js';
import { basePackRules } from './base-pack.js';
import { dealTypeRules } from './deal-types.js';
import { sectorRules } from './sectors.js';
import { jurisdictionRules } from './jurisdictions.js';

export { basePackRules, dealTypeRules, sectorRules, jurisdictionRules };

/** Process-wide rule base — read-only, shared by every resolution */
export const ruleBase: RuleBase = Object.freeze({
  basePack: basePackRules,
  dealTypes: dealTypeRules,
  sectors: sectorRules,
  jurisdictions: jurisdictionRules,
});

/** Every template in the rule base, base pack first then each axis in declaration order */
export function listTemplates(rules: RuleBase = ruleBase): DocumentTemplate[] {
  return [
    ...rules.basePack,
    ...Object.values(rules.dealTypes).flat(),
    ...Object.values(rules.sectors).flat(),
    ...Object.values(rules.jurisdictions).flat(),
  ];
}

/** Unique translation keys reachable from the rule base */
export function listTemplateKeys(rules: RuleBase = ruleBase): string[] {
  return [...new Set(listTemplates(rules).map((t) => t.key))];
}
