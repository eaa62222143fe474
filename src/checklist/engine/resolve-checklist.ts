/**
 * Checklist Resolution Engine — Core Pure Function
 *
 * Takes a DealContext and produces a ResolvedChecklist.
 *
 * Design principles:
 * - PURE FUNCTION: no I/O, deterministic for a given context
 * - Axes are additive: base pack + deal type + sector + jurisdiction
 * - Category-major canonical order, rule-base insertion order within a category
 * - Custom documents go last in their category, or override a matching entry
 * - Invalid input fails fast with a typed error before any rule is read
 */

import type { DealContext, DocumentTemplate, ResolvedChecklist, RuleBase } from '../types/index.js';
import { ruleBase as defaultRuleBase } from '../rules/index.js';
import { parseDealContext } from '../validation.js';
import { defaultTranslations } from '../../i18n/index.js';
import type { TranslationTable } from '../../i18n/index.js';
import {
  computeStats,
  dedupeTemplates,
  mergeCustomDocuments,
  orderByCategory,
} from './merge.js';

/** Read-only collaborators of the resolver, replaceable in tests */
export interface ResolverDeps {
  ruleBase: RuleBase;
  /** Used to match custom names against rule-base names in every language */
  translations: TranslationTable;
}

/**
 * Collect the templates that apply to a context, base pack first.
 */
export function selectTemplates(context: DealContext, rules: RuleBase): DocumentTemplate[] {
  return [
    ...rules.basePack,
    ...rules.dealTypes[context.dealType],
    ...rules.sectors[context.sector],
    ...rules.jurisdictions[context.jurisdiction],
  ];
}

/**
 * Resolve the document checklist for a deal.
 *
 * The context is validated again here, so JavaScript callers and hand-built
 * objects get the same guarantees as input coming through parseDealContext().
 *
 * @param context - Deal parameters and optional custom documents
 * @param deps - Optional rule base / translation table override
 * @returns Frozen ResolvedChecklist with documents and stats
 * @throws InvalidContextError | InvalidCustomEntryError
 */
export function resolveChecklist(
  context: DealContext,
  deps: Partial<ResolverDeps> = {},
): ResolvedChecklist {
  const rules = deps.ruleBase ?? defaultRuleBase;
  const translations = deps.translations ?? defaultTranslations;

  // 1. Validate (throws before anything else runs)
  const validated = parseDealContext(context);

  // 2. Union of the applicable packs, duplicates dropped
  const baseEntries = dedupeTemplates(selectTemplates(validated, rules));

  // 3. Custom documents: override or append
  const merged = mergeCustomDocuments(baseEntries, validated.customDocuments, translations);

  // 4. Canonical order + stats
  const documents = orderByCategory(merged).map((entry) => Object.freeze(entry));

  return Object.freeze({
    context: validated,
    documents: Object.freeze(documents),
    stats: computeStats(documents),
  });
}
