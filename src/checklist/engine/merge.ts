/**
 * Merge & deduplication logic for checklist entries.
 *
 * Two sources can name the same document:
 * - Axis packs may repeat a key already in the base pack (first one wins).
 * - A custom document may restate a rule-base document, in any language.
 *   The custom values for `required` / `priority` then override the base
 *   entry instead of adding a second row.
 *
 * Matching operates WITHIN a single category only. The same name in two
 * categories is two distinct documents.
 */

import { CATEGORIES } from '../types/index.js';
import type {
  Category,
  ChecklistStats,
  CustomDocument,
  DocumentEntry,
  DocumentTemplate,
  Priority,
} from '../types/index.js';
import type { TranslationTable } from '../../i18n/index.js';

/**
 * Normalize a document name for comparison: trim, collapse whitespace, lower-case.
 */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Every normalized name an entry is known by.
 * Rule-base entries match on their key and on their text in every language.
 */
export function entryNameVariants(entry: DocumentEntry, translations: TranslationTable): string[] {
  if (entry.name.kind === 'literal') {
    return [normalizeName(entry.name.text)];
  }
  return [entry.name.key, ...translations.variants(entry.name.key)].map(normalizeName);
}

/**
 * Drop templates whose key already appeared in the same category.
 *
 * @returns Templates converted to base-rule entries, first occurrence order preserved
 */
export function dedupeTemplates(templates: readonly DocumentTemplate[]): DocumentEntry[] {
  const seen = new Set<string>();
  const result: DocumentEntry[] = [];

  for (const template of templates) {
    const id = `${template.category}:${template.key}`;
    if (seen.has(id)) continue;
    seen.add(id);
    result.push({
      category: template.category,
      name: { kind: 'key', key: template.key },
      required: template.required,
      priority: template.priority,
      source: 'base-rule',
    });
  }

  return result;
}

/**
 * Merge custom documents into resolved entries.
 *
 * A custom document matching an existing entry of the same category overrides
 * its required/priority; otherwise it is appended with source "custom".
 * Later custom documents override earlier ones the same way.
 *
 * @returns New array; overridden entries are replaced, never mutated
 */
export function mergeCustomDocuments(
  entries: readonly DocumentEntry[],
  customDocuments: readonly CustomDocument[],
  translations: TranslationTable,
): DocumentEntry[] {
  const result = [...entries];

  for (const doc of customDocuments) {
    const wanted = normalizeName(doc.name);
    const index = result.findIndex(
      (entry) =>
        entry.category === doc.category &&
        entryNameVariants(entry, translations).includes(wanted),
    );

    const match = result[index];
    if (match) {
      result[index] = { ...match, required: doc.required, priority: doc.priority };
      continue;
    }

    result.push({
      category: doc.category,
      name: { kind: 'literal', text: doc.name.trim() },
      required: doc.required,
      priority: doc.priority,
      source: 'custom',
    });
  }

  return result;
}

/**
 * Group entries category-major in canonical order, keeping insertion order
 * within each category.
 */
export function orderByCategory(entries: readonly DocumentEntry[]): DocumentEntry[] {
  return CATEGORIES.flatMap((category) => entries.filter((e) => e.category === category));
}

/**
 * Compute total / per-category / per-priority counts. The result is frozen.
 */
export function computeStats(entries: readonly DocumentEntry[]): ChecklistStats {
  const byCategory: Record<Category, number> = {
    Legal: 0,
    Financial: 0,
    Operational: 0,
    Tax: 0,
    HR: 0,
    Commercial: 0,
    IP: 0,
    Compliance: 0,
  };
  const byPriority: Record<Priority, number> = { High: 0, Medium: 0, Low: 0 };

  for (const entry of entries) {
    byCategory[entry.category] += 1;
    byPriority[entry.priority] += 1;
  }

  return Object.freeze({
    total: entries.length,
    byCategory: Object.freeze(byCategory),
    byPriority: Object.freeze(byPriority),
  });
}
