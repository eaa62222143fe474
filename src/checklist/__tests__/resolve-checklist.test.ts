/**
 * Checklist Resolution Tests
 *
 * Covers axis composition, canonical ordering, stats, custom document
 * merging and fail-fast validation.
 */

import { describe, test, expect } from 'vitest';
import { resolveChecklist } from '../engine/index.js';
import { parseDealContext } from '../validation.js';
import type { DealContextInput } from '../validation.js';
import { CATEGORIES, DEAL_TYPES, JURISDICTIONS, LANGUAGES, SECTORS } from '../types/index.js';
import type { DocumentEntry, ResolvedChecklist } from '../types/index.js';
import { InvalidContextError, InvalidCustomEntryError } from '../errors.js';
import { present } from '../../presentation/index.js';
import {
  techShareDeal,
  healthcareMerger,
  crossBorderMerger,
  retailAssetDeal,
} from './fixtures/index.js';

function resolve(input: DealContextInput): ResolvedChecklist {
  return resolveChecklist(parseDealContext(input));
}

function keyOf(entry: DocumentEntry): string | undefined {
  return entry.name.kind === 'key' ? entry.name.key : undefined;
}

function findByKey(checklist: ResolvedChecklist, key: string): DocumentEntry | undefined {
  return checklist.documents.find((entry) => keyOf(entry) === key);
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

describe('Share Deal / Technology / Portugal', () => {
  const result = resolve(techShareDeal);

  test('resolves to 49 documents', () => {
    expect(result.stats.total).toBe(49);
    expect(result.documents).toHaveLength(49);
  });

  test('counts by category', () => {
    expect(result.stats.byCategory).toEqual({
      Legal: 13,
      Financial: 7,
      Operational: 1,
      Tax: 5,
      HR: 7,
      Commercial: 5,
      IP: 5,
      Compliance: 6,
    });
  });

  test('counts by priority', () => {
    expect(result.stats.byPriority).toEqual({ High: 30, Medium: 18, Low: 1 });
  });

  test('starts with the base pack Legal documents in declaration order', () => {
    expect(result.documents.slice(0, 3).map(keyOf)).toEqual([
      'doc.articles_of_association',
      'doc.certificate_of_incorporation',
      'doc.board_minutes',
    ]);
  });

  test('includes share deal, technology and Portugal documents', () => {
    expect(findByKey(result, 'doc.cap_table')).toBeDefined();
    expect(findByKey(result, 'doc.open_source_audit')).toBeDefined();
    expect(findByKey(result, 'doc.rcbe_declaration')).toBeDefined();
  });

  test('excludes documents of other axis values', () => {
    expect(findByKey(result, 'doc.merger_plan')).toBeUndefined();
    expect(findByKey(result, 'doc.property_title_deeds')).toBeUndefined();
    expect(findByKey(result, 'doc.es_tax_clearance')).toBeUndefined();
  });

  test('every entry comes from the rule base', () => {
    expect(result.documents.every((entry) => entry.source === 'base-rule')).toBe(true);
  });
});

describe('Merger / Healthcare', () => {
  test('Portugal resolves to 47 documents, none of them IP', () => {
    const result = resolve(healthcareMerger);
    expect(result.stats.total).toBe(47);
    expect(result.stats.byCategory.IP).toBe(0);
    expect(result.stats.byCategory.Compliance).toBe(11);
  });

  test('International adds cross-border merger control as required High Compliance', () => {
    const result = resolve(crossBorderMerger);
    expect(result.stats.total).toBe(48);
    expect(findByKey(result, 'doc.cross_border_merger_control')).toEqual({
      category: 'Compliance',
      name: { kind: 'key', key: 'doc.cross_border_merger_control' },
      required: true,
      priority: 'High',
      source: 'base-rule',
    });
  });
});

describe('every combination', () => {
  const combinations = DEAL_TYPES.flatMap((dealType) =>
    SECTORS.flatMap((sector) =>
      JURISDICTIONS.flatMap((jurisdiction) =>
        LANGUAGES.map((language) => ({ dealType, sector, jurisdiction, language })),
      ),
    ),
  );

  test('covers 108 combinations', () => {
    expect(combinations).toHaveLength(108);
  });

  test.each(combinations)(
    '$dealType / $sector / $jurisdiction / $language stays within 45-50 documents and presents',
    (axes) => {
      const result = resolve({ ...techShareDeal, ...axes });
      expect(result.stats.total).toBeGreaterThanOrEqual(45);
      expect(result.stats.total).toBeLessThanOrEqual(50);

      const model = present(result, { generatedAt: new Date(2026, 1, 15, 10, 30) });
      expect(model.language).toBe(axes.language);
      expect(model.checklist.rows).toHaveLength(result.stats.total);
      expect(model.checklist.rows.every((row) => row.name.trim().length > 0)).toBe(true);
    },
  );

  test.each(combinations)('$dealType / $sector / $jurisdiction / $language is ordered category-major', (axes) => {
    const result = resolve({ ...techShareDeal, ...axes });
    const positions = result.documents.map((entry) => CATEGORIES.indexOf(entry.category));
    expect(positions).toEqual([...positions].sort((a, b) => a - b));
  });

  test('the smallest combination is Asset Deal / Retail / Spain', () => {
    expect(resolve(retailAssetDeal).stats.total).toBe(45);
  });
});

// ---------------------------------------------------------------------------
// Stats and determinism
// ---------------------------------------------------------------------------

describe('stats', () => {
  const result = resolve(crossBorderMerger);

  test('category counts sum to total', () => {
    const sum = Object.values(result.stats.byCategory).reduce((a, b) => a + b, 0);
    expect(sum).toBe(result.stats.total);
  });

  test('priority counts sum to total', () => {
    const sum = Object.values(result.stats.byPriority).reduce((a, b) => a + b, 0);
    expect(sum).toBe(result.stats.total);
  });
});

describe('determinism', () => {
  test('resolving the same context twice gives equal results', () => {
    const context = parseDealContext(techShareDeal);
    expect(resolveChecklist(context)).toEqual(resolveChecklist(context));
  });

  test('language does not change the resolved documents', () => {
    const en = resolve({ ...healthcareMerger, language: 'EN' });
    const pt = resolve(healthcareMerger);
    expect(en.documents).toEqual(pt.documents);
  });

  test('result is frozen', () => {
    const result = resolve(techShareDeal);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.documents)).toBe(true);
    expect(Object.isFrozen(result.documents[0])).toBe(true);
  });

  test('stats are frozen and cannot drift from the documents', () => {
    const result = resolve(techShareDeal);
    expect(Object.isFrozen(result.stats)).toBe(true);
    expect(Object.isFrozen(result.stats.byCategory)).toBe(true);
    expect(Object.isFrozen(result.stats.byPriority)).toBe(true);
    expect(() => Object.assign(result.stats.byCategory, { Legal: 999 })).toThrow(TypeError);
    expect(() => Object.assign(result.stats, { total: 1 })).toThrow(TypeError);
    expect(result.stats.total).toBe(49);
    expect(result.stats.byCategory.Legal).toBe(13);
  });

  test('custom documents in the context are frozen', () => {
    const result = resolve({
      ...techShareDeal,
      customDocuments: [['IP', 'Patent Portfolio Review', 'Yes', 'High']],
    });
    const [custom] = result.context.customDocuments;
    expect(custom).toBeDefined();
    expect(Object.isFrozen(custom)).toBe(true);
    expect(() => Object.assign(custom ?? {}, { priority: 'Urgent' })).toThrow(TypeError);
    expect(custom?.priority).toBe('High');
  });
});

// ---------------------------------------------------------------------------
// Custom documents
// ---------------------------------------------------------------------------

describe('custom documents', () => {
  test('a new document is appended at the end of its category', () => {
    const result = resolve({
      ...techShareDeal,
      customDocuments: [['IP', 'Patent Portfolio Review', 'Yes', 'High']],
    });

    expect(result.stats.total).toBe(50);
    expect(result.stats.byCategory.IP).toBe(6);
    // Legal 13 + Financial 7 + Operational 1 + Tax 5 + HR 7 + Commercial 5 + IP 5 = 43
    expect(result.documents[43]).toEqual({
      category: 'IP',
      name: { kind: 'literal', text: 'Patent Portfolio Review' },
      required: true,
      priority: 'High',
      source: 'custom',
    });
    expect(result.documents[44]?.category).toBe('Compliance');
  });

  test('a matching name in the same category overrides required and priority', () => {
    const result = resolve({
      ...healthcareMerger,
      customDocuments: [{ category: 'Legal', name: '  merger   PLAN ', required: false, priority: 'Low' }],
    });

    expect(result.stats.total).toBe(47);
    expect(findByKey(result, 'doc.merger_plan')).toMatchObject({
      required: false,
      priority: 'Low',
      source: 'base-rule',
    });
  });

  test('matching works on the Portuguese name too', () => {
    const result = resolve({
      ...healthcareMerger,
      customDocuments: [['Legal', 'Projeto de fusão', 'não', 'Medium']],
    });

    expect(result.stats.total).toBe(47);
    expect(findByKey(result, 'doc.merger_plan')).toMatchObject({ required: false, priority: 'Medium' });
  });

  test('the same name in another category is a distinct document', () => {
    const result = resolve({
      ...healthcareMerger,
      customDocuments: [['Tax', 'Merger plan', 'Yes', 'High']],
    });

    expect(result.stats.total).toBe(48);
    expect(findByKey(result, 'doc.merger_plan')).toMatchObject({ required: true, priority: 'High' });
  });

  test('duplicate custom names in two categories stay distinct', () => {
    const result = resolve({
      ...techShareDeal,
      customDocuments: [
        ['IP', 'Brand audit', 'No', 'Low'],
        ['Commercial', 'Brand audit', 'No', 'Low'],
      ],
    });

    expect(result.stats.total).toBe(51);
    expect(result.documents.filter((entry) => entry.source === 'custom').map((e) => e.category)).toEqual([
      'Commercial',
      'IP',
    ]);
  });

  test('an override does not leak into later resolutions', () => {
    resolve({
      ...healthcareMerger,
      customDocuments: [['Legal', 'Merger plan', 'No', 'Low']],
    });
    expect(findByKey(resolve(healthcareMerger), 'doc.merger_plan')).toMatchObject({
      required: true,
      priority: 'High',
    });
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('invalid input', () => {
  test('unknown deal type throws InvalidContextError naming the field', () => {
    expect(() => resolve({ ...techShareDeal, dealType: 'Leveraged Buyout' })).toThrow(InvalidContextError);
    expect(() => resolve({ ...techShareDeal, dealType: 'Leveraged Buyout' })).toThrow(
      'Invalid dealType: "Leveraged Buyout". Must be one of: Share Deal, Asset Deal, Merger',
    );
  });

  test('unknown sector throws InvalidContextError', () => {
    expect(() => resolve({ ...techShareDeal, sector: 'Mining' })).toThrow(InvalidContextError);
  });

  test('blank target name throws InvalidContextError', () => {
    expect(() => resolve({ ...techShareDeal, targetName: '   ' })).toThrow('Invalid targetName: "   ".');
  });

  test('custom document with an unknown priority throws InvalidCustomEntryError', () => {
    expect(() =>
      resolve({ ...techShareDeal, customDocuments: [['IP', 'Patent review', 'Yes', 'Urgent']] }),
    ).toThrow(InvalidCustomEntryError);
  });

  test('the context is checked before custom documents', () => {
    expect(() =>
      resolve({
        ...techShareDeal,
        jurisdiction: 'France',
        customDocuments: [['Unknown', '', 'maybe', 'Urgent']],
      }),
    ).toThrow(InvalidContextError);
  });
});
