/**
 * Presentation Adapter Tests
 */

import { describe, test, expect } from 'vitest';
import { present, statusOptions } from '../present.js';
import { resolveChecklist } from '../../checklist/engine/index.js';
import { parseDealContext } from '../../checklist/validation.js';
import type { DealContextInput } from '../../checklist/validation.js';
import { MissingTranslationError } from '../../checklist/errors.js';
import { createTranslationTable } from '../../i18n/index.js';
import { techShareDeal, healthcareMerger } from '../../checklist/__tests__/fixtures/index.js';

const DATE = new Date(2026, 1, 15, 10, 30);

function presentFor(input: DealContextInput) {
  return present(resolveChecklist(parseDealContext(input)), { generatedAt: DATE });
}

describe('English checklist', () => {
  const model = presentFor(techShareDeal);

  test('file name and language', () => {
    expect(model.language).toBe('EN');
    expect(model.fileName).toBe('TechVida_Lda_DD_Checklist_20260215.xlsx');
    expect(model.generatedAt).toBe(DATE.toISOString());
  });

  test('sheet names', () => {
    expect(model.sheetNames).toEqual({
      checklist: 'Checklist',
      summary: 'Summary',
      instructions: 'Instructions',
    });
  });

  test('checklist headers', () => {
    expect(model.checklist.headers).toEqual([
      'Category',
      'Document Name',
      'Required',
      'Priority',
      'Received Date',
      'Status',
      'Responsible',
      'Comments',
    ]);
  });

  test('one row per resolved document, first row fully localized', () => {
    expect(model.checklist.rows).toHaveLength(49);
    expect(model.checklist.rows[0]).toEqual({
      category: 'Legal',
      categoryLabel: 'Legal',
      name: 'Articles of Association / By-laws',
      required: true,
      requiredLabel: 'Yes',
      priority: 'High',
      receivedDate: null,
      status: 'Pending',
      statusLabel: 'Pending',
      responsible: '',
      comments: '',
      source: 'base-rule',
    });
  });

  test('dropdown options', () => {
    expect(model.checklist.priorityOptions).toEqual(['High', 'Medium', 'Low']);
    expect(model.checklist.statusOptions.map((o) => o.label)).toEqual([
      'Pending',
      'Received',
      'Reviewed',
      'Missing',
    ]);
    expect(model.checklist.defaultStatus).toBe('Pending');
  });

  test('summary metadata in display order', () => {
    expect(model.summary.metadata).toEqual([
      { label: 'Target Company', value: 'TechVida Lda' },
      { label: 'Transaction Type', value: 'Share Deal' },
      { label: 'Sector', value: 'Technology' },
      { label: 'Jurisdiction', value: 'Portugal' },
      { label: 'Date Generated', value: '2026-02-15 10:30' },
      { label: 'Total Documents', value: 49 },
    ]);
    expect(model.summary.totalDocuments).toBe(49);
  });

  test('category table lists all eight categories', () => {
    expect(model.summary.byCategory.headers).toEqual(['Category', 'Count']);
    expect(model.summary.byCategory.rows.map((r) => [r.label, r.count])).toEqual([
      ['Legal', 13],
      ['Financial', 7],
      ['Operational', 1],
      ['Tax', 5],
      ['HR', 7],
      ['Commercial', 5],
      ['IP', 5],
      ['Compliance', 6],
    ]);
  });

  test('instructions content', () => {
    expect(model.instructions.howToUse.items).toHaveLength(6);
    expect(model.instructions.statusDefinitions.rows[0]).toEqual({
      status: 'Pending',
      label: 'Pending',
      definition: 'Document has been requested but not yet received.',
    });
    expect(model.instructions.timeline.rows[0]).toEqual({
      phase: 'Week 1-2',
      activities: 'Send initial document request list to target / advisors.',
    });
    expect(model.instructions.contacts.headers).toEqual(['Role', 'Firm', 'Contact Person', 'Email', 'Phone']);
    expect(model.instructions.contacts.roles).toHaveLength(6);
  });
});

describe('Portuguese checklist', () => {
  const model = presentFor({
    ...healthcareMerger,
    customDocuments: [['Legal', 'Acordo de confidencialidade', 'Sim', 'Medium']],
  });

  test('file name keeps accented letters', () => {
    expect(model.fileName).toBe('Farma_Saúde_SA_DD_Checklist_20260215.xlsx');
  });

  test('headers and sheet names are Portuguese', () => {
    expect(model.checklist.headers[0]).toBe('Categoria');
    expect(model.checklist.headers[1]).toBe('Nome do Documento');
    expect(model.sheetNames.summary).toBe('Resumo');
  });

  test('priority stays in its enumerated form, other labels are translated', () => {
    const [first] = model.checklist.rows;
    expect(first?.categoryLabel).toBe('Jurídico');
    expect(first?.requiredLabel).toBe('Sim');
    expect(first?.statusLabel).toBe('Pendente');
    expect(first?.priority).toBe('High');
  });

  test('custom documents keep their name verbatim at the end of their category', () => {
    // Legal holds 10 rule-base documents for this deal
    expect(model.checklist.rows[10]).toMatchObject({
      category: 'Legal',
      name: 'Acordo de confidencialidade',
      requiredLabel: 'Sim',
      priority: 'Medium',
      source: 'custom',
    });
    expect(model.checklist.rows[11]?.category).toBe('Financial');
  });

  test('category table omits empty categories', () => {
    expect(model.summary.byCategory.rows.map((r) => r.value)).toEqual([
      'Legal',
      'Financial',
      'Operational',
      'Tax',
      'HR',
      'Commercial',
      'Compliance',
    ]);
    expect(model.summary.byCategory.rows[0]).toEqual({ value: 'Legal', label: 'Jurídico', count: 11 });
  });

  test('priority table', () => {
    expect(model.summary.byPriority.rows).toEqual([
      { value: 'High', label: 'Alta', count: 31 },
      { value: 'Medium', label: 'Média', count: 16 },
      { value: 'Low', label: 'Baixa', count: 1 },
    ]);
  });

  test('metadata values are translated', () => {
    expect(model.summary.metadata[1]).toEqual({ label: 'Tipo de Transação', value: 'Fusão' });
    expect(model.summary.metadata[2]).toEqual({ label: 'Setor', value: 'Saúde' });
  });
});

describe('statusOptions', () => {
  test('Portuguese labels in lifecycle order', () => {
    expect(statusOptions('PT')).toEqual([
      { status: 'Pending', label: 'Pendente' },
      { status: 'Received', label: 'Recebido' },
      { status: 'Reviewed', label: 'Revisto' },
      { status: 'Missing', label: 'Em falta' },
    ]);
  });
});

describe('missing translations', () => {
  test('a table without the document key throws', () => {
    const checklist = resolveChecklist(parseDealContext(techShareDeal));
    const translations = createTranslationTable({ EN: { 'sheet.checklist': 'Checklist' }, PT: {} });
    expect(() => present(checklist, { translations, generatedAt: DATE })).toThrow(MissingTranslationError);
  });
});
