import { describe, test, expect } from 'vitest';
import { formatPreview } from '../preview.js';
import { prepareChecklist } from '../../generator.js';
import { techShareDeal, crossBorderMerger } from '../../checklist/__tests__/fixtures/index.js';

const DATE = new Date(2026, 1, 15, 10, 30);

describe('formatPreview', () => {
  const { model } = prepareChecklist(techShareDeal, { now: DATE });
  const lines = formatPreview(model, 'PREVIEW', 'Total: 49 documents');

  test('frame, header, one line per document, total', () => {
    // 5 heading lines + 49 rows + 3 footer lines
    expect(lines).toHaveLength(57);
    expect(lines[0]).toBe('='.repeat(90));
    expect(lines[4]).toBe('-'.repeat(90));
    expect(lines[55]).toBe('  Total: 49 documents');
  });

  test('column headers', () => {
    expect(lines[3]).toBe(
      `  ${'Category'.padEnd(14)} ${'Document Name'.padEnd(46)} ${'Required'.padEnd(12)} Priority`,
    );
  });

  test('document row', () => {
    expect(lines[5]).toBe(
      `  ${'Legal'.padEnd(14)} ${'Articles of Association / By-laws'.padEnd(46)} ${'Yes'.padEnd(12)} High`,
    );
  });

  test('long names are truncated', () => {
    const { model: intl } = prepareChecklist({ ...crossBorderMerger, language: 'EN' }, { now: DATE });
    const preview = formatPreview(intl, 'PREVIEW', 'Total');
    expect(preview).toContain(
      `  ${'Compliance'.padEnd(14)} Cross-border regulatory approvals & merger ... ${'Yes'.padEnd(12)} High`,
    );
  });
});
