/**
 * Terminal preview of a checklist — fixed-width table of category, name,
 * required flag and priority.
 */

import type { PresentationModel } from '../presentation/index.js';

const WIDTH = 90;
const NAME_WIDTH = 46;

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

function center(text: string, width: number): string {
  const left = Math.max(0, Math.floor((width - text.length) / 2));
  return (' '.repeat(left) + text).padEnd(width);
}

/**
 * Render the preview table as lines.
 *
 * @param title - Localized "PREVIEW" heading
 * @param totalLine - Localized total line, e.g. "Total: 46 documents"
 */
export function formatPreview(model: PresentationModel, title: string, totalLine: string): string[] {
  const [category, name, required, priority] = model.checklist.headers;
  const lines: string[] = [
    '='.repeat(WIDTH),
    `  ${center(title, WIDTH - 4)}`,
    '='.repeat(WIDTH),
    `  ${category.padEnd(14)} ${name.padEnd(NAME_WIDTH)} ${required.padEnd(12)} ${priority}`,
    '-'.repeat(WIDTH),
  ];

  for (const row of model.checklist.rows) {
    lines.push(
      `  ${row.categoryLabel.padEnd(14)} ${truncate(row.name, NAME_WIDTH).padEnd(NAME_WIDTH)} ` +
      `${row.requiredLabel.padEnd(12)} ${row.priority}`
    );
  }

  lines.push('-'.repeat(WIDTH), `  ${totalLine}`, '='.repeat(WIDTH));
  return lines;
}
