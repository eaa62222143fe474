/**
 * Programmatic Entry Point
 *
 * generateChecklistWorkbook() runs the full pipeline for one deal:
 *   validate -> resolve -> present -> render -> write
 * and returns the absolute path of the workbook.
 *
 * Validation errors (InvalidContextError, InvalidCustomEntryError) propagate
 * to the caller unchanged.
 *
 * Usage:
 *   const file = await generateChecklistWorkbook({
 *     targetName: 'TechVida Lda',
 *     dealType: 'Share Deal',
 *     sector: 'Technology',
 *     jurisdiction: 'Portugal',
 *     language: 'EN',
 *     customDocuments: [['IP', 'Patent Portfolio Review', 'Yes', 'High']],
 *   });
 */

import { appConfig } from './config.js';
import { parseDealContext } from './checklist/validation.js';
import type { DealContextInput } from './checklist/validation.js';
import { resolveChecklist } from './checklist/engine/index.js';
import type { ResolvedChecklist } from './checklist/types/index.js';
import { present } from './presentation/index.js';
import type { PresentationModel } from './presentation/index.js';
import { writeWorkbook } from './workbook/index.js';
import type { TranslationTable } from './i18n/index.js';

export interface GenerateOptions {
  /** Defaults to CHECKLIST_OUTPUT_DIR */
  outputDir?: string;
  /** Generation date — drives the filename and the summary timestamp */
  now?: Date;
  translations?: TranslationTable;
}

export interface PreparedChecklist {
  checklist: ResolvedChecklist;
  model: PresentationModel;
}

/**
 * Validate, resolve and present a deal without writing anything.
 * Used for previews and by generateChecklistWorkbook().
 */
export function prepareChecklist(
  input: DealContextInput,
  options: Omit<GenerateOptions, 'outputDir'> = {},
): PreparedChecklist {
  const context = parseDealContext(input);
  const checklist = resolveChecklist(context, { translations: options.translations });
  const model = present(checklist, {
    translations: options.translations,
    generatedAt: options.now,
  });
  return { checklist, model };
}

/**
 * Generate the checklist workbook for a deal.
 *
 * @returns Absolute path of the written .xlsx file
 */
export async function generateChecklistWorkbook(
  input: DealContextInput,
  options: GenerateOptions = {},
): Promise<string> {
  const { checklist, model } = prepareChecklist(input, options);
  const { context, stats } = checklist;

  const filePath = await writeWorkbook(model, options.outputDir ?? appConfig.output.dir);

  console.log(
    `[generator] ${stats.total} documents ` +
    `(${context.dealType} / ${context.sector} / ${context.jurisdiction} / ${context.language}) -> ${filePath}`
  );
  return filePath;
}

export type { DealContextInput, CustomDocumentInput } from './checklist/validation.js';
export { parseDealContext, parseCustomDocument } from './checklist/validation.js';
export { resolveChecklist } from './checklist/engine/index.js';
export { present, buildChecklistFilename } from './presentation/index.js';
export { buildWorkbook, writeWorkbook } from './workbook/index.js';
export {
  ChecklistError,
  InvalidContextError,
  InvalidCustomEntryError,
  MissingTranslationError,
} from './checklist/errors.js';
