/**
 * Interactive Terminal Flow
 *
 * Prompts for the deal parameters in sequence, shows a preview of the
 * resolved checklist, optionally collects custom documents, then hands off
 * to the programmatic generator.
 *
 * Steps:
 * 1. Language (EN / PT) — every later prompt is shown in that language
 * 2. Deal type, sector, jurisdiction (numbered menus)
 * 3. Target company name
 * 4. Preview
 * 5. Custom documents (optional, repeatable)
 * 6. Confirm and generate
 *
 * Validation errors are shown and the question is asked again; nothing
 * invalid reaches the generator.
 */

import {
  CATEGORIES,
  DEAL_TYPES,
  JURISDICTIONS,
  LANGUAGES,
  PRIORITIES,
  SECTORS,
} from '../checklist/types/index.js';
import type { CustomDocument, Language } from '../checklist/types/index.js';
import { ChecklistError } from '../checklist/errors.js';
import { parseCustomDocument } from '../checklist/validation.js';
import type { DealContextInput } from '../checklist/validation.js';
import { defaultTranslations, enumLabelKey, interpolate } from '../i18n/index.js';
import { generateChecklistWorkbook, prepareChecklist } from '../generator.js';
import { formatPreview } from './preview.js';
import type { Prompter } from './prompter.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InteractiveIO {
  prompter: Prompter;
  print: (line: string) => void;
}

export interface InteractiveOptions {
  /** Chosen when the language prompt is answered with an empty line */
  defaultLanguage?: Language;
  generate?: (input: DealContextInput) => Promise<string>;
}

interface MenuOption<T> {
  value: T;
  label: string;
}

const LANGUAGE_LABELS: Record<Language, string> = {
  EN: 'EN — English',
  PT: 'PT — Português',
};

const YES_ANSWERS = new Set(['y', 'yes', 's', 'sim']);
const NO_ANSWERS = new Set(['n', 'no', 'nao', 'não']);

// ---------------------------------------------------------------------------
// Prompt Helpers
// ---------------------------------------------------------------------------

/**
 * Display a numbered menu and return the chosen value.
 * An empty answer picks `defaultValue` when one is given.
 */
export async function choose<T>(
  io: InteractiveIO,
  prompt: string,
  options: readonly MenuOption<T>[],
  invalidMessage: string,
  defaultValue?: T,
): Promise<T> {
  io.print('');
  io.print(prompt);
  options.forEach((option, i) => io.print(`  [${i + 1}] ${option.label}`));

  for (;;) {
    const raw = (await io.prompter.ask('  > ')).trim();
    if (raw === '' && defaultValue !== undefined) {
      return defaultValue;
    }
    if (/^\d+$/.test(raw)) {
      const index = Number(raw) - 1;
      const option = options[index];
      if (index >= 0 && index < options.length && option) {
        io.print(`  ✔ ${option.label}`);
        return option.value;
      }
    }
    io.print(`  ✗ ${invalidMessage}`);
  }
}

/** Ask for non-empty free text */
export async function askText(io: InteractiveIO, prompt: string, emptyMessage: string): Promise<string> {
  for (;;) {
    const value = (await io.prompter.ask(`${prompt}: `)).trim();
    if (value) return value;
    io.print(`  ✗ ${emptyMessage}`);
  }
}

/** Ask a yes/no question; accepts English and Portuguese answers */
export async function askYesNo(
  io: InteractiveIO,
  prompt: string,
  hint: string,
  errorMessage: string,
): Promise<boolean> {
  for (;;) {
    const value = (await io.prompter.ask(`${prompt} ${hint}: `)).trim().toLowerCase();
    if (YES_ANSWERS.has(value)) return true;
    if (NO_ANSWERS.has(value)) return false;
    io.print(`  ✗ ${errorMessage}`);
  }
}

// ---------------------------------------------------------------------------
// Flow
// ---------------------------------------------------------------------------

/**
 * Run the interactive flow.
 *
 * @returns Path of the generated workbook, or null when the user cancels
 */
export async function runInteractive(
  io: InteractiveIO,
  options: InteractiveOptions = {},
): Promise<string | null> {
  const generate = options.generate ?? ((input: DealContextInput) => generateChecklistWorkbook(input));

  io.print('='.repeat(60));
  io.print('   DUE DILIGENCE — DOCUMENT CHECKLIST GENERATOR');
  io.print('='.repeat(60));

  const language = await choose(
    io,
    'Language / Idioma:',
    LANGUAGES.map((value) => ({ value, label: LANGUAGE_LABELS[value] })),
    'Please enter 1 or 2. / Introduza 1 ou 2.',
    options.defaultLanguage,
  );

  const t = (key: string): string => defaultTranslations.translate(key, language);
  const labelled = <T extends string>(prefix: string, values: readonly T[]): MenuOption<T>[] =>
    values.map((value) => ({ value, label: t(enumLabelKey(prefix, value)) }));
  const invalidChoice = (max: number): string => interpolate(t('prompt.invalid_choice'), { max });
  const yesNo = (prompt: string): Promise<boolean> =>
    askYesNo(io, prompt, t('prompt.yes_no_hint'), t('prompt.yes_no_error'));

  const dealType = await choose(io, t('prompt.deal_type'), labelled('deal_type', DEAL_TYPES), invalidChoice(DEAL_TYPES.length));
  const sector = await choose(io, t('prompt.sector'), labelled('sector', SECTORS), invalidChoice(SECTORS.length));
  const jurisdiction = await choose(
    io,
    t('prompt.jurisdiction'),
    labelled('jurisdiction', JURISDICTIONS),
    invalidChoice(JURISDICTIONS.length),
  );
  const targetName = await askText(io, t('prompt.target_name'), t('prompt.empty_field'));

  const input: DealContextInput = { targetName, dealType, sector, jurisdiction, language };

  // Preview
  const { checklist, model } = prepareChecklist(input);
  const baseTotal = checklist.stats.total;
  io.print('');
  formatPreview(
    model,
    t('prompt.preview_title'),
    interpolate(t('prompt.preview_total'), { count: baseTotal }),
  ).forEach((line) => io.print(line));

  // Custom documents
  const customDocuments: CustomDocument[] = [];
  if (await yesNo(t('prompt.add_custom'))) {
    do {
      const category = await choose(io, t('prompt.category'), labelled('category', CATEGORIES), invalidChoice(CATEGORIES.length));
      const name = await askText(io, t('prompt.document_name'), t('prompt.empty_field'));
      const required = await yesNo(t('prompt.required'));
      const priority = await choose(io, t('prompt.priority'), labelled('priority', PRIORITIES), invalidChoice(PRIORITIES.length));

      try {
        customDocuments.push(
          parseCustomDocument({ category, name, required, priority }, customDocuments.length),
        );
        io.print(`  ✔ ${interpolate(t('prompt.custom_added'), { name })}`);
      } catch (err) {
        if (!(err instanceof ChecklistError)) throw err;
        io.print(`  ✗ ${interpolate(t('prompt.custom_rejected'), { reason: err.message })}`);
      }
    } while (await yesNo(t('prompt.add_another')));

    const total = prepareChecklist({ ...input, customDocuments }).checklist.stats.total;
    io.print('');
    io.print(`  → ${interpolate(t('prompt.custom_total'), { added: customDocuments.length, total })}`);
  }

  // Generate
  if (!(await yesNo(t('prompt.generate')))) {
    io.print('');
    io.print(`  ${t('prompt.cancelled')}`);
    return null;
  }

  const filePath = await generate({ ...input, customDocuments });
  io.print('');
  io.print('='.repeat(60));
  io.print(`  ✔ ${interpolate(t('prompt.file_generated'), { path: filePath })}`);
  io.print('='.repeat(60));
  return filePath;
}
