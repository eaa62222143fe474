/**
 * Translation Table
 *
 * Read-only lookup of display text by key and language. The default table is
 * built once from translations.json and validated at load; tests can build a
 * minimal table with createTranslationTable().
 *
 * A missing key is a drift between the rule base and the translation data,
 * never a runtime condition to recover from: translate() always throws.
 */

import { z } from 'zod';
import { LANGUAGES } from '../checklist/types/index.js';
import type { Language } from '../checklist/types/index.js';
import { MissingTranslationError } from '../checklist/errors.js';
import translationsJson from './translations.json' with { type: 'json' };

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw translation data: language -> key -> text */
export type TranslationData = Readonly<Record<Language, Readonly<Record<string, string>>>>;

export interface TranslationTable {
  /** @throws MissingTranslationError when the key has no text for the language */
  translate(key: string, language: Language): string;
  has(key: string, language: Language): boolean;
  /** Text of the key in every language that defines it */
  variants(key: string): string[];
}

const TranslationDataSchema = z.object({
  EN: z.record(z.string(), z.string()),
  PT: z.record(z.string(), z.string()),
});

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Validate raw JSON into TranslationData.
 * Throws a plain Error naming the offending path, since this only fails on a broken build.
 */
export function loadTranslationData(raw: unknown): TranslationData {
  const result = TranslationDataSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new Error(`Translation data is malformed at "${path}": ${issue?.message ?? 'unknown error'}`);
  }
  return Object.freeze(result.data);
}

export function createTranslationTable(data: TranslationData): TranslationTable {
  const lookup = (key: string, language: Language): string | undefined => {
    const text = data[language][key];
    return text && text.trim().length > 0 ? text : undefined;
  };

  return {
    translate(key, language) {
      const text = lookup(key, language);
      if (text === undefined) {
        throw new MissingTranslationError(key, language);
      }
      return text;
    },
    has(key, language) {
      return lookup(key, language) !== undefined;
    },
    variants(key) {
      return LANGUAGES.map((language) => lookup(key, language)).filter(
        (text): text is string => text !== undefined,
      );
    },
  };
}

/** Process-wide default table */
export const defaultTranslations: TranslationTable = createTranslationTable(
  loadTranslationData(translationsJson),
);

// ---------------------------------------------------------------------------
// Key Helpers
// ---------------------------------------------------------------------------

/**
 * Translation key of an enumerated value.
 *
 * @example enumLabelKey('sector', 'Real Estate') // "sector.real_estate"
 */
export function enumLabelKey(prefix: string, value: string): string {
  return `${prefix}.${value.trim().toLowerCase().replace(/\s+/g, '_')}`;
}

/**
 * Fill {placeholders} in a translated template.
 * Unknown placeholders are left as they are.
 */
export function interpolate(template: string, params: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in params ? String(params[name]) : match,
  );
}
