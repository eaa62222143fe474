export {
  createTranslationTable,
  loadTranslationData,
  defaultTranslations,
  enumLabelKey,
  interpolate,
} from './translation-table.js';
export type { TranslationData, TranslationTable } from './translation-table.js';
