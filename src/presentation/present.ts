/**
 * Presentation Adapter — Pure Function
 *
 * Transforms a ResolvedChecklist into the PresentationModel consumed by the
 * workbook renderer. All localization happens here; a key without text for
 * the checklist language throws MissingTranslationError.
 *
 * Structure:
 * 1. Checklist sheet: localized headers + one row per document (status Pending)
 * 2. Summary sheet: deal metadata, counts by category and by priority
 * 3. Instructions sheet: how to use, status definitions, timeline, contacts
 */

import { CATEGORIES, PRIORITIES, STATUSES } from '../checklist/types/index.js';
import type {
  Category,
  DocumentEntry,
  Language,
  Priority,
  ResolvedChecklist,
  Status,
} from '../checklist/types/index.js';
import { defaultTranslations, enumLabelKey } from '../i18n/index.js';
import type { TranslationTable } from '../i18n/index.js';
import { buildChecklistFilename, formatTimestamp } from './naming.js';
import type {
  ChecklistRow,
  CountTable,
  InstructionsSheetModel,
  PresentationModel,
  StatusOption,
  SummarySheetModel,
} from './types.js';

// ---------------------------------------------------------------------------
// Template Constants
// ---------------------------------------------------------------------------

const CHECKLIST_HEADER_KEYS = [
  'header.category',
  'header.document_name',
  'header.required',
  'header.priority',
  'header.received_date',
  'header.status',
  'header.responsible',
  'header.comments',
] as const;

const CONTACT_HEADER_KEYS = [
  'contacts.header.role',
  'contacts.header.firm',
  'contacts.header.contact_person',
  'contacts.header.email',
  'contacts.header.phone',
] as const;

const HOW_TO_USE_STEPS = 6;
const TIMELINE_PHASES = 6;
const CONTACT_ROLES = 6;

const DEFAULT_STATUS: Status = 'Pending';

export interface PresentOptions {
  translations?: TranslationTable;
  /** Defaults to now — drives the filename and the "Date Generated" field */
  generatedAt?: Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** [1, 2, ..., count] */
function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i + 1);
}

function documentName(entry: DocumentEntry, t: (key: string) => string): string {
  return entry.name.kind === 'key' ? t(entry.name.key) : entry.name.text;
}

function buildRows(
  documents: readonly DocumentEntry[],
  t: (key: string) => string,
): ChecklistRow[] {
  const defaultStatusLabel = t(enumLabelKey('status', DEFAULT_STATUS));

  return documents.map((entry) => ({
    category: entry.category,
    categoryLabel: t(enumLabelKey('category', entry.category)),
    name: documentName(entry, t),
    required: entry.required,
    requiredLabel: t(entry.required ? 'required.yes' : 'required.no'),
    priority: entry.priority,
    receivedDate: null,
    status: DEFAULT_STATUS,
    statusLabel: defaultStatusLabel,
    responsible: '',
    comments: '',
    source: entry.source,
  }));
}

function buildCountTable<T extends string>(
  values: readonly T[],
  counts: Readonly<Record<T, number>>,
  labelPrefix: string,
  title: string,
  headers: [string, string],
  t: (key: string) => string,
): CountTable<T> {
  return {
    title,
    headers,
    rows: values
      .filter((value) => counts[value] > 0)
      .map((value) => ({
        value,
        label: t(enumLabelKey(labelPrefix, value)),
        count: counts[value],
      })),
  };
}

function buildSummary(
  checklist: ResolvedChecklist,
  generatedAt: Date,
  t: (key: string) => string,
): SummarySheetModel {
  const { context, stats } = checklist;
  const countHeader = t('summary.count');

  return {
    title: t('summary.title'),
    metadata: [
      { label: t('summary.target'), value: context.targetName },
      { label: t('summary.transaction'), value: t(enumLabelKey('deal_type', context.dealType)) },
      { label: t('summary.sector'), value: t(enumLabelKey('sector', context.sector)) },
      { label: t('summary.jurisdiction'), value: t(enumLabelKey('jurisdiction', context.jurisdiction)) },
      { label: t('summary.date_generated'), value: formatTimestamp(generatedAt) },
      { label: t('summary.total_docs'), value: stats.total },
    ],
    totalDocuments: stats.total,
    byCategory: buildCountTable<Category>(
      CATEGORIES,
      stats.byCategory,
      'category',
      t('summary.by_category'),
      [t('summary.category'), countHeader],
      t,
    ),
    byPriority: buildCountTable<Priority>(
      PRIORITIES,
      stats.byPriority,
      'priority',
      t('summary.by_priority'),
      [t('summary.priority'), countHeader],
      t,
    ),
  };
}

function buildInstructions(t: (key: string) => string): InstructionsSheetModel {
  return {
    title: t('instructions.title'),
    howToUse: {
      title: t('instructions.how_to_use'),
      items: range(HOW_TO_USE_STEPS).map((i) => t(`instructions.how_to_use.${i}`)),
    },
    statusDefinitions: {
      title: t('status_def.title'),
      headers: [t('status_def.header.status'), t('status_def.header.definition')],
      rows: STATUSES.map((status) => ({
        status,
        label: t(enumLabelKey('status', status)),
        definition: t(enumLabelKey('status_def', status)),
      })),
    },
    timeline: {
      title: t('timeline.title'),
      headers: [t('timeline.header.phase'), t('timeline.header.activities')],
      rows: range(TIMELINE_PHASES).map((i) => ({
        phase: t(`timeline.phase.${i}`),
        activities: t(`timeline.activity.${i}`),
      })),
    },
    contacts: {
      title: t('contacts.title'),
      headers: CONTACT_HEADER_KEYS.map((key) => t(key)),
      roles: range(CONTACT_ROLES).map((i) => t(`contacts.role.${i}`)),
    },
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Localized status options, in lifecycle order.
 */
export function statusOptions(
  language: Language,
  translations: TranslationTable = defaultTranslations,
): StatusOption[] {
  return STATUSES.map((status) => ({
    status,
    label: translations.translate(enumLabelKey('status', status), language),
  }));
}

/**
 * Build the PresentationModel for a resolved checklist.
 *
 * @param checklist - Output of resolveChecklist()
 * @param options - Translation table and generation date overrides
 * @throws MissingTranslationError when the table lacks a key for the checklist language
 */
export function present(
  checklist: ResolvedChecklist,
  options: PresentOptions = {},
): PresentationModel {
  const translations = options.translations ?? defaultTranslations;
  const generatedAt = options.generatedAt ?? new Date();
  const { language, targetName } = checklist.context;
  const t = (key: string): string => translations.translate(key, language);

  return {
    language,
    fileName: buildChecklistFilename(targetName, generatedAt),
    generatedAt: generatedAt.toISOString(),
    sheetNames: {
      checklist: t('sheet.checklist'),
      summary: t('sheet.summary'),
      instructions: t('sheet.instructions'),
    },
    checklist: {
      headers: CHECKLIST_HEADER_KEYS.map((key) => t(key)),
      rows: buildRows(checklist.documents, t),
      statusOptions: statusOptions(language, translations),
      priorityOptions: [...PRIORITIES],
      defaultStatus: DEFAULT_STATUS,
      validationMessages: {
        statusError: t('validation.status_error'),
        statusErrorTitle: t('validation.status_error_title'),
        priorityError: t('validation.priority_error'),
        priorityErrorTitle: t('validation.priority_error_title'),
      },
    },
    summary: buildSummary(checklist, generatedAt, t),
    instructions: buildInstructions(t),
  };
}
