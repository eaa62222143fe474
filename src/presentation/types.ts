/**
 * Presentation Model Type Definitions
 *
 * The PresentationModel is the only contract the workbook renderer depends on.
 * Every display string is already localized; enumerated values (category,
 * priority, status) travel alongside their labels so the renderer can style
 * cells without knowing the language, the rule base or the deal context.
 */

import type {
  Category,
  EntrySource,
  Language,
  Priority,
  Status,
} from '../checklist/types/index.js';

/** One row of the Checklist sheet */
export interface ChecklistRow {
  category: Category;
  categoryLabel: string;
  /** Translated document name, or the custom name verbatim */
  name: string;
  required: boolean;
  /** "Yes" / "No" in the target language */
  requiredLabel: string;
  /** Not localized — matches the priority dropdown values */
  priority: Priority;
  /** Blank tracking fields, filled in by the DD team */
  receivedDate: null;
  status: Status;
  statusLabel: string;
  responsible: string;
  comments: string;
  source: EntrySource;
}

export interface StatusOption {
  status: Status;
  label: string;
}

export interface LabeledValue {
  label: string;
  value: string | number;
}

export interface CountRow<T extends string> {
  value: T;
  label: string;
  count: number;
}

export interface CountTable<T extends string> {
  title: string;
  headers: [string, string];
  /** Non-zero counts only, in canonical order */
  rows: CountRow<T>[];
}

export interface ChecklistSheetModel {
  headers: string[];
  rows: ChecklistRow[];
  /** Localized status values for the dropdown, in lifecycle order */
  statusOptions: StatusOption[];
  priorityOptions: Priority[];
  defaultStatus: Status;
  validationMessages: {
    statusError: string;
    statusErrorTitle: string;
    priorityError: string;
    priorityErrorTitle: string;
  };
}

export interface SummarySheetModel {
  title: string;
  metadata: LabeledValue[];
  totalDocuments: number;
  byCategory: CountTable<Category>;
  byPriority: CountTable<Priority>;
}

export interface InstructionsSheetModel {
  title: string;
  howToUse: { title: string; items: string[] };
  statusDefinitions: {
    title: string;
    headers: [string, string];
    rows: { status: Status; label: string; definition: string }[];
  };
  timeline: {
    title: string;
    headers: [string, string];
    rows: { phase: string; activities: string }[];
  };
  contacts: {
    title: string;
    headers: string[];
    roles: string[];
  };
}

export interface PresentationModel {
  language: Language;
  /** e.g. "TechVida_Lda_DD_Checklist_20260215.xlsx" */
  fileName: string;
  /** ISO timestamp */
  generatedAt: string;
  sheetNames: {
    checklist: string;
    summary: string;
    instructions: string;
  };
  checklist: ChecklistSheetModel;
  summary: SummarySheetModel;
  instructions: InstructionsSheetModel;
}
