/**
 * Checklist Rule Base & Output Type Definitions
 *
 * Defines the contract for:
 * - Enumerated axis values (deal type, sector, jurisdiction, language)
 * - Rule base templates (DocumentTemplate) keyed by translation key
 * - Resolved entries (DocumentEntry) and the resolved checklist with its stats
 *
 * Consumers:
 * - rules/: declares DocumentTemplate[] per axis value
 * - engine/: turns a DealContext into a ResolvedChecklist
 * - presentation/: turns a ResolvedChecklist into a PresentationModel
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

/** Document categories, in the canonical output order */
export const CATEGORIES = [
  'Legal',
  'Financial',
  'Operational',
  'Tax',
  'HR',
  'Commercial',
  'IP',
  'Compliance',
] as const;

export type Category = typeof CATEGORIES[number];

export const PRIORITIES = ['High', 'Medium', 'Low'] as const;

export type Priority = typeof PRIORITIES[number];

export const DEAL_TYPES = ['Share Deal', 'Asset Deal', 'Merger'] as const;

export type DealType = typeof DEAL_TYPES[number];

export const SECTORS = [
  'Healthcare',
  'Technology',
  'Industrial',
  'Real Estate',
  'Financial Services',
  'Retail',
] as const;

export type Sector = typeof SECTORS[number];

export const JURISDICTIONS = ['Portugal', 'Spain', 'International'] as const;

export type Jurisdiction = typeof JURISDICTIONS[number];

export const LANGUAGES = ['EN', 'PT'] as const;

export type Language = typeof LANGUAGES[number];

/** Tracking status a document moves through once the checklist is in use */
export const STATUSES = ['Pending', 'Received', 'Reviewed', 'Missing'] as const;

export type Status = typeof STATUSES[number];

/** Where an entry came from — kept for traceability in the output */
export type EntrySource = 'base-rule' | 'custom';

// ---------------------------------------------------------------------------
// Rule Base
// ---------------------------------------------------------------------------

/**
 * A single document request template in the rule base.
 *
 * Templates carry a translation key, never display text.
 */
export interface DocumentTemplate {
  /** Translation key, e.g. "doc.shareholder_agreements" */
  readonly key: string;
  readonly category: Category;
  /** true = absence blocks closing */
  readonly required: boolean;
  readonly priority: Priority;
}

/** The full, read-only rule base: a base pack plus one subset per axis value */
export interface RuleBase {
  /** Documents requested for every deal */
  readonly basePack: readonly DocumentTemplate[];
  readonly dealTypes: Readonly<Record<DealType, readonly DocumentTemplate[]>>;
  readonly sectors: Readonly<Record<Sector, readonly DocumentTemplate[]>>;
  readonly jurisdictions: Readonly<Record<Jurisdiction, readonly DocumentTemplate[]>>;
}

// ---------------------------------------------------------------------------
// Deal Context
// ---------------------------------------------------------------------------

/** A custom document supplied by the caller, already validated */
export interface CustomDocument {
  readonly category: Category;
  /** Shown verbatim in every language */
  readonly name: string;
  readonly required: boolean;
  readonly priority: Priority;
}

/**
 * One generation request. Built once by the validation boundary and never mutated.
 */
export interface DealContext {
  readonly targetName: string;
  readonly dealType: DealType;
  readonly sector: Sector;
  readonly jurisdiction: Jurisdiction;
  readonly language: Language;
  readonly customDocuments: readonly CustomDocument[];
}

// ---------------------------------------------------------------------------
// Resolved Checklist
// ---------------------------------------------------------------------------

/** Entry name: a rule-base translation key, or verbatim text for custom entries */
export type DocumentName =
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'literal'; readonly text: string };

/** One checklist line */
export interface DocumentEntry {
  readonly category: Category;
  readonly name: DocumentName;
  readonly required: boolean;
  readonly priority: Priority;
  readonly source: EntrySource;
}

/**
 * Derived counts for a resolved checklist.
 *
 * Every category and priority is present as a key, zero when unused.
 */
export interface ChecklistStats {
  readonly total: number;
  readonly byCategory: Readonly<Record<Category, number>>;
  readonly byPriority: Readonly<Record<Priority, number>>;
}

/** Output of the resolver — immutable once created */
export interface ResolvedChecklist {
  readonly context: DealContext;
  /** Category-major in canonical order, insertion order within a category */
  readonly documents: readonly DocumentEntry[];
  readonly stats: ChecklistStats;
}
