/**
 * Barrel export for all checklist type definitions.
 *
 * Consumers should import from this module:
 *   import type { DealContext, DocumentEntry, ... } from './types/index.js';
 */

export {
  CATEGORIES,
  PRIORITIES,
  DEAL_TYPES,
  SECTORS,
  JURISDICTIONS,
  LANGUAGES,
  STATUSES,
} from './checklist.js';

export type {
  Category,
  Priority,
  DealType,
  Sector,
  Jurisdiction,
  Language,
  Status,
  EntrySource,
  DocumentTemplate,
  RuleBase,
  CustomDocument,
  DealContext,
  DocumentName,
  DocumentEntry,
  ChecklistStats,
  ResolvedChecklist,
} from './checklist.js';
