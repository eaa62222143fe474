/**
 * Barrel export for the checklist resolution engine.
 *
 * Primary export: resolveChecklist — the core pure function.
 * Also exports the merge helpers for testing and advanced use.
 */

export { resolveChecklist, selectTemplates } from './resolve-checklist.js';
export type { ResolverDeps } from './resolve-checklist.js';
export {
  normalizeName,
  entryNameVariants,
  dedupeTemplates,
  mergeCustomDocuments,
  orderByCategory,
  computeStats,
} from './merge.js';
