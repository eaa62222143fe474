/**
 * Barrel export for the presentation adapter.
 */

export { present, statusOptions } from './present.js';
export type { PresentOptions } from './present.js';
export {
  buildChecklistFilename,
  sanitizeTargetName,
  formatDateStamp,
  formatTimestamp,
} from './naming.js';
export type {
  PresentationModel,
  ChecklistRow,
  ChecklistSheetModel,
  SummarySheetModel,
  InstructionsSheetModel,
  StatusOption,
  LabeledValue,
  CountRow,
  CountTable,
} from './types.js';
