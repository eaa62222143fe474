/**
 * Checklist File Naming
 *
 * Pattern: "{CompanyName}_DD_Checklist_{YYYYMMDD}.xlsx"
 *
 * Examples:
 *   - "TechVida Lda"      -> "TechVida_Lda_DD_Checklist_20260215.xlsx"
 *   - "Farma Saúde SA"    -> "Farma_Saúde_SA_DD_Checklist_20260215.xlsx"
 *   - "Acme & Sons, Inc." -> "Acme___Sons__Inc__DD_Checklist_20260215.xlsx"
 *
 * Pure functions — no side effects, no I/O. Dates use local time.
 */

const FALLBACK_NAME = 'Target';

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Sanitize a company name for use in a filename.
 *
 * Keeps letters (any script), digits, space, underscore and dash; every other
 * character becomes "_". Trims, then turns spaces into underscores.
 */
export function sanitizeTargetName(name: string): string {
  const safe = name
    .replace(/[^\p{L}\p{N} _-]/gu, '_')
    .trim()
    .replace(/ /g, '_');
  return safe.length > 0 ? safe : FALLBACK_NAME;
}

/** "YYYYMMDD" */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** "YYYY-MM-DD HH:mm" */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Build the workbook filename for a target company.
 *
 * @param targetName - Company name as entered by the user
 * @param date - Generation date (defaults to now)
 */
export function buildChecklistFilename(targetName: string, date: Date = new Date()): string {
  return `${sanitizeTargetName(targetName)}_DD_Checklist_${formatDateStamp(date)}.xlsx`;
}
