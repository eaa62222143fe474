// ============================================================================
// Checklist Error Types — Typed errors for resolution failures
// ============================================================================

/**
 * Base error for all checklist resolution errors.
 * Resolution is deterministic, so none of these are worth retrying.
 */
export class ChecklistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChecklistError';
  }
}

/**
 * Thrown when a deal context field is outside its enumerated set
 * (or the target name is empty).
 */
export class InvalidContextError extends ChecklistError {
  readonly field: string;
  readonly value: unknown;
  readonly allowed: readonly string[];

  constructor(field: string, value: unknown, allowed: readonly string[]) {
    const expected = allowed.length > 0 ? ` Must be one of: ${allowed.join(', ')}` : '';
    super(`Invalid ${field}: ${JSON.stringify(value) ?? String(value)}.${expected}`);
    this.name = 'InvalidContextError';
    this.field = field;
    this.value = value;
    this.allowed = allowed;
  }
}

/**
 * Thrown when a custom document is missing fields or carries a category,
 * priority or required flag outside the enumerated values.
 */
export class InvalidCustomEntryError extends ChecklistError {
  /** Position of the offending entry in the supplied list */
  readonly index: number;
  readonly reason: string;

  constructor(index: number, reason: string) {
    super(`Invalid custom document at index ${index}: ${reason}`);
    this.name = 'InvalidCustomEntryError';
    this.index = index;
    this.reason = reason;
  }
}

/**
 * Thrown when a key has no text for the requested language.
 * Means the rule base and the translation table have drifted apart.
 */
export class MissingTranslationError extends ChecklistError {
  readonly key: string;
  readonly language: string;

  constructor(key: string, language: string) {
    super(`Missing translation for "${key}" in ${language}`);
    this.name = 'MissingTranslationError';
    this.key = key;
    this.language = language;
  }
}
