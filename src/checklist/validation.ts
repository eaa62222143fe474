/**
 * Deal Context Validation — System boundary for loosely-typed input
 *
 * Turns caller input (CLI answers, programmatic calls, tuples of custom
 * documents) into a strongly-typed, frozen DealContext. Nothing untyped
 * travels past this module.
 *
 * Custom documents are accepted in two shapes:
 *   ['IP', 'Patent Portfolio Review', 'Yes', 'High']                      (positional)
 *   { category: 'IP', name: 'Patent Portfolio Review', required: true, priority: 'High' }
 *
 * The required flag takes a boolean or one of yes/no/y/n/sim/não/nao/s.
 */

import { z } from 'zod';
import {
  CATEGORIES,
  PRIORITIES,
  DEAL_TYPES,
  SECTORS,
  JURISDICTIONS,
  LANGUAGES,
} from './types/index.js';
import type { CustomDocument, DealContext } from './types/index.js';
import { InvalidContextError, InvalidCustomEntryError } from './errors.js';

// ---------------------------------------------------------------------------
// Input Types
// ---------------------------------------------------------------------------

/** A custom document as callers may supply it, before validation */
export type CustomDocumentInput =
  | readonly [category: string, name: string, required: boolean | string, priority: string]
  | {
      category: string;
      name: string;
      required: boolean | string;
      priority: string;
    };

/** Loose deal parameters, as received from the CLI or a programmatic caller */
export interface DealContextInput {
  targetName: string;
  dealType: string;
  sector: string;
  jurisdiction: string;
  language: string;
  customDocuments?: readonly CustomDocumentInput[];
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const YES_VALUES = ['yes', 'y', 'sim', 's', 'true'] as const;
const NO_VALUES = ['no', 'n', 'não', 'nao', 'false'] as const;
const FLAG_VALUES = [...YES_VALUES, ...NO_VALUES] as const;
const YES_SET: ReadonlySet<string> = new Set(YES_VALUES);

const RequiredFlagSchema = z
  .union([
    z.boolean(),
    z.string().trim().toLowerCase().pipe(z.enum(FLAG_VALUES)),
  ])
  .transform((value) => (typeof value === 'boolean' ? value : YES_SET.has(value)));

const CustomDocumentObjectSchema = z.object({
  category: z.enum(CATEGORIES),
  name: z.string().trim().min(1, 'name cannot be empty'),
  required: RequiredFlagSchema,
  priority: z.enum(PRIORITIES),
});

const CustomDocumentTupleSchema = z
  .tuple([
    z.enum(CATEGORIES),
    z.string().trim().min(1, 'name cannot be empty'),
    RequiredFlagSchema,
    z.enum(PRIORITIES),
  ])
  .transform(([category, name, required, priority]) => ({ category, name, required, priority }));

const DealContextSchema = z.object({
  targetName: z.string().trim().min(1, 'target name cannot be empty'),
  dealType: z.enum(DEAL_TYPES),
  sector: z.enum(SECTORS),
  jurisdiction: z.enum(JURISDICTIONS),
  language: z.enum(LANGUAGES),
  customDocuments: z.array(z.unknown()).optional(),
});

/** Allowed values per context field, used in error messages */
const ALLOWED_VALUES: Record<string, readonly string[]> = {
  dealType: DEAL_TYPES,
  sector: SECTORS,
  jurisdiction: JURISDICTIONS,
  language: LANGUAGES,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'entry';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate one custom document and convert it to the typed shape.
 *
 * @param raw - Positional tuple or object form
 * @param index - Position in the caller's list, reported on failure
 * @throws InvalidCustomEntryError
 */
export function parseCustomDocument(raw: unknown, index: number): CustomDocument {
  const result = Array.isArray(raw)
    ? CustomDocumentTupleSchema.safeParse(raw)
    : CustomDocumentObjectSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidCustomEntryError(index, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Validate loose deal parameters and build a frozen DealContext.
 *
 * Context fields are checked before custom documents, so a bad deal type is
 * reported even when the custom list is also malformed.
 *
 * @throws InvalidContextError when a field is outside its enumerated set
 * @throws InvalidCustomEntryError when a custom document, or the list holding
 *   them, is malformed
 */
export function parseDealContext(raw: unknown): DealContext {
  if (!isRecord(raw)) {
    throw new InvalidContextError('context', raw, []);
  }

  const result = DealContextSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue && issue.path.length > 0 ? String(issue.path[0]) : 'context';
    if (field === 'customDocuments') {
      // The list itself is malformed, so no entry index exists yet
      throw new InvalidCustomEntryError(0, describeIssues(result.error));
    }
    throw new InvalidContextError(field, raw[field], ALLOWED_VALUES[field] ?? []);
  }

  const { customDocuments = [], ...fields } = result.data;
  const parsedCustom = customDocuments.map((doc, index) =>
    Object.freeze(parseCustomDocument(doc, index)),
  );

  return Object.freeze({
    ...fields,
    customDocuments: Object.freeze(parsedCustom),
  });
}
