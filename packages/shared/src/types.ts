/**
 * Shared TypeScript Types
 *
 * Types for the policy schedule extraction pipeline, matching JSON schemas in docs/contracts/
 */

import type { FieldSetName } from './config';

// ============================================================================
// Field Extraction
// ============================================================================

/** Value stored for a field whose rule did not match. */
export const MISSING_VALUE = '0';

/** Cause reported when a document yields no usable text. */
export const UNREADABLE_DOCUMENT_CAUSE = 'empty or non-extractable text';

/** Report column holding the document filename; no field may take this name. */
export const FILENAME_COLUMN = 'ARCHIVO';

/** Report sheet listing the extraction errors. */
export const ERRORS_SHEET_NAME = 'OBSERVACIONES';

export interface FieldDefinition {
  readonly name: string;
  /** Pattern with exactly one capture group holding the field value */
  readonly pattern: RegExp;
}

export type FieldValues = Readonly<Record<string, string>>;

/**
 * Values extracted from one document. Holds exactly one entry per registered
 * field, either the condensed capture or MISSING_VALUE.
 */
export interface DocumentRecord {
  filename: string;
  values: FieldValues;
}

/**
 * A field-level fault, or a whole-document failure when `field` is null.
 */
export interface ExtractionError {
  readonly filename: string;
  readonly field: string | null;
  readonly cause: string;
}

export interface ExtractionOutcome {
  /** Null when the document had no extractable text */
  record: DocumentRecord | null;
  errors: ExtractionError[];
}

export interface PatternFileEntry {
  name: string;
  pattern: string;
  flags?: string;
}

/** Shape of a PATTERNS_FILE, see docs/contracts/pattern_registry.schema.json */
export interface PatternFile {
  description?: string;
  fields: PatternFileEntry[];
}

// ============================================================================
// Batches
// ============================================================================

export interface UploadedDocument {
  filename: string;
  content: Uint8Array;
}

/**
 * Text-extraction collaborator. Expected to resolve to an empty string on
 * malformed input rather than reject.
 */
export type TextExtractor = (content: Uint8Array, filename: string) => Promise<string>;

export interface DocumentPreview {
  filename: string;
  text: string;
}

export interface BatchResult {
  batch_id: string;
  field_set: FieldSetName | 'custom';
  field_names: string[];
  uppercase: boolean;
  document_count: number;
  records: DocumentRecord[];
  errors: ExtractionError[];
  previews: DocumentPreview[];
  completed_at: string;
}

// ============================================================================
// API
// ============================================================================

export interface ExportRequest {
  records: DocumentRecord[];
  errors?: ExtractionError[];
  field_names?: string[];
  prefix?: string;
}

export interface FieldListResponse {
  field_set: FieldSetName | 'custom';
  fields: Array<{ name: string; pattern: string }>;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
