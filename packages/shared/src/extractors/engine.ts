/**
 * Field Extraction Engine
 *
 * Maps one document's text to a record holding one value per registered
 * field. A field whose rule does not match gets MISSING_VALUE; a rule that
 * throws gets MISSING_VALUE plus an ExtractionError, and the remaining
 * fields are still extracted.
 */

import {
  MISSING_VALUE,
  UNREADABLE_DOCUMENT_CAUSE,
  type ExtractionError,
  type ExtractionOutcome,
} from '../types';
import { logger } from '../logger';
import type { PatternRegistry } from './registry';

/**
 * Remove every whitespace character, including line breaks a PDF may put
 * inside a number or date.
 */
export function condenseWhitespace(value: string): string {
  return value.replace(/\s+/g, '').trim();
}

/**
 * Search the text with one field's rule.
 * Returns the condensed capture, or null when there is no match. An empty
 * capture is reported as no match.
 */
export function matchField(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  if (!match || match[1] === undefined) return null;

  const value = condenseWhitespace(match[1]);
  return value || null;
}

export function isExtractableText(text: string): boolean {
  return text.trim().length > 0;
}

/**
 * Extract every registered field from one document's text.
 *
 * Empty or whitespace-only text short-circuits before any rule runs and
 * yields a single document-level error and no record.
 */
export function extractDocument(
  filename: string,
  text: string,
  registry: PatternRegistry
): ExtractionOutcome {
  if (!isExtractableText(text)) {
    return {
      record: null,
      errors: [{ filename, field: null, cause: UNREADABLE_DOCUMENT_CAUSE }],
    };
  }

  const values: Record<string, string> = {};
  const errors: ExtractionError[] = [];

  for (const field of registry.fields()) {
    try {
      values[field] = matchField(text, registry.ruleFor(field)) ?? MISSING_VALUE;
    } catch (error) {
      const cause = error instanceof Error ? error.message : String(error);
      values[field] = MISSING_VALUE;
      errors.push({ filename, field, cause });

      logger.warn('Field rule failed', { field, cause });
    }
  }

  return { record: { filename, values }, errors };
}
