/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * Resolved once at startup and passed explicitly to the components that need it.
 */

import { ERRORS_SHEET_NAME } from './types';

export type FieldSetName = 'full' | 'basic';

export type SpreadsheetEnginePreference = 'auto' | 'xlsx' | 'none';

export interface Config {
  // HTTP
  port: number;
  maxUploadBytes: number;
  maxFilesPerBatch: number;

  // Pattern Registry
  fieldSet: FieldSetName;
  patternsFile: string | null;

  // Text normalization
  uppercaseText: boolean;
  debugText: boolean;
  textPreviewChars: number;

  // Report export
  reportPrefix: string;
  reportSheetName: string;
  spreadsheetEngine: SpreadsheetEnginePreference;
}

type Env = Record<string, string | undefined>;

const FIELD_SETS: readonly FieldSetName[] = ['full', 'basic'];
const ENGINE_PREFERENCES: readonly SpreadsheetEnginePreference[] = ['auto', 'xlsx', 'none'];

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
  variable: string
): T {
  if (!value) return fallback;
  const match = choices.find((choice) => choice === value.trim().toLowerCase());
  if (!match) {
    throw new Error(`${variable} must be one of ${choices.join(', ')} (got "${value}")`);
  }
  return match;
}

// Excel limits sheet names to 31 characters, none of them []:*?/\
const INVALID_SHEET_NAME = /[[\]:*?\/\\]/;

function parseSheetName(value: string | undefined, fallback: string, variable: string): string {
  const name = value?.trim() || fallback;
  if (name.length > 31 || INVALID_SHEET_NAME.test(name)) {
    throw new Error(
      `${variable} must be at most 31 characters and must not contain []:*?/\\ (got "${name}")`
    );
  }
  if (name === ERRORS_SHEET_NAME) {
    throw new Error(`${variable} must not be ${ERRORS_SHEET_NAME}, which holds the error table`);
  }
  return name;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    // HTTP
    port: parseInt(env.PORT || '8080', 10),
    maxUploadBytes: parseInt(env.MAX_UPLOAD_BYTES || '26214400', 10),
    maxFilesPerBatch: parseInt(env.MAX_FILES_PER_BATCH || '50', 10),

    // Pattern Registry
    fieldSet: parseChoice(env.FIELD_SET, FIELD_SETS, 'full', 'FIELD_SET'),
    patternsFile: env.PATTERNS_FILE || null,

    // Text normalization
    uppercaseText: env.UPPERCASE_TEXT !== 'false',
    debugText: env.DEBUG_TEXT === 'true',
    textPreviewChars: parseInt(env.TEXT_PREVIEW_CHARS || '20000', 10),

    // Report export
    reportPrefix: env.REPORT_PREFIX || 'RentaMAX',
    reportSheetName: parseSheetName(env.REPORT_SHEET_NAME, 'DATA', 'REPORT_SHEET_NAME'),
    spreadsheetEngine: parseChoice(
      env.SPREADSHEET_ENGINE,
      ENGINE_PREFERENCES,
      'auto',
      'SPREADSHEET_ENGINE'
    ),
  };
}

export const config: Config = loadConfig();
