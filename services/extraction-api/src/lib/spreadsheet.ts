/**
 * Spreadsheet Export
 *
 * Writes the result table (and the error table, when there is one) to an
 * .xlsx workbook with SheetJS. The engine is resolved once at startup; when
 * it cannot be loaded, export requests fail with SpreadsheetUnavailableError
 * while extraction keeps working.
 */

import {
  logger,
  FILENAME_COLUMN,
  ERRORS_SHEET_NAME,
  SpreadsheetUnavailableError,
  type DocumentRecord,
  type ExtractionError,
  type SpreadsheetEnginePreference,
} from '@policy-extractor/shared';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const ERROR_COLUMNS = [FILENAME_COLUMN, 'CAMPO', 'ERROR'];

export type SpreadsheetEngine = 'xlsx';

export interface SheetData {
  name: string;
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface SpreadsheetWriter {
  readonly engine: SpreadsheetEngine;
  write(sheets: SheetData[]): Buffer;
}

export type SpreadsheetEngineStatus =
  | { status: 'available'; writer: SpreadsheetWriter }
  | { status: 'unavailable'; reason: string };

async function loadXlsxWriter(): Promise<SpreadsheetWriter> {
  const XLSX = await import('xlsx');

  return {
    engine: 'xlsx',
    write(sheets: SheetData[]): Buffer {
      const workbook = XLSX.utils.book_new();

      for (const sheet of sheets) {
        // Header row, then one row per record in column order
        const data = [
          sheet.columns,
          ...sheet.rows.map((row) => sheet.columns.map((column) => row[column] ?? '')),
        ];
        XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(data), sheet.name);
      }

      const out: Buffer = XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
      return out;
    },
  };
}

/**
 * Resolve the spreadsheet engine for this process.
 */
export async function resolveSpreadsheetEngine(
  preference: SpreadsheetEnginePreference
): Promise<SpreadsheetEngineStatus> {
  if (preference === 'none') {
    return { status: 'unavailable', reason: 'spreadsheet export disabled by SPREADSHEET_ENGINE=none' };
  }

  try {
    const writer = await loadXlsxWriter();
    logger.info('Spreadsheet engine available', { engine: writer.engine });
    return { status: 'available', writer };
  } catch (error) {
    const reason = `xlsx could not be loaded: ${error instanceof Error ? error.message : String(error)}`;
    logger.warn('No spreadsheet engine available', { preference, reason });
    return { status: 'unavailable', reason };
  }
}

/**
 * @throws SpreadsheetUnavailableError when no engine was resolved
 */
export function requireWriter(engine: SpreadsheetEngineStatus): SpreadsheetWriter {
  if (engine.status === 'unavailable') {
    throw new SpreadsheetUnavailableError(engine.reason);
  }
  return engine.writer;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Report file name: <prefix>_<YYYYMMDD_HHMMSS>.xlsx, in local time.
 */
export function buildReportFilename(prefix: string, date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${prefix}_${day}_${time}.xlsx`;
}

/**
 * Lay out the result table and, when non-empty, the error table as sheets.
 */
export function buildReportSheets(
  records: readonly DocumentRecord[],
  errors: readonly ExtractionError[],
  fieldNames: readonly string[],
  sheetName: string
): SheetData[] {
  const sheets: SheetData[] = [
    {
      name: sheetName,
      columns: [FILENAME_COLUMN, ...fieldNames],
      rows: records.map((record) => ({ ...record.values, [FILENAME_COLUMN]: record.filename })),
    },
  ];

  if (errors.length > 0) {
    sheets.push({
      name: ERRORS_SHEET_NAME,
      columns: ERROR_COLUMNS,
      rows: errors.map((error) => ({
        [FILENAME_COLUMN]: error.filename,
        CAMPO: error.field ?? '',
        ERROR: error.cause,
      })),
    });
  }

  return sheets;
}
