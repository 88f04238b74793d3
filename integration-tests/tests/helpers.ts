/**
 * Test Helpers
 *
 * Sample schedule text and an in-process stand-in for the PDF text extractor.
 */

import type { TextExtractor, UploadedDocument } from '@policy-extractor/shared';

export const SCHEDULE_FIELD_NAMES = [
  'NUM_POL',
  'MON',
  'NUM_DOC',
  'FEC_NAC',
  'INI_VIG_POL',
  'FIN_VIG_POL',
  'PER_DIF',
  'PER_GAR',
  'REM_BASE',
  'PER_PAGO_RENTA',
  'K_SEPELIO',
  'P_UNICA',
  'PORC_DEV_PRIMA',
  'TASA_VENTA',
];

/**
 * Short schedule as a text extractor returns it, before uppercasing.
 */
export const SHORT_SCHEDULE = `Condiciones Particulares
Póliza N° RV-0001
Fecha de Nacimiento 15/03/1958
Tasa de Venta de la Póliza 3.5%`;

/**
 * Treats the uploaded bytes as the document's UTF-8 text.
 */
export const plainTextExtractor: TextExtractor = async (content) =>
  Buffer.from(content).toString('utf-8');

export function textDocument(filename: string, text: string): UploadedDocument {
  return { filename, content: Buffer.from(text, 'utf-8') };
}
