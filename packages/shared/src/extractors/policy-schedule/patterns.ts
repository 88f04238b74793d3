/**
 * Policy Schedule Extraction Patterns
 *
 * Regular expressions for the fields printed on an annuity policy schedule
 * ("Condiciones Particulares"). Rules are written for the uppercased text:
 * every label phrase is matched in capitals.
 *
 * Label words are separated by \s+ so a label may wrap onto the next line,
 * and the value may start on the line after its label. Each pattern has a
 * single capture group; the engine removes any whitespace inside it.
 */

import type { FieldDefinition } from '../../types';

/**
 * Date value: day, month and year separated by spaces, slashes or hyphens,
 * possibly broken across lines.
 * Examples: 01/01/1990, 01 01 1990, 01 / 01 /\n1990
 */
const DATE_VALUE = String.raw`([0-9]{1,2}\s*[\/\-]?\s*[0-9]{1,2}\s*[\/\-]?\s*[0-9]{2,4})`;

/**
 * Currency amount: a currency marker (S/., US$, $) followed by a number.
 * Examples: S/. 1,250.00, US$ 30000
 */
const AMOUNT_VALUE = String.raw`([A-Z$\/\.]+\s*\d[\d,\.]*)`;

// Shared by the policy number, policy period and sale rate labels
const POLICY = 'PÓLIZA';

export const NUM_POL = new RegExp(String.raw`${POLICY}\s+N[°º]\s*([A-Z0-9\/\.\-]+)`);

/**
 * Currency of the single premium: the marker printed before the amount.
 */
export const MON = /MONTO\s+PRIMA\s+ÚNICA\s*([A-Z$\/\.]+)/;

/**
 * Identity document number: "N°" followed by at least eight digits.
 * Spaces inside the number are tolerated.
 */
export const NUM_DOC = /N[°º]\s*([0-9 ]{8,})/;

export const FEC_NAC = new RegExp(String.raw`FECHA\s+DE\s+NACIMIENTO\s*${DATE_VALUE}`);

/**
 * Policy start date. The label reads either "...DE LA PÓLIZA" or, for
 * guaranteed-period schedules, "...DEL PG".
 */
export const INI_VIG_POL = new RegExp(
  String.raw`FECHA(?:\s+DE)?\s+INICIO\s+VIGENCIA\s+(?:DE\s+LA\s+${POLICY}|DEL\s+PG)\s*${DATE_VALUE}`
);

export const FIN_VIG_POL = new RegExp(
  String.raw`FECHA(?:\s+DE)?\s+FIN\s+VIGENCIA\s+(?:DE\s+LA\s+${POLICY}|DEL\s+PG)\s*${DATE_VALUE}`
);

/**
 * Deferral period in years, up to three digits.
 */
export const PER_DIF = /DIFERIMIENTO\s+DEL\s+PAGO\s*\(N[°º]\s*DE\s+AÑOS\)\s*([0-9]{1,3})/;

/**
 * Guaranteed period in months, up to three digits.
 */
export const PER_GAR = /N[°º]\s*MESES\s+PERIODO\s+GARANTIZADO\s*\(PG\)\s*([0-9]{1,3})/;

/**
 * Base annuity amount. The amount may appear after other text in the same
 * table cell, so the gap is matched lazily.
 */
export const REM_BASE = new RegExp(String.raw`MONTO\s+RENTA\s+BASE[\s\S]*?${AMOUNT_VALUE}`);

/**
 * Payment frequency as a word (MENSUAL, TRIMESTRAL, ANUAL...).
 */
export const PER_PAGO_RENTA = /PERIODICIDAD\s+DEL\s+PAGO\s*([A-ZÁÉÍÓÚ]+)/;

export const K_SEPELIO = new RegExp(
  String.raw`SUMA\s+ASEGURADA\s+COB\.?\s+DE\s+SEPELIO\s*${AMOUNT_VALUE}`
);

export const P_UNICA = new RegExp(String.raw`MONTO\s+PRIMA\s+ÚNICA\s*${AMOUNT_VALUE}`);

/**
 * Premium refund percentage, with or without the percent sign.
 */
export const PORC_DEV_PRIMA = /MONTO\s+DE\s+DEVOLUCIÓN\s+DE\s+PRIMA\s*([0-9]+%?)/;

/**
 * Sale rate. The "(TV)" marker may appear before or after "DE LA PÓLIZA";
 * the percent sign is left out of the capture.
 */
export const TASA_VENTA = new RegExp(
  String.raw`(?:TASA\s+DE\s+VENTA\s+DE\s+LA\s+${POLICY}(?:\s*\(TV\))?|TASA\s+DE\s+VENTA\s*\(TV\)\s*DE\s+LA\s+${POLICY})\s*([0-9]+(?:\.[0-9]+)?)\s*%?`
);

/**
 * The full policy schedule schema, in column order.
 */
export const POLICY_SCHEDULE_FIELDS: readonly FieldDefinition[] = [
  { name: 'NUM_POL', pattern: NUM_POL },
  { name: 'MON', pattern: MON },
  { name: 'NUM_DOC', pattern: NUM_DOC },
  { name: 'FEC_NAC', pattern: FEC_NAC },
  { name: 'INI_VIG_POL', pattern: INI_VIG_POL },
  { name: 'FIN_VIG_POL', pattern: FIN_VIG_POL },
  { name: 'PER_DIF', pattern: PER_DIF },
  { name: 'PER_GAR', pattern: PER_GAR },
  { name: 'REM_BASE', pattern: REM_BASE },
  { name: 'PER_PAGO_RENTA', pattern: PER_PAGO_RENTA },
  { name: 'K_SEPELIO', pattern: K_SEPELIO },
  { name: 'P_UNICA', pattern: P_UNICA },
  { name: 'PORC_DEV_PRIMA', pattern: PORC_DEV_PRIMA },
  { name: 'TASA_VENTA', pattern: TASA_VENTA },
];

/**
 * Identification subset used for quick policy lookups.
 */
export const BASIC_FIELD_NAMES: readonly string[] = ['NUM_POL', 'NUM_DOC', 'FEC_NAC', 'TASA_VENTA'];

export const POLICY_SCHEDULE_BASIC_FIELDS: readonly FieldDefinition[] =
  POLICY_SCHEDULE_FIELDS.filter((definition) => BASIC_FIELD_NAMES.includes(definition.name));
