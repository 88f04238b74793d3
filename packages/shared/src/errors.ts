/**
 * Typed errors raised by the registry and the export step.
 *
 * Field- and document-level extraction failures are never thrown to callers;
 * they are collected as ExtractionError values (see types.ts).
 */

export class UnknownFieldError extends Error {
  readonly field: string;

  constructor(field: string) {
    super(`No matching rule registered for field: ${field}`);
    this.name = 'UnknownFieldError';
    this.field = field;
    Object.setPrototypeOf(this, UnknownFieldError.prototype);
  }
}

export class InvalidRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRegistryError';
    Object.setPrototypeOf(this, InvalidRegistryError.prototype);
  }
}

/**
 * Raised when a report is requested but no spreadsheet engine could be loaded.
 * `remediation` is shown to the operator as-is.
 */
export class SpreadsheetUnavailableError extends Error {
  readonly reason: string;
  readonly remediation: string;

  constructor(reason: string) {
    super(`Spreadsheet export is unavailable: ${reason}`);
    this.name = 'SpreadsheetUnavailableError';
    this.reason = reason;
    this.remediation =
      'Install the "xlsx" package in the extraction-api workspace ' +
      '(npm install xlsx) and set SPREADSHEET_ENGINE to "auto" or "xlsx", then restart the service.';
    Object.setPrototypeOf(this, SpreadsheetUnavailableError.prototype);
  }
}
