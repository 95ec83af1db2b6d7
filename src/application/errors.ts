/**
 * Application-level errors for CLI error mapping.
 * Domain rule violations live in domain/ledger/errors.ts.
 */
export class CsvFormatError extends Error {
  constructor(message = 'Malformed CSV file') {
    super(message);
    this.name = 'CsvFormatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
