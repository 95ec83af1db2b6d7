import { ZodError } from 'zod';
import {
  ValidationError,
  InsufficientFundsError,
  UnknownAccountError,
} from '../../domain/ledger/errors.js';
import { CsvFormatError } from '../../application/errors.js';

export const ExitCodes = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  INVALID_INPUT: 2,
  INSUFFICIENT_FUNDS: 3,
  UNKNOWN_ACCOUNT: 4,
} as const;

/**
 * Standard error shape reported by the CLI.
 */
export interface CliErrorResponse {
  code: string;
  message: string;
  exitCode: number;
  details?: object;
}

export function mapCliError(err: unknown): CliErrorResponse {
  // Invalid options or environment
  if (err instanceof ZodError) {
    return {
      code: 'INVALID_OPTIONS',
      message: 'Invalid options',
      exitCode: ExitCodes.INVALID_INPUT,
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
  }

  if (err instanceof CsvFormatError) {
    return {
      code: 'CSV_FORMAT',
      message: err.message,
      exitCode: ExitCodes.INVALID_INPUT,
    };
  }

  if (err instanceof ValidationError) {
    return {
      code: 'VALIDATION_ERROR',
      message: err.message,
      exitCode: ExitCodes.INVALID_INPUT,
    };
  }

  if (err instanceof InsufficientFundsError) {
    return {
      code: 'INSUFFICIENT_FUNDS',
      message: err.message,
      exitCode: ExitCodes.INSUFFICIENT_FUNDS,
    };
  }

  if (err instanceof UnknownAccountError) {
    return {
      code: 'UNKNOWN_ACCOUNT',
      message: err.message,
      exitCode: ExitCodes.UNKNOWN_ACCOUNT,
      details: { owner: err.owner },
    };
  }

  // Generic error fallback
  return {
    code: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
    exitCode: ExitCodes.UNEXPECTED,
  };
}
