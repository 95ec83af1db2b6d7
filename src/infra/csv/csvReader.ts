import { basename } from 'path';
import { ValidationError } from '../../domain/ledger/errors.js';
import {
  AccountOpening,
  TransactionRecord,
} from '../../application/ledger/applyBatch.js';
import { CsvReadOptions, readCsvFile } from './csvParser.js';
import {
  AccountRowSchema,
  TransactionRowSchema,
  formatIssues,
} from './schemas.js';

const ACCOUNT_HEADERS = ['owner', 'opening_balance'] as const;
const TRANSACTION_HEADERS = ['owner', 'event', 'amount', 'other'] as const;

/**
 * Load account openings (owner, opening_balance) in file order.
 * Header names are matched case- and whitespace-insensitively.
 */
export async function loadAccounts(
  filePath: string,
  options: CsvReadOptions = {}
): Promise<AccountOpening[]> {
  const label = basename(filePath);
  const rows = await readCsvFile(filePath, ACCOUNT_HEADERS, label, options);

  const seen = new Set<string>();
  const openings: AccountOpening[] = [];
  for (const row of rows) {
    const parsed = AccountRowSchema.safeParse(row.values);
    if (!parsed.success) {
      throw new ValidationError(
        `${label} row ${row.rowNumber}: ${formatIssues(parsed.error)}`
      );
    }

    const { owner, opening_balance } = parsed.data;
    if (seen.has(owner)) {
      throw new ValidationError(`Duplicate owner in ${label}: ${owner}`);
    }
    seen.add(owner);
    openings.push({ owner, openingBalance: opening_balance });
  }
  return openings;
}

/**
 * Load transaction records (owner, event, amount, other) in file order.
 * Events are upper-cased; an empty amount is passed on as 0 so the ledger
 * rejects it as non-positive.
 */
export async function loadTransactions(
  filePath: string,
  options: CsvReadOptions = {}
): Promise<TransactionRecord[]> {
  const label = basename(filePath);
  const rows = await readCsvFile(filePath, TRANSACTION_HEADERS, label, options);

  return rows.map((row) => {
    const parsed = TransactionRowSchema.safeParse(row.values);
    if (!parsed.success) {
      throw new ValidationError(
        `${label} row ${row.rowNumber}: ${formatIssues(parsed.error)}`
      );
    }

    const { owner, event, amount, other } = parsed.data;
    const record: TransactionRecord = {
      owner,
      kind: event,
      amount: amount === '' ? 0 : amount,
    };
    if (other !== '') {
      record.other = other;
    }
    return record;
  });
}
