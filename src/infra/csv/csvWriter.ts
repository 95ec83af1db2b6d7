import { stringify } from 'csv-stringify/sync';
import { writeFile } from 'fs/promises';
import { Account } from '../../domain/ledger/account.js';
import { counterpartyOf } from '../../domain/ledger/events.js';
import { Money } from '../../domain/ledger/money.js';
import { LedgerEntry } from '../../application/ledger/applyBatch.js';

export interface LedgerCsvOptions {
  /**
   * Write OPEN rows too. Off by default; accounts.csv already carries them.
   * Rows are grouped by account, so the output is not a replayable transactions file.
   */
  includeOpen?: boolean;
}

export function formatBalancesCsv(balances: ReadonlyMap<string, Money>): string {
  const rows = [...balances].map(([owner, balance]) => ({
    owner,
    balance: balance.toFixed(),
  }));
  return stringify(rows, { header: true, columns: ['owner', 'balance'] });
}

export function formatLedgerCsv(
  ledger: readonly LedgerEntry[],
  options: LedgerCsvOptions = {}
): string {
  const rows = ledger
    .filter(({ event }) => options.includeOpen === true || event.kind !== 'OPEN')
    .map(({ owner, event }) => ({
      owner,
      event: event.kind,
      amount: Money.fromCents(event.amountCents).toFixed(),
      other: counterpartyOf(event) ?? '',
    }));
  return stringify(rows, {
    header: true,
    columns: ['owner', 'event', 'amount', 'other'],
  });
}

/**
 * Single-account ledger (event, amount, other); OPEN is covered by accounts.csv.
 */
export function formatAccountLedgerCsv(account: Account): string {
  const rows = account
    .statement()
    .filter((event) => event.kind !== 'OPEN')
    .map((event) => ({
      event: event.kind,
      amount: Money.fromCents(event.amountCents).toFixed(),
      other: counterpartyOf(event) ?? '',
    }));
  return stringify(rows, { header: true, columns: ['event', 'amount', 'other'] });
}

export async function writeBalances(
  filePath: string,
  balances: ReadonlyMap<string, Money>
): Promise<void> {
  await writeFile(filePath, formatBalancesCsv(balances), 'utf-8');
}

export async function writeLedger(
  filePath: string,
  ledger: readonly LedgerEntry[],
  options: LedgerCsvOptions = {}
): Promise<void> {
  await writeFile(filePath, formatLedgerCsv(ledger, options), 'utf-8');
}

export async function writeAccountLedger(
  filePath: string,
  account: Account
): Promise<void> {
  await writeFile(filePath, formatAccountLedgerCsv(account), 'utf-8');
}
