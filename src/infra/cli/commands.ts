import { mkdir } from 'fs/promises';
import { join } from 'path';
import {
  applyBatch,
  BatchResult,
  ErrorPolicy,
} from '../../application/ledger/applyBatch.js';
import { Account } from '../../domain/ledger/account.js';
import { ValidationError } from '../../domain/ledger/errors.js';
import { loadAccounts, loadTransactions } from '../csv/csvReader.js';
import { writeAccountLedger, writeBalances, writeLedger } from '../csv/csvWriter.js';

export interface BatchInputOptions {
  accounts: string;
  transactions: string;
  onError: ErrorPolicy;
  delimiter?: string;
  quiet: boolean;
}

export interface ApplyCommandOptions extends BatchInputOptions {
  outBalances: string;
}

export interface DumpLedgersCommandOptions extends BatchInputOptions {
  outLedgers: string;
  /** Also write one event,amount,other file per account into this directory. */
  outDir?: string;
  includeOpen: boolean;
}

/**
 * Apply transactions and write final balances (owner,balance).
 */
export async function runApply(options: ApplyCommandOptions): Promise<BatchResult> {
  const result = await loadAndApply(options);

  await writeBalances(options.outBalances, result.balances);
  log(options, `✓ Wrote ${result.balances.size} balances to ${options.outBalances}`);
  for (const [owner, balance] of result.balances) {
    log(options, `  ${owner}: ${balance.format()}`);
  }

  return result;
}

/**
 * Apply transactions and write the merged ledger (owner,event,amount,other).
 */
export async function runDumpLedgers(
  options: DumpLedgersCommandOptions
): Promise<BatchResult> {
  const result = await loadAndApply(options);
  const accountFiles = options.outDir ? accountFileNames(result.accounts) : [];

  await writeLedger(options.outLedgers, result.ledger, {
    includeOpen: options.includeOpen,
  });
  log(options, `✓ Wrote ${result.ledger.length} ledger events to ${options.outLedgers}`);

  if (options.outDir) {
    await mkdir(options.outDir, { recursive: true });
    for (const [account, fileName] of accountFiles) {
      await writeAccountLedger(join(options.outDir, fileName), account);
    }
    log(options, `✓ Wrote ${result.accounts.length} account ledgers to ${options.outDir}`);
  }

  return result;
}

async function loadAndApply(options: BatchInputOptions): Promise<BatchResult> {
  const csvOptions = { delimiter: options.delimiter };
  const openings = await loadAccounts(options.accounts, csvOptions);
  const records = await loadTransactions(options.transactions, csvOptions);
  log(options, `Loaded ${openings.length} accounts and ${records.length} transactions`);

  const result = applyBatch(openings, records, { onError: options.onError });

  for (const { index, record, error } of result.rejected) {
    console.warn(
      `Skipped transaction ${index + 1} (${record.owner} ${record.kind}): ${error.message}`
    );
  }
  if (result.pendingTransfers.length > 0) {
    log(
      options,
      `${result.pendingTransfers.length} transfer(s) have no TRANSFER_IN record in this batch`
    );
  }

  return result;
}

function log(options: Pick<BatchInputOptions, 'quiet'>, message: string): void {
  if (!options.quiet) {
    console.log(message);
  }
}

function safeFileName(owner: string): string {
  return owner.replace(/[^A-Za-z0-9._-]/g, '_');
}

/**
 * Pair each account with its per-account file name.
 * Names are compared case-insensitively since some file systems fold case.
 */
function accountFileNames(accounts: readonly Account[]): Array<[Account, string]> {
  const claimed = new Map<string, string>();
  return accounts.map((account) => {
    const fileName = `${safeFileName(account.owner)}.csv`;
    const previous = claimed.get(fileName.toLowerCase());
    if (previous !== undefined) {
      throw new ValidationError(
        `Accounts ${JSON.stringify(previous)} and ${JSON.stringify(account.owner)} would both be written to ${fileName}`
      );
    }
    claimed.set(fileName.toLowerCase(), account.owner);
    return [account, fileName];
  });
}
