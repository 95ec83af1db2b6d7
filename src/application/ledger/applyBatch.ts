import { Account } from '../../domain/ledger/account.js';
import { LedgerEvent, TransactionKind } from '../../domain/ledger/events.js';
import { Money } from '../../domain/ledger/money.js';
import {
  DomainError,
  UnknownAccountError,
  ValidationError,
} from '../../domain/ledger/errors.js';
import { PendingTransfer, TransferPairRegistry } from './transferPairs.js';

export type ErrorPolicy = 'abort' | 'skip';

export interface AccountOpening {
  owner: string;
  openingBalance: number | string;
}

export interface TransactionRecord {
  owner: string;
  kind: TransactionKind;
  amount: number | string;
  other?: string;
}

export interface ApplyBatchCommand {
  accounts: readonly AccountOpening[];
  transactions: readonly TransactionRecord[];
}

export interface ApplyBatchOptions {
  /** 'abort' rethrows the first failing record; 'skip' records it and moves on. */
  onError?: ErrorPolicy;
}

export interface LedgerEntry {
  readonly owner: string;
  readonly event: LedgerEvent;
}

export interface RejectedRecord {
  /** Zero-based position of the record in the input sequence. */
  readonly index: number;
  readonly record: TransactionRecord;
  readonly error: DomainError;
}

export interface BatchResult {
  balances: ReadonlyMap<string, Money>;
  ledger: readonly LedgerEntry[];
  accounts: readonly Account[];
  rejected: readonly RejectedRecord[];
  pendingTransfers: readonly PendingTransfer[];
}

export class ApplyBatchUseCase {
  private readonly onError: ErrorPolicy;

  constructor(options: ApplyBatchOptions = {}) {
    this.onError = options.onError ?? 'abort';
  }

  execute(command: ApplyBatchCommand): BatchResult {
    const accounts = openAccounts(command.accounts);
    const pairs = new TransferPairRegistry();
    const rejected: RejectedRecord[] = [];

    command.transactions.forEach((record, index) => {
      try {
        applyRecord(record, accounts, pairs);
      } catch (error) {
        if (this.onError === 'skip' && error instanceof DomainError) {
          rejected.push({ index, record, error });
          return;
        }
        throw error;
      }
    });

    const balances = new Map<string, Money>();
    const ledger: LedgerEntry[] = [];
    for (const account of accounts.values()) {
      balances.set(account.owner, account.balance);
      for (const event of account.statement()) {
        ledger.push({ owner: account.owner, event });
      }
    }

    return {
      balances,
      ledger,
      accounts: [...accounts.values()],
      rejected,
      pendingTransfers: pairs.pending(),
    };
  }
}

/**
 * Apply an ordered batch of transaction records to freshly opened accounts.
 */
export function applyBatch(
  accounts: readonly AccountOpening[],
  transactions: readonly TransactionRecord[],
  options: ApplyBatchOptions = {}
): BatchResult {
  return new ApplyBatchUseCase(options).execute({ accounts, transactions });
}

function openAccounts(openings: readonly AccountOpening[]): Map<string, Account> {
  const accounts = new Map<string, Account>();
  for (const opening of openings) {
    const account = Account.open(opening.owner, opening.openingBalance);
    if (accounts.has(account.owner)) {
      throw new ValidationError(`Duplicate account owner: ${account.owner}`);
    }
    accounts.set(account.owner, account);
  }
  return accounts;
}

function applyRecord(
  record: TransactionRecord,
  accounts: ReadonlyMap<string, Account>,
  pairs: TransferPairRegistry
): void {
  const owner = typeof record.owner === 'string' ? record.owner.trim() : '';
  if (owner === '') {
    throw new ValidationError('Transaction owner must be a non-empty string');
  }
  const account = accounts.get(owner);
  if (!account) {
    throw new UnknownAccountError(owner);
  }
  const other = record.other?.trim() ?? '';

  switch (record.kind) {
    case 'DEPOSIT':
      account.deposit(record.amount);
      return;
    case 'WITHDRAW':
      account.withdraw(record.amount);
      return;
    case 'TRANSFER_OUT': {
      const target = other === '' ? undefined : accounts.get(other);
      if (!target) {
        throw new UnknownAccountError(other);
      }
      const sent = account.transferTo(target, record.amount);
      pairs.recordOut(account.owner, target.owner, sent.amountCents);
      return;
    }
    case 'TRANSFER_IN': {
      const amount = Money.parsePositive(record.amount, 'Transfer');
      if (other !== '' && pairs.claimIn(account.owner, other, amount.cents)) {
        // Already credited when the OUT leg was applied.
        return;
      }
      account.receiveTransfer(other, record.amount);
      return;
    }
    default: {
      const kind: never = record.kind;
      throw new ValidationError(`Unknown event kind: ${String(kind)}`);
    }
  }
}
