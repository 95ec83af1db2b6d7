import { Money } from './money.js';
import {
  LedgerEvent,
  OpenEvent,
  DepositEvent,
  WithdrawEvent,
  TransferOutEvent,
  TransferInEvent,
} from './events.js';
import { ValidationError, InsufficientFundsError } from './errors.js';

/**
 * Account aggregate state (derived from its ledger).
 */
export interface AccountState {
  readonly owner: string;
  readonly balance: Money;
  readonly version: number;
}

function requireOwner(owner: string): string {
  if (typeof owner !== 'string' || owner.trim() === '') {
    throw new ValidationError('Owner must be a non-empty string');
  }
  return owner.trim();
}

/**
 * Account aggregate - one owner's balance and append-only ledger.
 * Every mutation goes through applyEvent, so the balance always equals the
 * signed sum of the ledger.
 */
export class Account {
  private readonly ledger: LedgerEvent[] = [];

  private constructor(private state: AccountState) {}

  /**
   * Open an account, recording the opening balance as its OPEN event.
   */
  static open(owner: string, openingBalance: number | string = 0): Account {
    const name = requireOwner(owner);
    const opening = Money.parse(openingBalance);
    if (opening.isNegative()) {
      throw new ValidationError(
        `Opening balance cannot be negative, got ${opening.toFixed()}`
      );
    }
    return Account.openWith(name, opening);
  }

  private static openWith(owner: string, opening: Money): Account {
    const account = new Account({ owner, balance: Money.zero(), version: 0 });
    const event: OpenEvent = { kind: 'OPEN', amountCents: opening.cents };
    account.applyEvent(event);
    return account;
  }

  /**
   * Rebuild an account by replaying a ledger produced by statement().
   */
  static fromEvents(owner: string, events: readonly LedgerEvent[]): Account {
    const [first, ...rest] = events;
    if (!first || first.kind !== 'OPEN') {
      throw new ValidationError('OPEN event must be first in the ledger');
    }

    const account = Account.openWith(requireOwner(owner), Money.fromCents(first.amountCents));
    for (const event of rest) {
      if (event.kind === 'OPEN') {
        throw new ValidationError('Ledger contains more than one OPEN event');
      }
      if (!Number.isSafeInteger(event.amountCents) || event.amountCents <= 0) {
        throw new ValidationError(
          `${event.kind} amount must be a positive number of cents, got ${event.amountCents}`
        );
      }
      account.applyEvent({ ...event });
      if (account.state.balance.isNegative()) {
        throw new ValidationError(
          `Ledger for ${account.owner} drives the balance below zero`
        );
      }
    }

    return account;
  }

  get owner(): string {
    return this.state.owner;
  }

  get balance(): Money {
    return this.state.balance;
  }

  /**
   * Get current state (immutable snapshot).
   */
  getState(): AccountState {
    return { ...this.state };
  }

  /**
   * Read-only copy of the ledger in the order events were appended.
   */
  statement(): readonly LedgerEvent[] {
    return Object.freeze([...this.ledger]);
  }

  deposit(amount: number | string): DepositEvent {
    const money = Money.parsePositive(amount, 'Deposit');

    const event: DepositEvent = { kind: 'DEPOSIT', amountCents: money.cents };
    this.applyEvent(event);
    return event;
  }

  withdraw(amount: number | string): WithdrawEvent {
    const money = Money.parsePositive(amount, 'Withdrawal');
    this.assertCovers(money, 'withdraw');

    const event: WithdrawEvent = { kind: 'WITHDRAW', amountCents: money.cents };
    this.applyEvent(event);
    return event;
  }

  /**
   * Move money to another account. Both legs are validated before either
   * ledger is touched.
   * Returns the TRANSFER_OUT event appended to this account.
   */
  transferTo(other: Account, amount: number | string): TransferOutEvent {
    const money = Money.parsePositive(amount, 'Transfer');
    if (other === this || other.owner === this.owner) {
      throw new ValidationError(`Cannot transfer from ${this.owner} to itself`);
    }
    this.assertCovers(money, 'transfer');

    const sent: TransferOutEvent = {
      kind: 'TRANSFER_OUT',
      amountCents: money.cents,
      counterparty: other.owner,
    };
    const received: TransferInEvent = {
      kind: 'TRANSFER_IN',
      amountCents: money.cents,
      counterparty: this.owner,
    };

    this.applyEvent(sent);
    other.applyEvent(received);
    return sent;
  }

  /**
   * Credit a transfer whose outgoing leg lives outside this batch.
   */
  receiveTransfer(from: string, amount: number | string): TransferInEvent {
    const money = Money.parsePositive(amount, 'Transfer');
    if (typeof from !== 'string' || from.trim() === '') {
      throw new ValidationError('Incoming transfer requires a counterparty');
    }
    if (from.trim() === this.owner) {
      throw new ValidationError(`Cannot transfer from ${this.owner} to itself`);
    }

    const event: TransferInEvent = {
      kind: 'TRANSFER_IN',
      amountCents: money.cents,
      counterparty: from.trim(),
    };
    this.applyEvent(event);
    return event;
  }

  private assertCovers(amount: Money, action: string): void {
    if (amount.isGreaterThan(this.state.balance)) {
      throw new InsufficientFundsError(
        `Cannot ${action} ${amount.toFixed()} from ${this.owner}: balance is ${this.state.balance.toFixed()}`
      );
    }
  }

  /**
   * Append an event and fold it into the balance.
   */
  private applyEvent(event: LedgerEvent): void {
    switch (event.kind) {
      case 'OPEN':
      case 'DEPOSIT':
      case 'TRANSFER_IN':
        this.applyCredit(event.amountCents);
        break;
      case 'WITHDRAW':
      case 'TRANSFER_OUT':
        this.applyDebit(event.amountCents);
        break;
    }

    this.ledger.push(Object.freeze(event));
    this.state = {
      ...this.state,
      version: this.state.version + 1,
    };
  }

  private applyCredit(amountCents: number): void {
    this.state = {
      ...this.state,
      balance: this.state.balance.add(Money.fromCents(amountCents)),
    };
  }

  private applyDebit(amountCents: number): void {
    this.state = {
      ...this.state,
      balance: this.state.balance.subtract(Money.fromCents(amountCents)),
    };
  }
}
