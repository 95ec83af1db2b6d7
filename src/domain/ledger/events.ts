/**
 * Ledger events for the Account aggregate.
 * Events are frozen when appended to a ledger.
 */

export type LedgerEvent =
  | OpenEvent
  | DepositEvent
  | WithdrawEvent
  | TransferOutEvent
  | TransferInEvent;

export type LedgerEventKind = LedgerEvent['kind'];

/** Kinds a transaction record may carry; OPEN is only produced by Account.open. */
export const TRANSACTION_KINDS = [
  'DEPOSIT',
  'WITHDRAW',
  'TRANSFER_OUT',
  'TRANSFER_IN',
] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export interface OpenEvent {
  readonly kind: 'OPEN';
  readonly amountCents: number;
}

export interface DepositEvent {
  readonly kind: 'DEPOSIT';
  readonly amountCents: number;
}

export interface WithdrawEvent {
  readonly kind: 'WITHDRAW';
  readonly amountCents: number;
}

export interface TransferOutEvent {
  readonly kind: 'TRANSFER_OUT';
  readonly amountCents: number;
  readonly counterparty: string;
}

export interface TransferInEvent {
  readonly kind: 'TRANSFER_IN';
  readonly amountCents: number;
  readonly counterparty: string;
}

/**
 * Amount of the event as it affects the balance: credits positive, debits negative.
 */
export function signedCents(event: LedgerEvent): number {
  switch (event.kind) {
    case 'OPEN':
    case 'DEPOSIT':
    case 'TRANSFER_IN':
      return event.amountCents;
    case 'WITHDRAW':
    case 'TRANSFER_OUT':
      return -event.amountCents;
  }
}

export function counterpartyOf(event: LedgerEvent): string | undefined {
  return event.kind === 'TRANSFER_OUT' || event.kind === 'TRANSFER_IN'
    ? event.counterparty
    : undefined;
}
