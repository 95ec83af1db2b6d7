/**
 * Property-based tests for the Account aggregate.
 *
 * For any sequence of operations, valid or not:
 * 1. balance equals the signed sum of the ledger
 * 2. balance never drops below zero
 * 3. a rejected operation leaves both accounts untouched
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Account } from '../account.js';
import { signedCents } from '../events.js';
import { DomainError } from '../errors.js';

const OPERATIONS = ['deposit', 'withdraw', 'transfer'] as const;

/** Amounts in cents, including zero and negatives that must be rejected. */
const arbOperation = fc.record({
  type: fc.constantFrom(...OPERATIONS),
  target: fc.constantFrom(0, 1),
  cents: fc.integer({ min: -500, max: 20000 }),
});

const arbOpening = fc.integer({ min: 0, max: 50000 });

function ledgerSum(account: Account): number {
  return account.statement().reduce((sum, event) => sum + signedCents(event), 0);
}

function snapshot(account: Account): { cents: number; events: number } {
  return { cents: account.balance.cents, events: account.statement().length };
}

describe('Account properties', () => {
  it('should keep balance equal to the ledger sum and never negative', () => {
    fc.assert(
      fc.property(
        arbOpening,
        arbOpening,
        fc.array(arbOperation, { maxLength: 60 }),
        (openA, openB, operations) => {
          const accounts = [
            Account.open('A', openA / 100),
            Account.open('B', openB / 100),
          ] as const;

          for (const op of operations) {
            const self = accounts[op.target];
            const other = accounts[op.target === 0 ? 1 : 0];
            const before = [snapshot(accounts[0]), snapshot(accounts[1])];

            try {
              if (op.type === 'deposit') {
                self.deposit(op.cents / 100);
              } else if (op.type === 'withdraw') {
                self.withdraw(op.cents / 100);
              } else {
                self.transferTo(other, op.cents / 100);
              }
            } catch (error) {
              expect(error).toBeInstanceOf(DomainError);
              expect([snapshot(accounts[0]), snapshot(accounts[1])]).toEqual(before);
            }

            for (const account of accounts) {
              expect(account.balance.cents).toBe(ledgerSum(account));
              expect(account.balance.cents).toBeGreaterThanOrEqual(0);
            }
          }
        }
      )
    );
  });

  it('should conserve money across transfers', () => {
    fc.assert(
      fc.property(
        arbOpening,
        arbOpening,
        fc.array(fc.integer({ min: 1, max: 20000 }), { maxLength: 30 }),
        (openA, openB, amounts) => {
          const a = Account.open('A', openA / 100);
          const b = Account.open('B', openB / 100);

          amounts.forEach((cents, i) => {
            const [from, to] = i % 2 === 0 ? [a, b] : [b, a];
            if (cents <= from.balance.cents) {
              from.transferTo(to, cents / 100);
            }
          });

          expect(a.balance.cents + b.balance.cents).toBe(openA + openB);
        }
      )
    );
  });
});
