import { z, ZodError } from 'zod';
import { TRANSACTION_KINDS } from '../../domain/ledger/events.js';
import { DECIMAL_PATTERN } from '../../domain/ledger/money.js';

const numeric = (field: string) =>
  z
    .string()
    .refine((value) => value === '' || DECIMAL_PATTERN.test(value), {
      message: `${field} must be a number`,
    });

export const AccountRowSchema = z.object({
  owner: z.string().min(1, 'owner is required'),
  opening_balance: numeric('opening_balance').refine((value) => value !== '', {
    message: 'opening_balance is required',
  }),
});

export const TransactionRowSchema = z.object({
  owner: z.string().min(1, 'owner is required'),
  event: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(TRANSACTION_KINDS)),
  amount: numeric('amount'),
  other: z.string().default(''),
});

export type AccountRow = z.infer<typeof AccountRowSchema>;
export type TransactionRow = z.infer<typeof TransactionRowSchema>;

export function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}
