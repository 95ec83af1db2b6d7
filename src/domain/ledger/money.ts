import { ValidationError } from './errors.js';

const displayFormat = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
});

/** Plain decimal notation, optionally with an exponent. Rejects `0x`, `0b` and `0o` forms. */
export const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function quote(input: number | string): string {
  return typeof input === 'string' ? JSON.stringify(input) : String(input);
}

/**
 * Money value object representing an amount in cents.
 * Amounts are stored as integer cents to avoid floating-point precision issues.
 * Note: Money can represent negative values (for balance arithmetic), but
 * fromCents and parsePositive validate input.
 */
export class Money {
  private constructor(public readonly cents: number) {}

  static fromCents(cents: number): Money {
    if (!Number.isSafeInteger(cents)) {
      throw new ValidationError(`Amount must be a whole number of cents, got ${cents}`);
    }
    if (cents < 0) {
      throw new ValidationError('Amount cannot be negative');
    }
    return new Money(cents);
  }

  /**
   * Create Money from balance calculation (allows negative values).
   * Use this for balance calculations, not for input validation.
   */
  static fromBalanceCents(cents: number): Money {
    return new Money(cents);
  }

  static zero(): Money {
    return new Money(0);
  }

  /**
   * Parse a decimal amount such as `20`, `"12.5"` or `"-3.10"`.
   * At most two fractional digits are accepted; the sign is left to the caller.
   */
  static parse(input: number | string): Money {
    let value: number;
    if (typeof input === 'number') {
      value = input;
    } else if (typeof input === 'string' && DECIMAL_PATTERN.test(input.trim())) {
      value = Number(input.trim());
    } else {
      throw new ValidationError(`Amount must be a number, got ${quote(input)}`);
    }

    if (!Number.isFinite(value)) {
      throw new ValidationError(`Amount must be a number, got ${quote(input)}`);
    }

    const scaled = value * 100;
    const cents = Math.round(scaled) || 0; // folds -0 into 0
    if (Math.abs(scaled - cents) > 1e-6) {
      throw new ValidationError(
        `Amount must have at most two decimal places, got ${quote(input)}`
      );
    }
    if (!Number.isSafeInteger(cents)) {
      throw new ValidationError(`Amount is out of range: ${quote(input)}`);
    }

    return new Money(cents);
  }

  /**
   * Parse an amount that must be strictly positive.
   * `label` names the operation in the error message.
   */
  static parsePositive(input: number | string, label: string): Money {
    const amount = Money.parse(input);
    if (amount.cents <= 0) {
      throw new ValidationError(`${label} amount must be greater than zero`);
    }
    return amount;
  }

  add(other: Money): Money {
    return new Money(this.cents + other.cents);
  }

  subtract(other: Money): Money {
    // Allow negative results (for balance calculations)
    return Money.fromBalanceCents(this.cents - other.cents);
  }

  isGreaterThan(other: Money): boolean {
    return this.cents > other.cents;
  }

  equals(other: Money): boolean {
    return this.cents === other.cents;
  }

  isZero(): boolean {
    return this.cents === 0;
  }

  isNegative(): boolean {
    return this.cents < 0;
  }

  /** Plain two-decimal form used in CSV files, e.g. `1234.50`. */
  toFixed(): string {
    const sign = this.cents < 0 ? '-' : '';
    const abs = Math.abs(this.cents);
    const units = Math.floor(abs / 100);
    const fraction = String(abs % 100).padStart(2, '0');
    return `${sign}${units}.${fraction}`;
  }

  /** Display form, e.g. `$1,234.50`. */
  format(): string {
    return displayFormat.format(this.cents / 100);
  }
}
