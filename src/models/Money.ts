/**
 * Fixed-scale decimal used for every price, quantity and percentage
 */

import Decimal from 'decimal.js';

/** Number of fractional digits kept by every Money value (standard crypto precision). */
export const MONEY_SCALE = 8;

// Enough significant digits that quantizing to MONEY_SCALE is always exact
const MoneyDecimal = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15
});

export type MoneyInput = Money | Decimal | string | number;

export type RoundingDirection = 'down' | 'up' | 'half_up';

const ROUNDING_MODES: Record<RoundingDirection, Decimal.Rounding> = {
  down: Decimal.ROUND_DOWN,
  up: Decimal.ROUND_UP,
  half_up: Decimal.ROUND_HALF_UP
};

/**
 * Immutable decimal value with a fixed scale. Arithmetic returns new values.
 */
export class Money {
  private readonly value: Decimal;

  private constructor(value: Decimal) {
    this.value = value.toDecimalPlaces(MONEY_SCALE, Decimal.ROUND_HALF_UP);
  }

  static of(input: MoneyInput): Money {
    if (input instanceof Money) {
      return input;
    }
    if (typeof input === 'number' && !Number.isFinite(input)) {
      throw new Error(`Invalid money value: ${input}`);
    }
    let parsed: Decimal;
    try {
      parsed = new MoneyDecimal(input instanceof Decimal ? input.toString() : input);
    } catch {
      throw new Error(`Invalid money value: ${String(input)}`);
    }
    if (!parsed.isFinite()) {
      throw new Error(`Invalid money value: ${String(input)}`);
    }
    return new Money(parsed);
  }

  /**
   * Parses a decimal string, returning undefined instead of throwing.
   */
  static tryParse(input: string): Money | undefined {
    if (input.trim() === '') {
      return undefined;
    }
    try {
      return Money.of(input.trim());
    } catch {
      return undefined;
    }
  }

  static zero(): Money {
    return ZERO;
  }

  static max(first: Money, ...rest: Money[]): Money {
    return rest.reduce((best, candidate) => (candidate.gt(best) ? candidate : best), first);
  }

  plus(other: MoneyInput): Money {
    return new Money(this.value.plus(Money.of(other).value));
  }

  minus(other: MoneyInput): Money {
    return new Money(this.value.minus(Money.of(other).value));
  }

  times(other: MoneyInput): Money {
    return new Money(this.value.times(Money.of(other).value));
  }

  /**
   * Divides to MONEY_SCALE digits. Rounds down unless told otherwise, so a
   * computed order quantity never exceeds what the budget pays for.
   */
  dividedBy(divisor: MoneyInput, rounding: RoundingDirection = 'down'): Money {
    const other = Money.of(divisor);
    if (other.isZero()) {
      throw new Error('Division by zero');
    }
    const quotient = this.value.dividedBy(other.value);
    return new Money(quotient.toDecimalPlaces(MONEY_SCALE, ROUNDING_MODES[rounding]));
  }

  compareTo(other: MoneyInput): -1 | 0 | 1 {
    const result = this.value.comparedTo(Money.of(other).value);
    return result < 0 ? -1 : result > 0 ? 1 : 0;
  }

  eq(other: MoneyInput): boolean {
    return this.compareTo(other) === 0;
  }

  lt(other: MoneyInput): boolean {
    return this.compareTo(other) < 0;
  }

  lte(other: MoneyInput): boolean {
    return this.compareTo(other) <= 0;
  }

  gt(other: MoneyInput): boolean {
    return this.compareTo(other) > 0;
  }

  gte(other: MoneyInput): boolean {
    return this.compareTo(other) >= 0;
  }

  isZero(): boolean {
    return this.value.isZero();
  }

  isNegative(): boolean {
    return this.value.isNegative() && !this.value.isZero();
  }

  isPositive(): boolean {
    return this.value.isPositive() && !this.value.isZero();
  }

  /**
   * Canonical string without trailing zeros, e.g. "101.97".
   */
  toString(): string {
    return this.value.toFixed();
  }

  /**
   * Fixed-point string, padded to the given number of digits (defaults to MONEY_SCALE).
   */
  toFixed(decimalPlaces: number = MONEY_SCALE): string {
    return this.value.toFixed(decimalPlaces, Decimal.ROUND_HALF_UP);
  }

  toNumber(): number {
    return this.value.toNumber();
  }

  toJSON(): string {
    return this.toString();
  }
}

const ZERO = Money.of(0);
