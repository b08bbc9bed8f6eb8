import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { Currency, CurrencyJson } from './currency.js';
import { HUNDRED, ZERO, parseDecimal, powerOfTen, toMoneyDecimal } from './decimal.js';
import {
  CurrencyMismatchError,
  DivisionByZeroError,
  InvalidAmountError,
  type InvalidTickSizeError,
  type PrecisionOverflowError,
} from './errors.js';
import { DEFAULT_ROUNDING_STRATEGY, RoundingStrategy, round, roundQuotient } from './rounding.js';
import { isMultipleOfTick, quantizeToTick } from './tick.js';

export type Ordering = -1 | 0 | 1;

export interface MoneyJson {
  amount: string;
  currency: CurrencyJson;
}

/**
 * Money value object: an exact decimal amount bound to a currency.
 *
 * Instances are immutable and every operation returns a new value. Operations
 * between two Money values check the currency codes first and return
 * `CurrencyMismatchError` instead of computing. Only division rounds, to the
 * currency's decimal places; everything else keeps full precision.
 *
 * Decimal arguments are expected to be finite.
 *
 * @example
 * ```typescript
 * const price = Money.of(dec('10.50'), Currency.USD);
 * const total = price.add(Money.of(dec('1.05'), Currency.USD)); // Ok(11.55 USD)
 * const snapped = Money.of(dec('10.567'), Currency.USD).toTickNearest(dec('0.25')); // Ok(10.50 USD)
 * ```
 */
export class Money {
  /**
   * Create Money without validation. Any finite Decimal is a valid amount.
   */
  static of(amount: Decimal, currency: Currency): Money {
    return new Money(amount, currency);
  }

  /**
   * Create Money from untrusted input
   * @param amount - Decimal string (e.g. '10.50'), number or Decimal
   */
  static parse(amount: string | number | Decimal, currency: Currency): Result<Money, InvalidAmountError> {
    return parseDecimal(amount).map((value) => new Money(value, currency));
  }

  static zero(currency: Currency): Money {
    return new Money(ZERO, currency);
  }

  /**
   * Create Money rounded to the currency's decimal places
   */
  static ofRounded(
    amount: Decimal,
    currency: Currency,
    strategy: RoundingStrategy = DEFAULT_ROUNDING_STRATEGY
  ): Money {
    return new Money(round(amount, currency.decimalPlaces, strategy), currency);
  }

  /**
   * Percentage change from `initial` to `current`, e.g. 100 -> 110 is 10.
   */
  static percentChange(
    initial: Money,
    current: Money
  ): Result<Decimal, CurrencyMismatchError | DivisionByZeroError> {
    return current.percentChangeFrom(initial);
  }

  /**
   * Percentage drop from `initial` to `current`, e.g. 100 -> 90 is 10.
   */
  static negativePercentChange(
    initial: Money,
    current: Money
  ): Result<Decimal, CurrencyMismatchError | DivisionByZeroError> {
    return current.negativePercentChangeFrom(initial);
  }

  private readonly _amount: Decimal;

  private constructor(
    amount: Decimal,
    private readonly _currency: Currency
  ) {
    const value = toMoneyDecimal(amount);
    // -0 would leak into toString() and toJSON()
    this._amount = value.isZero() ? ZERO : value;
    Object.freeze(this);
  }

  get amount(): Decimal {
    return this._amount;
  }

  get currency(): Currency {
    return this._currency;
  }

  get currencyCode(): string {
    return this._currency.code;
  }

  get decimalPlaces(): number {
    return this._currency.decimalPlaces;
  }

  // Arithmetic operations (return new instances)

  add(other: Money): Result<Money, CurrencyMismatchError> {
    return this.assertSameCurrency(other).map(() => this.withAmount(this._amount.plus(other._amount)));
  }

  subtract(other: Money): Result<Money, CurrencyMismatchError> {
    return this.assertSameCurrency(other).map(() => this.withAmount(this._amount.minus(other._amount)));
  }

  plusDecimal(value: Decimal): Money {
    return this.withAmount(this._amount.plus(value));
  }

  minusDecimal(value: Decimal): Money {
    return this.withAmount(this._amount.minus(value));
  }

  /**
   * Exact product of both amounts, kept in this currency
   */
  multiplyByMoney(other: Money): Result<Money, CurrencyMismatchError> {
    return this.assertSameCurrency(other).map(() => this.withAmount(this._amount.times(other._amount)));
  }

  /**
   * Exact product; never rounds
   */
  multiplyByDecimal(factor: Decimal): Money {
    return this.withAmount(this._amount.times(factor));
  }

  /**
   * Ratio of both amounts, rounded to the currency's decimal places and kept in
   * this currency.
   */
  divideByMoney(
    other: Money,
    strategy: RoundingStrategy = DEFAULT_ROUNDING_STRATEGY
  ): Result<Money, CurrencyMismatchError | DivisionByZeroError> {
    const validation = this.assertSameCurrency(other);
    if (validation.isErr()) {
      return err(validation.error);
    }
    return this.divideByDecimal(other._amount, strategy);
  }

  /**
   * Divide by a scalar and round the exact quotient to the currency's decimal
   * places.
   */
  divideByDecimal(
    divisor: Decimal,
    strategy: RoundingStrategy = DEFAULT_ROUNDING_STRATEGY
  ): Result<Money, DivisionByZeroError> {
    if (divisor.isZero()) {
      return err(new DivisionByZeroError());
    }

    const places = this._currency.decimalPlaces;
    const units = roundQuotient(this._amount.times(powerOfTen(places)), divisor, strategy);
    return ok(this.withAmount(units.times(powerOfTen(-places))));
  }

  // Comparison methods

  /**
   * @returns -1 if this < other, 0 if equal, 1 if this > other
   */
  compare(other: Money): Result<Ordering, CurrencyMismatchError> {
    return this.assertSameCurrency(other).map(() => {
      const result = this._amount.cmp(other._amount);
      const ordering: Ordering = result < 0 ? -1 : result > 0 ? 1 : 0;
      return ordering;
    });
  }

  isGreaterThan(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map((result) => result > 0);
  }

  isGreaterThanOrEqual(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map((result) => result >= 0);
  }

  isLessThan(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map((result) => result < 0);
  }

  isLessThanOrEqual(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compare(other).map((result) => result <= 0);
  }

  isGreaterThanDecimal(value: Decimal): boolean {
    return this._amount.gt(value);
  }

  isGreaterThanOrEqualDecimal(value: Decimal): boolean {
    return this._amount.gte(value);
  }

  isLessThanDecimal(value: Decimal): boolean {
    return this._amount.lt(value);
  }

  isLessThanOrEqualDecimal(value: Decimal): boolean {
    return this._amount.lte(value);
  }

  /**
   * Smaller of the two; `this` on a tie
   */
  min(other: Money): Result<Money, CurrencyMismatchError> {
    return this.compare(other).map((result) => (result <= 0 ? this : other));
  }

  /**
   * Larger of the two; `this` on a tie
   */
  max(other: Money): Result<Money, CurrencyMismatchError> {
    return this.compare(other).map((result) => (result >= 0 ? this : other));
  }

  /**
   * Same currency code and numerically equal amount (10.5 equals 10.50)
   */
  equals(other: Money): boolean {
    return this._currency.equals(other._currency) && this._amount.eq(other._amount);
  }

  isSameCurrency(other: Money): boolean {
    return this._currency.equals(other._currency);
  }

  // Percentage operations

  /**
   * Percentage change from `initial` to this value: (this - initial) * 100 / initial.
   * Not rounded.
   */
  percentChangeFrom(initial: Money): Result<Decimal, CurrencyMismatchError | DivisionByZeroError> {
    const validation = this.assertSameCurrency(initial);
    if (validation.isErr()) {
      return err(validation.error);
    }

    if (initial.isZero()) {
      return err(new DivisionByZeroError());
    }

    const change = this._amount.minus(initial._amount).times(HUNDRED).div(initial._amount);
    return ok(change.isZero() ? ZERO : change);
  }

  /**
   * Percentage drop from `initial` to this value: (initial - this) * 100 / initial.
   */
  negativePercentChangeFrom(initial: Money): Result<Decimal, CurrencyMismatchError | DivisionByZeroError> {
    return this.percentChangeFrom(initial).map((change) => (change.isZero() ? change : change.negated()));
  }

  // Properties and checks

  isZero(): boolean {
    return this._amount.isZero();
  }

  isPositive(): boolean {
    return this._amount.gt(0);
  }

  isNegative(): boolean {
    return this._amount.lt(0);
  }

  isPositiveOrZero(): boolean {
    return this._amount.gte(0);
  }

  isNegativeOrZero(): boolean {
    return this._amount.lte(0);
  }

  hasFraction(): boolean {
    return !this._amount.isInteger();
  }

  isInteger(): boolean {
    return this._amount.isInteger();
  }

  // Unary transforms

  abs(): Money {
    return this.withAmount(this._amount.abs());
  }

  negated(): Money {
    return this.withAmount(this._amount.negated());
  }

  /**
   * Round down to the currency's smallest unit (10.567 USD -> 10.56 USD)
   */
  floor(): Money {
    return this.rounded(RoundingStrategy.Floor);
  }

  /**
   * Round up to the currency's smallest unit (10.561 USD -> 10.57 USD)
   */
  ceil(): Money {
    return this.rounded(RoundingStrategy.Ceiling);
  }

  /**
   * Drop digits below the currency's smallest unit
   */
  trunc(): Money {
    return this.rounded(RoundingStrategy.ToZero);
  }

  /**
   * Round to the currency's decimal places
   */
  rounded(strategy: RoundingStrategy = DEFAULT_ROUNDING_STRATEGY): Money {
    return this.withAmount(round(this._amount, this._currency.decimalPlaces, strategy));
  }

  roundDp(decimalPlaces: number): Money {
    return this.roundDpWithStrategy(decimalPlaces, DEFAULT_ROUNDING_STRATEGY);
  }

  roundDpWithStrategy(decimalPlaces: number, strategy: RoundingStrategy): Money {
    return this.withAmount(round(this._amount, decimalPlaces, strategy));
  }

  /**
   * Round with banker's rounding and move to a currency carrying the new
   * number of decimal places.
   */
  rescale(decimalPlaces: number): Result<Money, PrecisionOverflowError> {
    return this._currency
      .withDecimalPlaces(decimalPlaces)
      .map((currency) => new Money(round(this._amount, decimalPlaces), currency));
  }

  sqrt(): Result<Money, InvalidAmountError> {
    if (this.isNegative()) {
      return err(new InvalidAmountError(this._amount.toFixed(), 'cannot take the square root of a negative amount'));
    }
    return ok(this.withAmount(this._amount.sqrt()));
  }

  // Tick operations

  /**
   * Snap to a multiple of `tick` with the given strategy.
   * Works for any positive tick: 0.001, 0.25, 9, 10, 101.
   */
  toTick(tick: Decimal, strategy: RoundingStrategy): Result<Money, InvalidTickSizeError> {
    return quantizeToTick(this._amount, tick, strategy).map((amount) => this.withAmount(amount));
  }

  /**
   * Nearest multiple of `tick`, ties to the even multiple
   */
  toTickNearest(tick: Decimal): Result<Money, InvalidTickSizeError> {
    return this.toTick(tick, RoundingStrategy.MidpointNearestEven);
  }

  /**
   * Largest multiple of `tick` not above the amount
   */
  toTickDown(tick: Decimal): Result<Money, InvalidTickSizeError> {
    return this.toTick(tick, RoundingStrategy.Floor);
  }

  /**
   * Smallest multiple of `tick` not below the amount
   */
  toTickUp(tick: Decimal): Result<Money, InvalidTickSizeError> {
    return this.toTick(tick, RoundingStrategy.Ceiling);
  }

  isMultipleOfTick(tick: Decimal): boolean {
    return isMultipleOfTick(this._amount, tick);
  }

  // Conversion

  /**
   * `"<amount> <code>"`, padded to the currency's decimal places. Digits beyond
   * them are shown, not rounded away.
   */
  toString(): string {
    const places = Math.max(this._currency.decimalPlaces, this._amount.decimalPlaces());
    return `${this._amount.toFixed(places)} ${this._currency.code}`;
  }

  /**
   * Amount as a plain decimal string, never a float
   */
  toJSON(): MoneyJson {
    return {
      amount: this._amount.toFixed(),
      currency: this._currency.toJSON(),
    };
  }

  // Private helper methods

  private withAmount(amount: Decimal): Money {
    return new Money(amount, this._currency);
  }

  private assertSameCurrency(other: Money): Result<void, CurrencyMismatchError> {
    if (!this._currency.equals(other._currency)) {
      return err(new CurrencyMismatchError(this._currency, other._currency));
    }
    return ok();
  }
}
