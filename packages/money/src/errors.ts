// Money error types for neverthrow Result handling

import type { Currency } from './currency.js';

export abstract class MoneyError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class CurrencyMismatchError extends MoneyError {
  readonly code = 'CURRENCY_MISMATCH';

  constructor(
    readonly expected: Currency,
    readonly actual: Currency
  ) {
    super(`Currency mismatch: expected ${expected.code}, got ${actual.code}`);
  }
}

export class DivisionByZeroError extends MoneyError {
  readonly code = 'DIVISION_BY_ZERO';

  constructor() {
    super('Cannot divide by zero');
  }
}

export class InvalidCurrencyError extends MoneyError {
  readonly code = 'INVALID_CURRENCY';

  constructor(readonly reason: string) {
    super(`Invalid currency: ${reason}`);
  }
}

export class InvalidTickSizeError extends MoneyError {
  readonly code = 'INVALID_TICK_SIZE';

  constructor(readonly reason: string) {
    super(`Invalid tick size: ${reason}`);
  }
}

export class PrecisionOverflowError extends MoneyError {
  readonly code = 'PRECISION_OVERFLOW';

  constructor(
    readonly decimalPlaces: number,
    readonly maxDecimalPlaces: number
  ) {
    super(`Precision ${decimalPlaces} is outside the supported range 0-${maxDecimalPlaces}`);
  }
}

export class InvalidAmountError extends MoneyError {
  readonly code = 'INVALID_AMOUNT';

  constructor(
    readonly value: string,
    readonly reason: string
  ) {
    super(`Invalid amount "${value}": ${reason}`);
  }
}

export class InvalidPayloadError extends MoneyError {
  readonly code = 'INVALID_PAYLOAD';

  constructor(readonly issues: string[]) {
    super(`Invalid money payload: ${issues.join('; ')}`);
  }
}

export type MoneyErrorTypes =
  | CurrencyMismatchError
  | DivisionByZeroError
  | InvalidCurrencyError
  | InvalidTickSizeError
  | PrecisionOverflowError
  | InvalidAmountError
  | InvalidPayloadError;
