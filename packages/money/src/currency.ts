import { getLogger } from '@fintick/logger';
import { err, ok, type Result } from 'neverthrow';

import { MAX_DECIMAL_PLACES } from './decimal.js';
import { InvalidCurrencyError, PrecisionOverflowError } from './errors.js';

const logger = getLogger('currency');

/**
 * Branded string for currency codes (e.g. 'USD', 'BTC').
 * Upper-case printable ASCII, 1-16 characters; created via parseCurrencyCode().
 */
export type CurrencyCode = string & { readonly _brand: 'CurrencyCode' };

/**
 * Branded string for display names (e.g. 'US Dollar').
 * Printable ASCII, 1-52 characters; created via parseCurrencyName().
 */
export type CurrencyName = string & { readonly _brand: 'CurrencyName' };

export const CURRENCY_CODE_CAPACITY = 16;
export const CURRENCY_NAME_CAPACITY = 52;

const INVALID_CODE = 'INVALID' as CurrencyCode;

// Codes exclude the space, names allow it
const CODE_CHAR = /[\x21-\x7E]/;
const NAME_CHAR = /[\x20-\x7E]/;

export interface CurrencyJson {
  id: number;
  code: string;
  name?: string | undefined;
  decimalPlaces: number;
}

function isPrintable(value: string, charPattern: RegExp): boolean {
  for (const ch of value) {
    if (!charPattern.test(ch)) return false;
  }
  return true;
}

function sanitizeAscii(value: string, capacity: number, charPattern: RegExp): string {
  let out = '';
  for (const ch of value) {
    if (out.length === capacity) break;
    out += charPattern.test(ch) ? ch : '_';
  }
  return out;
}

/**
 * Parse a raw string into a CurrencyCode: trimmed, upper-cased, 1-16 printable
 * ASCII characters without spaces.
 */
export function parseCurrencyCode(raw: string): Result<CurrencyCode, InvalidCurrencyError> {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return err(new InvalidCurrencyError('code must not be empty'));
  }
  if (!isPrintable(trimmed, CODE_CHAR)) {
    return err(new InvalidCurrencyError(`code "${raw}" must be printable ASCII without spaces`));
  }
  if (trimmed.length > CURRENCY_CODE_CAPACITY) {
    return err(new InvalidCurrencyError(`code "${trimmed}" exceeds ${CURRENCY_CODE_CAPACITY} characters`));
  }
  return ok(trimmed.toUpperCase() as CurrencyCode);
}

/**
 * Parse a raw string into a CurrencyName: trimmed, 1-52 printable ASCII characters.
 */
export function parseCurrencyName(raw: string): Result<CurrencyName, InvalidCurrencyError> {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return err(new InvalidCurrencyError('name must not be empty'));
  }
  if (!isPrintable(trimmed, NAME_CHAR)) {
    return err(new InvalidCurrencyError(`name "${raw}" must be printable ASCII`));
  }
  if (trimmed.length > CURRENCY_NAME_CAPACITY) {
    return err(new InvalidCurrencyError(`name "${trimmed}" exceeds ${CURRENCY_NAME_CAPACITY} characters`));
  }
  return ok(trimmed as CurrencyName);
}

function isValidDecimalPlaces(decimalPlaces: number): boolean {
  return Number.isInteger(decimalPlaces) && decimalPlaces >= 0 && decimalPlaces <= MAX_DECIMAL_PLACES;
}

function validateMetadata(id: number, decimalPlaces: number): Result<void, InvalidCurrencyError> {
  if (!Number.isSafeInteger(id)) {
    return err(new InvalidCurrencyError(`id must be an integer, received: ${id}`));
  }
  if (!isValidDecimalPlaces(decimalPlaces)) {
    return err(
      new InvalidCurrencyError(
        `decimal places must be an integer between 0 and ${MAX_DECIMAL_PLACES}, received: ${decimalPlaces}`
      )
    );
  }
  return ok();
}

/**
 * Currency value object.
 *
 * Identity is the code alone: `id` and `name` are descriptive metadata, so two
 * currencies built from the same code with different names are equal and hash
 * to the same key. `decimalPlaces` is the size of the currency's smallest unit
 * (2 for USD, 8 for BTC) and drives division and floor/ceil precision.
 */
export class Currency {
  static readonly USD = new Currency(1, 'USD' as CurrencyCode, 'US Dollar' as CurrencyName, 2);
  static readonly EUR = new Currency(2, 'EUR' as CurrencyCode, 'Euro' as CurrencyName, 2);
  static readonly BTC = new Currency(3, 'BTC' as CurrencyCode, 'Bitcoin' as CurrencyName, 8);
  static readonly ETH = new Currency(4, 'ETH' as CurrencyCode, 'Ether' as CurrencyName, 18);
  static readonly GBP = new Currency(5, 'GBP' as CurrencyCode, 'Pound Sterling' as CurrencyName, 2);
  static readonly JPY = new Currency(6, 'JPY' as CurrencyCode, 'Japanese Yen' as CurrencyName, 0);
  static readonly USDT = new Currency(7, 'USDT' as CurrencyCode, 'Tether USD' as CurrencyName, 6);
  static readonly USDC = new Currency(8, 'USDC' as CurrencyCode, 'USD Coin' as CurrencyName, 6);

  /**
   * Create a currency from raw strings, validating every field.
   *
   * @param name - Optional display name, at most 52 characters
   * @param decimalPlaces - Integer between 0 and 28
   */
  static create(
    id: number,
    code: string,
    name: string | undefined,
    decimalPlaces: number
  ): Result<Currency, InvalidCurrencyError> {
    return validateMetadata(id, decimalPlaces).andThen(() =>
      parseCurrencyCode(code).andThen((parsedCode) => {
        if (name === undefined) {
          return ok(new Currency(id, parsedCode, undefined, decimalPlaces));
        }
        return parseCurrencyName(name).map((parsedName) => new Currency(id, parsedCode, parsedName, decimalPlaces));
      })
    );
  }

  /**
   * Create a currency from keys that were already parsed, skipping string
   * validation. Same result as {@link Currency.create} for the same input.
   */
  static fromPrecomputed(
    id: number,
    code: CurrencyCode,
    name: CurrencyName | undefined,
    decimalPlaces: number
  ): Result<Currency, InvalidCurrencyError> {
    return validateMetadata(id, decimalPlaces).map(() => new Currency(id, code, name, decimalPlaces));
  }

  /**
   * Lenient constructor that never fails: non-printable characters become '_',
   * strings are cut to capacity, decimal places are clamped to 0-28, an unusable
   * code becomes 'INVALID' and an unusable name is dropped.
   */
  static sanitized(id: number, code: string, name: string | undefined, decimalPlaces: number): Currency {
    const sanitizedCode = sanitizeAscii(code.trim(), CURRENCY_CODE_CAPACITY, CODE_CHAR).toUpperCase();
    const parsedCode = parseCurrencyCode(sanitizedCode).unwrapOr(INVALID_CODE);

    const parsedName =
      name === undefined
        ? undefined
        : parseCurrencyName(sanitizeAscii(name.trim(), CURRENCY_NAME_CAPACITY, NAME_CHAR)).unwrapOr(undefined);

    const clampedPlaces = Number.isNaN(decimalPlaces)
      ? 0
      : Math.min(Math.max(Math.trunc(decimalPlaces), 0), MAX_DECIMAL_PLACES);
    const safeId = Number.isSafeInteger(id) ? id : 0;

    const currency = new Currency(safeId, parsedCode, parsedName, clampedPlaces);

    const codeChanged = parsedCode !== code.trim().toUpperCase();
    const nameChanged = name !== undefined && parsedName !== name.trim();
    if (codeChanged || nameChanged || clampedPlaces !== decimalPlaces || safeId !== id) {
      logger.warn(
        { code, decimalPlaces, id, name, sanitized: currency.toJSON() },
        'Currency input did not validate and was sanitized'
      );
    }

    return currency;
  }

  private constructor(
    readonly id: number,
    readonly code: CurrencyCode,
    readonly name: CurrencyName | undefined,
    readonly decimalPlaces: number
  ) {
    Object.freeze(this);
  }

  /**
   * Same currency with a different number of decimal places.
   */
  withDecimalPlaces(decimalPlaces: number): Result<Currency, PrecisionOverflowError> {
    if (!isValidDecimalPlaces(decimalPlaces)) {
      return err(new PrecisionOverflowError(decimalPlaces, MAX_DECIMAL_PLACES));
    }
    return ok(new Currency(this.id, this.code, this.name, decimalPlaces));
  }

  /**
   * Equality on the code only
   */
  equals(other: Currency): boolean {
    return this.code === other.code;
  }

  /**
   * Key for maps and sets; consistent with equals()
   */
  hashKey(): string {
    return this.code;
  }

  toString(): string {
    return this.code;
  }

  toJSON(): CurrencyJson {
    return {
      id: this.id,
      code: this.code,
      ...(this.name !== undefined ? { name: this.name } : {}),
      decimalPlaces: this.decimalPlaces,
    };
  }
}
