export {
  Currency,
  CURRENCY_CODE_CAPACITY,
  CURRENCY_NAME_CAPACITY,
  parseCurrencyCode,
  parseCurrencyName,
  type CurrencyCode,
  type CurrencyJson,
  type CurrencyName,
} from './currency.js';
export { MAX_DECIMAL_PLACES, MoneyDecimal, dec, parseDecimal, toMoneyDecimal } from './decimal.js';
export {
  CurrencyMismatchError,
  DivisionByZeroError,
  InvalidAmountError,
  InvalidCurrencyError,
  InvalidPayloadError,
  InvalidTickSizeError,
  MoneyError,
  PrecisionOverflowError,
  type MoneyErrorTypes,
} from './errors.js';
export { Money, type MoneyJson, type Ordering } from './money.js';
export {
  DEFAULT_ROUNDING_STRATEGY,
  RoundingStrategy,
  isRoundingStrategy,
  round,
  roundQuotient,
  toDecimalRounding,
} from './rounding.js';
export { CurrencyJsonSchema, MoneyJsonSchema, currencyFromJSON, moneyFromJSON } from './schemas/money.schema.js';
export { isMultipleOfTick, quantizeToTick, tickPowerOfTenPlaces, validateTick } from './tick.js';
export { Decimal } from 'decimal.js';
