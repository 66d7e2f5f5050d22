/**
 * CyberSource Gateway - Money Formatting
 *
 * Amounts are integer minor units all the way to the wire; the decimal
 * point is inserted on the string, never by floating-point division.
 */

import { Money, MoneyInput } from '../../shared/types';
import { ValidationError } from '../../shared/errors';

export const DEFAULT_CURRENCY = 'USD';

const ZERO_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
  'BIF', 'CLP', 'DJF', 'GNF', 'ISK', 'JPY', 'KMF', 'KRW', 'PYG',
  'RWF', 'UGX', 'VND', 'VUV', 'XAF', 'XOF', 'XPF',
]);

const THREE_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
  'BHD', 'IQD', 'JOD', 'KWD', 'LYD', 'OMR', 'TND',
]);

export function minorUnitExponent(currency: string): number {
  const code = currency.toUpperCase();
  if (ZERO_DECIMAL_CURRENCIES.has(code)) return 0;
  if (THREE_DECIMAL_CURRENCIES.has(code)) return 3;
  return 2;
}

function toMinorUnits(amount: bigint | number, field: string): bigint {
  if (typeof amount === 'bigint') {
    if (amount < 0n) {
      throw new ValidationError([`${field} must not be negative`]);
    }
    return amount;
  }
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new ValidationError([`${field} must be a non-negative integer in minor units, got ${amount}`]);
  }
  return BigInt(amount);
}

/**
 * Normalise caller money. Currency priority: explicit override,
 * then the Money value's own currency, then USD.
 */
export function resolveMoney(input: MoneyInput, currencyOverride?: string): Money {
  if (typeof input === 'object') {
    return {
      amount: toMinorUnits(input.amount, 'amount'),
      currency: (currencyOverride ?? input.currency).toUpperCase(),
    };
  }
  return {
    amount: toMinorUnits(input, 'amount'),
    currency: (currencyOverride ?? DEFAULT_CURRENCY).toUpperCase(),
  };
}

/**
 * 1000 USD -> "10.00", 1000 JPY -> "1000", 1500 KWD -> "1.500"
 */
export function formatAmount(amount: bigint | number, currency: string, field = 'amount'): string {
  const minor = toMinorUnits(amount, field);
  const exponent = minorUnitExponent(currency);
  if (exponent === 0) {
    return minor.toString();
  }

  const digits = minor.toString().padStart(exponent + 1, '0');
  const whole = digits.slice(0, digits.length - exponent);
  const fraction = digits.slice(digits.length - exponent);
  return `${whole}.${fraction}`;
}
