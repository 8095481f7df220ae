import { ParseError } from '../errors/AppError.js';

export interface Money {
  /** Signed integer amount in minor units (pence, cents). */
  minor: number;
  /** Exact fixed-point rendering with two decimal places, e.g. "-1.50". */
  decimal: string;
  currency: string;
}

const MINOR_PER_MAJOR = 100;

export const minorToDecimal = (minor: number): string => {
  const sign = minor < 0 ? '-' : '';
  const absolute = Math.abs(minor);
  const major = Math.trunc(absolute / MINOR_PER_MAJOR);
  const cents = absolute % MINOR_PER_MAJOR;

  return `${sign}${major}.${String(cents).padStart(2, '0')}`;
};

export const toMoney = (minor: unknown, currency: string): Money => {
  if (typeof minor !== 'number' || !Number.isSafeInteger(minor)) {
    throw new ParseError(`Monetary value ${String(minor)} is not an integer amount of minor units`, {
      value: minor,
    });
  }

  // Avoid "-0.00" for negative zero.
  const normalized = minor === 0 ? 0 : minor;

  return {
    minor: normalized,
    decimal: minorToDecimal(normalized),
    currency: currency.toUpperCase(),
  };
};

export const zeroMoney = (currency: string): Money => toMoney(0, currency);

/**
 * Display formatting. With `decimal: false`, whole amounts drop their
 * fractional part ("12" rather than "12.00"); other amounts keep two places.
 */
export const formatCurrency = (minor: number, options: { decimal?: boolean } = {}): string => {
  const { decimal = true } = options;

  if (!decimal && minor % MINOR_PER_MAJOR === 0) {
    return String(minor / MINOR_PER_MAJOR);
  }

  return minorToDecimal(minor);
};
