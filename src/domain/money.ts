import { Decimal } from "decimal.js";

const DECIMAL_STRING_PATTERN = /^-?\d+(\.\d+)?$/;

export function isDecimalString(value: string): boolean {
  return DECIMAL_STRING_PATTERN.test(value);
}

/**
 * Parses a plain decimal string ("45.00", "-3", "0.1") without going through a
 * binary float. Returns null for anything else, including exponent notation.
 * "-0.00" parses as zero.
 */
export function parseDecimal(value: string): Decimal | null {
  const trimmed = value.trim();
  if (!isDecimalString(trimmed)) {
    return null;
  }
  const parsed = new Decimal(trimmed);
  return parsed.isZero() ? parsed.abs() : parsed;
}

/** decimal.js reports -0 as negative; zero is never negative here. */
export function isNegativeAmount(value: Decimal): boolean {
  return value.isNegative() && !value.isZero();
}

/**
 * Converts an in-memory amount to the string form stores accept. Numbers are
 * routed through their shortest string form first, so 0.1 becomes "0.1".
 */
export function toDecimalString(value: Decimal | number): string | null {
  const decimal = typeof value === "number" ? (Number.isFinite(value) ? new Decimal(String(value)) : null) : value;
  if (!decimal || !decimal.isFinite()) {
    return null;
  }
  return decimal.isZero() ? "0" : decimal.toFixed();
}

/** Renders an amount with at least two fractional digits, keeping any extra precision. */
export function formatAmount(value: Decimal): string {
  return value.decimalPlaces() < 2 ? value.toFixed(2) : value.toFixed();
}
