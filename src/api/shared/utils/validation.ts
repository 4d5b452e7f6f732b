import { InvalidParameterError } from "../../core/errors/app-error";

const DECIMAL_DIGITS = /^[0-9]+$/;

export interface LimitBounds {
  defaultLimit: number;
  maxLimit: number;
}

/**
 * Resolves a result limit: undefined falls back to the default, values
 * above the maximum are clamped, anything that is not a positive integer
 * is rejected.
 */
export function resolveLimit(value: unknown, bounds: LimitBounds, fieldName: string = "limit"): number {
  if (value === undefined || value === null) {
    return bounds.defaultLimit;
  }

  // Decimal digits only: Number() would also take "0x10" or "1e1"
  const num = typeof value === "string" && DECIMAL_DIGITS.test(value) ? Number(value) : value;

  if (typeof num !== "number" || !Number.isInteger(num) || num <= 0) {
    throw new InvalidParameterError(`${fieldName} must be a positive integer`);
  }

  return Math.min(num, bounds.maxLimit);
}
