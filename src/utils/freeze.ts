import { Decimal } from 'decimal.js';

/**
 * Recursively freeze a parsed snapshot so callers sharing it cannot mutate it.
 * Date and Decimal instances are left as they are.
 */
export function deepFreeze(value: unknown): void {
  if (
    typeof value !== 'object' ||
    value === null ||
    value instanceof Date ||
    Decimal.isDecimal(value) ||
    Object.isFrozen(value)
  ) {
    return;
  }

  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}
