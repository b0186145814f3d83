/**
 * Dividend values are arbitrary-precision integers (rao). They travel as
 * bigint in the domain, decimal strings at rest, and JSON numbers on the
 * wire while they still fit in a safe integer.
 */

export type JsonAmount = number | string;

const DECIMAL_INT = /^-?\d+$/;

export function toJsonAmount(value: bigint): JsonAmount {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

export function parseBigIntAmount(raw: unknown): bigint {
  if (typeof raw === 'bigint') return raw;
  if (typeof raw === 'number' && Number.isInteger(raw)) return BigInt(raw);
  if (typeof raw === 'string' && DECIMAL_INT.test(raw)) return BigInt(raw);
  throw new TypeError(`Not an integer amount: ${String(raw)}`);
}

/** Token amounts are kept to 9 decimals (1 rao). */
export function roundTokenAmount(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}
