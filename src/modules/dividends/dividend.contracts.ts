/**
 * Dividend Contracts
 * ==================
 *
 * Query shape, fingerprinting and the response payloads of the dividend
 * endpoint. Response fields keep the snake_case names of the public API.
 */

import { z } from 'zod';
import type { JsonAmount } from '../../common/amounts.js';
import { ValidationError } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// QUERY
// ═══════════════════════════════════════════════════════════════

export interface DividendQuery {
  readonly netuid: number;
  readonly hotkey: string;
}

// base58 alphabet (no 0, O, I, l)
export const HOTKEY_PATTERN = /^[1-9A-HJ-NP-Za-km-z]{1,64}$/;

export const NetuidSchema = z.coerce.number().int().min(0).max(65535);
export const HotkeySchema = z.string().regex(HOTKEY_PATTERN, 'hotkey must be a base58 account key');

export const DividendQuerySchema = z.object({
  netuid: NetuidSchema,
  hotkey: HotkeySchema,
});

/** @throws ValidationError naming every offending field */
export function parseDividendQuery(query: DividendQuery): DividendQuery {
  const parsed = DividendQuerySchema.safeParse(query);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(detail);
  }
  return parsed.data;
}

export function fingerprint(query: DividendQuery): string {
  return `tao_dividends:${query.netuid}:${query.hotkey}`;
}

/** Guard key shared by every trade against the same account. */
export function tradeKey(query: DividendQuery): string {
  return `${query.netuid}:${query.hotkey}`;
}

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export interface CachedValue {
  value: bigint;
  wasCached: boolean;
}

export interface DividendResult {
  netuid: number;
  hotkey: string;
  dividend: bigint;
  cached: boolean;
  stake_tx_triggered: boolean;
  tx_hash: null;
}

export interface DividendBatchResult {
  dividends: DividendResult[];
  cached: boolean;
  stake_tx_triggered: boolean;
}

export interface DividendResultJson extends Omit<DividendResult, 'dividend'> {
  dividend: JsonAmount;
}

export interface DividendBatchResultJson {
  dividends: DividendResultJson[];
  cached: boolean;
  stake_tx_triggered: boolean;
}
