/**
 * Trade decision policy: sentiment score → direction and amount.
 */

import { roundTokenAmount } from '../../common/amounts.js';
import type { TradeDirection } from './trade.contracts.js';

export interface TradePolicy {
  /** Amount traded at |score| = 1. */
  unitAmount: number;
  maxAmount: number;
}

export interface TradeDecision {
  direction: TradeDirection;
  amount: number;
}

export function directionFor(score: number): TradeDirection {
  if (score > 0) return 'stake';
  if (score < 0) return 'unstake';
  return 'none';
}

export function decideTrade(score: number, policy: TradePolicy): TradeDecision {
  const direction = directionFor(score);
  if (direction === 'none') {
    return { direction, amount: 0 };
  }
  const amount = Math.min(policy.maxAmount, policy.unitAmount * Math.abs(score));
  return { direction, amount: roundTokenAmount(amount) };
}
