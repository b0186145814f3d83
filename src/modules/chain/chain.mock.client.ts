/**
 * Mock Chain Client
 * =================
 *
 * Deterministic stand-in for the chain gateway (CHAIN_PROVIDER=mock).
 * Same (netuid, hotkey) → same dividend; submissions return a hash derived
 * from the request and a running nonce.
 */

import type { ChainClient, SubmitStakeInput, SubmitStakeResult } from './chain.contracts.js';

const MOCK_HOTKEYS_PER_SUBNET = 4;

/**
 * Generate deterministic hash from string
 */
function hashSeed(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash;
  }
  return Math.abs(hash);
}

export class MockChainClient implements ChainClient {
  readonly name = 'mock';
  private nonce = 0;

  async getDividend(netuid: number, hotkey: string): Promise<bigint> {
    return BigInt(hashSeed(`${netuid}:${hotkey}`) % 1_000_000_000);
  }

  async listHotkeys(netuid: number): Promise<string[]> {
    const keys: string[] = [];
    for (let i = 1; i <= MOCK_HOTKEYS_PER_SUBNET; i++) {
      keys.push(`5Mock${netuid}Hotkey${i}`);
    }
    return keys;
  }

  async submit(input: SubmitStakeInput): Promise<SubmitStakeResult> {
    this.nonce++;
    const seed = hashSeed(`${input.operation}:${input.netuid}:${input.hotkey}:${input.amount}:${this.nonce}`);
    return {
      txHash: `0x${seed.toString(16).padStart(8, '0')}${this.nonce.toString(16).padStart(8, '0')}`,
      finalized: true,
    };
  }
}
