/**
 * Chain collaborator contract.
 *
 * The RPC wire protocol and wallet custody live behind this interface;
 * the service only sees decoded values and transaction hashes.
 */

export type StakeOperationType = 'stake' | 'unstake';

export interface SubmitStakeInput {
  netuid: number;
  hotkey: string;
  operation: StakeOperationType;
  amount: number;
}

export interface SubmitStakeResult {
  txHash: string;
  /** false when the chain only promises eventual inclusion */
  finalized: boolean;
}

export interface ChainClient {
  readonly name: string;
  getDividend(netuid: number, hotkey: string): Promise<bigint>;
  listHotkeys(netuid: number): Promise<string[]>;
  submit(input: SubmitStakeInput): Promise<SubmitStakeResult>;
}
