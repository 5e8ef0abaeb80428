import type { Address, Hex } from 'viem';

export const SLOTS_PER_EPOCH = 32n;

// Beacon head reference used to pin one consistent balance lookup per cycle.
export type BeaconHead = {
  slot: bigint;
  epoch: bigint;
};

export type ValidatorStatus = {
  pubkey: Hex;
  index: bigint;
  balance: bigint; // gwei
  activationEpoch: bigint;
  status: string;
};

export type BeaconClientConfig = {
  beaconApiUrl: string;
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
};

// Per-minipool balances in wei
export type MinipoolBalanceDetails = {
  minipoolAddress: Address;
  nodeDeposit: bigint;
  nodeBalance: bigint;
  totalBalance: bigint;
};
