import type { BeaconHead } from '../beacon/types.js'
import type { ChainClientError } from '../shared/errors.js'
import type { Result } from '../shared/result.js'

export const TOKEN_LABELS = ['ETH', 'Legacy RPL', 'New RPL', 'rETH'] as const

export type TokenLabel = (typeof TOKEN_LABELS)[number]

export type BeaconHeadSource = {
  getBeaconHead: () => Promise<Result<BeaconHead, ChainClientError>>
}

// An interval whose amounts are about to be folded into the ledger
export type FoldedInterval = {
  interval: bigint
  rpl: bigint
  eth: bigint
}

// Unclaimed totals are recomputed every cycle and never enter the ledger
export type UnclaimedRewards = {
  rpl: bigint
  eth: bigint
}

// One cycle's samples, in ETH/RPL units
export type NodeMetricValues = {
  totalStakedRpl: number
  effectiveStakedRpl: number
  rplCollateral: number
  cumulativeRplRewards: number
  expectedRplRewards: number
  rplApr: number
  balances: Record<TokenLabel, number>
  activeMinipoolCount: number
  depositedEth: number
  beaconShare: number
  beaconBalance: number
  unclaimedRewards: number
  claimedEthRewards: number
  unclaimedEthRewards: number
  totalEthRewardsSkimmed: number
  totalEthRewardsShareSkimmed: number
  totalRefundEthSkimmed: number
}

export type CycleOutcome =
  | { status: 'not-ready'; reason: string }
  | { status: 'failed'; error: Error }
  | { status: 'emitted'; values: NodeMetricValues }
