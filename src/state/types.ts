import type { Address, Hex } from 'viem'

export type MinipoolStatus = 'initialized' | 'prelaunch' | 'staking' | 'withdrawable' | 'dissolved'

// All amounts are wei unless stated otherwise.
export type NodeDetails = {
  nodeAddress: Address
  rplStake: bigint
  effectiveRplStake: bigint
  balanceEth: bigint
  balanceRpl: bigint
  balanceOldRpl: bigint
  balanceReth: bigint
}

export type MinipoolDetails = {
  minipoolAddress: Address
  nodeAddress: Address
  pubkey: Hex
  status: MinipoolStatus
  finalised: boolean
  nodeFee: bigint // 1e18 = 100%
  nodeDepositBalance: bigint
  userDepositBalance: bigint
  userDepositAssigned: boolean
  nodeShareOfBalance: bigint
  nodeRefundBalance: bigint
  distributableBalance: bigint
}

export type NetworkDetails = {
  rplPrice: bigint
  rplInflationIntervalRate: bigint // per-day multiplier, 1e18 = 1.0
  rplTotalSupply: bigint
  intervalDurationSeconds: number
  nodeOperatorRewardsPercent: bigint // 1e18 = 100%
}

/**
 * Consistent view of node, minipool and network state at one execution block.
 * Immutable once published.
 */
export type StateSnapshot = {
  readonly elBlockNumber: bigint
  readonly networkDetails: NetworkDetails
  readonly nodeDetailsByAddress: ReadonlyMap<Address, NodeDetails>
  readonly minipoolDetailsByNode: ReadonlyMap<Address, readonly MinipoolDetails[]>
}

export type StateProvider = {
  getState: () => StateSnapshot | null
  getTotalEffectiveRplStake: () => bigint | null
}
