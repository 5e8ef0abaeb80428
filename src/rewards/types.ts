import type { Address } from 'viem'
import type { ChainClientError, RewardsResolutionError } from '../shared/errors.js'
import type { Result } from '../shared/result.js'

export type IntervalRewardInfo = {
  index: bigint
  treeFilePath: string
  treeFileExists: boolean
  nodeExists: boolean
  collateralRplAmount: bigint
  smoothingPoolEthAmount: bigint
}

export type ClaimStatus = {
  unclaimed: bigint[]
  claimed: bigint[]
}

export type RewardsResolver = {
  getClaimStatus: (node: Address) => Promise<Result<ClaimStatus, ChainClientError>>
  getIntervalInfo: (node: Address, interval: bigint) => Promise<Result<IntervalRewardInfo, RewardsResolutionError>>
}
