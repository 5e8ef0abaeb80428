import PQueue from 'p-queue'
import type { Address } from 'viem'
import { logger } from '../shared/logger.js'
import { ChainClientError } from '../shared/errors.js'
import { Ok, Err, toError } from '../shared/result.js'
import type { RewardsContracts } from './contracts.js'
import type { IntervalInfoLoader } from './interval-info.js'
import type { RewardsResolver } from './types.js'

// Upper bound on isClaimed reads in flight; the interval count only grows.
const CLAIM_CHECK_CONCURRENCY = 8

export const createRewardsResolver = (
  contracts: RewardsContracts,
  intervalInfo: IntervalInfoLoader,
  claimCheckConcurrency = CLAIM_CHECK_CONCURRENCY
): RewardsResolver => {
  const claimChecks = new PQueue({ concurrency: claimCheckConcurrency })

  const getClaimStatus = async (node: Address) => {
    try {
      const rewardIndex = await contracts.getRewardIndex()
      const intervals: bigint[] = []
      for (let i = 0n; i < rewardIndex; i++) {
        intervals.push(i)
      }

      const claimedFlags = await Promise.all(intervals.map((interval) =>
        claimChecks.add(() => contracts.isClaimed(interval, node), { throwOnTimeout: true })
      ))
      const claimed = intervals.filter((_, i) => claimedFlags[i])
      const unclaimed = intervals.filter((_, i) => !claimedFlags[i])

      logger.debug(`[RewardsResolver] Node ${node}: ${claimed.length} claimed, ${unclaimed.length} unclaimed of ${rewardIndex} intervals`)
      return Ok({ unclaimed, claimed })
    } catch (error) {
      return Err(new ChainClientError(
        `Error getting claim status for node ${node}: ${toError(error).message}`,
        'execution',
        { cause: error }
      ))
    }
  }

  return {
    getClaimStatus,
    getIntervalInfo: (node: Address, interval: bigint) => intervalInfo.load(node, interval),
  }
}
