import type { Address } from 'viem'
import { logger } from '../shared/logger.js'
import { RewardsResolutionError } from '../shared/errors.js'
import { type Result, Ok, Err } from '../shared/result.js'
import type { ExecutionClient } from '../execution/client.js'
import type { RewardsResolver } from '../rewards/types.js'
import type { RewardsLedger } from './ledger.js'
import type { FoldedInterval, UnclaimedRewards } from './types.js'

export type ReconcileDeps = {
  rewards: RewardsResolver
  execution: ExecutionClient
  ledger: RewardsLedger
}

/**
 * Folds newly claimed intervals into the ledger and totals the node's
 * unclaimed rewards. Nothing reaches the ledger unless every interval
 * resolves and the latest header is known.
 */
export const reconcileRewards = async (
  deps: ReconcileDeps,
  node: Address
): Promise<Result<UnclaimedRewards, Error>> => {
  const status = await deps.rewards.getClaimStatus(node)
  if (!status.ok) return status

  const pending: FoldedInterval[] = []
  for (const interval of status.value.claimed) {
    if (deps.ledger.isHandled(interval)) continue

    const info = await deps.rewards.getIntervalInfo(node, interval)
    if (!info.ok) return info
    if (!info.value.treeFileExists) {
      return Err(new RewardsResolutionError(
        `Error calculating lifetime node rewards: rewards file ${info.value.treeFilePath} doesn't exist but interval ${interval} was claimed`,
        interval,
        info.value.treeFilePath
      ))
    }
    pending.push({
      interval,
      rpl: info.value.collateralRplAmount,
      eth: info.value.smoothingPoolEthAmount,
    })
  }

  const unclaimed: UnclaimedRewards = { rpl: 0n, eth: 0n }
  for (const interval of status.value.unclaimed) {
    const info = await deps.rewards.getIntervalInfo(node, interval)
    if (!info.ok) return info
    if (!info.value.treeFileExists) {
      return Err(new RewardsResolutionError(
        `Error calculating lifetime node rewards: rewards file ${info.value.treeFilePath} doesn't exist and interval ${interval} is unclaimed`,
        interval,
        info.value.treeFilePath
      ))
    }
    if (info.value.nodeExists) {
      unclaimed.rpl += info.value.collateralRplAmount
      unclaimed.eth += info.value.smoothingPoolEthAmount
    }
  }

  const header = await deps.execution.getLatestBlockNumber()
  if (!header.ok) return header

  const folded = deps.ledger.commit(pending, header.value)
  if (folded > 0) {
    logger.info(`[NodeCollector] Folded ${folded} newly claimed interval(s) for node ${node}`)
  }

  return Ok(unclaimed)
}
