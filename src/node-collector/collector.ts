import PQueue from 'p-queue'
import type { Address } from 'viem'
import type { BalanceResolver } from '../beacon/balances.js'
import type { ExecutionClient } from '../execution/client.js'
import type { RewardsResolver } from '../rewards/types.js'
import type { StateProvider } from '../state/types.js'
import { logger } from '../shared/logger.js'
import { failureReason } from '../shared/errors.js'
import { toError } from '../shared/result.js'
import { weiToEth } from '../shared/units.js'
import {
  collateralRatio,
  countActiveMinipools,
  estimateNodeRewards,
  estimateRplApr,
  rewardsIntervalDays,
  rewardsIntervalHours,
  rplIssuanceAtCheckpoint,
  sumBeaconBalances,
  sumSkimmedBalances,
} from './calculations.js'
import { createRewardsLedger, type RewardsLedger } from './ledger.js'
import type { NodeMetrics } from './metrics.js'
import { reconcileRewards } from './reconcile.js'
import type { BeaconHeadSource, CycleOutcome, NodeMetricValues } from './types.js'

export type CollectorCheckpoints = {
  saveNextRewardsStartBlock: (node: Address, block: bigint) => Promise<void>
}

export type NodeCollectorDeps = {
  nodeAddress: Address
  state: StateProvider
  rewards: RewardsResolver
  execution: ExecutionClient
  beacon: BeaconHeadSource
  balances: BalanceResolver
  metrics: NodeMetrics
  ledger?: RewardsLedger
  // Share one queue between collectors that may see the same node address
  queue?: PQueue
  checkpoints?: CollectorCheckpoints
}

export const createNodeCollector = (deps: NodeCollectorDeps) => {
  const node = deps.nodeAddress
  const ledger = deps.ledger ?? createRewardsLedger()
  const queue = deps.queue ?? new PQueue({ concurrency: 1 })

  const fail = (error: Error): CycleOutcome => {
    deps.metrics.recordFailure(node, failureReason(error))
    logger.error(`[NodeCollector] ${error.message}`)
    return { status: 'failed', error }
  }

  const notReady = (reason: string): CycleOutcome => {
    logger.debug(`[NodeCollector] Skipping cycle for ${node}: ${reason}`)
    return { status: 'not-ready', reason }
  }

  const saveCheckpoint = async (previous: bigint | null) => {
    const next = ledger.snapshot().nextRewardsStartBlock
    if (!deps.checkpoints || next === null || next === previous) return
    try {
      await deps.checkpoints.saveNextRewardsStartBlock(node, next)
    } catch (error) {
      logger.warn(`[NodeCollector] Failed to persist next rewards start block ${next}: ${toError(error).message}`)
    }
  }

  const runCycle = async (): Promise<CycleOutcome> => {
    deps.metrics.clear(node)

    const state = deps.state.getState()
    if (!state) return notReady('no state snapshot published yet')

    const nd = state.nodeDetailsByAddress.get(node)
    if (!nd) return notReady('node is not part of the current snapshot')
    const minipools = state.minipoolDetailsByNode.get(node) ?? []

    const totalEffectiveStake = deps.state.getTotalEffectiveRplStake()
    if (totalEffectiveStake === null) return notReady('total effective RPL stake is not known yet')

    const previousStartBlock = ledger.snapshot().nextRewardsStartBlock

    // Reconciliation commits to the ledger on its own success, even when a
    // sibling unit fails and the cycle emits nothing.
    const [rewards, head, activeMinipoolCount] = await Promise.all([
      reconcileRewards({ rewards: deps.rewards, execution: deps.execution, ledger }, node),
      deps.beacon.getBeaconHead(),
      Promise.resolve().then(() => countActiveMinipools(minipools)),
    ])
    await saveCheckpoint(previousStartBlock)

    if (!rewards.ok) return fail(rewards.error)
    if (!head.ok) return fail(head.error)

    const network = state.networkDetails
    const stakedRpl = weiToEth(nd.rplStake)
    const effectiveStakedRpl = weiToEth(nd.effectiveRplStake)

    const issuance = rplIssuanceAtCheckpoint(
      weiToEth(network.rplInflationIntervalRate),
      rewardsIntervalDays(network.intervalDurationSeconds),
      weiToEth(network.rplTotalSupply)
    )
    const estimatedRewards = totalEffectiveStake > 0n
      ? estimateNodeRewards(
          effectiveStakedRpl,
          weiToEth(totalEffectiveStake),
          issuance,
          weiToEth(network.nodeOperatorRewardsPercent)
        )
      : 0

    const skimmed = sumSkimmedBalances(minipools)

    const balances = await deps.balances.getBalances(minipools, head.value)
    if (!balances.ok) return fail(balances.error)
    const beacon = sumBeaconBalances(balances.value)

    const totals = ledger.snapshot()
    const values: NodeMetricValues = {
      totalStakedRpl: stakedRpl,
      effectiveStakedRpl,
      rplCollateral: collateralRatio(weiToEth(network.rplPrice), stakedRpl, activeMinipoolCount),
      cumulativeRplRewards: weiToEth(totals.cumulativeRplRewards),
      expectedRplRewards: estimatedRewards,
      rplApr: estimateRplApr(estimatedRewards, stakedRpl, rewardsIntervalHours(network.intervalDurationSeconds)),
      balances: {
        'ETH': weiToEth(nd.balanceEth),
        'Legacy RPL': weiToEth(nd.balanceOldRpl),
        'New RPL': weiToEth(nd.balanceRpl),
        'rETH': weiToEth(nd.balanceReth),
      },
      activeMinipoolCount,
      depositedEth: beacon.deposit,
      beaconShare: beacon.nodeShare,
      beaconBalance: beacon.beaconBalance,
      unclaimedRewards: weiToEth(rewards.value.rpl),
      claimedEthRewards: weiToEth(totals.cumulativeClaimedEthRewards),
      unclaimedEthRewards: weiToEth(rewards.value.eth),
      totalEthRewardsSkimmed: skimmed.distributableBalance,
      totalEthRewardsShareSkimmed: skimmed.nodeShareOfBalance,
      totalRefundEthSkimmed: skimmed.refundBalance,
    }

    deps.metrics.apply(node, values)
    return { status: 'emitted', values }
  }

  /** Runs one collection cycle; cycles for the same node never overlap. */
  const collect = (): Promise<CycleOutcome> =>
    queue.add(async () => {
      try {
        return await runCycle()
      } catch (error) {
        return fail(toError(error))
      }
    }, { throwOnTimeout: true })

  return {
    collect,
    ledger,
  }
}

export type NodeCollector = ReturnType<typeof createNodeCollector>
