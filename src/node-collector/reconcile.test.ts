import { describe, it, expect, vi } from 'vitest'
import { parseEther } from 'viem'
import { ChainClientError, RewardsResolutionError } from '../shared/errors.js'
import { Ok, Err } from '../shared/result.js'
import type { ExecutionClient } from '../execution/client.js'
import type { IntervalRewardInfo, RewardsResolver } from '../rewards/types.js'
import { createRewardsLedger } from './ledger.js'
import { reconcileRewards } from './reconcile.js'
import { NODE, intervalInfo } from './test-fixtures.js'

const createResolver = (
  claimed: bigint[],
  unclaimed: bigint[],
  infos: IntervalRewardInfo[]
) => {
  const byIndex = new Map(infos.map((info): [bigint, IntervalRewardInfo] => [info.index, info]))
  const getIntervalInfo = vi.fn(async (_node: string, interval: bigint) => {
    const info = byIndex.get(interval)
    return info ? Ok(info) : Err(new RewardsResolutionError(`no interval ${interval}`, interval, 'unknown'))
  })
  const resolver: RewardsResolver = {
    getClaimStatus: vi.fn(async () => Ok({ claimed, unclaimed })),
    getIntervalInfo,
  }
  return { resolver, getIntervalInfo }
}

const executionAt = (block: bigint): ExecutionClient => ({
  getLatestBlockNumber: vi.fn(async () => Ok(block)),
})

describe('reconcileRewards', () => {
  it('folds claimed intervals and totals unclaimed ones the node took part in', async () => {
    const { resolver } = createResolver([0n, 1n], [2n, 3n], [
      intervalInfo(0n, { collateralRplAmount: parseEther('3'), smoothingPoolEthAmount: parseEther('0.1') }),
      intervalInfo(1n, { collateralRplAmount: parseEther('4'), smoothingPoolEthAmount: parseEther('0.2') }),
      intervalInfo(2n, { collateralRplAmount: parseEther('5'), smoothingPoolEthAmount: parseEther('0.3') }),
      intervalInfo(3n, { nodeExists: false, collateralRplAmount: parseEther('100'), smoothingPoolEthAmount: parseEther('9') }),
    ])
    const ledger = createRewardsLedger()

    const result = await reconcileRewards({ rewards: resolver, execution: executionAt(900n), ledger }, NODE)

    expect(result).toEqual(Ok({ rpl: parseEther('5'), eth: parseEther('0.3') }))
    expect(ledger.snapshot()).toEqual({
      cumulativeRplRewards: parseEther('7'),
      cumulativeClaimedEthRewards: parseEther('0.3'),
      handledIntervals: [0n, 1n],
      nextRewardsStartBlock: 901n,
    })
  })

  it('does not fetch or re-add intervals that are already handled', async () => {
    const { resolver, getIntervalInfo } = createResolver([0n], [], [
      intervalInfo(0n, { collateralRplAmount: parseEther('3') }),
    ])
    const ledger = createRewardsLedger()
    const deps = { rewards: resolver, execution: executionAt(10n), ledger }

    await reconcileRewards(deps, NODE)
    await reconcileRewards(deps, NODE)

    expect(getIntervalInfo).toHaveBeenCalledTimes(1)
    expect(ledger.snapshot().cumulativeRplRewards).toBe(parseEther('3'))
  })

  it('fails when a claimed interval has no rewards file and leaves the ledger untouched', async () => {
    const { resolver } = createResolver([0n, 1n], [], [
      intervalInfo(0n, { collateralRplAmount: parseEther('3') }),
      intervalInfo(1n, { treeFileExists: false, treeFilePath: '/trees/rp-rewards-mainnet-1.json' }),
    ])
    const ledger = createRewardsLedger()

    const result = await reconcileRewards({ rewards: resolver, execution: executionAt(10n), ledger }, NODE)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(RewardsResolutionError)
    expect(result.error.message).toBe(
      "Error calculating lifetime node rewards: rewards file /trees/rp-rewards-mainnet-1.json doesn't exist but interval 1 was claimed"
    )
    expect(ledger.snapshot().handledIntervals).toEqual([])
    expect(ledger.snapshot().cumulativeRplRewards).toBe(0n)
  })

  it('fails when an unclaimed interval has no rewards file', async () => {
    const { resolver } = createResolver([], [4n], [
      intervalInfo(4n, { treeFileExists: false, treeFilePath: '/trees/rp-rewards-mainnet-4.json' }),
    ])

    const result = await reconcileRewards({ rewards: resolver, execution: executionAt(10n), ledger: createRewardsLedger() }, NODE)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe(
      "Error calculating lifetime node rewards: rewards file /trees/rp-rewards-mainnet-4.json doesn't exist and interval 4 is unclaimed"
    )
  })

  it('commits nothing when the latest header cannot be fetched', async () => {
    const { resolver } = createResolver([0n], [], [intervalInfo(0n, { collateralRplAmount: parseEther('3') })])
    const ledger = createRewardsLedger()
    const execution: ExecutionClient = {
      getLatestBlockNumber: vi.fn(async () => Err(new ChainClientError('Error getting latest block header: timeout', 'execution'))),
    }

    const result = await reconcileRewards({ rewards: resolver, execution, ledger }, NODE)

    expect(result.ok).toBe(false)
    expect(ledger.isHandled(0n)).toBe(false)
    expect(ledger.snapshot().nextRewardsStartBlock).toBeNull()
  })

  it('passes through claim status failures', async () => {
    const error = new ChainClientError('Error getting claim status', 'execution')
    const resolver: RewardsResolver = {
      getClaimStatus: vi.fn(async () => Err(error)),
      getIntervalInfo: vi.fn(),
    }

    const result = await reconcileRewards({ rewards: resolver, execution: executionAt(1n), ledger: createRewardsLedger() }, NODE)

    expect(result).toEqual({ ok: false, error })
  })
})
