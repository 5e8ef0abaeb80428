import type { FoldedInterval } from './types.js'

export type LedgerSnapshot = {
  cumulativeRplRewards: bigint
  cumulativeClaimedEthRewards: bigint
  handledIntervals: bigint[]
  nextRewardsStartBlock: bigint | null
}

/**
 * Running totals of claimed rewards for one node. Totals only grow, and each
 * claimed interval is folded in at most once for the life of the ledger.
 */
export const createRewardsLedger = (nextRewardsStartBlock: bigint | null = null) => {
  const handledIntervals = new Set<bigint>()
  let cumulativeRplRewards = 0n
  let cumulativeClaimedEthRewards = 0n
  let nextStartBlock = nextRewardsStartBlock

  const isHandled = (interval: bigint): boolean => handledIntervals.has(interval)

  /**
   * Folds newly claimed intervals and advances the start block pointer past
   * the observed header. Marking and adding happen together; an interval that
   * is already handled is skipped. Returns the number of intervals folded.
   */
  const commit = (intervals: readonly FoldedInterval[], headerBlock: bigint): number => {
    const negative = intervals.find(({ rpl, eth }) => rpl < 0n || eth < 0n)
    if (negative) {
      throw new RangeError(`Interval ${negative.interval} carries a negative reward amount`)
    }

    let folded = 0
    for (const { interval, rpl, eth } of intervals) {
      if (handledIntervals.has(interval)) continue
      cumulativeRplRewards += rpl
      cumulativeClaimedEthRewards += eth
      handledIntervals.add(interval)
      folded++
    }
    nextStartBlock = headerBlock + 1n
    return folded
  }

  const snapshot = (): LedgerSnapshot => ({
    cumulativeRplRewards,
    cumulativeClaimedEthRewards,
    handledIntervals: [...handledIntervals].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)),
    nextRewardsStartBlock: nextStartBlock,
  })

  return { isHandled, commit, snapshot }
}

export type RewardsLedger = ReturnType<typeof createRewardsLedger>
