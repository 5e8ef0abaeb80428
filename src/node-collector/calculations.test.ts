import { describe, it, expect } from 'vitest'
import { parseEther } from 'viem'
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
import { minipool } from './test-fixtures.js'

const TWENTY_EIGHT_DAYS = 28 * 24 * 60 * 60

describe('rewards interval length', () => {
  it('converts seconds to days and hours', () => {
    expect(rewardsIntervalDays(TWENTY_EIGHT_DAYS)).toBe(28)
    expect(rewardsIntervalHours(TWENTY_EIGHT_DAYS)).toBe(672)
  })
})

describe('rplIssuanceAtCheckpoint', () => {
  it('compounds daily inflation over the interval', () => {
    const expected = (Math.pow(1.00015, 28) - 1) * 20_000_000
    expect(rplIssuanceAtCheckpoint(1.00015, 28, 20_000_000)).toBe(expected)
  })

  it('clamps to zero below an inflation rate of 1.0', () => {
    expect(rplIssuanceAtCheckpoint(0.9999, 28, 20_000_000)).toBe(0)
  })

  it('never goes negative for any rate and exponent', () => {
    for (const rate of [-2, -0.5, 0, 0.5, 0.99999999, 1, 1.0001]) {
      for (const days of [0, 0.5, 1, 28, 365]) {
        expect(rplIssuanceAtCheckpoint(rate, days, 1_000)).toBeGreaterThanOrEqual(0)
      }
    }
  })

  it('is zero for a non-finite power', () => {
    expect(rplIssuanceAtCheckpoint(-1.5, 0.5, 1_000)).toBe(0)
  })
})

describe('estimateNodeRewards', () => {
  it('is exactly zero when the total effective stake is zero', () => {
    expect(estimateNodeRewards(10, 0, 5_000, 0.7)).toBe(0)
  })

  it('takes the pro-rata node operator share', () => {
    expect(estimateNodeRewards(25, 100, 1_000, 0.5)).toBe(125)
  })
})

describe('estimateRplApr', () => {
  it('annualizes the reward per staked RPL', () => {
    // 1 RPL per 100 staked over 672 hours
    expect(estimateRplApr(1, 100, 672)).toBeCloseTo((1 / 100 / 672) * 8760 * 100, 12)
  })

  it('is zero instead of non-finite when nothing is staked', () => {
    expect(estimateRplApr(5, 0, 672)).toBe(0)
  })

  it('is zero for an empty interval', () => {
    expect(estimateRplApr(5, 10, 0)).toBe(0)
  })
})

describe('collateralRatio', () => {
  it('is exactly zero without active minipools', () => {
    expect(collateralRatio(0.01, 1_000, 0)).toBe(0)
  })

  it('measures RPL value against a 16 ETH bond per minipool', () => {
    expect(collateralRatio(0.5, 32, 1)).toBe(1)
    expect(collateralRatio(0.5, 32, 2)).toBe(0.5)
  })
})

describe('countActiveMinipools', () => {
  it('excludes finalised minipools', () => {
    const minipools = [minipool('a1'), minipool('a2', { finalised: true }), minipool('a3')]
    expect(countActiveMinipools(minipools)).toBe(2)
  })

  it('is zero for a node without minipools', () => {
    expect(countActiveMinipools([])).toBe(0)
  })
})

describe('sumSkimmedBalances', () => {
  it('sums node share, refunds and distributable balances', () => {
    const totals = sumSkimmedBalances([
      minipool('a1', { nodeShareOfBalance: parseEther('0.25'), nodeRefundBalance: parseEther('1'), distributableBalance: parseEther('0.5') }),
      minipool('a2', { nodeShareOfBalance: parseEther('0.5'), nodeRefundBalance: 0n, distributableBalance: parseEther('1.25') }),
    ])
    expect(totals).toEqual({ nodeShareOfBalance: 0.75, refundBalance: 1, distributableBalance: 1.75 })
  })
})

describe('sumBeaconBalances', () => {
  it('sums deposits, node shares and validator balances', () => {
    const totals = sumBeaconBalances([
      { minipoolAddress: '0xa1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1', nodeDeposit: parseEther('8'), nodeBalance: parseEther('8.5'), totalBalance: parseEther('32.5') },
      { minipoolAddress: '0xa2a2a2a2a2a2a2a2a2a2a2a2a2a2a2a2a2a2a2a2', nodeDeposit: parseEther('16'), nodeBalance: parseEther('16'), totalBalance: parseEther('32') },
    ])
    expect(totals).toEqual({ deposit: 24, nodeShare: 24.5, beaconBalance: 64.5 })
  })
})
