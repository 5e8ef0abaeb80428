import type { MinipoolBalanceDetails } from '../beacon/types.js'
import type { MinipoolDetails } from '../state/types.js'
import { weiToEth } from '../shared/units.js'

const SECONDS_PER_DAY = 60 * 60 * 24
const SECONDS_PER_HOUR = 60 * 60
const HOURS_PER_YEAR = 24 * 365

// ETH bond per minipool that RPL collateral is measured against
export const MINIPOOL_BOND_ETH = 16.0

export const rewardsIntervalDays = (intervalSeconds: number): number => intervalSeconds / SECONDS_PER_DAY

export const rewardsIntervalHours = (intervalSeconds: number): number => intervalSeconds / SECONDS_PER_HOUR

/**
 * RPL minted over one rewards interval. Clamped at zero, which also covers
 * rounding just below an inflation rate of 1.0 and inputs that make the power
 * undefined.
 */
export const rplIssuanceAtCheckpoint = (
  inflationPerDay: number,
  intervalDays: number,
  totalRplSupply: number
): number => {
  const issuance = (Math.pow(inflationPerDay, intervalDays) - 1) * totalRplSupply
  if (!Number.isFinite(issuance) || issuance < 0) {
    return 0
  }
  return issuance
}

export const estimateNodeRewards = (
  effectiveStakedRpl: number,
  totalEffectiveStake: number,
  issuance: number,
  nodeOperatorRewardsPercent: number
): number => {
  if (!(totalEffectiveStake > 0)) {
    return 0
  }
  return (effectiveStakedRpl / totalEffectiveStake) * issuance * nodeOperatorRewardsPercent
}

/** Annualized percentage; 0 when nothing is staked or the interval is empty. */
export const estimateRplApr = (estimatedRewards: number, stakedRpl: number, intervalHours: number): number => {
  if (!(stakedRpl > 0) || !(intervalHours > 0)) {
    return 0
  }
  return (estimatedRewards / stakedRpl / intervalHours) * HOURS_PER_YEAR * 100
}

export const collateralRatio = (rplPrice: number, stakedRpl: number, activeMinipoolCount: number): number => {
  if (activeMinipoolCount <= 0) {
    return 0
  }
  return (rplPrice * stakedRpl) / (activeMinipoolCount * MINIPOOL_BOND_ETH)
}

// Finalised minipools have fully exited
export const countActiveMinipools = (minipools: readonly MinipoolDetails[]): number =>
  minipools.filter((mpd) => !mpd.finalised).length

export type SkimmedTotals = {
  nodeShareOfBalance: number
  refundBalance: number
  distributableBalance: number
}

export const sumSkimmedBalances = (minipools: readonly MinipoolDetails[]): SkimmedTotals => {
  let nodeShareOfBalance = 0n
  let refundBalance = 0n
  let distributableBalance = 0n
  for (const mpd of minipools) {
    nodeShareOfBalance += mpd.nodeShareOfBalance
    refundBalance += mpd.nodeRefundBalance
    distributableBalance += mpd.distributableBalance
  }
  return {
    nodeShareOfBalance: weiToEth(nodeShareOfBalance),
    refundBalance: weiToEth(refundBalance),
    distributableBalance: weiToEth(distributableBalance),
  }
}

export type BeaconTotals = {
  deposit: number
  nodeShare: number
  beaconBalance: number
}

export const sumBeaconBalances = (balances: readonly MinipoolBalanceDetails[]): BeaconTotals => {
  let deposit = 0n
  let nodeShare = 0n
  let beaconBalance = 0n
  for (const balance of balances) {
    deposit += balance.nodeDeposit
    nodeShare += balance.nodeBalance
    beaconBalance += balance.totalBalance
  }
  return {
    deposit: weiToEth(deposit),
    nodeShare: weiToEth(nodeShare),
    beaconBalance: weiToEth(beaconBalance),
  }
}
