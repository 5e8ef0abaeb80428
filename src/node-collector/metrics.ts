import { Counter, Gauge, type Registry } from 'prom-client'
import type { FailureReason } from '../shared/errors.js'
import { TOKEN_LABELS, type NodeMetricValues } from './types.js'

type ScalarMetric = Exclude<keyof NodeMetricValues, 'balances'>

// Metric name suffix and help text for every unlabelled-by-token value
const SCALAR_METRICS: ReadonlyArray<[ScalarMetric, string, string]> = [
  ['totalStakedRpl', 'total_staked_rpl', 'The total amount of RPL staked on the node'],
  ['effectiveStakedRpl', 'effective_staked_rpl', 'The effective amount of RPL staked on the node (honoring the 150% collateral cap)'],
  ['rplCollateral', 'rpl_collateral', 'The RPL collateral level for the node'],
  ['cumulativeRplRewards', 'cumulative_rpl_rewards', 'The cumulative RPL rewards earned by the node'],
  ['expectedRplRewards', 'expected_rpl_rewards', 'The expected RPL rewards for the node at the next rewards checkpoint'],
  ['rplApr', 'rpl_apr', 'The estimated APR of RPL for the node from the next rewards checkpoint'],
  ['activeMinipoolCount', 'active_minipool_count', 'The number of active minipools owned by the node'],
  ['depositedEth', 'deposited_eth', 'The amount of ETH this node deposited into minipools'],
  ['beaconShare', 'beacon_share', "The node's total share of its minipool's beacon chain balances"],
  ['beaconBalance', 'beacon_balance', "The total balances of all this node's validators on the beacon chain"],
  ['unclaimedRewards', 'unclaimed_rewards', 'The RPL rewards from the last period that have not been claimed yet'],
  ['claimedEthRewards', 'claimed_eth_rewards', 'The claimed ETH rewards from the smoothing pool'],
  ['unclaimedEthRewards', 'unclaimed_eth_rewards', 'The unclaimed ETH rewards from the smoothing pool'],
  ['totalEthRewardsSkimmed', 'total_eth_rewards_skimmed', 'The total ETH rewards skimmed balance'],
  ['totalEthRewardsShareSkimmed', 'total_eth_rewards_share_skimmed', 'The total ETH rewards share of the skimmed balance'],
  ['totalRefundEthSkimmed', 'total_refund_eth_skimmed', 'The total refund ETH skimmed balance'],
]

/**
 * Gauges for the node collector, registered once per registry. Every sample
 * carries the node address, so clearing one node leaves the others intact.
 */
export const createNodeMetrics = (registry: Registry, namespace: string) => {
  const prefix = `${namespace}_node`

  const scalars = new Map<ScalarMetric, Gauge<'node'>>(
    SCALAR_METRICS.map(([key, suffix, help]): [ScalarMetric, Gauge<'node'>] => [
      key,
      new Gauge({ name: `${prefix}_${suffix}`, help, labelNames: ['node'] as const, registers: [registry] }),
    ])
  )

  const balances = new Gauge({
    name: `${prefix}_balance`,
    help: 'How much ETH is in this node wallet',
    labelNames: ['node', 'token'] as const,
    registers: [registry],
  })

  const failures = new Counter({
    name: `${prefix}_collector_failures_total`,
    help: 'Collection cycles aborted before emission, by originating failure',
    labelNames: ['node', 'reason'] as const,
    registers: [registry],
  })

  const apply = (node: string, values: NodeMetricValues) => {
    for (const [key, gauge] of scalars) {
      gauge.set({ node }, values[key])
    }
    for (const token of TOKEN_LABELS) {
      balances.set({ node, token }, values.balances[token])
    }
  }

  const clear = (node: string) => {
    for (const gauge of scalars.values()) {
      gauge.remove({ node })
    }
    for (const token of TOKEN_LABELS) {
      balances.remove({ node, token })
    }
  }

  const recordFailure = (node: string, reason: FailureReason) => {
    failures.inc({ node, reason })
  }

  return { apply, clear, recordFailure }
}

export type NodeMetrics = ReturnType<typeof createNodeMetrics>
