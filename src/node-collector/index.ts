export { createNodeCollector } from './collector.js'
export type { NodeCollector, NodeCollectorDeps, CollectorCheckpoints } from './collector.js'
export { createNodeMetrics } from './metrics.js'
export type { NodeMetrics } from './metrics.js'
export { createRewardsLedger } from './ledger.js'
export type { RewardsLedger, LedgerSnapshot } from './ledger.js'
export type { CycleOutcome, NodeMetricValues, TokenLabel } from './types.js'
