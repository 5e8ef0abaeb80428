import { parseEther, type Address, type Hex } from 'viem'
import type { BeaconHead } from '../beacon/types.js'
import type { NetworkDetails, MinipoolDetails, NodeDetails, StateSnapshot } from '../state/types.js'
import type { IntervalRewardInfo } from '../rewards/types.js'

export const NODE: Address = '0x1111111111111111111111111111111111111111'

export const pubkeyOf = (byte: string): Hex => `0x${byte.repeat(48)}`

export const nodeDetails = (overrides: Partial<NodeDetails> = {}): NodeDetails => ({
  nodeAddress: NODE,
  rplStake: parseEther('10'),
  effectiveRplStake: parseEther('10'),
  balanceEth: parseEther('1.5'),
  balanceRpl: parseEther('20'),
  balanceOldRpl: 0n,
  balanceReth: parseEther('2'),
  ...overrides,
})

export const minipool = (byte: string, overrides: Partial<MinipoolDetails> = {}): MinipoolDetails => ({
  minipoolAddress: `0x${byte.repeat(20)}`,
  nodeAddress: NODE,
  pubkey: pubkeyOf(byte),
  status: 'staking',
  finalised: false,
  nodeFee: parseEther('0.14'),
  nodeDepositBalance: parseEther('8'),
  userDepositBalance: parseEther('24'),
  userDepositAssigned: true,
  nodeShareOfBalance: 0n,
  nodeRefundBalance: 0n,
  distributableBalance: 0n,
  ...overrides,
})

export const networkDetails = (overrides: Partial<NetworkDetails> = {}): NetworkDetails => ({
  rplPrice: parseEther('0.01'),
  rplInflationIntervalRate: parseEther('1.00015'),
  rplTotalSupply: parseEther('20000000'),
  intervalDurationSeconds: 28 * 24 * 60 * 60,
  nodeOperatorRewardsPercent: parseEther('0.7071'),
  ...overrides,
})

export const snapshotOf = (
  node: NodeDetails | null,
  minipools: MinipoolDetails[] = [],
  network: NetworkDetails = networkDetails(),
  elBlockNumber = 1000n
): StateSnapshot => ({
  elBlockNumber,
  networkDetails: network,
  nodeDetailsByAddress: new Map<Address, NodeDetails>(node ? [[node.nodeAddress, node]] : []),
  minipoolDetailsByNode: new Map<Address, MinipoolDetails[]>(minipools.length > 0 ? [[NODE, minipools]] : []),
})

export const beaconHead = (slot = 3200n): BeaconHead => ({
  slot,
  epoch: slot / 32n,
})

export const intervalInfo = (index: bigint, overrides: Partial<IntervalRewardInfo> = {}): IntervalRewardInfo => ({
  index,
  treeFilePath: `/trees/rp-rewards-mainnet-${index}.json`,
  treeFileExists: true,
  nodeExists: true,
  collateralRplAmount: 0n,
  smoothingPoolEthAmount: 0n,
  ...overrides,
})
