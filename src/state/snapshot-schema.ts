import { z } from 'zod'
import { getAddress, isAddress, isHex } from 'viem'
import type { MinipoolDetails, NodeDetails, StateSnapshot } from './types.js'

const wei = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative decimal integer string')
  .transform((value) => BigInt(value))

const address = z
  .string()
  .refine((value) => isAddress(value), { message: 'Invalid Ethereum address' })
  .transform((value) => getAddress(value))

const pubkey = z
  .string()
  .refine((value): value is `0x${string}` => isHex(value) && value.length === 98, {
    message: 'Expected a 48-byte hex validator pubkey',
  })

const nodeSchema = z.object({
  nodeAddress: address,
  rplStake: wei,
  effectiveRplStake: wei,
  balanceEth: wei,
  balanceRpl: wei,
  balanceOldRpl: wei,
  balanceReth: wei,
})

const minipoolSchema = z.object({
  minipoolAddress: address,
  nodeAddress: address,
  pubkey,
  status: z.enum(['initialized', 'prelaunch', 'staking', 'withdrawable', 'dissolved']),
  finalised: z.boolean(),
  nodeFee: wei,
  nodeDepositBalance: wei,
  userDepositBalance: wei,
  userDepositAssigned: z.boolean(),
  nodeShareOfBalance: wei,
  nodeRefundBalance: wei,
  distributableBalance: wei,
})

export const stateDocumentSchema = z.object({
  elBlockNumber: wei,
  totalEffectiveRplStake: wei.nullable(),
  networkDetails: z.object({
    rplPrice: wei,
    rplInflationIntervalRate: wei,
    rplTotalSupply: wei,
    intervalDurationSeconds: z.number().int().nonnegative(),
    nodeOperatorRewardsPercent: wei,
  }),
  nodes: z.array(nodeSchema),
  minipools: z.array(minipoolSchema),
})

export type ParsedState = {
  snapshot: StateSnapshot
  totalEffectiveRplStake: bigint | null
}

/**
 * Validates the provider's JSON document and indexes nodes and minipools by
 * checksummed node address.
 */
export const parseStateSnapshot = (input: unknown): ParsedState => {
  const document = stateDocumentSchema.parse(input)

  const nodeDetailsByAddress = new Map<NodeDetails['nodeAddress'], NodeDetails>()
  for (const node of document.nodes) {
    nodeDetailsByAddress.set(node.nodeAddress, node)
  }

  const minipoolDetailsByNode = new Map<MinipoolDetails['nodeAddress'], MinipoolDetails[]>()
  for (const minipool of document.minipools) {
    const existing = minipoolDetailsByNode.get(minipool.nodeAddress)
    if (existing) {
      existing.push(minipool)
    } else {
      minipoolDetailsByNode.set(minipool.nodeAddress, [minipool])
    }
  }

  return {
    snapshot: {
      elBlockNumber: document.elBlockNumber,
      networkDetails: document.networkDetails,
      nodeDetailsByAddress,
      minipoolDetailsByNode,
    },
    totalEffectiveRplStake: document.totalEffectiveRplStake,
  }
}
