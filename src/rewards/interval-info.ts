import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import type { Address } from 'viem'
import type { Network } from '../shared/config.js'
import { RewardsResolutionError } from '../shared/errors.js'
import { type Result, Ok, Err, toError } from '../shared/result.js'
import type { IntervalRewardInfo } from './types.js'

const amount = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => BigInt(value))

const nodeRewardsSchema = z.object({
  collateralRpl: amount,
  smoothingPoolEth: amount.default('0'),
})

const rewardsTreeSchema = z.object({
  index: z.number().int().nonnegative(),
  nodeRewards: z.record(z.string(), nodeRewardsSchema),
})

export type NodeRewardsEntry = z.infer<typeof nodeRewardsSchema>

// Parsed tree keyed by lowercase node address
export type RewardsTree = {
  index: number
  nodeRewards: Map<string, NodeRewardsEntry>
}

export const rewardsTreeFileName = (network: Network, interval: bigint) =>
  `rp-rewards-${network}-${interval}.json`

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

export const parseRewardsTree = (input: unknown): RewardsTree => {
  const parsed = rewardsTreeSchema.parse(input)
  const nodeRewards = new Map<string, NodeRewardsEntry>()
  for (const [address, entry] of Object.entries(parsed.nodeRewards)) {
    nodeRewards.set(address.toLowerCase(), entry)
  }
  return { index: parsed.index, nodeRewards }
}

export type IntervalInfoLoader = ReturnType<typeof createIntervalInfoLoader>

/**
 * Reads per-interval reward amounts from the published rewards tree files.
 * Tree files never change once written, so parsed trees are kept.
 */
export const createIntervalInfoLoader = (treeDir: string, network: Network) => {
  const trees = new Map<bigint, RewardsTree>()

  const readTree = async (filePath: string, interval: bigint): Promise<Result<RewardsTree | null, RewardsResolutionError>> => {
    const cached = trees.get(interval)
    if (cached) return Ok(cached)

    let raw: string
    try {
      raw = await readFile(filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return Ok(null)
      return Err(new RewardsResolutionError(
        `Error reading rewards file ${filePath} for interval ${interval}: ${toError(error).message}`,
        interval,
        filePath,
        { cause: error }
      ))
    }

    try {
      const tree = parseRewardsTree(JSON.parse(raw))
      if (BigInt(tree.index) !== interval) {
        throw new Error(`file is for interval ${tree.index}`)
      }
      trees.set(interval, tree)
      return Ok(tree)
    } catch (error) {
      return Err(new RewardsResolutionError(
        `Rewards file ${filePath} for interval ${interval} is malformed: ${toError(error).message}`,
        interval,
        filePath,
        { cause: error }
      ))
    }
  }

  const load = async (node: Address, interval: bigint): Promise<Result<IntervalRewardInfo, RewardsResolutionError>> => {
    const treeFilePath = path.join(treeDir, rewardsTreeFileName(network, interval))
    const tree = await readTree(treeFilePath, interval)
    if (!tree.ok) return tree

    const entry = tree.value?.nodeRewards.get(node.toLowerCase())
    return Ok({
      index: interval,
      treeFilePath,
      treeFileExists: tree.value !== null,
      nodeExists: entry !== undefined,
      collateralRplAmount: entry?.collateralRpl ?? 0n,
      smoothingPoolEthAmount: entry?.smoothingPoolEth ?? 0n,
    })
  }

  return { load }
}
