import type { Address } from 'viem'
import type { Database } from '../types.js'

export const createCollectorStateRepository = (db: Database) => {
  const getNextRewardsStartBlock = async (node: Address): Promise<bigint | null> => {
    const result = await db.query<{ next_rewards_start_block: string }>(
      'SELECT next_rewards_start_block FROM collector_state WHERE node_address = $1',
      [node.toLowerCase()]
    )
    const row = result.rows[0]
    return row ? BigInt(row.next_rewards_start_block) : null
  }

  const saveNextRewardsStartBlock = async (node: Address, block: bigint): Promise<void> => {
    await db.query(
      `INSERT INTO collector_state (node_address, next_rewards_start_block)
       VALUES ($1, $2)
       ON CONFLICT (node_address)
       DO UPDATE SET next_rewards_start_block = $2, updated_at = CURRENT_TIMESTAMP`,
      [node.toLowerCase(), block]
    )
  }

  return {
    getNextRewardsStartBlock,
    saveNextRewardsStartBlock
  }
}

export type CollectorStateRepository = ReturnType<typeof createCollectorStateRepository>
