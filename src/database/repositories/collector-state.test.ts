import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createDatabase } from '../create-database.js'
import type { Database } from '../types.js'
import { createCollectorStateRepository } from './collector-state.js'

const NODE = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01'

describe('createCollectorStateRepository', () => {
  let db: Database

  beforeEach(async () => {
    db = await createDatabase({ sqlitePath: ':memory:' })
    await db.migrate()
  })

  afterEach(async () => {
    await db.close()
  })

  it('returns null for a node that was never checkpointed', async () => {
    const repository = createCollectorStateRepository(db)

    expect(await repository.getNextRewardsStartBlock(NODE)).toBeNull()
  })

  it('round-trips block numbers beyond the safe integer range', async () => {
    const repository = createCollectorStateRepository(db)
    const block = 2n ** 64n + 1n

    await repository.saveNextRewardsStartBlock(NODE, block)

    expect(await repository.getNextRewardsStartBlock(NODE)).toBe(block)
  })

  it('overwrites the checkpoint and ignores address casing', async () => {
    const repository = createCollectorStateRepository(db)

    await repository.saveNextRewardsStartBlock(NODE, 100n)
    await repository.saveNextRewardsStartBlock('0xabcdef0123456789abcdef0123456789abcdef01', 250n)

    expect(await repository.getNextRewardsStartBlock(NODE)).toBe(250n)
    const rows = await db.query<{ node_address: string }>('SELECT node_address FROM collector_state')
    expect(rows.rows).toEqual([{ node_address: '0xabcdef0123456789abcdef0123456789abcdef01' }])
  })

  it('applies each migration once', async () => {
    await db.migrate()

    const result = await db.query<{ version: number }>('SELECT version FROM migrations')
    expect(result.rows).toEqual([{ version: 1 }])
  })
})
