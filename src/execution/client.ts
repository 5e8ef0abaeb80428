import type { PublicClient } from 'viem'
import { ChainClientError } from '../shared/errors.js'
import { type Result, Ok, Err, toError } from '../shared/result.js'

export type ExecutionClient = {
  getLatestBlockNumber: () => Promise<Result<bigint, ChainClientError>>
}

export const createExecutionClient = (client: Pick<PublicClient, 'getBlock'>): ExecutionClient => ({
  getLatestBlockNumber: async () => {
    try {
      const header = await client.getBlock({ blockTag: 'latest' })
      return Ok(header.number)
    } catch (error) {
      return Err(new ChainClientError(`Error getting latest block header: ${toError(error).message}`, 'execution', { cause: error }))
    }
  },
})
