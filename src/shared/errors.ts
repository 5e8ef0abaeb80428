/**
 * A reward interval cannot be reconstructed: its tree file is missing or
 * unreadable. Totals computed without it would be silently wrong.
 */
export class RewardsResolutionError extends Error {
  constructor(
    message: string,
    readonly interval: bigint,
    readonly treeFilePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'RewardsResolutionError'
  }
}

export type ChainClientSource = 'execution' | 'beacon' | 'state'

/** Transport failure or malformed payload from one of the chain clients. */
export class ChainClientError extends Error {
  constructor(
    message: string,
    readonly source: ChainClientSource,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ChainClientError'
  }
}

export type FailureReason = 'rewards' | 'execution' | 'beacon' | 'state' | 'unknown'

export const failureReason = (error: Error): FailureReason => {
  if (error instanceof RewardsResolutionError) return 'rewards'
  if (error instanceof ChainClientError) return error.source
  return 'unknown'
}
