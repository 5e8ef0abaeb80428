import { formatEther } from 'viem'

// Float conversions are for observability only; ledger arithmetic stays in bigint.
export const weiToEth = (wei: bigint): number => Number(formatEther(wei))

export const gweiToWei = (gwei: bigint): bigint => gwei * 1_000_000_000n
