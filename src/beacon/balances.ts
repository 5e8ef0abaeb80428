import { logger } from '../shared/logger.js'
import { gweiToWei } from '../shared/units.js'
import { ChainClientError } from '../shared/errors.js'
import { type Result, Ok, Err } from '../shared/result.js'
import type { MinipoolDetails } from '../state/types.js'
import type { BeaconClient } from './client.js'
import type { BeaconHead, MinipoolBalanceDetails } from './types.js'

const FEE_DENOMINATOR = 10n ** 18n

const userCapital = (minipool: MinipoolDetails): bigint =>
  minipool.userDepositAssigned ? minipool.userDepositBalance : 0n

/**
 * The node operator's share of a minipool balance. Above total capital the
 * rewards are split by capital, and the node also earns its fee on the user's
 * part. Below that the user is made whole first.
 */
export const calculateNodeShare = (minipool: MinipoolDetails, balance: bigint): bigint => {
  const userPart = userCapital(minipool)
  const nodePart = minipool.nodeDepositBalance
  const capital = userPart + nodePart

  if (capital > 0n && balance > capital) {
    const rewards = balance - capital
    const nodeRewards = (rewards * nodePart) / capital
    const commission = ((rewards - nodeRewards) * minipool.nodeFee) / FEE_DENOMINATOR
    return nodePart + nodeRewards + commission
  }
  if (balance > userPart) {
    return balance - userPart
  }
  return 0n
}

export type BalanceResolver = {
  getBalances: (
    minipools: readonly MinipoolDetails[],
    head: BeaconHead
  ) => Promise<Result<MinipoolBalanceDetails[], ChainClientError>>
}

export const createBalanceResolver = (
  beacon: Pick<BeaconClient, 'getValidators'>
): BalanceResolver => {
  const getBalances = async (
    minipools: readonly MinipoolDetails[],
    head: BeaconHead
  ): Promise<Result<MinipoolBalanceDetails[], ChainClientError>> => {
    if (minipools.length === 0) return Ok([])

    const validators = await beacon.getValidators(
      minipools.map((mpd) => mpd.pubkey),
      head.slot.toString()
    )
    if (!validators.ok) {
      return Err(new ChainClientError(
        `Error getting validator balances at slot ${head.slot}: ${validators.error.message}`,
        'beacon',
        { cause: validators.error }
      ))
    }

    return Ok(minipools.map((mpd) => {
      const validator = validators.value.get(mpd.pubkey.toLowerCase())
      if (!validator || validator.activationEpoch > head.epoch) {
        // Not active yet: the deposit is still the whole story
        logger.debug(`[BalanceResolver] Minipool ${mpd.minipoolAddress} has no active validator at epoch ${head.epoch}`)
        return {
          minipoolAddress: mpd.minipoolAddress,
          nodeDeposit: mpd.nodeDepositBalance,
          nodeBalance: mpd.nodeDepositBalance,
          totalBalance: mpd.nodeDepositBalance + userCapital(mpd),
        }
      }

      const totalBalance = gweiToWei(validator.balance)
      return {
        minipoolAddress: mpd.minipoolAddress,
        nodeDeposit: mpd.nodeDepositBalance,
        nodeBalance: calculateNodeShare(mpd, totalBalance),
        totalBalance,
      }
    }))
  }

  return { getBalances }
}
