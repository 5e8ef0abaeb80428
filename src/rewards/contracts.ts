import { encodePacked, keccak256, parseAbi, type Address, type PublicClient } from 'viem'
import { logger } from '../shared/logger.js'

const rocketStorageAbi = parseAbi([
  'function getAddress(bytes32 _key) view returns (address)',
])

const rocketRewardsPoolAbi = parseAbi([
  'function getRewardIndex() view returns (uint256)',
])

const rocketMerkleDistributorAbi = parseAbi([
  'function isClaimed(uint256 _rewardIndex, address _claimer) view returns (bool)',
])

type ContractName = 'rocketRewardsPool' | 'rocketMerkleDistributorMainnet'

export type RewardsContracts = {
  getRewardIndex: () => Promise<bigint>
  isClaimed: (interval: bigint, node: Address) => Promise<boolean>
}

export const contractStorageKey = (name: string) =>
  keccak256(encodePacked(['string', 'string'], ['contract.address', name]))

/**
 * Rewards pool and merkle distributor reads. Network contract addresses are
 * looked up in RocketStorage once and reused until a lookup fails.
 */
export const createRewardsContracts = (
  client: PublicClient,
  rocketStorage: Address
): RewardsContracts => {
  const addresses = new Map<ContractName, Promise<Address>>()

  const resolve = (name: ContractName): Promise<Address> => {
    const cached = addresses.get(name)
    if (cached) return cached

    const lookup = client
      .readContract({
        address: rocketStorage,
        abi: rocketStorageAbi,
        functionName: 'getAddress',
        args: [contractStorageKey(name)],
      })
      .then(
        (address) => {
          logger.debug(`[RewardsContracts] ${name} is at ${address}`)
          return address
        },
        (error: unknown) => {
          addresses.delete(name)
          throw error
        }
      )
    addresses.set(name, lookup)
    return lookup
  }

  const getRewardIndex = async (): Promise<bigint> =>
    client.readContract({
      address: await resolve('rocketRewardsPool'),
      abi: rocketRewardsPoolAbi,
      functionName: 'getRewardIndex',
    })

  const isClaimed = async (interval: bigint, node: Address): Promise<boolean> =>
    client.readContract({
      address: await resolve('rocketMerkleDistributorMainnet'),
      abi: rocketMerkleDistributorAbi,
      functionName: 'isClaimed',
      args: [interval, node],
    })

  return { getRewardIndex, isClaimed }
}
