import type { StateProvider, StateSnapshot } from './types.js'

export type StateLocker = StateProvider & {
  update: (snapshot: StateSnapshot, totalEffectiveRplStake: bigint | null) => void
  isReady: () => boolean
}

/**
 * Holds the most recently published snapshot. Readers get a reference to an
 * immutable snapshot; a newer update never mutates one already handed out.
 */
export const createStateLocker = (): StateLocker => {
  let current: { snapshot: StateSnapshot; totalEffectiveRplStake: bigint | null } | null = null

  return {
    getState: () => current?.snapshot ?? null,
    getTotalEffectiveRplStake: () => current?.totalEffectiveRplStake ?? null,
    update: (snapshot, totalEffectiveRplStake) => {
      current = { snapshot, totalEffectiveRplStake }
    },
    isReady: () => current !== null,
  }
}
