import { describe, it, expect, vi, beforeEach } from 'vitest'
import { getEventListeners } from 'node:events'
import fetch, { Response } from 'node-fetch'
import { createStateLocker } from './state-locker.js'
import { createStateRefresher, sleep } from './state-refresher.js'

vi.mock('node-fetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node-fetch')>()),
  default: vi.fn(),
}))

const fetchMock = vi.mocked(fetch)

const config = { sourceUrl: 'http://state.test/snapshot', refreshIntervalMs: 60_000, timeoutMs: 1000 }

const stateDoc = (elBlockNumber: string) => ({
  elBlockNumber,
  totalEffectiveRplStake: '1000',
  networkDetails: {
    rplPrice: '10000000000000000',
    rplInflationIntervalRate: '1000133680617113500',
    rplTotalSupply: '20000000000000000000000000',
    intervalDurationSeconds: 2419200,
    nodeOperatorRewardsPercent: '707100000000000000',
  },
  nodes: [],
  minipools: [],
})

const json = (body: unknown) =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } })

describe('createStateRefresher', () => {
  beforeEach(() => {
    fetchMock.mockReset()
  })

  it('publishes a valid document to the locker', async () => {
    fetchMock.mockResolvedValueOnce(json(stateDoc('120')))
    const locker = createStateLocker()

    const result = await createStateRefresher(config, locker).refresh()

    expect(result).toEqual({ ok: true, value: 120n })
    expect(locker.isReady()).toBe(true)
    expect(locker.getState()?.elBlockNumber).toBe(120n)
    expect(locker.getTotalEffectiveRplStake()).toBe(1000n)
    expect(fetchMock).toHaveBeenCalledWith('http://state.test/snapshot', expect.objectContaining({ method: 'GET' }))
  })

  it('keeps the previous snapshot when the provider errors', async () => {
    fetchMock
      .mockResolvedValueOnce(json(stateDoc('120')))
      .mockResolvedValueOnce(new Response('down for maintenance', { status: 503 }))
    const locker = createStateLocker()
    const refresher = createStateRefresher(config, locker)

    await refresher.refresh()
    const result = await refresher.refresh()

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.source).toBe('state')
    expect(result.error.message).toBe('State provider responded with status 503: down for maintenance')
    expect(locker.getState()?.elBlockNumber).toBe(120n)
  })

  it('reports transport failures', async () => {
    fetchMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED'))

    const result = await createStateRefresher(config, createStateLocker()).refresh()

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('State provider request failed: connect ECONNREFUSED')
  })

  it('rejects a document that fails validation', async () => {
    fetchMock.mockResolvedValueOnce(json({ ...stateDoc('120'), nodes: 'none' }))
    const locker = createStateLocker()

    const result = await createStateRefresher(config, locker).refresh()

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message.startsWith('State document failed validation: ')).toBe(true)
    expect(locker.isReady()).toBe(false)
  })

  it('refreshes in the background until stopped', async () => {
    fetchMock.mockResolvedValue(json(stateDoc('42')))
    const locker = createStateLocker()
    const refresher = createStateRefresher(config, locker)

    refresher.start()
    await vi.waitFor(() => expect(locker.isReady()).toBe(true))
    refresher.stop()

    expect(locker.getState()?.elBlockNumber).toBe(42n)
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })
})

describe('sleep', () => {
  it('leaves no abort listener behind once the timer fires', async () => {
    const controller = new AbortController()

    for (let i = 0; i < 15; i++) {
      await sleep(1, controller.signal)
    }

    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0)
  })

  it('wakes up early when aborted', async () => {
    const controller = new AbortController()
    const started = Date.now()

    const pending = sleep(60_000, controller.signal)
    controller.abort()
    await pending

    expect(Date.now() - started).toBeLessThan(1000)
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0)
  })
})
