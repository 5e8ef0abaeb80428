import express, { type Request, type Response } from 'express'
import PQueue from 'p-queue'
import type { Server } from 'node:http'
import type { Registry } from 'prom-client'
import { logger } from '../shared/logger.js'
import type { NodeCollector } from '../node-collector/index.js'

export type MetricsServerDeps = {
  registry: Registry
  collectors: NodeCollector[]
  isStateReady: () => boolean
}

/**
 * Scrape surface. Each GET /metrics runs one collection cycle per node before
 * rendering the registry, so a failed cycle shows up as missing samples.
 * Scrapes run one at a time, since a cycle clears its node's samples before
 * emitting.
 */
export const createMetricsApp = (deps: MetricsServerDeps) => {
  const app = express()
  const scrapes = new PQueue({ concurrency: 1 })

  const scrape = () =>
    scrapes.add(async () => {
      const outcomes = await Promise.all(deps.collectors.map((collector) => collector.collect()))
      logger.debug(`[MetricsServer] Scrape outcomes: ${outcomes.map((outcome) => outcome.status).join(', ')}`)
      return deps.registry.metrics()
    }, { throwOnTimeout: true })

  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      const body = await scrape()
      res.set('Content-Type', deps.registry.contentType)
      res.send(body)
    } catch (error) {
      logger.error('[MetricsServer] Failed to render metrics:', error)
      res.status(500).send('Failed to render metrics')
    }
  })

  app.get('/health', (_req: Request, res: Response) => {
    const stateReady = deps.isStateReady()
    res.json({ status: 'ok', stateReady })
  })

  return app
}

export const startMetricsServer = (deps: MetricsServerDeps, port: number, host: string): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = createMetricsApp(deps).listen(port, host, () => {
      logger.info(`[MetricsServer] Serving metrics on http://${host}:${port}/metrics`)
      resolve(server)
    })
    server.once('error', reject)
  })

export const stopMetricsServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
