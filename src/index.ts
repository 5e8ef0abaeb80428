import type { Server } from 'node:http'
import { createPublicClient, http, type PublicClient } from 'viem'
import { holesky, mainnet } from 'viem/chains'
import { Registry, collectDefaultMetrics } from 'prom-client'
import { createDatabase } from './database/create-database.js'
import { createCollectorStateRepository } from './database/repositories/collector-state.js'
import { loadConfig } from './shared/config.js'
import { logger } from './shared/logger.js'
import { createStateLocker } from './state/state-locker.js'
import { createStateRefresher } from './state/state-refresher.js'
import { createBeaconClient } from './beacon/client.js'
import { createBalanceResolver } from './beacon/balances.js'
import { createExecutionClient } from './execution/client.js'
import { createRewardsContracts } from './rewards/contracts.js'
import { createIntervalInfoLoader } from './rewards/interval-info.js'
import { createRewardsResolver } from './rewards/resolver.js'
import { createNodeCollector, createNodeMetrics, createRewardsLedger } from './node-collector/index.js'
import { startMetricsServer, stopMetricsServer } from './server/metrics-server.js'

const main = async () => {
  logger.info('Starting node metrics exporter...')

  let server: Server | null = null
  let refresher: ReturnType<typeof createStateRefresher> | null = null
  let db: Awaited<ReturnType<typeof createDatabase>> | null = null

  try {
    const config = loadConfig()
    logger.info('Configuration loaded successfully')

    db = await createDatabase(config.database)
    logger.info('Running database migrations...')
    await db.migrate()
    const collectorState = createCollectorStateRepository(db)

    const nodeAddress = config.ethereum.nodeAddress
    const startBlock = await collectorState.getNextRewardsStartBlock(nodeAddress)
    logger.info(`Next rewards start block from DB: ${startBlock ?? 'none'}`)

    const client: PublicClient = createPublicClient({
      chain: config.ethereum.network === 'holesky' ? holesky : mainnet,
      transport: http(config.ethereum.rpcUrl, {
        retryCount: 3,
        retryDelay: 1000
      })
    })

    const beaconClient = createBeaconClient({
      beaconApiUrl: config.ethereum.beaconApiUrl,
      ...config.beacon
    })

    const locker = createStateLocker()
    refresher = createStateRefresher({ ...config.state, timeoutMs: config.beacon.timeoutMs }, locker)
    const initial = await refresher.refresh()
    if (!initial.ok) {
      logger.warn(`Initial state refresh failed, collector stays not-ready until one succeeds: ${initial.error.message}`)
    }
    refresher.start()

    const registry = new Registry()
    collectDefaultMetrics({ register: registry })

    const collector = createNodeCollector({
      nodeAddress,
      state: locker,
      rewards: createRewardsResolver(
        createRewardsContracts(client, config.ethereum.rocketStorageAddress),
        createIntervalInfoLoader(config.rewards.treeDir, config.ethereum.network)
      ),
      execution: createExecutionClient(client),
      beacon: beaconClient,
      balances: createBalanceResolver(beaconClient),
      metrics: createNodeMetrics(registry, config.metrics.namespace),
      ledger: createRewardsLedger(startBlock),
      checkpoints: collectorState,
    })

    server = await startMetricsServer(
      { registry, collectors: [collector], isStateReady: locker.isReady },
      config.metrics.port,
      config.metrics.host
    )

    logger.info(`Collecting metrics for node ${nodeAddress}`)

    const shutdown = async () => {
      logger.info('Shutting down gracefully...')
      refresher?.stop()
      if (server) {
        await stopMetricsServer(server)
      }
      if (db) {
        await db.close()
      }
      logger.info('All components stopped. Exiting.')
      process.exit(0)
    }

    const onSignal = () => {
      shutdown().catch((error) => {
        logger.error('Error during shutdown:', error)
        process.exit(1)
      })
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)

  } catch (error) {
    logger.error('Failed to start exporter:', error)
    refresher?.stop()
    if (server) await stopMetricsServer(server).catch(e => logger.error('Error stopping metrics server during main catch:', e))
    if (db) await db.close().catch(e => logger.error('Error closing database during main catch:', e))
    process.exit(1)
  }
}

main().catch((error) => {
  logger.error('Unhandled error at main execution level:', error)
  process.exit(1)
})
