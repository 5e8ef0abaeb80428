import { z } from 'zod'
import dotenv from 'dotenv'
import { getAddress, isAddress } from 'viem'

// Load environment variables
dotenv.config()

const addressSchema = z
  .string()
  .refine((value) => isAddress(value), { message: 'Invalid Ethereum address' })
  .transform((value) => getAddress(value))

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  filePath: z.string().optional(),
  maxSizeMB: z.number().positive().optional(),
  maxFiles: z.number().int().positive().optional(),
})

const configSchema = z.object({
  // Database
  database: z.object({
    sqlitePath: z.string().min(1).default('./data/node-metrics.db'),
  }),

  // Ethereum
  ethereum: z.object({
    rpcUrl: z.string().url(),
    beaconApiUrl: z.string().url(),
    network: z.enum(['mainnet', 'holesky']).default('mainnet'),
    rocketStorageAddress: addressSchema,
    nodeAddress: addressSchema,
  }),

  // Beacon client transport
  beacon: z.object({
    timeoutMs: z.number().int().positive().default(10000),
    retryCount: z.number().int().positive().default(3),
    retryDelayMs: z.number().int().positive().default(1000),
  }),

  // Snapshot provider
  state: z.object({
    sourceUrl: z.string().url(),
    refreshIntervalMs: z.number().int().positive().default(60000),
  }),

  rewards: z.object({
    treeDir: z.string().min(1).default('./data/rewards-trees'),
  }),

  // Scrape endpoint
  metrics: z.object({
    port: z.number().int().positive().default(9102),
    host: z.string().default('0.0.0.0'),
    namespace: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/).default('rocketpool'),
  }),

  logging: loggingSchema,
})

export type Config = z.infer<typeof configSchema>
export type LoggingConfig = z.infer<typeof loggingSchema>
export type Network = Config['ethereum']['network']

const parseEnvNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined
  const parsed = parseInt(value, 10)
  return isNaN(parsed) ? undefined : parsed
}

const rawLoggingConfig = () => ({
  level: process.env['LOG_LEVEL'] || 'info',
  filePath: process.env['LOG_FILE_PATH'],
  maxSizeMB: parseEnvNumber(process.env['LOG_MAX_SIZE_MB']),
  maxFiles: parseEnvNumber(process.env['LOG_MAX_FILES']),
})

/**
 * Logging settings only. The logger is created at import time, before the rest
 * of the environment is known to be complete, so this never throws.
 */
export const loadLoggingConfig = (): LoggingConfig => {
  const parsed = loggingSchema.safeParse(rawLoggingConfig())
  return parsed.success ? parsed.data : loggingSchema.parse({})
}

export const loadConfig = (): Config => {
  dotenv.config()

  const ethereumRpcUrl = process.env['ETH_RPC_URL']
  if (!ethereumRpcUrl) {
    throw new Error('ETH_RPC_URL is not set in the environment variables.')
  }

  const rawConfig = {
    database: {
      sqlitePath: process.env['SQLITE_PATH'],
    },
    ethereum: {
      rpcUrl: ethereumRpcUrl,
      beaconApiUrl: process.env['BEACON_API_URL'],
      network: process.env['NETWORK'],
      rocketStorageAddress: process.env['ROCKET_STORAGE_ADDRESS'],
      nodeAddress: process.env['NODE_ADDRESS'],
    },
    beacon: {
      timeoutMs: parseEnvNumber(process.env['BEACON_TIMEOUT_MS']),
      retryCount: parseEnvNumber(process.env['BEACON_RETRY_COUNT']),
      retryDelayMs: parseEnvNumber(process.env['BEACON_RETRY_DELAY_MS']),
    },
    state: {
      sourceUrl: process.env['STATE_URL'],
      refreshIntervalMs: parseEnvNumber(process.env['STATE_REFRESH_INTERVAL_MS']),
    },
    rewards: {
      treeDir: process.env['REWARDS_TREE_DIR'],
    },
    metrics: {
      port: parseEnvNumber(process.env['METRICS_PORT']),
      host: process.env['METRICS_HOST'],
      namespace: process.env['METRICS_NAMESPACE'],
    },
    logging: rawLoggingConfig(),
  }

  try {
    return configSchema.parse(rawConfig)
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation error:', JSON.stringify(error.issues, null, 2))
    } else {
      console.error('Unknown error during configuration loading:', error)
    }
    throw new Error('Configuration validation failed')
  }
}
