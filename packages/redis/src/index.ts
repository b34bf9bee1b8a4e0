/**
 * @kibble/redis - Shared Redis connection utilities
 *
 * Connection configuration and the lazily created shared client. The
 * reconciler's run lease and override locks run on that client.
 */

import Redis, { type RedisOptions } from 'ioredis'
import { createLogger } from '@kibble/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  redisUrl: string | undefined
}

/**
 * Parse Redis configuration from environment variables.
 *
 * Supports two modes:
 * - REDIS_URL: Full URL (e.g., redis://:password@host:port), parsed into components
 * - REDIS_HOST/PORT/PASSWORD: Individual environment variables
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password || undefined,
        redisUrl,
      }
    } catch (error) {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT', {}, error)
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    redisUrl: undefined,
  }
}

/**
 * Connection info for logging, password masked.
 */
export function describeRedisConfig(config: RedisConfig): string {
  return config.redisUrl
    ? config.redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@')
    : `${config.host}:${config.port}`
}

// =============================================================================
// Connection Options
// =============================================================================

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/**
 * Build ioredis options with keepalive and capped exponential reconnect.
 * After 20 attempts the retry log drops to once per minute.
 */
export function createRedisOptions(config: RedisConfig = parseRedisConfig()): RedisOptions {
  const info = describeRedisConfig(config)
  let consecutiveFailures = 0
  let lastCircuitBreakerLog = 0

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    enableOfflineQueue: true,

    retryStrategy(times: number) {
      consecutiveFailures = times

      if (times > 20) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Circuit breaker: prolonged outage', { attempts: times, connection: info })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      if (RECONNECT_ERRORS.some((e) => err.message.includes(e))) {
        if (consecutiveFailures <= 20) {
          log.warn('Reconnecting due to error', { reason: err.message })
        }
        return true
      }
      return false
    },
  }
}

// =============================================================================
// Client Factory Functions
// =============================================================================

let singletonClient: Redis | null = null

/**
 * Lazily created shared client.
 */
export function getRedisClient(): Redis {
  if (!singletonClient) {
    const config = parseRedisConfig()
    const client = new Redis(createRedisOptions(config))

    client.on('error', (err: Error) => {
      log.error('Connection error', { reason: err.message })
    })

    client.on('connect', () => {
      log.info('Connected', { connection: describeRedisConfig(config) })
    })

    singletonClient = client
  }
  return singletonClient
}

/**
 * Gracefully disconnect the shared client. Safe to call when none was created.
 */
export async function disconnectRedis(): Promise<void> {
  if (singletonClient) {
    await singletonClient.quit()
    singletonClient = null
  }
}
