/**
 * Single-owner leases for reconcile runs and override edits.
 *
 * The Redis lease stores a random owner token under the key, so only the
 * owner can renew or release it; a renewal timer keeps a long run's lease alive:
 * - acquire: SET NX PX with the token
 * - renew/release: Lua compare-and-pexpire / compare-and-delete
 */

import { randomUUID } from 'crypto'
import { loggers } from '../config/logger'

const log = loggers.lease

export const RUN_LEASE_PREFIX = 'run-lease:'
export const OVERRIDE_LOCK_PREFIX = 'override-lock:'
export const DEFAULT_LEASE_TTL_MS = 120_000

const RELEASE_IF_OWNER = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`

const RENEW_IF_OWNER = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("pexpire", KEYS[1], ARGV[2])
  else
    return 0
  end
`

/**
 * The two Redis commands a lease needs. An ioredis client satisfies it.
 */
export interface LeaseClient {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>
}

export interface LeaseHandle {
  key: string
  /** False once a renewal failed; the lease may be held by someone else */
  isHeld(): boolean
  release(): Promise<boolean>
}

export interface RunLease {
  readonly kind: 'redis' | 'memory'
  /** Returns null while another owner holds the key */
  acquire(key: string): Promise<LeaseHandle | null>
}

export interface RedisRunLeaseOptions {
  ttlMs?: number
  /** Default: a quarter of the TTL */
  renewalIntervalMs?: number
}

export class RedisRunLease implements RunLease {
  readonly kind = 'redis'
  private readonly ttlMs: number
  private readonly renewalIntervalMs: number

  constructor(
    private readonly redis: LeaseClient,
    options: RedisRunLeaseOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_LEASE_TTL_MS
    this.renewalIntervalMs = options.renewalIntervalMs ?? Math.floor(this.ttlMs / 4)
  }

  async acquire(key: string): Promise<LeaseHandle | null> {
    const token = randomUUID()
    const claimed = await this.redis.set(key, token, 'PX', this.ttlMs, 'NX')
    if (claimed !== 'OK') {
      log.debug('Lease not available', { key })
      return null
    }
    log.debug('Lease acquired', { key, ttlMs: this.ttlMs })
    return new RedisLeaseHandle(this.redis, key, token, this.ttlMs, this.renewalIntervalMs)
  }
}

class RedisLeaseHandle implements LeaseHandle {
  private held = true
  private renewalTimer: ReturnType<typeof setInterval> | undefined

  constructor(
    private readonly redis: LeaseClient,
    readonly key: string,
    private readonly token: string,
    private readonly ttlMs: number,
    renewalIntervalMs: number
  ) {
    const timer = setInterval(() => {
      void this.renew()
    }, renewalIntervalMs)
    timer.unref()
    this.renewalTimer = timer
  }

  isHeld(): boolean {
    return this.held
  }

  async release(): Promise<boolean> {
    this.stopRenewal()
    this.held = false
    try {
      const released = Number(await this.redis.eval(RELEASE_IF_OWNER, 1, this.key, this.token)) === 1
      if (released) {
        log.debug('Lease released', { key: this.key })
      } else {
        log.warn('Lease release failed (token mismatch or expired)', { key: this.key })
      }
      return released
    } catch (error) {
      log.warn('Lease release error', { key: this.key }, error)
      return false
    }
  }

  private async renew(): Promise<void> {
    let renewed = false
    try {
      renewed = Number(await this.redis.eval(RENEW_IF_OWNER, 1, this.key, this.token, this.ttlMs.toString())) === 1
    } catch (error) {
      log.warn('Lease extend error', { key: this.key }, error)
    }
    if (!renewed && this.held) {
      log.warn('Lease renewal failed - lease may have expired', { key: this.key })
      this.held = false
      this.stopRenewal()
    }
  }

  private stopRenewal(): void {
    if (this.renewalTimer) {
      clearInterval(this.renewalTimer)
      this.renewalTimer = undefined
    }
  }
}

/**
 * Process-local lease. Keys never expire; release is owner-checked.
 */
export class MemoryRunLease implements RunLease {
  readonly kind = 'memory'
  private readonly owners = new Map<string, string>()

  async acquire(key: string): Promise<LeaseHandle | null> {
    if (this.owners.has(key)) return null
    const token = randomUUID()
    this.owners.set(key, token)

    return {
      key,
      isHeld: () => this.owners.get(key) === token,
      release: async () => {
        if (this.owners.get(key) !== token) return false
        this.owners.delete(key)
        return true
      },
    }
  }

  isLocked(key: string): boolean {
    return this.owners.has(key)
  }
}

export function runLeaseKey(target: string): string {
  return `${RUN_LEASE_PREFIX}${target}`
}

export function overrideLockKey(productKeyOrBrand: string): string {
  return `${OVERRIDE_LOCK_PREFIX}${productKeyOrBrand}`
}

/**
 * Run `work` under the lease, releasing it afterwards. Returns null when the
 * lease is held elsewhere and `work` never ran.
 */
export async function withLease<T>(
  lease: RunLease,
  key: string,
  work: (handle: LeaseHandle) => Promise<T>
): Promise<{ value: T } | null> {
  const handle = await lease.acquire(key)
  if (!handle) return null
  try {
    return { value: await work(handle) }
  } finally {
    await handle.release()
  }
}
