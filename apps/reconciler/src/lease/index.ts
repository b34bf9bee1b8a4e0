import { getRedisClient } from '@kibble/redis'
import type { Settings } from '../config/settings'
import { MemoryRunLease, RedisRunLease, type RunLease } from './run-lease'

export * from './run-lease'

export function createRunLease(settings: Pick<Settings, 'lease' | 'leaseTtlMs'>): RunLease {
  return settings.lease === 'redis'
    ? new RedisRunLease(getRedisClient(), { ttlMs: settings.leaseTtlMs })
    : new MemoryRunLease()
}
