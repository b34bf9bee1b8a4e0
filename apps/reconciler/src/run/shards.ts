/**
 * Key sharding. A base key always lands in the same shard, so shards can be
 * reconciled independently and their outputs concatenated.
 */

import { createHash } from 'crypto'

export function shardOf(key: string, shardCount: number): number {
  if (shardCount <= 1) return 0
  const digest = createHash('sha256').update(key).digest()
  return digest.readUInt32BE(0) % shardCount
}

/**
 * Partition keyed groups into `shardCount` maps, each in key order.
 */
export function partitionByShard<T>(groups: ReadonlyMap<string, T>, shardCount: number): Array<Map<string, T>> {
  const shards = Array.from({ length: Math.max(1, shardCount) }, () => new Map<string, T>())
  const keys = [...groups.keys()].sort()
  for (const key of keys) {
    const group = groups.get(key)
    if (group === undefined) continue
    shards[shardOf(key, shards.length)].set(key, group)
  }
  return shards
}
