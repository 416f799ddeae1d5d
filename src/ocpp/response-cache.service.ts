import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { createHash } from 'crypto'
import { RedisService } from '../redis/redis.service'

type CacheEntry = {
  fingerprint: string
  frame: string
  expiresAt: number
}

type StoredReply = Pick<CacheEntry, 'fingerprint' | 'frame'>

const MAX_ENTRIES = 10_000

/**
 * Serialized replies to recent CALLs, keyed by charge point and unique id, so
 * a retransmitted CALL is answered without being processed twice.
 *
 * Each reply carries a fingerprint of the CALL's action and payload. A charge
 * point that reuses a unique id for a different CALL (its counter restarts
 * after a reboot) misses the cache and is processed normally.
 */
@Injectable()
export class OcppResponseCache {
  private readonly logger = new Logger(OcppResponseCache.name)
  private readonly ttlSeconds: number
  private readonly ttlMs: number
  private readonly useRedis: boolean
  private readonly cache = new Map<string, CacheEntry>()

  constructor(
    private readonly redis: RedisService,
    config: ConfigService
  ) {
    const ttl = config.get<number>('ocpp.responseCacheTtlSeconds') ?? 300
    this.ttlSeconds = Number.isFinite(ttl) && ttl > 0 ? Math.floor(ttl) : 0
    this.ttlMs = this.ttlSeconds * 1000
    this.useRedis = (config.get<boolean>('ocpp.responseCacheRedis') ?? true) && this.redis.isEnabled()
  }

  static fingerprint(action: string, payload: unknown): string {
    return createHash('sha256').update(action).update('\n').update(JSON.stringify(payload) ?? '').digest('hex')
  }

  get size(): number {
    return this.cache.size
  }

  async get(
    chargePointId: string,
    uniqueId: string,
    fingerprint: string,
    now = Date.now()
  ): Promise<string | null> {
    if (this.ttlSeconds <= 0) {
      return null
    }
    const key = this.buildKey(chargePointId, uniqueId)
    const entry = this.cache.get(key)
    if (entry) {
      if (now > entry.expiresAt) {
        this.cache.delete(key)
      } else {
        return entry.fingerprint === fingerprint ? entry.frame : null
      }
    }

    if (!this.useRedis) {
      return null
    }

    try {
      const stored = parseStoredReply(await this.redis.getClient().get(key))
      if (!stored) {
        return null
      }
      this.remember(key, { ...stored, expiresAt: now + this.ttlMs }, now)
      return stored.fingerprint === fingerprint ? stored.frame : null
    } catch (error) {
      this.logger.warn(`Failed to read response cache for ${key}: ${describe(error)}`)
      return null
    }
  }

  async set(
    chargePointId: string,
    uniqueId: string,
    fingerprint: string,
    frame: string,
    now = Date.now()
  ): Promise<void> {
    if (this.ttlSeconds <= 0) {
      return
    }
    const key = this.buildKey(chargePointId, uniqueId)
    this.remember(key, { fingerprint, frame, expiresAt: now + this.ttlMs }, now)
    if (!this.useRedis) {
      return
    }
    try {
      const stored: StoredReply = { fingerprint, frame }
      await this.redis.getClient().setex(key, this.ttlSeconds, JSON.stringify(stored))
    } catch (error) {
      this.logger.warn(`Failed to persist response cache for ${key}: ${describe(error)}`)
    }
  }

  // Entries share one lifetime, so insertion order is expiry order.
  private remember(key: string, entry: CacheEntry, now: number): void {
    this.cache.delete(key)
    this.cache.set(key, entry)
    for (const [candidate, existing] of this.cache) {
      if (existing.expiresAt >= now && this.cache.size <= MAX_ENTRIES) {
        break
      }
      this.cache.delete(candidate)
    }
  }

  private buildKey(chargePointId: string, uniqueId: string): string {
    return `response:${chargePointId}:${uniqueId}`
  }
}

function parseStoredReply(raw: string | null): StoredReply | null {
  if (!raw) {
    return null
  }
  try {
    const value: unknown = JSON.parse(raw)
    if (
      typeof value === 'object' &&
      value !== null &&
      'fingerprint' in value &&
      'frame' in value &&
      typeof value.fingerprint === 'string' &&
      typeof value.frame === 'string'
    ) {
      return { fingerprint: value.fingerprint, frame: value.frame }
    }
  } catch {
    return null
  }
  return null
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
