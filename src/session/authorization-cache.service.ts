import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { ChargingStore, IdTagRecord } from '../persistence/charging-store'
import { MetricsService } from '../metrics/metrics.service'
import type { Authorization, Verdict } from './session.types'

type CacheEntry = {
  authorization: Authorization
  cachedUntil: number
}

// Marks a storage read whose result an invalidation has made stale.
type LoadTicket = {
  stale: boolean
}

type Load = {
  ticket: LoadTicket
  result: Promise<Authorization>
}

/**
 * Advisory copy of identity-tag verdicts. The cache lifetime bounds how stale
 * a copy may be; a tag's own expiry bounds its validity.
 */
@Injectable()
export class AuthorizationCache {
  private readonly logger = new Logger(AuthorizationCache.name)
  private readonly entries = new Map<string, CacheEntry>()
  private readonly inflight = new Map<string, Load>()
  private readonly ttlMs: number
  private readonly maxEntries: number

  constructor(
    private readonly store: ChargingStore,
    private readonly metrics: MetricsService,
    config: ConfigService
  ) {
    this.ttlMs = (config.get<number>('ocpp.authCacheTtlSeconds') ?? 60) * 1000
    this.maxEntries = config.get<number>('ocpp.authCacheMaxEntries') ?? 10000
  }

  async resolve(tag: string, now = Date.now()): Promise<Authorization> {
    const entry = this.entries.get(tag)
    if (entry && entry.cachedUntil > now) {
      this.metrics.increment('auth_cache_total', { result: 'hit' })
      return applyExpiry(entry.authorization, now)
    }
    if (entry) {
      this.entries.delete(tag)
    }

    const pending = this.inflight.get(tag)
    if (pending) {
      return pending.result
    }

    this.metrics.increment('auth_cache_total', { result: 'miss' })
    const ticket: LoadTicket = { stale: false }
    const load: Load = { ticket, result: this.load(tag, now, ticket) }
    this.inflight.set(tag, load)
    try {
      return await load.result
    } finally {
      if (this.inflight.get(tag) === load) {
        this.inflight.delete(tag)
      }
    }
  }

  invalidate(tag: string): void {
    const pending = this.inflight.get(tag)
    if (pending) {
      pending.ticket.stale = true
      this.inflight.delete(tag)
    }
    this.entries.delete(tag)
  }

  invalidateAll(): void {
    for (const pending of this.inflight.values()) {
      pending.ticket.stale = true
    }
    this.entries.clear()
    this.inflight.clear()
    this.logger.log('Authorization cache cleared')
  }

  size(): number {
    return this.entries.size
  }

  private async load(tag: string, now: number, ticket: LoadTicket): Promise<Authorization> {
    const record = await this.store.findIdTag(tag)
    const authorization = await this.evaluate(record, now)

    if (!ticket.stale) {
      this.remember(tag, authorization, now)
    }
    return authorization
  }

  private async evaluate(record: IdTagRecord | null, now: number): Promise<Authorization> {
    const own = ownAuthorization(record, now)
    if (!record || own.verdict !== 'Accepted' || !record.parentTag) {
      return own
    }

    const parent = ownAuthorization(await this.store.findIdTag(record.parentTag), now)
    if (parent.verdict !== 'Accepted') {
      return { ...own, verdict: parent.verdict }
    }
    return own
  }

  private remember(tag: string, authorization: Authorization, now: number): void {
    if (this.ttlMs <= 0) {
      return
    }
    if (!this.entries.has(tag) && this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (!oldest.done) {
        this.entries.delete(oldest.value)
      }
    }
    this.entries.set(tag, { authorization, cachedUntil: now + this.ttlMs })
  }
}

function ownAuthorization(record: IdTagRecord | null, now: number): Authorization {
  if (!record) {
    return { verdict: 'Invalid' }
  }
  const details: Authorization = {
    verdict: 'Accepted',
    ...(record.expiryDate ? { expiryDate: record.expiryDate } : {}),
    ...(record.parentTag ? { parentIdTag: record.parentTag } : {}),
  }
  return { ...details, verdict: ownVerdict(record, now) }
}

function ownVerdict(record: IdTagRecord, now: number): Verdict {
  if (record.status === 'Blocked') {
    return 'Blocked'
  }
  if (record.expiryDate && record.expiryDate.getTime() < now) {
    return 'Expired'
  }
  return record.status
}

function applyExpiry(authorization: Authorization, now: number): Authorization {
  if (
    authorization.verdict === 'Accepted' &&
    authorization.expiryDate &&
    authorization.expiryDate.getTime() < now
  ) {
    return { ...authorization, verdict: 'Expired' }
  }
  return authorization
}
