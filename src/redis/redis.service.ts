import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import Redis from 'ioredis'
import type { DependencyStatus } from '../kafka/kafka.service'
import { CircuitBreaker, CircuitOpenError } from '../resilience/circuit-breaker'

export type RedisClient = {
  get(key: string): Promise<string | null>
  setex(key: string, seconds: number, value: string): Promise<void>
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>
  del(key: string): Promise<number>
  ping(): Promise<string>
  quit(): Promise<void>
}

type Entry = {
  value: string
  expiresAt: number | null
}

const SWEEP_EVERY_WRITES = 128

export class InMemoryRedisClient implements RedisClient {
  private readonly store = new Map<string, Entry>()
  private writes = 0

  get size(): number {
    return this.store.size
  }

  async get(key: string): Promise<string | null> {
    return this.getEntry(key)?.value ?? null
  }

  async setex(key: string, seconds: number, value: string): Promise<void> {
    const now = Date.now()
    this.store.set(key, { value, expiresAt: seconds > 0 ? now + seconds * 1000 : null })
    this.writes += 1
    if (this.writes % SWEEP_EVERY_WRITES === 0) {
      this.sweep(now)
    }
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.getEntry(key)) {
      return false
    }
    await this.setex(key, ttlSeconds, value)
    return true
  }

  async del(key: string): Promise<number> {
    return this.store.delete(key) ? 1 : 0
  }

  async ping(): Promise<string> {
    return 'PONG'
  }

  async quit(): Promise<void> {
    this.store.clear()
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.store) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.store.delete(key)
      }
    }
  }

  private getEntry(key: string): Entry | null {
    const entry = this.store.get(key)
    if (!entry) return null
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.store.delete(key)
      return null
    }
    return entry
  }
}

class ResilientRedisClient implements RedisClient {
  constructor(
    private readonly client: Redis,
    private readonly breaker: CircuitBreaker,
    private readonly logger: Logger
  ) {}

  get(key: string): Promise<string | null> {
    return this.execute(() => this.client.get(key))
  }

  async setex(key: string, seconds: number, value: string): Promise<void> {
    await this.execute(() => this.client.setex(key, seconds, value))
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.execute(() => this.client.set(key, value, 'EX', ttlSeconds, 'NX'))
    return result === 'OK'
  }

  del(key: string): Promise<number> {
    return this.execute(() => this.client.del(key))
  }

  ping(): Promise<string> {
    return this.execute(() => this.client.ping())
  }

  async quit(): Promise<void> {
    await this.client.quit()
  }

  private async execute<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await this.breaker.execute(fn)
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        this.logger.warn('Redis circuit open; skipping command')
      }
      throw error
    }
  }
}

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: RedisClient
  private readonly logger = new Logger(RedisService.name)
  private readonly enabled: boolean

  constructor(private readonly config: ConfigService) {
    const url = this.config.get<string>('redis.url') ?? 'redis://localhost:6379'
    const keyPrefix = this.config.get<string>('redis.prefix') || 'ocpp'
    this.enabled = this.config.get<boolean>('redis.enabled') ?? true

    if (!this.enabled) {
      this.logger.warn('Redis disabled; using in-memory store')
      this.client = new InMemoryRedisClient()
      return
    }

    const maxAttempts = envInt('REDIS_RETRY_MAX_ATTEMPTS', 20)
    const initialDelay = envInt('REDIS_RETRY_INITIAL_DELAY_MS', 200)
    const maxDelay = envInt('REDIS_RETRY_MAX_DELAY_MS', 2000)
    const client = new Redis(url, {
      keyPrefix: `${keyPrefix}:`,
      lazyConnect: false,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) =>
        times > maxAttempts ? null : Math.min(initialDelay * Math.pow(2, times - 1), maxDelay),
    })
    client.on('error', (err: Error) => this.logger.error(`Redis error: ${err.message}`))
    const breaker = new CircuitBreaker({
      failureThreshold: envInt('REDIS_CIRCUIT_FAILURE_THRESHOLD', 5),
      openDurationMs: Math.max(1, envInt('REDIS_CIRCUIT_OPEN_SECONDS', 15)) * 1000,
      halfOpenSuccesses: envInt('REDIS_CIRCUIT_HALF_OPEN_SUCCESS', 2),
      onTransition: (from, to) => this.logger.warn(`Redis circuit ${from} -> ${to}`),
    })
    this.client = new ResilientRedisClient(client, breaker, this.logger)
  }

  getClient(): RedisClient {
    return this.client
  }

  isEnabled(): boolean {
    return this.enabled
  }

  async checkConnection(): Promise<DependencyStatus> {
    if (!this.enabled) {
      return { status: 'disabled' }
    }
    try {
      const response = await this.client.ping()
      return { status: response === 'PONG' ? 'up' : 'down' }
    } catch (error) {
      return { status: 'down', error: error instanceof Error ? error.message : String(error) }
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.client.quit()
  }
}

function envInt(key: string, fallback: number): number {
  const parsed = parseInt(process.env[key] || '', 10)
  return Number.isFinite(parsed) ? parsed : fallback
}
