import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { MetricsService } from '../metrics/metrics.service'
import { ConnectionRegistry } from './connection-registry.service'
import { SessionCoordinator } from './session-coordinator.service'

/**
 * Periodic sweep that demotes charge points whose last inbound traffic is
 * older than the missed-heartbeat deadline.
 */
@Injectable()
export class LivenessMonitor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LivenessMonitor.name)
  private readonly intervalMs: number
  private readonly deadlineMs: number
  private timer: NodeJS.Timeout | null = null
  private running = false

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly coordinator: SessionCoordinator,
    private readonly metrics: MetricsService,
    config: ConfigService
  ) {
    const heartbeatSeconds = config.get<number>('ocpp.heartbeatIntervalSeconds') ?? 300
    const factor = config.get<number>('ocpp.missedHeartbeatFactor') ?? 2.5
    this.deadlineMs = heartbeatSeconds * factor * 1000
    this.intervalMs = config.get<number>('ocpp.livenessSweepMs') ?? Math.round((heartbeatSeconds * 1000) / 3)
  }

  onModuleInit(): void {
    this.timer = setInterval(() => {
      void this.tick()
    }, this.intervalMs)
    this.timer.unref()
    this.logger.log(`Liveness sweep every ${this.intervalMs}ms, deadline ${this.deadlineMs}ms`)
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  get missedHeartbeatDeadlineMs(): number {
    return this.deadlineMs
  }

  /** Runs one sweep; returns the ids demoted. A tick that overlaps a running one is skipped. */
  async tick(now = Date.now()): Promise<string[]> {
    if (this.running) {
      return []
    }
    this.running = true
    const demoted: string[] = []
    try {
      for (const stale of this.registry.staleEntries(now, this.deadlineMs)) {
        try {
          if (await this.coordinator.expire(stale.chargePointId, stale.handle, now, this.deadlineMs)) {
            demoted.push(stale.chargePointId)
          }
        } catch (error) {
          this.logger.error(
            `Failed to demote ${stale.chargePointId}: ${
              error instanceof Error ? error.message : String(error)
            }`
          )
        }
      }
    } finally {
      this.running = false
    }
    if (demoted.length > 0) {
      this.metrics.increment('ocpp_liveness_demotions_total', {}, demoted.length)
    }
    return demoted
  }
}
