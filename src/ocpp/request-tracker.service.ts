import { Injectable, Logger } from '@nestjs/common'
import { MetricsService } from '../metrics/metrics.service'

export type TrackedReply =
  | { status: 'result'; payload: unknown }
  | {
      status: 'error'
      errorCode: string
      errorDescription: string
      errorDetails: Record<string, unknown>
    }
  | { status: 'timeout' }

export type Registration =
  | { status: 'registered'; reply: Promise<TrackedReply> }
  | { status: 'busy'; pendingAction: string }

type PendingCommand = {
  chargePointId: string
  uniqueId: string
  action: string
  createdAt: number
  timeout: NodeJS.Timeout
  resolve: (reply: TrackedReply) => void
}

const EXPIRED_MEMORY = 1000

/**
 * Outbound CALLs awaiting a correlated reply. At most one command per charge
 * point is in flight.
 */
@Injectable()
export class OcppRequestTracker {
  private readonly logger = new Logger(OcppRequestTracker.name)
  private readonly pending = new Map<string, PendingCommand>()
  private readonly byChargePoint = new Map<string, string>()
  private readonly expired = new Set<string>()

  constructor(private readonly metrics: MetricsService) {}

  register(chargePointId: string, uniqueId: string, action: string, timeoutMs: number): Registration {
    const current = this.byChargePoint.get(chargePointId)
    const inFlight = current ? this.pending.get(current) : undefined
    if (inFlight) {
      return { status: 'busy', pendingAction: inFlight.action }
    }

    let resolveReply: (reply: TrackedReply) => void = () => undefined
    const reply = new Promise<TrackedReply>((resolve) => {
      resolveReply = resolve
    })

    const timeout = setTimeout(() => {
      if (!this.settle(uniqueId)) {
        return
      }
      this.rememberExpired(uniqueId)
      this.metrics.increment('ocpp_timeouts_total', { direction: 'outbound', action })
      this.logger.warn(`${action} to ${chargePointId} timed out after ${timeoutMs}ms`)
      resolveReply({ status: 'timeout' })
    }, timeoutMs)

    this.pending.set(uniqueId, {
      chargePointId,
      uniqueId,
      action,
      createdAt: Date.now(),
      timeout,
      resolve: resolveReply,
    })
    this.byChargePoint.set(chargePointId, uniqueId)
    return { status: 'registered', reply }
  }

  /** Drops a registration whose CALL never left the process. */
  release(uniqueId: string): void {
    this.settle(uniqueId)
  }

  handleCallResult(chargePointId: string, uniqueId: string, payload: unknown): boolean {
    const pending = this.claim(chargePointId, uniqueId)
    if (!pending) {
      return false
    }
    this.metrics.increment('ocpp_command_replies_total', { action: pending.action, outcome: 'result' })
    pending.resolve({ status: 'result', payload })
    return true
  }

  handleCallError(
    chargePointId: string,
    uniqueId: string,
    errorCode: string,
    errorDescription: string,
    errorDetails: Record<string, unknown>
  ): boolean {
    const pending = this.claim(chargePointId, uniqueId)
    if (!pending) {
      return false
    }
    this.metrics.increment('ocpp_error_codes_total', { code: errorCode, direction: 'outbound' })
    this.metrics.increment('ocpp_command_replies_total', { action: pending.action, outcome: 'error' })
    pending.resolve({ status: 'error', errorCode, errorDescription, errorDetails })
    return true
  }

  hasPending(chargePointId: string): boolean {
    return this.byChargePoint.has(chargePointId)
  }

  pendingCount(): number {
    return this.pending.size
  }

  private claim(chargePointId: string, uniqueId: string): PendingCommand | null {
    const pending = this.pending.get(uniqueId)
    if (!pending || pending.chargePointId !== chargePointId) {
      const late = this.expired.has(uniqueId)
      this.metrics.increment('ocpp_discarded_replies_total', { reason: late ? 'late' : 'unknown' })
      this.logger.warn(
        late
          ? `Discarding late reply ${uniqueId} from ${chargePointId}`
          : `Discarding reply ${uniqueId} from ${chargePointId} with no pending command`
      )
      return null
    }
    this.settle(uniqueId)
    this.logger.debug(
      `${pending.action} reply from ${chargePointId} after ${Date.now() - pending.createdAt}ms`
    )
    return pending
  }

  private settle(uniqueId: string): PendingCommand | null {
    const pending = this.pending.get(uniqueId)
    if (!pending) {
      return null
    }
    clearTimeout(pending.timeout)
    this.pending.delete(uniqueId)
    if (this.byChargePoint.get(pending.chargePointId) === uniqueId) {
      this.byChargePoint.delete(pending.chargePointId)
    }
    return pending
  }

  private rememberExpired(uniqueId: string): void {
    this.expired.add(uniqueId)
    if (this.expired.size > EXPIRED_MEMORY) {
      const oldest = this.expired.values().next()
      if (!oldest.done) {
        this.expired.delete(oldest.value)
      }
    }
  }
}
