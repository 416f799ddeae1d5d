import { Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { OnGatewayConnection, OnGatewayDisconnect, WebSocketGateway } from '@nestjs/websockets'
import { randomUUID } from 'crypto'
import { IncomingMessage } from 'http'
import { WebSocket, type RawData } from 'ws'
import { LogContextService } from '../logging/log-context.service'
import { MetricsService } from '../metrics/metrics.service'
import { KeyedMutex } from '../session/keyed-mutex'
import { SessionCoordinator } from '../session/session-coordinator.service'
import { parseFrame } from './ocpp-envelope'
import { OcppService } from './ocpp.service'
import { WsConnectionHandle } from './ws-connection-handle'

const MAX_CHARGE_POINT_ID_LENGTH = 48

type ConnectionState = {
  handle: WsConnectionHandle
  ip: string
  registered: boolean
  pending: RawData[]
}

@WebSocketGateway({ path: '/ocpp' })
export class OcppGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(OcppGateway.name)
  private readonly maxPayloadBytes: number
  private readonly pendingMessageLimit: number
  private readonly states = new WeakMap<WebSocket, ConnectionState>()
  // Frames from one connection are handled in arrival order.
  private readonly inbound = new KeyedMutex()

  constructor(
    private readonly coordinator: SessionCoordinator,
    private readonly ocppService: OcppService,
    private readonly metrics: MetricsService,
    private readonly logContext: LogContextService,
    config: ConfigService
  ) {
    const maxPayload = config.get<number>('ocpp.maxPayloadBytes') ?? 65536
    this.maxPayloadBytes = maxPayload > 0 ? maxPayload : 0
    const pendingLimit = config.get<number>('ocpp.pendingMessageLimit') ?? 100
    this.pendingMessageLimit = pendingLimit > 0 ? pendingLimit : 0
  }

  async handleConnection(client: WebSocket, request: IncomingMessage): Promise<void> {
    const connectionId = randomUUID()
    const ip = clientIp(request)
    await this.logContext.runWithContext(
      { correlationId: connectionId, connectionId, ip, path: request.url || '' },
      async () => {
        const chargePointId = parseChargePointId(request.url)
        if (!chargePointId) {
          this.logger.warn(`Rejected connection on invalid path ${request.url ?? ''}`)
          client.close(1008, 'Invalid OCPP path')
          return
        }
        this.logContext.setContext({ chargePointId })

        const state: ConnectionState = {
          handle: new WsConnectionHandle(chargePointId, connectionId, client),
          ip,
          registered: false,
          pending: [],
        }
        this.states.set(client, state)

        client.on('message', (data: RawData) => {
          if (!state.registered) {
            if (this.pendingMessageLimit > 0 && state.pending.length >= this.pendingMessageLimit) {
              this.metrics.increment('ocpp_pending_overflow_total')
              this.logger.warn('Pending message limit exceeded before registration; closing connection')
              client.close(1013, 'Too many pending messages')
              return
            }
            state.pending.push(data)
            return
          }
          this.enqueue(data, state)
        })

        try {
          await this.coordinator.onConnect(state.handle)
        } catch (error) {
          this.logger.error(`Failed to register ${chargePointId}: ${describe(error)}`)
          client.close(1011, 'Registration failed')
          return
        }
        state.registered = true
        for (const data of state.pending.splice(0, state.pending.length)) {
          this.enqueue(data, state)
        }
        this.logger.log(`Connected ${chargePointId}`)
      }
    )
  }

  async handleDisconnect(client: WebSocket): Promise<void> {
    const state = this.states.get(client)
    if (!state) {
      return
    }
    this.states.delete(client)
    const { handle } = state
    await this.logContext.runWithContext(
      {
        correlationId: handle.connectionId,
        connectionId: handle.connectionId,
        chargePointId: handle.chargePointId,
        ip: state.ip,
      },
      async () => {
        if (!state.registered) {
          return
        }
        try {
          await this.coordinator.onDisconnect(handle)
          this.logger.log(`Disconnected ${handle.chargePointId}`)
        } catch (error) {
          this.logger.error(`Failed to unregister ${handle.chargePointId}: ${describe(error)}`)
        }
      }
    )
  }

  private enqueue(data: RawData, state: ConnectionState): void {
    void this.inbound.runExclusive(state.handle.connectionId, () => this.handleMessage(data, state))
  }

  private async handleMessage(data: RawData, state: ConnectionState): Promise<void> {
    const { handle } = state
    const correlationId = randomUUID()
    await this.logContext.runWithContext(
      {
        correlationId,
        connectionId: handle.connectionId,
        chargePointId: handle.chargePointId,
        ip: state.ip,
      },
      async () => {
        const size = payloadSize(data)
        if (this.maxPayloadBytes > 0 && size > this.maxPayloadBytes) {
          this.metrics.increment('ocpp_payload_too_large_total')
          this.logger.warn(`Payload of ${size} bytes exceeds the configured limit`)
          handle.close(1009, 'Payload too large')
          return
        }

        const raw = rawToString(data)
        this.metrics.increment('ocpp_inbound_total')
        this.metrics.observeRate('ocpp_inbound_rate_per_sec')

        const peeked = parseFrame(raw)
        if (peeked.ok) {
          this.logContext.setContext({
            messageId: peeked.frame.uniqueId,
            correlationId: peeked.frame.uniqueId,
            action: peeked.frame.type === 'call' ? peeked.frame.action : undefined,
          })
        }

        try {
          const reply = await this.ocppService.handleIncoming(raw, {
            chargePointId: handle.chargePointId,
            connectionId: handle.connectionId,
          })
          if (reply) {
            handle.send(reply)
            this.metrics.increment('ocpp_outbound_total')
            this.metrics.observeRate('ocpp_outbound_rate_per_sec')
          }
        } catch (error) {
          this.logger.error(`Failed to handle frame from ${handle.chargePointId}: ${describe(error)}`)
        }
      }
    )
  }
}

/** Extracts `<id>` from `/ocpp/<id>`; null when missing, malformed or too long. */
export function parseChargePointId(url: string | undefined): string | null {
  const path = (url || '').split('?')[0]
  const parts = path.split('/').filter(Boolean)
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'ocpp') {
    return null
  }
  let chargePointId: string
  try {
    chargePointId = decodeURIComponent(parts[1])
  } catch {
    return null
  }
  if (chargePointId.length === 0 || chargePointId.length > MAX_CHARGE_POINT_ID_LENGTH) {
    return null
  }
  return chargePointId
}

function clientIp(request: IncomingMessage): string {
  const forwarded = request.headers['x-forwarded-for']
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(',')[0]
  return first?.trim() || request.socket.remoteAddress || 'unknown'
}

function payloadSize(data: RawData): number {
  if (Buffer.isBuffer(data)) {
    return data.length
  }
  if (Array.isArray(data)) {
    return data.reduce((sum, chunk) => sum + chunk.length, 0)
  }
  return data.byteLength
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8')
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  return Buffer.from(data).toString('utf8')
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
