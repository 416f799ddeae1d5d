import 'dotenv/config'
import { randomUUID } from 'crypto'
import { readFileSync } from 'fs'
import { WebSocket, type ClientOptions } from 'ws'

type Frame = unknown[]

type Pending = {
  resolve: (frame: Frame) => void
  reject: (error: Error) => void
  timeout: NodeJS.Timeout
}

class OcppTestClient {
  private readonly ws: WebSocket
  private readonly pending = new Map<string, Pending>()

  constructor(url: string, protocol: string) {
    this.ws = new WebSocket(url, protocol, buildClientOptions(url))
  }

  async connect(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.ws.once('open', () => resolve())
      this.ws.once('error', (err) => reject(err))
    })

    this.ws.on('message', (data) => {
      let message: unknown
      try {
        message = JSON.parse(data.toString())
      } catch {
        console.warn('Ignoring non-JSON frame')
        return
      }
      if (!Array.isArray(message) || typeof message[1] !== 'string') return
      const pending = this.pending.get(message[1])
      if (!pending) return

      clearTimeout(pending.timeout)
      this.pending.delete(message[1])
      pending.resolve(message)
    })
  }

  close(): void {
    this.ws.close()
  }

  call(action: string, payload: unknown, timeoutMs = 5000): Promise<Frame> {
    const uniqueId = randomUUID()
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending.delete(uniqueId)
        reject(new Error(`Timeout waiting for ${action}`))
      }, timeoutMs)

      this.pending.set(uniqueId, { resolve, reject, timeout })
      this.ws.send(JSON.stringify([2, uniqueId, action, payload]))
    })
  }
}

function buildClientOptions(url: string): ClientOptions {
  const options: ClientOptions = {}
  if (!url.startsWith('wss://')) {
    return options
  }
  const caPath = process.env.OCPP_CLIENT_CA_PATH
  if (caPath) {
    options.ca = readFileSync(caPath)
  }
  const rejectUnauthorized = process.env.OCPP_CLIENT_REJECT_UNAUTHORIZED
  if (rejectUnauthorized) {
    options.rejectUnauthorized = rejectUnauthorized !== 'false'
  }
  return options
}

function assert(condition: boolean, message: string): void {
  if (!condition) {
    throw new Error(message)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function resultPayload(frame: Frame, label: string): Record<string, unknown> {
  const payload = frame[2]
  if (frame[0] !== 3 || !isRecord(payload)) {
    throw new Error(`${label} should return a CALLRESULT with an object payload`)
  }
  return payload
}

function idTagStatus(payload: Record<string, unknown>): unknown {
  const info = payload.idTagInfo
  return isRecord(info) ? info.status : undefined
}

async function main(): Promise<void> {
  const url = process.env.OCPP_URL || 'ws://localhost:9000/ocpp/CP-SMOKE-001'
  const idTag = process.env.OCPP_SMOKE_ID_TAG || 'TAG-0001'
  const client = new OcppTestClient(url, 'ocpp1.6')
  await client.connect()

  const boot = resultPayload(
    await client.call('BootNotification', { chargePointVendor: 'Acme', chargePointModel: 'AC-22' }),
    'BootNotification'
  )
  assert(boot.status === 'Accepted', 'BootNotification should be Accepted')

  resultPayload(await client.call('Heartbeat', {}), 'Heartbeat')
  resultPayload(
    await client.call('StatusNotification', { connectorId: 1, errorCode: 'NoError', status: 'Available' }),
    'StatusNotification'
  )

  const invalid = await client.call('BootNotification', { chargePointVendor: 'Acme' })
  assert(invalid[0] === 4 && invalid[2] === 'FormationViolation', 'Invalid BootNotification should be rejected')

  const unsupported = await client.call('SignCertificate', { csr: 'x' })
  assert(unsupported[0] === 4 && unsupported[2] === 'NotImplemented', 'Unknown action should be NotImplemented')

  const startPayload = { connectorId: 1, idTag, meterStart: 100, timestamp: new Date().toISOString() }
  const start = resultPayload(await client.call('StartTransaction', startPayload), 'StartTransaction')
  assert(idTagStatus(start) === 'Accepted', `StartTransaction for ${idTag} should be Accepted`)
  const transactionId = start.transactionId
  assert(typeof transactionId === 'number' && transactionId > 0, 'StartTransaction should allocate an id')

  const second = resultPayload(await client.call('StartTransaction', startPayload), 'Second StartTransaction')
  assert(idTagStatus(second) === 'ConcurrentTx', 'Second start on a busy connector should be ConcurrentTx')

  resultPayload(
    await client.call('MeterValues', {
      connectorId: 1,
      transactionId,
      meterValue: [{ timestamp: new Date().toISOString(), sampledValue: [{ value: '125' }] }],
    }),
    'MeterValues'
  )

  const stopPayload = { transactionId, meterStop: 150, timestamp: new Date().toISOString() }
  resultPayload(await client.call('StopTransaction', stopPayload), 'StopTransaction')
  resultPayload(await client.call('StopTransaction', stopPayload), 'Repeated StopTransaction')

  const transfer = resultPayload(
    await client.call('DataTransfer', { vendorId: 'com.acme', messageId: 'Ping', data: 'hello' }),
    'DataTransfer'
  )
  assert(transfer.status === 'Accepted', 'DataTransfer should be Accepted')

  client.close()
  console.log('OCPP smoke tests passed')
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
