import type { OcppErrorCode } from '../ocpp-envelope'
import type { InboundCall } from '../schemas/ocpp16.types'

export type OcppContext = {
  chargePointId: string
  connectionId: string
}

export type OcppError = {
  code: OcppErrorCode
  description: string
  details?: Record<string, unknown>
}

export type OcppHandlerResult = { response: object } | { error: OcppError }

export interface OcppAdapter {
  readonly version: string
  handleCall(call: InboundCall, context: OcppContext): Promise<OcppHandlerResult>
}
