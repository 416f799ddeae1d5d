import { isRecord } from '../ocpp/ocpp-envelope'
import type { AvailabilityType, ResetType } from '../ocpp/schemas/ocpp16.types'

/**
 * Wire shape of an administrative command:
 * `{ commandId, commandType, chargePointId, payload?, requestedAt?, timeoutSec? }`.
 */
export type CommandEnvelope = {
  commandId: string
  chargePointId: string
  requestedAt?: string
  timeoutSec?: number
}

export type CommandBody =
  | { commandType: 'RemoteStart'; idTag: string; connectorId?: number }
  | { commandType: 'RemoteStop'; transactionId: number }
  | { commandType: 'ChangeAvailability'; connectorId: number; availability: AvailabilityType }
  | { commandType: 'Reset'; resetType: ResetType }
  | { commandType: 'ChangeConfiguration'; key: string; value: string }
  | { commandType: 'GetConfiguration'; keys?: string[] }
  | { commandType: 'ClearCache' }
  | { commandType: 'GetStatus' }

export type AdminCommand = CommandEnvelope & CommandBody

export type CommandType = CommandBody['commandType']

export type CommandParseResult =
  | { ok: true; command: AdminCommand }
  | { ok: false; error: string; commandId?: string; chargePointId?: string }

export function parseAdminCommand(raw: unknown): CommandParseResult {
  if (!isRecord(raw)) {
    return { ok: false, error: 'Command must be a JSON object' }
  }
  const commandId = nonEmptyString(raw.commandId)
  const chargePointId = nonEmptyString(raw.chargePointId)
  if (!commandId) {
    return { ok: false, error: 'Missing commandId', chargePointId }
  }
  if (!chargePointId) {
    return { ok: false, error: 'Missing chargePointId', commandId }
  }

  const envelope: CommandEnvelope = { commandId, chargePointId }
  const requestedAt = nonEmptyString(raw.requestedAt)
  if (requestedAt) {
    envelope.requestedAt = requestedAt
  }
  if (typeof raw.timeoutSec === 'number' && raw.timeoutSec > 0) {
    envelope.timeoutSec = raw.timeoutSec
  }

  const payload = isRecord(raw.payload) ? raw.payload : {}
  const body = parseBody(raw.commandType, payload)
  if (typeof body === 'string') {
    return { ok: false, error: body, commandId, chargePointId }
  }
  return { ok: true, command: { ...envelope, ...body } }
}

function parseBody(commandType: unknown, payload: Record<string, unknown>): CommandBody | string {
  switch (commandType) {
    case 'RemoteStart': {
      const idTag = nonEmptyString(payload.idTag)
      if (!idTag) {
        return 'RemoteStart requires payload.idTag'
      }
      const connectorId = optionalInteger(payload.connectorId)
      return connectorId === undefined
        ? { commandType: 'RemoteStart', idTag }
        : { commandType: 'RemoteStart', idTag, connectorId }
    }
    case 'RemoteStop': {
      const transactionId = optionalInteger(payload.transactionId)
      if (transactionId === undefined) {
        return 'RemoteStop requires an integer payload.transactionId'
      }
      return { commandType: 'RemoteStop', transactionId }
    }
    case 'ChangeAvailability': {
      const connectorId = optionalInteger(payload.connectorId)
      const availability = payload.type
      if (connectorId === undefined || connectorId < 0) {
        return 'ChangeAvailability requires payload.connectorId'
      }
      if (!isAvailabilityType(availability)) {
        return 'ChangeAvailability requires payload.type Operative or Inoperative'
      }
      return { commandType: 'ChangeAvailability', connectorId, availability }
    }
    case 'Reset': {
      const resetType = payload.type ?? 'Soft'
      if (!isResetType(resetType)) {
        return 'Reset payload.type must be Soft or Hard'
      }
      return { commandType: 'Reset', resetType }
    }
    case 'ChangeConfiguration': {
      const key = nonEmptyString(payload.key)
      if (!key || typeof payload.value !== 'string') {
        return 'ChangeConfiguration requires payload.key and payload.value'
      }
      return { commandType: 'ChangeConfiguration', key, value: payload.value }
    }
    case 'GetConfiguration': {
      if (payload.keys === undefined) {
        return { commandType: 'GetConfiguration' }
      }
      const keys = payload.keys
      if (!Array.isArray(keys) || !keys.every((key): key is string => typeof key === 'string')) {
        return 'GetConfiguration payload.keys must be a list of strings'
      }
      return { commandType: 'GetConfiguration', keys }
    }
    case 'ClearCache':
      return { commandType: 'ClearCache' }
    case 'GetStatus':
      return { commandType: 'GetStatus' }
    default:
      return `Unsupported commandType ${String(commandType)}`
  }
}

function isAvailabilityType(value: unknown): value is AvailabilityType {
  return value === 'Operative' || value === 'Inoperative'
}

function isResetType(value: unknown): value is ResetType {
  return value === 'Soft' || value === 'Hard'
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function optionalInteger(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined
}
