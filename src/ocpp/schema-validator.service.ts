import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv'
import addFormats from 'ajv-formats'
import { Injectable } from '@nestjs/common'
import { OCPP16_COMMANDS, OCPP16_REQUESTS } from './schemas/ocpp16.schemas'
import { OCPP16_COMMAND_REPLIES, OCPP16_RESPONSES } from './schemas/ocpp16.responses'
import type {
  InboundAction,
  InboundCall,
  InboundRequests,
  OutboundAction,
  OutboundReplies,
} from './schemas/ocpp16.types'

export type ValidationResult = { valid: true } | { valid: false; errors: string[] }

export type ParsedInbound =
  | { ok: true; call: InboundCall }
  | { ok: false; reason: 'unsupported' | 'invalid'; errors: string[] }

export type ParsedReply<A extends OutboundAction> =
  | { ok: true; reply: OutboundReplies[A] }
  | { ok: false; errors: string[] }

type RequestValidators = { [K in InboundAction]: ValidateFunction<InboundRequests[K]> }
type ReplyValidators = { [K in OutboundAction]: ValidateFunction<OutboundReplies[K]> }

@Injectable()
export class OcppSchemaValidator {
  private readonly requests: RequestValidators
  private readonly responses: Record<InboundAction, ValidateFunction>
  private readonly commands: Record<OutboundAction, ValidateFunction>
  private readonly replies: ReplyValidators

  constructor() {
    const ajv = new Ajv({
      allErrors: true,
      strict: true,
      strictSchema: false,
      strictTypes: false,
    })
    addFormats(ajv)

    this.requests = {
      BootNotification: ajv.compile<InboundRequests['BootNotification']>(
        OCPP16_REQUESTS.BootNotification
      ),
      Heartbeat: ajv.compile<InboundRequests['Heartbeat']>(OCPP16_REQUESTS.Heartbeat),
      Authorize: ajv.compile<InboundRequests['Authorize']>(OCPP16_REQUESTS.Authorize),
      StatusNotification: ajv.compile<InboundRequests['StatusNotification']>(
        OCPP16_REQUESTS.StatusNotification
      ),
      StartTransaction: ajv.compile<InboundRequests['StartTransaction']>(
        OCPP16_REQUESTS.StartTransaction
      ),
      StopTransaction: ajv.compile<InboundRequests['StopTransaction']>(
        OCPP16_REQUESTS.StopTransaction
      ),
      MeterValues: ajv.compile<InboundRequests['MeterValues']>(OCPP16_REQUESTS.MeterValues),
      DataTransfer: ajv.compile<InboundRequests['DataTransfer']>(OCPP16_REQUESTS.DataTransfer),
    }
    this.replies = {
      RemoteStartTransaction: ajv.compile<OutboundReplies['RemoteStartTransaction']>(
        OCPP16_COMMAND_REPLIES.RemoteStartTransaction
      ),
      RemoteStopTransaction: ajv.compile<OutboundReplies['RemoteStopTransaction']>(
        OCPP16_COMMAND_REPLIES.RemoteStopTransaction
      ),
      ChangeAvailability: ajv.compile<OutboundReplies['ChangeAvailability']>(
        OCPP16_COMMAND_REPLIES.ChangeAvailability
      ),
      Reset: ajv.compile<OutboundReplies['Reset']>(OCPP16_COMMAND_REPLIES.Reset),
      ChangeConfiguration: ajv.compile<OutboundReplies['ChangeConfiguration']>(
        OCPP16_COMMAND_REPLIES.ChangeConfiguration
      ),
      GetConfiguration: ajv.compile<OutboundReplies['GetConfiguration']>(
        OCPP16_COMMAND_REPLIES.GetConfiguration
      ),
      ClearCache: ajv.compile<OutboundReplies['ClearCache']>(
        OCPP16_COMMAND_REPLIES.ClearCache
      ),
    }
    this.responses = {
      BootNotification: ajv.compile(OCPP16_RESPONSES.BootNotification),
      Heartbeat: ajv.compile(OCPP16_RESPONSES.Heartbeat),
      Authorize: ajv.compile(OCPP16_RESPONSES.Authorize),
      StatusNotification: ajv.compile(OCPP16_RESPONSES.StatusNotification),
      StartTransaction: ajv.compile(OCPP16_RESPONSES.StartTransaction),
      StopTransaction: ajv.compile(OCPP16_RESPONSES.StopTransaction),
      MeterValues: ajv.compile(OCPP16_RESPONSES.MeterValues),
      DataTransfer: ajv.compile(OCPP16_RESPONSES.DataTransfer),
    }
    this.commands = {
      RemoteStartTransaction: ajv.compile(OCPP16_COMMANDS.RemoteStartTransaction),
      RemoteStopTransaction: ajv.compile(OCPP16_COMMANDS.RemoteStopTransaction),
      ChangeAvailability: ajv.compile(OCPP16_COMMANDS.ChangeAvailability),
      Reset: ajv.compile(OCPP16_COMMANDS.Reset),
      ChangeConfiguration: ajv.compile(OCPP16_COMMANDS.ChangeConfiguration),
      GetConfiguration: ajv.compile(OCPP16_COMMANDS.GetConfiguration),
      ClearCache: ajv.compile(OCPP16_COMMANDS.ClearCache),
    }
  }

  isSupported(action: string): action is InboundAction {
    return Object.prototype.hasOwnProperty.call(this.requests, action)
  }

  parseInbound(action: string, payload: unknown): ParsedInbound {
    if (!this.isSupported(action)) {
      return { ok: false, reason: 'unsupported', errors: [] }
    }
    switch (action) {
      case 'BootNotification':
        return this.check(action, payload)
      case 'Heartbeat':
        return this.check(action, payload)
      case 'Authorize':
        return this.check(action, payload)
      case 'StatusNotification':
        return this.check(action, payload)
      case 'StartTransaction':
        return this.check(action, payload)
      case 'StopTransaction':
        return this.check(action, payload)
      case 'MeterValues':
        return this.check(action, payload)
      case 'DataTransfer':
        return this.check(action, payload)
    }
  }

  validateResponse(action: InboundAction, payload: unknown): ValidationResult {
    return run(this.responses[action], payload)
  }

  validateCommand(action: OutboundAction, payload: unknown): ValidationResult {
    return run(this.commands[action], payload)
  }

  parseReply<A extends OutboundAction>(action: A, payload: unknown): ParsedReply<A> {
    const validate: ValidateFunction<OutboundReplies[A]> = this.replies[action]
    if (validate(payload)) {
      return { ok: true, reply: payload }
    }
    return { ok: false, errors: formatErrors(validate.errors) }
  }

  private check<K extends InboundAction>(
    action: K,
    payload: unknown
  ):
    | { ok: true; call: { action: K; payload: InboundRequests[K] } }
    | { ok: false; reason: 'invalid'; errors: string[] } {
    const validate: ValidateFunction<InboundRequests[K]> = this.requests[action]
    if (validate(payload)) {
      return { ok: true, call: { action, payload } }
    }
    return { ok: false, reason: 'invalid', errors: formatErrors(validate.errors) }
  }
}

function run(validate: ValidateFunction, payload: unknown): ValidationResult {
  if (validate(payload)) {
    return { valid: true }
  }
  return { valid: false, errors: formatErrors(validate.errors) }
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => {
    const path = error.instancePath || '/'
    const message = error.message || 'invalid'
    return `${path} ${message}`.trim()
  })
}
