import type { SchemaObject } from 'ajv'
import { TAG_STATUSES } from '../../session/session.types'
import type { InboundAction, OutboundAction } from './ocpp16.types'

const integerNonNeg = { type: 'integer', minimum: 0 }
const timestamp = { type: 'string', format: 'date-time' }
const empty: SchemaObject = { type: 'object', additionalProperties: false }

const idTagInfo: SchemaObject = {
  type: 'object',
  required: ['status'],
  properties: {
    status: { type: 'string', enum: [...TAG_STATUSES, 'ConcurrentTx'] },
    expiryDate: timestamp,
    parentIdTag: { type: 'string', maxLength: 20 },
  },
  additionalProperties: false,
}

function statusOf(...values: string[]): SchemaObject {
  return {
    type: 'object',
    required: ['status'],
    properties: {
      status: { type: 'string', enum: values },
    },
    additionalProperties: true,
  }
}

/** Responses the central system returns to charge point requests. */
export const OCPP16_RESPONSES: Record<InboundAction, SchemaObject> = {
  BootNotification: {
    type: 'object',
    required: ['status', 'currentTime', 'interval'],
    properties: {
      status: { type: 'string', enum: ['Accepted', 'Pending', 'Rejected'] },
      currentTime: timestamp,
      interval: integerNonNeg,
    },
    additionalProperties: false,
  },
  Heartbeat: {
    type: 'object',
    required: ['currentTime'],
    properties: {
      currentTime: timestamp,
    },
    additionalProperties: false,
  },
  Authorize: {
    type: 'object',
    required: ['idTagInfo'],
    properties: {
      idTagInfo,
    },
    additionalProperties: false,
  },
  StatusNotification: empty,
  StartTransaction: {
    type: 'object',
    required: ['transactionId', 'idTagInfo'],
    properties: {
      transactionId: { type: 'integer' },
      idTagInfo,
    },
    additionalProperties: false,
  },
  StopTransaction: {
    type: 'object',
    properties: {
      idTagInfo,
    },
    additionalProperties: false,
  },
  MeterValues: empty,
  DataTransfer: {
    type: 'object',
    required: ['status'],
    properties: {
      status: { type: 'string', enum: ['Accepted', 'Rejected', 'UnknownMessageId', 'UnknownVendorId'] },
      data: { type: 'string' },
    },
    additionalProperties: false,
  },
}

/** Replies charge points send to central system commands. */
export const OCPP16_COMMAND_REPLIES: Record<OutboundAction, SchemaObject> = {
  RemoteStartTransaction: statusOf('Accepted', 'Rejected'),
  RemoteStopTransaction: statusOf('Accepted', 'Rejected'),
  ChangeAvailability: statusOf('Accepted', 'Rejected', 'Scheduled'),
  Reset: statusOf('Accepted', 'Rejected'),
  ChangeConfiguration: statusOf('Accepted', 'Rejected', 'RebootRequired', 'NotSupported'),
  GetConfiguration: {
    type: 'object',
    properties: {
      configurationKey: {
        type: 'array',
        items: {
          type: 'object',
          required: ['key', 'readonly'],
          properties: {
            key: { type: 'string' },
            readonly: { type: 'boolean' },
            value: { type: 'string' },
          },
          additionalProperties: true,
        },
      },
      unknownKey: {
        type: 'array',
        items: { type: 'string' },
      },
    },
    additionalProperties: true,
  },
  ClearCache: statusOf('Accepted', 'Rejected'),
}
