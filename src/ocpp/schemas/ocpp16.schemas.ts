import type { SchemaObject } from 'ajv'
import { CONNECTOR_STATUSES } from '../../session/session.types'
import type { InboundAction, OutboundAction } from './ocpp16.types'

const stringRequired = { type: 'string', minLength: 1 }
const idToken = { type: 'string', minLength: 1, maxLength: 20 }
const integerNonNeg = { type: 'integer', minimum: 0 }
const timestamp = { type: 'string', format: 'date-time' }

const sampledValue: SchemaObject = {
  type: 'object',
  required: ['value'],
  properties: {
    value: { type: 'string' },
    context: { type: 'string' },
    format: { type: 'string', enum: ['Raw', 'SignedData'] },
    measurand: { type: 'string' },
    phase: { type: 'string' },
    location: { type: 'string' },
    unit: { type: 'string' },
  },
  additionalProperties: false,
}

const meterValue: SchemaObject = {
  type: 'object',
  required: ['timestamp', 'sampledValue'],
  properties: {
    timestamp,
    sampledValue: {
      type: 'array',
      minItems: 1,
      items: sampledValue,
    },
  },
  additionalProperties: false,
}

/** Requests received from charge points. */
export const OCPP16_REQUESTS: Record<InboundAction, SchemaObject> = {
  BootNotification: {
    type: 'object',
    required: ['chargePointVendor', 'chargePointModel'],
    properties: {
      chargePointVendor: { ...stringRequired, maxLength: 20 },
      chargePointModel: { ...stringRequired, maxLength: 20 },
      chargePointSerialNumber: { type: 'string', maxLength: 25 },
      chargeBoxSerialNumber: { type: 'string', maxLength: 25 },
      firmwareVersion: { type: 'string', maxLength: 50 },
      iccid: { type: 'string', maxLength: 20 },
      imsi: { type: 'string', maxLength: 20 },
      meterSerialNumber: { type: 'string', maxLength: 25 },
      meterType: { type: 'string', maxLength: 25 },
    },
    additionalProperties: false,
  },
  Heartbeat: {
    type: 'object',
    additionalProperties: false,
  },
  Authorize: {
    type: 'object',
    required: ['idTag'],
    properties: {
      idTag: idToken,
    },
    additionalProperties: false,
  },
  StatusNotification: {
    type: 'object',
    required: ['connectorId', 'errorCode', 'status'],
    properties: {
      connectorId: integerNonNeg,
      errorCode: stringRequired,
      status: { type: 'string', enum: [...CONNECTOR_STATUSES] },
      info: { type: 'string', maxLength: 50 },
      vendorId: { type: 'string', maxLength: 255 },
      vendorErrorCode: { type: 'string', maxLength: 50 },
      timestamp,
    },
    additionalProperties: false,
  },
  StartTransaction: {
    type: 'object',
    required: ['connectorId', 'idTag', 'meterStart', 'timestamp'],
    properties: {
      connectorId: { type: 'integer', minimum: 1 },
      idTag: idToken,
      meterStart: integerNonNeg,
      timestamp,
      reservationId: { type: 'integer' },
    },
    additionalProperties: false,
  },
  StopTransaction: {
    type: 'object',
    required: ['transactionId', 'meterStop', 'timestamp'],
    properties: {
      transactionId: { type: 'integer' },
      meterStop: integerNonNeg,
      timestamp,
      idTag: idToken,
      reason: { type: 'string' },
      transactionData: { type: 'array', items: meterValue },
    },
    additionalProperties: false,
  },
  MeterValues: {
    type: 'object',
    required: ['connectorId', 'meterValue'],
    properties: {
      connectorId: integerNonNeg,
      transactionId: { type: 'integer' },
      meterValue: {
        type: 'array',
        minItems: 1,
        items: meterValue,
      },
    },
    additionalProperties: false,
  },
  DataTransfer: {
    type: 'object',
    required: ['vendorId'],
    properties: {
      vendorId: { ...stringRequired, maxLength: 255 },
      messageId: { type: 'string', maxLength: 50 },
      data: { type: 'string' },
    },
    additionalProperties: false,
  },
}

/** Commands sent to charge points. */
export const OCPP16_COMMANDS: Record<OutboundAction, SchemaObject> = {
  RemoteStartTransaction: {
    type: 'object',
    required: ['idTag'],
    properties: {
      connectorId: { type: 'integer', minimum: 1 },
      idTag: idToken,
    },
    additionalProperties: false,
  },
  RemoteStopTransaction: {
    type: 'object',
    required: ['transactionId'],
    properties: {
      transactionId: { type: 'integer' },
    },
    additionalProperties: false,
  },
  ChangeAvailability: {
    type: 'object',
    required: ['connectorId', 'type'],
    properties: {
      connectorId: integerNonNeg,
      type: { type: 'string', enum: ['Inoperative', 'Operative'] },
    },
    additionalProperties: false,
  },
  Reset: {
    type: 'object',
    required: ['type'],
    properties: {
      type: { type: 'string', enum: ['Hard', 'Soft'] },
    },
    additionalProperties: false,
  },
  ChangeConfiguration: {
    type: 'object',
    required: ['key', 'value'],
    properties: {
      key: { ...stringRequired, maxLength: 50 },
      value: { type: 'string', maxLength: 500 },
    },
    additionalProperties: false,
  },
  GetConfiguration: {
    type: 'object',
    properties: {
      key: {
        type: 'array',
        items: { ...stringRequired, maxLength: 50 },
      },
    },
    additionalProperties: false,
  },
  ClearCache: {
    type: 'object',
    additionalProperties: false,
  },
}
