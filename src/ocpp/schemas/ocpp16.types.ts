import type { ConnectorStatus, TagStatus } from '../../session/session.types'

export type AuthorizationStatus = TagStatus | 'ConcurrentTx'

export type IdTagInfo = {
  status: AuthorizationStatus
  expiryDate?: string
  parentIdTag?: string
}

export type SampledValue = {
  value: string
  context?: string
  format?: string
  measurand?: string
  phase?: string
  location?: string
  unit?: string
}

export type MeterValue = {
  timestamp: string
  sampledValue: SampledValue[]
}

export type BootNotificationRequest = {
  chargePointVendor: string
  chargePointModel: string
  chargePointSerialNumber?: string
  chargeBoxSerialNumber?: string
  firmwareVersion?: string
  iccid?: string
  imsi?: string
  meterSerialNumber?: string
  meterType?: string
}

export type HeartbeatRequest = Record<string, never>

export type AuthorizeRequest = {
  idTag: string
}

export type StatusNotificationRequest = {
  connectorId: number
  errorCode: string
  status: ConnectorStatus
  info?: string
  vendorId?: string
  vendorErrorCode?: string
  timestamp?: string
}

export type StartTransactionRequest = {
  connectorId: number
  idTag: string
  meterStart: number
  timestamp: string
  reservationId?: number
}

export type StopTransactionRequest = {
  transactionId: number
  meterStop: number
  timestamp: string
  idTag?: string
  reason?: string
  transactionData?: MeterValue[]
}

export type MeterValuesRequest = {
  connectorId: number
  transactionId?: number
  meterValue: MeterValue[]
}

export type DataTransferRequest = {
  vendorId: string
  messageId?: string
  data?: string
}

/** Requests a charge point sends to the central system. */
export type InboundRequests = {
  BootNotification: BootNotificationRequest
  Heartbeat: HeartbeatRequest
  Authorize: AuthorizeRequest
  StatusNotification: StatusNotificationRequest
  StartTransaction: StartTransactionRequest
  StopTransaction: StopTransactionRequest
  MeterValues: MeterValuesRequest
  DataTransfer: DataTransferRequest
}

export type InboundAction = keyof InboundRequests

export type InboundCall = {
  [K in InboundAction]: { action: K; payload: InboundRequests[K] }
}[InboundAction]

export type RegistrationStatus = 'Accepted' | 'Pending' | 'Rejected'

export type InboundResponses = {
  BootNotification: { status: RegistrationStatus; currentTime: string; interval: number }
  Heartbeat: { currentTime: string }
  Authorize: { idTagInfo: IdTagInfo }
  StatusNotification: Record<string, never>
  StartTransaction: { transactionId: number; idTagInfo: IdTagInfo }
  StopTransaction: { idTagInfo?: IdTagInfo }
  MeterValues: Record<string, never>
  DataTransfer: { status: 'Accepted' | 'Rejected' | 'UnknownMessageId' | 'UnknownVendorId'; data?: string }
}

export type AvailabilityType = 'Inoperative' | 'Operative'
export type ResetType = 'Hard' | 'Soft'

/** Commands the central system sends to a charge point. */
export type OutboundRequests = {
  RemoteStartTransaction: { idTag: string; connectorId?: number }
  RemoteStopTransaction: { transactionId: number }
  ChangeAvailability: { connectorId: number; type: AvailabilityType }
  Reset: { type: ResetType }
  ChangeConfiguration: { key: string; value: string }
  GetConfiguration: { key?: string[] }
  ClearCache: Record<string, never>
}

export type KeyValue = {
  key: string
  readonly: boolean
  value?: string
}

export type OutboundReplies = {
  RemoteStartTransaction: { status: 'Accepted' | 'Rejected' }
  RemoteStopTransaction: { status: 'Accepted' | 'Rejected' }
  ChangeAvailability: { status: 'Accepted' | 'Rejected' | 'Scheduled' }
  Reset: { status: 'Accepted' | 'Rejected' }
  ChangeConfiguration: { status: 'Accepted' | 'Rejected' | 'RebootRequired' | 'NotSupported' }
  GetConfiguration: { configurationKey?: KeyValue[]; unknownKey?: string[] }
  ClearCache: { status: 'Accepted' | 'Rejected' }
}

export type OutboundAction = keyof OutboundRequests
