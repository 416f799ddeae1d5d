export type StationEventType =
  | 'StationBooted'
  | 'StationOnline'
  | 'StationOffline'
  | 'ConnectorStatusChanged'
  | 'DataTransferReceived'

export type SessionEventType =
  | 'SessionStarted'
  | 'SessionStopped'
  | 'SessionStopUnmatched'
  | 'MeterValuesReceived'

export type CommandEventType =
  | 'CommandDispatched'
  | 'CommandAccepted'
  | 'CommandRejected'
  | 'CommandTimeout'
  | 'CommandFailed'
  | 'CommandDuplicate'

export type DomainEvent = {
  eventId: string
  eventType: StationEventType | SessionEventType | CommandEventType
  source: string
  occurredAt: string
  correlationId?: string
  chargePointId?: string
  connectorId?: number
  transactionId?: number
  payload?: Record<string, unknown>
}
