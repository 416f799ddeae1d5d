export type Reachability = 'Unknown' | 'Online' | 'Offline'

export type Availability = 'Operative' | 'Inoperative'

export const CONNECTOR_STATUSES = [
  'Available',
  'Preparing',
  'Charging',
  'SuspendedEVSE',
  'SuspendedEV',
  'Finishing',
  'Reserved',
  'Unavailable',
  'Faulted',
] as const

export type ConnectorStatus = (typeof CONNECTOR_STATUSES)[number]

export const TAG_STATUSES = ['Accepted', 'Blocked', 'Expired', 'Invalid'] as const

export type TagStatus = (typeof TAG_STATUSES)[number]

/** Outcome of resolving an identity tag. */
export type Verdict = TagStatus

export type Authorization = {
  verdict: Verdict
  expiryDate?: Date
  parentIdTag?: string
}

export type SessionStatus = 'Active' | 'Completed'

export type MeterSampleInput = {
  sampledAt: Date
  value: number
  measurand: string
  unit: string
  phase?: string
  context?: string
  location?: string
}

export const DEFAULT_MEASURAND = 'Energy.Active.Import.Register'
export const DEFAULT_UNIT = 'Wh'

/**
 * Live transport connection to one charge point. Implemented by the
 * WebSocket gateway; tests use an in-process fake.
 */
export interface ConnectionHandle {
  readonly chargePointId: string
  readonly connectionId: string
  send(frame: string): void
  close(code: number, reason: string): void
}
