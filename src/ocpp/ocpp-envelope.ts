export const MESSAGE_TYPE = {
  CALL: 2,
  CALLRESULT: 3,
  CALLERROR: 4,
} as const

/** CALLERROR codes defined by OCPP-J 1.6. */
export type OcppErrorCode =
  | 'NotImplemented'
  | 'NotSupported'
  | 'InternalError'
  | 'ProtocolError'
  | 'SecurityError'
  | 'FormationViolation'
  | 'PropertyConstraintViolation'
  | 'OccurenceConstraintViolation'
  | 'TypeConstraintViolation'
  | 'GenericError'

export type CallFrame = [2, string, string, unknown]
export type CallResultFrame = [3, string, unknown]
export type CallErrorFrame = [4, string, OcppErrorCode, string, Record<string, unknown>]
export type OutboundFrame = CallResultFrame | CallErrorFrame

export type Frame =
  | { type: 'call'; uniqueId: string; action: string; payload: unknown }
  | { type: 'result'; uniqueId: string; payload: unknown }
  | {
      type: 'error'
      uniqueId: string
      errorCode: string
      errorDescription: string
      errorDetails: Record<string, unknown>
    }

export type FrameError = {
  reason: string
  /** Set when the frame was recognizably a CALL, so a CALLERROR can be returned. */
  callUniqueId?: string
}

export type FrameParseResult = { ok: true; frame: Frame } | { ok: false; error: FrameError }

export function parseFrame(raw: string): FrameParseResult {
  let message: unknown
  try {
    message = JSON.parse(raw)
  } catch {
    return { ok: false, error: { reason: 'Message is not valid JSON' } }
  }
  return decodeFrame(message)
}

export function decodeFrame(message: unknown): FrameParseResult {
  if (!Array.isArray(message)) {
    return { ok: false, error: { reason: 'Message must be a JSON array' } }
  }

  const [messageTypeId, uniqueId] = message
  const callUniqueId =
    messageTypeId === MESSAGE_TYPE.CALL && typeof uniqueId === 'string' ? uniqueId : undefined

  if (message.length < 3) {
    return { ok: false, error: { reason: 'Message array is too short', callUniqueId } }
  }
  if (typeof uniqueId !== 'string' || uniqueId.length === 0 || uniqueId.length > 36) {
    return { ok: false, error: { reason: 'Invalid uniqueId' } }
  }

  switch (messageTypeId) {
    case MESSAGE_TYPE.CALL: {
      const action = message[2]
      if (typeof action !== 'string' || action.length === 0) {
        return { ok: false, error: { reason: 'Missing action', callUniqueId } }
      }
      return { ok: true, frame: { type: 'call', uniqueId, action, payload: message[3] ?? {} } }
    }
    case MESSAGE_TYPE.CALLRESULT:
      return { ok: true, frame: { type: 'result', uniqueId, payload: message[2] } }
    case MESSAGE_TYPE.CALLERROR: {
      const [, , errorCode, errorDescription, errorDetails] = message
      if (typeof errorCode !== 'string' || typeof errorDescription !== 'string') {
        return { ok: false, error: { reason: 'Invalid CallError payload' } }
      }
      return {
        ok: true,
        frame: {
          type: 'error',
          uniqueId,
          errorCode,
          errorDescription,
          errorDetails: isRecord(errorDetails) ? errorDetails : {},
        },
      }
    }
    default:
      return { ok: false, error: { reason: `Unsupported message type ${String(messageTypeId)}` } }
  }
}

export function buildCall(uniqueId: string, action: string, payload: unknown): CallFrame {
  return [MESSAGE_TYPE.CALL, uniqueId, action, payload]
}

export function buildCallResult(uniqueId: string, payload: unknown): CallResultFrame {
  return [MESSAGE_TYPE.CALLRESULT, uniqueId, payload]
}

export function buildCallError(
  uniqueId: string,
  errorCode: OcppErrorCode,
  errorDescription: string,
  errorDetails: Record<string, unknown> = {}
): CallErrorFrame {
  return [MESSAGE_TYPE.CALLERROR, uniqueId, errorCode, errorDescription, errorDetails]
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
