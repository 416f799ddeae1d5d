import { MetricsService } from '../../src/metrics/metrics.service'
import { OcppRequestTracker, Registration, TrackedReply } from '../../src/ocpp/request-tracker.service'

function replyOf(registration: Registration): Promise<TrackedReply> {
  if (registration.status !== 'registered') {
    throw new Error(`Expected a registration, got ${registration.status}`)
  }
  return registration.reply
}

describe('OcppRequestTracker', () => {
  let metrics: MetricsService
  let tracker: OcppRequestTracker

  beforeEach(() => {
    metrics = new MetricsService()
    tracker = new OcppRequestTracker(metrics)
  })

  it('should resolve a registration with the correlated result', async () => {
    const reply = replyOf(tracker.register('CP-1', 'cmd-1', 'Reset', 1000))

    expect(tracker.handleCallResult('CP-1', 'cmd-1', { status: 'Accepted' })).toBe(true)

    await expect(reply).resolves.toEqual({ status: 'result', payload: { status: 'Accepted' } })
    expect(tracker.hasPending('CP-1')).toBe(false)
  })

  it('should resolve a registration with the correlated CALLERROR', async () => {
    const reply = replyOf(tracker.register('CP-1', 'cmd-1', 'Reset', 1000))

    tracker.handleCallError('CP-1', 'cmd-1', 'NotSupported', 'No reset', { hint: 'firmware' })

    await expect(reply).resolves.toEqual({
      status: 'error',
      errorCode: 'NotSupported',
      errorDescription: 'No reset',
      errorDetails: { hint: 'firmware' },
    })
    expect(metrics.counterValue('ocpp_error_codes_total', { code: 'NotSupported', direction: 'outbound' })).toBe(1)
  })

  it('should refuse a second command while one is in flight', () => {
    tracker.register('CP-1', 'cmd-1', 'Reset', 1000)

    expect(tracker.register('CP-1', 'cmd-2', 'ClearCache', 1000)).toEqual({
      status: 'busy',
      pendingAction: 'Reset',
    })
    expect(tracker.register('CP-2', 'cmd-3', 'ClearCache', 1000).status).toBe('registered')
    expect(tracker.pendingCount()).toBe(2)

    tracker.release('cmd-1')
    tracker.release('cmd-3')
  })

  it('should resolve with timeout after the deadline', async () => {
    const reply = replyOf(tracker.register('CP-1', 'cmd-1', 'Reset', 10))

    await expect(reply).resolves.toEqual({ status: 'timeout' })
    expect(tracker.hasPending('CP-1')).toBe(false)
    expect(metrics.counterValue('ocpp_timeouts_total', { direction: 'outbound', action: 'Reset' })).toBe(1)
  })

  it('should discard a reply that arrives after the deadline as late', async () => {
    await replyOf(tracker.register('CP-1', 'cmd-1', 'Reset', 10))

    expect(tracker.handleCallResult('CP-1', 'cmd-1', { status: 'Accepted' })).toBe(false)
    expect(metrics.counterValue('ocpp_discarded_replies_total', { reason: 'late' })).toBe(1)
  })

  it('should discard a reply from a different charge point', () => {
    tracker.register('CP-1', 'cmd-1', 'Reset', 1000)

    expect(tracker.handleCallResult('CP-2', 'cmd-1', { status: 'Accepted' })).toBe(false)
    expect(metrics.counterValue('ocpp_discarded_replies_total', { reason: 'unknown' })).toBe(1)
    expect(tracker.hasPending('CP-1')).toBe(true)

    tracker.release('cmd-1')
  })

  it('should free the charge point when a registration is released', () => {
    tracker.register('CP-1', 'cmd-1', 'Reset', 1000)

    tracker.release('cmd-1')

    expect(tracker.hasPending('CP-1')).toBe(false)
    expect(tracker.register('CP-1', 'cmd-2', 'Reset', 1000).status).toBe('registered')
    tracker.release('cmd-2')
  })
})
