import { StorageFailure } from '../../src/persistence/charging-store'
import type { MessageOf } from '../../src/session/inbound-message'
import type { MeterSampleInput } from '../../src/session/session.types'
import { FakeConnection, waitForFrames } from '../helpers/fake-connection'
import { at, createHarness, Harness } from '../helpers/test-utils'

const CP = 'CP-1'

function startMessage(
  connectorId = 1,
  idTag = 'TAG-0001',
  meterStart = 100
): MessageOf<'StartTransaction'> {
  return { kind: 'StartTransaction', chargePointId: CP, connectorId, idTag, meterStart, timestamp: at(0) }
}

function stopMessage(
  transactionId: number,
  meterStop: number,
  samples: MeterSampleInput[] = []
): MessageOf<'StopTransaction'> {
  return {
    kind: 'StopTransaction',
    chargePointId: CP,
    transactionId,
    meterStop,
    timestamp: at(60_000),
    samples,
  }
}

function energy(value: number): MeterSampleInput {
  return { sampledAt: at(30_000), value, measurand: 'Energy.Active.Import.Register', unit: 'Wh' }
}

describe('SessionCoordinator', () => {
  let harness: Harness
  let connection: FakeConnection
  let published: jest.SpyInstance

  const eventTypes = (topic: string): string[] =>
    published.mock.calls
      .filter(([calledTopic]) => calledTopic === topic)
      .map(([, message]) => {
        const event: unknown = JSON.parse(String(message))
        return typeof event === 'object' && event !== null && 'eventType' in event
          ? String(event.eventType)
          : ''
      })

  beforeEach(async () => {
    harness = createHarness()
    published = jest.spyOn(harness.kafka, 'publish')
    harness.store.seedTag('TAG-0001')
    harness.store.seedTag('TAG-0002')
    harness.store.seedTag('BLOCKED001', 'Blocked')
    harness.store.seedTag('CHILD001', 'Accepted', { parentTag: 'BLOCKED001' })
    connection = new FakeConnection(CP)
    await harness.coordinator.onConnect(connection, at(0))
  })

  describe('connection lifecycle', () => {
    it('should register the connection and announce it Online', () => {
      expect(harness.registry.lookup(CP).status).toBe('connected')
      expect(harness.metrics.gaugeValue('ocpp_connections_active')).toBe(1)
      expect(eventTypes('ocpp.station.events')).toEqual(['StationOnline'])
    })

    it('should mark the charge point Offline when the current connection closes', async () => {
      await harness.coordinator.dispatch(
        { kind: 'BootNotification', chargePointId: CP, vendor: 'Acme', model: 'AC-22' },
        at(0)
      )

      await harness.coordinator.onDisconnect(connection, at(5000))

      expect(harness.registry.lookup(CP)).toEqual({ status: 'not-connected' })
      expect(harness.store.chargePoints.get(CP)?.reachability).toBe('Offline')
      expect(eventTypes('ocpp.station.events')).toContain('StationOffline')
    })

    it('should ignore the close of a superseded connection', async () => {
      const replacement = new FakeConnection(CP)
      await harness.coordinator.onConnect(replacement, at(1000))

      await harness.coordinator.onDisconnect(connection, at(2000))

      const lookup = harness.registry.lookup(CP)
      expect(lookup.status === 'connected' && lookup.handle).toBe(replacement)
      expect(eventTypes('ocpp.station.events')).not.toContain('StationOffline')
    })
  })

  describe('inbound operations', () => {
    it('should accept a boot with the heartbeat interval and persist the charge point', async () => {
      const result = await harness.coordinator.dispatch(
        {
          kind: 'BootNotification',
          chargePointId: CP,
          vendor: 'Acme',
          model: 'AC-22',
          firmwareVersion: '1.4.2',
        },
        at(0)
      )

      expect(result).toEqual({
        kind: 'BootNotification',
        status: 'Accepted',
        currentTime: at(0),
        interval: 60,
      })
      expect(harness.store.chargePoints.get(CP)).toMatchObject({
        vendor: 'Acme',
        model: 'AC-22',
        firmwareVersion: '1.4.2',
        reachability: 'Online',
      })
    })

    it('should raise a storage failure during boot', async () => {
      harness.store.failNext('upsertChargePoint')

      await expect(
        harness.coordinator.dispatch(
          { kind: 'BootNotification', chargePointId: CP, vendor: 'Acme', model: 'AC-22' },
          at(0)
        )
      ).rejects.toBeInstanceOf(StorageFailure)
    })

    it('should answer a heartbeat with the current time', async () => {
      await expect(
        harness.coordinator.dispatch({ kind: 'Heartbeat', chargePointId: CP }, at(30_000))
      ).resolves.toEqual({ kind: 'Heartbeat', currentTime: at(30_000) })
      expect(harness.registry.lookup(CP)).toMatchObject({ lastActivityAt: at(30_000).getTime() })
    })

    it('should authorize through the cache', async () => {
      await expect(
        harness.coordinator.dispatch({ kind: 'Authorize', chargePointId: CP, idTag: 'CHILD001' }, at(0))
      ).resolves.toEqual({
        kind: 'Authorize',
        authorization: { verdict: 'Blocked', parentIdTag: 'BLOCKED001' },
      })
    })

    it('should store an Unavailable status as an Inoperative connector', async () => {
      await harness.coordinator.dispatch(
        {
          kind: 'StatusNotification',
          chargePointId: CP,
          connectorId: 2,
          status: 'Unavailable',
          errorCode: 'NoError',
        },
        at(0)
      )

      expect(harness.store.connectors.get(`${CP}/2`)).toMatchObject({
        status: 'Unavailable',
        availability: 'Inoperative',
        statusAt: at(0),
      })
    })

    it('should accept a status report even when it cannot be stored', async () => {
      harness.store.failNext('upsertConnector')

      await expect(
        harness.coordinator.dispatch(
          {
            kind: 'StatusNotification',
            chargePointId: CP,
            connectorId: 1,
            status: 'Available',
            errorCode: 'NoError',
          },
          at(0)
        )
      ).resolves.toEqual({ kind: 'StatusNotification' })
      expect(harness.metrics.counterValue('storage_failures_total', { operation: 'upsertConnector' })).toBe(1)
    })

    it('should store vendor data transfers and accept them', async () => {
      await expect(
        harness.coordinator.dispatch(
          { kind: 'DataTransfer', chargePointId: CP, vendorId: 'com.acme', messageId: 'Diag', data: 'x=1' },
          at(0)
        )
      ).resolves.toEqual({ kind: 'DataTransfer', status: 'Accepted' })
      expect(harness.store.dataTransfers).toEqual([
        { chargePointId: CP, vendorId: 'com.acme', messageId: 'Diag', data: 'x=1', receivedAt: at(0) },
      ])
    })
  })

  describe('transactions', () => {
    it('should accept a start with an Accepted tag', async () => {
      await expect(harness.coordinator.dispatch(startMessage(), at(0))).resolves.toEqual({
        kind: 'StartTransaction',
        outcome: 'accepted',
        transactionId: 1,
        authorization: { verdict: 'Accepted' },
      })
      expect(eventTypes('ocpp.session.events')).toEqual(['SessionStarted'])
    })

    it('should reject a start with a Blocked parent as NotAuthorized', async () => {
      await expect(harness.coordinator.dispatch(startMessage(1, 'CHILD001'), at(0))).resolves.toEqual({
        kind: 'StartTransaction',
        outcome: 'rejected',
        reason: 'NotAuthorized',
        authorization: { verdict: 'Blocked', parentIdTag: 'BLOCKED001' },
      })
      expect(harness.store.sessions).toHaveLength(0)
    })

    it('should reject a second start on the same connector', async () => {
      await harness.coordinator.dispatch(startMessage(1, 'TAG-0001'), at(0))

      await expect(
        harness.coordinator.dispatch(startMessage(1, 'TAG-0002'), at(1000))
      ).resolves.toMatchObject({ outcome: 'rejected', reason: 'ConnectorBusy' })
      expect(harness.store.sessions).toHaveLength(1)
    })

    it('should accept exactly one of several concurrent starts on one connector', async () => {
      const results = await Promise.all(
        Array.from({ length: 6 }, (_, index) =>
          harness.coordinator.dispatch(startMessage(1, 'TAG-0001', 100 + index), at(0))
        )
      )

      const accepted = results.filter(
        (result) => result.kind === 'StartTransaction' && result.outcome === 'accepted'
      )
      expect(accepted).toHaveLength(1)
      expect(harness.store.sessions).toHaveLength(1)
    })

    it('should reject a start with StorageFailure when the tag cannot be read', async () => {
      harness.store.failNext('findIdTag')

      await expect(harness.coordinator.dispatch(startMessage(), at(0))).resolves.toEqual({
        kind: 'StartTransaction',
        outcome: 'rejected',
        reason: 'StorageFailure',
        authorization: { verdict: 'Invalid' },
      })
    })

    it('should roll back and reject a start whose session write fails', async () => {
      harness.store.failNext('insertSession')

      await expect(harness.coordinator.dispatch(startMessage(), at(0))).resolves.toMatchObject({
        outcome: 'rejected',
        reason: 'StorageFailure',
      })
      await expect(harness.ledger.activeFor(CP, 1)).resolves.toBeNull()
    })

    it('should complete a session started at 100 and stopped at 150 with its samples', async () => {
      await harness.coordinator.dispatch(startMessage(1, 'TAG-0001', 100), at(0))
      const meter = await harness.coordinator.dispatch(
        { kind: 'MeterValues', chargePointId: CP, connectorId: 1, transactionId: 1, samples: [energy(125)] },
        at(30_000)
      )

      const stop = await harness.coordinator.dispatch(stopMessage(1, 150), at(60_000))

      expect(meter).toEqual({
        kind: 'MeterValues',
        attribution: { transactionId: 1, orphaned: false, stored: 1 },
      })
      expect(stop).toMatchObject({
        kind: 'StopTransaction',
        outcome: 'completed',
        session: { transactionId: 1, meterStart: 100, meterStop: 150 },
      })
      expect(harness.store.session(1)).toMatchObject({ status: 'Completed', meterStart: 100, meterStop: 150 })
      expect(harness.store.meterSamples[0]).toMatchObject({ sessionId: 1, transactionId: 1, value: 125 })
      expect(eventTypes('ocpp.session.events')).toEqual([
        'SessionStarted',
        'MeterValuesReceived',
        'SessionStopped',
      ])
    })

    it('should store transaction data from a stop against the session before closing it', async () => {
      await harness.coordinator.dispatch(startMessage(), at(0))

      await harness.coordinator.dispatch(stopMessage(1, 150, [energy(140), energy(150)]), at(60_000))

      expect(harness.store.meterSamples.map((row) => [row.sessionId, row.connectorId, row.orphaned])).toEqual([
        [1, 1, false],
        [1, 1, false],
      ])
    })

    it('should report NotFound for a stop that matches no Active session and change nothing', async () => {
      await harness.coordinator.dispatch(startMessage(), at(0))

      await expect(harness.coordinator.dispatch(stopMessage(7, 150), at(60_000))).resolves.toEqual({
        kind: 'StopTransaction',
        outcome: 'not-found',
        authorization: undefined,
      })
      await expect(harness.ledger.activeFor(CP, 1)).resolves.toMatchObject({ transactionId: 1 })
      expect(harness.metrics.counterValue('ocpp_transactions_total', { outcome: 'stop_not_found' })).toBe(1)
      expect(eventTypes('ocpp.session.events')).toEqual(['SessionStarted', 'SessionStopUnmatched'])
    })

    it('should raise a storage failure on stop and keep the session Active', async () => {
      await harness.coordinator.dispatch(startMessage(), at(0))
      harness.store.failNext('completeSession')

      await expect(harness.coordinator.dispatch(stopMessage(1, 150), at(60_000))).rejects.toBeInstanceOf(
        StorageFailure
      )
      await expect(harness.ledger.activeFor(CP, 1)).resolves.toMatchObject({ transactionId: 1 })
    })

    it('should store meter values on an Idle connector as orphaned', async () => {
      const result = await harness.coordinator.dispatch(
        { kind: 'MeterValues', chargePointId: CP, connectorId: 2, samples: [energy(5)] },
        at(0)
      )

      expect(result).toEqual({
        kind: 'MeterValues',
        attribution: { transactionId: null, orphaned: true, stored: 1 },
      })
      expect(harness.store.meterSamples[0]).toMatchObject({ orphaned: true, sessionId: null })
      expect(harness.metrics.counterValue('ocpp_orphaned_samples_total')).toBe(1)
    })
  })

  describe('commands', () => {
    const reply = async (payload: unknown, frames = 1): Promise<void> => {
      await waitForFrames(connection, frames)
      const [uniqueId] = connection.lastCall()
      harness.tracker.handleCallResult(CP, uniqueId, payload)
    }

    it('should report an unknown charge point as unreachable', async () => {
      await expect(harness.coordinator.sendRemoteStart('CP-404', 'TAG-0001')).resolves.toEqual({
        status: 'unreachable',
      })
    })

    it('should refuse a remote start for a tag that is not Accepted', async () => {
      await expect(harness.coordinator.sendRemoteStart(CP, 'BLOCKED001', 1)).resolves.toEqual({
        status: 'invalid',
        reason: 'Tag BLOCKED001 is Blocked',
      })
      expect(connection.sent).toHaveLength(0)
    })

    it('should refuse a remote start on a connector with an Active session', async () => {
      await harness.coordinator.dispatch(startMessage(), at(0))

      await expect(harness.coordinator.sendRemoteStart(CP, 'TAG-0002', 1)).resolves.toEqual({
        status: 'invalid',
        reason: 'Connector 1 has an active transaction',
      })
    })

    it('should send RemoteStartTransaction and return the device reply', async () => {
      const pending = harness.coordinator.sendRemoteStart(CP, 'TAG-0001', 2)
      await reply({ status: 'Accepted' })

      await expect(pending).resolves.toEqual({ status: 'replied', reply: { status: 'Accepted' } })
      const [, action, payload] = connection.lastCall()
      expect(action).toBe('RemoteStartTransaction')
      expect(payload).toEqual({ idTag: 'TAG-0001', connectorId: 2 })
    })

    it('should time out a remote stop to a silent charge point and leave the session Active', async () => {
      await harness.coordinator.dispatch(startMessage(), at(0))

      await expect(harness.coordinator.sendRemoteStop(CP, 1, { timeoutMs: 20 })).resolves.toEqual({
        status: 'timeout',
      })
      await expect(harness.ledger.activeFor(CP, 1)).resolves.toMatchObject({ transactionId: 1 })
      expect(harness.store.session(1)?.status).toBe('Active')
    })

    it('should discard a reply that arrives after the deadline', async () => {
      await harness.coordinator.dispatch(startMessage(), at(0))
      await harness.coordinator.sendRemoteStop(CP, 1, { timeoutMs: 20 })
      const [uniqueId] = connection.lastCall()

      expect(harness.tracker.handleCallResult(CP, uniqueId, { status: 'Accepted' })).toBe(false)
      expect(harness.metrics.counterValue('ocpp_discarded_replies_total', { reason: 'late' })).toBe(1)
      await expect(harness.ledger.activeFor(CP, 1)).resolves.toMatchObject({ transactionId: 1 })
    })

    it('should refuse a remote stop for a transaction that is not Active', async () => {
      await expect(harness.coordinator.sendRemoteStop(CP, 5)).resolves.toEqual({
        status: 'invalid',
        reason: 'Transaction 5 is not active on CP-1',
      })
    })

    it('should return Busy while another command awaits its reply', async () => {
      const first = harness.coordinator.reset(CP, 'Soft', { timeoutMs: 1000 })
      await waitForFrames(connection, 1)

      await expect(harness.coordinator.reset(CP, 'Hard')).resolves.toEqual({
        status: 'busy',
        pendingAction: 'Reset',
      })

      await reply({ status: 'Accepted' })
      await expect(first).resolves.toEqual({ status: 'replied', reply: { status: 'Accepted' } })
    })

    it('should keep serving inbound messages while a command is pending', async () => {
      const pending = harness.coordinator.reset(CP, 'Soft', { timeoutMs: 1000 })
      await waitForFrames(connection, 1)

      await expect(
        harness.coordinator.dispatch({ kind: 'Heartbeat', chargePointId: CP }, at(1000))
      ).resolves.toEqual({ kind: 'Heartbeat', currentTime: at(1000) })

      await reply({ status: 'Accepted' })
      await pending
    })

    it('should surface a device CALLERROR', async () => {
      const pending = harness.coordinator.reset(CP, 'Hard')
      await waitForFrames(connection, 1)
      const [uniqueId] = connection.lastCall()
      harness.tracker.handleCallError(CP, uniqueId, 'NotSupported', 'Reset not supported', {})

      await expect(pending).resolves.toEqual({
        status: 'error',
        errorCode: 'NotSupported',
        errorDescription: 'Reset not supported',
        errorDetails: {},
      })
    })

    it('should report a connection that fails to send as unreachable', async () => {
      connection.failSends = true

      await expect(harness.coordinator.reset(CP, 'Soft')).resolves.toEqual({ status: 'unreachable' })
      expect(harness.tracker.hasPending(CP)).toBe(false)
    })

    it('should persist an accepted availability change', async () => {
      const pending = harness.coordinator.changeAvailability(CP, 1, 'Inoperative')
      await reply({ status: 'Scheduled' })

      await expect(pending).resolves.toEqual({ status: 'replied', reply: { status: 'Scheduled' } })
      expect(harness.store.connectors.get(`${CP}/1`)?.availability).toBe('Inoperative')
    })

    it('should not persist a rejected availability change', async () => {
      const pending = harness.coordinator.changeAvailability(CP, 1, 'Inoperative')
      await reply({ status: 'Rejected' })

      await pending
      expect(harness.store.connectors.has(`${CP}/1`)).toBe(false)
    })

    it('should persist an accepted configuration change', async () => {
      const pending = harness.coordinator.changeConfiguration(CP, 'HeartbeatInterval', '120')
      await reply({ status: 'Accepted' })

      await pending
      expect(harness.store.configuration.get(CP)?.get('HeartbeatInterval')).toEqual({
        key: 'HeartbeatInterval',
        value: '120',
        readonly: false,
      })
    })

    it('should store the configuration a charge point reports', async () => {
      const pending = harness.coordinator.getConfiguration(CP, ['MeterValueSampleInterval'])
      await reply({
        configurationKey: [{ key: 'MeterValueSampleInterval', readonly: false, value: '60' }],
        unknownKey: [],
      })

      await expect(pending).resolves.toMatchObject({ status: 'replied' })
      expect(connection.lastCall()[2]).toEqual({ key: ['MeterValueSampleInterval'] })
      expect(harness.store.configuration.get(CP)?.get('MeterValueSampleInterval')).toEqual({
        key: 'MeterValueSampleInterval',
        value: '60',
        readonly: false,
      })
    })

    it('should clear the local cache even when the charge point is unreachable', async () => {
      await harness.authorizations.resolve('TAG-0001')
      expect(harness.authorizations.size()).toBe(1)

      await expect(harness.coordinator.clearCache('CP-404')).resolves.toEqual({ status: 'unreachable' })
      expect(harness.authorizations.size()).toBe(0)
    })

    it('should report an invalid device reply as an error', async () => {
      const pending = harness.coordinator.clearCache(CP)
      await reply({ status: 'Maybe' })

      await expect(pending).resolves.toMatchObject({
        status: 'error',
        errorCode: 'ResponseValidationFailed',
      })
    })
  })

  describe('read path', () => {
    it('should combine the stored record with live state and Active sessions', async () => {
      await harness.coordinator.dispatch(
        { kind: 'BootNotification', chargePointId: CP, vendor: 'Acme', model: 'AC-22' },
        at(0)
      )
      await harness.coordinator.dispatch(startMessage(), at(1000))

      const status = await harness.coordinator.getChargePointStatus(CP)

      expect(status).toMatchObject({
        chargePointId: CP,
        reachability: 'Online',
        connected: true,
        connectedAt: at(0),
        lastActivityAt: at(1000),
      })
      expect(status?.activeSessions.map((session) => session.transactionId)).toEqual([1])
    })

    it('should return null for a charge point never seen', async () => {
      await expect(harness.coordinator.getChargePointStatus('CP-404')).resolves.toBeNull()
    })

    it('should list stored and connected charge points sorted by id', async () => {
      await harness.coordinator.onConnect(new FakeConnection('CP-0'), at(0))
      await harness.coordinator.dispatch(
        { kind: 'BootNotification', chargePointId: CP, vendor: 'Acme', model: 'AC-22' },
        at(0)
      )

      const summaries = await harness.coordinator.listChargePoints()

      expect(summaries.map((summary) => [summary.chargePointId, summary.vendor, summary.connected])).toEqual([
        ['CP-0', null, true],
        [CP, 'Acme', true],
      ])
    })
  })
})
