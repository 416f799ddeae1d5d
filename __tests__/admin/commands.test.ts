import { parseAdminCommand } from '../../src/contracts/commands'

const envelope = { commandId: 'cmd-1', chargePointId: 'CP-1' }

describe('parseAdminCommand', () => {
  it('should parse a RemoteStart with its envelope', () => {
    expect(
      parseAdminCommand({
        ...envelope,
        commandType: 'RemoteStart',
        requestedAt: '2026-01-01T10:00:00Z',
        timeoutSec: 30,
        payload: { idTag: 'TAG-0001', connectorId: 2 },
      })
    ).toEqual({
      ok: true,
      command: {
        commandId: 'cmd-1',
        chargePointId: 'CP-1',
        requestedAt: '2026-01-01T10:00:00Z',
        timeoutSec: 30,
        commandType: 'RemoteStart',
        idTag: 'TAG-0001',
        connectorId: 2,
      },
    })
  })

  it('should default a Reset to Soft', () => {
    expect(parseAdminCommand({ ...envelope, commandType: 'Reset' })).toEqual({
      ok: true,
      command: { ...envelope, commandType: 'Reset', resetType: 'Soft' },
    })
  })

  it('should ignore a non-positive timeout', () => {
    expect(parseAdminCommand({ ...envelope, commandType: 'ClearCache', timeoutSec: 0 })).toEqual({
      ok: true,
      command: { ...envelope, commandType: 'ClearCache' },
    })
  })

  it('should refuse anything but an object', () => {
    expect(parseAdminCommand(['RemoteStart'])).toEqual({ ok: false, error: 'Command must be a JSON object' })
  })

  it('should refuse a missing identity', () => {
    expect(parseAdminCommand({ chargePointId: 'CP-1', commandType: 'ClearCache' })).toEqual({
      ok: false,
      error: 'Missing commandId',
      chargePointId: 'CP-1',
    })
    expect(parseAdminCommand({ commandId: 'cmd-1', commandType: 'ClearCache' })).toEqual({
      ok: false,
      error: 'Missing chargePointId',
      commandId: 'cmd-1',
    })
  })

  it.each([
    [{ commandType: 'RemoteStart', payload: {} }, 'RemoteStart requires payload.idTag'],
    [{ commandType: 'RemoteStop', payload: { transactionId: '7' } }, 'RemoteStop requires an integer payload.transactionId'],
    [{ commandType: 'ChangeAvailability', payload: { connectorId: 1, type: 'Off' } }, 'ChangeAvailability requires payload.type Operative or Inoperative'],
    [{ commandType: 'ChangeAvailability', payload: { connectorId: -1, type: 'Operative' } }, 'ChangeAvailability requires payload.connectorId'],
    [{ commandType: 'Reset', payload: { type: 'Warm' } }, 'Reset payload.type must be Soft or Hard'],
    [{ commandType: 'ChangeConfiguration', payload: { key: 'HeartbeatInterval', value: 120 } }, 'ChangeConfiguration requires payload.key and payload.value'],
    [{ commandType: 'GetConfiguration', payload: { keys: ['A', 1] } }, 'GetConfiguration payload.keys must be a list of strings'],
    [{ commandType: 'UpdateFirmware' }, 'Unsupported commandType UpdateFirmware'],
  ])('should refuse %j', (body, error) => {
    expect(parseAdminCommand({ ...envelope, ...body })).toEqual({ ok: false, error, ...envelope })
  })
})
