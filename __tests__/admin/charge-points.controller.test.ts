import { NotFoundException } from '@nestjs/common'
import { Request } from 'express'
import { mock } from 'jest-mock-extended'
import { ChargePointsController } from '../../src/admin/charge-points.controller'
import { FakeConnection } from '../helpers/fake-connection'
import { at, createHarness, Harness } from '../helpers/test-utils'

describe('ChargePointsController', () => {
  let harness: Harness
  let controller: ChargePointsController
  const request = mock<Request>({ headers: {} })

  beforeEach(async () => {
    delete process.env.HEALTH_METRICS_AUTH_TOKEN
    harness = createHarness()
    controller = new ChargePointsController(harness.coordinator)
    await harness.coordinator.onConnect(new FakeConnection('CP-1'), at(0))
  })

  it('should list connected charge points', async () => {
    await expect(controller.list(request)).resolves.toMatchObject([
      { chargePointId: 'CP-1', connected: true, vendor: null },
    ])
  })

  it('should return the status of a known charge point', async () => {
    await expect(controller.get(request, 'CP-1')).resolves.toMatchObject({
      chargePointId: 'CP-1',
      connected: true,
      activeSessions: [],
    })
  })

  it('should answer 404 for an unknown charge point', async () => {
    await expect(controller.get(request, 'CP-404')).rejects.toThrow(
      new NotFoundException('Unknown charge point CP-404')
    )
  })
})
