import { OcppResponseCache } from '../../src/ocpp/response-cache.service'
import { RedisService } from '../../src/redis/redis.service'
import { BASE_TIME, createConfig } from '../helpers/test-utils'

const startCall = { connectorId: 1, idTag: 'TAG-0001', meterStart: 100, timestamp: '2026-01-01T10:00:00Z' }

describe('OcppResponseCache', () => {
  const fingerprint = OcppResponseCache.fingerprint('StartTransaction', startCall)

  let cache: OcppResponseCache

  beforeEach(() => {
    const config = createConfig()
    cache = new OcppResponseCache(new RedisService(config), config)
  })

  it('should replay a reply to a CALL with the same action and payload', async () => {
    await cache.set('CP-1', '1', fingerprint, '[3,"1",{"transactionId":1}]', BASE_TIME)

    await expect(cache.get('CP-1', '1', fingerprint, BASE_TIME + 1000)).resolves.toBe('[3,"1",{"transactionId":1}]')
  })

  it('should miss when a unique id is reused for a different payload', async () => {
    await cache.set('CP-1', '1', fingerprint, '[3,"1",{"transactionId":1}]', BASE_TIME)
    const reused = OcppResponseCache.fingerprint('StartTransaction', { ...startCall, meterStart: 900 })

    await expect(cache.get('CP-1', '1', reused, BASE_TIME + 1000)).resolves.toBeNull()
  })

  it('should miss when a unique id is reused for a different action', async () => {
    await cache.set('CP-1', '1', fingerprint, '[3,"1",{"transactionId":1}]', BASE_TIME)

    await expect(
      cache.get('CP-1', '1', OcppResponseCache.fingerprint('Heartbeat', {}), BASE_TIME + 1000)
    ).resolves.toBeNull()
  })

  it('should keep only the latest reply for a unique id', async () => {
    const second = OcppResponseCache.fingerprint('Heartbeat', {})
    await cache.set('CP-1', '1', fingerprint, '[3,"1",{"transactionId":1}]', BASE_TIME)
    await cache.set('CP-1', '1', second, '[3,"1",{"currentTime":"2026-01-01T10:00:01.000Z"}]', BASE_TIME + 1000)

    await expect(cache.get('CP-1', '1', fingerprint, BASE_TIME + 2000)).resolves.toBeNull()
    await expect(cache.get('CP-1', '1', second, BASE_TIME + 2000)).resolves.toBe(
      '[3,"1",{"currentTime":"2026-01-01T10:00:01.000Z"}]'
    )
    expect(cache.size).toBe(1)
  })

  it('should drop expired replies when a new one is stored', async () => {
    for (let index = 0; index < 5000; index += 1) {
      await cache.set('CP-1', `m-${index}`, fingerprint, '[3,"x",{}]', BASE_TIME)
    }
    expect(cache.size).toBe(5000)

    await cache.set('CP-1', 'late', fingerprint, '[3,"late",{}]', BASE_TIME + 3_600_000)

    expect(cache.size).toBe(1)
    await expect(cache.get('CP-1', 'm-0', fingerprint, BASE_TIME + 3_600_000)).resolves.toBeNull()
  })

  it('should evict the oldest reply beyond the entry limit', async () => {
    for (let index = 0; index <= 10_000; index += 1) {
      await cache.set('CP-1', `m-${index}`, fingerprint, `[3,"m-${index}",{}]`, BASE_TIME)
    }

    expect(cache.size).toBe(10_000)
    await expect(cache.get('CP-1', 'm-0', fingerprint, BASE_TIME)).resolves.toBeNull()
    await expect(cache.get('CP-1', 'm-10000', fingerprint, BASE_TIME)).resolves.toBe('[3,"m-10000",{}]')
  })

  it('should not cache when the lifetime is zero', async () => {
    const config = createConfig({ ocpp: { responseCacheTtlSeconds: 0 } })
    const disabled = new OcppResponseCache(new RedisService(config), config)

    await disabled.set('CP-1', '1', fingerprint, '[3,"1",{}]', BASE_TIME)

    await expect(disabled.get('CP-1', '1', fingerprint, BASE_TIME)).resolves.toBeNull()
    expect(disabled.size).toBe(0)
  })

  describe('with Redis', () => {
    let redis: RedisService

    beforeEach(() => {
      redis = new RedisService(createConfig())
      jest.spyOn(redis, 'isEnabled').mockReturnValue(true)
    })

    it('should share replies and their fingerprints between instances', async () => {
      const config = createConfig()
      const writer = new OcppResponseCache(redis, config)
      const reader = new OcppResponseCache(redis, config)

      await writer.set('CP-1', '1', fingerprint, '[3,"1",{"transactionId":1}]')

      await expect(redis.getClient().get('response:CP-1:1')).resolves.toBe(
        JSON.stringify({ fingerprint, frame: '[3,"1",{"transactionId":1}]' })
      )
      await expect(reader.get('CP-1', '1', fingerprint)).resolves.toBe('[3,"1",{"transactionId":1}]')
      await expect(
        reader.get('CP-1', '1', OcppResponseCache.fingerprint('StartTransaction', { ...startCall, meterStart: 900 }))
      ).resolves.toBeNull()
    })

    it('should treat a stored value in another format as a miss', async () => {
      await redis.getClient().setex('response:CP-1:1', 300, '[3,"1",{}]')

      await expect(new OcppResponseCache(redis, createConfig()).get('CP-1', '1', fingerprint)).resolves.toBeNull()
    })
  })
})
