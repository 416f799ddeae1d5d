import configuration from '../../src/config/configuration'
import { validateEnvOrThrow } from '../../src/config/validate-env'

describe('configuration', () => {
  const original = { ...process.env }

  afterEach(() => {
    process.env = { ...original }
  })

  it('should derive the liveness sweep from the heartbeat interval', () => {
    process.env.OCPP_HEARTBEAT_INTERVAL_SECONDS = '90'
    delete process.env.OCPP_LIVENESS_SWEEP_MS

    expect(configuration().ocpp).toMatchObject({
      heartbeatIntervalSeconds: 90,
      livenessSweepMs: 30000,
      missedHeartbeatFactor: 2.5,
    })
  })

  it('should fall back to defaults for blank or non-numeric values', () => {
    process.env.OCPP_COMMAND_TIMEOUT_MS = ' '
    process.env.OCPP_AUTH_CACHE_TTL_SECONDS = 'soon'

    const { ocpp } = configuration()

    expect(ocpp.commandTimeoutMs).toBe(15000)
    expect(ocpp.authCacheTtlSeconds).toBe(60)
  })

  it('should disable Kafka when no brokers are listed', () => {
    process.env.KAFKA_BROKERS = ' , '

    expect(configuration().kafka).toMatchObject({ enabled: false, brokers: [] })
  })
})

describe('validateEnvOrThrow', () => {
  it('should accept the defaults', () => {
    expect(() => validateEnvOrThrow({})).not.toThrow()
  })

  it('should list every issue found', () => {
    expect(() => validateEnvOrThrow({ PORT: '70000', DATABASE_SSL: 'yes' })).toThrow(
      'Invalid configuration:\n- PORT must be <= 65535\n- DATABASE_SSL must be true or false'
    )
  })

  it('should reject a broker without a port', () => {
    expect(() => validateEnvOrThrow({ KAFKA_BROKERS: 'kafka' })).toThrow(
      'KAFKA_BROKERS entry "kafka" is invalid: missing host or port'
    )
  })

  it('should reject requiring a dependency that is disabled', () => {
    expect(() => validateEnvOrThrow({ REQUIRE_REDIS: 'true', REDIS_ENABLED: 'false' })).toThrow(
      'REQUIRE_REDIS cannot be true when REDIS_ENABLED is false'
    )
  })

  it('should reject a sweep longer than the heartbeat deadline', () => {
    expect(() =>
      validateEnvOrThrow({ OCPP_HEARTBEAT_INTERVAL_SECONDS: '60', OCPP_LIVENESS_SWEEP_MS: '150001' })
    ).toThrow('OCPP_LIVENESS_SWEEP_MS must not exceed the missed-heartbeat deadline')
    expect(() =>
      validateEnvOrThrow({ OCPP_HEARTBEAT_INTERVAL_SECONDS: '60', OCPP_LIVENESS_SWEEP_MS: '150000' })
    ).not.toThrow()
  })

  it('should require key and certificate paths when TLS is enabled', () => {
    expect(() => validateEnvOrThrow({ OCPP_TLS_ENABLED: 'true' })).toThrow(
      'Invalid configuration:\n- OCPP_TLS_KEY_PATH is required when TLS is enabled\n- OCPP_TLS_CERT_PATH is required when TLS is enabled'
    )
  })
})
