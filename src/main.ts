import 'reflect-metadata'
import 'dotenv/config'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import * as fs from 'fs'
import type { SecureVersion } from 'tls'
import { AppModule } from './app.module'
import { validateEnvOrThrow } from './config/validate-env'
import { KafkaService } from './kafka/kafka.service'
import { JsonLogger } from './logging/json-logger.service'
import { LogContextService } from './logging/log-context.service'
import { MetricsService } from './metrics/metrics.service'
import { OcppWsAdapter } from './ocpp/ocpp-ws.adapter'
import { RedisService } from './redis/redis.service'

type HttpsOptions = {
  key: Buffer
  cert: Buffer
  ca?: Buffer
  minVersion: SecureVersion
}

async function bootstrap(): Promise<void> {
  validateEnvOrThrow()
  const logger = new JsonLogger(new LogContextService())
  const httpsOptions = buildHttpsOptions()
  const app = await NestFactory.create(AppModule, httpsOptions ? { httpsOptions, logger } : { logger })
  app.useWebSocketAdapter(new OcppWsAdapter(app))
  app.enableShutdownHooks()
  app.get(MetricsService).setGauge('ocpp_connections_active', 0)

  await enforceRequiredDependencies(app.get(KafkaService), app.get(RedisService))

  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : 9000
  await app.listen(port)
  Logger.log(`Central system listening on ${port} (${httpsOptions ? 'wss' : 'ws'}://.../ocpp/<id>)`, 'Bootstrap')
}

bootstrap().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})

function buildHttpsOptions(): HttpsOptions | undefined {
  if ((process.env.OCPP_TLS_ENABLED ?? 'false') !== 'true') {
    return undefined
  }
  const keyPath = process.env.OCPP_TLS_KEY_PATH
  const certPath = process.env.OCPP_TLS_CERT_PATH
  if (!keyPath || !certPath) {
    throw new Error('OCPP_TLS_KEY_PATH and OCPP_TLS_CERT_PATH are required when TLS is enabled')
  }
  const caPath = process.env.OCPP_TLS_CA_PATH
  return {
    key: fs.readFileSync(keyPath),
    cert: fs.readFileSync(certPath),
    ca: caPath ? fs.readFileSync(caPath) : undefined,
    minVersion: process.env.OCPP_TLS_MIN_VERSION === 'TLSv1.3' ? 'TLSv1.3' : 'TLSv1.2',
  }
}

async function enforceRequiredDependencies(kafka: KafkaService, redis: RedisService): Promise<void> {
  const requireKafka = (process.env.REQUIRE_KAFKA ?? 'false') === 'true'
  const requireRedis = (process.env.REQUIRE_REDIS ?? 'false') === 'true'
  if (!requireKafka && !requireRedis) {
    return
  }

  const [kafkaStatus, redisStatus] = await Promise.all([
    kafka.checkConnection(),
    redis.checkConnection(),
  ])

  const failures: string[] = []
  if (requireKafka && kafkaStatus.status !== 'up') {
    failures.push(`kafka=${kafkaStatus.status}`)
  }
  if (requireRedis && redisStatus.status !== 'up') {
    failures.push(`redis=${redisStatus.status}`)
  }

  if (failures.length > 0) {
    throw new Error(`Required dependencies unavailable: ${failures.join(', ')}`)
  }
}
