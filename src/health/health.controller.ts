import { Controller, Get, Req } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { InjectDataSource } from '@nestjs/typeorm'
import { Request } from 'express'
import { DataSource } from 'typeorm'
import { assertOpsToken } from '../common/ops-token'
import { DependencyStatus, KafkaService } from '../kafka/kafka.service'
import { RedisService } from '../redis/redis.service'
import { ConnectionRegistry } from '../session/connection-registry.service'

export type HealthReport = {
  status: 'ok' | 'degraded' | 'down'
  service: string | undefined
  time: string
  connections: number
  dependencies: {
    database: DependencyStatus
    kafka: DependencyStatus
    redis: DependencyStatus
  }
  required: { kafka: boolean; redis: boolean }
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly config: ConfigService,
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly kafka: KafkaService,
    private readonly redis: RedisService,
    private readonly registry: ConnectionRegistry
  ) {}

  @Get()
  async getHealth(@Req() req: Request): Promise<HealthReport> {
    assertOpsToken(req)
    const [database, kafka, redis] = await Promise.all([
      this.checkDatabase(),
      this.kafka.checkConnection(),
      this.redis.checkConnection(),
    ])
    const requireKafka = (process.env.REQUIRE_KAFKA ?? 'false') === 'true'
    const requireRedis = (process.env.REQUIRE_REDIS ?? 'false') === 'true'
    const requiredFailures =
      database.status !== 'up' ||
      (requireKafka && kafka.status !== 'up') ||
      (requireRedis && redis.status !== 'up')
    const hasDownstreamFailure = [kafka, redis].some((dep) => dep.status === 'down')

    return {
      status: requiredFailures ? 'down' : hasDownstreamFailure ? 'degraded' : 'ok',
      service: this.config.get<string>('service.name'),
      time: new Date().toISOString(),
      connections: this.registry.size(),
      dependencies: { database, kafka, redis },
      required: { kafka: requireKafka, redis: requireRedis },
    }
  }

  private async checkDatabase(): Promise<DependencyStatus> {
    try {
      await this.dataSource.query('SELECT 1')
      return { status: 'up' }
    } catch (error) {
      return { status: 'down', error: error instanceof Error ? error.message : String(error) }
    }
  }
}
