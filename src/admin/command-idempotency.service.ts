import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { RedisService } from '../redis/redis.service'

@Injectable()
export class CommandIdempotencyService {
  private readonly logger = new Logger(CommandIdempotencyService.name)
  private readonly ttlSeconds: number

  constructor(
    private readonly redis: RedisService,
    config: ConfigService
  ) {
    const configured = config.get<number>('commands.idempotencyTtlSeconds') ?? 86400
    this.ttlSeconds = configured > 0 ? configured : 0
  }

  /** True the first time `commandId` is seen within the TTL. Fails open when Redis is down. */
  async claim(commandId: string): Promise<boolean> {
    if (this.ttlSeconds <= 0) {
      return true
    }
    try {
      return await this.redis
        .getClient()
        .setIfAbsent(this.key(commandId), new Date().toISOString(), this.ttlSeconds)
    } catch (error) {
      this.logger.warn(
        `Failed to claim idempotency for ${commandId}: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
      return true
    }
  }

  private key(commandId: string): string {
    return `command-idempotency:${commandId}`
  }
}
