import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Consumer, Kafka, Producer } from 'kafkajs'

export type DependencyStatus = { status: 'up' | 'down' | 'disabled'; error?: string }

@Injectable()
export class KafkaService implements OnModuleDestroy {
  private readonly kafka: Kafka | null
  private readonly enabled: boolean
  private readonly defaultGroupId: string
  private readonly consumers = new Map<string, Consumer>()
  private readonly logger = new Logger(KafkaService.name)
  private producer: Promise<Producer> | null = null
  private warnedDisabled = false

  constructor(private readonly config: ConfigService) {
    const brokers = this.config.get<string[]>('kafka.brokers') || []
    const clientId = this.config.get<string>('kafka.clientId') || 'ocpp-central-system'
    this.defaultGroupId = this.config.get<string>('kafka.groupId') || 'ocpp-central-system'
    this.enabled = (this.config.get<boolean>('kafka.enabled') ?? true) && brokers.length > 0
    this.kafka = this.enabled ? new Kafka({ clientId, brokers }) : null
  }

  isEnabled(): boolean {
    return this.enabled
  }

  async publish(topic: string, message: string, key?: string): Promise<void> {
    if (!this.enabled) {
      this.logDisabledOnce()
      return
    }
    const producer = await this.getProducer()
    await producer.send({ topic, messages: [{ key, value: message }] })
  }

  async getConsumer(groupId?: string): Promise<Consumer> {
    const kafka = this.getKafkaClient()
    const resolvedGroupId = groupId || this.defaultGroupId
    const existing = this.consumers.get(resolvedGroupId)
    if (existing) {
      return existing
    }
    const consumer = kafka.consumer({ groupId: resolvedGroupId })
    this.consumers.set(resolvedGroupId, consumer)
    await consumer.connect()
    this.logger.log(`Kafka consumer connected (${resolvedGroupId})`)
    return consumer
  }

  async checkConnection(): Promise<DependencyStatus> {
    if (!this.kafka) {
      return { status: 'disabled' }
    }
    const admin = this.kafka.admin()
    try {
      await admin.connect()
      await admin.describeCluster()
      return { status: 'up' }
    } catch (error) {
      return { status: 'down', error: error instanceof Error ? error.message : String(error) }
    } finally {
      await admin.disconnect()
    }
  }

  async onModuleDestroy(): Promise<void> {
    for (const consumer of this.consumers.values()) {
      await consumer.disconnect()
    }
    this.consumers.clear()
    if (this.producer) {
      const producer = await this.producer
      await producer.disconnect()
      this.producer = null
    }
  }

  private getProducer(): Promise<Producer> {
    if (!this.producer) {
      const producer = this.getKafkaClient().producer()
      this.producer = producer.connect().then(() => {
        this.logger.log('Kafka producer connected')
        return producer
      })
      this.producer.catch(() => {
        this.producer = null
      })
    }
    return this.producer
  }

  private getKafkaClient(): Kafka {
    if (!this.kafka) {
      this.logDisabledOnce()
      throw new Error('Kafka is disabled')
    }
    return this.kafka
  }

  private logDisabledOnce(): void {
    if (this.warnedDisabled) return
    this.warnedDisabled = true
    this.logger.warn('Kafka disabled; skipping broker interactions')
  }
}
