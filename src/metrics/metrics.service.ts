import { Injectable } from '@nestjs/common'

export type MetricLabels = Record<string, string | number | boolean>

type MetricRecord = {
  name: string
  labels: Record<string, string>
  value: number
}

type RateRecord = {
  name: string
  labels: Record<string, string>
  buckets: Map<number, number>
}

export type MetricsSnapshot = {
  timestamp: string
  counters: MetricRecord[]
  gauges: MetricRecord[]
  rates: Array<MetricRecord & { count: number; windowSeconds: number }>
}

@Injectable()
export class MetricsService {
  private readonly windowSeconds: number
  private readonly counters = new Map<string, MetricRecord>()
  private readonly gauges = new Map<string, MetricRecord>()
  private readonly rates = new Map<string, RateRecord>()

  constructor() {
    const parsed = parseInt(process.env.METRICS_RATE_WINDOW_SECONDS || '60', 10)
    this.windowSeconds = Number.isFinite(parsed) && parsed > 0 ? parsed : 60
  }

  increment(name: string, labels: MetricLabels = {}, value = 1): void {
    const key = buildKey(name, labels)
    const record = this.counters.get(key)
    if (record) {
      record.value += value
      return
    }
    this.counters.set(key, { name, labels: normalizeLabels(labels), value })
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}): void {
    this.gauges.set(buildKey(name, labels), { name, labels: normalizeLabels(labels), value })
  }

  observeRate(name: string, labels: MetricLabels = {}, value = 1): void {
    const key = buildKey(name, labels)
    let record = this.rates.get(key)
    if (!record) {
      record = { name, labels: normalizeLabels(labels), buckets: new Map() }
      this.rates.set(key, record)
    }
    const now = Math.floor(Date.now() / 1000)
    record.buckets.set(now, (record.buckets.get(now) || 0) + value)
    this.pruneBuckets(record.buckets, now)
  }

  counterValue(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(buildKey(name, labels))?.value ?? 0
  }

  gaugeValue(name: string, labels: MetricLabels = {}): number | undefined {
    return this.gauges.get(buildKey(name, labels))?.value
  }

  snapshot(): MetricsSnapshot {
    const now = Math.floor(Date.now() / 1000)
    const rates = Array.from(this.rates.values()).map((record) => {
      this.pruneBuckets(record.buckets, now)
      const count = Array.from(record.buckets.values()).reduce((sum, val) => sum + val, 0)
      return {
        name: record.name,
        labels: record.labels,
        value: count / this.windowSeconds,
        count,
        windowSeconds: this.windowSeconds,
      }
    })

    return {
      timestamp: new Date().toISOString(),
      counters: Array.from(this.counters.values()),
      gauges: Array.from(this.gauges.values()),
      rates,
    }
  }

  private pruneBuckets(buckets: Map<number, number>, nowSeconds: number): void {
    const threshold = nowSeconds - this.windowSeconds + 1
    for (const key of buckets.keys()) {
      if (key < threshold) {
        buckets.delete(key)
      }
    }
  }
}

function buildKey(name: string, labels: MetricLabels): string {
  const labelKey = Object.entries(normalizeLabels(labels))
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`)
    .join(',')
  return labelKey ? `${name}|${labelKey}` : name
}

function normalizeLabels(labels: MetricLabels): Record<string, string> {
  const normalized: Record<string, string> = {}
  for (const [key, value] of Object.entries(labels)) {
    normalized[key] = String(value)
  }
  return normalized
}
