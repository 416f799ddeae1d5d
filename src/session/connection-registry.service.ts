import { Injectable, Logger } from '@nestjs/common'
import type { ConnectionHandle } from './session.types'

type RegistryEntry = {
  handle: ConnectionHandle
  connectedAt: number
  lastActivityAt: number
}

export type ConnectionLookup =
  | { status: 'connected'; handle: ConnectionHandle; connectedAt: number; lastActivityAt: number }
  | { status: 'not-connected' }

export type StaleConnection = {
  chargePointId: string
  handle: ConnectionHandle
  lastActivityAt: number
}

/**
 * Process-wide map of charge point id to its live connection. Written only by
 * the session coordinator.
 */
@Injectable()
export class ConnectionRegistry {
  private readonly logger = new Logger(ConnectionRegistry.name)
  private readonly entries = new Map<string, RegistryEntry>()

  /** Registers `handle`, closing and returning the connection it supersedes. */
  register(handle: ConnectionHandle, now = Date.now()): ConnectionHandle | null {
    const existing = this.entries.get(handle.chargePointId)
    this.entries.set(handle.chargePointId, { handle, connectedAt: now, lastActivityAt: now })
    if (!existing || existing.handle === handle) {
      return null
    }
    try {
      existing.handle.close(1008, 'Replaced by new connection')
    } catch (error) {
      this.logger.warn(
        `Failed to close superseded connection ${existing.handle.connectionId}: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
    }
    return existing.handle
  }

  lookup(chargePointId: string): ConnectionLookup {
    const entry = this.entries.get(chargePointId)
    if (!entry) {
      return { status: 'not-connected' }
    }
    return {
      status: 'connected',
      handle: entry.handle,
      connectedAt: entry.connectedAt,
      lastActivityAt: entry.lastActivityAt,
    }
  }

  /** Returns false when `handle` is no longer the registered connection. */
  unregister(chargePointId: string, handle: ConnectionHandle): boolean {
    const entry = this.entries.get(chargePointId)
    if (!entry || entry.handle !== handle) {
      return false
    }
    this.entries.delete(chargePointId)
    return true
  }

  touch(chargePointId: string, now = Date.now()): boolean {
    const entry = this.entries.get(chargePointId)
    if (!entry) {
      return false
    }
    entry.lastActivityAt = Math.max(entry.lastActivityAt, now)
    return true
  }

  staleEntries(now: number, deadlineMs: number): StaleConnection[] {
    const stale: StaleConnection[] = []
    for (const [chargePointId, entry] of this.entries) {
      if (now - entry.lastActivityAt > deadlineMs) {
        stale.push({ chargePointId, handle: entry.handle, lastActivityAt: entry.lastActivityAt })
      }
    }
    return stale
  }

  connectedIds(): string[] {
    return Array.from(this.entries.keys())
  }

  size(): number {
    return this.entries.size
  }
}
