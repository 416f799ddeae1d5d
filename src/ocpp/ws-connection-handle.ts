import { WebSocket } from 'ws'
import type { ConnectionHandle } from '../session/session.types'

/** ConnectionHandle over a live `ws` socket. */
export class WsConnectionHandle implements ConnectionHandle {
  constructor(
    readonly chargePointId: string,
    readonly connectionId: string,
    private readonly socket: WebSocket
  ) {}

  send(frame: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error(`Connection ${this.connectionId} is not open`)
    }
    this.socket.send(frame)
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) {
      return
    }
    this.socket.close(code, reason)
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN
  }
}
