import { Logger } from '@nestjs/common'
import { WsAdapter } from '@nestjs/platform-ws'
import * as http from 'http'
import { Socket } from 'net'

export const OCPP_SUBPROTOCOL = 'ocpp1.6'

/**
 * WebSocket adapter that accepts upgrades below the gateway path
 * (`/ocpp/<chargePointId>`) and only when the client offers the OCPP 1.6
 * subprotocol.
 */
export class OcppWsAdapter extends WsAdapter {
  private readonly adapterLogger = new Logger(OcppWsAdapter.name)

  protected ensureHttpServerExists(
    port: number,
    httpServer: http.Server = http.createServer()
  ): http.Server {
    const existing: http.Server | undefined = this.httpServersRegistry.get(port)
    if (existing) {
      return existing
    }

    this.httpServersRegistry.set(port, httpServer)
    httpServer.on('upgrade', (request: http.IncomingMessage, socket: Socket, head: Buffer) => {
      try {
        const baseUrl = `ws://${request.headers.host || 'localhost'}/`
        const pathname = new URL(request.url || '', baseUrl).pathname
        const offered = parseProtocols(request.headers['sec-websocket-protocol'])

        if (!offered.includes(OCPP_SUBPROTOCOL)) {
          this.adapterLogger.warn(`Rejected upgrade on ${pathname}: subprotocol ${OCPP_SUBPROTOCOL} not offered`)
          socket.end('HTTP/1.1 400 Bad Request\r\n\r\nUnsupported Sec-WebSocket-Protocol')
          return
        }

        request.headers['sec-websocket-protocol'] = OCPP_SUBPROTOCOL
        const wsServers = this.wsServersRegistry.get(port) ?? []
        const target = wsServers.find((wsServer) => isPathMatch(pathname, wsServer.path))
        if (!target) {
          socket.destroy()
          return
        }
        target.handleUpgrade(request, socket, head, (ws: unknown) => {
          target.emit('connection', ws, request)
        })
      } catch (error) {
        socket.end(
          `HTTP/1.1 400 Bad Request\r\n\r\n${error instanceof Error ? error.message : String(error)}`
        )
      }
    })

    return httpServer
  }
}

// Dynamic segments under the gateway path, e.g. /ocpp/CP-1.
function isPathMatch(pathname: string, wsPath: string): boolean {
  return pathname.startsWith(`${wsPath}/`)
}

function parseProtocols(header: string | string[] | undefined): string[] {
  if (!header) return []
  const raw = Array.isArray(header) ? header.join(',') : header
  return raw
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean)
}
