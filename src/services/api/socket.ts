import net from 'node:net'
import tls from 'node:tls'
import { ConnectionError } from '../errors'

// The subset of a net/tls socket the session relies on
export interface DeviceSocket {
  write(data: Uint8Array, callback?: (err?: Error | null) => void): boolean
  destroy(error?: Error): void
  on(event: 'data', listener: (chunk: Buffer) => void): this
  on(event: 'error', listener: (err: Error) => void): this
  on(event: 'close', listener: () => void): this
}

export interface SocketTarget {
  host: string
  port: number
  tls: boolean
  rejectUnauthorized: boolean
  connectTimeout: number  // milliseconds
}

export type Connector = (target: SocketTarget) => Promise<DeviceSocket>

// Open a TCP or TLS connection to the API port
export const connectSocket: Connector = (target) => {
  return new Promise((resolve, reject) => {
    const socket = target.tls
      ? tls.connect({
          host: target.host,
          port: target.port,
          rejectUnauthorized: target.rejectUnauthorized,
          // SNI must not be an IP address
          servername: net.isIP(target.host) ? undefined : target.host,
        })
      : net.createConnection({ host: target.host, port: target.port })
    const readyEvent = target.tls ? 'secureConnect' : 'connect'

    const timer = setTimeout(() => {
      socket.destroy()
      reject(new ConnectionError(`Connection to ${target.host}:${target.port} timed out after ${target.connectTimeout}ms`))
    }, target.connectTimeout)

    const onError = (err: Error) => {
      clearTimeout(timer)
      socket.destroy()
      reject(new ConnectionError(`Could not connect to ${target.host}:${target.port} - ${err.message}`, err))
    }

    socket.once('error', onError)
    socket.once(readyEvent, () => {
      clearTimeout(timer)
      socket.removeListener('error', onError)
      socket.setNoDelay(true)
      resolve(socket)
    })
  })
}
