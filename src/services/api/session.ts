import { SentenceDecoder, encodeSentence, type WordEncoding } from './codec'
import { connectSocket, type Connector, type DeviceSocket } from './socket'
import { Mutex } from '../concurrency'
import { ConnectionError, DriverError, FramingError, TimeoutError, describeError } from '../errors'
import type { LogFn } from '../drivers/types'

export type SessionState = 'disconnected' | 'connecting' | 'authenticating' | 'ready' | 'closed'

// Allowed transitions; any state may drop to closed, closed is terminal
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  disconnected: ['connecting', 'closed'],
  connecting: ['authenticating', 'closed'],
  authenticating: ['ready', 'closed'],
  ready: ['closed'],
  closed: [],
}

export interface SessionOptions {
  host: string
  port: number
  tls: boolean
  rejectUnauthorized: boolean
  connectTimeout: number  // milliseconds
  readTimeout: number     // milliseconds
  encoding: WordEncoding
  log?: LogFn
  connector?: Connector
}

// Raw sentence I/O handed to whoever holds the session
export interface SessionIO {
  write(words: readonly string[]): Promise<void>
  read(deadline: number): Promise<string[]>
}

interface PendingRead {
  resolve: (sentence: string[]) => void
  reject: (error: Error) => void
  timer: ReturnType<typeof setTimeout>
}

export class Session {
  private current: SessionState = 'disconnected'
  private socket: DeviceSocket | null = null
  private readonly decoder: SentenceDecoder
  private readonly inbox: string[][] = []
  private waiter: PendingRead | null = null
  private failure: DriverError | null = null
  private closing = false
  private readonly mutex = new Mutex()
  private readonly io: SessionIO

  constructor(private readonly options: SessionOptions) {
    this.decoder = new SentenceDecoder(options.encoding)
    this.io = {
      write: (words) => this.write(words),
      read: (deadline) => this.read(deadline),
    }
  }

  get state(): SessionState {
    return this.current
  }

  get readTimeout(): number {
    return this.options.readTimeout
  }

  // Error that closed the session, if any
  get closedBy(): DriverError | null {
    return this.failure
  }

  async open(authenticate: (io: SessionIO) => Promise<void>): Promise<void> {
    const { host, port, log } = this.options
    this.transition('connecting')

    let socket: DeviceSocket
    try {
      const connector = this.options.connector ?? connectSocket
      socket = await connector({
        host,
        port,
        tls: this.options.tls,
        rejectUnauthorized: this.options.rejectUnauthorized,
        connectTimeout: this.options.connectTimeout,
      })
    } catch (err) {
      const error = err instanceof DriverError ? err : new ConnectionError(`Could not connect to ${host}:${port} - ${describeError(err)}`, err)
      this.terminate(error)
      throw error
    }

    // close() may have been called while connecting
    if (this.current === 'closed') {
      socket.destroy()
      throw this.failure ?? new ConnectionError('Session closed while connecting')
    }

    this.socket = socket
    socket.on('data', chunk => this.onData(chunk))
    socket.on('error', err => this.terminate(new ConnectionError(`Socket error: ${err.message}`, err)))
    socket.on('close', () => this.onClose())
    if (log) log('info', `Connected to ${host}:${port}${this.options.tls ? ' (TLS)' : ''}`)

    this.transition('authenticating')
    try {
      await authenticate(this.io)
    } catch (err) {
      const error = err instanceof DriverError ? err : new ConnectionError(describeError(err), err)
      this.terminate(error)
      throw error
    }
    this.transition('ready')
  }

  // Run one exchange with exclusive use of the stream
  exclusive<T>(task: (io: SessionIO) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      if (this.current !== 'ready') {
        throw this.failure ?? new ConnectionError(`Session is not ready (${this.current})`)
      }
      try {
        return await task(this.io)
      } catch (err) {
        if (err instanceof DriverError && err.fatal) {
          this.terminate(err)
        }
        throw err
      }
    })
  }

  close(): void {
    if (this.current === 'closed') return
    this.closing = true
    this.terminate(new ConnectionError('Session closed'))
    if (this.options.log) this.options.log('info', `Closed session to ${this.options.host}`)
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid session transition ${this.current} -> ${next}`)
    }
    this.current = next
  }

  private write(words: readonly string[]): Promise<void> {
    const socket = this.socket
    if (!socket || (this.current !== 'authenticating' && this.current !== 'ready')) {
      return Promise.reject(this.failure ?? new ConnectionError(`Cannot write in state ${this.current}`))
    }

    const data = encodeSentence(words, this.options.encoding)
    return new Promise((resolve, reject) => {
      socket.write(data, err => {
        if (err) {
          const error = new ConnectionError(`Write failed: ${err.message}`, err)
          this.terminate(error)
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }

  private read(deadline: number): Promise<string[]> {
    const next = this.inbox.shift()
    if (next) return Promise.resolve(next)
    if (this.current === 'closed') {
      return Promise.reject(this.failure ?? new ConnectionError('Session closed'))
    }
    if (this.waiter) {
      return Promise.reject(new Error('Concurrent read on one session'))
    }

    return new Promise((resolve, reject) => {
      const wait = Math.max(0, deadline - Date.now())
      const timer = setTimeout(() => {
        this.waiter = null
        const error = new TimeoutError(`No reply from ${this.options.host} within ${this.options.readTimeout}ms`)
        this.terminate(error)
        reject(error)
      }, wait)
      this.waiter = { resolve, reject, timer }
    })
  }

  private onData(chunk: Buffer): void {
    if (this.current === 'closed') return

    let sentences: string[][]
    try {
      sentences = this.decoder.push(chunk)
    } catch (err) {
      this.terminate(err instanceof FramingError ? err : new FramingError(describeError(err), err))
      return
    }

    for (const sentence of sentences) {
      const waiter = this.waiter
      if (waiter) {
        this.waiter = null
        clearTimeout(waiter.timer)
        waiter.resolve(sentence)
      } else {
        this.inbox.push(sentence)
      }
    }
  }

  private onClose(): void {
    if (this.current === 'closed') return
    try {
      this.decoder.end()
    } catch (err) {
      this.terminate(err instanceof FramingError ? err : new FramingError(describeError(err), err))
      return
    }
    this.terminate(new ConnectionError(`Connection to ${this.options.host} closed by device`))
  }

  // Move to closed, release the socket and fail any pending read
  private terminate(error: DriverError): void {
    if (this.current === 'closed') return
    this.current = 'closed'
    this.failure = error
    this.inbox.length = 0

    const socket = this.socket
    this.socket = null
    if (socket) socket.destroy()

    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      clearTimeout(waiter.timer)
      waiter.reject(error)
    }

    const { log } = this.options
    if (log && !this.closing) {
      log('error', `Session to ${this.options.host} closed: ${error.message}`)
    }
  }
}
