import { Client, type ConnectConfig } from 'ssh2'
import { AuthenticationError, CommandError, ConnectionError, TimeoutError } from './errors'
import type { LogFn } from './drivers/types'

// Algorithms accepted when talking to RouterOS and older switch firmware
const KEX_ALGORITHMS: NonNullable<NonNullable<ConnectConfig['algorithms']>['kex']> = [
  'curve25519-sha256',
  'curve25519-sha256@libssh.org',
  'ecdh-sha2-nistp256',
  'ecdh-sha2-nistp384',
  'ecdh-sha2-nistp521',
  'diffie-hellman-group-exchange-sha256',
  'diffie-hellman-group14-sha256',
  'diffie-hellman-group14-sha1',
]

// Host key types the store understands
const HOST_KEY_ALGORITHMS = [
  'ecdsa-sha2-nistp256',
  'ecdsa-sha2-nistp384',
  'ecdsa-sha2-nistp521',
  'rsa-sha2-512',
  'rsa-sha2-256',
  'ssh-rsa',
] as const

type HostKeyAlgorithm = (typeof HOST_KEY_ALGORITHMS)[number]

export interface ExecResult {
  stdout: string
  stderr: string
  code: number
}

// What the configuration operations need from a remote shell
export interface ShellSession {
  exec(command: string): Promise<ExecResult>
  writeFile(path: string, data: Buffer): Promise<void>
}

export interface ShellProvider {
  session<T>(task: (shell: ShellSession) => Promise<T>): Promise<T>
}

export interface SshOptions {
  host: string
  port: number
  username: string
  password?: string
  privateKey?: Buffer
  // "<type> <base64>" as stored by the host key store
  hostKey: () => Promise<string>
  timeout: number      // milliseconds, connection setup
  readTimeout: number  // milliseconds, one command's output
  log?: LogFn
}

// The parts of an ssh2 exec channel that output collection uses
export interface ExecStream {
  on(event: 'data', listener: (data: Buffer) => void): unknown
  on(event: 'exit', listener: (code: number | null) => void): unknown
  on(event: 'close', listener: () => void): unknown
  stderr: { on(event: 'data', listener: (data: Buffer) => void): unknown }
  close(): unknown
}

// Collect a command's output until its channel closes.
// Chunks are decoded together, a character may span two of them.
export function collectOutput(stream: ExecStream, command: string, timeout: number): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let code = 0

    const timer = setTimeout(() => {
      reject(new TimeoutError(`${command} did not finish within ${timeout}ms`))
      stream.close()
    }, timeout)

    stream.on('data', data => {
      stdout.push(data)
    })
    stream.stderr.on('data', data => {
      stderr.push(data)
    })
    stream.on('exit', exitCode => {
      code = exitCode ?? -1
    })
    stream.on('close', () => {
      clearTimeout(timer)
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        code,
      })
    })
  })
}

// Key blobs start with a length-prefixed algorithm name
export function hostKeyType(key: Buffer): string {
  if (key.length < 4) return ''
  const length = key.readUInt32BE(0)
  return key.subarray(4, 4 + length).toString('ascii')
}

export function formatHostKey(key: Buffer): string {
  return `${hostKeyType(key)} ${key.toString('base64')}`
}

function isHostKeyAlgorithm(value: string): value is HostKeyAlgorithm {
  return HOST_KEY_ALGORITHMS.some(algorithm => algorithm === value)
}

// RSA keys are stored as ssh-rsa but negotiated with any rsa-sha2 signature
function negotiableAlgorithms(keyType: string): HostKeyAlgorithm[] {
  if (keyType === 'ssh-rsa') return ['rsa-sha2-512', 'rsa-sha2-256', 'ssh-rsa']
  return isHostKeyAlgorithm(keyType) ? [keyType] : [...HOST_KEY_ALGORITHMS]
}

function connectionError(host: string, err: Error & { level?: string }): Error {
  // Auth failures have level 'client-authentication'
  if (err.level === 'client-authentication') {
    return new AuthenticationError(`SSH login to ${host} rejected`, err)
  }
  return new ConnectionError(`SSH connection to ${host} failed: ${err.message}`, err)
}

// Read the device host key without authenticating
export function fetchHostKey(host: string, port = 22, timeout = 5000): Promise<string> {
  return new Promise((resolve, reject) => {
    const client = new Client()
    let captured: string | null = null

    client.on('error', (err: Error & { level?: string }) => {
      if (captured) {
        resolve(captured)
      } else {
        reject(connectionError(host, err))
      }
    })

    client.connect({
      host,
      port,
      username: 'host-key-probe',
      readyTimeout: timeout,
      algorithms: { kex: KEX_ALGORITHMS, serverHostKey: [...HOST_KEY_ALGORITHMS] },
      hostVerifier: (key: Buffer): boolean => {
        captured = formatHostKey(key)
        // Refusing the key aborts the handshake, the error handler resolves
        return false
      },
    })
  })
}

// SSH client for the operations the binary API cannot perform.
// Opening is counted so nested session() calls share one connection.
export class SshChannel implements ShellProvider {
  private client: Client | null = null
  private connecting: Promise<Client> | null = null
  private openCount = 0

  constructor(private readonly options: SshOptions) {}

  async session<T>(task: (shell: ShellSession) => Promise<T>): Promise<T> {
    await this.open()
    try {
      return await task(this)
    } finally {
      this.close()
    }
  }

  async open(): Promise<void> {
    this.openCount++
    try {
      if (!this.connecting) this.connecting = this.connect()
      this.client = await this.connecting
    } catch (err) {
      this.openCount--
      this.connecting = null
      throw err
    }
  }

  close(): void {
    if (this.openCount === 0) return
    this.openCount--
    if (this.openCount === 0 && this.client) {
      this.client.end()
      this.client = null
      this.connecting = null
    }
  }

  exec(command: string): Promise<ExecResult> {
    const client = this.requireClient()
    return new Promise((resolve, reject) => {
      client.exec(command, (err, stream) => {
        if (err) {
          reject(new CommandError(command, [{ message: err.message, category: null }]))
          return
        }
        collectOutput(stream, command, this.options.readTimeout).then(resolve, reject)
      })
    })
  }

  writeFile(path: string, data: Buffer): Promise<void> {
    const client = this.requireClient()
    return new Promise((resolve, reject) => {
      client.sftp((err, sftp) => {
        if (err) {
          reject(new ConnectionError(`SFTP unavailable on ${this.options.host}: ${err.message}`, err))
          return
        }
        sftp.writeFile(path, data, writeErr => {
          sftp.end()
          if (writeErr) {
            reject(new CommandError(`sftp put ${path}`, [{ message: writeErr.message, category: null }]))
          } else {
            resolve()
          }
        })
      })
    })
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new ConnectionError('SSH client needs to be opened first')
    }
    return this.client
  }

  private async connect(): Promise<Client> {
    const { host, port, username, password, privateKey, timeout, log } = this.options
    const expected = await this.options.hostKey()
    const [keyType] = expected.split(' ', 1)

    return new Promise((resolve, reject) => {
      const client = new Client()

      client.on('ready', () => {
        if (log) log('info', `SSH session to ${host} established`)
        resolve(client)
      })

      client.on('error', (err: Error & { level?: string }) => {
        reject(connectionError(host, err))
      })

      client.connect({
        host,
        port,
        username,
        password,
        privateKey,
        readyTimeout: timeout,
        tryKeyboard: false,
        algorithms: { kex: KEX_ALGORITHMS, serverHostKey: negotiableAlgorithms(keyType) },
        hostVerifier: (key: Buffer): boolean => {
          const matches = formatHostKey(key) === expected
          if (!matches && log) log('error', `SSH host key mismatch for ${host}`)
          return matches
        },
      })
    })
  }
}
