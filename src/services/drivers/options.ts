import { existsSync, readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigurationError } from '../errors'
import type { Connector } from '../api/socket'
import type { LoginMethod } from '../api/login'
import type { WordEncoding } from '../api/codec'
import type { ShellProvider } from '../ssh'
import type { HostKeyStore } from '../host-keys'
import type { LogFn } from './types'

export const API_PORT = 8728
export const API_SSL_PORT = 8729

const port = z.number().int().min(1).max(65535)

// Recognized driver options; timeouts are in seconds
export const driverOptionsSchema = z.object({
  port: port.optional(),
  tls: z.boolean().default(false),
  rejectUnauthorized: z.boolean().default(false),
  timeout: z.number().positive().default(60),
  connectTimeout: z.number().positive().optional(),
  readTimeout: z.number().positive().optional(),
  loginMethod: z.enum(['plain', 'token']).default('plain'),
  encoding: z.enum(['utf8', 'latin1']).default('utf8'),
  sshPort: port.default(22),
  privateKeyFile: z.string().min(1).optional(),
  hostKey: z.string().regex(/^\S+ \S+$/, 'expected "<type> <base64>"').optional(),
  hostKeyDatabase: z.string().min(1).default(':memory:'),
  strictNormalization: z.boolean().default(false),
})

// Collaborators that cannot be described by the schema
export interface DriverHooks {
  log?: LogFn
  // Socket factory, replaced by in-process devices in tests
  connector?: Connector
  // SSH access for the configuration operations
  shell?: ShellProvider
  hostKeys?: HostKeyStore
}

export type DriverOptions = z.input<typeof driverOptionsSchema> & DriverHooks

export interface ResolvedOptions extends DriverHooks {
  port: number
  tls: boolean
  rejectUnauthorized: boolean
  connectTimeout: number  // milliseconds
  readTimeout: number     // milliseconds
  loginMethod: LoginMethod
  encoding: WordEncoding
  sshPort: number
  privateKey?: Buffer
  hostKey?: string
  hostKeyDatabase: string
  strictNormalization: boolean
}

export function resolveOptions(options: DriverOptions = {}): ResolvedOptions {
  const { log, connector, shell, hostKeys, ...rest } = options
  const parsed = driverOptionsSchema.safeParse(rest)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid driver options - ${issues.join('; ')}`, parsed.error)
  }
  const value = parsed.data

  let privateKey: Buffer | undefined
  if (value.privateKeyFile) {
    if (!existsSync(value.privateKeyFile)) {
      throw new ConfigurationError(`Private key file not found: ${value.privateKeyFile}`)
    }
    privateKey = readFileSync(value.privateKeyFile)
  }

  return {
    log,
    connector,
    shell,
    hostKeys,
    port: value.port ?? (value.tls ? API_SSL_PORT : API_PORT),
    tls: value.tls,
    rejectUnauthorized: value.rejectUnauthorized,
    connectTimeout: (value.connectTimeout ?? value.timeout) * 1000,
    readTimeout: (value.readTimeout ?? value.timeout) * 1000,
    loginMethod: value.loginMethod,
    encoding: value.encoding,
    sshPort: value.sshPort,
    privateKey,
    hostKey: value.hostKey,
    hostKeyDatabase: value.hostKeyDatabase,
    strictNormalization: value.strictNormalization,
  }
}
