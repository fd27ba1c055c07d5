import { createHash } from 'node:crypto'
import { exchange, type Reply } from './channel'
import type { WordEncoding } from './codec'
import type { SessionIO } from './session'
import { AuthenticationError, CommandError } from '../errors'
import type { LogFn } from '../drivers/types'

// 'plain' sends credentials first (RouterOS 6.43+), 'token' starts with a bare /login
export type LoginMethod = 'plain' | 'token'

export interface Credentials {
  username: string
  password: string
}

export interface LoginOptions {
  method: LoginMethod
  encoding: WordEncoding
  readTimeout: number
  log?: LogFn
}

type LoginRequest = 'bare' | 'password' | 'response'
type ReplyShape = 'challenge' | 'accepted'

// What to send next, given what was sent and the shape of the device's reply
const NEXT_REQUEST: Record<LoginRequest, Record<ReplyShape, LoginRequest | 'ready' | 'reject'>> = {
  bare: { challenge: 'response', accepted: 'password' },
  password: { challenge: 'response', accepted: 'ready' },
  response: { challenge: 'reject', accepted: 'ready' },
}

// Legacy challenge: "00" + md5(0x00 + password + challenge bytes)
export function challengeResponse(password: string, challenge: string, encoding: WordEncoding = 'utf8'): string {
  const hash = createHash('md5')
  hash.update(Buffer.from([0]))
  hash.update(Buffer.from(password, encoding))
  hash.update(Buffer.from(challenge, 'hex'))
  return `00${hash.digest('hex')}`
}

export function replyShape(reply: Reply): ReplyShape {
  const ret = reply.done.ret
  return ret !== undefined && /^([0-9a-f]{2})+$/i.test(ret) ? 'challenge' : 'accepted'
}

function loginWords(request: LoginRequest, credentials: Credentials, challenge: string, encoding: WordEncoding): string[] {
  switch (request) {
    case 'bare':
      return ['/login']
    case 'password':
      return ['/login', `=name=${credentials.username}`, `=password=${credentials.password}`]
    case 'response':
      return ['/login', `=name=${credentials.username}`, `=response=${challengeResponse(credentials.password, challenge, encoding)}`]
  }
}

export async function login(io: SessionIO, credentials: Credentials, options: LoginOptions): Promise<void> {
  const { log } = options
  let request: LoginRequest = options.method === 'token' ? 'bare' : 'password'
  let challenge = ''

  for (;;) {
    let reply: Reply
    try {
      const words = loginWords(request, credentials, challenge, options.encoding)
      reply = await exchange(io, words, null, Date.now() + options.readTimeout)
    } catch (err) {
      if (err instanceof CommandError) {
        throw new AuthenticationError(`Login as ${credentials.username} rejected: ${err.message}`, err)
      }
      throw err
    }

    const shape = replyShape(reply)
    const next: LoginRequest | 'ready' | 'reject' = NEXT_REQUEST[request][shape]
    if (next === 'ready') {
      if (log) log('success', `Logged in as ${credentials.username}${request === 'response' ? ' (challenge-response)' : ''}`)
      return
    }
    if (next === 'reject') {
      throw new AuthenticationError(`Login as ${credentials.username} rejected: device issued a second challenge`)
    }
    if (next === 'response') {
      challenge = reply.done.ret ?? ''
      if (log) log('info', 'Device requested challenge-response login')
    }
    request = next
  }
}
