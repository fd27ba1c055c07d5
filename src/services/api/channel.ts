import { nanoid } from 'nanoid'
import { formatValue, type QueryExpression, type QueryValue } from './query'
import type { Session, SessionIO } from './session'
import { CommandError, ConfigurationError, ConnectionError, FramingError, type Trap } from '../errors'

// Attribute map of one reply sentence; every value is a string on the wire
export type RawRecord = Record<string, string>

export interface Reply {
  records: RawRecord[]
  // Attributes of the closing !done sentence, e.g. `ret` during login
  done: RawRecord
}

export type CommandArguments = Record<string, QueryValue | undefined>

export interface RunOptions {
  query?: QueryExpression
  proplist?: readonly string[]
}

interface ParsedSentence {
  reply: string
  attributes: RawRecord
  tag: string | null
  // Words that are neither attributes nor API attributes (the !fatal reason)
  text: string[]
}

export function buildCommand(
  path: string,
  args: CommandArguments = {},
  options: RunOptions = {},
  tag: string | null = null
): string[] {
  if (!path.startsWith('/')) {
    throw new ConfigurationError(`Command path must start with "/": ${path}`)
  }

  const words = [path]
  for (const [name, value] of Object.entries(args)) {
    if (value === undefined) continue
    words.push(`=${name}=${formatValue(value)}`)
  }
  if (options.proplist && options.proplist.length > 0) {
    words.push(`=.proplist=${options.proplist.join(',')}`)
  }
  if (options.query) {
    words.push(...options.query.words)
  }
  if (tag !== null) {
    words.push(`.tag=${tag}`)
  }
  return words
}

export function parseSentence(sentence: readonly string[]): ParsedSentence {
  const [reply, ...rest] = sentence
  if (reply === undefined) {
    throw new FramingError('Received an empty sentence')
  }

  const attributes: RawRecord = {}
  const text: string[] = []
  let tag: string | null = null

  for (const word of rest) {
    if (word.startsWith('=')) {
      // =name=value, the value may itself contain "="
      const separator = word.indexOf('=', 1)
      if (separator === -1) {
        attributes[word.slice(1)] = ''
      } else {
        attributes[word.slice(1, separator)] = word.slice(separator + 1)
      }
    } else if (word.startsWith('.tag=')) {
      tag = word.slice('.tag='.length)
    } else if (!word.startsWith('.')) {
      text.push(word)
    }
  }

  return { reply, attributes, tag, text }
}

function parseCategory(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null
  return Number(raw)
}

// Send one command and collect its reply up to !done or !trap.
// Devices follow a !trap with a !done for the same tag; a trapped tag goes into
// `abandoned` and its remaining sentences are dropped ahead of later replies.
export async function exchange(
  io: SessionIO,
  words: readonly string[],
  tag: string | null,
  deadline: number,
  abandoned: Set<string> = new Set()
): Promise<Reply> {
  const command = words[0] ?? ''
  await io.write(words)

  const records: RawRecord[] = []

  for (;;) {
    const parsed = parseSentence(await io.read(deadline))

    if (parsed.tag !== null && parsed.tag !== tag && abandoned.has(parsed.tag)) {
      if (parsed.reply === '!done') abandoned.delete(parsed.tag)
      continue
    }

    // Untagged replies rely on single-flight ordering
    if (tag !== null && parsed.tag !== null && parsed.tag !== tag) {
      throw new FramingError(`Reply tagged "${parsed.tag}" while waiting for "${tag}"`)
    }

    switch (parsed.reply) {
      case '!re':
        records.push(parsed.attributes)
        break
      case '!empty':
        break
      case '!trap': {
        const trap: Trap = {
          message: parsed.attributes.message ?? '',
          category: parseCategory(parsed.attributes.category),
        }
        if (tag !== null) abandoned.add(tag)
        throw new CommandError(command, [trap])
      }
      case '!fatal':
        throw new ConnectionError(`Device terminated the session: ${parsed.text.join(' ') || 'no reason given'}`)
      case '!done':
        return { records, done: parsed.attributes }
      default:
        throw new FramingError(`Unexpected reply word "${parsed.reply}" to ${command}`)
    }
  }
}

export class CommandChannel {
  // Tags of trapped commands whose closing !done has not been read yet
  private readonly abandoned = new Set<string>()

  constructor(private readonly session: Session) {}

  run(path: string, args: CommandArguments = {}, options: RunOptions = {}): Promise<Reply> {
    const tag = nanoid(10)
    const words = buildCommand(path, args, options, tag)
    return this.session.exclusive(io => exchange(io, words, tag, Date.now() + this.session.readTimeout, this.abandoned))
  }

  // Records only, for print-style commands
  async call(path: string, args: CommandArguments = {}, options: RunOptions = {}): Promise<RawRecord[]> {
    const reply = await this.run(path, args, options)
    return reply.records
  }
}
