import { FramingError } from '../errors'

// RouterOS API sentence framing
// A sentence is a list of length-prefixed words terminated by a zero-length word.
// Length prefix classes:
//   len < 0x80        -> 1 byte   0xxxxxxx
//   len < 0x4000      -> 2 bytes  10xxxxxx ...
//   len < 0x200000    -> 3 bytes  110xxxxx ...
//   len < 0x10000000  -> 4 bytes  1110xxxx ...
//   otherwise         -> 5 bytes  0xF0 + 32-bit big endian length
// First bytes 0xF8-0xFF are reserved control bytes.

export type WordEncoding = 'utf8' | 'latin1'

export const MAX_WORD_LENGTH = 0xffffffff

export interface DecodedSentence {
  words: string[]
  bytesConsumed: number
}

interface DecodedLength {
  length: number
  width: number
}

export function encodeLength(length: number): Buffer {
  if (!Number.isInteger(length) || length < 0 || length > MAX_WORD_LENGTH) {
    throw new RangeError(`Invalid word length: ${length}`)
  }

  if (length < 0x80) {
    return Buffer.from([length])
  }
  if (length < 0x4000) {
    const value = length | 0x8000
    return Buffer.from([(value >> 8) & 0xff, value & 0xff])
  }
  if (length < 0x200000) {
    const value = length | 0xc00000
    return Buffer.from([(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff])
  }
  if (length < 0x10000000) {
    // >>> 0 keeps the value unsigned once bit 31 is set
    const value = (length | 0xe0000000) >>> 0
    const header = Buffer.alloc(4)
    header.writeUInt32BE(value, 0)
    return header
  }

  const header = Buffer.alloc(5)
  header[0] = 0xf0
  header.writeUInt32BE(length, 1)
  return header
}

// Returns null when the buffer does not hold the whole prefix yet
export function decodeLength(buffer: Uint8Array, offset = 0): DecodedLength | null {
  if (offset >= buffer.length) return null
  const first = buffer[offset]
  const available = buffer.length - offset

  if ((first & 0x80) === 0x00) {
    return { length: first, width: 1 }
  }
  if ((first & 0xc0) === 0x80) {
    if (available < 2) return null
    return { length: ((first & 0x3f) << 8) | buffer[offset + 1], width: 2 }
  }
  if ((first & 0xe0) === 0xc0) {
    if (available < 3) return null
    return {
      length: ((first & 0x1f) << 16) | (buffer[offset + 1] << 8) | buffer[offset + 2],
      width: 3,
    }
  }
  if ((first & 0xf0) === 0xe0) {
    if (available < 4) return null
    const length = (((first & 0x0f) << 24) | (buffer[offset + 1] << 16) | (buffer[offset + 2] << 8) | buffer[offset + 3]) >>> 0
    return { length, width: 4 }
  }
  if (first === 0xf0) {
    if (available < 5) return null
    const length = ((buffer[offset + 1] << 24) | (buffer[offset + 2] << 16) | (buffer[offset + 3] << 8) | buffer[offset + 4]) >>> 0
    return { length, width: 5 }
  }

  throw new FramingError(`Reserved control byte 0x${first.toString(16)} in length prefix`)
}

export function encodeWord(word: string | Uint8Array, encoding: WordEncoding = 'utf8'): Buffer {
  const bytes = typeof word === 'string' ? Buffer.from(word, encoding) : Buffer.from(word)
  return Buffer.concat([encodeLength(bytes.length), bytes])
}

export function encodeSentence(words: readonly (string | Uint8Array)[], encoding: WordEncoding = 'utf8'): Buffer {
  const parts = words.map(word => encodeWord(word, encoding))
  // Zero-length terminator
  parts.push(Buffer.from([0]))
  return Buffer.concat(parts)
}

// Decode one sentence starting at offset. Returns null when the sentence is incomplete;
// the caller keeps the bytes and retries once more data arrives.
export function decodeSentence(
  buffer: Uint8Array,
  offset = 0,
  encoding: WordEncoding = 'utf8'
): DecodedSentence | null {
  const words: string[] = []
  let position = offset

  for (;;) {
    const prefix = decodeLength(buffer, position)
    if (!prefix) return null

    const start = position + prefix.width
    if (prefix.length === 0) {
      return { words, bytesConsumed: start - offset }
    }

    const end = start + prefix.length
    if (end > buffer.length) return null

    words.push(Buffer.from(buffer.buffer, buffer.byteOffset + start, prefix.length).toString(encoding))
    position = end
  }
}

// Accumulates stream chunks and yields complete sentences
export class SentenceDecoder {
  private pending: Buffer = Buffer.alloc(0)

  constructor(private readonly encoding: WordEncoding = 'utf8') {}

  get buffered(): number {
    return this.pending.length
  }

  push(chunk: Uint8Array): string[][] {
    this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk])

    const sentences: string[][] = []
    let offset = 0
    for (;;) {
      const decoded = decodeSentence(this.pending, offset, this.encoding)
      if (!decoded) break
      sentences.push(decoded.words)
      offset += decoded.bytesConsumed
    }

    if (offset > 0) {
      this.pending = this.pending.subarray(offset)
    }
    return sentences
  }

  // Called when the stream ends; leftover bytes mean a word was cut off
  end(): void {
    if (this.pending.length > 0) {
      const size = this.pending.length
      this.pending = Buffer.alloc(0)
      throw new FramingError(`Stream closed with ${size} bytes of an incomplete sentence`)
    }
  }
}
