import { describe, it, expect } from 'vitest'
import { EventEmitter } from 'node:events'
import { collectOutput, formatHostKey, hostKeyType } from '../ssh'
import { TimeoutError } from '../errors'

// Wire format of a public key blob: uint32 length + algorithm name, then key material
function keyBlob(type: string, material: number[]): Buffer {
  const name = Buffer.from(type, 'ascii')
  const length = Buffer.alloc(4)
  length.writeUInt32BE(name.length, 0)
  return Buffer.concat([length, name, Buffer.from(material)])
}

describe('host key helpers', () => {
  it('reads the algorithm from a key blob', () => {
    expect(hostKeyType(keyBlob('ssh-rsa', [1, 2, 3]))).toBe('ssh-rsa')
    expect(hostKeyType(keyBlob('ecdsa-sha2-nistp256', [4]))).toBe('ecdsa-sha2-nistp256')
    expect(hostKeyType(Buffer.from([0, 0]))).toBe('')
  })

  it('formats keys the way the store saves them', () => {
    const blob = keyBlob('ssh-rsa', [1, 2, 3])
    expect(formatHostKey(blob)).toBe(`ssh-rsa ${blob.toString('base64')}`)
  })
})

// Exec channel double; the test pushes output and closes it
class FakeExecStream extends EventEmitter {
  readonly stderr = new EventEmitter()
  closed = false

  close(): void {
    this.closed = true
  }

  finish(code: number): void {
    this.emit('exit', code)
    this.emit('close')
  }
}

describe('collectOutput', () => {
  it('decodes characters split between chunks', async () => {
    const stream = new FakeExecStream()
    const output = collectOutput(stream, '/export', 1000)

    const text = Buffer.from('/interface\nset [ find ] comment="café"\n', 'utf8')
    const split = text.indexOf(0xc3) + 1
    stream.emit('data', text.subarray(0, split))
    stream.emit('data', text.subarray(split))
    stream.stderr.emit('data', Buffer.from('warn', 'utf8'))
    stream.finish(0)

    expect(await output).toEqual({
      stdout: '/interface\nset [ find ] comment="café"\n',
      stderr: 'warn',
      code: 0,
    })
  })

  it('reports the exit code', async () => {
    const stream = new FakeExecStream()
    const output = collectOutput(stream, '/export', 1000)
    stream.finish(1)
    expect((await output).code).toBe(1)
  })

  it('gives up on a command that never finishes', async () => {
    const stream = new FakeExecStream()
    await expect(collectOutput(stream, '/export', 20)).rejects.toThrow(TimeoutError)
    await expect(collectOutput(stream, '/import "x.rsc"', 20)).rejects.toThrow('/import "x.rsc" did not finish within 20ms')
    expect(stream.closed).toBe(true)
  })
})
