// Error taxonomy shared by the API client, the normalizer and the driver.
// Fatal errors leave the session closed; the others are local to one operation.

export class DriverError extends Error {
  readonly fatal: boolean

  constructor(message: string, options: { fatal: boolean; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.fatal = options.fatal
  }
}

// Socket-level failure: refused, reset, DNS, unexpected close
export class ConnectionError extends DriverError {
  constructor(message: string, cause?: unknown) {
    super(message, { fatal: true, cause })
  }
}

export class AuthenticationError extends DriverError {
  constructor(message: string, cause?: unknown) {
    super(message, { fatal: true, cause })
  }
}

// Malformed byte stream, the connection is desynchronized
export class FramingError extends DriverError {
  constructor(message: string, cause?: unknown) {
    super(message, { fatal: true, cause })
  }
}

export class TimeoutError extends DriverError {
  constructor(message: string) {
    super(message, { fatal: true })
  }
}

export interface Trap {
  message: string
  category: number | null
}

// Device answered with !trap; the session stays usable
export class CommandError extends DriverError {
  readonly command: string
  readonly category: number | null
  readonly traps: Trap[]

  constructor(command: string, traps: Trap[]) {
    const first = traps[0] ?? { message: 'unknown failure', category: null }
    super(first.message, { fatal: false })
    this.command = command
    this.category = first.category
    this.traps = traps
  }
}

export class NormalizationError extends DriverError {
  readonly schema: string
  readonly field: string
  readonly index: number
  readonly raw: string | undefined

  constructor(schema: string, field: string, index: number, raw: string | undefined, reason: string) {
    super(`${schema}[${index}].${field}: ${reason}`, { fatal: false })
    this.schema = schema
    this.field = field
    this.index = index
    this.raw = raw
  }
}

// Invalid driver options or arguments, raised before anything is sent
export class ConfigurationError extends DriverError {
  constructor(message: string, cause?: unknown) {
    super(message, { fatal: false, cause })
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
