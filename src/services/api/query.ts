import { ConfigurationError } from '../errors'

// RouterOS API query words for print commands.
// Each word pushes a boolean onto the device's query stack; `?#` words combine
// the top of the stack (`|` or, `&` and, `!` not), one operator per character.

export type QueryValue = string | number | boolean

export interface QueryExpression {
  readonly words: readonly string[]
}

export function formatValue(value: QueryValue): string {
  if (typeof value === 'boolean') return value ? 'yes' : 'no'
  return String(value)
}

function expression(...words: string[]): QueryExpression {
  return { words }
}

function combine(operator: '|' | '&', expressions: readonly QueryExpression[]): QueryExpression {
  if (expressions.length === 0) {
    throw new ConfigurationError(`Cannot combine an empty list of query expressions with ${operator}`)
  }
  const words = expressions.flatMap(e => e.words)
  if (expressions.length > 1) {
    words.push(`?#${operator.repeat(expressions.length - 1)}`)
  }
  return { words }
}

export class Key {
  constructor(readonly name: string) {}

  eq(value: QueryValue): QueryExpression {
    return expression(`?${this.name}=${formatValue(value)}`)
  }

  ne(value: QueryValue): QueryExpression {
    return expression(`?${this.name}=${formatValue(value)}`, '?#!')
  }

  lt(value: QueryValue): QueryExpression {
    return expression(`?<${this.name}=${formatValue(value)}`)
  }

  gt(value: QueryValue): QueryExpression {
    return expression(`?>${this.name}=${formatValue(value)}`)
  }

  in(...values: QueryValue[]): QueryExpression {
    return combine('|', values.map(value => this.eq(value)))
  }

  // Item has the property at all
  exists(): QueryExpression {
    return expression(`?${this.name}`)
  }

  missing(): QueryExpression {
    return expression(`?-${this.name}`)
  }
}

export function key(name: string): Key {
  return new Key(name)
}

export function and(...expressions: QueryExpression[]): QueryExpression {
  return combine('&', expressions)
}

export function or(...expressions: QueryExpression[]): QueryExpression {
  return combine('|', expressions)
}

export function not(expr: QueryExpression): QueryExpression {
  return { words: [...expr.words, '?#!'] }
}

// Keys used across the driver
export const Keys = {
  name: key('name'),
  interface: key('interface'),
  address: key('address'),
  macAddress: key('mac-address'),
  disabled: key('disabled'),
  dstAddress: key('dst-address'),
  bgp: key('bgp'),
  receivedFrom: key('received-from'),
  remoteAddress: key('remote-address'),
  routingMark: key('routing-mark'),
  peer: key('peer'),
} as const

export const notDisabled = Keys.disabled.eq(false)
