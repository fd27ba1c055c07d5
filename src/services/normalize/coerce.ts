import net from 'node:net'

// Every value arrives as a string; coercers turn it into the schema type or throw
export type Coercer<T> = (raw: string) => T

export class CoercionError extends Error {
  constructor(readonly raw: string, readonly expected: string) {
    super(`expected ${expected}, got "${raw}"`)
    this.name = 'CoercionError'
  }
}

export const asString: Coercer<string> = raw => raw

function stripSuffix(raw: string, suffix: string | undefined): string {
  const value = raw.trim()
  if (suffix && value.toLowerCase().endsWith(suffix.toLowerCase())) {
    return value.slice(0, value.length - suffix.length)
  }
  return value
}

// Optional unit suffix, e.g. asInteger('RPM') for "3400RPM"
export function asInteger(suffix?: string): Coercer<number> {
  return raw => {
    const value = stripSuffix(raw, suffix)
    if (!/^-?\d+$/.test(value)) throw new CoercionError(raw, 'integer')
    return Number(value)
  }
}

export function asFloat(suffix?: string): Coercer<number> {
  return raw => {
    const value = stripSuffix(raw, suffix)
    if (!/^-?\d+(\.\d+)?$/.test(value)) throw new CoercionError(raw, 'number')
    return Number(value)
  }
}

// Device truthy/falsy tokens
const BOOLEAN_TOKENS: Record<string, boolean> = {
  true: true,
  yes: true,
  false: false,
  no: false,
}

export const asBoolean: Coercer<boolean> = raw => {
  const value = BOOLEAN_TOKENS[raw.trim().toLowerCase()]
  if (value === undefined) throw new CoercionError(raw, 'boolean')
  return value
}

// disabled=true -> enabled=false
export const asNegatedBoolean: Coercer<boolean> = raw => !asBoolean(raw)

export function asEnum<T extends string>(values: readonly T[]): Coercer<T> {
  return raw => {
    const found = values.find(value => value === raw)
    if (found === undefined) throw new CoercionError(raw, `one of ${values.join('|')}`)
    return found
  }
}

const UNIT_SECONDS: Record<string, number> = {
  w: 604800,
  d: 86400,
  h: 3600,
  m: 60,
  s: 1,
  ms: 0.001,
  us: 0.000001,
  ns: 0.000000001,
}

const CLOCK_DURATION = /^(?:(\d+)w)?(?:(\d+)d)?(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/
const UNIT_DURATION = /^(?:\d+(?:\.\d+)?(?:ms|us|ns|w|d|h|m|s))+$/
const UNIT_TOKEN = /(\d+(?:\.\d+)?)(ms|us|ns|w|d|h|m|s)/g

// RouterOS durations to seconds: "1w2d3h4m5s", "3s200ms", "00:01:02", "1d02:03:04"
export function parseDuration(raw: string): number {
  const value = raw.trim()

  const clock = CLOCK_DURATION.exec(value)
  if (clock) {
    const [, weeks, days, hours, minutes, seconds] = clock
    return (
      Number(weeks ?? 0) * UNIT_SECONDS.w +
      Number(days ?? 0) * UNIT_SECONDS.d +
      Number(hours) * UNIT_SECONDS.h +
      Number(minutes) * UNIT_SECONDS.m +
      Number(seconds)
    )
  }

  if (!UNIT_DURATION.test(value)) throw new CoercionError(raw, 'duration')

  let total = 0
  for (const match of value.matchAll(UNIT_TOKEN)) {
    total += Number(match[1]) * UNIT_SECONDS[match[2]]
  }
  // Float noise from the sub-second units
  return Math.round(total * 1e6) / 1e6
}

export const asDuration: Coercer<number> = parseDuration

export const asMac: Coercer<string> = raw => {
  const value = raw.trim()
  if (!/^([0-9a-f]{2}[:-]){5}[0-9a-f]{2}$/i.test(value)) throw new CoercionError(raw, 'MAC address')
  return value.replace(/-/g, ':').toUpperCase()
}

// Interfaces without a hardware address report an empty value
export const asMacOrBlank: Coercer<string> = raw => (raw.trim() === '' ? '' : asMac(raw))

export const asIp: Coercer<string> = raw => {
  const value = raw.trim()
  if (net.isIP(value) === 0) throw new CoercionError(raw, 'IP address')
  return value.toLowerCase()
}

// "a,b,c" -> ['a', 'b', 'c'], empty string -> []
export const asList: Coercer<string[]> = raw => raw.split(',').map(item => item.trim()).filter(Boolean)

// Durations reported as "12ms" or "1ms234us" to milliseconds
export const asMilliseconds: Coercer<number> = raw => Math.round(parseDuration(raw) * 1e6) / 1e3

export interface Cidr {
  address: string
  prefixLength: number
}

// "192.0.2.1/24" -> { address: '192.0.2.1', prefixLength: 24 }
export const asCidr: Coercer<Cidr> = raw => {
  const [address, prefix, ...rest] = raw.trim().split('/')
  const version = net.isIP(address)
  const maxPrefix = version === 6 ? 128 : 32
  if (version === 0 || rest.length > 0 || prefix === undefined || !/^\d+$/.test(prefix) || Number(prefix) > maxPrefix) {
    throw new CoercionError(raw, 'address/prefix')
  }
  return { address: address.toLowerCase(), prefixLength: Number(prefix) }
}
