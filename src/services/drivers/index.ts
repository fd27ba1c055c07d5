// Driver registry - exports the driver and shared types

export * from './types'
export { RouterOSDriver, PING_COUNT, PING_SIZE, PING_TTL } from './routeros'
export type { CandidateOptions, Diagnostics } from './routeros'
export { resolveOptions, driverOptionsSchema, API_PORT, API_SSL_PORT } from './options'
export type { DriverOptions, DriverHooks, ResolvedOptions } from './options'

import { RouterOSDriver } from './routeros'
import type { DriverOptions } from './options'

export type DriverFactory = (hostname: string, username: string, password: string, options?: DriverOptions) => RouterOSDriver

// Registry of all available drivers by name
export const drivers: Record<string, DriverFactory> = {
  'ros': (hostname, username, password, options) => new RouterOSDriver(hostname, username, password, options),
}

// Get driver by name
export function getDriver(name: string): DriverFactory | undefined {
  return drivers[name]
}
