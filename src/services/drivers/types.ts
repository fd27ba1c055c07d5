export type LogLevel = 'info' | 'success' | 'warn' | 'error'

export type LogFn = (level: LogLevel, message: string) => void

export interface Facts {
  uptime: number  // seconds
  vendor: string
  model: string
  hostname: string
  fqdn: string
  osVersion: string
  serialNumber: string
  interfaceList: string[]
}

export interface InterfaceInfo {
  isUp: boolean
  isEnabled: boolean
  description: string
  lastFlapped: number  // -1 when the device does not report it
  mtu: number
  speed: number
  macAddress: string
}

export interface InterfaceCounters {
  txErrors: number
  rxErrors: number
  txDiscards: number
  rxDiscards: number
  txOctets: number
  rxOctets: number
  txUnicastPackets: number
  rxUnicastPackets: number
  txMulticastPackets: number
  rxMulticastPackets: number
  txBroadcastPackets: number
  rxBroadcastPackets: number
}

export interface AddressFamilies {
  ipv4?: Record<string, { prefixLength: number }>
  ipv6?: Record<string, { prefixLength: number }>
}

export interface ArpEntry {
  interface: string
  mac: string
  ip: string
  age: number
}

export interface Ipv6Neighbor extends ArpEntry {
  state: string
}

export interface MacAddressEntry {
  mac: string
  interface: string
  vlan: number
  static: boolean
  active: boolean
  moves: number
  lastMove: number
}

export interface NetworkInstance {
  name: string
  type: 'L3VRF'
  state: { routeDistinguisher: string }
  interfaces: { interface: Record<string, Record<string, never>> }
}

export interface LldpNeighbor {
  hostname: string
  port: string
}

export interface LldpNeighborDetail {
  parentInterface: string
  remoteChassisId: string
  remoteSystemName: string
  remotePort: string
  remotePortDescription: string
  remoteSystemDescription: string
  remoteSystemCapab: string[]
  remoteSystemEnableCapab: string[]
}

export interface PrefixStats {
  sentPrefixes: number
  acceptedPrefixes: number
  receivedPrefixes: number
}

export interface BgpPeer {
  localAs: number
  remoteAs: number
  remoteId: string
  isUp: boolean
  isEnabled: boolean
  description: string
  uptime: number
  addressFamily: Record<string, PrefixStats>
}

export interface BgpInstanceNeighbors {
  routerId: string
  peers: Record<string, BgpPeer>
}

export interface BgpNeighborDetail {
  up: boolean
  localAs: number
  remoteAs: number
  routerId: string
  localAddress: string
  localAddressConfigured: boolean
  localPort: number
  routingTable: string
  remoteAddress: string
  remotePort: number
  multihop: boolean
  multipath: boolean
  removePrivateAs: boolean
  importPolicy: string
  exportPolicy: string
  inputMessages: number
  outputMessages: number
  inputUpdates: number
  outputUpdates: number
  messagesQueuedOut: number
  connectionState: string
  previousConnectionState: string
  lastEvent: string
  suppress4ByteAs: boolean
  localAsPrepend: boolean
  holdtime: number
  configuredHoldtime: number
  keepalive: number
  configuredKeepalive: number
  activePrefixCount: number
  receivedPrefixCount: number
  acceptedPrefixCount: number
  suppressedPrefixCount: number
  advertisedPrefixCount: number
  flapCount: number
}

export interface Environment {
  fans: Record<string, { status: boolean }>
  temperature: Record<string, { temperature: number; isAlert: boolean; isCritical: boolean }>
  power: Record<string, { status: boolean; capacity: number; output: number }>
  cpu: Record<string, { usage: number }>
  memory: { availableRam: number; usedRam: number }
}

export interface SnmpInformation {
  chassisId: string
  community: Record<string, { acl: string; mode: 'ro' | 'rw' }>
  contact: string
  location: string
}

export interface UserInfo {
  level: number
  password: string
  sshkeys: string[]
}

export interface PingOptions {
  source?: string
  ttl?: number
  size?: number
  count?: number
  vrf?: string
}

export interface PingProbe {
  ipAddress: string
  rtt: number  // milliseconds, -1 when lost
}

export interface PingResult {
  success: {
    probesSent: number
    packetLoss: number
    rttMin: number
    rttMax: number
    rttAvg: number
    rttStddev: number
    results: PingProbe[]
  }
}

export interface ConfigResult {
  running: string
  startup: string
  candidate: string
}
