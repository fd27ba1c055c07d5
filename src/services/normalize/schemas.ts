import {
  asBoolean,
  asCidr,
  asDuration,
  asFloat,
  asInteger,
  asIp,
  asList,
  asMac,
  asMacOrBlank,
  asMilliseconds,
  asNegatedBoolean,
  asString,
  type Cidr,
} from './coerce'
import { defineSchema } from './normalizer'

// Field tables for the RouterOS print commands the driver reads.
// Candidate lists cover attribute names that differ between RouterOS 6 and 7.

export interface InterfaceRow {
  name: string
  isUp: boolean
  isEnabled: boolean
  description: string
  mtu: number
  macAddress: string
}

export const interfaceSchema = defineSchema<InterfaceRow>('interface', f => ({
  name: f.required('name', asString),
  isUp: f.field('running', asBoolean, false),
  isEnabled: f.field('disabled', asNegatedBoolean, true),
  description: f.field('comment', asString, ''),
  mtu: f.field(['actual-mtu', 'mtu'], asInteger(), 0),
  macAddress: f.field('mac-address', asMacOrBlank, ''),
}))

export interface InterfaceCountersRow {
  name: string
  txErrors: number
  rxErrors: number
  txDiscards: number
  rxDiscards: number
  txOctets: number
  rxOctets: number
  txPackets: number
  rxPackets: number
}

export const interfaceCountersSchema = defineSchema<InterfaceCountersRow>('interface-counters', f => ({
  name: f.required('name', asString),
  txErrors: f.field('tx-error', asInteger(), 0),
  rxErrors: f.field('rx-error', asInteger(), 0),
  txDiscards: f.field('tx-drop', asInteger(), 0),
  rxDiscards: f.field('rx-drop', asInteger(), 0),
  txOctets: f.field('tx-byte', asInteger(), 0),
  rxOctets: f.field('rx-byte', asInteger(), 0),
  txPackets: f.field('tx-packet', asInteger(), 0),
  rxPackets: f.field('rx-packet', asInteger(), 0),
}))

export interface AddressRow {
  interface: string
  address: Cidr
}

export const addressSchema = defineSchema<AddressRow>('address', f => ({
  interface: f.required(['interface', 'actual-interface'], asString),
  address: f.required('address', asCidr),
}))

export interface ArpRow {
  interface: string
  mac: string
  ip: string
}

export const arpSchema = defineSchema<ArpRow>('arp', f => ({
  interface: f.required('interface', asString),
  mac: f.required('mac-address', asMac),
  ip: f.required('address', asIp),
}))

export interface Ipv6NeighborRow extends ArpRow {
  state: string
}

export const ipv6NeighborSchema = defineSchema<Ipv6NeighborRow>('ipv6-neighbor', f => ({
  interface: f.required('interface', asString),
  mac: f.required('mac-address', asMac),
  ip: f.required('address', asIp),
  state: f.field('status', asString, ''),
}))

export interface MacTableRow {
  mac: string
  interface: string
  vlan: number
  static: boolean
  active: boolean
}

// The vid is not consistently set by the device, 1 is the bridge default
export const bridgeHostSchema = defineSchema<MacTableRow>('bridge-host', f => ({
  mac: f.required('mac-address', asMac),
  interface: f.required(['on-interface', 'interface'], asString),
  vlan: f.field('vid', asInteger(), 1),
  static: f.field('dynamic', asNegatedBoolean, true),
  active: f.field('invalid', asNegatedBoolean, true),
}))

// CRS1xx/CRS2xx switch chip table
export const unicastFdbSchema = defineSchema<MacTableRow>('unicast-fdb', f => ({
  mac: f.required('mac-address', asMac),
  interface: f.required('port', asString),
  vlan: f.field('vlan-id', asInteger(), 0),
  static: f.field('dynamic', asNegatedBoolean, true),
  active: f.field('active', asBoolean, false),
}))

export interface VrfRow {
  routingMark: string
  interfaces: string[]
  routeDistinguisher: string
}

export const vrfSchema = defineSchema<VrfRow>('vrf', f => ({
  routingMark: f.required(['routing-mark', 'name'], asString),
  interfaces: f.field('interfaces', asList, []),
  routeDistinguisher: f.field('route-distinguisher', asString, ''),
}))

export interface NeighborRow {
  interface: string
  identity: string
  interfaceName: string
  macAddress: string
  systemDescription: string
  systemCaps: string[]
  systemCapsEnabled: string[]
}

export const neighborSchema = defineSchema<NeighborRow>('ip-neighbor', f => ({
  interface: f.required('interface', asString),
  identity: f.field('identity', asString, ''),
  interfaceName: f.field('interface-name', asString, ''),
  macAddress: f.field('mac-address', asString, ''),
  systemDescription: f.field('system-description', asString, ''),
  systemCaps: f.field('system-caps', asList, []),
  systemCapsEnabled: f.field('system-caps-enabled', asList, []),
}))

export interface BgpInstanceRow {
  name: string
  as: number
  routerId: string
  routingTable: string
}

export const bgpInstanceSchema = defineSchema<BgpInstanceRow>('bgp-instance', f => ({
  name: f.required('name', asString),
  as: f.required('as', asInteger()),
  routerId: f.field('router-id', asString, ''),
  routingTable: f.field('routing-table', asString, ''),
}))

export interface BgpPeerRow {
  name: string
  instance: string
  remoteAddress: string
  remoteAs: number
  remoteId: string
  established: boolean
  disabled: boolean
  addressFamilies: string[]
  prefixCount: number
  uptime: number
  localAddress: string
  multihop: boolean
  removePrivateAs: boolean
  inFilter: string
  outFilter: string
  updatesReceived: number
  withdrawnReceived: number
  updatesSent: number
  withdrawnSent: number
  state: string
  as4Capability: boolean
  holdTime: number
  usedHoldTime: number
  keepaliveTime: number
  usedKeepaliveTime: number
}

export const bgpPeerSchema = defineSchema<BgpPeerRow>('bgp-peer', f => {
  const holdTime = f.field('hold-time', asDuration, 30)
  return {
    name: f.required('name', asString),
    instance: f.field('instance', asString, 'default'),
    remoteAddress: f.required('remote-address', asString),
    remoteAs: f.required('remote-as', asInteger()),
    remoteId: f.field('remote-id', asString, ''),
    established: f.field('established', asBoolean, false),
    disabled: f.field('disabled', asBoolean, false),
    addressFamilies: f.field('address-families', asList, ['ip']),
    prefixCount: f.field('prefix-count', asInteger(), 0),
    uptime: f.field('uptime', asDuration, 0),
    localAddress: f.field('local-address', asString, ''),
    multihop: f.field('multihop', asBoolean, false),
    removePrivateAs: f.field('remove-private-as', asBoolean, false),
    inFilter: f.field('in-filter', asString, ''),
    outFilter: f.field('out-filter', asString, ''),
    updatesReceived: f.field('updates-received', asInteger(), 0),
    withdrawnReceived: f.field('withdrawn-received', asInteger(), 0),
    updatesSent: f.field('updates-sent', asInteger(), 0),
    withdrawnSent: f.field('withdrawn-sent', asInteger(), 0),
    state: f.field('state', asString, ''),
    as4Capability: f.field('as4-capability', asBoolean, true),
    holdTime,
    usedHoldTime: f.field('used-hold-time', asDuration, holdTime),
    keepaliveTime: f.field('keepalive-time', asDuration, 10),
    usedKeepaliveTime: f.field('used-keepalive-time', asDuration, 10),
  }
})

export interface BgpAdvertisementRow {
  peer: string
  prefix: string
}

export const bgpAdvertisementSchema = defineSchema<BgpAdvertisementRow>('bgp-advertisement', f => ({
  peer: f.required('peer', asString),
  prefix: f.required('prefix', asString),
}))

export interface ResourceRow {
  uptime: number
  platform: string
  boardName: string
  version: string
  totalMemory: number
  freeMemory: number
}

export const resourceSchema = defineSchema<ResourceRow>('system-resource', f => ({
  uptime: f.required('uptime', asDuration),
  platform: f.field('platform', asString, 'MikroTik'),
  boardName: f.field('board-name', asString, ''),
  version: f.field('version', asString, ''),
  totalMemory: f.field('total-memory', asInteger(), 0),
  freeMemory: f.field('free-memory', asInteger(), 0),
}))

export const identitySchema = defineSchema<{ name: string }>('system-identity', f => ({
  name: f.required('name', asString),
}))

export const routerboardSchema = defineSchema<{ serialNumber: string }>('system-routerboard', f => ({
  serialNumber: f.field('serial-number', asString, ''),
}))

export interface HealthRow {
  activeFan: string
  fanSpeed: number
  temperatures: { sensor: string; celsius: number }[]
  powerSupplies: { name: string; ok: boolean }[]
}

// Reported sensor name -> health attribute
const TEMPERATURE_SENSORS: readonly (readonly [string, string])[] = [
  ['board', 'temperature'],
  ['cpu', 'cpu-temperature'],
  ['board2', 'board-temperature1'],
]

export const healthSchema = defineSchema<HealthRow>('system-health', f => ({
  activeFan: f.field('active-fan', asString, 'none'),
  fanSpeed: f.field(['fan-speed', 'fan1-speed'], asInteger('RPM'), 0),
  temperatures: TEMPERATURE_SENSORS
    .filter(([, attribute]) => f.has(attribute))
    .map(([sensor, attribute]) => ({ sensor, celsius: f.field(attribute, asFloat(), 0) })),
  powerSupplies: ['psu1', 'psu2']
    .filter(name => f.has(`${name}-state`))
    .map(name => ({ name, ok: f.field(`${name}-state`, asString, '') === 'ok' })),
}))

export interface CpuRow {
  cpu: string
  load: number
}

export const cpuSchema = defineSchema<CpuRow>('system-cpu', f => ({
  cpu: f.required('cpu', asString),
  load: f.field('load', asFloat(), 0),
}))

export interface NtpClientRow {
  serverNames: string[]
  primaryNtp: string
  secondaryNtp: string
}

export const ntpClientSchema = defineSchema<NtpClientRow>('ntp-client', f => ({
  serverNames: f.field(['server-dns-names', 'servers'], asList, []),
  primaryNtp: f.field('primary-ntp', asString, ''),
  secondaryNtp: f.field('secondary-ntp', asString, ''),
}))

export interface SnmpCommunityRow {
  name: string
  addresses: string
  readAccess: boolean
}

export const snmpCommunitySchema = defineSchema<SnmpCommunityRow>('snmp-community', f => ({
  name: f.required('name', asString),
  addresses: f.field('addresses', asString, ''),
  readAccess: f.field('read-access', asBoolean, false),
}))

export interface SnmpRow {
  engineId: string
  contact: string
  location: string
}

export const snmpSchema = defineSchema<SnmpRow>('snmp', f => ({
  engineId: f.field('engine-id', asString, ''),
  contact: f.field('contact', asString, ''),
  location: f.field('location', asString, ''),
}))

export interface UserRow {
  name: string
  group: string
}

export const userSchema = defineSchema<UserRow>('user', f => ({
  name: f.required('name', asString),
  group: f.field('group', asString, ''),
}))

export interface PingRow {
  host: string
  sent: number
  packetLoss: number
  time: number
  minRtt: number
  avgRtt: number
  maxRtt: number
}

export const pingSchema = defineSchema<PingRow>('ping', f => ({
  host: f.field('host', asString, ''),
  sent: f.field('sent', asInteger(), 0),
  packetLoss: f.field('packet-loss', asInteger(), 0),
  time: f.field('time', asMilliseconds, -1),
  minRtt: f.field('min-rtt', asMilliseconds, -1),
  avgRtt: f.field('avg-rtt', asMilliseconds, -1),
  maxRtt: f.field('max-rtt', asMilliseconds, -1),
}))
