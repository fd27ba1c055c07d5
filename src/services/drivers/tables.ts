import net from 'node:net'
import type { RawRecord } from '../api/channel'
import type { AddressRow, BgpInstanceRow, BgpPeerRow, VrfRow } from '../normalize/schemas'
import type { BgpNeighborDetail, NetworkInstance } from './types'

// Natural order: ether2 before ether10
export function sortNicely(names: readonly string[]): string[] {
  const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' })
  return [...names].sort(collator.compare)
}

// Unique items of comma separated lists
export function flattenLists(lists: readonly string[][]): string[] {
  return [...new Set(lists.flat())]
}

export function ipVersion(prefix: string): 4 | 6 {
  const address = prefix.split('/')[0]
  return net.isIP(address) === 6 ? 6 : 4
}

// RouterOS names the IPv4 address family "ip"
export function familyName(addressFamily: string): string {
  return addressFamily === 'ip' ? 'ipv4' : addressFamily
}

export function instanceName(name: string): string {
  return name === 'default' ? 'global' : name
}

// Neighbor interface names are reversed, "sfp-sfpplus1,bridge" is bridge/sfp-sfpplus1
export class LldpInterface {
  constructor(readonly parent: string, readonly child: string) {}

  static fromApi(value: string): LldpInterface {
    const parts = value.split(',').reverse()
    return new LldpInterface(parts[0] ?? '', parts.slice(1).join(','))
  }

  toString(): string {
    return this.child ? `${this.parent}/${this.child}` : this.parent
  }
}

// RouterOS 7 reports health as one {name, value} row per sensor
export function flattenHealth(records: readonly RawRecord[]): RawRecord | null {
  if (records.length === 0) return null
  const perSensor = records.every(r => 'name' in r && 'value' in r)
  if (!perSensor) return records[0]

  const flat: RawRecord = {}
  for (const record of records) {
    flat[record.name] = record.value
  }
  return flat
}

export function groupAddresses(rows: readonly AddressRow[]): Map<string, Record<string, { prefixLength: number }>> {
  const byInterface = new Map<string, Record<string, { prefixLength: number }>>()
  for (const row of rows) {
    const entry = byInterface.get(row.interface) ?? {}
    entry[row.address.address] = { prefixLength: row.address.prefixLength }
    byInterface.set(row.interface, entry)
  }
  return byInterface
}

export function convertVrfTable(rows: readonly VrfRow[]): Record<string, NetworkInstance> {
  const instances: Record<string, NetworkInstance> = {}
  for (const row of rows) {
    const interfaces: Record<string, Record<string, never>> = {}
    for (const name of row.interfaces) {
      interfaces[name] = {}
    }
    instances[row.routingMark] = {
      name: row.routingMark,
      type: 'L3VRF',
      state: { routeDistinguisher: row.routeDistinguisher },
      interfaces: { interface: interfaces },
    }
  }
  return instances
}

export function bgpPeerDetail(peer: BgpPeerRow, instance: BgpInstanceRow, advertised: number): BgpNeighborDetail {
  return {
    up: peer.established,
    localAs: instance.as,
    remoteAs: peer.remoteAs,
    routerId: instance.routerId,
    localAddress: peer.localAddress,
    localAddressConfigured: peer.localAddress !== '',
    localPort: 179,
    routingTable: instance.routingTable,
    remoteAddress: peer.remoteAddress,
    remotePort: 179,
    multihop: peer.multihop,
    multipath: false,
    removePrivateAs: peer.removePrivateAs,
    importPolicy: peer.inFilter,
    exportPolicy: peer.outFilter,
    inputMessages: peer.updatesReceived + peer.withdrawnReceived,
    outputMessages: peer.updatesSent + peer.withdrawnSent,
    inputUpdates: peer.updatesReceived,
    outputUpdates: peer.updatesSent,
    messagesQueuedOut: 0,
    connectionState: peer.state,
    previousConnectionState: '',
    lastEvent: '',
    suppress4ByteAs: !peer.as4Capability,
    localAsPrepend: false,
    holdtime: peer.usedHoldTime,
    configuredHoldtime: peer.holdTime,
    keepalive: peer.usedKeepaliveTime,
    configuredKeepalive: peer.keepaliveTime,
    activePrefixCount: peer.prefixCount,
    receivedPrefixCount: peer.prefixCount,
    acceptedPrefixCount: peer.prefixCount,
    suppressedPrefixCount: 0,
    advertisedPrefixCount: advertised,
    flapCount: 0,
  }
}
