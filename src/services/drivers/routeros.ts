import { readFile } from 'node:fs/promises'
import { CommandChannel, type CommandArguments, type RawRecord, type RunOptions } from '../api/channel'
import { login } from '../api/login'
import { Keys, and, notDisabled } from '../api/query'
import { Session } from '../api/session'
import { ConfigDiff, RouterOSConfig } from '../config-diff'
import { openDatabase, type HostKeyDatabase } from '../../db/client'
import { CommandError, ConfigurationError, ConnectionError, NormalizationError, describeError } from '../errors'
import { HostKeyStore } from '../host-keys'
import { normalize, normalizeRecord, type NormalizationIssue, type Schema } from '../normalize/normalizer'
import {
  addressSchema,
  arpSchema,
  bgpAdvertisementSchema,
  bgpInstanceSchema,
  bgpPeerSchema,
  bridgeHostSchema,
  cpuSchema,
  healthSchema,
  identitySchema,
  interfaceCountersSchema,
  interfaceSchema,
  ipv6NeighborSchema,
  neighborSchema,
  ntpClientSchema,
  pingSchema,
  resourceSchema,
  routerboardSchema,
  snmpCommunitySchema,
  snmpSchema,
  unicastFdbSchema,
  userSchema,
  vrfSchema,
  type MacTableRow,
} from '../normalize/schemas'
import { SshChannel, type ShellProvider } from '../ssh'
import { resolveOptions, type DriverOptions, type ResolvedOptions } from './options'
import {
  LldpInterface,
  bgpPeerDetail,
  convertVrfTable,
  familyName,
  flattenHealth,
  flattenLists,
  groupAddresses,
  instanceName,
  ipVersion,
  sortNicely,
} from './tables'
import type {
  AddressFamilies,
  ArpEntry,
  BgpInstanceNeighbors,
  BgpNeighborDetail,
  ConfigResult,
  Environment,
  Facts,
  InterfaceCounters,
  InterfaceInfo,
  Ipv6Neighbor,
  LldpNeighbor,
  LldpNeighborDetail,
  MacAddressEntry,
  NetworkInstance,
  PingOptions,
  PingResult,
  PrefixStats,
  SnmpInformation,
  UserInfo,
} from './types'

export const PING_TTL = 255
export const PING_SIZE = 100
export const PING_COUNT = 5

// Outcome of normalizing the replies of the last operation
export interface Diagnostics {
  issues: NormalizationIssue[]
  rejected: NormalizationError[]
}

export interface CandidateOptions {
  filename?: string
  config?: string | RouterOSConfig
  currentConfig?: string | RouterOSConfig
  currentConfigVerbose?: string | RouterOSConfig
}

function asConfig(value: string | RouterOSConfig): RouterOSConfig {
  return typeof value === 'string' ? RouterOSConfig.parse(value) : value
}

function toMacEntry(row: MacTableRow): MacAddressEntry {
  return { ...row, moves: 0, lastMove: 0 }
}

export class RouterOSDriver {
  diagnostics: Diagnostics = { issues: [], rejected: [] }

  private readonly options: ResolvedOptions
  private session: Session | null = null
  private channel: CommandChannel | null = null
  private opening: Promise<CommandChannel> | null = null
  private shellProvider: ShellProvider | null = null
  private hostKeyStore: Promise<HostKeyStore> | null = null
  // Opened by this driver, released on close
  private hostKeyDatabase: HostKeyDatabase | null = null

  constructor(
    readonly hostname: string,
    private readonly username: string,
    private readonly password: string,
    options: DriverOptions = {}
  ) {
    this.options = resolveOptions(options)
  }

  async open(): Promise<void> {
    await this.connect()
  }

  close(): void {
    this.session?.close()
    this.session = null
    this.channel = null
    this.opening = null

    this.hostKeyDatabase?.close()
    this.hostKeyDatabase = null
    this.hostKeyStore = null
  }

  isAlive(): { isAlive: boolean } {
    return { isAlive: this.session?.state === 'ready' }
  }

  async getFacts(): Promise<Facts> {
    this.resetDiagnostics()
    const resource = this.one(await this.call('/system/resource/print'), resourceSchema)
    const identity = this.one(await this.call('/system/identity/print'), identitySchema)
    const routerboard = this.one(await this.call('/system/routerboard/print'), routerboardSchema)
    const interfaces = this.rows(await this.call('/interface/print', {}, { proplist: ['name'] }), interfaceSchema)

    return {
      uptime: resource.uptime,
      vendor: resource.platform,
      model: resource.boardName,
      hostname: identity.name,
      fqdn: '',
      osVersion: resource.version,
      serialNumber: routerboard.serialNumber,
      interfaceList: sortNicely(interfaces.map(i => i.name)),
    }
  }

  async getInterfaces(): Promise<Record<string, InterfaceInfo>> {
    this.resetDiagnostics()
    const result: Record<string, InterfaceInfo> = {}
    for (const row of this.rows(await this.call('/interface/print'), interfaceSchema)) {
      result[row.name] = {
        isUp: row.isUp,
        isEnabled: row.isEnabled,
        description: row.description,
        lastFlapped: -1,
        mtu: row.mtu,
        speed: -1,
        macAddress: row.macAddress,
      }
    }
    return result
  }

  async getInterfacesCounters(): Promise<Record<string, InterfaceCounters>> {
    this.resetDiagnostics()
    const records = await this.call('/interface/print', { stats: true })
    const result: Record<string, InterfaceCounters> = {}
    for (const row of this.rows(records, interfaceCountersSchema)) {
      result[row.name] = {
        txErrors: row.txErrors,
        rxErrors: row.rxErrors,
        txDiscards: row.txDiscards,
        rxDiscards: row.rxDiscards,
        txOctets: row.txOctets,
        rxOctets: row.rxOctets,
        txUnicastPackets: row.txPackets,
        rxUnicastPackets: row.rxPackets,
        txMulticastPackets: 0,
        rxMulticastPackets: 0,
        txBroadcastPackets: 0,
        rxBroadcastPackets: 0,
      }
    }
    return result
  }

  async getInterfacesIp(): Promise<Record<string, AddressFamilies>> {
    this.resetDiagnostics()
    const result: Record<string, AddressFamilies> = {}

    const ipv4 = groupAddresses(this.rows(await this.call('/ip/address/print'), addressSchema))
    for (const [name, addresses] of ipv4) {
      result[name] = { ...result[name], ipv4: addresses }
    }

    // No ipv6 package, or disabled
    const ipv6Records = await this.optional('IPv6 addresses', () => this.call('/ipv6/address/print'))
    if (ipv6Records) {
      for (const [name, addresses] of groupAddresses(this.rows(ipv6Records, addressSchema))) {
        result[name] = { ...result[name], ipv6: addresses }
      }
    }
    return result
  }

  async getArpTable(vrf = ''): Promise<ArpEntry[]> {
    this.resetDiagnostics()
    let records: RawRecord[]
    if (vrf) {
      const vrfs = this.rows(
        await this.call('/ip/route/vrf/print', {}, { proplist: ['interfaces', 'routing-mark'], query: Keys.routingMark.eq(vrf) }),
        vrfSchema
      )
      const interfaces = flattenLists(vrfs.map(v => v.interfaces))
      if (interfaces.length === 0) return []
      records = await this.call('/ip/arp/print', {}, {
        proplist: ['interface', 'mac-address', 'address'],
        query: Keys.interface.in(...interfaces),
      })
    } else {
      records = await this.call('/ip/arp/print')
    }

    // Incomplete entries have no MAC yet
    const complete = records.filter(r => 'mac-address' in r)
    return this.rows(complete, arpSchema).map(row => ({ ...row, age: -1 }))
  }

  async getIpv6NeighborsTable(): Promise<Ipv6Neighbor[]> {
    this.resetDiagnostics()
    const records = (await this.call('/ipv6/neighbor/print')).filter(r => 'mac-address' in r)
    return this.rows(records, ipv6NeighborSchema).map(row => ({ ...row, age: -1 }))
  }

  async getMacAddressTable(): Promise<MacAddressEntry[]> {
    this.resetDiagnostics()
    const table = this.rows(await this.call('/interface/bridge/host/print'), bridgeHostSchema).map(toMacEntry)

    // Only CRS1xx and CRS2xx switches have this table
    const fdb = await this.optional('switch unicast FDB', () => this.call('/interface/ethernet/switch/unicast-fdb/print'))
    if (fdb) {
      table.push(...this.rows(fdb, unicastFdbSchema).map(toMacEntry))
    }
    return table
  }

  async getNetworkInstances(name = ''): Promise<Record<string, NetworkInstance>> {
    this.resetDiagnostics()
    const records = await this.call('/ip/route/vrf/print', {}, {
      proplist: ['interfaces', 'routing-mark', 'route-distinguisher'],
      query: name ? Keys.routingMark.eq(name) : undefined,
    })
    return convertVrfTable(this.rows(records, vrfSchema))
  }

  async getLldpNeighbors(): Promise<Record<string, LldpNeighbor[]>> {
    this.resetDiagnostics()
    const records = await this.call('/ip/neighbor/print', {}, { proplist: ['identity', 'interface-name', 'interface'] })
    const table: Record<string, LldpNeighbor[]> = {}
    for (const row of this.rows(records, neighborSchema)) {
      const key = LldpInterface.fromApi(row.interface).toString()
      table[key] = [...(table[key] ?? []), { hostname: row.identity, port: row.interfaceName }]
    }
    return table
  }

  // Parent and child share one attribute on the device, so filtering happens here
  async getLldpNeighborsDetail(interfaceName = ''): Promise<Record<string, LldpNeighborDetail[]>> {
    this.resetDiagnostics()
    const records = await this.call('/ip/neighbor/print', {}, {
      proplist: ['identity', 'interface-name', 'interface', 'mac-address', 'system-description', 'system-caps', 'system-caps-enabled'],
    })
    const table: Record<string, LldpNeighborDetail[]> = {}
    for (const row of this.rows(records, neighborSchema)) {
      const iface = LldpInterface.fromApi(row.interface)
      const key = iface.toString()
      table[key] = [...(table[key] ?? []), {
        parentInterface: iface.parent,
        remoteChassisId: row.macAddress,
        remoteSystemName: row.identity,
        remotePort: row.interfaceName,
        remotePortDescription: '',
        remoteSystemDescription: row.systemDescription,
        remoteSystemCapab: row.systemCaps,
        remoteSystemEnableCapab: row.systemCapsEnabled,
      }]
    }
    if (!interfaceName) return table
    return { [interfaceName]: table[interfaceName] ?? [] }
  }

  async getBgpNeighbors(): Promise<Record<string, BgpInstanceNeighbors>> {
    this.resetDiagnostics()

    // Prefixes advertised to each peer, per address family
    const sent = new Map<string, Map<string, number>>()
    for (const row of this.rows(await this.call('/routing/bgp/advertisements/print'), bgpAdvertisementSchema)) {
      const family = `ipv${ipVersion(row.prefix)}`
      const counts = sent.get(row.peer) ?? new Map<string, number>()
      counts.set(family, (counts.get(family) ?? 0) + 1)
      sent.set(row.peer, counts)
    }
    const sentPrefixes = (peer: string, family: string): number => sent.get(peer)?.get(family) ?? 0

    const instances = this.rows(await this.call('/routing/bgp/instance/print'), bgpInstanceSchema)
    const peers = this.rows(await this.call('/routing/bgp/peer/print'), bgpPeerSchema)
    const result: Record<string, BgpInstanceNeighbors> = {}

    for (const instance of instances) {
      const neighbors: BgpInstanceNeighbors = { routerId: instance.routerId, peers: {} }
      result[instanceName(instance.name)] = neighbors

      for (const peer of peers.filter(p => p.instance === instance.name)) {
        const addressFamily: Record<string, PrefixStats> = {}

        if (peer.addressFamilies.length > 1) {
          // Prefix counts are not per family, count the peer's routes instead
          for (const af of peer.addressFamilies) {
            const routes = await this.call(`/${af}/route/print`, {}, {
              proplist: ['dst-address'],
              query: and(Keys.bgp.eq(true), Keys.receivedFrom.eq(peer.name)),
            })
            const family = familyName(af)
            addressFamily[family] = {
              sentPrefixes: sentPrefixes(peer.name, family),
              acceptedPrefixes: routes.length,
              receivedPrefixes: routes.length,
            }
          }
        } else {
          const family = familyName(peer.addressFamilies[0] ?? 'ip')
          addressFamily[family] = {
            sentPrefixes: sentPrefixes(peer.name, family),
            acceptedPrefixes: peer.prefixCount,
            receivedPrefixes: peer.prefixCount,
          }
        }

        neighbors.peers[peer.remoteAddress] = {
          localAs: instance.as,
          remoteAs: peer.remoteAs,
          remoteId: peer.remoteId,
          isUp: peer.established,
          isEnabled: !peer.disabled,
          description: peer.name,
          uptime: peer.uptime,
          addressFamily,
        }
      }
    }
    return result
  }

  async getBgpNeighborsDetail(address = ''): Promise<Record<string, Record<string, BgpNeighborDetail[]>>> {
    this.resetDiagnostics()
    const peers = this.rows(
      await this.call('/routing/bgp/peer/print', {}, { query: address ? Keys.remoteAddress.eq(address) : undefined }),
      bgpPeerSchema
    )
    if (peers.length === 0) return {}

    const peerNames = [...new Set(peers.map(p => p.name))]
    const advertisements = this.rows(
      await this.call('/routing/bgp/advertisements/print', {}, { proplist: ['peer', 'prefix'], query: Keys.peer.in(...peerNames) }),
      bgpAdvertisementSchema
    )
    const instances = this.rows(
      await this.call('/routing/bgp/instance/print', {}, {
        query: and(Keys.name.in(...new Set(peers.map(p => p.instance))), notDisabled),
      }),
      bgpInstanceSchema
    )

    const sent = new Map<string, number>()
    for (const row of advertisements) {
      sent.set(row.peer, (sent.get(row.peer) ?? 0) + 1)
    }

    const result: Record<string, Record<string, BgpNeighborDetail[]>> = {}
    for (const instance of instances) {
      const byAs: Record<string, BgpNeighborDetail[]> = result[instanceName(instance.name)] ?? {}
      result[instanceName(instance.name)] = byAs
      for (const peer of peers.filter(p => p.instance === instance.name)) {
        const key = String(peer.remoteAs)
        byAs[key] = [...(byAs[key] ?? []), bgpPeerDetail(peer, instance, sent.get(peer.name) ?? 0)]
      }
    }
    return result
  }

  async getEnvironment(): Promise<Environment> {
    this.resetDiagnostics()
    const environment: Environment = {
      fans: {},
      temperature: {},
      power: {},
      cpu: {},
      memory: { availableRam: 0, usedRam: 0 },
    }

    const healthRecord = flattenHealth(await this.call('/system/health/print'))
    if (healthRecord) {
      const health = this.one([healthRecord], healthSchema)
      if (health.activeFan !== 'none') {
        environment.fans[health.activeFan] = { status: health.fanSpeed !== 0 }
      }
      for (const { sensor, celsius } of health.temperatures) {
        environment.temperature[sensor] = { temperature: celsius, isAlert: false, isCritical: false }
      }
      for (const { name, ok } of health.powerSupplies) {
        environment.power[name] = { status: ok, capacity: -1, output: -1 }
      }
    }

    for (const row of this.rows(await this.call('/system/resource/cpu/print'), cpuSchema)) {
      environment.cpu[row.cpu] = { usage: row.load }
    }

    const resource = this.one(await this.call('/system/resource/print'), resourceSchema)
    environment.memory = {
      availableRam: resource.totalMemory,
      usedRam: resource.totalMemory - resource.freeMemory,
    }
    return environment
  }

  async getNtpServers(): Promise<Record<string, Record<string, never>>> {
    this.resetDiagnostics()
    const client = this.one(await this.call('/system/ntp/client/print'), ntpClientSchema)
    const servers: Record<string, Record<string, never>> = {}
    for (const name of [...client.serverNames, client.primaryNtp, client.secondaryNtp]) {
      if (name && name !== '0.0.0.0') servers[name] = {}
    }
    return servers
  }

  async getSnmpInformation(): Promise<SnmpInformation> {
    this.resetDiagnostics()
    const community: SnmpInformation['community'] = {}
    for (const row of this.rows(await this.call('/snmp/community/print'), snmpCommunitySchema)) {
      community[row.name] = { acl: row.addresses, mode: row.readAccess ? 'ro' : 'rw' }
    }
    const snmp = this.one(await this.call('/snmp/print'), snmpSchema)
    return {
      chassisId: snmp.engineId,
      community,
      contact: snmp.contact,
      location: snmp.location,
    }
  }

  async getUsers(): Promise<Record<string, UserInfo>> {
    this.resetDiagnostics()
    const users: Record<string, UserInfo> = {}
    for (const row of this.rows(await this.call('/user/print'), userSchema)) {
      users[row.name] = { level: row.group === 'full' ? 15 : 0, password: '', sshkeys: [] }
    }
    return users
  }

  async ping(destination: string, options: PingOptions = {}): Promise<PingResult> {
    this.resetDiagnostics()
    const args: CommandArguments = {
      address: destination,
      ttl: options.ttl ?? PING_TTL,
      size: options.size ?? PING_SIZE,
      count: options.count ?? PING_COUNT,
      'src-address': options.source || undefined,
      'routing-table': options.vrf || undefined,
    }
    const rows = this.rows(await this.call('/ping', args), pingSchema)
    const last = rows[rows.length - 1]
    if (!last) {
      throw new CommandError('/ping', [{ message: `no replies while pinging ${destination}`, category: null }])
    }

    return {
      success: {
        probesSent: Math.max(...rows.map(r => r.sent)),
        packetLoss: Math.max(...rows.map(r => r.packetLoss)),
        rttMin: Math.min(...rows.map(r => r.minRtt)),
        rttMax: Math.max(...rows.map(r => r.maxRtt)),
        // The last reply carries the running average
        rttAvg: last.avgRtt,
        rttStddev: -1,
        results: rows.map(r => ({ ipAddress: r.host, rtt: r.time })),
      },
    }
  }

  async getConfig(options: { full?: boolean } = {}): Promise<ConfigResult> {
    const command = options.full ? '/export verbose' : '/export'
    const running = await this.shell().session(async shell => {
      const result = await shell.exec(command)
      if (result.code !== 0) {
        const output = result.stderr || result.stdout
        throw new CommandError(command, [{ message: output.slice(0, 150), category: null }])
      }
      return result.stdout
    })
    return { running, startup: '', candidate: '' }
  }

  // Apply the difference between the running configuration and a candidate.
  // Returns the applied diff, empty when nothing had to change.
  async loadReplaceCandidate(options: CandidateOptions): Promise<ConfigDiff> {
    const { filename, config } = options
    let candidateSource: string | RouterOSConfig
    if (filename) {
      candidateSource = await readFile(filename, 'utf8')
    } else if (config) {
      candidateSource = config
    } else {
      throw new ConfigurationError('filename or config must be specified')
    }

    const candidate = asConfig(candidateSource)
    const current = asConfig(options.currentConfig ?? (await this.getConfig()).running)
    const verbose = options.currentConfigVerbose ? asConfig(options.currentConfigVerbose) : undefined
    const diff = candidate.diff(current, verbose)
    if (diff.isEmpty) return diff

    const fileName = `script-${new Date().toISOString().replace(/[:.]/g, '-')}.rsc`
    const script = [
      diff.toString(),
      // Remove the script after a successful run and report success
      `/file remove "${fileName}"`,
      ':put SUCCESS',
    ].join('\n')

    const { log } = this.options
    await this.shell().session(async shell => {
      await shell.writeFile(fileName, Buffer.from(script, 'utf8'))
      const result = await shell.exec(`/import "${fileName}"`)
      if (!result.stdout.includes('SUCCESS')) {
        throw new CommandError('/import', [{
          message: `Error while executing script. File remains on the router in file ${fileName}`,
          category: null,
        }])
      }
    })
    if (log) log('success', `Applied ${diff.sections.length} changed section(s) on ${this.hostname}`)
    return diff
  }

  // Drop the pinned SSH host key, e.g. after the device was reinstalled
  async forgetHostKey(): Promise<void> {
    if (this.options.hostKey) {
      throw new ConfigurationError('hostKey option is set, there is no stored key to forget')
    }
    const store = await this.hostKeys()
    await store.forget(this.hostname)
    const { log } = this.options
    if (log) log('info', `Forgot SSH host key of ${this.hostname}`)
  }

  private async connect(): Promise<CommandChannel> {
    if (this.channel && this.session?.state === 'ready') return this.channel
    if (this.opening) return this.opening

    const { options } = this
    const session = new Session({
      host: this.hostname,
      port: options.port,
      tls: options.tls,
      rejectUnauthorized: options.rejectUnauthorized,
      connectTimeout: options.connectTimeout,
      readTimeout: options.readTimeout,
      encoding: options.encoding,
      log: options.log,
      connector: options.connector,
    })
    this.session = session

    const opening = (async () => {
      await session.open(io => login(io, { username: this.username, password: this.password }, {
        method: options.loginMethod,
        encoding: options.encoding,
        readTimeout: options.readTimeout,
        log: options.log,
      }))
      if (options.log) options.log('success', `Logged in to ${this.hostname} as ${this.username}`)
      const channel = new CommandChannel(session)
      // close() may have run meanwhile
      if (this.session === session) this.channel = channel
      return channel
    })()
    this.opening = opening

    try {
      return await opening
    } finally {
      if (this.opening === opening) this.opening = null
    }
  }

  private async call(path: string, args: CommandArguments = {}, options: RunOptions = {}): Promise<RawRecord[]> {
    const channel = await this.connect()
    return channel.call(path, args, options)
  }

  // Run a read whose table may not exist on this device; a trap means "absent"
  private async optional(label: string, read: () => Promise<RawRecord[]>): Promise<RawRecord[] | null> {
    try {
      return await read()
    } catch (err) {
      if (!(err instanceof CommandError)) throw err
      const { log } = this.options
      if (log) log('warn', `Skipping ${label} on ${this.hostname}: ${describeError(err)}`)
      return null
    }
  }

  private resetDiagnostics(): void {
    this.diagnostics = { issues: [], rejected: [] }
  }

  private rows<T>(records: readonly RawRecord[], schema: Schema<T>): T[] {
    const result = normalize(records, schema)
    this.collect(result.issues, result.rejected)

    const [firstRejected] = result.rejected
    if (firstRejected && this.options.strictNormalization) throw firstRejected
    return result.items
  }

  // Singleton tables such as /system/resource
  private one<T>(records: readonly RawRecord[], schema: Schema<T>): T {
    const [record] = records
    if (!record) {
      throw new NormalizationError(schema.name, '*', 0, undefined, 'device returned no record')
    }
    const issues: NormalizationIssue[] = []
    const value = normalizeRecord(record, schema, 0, issues)
    this.collect(issues, [])
    return value
  }

  private collect(issues: NormalizationIssue[], rejected: NormalizationError[]): void {
    this.diagnostics.issues.push(...issues)
    this.diagnostics.rejected.push(...rejected)

    const { log } = this.options
    if (!log) return
    for (const issue of issues) {
      log('warn', `${issue.schema}[${issue.index}].${issue.field}: ${issue.reason}, using default`)
    }
    for (const error of rejected) {
      log('warn', `Dropped record ${error.message}`)
    }
  }

  private shell(): ShellProvider {
    if (this.shellProvider) return this.shellProvider
    const { options } = this
    const provider = options.shell ?? new SshChannel({
      host: this.hostname,
      port: options.sshPort,
      username: this.username,
      password: options.privateKey ? undefined : this.password,
      privateKey: options.privateKey,
      hostKey: async () => options.hostKey ?? (await this.hostKeys()).forHostname(this.hostname, options.sshPort),
      timeout: options.connectTimeout,
      readTimeout: options.readTimeout,
      log: options.log,
    })
    this.shellProvider = provider
    return provider
  }

  private hostKeys(): Promise<HostKeyStore> {
    const { hostKeys, hostKeyDatabase } = this.options
    if (hostKeys) return Promise.resolve(hostKeys)
    if (!this.hostKeyStore) {
      const store: Promise<HostKeyStore> = openDatabase(hostKeyDatabase).then(database => {
        if (this.hostKeyStore !== store) {
          // close() ran while opening
          database.close()
          throw new ConnectionError(`Driver for ${this.hostname} was closed`)
        }
        this.hostKeyDatabase = database
        return new HostKeyStore(database)
      })
      this.hostKeyStore = store
    }
    return this.hostKeyStore
  }
}
