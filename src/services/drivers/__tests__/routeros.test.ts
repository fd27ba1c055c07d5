import { describe, it, expect, vi } from 'vitest'
import { RouterOSDriver } from '../routeros'
import type { DriverOptions } from '../options'
import type { ExecResult, ShellProvider, ShellSession } from '../../ssh'
import { AuthenticationError, CommandError, ConfigurationError, ConnectionError, NormalizationError } from '../../errors'
import { done, fakeDevice, re, trap, type Route } from '../../api/__tests__/fake-device'

const hostKeyDatabases = vi.hoisted(() => ({ opened: 0, closed: 0 }))

// Count database handles so tests can see the driver release them
vi.mock('../../../db/client', async importOriginal => {
  const actual = await importOriginal<typeof import('../../../db/client')>()
  return {
    ...actual,
    openDatabase: async (path?: string) => {
      const database = await actual.openDatabase(path)
      hostKeyDatabases.opened++
      return {
        ...database,
        close: () => {
          hostKeyDatabases.closed++
          database.close()
        },
      }
    },
  }
})

function driverFor(routes: Record<string, Route>, options: DriverOptions = {}) {
  const device = fakeDevice(routes)
  const driver = new RouterOSDriver('router.test', 'admin', 'test-secret', { connector: device.connector, ...options })
  return { device, driver }
}

// Words of the first command sent to `path`, without the request tag
function sentTo(commands: string[][], path: string): string[] {
  const words = commands.find(w => w[0] === path) ?? []
  return words.filter(w => !w.startsWith('.tag='))
}

function fakeShell(exec: (command: string) => ExecResult) {
  const files = new Map<string, string>()
  const commands: string[] = []
  const session: ShellSession = {
    async exec(command) {
      commands.push(command)
      return exec(command)
    },
    async writeFile(path, data) {
      files.set(path, data.toString('utf8'))
    },
  }
  const shell: ShellProvider = {
    async session<T>(task: (shell: ShellSession) => Promise<T>): Promise<T> {
      return task(session)
    },
  }
  return { shell, files, commands }
}

const RUNNING = [
  '/ip pool',
  'add name=dhcp ranges=192.0.2.100-192.0.2.200',
  '/system identity',
  'set name=old-router',
].join('\n')

describe('RouterOSDriver lifecycle', () => {
  it('reports liveness and reconnects after close', async () => {
    const { device, driver } = driverFor({ '/system/identity/print': [re({ name: 'core-router' }), done()] })
    expect(driver.isAlive()).toEqual({ isAlive: false })

    await driver.open()
    expect(driver.isAlive()).toEqual({ isAlive: true })
    expect(device.targets[0]?.port).toBe(8728)

    driver.close()
    driver.close()
    expect(driver.isAlive()).toEqual({ isAlive: false })
    expect(device.sockets[0]?.destroyed).toBe(true)

    await driver.getSnmpInformation().catch(() => undefined)
    expect(device.sockets).toHaveLength(2)
  })

  it('shares one connection between concurrent operations', async () => {
    const { device, driver } = driverFor({ '/user/print': [re({ name: 'admin', group: 'full' }), done()] })
    await Promise.all([driver.getUsers(), driver.getUsers()])
    expect(device.sockets).toHaveLength(1)
  })

  it('surfaces a rejected login', async () => {
    const device = fakeDevice({}, [trap('invalid user name or password (6)'), done()])
    const driver = new RouterOSDriver('router.test', 'admin', 'wrong-secret', { connector: device.connector })

    await expect(driver.open()).rejects.toThrow(AuthenticationError)
    expect(driver.isAlive()).toEqual({ isAlive: false })
  })

  it('drops a pending connect on close', async () => {
    const { device, driver } = driverFor({ '/user/print': [re({ name: 'admin', group: 'full' }), done()] })

    const pending = driver.open()
    driver.close()
    await expect(pending).rejects.toThrow(ConnectionError)
    expect(device.sockets[0]?.destroyed).toBe(true)

    expect(await driver.getUsers()).toEqual({ admin: { level: 15, password: '', sshkeys: [] } })
    expect(device.sockets).toHaveLength(2)
  })

  it('releases the host key database on close', async () => {
    const { driver } = driverFor({})
    const before = { ...hostKeyDatabases }

    await driver.forgetHostKey()
    await driver.forgetHostKey()
    expect(hostKeyDatabases.opened - before.opened).toBe(1)

    driver.close()
    driver.close()
    expect(hostKeyDatabases.closed - before.closed).toBe(1)

    await driver.forgetHostKey()
    expect(hostKeyDatabases.opened - before.opened).toBe(2)
    driver.close()
  })

  it('has no stored host key to forget when one is pinned in the options', async () => {
    const { driver } = driverFor({}, { hostKey: 'ssh-ed25519 AAAAtest' })
    await expect(driver.forgetHostKey()).rejects.toThrow(ConfigurationError)
  })

  it('validates options at construction', () => {
    expect(() => new RouterOSDriver('router.test', 'admin', 'test-secret', { port: 0 })).toThrow(ConfigurationError)
  })
})

describe('RouterOSDriver getters', () => {
  it('getFacts', async () => {
    const { device, driver } = driverFor({
      '/system/resource/print': [re({ uptime: '1w2d', platform: 'MikroTik', 'board-name': 'RB4011iGS+', version: '6.49.10 (long-term)' }), done()],
      '/system/identity/print': [re({ name: 'core-router' }), done()],
      '/system/routerboard/print': [re({ routerboard: 'true', 'serial-number': 'D4E60A1B2C3D' }), done()],
      '/interface/print': [re({ name: 'ether10' }), re({ name: 'ether2' }), re({ name: 'ether1' }), done()],
    })

    expect(await driver.getFacts()).toEqual({
      uptime: 777600,
      vendor: 'MikroTik',
      model: 'RB4011iGS+',
      hostname: 'core-router',
      fqdn: '',
      osVersion: '6.49.10 (long-term)',
      serialNumber: 'D4E60A1B2C3D',
      interfaceList: ['ether1', 'ether2', 'ether10'],
    })
    expect(sentTo(device.commands(), '/interface/print')).toEqual(['/interface/print', '=.proplist=name'])
  })

  it('getInterfaces', async () => {
    const { driver } = driverFor({
      '/interface/print': [
        re({ name: 'ether1', running: 'true', disabled: 'false', comment: 'uplink', 'actual-mtu': '1500', 'mac-address': '4c:5e:0c:aa:bb:01' }),
        re({ name: 'wlan1', running: 'false', disabled: 'true' }),
        done(),
      ],
    })

    expect(await driver.getInterfaces()).toEqual({
      ether1: { isUp: true, isEnabled: true, description: 'uplink', lastFlapped: -1, mtu: 1500, speed: -1, macAddress: '4C:5E:0C:AA:BB:01' },
      wlan1: { isUp: false, isEnabled: false, description: '', lastFlapped: -1, mtu: 0, speed: -1, macAddress: '' },
    })
  })

  it('getInterfacesCounters', async () => {
    const { device, driver } = driverFor({
      '/interface/print': [
        re({ name: 'ether1', 'rx-byte': '1000', 'tx-byte': '2000', 'rx-packet': '10', 'tx-packet': '20', 'rx-error': '1', 'tx-error': '0', 'rx-drop': '2', 'tx-drop': '3' }),
        done(),
      ],
    })

    expect(await driver.getInterfacesCounters()).toEqual({
      ether1: {
        txErrors: 0,
        rxErrors: 1,
        txDiscards: 3,
        rxDiscards: 2,
        txOctets: 2000,
        rxOctets: 1000,
        txUnicastPackets: 20,
        rxUnicastPackets: 10,
        txMulticastPackets: 0,
        rxMulticastPackets: 0,
        txBroadcastPackets: 0,
        rxBroadcastPackets: 0,
      },
    })
    expect(sentTo(device.commands(), '/interface/print')).toEqual(['/interface/print', '=stats=yes'])
  })

  it('getInterfacesIp groups addresses per interface and family', async () => {
    const { driver } = driverFor({
      '/ip/address/print': [
        re({ address: '192.0.2.1/24', interface: 'ether1' }),
        re({ address: '192.0.2.129/25', interface: 'ether1' }),
        re({ address: '198.51.100.1/24', interface: 'ether2' }),
        done(),
      ],
      '/ipv6/address/print': [re({ address: '2001:db8::1/64', interface: 'ether1' }), done()],
    })

    expect(await driver.getInterfacesIp()).toEqual({
      ether1: {
        ipv4: { '192.0.2.1': { prefixLength: 24 }, '192.0.2.129': { prefixLength: 25 } },
        ipv6: { '2001:db8::1': { prefixLength: 64 } },
      },
      ether2: { ipv4: { '198.51.100.1': { prefixLength: 24 } } },
    })
  })

  it('getInterfacesIp tolerates a device without IPv6', async () => {
    const log = vi.fn()
    const { driver } = driverFor({
      '/ip/address/print': [re({ address: '192.0.2.1/24', interface: 'ether1' }), done()],
    }, { log })

    expect(await driver.getInterfacesIp()).toEqual({ ether1: { ipv4: { '192.0.2.1': { prefixLength: 24 } } } })
    expect(log).toHaveBeenCalledWith('warn', 'Skipping IPv6 addresses on router.test: no such command prefix')
    expect(driver.isAlive()).toEqual({ isAlive: true })
  })

  it('getArpTable skips incomplete entries', async () => {
    const { driver } = driverFor({
      '/ip/arp/print': [
        re({ address: '192.0.2.10', 'mac-address': '4C:5E:0C:AA:BB:02', interface: 'ether1' }),
        re({ address: '192.0.2.11', interface: 'ether1' }),
        done(),
      ],
    })

    expect(await driver.getArpTable()).toEqual([
      { interface: 'ether1', mac: '4C:5E:0C:AA:BB:02', ip: '192.0.2.10', age: -1 },
    ])
  })

  it('getArpTable restricts a VRF to its interfaces', async () => {
    const { device, driver } = driverFor({
      '/ip/route/vrf/print': [re({ 'routing-mark': 'cust-a', interfaces: 'ether2,ether3' }), done()],
      '/ip/arp/print': [re({ address: '198.51.100.10', 'mac-address': '4C:5E:0C:AA:BB:06', interface: 'ether2' }), done()],
    })

    expect(await driver.getArpTable('cust-a')).toEqual([
      { interface: 'ether2', mac: '4C:5E:0C:AA:BB:06', ip: '198.51.100.10', age: -1 },
    ])
    expect(sentTo(device.commands(), '/ip/route/vrf/print')).toEqual([
      '/ip/route/vrf/print',
      '=.proplist=interfaces,routing-mark',
      '?routing-mark=cust-a',
    ])
    expect(sentTo(device.commands(), '/ip/arp/print')).toEqual([
      '/ip/arp/print',
      '=.proplist=interface,mac-address,address',
      '?interface=ether2',
      '?interface=ether3',
      '?#|',
    ])
  })

  it('getArpTable returns nothing for an unknown VRF', async () => {
    const { device, driver } = driverFor({ '/ip/route/vrf/print': [done()] })
    expect(await driver.getArpTable('missing')).toEqual([])
    expect(device.commands().some(w => w[0] === '/ip/arp/print')).toBe(false)
  })

  it('getIpv6NeighborsTable', async () => {
    const { driver } = driverFor({
      '/ipv6/neighbor/print': [
        re({ address: 'fe80::1', 'mac-address': '4C:5E:0C:AA:BB:07', interface: 'bridge', status: 'reachable' }),
        re({ address: 'fe80::2', interface: 'bridge', status: 'noarp' }),
        done(),
      ],
    })

    expect(await driver.getIpv6NeighborsTable()).toEqual([
      { interface: 'bridge', mac: '4C:5E:0C:AA:BB:07', ip: 'fe80::1', age: -1, state: 'reachable' },
    ])
  })

  it('getMacAddressTable adds the switch chip table when present', async () => {
    const { driver } = driverFor({
      '/interface/bridge/host/print': [re({ 'mac-address': '4C:5E:0C:AA:BB:03', 'on-interface': 'ether2', vid: '10', dynamic: 'true', invalid: 'false' }), done()],
      '/interface/ethernet/switch/unicast-fdb/print': [re({ 'mac-address': '4C:5E:0C:AA:BB:04', port: 'ether5', 'vlan-id': '20', dynamic: 'false', active: 'true' }), done()],
    })

    expect(await driver.getMacAddressTable()).toEqual([
      { mac: '4C:5E:0C:AA:BB:03', interface: 'ether2', vlan: 10, static: false, active: true, moves: 0, lastMove: 0 },
      { mac: '4C:5E:0C:AA:BB:04', interface: 'ether5', vlan: 20, static: true, active: true, moves: 0, lastMove: 0 },
    ])
  })

  it('getMacAddressTable skips a missing switch chip table', async () => {
    const { driver } = driverFor({
      '/interface/bridge/host/print': [re({ 'mac-address': '4C:5E:0C:AA:BB:03', interface: 'bridge' }), done()],
    })

    expect(await driver.getMacAddressTable()).toEqual([
      { mac: '4C:5E:0C:AA:BB:03', interface: 'bridge', vlan: 1, static: true, active: true, moves: 0, lastMove: 0 },
    ])
  })

  it('getNetworkInstances', async () => {
    const { device, driver } = driverFor({
      '/ip/route/vrf/print': [re({ 'routing-mark': 'cust-a', interfaces: 'ether2,ether3', 'route-distinguisher': '65000:1' }), done()],
    })

    expect(await driver.getNetworkInstances('cust-a')).toEqual({
      'cust-a': {
        name: 'cust-a',
        type: 'L3VRF',
        state: { routeDistinguisher: '65000:1' },
        interfaces: { interface: { ether2: {}, ether3: {} } },
      },
    })
    expect(sentTo(device.commands(), '/ip/route/vrf/print')).toEqual([
      '/ip/route/vrf/print',
      '=.proplist=interfaces,routing-mark,route-distinguisher',
      '?routing-mark=cust-a',
    ])
  })

  const neighbors = [
    re({
      identity: 'switch-a',
      'interface-name': 'ether24',
      interface: 'ether1,bridge',
      'mac-address': '4C:5E:0C:AA:BB:05',
      'system-description': 'MikroTik RouterOS',
      'system-caps': 'bridge,router',
      'system-caps-enabled': 'router',
    }),
    re({ identity: 'ap-1', 'interface-name': 'eth0', interface: 'ether5' }),
    done(),
  ]

  it('getLldpNeighbors keys neighbors by parent/child', async () => {
    const { driver } = driverFor({ '/ip/neighbor/print': neighbors })
    expect(await driver.getLldpNeighbors()).toEqual({
      'bridge/ether1': [{ hostname: 'switch-a', port: 'ether24' }],
      ether5: [{ hostname: 'ap-1', port: 'eth0' }],
    })
  })

  it('getLldpNeighborsDetail filters by interface', async () => {
    const { driver } = driverFor({ '/ip/neighbor/print': neighbors })
    expect(await driver.getLldpNeighborsDetail('bridge/ether1')).toEqual({
      'bridge/ether1': [{
        parentInterface: 'bridge',
        remoteChassisId: '4C:5E:0C:AA:BB:05',
        remoteSystemName: 'switch-a',
        remotePort: 'ether24',
        remotePortDescription: '',
        remoteSystemDescription: 'MikroTik RouterOS',
        remoteSystemCapab: ['bridge', 'router'],
        remoteSystemEnableCapab: ['router'],
      }],
    })
    expect(await driver.getLldpNeighborsDetail('ether9')).toEqual({ ether9: [] })
  })

  it('getEnvironment', async () => {
    const { driver } = driverFor({
      '/system/health/print': [re({ 'active-fan': 'fan1', 'fan-speed': '3400RPM', temperature: '41', 'cpu-temperature': '52', 'psu1-state': 'ok', 'psu2-state': 'fail' }), done()],
      '/system/resource/cpu/print': [re({ cpu: 'cpu0', load: '12' }), re({ cpu: 'cpu1', load: '3' }), done()],
      '/system/resource/print': [re({ uptime: '1h', 'total-memory': '1073741824', 'free-memory': '973741824' }), done()],
    })

    expect(await driver.getEnvironment()).toEqual({
      fans: { fan1: { status: true } },
      temperature: {
        board: { temperature: 41, isAlert: false, isCritical: false },
        cpu: { temperature: 52, isAlert: false, isCritical: false },
      },
      power: {
        psu1: { status: true, capacity: -1, output: -1 },
        psu2: { status: false, capacity: -1, output: -1 },
      },
      cpu: { cpu0: { usage: 12 }, cpu1: { usage: 3 } },
      memory: { availableRam: 1073741824, usedRam: 100000000 },
    })
  })

  it('getEnvironment reads per-sensor health rows', async () => {
    const { driver } = driverFor({
      '/system/health/print': [re({ name: 'temperature', value: '38', type: 'C' }), re({ name: 'cpu-temperature', value: '47', type: 'C' }), done()],
      '/system/resource/cpu/print': [done()],
      '/system/resource/print': [re({ uptime: '1h' }), done()],
    })

    const environment = await driver.getEnvironment()
    expect(environment.temperature).toEqual({
      board: { temperature: 38, isAlert: false, isCritical: false },
      cpu: { temperature: 47, isAlert: false, isCritical: false },
    })
    expect(environment.fans).toEqual({})
  })

  it('getNtpServers', async () => {
    const { driver } = driverFor({
      '/system/ntp/client/print': [re({ enabled: 'true', 'primary-ntp': '192.0.2.123', 'secondary-ntp': '0.0.0.0', 'server-dns-names': 'pool.ntp.org,time.example.net' }), done()],
    })
    expect(await driver.getNtpServers()).toEqual({ 'pool.ntp.org': {}, 'time.example.net': {}, '192.0.2.123': {} })
  })

  it('getSnmpInformation', async () => {
    const { driver } = driverFor({
      '/snmp/community/print': [re({ name: 'public', addresses: '192.0.2.0/24', 'read-access': 'true' }), re({ name: 'writers', 'read-access': 'false' }), done()],
      '/snmp/print': [re({ enabled: 'true', contact: 'noc@example.net', location: 'rack 4', 'engine-id': '80003a8c04' }), done()],
    })

    expect(await driver.getSnmpInformation()).toEqual({
      chassisId: '80003a8c04',
      community: {
        public: { acl: '192.0.2.0/24', mode: 'ro' },
        writers: { acl: '', mode: 'rw' },
      },
      contact: 'noc@example.net',
      location: 'rack 4',
    })
  })

  it('getUsers', async () => {
    const { driver } = driverFor({ '/user/print': [re({ name: 'admin', group: 'full' }), re({ name: 'monitor', group: 'read' }), done()] })
    expect(await driver.getUsers()).toEqual({
      admin: { level: 15, password: '', sshkeys: [] },
      monitor: { level: 0, password: '', sshkeys: [] },
    })
  })
})

describe('RouterOSDriver BGP', () => {
  const instance = re({ name: 'default', as: '65000', 'router-id': '192.0.2.1', 'routing-table': 'main' })
  const upstream = re({
    name: 'upstream',
    instance: 'default',
    'remote-address': '203.0.113.1',
    'remote-as': '64500',
    'remote-id': '203.0.113.1',
    'local-address': '203.0.113.2',
    established: 'true',
    disabled: 'false',
    'address-families': 'ip',
    'prefix-count': '812',
    uptime: '1d',
    state: 'established',
    'hold-time': '3m',
    'used-hold-time': '90s',
    'keepalive-time': '1m',
    'used-keepalive-time': '30s',
    'updates-received': '100',
    'withdrawn-received': '5',
    'updates-sent': '50',
    'withdrawn-sent': '1',
    'in-filter': 'bgp-in',
    'out-filter': 'bgp-out',
  })
  const dual = re({
    name: 'dual',
    instance: 'default',
    'remote-address': '2001:db8::2',
    'remote-as': '64501',
    established: 'false',
    disabled: 'true',
    'address-families': 'ip,ipv6',
  })
  const advertisements = [
    re({ peer: 'upstream', prefix: '192.0.2.0/24' }),
    re({ peer: 'upstream', prefix: '198.51.100.0/24' }),
    re({ peer: 'dual', prefix: '2001:db8::/32' }),
    done(),
  ]

  it('getBgpNeighbors counts prefixes per address family', async () => {
    const { device, driver } = driverFor({
      '/routing/bgp/advertisements/print': advertisements,
      '/routing/bgp/instance/print': [instance, done()],
      '/routing/bgp/peer/print': [upstream, dual, done()],
      '/ip/route/print': [re({ 'dst-address': '10.0.0.0/8' }), re({ 'dst-address': '172.16.0.0/12' }), done()],
      '/ipv6/route/print': [re({ 'dst-address': '2001:db8:100::/48' }), done()],
    })

    expect(await driver.getBgpNeighbors()).toEqual({
      global: {
        routerId: '192.0.2.1',
        peers: {
          '203.0.113.1': {
            localAs: 65000,
            remoteAs: 64500,
            remoteId: '203.0.113.1',
            isUp: true,
            isEnabled: true,
            description: 'upstream',
            uptime: 86400,
            addressFamily: { ipv4: { sentPrefixes: 2, acceptedPrefixes: 812, receivedPrefixes: 812 } },
          },
          '2001:db8::2': {
            localAs: 65000,
            remoteAs: 64501,
            remoteId: '',
            isUp: false,
            isEnabled: false,
            description: 'dual',
            uptime: 0,
            addressFamily: {
              ipv4: { sentPrefixes: 0, acceptedPrefixes: 2, receivedPrefixes: 2 },
              ipv6: { sentPrefixes: 1, acceptedPrefixes: 1, receivedPrefixes: 1 },
            },
          },
        },
      },
    })
    expect(sentTo(device.commands(), '/ip/route/print')).toEqual([
      '/ip/route/print',
      '=.proplist=dst-address',
      '?bgp=yes',
      '?received-from=dual',
      '?#&',
    ])
  })

  it('getBgpNeighborsDetail', async () => {
    const { device, driver } = driverFor({
      '/routing/bgp/peer/print': [upstream, done()],
      '/routing/bgp/advertisements/print': [...advertisements.slice(0, 2), done()],
      '/routing/bgp/instance/print': [instance, done()],
    })

    const detail = await driver.getBgpNeighborsDetail('203.0.113.1')
    expect(Object.keys(detail)).toEqual(['global'])
    expect(detail.global?.['64500']).toEqual([{
      up: true,
      localAs: 65000,
      remoteAs: 64500,
      routerId: '192.0.2.1',
      localAddress: '203.0.113.2',
      localAddressConfigured: true,
      localPort: 179,
      routingTable: 'main',
      remoteAddress: '203.0.113.1',
      remotePort: 179,
      multihop: false,
      multipath: false,
      removePrivateAs: false,
      importPolicy: 'bgp-in',
      exportPolicy: 'bgp-out',
      inputMessages: 105,
      outputMessages: 51,
      inputUpdates: 100,
      outputUpdates: 50,
      messagesQueuedOut: 0,
      connectionState: 'established',
      previousConnectionState: '',
      lastEvent: '',
      suppress4ByteAs: false,
      localAsPrepend: false,
      holdtime: 90,
      configuredHoldtime: 180,
      keepalive: 30,
      configuredKeepalive: 60,
      activePrefixCount: 812,
      receivedPrefixCount: 812,
      acceptedPrefixCount: 812,
      suppressedPrefixCount: 0,
      advertisedPrefixCount: 2,
      flapCount: 0,
    }])

    const commands = device.commands()
    expect(sentTo(commands, '/routing/bgp/peer/print')).toEqual(['/routing/bgp/peer/print', '?remote-address=203.0.113.1'])
    expect(sentTo(commands, '/routing/bgp/instance/print')).toEqual(['/routing/bgp/instance/print', '?name=default', '?disabled=no', '?#&'])
  })

  it('getBgpNeighborsDetail stops when no peer matches', async () => {
    const { device, driver } = driverFor({ '/routing/bgp/peer/print': [done()] })
    expect(await driver.getBgpNeighborsDetail('192.0.2.250')).toEqual({})
    expect(device.commands().map(w => w[0])).toEqual(['/login', '/routing/bgp/peer/print'])
  })
})

describe('RouterOSDriver ping', () => {
  it('summarizes the probes', async () => {
    const { device, driver } = driverFor({
      '/ping': [
        re({ seq: '0', host: '192.0.2.1', time: '1ms', sent: '1', received: '1', 'packet-loss': '0', 'min-rtt': '1ms', 'avg-rtt': '1ms', 'max-rtt': '1ms' }),
        re({ seq: '1', host: '192.0.2.1', time: '3ms', sent: '2', received: '2', 'packet-loss': '0', 'min-rtt': '1ms', 'avg-rtt': '2ms', 'max-rtt': '3ms' }),
        re({ seq: '2', host: '192.0.2.1', status: 'timeout', sent: '3', received: '2', 'packet-loss': '33', 'min-rtt': '1ms', 'avg-rtt': '2ms', 'max-rtt': '3ms' }),
        done(),
      ],
    })

    expect(await driver.ping('192.0.2.1', { count: 3, source: '192.0.2.254' })).toEqual({
      success: {
        probesSent: 3,
        packetLoss: 33,
        rttMin: 1,
        rttMax: 3,
        rttAvg: 2,
        rttStddev: -1,
        results: [
          { ipAddress: '192.0.2.1', rtt: 1 },
          { ipAddress: '192.0.2.1', rtt: 3 },
          { ipAddress: '192.0.2.1', rtt: -1 },
        ],
      },
    })
    expect(sentTo(device.commands(), '/ping')).toEqual([
      '/ping',
      '=address=192.0.2.1',
      '=ttl=255',
      '=size=100',
      '=count=3',
      '=src-address=192.0.2.254',
    ])
  })

  it('fails when the device returns no probes', async () => {
    const { driver } = driverFor({ '/ping': [done()] })
    await expect(driver.ping('192.0.2.1')).rejects.toThrow('no replies while pinging 192.0.2.1')
  })
})

describe('RouterOSDriver normalization diagnostics', () => {
  const routes = {
    '/interface/print': [re({ name: 'ether1', mtu: 'auto' }), re({ running: 'true' }), done()],
  }

  it('keeps usable records and reports the rest', async () => {
    const log = vi.fn()
    const { driver } = driverFor(routes, { log })

    expect(Object.keys(await driver.getInterfaces())).toEqual(['ether1'])
    expect(driver.diagnostics.issues).toEqual([
      { schema: 'interface', index: 0, field: 'mtu', raw: 'auto', reason: 'expected integer, got "auto"' },
    ])
    expect(driver.diagnostics.rejected.map(e => e.message)).toEqual(['interface[1].name: required attribute missing'])
    expect(log).toHaveBeenCalledWith('warn', 'Dropped record interface[1].name: required attribute missing')
  })

  it('throws the first rejection in strict mode', async () => {
    const { driver } = driverFor(routes, { strictNormalization: true })
    await expect(driver.getInterfaces()).rejects.toThrow(NormalizationError)
  })

  it('starts every operation with fresh diagnostics', async () => {
    const { driver } = driverFor({ ...routes, '/user/print': [re({ name: 'admin', group: 'full' }), done()] })
    await driver.getInterfaces()
    await driver.getUsers()
    expect(driver.diagnostics).toEqual({ issues: [], rejected: [] })
  })
})

describe('RouterOSDriver configuration', () => {
  it('getConfig exports over the shell', async () => {
    const { shell, commands } = fakeShell(() => ({ stdout: RUNNING, stderr: '', code: 0 }))
    const { driver } = driverFor({}, { shell })

    expect(await driver.getConfig({ full: true })).toEqual({ running: RUNNING, startup: '', candidate: '' })
    expect(commands).toEqual(['/export verbose'])
  })

  it('getConfig raises on a failed export', async () => {
    const { shell } = fakeShell(() => ({ stdout: '', stderr: 'expected end of command', code: 1 }))
    const { driver } = driverFor({}, { shell })
    await expect(driver.getConfig()).rejects.toThrow(CommandError)
    await expect(driver.getConfig()).rejects.toThrow('expected end of command')
  })

  it('loadReplaceCandidate uploads and imports the diff', async () => {
    const { shell, files, commands } = fakeShell(command =>
      command === '/export'
        ? { stdout: RUNNING, stderr: '', code: 0 }
        : { stdout: 'Script file loaded and executed successfully\nSUCCESS\n', stderr: '', code: 0 }
    )
    const { driver } = driverFor({}, { shell })

    const diff = await driver.loadReplaceCandidate({
      config: '/ip pool\nadd name=dhcp ranges=192.0.2.100-192.0.2.200\n/system identity\nset name=core-router',
    })

    expect(diff.toString()).toBe('/system identity\nset name=core-router')
    const [fileName, script] = [...files.entries()][0] ?? ['', '']
    expect(fileName).toMatch(/^script-[\d-]+T[\d-]+Z\.rsc$/)
    expect(script).toBe(`/system identity\nset name=core-router\n/file remove "${fileName}"\n:put SUCCESS`)
    expect(commands).toEqual(['/export', `/import "${fileName}"`])
  })

  it('loadReplaceCandidate does nothing without changes', async () => {
    const { shell, files, commands } = fakeShell(() => ({ stdout: '', stderr: '', code: 0 }))
    const { driver } = driverFor({}, { shell })

    const diff = await driver.loadReplaceCandidate({ config: RUNNING, currentConfig: RUNNING })
    expect(diff.isEmpty).toBe(true)
    expect(files.size).toBe(0)
    expect(commands).toEqual([])
  })

  it('loadReplaceCandidate reports a failed import', async () => {
    const { shell } = fakeShell(() => ({ stdout: 'failure: item already exists', stderr: '', code: 0 }))
    const { driver } = driverFor({}, { shell })

    await expect(driver.loadReplaceCandidate({ config: '/system identity\nset name=core-router', currentConfig: RUNNING }))
      .rejects.toThrow(/^Error while executing script\. File remains on the router in file script-/)
  })

  it('loadReplaceCandidate rejects a candidate with commands outside a section', async () => {
    const { shell, commands } = fakeShell(() => ({ stdout: '', stderr: '', code: 0 }))
    const { driver } = driverFor({}, { shell })

    await expect(driver.loadReplaceCandidate({ config: 'add address=192.0.2.1/24', currentConfig: RUNNING }))
      .rejects.toThrow(ConfigurationError)
    expect(commands).toEqual([])
  })

  it('loadReplaceCandidate needs a candidate', async () => {
    const { driver } = driverFor({})
    await expect(driver.loadReplaceCandidate({})).rejects.toThrow(ConfigurationError)
  })
})
