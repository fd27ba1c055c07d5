import { describe, it, expect } from 'vitest'
import { RouterOSConfig } from '../config-diff'
import { ConfigurationError } from '../errors'

describe('RouterOSConfig.parse', () => {
  it('joins continuation lines and skips comments', () => {
    const config = RouterOSConfig.parse([
      '# sep/02/2024 10:00:00 by RouterOS 6.49',
      '/ip address',
      'add address=192.0.2.1/24 interface=ether1',
      '/interface ethernet',
      'set [ find default-name=ether1 ] comment="uplink port" \\',
      '    mtu=1500',
    ].join('\n'))

    expect(config.section('/interface ethernet')?.expressions).toEqual([
      {
        command: 'set',
        selector: '[ find default-name=ether1 ]',
        args: [{ key: 'comment', value: '"uplink port"' }, { key: 'mtu', value: '1500' }],
      },
    ])
    expect(config.toString()).toBe([
      '/ip address',
      'add address=192.0.2.1/24 interface=ether1',
      '/interface ethernet',
      'set [ find default-name=ether1 ] comment="uplink port" mtu=1500',
    ].join('\n'))
  })

  it('keeps bare words as valueless arguments', () => {
    const config = RouterOSConfig.parse('/ip firewall filter\nadd action=drop chain=input disabled')
    expect(config.section('/ip firewall filter')?.expressions[0]?.args).toEqual([
      { key: 'action', value: 'drop' },
      { key: 'chain', value: 'input' },
      { key: 'disabled', value: null },
    ])
  })

  it('refuses commands before the first section', () => {
    expect(() => RouterOSConfig.parse('add name=x')).toThrow(ConfigurationError)
    expect(() => RouterOSConfig.parse('add name=x')).toThrow('Command outside of a section: add name=x')
  })
})

describe('RouterOSConfig.diff', () => {
  const running = RouterOSConfig.parse([
    '/ip address',
    'add address=192.0.2.1/24 interface=ether1',
    'add address=198.51.100.1/24 interface=ether2',
    '/ip pool',
    'add name=dhcp ranges=192.0.2.100-192.0.2.200',
    '/ip dns',
    'set servers=192.0.2.53',
    '/system identity',
    'set name=old-router',
  ].join('\n'))

  it('removes, updates and adds items', () => {
    const candidate = RouterOSConfig.parse([
      '/ip address',
      'add address=192.0.2.1/24 interface=ether1',
      '/ip pool',
      'add name=dhcp ranges=192.0.2.50-192.0.2.200',
      'add name=guests ranges=198.51.100.10-198.51.100.20',
      '/system identity',
      'set name=core-router',
    ].join('\n'))

    expect(candidate.diff(running).toString()).toBe([
      '/ip address',
      'remove [ find where address=198.51.100.1/24 interface=ether2 ]',
      '/ip pool',
      'set [ find name=dhcp ] ranges=192.0.2.50-192.0.2.200',
      'add name=guests ranges=198.51.100.10-198.51.100.20',
      '/system identity',
      'set name=core-router',
    ].join('\n'))
  })

  it('is empty when nothing changed', () => {
    const diff = running.diff(running)
    expect(diff.isEmpty).toBe(true)
    expect(diff.toString()).toBe('')
  })

  it('ignores argument order', () => {
    const candidate = RouterOSConfig.parse('/ip address\nadd interface=ether1 address=192.0.2.1/24\nadd interface=ether2 address=198.51.100.1/24')
    expect(candidate.diff(running).isEmpty).toBe(true)
  })

  it('resets dropped settings to the verbose export values', () => {
    const current = RouterOSConfig.parse('/interface ethernet\nset [ find default-name=ether1 ] comment=uplink mtu=9000')
    const verbose = RouterOSConfig.parse('/interface ethernet\nset [ find default-name=ether1 ] advertise=10M-half comment="" mtu=1500')
    const candidate = RouterOSConfig.parse('/interface ethernet\nset [ find default-name=ether1 ] mtu=9000')

    expect(candidate.diff(current, verbose).toString()).toBe('/interface ethernet\nset [ find default-name=ether1 ] comment=""')
  })

  it('removes named items by name', () => {
    const candidate = RouterOSConfig.parse('/ip pool\nadd name=guests ranges=198.51.100.10-198.51.100.20')
    expect(candidate.diff(running).toString()).toBe([
      '/ip pool',
      'remove [ find name=dhcp ]',
      'add name=guests ranges=198.51.100.10-198.51.100.20',
    ].join('\n'))
  })
})
