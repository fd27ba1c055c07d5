import { describe, it, expect } from 'vitest'
import { LldpInterface, flattenHealth, flattenLists, instanceName, ipVersion, sortNicely } from '../tables'

describe('sortNicely', () => {
  it('orders embedded numbers numerically', () => {
    expect(sortNicely(['ether10', 'ether2', 'bridge', 'ether1', 'sfp-sfpplus1'])).toEqual([
      'bridge',
      'ether1',
      'ether2',
      'ether10',
      'sfp-sfpplus1',
    ])
  })
})

describe('LldpInterface', () => {
  it('reverses the child,parent attribute', () => {
    const iface = LldpInterface.fromApi('ether1,bridge')
    expect(iface.parent).toBe('bridge')
    expect(iface.child).toBe('ether1')
    expect(iface.toString()).toBe('bridge/ether1')
  })

  it('uses a lone interface as its own key', () => {
    expect(LldpInterface.fromApi('ether3').toString()).toBe('ether3')
  })
})

describe('flattenHealth', () => {
  it('merges per-sensor rows', () => {
    expect(flattenHealth([
      { '.id': '*D', name: 'temperature', value: '41', type: 'C' },
      { '.id': '*E', name: 'fan1-speed', value: '3400', type: 'RPM' },
    ])).toEqual({ temperature: '41', 'fan1-speed': '3400' })
  })

  it('passes a single health record through', () => {
    expect(flattenHealth([{ temperature: '41', voltage: '24' }])).toEqual({ temperature: '41', voltage: '24' })
    expect(flattenHealth([])).toBeNull()
  })
})

describe('helpers', () => {
  it('tells address families apart', () => {
    expect(ipVersion('192.0.2.0/24')).toBe(4)
    expect(ipVersion('2001:db8::/32')).toBe(6)
  })

  it('renames the default BGP instance', () => {
    expect(instanceName('default')).toBe('global')
    expect(instanceName('customer-a')).toBe('customer-a')
  })

  it('deduplicates list items', () => {
    expect(flattenLists([['ether1', 'ether2'], ['ether2', 'ether3']])).toEqual(['ether1', 'ether2', 'ether3'])
  })
})
