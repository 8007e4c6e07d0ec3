import { describe, expect, it } from 'vitest';

import { formatPolicy, formatRoute, formatZone } from './format';
import { ANY_IPV4, IPNetwork } from './ip';

describe('format', () => {
  it('renders a policy', () => {
    expect(formatPolicy({
      name: 'allow-dns',
      fromZone: 'trust',
      toZone: 'untrust',
      enabled: true,
      sequence: 4,
      sourceAddresses: ['lan', 'dmz'],
      destinationAddresses: ['resolvers'],
      applications: ['junos-dns-udp'],
      action: 'permit',
    })).toBe('permit trust:[lan, dmz] -> untrust:[resolvers] : [junos-dns-udp]');
  });

  it('renders routes with and without a next hop', () => {
    expect(formatRoute({ destination: IPNetwork.parse('0.0.0.0/0'), interface: 'ge-0/0/0.0', isLocal: false }))
      .toBe('0.0.0.0/0 via ge-0/0/0.0');
    expect(formatRoute({ destination: IPNetwork.parse('10.0.0.0/24'), interface: 'ge-0/0/1.0', isLocal: true }))
      .toBe('10.0.0.0/24 via ge-0/0/1.0 (local)');
  });

  it('renders a zone', () => {
    expect(formatZone({ name: 'trust', interfaces: ['ge-0/0/1.0', 'ge-0/0/2.0'], addresses: new Map([['any', ANY_IPV4]]) }))
      .toBe('trust on [ge-0/0/1.0, ge-0/0/2.0]');
  });
});
