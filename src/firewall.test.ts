import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { MalformedDocumentError, UnresolvedReferenceError } from './errors';
import { buildFirewallModel, loadFirewallModel, type FirewallPaths } from './firewall';
import { formatFirewall } from './format';

function fixture(name: string): string {
  return fileURLToPath(new URL(`./__fixtures__/${name}`, import.meta.url));
}

const paths: FirewallPaths = {
  securityPolicies: fixture('security-policies.xml'),
  routes: fixture('route.xml'),
  securityZones: fixture('security-zones.xml'),
};

function sources() {
  return {
    securityPolicies: readFileSync(paths.securityPolicies, 'utf8'),
    routes: readFileSync(paths.routes, 'utf8'),
    securityZones: readFileSync(paths.securityZones, 'utf8'),
  };
}

describe('loadFirewallModel', () => {
  it('builds policies, routes and zones from the three exports', async () => {
    const fw = await loadFirewallModel(paths);

    expect(fw.policies.map(p => [p.name, p.fromZone, p.toZone, p.enabled, p.sequence, p.action])).toEqual([
      ['allow-web', 'trust', 'untrust', true, 1, 'permit'],
      ['legacy-ftp', 'trust', 'untrust', false, 2, 'permit'],
      ['block-inbound', 'untrust', 'trust', true, 1, 'deny'],
    ]);

    expect(fw.routeTableFound).toBe(true);
    expect(fw.routes.map(r => [r.destination.toString(), r.interface, r.isLocal])).toEqual([
      ['0.0.0.0/0', 'ge-0/0/0.0', false],
      ['10.0.0.0/24', 'ge-0/0/1.0', true],
    ]);

    expect(fw.zones.map(z => [z.name, [...z.interfaces], [...z.addresses.keys()]])).toEqual([
      ['trust', ['ge-0/0/1.0'], ['any', 'web-1', 'web-2', 'web-servers']],
      ['untrust', ['ge-0/0/0.0'], ['any']],
    ]);
    expect(fw.zones[0]?.addresses.get('web-servers')?.toCidrs()).toEqual(['10.0.0.10/31']);
  });

  it('rejects when a file is missing', async () => {
    await expect(loadFirewallModel({ ...paths, routes: fixture('missing.xml') })).rejects.toThrow('ENOENT');
  });
});

describe('buildFirewallModel', () => {
  it('returns a frozen model', () => {
    const fw = buildFirewallModel(sources());
    expect(Object.isFrozen(fw)).toBe(true);
    expect(Object.isFrozen(fw.policies)).toBe(true);
    expect(Object.isFrozen(fw.routes)).toBe(true);
    expect(Object.isFrozen(fw.zones)).toBe(true);
  });

  it('renders a listing', () => {
    expect(formatFirewall(buildFirewallModel(sources()))).toBe([
      'policies:',
      '  permit trust:[web-servers] -> untrust:[any] : [junos-http, junos-https]',
      '  permit trust:[any] -> untrust:[any] : [junos-ftp]',
      '  deny untrust:[any] -> trust:[any] : [any]',
      'routes:',
      '  0.0.0.0/0 via ge-0/0/0.0',
      '  10.0.0.0/24 via ge-0/0/1.0 (local)',
      'zones:',
      '  trust on [ge-0/0/1.0]',
      '  untrust on [ge-0/0/0.0]',
    ].join('\n'));
  });

  it('logs each extraction under its document name', () => {
    const lines: string[] = [];
    const log = pino({ level: 'info' }, { write: (line: string) => { lines.push(line); } });

    buildFirewallModel(sources(), { logger: log });

    const entries: Array<{ document?: string; msg?: string }> = lines.map(line => JSON.parse(line));
    expect(entries.map(e => `${e.document}: ${e.msg}`)).toEqual([
      'policies: parsing policies',
      'routes: parsing routes',
      'zones: parsing zones',
    ]);
  });

  it('reports an absent route table separately from the routes', () => {
    const fw = buildFirewallModel({ ...sources(), routes: '<rpc-reply/>' });
    expect(fw.routeTableFound).toBe(false);
    expect(fw.routes).toEqual([]);
    expect(fw.policies).toHaveLength(3);
  });

  it('fails as a whole when one document is malformed', () => {
    expect(() => buildFirewallModel({ ...sources(), securityPolicies: '<security-policies>' }))
      .toThrow(MalformedDocumentError);
  });

  it('fails as a whole on an unresolved address reference', () => {
    const zones = '<zones><security-zone><name>trust</name><address-book>'
      + '<address-set><name>s</name><address><name>nowhere</name></address></address-set>'
      + '</address-book></security-zone></zones>';
    expect(() => buildFirewallModel({ ...sources(), securityZones: zones })).toThrow(UnresolvedReferenceError);
  });
});
