// src/format.ts
// One-line renderings of model entities for logs and listings.

import type { FirewallModel } from './firewall';
import type { Policy } from './parse_policies';
import type { Route } from './parse_routes';
import type { Zone } from './parse_zones';

function list(items: readonly string[]): string {
  return `[${items.join(', ')}]`;
}

export function formatPolicy(p: Policy): string {
  return `${p.action} ${p.fromZone}:${list(p.sourceAddresses)} -> ${p.toZone}:${list(p.destinationAddresses)} : ${list(p.applications)}`;
}

export function formatRoute(r: Route): string {
  return `${r.destination.toString()} via ${r.interface}${r.isLocal ? ' (local)' : ''}`;
}

export function formatZone(z: Zone): string {
  return `${z.name} on ${list(z.interfaces)}`;
}

export function formatFirewall(fw: FirewallModel): string {
  return [
    'policies:',
    ...fw.policies.map(p => `  ${formatPolicy(p)}`),
    'routes:',
    ...fw.routes.map(r => `  ${formatRoute(r)}`),
    'zones:',
    ...fw.zones.map(z => `  ${formatZone(z)}`),
  ].join('\n');
}
