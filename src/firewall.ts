// src/firewall.ts
// Aggregate root: runs the three extractors over their own documents and
// freezes the results together. Any extractor error fails the whole build.

import { readFile } from 'node:fs/promises';

import { createChildLogger, logger as defaultLogger, type Logger } from './logger';
import { parsePolicies, type Policy } from './parse_policies';
import { parseRoutes, type Route } from './parse_routes';
import { parseZones, type Zone } from './parse_zones';

export type FirewallModel = {
  readonly policies: readonly Policy[];
  /** inet.0 routes; empty both when the table is absent and when it is empty */
  readonly routes: readonly Route[];
  readonly zones: readonly Zone[];
  /** distinguishes "no inet.0 table" from "inet.0 with no usable routes" */
  readonly routeTableFound: boolean;
};

/** XML text of the three exports. */
export type FirewallSources = {
  securityPolicies: string;
  routes: string;
  securityZones: string;
};

/** Paths of the three export files. */
export type FirewallPaths = {
  [K in keyof FirewallSources]: string;
};

export type FirewallOptions = {
  routingNamespace?: string;
  logger?: Logger;
};

export function buildFirewallModel(sources: FirewallSources, options: FirewallOptions = {}): FirewallModel {
  const log = options.logger ?? defaultLogger;

  const policies = parsePolicies(sources.securityPolicies, createChildLogger({ document: 'policies' }, log));
  const { tableFound, routes } = parseRoutes(sources.routes, {
    routingNamespace: options.routingNamespace,
    logger: createChildLogger({ document: 'routes' }, log),
  });
  const zones = parseZones(sources.securityZones, createChildLogger({ document: 'zones' }, log));

  return Object.freeze({
    policies: Object.freeze(policies),
    routes: Object.freeze(routes),
    zones: Object.freeze(zones),
    routeTableFound: tableFound,
  });
}

export async function loadFirewallModel(paths: FirewallPaths, options: FirewallOptions = {}): Promise<FirewallModel> {
  const [securityPolicies, routes, securityZones] = await Promise.all([
    readFile(paths.securityPolicies, 'utf8'),
    readFile(paths.routes, 'utf8'),
    readFile(paths.securityZones, 'utf8'),
  ]);
  return buildFirewallModel({ securityPolicies, routes, securityZones }, options);
}
