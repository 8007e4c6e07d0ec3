export { buildFirewallModel, loadFirewallModel } from './firewall';
export type { FirewallModel, FirewallOptions, FirewallPaths, FirewallSources } from './firewall';
export { extractPolicies, parsePolicies } from './parse_policies';
export type { Policy, PolicyAction } from './parse_policies';
export { extractRoutes, parseRoutes } from './parse_routes';
export type { Route, RouteExtraction, RouteOptions } from './parse_routes';
export { extractZones, parseZones, resolveAddressBook } from './parse_zones';
export type { Zone } from './parse_zones';
export { ANY_IPV4, IPNetwork, IPSet } from './ip';
export type { IPFamily } from './ip';
export { formatFirewall, formatPolicy, formatRoute, formatZone } from './format';
export { FirewallModelError, MalformedDocumentError, UnresolvedReferenceError } from './errors';
export type { DocumentKind } from './errors';
export { JUNOS_ROUTING_NAMESPACE, PRIMARY_ROUTE_TABLE } from './config';
export { createChildLogger, logger } from './logger';
export type { Logger } from './logger';
