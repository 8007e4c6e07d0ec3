// src/config.ts
// Environment for the logging layer, plus the vendor constants the route
// extractor matches against.

export type NodeEnv = 'development' | 'production' | 'test';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Env {
  NODE_ENV: NodeEnv;
  LOG_LEVEL: LogLevel;
}

/** Namespace of `show route | display xml` output on Junos 12.1X44. */
export const JUNOS_ROUTING_NAMESPACE = 'http://xml.juniper.net/junos/12.1X44/junos-routing';

/** The primary IPv4 unicast table; the only one modelled. */
export const PRIMARY_ROUTE_TABLE = 'inet.0';

function parseNodeEnv(value: string | undefined): NodeEnv {
  return value === 'production' || value === 'test' ? value : 'development';
}

function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  const match = LOG_LEVELS.find(level => level === value?.trim().toLowerCase());
  return match ?? defaultValue;
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): Env {
  const NODE_ENV = parseNodeEnv(env.NODE_ENV);
  return {
    NODE_ENV,
    LOG_LEVEL: parseLogLevel(env.LOG_LEVEL, NODE_ENV === 'production' ? 'info' : 'debug'),
  };
}
