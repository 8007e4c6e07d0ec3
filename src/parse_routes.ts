// src/parse_routes.ts
// Routing-table export -> Route[] for inet.0.
//
// Every element lives in the vendor routing namespace:
//   <route-table><table-name>inet.0</table-name>
//     <rt><rt-destination>10.0.0.0/8</rt-destination>
//       <rt-entry><current-active/>…<nh><to>…</to><via>ge-0/0/0.0</via></nh></rt-entry>
//     </rt>
//   </route-table>

import { JUNOS_ROUTING_NAMESPACE, PRIMARY_ROUTE_TABLE } from './config';
import { MalformedDocumentError } from './errors';
import { IPNetwork } from './ip';
import { logger as defaultLogger, type Logger } from './logger';
import { children, descendants, optionalText, parseXmlDocument, requireText, type XmlNamespace } from './xml';

export type Route = {
  readonly destination: IPNetwork;
  /** egress interface, from the active entry's first next-hop "via" */
  readonly interface: string;
  /** directly attached: the active entry has no next-hop address */
  readonly isLocal: boolean;
};

export type RouteExtraction = {
  /** false when the document has no inet.0 table at all */
  tableFound: boolean;
  routes: Route[];
};

export type RouteOptions = {
  /** Namespace URI of the export; varies with the Junos release. */
  routingNamespace?: string;
  logger?: Logger;
};

// ---------------- main ----------------

export function parseRoutes(xmlText: string, options: RouteOptions = {}): RouteExtraction {
  return extractRoutes(parseXmlDocument(xmlText, 'routes'), options);
}

export function extractRoutes(doc: Document, options: RouteOptions = {}): RouteExtraction {
  const ns = options.routingNamespace ?? JUNOS_ROUTING_NAMESPACE;
  const log = options.logger ?? defaultLogger;
  log.info('parsing routes');

  const table = descendants(doc.documentElement, 'route-table', ns)
    .find(t => optionalText(t, 'table-name', ns) === PRIMARY_ROUTE_TABLE);
  if (!table) {
    log.info({ table: PRIMARY_ROUTE_TABLE, namespace: ns }, 'route table not found');
    return { tableFound: false, routes: [] };
  }

  const routes: Route[] = [];
  for (const rt of children(table, 'rt', ns)) {
    const route = parseRt(rt, ns);
    if (route) routes.push(route);
  }
  log.debug({ count: routes.length }, 'parsed routes');
  return { tableFound: true, routes };
}

// ---------------- parsers ----------------

function parseRt(rt: Element, ns: XmlNamespace): Route | undefined {
  const destinationText = requireText(rt, 'rt-destination', 'routes', ns);
  let destination: IPNetwork;
  try {
    destination = IPNetwork.parse(destinationText);
  } catch (err) {
    throw new MalformedDocumentError('routes', err instanceof Error ? err.message : String(err), {
      destination: destinationText,
    });
  }

  const active = children(rt, 'rt-entry', ns).find(e => descendants(e, 'current-active', ns).length > 0);
  if (!active) return undefined;

  // discard/reject and local (nh-local-interface) entries carry no via
  const via = descendants(active, 'via', ns)[0];
  const iface = via ? (via.textContent ?? '').trim() : '';
  if (!iface) return undefined;

  return Object.freeze({
    destination,
    interface: iface,
    isLocal: descendants(active, 'to', ns).length === 0,
  });
}
