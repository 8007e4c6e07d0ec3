// src/parse_zones.ts
// Zone-configuration export -> Zone[], with each zone's address book
// resolved to IP sets.
//
//   <security-zone><name>trust</name>
//     <address-book>
//       <address><name>web</name><ip-prefix>10.0.0.0/24</ip-prefix></address>
//       <address-set><name>servers</name><address><name>web</name></address></address-set>
//     </address-book>
//     <interfaces><name>ge-0/0/0.0</name></interfaces>
//   </security-zone>

import { MalformedDocumentError, UnresolvedReferenceError } from './errors';
import { ANY_IPV4, IPSet } from './ip';
import { logger as defaultLogger, type Logger } from './logger';
import { children, descendants, firstChild, optionalText, parseXmlDocument, requireText } from './xml';

export type Zone = {
  readonly name: string;
  readonly interfaces: readonly string[];
  /** address-book entry name -> addresses; always holds "any" */
  readonly addresses: ReadonlyMap<string, IPSet>;
};

// ---------------- main ----------------

export function parseZones(xmlText: string, log: Logger = defaultLogger): Zone[] {
  return extractZones(parseXmlDocument(xmlText, 'zones'), log);
}

export function extractZones(doc: Document, log: Logger = defaultLogger): Zone[] {
  log.info('parsing zones');
  const zones = descendants(doc.documentElement, 'security-zone').map(parseSecurityZone);
  log.debug({ count: zones.length }, 'parsed zones');
  return zones;
}

function parseSecurityZone(sze: Element): Zone {
  const name = requireText(sze, 'name', 'zones');

  const interfaces = descendants(sze, 'interfaces')
    .flatMap(i => children(i, 'name'))
    .map(n => (n.textContent ?? '').trim());

  const addressBook = firstChild(sze, 'address-book');
  return Object.freeze({
    name,
    interfaces: Object.freeze(interfaces),
    addresses: resolveAddressBook(name, addressBook),
  });
}

// --------------------------- Address resolution ---------------------------

/** Read-only view of a resolved address book; there is no way to change it. */
class AddressBook implements ReadonlyMap<string, IPSet> {
  readonly #entries: Map<string, IPSet>;

  constructor(entries: Map<string, IPSet>) {
    this.#entries = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#entries.size;
  }

  get(name: string): IPSet | undefined {
    return this.#entries.get(name);
  }

  has(name: string): boolean {
    return this.#entries.has(name);
  }

  forEach(callback: (value: IPSet, key: string, map: ReadonlyMap<string, IPSet>) => void, thisArg?: unknown): void {
    this.#entries.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  keys(): IterableIterator<string> {
    return this.#entries.keys();
  }

  values(): IterableIterator<IPSet> {
    return this.#entries.values();
  }

  entries(): IterableIterator<[string, IPSet]> {
    return this.#entries.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, IPSet]> {
    return this.#entries.entries();
  }
}

/**
 * Resolve an address book in one ordered pass. Sets may only name entries
 * already in the map ("any" and anything earlier in the same zone).
 */
export function resolveAddressBook(zoneName: string, addressBook: Element | undefined): ReadonlyMap<string, IPSet> {
  const addresses = new Map<string, IPSet>([['any', ANY_IPV4]]);
  if (!addressBook) return new AddressBook(addresses);

  for (const entry of Array.from(addressBook.children)) {
    const name = requireText(entry, 'name', 'zones', null, { zone: zoneName });
    const value = entry.localName === 'address'
      ? resolveAddress(zoneName, name, entry)
      : resolveAddressSet(zoneName, name, entry, addresses);
    addresses.set(name, value);
  }
  return new AddressBook(addresses);
}

function resolveAddress(zoneName: string, name: string, entry: Element): IPSet {
  const where = { zone: zoneName, address: name };
  const prefix = optionalText(entry, 'ip-prefix');
  const range = firstChild(entry, 'range-address');
  try {
    if (prefix) return IPSet.fromCidr(prefix);
    if (range) {
      return IPSet.fromRange(
        requireText(range, 'name', 'zones', null, where),
        requireText(range, 'to/range-high', 'zones', null, where),
      );
    }
  } catch (err) {
    if (err instanceof MalformedDocumentError) throw err;
    throw new MalformedDocumentError('zones', err instanceof Error ? err.message : String(err), where);
  }
  throw new MalformedDocumentError('zones', `address '${name}' has neither <ip-prefix> nor <range-address>`, where);
}

function resolveAddressSet(zoneName: string, name: string, entry: Element, known: ReadonlyMap<string, IPSet>): IPSet {
  // members are <address> refs; nested <address-set> refs resolve the same way
  const members = Array.from(entry.children)
    .filter(m => m.localName === 'address' || m.localName === 'address-set')
    .map(m => requireText(m, 'name', 'zones', null, { zone: zoneName, addressSet: name }));

  let ip = IPSet.of();
  for (const member of members) {
    const value = known.get(member);
    if (!value) throw new UnresolvedReferenceError(zoneName, name, member);
    ip = ip.union(value);
  }
  return ip;
}
