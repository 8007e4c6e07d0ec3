// src/ip.ts
// Addresses, CIDR networks and IPSet (a normalized union of address ranges).
// IPv4 and IPv6 are both held as bigint so one range algebra covers both.

export type IPFamily = 4 | 6;

type Range = { family: IPFamily; start: bigint; end: bigint };

const BITS: Record<IPFamily, number> = { 4: 32, 6: 128 };

function familyOf(ip: string): IPFamily {
  return ip.includes(':') ? 6 : 4;
}

/** Parse dotted IPv4 to an unsigned integer */
function ipv4ToBigInt(ip: string): bigint {
  const parts = ip.trim().split('.');
  if (parts.length !== 4) throw new Error(`Bad IPv4: ${ip}`);
  let n = 0n;
  for (const p of parts) {
    if (!/^\d{1,3}$/.test(p)) throw new Error(`Bad IPv4: ${ip}`);
    const v = Number(p);
    if (v > 255) throw new Error(`Bad IPv4: ${ip}`);
    n = (n << 8n) | BigInt(v);
  }
  return n;
}

/** Parse IPv6 (with optional "::" and trailing dotted quad) to an unsigned integer */
function ipv6ToBigInt(ip: string): bigint {
  let text = ip.trim().toLowerCase();
  // trailing embedded IPv4, e.g. ::ffff:10.0.0.1
  const lastColon = text.lastIndexOf(':');
  if (text.slice(lastColon + 1).includes('.')) {
    const v4 = ipv4ToBigInt(text.slice(lastColon + 1));
    text = `${text.slice(0, lastColon + 1)}${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const halves = text.split('::');
  if (halves.length > 2) throw new Error(`Bad IPv6: ${ip}`);
  const head = halves[0] ? halves[0].split(':') : [];
  const tail = halves.length === 2 && halves[1] ? halves[1].split(':') : [];
  const missing = 8 - head.length - tail.length;
  if (halves.length === 2 ? missing < 1 : missing !== 0) throw new Error(`Bad IPv6: ${ip}`);

  const groups = [...head, ...Array<string>(halves.length === 2 ? missing : 0).fill('0'), ...tail];
  let n = 0n;
  for (const g of groups) {
    if (!/^[0-9a-f]{1,4}$/.test(g)) throw new Error(`Bad IPv6: ${ip}`);
    n = (n << 16n) | BigInt(parseInt(g, 16));
  }
  return n;
}

function parseAddress(ip: string): { family: IPFamily; value: bigint } {
  const family = familyOf(ip);
  return { family, value: family === 4 ? ipv4ToBigInt(ip) : ipv6ToBigInt(ip) };
}

function formatAddress(family: IPFamily, value: bigint): string {
  if (family === 4) {
    return [24n, 16n, 8n, 0n].map(shift => ((value >> shift) & 255n).toString()).join('.');
  }
  const groups: string[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) groups.push(((value >> shift) & 0xffffn).toString(16));

  // longest run of zero groups (at least two) collapses to "::"
  let bestStart = -1;
  let bestLen = 1;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== '0') { i++; continue; }
    let j = i;
    while (j < groups.length && groups[j] === '0') j++;
    if (j - i > bestLen) { bestStart = i; bestLen = j - i; }
    i = j;
  }
  if (bestStart < 0) return groups.join(':');
  return `${groups.slice(0, bestStart).join(':')}::${groups.slice(bestStart + bestLen).join(':')}`;
}

/** Build a mask integer from prefix length */
function prefixToMask(family: IPFamily, prefix: number): bigint {
  const bits = BigInt(BITS[family]);
  const all = (1n << bits) - 1n;
  return (all << (bits - BigInt(prefix))) & all;
}

/** A CIDR network: "a.b.c.d/nn" or "x::/nn". Host bits are masked off. */
export class IPNetwork {
  private constructor(
    readonly family: IPFamily,
    readonly network: bigint,
    readonly prefix: number,
  ) {}

  /** A bare address is a host network (/32 or /128). */
  static parse(cidr: string): IPNetwork {
    const [ipStr, pStr, ...rest] = cidr.trim().split('/');
    if (!ipStr || rest.length) throw new Error(`Bad CIDR: ${cidr}`);
    const { family, value } = parseAddress(ipStr);
    if (pStr !== undefined && !/^\d{1,3}$/.test(pStr)) throw new Error(`Bad CIDR prefix: ${cidr}`);
    const prefix = pStr === undefined ? BITS[family] : Number(pStr);
    if (prefix > BITS[family]) throw new Error(`Bad CIDR prefix: ${cidr}`);
    return new IPNetwork(family, value & prefixToMask(family, prefix), prefix);
  }

  get first(): bigint {
    return this.network;
  }

  get last(): bigint {
    return this.network | (~prefixToMask(this.family, this.prefix) & ((1n << BigInt(BITS[this.family])) - 1n));
  }

  equals(other: IPNetwork): boolean {
    return this.family === other.family && this.network === other.network && this.prefix === other.prefix;
  }

  toString(): string {
    return `${formatAddress(this.family, this.network)}/${this.prefix}`;
  }
}

function normalize(ranges: Range[]): Range[] {
  const sorted = [...ranges].sort((a, b) =>
    a.family !== b.family ? a.family - b.family : a.start < b.start ? -1 : a.start > b.start ? 1 : 0,
  );
  const out: Range[] = [];
  for (const r of sorted) {
    const prev = out[out.length - 1];
    if (prev && prev.family === r.family && r.start <= prev.end + 1n) {
      if (r.end > prev.end) out[out.length - 1] = { ...prev, end: r.end };
    } else {
      out.push({ ...r });
    }
  }
  return out;
}

/**
 * Immutable set of addresses. Ranges are kept sorted and merged, so two sets
 * holding the same addresses compare equal however they were built.
 */
export class IPSet {
  private constructor(private readonly ranges: readonly Range[]) {}

  static of(networks: Iterable<IPNetwork> = []): IPSet {
    return new IPSet(normalize(Array.from(networks, n => ({ family: n.family, start: n.first, end: n.last }))));
  }

  static fromCidr(cidr: string): IPSet {
    return IPSet.of([IPNetwork.parse(cidr)]);
  }

  /** Inclusive address range, e.g. from a range-address book entry. */
  static fromRange(low: string, high: string): IPSet {
    const a = parseAddress(low);
    const b = parseAddress(high);
    if (a.family !== b.family) throw new Error(`Mixed address families: ${low} - ${high}`);
    if (a.value > b.value) throw new Error(`Empty range: ${low} - ${high}`);
    return new IPSet([{ family: a.family, start: a.value, end: b.value }]);
  }

  get isEmpty(): boolean {
    return this.ranges.length === 0;
  }

  union(other: IPSet): IPSet {
    return new IPSet(normalize([...this.ranges, ...other.ranges]));
  }

  equals(other: IPSet): boolean {
    return this.ranges.length === other.ranges.length &&
      this.ranges.every((r, i) => {
        const o = other.ranges[i];
        return o !== undefined && r.family === o.family && r.start === o.start && r.end === o.end;
      });
  }

  /** True when every address of the given address or CIDR is in the set. */
  contains(ipOrCidr: string): boolean {
    const net = IPNetwork.parse(ipOrCidr);
    return this.ranges.some(r => r.family === net.family && r.start <= net.first && net.last <= r.end);
  }

  /** Minimal CIDR cover, ascending, IPv4 before IPv6. */
  toCidrs(): string[] {
    const out: string[] = [];
    for (const r of this.ranges) {
      const bits = BITS[r.family];
      let start = r.start;
      while (start <= r.end) {
        // widest block aligned at start that stays inside the range
        let size = 0;
        while (size < bits && (start & ((1n << BigInt(size + 1)) - 1n)) === 0n &&
          start + (1n << BigInt(size + 1)) - 1n <= r.end) {
          size++;
        }
        out.push(`${formatAddress(r.family, start)}/${bits - size}`);
        start += 1n << BigInt(size);
      }
    }
    return out;
  }

  toString(): string {
    return `IPSet([${this.toCidrs().join(', ')}])`;
  }
}

/** The whole IPv4 space; every zone's built-in "any" entry. */
export const ANY_IPV4: IPSet = IPSet.fromCidr('0.0.0.0/0');
