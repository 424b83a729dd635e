import { isIP } from 'node:net';
import type { CidrRange, IpFamily } from './types.js';

const PREFIX_PATTERN = /^\d{1,3}$/;

const ADDRESS_BITS: Record<IpFamily, number> = { 4: 32, 6: 128 };

// ---------------------------------------------------------------------------
// Address <-> integer conversion
// ---------------------------------------------------------------------------

function ipv4ToBigInt(address: string): bigint {
  return address
    .split('.')
    .reduce((acc, octet) => (acc << 8n) | BigInt(parseInt(octet, 10)), 0n);
}

function bigIntToIpv4(value: bigint): string {
  const octets: number[] = [];
  for (let shift = 24n; shift >= 0n; shift -= 8n) {
    octets.push(Number((value >> shift) & 0xffn));
  }
  return octets.join('.');
}

/** Expands an IPv6 address (already validated by `isIP`) to eight groups. */
function ipv6Groups(address: string): number[] {
  const expandSide = (side: string): number[] => {
    if (side.length === 0) return [];
    const groups: number[] = [];
    for (const part of side.split(':')) {
      if (part.includes('.')) {
        // Trailing embedded IPv4, e.g. ::ffff:192.0.2.1
        const v4 = Number(ipv4ToBigInt(part));
        groups.push((v4 >>> 16) & 0xffff, v4 & 0xffff);
      } else {
        groups.push(parseInt(part, 16));
      }
    }
    return groups;
  };

  const [head = '', tail] = address.split('::');
  const left = expandSide(head);
  if (tail === undefined) return left;

  const right = expandSide(tail);
  const zeros = new Array<number>(8 - left.length - right.length).fill(0);
  return [...left, ...zeros, ...right];
}

function ipv6ToBigInt(address: string): bigint {
  return ipv6Groups(address).reduce((acc, group) => (acc << 16n) | BigInt(group), 0n);
}

const IPV4_MAPPED_PREFIX = 0xffffn;

/**
 * Formats per RFC 5952: lowercase, longest zero run (two groups or more)
 * as "::", and IPv4-mapped addresses in mixed notation (::ffff:192.0.2.1).
 */
function bigIntToIpv6(value: bigint): string {
  if (value >> 32n === IPV4_MAPPED_PREFIX) {
    return `::ffff:${bigIntToIpv4(value & 0xffffffffn)}`;
  }

  const groups: number[] = [];
  for (let shift = 112n; shift >= 0n; shift -= 16n) {
    groups.push(Number((value >> shift) & 0xffffn));
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) return hex.join(':');

  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}

export function addressToString(value: bigint, family: IpFamily): string {
  return family === 4 ? bigIntToIpv4(value) : bigIntToIpv6(value);
}

// ---------------------------------------------------------------------------
// Ranges
// ---------------------------------------------------------------------------

/**
 * Parses CIDR notation ("192.168.1.0/24", "2001:db8::/126").
 * Host bits are masked off, so "192.168.1.7/24" is the same range
 * as "192.168.1.0/24". Returns null when the text is not a range.
 */
export function parseCidr(text: string): CidrRange | null {
  const trimmed = text.trim();
  const slash = trimmed.indexOf('/');
  if (slash <= 0) return null;

  const address = trimmed.slice(0, slash);
  const rawPrefix = trimmed.slice(slash + 1);
  if (!PREFIX_PATTERN.test(rawPrefix)) return null;

  const family = isIP(address);
  if (family !== 4 && family !== 6) return null;
  if (family === 6 && address.includes('%')) return null;

  const bits = ADDRESS_BITS[family];
  const prefix = parseInt(rawPrefix, 10);
  if (prefix > bits) return null;

  const value = family === 4 ? ipv4ToBigInt(address) : ipv6ToBigInt(address);
  const hostBits = BigInt(bits - prefix);
  const network = (value >> hostBits) << hostBits;

  return { family, network, prefix };
}

function hostBounds(range: CidrRange): { first: bigint; last: bigint } {
  const size = 1n << BigInt(ADDRESS_BITS[range.family] - range.prefix);
  const last = range.network + size - 1n;

  // IPv4 ranges wider than /31 reserve the network and broadcast addresses.
  if (range.family === 4 && range.prefix < 31) {
    return { first: range.network + 1n, last: last - 1n };
  }
  return { first: range.network, last };
}

/** Number of addresses `hosts` yields for the range. */
export function hostCount(range: CidrRange): bigint {
  const { first, last } = hostBounds(range);
  return last - first + 1n;
}

/** Lazily yields every usable host address of the range, lowest first. */
export function* hosts(range: CidrRange): Generator<string> {
  const { first, last } = hostBounds(range);
  for (let current = first; current <= last; current++) {
    yield addressToString(current, range.family);
  }
}

export function formatCidr(range: CidrRange): string {
  return `${addressToString(range.network, range.family)}/${range.prefix}`;
}
