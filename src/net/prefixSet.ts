// src/net/prefixSet.ts
import { isIP } from 'net';
import ipaddr from 'ipaddr.js';
import type { ClientAddress, IpAddress } from './clientAddress.js';
import { isKnownAddress } from './clientAddress.js';

type Family = 'ipv4' | 'ipv6';

const WIDTH: Record<Family, number> = { ipv4: 32, ipv6: 128 };

// Config lists may use commas, semicolons or any whitespace between entries.
const SEPARATORS = /[,;\s]+/;
const BITS = /^(0|[1-9]\d*)$/;

function familyOf(addr: IpAddress): Family {
  return addr.toByteArray().length === 4 ? 'ipv4' : 'ipv6';
}

function toBigInt(addr: IpAddress): bigint {
  return addr.toByteArray().reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
}

function fromBigInt(value: bigint, family: Family): IpAddress {
  const bytes: number[] = [];
  for (let i = WIDTH[family] / 8; i > 0; i--) {
    bytes.unshift(Number(value & 0xffn));
    value >>= 8n;
  }
  return ipaddr.fromByteArray(bytes);
}

// ::ffff:0:0/96
const V4_MAPPED = 0xffffn;

function hostMask(family: Family, bits: number): bigint {
  return (1n << BigInt(WIDTH[family] - bits)) - 1n;
}

/** An IP network kept in canonical form: host bits are always zero. */
export class NetworkPrefix {
  readonly first: bigint;
  readonly last: bigint;

  private constructor(
    readonly family: Family,
    readonly bits: number,
    address: bigint
  ) {
    const host = hostMask(family, bits);
    this.first = address & ~host;
    this.last = this.first | host;
  }

  /** Parses `address/bits`; returns null for anything else. */
  static parse(token: string): NetworkPrefix | null {
    const slash = token.lastIndexOf('/');
    if (slash === -1) return null;
    const addr = token.slice(0, slash);
    const bits = token.slice(slash + 1);
    if (!isIP(addr) || addr.includes('%') || !BITS.test(bits)) return null;

    const parsed = ipaddr.parse(addr);
    const family = familyOf(parsed);
    const length = Number(bits);
    if (length > WIDTH[family]) return null;
    const value = toBigInt(parsed);
    // Client addresses are unmapped to IPv4, so IPv4-mapped networks are stored the same way
    if (family === 'ipv6' && length >= 96 && (value >> 32n) === V4_MAPPED) {
      return new NetworkPrefix('ipv4', length - 96, value & 0xffffffffn);
    }
    return new NetworkPrefix(family, length, value);
  }

  contains(addr: IpAddress): boolean {
    if (familyOf(addr) !== this.family) return false;
    const value = toBigInt(addr);
    return value >= this.first && value <= this.last;
  }

  equals(other: NetworkPrefix): boolean {
    return this.family === other.family && this.bits === other.bits && this.first === other.first;
  }

  toString(): string {
    return `${fromBigInt(this.first, this.family).toString()}/${this.bits}`;
  }
}

interface Range {
  first: bigint;
  last: bigint;
}

// Sorted, non-overlapping, non-adjacent ranges.
function mergeRanges(prefixes: NetworkPrefix[]): Range[] {
  const sorted = prefixes
    .map((p) => ({ first: p.first, last: p.last }))
    .sort((a, b) => (a.first < b.first ? -1 : a.first > b.first ? 1 : 0));
  const out: Range[] = [];
  for (const r of sorted) {
    const tail = out[out.length - 1];
    if (tail && r.first <= tail.last + 1n) {
      if (r.last > tail.last) tail.last = r.last;
    } else {
      out.push({ ...r });
    }
  }
  return out;
}

function search(ranges: readonly Range[], value: bigint): boolean {
  let lo = 0;
  let hi = ranges.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const r = ranges[mid];
    if (value < r.first) hi = mid - 1;
    else if (value > r.last) lo = mid + 1;
    else return true;
  }
  return false;
}

/**
 * Immutable set of networks. Built once from configuration, then only queried, so it can
 * be shared by every in-flight request without locking. To reload ranges, build a new set
 * and swap the reference.
 */
export class PrefixSet {
  private readonly v4: readonly Range[];
  private readonly v6: readonly Range[];

  readonly prefixes: readonly NetworkPrefix[];

  constructor(prefixes: readonly NetworkPrefix[]) {
    this.prefixes = Object.freeze([...prefixes]);
    this.v4 = mergeRanges(this.prefixes.filter((p) => p.family === 'ipv4'));
    this.v6 = mergeRanges(this.prefixes.filter((p) => p.family === 'ipv6'));
  }

  get size(): number {
    return this.prefixes.length;
  }

  contains(addr: IpAddress): boolean {
    const ranges = familyOf(addr) === 'ipv4' ? this.v4 : this.v6;
    return search(ranges, toBigInt(addr));
  }
}

/**
 * Builds a PrefixSet from a list such as `"10.0.0.0/8, 172.16.0.0/12;192.168.0.0/16"`.
 * Entries that do not parse are skipped and reported to `onInvalid`; they never fail the
 * build. Returns null when nothing usable is configured.
 */
export function buildPrefixSet(
  configText: string | undefined,
  onInvalid?: (token: string) => void
): PrefixSet | null {
  const raw = (configText ?? '').trim();
  if (!raw) return null;

  const unique = new Map<string, NetworkPrefix>();
  for (const token of raw.split(SEPARATORS)) {
    if (!token) continue;
    const prefix = NetworkPrefix.parse(token);
    if (!prefix) {
      onInvalid?.(token);
      continue;
    }
    unique.set(prefix.toString(), prefix);
  }
  return unique.size ? new PrefixSet([...unique.values()]) : null;
}

export function containsAddress(set: PrefixSet | null, addr: ClientAddress): boolean {
  if (!set || !isKnownAddress(addr)) return false;
  return set.contains(addr);
}
