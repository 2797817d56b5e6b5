import { describe, expect, it, vi } from 'vitest';
import { buildPrefixSet, containsAddress, NetworkPrefix, PrefixSet } from '../prefixSet.js';
import { parseAddress } from '../clientAddress.js';

const internal = (set: ReturnType<typeof buildPrefixSet>, ip: string) =>
  containsAddress(set, parseAddress(ip));

describe('buildPrefixSet', () => {
  it('treats addresses inside a configured network as internal', () => {
    const set = buildPrefixSet('10.0.0.0/8');
    expect(internal(set, '10.1.2.3')).toBe(true);
    expect(internal(set, '8.8.8.8')).toBe(false);
  });

  it('accepts comma, semicolon, space, tab and newline separators', () => {
    const set = buildPrefixSet('10.0.0.0/8, 172.16.0.0/12;192.168.0.0/16\t100.64.0.0/10\nfd00::/8');
    expect(set?.prefixes.map(String)).toEqual([
      '10.0.0.0/8',
      '172.16.0.0/12',
      '192.168.0.0/16',
      '100.64.0.0/10',
      'fd00::/8',
    ]);
    expect(internal(set, '172.31.255.255')).toBe(true);
    expect(internal(set, '172.32.0.0')).toBe(false);
    expect(internal(set, '192.168.4.20')).toBe(true);
    expect(internal(set, '100.127.0.1')).toBe(true);
    expect(internal(set, 'fd12:3456::1')).toBe(true);
    expect(internal(set, 'fe80::1')).toBe(false);
  });

  it('returns null for empty or whitespace-only configuration', () => {
    expect(buildPrefixSet('')).toBeNull();
    expect(buildPrefixSet('  \n\t ')).toBeNull();
    expect(buildPrefixSet(undefined)).toBeNull();
  });

  it('treats every address as external when nothing valid is configured', () => {
    const set = buildPrefixSet('not-a-cidr, 10.0.0.0, 300.1.1.1/8');
    expect(set).toBeNull();
    expect(internal(set, '127.0.0.1')).toBe(false);
    expect(internal(set, '10.0.0.1')).toBe(false);
  });

  it('skips malformed entries, reports them and keeps the rest', () => {
    const onInvalid = vi.fn();
    const set = buildPrefixSet('10.0.0.0/8, bogus, 192.168.0.0/33, 10.0.0.0/08, fe80::1%eth0/64', onInvalid);
    expect(set?.prefixes.map(String)).toEqual(['10.0.0.0/8']);
    expect(onInvalid.mock.calls).toEqual([
      ['bogus'],
      ['192.168.0.0/33'],
      ['10.0.0.0/08'],
      ['fe80::1%eth0/64'],
    ]);
  });

  it('masks host bits and collapses duplicates', () => {
    const set = buildPrefixSet('10.1.2.3/8 10.0.0.0/8 10.255.255.255/8');
    expect(set?.size).toBe(1);
    expect(set?.prefixes.map(String)).toEqual(['10.0.0.0/8']);
  });

  it('matches through any covering prefix, not only the longest', () => {
    const set = buildPrefixSet('10.0.0.0/8, 10.1.0.0/16, 192.168.1.0/24');
    expect(internal(set, '10.200.0.1')).toBe(true);
    expect(internal(set, '10.1.9.9')).toBe(true);
    expect(internal(set, '192.168.2.1')).toBe(false);
  });

  it('handles single hosts and the catch-all prefix', () => {
    expect(internal(buildPrefixSet('203.0.113.7/32'), '203.0.113.7')).toBe(true);
    expect(internal(buildPrefixSet('203.0.113.7/32'), '203.0.113.8')).toBe(false);
    expect(internal(buildPrefixSet('0.0.0.0/0'), '8.8.8.8')).toBe(true);
    // IPv4 ranges never cover IPv6 addresses
    expect(internal(buildPrefixSet('0.0.0.0/0'), '2001:db8::1')).toBe(false);
  });

  it('finds addresses across many disjoint ranges', () => {
    const cidrs = Array.from({ length: 200 }, (_, i) => `10.${i}.0.0/24`).join(',');
    const set = buildPrefixSet(cidrs);
    expect(internal(set, '10.0.0.1')).toBe(true);
    expect(internal(set, '10.137.0.200')).toBe(true);
    expect(internal(set, '10.199.0.255')).toBe(true);
    expect(internal(set, '10.137.1.0')).toBe(false);
    expect(internal(set, '10.200.0.1')).toBe(false);
  });

  it('never reports invalid addresses as internal', () => {
    const set = buildPrefixSet('0.0.0.0/0, ::/0');
    expect(internal(set, 'garbage')).toBe(false);
    expect(internal(set, '')).toBe(false);
  });
});

describe('NetworkPrefix', () => {
  it('compares equal regardless of host-bit noise', () => {
    const a = NetworkPrefix.parse('192.168.1.77/24');
    const b = NetworkPrefix.parse('192.168.1.0/24');
    expect(a && b && a.equals(b)).toBe(true);
    expect(a?.toString()).toBe('192.168.1.0/24');
  });

  it('canonicalizes IPv6 prefixes', () => {
    expect(NetworkPrefix.parse('2001:db8:0:0:1::1/32')?.toString()).toBe('2001:db8::/32');
  });

  it('stores IPv4-mapped networks as IPv4', () => {
    expect(NetworkPrefix.parse('::ffff:10.0.0.0/104')?.toString()).toBe('10.0.0.0/8');
    expect(NetworkPrefix.parse('::ffff:192.168.1.9/128')?.toString()).toBe('192.168.1.9/32');
    expect(NetworkPrefix.parse('::ffff:0:0/96')?.toString()).toBe('0.0.0.0/0');
    expect(NetworkPrefix.parse('::fffe:0:0/96')?.toString()).toBe('::fffe:0:0/96');
  });

  it('rejects tokens without a prefix length', () => {
    expect(NetworkPrefix.parse('10.0.0.1')).toBeNull();
    expect(NetworkPrefix.parse('10.0.0.1/')).toBeNull();
    expect(NetworkPrefix.parse('::1/129')).toBeNull();
  });
});

describe('PrefixSet', () => {
  it('matches IPv4 clients against IPv4-mapped entries', () => {
    const set = buildPrefixSet('::ffff:10.0.0.0/104');

    expect(set?.prefixes.map(String)).toEqual(['10.0.0.0/8']);
    expect(containsAddress(set, parseAddress('::ffff:10.0.0.1'))).toBe(true);
    expect(containsAddress(set, parseAddress('10.0.0.1'))).toBe(true);
    expect(containsAddress(set, parseAddress('11.0.0.1'))).toBe(false);
  });

  it('is not affected by later changes to the source array', () => {
    const ten = NetworkPrefix.parse('10.0.0.0/8');
    const other = NetworkPrefix.parse('172.16.0.0/12');
    if (!ten || !other) throw new Error('fixture prefixes must parse');
    const source = [ten];
    const set = new PrefixSet(source);

    source.push(other);
    source.shift();

    expect(set.size).toBe(1);
    expect(set.prefixes.map(String)).toEqual(['10.0.0.0/8']);
    expect(containsAddress(set, parseAddress('10.1.2.3'))).toBe(true);
  });
});
