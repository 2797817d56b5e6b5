// src/net/clientAddress.ts
import { isIP } from 'net';
import type { IncomingHttpHeaders } from 'http';
import ipaddr from 'ipaddr.js';
import type { IPv4, IPv6 } from 'ipaddr.js';

export type IpAddress = IPv4 | IPv6;

export const UNKNOWN_ADDRESS = Symbol('unknown-address');
export type ClientAddress = IpAddress | typeof UNKNOWN_ADDRESS;

// Anything carrying headers and a transport peer; http.IncomingMessage and express' Request fit.
export interface AddressSource {
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string | undefined };
}

export function isKnownAddress(addr: ClientAddress): addr is IpAddress {
  return addr !== UNKNOWN_ADDRESS;
}

// "1.2.3.4:80" -> "1.2.3.4", "[::1]:80" -> "::1". Bare IPv6 literals are returned as-is.
function stripPort(hostport: string): string {
  if (hostport.startsWith('[')) {
    const end = hostport.indexOf(']');
    return end > 0 ? hostport.slice(1, end) : hostport;
  }
  const colon = hostport.indexOf(':');
  if (colon !== -1 && colon === hostport.lastIndexOf(':')) return hostport.slice(0, colon);
  return hostport;
}

/**
 * Parses a literal IPv4/IPv6 address. IPv4-mapped IPv6 (`::ffff:10.0.0.1`, what Node reports
 * for IPv4 peers on dual-stack sockets) comes back as plain IPv4.
 */
export function parseAddress(text: string): ClientAddress {
  const host = stripPort(text.trim());
  if (!isIP(host)) return UNKNOWN_ADDRESS;
  return ipaddr.process(host);
}

function firstForwardedFor(headers: IncomingHttpHeaders): ClientAddress {
  const raw = headers['x-forwarded-for'];
  const xff = Array.isArray(raw) ? raw.join(',') : raw;
  if (!xff) return UNKNOWN_ADDRESS;
  // "client, proxy1, proxy2"
  const [first = ''] = xff.split(',');
  return parseAddress(first);
}

/**
 * Best-effort client address: the first X-Forwarded-For entry, else the transport peer.
 *
 * X-Forwarded-For is set by whoever sends the request, so the result is only good enough
 * for metrics and billing. Never use it for access control.
 */
export function resolveClientAddress(req: AddressSource): ClientAddress {
  const forwarded = firstForwardedFor(req.headers);
  if (isKnownAddress(forwarded)) return forwarded;

  const peer = req.socket.remoteAddress;
  return peer ? parseAddress(peer) : UNKNOWN_ADDRESS;
}
