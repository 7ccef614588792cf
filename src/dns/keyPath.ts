/**
 * SkyDNS key layout
 *
 * `api.example.com` under `/skydns` is stored at `/skydns/com/example/api`.
 * Hosts with several addresses get one leaf per address: `a1`, `a2`, ... for
 * IPv4 and `aaaa1`, `aaaa2`, ... for IPv6, numbered per family in order.
 */
import { recordTypeForFamily } from './addresses.js';
import type { DNSRecordType, ResolvedAddress } from '../types/index.js';

export interface AddressKeyPath {
  key: string;
  address: ResolvedAddress;
  type: DNSRecordType;
}

function normalizePrefix(prefix: string): string {
  return prefix.replace(/\/+$/, '');
}

function normalizeHostname(hostname: string): string {
  return hostname.trim().replace(/\.+$/, '');
}

export function buildKeyPath(prefix: string, hostname: string): string {
  const labels = normalizeHostname(hostname).split('.').reverse();
  return `${normalizePrefix(prefix)}/${labels.join('/')}`;
}

/**
 * Inverse of buildKeyPath. Returns null when the path is outside the prefix.
 */
export function reverseKeyPath(prefix: string, path: string): string | null {
  const base = `${normalizePrefix(prefix)}/`;
  if (!path.startsWith(base)) return null;

  const labels = path.slice(base.length).split('/');
  return labels.reverse().join('.');
}

export function buildAddressKeyPaths(
  prefix: string,
  hostname: string,
  addresses: readonly ResolvedAddress[]
): AddressKeyPath[] {
  const basePath = buildKeyPath(prefix, hostname);
  let ipv4Count = 0;
  let ipv6Count = 0;

  return addresses.map((address) => {
    const leaf = address.family === 'ipv4' ? `a${++ipv4Count}` : `aaaa${++ipv6Count}`;
    return {
      key: `${basePath}/${leaf}`,
      address,
      type: recordTypeForFamily(address.family),
    };
  });
}
