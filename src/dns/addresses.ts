/**
 * IP address classification and multi-address selection
 */
import { BlockList, isIP } from 'node:net';
import type { AddressFamily, DNSRecordType, MultiAddressStrategy, ResolvedAddress } from '../types/index.js';

/**
 * Parse a raw string as an IP literal. Anything else yields null.
 */
export function classifyAddress(raw: string): ResolvedAddress | null {
  const value = raw.trim();
  switch (isIP(value)) {
    case 4:
      return { value, family: 'ipv4' };
    case 6:
      return { value, family: 'ipv6' };
    default:
      return null;
  }
}

export function recordTypeForFamily(family: AddressFamily): DNSRecordType {
  return family === 'ipv4' ? 'A' : 'AAAA';
}

/**
 * Record type implied by a DNS target: IP literals map to A/AAAA, anything else is a CNAME
 */
export function classifyTarget(target: string): DNSRecordType {
  const address = classifyAddress(target);
  return address ? recordTypeForFamily(address.family) : 'CNAME';
}

/**
 * Drop a CIDR prefix length ("10.0.0.5/24" -> "10.0.0.5")
 */
export function stripPrefixLength(raw: string): string {
  const slash = raw.indexOf('/');
  return slash === -1 ? raw.trim() : raw.slice(0, slash).trim();
}

// Loopback and link-local ranges
const excludedRanges = new BlockList();
excludedRanges.addSubnet('127.0.0.0', 8, 'ipv4');
excludedRanges.addSubnet('169.254.0.0', 16, 'ipv4');
excludedRanges.addSubnet('::1', 128, 'ipv6');
excludedRanges.addSubnet('fe80::', 10, 'ipv6');

const MAPPED_IPV4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/**
 * Loopback and link-local addresses never describe a reachable host.
 * IPv4-mapped IPv6 addresses are checked as IPv4.
 */
export function isExcludedAddress(raw: string): boolean {
  const address = classifyAddress(raw);
  if (!address) return false;

  if (address.family === 'ipv6') {
    const mapped = MAPPED_IPV4.exec(address.value)?.[1];
    if (mapped) {
      return excludedRanges.check(mapped, 'ipv4');
    }
  }

  return excludedRanges.check(address.value, address.family);
}

/**
 * Parse and select addresses.
 * - first: the first IPv4 address only, plus every IPv6 address
 * - all: every valid address
 * Order of the input is preserved; unparseable entries are dropped.
 */
export function selectAddresses(raw: readonly string[], strategy: MultiAddressStrategy): ResolvedAddress[] {
  const result: ResolvedAddress[] = [];
  let foundIPv4 = false;

  for (const entry of raw) {
    const address = classifyAddress(entry);
    if (!address) continue;

    if (strategy === 'first' && address.family === 'ipv4') {
      if (foundIPv4) continue;
      foundIPv4 = true;
    }

    result.push(address);
  }

  return result;
}
