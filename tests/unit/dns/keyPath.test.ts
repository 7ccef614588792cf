/**
 * SkyDNS key layout unit tests
 */
import { describe, it, expect } from 'vitest';
import { buildAddressKeyPaths, buildKeyPath, reverseKeyPath } from '../../../src/dns/keyPath.js';

describe('keyPath', () => {
  describe('buildKeyPath', () => {
    it('should reverse the labels under the prefix', () => {
      expect(buildKeyPath('/skydns', 'api.example.com')).toBe('/skydns/com/example/api');
    });

    it('should ignore trailing slashes on the prefix and trailing dots on the name', () => {
      expect(buildKeyPath('/skydns/', 'web.home.lab.')).toBe('/skydns/lab/home/web');
    });

    it('should handle a single-label name', () => {
      expect(buildKeyPath('/dns', 'nas')).toBe('/dns/nas');
    });
  });

  describe('reverseKeyPath', () => {
    it('should reconstruct the hostname', () => {
      const hostname = 'a.b.c.example.org';
      expect(reverseKeyPath('/skydns', buildKeyPath('/skydns', hostname))).toBe(hostname);
    });

    it('should return null outside the prefix', () => {
      expect(reverseKeyPath('/skydns', '/other/com/example')).toBeNull();
    });
  });

  describe('buildAddressKeyPaths', () => {
    it('should number leaves per address family', () => {
      const keys = buildAddressKeyPaths('/skydns', 'vm.home.lab', [
        { value: '10.0.0.1', family: 'ipv4' },
        { value: '2001:db8::1', family: 'ipv6' },
        { value: '10.0.0.2', family: 'ipv4' },
      ]);

      expect(keys.map((k) => [k.key, k.type])).toEqual([
        ['/skydns/lab/home/vm/a1', 'A'],
        ['/skydns/lab/home/vm/aaaa1', 'AAAA'],
        ['/skydns/lab/home/vm/a2', 'A'],
      ]);
    });

    it('should return nothing without addresses', () => {
      expect(buildAddressKeyPaths('/skydns', 'vm.home.lab', [])).toEqual([]);
    });
  });
});
