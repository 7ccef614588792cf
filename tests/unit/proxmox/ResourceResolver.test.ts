/**
 * ResourceResolver unit tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ResourceResolver } from '../../../src/proxmox/ResourceResolver.js';
import { parseTags } from '../../../src/proxmox/tags.js';
import { createSilentLogger } from '../../../src/core/Logger.js';
import { FakeProxmoxApi } from '../../helpers/FakeProxmoxApi.js';
import type { MultiAddressStrategy, ResolutionResult, VMResource } from '../../../src/types/index.js';

function vm(overrides: Partial<VMResource> & { rawTags?: string } = {}): VMResource {
  const { rawTags, ...rest } = overrides;
  return {
    vmid: 100,
    name: 'web-server',
    kind: 'qemu',
    status: 'running',
    node: 'pve1',
    tags: parseTags(rawTags),
    ...rest,
  };
}

function values(result: ResolutionResult): string[] {
  return result.status === 'resolved' ? result.addresses.map((a) => a.value) : [];
}

describe('ResourceResolver', () => {
  let api: FakeProxmoxApi;

  const createResolver = (strategy: MultiAddressStrategy = 'first', defaultInterface = 'eth0'): ResourceResolver =>
    new ResourceResolver(api, { domain: 'home.lab', defaultInterface, strategy, logger: createSilentLogger() });

  beforeEach(() => {
    api = new FakeProxmoxApi();
  });

  describe('generateHostname', () => {
    it('should append the domain to short names', () => {
      expect(createResolver().generateHostname('web-server')).toBe('web-server.home.lab');
    });

    it('should keep dotted names unchanged', () => {
      expect(createResolver().generateHostname('db.example.com')).toBe('db.example.com');
    });

    it('should keep short names without a domain', () => {
      const resolver = new ResourceResolver(api, {
        domain: '',
        defaultInterface: 'eth0',
        strategy: 'first',
        logger: createSilentLogger(),
      });
      expect(resolver.generateHostname('nas')).toBe('nas');
    });
  });

  describe('resolve', () => {
    it('should skip resources tagged dnsherpa-skip', async () => {
      const result = await createResolver().resolve(vm({ rawTags: 'dnsherpa-skip' }));

      expect(result.status).toBe('skipped');
      expect(api.calls).toEqual([]);
    });

    it('should use the ip tag and ignore live data', async () => {
      api.agentInterfaces.set(100, [{ name: 'eth0', 'ip-addresses': [{ 'ip-address': '10.0.0.9' }] }]);

      const result = await createResolver().resolve(vm({ rawTags: 'dnsherpa-ip:192.0.2.5,2001:db8::5' }));

      expect(result).toEqual({
        status: 'resolved',
        hostname: 'web-server.home.lab',
        addresses: [
          { value: '192.0.2.5', family: 'ipv4' },
          { value: '2001:db8::5', family: 'ipv6' },
        ],
        source: 'tag',
      });
      expect(api.calls).toEqual([]);
    });

    it('should not apply the multi-address strategy to tag addresses', async () => {
      const result = await createResolver('first').resolve(vm({ rawTags: 'dnsherpa-ip:10.0.0.1,10.0.0.2' }));

      expect(values(result)).toEqual(['10.0.0.1', '10.0.0.2']);
    });

    it('should drop invalid tag entries and stop even when none remain', async () => {
      api.agentInterfaces.set(100, [{ name: 'eth0', 'ip-addresses': [{ 'ip-address': '10.0.0.9' }] }]);

      const result = await createResolver().resolve(vm({ rawTags: 'dnsherpa-ip:bogus' }));

      expect(result).toMatchObject({ status: 'resolved', source: 'tag', addresses: [] });
      expect(api.calls).toEqual([]);
    });

    it('should read the configured interface from the guest agent', async () => {
      api.agentInterfaces.set(100, [
        { name: 'lo', 'ip-addresses': [{ 'ip-address': '127.0.0.1', prefix: 8 }] },
        {
          name: 'eth0',
          'ip-addresses': [
            { 'ip-address': '10.0.0.1', prefix: 24 },
            { 'ip-address': '10.0.0.2', prefix: 24 },
            { 'ip-address': 'fe80::1', prefix: 64 },
            { 'ip-address': '2001:db8::1', prefix: 64 },
            { 'ip-address': '2001:db8::2', prefix: 64 },
          ],
        },
        { name: 'eth1', 'ip-addresses': [{ 'ip-address': '172.16.0.1' }] },
      ]);

      const first = await createResolver('first').resolve(vm());
      const all = await createResolver('all').resolve(vm());

      expect(first).toMatchObject({ status: 'resolved', source: 'agent', interfaceName: 'eth0' });
      expect(values(first)).toEqual(['10.0.0.1', '2001:db8::1', '2001:db8::2']);
      expect(values(all)).toEqual(['10.0.0.1', '10.0.0.2', '2001:db8::1', '2001:db8::2']);
    });

    it('should prefer the interface tag over the configured interface', async () => {
      api.agentInterfaces.set(100, [
        { name: 'eth0', 'ip-addresses': [{ 'ip-address': '10.0.0.1' }] },
        { name: 'ens18', 'ip-addresses': [{ 'ip-address': '10.0.1.1' }] },
      ]);

      const result = await createResolver().resolve(vm({ rawTags: 'dnsherpa-interface:ens18' }));

      expect(result).toMatchObject({ source: 'agent', interfaceName: 'ens18' });
      expect(values(result)).toEqual(['10.0.1.1']);
    });

    it('should fall back to eth0 when the configured interface is blank', async () => {
      api.agentInterfaces.set(100, [{ name: 'eth0', 'ip-addresses': [{ 'ip-address': '10.0.0.1' }] }]);

      const result = await createResolver('first', '  ').resolve(vm());

      expect(values(result)).toEqual(['10.0.0.1']);
    });

    it('should read LXC interfaces and strip prefix lengths', async () => {
      api.containerInterfaces.set(200, [
        { name: 'lo', inet: '127.0.0.1/8', inet6: '::1/128' },
        { name: 'eth0', inet: '10.0.0.20/24', inet6: 'fe80::216:3eff:fe00:1/64' },
      ]);

      const result = await createResolver().resolve(vm({ vmid: 200, kind: 'lxc', name: 'db.example.com' }));

      expect(result).toEqual({
        status: 'resolved',
        hostname: 'db.example.com',
        addresses: [{ value: '10.0.0.20', family: 'ipv4' }],
        source: 'interfaces',
        interfaceName: 'eth0',
      });
    });

    it('should fall back to the static config when the agent is unavailable', async () => {
      const result = await createResolver().resolve(vm());

      expect(result).toEqual({
        status: 'resolved',
        hostname: 'web-server.home.lab',
        addresses: [],
        source: 'config',
        interfaceName: 'eth0',
      });
      expect(api.calls).toEqual(['agent:100']);
    });

    it('should return no addresses when the interface is missing', async () => {
      api.agentInterfaces.set(100, [{ name: 'ens19', 'ip-addresses': [{ 'ip-address': '10.0.0.1' }] }]);

      const result = await createResolver().resolve(vm());

      expect(result).toMatchObject({ source: 'agent', addresses: [] });
    });
  });
});
