/**
 * Resolves the hostname and addresses a Proxmox guest should be published under
 *
 * Address priority, first match wins:
 *   1. dnsherpa-ip tag
 *   2. live interface data for the dnsherpa-interface tag, the configured interface, or eth0
 *   3. static guest configuration (not supported yet, yields nothing)
 */
import { createChildLogger, type Logger } from '../core/Logger.js';
import { classifyAddress, isExcludedAddress, selectAddresses, stripPrefixLength } from '../dns/addresses.js';
import { TAG_INTERFACE, TAG_IP, TAG_SKIP, getTagValue, hasTag } from './tags.js';
import type { ProxmoxApi } from './ProxmoxClient.js';
import type {
  AgentNetworkInterface,
  ContainerNetworkInterface,
  MultiAddressStrategy,
  ResolutionResult,
  ResolvedAddress,
  VMResource,
} from '../types/index.js';

export const DEFAULT_INTERFACE = 'eth0';

export interface ResourceResolverOptions {
  domain: string;
  defaultInterface: string;
  strategy: MultiAddressStrategy;
  logger?: Logger;
}

interface LiveAddresses {
  available: boolean;
  addresses: string[];
}

export class ResourceResolver {
  private logger: Logger;
  private api: ProxmoxApi;
  private domain: string;
  private defaultInterface: string;
  private strategy: MultiAddressStrategy;

  constructor(api: ProxmoxApi, options: ResourceResolverOptions) {
    this.api = api;
    this.domain = options.domain.trim().replace(/^\.+|\.+$/g, '');
    this.defaultInterface = options.defaultInterface.trim() || DEFAULT_INTERFACE;
    this.strategy = options.strategy;
    this.logger = options.logger ?? createChildLogger({ service: 'ResourceResolver' });
  }

  /**
   * Dotted names are used as they are; short names get the configured domain.
   * Without a domain the short name is published unqualified.
   */
  generateHostname(name: string): string {
    if (name.includes('.') || !this.domain) {
      return name;
    }
    return `${name}.${this.domain}`;
  }

  async resolve(resource: VMResource): Promise<ResolutionResult> {
    if (hasTag(resource.tags, TAG_SKIP)) {
      return { status: 'skipped', reason: `${TAG_SKIP} tag` };
    }

    const hostname = this.generateHostname(resource.name);

    const ipTag = getTagValue(resource.tags, TAG_IP);
    if (ipTag) {
      const addresses = this.parseIpTag(ipTag);
      this.logger.debug({ name: resource.name, addresses: addresses.map((a) => a.value) }, 'Using addresses from tag');
      return { status: 'resolved', hostname, addresses, source: 'tag' };
    }

    const interfaceName = getTagValue(resource.tags, TAG_INTERFACE) || this.defaultInterface;

    const live = resource.kind === 'qemu'
      ? await this.readAgentAddresses(resource, interfaceName)
      : await this.readContainerAddresses(resource, interfaceName);

    if (!live.available) {
      return {
        status: 'resolved',
        hostname,
        addresses: this.resolveFromConfig(resource),
        source: 'config',
        interfaceName,
      };
    }

    return {
      status: 'resolved',
      hostname,
      addresses: selectAddresses(live.addresses, this.strategy),
      source: resource.kind === 'qemu' ? 'agent' : 'interfaces',
      interfaceName,
    };
  }

  /**
   * Comma-separated IP literals; invalid entries are dropped
   */
  private parseIpTag(value: string): ResolvedAddress[] {
    const addresses: ResolvedAddress[] = [];
    for (const entry of value.split(',')) {
      const address = classifyAddress(entry);
      if (address) {
        addresses.push(address);
      }
    }
    return addresses;
  }

  private async readAgentAddresses(resource: VMResource, interfaceName: string): Promise<LiveAddresses> {
    let interfaces: AgentNetworkInterface[];
    try {
      interfaces = await this.api.getAgentInterfaces(resource.node, resource.vmid);
    } catch (error) {
      this.logger.debug({ name: resource.name, error }, 'QEMU agent not available, falling back to config');
      return { available: false, addresses: [] };
    }

    const addresses: string[] = [];
    for (const iface of interfaces) {
      if (iface.name !== interfaceName) continue;

      for (const ip of iface['ip-addresses'] ?? []) {
        const value = stripPrefixLength(ip['ip-address']);
        if (!isExcludedAddress(value)) {
          addresses.push(value);
        }
      }
    }

    return { available: true, addresses };
  }

  private async readContainerAddresses(resource: VMResource, interfaceName: string): Promise<LiveAddresses> {
    let interfaces: ContainerNetworkInterface[];
    try {
      interfaces = await this.api.getContainerInterfaces(resource.node, resource.vmid);
    } catch (error) {
      this.logger.debug({ name: resource.name, error }, 'Failed to get container interfaces, falling back to config');
      return { available: false, addresses: [] };
    }

    this.logger.debug({ name: resource.name, count: interfaces.length }, 'Found container network interfaces');

    const addresses: string[] = [];
    for (const iface of interfaces) {
      this.logger.trace(
        { name: resource.name, interface: iface.name, ipv4: iface.inet, ipv6: iface.inet6 },
        'Container interface details'
      );
      if (iface.name !== interfaceName) continue;

      for (const raw of [iface.inet, iface.inet6]) {
        if (!raw) continue;
        const value = stripPrefixLength(raw);
        if (!isExcludedAddress(value)) {
          addresses.push(value);
        }
      }
    }

    return { available: true, addresses };
  }

  /**
   * Reading addresses from the guest's static network configuration is not supported yet
   */
  private resolveFromConfig(resource: VMResource): ResolvedAddress[] {
    this.logger.debug({ name: resource.name }, 'Unable to determine IP from config (agent not available)');
    return [];
  }
}
