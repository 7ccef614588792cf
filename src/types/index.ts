/**
 * Core type definitions for DNSherpa
 */

// DNS Record Types
export type DNSRecordType = 'A' | 'AAAA' | 'CNAME';

export type AddressFamily = 'ipv4' | 'ipv6';

export interface ResolvedAddress {
  readonly value: string;
  readonly family: AddressFamily;
}

/**
 * Value written to the store. The same shape serves CNAME, A and AAAA records;
 * the record type is implied by the key and the target.
 */
export interface DNSRecord {
  host: string;
  ttl: number;
}

export const RECORD_TTL = 300;

// Discovery Types
export type HostSource = 'docker' | 'proxmox';

export type MultiAddressStrategy = 'first' | 'all';

// Docker Types
export type ContainerLabels = Record<string, string>;

export interface ContainerInfo {
  id: string;
  name: string;
  labels: ContainerLabels;
}

export interface DockerEvent {
  Type: string;
  Action: string;
  Actor: {
    ID: string;
    Attributes?: {
      name?: string;
      [key: string]: string | undefined;
    };
  };
  time?: number;
}

// Proxmox Types
export type ResourceKind = 'qemu' | 'lxc';

export interface VMResource {
  vmid: number;
  name: string;
  kind: ResourceKind;
  status: string;
  node: string;
  tags: ReadonlySet<string>;
}

export interface ProxmoxNode {
  node: string;
  status: string;
  type?: string;
}

export interface ProxmoxGuest {
  vmid: number;
  name: string;
  status: string;
  tags?: string;
}

export interface ProxmoxVersion {
  version: string;
  release: string;
}

/**
 * Interface as reported by the QEMU guest agent
 */
export interface AgentNetworkInterface {
  name: string;
  'ip-addresses'?: Array<{
    'ip-address': string;
    'ip-address-type'?: string;
    prefix?: number;
  }>;
}

/**
 * Interface as reported by an LXC container
 */
export interface ContainerNetworkInterface {
  name: string;
  inet?: string;
  inet6?: string;
}

// Resolution results
export type AddressSource = 'tag' | 'agent' | 'interfaces' | 'config';

export type ResolutionResult =
  | { status: 'skipped'; reason: string }
  | {
      status: 'resolved';
      hostname: string;
      addresses: ResolvedAddress[];
      source: AddressSource;
      interfaceName?: string;
    };

export interface SyncSummary {
  processed: number;
  skipped: number;
  failed: number;
}
