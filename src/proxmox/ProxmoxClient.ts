/**
 * Proxmox VE API client
 * Token-authenticated access to the parts of /api2/json that discovery uses
 */
import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { ProxmoxApiError, errorMessage } from '../core/errors.js';
import type {
  AgentNetworkInterface,
  ContainerNetworkInterface,
  ProxmoxGuest,
  ProxmoxNode,
  ProxmoxVersion,
} from '../types/index.js';

/**
 * What discovery needs from a Proxmox cluster
 */
export interface ProxmoxApi {
  getVersion(): Promise<ProxmoxVersion>;
  listNodes(): Promise<ProxmoxNode[]>;
  listVirtualMachines(node: string): Promise<ProxmoxGuest[]>;
  listContainers(node: string): Promise<ProxmoxGuest[]>;
  /** Interfaces reported by the QEMU guest agent; fails when the agent is not running */
  getAgentInterfaces(node: string, vmid: number): Promise<AgentNetworkInterface[]>;
  getContainerInterfaces(node: string, vmid: number): Promise<ContainerNetworkInterface[]>;
}

interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal; dispatcher?: Dispatcher }
) => Promise<FetchResponse>;

export interface ProxmoxClientOptions {
  apiUrl: string;
  tokenId: string;
  tokenSecret: string;
  verifySSL: boolean;
  timeout?: number;
  fetch?: FetchLike;
}

const versionSchema = z.object({
  version: z.string(),
  release: z.string().default(''),
});

const nodeSchema = z.object({
  node: z.string(),
  status: z.string().default('unknown'),
  type: z.string().optional(),
});

const guestSchema = z.object({
  vmid: z.coerce.number().int(),
  name: z.string().optional(),
  status: z.string().default('unknown'),
  tags: z.string().optional(),
});

const agentInterfacesSchema = z.object({
  result: z.array(
    z.object({
      name: z.string(),
      'ip-addresses': z
        .array(
          z.object({
            'ip-address': z.string(),
            'ip-address-type': z.string().optional(),
            prefix: z.number().optional(),
          })
        )
        .optional(),
    })
  ),
});

const containerInterfaceSchema = z.object({
  name: z.string(),
  inet: z.string().optional(),
  inet6: z.string().optional(),
});

/**
 * Append /api2/json unless the URL already ends with it
 */
export function normalizeApiUrl(apiUrl: string): string {
  const trimmed = apiUrl.trim().replace(/\/+$/, '');
  return trimmed.endsWith('/api2/json') ? trimmed : `${trimmed}/api2/json`;
}

export class ProxmoxClient implements ProxmoxApi {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeout: number;
  private readonly fetchFn: FetchLike;
  private readonly dispatcher?: Dispatcher;

  constructor(options: ProxmoxClientOptions) {
    this.baseUrl = normalizeApiUrl(options.apiUrl);
    this.authHeader = `PVEAPIToken=${options.tokenId}=${options.tokenSecret}`;
    this.timeout = options.timeout ?? 10000;
    this.fetchFn = options.fetch ?? undiciFetch;

    // Self-signed certificates are the norm on Proxmox hosts
    if (!options.verifySSL) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
  }

  async getVersion(): Promise<ProxmoxVersion> {
    return versionSchema.parse(await this.get('/version'));
  }

  async listNodes(): Promise<ProxmoxNode[]> {
    return z.array(nodeSchema).parse(await this.get('/nodes'));
  }

  async listVirtualMachines(node: string): Promise<ProxmoxGuest[]> {
    const guests = z.array(guestSchema).parse(await this.get(`/nodes/${encodeURIComponent(node)}/qemu`));
    return guests.map((guest) => this.toGuest(guest, 'vm'));
  }

  async listContainers(node: string): Promise<ProxmoxGuest[]> {
    const guests = z.array(guestSchema).parse(await this.get(`/nodes/${encodeURIComponent(node)}/lxc`));
    return guests.map((guest) => this.toGuest(guest, 'ct'));
  }

  async getAgentInterfaces(node: string, vmid: number): Promise<AgentNetworkInterface[]> {
    const data = await this.get(`/nodes/${encodeURIComponent(node)}/qemu/${vmid}/agent/network-get-interfaces`);
    return agentInterfacesSchema.parse(data).result;
  }

  async getContainerInterfaces(node: string, vmid: number): Promise<ContainerNetworkInterface[]> {
    const data = await this.get(`/nodes/${encodeURIComponent(node)}/lxc/${vmid}/interfaces`);
    return z.array(containerInterfaceSchema).parse(data ?? []);
  }

  async dispose(): Promise<void> {
    if (this.dispatcher) {
      await this.dispatcher.close();
    }
  }

  private toGuest(guest: z.infer<typeof guestSchema>, fallbackPrefix: string): ProxmoxGuest {
    return {
      vmid: guest.vmid,
      name: guest.name ?? `${fallbackPrefix}${guest.vmid}`,
      status: guest.status,
      tags: guest.tags,
    };
  }

  /**
   * GET a path and unwrap the `data` envelope
   */
  private async get(path: string): Promise<unknown> {
    let response: FetchResponse;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        headers: {
          Accept: 'application/json',
          Authorization: this.authHeader,
        },
        signal: AbortSignal.timeout(this.timeout),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      throw new ProxmoxApiError(`Request to ${path} failed: ${errorMessage(error)}`, path);
    }

    if (!response.ok) {
      throw new ProxmoxApiError(
        `Request to ${path} failed with ${response.status} ${response.statusText}`,
        path,
        response.status
      );
    }

    const body: unknown = await response.json();
    if (typeof body !== 'object' || body === null || !('data' in body)) {
      throw new ProxmoxApiError(`Unexpected response from ${path}`, path, response.status);
    }

    return body.data;
  }
}
