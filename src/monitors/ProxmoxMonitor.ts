/**
 * Proxmox Monitor
 * Polls the cluster for running VMs and containers and writes their address records
 */
import { createChildLogger, type Logger } from '../core/Logger.js';
import { EventTypes, type EventBus } from '../core/EventBus.js';
import { sleep } from '../core/timeout.js';
import { parseTags } from '../proxmox/tags.js';
import type { ProxmoxApi } from '../proxmox/ProxmoxClient.js';
import type { ResourceResolver } from '../proxmox/ResourceResolver.js';
import type { RecordStore } from '../providers/base/RecordStore.js';
import type { ProxmoxGuest, ResourceKind, SyncSummary, VMResource } from '../types/index.js';

export interface ProxmoxMonitorOptions {
  /** Milliseconds between the end of one pass and the start of the next */
  pollInterval: number;
  logger?: Logger;
  eventBus?: EventBus;
}

export class ProxmoxMonitor {
  private logger: Logger;
  private api: ProxmoxApi;
  private store: RecordStore;
  private resolver: ResourceResolver;
  private pollInterval: number;
  private eventBus?: EventBus;
  private polling: boolean = false;

  constructor(api: ProxmoxApi, store: RecordStore, resolver: ResourceResolver, options: ProxmoxMonitorOptions) {
    this.api = api;
    this.store = store;
    this.resolver = resolver;
    this.pollInterval = options.pollInterval;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? createChildLogger({ service: 'ProxmoxMonitor' });
  }

  /**
   * Read the API version and node list. Throws when the cluster is unreachable.
   */
  async testConnection(): Promise<void> {
    const version = await this.api.getVersion();
    const nodes = await this.api.listNodes();

    this.logger.info(
      { version: version.version, release: version.release, count: nodes.length },
      'Connected to Proxmox API'
    );
    for (const node of nodes) {
      this.logger.debug({ node: node.node, status: node.status }, 'Found Proxmox node');
    }
  }

  /**
   * Poll until the signal aborts. Passes never overlap: the interval is
   * measured from the end of one pass to the start of the next.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.testConnection();

    this.logger.info({ interval: this.pollInterval }, 'Starting Proxmox polling');
    this.polling = true;

    try {
      try {
        await this.syncAll();
      } catch (error) {
        this.logger.warn({ error }, 'Initial Proxmox sync failed');
      }

      while (!signal.aborted) {
        await sleep(this.pollInterval, signal);
        if (signal.aborted) break;

        try {
          await this.syncAll();
        } catch (error) {
          this.logger.error({ error }, 'Proxmox sync failed');
        }
      }
    } finally {
      this.polling = false;
    }

    this.logger.info('Proxmox polling stopped');
  }

  /**
   * One pass over every online node. A failing node list is thrown;
   * failures below that are logged and counted.
   */
  async syncAll(): Promise<SyncSummary> {
    const startTime = Date.now();
    const summary: SyncSummary = { processed: 0, skipped: 0, failed: 0 };

    const nodes = await this.api.listNodes();

    for (const node of nodes) {
      if (node.status !== 'online') {
        this.logger.debug({ node: node.node, status: node.status }, 'Skipping offline node');
        continue;
      }

      const resources = await this.listResources(node.node);

      for (const resource of resources) {
        await this.syncResource(resource, summary);
      }
    }

    const duration = Date.now() - startTime;
    this.logger.info({ ...summary, duration }, 'Proxmox sync completed');
    this.eventBus?.publish(EventTypes.PROXMOX_SYNC_COMPLETED, { ...summary, duration });

    return summary;
  }

  isPolling(): boolean {
    return this.polling;
  }

  /**
   * VMs and containers are listed independently so one failing list does not hide the other
   */
  private async listResources(node: string): Promise<VMResource[]> {
    const resources: VMResource[] = [];

    try {
      const vms = await this.api.listVirtualMachines(node);
      resources.push(...vms.map((guest) => toResource(guest, node, 'qemu')));
    } catch (error) {
      this.logger.error({ error, node }, 'Failed to list VMs');
    }

    try {
      const containers = await this.api.listContainers(node);
      resources.push(...containers.map((guest) => toResource(guest, node, 'lxc')));
    } catch (error) {
      this.logger.error({ error, node }, 'Failed to list containers');
    }

    return resources;
  }

  private async syncResource(resource: VMResource, summary: SyncSummary): Promise<void> {
    if (resource.status !== 'running') {
      summary.skipped++;
      return;
    }

    try {
      const result = await this.resolver.resolve(resource);

      if (result.status === 'skipped') {
        this.logger.debug({ name: resource.name, vmid: resource.vmid, reason: result.reason }, 'Skipping resource');
        summary.skipped++;
        return;
      }

      if (result.addresses.length === 0) {
        this.logger.warn(
          { name: resource.name, vmid: resource.vmid, type: resource.kind, source: result.source },
          'No IP addresses found for resource'
        );
        summary.skipped++;
        return;
      }

      await this.store.writeAddressRecords(result.hostname, result.addresses, 'proxmox');
      summary.processed++;
    } catch (error) {
      this.logger.error({ error, name: resource.name, vmid: resource.vmid }, 'Failed to process resource');
      summary.failed++;
    }
  }
}

function toResource(guest: ProxmoxGuest, node: string, kind: ResourceKind): VMResource {
  return {
    vmid: guest.vmid,
    name: guest.name,
    kind,
    status: guest.status,
    node,
    tags: parseTags(guest.tags),
  };
}
