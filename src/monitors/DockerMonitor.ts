/**
 * Docker Monitor
 * Keeps DNS records for Traefik-routed containers: a full sync at startup,
 * then one pass per container start event.
 */
import { createChildLogger, type Logger } from '../core/Logger.js';
import { EventTypes, type EventBus } from '../core/EventBus.js';
import { classifyTarget } from '../dns/addresses.js';
import { extractHostsFromLabels } from './labels.js';
import type { DockerApi } from '../docker/DockerClient.js';
import type { RecordStore } from '../providers/base/RecordStore.js';
import type { ContainerInfo, DockerEvent } from '../types/index.js';

export interface DockerMonitorOptions {
  /** Hostname or IP every discovered host points at */
  target: string;
  logger?: Logger;
  eventBus?: EventBus;
}

export interface DockerSyncResult {
  containerCount: number;
  hostCount: number;
  failed: number;
}

export class DockerMonitor {
  private logger: Logger;
  private docker: DockerApi;
  private store: RecordStore;
  private target: string;
  private eventBus?: EventBus;
  private watching: boolean = false;

  constructor(docker: DockerApi, store: RecordStore, options: DockerMonitorOptions) {
    this.docker = docker;
    this.store = store;
    this.target = options.target;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? createChildLogger({ service: 'DockerMonitor' });
  }

  /**
   * Sync existing containers, then follow container start events.
   * Returns when the signal aborts; a failing or closed event stream is thrown.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info({ target: this.target, type: classifyTarget(this.target) }, 'Starting Docker event monitoring');

    try {
      await this.sync();
    } catch (error) {
      this.logger.warn({ error }, 'Failed to sync existing containers');
    }

    if (signal.aborted) return;

    this.watching = true;
    this.logger.info('Listening for Docker events');

    try {
      for await (const event of this.docker.streamEvents(signal)) {
        if (signal.aborted) break;
        await this.handleEvent(event);
      }
    } catch (error) {
      if (signal.aborted) return;
      this.logger.error({ error }, 'Docker events stream error');
      throw error;
    } finally {
      this.watching = false;
    }

    if (!signal.aborted) {
      throw new Error('Docker event stream ended unexpectedly');
    }

    this.logger.info('Docker event monitoring stopped');
  }

  /**
   * Write records for every running container
   */
  async sync(): Promise<DockerSyncResult> {
    const containers = await this.docker.listContainers();

    this.logger.info({ count: containers.length }, 'Syncing existing containers');

    let hostCount = 0;
    let failed = 0;

    for (const container of containers) {
      const hosts = extractHostsFromLabels(container.labels);
      if (hosts.length === 0) continue;

      this.logger.debug(
        { containerId: container.id, containerName: container.name, hosts },
        'Found hosts in container labels'
      );

      hostCount += hosts.length;
      failed += await this.writeHosts(hosts);
    }

    this.eventBus?.publish(EventTypes.DOCKER_SYNC_COMPLETED, {
      containerCount: containers.length,
      hostCount,
    });

    return { containerCount: containers.length, hostCount, failed };
  }

  /**
   * React to a daemon event. Only container starts matter; labels are read
   * fresh from the container rather than taken from the event.
   */
  async handleEvent(event: DockerEvent): Promise<void> {
    if (event.Type !== 'container' || event.Action !== 'start') {
      return;
    }

    const containerId = event.Actor.ID;

    let container: ContainerInfo;
    try {
      container = await this.docker.inspectContainer(containerId);
    } catch (error) {
      this.logger.error({ error, containerId }, 'Failed to inspect container');
      return;
    }

    const hosts = extractHostsFromLabels(container.labels);
    if (hosts.length === 0) return;

    this.logger.info(
      { containerId, containerName: container.name, hosts },
      'Processing Docker container for DNS records'
    );

    this.eventBus?.publish(EventTypes.DOCKER_CONTAINER_STARTED, {
      containerId,
      containerName: container.name,
      hosts,
    });

    await this.writeHosts(hosts);
  }

  /**
   * Returns the number of failed writes
   */
  private async writeHosts(hosts: string[]): Promise<number> {
    let failed = 0;

    for (const host of hosts) {
      try {
        await this.store.writeRecord(host, this.target, 'docker');
      } catch (error) {
        failed++;
        this.logger.error({ error, hostname: host }, 'Failed to create DNS record');
      }
    }

    return failed;
  }

  isWatching(): boolean {
    return this.watching;
  }
}
