/**
 * Docker access through dockerode
 */
import Docker from 'dockerode';
import { Readable } from 'stream';
import { createChildLogger, createSilentLogger, type Logger } from '../core/Logger.js';
import { withTimeout } from '../core/timeout.js';
import type { ContainerInfo, DockerEvent } from '../types/index.js';

/**
 * What the Docker monitor needs from the daemon
 */
export interface DockerApi {
  /** Currently running containers */
  listContainers(): Promise<ContainerInfo[]>;
  inspectContainer(id: string): Promise<ContainerInfo>;
  /** Daemon events until the stream fails, ends, or the signal aborts */
  streamEvents(signal: AbortSignal): AsyncIterable<DockerEvent>;
}

export interface DockerClientOptions {
  socketPath: string;
  listTimeout?: number;
  inspectTimeout?: number;
  eventsTimeout?: number;
  logger?: Logger;
}

function isDockerEvent(value: unknown): value is DockerEvent {
  if (typeof value !== 'object' || value === null) return false;
  if (!('Type' in value) || !('Action' in value) || !('Actor' in value)) return false;
  return (
    typeof value.Type === 'string' &&
    typeof value.Action === 'string' &&
    typeof value.Actor === 'object' &&
    value.Actor !== null
  );
}

function parseLine(line: string, logger: Logger): DockerEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    logger.warn({ error, line: line.slice(0, 200) }, 'Failed to parse Docker event');
    return undefined;
  }
  return isDockerEvent(parsed) ? parsed : undefined;
}

/**
 * Split a chunked stream of newline-delimited JSON into events.
 * Malformed lines and lines that are not Docker events are skipped.
 */
export async function* parseEventStream(
  chunks: AsyncIterable<Buffer | string>,
  logger: Logger = createSilentLogger()
): AsyncGenerator<DockerEvent> {
  let pending = '';

  for await (const chunk of chunks) {
    pending += chunk.toString();

    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      const line = pending.slice(0, newline).trim();
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');

      if (!line) continue;
      const event = parseLine(line, logger);
      if (event) {
        yield event;
      }
    }
  }

  const rest = pending.trim();
  if (rest) {
    const event = parseLine(rest, logger);
    if (event) {
      yield event;
    }
  }
}

export class DockerClient implements DockerApi {
  private docker: Docker;
  private listTimeout: number;
  private inspectTimeout: number;
  private eventsTimeout: number;
  private logger: Logger;

  constructor(options: DockerClientOptions) {
    this.docker = new Docker({ socketPath: options.socketPath });
    this.listTimeout = options.listTimeout ?? 30000;
    this.inspectTimeout = options.inspectTimeout ?? 10000;
    this.eventsTimeout = options.eventsTimeout ?? 10000;
    this.logger = options.logger ?? createChildLogger({ service: 'DockerClient' });
  }

  async listContainers(): Promise<ContainerInfo[]> {
    const containers = await withTimeout(this.docker.listContainers(), this.listTimeout, 'docker list containers');

    return containers.map((container) => ({
      id: container.Id,
      name: container.Names?.[0]?.replace(/^\//, '') ?? container.Id.slice(0, 12),
      labels: container.Labels ?? {},
    }));
  }

  async inspectContainer(id: string): Promise<ContainerInfo> {
    const info = await withTimeout(this.docker.getContainer(id).inspect(), this.inspectTimeout, 'docker inspect');

    return {
      id: info.Id,
      name: info.Name.replace(/^\//, ''),
      labels: info.Config?.Labels ?? {},
    };
  }

  async *streamEvents(signal: AbortSignal): AsyncGenerator<DockerEvent> {
    const stream = await withTimeout(
      this.docker.getEvents({ filters: { type: ['container'] } }),
      this.eventsTimeout,
      'docker events'
    );

    const close = (): void => {
      if (stream instanceof Readable) {
        stream.destroy();
      }
    };
    signal.addEventListener('abort', close, { once: true });

    try {
      if (signal.aborted) return;
      yield* parseEventStream(stream, this.logger);
    } finally {
      signal.removeEventListener('abort', close);
      close();
    }
  }
}
