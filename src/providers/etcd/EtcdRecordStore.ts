/**
 * etcd Record Store
 * Writes SkyDNS records into etcd v3 for CoreDNS/SkyDNS to serve
 */
import { readFileSync } from 'fs';
import { rootCertificates } from 'tls';
import { Etcd3, type IOptions } from 'etcd3';
import { RecordStore, type RecordStoreOptions } from '../base/RecordStore.js';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { withTimeout } from '../../core/timeout.js';

export interface EtcdTLSFiles {
  caFile?: string;
  certFile?: string;
  keyFile?: string;
}

export interface EtcdConnectionOptions {
  endpoints: string[];
  tls: boolean;
  tlsFiles?: EtcdTLSFiles;
  dialTimeout?: number;
}

/**
 * The slice of the etcd3 client this store relies on
 */
export interface EtcdClientLike {
  put(key: string): { value(value: string): { exec(): Promise<unknown> } };
  maintenance: { status(): Promise<{ version: string }> };
  close(): void;
}

type EtcdCredentials = NonNullable<IOptions['credentials']>;

function readPem(path: string, label: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new ConfigError(`Failed to read ${label} file ${path}: ${errorMessage(error)}`, 'CONFIG_TLS');
  }
}

/**
 * Build gRPC TLS credentials from PEM files. Without a CA file the system roots are trusted;
 * a client certificate is only used when both certificate and key are given.
 */
export function buildTLSCredentials(files: EtcdTLSFiles = {}): EtcdCredentials {
  const credentials: EtcdCredentials = {
    rootCertificate: files.caFile
      ? readPem(files.caFile, 'CA')
      : Buffer.from(rootCertificates.join('\n')),
  };

  if (files.certFile && files.keyFile) {
    credentials.certChain = readPem(files.certFile, 'client certificate');
    credentials.privateKey = readPem(files.keyFile, 'client key');
  }

  return credentials;
}

/**
 * Prefix bare host:port endpoints with the scheme matching the TLS setting
 */
export function normalizeEndpoints(endpoints: string[], tls: boolean): string[] {
  const scheme = tls ? 'https://' : 'http://';
  return endpoints
    .map((endpoint) => endpoint.trim())
    .filter((endpoint) => endpoint.length > 0)
    .map((endpoint) => (/^https?:\/\//i.test(endpoint) ? endpoint : `${scheme}${endpoint}`));
}

export function createEtcdClient(options: EtcdConnectionOptions): Etcd3 {
  const clientOptions: IOptions = {
    hosts: normalizeEndpoints(options.endpoints, options.tls),
    dialTimeout: options.dialTimeout ?? 5000,
  };

  if (options.tls) {
    clientOptions.credentials = buildTLSCredentials(options.tlsFiles);
  }

  return new Etcd3(clientOptions);
}

export class EtcdRecordStore extends RecordStore {
  private client: EtcdClientLike;

  constructor(client: EtcdClientLike, options: RecordStoreOptions) {
    super(options);
    this.client = client;
  }

  async init(): Promise<void> {
    try {
      const status = await withTimeout(this.client.maintenance.status(), this.putTimeout, 'etcd status');
      this.initialized = true;
      this.logger.info({ version: status.version, prefix: this.prefix }, 'Connected to etcd');
    } catch (error) {
      this.logger.error({ error }, 'Failed to connect to etcd');
      throw error;
    }
  }

  protected async put(key: string, value: string): Promise<void> {
    await this.client.put(key).value(value).exec();
  }

  async dispose(): Promise<void> {
    this.client.close();
    this.initialized = false;
    this.logger.debug('etcd client closed');
  }
}
