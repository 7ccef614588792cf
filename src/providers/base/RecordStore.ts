/**
 * Abstract Record Store
 * Synthesizes SkyDNS records and hands each key/value pair to a concrete backend
 */
import { createChildLogger, type Logger } from '../../core/Logger.js';
import { StoreError, errorMessage } from '../../core/errors.js';
import { withTimeout } from '../../core/timeout.js';
import { EventTypes, type EventBus } from '../../core/EventBus.js';
import { classifyTarget } from '../../dns/addresses.js';
import { buildAddressKeyPaths, buildKeyPath } from '../../dns/keyPath.js';
import { RECORD_TTL, type DNSRecord, type DNSRecordType, type HostSource, type ResolvedAddress } from '../../types/index.js';

export interface RecordStoreOptions {
  prefix: string;
  ttl?: number;
  putTimeout?: number;
  logger?: Logger;
  eventBus?: EventBus;
}

export interface WrittenRecord {
  key: string;
  type: DNSRecordType;
  target: string;
}

export function serializeRecord(record: DNSRecord): string {
  return JSON.stringify({ host: record.host, ttl: record.ttl });
}

/**
 * Abstract Record Store base class
 */
export abstract class RecordStore {
  protected logger: Logger;
  protected readonly prefix: string;
  protected readonly ttl: number;
  protected readonly putTimeout: number;
  protected readonly eventBus?: EventBus;
  protected initialized: boolean = false;

  constructor(options: RecordStoreOptions) {
    this.logger = options.logger ?? createChildLogger({ service: 'RecordStore' });
    this.prefix = options.prefix;
    this.ttl = options.ttl ?? RECORD_TTL;
    this.putTimeout = options.putTimeout ?? 5000;
    this.eventBus = options.eventBus;
  }

  /**
   * Verify the backend is reachable
   */
  abstract init(): Promise<void>;

  /**
   * Store a value at a key, overwriting whatever was there
   */
  protected abstract put(key: string, value: string): Promise<void>;

  /**
   * Release backend resources
   */
  abstract dispose(): Promise<void>;

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Point a hostname at a target. The target may be a hostname (CNAME) or an IP (A/AAAA);
   * the stored value is the same in every case.
   */
  async writeRecord(hostname: string, target: string, source: HostSource): Promise<WrittenRecord> {
    const key = buildKeyPath(this.prefix, hostname);
    const type = classifyTarget(target);

    this.logger.info({ hostname, target, type }, 'Creating DNS record');

    await this.putRecord(key, { host: target, ttl: this.ttl }, hostname, source);
    this.eventBus?.publish(EventTypes.DNS_RECORD_WRITTEN, { key, hostname, target, type, source });

    return { key, type, target };
  }

  /**
   * Write one A/AAAA record per address under suffixed keys (a1, a2, ..., aaaa1, ...).
   * Stops at the first failed write.
   */
  async writeAddressRecords(
    hostname: string,
    addresses: readonly ResolvedAddress[],
    source: HostSource
  ): Promise<WrittenRecord[]> {
    const written: WrittenRecord[] = [];

    for (const { key, address, type } of buildAddressKeyPaths(this.prefix, hostname, addresses)) {
      await this.putRecord(key, { host: address.value, ttl: this.ttl }, hostname, source);
      written.push({ key, type, target: address.value });

      this.logger.info({ hostname, address: address.value, type }, 'Created DNS record');
      this.eventBus?.publish(EventTypes.DNS_RECORD_WRITTEN, {
        key,
        hostname,
        target: address.value,
        type,
        source,
      });
    }

    if (written.length > 0) {
      this.logger.info(
        { hostname, count: written.length, records: written.map((r) => `${r.type}->${r.target}`).join(', ') },
        'DNS records created successfully'
      );
    }

    return written;
  }

  private async putRecord(key: string, record: DNSRecord, hostname: string, source: HostSource): Promise<void> {
    try {
      await withTimeout(this.put(key, serializeRecord(record)), this.putTimeout, `put ${key}`);
      this.logger.debug({ key }, 'Record stored');
    } catch (error) {
      const message = errorMessage(error);
      this.eventBus?.publish(EventTypes.DNS_RECORD_FAILED, { hostname, source, error: message });
      throw new StoreError(`Failed to create DNS record for ${hostname}: ${message}`, key, error);
    }
  }
}
