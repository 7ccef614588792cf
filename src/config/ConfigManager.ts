/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import { existsSync, readFileSync } from 'fs';
import type { z } from 'zod';
import { ConfigError, errorMessage } from '../core/errors.js';
import { isLogLevel, logger as rootLogger, parseLogLevel, type Logger, type LogLevel } from '../core/Logger.js';
import {
  appConfigSchema,
  dockerConfigSchema,
  etcdConfigSchema,
  proxmoxConfigSchema,
  type AppConfig,
  type DockerConfig,
  type EtcdConfig,
  type ProxmoxConfig,
} from './schema.js';

export const DEFAULT_HOSTNAME_FILE = '/host/hostname';
const SECRETS_DIR = '/run/secrets';

/**
 * Where configuration is read from. Defaults to the process environment and the real filesystem.
 */
export interface ConfigSources {
  env?: Record<string, string | undefined>;
  readFile?: (path: string) => string;
  fileExists?: (path: string) => boolean;
  logger?: Logger;
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parse a duration such as `30s`, `1m30s`, `500ms` or `2h` into milliseconds.
 * A bare number is taken as milliseconds. Returns undefined for anything else.
 */
export function parseDuration(value: string): number | undefined {
  const input = value.trim();
  if (/^\d+$/.test(input)) {
    return parseInt(input, 10);
  }

  if (!/^(\d+(\.\d+)?(ms|s|m|h))+$/.test(input)) {
    return undefined;
  }

  let total = 0;
  for (const match of input.matchAll(/(\d+(?:\.\d+)?)(ms|s|m|h)/g)) {
    const amount = parseFloat(match[1] ?? '0');
    const unit = DURATION_UNITS[match[2] ?? 'ms'] ?? 1;
    total += amount * unit;
  }
  return Math.round(total);
}

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseSection<T extends z.ZodTypeAny>(section: string, schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZod(section, result.error);
  }
  return result.data;
}

export class ConfigManager {
  private _app: AppConfig;
  private _etcd: EtcdConfig;
  private _docker: DockerConfig;
  private _proxmox: ProxmoxConfig;

  private env: Record<string, string | undefined>;
  private readFile: (path: string) => string;
  private fileExists: (path: string) => boolean;
  private logger: Logger;

  constructor(sources: ConfigSources = {}) {
    this.env = sources.env ?? process.env;
    this.readFile = sources.readFile ?? ((path) => readFileSync(path, 'utf-8'));
    this.fileExists = sources.fileExists ?? existsSync;
    this.logger = sources.logger ?? rootLogger;

    const agentMode = this.getEnv('AGENT_MODE', 'docker')?.toLowerCase();
    const domain = this.getEnv('DOMAIN', '') ?? '';

    // Load and validate app config; the DNS target only matters when Docker is watched
    const app = parseSection('application', appConfigSchema, {
      agentMode,
      logLevel: this.readLogLevel(),
      domain,
    });
    if (app.agentMode !== 'proxmox') {
      app.dnsTarget = this.detectDNSTarget(domain);
    }
    this._app = app;
    this.checkLogFormat();

    // Load etcd config
    this._etcd = parseSection('etcd', etcdConfigSchema, {
      endpoints: parseList(this.getEnv('ETCD_ENDPOINTS', '127.0.0.1:2379') ?? ''),
      prefix: this.getEnv('ETCD_PREFIX', '/skydns'),
      tls: parseBool(this.getEnv('ETCD_TLS'), false),
      caFile: this.getEnv('ETCD_CA_FILE'),
      certFile: this.getEnv('ETCD_CERT_FILE'),
      keyFile: this.getEnv('ETCD_KEY_FILE'),
    });

    // Load Docker config
    this._docker = parseSection('docker', dockerConfigSchema, {
      socketPath: this.getEnv('DOCKER_SOCKET', '/var/run/docker.sock'),
    });

    // Load Proxmox config
    const rawInterval = this.getEnv('PROXMOX_POLL_INTERVAL', '30s') ?? '30s';
    const pollInterval = parseDuration(rawInterval);
    if (pollInterval === undefined) {
      throw ConfigError.invalid('PROXMOX_POLL_INTERVAL', rawInterval, 'a duration such as 30s, 5m or 1h');
    }

    this._proxmox = parseSection('proxmox', proxmoxConfigSchema, {
      apiUrl: this.getEnv('PROXMOX_API_URL'),
      tokenId: this.getEnv('PROXMOX_TOKEN_ID'),
      tokenSecret: this.getSecret('PROXMOX_TOKEN_SECRET'),
      pollInterval,
      verifySSL: parseBool(this.getEnv('PROXMOX_VERIFY_SSL'), false),
      interface: this.getEnv('PROXMOX_INTERFACE', 'eth0'),
      multiIPv4: this.getEnv('PROXMOX_MULTI_IPV4', 'first')?.toLowerCase(),
    });
  }

  // Getters for configuration sections
  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get etcd(): Readonly<EtcdConfig> {
    return this._etcd;
  }

  get docker(): Readonly<DockerConfig> {
    return this._docker;
  }

  get proxmox(): Readonly<ProxmoxConfig> {
    return this._proxmox;
  }

  /**
   * Docker target, present in docker and hybrid modes
   */
  requireDNSTarget(): string {
    if (!this._app.dnsTarget) {
      throw ConfigError.missing('DNS_TARGET');
    }
    return this._app.dnsTarget;
  }

  /**
   * Log the effective configuration. Secrets are reported as set or not set.
   */
  logSummary(logger: Logger = this.logger): void {
    logger.info(
      {
        mode: this._app.agentMode,
        endpoints: this._etcd.endpoints.join(','),
        prefix: this._etcd.prefix,
        tls: this._etcd.tls,
        target: this._app.dnsTarget,
        domain: this._app.domain || undefined,
      },
      'Configuration loaded'
    );

    if (this._app.agentMode !== 'docker') {
      logger.info(
        {
          apiUrl: this._proxmox.apiUrl,
          tokenId: this._proxmox.tokenId,
          tokenSecret: this._proxmox.tokenSecret ? 'set' : 'not set',
          interval: this._proxmox.pollInterval,
          interface: this._proxmox.interface,
          strategy: this._proxmox.multiIPv4,
          verifySSL: this._proxmox.verifySSL,
        },
        'Proxmox configuration'
      );
    }
  }

  /**
   * Unknown levels fall back to info with a warning
   */
  private readLogLevel(): LogLevel {
    const raw = this.getEnv('LOG_LEVEL');
    const level = parseLogLevel(raw);
    if (raw !== undefined && !isLogLevel(raw.trim().toLowerCase())) {
      this.logger.warn({ value: raw, fallback: level }, 'Unknown LOG_LEVEL, using default');
    }
    return level;
  }

  /**
   * The root logger picks its format before config loads; only report values it ignored
   */
  private checkLogFormat(): void {
    const raw = this.getEnv('LOG_FORMAT');
    if (raw === undefined) return;
    const normalized = raw.trim().toLowerCase();
    if (normalized !== 'text' && normalized !== 'json') {
      this.logger.warn({ value: raw, fallback: 'text' }, 'Unknown LOG_FORMAT, using default');
    }
  }

  /**
   * Read environment variable with optional default. Empty values count as unset.
   */
  private getEnv(key: string, defaultValue?: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value === '' ? defaultValue : value;
  }

  /**
   * Read secret from file (Docker secrets support) or environment
   */
  private getSecret(key: string): string | undefined {
    const secretPath = `${SECRETS_DIR}/${key.toLowerCase()}`;
    if (this.fileExists(secretPath)) {
      try {
        return this.readFile(secretPath).trim();
      } catch (error) {
        this.logger.warn({ key, error }, 'Failed to read Docker secret');
      }
    }

    return this.getEnv(key);
  }

  /**
   * DNS_TARGET when set, otherwise the host's name from the mounted hostname file,
   * qualified with DOMAIN when it is a short name
   */
  private detectDNSTarget(domain: string): string {
    const explicit = this.getEnv('DNS_TARGET');
    if (explicit) {
      return explicit.trim();
    }

    const hostnameFile = this.getEnv('HOST_HOSTNAME_FILE', DEFAULT_HOSTNAME_FILE) ?? DEFAULT_HOSTNAME_FILE;

    let contents: string;
    try {
      contents = this.readFile(hostnameFile);
    } catch (error) {
      throw new ConfigError(
        `DNS_TARGET is not set and ${hostnameFile} cannot be read (${errorMessage(error)}). ` +
          `Set DNS_TARGET or mount the host's /etc/hostname with -v /etc/hostname:${hostnameFile}:ro`,
        'CONFIG_MISSING',
        { variable: 'DNS_TARGET', file: hostnameFile }
      );
    }

    const hostname = contents.trim();
    if (!hostname) {
      throw new ConfigError(`${hostnameFile} is empty`, 'CONFIG_MISSING', { variable: 'DNS_TARGET', file: hostnameFile });
    }

    if (hostname.includes('.')) {
      this.logger.info({ target: hostname }, 'Detected DNS target from host hostname');
      return hostname;
    }

    if (!domain) {
      throw ConfigError.missing(
        'DOMAIN',
        `Host hostname '${hostname}' is not fully qualified; set DOMAIN or DNS_TARGET`
      );
    }

    const fqdn = `${hostname}.${domain}`;
    this.logger.info({ target: fqdn }, 'Detected DNS target from host hostname and domain');
    return fqdn;
  }
}
