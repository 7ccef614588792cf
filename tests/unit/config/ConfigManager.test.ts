/**
 * ConfigManager unit tests
 */
import { describe, it, expect, vi } from 'vitest';
import { ConfigManager, parseDuration, type ConfigSources } from '../../../src/config/ConfigManager.js';
import { ConfigError } from '../../../src/core/errors.js';
import { createSilentLogger, type Logger } from '../../../src/core/Logger.js';

function load(
  env: Record<string, string>,
  files: Record<string, string> = {},
  logger: Logger = createSilentLogger()
): ConfigManager {
  const sources: ConfigSources = {
    env,
    readFile: (path) => {
      const contents = files[path];
      if (contents === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return contents;
    },
    fileExists: (path) => path in files,
    logger,
  };
  return new ConfigManager(sources);
}

function loadError(env: Record<string, string>, files: Record<string, string> = {}): unknown {
  try {
    load(env, files);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseDuration', () => {
  it('should parse unit suffixes', () => {
    expect(parseDuration('30s')).toBe(30000);
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('5m')).toBe(300000);
    expect(parseDuration('1h')).toBe(3600000);
    expect(parseDuration('1m30s')).toBe(90000);
    expect(parseDuration('1.5s')).toBe(1500);
  });

  it('should read bare numbers as milliseconds', () => {
    expect(parseDuration('45000')).toBe(45000);
  });

  it('should reject anything else', () => {
    expect(parseDuration('soon')).toBeUndefined();
    expect(parseDuration('10 s')).toBeUndefined();
    expect(parseDuration('')).toBeUndefined();
  });
});

describe('ConfigManager', () => {
  it('should apply defaults', () => {
    const config = load({ DNS_TARGET: 'docker-host.example.com' });

    expect(config.app).toMatchObject({
      agentMode: 'docker',
      logLevel: 'info',
      domain: '',
      dnsTarget: 'docker-host.example.com',
    });
    expect(config.etcd).toEqual({ endpoints: ['127.0.0.1:2379'], prefix: '/skydns', tls: false });
    expect(config.docker.socketPath).toBe('/var/run/docker.sock');
    expect(config.proxmox).toMatchObject({
      pollInterval: 30000,
      verifySSL: false,
      interface: 'eth0',
      multiIPv4: 'first',
    });
  });

  it('should parse every setting from the environment', () => {
    const config = load({
      AGENT_MODE: 'Hybrid',
      ETCD_ENDPOINTS: 'etcd1:2379, etcd2:2379',
      ETCD_PREFIX: '/dns',
      ETCD_TLS: 'true',
      ETCD_CA_FILE: '/certs/ca.pem',
      DNS_TARGET: '192.0.2.10',
      DOMAIN: 'home.lab',
      PROXMOX_API_URL: 'https://pve.home.lab:8006',
      PROXMOX_TOKEN_ID: 'dns@pve!sync',
      PROXMOX_TOKEN_SECRET: 'test-secret',
      PROXMOX_POLL_INTERVAL: '2m',
      PROXMOX_VERIFY_SSL: '1',
      PROXMOX_INTERFACE: 'ens18',
      PROXMOX_MULTI_IPV4: 'all',
      LOG_LEVEL: 'DEBUG',
      LOG_FORMAT: 'json',
    });

    expect(config.app.agentMode).toBe('hybrid');
    expect(config.app.logLevel).toBe('debug');
    expect(config.etcd).toEqual({
      endpoints: ['etcd1:2379', 'etcd2:2379'],
      prefix: '/dns',
      tls: true,
      caFile: '/certs/ca.pem',
    });
    expect(config.proxmox).toEqual({
      apiUrl: 'https://pve.home.lab:8006',
      tokenId: 'dns@pve!sync',
      tokenSecret: 'test-secret',
      pollInterval: 120000,
      verifySSL: true,
      interface: 'ens18',
      multiIPv4: 'all',
    });
  });

  it('should treat empty variables as unset', () => {
    const config = load({ DNS_TARGET: 'host.example.com', AGENT_MODE: '', ETCD_PREFIX: '' });

    expect(config.app.agentMode).toBe('docker');
    expect(config.etcd.prefix).toBe('/skydns');
  });

  it('should prefer the token secret file', () => {
    const config = load(
      { AGENT_MODE: 'proxmox', PROXMOX_TOKEN_SECRET: 'env-secret' },
      { '/run/secrets/proxmox_token_secret': 'file-secret\n' }
    );

    expect(config.proxmox.tokenSecret).toBe('file-secret');
  });

  describe('DNS target', () => {
    it('should use a fully qualified host name from the hostname file', () => {
      const config = load({}, { '/host/hostname': 'docker01.example.com\n' });

      expect(config.app.dnsTarget).toBe('docker01.example.com');
    });

    it('should qualify a short host name with the domain', () => {
      const config = load({ DOMAIN: 'home.lab' }, { '/host/hostname': 'docker01\n' });

      expect(config.requireDNSTarget()).toBe('docker01.home.lab');
    });

    it('should honour a custom hostname file location', () => {
      const config = load({ HOST_HOSTNAME_FILE: '/mnt/hostname' }, { '/mnt/hostname': 'nas.lan' });

      expect(config.app.dnsTarget).toBe('nas.lan');
    });

    it('should fail when the hostname file is missing', () => {
      const error = loadError({});

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('code', 'CONFIG_MISSING');
    });

    it('should fail when the hostname file is empty', () => {
      expect(loadError({}, { '/host/hostname': '  \n' })).toHaveProperty('message', '/host/hostname is empty');
    });

    it('should fail for a short host name without a domain', () => {
      const error = loadError({}, { '/host/hostname': 'docker01' });

      expect(error).toHaveProperty(
        'message',
        "DOMAIN is not set. Host hostname 'docker01' is not fully qualified; set DOMAIN or DNS_TARGET"
      );
    });

    it('should not be required in proxmox mode', () => {
      const config = load({ AGENT_MODE: 'proxmox' });

      expect(config.app.dnsTarget).toBeUndefined();
      expect(() => config.requireDNSTarget()).toThrow(ConfigError);
    });
  });

  describe('validation', () => {
    it('should reject an unknown agent mode', () => {
      const error = loadError({ AGENT_MODE: 'kubernetes', DNS_TARGET: 'host.example.com' });

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('code', 'CONFIG_INVALID');
    });

    it('should reject an invalid poll interval', () => {
      const error = loadError({ AGENT_MODE: 'proxmox', PROXMOX_POLL_INTERVAL: 'often' });

      expect(error).toHaveProperty(
        'message',
        "Invalid PROXMOX_POLL_INTERVAL 'often': expected a duration such as 30s, 5m or 1h"
      );
    });

    it('should reject a poll interval longer than a timer can wait', () => {
      const error = loadError({ AGENT_MODE: 'proxmox', PROXMOX_POLL_INTERVAL: '720h' });

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty(
        'message',
        'Invalid proxmox configuration (pollInterval: must be at most 24 days)'
      );
    });

    it('should accept a poll interval of a day', () => {
      expect(load({ AGENT_MODE: 'proxmox', PROXMOX_POLL_INTERVAL: '24h' }).proxmox.pollInterval).toBe(86400000);
    });

    it('should reject an unknown multi-address strategy', () => {
      expect(loadError({ AGENT_MODE: 'proxmox', PROXMOX_MULTI_IPV4: 'random' })).toBeInstanceOf(ConfigError);
    });

    it('should reject a prefix without a leading slash', () => {
      expect(loadError({ AGENT_MODE: 'proxmox', ETCD_PREFIX: 'skydns' })).toBeInstanceOf(ConfigError);
    });

    it('should reject an empty endpoint list', () => {
      expect(loadError({ AGENT_MODE: 'proxmox', ETCD_ENDPOINTS: ' , ' })).toBeInstanceOf(ConfigError);
    });
  });
});

describe('ConfigManager log settings', () => {
  it('should fall back to info for an unknown log level and warn', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    const config = load({ LOG_LEVEL: 'verbose', DNS_TARGET: 'docker-host.example.com' }, {}, logger);

    expect(config.app.logLevel).toBe('info');
    expect(warn).toHaveBeenCalledWith({ value: 'verbose', fallback: 'info' }, 'Unknown LOG_LEVEL, using default');
  });

  it('should warn about an unknown log format without failing', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    load({ LOG_FORMAT: 'xml', DNS_TARGET: 'docker-host.example.com' }, {}, logger);

    expect(warn).toHaveBeenCalledWith({ value: 'xml', fallback: 'text' }, 'Unknown LOG_FORMAT, using default');
  });

  it('should not warn for known values', () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');

    load({ LOG_LEVEL: 'Trace', LOG_FORMAT: 'JSON', DNS_TARGET: 'docker-host.example.com' }, {}, logger);

    expect(warn).not.toHaveBeenCalled();
  });
});
