/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

// Agent mode schema - which reconcilers run
export const agentModeSchema = z.enum(['docker', 'proxmox', 'hybrid']);

// Multi-address strategy schema
// - first: first IPv4 plus every IPv6
// - all: every address
export const multiAddressStrategySchema = z.enum(['first', 'all']);

// Base application config schema
export const appConfigSchema = z.object({
  agentMode: agentModeSchema.default('docker'),
  logLevel: logLevelSchema.default('info'),
  domain: z.string().default(''),
  // Resolved at load time; absent only in proxmox mode
  dnsTarget: z.string().min(1).optional(),
});

// etcd config schema
export const etcdConfigSchema = z.object({
  endpoints: z.array(z.string().min(1)).min(1, 'at least one endpoint is required'),
  prefix: z.string().min(1).startsWith('/', 'must start with /').default('/skydns'),
  tls: z.boolean().default(false),
  caFile: z.string().optional(),
  certFile: z.string().optional(),
  keyFile: z.string().optional(),
});

// Docker config schema
export const dockerConfigSchema = z.object({
  socketPath: z.string().min(1).default('/var/run/docker.sock'),
});

// Longest delay a Node.js timer accepts
export const MAX_POLL_INTERVAL = 2_147_483_647;

// Proxmox config schema
export const proxmoxConfigSchema = z.object({
  apiUrl: z.string().url().optional(),
  tokenId: z.string().optional(),
  tokenSecret: z.string().optional(),
  pollInterval: z.number().int().positive().max(MAX_POLL_INTERVAL, 'must be at most 24 days').default(30000),
  verifySSL: z.boolean().default(false),
  interface: z.string().min(1).default('eth0'),
  multiIPv4: multiAddressStrategySchema.default('first'),
});

// Type exports
export type AppConfig = z.infer<typeof appConfigSchema>;
export type EtcdConfig = z.infer<typeof etcdConfigSchema>;
export type DockerConfig = z.infer<typeof dockerConfigSchema>;
export type ProxmoxConfig = z.infer<typeof proxmoxConfigSchema>;
