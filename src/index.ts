#!/usr/bin/env node
/**
 * DNSherpa - Entry Point
 *
 * Publishes DNS records in etcd for Traefik-routed Docker containers
 * and Proxmox VMs and containers
 */
import { ConfigManager } from './config/ConfigManager.js';
import { createApplication, logBanner, logger, setLogLevel } from './core/index.js';

async function main(): Promise<void> {
  logBanner(logger);

  const config = new ConfigManager();
  setLogLevel(config.app.logLevel);

  const app = createApplication(config);
  await app.run();
}

// Run the application
main().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.fatal({ error }, 'DNSherpa stopped with an error');
    process.exit(1);
  }
);
