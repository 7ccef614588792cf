/**
 * Main Application Orchestrator
 * Coordinates startup, mode dispatch and shutdown of the reconcilers
 */
import { createChildLogger, logger as defaultLogger, type Logger } from './Logger.js';
import { EventBus, EventTypes } from './EventBus.js';
import { waitForAbort } from './timeout.js';
import { getVersion } from './version.js';
import type { ConfigManager } from '../config/ConfigManager.js';
import { DockerClient, type DockerApi } from '../docker/DockerClient.js';
import { DockerMonitor } from '../monitors/DockerMonitor.js';
import { ProxmoxMonitor } from '../monitors/ProxmoxMonitor.js';
import { ProxmoxClient, type ProxmoxApi } from '../proxmox/ProxmoxClient.js';
import { ResourceResolver } from '../proxmox/ResourceResolver.js';
import type { RecordStore } from '../providers/base/RecordStore.js';
import { EtcdRecordStore, createEtcdClient } from '../providers/etcd/EtcdRecordStore.js';

/**
 * A long-running loop started by the application
 */
export interface Reconciler {
  name: string;
  run(signal: AbortSignal): Promise<void>;
}

interface DisposableProxmoxApi extends ProxmoxApi {
  dispose?(): Promise<void>;
}

/**
 * Factories for the external clients, replaceable in tests
 */
export interface ApplicationDependencies {
  createStore(config: ConfigManager, logger: Logger, eventBus: EventBus): RecordStore;
  createDockerApi(config: ConfigManager, logger: Logger): DockerApi;
  createProxmoxApi(config: ConfigManager): DisposableProxmoxApi;
}

export interface ApplicationOptions {
  logger?: Logger;
  eventBus?: EventBus;
  dependencies?: Partial<ApplicationDependencies>;
  /** Abort on SIGINT/SIGTERM. Defaults to true. */
  handleSignals?: boolean;
}

const defaultDependencies: ApplicationDependencies = {
  createStore: (config, logger, eventBus) => {
    const client = createEtcdClient({
      endpoints: config.etcd.endpoints,
      tls: config.etcd.tls,
      tlsFiles: {
        caFile: config.etcd.caFile,
        certFile: config.etcd.certFile,
        keyFile: config.etcd.keyFile,
      },
    });
    return new EtcdRecordStore(client, {
      prefix: config.etcd.prefix,
      logger: createChildLogger({ service: 'EtcdRecordStore' }, logger),
      eventBus,
    });
  },
  createDockerApi: (config, logger) =>
    new DockerClient({
      socketPath: config.docker.socketPath,
      logger: createChildLogger({ service: 'DockerClient' }, logger),
    }),
  createProxmoxApi: (config) =>
    new ProxmoxClient({
      apiUrl: config.proxmox.apiUrl ?? '',
      tokenId: config.proxmox.tokenId ?? '',
      tokenSecret: config.proxmox.tokenSecret ?? '',
      verifySSL: config.proxmox.verifySSL,
    }),
};

export class Application {
  private config: ConfigManager;
  private rootLogger: Logger;
  private logger: Logger;
  private eventBus: EventBus;
  private dependencies: ApplicationDependencies;
  private handleSignals: boolean;
  private controller: AbortController = new AbortController();
  private isRunning: boolean = false;
  private shutdownReason: string = 'manual';
  private disposers: Array<() => Promise<void>> = [];

  constructor(config: ConfigManager, options: ApplicationOptions = {}) {
    this.config = config;
    this.rootLogger = options.logger ?? defaultLogger;
    this.logger = createChildLogger({ service: 'Application' }, this.rootLogger);
    this.eventBus = options.eventBus ?? new EventBus(this.logger);
    this.dependencies = { ...defaultDependencies, ...options.dependencies };
    this.handleSignals = options.handleSignals ?? true;

    if (config.app.logLevel === 'trace') {
      this.eventBus.enableDebugLogging();
    }
  }

  /**
   * Run until stopped. In docker and proxmox mode the reconciler's failure is thrown;
   * in hybrid mode early exits are logged and the application waits for shutdown.
   */
  async run(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Application already running');
      return;
    }
    this.isRunning = true;

    const removeSignalHandlers = this.handleSignals ? this.setupShutdownHandlers() : (): void => {};
    const mode = this.config.app.agentMode;

    try {
      this.config.logSummary(this.logger);

      const store = this.dependencies.createStore(this.config, this.rootLogger, this.eventBus);
      this.disposers.push(() => store.dispose());
      await store.init();

      const reconcilers = this.createReconcilers(store);

      this.eventBus.publish(EventTypes.SYSTEM_STARTED, { version: getVersion(), mode });
      this.logger.info({ mode }, 'DNSherpa started');

      if (mode === 'hybrid') {
        await this.runHybrid(reconcilers);
      } else {
        await this.runSingle(reconcilers);
      }
    } finally {
      removeSignalHandlers();
      await this.dispose();
      this.isRunning = false;
    }
  }

  /**
   * Request shutdown; run() returns once the reconcilers have settled
   */
  stop(reason: string = 'manual'): void {
    if (this.controller.signal.aborted) return;
    this.shutdownReason = reason;
    this.logger.info({ reason }, 'Shutting down DNSherpa');
    this.controller.abort();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get running(): boolean {
    return this.isRunning;
  }

  private createReconcilers(store: RecordStore): Reconciler[] {
    const mode = this.config.app.agentMode;
    const reconcilers: Reconciler[] = [];

    if (mode === 'docker' || mode === 'hybrid') {
      reconcilers.push(this.createDockerReconciler(store));
    }
    if (mode === 'proxmox' || mode === 'hybrid') {
      reconcilers.push(this.createProxmoxReconciler(store));
    }

    return reconcilers;
  }

  private createDockerReconciler(store: RecordStore): Reconciler {
    const monitor = new DockerMonitor(this.dependencies.createDockerApi(this.config, this.rootLogger), store, {
      target: this.config.requireDNSTarget(),
      logger: createChildLogger({ service: 'DockerMonitor' }, this.rootLogger),
      eventBus: this.eventBus,
    });

    return { name: 'docker', run: (signal) => monitor.run(signal) };
  }

  private createProxmoxReconciler(store: RecordStore): Reconciler {
    const proxmox = this.config.proxmox;

    if (!proxmox.apiUrl) {
      return {
        name: 'proxmox',
        run: async (signal) => {
          this.logger.warn('PROXMOX_API_URL is not set, Proxmox monitoring is idle');
          await waitForAbort(signal);
        },
      };
    }

    const api = this.dependencies.createProxmoxApi(this.config);
    if (api.dispose) {
      const dispose = api.dispose.bind(api);
      this.disposers.push(dispose);
    }

    const resolver = new ResourceResolver(api, {
      domain: this.config.app.domain,
      defaultInterface: proxmox.interface,
      strategy: proxmox.multiIPv4,
      logger: createChildLogger({ service: 'ResourceResolver' }, this.rootLogger),
    });

    const monitor = new ProxmoxMonitor(api, store, resolver, {
      pollInterval: proxmox.pollInterval,
      logger: createChildLogger({ service: 'ProxmoxMonitor' }, this.rootLogger),
      eventBus: this.eventBus,
    });

    return { name: 'proxmox', run: (signal) => monitor.run(signal) };
  }

  private async runSingle(reconcilers: Reconciler[]): Promise<void> {
    const signal = this.controller.signal;
    for (const reconciler of reconcilers) {
      await reconciler.run(signal);
    }
  }

  /**
   * Run every reconciler concurrently. One stopping early does not stop the others.
   */
  private async runHybrid(reconcilers: Reconciler[]): Promise<void> {
    const signal = this.controller.signal;

    await Promise.all(
      reconcilers.map(async (reconciler) => {
        try {
          await reconciler.run(signal);
          if (!signal.aborted) {
            this.logger.warn({ name: reconciler.name }, 'Reconciler exited early');
          }
        } catch (error) {
          this.logger.error({ error, name: reconciler.name }, 'Reconciler failed');
        }
      })
    );

    await waitForAbort(signal);
  }

  private setupShutdownHandlers(): () => void {
    const onSigterm = (): void => this.stop('SIGTERM');
    const onSigint = (): void => this.stop('SIGINT');

    process.on('SIGTERM', onSigterm);
    process.on('SIGINT', onSigint);

    return () => {
      process.off('SIGTERM', onSigterm);
      process.off('SIGINT', onSigint);
    };
  }

  private async dispose(): Promise<void> {
    this.eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason: this.shutdownReason });

    const disposers = this.disposers.splice(0).reverse();
    for (const dispose of disposers) {
      try {
        await dispose();
      } catch (error) {
        this.logger.warn({ error }, 'Error during shutdown');
      }
    }

    this.logger.info('DNSherpa shutdown complete');
  }
}

// Export factory function
export function createApplication(config: ConfigManager, options?: ApplicationOptions): Application {
  return new Application(config, options);
}
