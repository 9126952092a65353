/**
 * Main Application Orchestrator
 * Coordinates startup, shutdown, and service lifecycle
 */
import { createLogger, setLogLevel, type Logger } from './Logger.js';
import { eventBus, EventTypes } from './EventBus.js';
import { ConfigManager, getConfig } from '../config/ConfigManager.js';
import type { StaticRecord } from '../config/schema.js';
import { NameTable } from '../table/NameTable.js';
import { qualifyName } from '../table/names.js';
import { DockerMonitor } from '../monitors/DockerMonitor.js';
import { DockerRuntime } from '../runtime/DockerRuntime.js';
import { DnsResponder } from '../dns/DnsResponder.js';
import { NodeUpstreamResolver } from '../dns/UpstreamResolver.js';
import type { ContainerRuntime, UpstreamResolver } from '../types/index.js';

const VERSION = '1.0.0';

export interface ApplicationOptions {
  config?: ConfigManager;
  runtime?: ContainerRuntime;
  resolver?: UpstreamResolver;
  logger?: Logger;
  handleSignals?: boolean;
}

/**
 * Pre-seed the table with configured records, qualified like container names
 */
export function seedStaticRecords(table: NameTable, records: readonly StaticRecord[], domain: string): number {
  let count = 0;
  for (const record of records) {
    const name = qualifyName(record.name, domain);
    if (!name) continue;
    table.add(name, record.address);
    count += 1;
  }
  return count;
}

export class Application {
  private config: ConfigManager;
  private logger: Logger;
  private isRunning: boolean = false;
  private shutdownPromise: Promise<void> | null = null;
  readonly table: NameTable;
  private dockerMonitor: DockerMonitor;
  private dnsResponder: DnsResponder;

  constructor(private options: ApplicationOptions = {}) {
    this.config = options.config ?? getConfig();
    this.logger =
      options.logger ??
      createLogger({ level: this.config.app.logLevel, pretty: this.config.app.logPretty });

    setLogLevel(this.config.app.logLevel);
    if (this.config.app.logLevel === 'trace') {
      eventBus.enableDebugLogging();
    }

    this.table = new NameTable(this.logger.child({ service: 'NameTable' }));

    const runtime = options.runtime ?? new DockerRuntime(
      this.config.docker.socketPath,
      this.logger.child({ service: 'DockerRuntime' })
    );
    this.dockerMonitor = new DockerMonitor(runtime, this.table, {
      domain: this.config.dns.domain,
      network: this.config.docker.network,
      logger: this.logger.child({ service: 'DockerMonitor' }),
    });

    this.dnsResponder = new DnsResponder(this.table, {
      bindAddress: this.config.dns.bindAddress,
      port: this.config.dns.port,
      ttl: this.config.dns.ttl,
      resolver: options.resolver ?? this.createResolver(),
      logger: this.logger.child({ service: 'DnsResponder' }),
    });
  }

  private createResolver(): UpstreamResolver | undefined {
    const servers = this.config.upstreamServers;
    if (servers.length === 0) {
      return undefined;
    }
    return new NodeUpstreamResolver({
      servers,
      timeout: this.config.dns.resolverTimeout,
      logger: this.logger.child({ service: 'UpstreamResolver' }),
    });
  }

  /**
   * Start the application. Resolves once the responder is listening and
   * the monitor has loaded the running containers.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Application already running');
      return;
    }

    this.logger.info({ domain: this.config.dns.domain }, 'Starting container DNS');

    try {
      const seeded = seedStaticRecords(this.table, this.config.dns.records, this.config.dns.domain);
      eventBus.publish(EventTypes.RECORDS_SEEDED, { count: seeded });

      await this.dnsResponder.start();
      await this.dockerMonitor.init();

      void this.dockerMonitor.startWatching().catch((error: unknown) => {
        this.logger.error({ error }, 'Docker event stream failed');
      });

      if (this.options.handleSignals ?? true) {
        this.setupShutdownHandlers();
      }

      this.isRunning = true;

      eventBus.publish(EventTypes.SYSTEM_STARTED, {
        version: VERSION,
        domain: this.config.dns.domain,
      });

      this.logger.info({ count: this.table.size }, 'Container DNS started');
    } catch (error) {
      this.logger.error({ error }, 'Failed to start application');
      await this.dnsResponder.stop();
      throw error;
    }
  }

  get responder(): DnsResponder {
    return this.dnsResponder;
  }

  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string, exitCode: number = 0): Promise<void> => {
      if (this.shutdownPromise) {
        this.logger.info('Shutdown already in progress');
        return this.shutdownPromise;
      }

      this.logger.info({ signal }, 'Shutdown signal received');
      this.shutdownPromise = this.shutdown(signal);
      try {
        await this.shutdownPromise;
        process.exit(exitCode);
      } catch {
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    process.on('unhandledRejection', (reason) => {
      this.logger.fatal({ reason }, 'Unhandled rejection');
      void shutdown('unhandledRejection', 1);
    });
  }

  /**
   * Stop the responder and the event stream. In-flight events may be dropped.
   */
  async shutdown(reason: string = 'manual'): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info({ reason }, 'Shutting down container DNS');
    eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason });

    try {
      await this.dockerMonitor.dispose();
      await this.dnsResponder.stop();

      this.isRunning = false;
      this.logger.info('Shutdown complete');
    } catch (error) {
      this.logger.error({ error }, 'Error during shutdown');
      throw error;
    }
  }

  get running(): boolean {
    return this.isRunning;
  }
}

export function createApplication(options?: ApplicationOptions): Application {
  return new Application(options);
}
