/**
 * Docker Monitor
 * Keeps the name table in step with the containers running on the host
 */
import { createChildLogger, type Logger } from '../core/Logger.js';
import { eventBus as defaultEventBus, EventTypes, type EventBus } from '../core/EventBus.js';
import { qualifyName } from '../table/names.js';
import type { NameTable } from '../table/NameTable.js';
import type {
  ContainerMetadata,
  ContainerRecord,
  ContainerRuntime,
  EventSubscription,
  RuntimeEvent,
} from '../types/index.js';

export interface DockerMonitorOptions {
  domain: string;
  network?: string;
  logger?: Logger;
  eventBus?: EventBus;
}

/**
 * Raw name for a container. Docker derives the hostname from the
 * id when none is set, so the name field wins unless it is empty.
 */
export function resolveContainerName(metadata: ContainerMetadata): string | undefined {
  const { name, hostname } = metadata;
  return name || hostname || undefined;
}

/**
 * Address on the filtered network when set, otherwise the default network address
 */
export function resolveContainerAddress(metadata: ContainerMetadata, network?: string): string | undefined {
  if (network) {
    const address = metadata.networks[network]?.ipAddress;
    if (address) return address;
  }
  return metadata.defaultAddress;
}

type AddressedRecord = ContainerRecord & { address: string };

function withAddress(records: ContainerRecord[]): AddressedRecord[] {
  return records.filter(
    (record): record is AddressedRecord => record.address !== undefined && record.address.trim() !== ''
  );
}

export class DockerMonitor {
  private logger: Logger;
  private runtime: ContainerRuntime;
  private table: NameTable;
  private eventBus: EventBus;
  private domain: string;
  private network?: string;
  private subscription: EventSubscription | null = null;
  private initialized: boolean = false;
  private watching: boolean = false;

  constructor(runtime: ContainerRuntime, table: NameTable, options: DockerMonitorOptions) {
    this.runtime = runtime;
    this.table = table;
    this.domain = options.domain;
    this.network = options.network;
    this.eventBus = options.eventBus ?? defaultEventBus;
    this.logger = options.logger ?? createChildLogger({ service: 'DockerMonitor' });
  }

  /**
   * Connect, subscribe to events, then load the containers already running.
   * The subscription is opened first so nothing is lost while loading.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      this.logger.warn('Docker monitor already initialized');
      return;
    }

    this.logger.debug('Initializing Docker monitor');

    try {
      await this.runtime.ping();
      this.subscription = await this.runtime.streamEvents();
      await this.loadContainers();

      this.initialized = true;
      this.logger.info({ count: this.table.size }, 'Docker monitor initialized');
    } catch (error) {
      this.subscription?.close();
      this.subscription = null;
      this.logger.error({ error }, 'Failed to initialize Docker monitor');
      throw error;
    }
  }

  private async loadContainers(): Promise<void> {
    const containers = await this.runtime.listRunningContainers();

    for (const container of containers) {
      if (this.network && container.networkMode !== this.network) {
        continue;
      }

      try {
        const records = await this.inspect(container.id);
        this.addRecords(withAddress(records));
      } catch (error) {
        this.logger.warn({ error, containerId: container.id }, 'Failed to inspect running container');
      }
    }

    this.logger.debug({ count: containers.length }, 'Loaded containers');
  }

  /**
   * Consume the event stream until it ends or stopWatching() is called
   */
  async startWatching(): Promise<void> {
    if (!this.subscription) {
      throw new Error('Docker monitor not initialized');
    }
    if (this.watching) {
      this.logger.warn('Already watching Docker events');
      return;
    }

    this.watching = true;
    this.logger.info('Docker event stream started');

    try {
      for await (const event of this.subscription) {
        await this.handleEvent(event);
      }
      this.logger.warn('Docker event stream ended');
    } finally {
      this.watching = false;
    }
  }

  stopWatching(): void {
    if (this.subscription) {
      this.subscription.close();
      this.subscription = null;
    }
    this.watching = false;
    this.logger.info('Docker event stream stopped');
  }

  /**
   * Apply one event to the table. Errors are logged and never escape.
   */
  async handleEvent(event: RuntimeEvent): Promise<void> {
    if (event.type !== 'container') return;

    const containerId = event.id;
    if (!containerId) return;

    try {
      switch (event.status) {
        case 'start':
          await this.handleContainerStart(containerId);
          break;

        case 'die':
          await this.handleContainerDie(containerId);
          break;

        case 'rename':
          this.handleContainerRename(containerId, event.attributes);
          break;
      }
    } catch (error) {
      this.logger.error({ error, containerId, type: event.status }, 'Failed to handle Docker event');
    }
  }

  private async handleContainerStart(containerId: string): Promise<void> {
    const records = withAddress(await this.inspect(containerId));
    this.addRecords(records);

    this.eventBus.publish(EventTypes.CONTAINER_STARTED, {
      containerId,
      names: records.map((record) => record.name),
    });
  }

  private async handleContainerDie(containerId: string): Promise<void> {
    const records = await this.inspect(containerId);
    for (const record of records) {
      this.table.remove(record.name);
    }

    this.eventBus.publish(EventTypes.CONTAINER_DIED, {
      containerId,
      names: records.map((record) => record.name),
    });
  }

  private handleContainerRename(containerId: string, attributes: Record<string, string>): void {
    const oldName = qualifyName(attributes['oldName'] ?? '', this.domain);
    const newName = qualifyName(attributes['name'] ?? '', this.domain);
    if (!oldName || !newName) {
      this.logger.debug({ containerId }, 'Rename event without names ignored');
      return;
    }

    this.table.rename(oldName, newName);

    this.eventBus.publish(EventTypes.CONTAINER_RENAMED, { containerId, oldName, newName });
  }

  /**
   * Fetch fresh metadata and turn it into records. A stopped container has
   * no address, so the address is left optional.
   */
  private async inspect(containerId: string): Promise<ContainerRecord[]> {
    const metadata = await this.runtime.inspectContainer(containerId);

    const rawName = resolveContainerName(metadata);
    if (!rawName) {
      this.logger.debug({ containerId }, 'Container has no usable name');
      return [];
    }

    const address = resolveContainerAddress(metadata, this.network);

    return this.deriveNames(rawName)
      .map((name) => ({ id: metadata.id, name, running: metadata.running, address }));
  }

  private deriveNames(rawName: string): string[] {
    const name = qualifyName(rawName, this.domain);
    return name ? [name] : [];
  }

  private addRecords(records: AddressedRecord[]): void {
    for (const record of records) {
      this.table.add(record.name, record.address);
    }
  }

  isWatching(): boolean {
    return this.watching;
  }

  async dispose(): Promise<void> {
    this.stopWatching();
    this.initialized = false;
    this.logger.debug('Docker monitor disposed');
  }
}
