/**
 * Docker Runtime
 * ContainerRuntime backed by the Docker Engine API
 */
import Docker from 'dockerode';
import { createInterface } from 'readline';
import { z } from 'zod';
import { createChildLogger, type Logger } from '../core/Logger.js';
import type {
  ContainerMetadata,
  ContainerRuntime,
  ContainerSummary,
  EventSubscription,
  RuntimeEvent,
} from '../types/index.js';

// Accepts both the current event shape (Type/Action/Actor) and the legacy one (status/id)
const dockerEventSchema = z.object({
  Type: z.string().optional(),
  Action: z.string().optional(),
  status: z.string().optional(),
  id: z.string().optional(),
  Actor: z
    .object({
      ID: z.string().optional(),
      Attributes: z.record(z.string()).optional(),
    })
    .optional(),
});

/**
 * Map a decoded event line to a RuntimeEvent, or null when it is not an event object
 */
export function toRuntimeEvent(raw: unknown): RuntimeEvent | null {
  const parsed = dockerEventSchema.safeParse(raw);
  if (!parsed.success) return null;

  const event = parsed.data;
  return {
    type: event.Type ?? 'container',
    status: event.Action ?? event.status ?? '',
    id: event.Actor?.ID || event.id || undefined,
    attributes: event.Actor?.Attributes ?? {},
  };
}

/**
 * The parts of docker inspect output the monitor relies on
 */
export interface InspectInfo {
  Id: string;
  Name?: string;
  State?: { Running?: boolean };
  Config?: { Hostname?: string };
  HostConfig?: { NetworkMode?: string };
  NetworkSettings?: {
    IPAddress?: string;
    Networks?: Record<string, { IPAddress?: string }>;
  };
}

/**
 * Map docker inspect output to ContainerMetadata
 */
export function toContainerMetadata(info: InspectInfo): ContainerMetadata {
  const networks: ContainerMetadata['networks'] = {};
  for (const [name, network] of Object.entries(info.NetworkSettings?.Networks ?? {})) {
    networks[name] = { ipAddress: network.IPAddress || undefined };
  }

  return {
    id: info.Id,
    name: info.Name?.replace(/^\//, '') ?? '',
    hostname: info.Config?.Hostname ?? '',
    running: info.State?.Running ?? false,
    networkMode: info.HostConfig?.NetworkMode || undefined,
    defaultAddress: info.NetworkSettings?.IPAddress || undefined,
    networks,
  };
}

export class DockerRuntime implements ContainerRuntime {
  private logger: Logger;
  private docker: Docker;

  constructor(socketPath: string, logger?: Logger) {
    this.logger = logger ?? createChildLogger({ service: 'DockerRuntime' });
    this.docker = new Docker({ socketPath });
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }

  async listRunningContainers(): Promise<ContainerSummary[]> {
    const containers = await this.docker.listContainers();
    return containers.map((container) => ({
      id: container.Id,
      networkMode: container.HostConfig?.NetworkMode,
    }));
  }

  async inspectContainer(id: string): Promise<ContainerMetadata> {
    const info = await this.docker.getContainer(id).inspect();
    return toContainerMetadata(info);
  }

  /**
   * Open the event stream. Events arriving before the caller starts
   * iterating are buffered by the stream.
   */
  async streamEvents(): Promise<EventSubscription> {
    const stream = await this.docker.getEvents({
      filters: { type: ['container'] },
    });
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    // readline only buffers lines once an iterator exists
    const pending = lines[Symbol.asyncIterator]();
    const logger = this.logger;

    async function* parse(): AsyncGenerator<RuntimeEvent> {
      for await (const line of pending) {
        if (line.trim() === '') continue;

        let event: RuntimeEvent | null = null;
        try {
          event = toRuntimeEvent(JSON.parse(line));
        } catch (error) {
          logger.warn({ error }, 'Failed to parse Docker event');
          continue;
        }

        if (event) {
          yield event;
        } else {
          logger.warn('Skipping unrecognised Docker event');
        }
      }
    }

    return {
      [Symbol.asyncIterator]: () => parse(),
      close: () => {
        lines.close();
        if ('destroy' in stream && typeof stream.destroy === 'function') {
          stream.destroy();
        }
      },
    };
  }
}
