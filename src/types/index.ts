/**
 * Shared type definitions
 */

// Container Types
export interface ContainerRecord {
  id: string;
  name: string;
  running: boolean;
  address?: string;
}

export interface ContainerSummary {
  id: string;
  networkMode?: string;
}

export interface ContainerMetadata {
  id: string;
  name: string;
  hostname: string;
  running: boolean;
  networkMode?: string;
  defaultAddress?: string;
  networks: Record<string, { ipAddress?: string }>;
}

// Runtime Event Types
export interface RuntimeEvent {
  type: string;
  status: string;
  id?: string;
  attributes: Record<string, string>;
}

export interface EventSubscription extends AsyncIterable<RuntimeEvent> {
  close(): void;
}

/**
 * What the monitor needs from a container runtime
 */
export interface ContainerRuntime {
  ping(): Promise<void>;
  listRunningContainers(): Promise<ContainerSummary[]>;
  inspectContainer(id: string): Promise<ContainerMetadata>;
  streamEvents(): Promise<EventSubscription>;
}

// Resolver Types
export interface UpstreamResolver {
  /**
   * First IPv4 address for the name, or undefined when there is no answer
   */
  resolve4(name: string): Promise<string | undefined>;
}
