/**
 * DockerRuntime unit tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PassThrough } from 'stream';
import { DockerRuntime, toContainerMetadata, toRuntimeEvent } from '../../../src/runtime/DockerRuntime.js';
import type { RuntimeEvent } from '../../../src/types/index.js';
import { silentLogger } from '../../helpers/FakeRuntime.js';

const mocks = vi.hoisted(() => ({
  ping: vi.fn(),
  listContainers: vi.fn(),
  getEvents: vi.fn(),
  inspect: vi.fn(),
}));

vi.mock('dockerode', () => ({
  default: vi.fn(function () {
    return {
      ping: mocks.ping,
      listContainers: mocks.listContainers,
      getEvents: mocks.getEvents,
      getContainer: vi.fn(() => ({ inspect: mocks.inspect })),
    };
  }),
}));

describe('toRuntimeEvent', () => {
  it('should map the current event shape', () => {
    expect(
      toRuntimeEvent({
        Type: 'container',
        Action: 'rename',
        Actor: { ID: 'abc123', Attributes: { name: 'worker2', oldName: '/worker' } },
      })
    ).toEqual({
      type: 'container',
      status: 'rename',
      id: 'abc123',
      attributes: { name: 'worker2', oldName: '/worker' },
    });
  });

  it('should map the legacy event shape', () => {
    expect(toRuntimeEvent({ status: 'die', id: 'abc123' })).toEqual({
      type: 'container',
      status: 'die',
      id: 'abc123',
      attributes: {},
    });
  });

  it('should leave the id undefined when absent', () => {
    expect(toRuntimeEvent({ Type: 'network', Action: 'connect' })?.id).toBeUndefined();
  });

  it('should return null for non-objects', () => {
    expect(toRuntimeEvent('start')).toBeNull();
    expect(toRuntimeEvent(null)).toBeNull();
  });
});

describe('toContainerMetadata', () => {
  it('should map inspect output', () => {
    expect(
      toContainerMetadata({
        Id: 'abc123',
        Name: '/worker',
        State: { Running: true },
        Config: { Hostname: 'abc123' },
        HostConfig: { NetworkMode: 'backend' },
        NetworkSettings: {
          IPAddress: '',
          Networks: { backend: { IPAddress: '172.20.0.4' }, none: { IPAddress: '' } },
        },
      })
    ).toEqual({
      id: 'abc123',
      name: 'worker',
      hostname: 'abc123',
      running: true,
      networkMode: 'backend',
      defaultAddress: undefined,
      networks: { backend: { ipAddress: '172.20.0.4' }, none: { ipAddress: undefined } },
    });
  });

  it('should tolerate missing sections', () => {
    expect(toContainerMetadata({ Id: 'abc123' })).toEqual({
      id: 'abc123',
      name: '',
      hostname: '',
      running: false,
      networkMode: undefined,
      defaultAddress: undefined,
      networks: {},
    });
  });
});

describe('DockerRuntime', () => {
  let runtime: DockerRuntime;

  beforeEach(() => {
    vi.clearAllMocks();
    runtime = new DockerRuntime('/var/run/docker.sock', silentLogger);
  });

  it('should list running containers with their network mode', async () => {
    mocks.listContainers.mockResolvedValue([
      { Id: 'abc123', HostConfig: { NetworkMode: 'bridge' } },
      { Id: 'def456', HostConfig: {} },
    ]);

    await expect(runtime.listRunningContainers()).resolves.toEqual([
      { id: 'abc123', networkMode: 'bridge' },
      { id: 'def456', networkMode: undefined },
    ]);
    expect(mocks.listContainers).toHaveBeenCalledWith();
  });

  it('should inspect containers', async () => {
    mocks.inspect.mockResolvedValue({
      Id: 'abc123',
      Name: '/worker',
      State: { Running: false },
      Config: { Hostname: 'abc123' },
      NetworkSettings: { IPAddress: '172.17.0.2', Networks: {} },
    });

    const metadata = await runtime.inspectContainer('abc123');

    expect(metadata.name).toBe('worker');
    expect(metadata.defaultAddress).toBe('172.17.0.2');
    expect(metadata.running).toBe(false);
  });

  it('should split the event stream into events', async () => {
    const stream = new PassThrough();
    mocks.getEvents.mockResolvedValue(stream);

    const subscription = await runtime.streamEvents();
    const start = JSON.stringify({ Type: 'container', Action: 'start', Actor: { ID: 'abc123', Attributes: {} } });
    const die = JSON.stringify({ Type: 'container', Action: 'die', Actor: { ID: 'abc123', Attributes: {} } });

    stream.write(start.slice(0, 10));
    stream.write(`${start.slice(10)}\nnot json\n\n${die}\n`);
    stream.end();

    const events: RuntimeEvent[] = [];
    for await (const event of subscription) {
      events.push(event);
    }

    expect(mocks.getEvents).toHaveBeenCalledWith({ filters: { type: ['container'] } });
    expect(events.map((event) => event.status)).toEqual(['start', 'die']);
  });
});
