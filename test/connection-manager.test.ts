import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConnectionManager, type ConnectionManagerOptions } from '../src/transport/connection-manager.js';
import { encodeFrame } from '../src/framers/mesh-framer.js';
import { ChannelOpenFailureError, SendRejectedError } from '../src/errors.js';
import {
  ConnectionState,
  DisconnectReason,
  type ConnectionSnapshot,
  type ControlMessageEncoder,
} from '../src/types/link-types.js';
import { busyPortError, FakeAccess, FakeDiscovery, FakeDriver, flushPromises } from './helpers/fakes.js';

const CONFIG_REQUEST = 0xc0;
const HEARTBEAT = 0xbe;
const FAREWELL = 0xdd;

type StubEncoder = ControlMessageEncoder & {
  encodeConfigRequest: ReturnType<typeof vi.fn>;
  encodeHeartbeat: ReturnType<typeof vi.fn>;
};

const createEncoder = (): StubEncoder => ({
  encodeConfigRequest: vi.fn((id: number) => Uint8Array.of(CONFIG_REQUEST, (id >> 8) & 0xff, id & 0xff)),
  encodeHeartbeat: vi.fn((nonce: number) => Uint8Array.of(HEARTBEAT, (nonce >> 8) & 0xff, nonce & 0xff)),
});

interface Harness {
  manager: ConnectionManager;
  driver: FakeDriver;
  discovery: FakeDiscovery;
  access: FakeAccess;
  encoder: StubEncoder;
  events: string[];
  snapshots: ConnectionSnapshot[];
}

const createHarness = (options: ConnectionManagerOptions = {}): Harness => {
  const events: string[] = [];
  const driver = new FakeDriver(events);
  const discovery = new FakeDiscovery();
  const access = new FakeAccess();
  const encoder = createEncoder();
  const manager = new ConnectionManager({
    driver,
    discovery,
    access,
    encoder,
    configIdSource: () => 0x1234,
    nonceSource: () => 100,
    ...options,
  });
  const snapshots: ConnectionSnapshot[] = [];
  manager.subscribe(snapshot => snapshots.push(snapshot));
  return { manager, driver, discovery, access, encoder, events, snapshots };
};

const statuses = (snapshots: ConnectionSnapshot[]): string[] => snapshots.map(s => s.status);

describe('ConnectionManager.connect', () => {
  it('opens the device, sends the handshake and reports Connected', async () => {
    const { manager, driver, snapshots } = createHarness();

    const session = await manager.connect();

    expect(manager.state).toBe(ConnectionState.Connected);
    expect(manager.currentSession).toBe(session);
    expect(manager.configId).toBe(0x1234);
    expect(driver.last.written).toEqual([encodeFrame(Uint8Array.of(CONFIG_REQUEST, 0x12, 0x34))]);
    expect(driver.lines).toEqual([{ baudRate: 115200, dataBits: 8, stopBits: 1, parity: 'none' }]);
    expect(statuses(snapshots)).toEqual(['Not connected', 'Opening /dev/ttyFAKE0', 'Connected (115200)']);
    expect(snapshots[2]?.sessionId).toBe(session.id);
    await manager.destroy();
  });

  it('asks for permission when the host has not granted it', async () => {
    const access = new FakeAccess(false, true);
    const { manager, snapshots } = createHarness({ access });

    await manager.connect();

    expect(access.requests).toBe(1);
    expect(snapshots.map(s => s.state)).toEqual([
      ConnectionState.Idle,
      ConnectionState.AwaitingPermission,
      ConnectionState.Opening,
      ConnectionState.Connected,
    ]);
    expect(snapshots[1]?.status).toBe('Requesting USB permission…');
    await manager.destroy();
  });

  it('returns to Idle when permission is denied', async () => {
    const access = new FakeAccess(false, false);
    const { manager, driver, snapshots } = createHarness({ access });

    await expect(manager.connect()).rejects.toMatchObject({ reason: 'permission-denied' });

    expect(access.requests).toBe(1);
    expect(manager.state).toBe(ConnectionState.Idle);
    expect(driver.channels).toHaveLength(0);
    const last = snapshots[snapshots.length - 1];
    expect(last?.status).toBe('USB permission denied');
    expect(last?.reason).toBe(DisconnectReason.PermissionDenied);
  });

  it('returns to Idle when the permission request itself fails', async () => {
    const access = new FakeAccess(false, true);
    access.requestImpl = async () => {
      throw new Error('host refused to prompt');
    };
    const { manager, driver, snapshots } = createHarness({ access });

    const error = await manager.connect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ChannelOpenFailureError);
    expect(error).toMatchObject({ reason: 'permission-denied', path: '/dev/ttyFAKE0' });
    expect(manager.state).toBe(ConnectionState.Idle);
    expect(driver.channels).toHaveLength(0);
    const last = snapshots[snapshots.length - 1];
    expect(last?.status).toBe('Error: Permission request failed: host refused to prompt');
    expect(last?.reason).toBe(DisconnectReason.PermissionDenied);
  });

  it('returns to Idle when the permission check fails', async () => {
    const access = new FakeAccess();
    access.checkImpl = async () => {
      throw new Error('stat failed');
    };
    const { manager, snapshots } = createHarness({ access });

    await expect(manager.connect()).rejects.toMatchObject({ reason: 'permission-denied' });

    expect(access.requests).toBe(0);
    expect(manager.state).toBe(ConnectionState.Idle);
    expect(statuses(snapshots)).toEqual(['Not connected', 'Error: Permission check failed: stat failed']);
  });

  it('fails with no-device when nothing matches', async () => {
    const { manager, discovery, snapshots } = createHarness();
    discovery.candidates = [];

    await expect(manager.connect()).rejects.toMatchObject({ reason: 'no-device' });

    expect(manager.state).toBe(ConnectionState.Idle);
    expect(snapshots[snapshots.length - 1]?.status).toBe('No serial drivers matched');
  });

  it('surfaces an open failure and stays Idle', async () => {
    const { manager, driver, snapshots } = createHarness();
    driver.failWith = busyPortError('/dev/ttyFAKE0');

    await expect(manager.connect()).rejects.toBe(driver.failWith);

    expect(manager.state).toBe(ConnectionState.Idle);
    expect(manager.currentSession).toBeNull();
    expect(statuses(snapshots)).toEqual(['Not connected', 'Opening /dev/ttyFAKE0', 'Error: Port busy']);
  });

  it('wraps unexpected open errors', async () => {
    const { manager, driver } = createHarness();
    driver.failWith = new Error('driver exploded');

    const error = await manager.connect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ChannelOpenFailureError);
    expect(error).toMatchObject({ reason: 'unknown', message: 'driver exploded' });
  });

  it('discards the session when the handshake cannot be written', async () => {
    const { manager, driver } = createHarness();
    driver.prepare = channel => {
      channel.writeImpl = async () => {
        throw new Error('EIO');
      };
    };

    await expect(manager.connect()).rejects.toMatchObject({ reason: 'handshake' });

    expect(manager.state).toBe(ConnectionState.Idle);
    expect(manager.currentSession).toBeNull();
    expect(driver.last.closeCalls).toBe(1);
  });

  it('shares one attempt between concurrent calls', async () => {
    const { manager, driver } = createHarness();

    const first = manager.connect();
    const second = manager.connect();

    expect(second).toBe(first);
    await first;
    expect(driver.channels).toHaveLength(1);
    await manager.destroy();
  });

  it('closes the live session before opening a new one', async () => {
    const { manager, events, snapshots } = createHarness();

    const first = await manager.connect();
    const second = await manager.connect();

    expect(events).toEqual(['open:/dev/ttyFAKE0', 'close:/dev/ttyFAKE0', 'open:/dev/ttyFAKE0']);
    expect(second.id).not.toBe(first.id);
    expect(first.isClosed).toBe(true);
    expect(snapshots.find(s => s.reason === DisconnectReason.Replaced)?.status).toBe('Disconnected');
    await manager.destroy();
  });

  it('never reuses the previous handshake id', async () => {
    const { manager } = createHarness({ configIdSource: () => 77 });

    await manager.connect();
    expect(manager.configId).toBe(77);
    await manager.connect();
    expect(manager.configId).toBe(78);
    await manager.destroy();
  });

  it('keeps handshake ids non-negative', async () => {
    const { manager } = createHarness({ configIdSource: () => 0xffffffff });

    await manager.connect();

    expect(manager.configId).toBe(0x7fffffff);
    await manager.destroy();
  });
});

describe('ConnectionManager while connected', () => {
  it('rejects sends without a session', async () => {
    const { manager } = createHarness();
    await expect(manager.send(Uint8Array.of(1))).rejects.toBeInstanceOf(SendRejectedError);
  });

  it('writes payloads on the live session', async () => {
    const { manager, driver } = createHarness();
    await manager.connect();

    await manager.send(Uint8Array.of(5, 6));

    expect(driver.last.written[1]).toEqual(encodeFrame(Uint8Array.of(5, 6)));
    await manager.destroy();
  });

  it('publishes an error snapshot for a failed write and stays Connected', async () => {
    const { manager, driver, snapshots } = createHarness();
    await manager.connect();
    driver.last.writeImpl = async () => {
      throw new Error('write timeout');
    };

    await expect(manager.send(Uint8Array.of(1))).rejects.toThrow('write timeout');

    expect(manager.state).toBe(ConnectionState.Connected);
    expect(snapshots[snapshots.length - 1]?.status).toBe('Error: write timeout');
    await manager.destroy();
  });

  it('drops to Idle on an I/O failure and does not reconnect', async () => {
    const { manager, driver, snapshots } = createHarness();
    await manager.connect();

    driver.last.emitError(new Error('device reset'));

    expect(manager.state).toBe(ConnectionState.Idle);
    expect(manager.currentSession).toBeNull();
    const last = snapshots[snapshots.length - 1];
    expect(last?.status).toBe('Connection lost');
    expect(last?.reason).toBe(DisconnectReason.ConnectionLost);
    expect(last?.error?.message).toBe('device reset');
    await flushPromises();
    expect(driver.last.closeCalls).toBe(1);
    expect(driver.channels).toHaveLength(1);
    await expect(manager.send(Uint8Array.of(1))).rejects.toBeInstanceOf(SendRejectedError);
  });

  it('sends the farewell and closes on disconnect', async () => {
    const encoder = { ...createEncoder(), encodeDisconnect: () => Uint8Array.of(FAREWELL) };
    const { manager, driver, snapshots } = createHarness({ encoder });
    await manager.connect();
    const channel = driver.last;

    await manager.disconnect();

    expect(channel.written[channel.written.length - 1]).toEqual(encodeFrame(Uint8Array.of(FAREWELL)));
    expect(channel.closeCalls).toBe(1);
    expect(manager.state).toBe(ConnectionState.Idle);
    const last = snapshots[snapshots.length - 1];
    expect(last?.status).toBe('Disconnected');
    expect(last?.reason).toBe(DisconnectReason.ManualDisconnect);
  });

  it('skips the farewell when disabled', async () => {
    const encoder = { ...createEncoder(), encodeDisconnect: () => Uint8Array.of(FAREWELL) };
    const { manager, driver } = createHarness({ encoder, notifyOnDisconnect: false });
    await manager.connect();

    await manager.disconnect();

    expect(driver.last.written).toHaveLength(1);
  });

  it('forwards decoded payloads to the payload handler', async () => {
    const { manager, driver } = createHarness();
    const received: Uint8Array[] = [];
    manager.setPayloadHandler(payload => received.push(payload));
    await manager.connect();

    driver.last.emitData(encodeFrame(Uint8Array.of(0x42)));

    expect(received).toEqual([Uint8Array.of(0x42)]);
    await manager.destroy();
  });

  it('drops observers and refuses to connect after destroy', async () => {
    const { manager, snapshots } = createHarness();
    await manager.connect();
    await manager.destroy();
    const seen = snapshots.length;

    await expect(manager.connect()).rejects.toThrow('destroyed');
    expect(snapshots).toHaveLength(seen);
  });
});

describe('ConnectionManager cancellation', () => {
  const hangWrites = (driver: FakeDriver): void => {
    driver.prepare = channel => {
      channel.writeImpl = () => new Promise<void>(() => {});
    };
  };

  it('disconnect cancels an attempt stuck on the handshake write', async () => {
    const { manager, driver, snapshots } = createHarness();
    hangWrites(driver);

    const connecting = manager.connect();
    await flushPromises();
    expect(manager.state).toBe(ConnectionState.Opening);

    await manager.disconnect();

    await expect(connecting).rejects.toMatchObject({ reason: 'cancelled' });
    expect(manager.state).toBe(ConnectionState.Idle);
    expect(manager.currentSession).toBeNull();
    expect(driver.last.closeCalls).toBe(1);
    const last = snapshots[snapshots.length - 1];
    expect(last?.status).toBe('Disconnected');
    expect(last?.reason).toBe(DisconnectReason.ManualDisconnect);
  });

  it('disconnect cancels an attempt waiting for permission', async () => {
    const access = new FakeAccess(false, true);
    access.requestImpl = () => new Promise<boolean>(() => {});
    const { manager, driver } = createHarness({ access });

    const connecting = manager.connect();
    await flushPromises();
    expect(manager.state).toBe(ConnectionState.AwaitingPermission);

    await manager.disconnect();

    await expect(connecting).rejects.toMatchObject({ reason: 'cancelled' });
    expect(manager.state).toBe(ConnectionState.Idle);
    expect(driver.channels).toHaveLength(0);
  });

  it('destroy releases a half-open channel', async () => {
    const { manager, driver, snapshots } = createHarness();
    hangWrites(driver);

    const connecting = manager.connect();
    await flushPromises();
    await manager.destroy();

    await expect(connecting).rejects.toMatchObject({ reason: 'cancelled' });
    expect(driver.last.closeCalls).toBe(1);
    expect(snapshots[snapshots.length - 1]?.reason).toBe(DisconnectReason.Destroyed);
  });

  it('a connect during the farewell shares the teardown', async () => {
    const encodeDisconnect = vi.fn(() => Uint8Array.of(FAREWELL));
    const encoder = { ...createEncoder(), encodeDisconnect };
    const { manager, driver } = createHarness({ encoder });
    await manager.connect();
    const first = driver.last;
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    first.writeImpl = () => gate;

    const disconnecting = manager.disconnect();
    const reconnecting = manager.connect();
    await flushPromises();
    release();
    await disconnecting;
    await reconnecting;

    expect(encodeDisconnect).toHaveBeenCalledTimes(1);
    expect(first.closeCalls).toBe(1);
    expect(driver.channels).toHaveLength(2);
    expect(manager.state).toBe(ConnectionState.Connected);
    await manager.destroy();
  });

  it('clears keepalive stats once the session is gone', async () => {
    const { manager } = createHarness();
    await manager.connect();
    expect(manager.heartbeatStats).toEqual({
      totalRuns: 0,
      failures: 0,
      lastNonce: null,
      lastError: null,
      lastRunTime: null,
    });

    await manager.disconnect();

    expect(manager.heartbeatStats).toBeNull();
  });
});

describe('ConnectionManager keepalive', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs the connect, keepalive, failure and reconnect cycle', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    const { manager, driver, encoder } = createHarness();

    const first = await manager.connect();
    const channel = driver.last;
    expect(encoder.encodeConfigRequest).toHaveBeenCalledTimes(1);

    for (let i = 0; i < 3; i++) {
      await vi.advanceTimersByTimeAsync(10_000);
      await flushPromises();
    }

    expect(channel.written).toEqual([
      encodeFrame(Uint8Array.of(CONFIG_REQUEST, 0x12, 0x34)),
      encodeFrame(Uint8Array.of(HEARTBEAT, 0x00, 100)),
      encodeFrame(Uint8Array.of(HEARTBEAT, 0x00, 101)),
      encodeFrame(Uint8Array.of(HEARTBEAT, 0x00, 102)),
    ]);
    expect(manager.heartbeatStats?.totalRuns).toBe(3);

    channel.emitError(new Error('cable pulled'));
    expect(manager.state).toBe(ConnectionState.Idle);

    await vi.advanceTimersByTimeAsync(30_000);
    await flushPromises();
    expect(channel.written).toHaveLength(4);
    expect(driver.channels).toHaveLength(1);

    const second = await manager.connect();
    expect(second.id).not.toBe(first.id);
    expect(driver.last).not.toBe(channel);
    expect(driver.last.written).toHaveLength(1);
    expect(manager.configId).toBe(0x1235);
    await manager.destroy();
  });

  it('sends no keepalives when disabled', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    const { manager, driver } = createHarness({ keepalive: false });
    await manager.connect();

    await vi.advanceTimersByTimeAsync(60_000);
    await flushPromises();

    expect(driver.last.written).toHaveLength(1);
    await manager.destroy();
  });
});
