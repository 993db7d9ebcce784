import { describe, expect, it, vi } from 'vitest';

import { ConnectionStateTracker } from '../src/transport/trackers/ConnectionStateTracker.js';
import { ConnectionState, type ConnectionSnapshot } from '../src/types/link-types.js';

describe('ConnectionStateTracker', () => {
  it('starts Idle with "Not connected"', () => {
    const state = new ConnectionStateTracker().getState();
    expect(state.state).toBe(ConnectionState.Idle);
    expect(state.status).toBe('Not connected');
    expect(state.sessionId).toBeNull();
  });

  it('calls a new subscriber with the current snapshot', () => {
    const tracker = new ConnectionStateTracker();
    const handler = vi.fn();

    tracker.subscribe(handler);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ state: ConnectionState.Idle, status: 'Not connected' });
  });

  it('delivers every publish in order until unsubscribed', () => {
    const tracker = new ConnectionStateTracker();
    const statuses: string[] = [];
    const unsubscribe = tracker.subscribe(snapshot => statuses.push(snapshot.status));

    tracker.publish({ state: ConnectionState.Opening, status: 'Opening /dev/ttyACM0', sessionId: null, device: null });
    tracker.publish({ state: ConnectionState.Connected, status: 'Connected (115200)', sessionId: 's1', device: null });
    unsubscribe();
    tracker.publish({ state: ConnectionState.Idle, status: 'Disconnected', sessionId: null, device: null });

    expect(statuses).toEqual(['Not connected', 'Opening /dev/ttyACM0', 'Connected (115200)']);
    expect(tracker.getState().status).toBe('Disconnected');
  });

  it('hands out copies that observers cannot change', () => {
    const tracker = new ConnectionStateTracker();
    const device = { path: '/dev/ttyACM0' };
    let seen: ConnectionSnapshot | null = null;
    tracker.subscribe(snapshot => {
      seen = snapshot;
    });

    tracker.publish({ state: ConnectionState.Opening, status: 'Opening /dev/ttyACM0', sessionId: null, device });
    device.path = '/dev/other';

    expect(tracker.getState().device?.path).toBe('/dev/ttyACM0');
    expect(seen).not.toBe(null);
  });

  it('keeps notifying after a handler throws', () => {
    const tracker = new ConnectionStateTracker();
    const good = vi.fn();
    tracker.subscribe(() => {
      throw new Error('observer bug');
    });
    tracker.subscribe(good);

    tracker.publish({ state: ConnectionState.Opening, status: 'Opening x', sessionId: null, device: null });

    expect(good).toHaveBeenCalledTimes(2);
  });

  it('drops all observers on clear', () => {
    const tracker = new ConnectionStateTracker();
    const handler = vi.fn();
    tracker.subscribe(handler);
    tracker.clear();

    tracker.publish({ state: ConnectionState.Opening, status: 'Opening x', sessionId: null, device: null });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(tracker.subscriberCount).toBe(0);
  });
});
