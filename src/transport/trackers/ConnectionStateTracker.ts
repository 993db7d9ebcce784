// src/transport/trackers/ConnectionStateTracker.ts

import { rootLogger } from '../../logger.js';
import { toError } from '../../utils/utils.js';
import {
  ConnectionState,
  type ConnectionSnapshot,
  type ConnectionStateHandler,
} from '../../types/link-types.js';

const logger = rootLogger.createLogger('ConnectionStateTracker');

export type SnapshotUpdate = Omit<ConnectionSnapshot, 'timestamp'>;

function copySnapshot(snapshot: ConnectionSnapshot): ConnectionSnapshot {
  return { ...snapshot, device: snapshot.device ? { ...snapshot.device } : null };
}

/**
 * Holds the latest connection snapshot and fans it out to observers.
 * Every publish is delivered synchronously, in order, as an immutable copy.
 */
export class ConnectionStateTracker {
  private readonly _subscribers = new Set<ConnectionStateHandler>();
  private _state: ConnectionSnapshot;

  constructor() {
    this._state = {
      state: ConnectionState.Idle,
      status: 'Not connected',
      sessionId: null,
      device: null,
      timestamp: Date.now(),
    };
  }

  /**
   * Adds an observer and calls it with the current snapshot.
   * @returns a function that removes the observer
   */
  public subscribe(handler: ConnectionStateHandler): () => void {
    this._subscribers.add(handler);
    this._deliver(handler, this._state);
    return () => {
      this._subscribers.delete(handler);
    };
  }

  public publish(update: SnapshotUpdate): ConnectionSnapshot {
    this._state = Object.freeze(copySnapshot({ ...update, timestamp: Date.now() }));
    for (const subscriber of [...this._subscribers]) {
      this._deliver(subscriber, this._state);
    }
    return copySnapshot(this._state);
  }

  /**
   * Returns a copy of the current snapshot.
   */
  public getState(): ConnectionSnapshot {
    return copySnapshot(this._state);
  }

  public get subscriberCount(): number {
    return this._subscribers.size;
  }

  /**
   * Drops every observer. The snapshot is kept.
   */
  public clear(): void {
    this._subscribers.clear();
  }

  private _deliver(handler: ConnectionStateHandler, snapshot: ConnectionSnapshot): void {
    try {
      handler(copySnapshot(snapshot));
    } catch (err: unknown) {
      logger.error('Connection state handler failed', toError(err), { state: snapshot.state });
    }
  }
}
