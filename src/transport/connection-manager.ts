// src/transport/connection-manager.ts

import { randomInt } from 'node:crypto';
import { KEEPALIVE } from '../constants/constants.js';
import { lineConfigFor, resolveLinkOptions, type LinkOptions, type ResolvedLinkOptions } from '../config.js';
import {
  ChannelClosedError,
  ChannelIOFailureError,
  ChannelOpenFailureError,
  LinkError,
  SendRejectedError,
  type MalformedFrameError,
} from '../errors.js';
import { rootLogger } from '../logger.js';
import { MeshCodec } from '../messages/mesh-codec.js';
import { toError } from '../utils/utils.js';
import { SerialDeviceDiscovery } from './discovery/serial-discovery.js';
import { NodeDeviceAccess } from './discovery/device-access.js';
import { NodeSerialDriver } from './node-transports/node-serial-channel.js';
import { HeartbeatTask } from './heartbeat-task.js';
import { LinkSession } from './link-session.js';
import { ConnectionStateTracker } from './trackers/ConnectionStateTracker.js';
import type { StreamFramer } from '../framers/stream-framer.js';
import {
  ConnectionState,
  DisconnectReason,
  type ByteChannel,
  type ChannelDriver,
  type ConnectionSnapshot,
  type ConnectionStateHandler,
  type ControlMessageEncoder,
  type DeviceAccess,
  type DeviceCandidate,
  type DeviceDiscovery,
  type HeartbeatStats,
  type PayloadHandler,
} from '../types/link-types.js';

const logger = rootLogger.createLogger('ConnectionManager');

export interface ConnectionManagerOptions extends LinkOptions {
  discovery?: DeviceDiscovery;
  access?: DeviceAccess;
  driver?: ChannelDriver;
  /** Builds the handshake, keepalive and farewell payloads */
  encoder?: ControlMessageEncoder;
  framer?: StreamFramer;
  /** Source for handshake correlation ids; masked to 31 bits */
  configIdSource?: () => number;
  /** Source for the first keepalive nonce of each session */
  nonceSource?: () => number;
  onMalformed?: (error: MalformedFrameError) => void;
}

interface TransitionDetails {
  reason?: DisconnectReason;
  error?: Error;
}

/** One `connect()` call in flight; cancelled by `disconnect()` or `destroy()` */
interface ConnectAttempt {
  cancelled: boolean;
  reason: DisconnectReason;
  cancel: () => void;
  cancelSignal: Promise<void>;
}

type Raced<T> = { done: true; value: T } | { done: false };

function createAttempt(): ConnectAttempt {
  let cancel: () => void = () => {};
  const cancelSignal = new Promise<void>(resolve => {
    cancel = resolve;
  });
  return { cancelled: false, reason: DisconnectReason.ManualDisconnect, cancel, cancelSignal };
}

/**
 * Owns the connection lifecycle: discovery, permission, open, handshake,
 * keepalive and teardown. At most one live session exists at a time and the
 * link is never reopened without an explicit `connect()`.
 */
export class ConnectionManager {
  private readonly options: ResolvedLinkOptions;
  private readonly discovery: DeviceDiscovery;
  private readonly access: DeviceAccess;
  private readonly driver: ChannelDriver;
  private readonly encoder: ControlMessageEncoder;
  private readonly framer?: StreamFramer;
  private readonly configIdSource: () => number;
  private readonly nonceSource: () => number;
  private readonly onMalformed?: (error: MalformedFrameError) => void;
  private readonly tracker = new ConnectionStateTracker();

  private _state: ConnectionState = ConnectionState.Idle;
  private session: LinkSession | null = null;
  private device: DeviceCandidate | null = null;
  private heartbeat: HeartbeatTask | null = null;
  private payloadHandler: PayloadHandler | null = null;
  private lastConfigId: number | null = null;
  private pendingClose: Promise<void> | null = null;
  private closing: { session: LinkSession; done: Promise<void> } | null = null;
  private attempt: ConnectAttempt | null = null;
  private destroyed: boolean = false;

  private _isConnecting: boolean = false;
  private _connectionPromise: Promise<LinkSession> | null = null;

  constructor(options: ConnectionManagerOptions = {}) {
    this.options = resolveLinkOptions(options);
    if (options.logLevel) rootLogger.setLevel(options.logLevel);

    this.discovery =
      options.discovery ??
      new SerialDeviceDiscovery({ path: this.options.path, vendorIds: this.options.vendorIds });
    this.access = options.access ?? new NodeDeviceAccess();
    this.driver = options.driver ?? new NodeSerialDriver();
    this.encoder = options.encoder ?? MeshCodec.load();
    this.framer = options.framer;
    this.configIdSource = options.configIdSource ?? (() => Date.now());
    this.nonceSource = options.nonceSource ?? (() => randomInt(0, KEEPALIVE.MAX_NONCE + 1));
    this.onMalformed = options.onMalformed;
  }

  public get state(): ConnectionState {
    return this._state;
  }

  public get status(): string {
    return this.tracker.getState().status;
  }

  public get snapshot(): ConnectionSnapshot {
    return this.tracker.getState();
  }

  /** The live session, or null when not Connected */
  public get currentSession(): LinkSession | null {
    return this.session;
  }

  public get isConnecting(): boolean {
    return this._isConnecting;
  }

  /** Id sent in the most recent handshake */
  public get configId(): number | null {
    return this.lastConfigId;
  }

  public get heartbeatStats(): HeartbeatStats | null {
    return this.heartbeat ? { ...this.heartbeat.stats } : null;
  }

  public get resolvedOptions(): ResolvedLinkOptions {
    return this.options;
  }

  /**
   * Adds a state observer. It is called at once with the current snapshot.
   * @returns a function that removes the observer
   */
  public subscribe(handler: ConnectionStateHandler): () => void {
    return this.tracker.subscribe(handler);
  }

  public setPayloadHandler(handler: PayloadHandler | null): void {
    this.payloadHandler = handler;
  }

  /**
   * Attaches to the first matching device and performs the handshake. A call
   * made while an attempt is running joins that attempt. When already
   * Connected the current session is closed first.
   * @throws ChannelOpenFailureError
   */
  public connect(): Promise<LinkSession> {
    if (this._isConnecting && this._connectionPromise) {
      logger.debug('Connection attempt already in progress');
      return this._connectionPromise;
    }

    this._isConnecting = true;
    const attempt = createAttempt();
    this.attempt = attempt;
    this._connectionPromise = this._connect(attempt).finally(() => {
      this._isConnecting = false;
      this._connectionPromise = null;
      if (this.attempt === attempt) this.attempt = null;
    });
    return this._connectionPromise;
  }

  /**
   * Closes the live session and returns to Idle. An attempt still in
   * progress is cancelled and its pending handshake write rejected.
   */
  public async disconnect(): Promise<void> {
    this._cancelAttempt(DisconnectReason.ManualDisconnect);
    await this._settlePendingConnect();
    const session = this.session;
    if (!session) {
      logger.debug('Disconnect requested with no open session');
      return;
    }
    await this._closeSession(session, DisconnectReason.ManualDisconnect, 'Disconnected');
  }

  /**
   * Writes one payload on the live session.
   * @throws SendRejectedError when no session is open
   * @throws ChannelIOFailureError when the write fails
   */
  public async send(payload: Uint8Array): Promise<void> {
    const session = this.session;
    if (!session || this._state !== ConnectionState.Connected) {
      throw new SendRejectedError();
    }

    try {
      await session.send(payload);
    } catch (err: unknown) {
      const error = toError(err);
      if (
        error instanceof ChannelIOFailureError &&
        !(error instanceof ChannelClosedError) &&
        this.session === session
      ) {
        this._publish(`Error: ${error.message}`, { error });
      }
      throw error;
    }
  }

  /**
   * Next packet id on the live session.
   * @throws SendRejectedError when no session is open
   */
  public nextPacketId(): number {
    if (!this.session) throw new SendRejectedError();
    return this.session.nextPacketId();
  }

  /**
   * Disconnects and drops every observer. The manager cannot connect again.
   */
  public async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    this._cancelAttempt(DisconnectReason.Destroyed);
    await this._settlePendingConnect();
    const session = this.session;
    if (session) {
      await this._closeSession(session, DisconnectReason.Destroyed, 'Disconnected');
    }
    await this.pendingClose;
    this.payloadHandler = null;
    this.tracker.clear();
    logger.debug('Connection manager destroyed');
  }

  private async _connect(attempt: ConnectAttempt): Promise<LinkSession> {
    if (this.destroyed) throw new LinkError('Connection manager has been destroyed');

    if (this.session) {
      await this._closeSession(this.session, DisconnectReason.Replaced, 'Disconnected');
    }
    if (this.pendingClose) await this.pendingClose;

    let found: Raced<DeviceCandidate[]>;
    try {
      found = await this._raceCancel(attempt, this.discovery.findCandidates());
    } catch (err: unknown) {
      throw this._openFailed(
        new ChannelOpenFailureError('unknown', `Device discovery failed: ${toError(err).message}`)
      );
    }
    if (!found.done) throw this._cancelled(attempt);

    const device = found.value[0];
    if (!device) {
      const error = new ChannelOpenFailureError('no-device', 'No serial drivers matched');
      this.device = null;
      this._transition(ConnectionState.Idle, 'No serial drivers matched', {
        reason: DisconnectReason.OpenFailed,
        error,
      });
      throw error;
    }
    this.device = device;
    logger.info(`Using device ${device.path}`, { path: device.path });

    let allowed: Raced<boolean>;
    try {
      allowed = await this._raceCancel(attempt, this.access.hasPermission(device));
    } catch (err: unknown) {
      throw this._permissionFailed(`Permission check failed: ${toError(err).message}`, device.path);
    }
    if (!allowed.done) throw this._cancelled(attempt, device.path);

    if (!allowed.value) {
      this._transition(ConnectionState.AwaitingPermission, 'Requesting USB permission…');
      let granted: Raced<boolean>;
      try {
        granted = await this._raceCancel(attempt, this.access.requestPermission(device));
      } catch (err: unknown) {
        throw this._permissionFailed(`Permission request failed: ${toError(err).message}`, device.path);
      }
      if (!granted.done) throw this._cancelled(attempt, device.path);
      if (!granted.value) {
        const error = new ChannelOpenFailureError('permission-denied', 'USB permission denied', device.path);
        this._transition(ConnectionState.Idle, 'USB permission denied', {
          reason: DisconnectReason.PermissionDenied,
          error,
        });
        throw error;
      }
    }

    this._transition(ConnectionState.Opening, `Opening ${device.path}`);

    const opening = this.driver.open(device, lineConfigFor(this.options));
    let opened: Raced<ByteChannel>;
    try {
      opened = await this._raceCancel(attempt, opening);
    } catch (err: unknown) {
      const error =
        err instanceof ChannelOpenFailureError
          ? err
          : new ChannelOpenFailureError('unknown', toError(err).message, device.path);
      throw this._openFailed(error);
    }
    if (!opened.done) {
      // the driver may still hand over a channel once it settles
      opening
        .then(channel => channel.close())
        .catch((err: unknown) => {
          logger.debug(`Late channel not released: ${toError(err).message}`, { path: device.path });
        });
      throw this._cancelled(attempt, device.path);
    }
    const channel = opened.value;

    const session: LinkSession = new LinkSession(channel, {
      framer: this.framer,
      onPayload: payload => this._onPayload(payload),
      onFailure: error => this._onSessionFailure(session, error),
      onMalformed: this.onMalformed,
    });

    const configId = this._nextConfigId();
    let sent: Raced<void>;
    try {
      sent = await this._raceCancel(attempt, session.send(this.encoder.encodeConfigRequest(configId)));
    } catch (err: unknown) {
      await session.close();
      throw this._openFailed(
        new ChannelOpenFailureError('handshake', `Handshake failed: ${toError(err).message}`, device.path)
      );
    }
    if (!sent.done || attempt.cancelled) {
      // closing rejects the pending write with ChannelClosedError
      await session.close();
      throw this._cancelled(attempt, device.path);
    }

    if (session.failed || this.destroyed) {
      await session.close();
      throw this._openFailed(
        new ChannelOpenFailureError('handshake', `Channel lost during handshake on ${device.path}`, device.path)
      );
    }

    this.lastConfigId = configId;
    this.session = session;
    this._transition(ConnectionState.Connected, `Connected (${this.options.baudRate})`);
    logger.info(`Handshake sent, config id ${configId}`, { sessionId: session.id, path: device.path });

    this._startHeartbeat(session);
    return session;
  }

  private _startHeartbeat(session: LinkSession): void {
    if (!this.options.keepalive) return;
    this.heartbeat = new HeartbeatTask({
      intervalMs: this.options.keepaliveIntervalMs,
      initialNonce: this.nonceSource(),
      sessionId: session.id,
      shouldRun: () => this._state === ConnectionState.Connected && this.session === session,
      send: nonce => this.send(this.encoder.encodeHeartbeat(nonce)),
    });
    this.heartbeat.start();
  }

  private _stopHeartbeat(): void {
    this.heartbeat?.stop();
    this.heartbeat = null;
  }

  private _onPayload(payload: Uint8Array): void {
    this.payloadHandler?.(payload);
  }

  private _onSessionFailure(session: LinkSession, error: Error): void {
    if (this.session !== session) return;
    logger.error(`Connection lost: ${error.message}`, { sessionId: session.id, path: session.path });

    this._stopHeartbeat();
    this.session = null;
    this._transition(ConnectionState.Idle, 'Connection lost', {
      reason: DisconnectReason.ConnectionLost,
      error,
    });
    this.pendingClose = session.close().finally(() => {
      this.pendingClose = null;
    });
  }

  /**
   * Callers closing the same session share one teardown.
   */
  private _closeSession(session: LinkSession, reason: DisconnectReason, status: string): Promise<void> {
    if (this.closing?.session === session) return this.closing.done;
    const done = this._teardownSession(session, reason, status).finally(() => {
      if (this.closing?.session === session) this.closing = null;
    });
    this.closing = { session, done };
    return done;
  }

  private async _teardownSession(session: LinkSession, reason: DisconnectReason, status: string): Promise<void> {
    this._stopHeartbeat();

    if (
      this.options.notifyOnDisconnect &&
      this.encoder.encodeDisconnect &&
      !session.failed &&
      !session.isClosed
    ) {
      try {
        await session.send(this.encoder.encodeDisconnect());
      } catch (err: unknown) {
        logger.warn(`Farewell not sent: ${toError(err).message}`, { sessionId: session.id });
      }
    }

    // a failure during the farewell may already have torn the session down
    if (this.session === session) {
      this.session = null;
      await session.close();
      this._transition(ConnectionState.Idle, status, { reason });
    } else {
      await session.close();
    }
  }

  private async _settlePendingConnect(): Promise<void> {
    const pending = this._connectionPromise;
    if (!pending) return;
    try {
      await pending;
    } catch (err: unknown) {
      logger.debug(`Pending connection attempt failed: ${toError(err).message}`);
    }
  }

  private _cancelAttempt(reason: DisconnectReason): void {
    const attempt = this.attempt;
    if (!attempt || attempt.cancelled) return;
    logger.info('Cancelling connection attempt', { state: this._state });
    attempt.cancelled = true;
    attempt.reason = reason;
    attempt.cancel();
  }

  /**
   * Settles with the work's value, or with `done: false` once the attempt is
   * cancelled. Work rejecting after a cancel is ignored.
   */
  private _raceCancel<T>(attempt: ConnectAttempt, work: Promise<T>): Promise<Raced<T>> {
    return Promise.race([
      work.then((value): Raced<T> => ({ done: true, value })),
      attempt.cancelSignal.then((): Raced<T> => ({ done: false })),
    ]);
  }

  private _cancelled(attempt: ConnectAttempt, path?: string): ChannelOpenFailureError {
    this._transition(ConnectionState.Idle, 'Disconnected', { reason: attempt.reason });
    return new ChannelOpenFailureError('cancelled', 'Connection attempt cancelled', path);
  }

  private _permissionFailed(message: string, path: string): ChannelOpenFailureError {
    return this._openFailed(
      new ChannelOpenFailureError('permission-denied', message, path),
      DisconnectReason.PermissionDenied
    );
  }

  private _openFailed(
    error: ChannelOpenFailureError,
    reason: DisconnectReason = DisconnectReason.OpenFailed
  ): ChannelOpenFailureError {
    this._transition(ConnectionState.Idle, `Error: ${error.message}`, { reason, error });
    return error;
  }

  /**
   * Non-negative 31-bit id, different from the previous handshake's.
   */
  private _nextConfigId(): number {
    let id = this.configIdSource() & 0x7fffffff;
    if (id === this.lastConfigId) id = (id + 1) & 0x7fffffff;
    return id;
  }

  private _transition(state: ConnectionState, status: string, details: TransitionDetails = {}): void {
    const previous = this._state;
    this._state = state;
    if (state !== ConnectionState.Connected) this._stopHeartbeat();
    logger.info(`${previous} -> ${state}: ${status}`, { state, path: this.device?.path });
    this._publish(status, details);
  }

  private _publish(status: string, details: TransitionDetails = {}): void {
    this.tracker.publish({
      state: this._state,
      status,
      sessionId: this.session?.id ?? null,
      device: this.device,
      ...details,
    });
  }
}
