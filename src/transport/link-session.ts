// src/transport/link-session.ts

import { randomUUID } from 'node:crypto';
import { Mutex } from 'async-mutex';
import { rootLogger } from '../logger.js';
import { MeshFramer } from '../framers/mesh-framer.js';
import { ChannelClosedError, ChannelIOFailureError, MalformedFrameError } from '../errors.js';
import { LinkStats } from '../utils/link-stats.js';
import { toError } from '../utils/utils.js';
import type { StreamDecoder, StreamFramer } from '../framers/stream-framer.js';
import type {
  ByteChannel,
  LinkStatsSnapshot,
  PayloadHandler,
  SessionFailureHandler,
} from '../types/link-types.js';

const logger = rootLogger.createLogger('LinkSession');

export interface LinkSessionOptions {
  /** Receives every decoded payload, in arrival order */
  onPayload?: PayloadHandler;
  /** Called at most once, when the channel fails or closes on its own */
  onFailure?: SessionFailureHandler;
  /** Called for every run of bytes dropped while resynchronising */
  onMalformed?: (error: MalformedFrameError) => void;
  framer?: StreamFramer;
}

/**
 * One physical connection. Owns the channel, its decode buffer and the packet
 * id counter. Writes are serialised; decoding happens synchronously inside the
 * channel's data callback.
 */
export class LinkSession {
  public readonly id: string = randomUUID();
  public readonly openedAt: number = Date.now();

  private readonly channel: ByteChannel;
  private readonly framer: StreamFramer;
  private readonly decoder: StreamDecoder;
  private readonly writeMutex = new Mutex();
  private readonly _stats = new LinkStats();

  private readonly onPayload?: PayloadHandler;
  private readonly onFailure?: SessionFailureHandler;
  private readonly onMalformed?: (error: MalformedFrameError) => void;

  private packetId: number = 0;
  private _failed: boolean = false;
  private _closed: boolean = false;
  private closePromise: Promise<void> | null = null;
  private signalClosed: () => void = () => {};
  private readonly closedSignal: Promise<void> = new Promise<void>(resolve => {
    this.signalClosed = resolve;
  });

  constructor(channel: ByteChannel, options: LinkSessionOptions = {}) {
    this.channel = channel;
    this.framer = options.framer ?? new MeshFramer();
    this.onPayload = options.onPayload;
    this.onFailure = options.onFailure;
    this.onMalformed = options.onMalformed;
    this.decoder = this.framer.createDecoder(discarded => this._onDiscard(discarded));

    channel.setDataHandler(chunk => this.onBytes(chunk));
    channel.setErrorHandler(err => this._fail(err));
    channel.setCloseHandler(() => this._fail(new ChannelClosedError(`Port ${channel.path} closed`)));

    logger.debug('Session created', { sessionId: this.id, path: channel.path });
  }

  public get path(): string {
    return this.channel.path;
  }

  public get isClosed(): boolean {
    return this._closed;
  }

  /** True once the channel reported a terminal failure */
  public get failed(): boolean {
    return this._failed;
  }

  public get stats(): LinkStatsSnapshot {
    return this._stats.snapshot();
  }

  /** Bytes buffered by the decoder that do not yet form a frame */
  public get pendingBytes(): number {
    return this.decoder.pending;
  }

  /**
   * Frames and writes one payload. Concurrent calls are written one at a time
   * in call order.
   * @throws PayloadTooLargeError before anything is written
   * @throws ChannelClosedError if the session is closed before the write completes
   * @throws ChannelIOFailureError if the channel rejects the write
   */
  public async send(payload: Uint8Array): Promise<void> {
    if (this._closed) throw new ChannelClosedError('Session is closed');
    const frame = this.framer.buildFrame(payload);

    const write = this.writeMutex.runExclusive(() => this._writeFrame(frame));
    const outcome: Error | null = await Promise.race([
      write.then(
        () => null,
        (err: unknown) => toError(err)
      ),
      this.closedSignal.then(() => new ChannelClosedError('Session closed during write')),
    ]);
    if (outcome) throw outcome;
  }

  /**
   * Feeds received bytes to the decoder and hands every completed payload to
   * the consumer before returning.
   */
  public onBytes(data: Uint8Array): void {
    if (this._closed) return;
    const payloads = this.decoder.push(data);
    this._stats.recordReceived(data.length, payloads.length);
    if (payloads.length > 0) {
      logger.trace(`Decoded ${payloads.length} frame(s)`, { sessionId: this.id, length: data.length });
    }
    for (const payload of payloads) {
      try {
        this.onPayload?.(payload);
      } catch (err: unknown) {
        logger.error('Payload consumer failed', toError(err), { sessionId: this.id });
      }
    }
  }

  /**
   * Next id for an acknowledgeable packet. Unsigned 32-bit, never 0.
   */
  public nextPacketId(): number {
    this.packetId = (this.packetId + 1) >>> 0;
    if (this.packetId === 0) this.packetId = 1;
    return this.packetId;
  }

  /**
   * Releases the channel. In-flight sends reject with ChannelClosedError.
   * Safe to call repeatedly and after a failure.
   */
  public close(): Promise<void> {
    if (this.closePromise) return this.closePromise;
    this._closed = true;
    this.signalClosed();
    this.closePromise = this.channel.close().then(
      () => {
        logger.debug('Session closed', { sessionId: this.id, path: this.channel.path });
      },
      (err: unknown) => {
        // the channel is unusable either way
        logger.warn('Channel close failed', toError(err), { sessionId: this.id, path: this.channel.path });
      }
    );
    return this.closePromise;
  }

  private async _writeFrame(frame: Uint8Array): Promise<void> {
    if (this._closed) throw new ChannelClosedError('Session is closed');
    try {
      await this.channel.write(frame);
    } catch (err: unknown) {
      this._stats.recordSendError();
      if (this._closed) throw new ChannelClosedError('Session closed during write');
      const error =
        err instanceof ChannelIOFailureError ? err : new ChannelIOFailureError(toError(err).message);
      logger.warn(`Write failed: ${error.message}`, { sessionId: this.id, length: frame.length });
      if (!this.channel.isOpen) this._fail(error);
      throw error;
    }
    this._stats.recordSent(frame.length);
    logger.trace('Frame written', { sessionId: this.id, length: frame.length });
  }

  private _onDiscard(discarded: Uint8Array): void {
    this._stats.recordDiscarded(discarded.length);
    const error = new MalformedFrameError(discarded);
    logger.debug(error.message, { sessionId: this.id });
    this.onMalformed?.(error);
  }

  private _fail(error: Error): void {
    if (this._failed || this._closed) return;
    this._failed = true;
    logger.error(`Session failed: ${error.message}`, { sessionId: this.id, path: this.channel.path });
    this.onFailure?.(error);
  }
}
