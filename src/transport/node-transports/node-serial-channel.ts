// src/transport/node-transports/node-serial-channel.ts

import { SerialPort } from 'serialport';
import { rootLogger } from '../../logger.js';
import {
  ChannelClosedError,
  ChannelIOFailureError,
  ChannelOpenFailureError,
  type ChannelOpenFailureReason,
} from '../../errors.js';
import { fromNodeBuffer, toError } from '../../utils/utils.js';
import type {
  ByteChannel,
  ChannelDriver,
  DeviceCandidate,
  SerialLineConfig,
} from '../../types/link-types.js';

const logger = rootLogger.createLogger('NodeSerialChannel');

/**
 * The part of a `serialport` stream the channel relies on. `SerialPort` and
 * `SerialPortMock` both satisfy it.
 */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(event?: 'data' | 'error' | 'close'): unknown;
}

export interface SerialPortFactoryOptions extends SerialLineConfig {
  path: string;
  autoOpen: false;
}

export type SerialPortFactory = (options: SerialPortFactoryOptions) => SerialPortLike;

const defaultPortFactory: SerialPortFactory = options => new SerialPort(options);

/**
 * Maps the driver's open error text onto a failure reason.
 */
export function classifyOpenError(err: Error): ChannelOpenFailureReason {
  const message = err.message.toLowerCase();
  if (message.includes('permission') || message.includes('access denied') || message.includes('eacces'))
    return 'permission-denied';
  if (message.includes('busy') || message.includes('lock')) return 'busy';
  if (
    message.includes('no such file') ||
    message.includes('enoent') ||
    message.includes('not found') ||
    message.includes('does not exist')
  ) {
    return 'no-port';
  }
  return 'unknown';
}

/**
 * Byte channel over a Node `serialport` stream. Line settings are fixed when
 * the port is opened.
 */
export class NodeSerialChannel implements ByteChannel {
  public readonly path: string;
  private readonly port: SerialPortLike;
  private _isOpen: boolean = false;
  private _closing: boolean = false;

  private onData: ((chunk: Uint8Array) => void) | null = null;
  private onError: ((err: Error) => void) | null = null;
  private onClose: (() => void) | null = null;

  constructor(path: string, line: SerialLineConfig, portFactory: SerialPortFactory = defaultPortFactory) {
    this.path = path;
    this.port = portFactory({ ...line, path, autoOpen: false });
  }

  public get isOpen(): boolean {
    return this._isOpen && this.port.isOpen;
  }

  public setDataHandler(handler: (chunk: Uint8Array) => void): void {
    this.onData = handler;
  }

  public setErrorHandler(handler: (err: Error) => void): void {
    this.onError = handler;
  }

  public setCloseHandler(handler: () => void): void {
    this.onClose = handler;
  }

  /**
   * @throws ChannelOpenFailureError
   */
  public async open(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.port.open((err: Error | null) => {
        if (err) {
          const reason = classifyOpenError(err);
          reject(new ChannelOpenFailureError(reason, `Failed to open ${this.path}: ${err.message}`, this.path));
          return;
        }
        resolve();
      });
    });

    this._isOpen = true;
    this._removeAllListeners();
    this.port.on('data', (chunk: Buffer) => this._onData(chunk));
    this.port.on('error', (err: Error) => this._onError(err));
    this.port.on('close', () => this._onClose());
    logger.info('Serial port opened', { path: this.path });
  }

  public async write(data: Uint8Array): Promise<void> {
    if (!this.isOpen) throw new ChannelClosedError(`Port ${this.path} is closed`);
    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

    await new Promise<void>((resolve, reject) => {
      this.port.write(buffer, (err: Error | null | undefined) => {
        if (err) {
          reject(new ChannelIOFailureError(`Write to ${this.path} failed: ${err.message}`));
          return;
        }
        this.port.drain((drainErr: Error | null) => {
          if (drainErr) {
            reject(new ChannelIOFailureError(`Drain on ${this.path} failed: ${drainErr.message}`));
            return;
          }
          resolve();
        });
      });
    });
  }

  /**
   * Closes the port without reporting a close event. Idempotent.
   */
  public async close(): Promise<void> {
    if (this._closing) return;
    this._closing = true;
    this._isOpen = false;
    this._removeAllListeners();
    // a stream error emitted during teardown must not crash the process
    this.port.on('error', (err: Error) => logger.debug('Error while closing', err, { path: this.path }));

    if (!this.port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      this.port.close((err: Error | null) => {
        if (err) {
          reject(new ChannelIOFailureError(`Close of ${this.path} failed: ${err.message}`));
          return;
        }
        logger.debug('Serial port closed', { path: this.path });
        resolve();
      });
    });
  }

  private _removeAllListeners(): void {
    this.port.removeAllListeners('data');
    this.port.removeAllListeners('error');
    this.port.removeAllListeners('close');
  }

  private _onData(chunk: Buffer): void {
    if (!this._isOpen) return;
    this.onData?.(fromNodeBuffer(chunk));
  }

  private _onError(err: Error): void {
    logger.error(`Serial port error: ${err.message}`, { path: this.path });
    this.onError?.(new ChannelIOFailureError(err.message));
  }

  private _onClose(): void {
    if (this._closing) return;
    logger.warn('Serial port closed unexpectedly', { path: this.path });
    this._isOpen = false;
    this.onClose?.();
  }
}

/**
 * Opens `NodeSerialChannel`s. A custom port factory lets tests substitute
 * `SerialPortMock`.
 */
export class NodeSerialDriver implements ChannelDriver {
  constructor(private readonly portFactory: SerialPortFactory = defaultPortFactory) {}

  public async open(device: DeviceCandidate, line: SerialLineConfig): Promise<NodeSerialChannel> {
    let channel: NodeSerialChannel;
    try {
      channel = new NodeSerialChannel(device.path, line, this.portFactory);
    } catch (err: unknown) {
      const error = toError(err);
      throw new ChannelOpenFailureError('no-driver', `No serial driver for ${device.path}: ${error.message}`, device.path);
    }
    await channel.open();
    return channel;
  }
}
