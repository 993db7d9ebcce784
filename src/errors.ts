// src/errors.ts

import { FRAME } from './constants/constants.js';
import { toHex } from './utils/utils.js';

/**
 * Base class for all link errors
 */
export class LinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LinkError';
  }
}

/**
 * Error class for configuration validation failures
 */
export class LinkConfigError extends LinkError {
  constructor(message: string) {
    super(message);
    this.name = 'LinkConfigError';
  }
}

// --- Errors for Framing ---

/**
 * Payload does not fit in a single frame. Nothing was written.
 */
export class PayloadTooLargeError extends LinkError {
  readonly size: number;
  readonly max: number;

  constructor(size: number, max: number = FRAME.MAX_PAYLOAD) {
    super(`Payload too large: ${size} bytes exceeds maximum ${max} bytes`);
    this.name = 'PayloadTooLargeError';
    this.size = size;
    this.max = max;
  }
}

/**
 * Describes a resynchronisation event inside the decoder. Never thrown out of
 * decode; handed to diagnostics listeners only.
 */
export class MalformedFrameError extends LinkError {
  readonly discarded: number;

  constructor(discarded: Uint8Array) {
    const preview = discarded.length > 16 ? `${toHex(discarded.subarray(0, 16))}…` : toHex(discarded);
    super(`Discarded ${discarded.length} unframed bytes: ${preview}`);
    this.name = 'MalformedFrameError';
    this.discarded = discarded.length;
  }
}

// --- Errors for Connection and Transport ---

export type ChannelOpenFailureReason =
  | 'no-device'
  | 'no-driver'
  | 'no-port'
  | 'busy'
  | 'permission-denied'
  | 'handshake'
  | 'cancelled'
  | 'unknown';

/**
 * Error class for failures while attaching to a device. The connection is back in `Idle`.
 */
export class ChannelOpenFailureError extends LinkError {
  readonly reason: ChannelOpenFailureReason;
  readonly path?: string;

  constructor(reason: ChannelOpenFailureReason, message: string, path?: string) {
    super(message);
    this.name = 'ChannelOpenFailureError';
    this.reason = reason;
    this.path = path;
  }
}

/**
 * Error class for read/write failures on an open channel
 */
export class ChannelIOFailureError extends LinkError {
  constructor(message: string) {
    super(message);
    this.name = 'ChannelIOFailureError';
  }
}

/**
 * The session was closed before or during the operation.
 */
export class ChannelClosedError extends ChannelIOFailureError {
  constructor(message: string = 'Channel closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

/**
 * Send attempted while no session is open. The engine does not retry.
 */
export class SendRejectedError extends LinkError {
  constructor(message: string = 'No open session: connect before sending') {
    super(message);
    this.name = 'SendRejectedError';
  }
}

// --- Errors for Messages ---

/**
 * Error class for application messages that cannot be serialised
 */
export class MessageEncodeError extends LinkError {
  constructor(message: string) {
    super(message);
    this.name = 'MessageEncodeError';
  }
}

/**
 * Inbound payload did not match any known message. Carried in the decoded
 * result, never thrown to the receive loop.
 */
export class MessageDecodeError extends LinkError {
  constructor(message: string) {
    super(message);
    this.name = 'MessageDecodeError';
  }
}
