// src/framers/stream-framer.ts

/**
 * Result of one decode pass over the retained buffer plus new bytes.
 */
export interface DecodeResult {
  /** Payloads completed by this pass, in stream order */
  payloads: Uint8Array[];
  /** Unconsumed tail to retain for the next pass */
  rest: Uint8Array;
  /** Bytes dropped while resynchronising */
  discarded: number;
}

/**
 * Incremental decoder bound to one byte stream.
 */
export interface StreamDecoder {
  /**
   * Appends a chunk and returns every payload it completes. Never throws on
   * malformed input.
   */
  push(chunk: Uint8Array): Uint8Array[];
  /** Number of bytes buffered and not yet resolved into a frame */
  readonly pending: number;
  reset(): void;
}

/**
 * Common interface for building and splitting frames on a byte stream.
 */
export interface StreamFramer {
  /**
   * Wraps a payload in the wire header.
   */
  buildFrame(payload: Uint8Array): Uint8Array;

  /**
   * Creates a decoder with its own buffer for one stream.
   */
  createDecoder(onDiscard?: (discarded: Uint8Array) => void): StreamDecoder;
}
