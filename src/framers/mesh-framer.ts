// src/framers/mesh-framer.ts

import { FRAME } from '../constants/constants.js';
import { PayloadTooLargeError } from '../errors.js';
import { bytesToUint16BE, concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';
import type { DecodeResult, StreamDecoder, StreamFramer } from './stream-framer.js';

const EMPTY = new Uint8Array(0);

/**
 * Builds `MAGIC1 MAGIC2 len_hi len_lo payload`. Pure.
 * @throws PayloadTooLargeError when the payload exceeds MAX_PAYLOAD
 */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > FRAME.MAX_PAYLOAD) {
    throw new PayloadTooLargeError(payload.length, FRAME.MAX_PAYLOAD);
  }
  const out = new Uint8Array(FRAME.HEADER_SIZE + payload.length);
  out[0] = FRAME.MAGIC1;
  out[1] = FRAME.MAGIC2;
  out[2] = (payload.length >> 8) & 0xff;
  out[3] = payload.length & 0xff;
  out.set(payload, FRAME.HEADER_SIZE);
  return out;
}

/**
 * One resynchronising decode pass over `buffer + incoming`.
 *
 * The cursor only ever moves forward by one byte on a mismatch (bad magic or
 * an out-of-range length), so a real header hidden inside a spurious length
 * field is still found. Emitted payloads are copies; `rest` may share memory
 * with the inputs.
 */
export function decodeFrames(
  incoming: Uint8Array,
  buffer: Uint8Array = EMPTY,
  onDiscard?: (discarded: Uint8Array) => void
): DecodeResult {
  const data = buffer.length === 0 ? incoming : concatUint8Arrays([buffer, incoming]);
  const payloads: Uint8Array[] = [];
  let discarded = 0;
  let cursor = 0;
  // start of the bytes skipped since the last emitted frame
  let skippedFrom = 0;

  const flushSkipped = (until: number): void => {
    if (until > skippedFrom) {
      discarded += until - skippedFrom;
      onDiscard?.(sliceUint8Array(data, skippedFrom, until));
    }
  };

  while (data.length - cursor >= FRAME.HEADER_SIZE) {
    if (data[cursor] !== FRAME.MAGIC1 || data[cursor + 1] !== FRAME.MAGIC2) {
      cursor += 1;
      continue;
    }

    const length = bytesToUint16BE(data, cursor + 2);
    if (length === 0 || length > FRAME.MAX_PAYLOAD) {
      cursor += 1;
      continue;
    }

    const total = FRAME.HEADER_SIZE + length;
    if (data.length - cursor < total) break;

    flushSkipped(cursor);
    payloads.push(data.slice(cursor + FRAME.HEADER_SIZE, cursor + total));
    cursor += total;
    skippedFrom = cursor;
  }

  flushSkipped(cursor);

  return {
    payloads,
    rest: cursor >= data.length ? EMPTY : sliceUint8Array(data, cursor),
    discarded,
  };
}

/**
 * Stateful decoder: keeps the unresolved tail between pushes.
 */
export class FrameDecoder implements StreamDecoder {
  private buffer: Uint8Array = EMPTY;
  private _discarded = 0;

  constructor(private readonly onDiscard?: (discarded: Uint8Array) => void) {}

  public push(chunk: Uint8Array): Uint8Array[] {
    const { payloads, rest, discarded } = decodeFrames(chunk, this.buffer, this.onDiscard);
    // copy the tail so the caller's chunk can be reused
    this.buffer = rest.length === 0 ? EMPTY : rest.slice();
    this._discarded += discarded;
    return payloads;
  }

  public get pending(): number {
    return this.buffer.length;
  }

  /** Total bytes dropped by resynchronisation since creation or reset */
  public get discarded(): number {
    return this._discarded;
  }

  public reset(): void {
    this.buffer = EMPTY;
    this._discarded = 0;
  }
}

export class MeshFramer implements StreamFramer {
  public buildFrame(payload: Uint8Array): Uint8Array {
    return encodeFrame(payload);
  }

  public createDecoder(onDiscard?: (discarded: Uint8Array) => void): FrameDecoder {
    return new FrameDecoder(onDiscard);
  }
}
