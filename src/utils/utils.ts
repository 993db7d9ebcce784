// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a Big Endian 16-bit unsigned integer. Missing bytes read as zero.
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return ((buf[offset] ?? 0) << 8) | (buf[offset + 1] ?? 0);
}

/**
 * Returns a slice that shares the input's buffer.
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += `${HEX_TABLE[(b >> 4) & 0xf]}${HEX_TABLE[b & 0xf]}`;
  }
  return hex;
}

/**
 * Wraps a Node `Buffer` view without copying.
 */
export function fromNodeBuffer(data: Buffer): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Normalises anything thrown into an Error.
 */
export function toError(err: unknown, wrap: (message: string) => Error = m => new Error(m)): Error {
  return err instanceof Error ? err : wrap(String(err));
}
