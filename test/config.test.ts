import { describe, expect, it } from 'vitest';

import { DEFAULT_LINK_OPTIONS, lineConfigFor, resolveLinkOptions } from '../src/config.js';
import { LinkConfigError } from '../src/errors.js';

describe('resolveLinkOptions', () => {
  it('returns the defaults when nothing is given', () => {
    expect(resolveLinkOptions()).toEqual(DEFAULT_LINK_OPTIONS);
    expect(DEFAULT_LINK_OPTIONS.baudRate).toBe(115200);
    expect(DEFAULT_LINK_OPTIONS.keepaliveIntervalMs).toBe(10_000);
  });

  it('lower-cases vendor ids', () => {
    expect(resolveLinkOptions({ vendorIds: ['239A', '10C4'] }).vendorIds).toEqual(['239a', '10c4']);
  });

  it.each([0, 299, 921601, 9600.5])('rejects baud rate %s', baudRate => {
    expect(() => resolveLinkOptions({ baudRate })).toThrow(LinkConfigError);
  });

  it('rejects a non-positive keepalive interval', () => {
    expect(() => resolveLinkOptions({ keepaliveIntervalMs: 0 })).toThrow(LinkConfigError);
  });

  it('rejects a blank path', () => {
    expect(() => resolveLinkOptions({ path: '  ' })).toThrow('Device path must not be empty');
  });

  it('requires a path when no vendor ids are given', () => {
    expect(() => resolveLinkOptions({ vendorIds: [] })).toThrow(LinkConfigError);
    expect(resolveLinkOptions({ vendorIds: [], path: '/dev/ttyUSB0' }).path).toBe('/dev/ttyUSB0');
  });

  it('rejects malformed vendor ids', () => {
    expect(() => resolveLinkOptions({ vendorIds: ['23a'] })).toThrow(LinkConfigError);
  });
});

describe('lineConfigFor', () => {
  it('fixes 8 data bits, 1 stop bit and no parity', () => {
    expect(lineConfigFor(resolveLinkOptions({ baudRate: 57600 }))).toEqual({
      baudRate: 57600,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
    });
  });
});
