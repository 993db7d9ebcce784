// src/config.ts

import { KEEPALIVE, KNOWN_RADIO_VENDOR_IDS, SERIAL_LINE } from './constants/constants.js';
import { LinkConfigError } from './errors.js';
import type { LogLevel, SerialLineConfig } from './types/link-types.js';

/** Options accepted by the connection manager and client */
export interface LinkOptions {
  /** Serial device to use; skips vendor id matching when set */
  path?: string;
  baudRate?: number;
  /** Lower-case hex USB vendor ids that identify a radio */
  vendorIds?: readonly string[];
  keepaliveIntervalMs?: number;
  /** Disable to never send keepalives */
  keepalive?: boolean;
  /** Send a disconnect message to the radio before an explicit disconnect */
  notifyOnDisconnect?: boolean;
  logLevel?: LogLevel;
}

export interface ResolvedLinkOptions {
  path: string | null;
  baudRate: number;
  vendorIds: readonly string[];
  keepaliveIntervalMs: number;
  keepalive: boolean;
  notifyOnDisconnect: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_LINK_OPTIONS: ResolvedLinkOptions = {
  path: null,
  baudRate: SERIAL_LINE.DEFAULT_BAUD_RATE,
  vendorIds: KNOWN_RADIO_VENDOR_IDS,
  keepaliveIntervalMs: KEEPALIVE.DEFAULT_INTERVAL_MS,
  keepalive: true,
  notifyOnDisconnect: true,
  logLevel: 'info',
};

/**
 * Merges options over the defaults and validates the result.
 * @throws LinkConfigError
 */
export function resolveLinkOptions(options: LinkOptions = {}): ResolvedLinkOptions {
  const resolved: ResolvedLinkOptions = {
    path: options.path ?? DEFAULT_LINK_OPTIONS.path,
    baudRate: options.baudRate ?? DEFAULT_LINK_OPTIONS.baudRate,
    vendorIds: (options.vendorIds ?? DEFAULT_LINK_OPTIONS.vendorIds).map(id => id.toLowerCase()),
    keepaliveIntervalMs: options.keepaliveIntervalMs ?? DEFAULT_LINK_OPTIONS.keepaliveIntervalMs,
    keepalive: options.keepalive ?? DEFAULT_LINK_OPTIONS.keepalive,
    notifyOnDisconnect: options.notifyOnDisconnect ?? DEFAULT_LINK_OPTIONS.notifyOnDisconnect,
    logLevel: options.logLevel ?? DEFAULT_LINK_OPTIONS.logLevel,
  };

  if (
    !Number.isInteger(resolved.baudRate) ||
    resolved.baudRate < SERIAL_LINE.MIN_BAUD_RATE ||
    resolved.baudRate > SERIAL_LINE.MAX_BAUD_RATE
  ) {
    throw new LinkConfigError(`Invalid baud rate: ${resolved.baudRate}`);
  }
  if (!Number.isFinite(resolved.keepaliveIntervalMs) || resolved.keepaliveIntervalMs <= 0) {
    throw new LinkConfigError(
      `Keepalive interval must be a positive number, got ${resolved.keepaliveIntervalMs}`
    );
  }
  if (resolved.path !== null && resolved.path.trim() === '') {
    throw new LinkConfigError('Device path must not be empty');
  }
  if (resolved.path === null && resolved.vendorIds.length === 0) {
    throw new LinkConfigError('Either a device path or at least one vendor id is required');
  }
  if (resolved.vendorIds.some(id => !/^[0-9a-f]{4}$/.test(id))) {
    throw new LinkConfigError(`Vendor ids must be 4 hex digits: ${resolved.vendorIds.join(', ')}`);
  }

  return resolved;
}

export function lineConfigFor(options: ResolvedLinkOptions): SerialLineConfig {
  return {
    baudRate: options.baudRate,
    dataBits: SERIAL_LINE.DATA_BITS,
    stopBits: SERIAL_LINE.STOP_BITS,
    parity: SERIAL_LINE.PARITY,
  };
}
