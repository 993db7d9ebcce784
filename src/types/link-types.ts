// src/types/link-types.ts

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  path?: string;
  state?: string;
  sessionId?: string;
  packetId?: number;
  length?: number;
  [key: string]: unknown;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'path' | 'state' | 'sessionId';

export interface LoggerInstance {
  trace: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  setLevel: (level: LogLevel | 'none') => void;
  pause: () => void;
  resume: () => void;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

// !=============================================================================
// ! Physical channel
// !=============================================================================

/** Serial line settings fixed at open time */
export interface SerialLineConfig {
  baudRate: number;
  dataBits: 8;
  stopBits: 1;
  parity: 'none';
}

/** A device found by discovery */
export interface DeviceCandidate {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  vendorId?: string;
  productId?: string;
}

/**
 * An open byte channel. Owned by exactly one session.
 */
export interface ByteChannel {
  readonly path: string;
  readonly isOpen: boolean;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
  setDataHandler(handler: (chunk: Uint8Array) => void): void;
  setErrorHandler(handler: (err: Error) => void): void;
  setCloseHandler(handler: () => void): void;
}

/** Opens byte channels on discovered devices */
export interface ChannelDriver {
  open(device: DeviceCandidate, line: SerialLineConfig): Promise<ByteChannel>;
}

export interface DeviceDiscovery {
  findCandidates(): Promise<DeviceCandidate[]>;
}

/**
 * Host-side access control for a device (USB permission, device node mode).
 */
export interface DeviceAccess {
  hasPermission(device: DeviceCandidate): Promise<boolean>;
  /** Resolves once the host has answered; `false` means denied. */
  requestPermission(device: DeviceCandidate): Promise<boolean>;
}

// !=============================================================================
// ! Connection state
// !=============================================================================

export enum ConnectionState {
  Idle = 'Idle',
  AwaitingPermission = 'AwaitingPermission',
  Opening = 'Opening',
  Connected = 'Connected',
}

/**
 * Why the connection returned to `Idle`
 */
export enum DisconnectReason {
  OpenFailed = 'OpenFailed',
  PermissionDenied = 'PermissionDenied',
  ConnectionLost = 'ConnectionLost',
  ManualDisconnect = 'ManualDisconnect',
  Replaced = 'Replaced',
  Destroyed = 'Destroyed',
}

export interface ConnectionSnapshot {
  state: ConnectionState;
  /** Human-readable status line */
  status: string;
  sessionId: string | null;
  device: DeviceCandidate | null;
  reason?: DisconnectReason;
  error?: Error;
  timestamp: number;
}

export type ConnectionStateHandler = (snapshot: ConnectionSnapshot) => void;

// !=============================================================================
// ! Session
// !=============================================================================

export type PayloadHandler = (payload: Uint8Array) => void;

export type SessionFailureHandler = (error: Error) => void;

export interface LinkStatsSnapshot {
  bytesReceived: number;
  bytesSent: number;
  framesReceived: number;
  framesSent: number;
  bytesDiscarded: number;
  sendErrors: number;
  lastReceiveAt: number | null;
  lastSendAt: number | null;
}

/**
 * Builds the opaque control payloads the connection manager sends.
 */
export interface ControlMessageEncoder {
  encodeConfigRequest(configId: number): Uint8Array;
  encodeHeartbeat(nonce: number): Uint8Array;
  /** Optional farewell sent before an explicit disconnect */
  encodeDisconnect?(): Uint8Array;
}

export interface HeartbeatStats {
  totalRuns: number;
  failures: number;
  lastNonce: number | null;
  lastError: Error | null;
  lastRunTime: number | null;
}
