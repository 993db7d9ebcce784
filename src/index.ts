// src/index.ts

export { MeshLinkClient, type MeshLinkClientOptions, type SendOptions } from './client.js';
export {
  ConnectionManager,
  type ConnectionManagerOptions,
} from './transport/connection-manager.js';
export { LinkSession, type LinkSessionOptions } from './transport/link-session.js';
export { HeartbeatTask, type HeartbeatTaskOptions } from './transport/heartbeat-task.js';
export { ConnectionStateTracker } from './transport/trackers/ConnectionStateTracker.js';
export {
  NodeSerialChannel,
  NodeSerialDriver,
  classifyOpenError,
  type SerialPortFactory,
  type SerialPortLike,
} from './transport/node-transports/node-serial-channel.js';
export { SerialDeviceDiscovery, type SerialPortInfo } from './transport/discovery/serial-discovery.js';
export { NodeDeviceAccess, GrantedDeviceAccess } from './transport/discovery/device-access.js';

export { encodeFrame, decodeFrames, FrameDecoder, MeshFramer } from './framers/mesh-framer.js';
export type { DecodeResult, StreamDecoder, StreamFramer } from './framers/stream-framer.js';

export {
  MeshCodec,
  DEFAULT_PROTO_PATH,
  type InboundMessage,
  type InboundKind,
  type PacketHeader,
  type PacketOptions,
  type NodeUser,
} from './messages/mesh-codec.js';
export {
  MessagePipeline,
  type InboundEnvelope,
  type InboundDispatcher,
} from './messages/message-pipeline.js';
export {
  createHealthReport,
  validateHealthReport,
  type HealthReport,
  type HealthReportInput,
  type RiskLevel,
} from './messages/health-report.js';

export { resolveLinkOptions, DEFAULT_LINK_OPTIONS, type LinkOptions, type ResolvedLinkOptions } from './config.js';
export * from './errors.js';
export * from './constants/constants.js';
export { rootLogger } from './logger.js';
export { default as Logger } from './logger.js';
export * from './types/link-types.js';
