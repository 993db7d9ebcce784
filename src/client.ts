// src/client.ts

import { rootLogger } from './logger.js';
import { ConnectionManager, type ConnectionManagerOptions } from './transport/connection-manager.js';
import { MeshCodec, type PacketOptions } from './messages/mesh-codec.js';
import { MessagePipeline, type InboundDispatcher } from './messages/message-pipeline.js';
import { createHealthReport, type HealthReport, type HealthReportInput } from './messages/health-report.js';
import type { LinkSession } from './transport/link-session.js';
import type {
  ConnectionSnapshot,
  ConnectionState,
  ConnectionStateHandler,
  LinkStatsSnapshot,
  LogContext,
  LogLevel,
} from './types/link-types.js';

const logger = rootLogger.createLogger('MeshLinkClient');

export interface MeshLinkClientOptions extends ConnectionManagerOptions {
  codec?: MeshCodec;
}

/** Packet options chosen by the caller; the id comes from the session */
export type SendOptions = Omit<PacketOptions, 'id'>;

/**
 * Entry point for applications: connects to a radio, sends text and health
 * reports, and hands decoded messages to listeners.
 */
export class MeshLinkClient {
  private readonly codec: MeshCodec;
  private readonly manager: ConnectionManager;
  private readonly pipeline: MessagePipeline;

  constructor(options: MeshLinkClientOptions = {}) {
    this.codec = options.codec ?? MeshCodec.load();
    this.manager = new ConnectionManager({ ...options, encoder: options.encoder ?? this.codec });
    this.pipeline = new MessagePipeline(this.manager, this.codec);
    this.manager.setPayloadHandler(payload => {
      this.pipeline.handlePayload(payload);
    });
  }

  public get state(): ConnectionState {
    return this.manager.state;
  }

  public get status(): string {
    return this.manager.status;
  }

  public get snapshot(): ConnectionSnapshot {
    return this.manager.snapshot;
  }

  public get session(): LinkSession | null {
    return this.manager.currentSession;
  }

  public get stats(): LinkStatsSnapshot | null {
    return this.manager.currentSession?.stats ?? null;
  }

  /**
   * Enables the library logger at the given level
   */
  enableLogger(level: LogLevel = 'info'): void {
    rootLogger.enable();
    rootLogger.setLevel(level);
  }

  disableLogger(): void {
    rootLogger.disable();
  }

  setLoggerContext(context: LogContext): void {
    rootLogger.addGlobalContext(context);
  }

  connect(): Promise<LinkSession> {
    return this.manager.connect();
  }

  disconnect(): Promise<void> {
    return this.manager.disconnect();
  }

  /**
   * @returns the packet id used
   */
  async sendText(text: string, options: SendOptions = {}): Promise<number> {
    const id = this.manager.nextPacketId();
    await this.pipeline.send(this.codec.encodeText(text, { ...options, id }));
    logger.info(`Text sent, packet ${id}`, { packetId: id, length: text.length });
    return id;
  }

  /**
   * Accepts a finished report or the fields to build one from.
   * @returns the packet id used
   */
  async sendHealthReport(report: HealthReport | HealthReportInput, options: SendOptions = {}): Promise<number> {
    const complete = 'version' in report ? report : createHealthReport(report);
    const id = this.manager.nextPacketId();
    await this.pipeline.send(this.codec.encodeHealthReport(complete, { ...options, id }));
    logger.info(`Health report sent, risk ${complete.risk}`, { packetId: id });
    return id;
  }

  /**
   * Sends an already encoded payload as-is.
   */
  sendRaw(payload: Uint8Array): Promise<void> {
    return this.pipeline.send(payload);
  }

  /**
   * @returns a function that removes the listener
   */
  onMessage(dispatcher: InboundDispatcher): () => void {
    return this.pipeline.addDispatcher(dispatcher);
  }

  /**
   * @returns a function that removes the listener
   */
  onStateChange(handler: ConnectionStateHandler): () => void {
    return this.manager.subscribe(handler);
  }

  async destroy(): Promise<void> {
    this.pipeline.clear();
    await this.manager.destroy();
  }
}

export default MeshLinkClient;
