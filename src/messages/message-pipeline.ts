// src/messages/message-pipeline.ts

import { rootLogger } from '../logger.js';
import { toError } from '../utils/utils.js';
import type { InboundMessage } from './mesh-codec.js';

const logger = rootLogger.createLogger('MessagePipeline');

/**
 * One received payload, tagged with its arrival order.
 */
export interface InboundEnvelope {
  /** Starts at 1 and increases by one per payload */
  sequence: number;
  receivedAt: number;
  payload: Uint8Array;
  message: InboundMessage;
}

export type InboundDispatcher = (envelope: InboundEnvelope) => void;

export interface InboundDecoder {
  decodeInbound(payload: Uint8Array): InboundMessage;
}

/** Where outbound bytes go; the connection manager in practice */
export interface PayloadSink {
  send(payload: Uint8Array): Promise<void>;
}

/**
 * Glue between application encoders/dispatchers and the link. Outbound bytes
 * pass through untouched; inbound payloads are decoded and handed out in
 * arrival order.
 */
export class MessagePipeline {
  private readonly sink: PayloadSink;
  private readonly decoder: InboundDecoder;
  private readonly dispatchers = new Set<InboundDispatcher>();
  private sequence: number = 0;

  constructor(sink: PayloadSink, decoder: InboundDecoder) {
    this.sink = sink;
    this.decoder = decoder;
  }

  /** Number of payloads received so far */
  public get received(): number {
    return this.sequence;
  }

  public send(payload: Uint8Array): Promise<void> {
    return this.sink.send(payload);
  }

  /**
   * @returns a function that removes the dispatcher
   */
  public addDispatcher(dispatcher: InboundDispatcher): () => void {
    this.dispatchers.add(dispatcher);
    return () => {
      this.dispatchers.delete(dispatcher);
    };
  }

  /**
   * Decodes and dispatches one payload. A throwing dispatcher is logged and
   * does not stop the others or later payloads.
   */
  public handlePayload(payload: Uint8Array): InboundEnvelope {
    this.sequence += 1;
    const envelope: InboundEnvelope = {
      sequence: this.sequence,
      receivedAt: Date.now(),
      payload,
      message: this.decoder.decodeInbound(payload),
    };

    if (envelope.message.kind === 'unrecognized') {
      logger.warn(`Unrecognized payload #${envelope.sequence}: ${envelope.message.error.message}`, {
        length: payload.length,
      });
    } else {
      logger.debug(`Received ${envelope.message.kind} #${envelope.sequence}`, { length: payload.length });
    }

    for (const dispatcher of [...this.dispatchers]) {
      try {
        dispatcher(envelope);
      } catch (err: unknown) {
        logger.error(`Dispatcher failed on #${envelope.sequence}`, toError(err));
      }
    }
    return envelope;
  }

  public clear(): void {
    this.dispatchers.clear();
  }
}
