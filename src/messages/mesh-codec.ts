// src/messages/mesh-codec.ts

import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import type { IConversionOptions, Root, Type } from 'protobufjs';
import { BROADCAST_ADDR, FRAME, PORT_NUMS } from '../constants/constants.js';
import { MessageDecodeError, MessageEncodeError, PayloadTooLargeError } from '../errors.js';
import { toError } from '../utils/utils.js';
import { riskFromCode, riskToCode, validateHealthReport, type HealthReport } from './health-report.js';
import type { ControlMessageEncoder } from '../types/link-types.js';

export const DEFAULT_PROTO_PATH = fileURLToPath(new URL('../../proto/mesh.proto', import.meta.url));

const CONVERSION: IConversionOptions = { longs: Number };

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

type Fields = Record<string, unknown>;

export interface PacketOptions {
  /** Packet id, usually from `LinkSession.nextPacketId()` */
  id: number;
  /** Destination node number. Defaults to broadcast. */
  to?: number;
  channel?: number;
  wantAck?: boolean;
  hopLimit?: number;
}

export interface PacketHeader {
  id: number;
  from: number;
  to: number;
  channel: number;
  hopLimit: number;
  wantAck: boolean;
}

export interface NodeUser {
  id: string;
  longName: string;
  shortName: string;
}

export type InboundMessage =
  | { kind: 'my-info'; myNodeNum: number }
  | { kind: 'node-info'; num: number; user: NodeUser | null }
  | { kind: 'config-complete'; configId: number }
  | { kind: 'rebooted' }
  | { kind: 'text'; packet: PacketHeader; text: string }
  | { kind: 'health-report'; packet: PacketHeader; report: HealthReport }
  | { kind: 'packet'; packet: PacketHeader; portnum: number | null; payload: Uint8Array }
  | { kind: 'unrecognized'; error: Error };

export type InboundKind = InboundMessage['kind'];

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !ArrayBuffer.isView(value);
}

function numberField(fields: Fields, key: string): number {
  const value = fields[key];
  return typeof value === 'number' ? value : 0;
}

function stringField(fields: Fields, key: string): string {
  const value = fields[key];
  return typeof value === 'string' ? value : '';
}

function bytesField(fields: Fields, key: string): Uint8Array {
  const value = fields[key];
  return value instanceof Uint8Array ? new Uint8Array(value) : new Uint8Array(0);
}

function assertUint32(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new MessageEncodeError(`${name} must be an unsigned 32-bit integer, got ${value}`);
  }
}

/**
 * Encodes the messages sent to the radio and decodes what it sends back,
 * using the schema in `proto/mesh.proto`.
 */
export class MeshCodec implements ControlMessageEncoder {
  private readonly toRadio: Type;
  private readonly fromRadio: Type;
  private readonly healthReport: Type;

  /** Matchers tried in order; the first non-null result wins */
  private readonly inboundMatchers: Array<(fields: Fields) => InboundMessage | null> = [
    ({ myInfo }) => (isFields(myInfo) ? { kind: 'my-info', myNodeNum: numberField(myInfo, 'myNodeNum') } : null),
    ({ nodeInfo }) => (isFields(nodeInfo) ? this._nodeInfo(nodeInfo) : null),
    ({ configCompleteId }) =>
      typeof configCompleteId === 'number' ? { kind: 'config-complete', configId: configCompleteId } : null,
    ({ rebooted }) => (rebooted === true ? { kind: 'rebooted' } : null),
    ({ packet }) => (isFields(packet) ? this._packet(packet) : null),
  ];

  constructor(root: Root) {
    this.toRadio = root.lookupType('mesh.ToRadio');
    this.fromRadio = root.lookupType('mesh.FromRadio');
    this.healthReport = root.lookupType('mesh.HealthReport');
  }

  /**
   * Loads the schema from disk.
   */
  static load(protoPath: string = DEFAULT_PROTO_PATH): MeshCodec {
    return new MeshCodec(protobuf.loadSync(protoPath));
  }

  encodeConfigRequest(configId: number): Uint8Array {
    assertUint32('Config id', configId);
    return this._encode(this.toRadio, { wantConfigId: configId });
  }

  encodeHeartbeat(nonce: number): Uint8Array {
    assertUint32('Heartbeat nonce', nonce);
    return this._encode(this.toRadio, { heartbeat: { nonce } });
  }

  encodeDisconnect(): Uint8Array {
    return this._encode(this.toRadio, { disconnect: true });
  }

  /**
   * @throws MessageEncodeError for empty text or bad packet options
   * @throws PayloadTooLargeError when the message does not fit in one frame
   */
  encodeText(text: string, options: PacketOptions): Uint8Array {
    if (text.trim() === '') throw new MessageEncodeError('Text message must not be blank');
    return this._encodePacket(PORT_NUMS.TEXT_MESSAGE_APP, textEncoder.encode(text), options);
  }

  /**
   * Wraps the report in a packet on the private application port.
   */
  encodeHealthReport(report: HealthReport, options: PacketOptions): Uint8Array {
    return this._encodePacket(PORT_NUMS.PRIVATE_APP, this.encodeHealthReportBody(report), options);
  }

  /**
   * The report alone, as carried in the packet payload.
   */
  encodeHealthReportBody(report: HealthReport): Uint8Array {
    validateHealthReport(report);
    return this._encode(this.healthReport, {
      version: report.version,
      person: report.person,
      timestamp: report.timestamp,
      risk: riskToCode(report.risk),
      recommendation: report.recommendation,
      alert: report.alert,
    });
  }

  /**
   * @throws MessageDecodeError
   */
  decodeHealthReportBody(payload: Uint8Array): HealthReport {
    const fields = this._decode(this.healthReport, payload);
    const risk = riskFromCode(numberField(fields, 'risk'));
    if (risk === null) {
      throw new MessageDecodeError(`Health report has unknown risk level ${numberField(fields, 'risk')}`);
    }
    return {
      version: numberField(fields, 'version'),
      person: stringField(fields, 'person'),
      timestamp: numberField(fields, 'timestamp'),
      risk,
      recommendation: stringField(fields, 'recommendation'),
      alert: fields.alert === true,
    };
  }

  /**
   * Decodes one payload from the radio. Never throws: failures come back as
   * the `unrecognized` variant.
   */
  decodeInbound(payload: Uint8Array): InboundMessage {
    let fields: Fields;
    try {
      fields = this._decode(this.fromRadio, payload);
    } catch (err: unknown) {
      return { kind: 'unrecognized', error: toError(err) };
    }

    try {
      for (const match of this.inboundMatchers) {
        const message = match(fields);
        if (message) return message;
      }
    } catch (err: unknown) {
      return { kind: 'unrecognized', error: toError(err) };
    }
    return {
      kind: 'unrecognized',
      error: new MessageDecodeError(`No known message in ${payload.length}-byte payload`),
    };
  }

  private _nodeInfo(fields: Fields): InboundMessage {
    const user = fields.user;
    return {
      kind: 'node-info',
      num: numberField(fields, 'num'),
      user: isFields(user)
        ? {
            id: stringField(user, 'id'),
            longName: stringField(user, 'longName'),
            shortName: stringField(user, 'shortName'),
          }
        : null,
    };
  }

  private _packet(fields: Fields): InboundMessage {
    const packet: PacketHeader = {
      id: numberField(fields, 'id'),
      from: numberField(fields, 'from'),
      to: numberField(fields, 'to'),
      channel: numberField(fields, 'channel'),
      hopLimit: numberField(fields, 'hopLimit'),
      wantAck: fields.wantAck === true,
    };

    const decoded = fields.decoded;
    if (!isFields(decoded)) {
      return { kind: 'packet', packet, portnum: null, payload: bytesField(fields, 'encrypted') };
    }

    const portnum = numberField(decoded, 'portnum');
    const data = bytesField(decoded, 'payload');
    switch (portnum) {
      case PORT_NUMS.TEXT_MESSAGE_APP:
        return { kind: 'text', packet, text: textDecoder.decode(data) };
      case PORT_NUMS.PRIVATE_APP:
        return { kind: 'health-report', packet, report: this.decodeHealthReportBody(data) };
      default:
        return { kind: 'packet', packet, portnum, payload: data };
    }
  }

  private _encodePacket(portnum: number, payload: Uint8Array, options: PacketOptions): Uint8Array {
    const to = options.to ?? BROADCAST_ADDR;
    const channel = options.channel ?? 0;
    assertUint32('Packet id', options.id);
    assertUint32('Destination', to);
    assertUint32('Channel', channel);
    if (options.hopLimit !== undefined) assertUint32('Hop limit', options.hopLimit);

    const bytes = this._encode(this.toRadio, {
      packet: {
        to,
        channel,
        id: options.id,
        wantAck: options.wantAck ?? false,
        hopLimit: options.hopLimit,
        decoded: { portnum, payload },
      },
    });
    if (bytes.length > FRAME.MAX_PAYLOAD) throw new PayloadTooLargeError(bytes.length);
    return bytes;
  }

  private _encode(type: Type, value: Fields): Uint8Array {
    const problem = type.verify(value);
    if (problem) throw new MessageEncodeError(`${type.name}: ${problem}`);
    return new Uint8Array(type.encode(type.fromObject(value)).finish());
  }

  private _decode(type: Type, payload: Uint8Array): Fields {
    try {
      return type.toObject(type.decode(payload), CONVERSION);
    } catch (err: unknown) {
      throw new MessageDecodeError(`Cannot decode ${type.name}: ${toError(err).message}`);
    }
  }
}
