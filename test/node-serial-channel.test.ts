import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SerialPortMock } from 'serialport';

import {
  classifyOpenError,
  NodeSerialChannel,
  NodeSerialDriver,
  type SerialPortFactory,
} from '../src/transport/node-transports/node-serial-channel.js';
import { ChannelClosedError, ChannelOpenFailureError } from '../src/errors.js';
import type { SerialLineConfig } from '../src/types/link-types.js';

const PATH = '/dev/ttyMOCK0';
const line: SerialLineConfig = { baudRate: 115200, dataBits: 8, stopBits: 1, parity: 'none' };

describe('NodeSerialChannel', () => {
  let created: SerialPortMock[] = [];
  const factory: SerialPortFactory = options => {
    const port = new SerialPortMock(options);
    created.push(port);
    return port;
  };

  const mockPort = (): SerialPortMock => {
    const port = created[created.length - 1];
    if (!port) throw new Error('No port created');
    return port;
  };

  beforeEach(() => {
    created = [];
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
  });

  afterEach(() => {
    SerialPortMock.binding.reset();
  });

  it('opens the port with the line settings', async () => {
    const channel = new NodeSerialChannel(PATH, line, factory);

    await channel.open();

    expect(channel.isOpen).toBe(true);
    expect(mockPort().baudRate).toBe(115200);
    await channel.close();
  });

  it('writes bytes to the port', async () => {
    const channel = new NodeSerialChannel(PATH, line, factory);
    await channel.open();

    await channel.write(Uint8Array.of(0x94, 0xc3, 0x00, 0x01, 0x2a));

    expect(mockPort().port?.recording).toEqual(Buffer.from([0x94, 0xc3, 0x00, 0x01, 0x2a]));
    await channel.close();
  });

  it('delivers received bytes to the data handler', async () => {
    const channel = new NodeSerialChannel(PATH, line, factory);
    const received: number[] = [];
    channel.setDataHandler(chunk => received.push(...chunk));
    await channel.open();

    mockPort().port?.emitData(Buffer.from([1, 2, 3]));

    await vi.waitFor(() => expect(received).toEqual([1, 2, 3]));
    await channel.close();
  });

  it('fails to open a port that does not exist', async () => {
    const channel = new NodeSerialChannel('/dev/ttyMISSING', line, factory);

    await expect(channel.open()).rejects.toBeInstanceOf(ChannelOpenFailureError);
    expect(channel.isOpen).toBe(false);
  });

  it('rejects writes after close', async () => {
    const channel = new NodeSerialChannel(PATH, line, factory);
    await channel.open();
    await channel.close();

    await expect(channel.write(Uint8Array.of(1))).rejects.toBeInstanceOf(ChannelClosedError);
    expect(channel.isOpen).toBe(false);
  });

  it('does not report its own close', async () => {
    const channel = new NodeSerialChannel(PATH, line, factory);
    const onClose = vi.fn();
    channel.setCloseHandler(onClose);
    await channel.open();

    await channel.close();
    await channel.close();

    expect(onClose).not.toHaveBeenCalled();
  });

  it('reports a close it did not ask for', async () => {
    const channel = new NodeSerialChannel(PATH, line, factory);
    const onClose = vi.fn();
    channel.setCloseHandler(onClose);
    await channel.open();

    await new Promise<void>(resolve => mockPort().close(() => resolve()));

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(channel.isOpen).toBe(false);
  });
});

describe('NodeSerialDriver', () => {
  beforeEach(() => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: true });
  });

  afterEach(() => {
    SerialPortMock.binding.reset();
  });

  it('returns an open channel', async () => {
    const driver = new NodeSerialDriver(options => new SerialPortMock(options));

    const channel = await driver.open({ path: PATH }, line);

    expect(channel.isOpen).toBe(true);
    expect(channel.path).toBe(PATH);
    await channel.close();
  });

  it('maps a factory failure to no-driver', async () => {
    const driver = new NodeSerialDriver(() => {
      throw new Error('unsupported platform');
    });

    await expect(driver.open({ path: PATH }, line)).rejects.toMatchObject({ reason: 'no-driver' });
  });
});

describe('classifyOpenError', () => {
  it.each([
    ['Error: Permission denied, cannot open /dev/ttyACM0', 'permission-denied'],
    ['Error Resource busy, cannot open /dev/ttyACM0', 'busy'],
    ['Port is locked cannot open', 'busy'],
    ['Error: No such file or directory, cannot open /dev/ttyACM9', 'no-port'],
    ['Opening COM9: File not found', 'no-port'],
    ['Something odd happened', 'unknown'],
  ])('classifies "%s" as %s', (message, reason) => {
    expect(classifyOpenError(new Error(message))).toBe(reason);
  });
});
