// src/transport/discovery/serial-discovery.ts

import { SerialPort } from 'serialport';
import { rootLogger } from '../../logger.js';
import type { DeviceCandidate, DeviceDiscovery } from '../../types/link-types.js';

const logger = rootLogger.createLogger('SerialDiscovery');

/** Port description as returned by `SerialPort.list()` */
export interface SerialPortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  vendorId?: string;
  productId?: string;
}

export interface SerialDiscoveryOptions {
  /** Use this device and skip vendor matching */
  path?: string | null;
  /** Lower-case hex USB vendor ids accepted as radios */
  vendorIds: readonly string[];
  listPorts?: () => Promise<SerialPortInfo[]>;
}

function toCandidate(info: SerialPortInfo): DeviceCandidate {
  return {
    path: info.path,
    manufacturer: info.manufacturer,
    serialNumber: info.serialNumber,
    vendorId: info.vendorId?.toLowerCase(),
    productId: info.productId?.toLowerCase(),
  };
}

/**
 * Finds radios among the host's serial ports. Candidates are returned in the
 * order the vendor ids are listed, so the first entry is the preferred match.
 */
export class SerialDeviceDiscovery implements DeviceDiscovery {
  private readonly listPorts: () => Promise<SerialPortInfo[]>;

  constructor(private readonly options: SerialDiscoveryOptions) {
    this.listPorts = options.listPorts ?? (() => SerialPort.list());
  }

  public async findCandidates(): Promise<DeviceCandidate[]> {
    const ports = await this.listPorts();
    logger.debug(`Serial ports found: ${ports.length}`);
    for (const port of ports) {
      logger.trace(
        `${port.path} VID=${port.vendorId ?? '-'} PID=${port.productId ?? '-'} ${port.manufacturer ?? ''}`
      );
    }

    const path = this.options.path;
    if (path) {
      const listed = ports.find(port => port.path === path);
      // an explicit path is used even when the OS does not enumerate it
      return [listed ? toCandidate(listed) : { path }];
    }

    const candidates: DeviceCandidate[] = [];
    for (const vendorId of this.options.vendorIds) {
      for (const port of ports) {
        if (port.vendorId?.toLowerCase() === vendorId) candidates.push(toCandidate(port));
      }
    }
    return candidates;
  }
}
