// src/transport/discovery/device-access.ts

import { access, constants } from 'node:fs/promises';
import type { DeviceAccess, DeviceCandidate } from '../../types/link-types.js';

/**
 * Grants every device. For hosts where opening the port is the only check.
 */
export class GrantedDeviceAccess implements DeviceAccess {
  public async hasPermission(): Promise<boolean> {
    return true;
  }

  public async requestPermission(): Promise<boolean> {
    return true;
  }
}

/**
 * Checks read/write access on the device node. Node cannot prompt for access,
 * so a request re-checks the node (the user may have changed group membership
 * or udev rules in the meantime).
 */
export class NodeDeviceAccess implements DeviceAccess {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  public async hasPermission(device: DeviceCandidate): Promise<boolean> {
    if (this.platform === 'win32') return true;
    try {
      await access(device.path, constants.R_OK | constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async requestPermission(device: DeviceCandidate): Promise<boolean> {
    return this.hasPermission(device);
  }
}
