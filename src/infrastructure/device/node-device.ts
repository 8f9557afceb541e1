import { arch, hostname, platform, release } from 'node:os';
import type { DeviceInfoProvider } from '../../application/ports.js';
import type { DeviceSnapshot } from '../../domain/index.js';

export interface NodeDeviceInfoOptions {
  readonly appVersion: string;
  /** Stable id for this installation; generated and persisted by the client when absent. */
  readonly deviceId?: string;
}

/** Device facts of the Node.js host process. */
export class NodeDeviceInfo implements DeviceInfoProvider {
  private readonly snapshot: DeviceSnapshot;

  constructor(options: NodeDeviceInfoOptions) {
    this.snapshot = {
      platform: platform(),
      os_version: release(),
      arch: arch(),
      device_model: hostname(),
      runtime: 'node',
      runtime_version: process.versions.node,
      app_version: options.appVersion,
      ...(options.deviceId ? { device_id: options.deviceId } : {}),
    };
  }

  currentDeviceSnapshot(): DeviceSnapshot {
    return { ...this.snapshot, locale: Intl.DateTimeFormat().resolvedOptions().locale };
  }
}
