import { NotFoundError, ServiceUnavailableError } from '@pbr/domain';
import type { AccountPort, DeviceRecord } from '@pbr/relay/domain/services/ports/account.port';
import { createChildLogger } from '@pbr/relay/infrastructure/logging/pino-logger';

const log = createChildLogger('device-directory');

export interface DeviceDirectory {
  describe(deviceIden: string): Promise<string | null>;
  invalidate(): void;
}

/**
 * Resolves device idens to display names. The device list is cached until a
 * miss or an explicit invalidation; lookup failures resolve to null.
 */
export class DeviceDirectoryService implements DeviceDirectory {
  private devices: Map<string, DeviceRecord> | null = null;
  private inflight: Promise<Map<string, DeviceRecord> | null> | null = null;

  constructor(private readonly account: AccountPort) {}

  async describe(deviceIden: string): Promise<string | null> {
    let device = this.devices?.get(deviceIden);
    if (!device) {
      const devices = await this.refresh();
      device = devices?.get(deviceIden);
    }
    return device ? displayName(device) : null;
  }

  invalidate(): void {
    this.devices = null;
  }

  private refresh(): Promise<Map<string, DeviceRecord> | null> {
    this.inflight ??= this.fetchDevices().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async fetchDevices(): Promise<Map<string, DeviceRecord> | null> {
    try {
      const records = await this.account.listDevices();
      this.devices = new Map(records.map((record) => [record.iden, record]));
      log.debug(`Loaded ${records.length} devices`);
      return this.devices;
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof ServiceUnavailableError) {
        log.warn(`Device list unavailable: ${error.message}`);
        return this.devices;
      }
      throw error;
    }
  }
}

function displayName(device: DeviceRecord): string | null {
  if (device.nickname) {
    return device.nickname;
  }
  const model = [device.manufacturer, device.model].filter((part): part is string => Boolean(part)).join(' ');
  return model || null;
}
