import type { Logger } from 'pino';
import type { CapabilityProfile, UsbDeviceAudioInfo, UsbDeviceSummary, UsbSettings } from '../types.js';
import {
  createControlTransfer,
  deviceId,
  hasAudioInterface,
  readConfigurationDescriptor,
  readStringDescriptor,
  withClaimedAudioInterfaces,
} from '../usb/deviceIo.js';
import type { UsbDeviceHandle } from '../usb/deviceIo.js';
import type { UsbDeviceSource } from '../usb/nodeUsbSource.js';
import { createLoggerObserver } from '../usb/observer.js';
import { parseAudioDescriptors } from '../usb/resolver.js';

export class DeviceNotFoundError extends Error {
  deviceId: string;

  constructor(id: string) {
    super(`Device not found: ${id}`);
    this.name = 'DeviceNotFoundError';
    this.deviceId = id;
  }
}

export class DeviceAccessError extends Error {
  deviceId: string;

  constructor(id: string, message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'DeviceAccessError';
    this.deviceId = id;
  }
}

const UNKNOWN = 'Unknown';

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export class UsbAudioService {
  constructor(
    private readonly source: UsbDeviceSource,
    private settings: UsbSettings,
    private readonly logger: Logger
  ) {}

  updateSettings(settings: UsbSettings): void {
    this.settings = settings;
  }

  getSettings(): UsbSettings {
    return this.settings;
  }

  async listDevices(options: { audioOnly?: boolean } = {}): Promise<UsbDeviceSummary[]> {
    const audioOnly = options.audioOnly ?? this.settings.audioOnly;
    const summaries: UsbDeviceSummary[] = [];
    for (const device of this.source.list()) {
      const isAudioDevice = this.isAudioDevice(device);
      if (audioOnly && !isAudioDevice) continue;
      summaries.push(await this.describe(device, isAudioDevice));
    }
    return summaries;
  }

  /**
   * Opens the device, reads and decodes its configuration descriptor with the
   * audio interfaces claimed, and closes it again.
   */
  async getDeviceAudioInfo(id: string): Promise<UsbDeviceAudioInfo> {
    const device = this.source.list().find((candidate) => deviceId(candidate) === id);
    if (!device) {
      throw new DeviceNotFoundError(id);
    }

    try {
      device.open();
    } catch (err) {
      throw new DeviceAccessError(id, `Failed to open device ${id}: ${errorMessage(err)}`, err);
    }

    try {
      const summary = await this.describeOpen(device, this.isAudioDevice(device));
      const observer = createLoggerObserver(this.logger, { deviceId: id });
      const transfer = createControlTransfer(device);

      let raw: Uint8Array;
      try {
        raw = await readConfigurationDescriptor(transfer, this.settings.descriptorTimeoutMs);
      } catch (err) {
        throw new DeviceAccessError(id, `Failed to read descriptors of ${id}: ${errorMessage(err)}`, err);
      }

      let profile: CapabilityProfile;
      try {
        profile = await withClaimedAudioInterfaces(
          device,
          () => parseAudioDescriptors(raw, { transfer, clockTimeoutMs: this.settings.controlTimeoutMs, observer }),
          observer
        );
      } catch (err) {
        throw new DeviceAccessError(id, `Failed to claim audio interfaces of ${id}: ${errorMessage(err)}`, err);
      }

      this.logger.info({
        event: 'usb_audio_profile',
        deviceId: id,
        uacVersion: profile.uacVersion,
        sampleRates: profile.sampleRates,
        endpoints: profile.endpoints.length,
      });
      return { ...summary, ...profile };
    } finally {
      try {
        device.close();
      } catch (err) {
        this.logger.warn({ event: 'usb_close_failed', deviceId: id, message: errorMessage(err) });
      }
    }
  }

  private isAudioDevice(device: UsbDeviceHandle): boolean {
    try {
      return hasAudioInterface(device);
    } catch (err) {
      this.logger.debug({ event: 'usb_config_unreadable', deviceId: deviceId(device), message: errorMessage(err) });
      return false;
    }
  }

  private baseSummary(device: UsbDeviceHandle, isAudioDevice: boolean): UsbDeviceSummary {
    const descriptor = device.deviceDescriptor;
    return {
      id: deviceId(device),
      busNumber: device.busNumber,
      deviceAddress: device.deviceAddress,
      vendorId: descriptor.idVendor,
      productId: descriptor.idProduct,
      productName: UNKNOWN,
      manufacturerName: UNKNOWN,
      serialNumber: '',
      deviceClass: descriptor.bDeviceClass,
      isAudioDevice,
    };
  }

  private async describeOpen(device: UsbDeviceHandle, isAudioDevice: boolean): Promise<UsbDeviceSummary> {
    const summary = this.baseSummary(device, isAudioDevice);
    const descriptor = device.deviceDescriptor;
    try {
      const [productName, manufacturerName, serialNumber] = await Promise.all([
        readStringDescriptor(device, descriptor.iProduct),
        readStringDescriptor(device, descriptor.iManufacturer),
        readStringDescriptor(device, descriptor.iSerialNumber),
      ]);
      return {
        ...summary,
        productName: productName || UNKNOWN,
        manufacturerName: manufacturerName || UNKNOWN,
        serialNumber,
      };
    } catch (err) {
      this.logger.debug({ event: 'usb_strings_unreadable', deviceId: summary.id, message: errorMessage(err) });
      return summary;
    }
  }

  /** String descriptors need an open handle; devices we may not open are listed without them. */
  private async describe(device: UsbDeviceHandle, isAudioDevice: boolean): Promise<UsbDeviceSummary> {
    try {
      device.open(false);
    } catch (err) {
      this.logger.debug({ event: 'usb_open_failed', deviceId: deviceId(device), message: errorMessage(err) });
      return this.baseSummary(device, isAudioDevice);
    }
    try {
      return await this.describeOpen(device, isAudioDevice);
    } finally {
      try {
        device.close();
      } catch (err) {
        this.logger.debug({ event: 'usb_close_failed', deviceId: deviceId(device), message: errorMessage(err) });
      }
    }
  }
}
