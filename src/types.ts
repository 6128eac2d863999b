export const UAC_VERSIONS = [1, 2] as const;

export type UacVersion = (typeof UAC_VERSIONS)[number];

/**
 * Device-to-host control transfer bound to an already opened (and, for class
 * requests, already claimed) device. Resolves with the bytes the device
 * returned, which may be fewer than `length`.
 */
export type ControlTransferIn = (
  requestType: number,
  request: number,
  value: number,
  index: number,
  length: number,
  timeoutMs: number
) => Promise<Uint8Array>;

export interface AudioEndpoint {
  address: number;
  maxPacketSize: number;
  channels: number;
  bitResolution: number;
  sampleRate: number;
  sampleRateSettable: boolean;
  interfaceNumber: number;
  alternateSetting: number;
}

export interface CapabilityProfile {
  uacVersion: UacVersion;
  /** Ascending, no duplicates, in Hz. */
  sampleRates: readonly number[];
  endpoints: readonly AudioEndpoint[];
}

export interface UsbDeviceSummary {
  /** `<bus>-<address>`, stable while the device stays attached. */
  id: string;
  busNumber: number;
  deviceAddress: number;
  vendorId: number;
  productId: number;
  productName: string;
  manufacturerName: string;
  serialNumber: string;
  deviceClass: number;
  isAudioDevice: boolean;
}

export interface UsbDeviceAudioInfo extends UsbDeviceSummary, CapabilityProfile {}

export interface UsbSettings {
  controlTimeoutMs: number;
  descriptorTimeoutMs: number;
  audioOnly: boolean;
}

export interface AppConfig {
  server: {
    port: number;
  };
  usb: UsbSettings;
}
