import type { ControlTransferIn } from '../types.js';
import { withGrace, withTimeout } from '../utils/timeout.js';
import {
  CONFIGURATION_DESCRIPTOR_LENGTH,
  DESC_TYPE_CONFIGURATION,
  REQUEST_GET_DESCRIPTOR,
  REQUEST_TYPE_STANDARD_DEVICE_IN,
  TRANSFER_TIMEOUT_GRACE_MS,
  USB_CLASS_AUDIO,
} from './constants.js';
import type { DescriptorObserver } from './observer.js';
import { silentObserver } from './observer.js';

export interface UsbInterfaceHandle {
  readonly interfaceNumber: number;
  readonly descriptor: { readonly bInterfaceClass: number; readonly bInterfaceSubClass: number };
  claim(): void;
  release(closeEndpoints: boolean, callback: (error?: Error) => void): void;
  isKernelDriverActive(): boolean;
  detachKernelDriver(): void;
  attachKernelDriver(): void;
}

/** The part of the `usb` package's Device that this service relies on. */
export interface UsbDeviceHandle {
  readonly busNumber: number;
  readonly deviceAddress: number;
  readonly deviceDescriptor: {
    readonly bDeviceClass: number;
    readonly idVendor: number;
    readonly idProduct: number;
    readonly iManufacturer: number;
    readonly iProduct: number;
    readonly iSerialNumber: number;
  };
  readonly configDescriptor: { readonly interfaces: readonly (readonly { readonly bInterfaceClass: number }[])[] } | undefined;
  readonly interfaces: readonly UsbInterfaceHandle[] | undefined;
  timeout: number;
  open(defaultConfig?: boolean): void;
  close(): void;
  controlTransfer(
    bmRequestType: number,
    bRequest: number,
    wValue: number,
    wIndex: number,
    dataOrLength: number | Buffer,
    callback: (error?: Error, data?: Buffer | number) => void
  ): unknown;
  getStringDescriptor(index: number, callback: (error?: Error, value?: string) => void): void;
}

export function deviceId(device: Pick<UsbDeviceHandle, 'busNumber' | 'deviceAddress'>): string {
  return `${device.busNumber}-${device.deviceAddress}`;
}

/** Uses the active configuration, which libusb exposes without opening the device. */
export function hasAudioInterface(device: UsbDeviceHandle): boolean {
  const config = device.configDescriptor;
  if (!config) return false;
  return config.interfaces.some((alternates) => alternates.some((alt) => alt.bInterfaceClass === USB_CLASS_AUDIO));
}

export function createControlTransfer(device: UsbDeviceHandle): ControlTransferIn {
  return (requestType, request, value, index, length, timeoutMs) =>
    new Promise<Uint8Array>((resolve, reject) => {
      device.timeout = timeoutMs;
      device.controlTransfer(requestType, request, value, index, length, (error, data) => {
        if (error) {
          reject(error);
          return;
        }
        if (data === undefined || typeof data === 'number') {
          reject(new Error('control transfer returned no data'));
          return;
        }
        resolve(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
      });
    });
}

/**
 * Fetches the full active configuration descriptor: the 9-byte header first,
 * then again with the wTotalLength it declares.
 */
export async function readConfigurationDescriptor(
  transfer: ControlTransferIn,
  timeoutMs: number
): Promise<Uint8Array> {
  const value = DESC_TYPE_CONFIGURATION << 8;
  const outerTimeoutMs = withGrace(timeoutMs, TRANSFER_TIMEOUT_GRACE_MS);
  const header = await withTimeout(
    transfer(REQUEST_TYPE_STANDARD_DEVICE_IN, REQUEST_GET_DESCRIPTOR, value, 0, CONFIGURATION_DESCRIPTOR_LENGTH, timeoutMs),
    outerTimeoutMs
  );
  if (header.byteLength < 4 || header[1] !== DESC_TYPE_CONFIGURATION) {
    throw new Error(`invalid configuration descriptor header (${header.byteLength} bytes)`);
  }
  const totalLength = (header[2] ?? 0) | ((header[3] ?? 0) << 8);
  if (totalLength <= header.byteLength) {
    return header.subarray(0, totalLength);
  }
  return withTimeout(
    transfer(REQUEST_TYPE_STANDARD_DEVICE_IN, REQUEST_GET_DESCRIPTOR, value, 0, totalLength, timeoutMs),
    outerTimeoutMs
  );
}

export function readStringDescriptor(device: UsbDeviceHandle, index: number): Promise<string> {
  if (index === 0) return Promise.resolve('');
  return new Promise((resolve, reject) => {
    device.getStringDescriptor(index, (error, value) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(value ?? '');
    });
  });
}

function releaseInterface(iface: UsbInterfaceHandle): Promise<void> {
  return new Promise((resolve, reject) => {
    iface.release(false, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * Claims every audio-class interface of an open device for the duration of
 * `fn`, then releases what was claimed and hands detached kernel drivers back,
 * whatever `fn` or a failed claim did. Release and reattach problems are
 * reported, never thrown over `fn`'s outcome.
 */
export async function withClaimedAudioInterfaces<T>(
  device: UsbDeviceHandle,
  fn: () => Promise<T>,
  observer: DescriptorObserver = silentObserver
): Promise<T> {
  const acquired: { iface: UsbInterfaceHandle; detached: boolean; claimed: boolean }[] = [];
  const audioInterfaces = (device.interfaces ?? []).filter(
    (iface) => iface.descriptor.bInterfaceClass === USB_CLASS_AUDIO
  );

  try {
    for (const iface of audioInterfaces) {
      const entry = { iface, detached: false, claimed: false };
      acquired.push(entry);
      if (iface.isKernelDriverActive()) {
        iface.detachKernelDriver();
        entry.detached = true;
      }
      iface.claim();
      entry.claimed = true;
    }
    return await fn();
  } finally {
    for (const { iface, detached, claimed } of acquired.reverse()) {
      if (claimed) {
        try {
          await releaseInterface(iface);
        } catch (err) {
          observer({
            level: 'warn',
            event: 'usb_interface_release_failed',
            message: `failed to release interface ${iface.interfaceNumber}: ${errorMessage(err)}`,
            data: { interfaceNumber: iface.interfaceNumber },
          });
        }
      }
      if (detached) {
        try {
          iface.attachKernelDriver();
        } catch (err) {
          observer({
            level: 'warn',
            event: 'usb_kernel_driver_attach_failed',
            message: `failed to reattach kernel driver on interface ${iface.interfaceNumber}: ${errorMessage(err)}`,
            data: { interfaceNumber: iface.interfaceNumber },
          });
        }
      }
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
