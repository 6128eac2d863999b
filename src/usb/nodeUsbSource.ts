import { getDeviceList } from 'usb';
import type { UsbDeviceHandle } from './deviceIo.js';

export interface UsbDeviceSource {
  list(): UsbDeviceHandle[];
}

/** libusb-backed device list. Kept apart so tests never load the native binding. */
export class NodeUsbDeviceSource implements UsbDeviceSource {
  list(): UsbDeviceHandle[] {
    return getDeviceList();
  }
}
