import type { UsbDeviceHandle, UsbInterfaceHandle } from '../deviceIo.js';

export interface FakeTransfer {
  requestType: number;
  request: number;
  value: number;
  index: number;
  length: number;
  timeout: number;
}

export interface FakeDeviceOptions {
  busNumber?: number;
  deviceAddress?: number;
  vendorId?: number;
  productId?: number;
  deviceClass?: number;
  /** bInterfaceClass per interface number; omit for a device whose config is unreadable. */
  interfaceClasses?: number[];
  /** String descriptors by index; a missing index fails the read. */
  strings?: Record<number, string>;
  /** Active configuration descriptor served to GET_DESCRIPTOR. */
  configuration?: Uint8Array;
  /** Bytes served to class requests; omit to stall them. */
  clockResponse?: number[];
  kernelDriverActive?: boolean;
  openError?: Error;
  claimError?: Error;
  releaseError?: Error;
}

class FakeInterface implements UsbInterfaceHandle {
  readonly interfaceNumber: number;
  readonly descriptor: { bInterfaceClass: number; bInterfaceSubClass: number };

  constructor(
    interfaceNumber: number,
    interfaceClass: number,
    private readonly log: string[],
    private driverActive: boolean,
    private readonly errors: { claim?: Error; release?: Error } = {}
  ) {
    this.interfaceNumber = interfaceNumber;
    this.descriptor = { bInterfaceClass: interfaceClass, bInterfaceSubClass: 0 };
  }

  claim(): void {
    if (this.errors.claim) throw this.errors.claim;
    this.log.push(`claim ${this.interfaceNumber}`);
  }

  release(_closeEndpoints: boolean, callback: (error?: Error) => void): void {
    this.log.push(`release ${this.interfaceNumber}`);
    callback(this.errors.release);
  }

  isKernelDriverActive(): boolean {
    return this.driverActive;
  }

  detachKernelDriver(): void {
    this.log.push(`detach ${this.interfaceNumber}`);
    this.driverActive = false;
  }

  attachKernelDriver(): void {
    this.log.push(`attach ${this.interfaceNumber}`);
    this.driverActive = true;
  }
}

/** In-memory stand-in for a libusb device; records what was done to it. */
export class FakeUsbDevice implements UsbDeviceHandle {
  readonly busNumber: number;
  readonly deviceAddress: number;
  readonly deviceDescriptor: UsbDeviceHandle['deviceDescriptor'];
  readonly configDescriptor: UsbDeviceHandle['configDescriptor'];
  readonly interfaces: FakeInterface[] | undefined;
  readonly log: string[] = [];
  readonly transfers: FakeTransfer[] = [];
  timeout = 0;
  isOpen = false;

  constructor(private readonly options: FakeDeviceOptions = {}) {
    this.busNumber = options.busNumber ?? 1;
    this.deviceAddress = options.deviceAddress ?? 2;
    this.deviceDescriptor = {
      bDeviceClass: options.deviceClass ?? 0,
      idVendor: options.vendorId ?? 0x1234,
      idProduct: options.productId ?? 0x5678,
      iManufacturer: 1,
      iProduct: 2,
      iSerialNumber: 3,
    };
    const classes = options.interfaceClasses;
    this.configDescriptor = classes ? { interfaces: classes.map((cls) => [{ bInterfaceClass: cls }]) } : undefined;
    this.interfaces = classes?.map(
      (cls, number) =>
        new FakeInterface(number, cls, this.log, options.kernelDriverActive ?? false, {
          claim: options.claimError,
          release: options.releaseError,
        })
    );
  }

  open(defaultConfig = true): void {
    if (this.options.openError) throw this.options.openError;
    this.log.push(defaultConfig ? 'open' : 'open(no config)');
    this.isOpen = true;
  }

  close(): void {
    this.log.push('close');
    this.isOpen = false;
  }

  controlTransfer(
    bmRequestType: number,
    bRequest: number,
    wValue: number,
    wIndex: number,
    dataOrLength: number | Buffer,
    callback: (error?: Error, data?: Buffer | number) => void
  ): void {
    if (typeof dataOrLength !== 'number') {
      callback(new Error('OUT transfers are not supported'));
      return;
    }
    this.transfers.push({
      requestType: bmRequestType,
      request: bRequest,
      value: wValue,
      index: wIndex,
      length: dataOrLength,
      timeout: this.timeout,
    });

    if (bmRequestType === 0x80 && bRequest === 0x06) {
      const config = this.options.configuration ?? new Uint8Array();
      callback(undefined, Buffer.from(config.subarray(0, dataOrLength)));
      return;
    }
    const clock = this.options.clockResponse;
    if (clock) {
      callback(undefined, Buffer.from(clock));
      return;
    }
    callback(new Error('LIBUSB_ERROR_PIPE'));
  }

  getStringDescriptor(index: number, callback: (error?: Error, value?: string) => void): void {
    const value = this.options.strings?.[index];
    if (value === undefined) {
      callback(new Error('LIBUSB_ERROR_IO'));
      return;
    }
    callback(undefined, value);
  }
}
