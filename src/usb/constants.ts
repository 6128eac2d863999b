// Standard descriptor types
export const DESC_TYPE_CONFIGURATION = 0x02;
export const DESC_TYPE_INTERFACE = 0x04;
export const DESC_TYPE_ENDPOINT = 0x05;

// Audio class-specific descriptor types
export const DESC_TYPE_CS_INTERFACE = 0x24;
export const DESC_TYPE_CS_ENDPOINT = 0x25;

export const USB_CLASS_AUDIO = 0x01;
export const USB_SUBCLASS_AUDIOCONTROL = 0x01;
export const USB_SUBCLASS_AUDIOSTREAMING = 0x02;

// CS_INTERFACE subtypes. HEADER and AS_GENERAL share 0x01: the former lives in
// the AudioControl interface, the latter in an AudioStreaming one.
export const UAC_HEADER = 0x01;
export const UAC_AS_GENERAL = 0x01;
export const UAC_FORMAT_TYPE = 0x02;
export const UAC2_CLOCK_SOURCE = 0x0a;

export const UAC_FORMAT_TYPE_I = 0x01;
export const UAC_FORMAT_TAG_PCM = 0x0001;
export const UAC2_BCD_ADC = 0x0200;

export const ENDPOINT_DIR_IN = 0x80;
export const ENDPOINT_XFER_TYPE_MASK = 0x03;
export const ENDPOINT_XFER_ISOCHRONOUS = 0x01;

// Control requests
export const REQUEST_TYPE_STANDARD_DEVICE_IN = 0x80;
export const REQUEST_TYPE_CLASS_INTERFACE_IN = 0xa1;
export const REQUEST_GET_DESCRIPTOR = 0x06;
export const UAC2_GET_CUR = 0x01;
export const UAC2_CS_SAM_FREQ_CONTROL = 0x01;

export const CONFIGURATION_DESCRIPTOR_LENGTH = 9;

/** Added to a transfer's own timeout for the outer timer, so libusb reports first. */
export const TRANSFER_TIMEOUT_GRACE_MS = 100;

/** Rates advertised for a UAC1 continuous range when they fall inside it. */
export const CONTINUOUS_RANGE_STANDARD_RATES: readonly number[] = [
  44_100, 48_000, 96_000, 192_000, 256_000, 384_000, 500_000,
];
