export interface DescriptorRecord {
  /** Offset of `bLength` inside the configuration buffer. */
  offset: number;
  length: number;
  type: number;
  /** The whole record, `bLength` and `bDescriptorType` included. */
  bytes: Uint8Array;
}

export interface DescriptorTruncation {
  offset: number;
  declaredLength: number;
}

export interface DescriptorWalk {
  records: DescriptorRecord[];
  /** Bytes covered by well-formed records. */
  consumed: number;
  /** Set when the walk stopped before the end of the buffer. */
  truncation?: DescriptorTruncation;
}

/**
 * Splits a configuration descriptor into its length-prefixed records, in
 * order. Stops silently at the first record that is shorter than its own
 * header or that would run past the end of the buffer.
 */
export function walkDescriptors(raw: Uint8Array): DescriptorWalk {
  const records: DescriptorRecord[] = [];
  let offset = 0;
  while (offset < raw.length) {
    const length = raw[offset] ?? 0;
    if (length < 2 || offset + length > raw.length) {
      return { records, consumed: offset, truncation: { offset, declaredLength: length } };
    }
    records.push({
      offset,
      length,
      type: raw[offset + 1] ?? 0,
      bytes: raw.subarray(offset, offset + length),
    });
    offset += length;
  }
  return { records, consumed: offset };
}

export function readU8(record: DescriptorRecord, index: number): number {
  return record.bytes[index] ?? 0;
}

export function readU16LE(record: DescriptorRecord, index: number): number {
  return readU8(record, index) | (readU8(record, index + 1) << 8);
}

/** 3-byte little-endian sample frequency as used by UAC1 format descriptors. */
export function readU24LE(record: DescriptorRecord, index: number): number {
  return readU8(record, index) | (readU8(record, index + 1) << 8) | (readU8(record, index + 2) << 16);
}
