import type { ControlTransferIn } from '../types.js';
import { TimeoutError, withGrace, withTimeout } from '../utils/timeout.js';
import {
  REQUEST_TYPE_CLASS_INTERFACE_IN,
  TRANSFER_TIMEOUT_GRACE_MS,
  UAC2_CS_SAM_FREQ_CONTROL,
  UAC2_GET_CUR,
} from './constants.js';

export const DEFAULT_CLOCK_QUERY_TIMEOUT_MS = 1_000;
const FREQUENCY_BYTES = 4;

export type TransferFailureReason = 'unexpected_length' | 'timeout' | 'transport' | 'unavailable' | 'no_rate';

export class TransferError extends Error {
  reason: TransferFailureReason;
  clockId?: number;
  actualLength?: number;

  constructor(
    reason: TransferFailureReason,
    message: string,
    details: { clockId?: number; actualLength?: number; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TransferError';
    this.reason = reason;
    this.clockId = details.clockId;
    this.actualLength = details.actualLength;
  }
}

/** Stand-in primitive for parsing without a device: every transfer fails. */
export const unavailableTransfer: ControlTransferIn = async () => {
  throw new TransferError('unavailable', 'no device connection for control transfers');
};

/**
 * Reads the current sampling frequency of a UAC2 Clock Source entity with a
 * class GET_CUR request on its CS_SAM_FREQ_CONTROL selector.
 */
export async function queryClockFrequency(
  transfer: ControlTransferIn,
  clockId: number,
  timeoutMs = DEFAULT_CLOCK_QUERY_TIMEOUT_MS
): Promise<number> {
  let data: Uint8Array;
  try {
    data = await withTimeout(
      transfer(
        REQUEST_TYPE_CLASS_INTERFACE_IN,
        UAC2_GET_CUR,
        UAC2_CS_SAM_FREQ_CONTROL << 8,
        (clockId & 0xff) << 8,
        FREQUENCY_BYTES,
        timeoutMs
      ),
      withGrace(timeoutMs, TRANSFER_TIMEOUT_GRACE_MS)
    );
  } catch (err) {
    if (err instanceof TransferError) throw err;
    if (err instanceof TimeoutError) {
      throw new TransferError('timeout', `UAC2 GET_CUR timed out after ${timeoutMs}ms`, { clockId, cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new TransferError('transport', `UAC2 GET_CUR failed: ${message}`, { clockId, cause: err });
  }

  if (data.byteLength !== FREQUENCY_BYTES) {
    throw new TransferError(
      'unexpected_length',
      `UAC2 GET_CUR unexpected length: ${data.byteLength} (expected ${FREQUENCY_BYTES})`,
      { clockId, actualLength: data.byteLength }
    );
  }

  return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(0, true);
}
