import type { AudioEndpoint, CapabilityProfile, ControlTransferIn } from '../types.js';
import { DEFAULT_CLOCK_QUERY_TIMEOUT_MS, TransferError, queryClockFrequency, unavailableTransfer } from './clockQuery.js';
import type { DescriptorObserver } from './observer.js';
import { silentObserver } from './observer.js';
import { scanDescriptors } from './scanner.js';
import type { RateSource, ScanResult } from './scanner.js';

export interface ResolveOptions {
  /** Omit to resolve offline; clock queries then fail and are reported. */
  transfer?: ControlTransferIn;
  clockTimeoutMs?: number;
  observer?: DescriptorObserver;
}

type ClockReading = { ok: true; rate: number } | { ok: false; error: TransferError };

function toTransferError(err: unknown, clockId: number): TransferError {
  if (err instanceof TransferError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransferError('transport', message, { clockId, cause: err });
}

function resolveRate(source: RateSource, readings: readonly ClockReading[]): number {
  if (source.kind === 'static') return source.rate;
  const reading = readings[source.queryIndex];
  if (reading?.ok && reading.rate > 0) return reading.rate;
  return resolveRate(source.fallback, readings);
}

/**
 * Turns a scan into a capability profile. Performs the clock reads the scan
 * deferred, one attempt each; a failed read only leaves its rate out.
 */
export async function resolveCapabilities(scan: ScanResult, options: ResolveOptions = {}): Promise<CapabilityProfile> {
  const transfer = options.transfer ?? unavailableTransfer;
  const timeoutMs = options.clockTimeoutMs ?? DEFAULT_CLOCK_QUERY_TIMEOUT_MS;
  const observer = options.observer ?? silentObserver;
  const rates = new Set(scan.state.sampleRates);

  const readClock = async (clockId: number, stage: 'format' | 'fallback'): Promise<ClockReading> => {
    try {
      const rate = await queryClockFrequency(transfer, clockId, timeoutMs);
      observer({
        level: 'info',
        event: 'uac2_clock_rate',
        message: `UAC2 sample rate: ${rate} Hz`,
        data: { clockId, rate, stage },
      });
      if (rate > 0) rates.add(rate);
      return { ok: true, rate };
    } catch (err) {
      const error = toTransferError(err, clockId);
      observer({
        level: 'warn',
        event: 'uac2_clock_rate_failed',
        message: `Failed to read UAC2 sample rate: ${error.message}`,
        data: { clockId, stage, reason: error.reason },
      });
      return { ok: false, error };
    }
  };

  // Sequential on purpose: one outstanding control transfer per device.
  const readings: ClockReading[] = [];
  for (const request of scan.clockQueries) {
    readings[request.index] = await readClock(request.clockId, 'format');
  }

  if (scan.state.uac2ClockId >= 0 && rates.size === 0) {
    await readClock(scan.state.uac2ClockId, 'fallback');
  }

  const endpoints: AudioEndpoint[] = [];
  for (const candidate of scan.candidates) {
    const sampleRate = resolveRate(candidate.sampleRate, readings);
    if (sampleRate > 0) endpoints.push({ ...candidate, sampleRate });
  }

  return {
    uacVersion: scan.state.uacVersion === 2 ? 2 : 1,
    sampleRates: [...rates].sort((a, b) => a - b),
    endpoints,
  };
}

export async function parseAudioDescriptors(
  raw: Uint8Array,
  options: ResolveOptions = {}
): Promise<CapabilityProfile> {
  const scan = scanDescriptors(raw, { observer: options.observer });
  return resolveCapabilities(scan, options);
}

/** For callers that cannot proceed without at least one known sample rate. */
export function requireSampleRate(profile: CapabilityProfile): number {
  const highest = profile.sampleRates.at(-1);
  if (highest === undefined) {
    throw new TransferError('no_rate', 'no sample rate could be determined for this device');
  }
  return highest;
}
