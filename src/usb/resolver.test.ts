import { readFile } from 'node:fs/promises';
import { describe, expect, it, vi } from 'vitest';
import type { ControlTransferIn } from '../types.js';
import { TransferError } from './clockQuery.js';
import { createRecordingObserver } from './observer.js';
import { parseAudioDescriptors, requireSampleRate } from './resolver.js';
import {
  acHeader,
  asGeneral,
  audioControlInterface,
  audioStreamingInterface,
  configuration,
  csEndpoint,
  endpointDesc,
  uac1FormatContinuous,
  uac1FormatDiscrete,
  uac2ClockSource,
  uac2FormatTypeI,
} from './testing/descriptors.js';
import { parseHexBytes } from '../utils/hex.js';

const uac2Microphone = () =>
  configuration(
    audioControlInterface(0),
    acHeader(0x0200),
    uac2ClockSource({ id: 5, attributes: 0x01, controls: 0x01 }),
    audioStreamingInterface(1),
    asGeneral(1),
    uac2FormatTypeI({ bits: 24 }),
    endpointDesc({ address: 0x81, maxPacketSize: 200 }),
    csEndpoint()
  );

const respond = (...data: number[]) => vi.fn<ControlTransferIn>(async () => Uint8Array.from(data));

describe('parseAudioDescriptors', () => {
  it('reads the UAC2 clock rate for a streaming format', async () => {
    const transfer = respond(0x80, 0xbb, 0x00, 0x00);

    const profile = await parseAudioDescriptors(uac2Microphone(), { transfer, clockTimeoutMs: 500 });

    expect(profile).toEqual({
      uacVersion: 2,
      sampleRates: [48_000],
      endpoints: [
        {
          address: 0x81,
          maxPacketSize: 200,
          channels: 1,
          bitResolution: 24,
          sampleRate: 48_000,
          sampleRateSettable: true,
          interfaceNumber: 1,
          alternateSetting: 1,
        },
      ],
    });
    expect(transfer).toHaveBeenCalledTimes(1);
    expect(transfer).toHaveBeenCalledWith(0xa1, 0x01, 0x0100, 0x0500, 4, 500);
  });

  it('still returns a profile when the clock read fails', async () => {
    const transfer = respond(0x80, 0xbb, 0x00);
    const observer = createRecordingObserver();

    const profile = await parseAudioDescriptors(uac2Microphone(), { transfer, observer });

    expect(profile).toEqual({ uacVersion: 2, sampleRates: [], endpoints: [] });
    // one read for the format, one more because no rate was found at all
    expect(transfer).toHaveBeenCalledTimes(2);
    const failures = observer.diagnostics.filter((d) => d.event === 'uac2_clock_rate_failed');
    expect(failures.map((d) => d.data)).toEqual([
      { clockId: 5, stage: 'format', reason: 'unexpected_length' },
      { clockId: 5, stage: 'fallback', reason: 'unexpected_length' },
    ]);
    expect(failures[0]?.message).toBe('Failed to read UAC2 sample rate: UAC2 GET_CUR unexpected length: 3 (expected 4)');
  });

  it('reads the selected clock once more when no format asked for it', async () => {
    const transfer = respond(0x00, 0x77, 0x01, 0x00);

    const profile = await parseAudioDescriptors(
      configuration(audioControlInterface(0), acHeader(0x0200), uac2ClockSource({ id: 9, attributes: 3, controls: 3 })),
      { transfer }
    );

    expect(profile).toEqual({ uacVersion: 2, sampleRates: [96_000], endpoints: [] });
    expect(transfer).toHaveBeenCalledWith(0xa1, 0x01, 0x0100, 0x0900, 4, 1_000);
  });

  it('falls back to the earlier rate when a clock read yields nothing', async () => {
    const transfer = respond(0x00, 0x00, 0x00, 0x00);

    const profile = await parseAudioDescriptors(
      configuration(
        audioControlInterface(0),
        acHeader(0x0200),
        uac2ClockSource({ id: 2, attributes: 1, controls: 1 }),
        audioStreamingInterface(1),
        uac1FormatDiscrete({ channels: 2, bits: 16, rates: [44_100] }),
        audioStreamingInterface(1, 2),
        asGeneral(1),
        uac2FormatTypeI({ bits: 16 }),
        endpointDesc({ address: 0x81, maxPacketSize: 96 }),
        csEndpoint(0)
      ),
      { transfer }
    );

    expect(profile.sampleRates).toEqual([44_100]);
    expect(profile.endpoints).toEqual([
      {
        address: 0x81,
        maxPacketSize: 96,
        channels: 1,
        bitResolution: 16,
        sampleRate: 44_100,
        sampleRateSettable: false,
        interfaceNumber: 1,
        alternateSetting: 2,
      },
    ]);
    expect(transfer).toHaveBeenCalledTimes(1);
  });

  it('reports clock reads as unavailable when parsing offline', async () => {
    const observer = createRecordingObserver();

    const profile = await parseAudioDescriptors(uac2Microphone(), { observer });

    expect(profile.sampleRates).toEqual([]);
    expect(
      observer.diagnostics.filter((d) => d.event === 'uac2_clock_rate_failed').map((d) => d.data?.reason)
    ).toEqual(['unavailable', 'unavailable']);
  });

  it('defaults to UAC1 and sorts the rates', async () => {
    const profile = await parseAudioDescriptors(
      configuration(
        audioStreamingInterface(1),
        uac1FormatDiscrete({ channels: 1, bits: 16, rates: [96_000, 32_000] }),
        audioStreamingInterface(2),
        uac1FormatContinuous({ channels: 1, bits: 16, lower: 8_000, upper: 16_000 })
      )
    );

    expect(profile).toEqual({ uacVersion: 1, sampleRates: [8_000, 16_000, 32_000, 96_000], endpoints: [] });
  });

  it('keeps a playback endpoint whose data endpoint is OUT', async () => {
    const profile = await parseAudioDescriptors(
      configuration(
        audioStreamingInterface(1),
        uac1FormatDiscrete({ channels: 2, bits: 16, rates: [48_000] }),
        endpointDesc({ address: 0x01, maxPacketSize: 192 }),
        csEndpoint()
      )
    );

    expect(profile.sampleRates).toEqual([48_000]);
    expect(profile.endpoints).toEqual([
      {
        address: 0,
        maxPacketSize: 0,
        channels: 2,
        bitResolution: 16,
        sampleRate: 48_000,
        sampleRateSettable: true,
        interfaceNumber: 1,
        alternateSetting: 1,
      },
    ]);
  });

  it('decodes the sample dump shipped with the CLI', async () => {
    const text = await readFile(new URL('../../fixtures/uac1-microphone.hex', import.meta.url), 'utf-8');

    const profile = await parseAudioDescriptors(parseHexBytes(text));

    expect(profile).toEqual({
      uacVersion: 1,
      sampleRates: [44_100, 48_000],
      endpoints: [
        {
          address: 0x81,
          maxPacketSize: 96,
          channels: 1,
          bitResolution: 16,
          sampleRate: 48_000,
          sampleRateSettable: true,
          interfaceNumber: 1,
          alternateSetting: 1,
        },
      ],
    });
  });

  it('returns an empty UAC1 profile for an empty buffer', async () => {
    await expect(parseAudioDescriptors(new Uint8Array())).resolves.toEqual({
      uacVersion: 1,
      sampleRates: [],
      endpoints: [],
    });
  });
});

describe('requireSampleRate', () => {
  it('returns the highest known rate', () => {
    expect(requireSampleRate({ uacVersion: 1, sampleRates: [44_100, 48_000], endpoints: [] })).toBe(48_000);
  });

  it('throws when no rate is known', () => {
    expect(() => requireSampleRate({ uacVersion: 2, sampleRates: [], endpoints: [] })).toThrow(TransferError);
    expect(() => requireSampleRate({ uacVersion: 2, sampleRates: [], endpoints: [] })).toThrow(
      'no sample rate could be determined for this device'
    );
  });
});
