import type { AudioEndpoint } from '../types.js';
import { hex16, hex8 } from '../utils/hex.js';
import {
  CONTINUOUS_RANGE_STANDARD_RATES,
  DESC_TYPE_CS_ENDPOINT,
  DESC_TYPE_CS_INTERFACE,
  DESC_TYPE_ENDPOINT,
  DESC_TYPE_INTERFACE,
  ENDPOINT_DIR_IN,
  ENDPOINT_XFER_ISOCHRONOUS,
  ENDPOINT_XFER_TYPE_MASK,
  UAC2_BCD_ADC,
  UAC2_CLOCK_SOURCE,
  UAC_AS_GENERAL,
  UAC_FORMAT_TAG_PCM,
  UAC_FORMAT_TYPE,
  UAC_FORMAT_TYPE_I,
  UAC_HEADER,
  USB_CLASS_AUDIO,
  USB_SUBCLASS_AUDIOSTREAMING,
} from './constants.js';
import { readU16LE, readU24LE, readU8, walkDescriptors } from './descriptorReader.js';
import type { DescriptorRecord } from './descriptorReader.js';
import type { DescriptorObserver } from './observer.js';
import { silentObserver } from './observer.js';

/**
 * Where the sample rate of the current format block comes from. UAC2 rates are
 * only known once the resolver has read the clock, so the scanner records a
 * reference to the deferred query plus what to fall back to when it yields
 * nothing.
 */
export type RateSource =
  | { kind: 'static'; rate: number }
  | { kind: 'clock'; queryIndex: number; clockId: number; fallback: RateSource };

export interface PendingEndpoint {
  address: number;
  maxPacketSize: number;
}

export interface ScanState {
  currentInterfaceNumber: number;
  currentAlternateSetting: number;
  foundAudioStreaming: boolean;
  expectingFormat: boolean;
  expectingEndpoint: boolean;
  isUac2Format: boolean;
  /** 0 until a Header is seen; never lowered once it reached 2. */
  uacVersion: 0 | 1 | 2;
  /** First readable UAC2 Clock Source, -1 when none qualified. */
  uac2ClockId: number;
  currentChannels: number;
  currentBitResolution: number;
  currentSampleRate: RateSource;
  pendingEndpoint: PendingEndpoint | null;
  /** Insertion order, no duplicates. */
  sampleRates: readonly number[];
  clockQueryCount: number;
}

export type EndpointCandidate = Omit<AudioEndpoint, 'sampleRate'> & { sampleRate: RateSource };

export interface ClockQueryRequest {
  index: number;
  clockId: number;
  offset: number;
}

export type ScanEvent =
  | {
      type: 'interface';
      offset: number;
      interfaceNumber: number;
      alternateSetting: number;
      endpointCount: number;
      interfaceClass: number;
      interfaceSubClass: number;
      audioStreaming: boolean;
    }
  | { type: 'header'; offset: number; bcdADC: number; uacVersion: 1 | 2 }
  | {
      type: 'clockSource';
      offset: number;
      clockId: number;
      attributes: number;
      controls: number;
      selected: boolean;
    }
  | { type: 'streamFormat'; offset: number; formatTag: number; pcm: boolean }
  | { type: 'uac2Format'; offset: number }
  | {
      type: 'format';
      offset: number;
      uac: 1 | 2;
      channels: number;
      bitResolution: number;
      rates: number[];
      range?: { lower: number; upper: number };
    }
  | { type: 'clockQuery'; offset: number; request: ClockQueryRequest }
  | { type: 'endpoint'; offset: number; address: number; attributes: number; maxPacketSize: number }
  | { type: 'endpointCandidate'; offset: number; candidate: EndpointCandidate }
  | { type: 'truncated'; offset: number; declaredLength: number };

export interface Transition {
  state: ScanState;
  events: ScanEvent[];
}

export interface ScanResult {
  state: ScanState;
  events: ScanEvent[];
  candidates: EndpointCandidate[];
  clockQueries: ClockQueryRequest[];
  bytesConsumed: number;
  truncatedAt?: number;
}

export interface ScanOptions {
  observer?: DescriptorObserver;
}

export function createScanState(): ScanState {
  return {
    currentInterfaceNumber: -1,
    currentAlternateSetting: 0,
    foundAudioStreaming: false,
    expectingFormat: false,
    expectingEndpoint: false,
    isUac2Format: false,
    uacVersion: 0,
    uac2ClockId: -1,
    currentChannels: 1,
    currentBitResolution: 16,
    currentSampleRate: { kind: 'static', rate: 0 },
    pendingEndpoint: null,
    sampleRates: [],
    clockQueryCount: 0,
  };
}

function withRates(rates: readonly number[], added: readonly number[]): readonly number[] {
  const fresh = added.filter((rate, i) => !rates.includes(rate) && added.indexOf(rate) === i);
  return fresh.length === 0 ? rates : [...rates, ...fresh];
}

function hasRate(source: RateSource): boolean {
  return source.kind === 'clock' || source.rate > 0;
}

function applyInterface(state: ScanState, record: DescriptorRecord): Transition {
  if (record.length < 9) return { state, events: [] };

  const interfaceNumber = readU8(record, 2);
  const alternateSetting = readU8(record, 3);
  const endpointCount = readU8(record, 4);
  const interfaceClass = readU8(record, 5);
  const interfaceSubClass = readU8(record, 6);
  const audioStreaming =
    interfaceClass === USB_CLASS_AUDIO && interfaceSubClass === USB_SUBCLASS_AUDIOSTREAMING && endpointCount > 0;

  return {
    state: {
      ...state,
      currentInterfaceNumber: interfaceNumber,
      currentAlternateSetting: alternateSetting,
      foundAudioStreaming: audioStreaming,
      expectingFormat: audioStreaming,
      isUac2Format: audioStreaming ? false : state.isUac2Format,
      expectingEndpoint: false,
      pendingEndpoint: null,
    },
    events: [
      {
        type: 'interface',
        offset: record.offset,
        interfaceNumber,
        alternateSetting,
        endpointCount,
        interfaceClass,
        interfaceSubClass,
        audioStreaming,
      },
    ],
  };
}

function applyUac1FormatTypeI(state: ScanState, record: DescriptorRecord): Transition {
  if (record.length < 8 || readU8(record, 3) !== UAC_FORMAT_TYPE_I) return { state, events: [] };

  const channels = readU8(record, 4);
  const bitResolution = readU8(record, 6);
  const samFreqType = readU8(record, 7);

  let rates: number[];
  let range: { lower: number; upper: number } | undefined;
  let currentRate: number;

  if (samFreqType === 0 && record.length >= 14) {
    const lower = readU24LE(record, 8);
    const upper = readU24LE(record, 11);
    range = { lower, upper };
    const standard = CONTINUOUS_RANGE_STANDARD_RATES.filter((rate) => rate >= lower && rate <= upper);
    rates = [...withRates([lower, upper], standard)];
    currentRate = upper;
  } else {
    rates = [];
    for (let i = 0; i < samFreqType; i += 1) {
      const at = 8 + i * 3;
      if (at + 3 > record.length) break;
      rates.push(readU24LE(record, at));
    }
    currentRate = rates.reduce((max, rate) => Math.max(max, rate), 0);
  }

  return {
    state: {
      ...state,
      currentChannels: channels,
      currentBitResolution: bitResolution,
      currentSampleRate: { kind: 'static', rate: currentRate },
      sampleRates: withRates(state.sampleRates, rates),
      expectingFormat: false,
      expectingEndpoint: true,
    },
    events: [
      {
        type: 'format',
        offset: record.offset,
        uac: 1,
        channels,
        bitResolution,
        rates,
        ...(range ? { range } : {}),
      },
    ],
  };
}

function applyUac2FormatTypeI(state: ScanState, record: DescriptorRecord): Transition {
  if (record.length < 6 || readU8(record, 3) !== UAC_FORMAT_TYPE_I) return { state, events: [] };

  const bitResolution = readU8(record, 5);
  const events: ScanEvent[] = [
    { type: 'format', offset: record.offset, uac: 2, channels: 1, bitResolution, rates: [] },
  ];

  let currentSampleRate = state.currentSampleRate;
  let clockQueryCount = state.clockQueryCount;
  if (state.uac2ClockId >= 0) {
    const request: ClockQueryRequest = { index: clockQueryCount, clockId: state.uac2ClockId, offset: record.offset };
    clockQueryCount += 1;
    currentSampleRate = {
      kind: 'clock',
      queryIndex: request.index,
      clockId: request.clockId,
      fallback: state.currentSampleRate,
    };
    events.push({ type: 'clockQuery', offset: record.offset, request });
  }

  return {
    state: {
      ...state,
      // The target devices are mono; UAC2 carries the count in the cluster, not here.
      currentChannels: 1,
      currentBitResolution: bitResolution,
      currentSampleRate,
      clockQueryCount,
      expectingFormat: false,
      isUac2Format: false,
      expectingEndpoint: true,
    },
    events,
  };
}

function applyClassInterface(state: ScanState, record: DescriptorRecord): Transition {
  if (record.length < 3) return { state, events: [] };

  const subtype = readU8(record, 2);
  const events: ScanEvent[] = [];
  let next = state;

  // HEADER and AS_GENERAL share a subtype; inside a streaming scope it is AS_GENERAL.
  if (subtype === UAC_HEADER && !next.foundAudioStreaming && record.length >= 6) {
    const bcdADC = readU8(record, 4) | (readU8(record, 3) << 8);
    let uacVersion = next.uacVersion;
    if (bcdADC >= UAC2_BCD_ADC) {
      uacVersion = 2;
    } else if (uacVersion === 0) {
      uacVersion = 1;
    }
    next = { ...next, uacVersion };
    events.push({ type: 'header', offset: record.offset, bcdADC, uacVersion: uacVersion === 2 ? 2 : 1 });
  }

  if (subtype === UAC2_CLOCK_SOURCE && record.length >= 8) {
    const clockId = readU8(record, 3);
    const attributes = readU8(record, 4);
    const controls = readU8(record, 5);
    const qualifies = (attributes & 0x03) !== 0 && (controls & 0x01) !== 0;
    const selected = qualifies && next.uac2ClockId < 0;
    if (selected) next = { ...next, uac2ClockId: clockId };
    events.push({ type: 'clockSource', offset: record.offset, clockId, attributes, controls, selected });
  }

  if (next.foundAudioStreaming && subtype === UAC_AS_GENERAL && next.expectingFormat && record.length >= 7) {
    const formatTag = readU16LE(record, 5);
    events.push({ type: 'streamFormat', offset: record.offset, formatTag, pcm: formatTag === UAC_FORMAT_TAG_PCM });
  }

  if (next.foundAudioStreaming && subtype === UAC_FORMAT_TYPE && next.expectingFormat && !next.isUac2Format) {
    const applied = applyUac1FormatTypeI(next, record);
    next = applied.state;
    events.push(...applied.events);
  }

  if (next.foundAudioStreaming && next.uacVersion === 2 && subtype === UAC_AS_GENERAL && next.expectingFormat) {
    next = { ...next, isUac2Format: true };
    events.push({ type: 'uac2Format', offset: record.offset });
  }

  if (next.foundAudioStreaming && next.uacVersion === 2 && subtype === UAC_FORMAT_TYPE && next.isUac2Format) {
    const applied = applyUac2FormatTypeI(next, record);
    next = applied.state;
    events.push(...applied.events);
  }

  return { state: next, events };
}

function applyEndpoint(state: ScanState, record: DescriptorRecord): Transition {
  if (record.length < 7 || !state.expectingEndpoint) return { state, events: [] };

  const address = readU8(record, 2);
  const attributes = readU8(record, 3);
  const maxPacketSize = readU16LE(record, 4);
  const events: ScanEvent[] = [{ type: 'endpoint', offset: record.offset, address, attributes, maxPacketSize }];

  const isInput = (address & ENDPOINT_DIR_IN) !== 0;
  const isIsochronous = (attributes & ENDPOINT_XFER_TYPE_MASK) === ENDPOINT_XFER_ISOCHRONOUS;
  if (!isInput || !isIsochronous) return { state, events };

  return {
    state: { ...state, expectingEndpoint: false, pendingEndpoint: { address, maxPacketSize } },
    events,
  };
}

function applyClassEndpoint(state: ScanState, record: DescriptorRecord): Transition {
  if (record.length < 4 || !state.foundAudioStreaming || !hasRate(state.currentSampleRate)) {
    return { state, events: [] };
  }

  // 0 when the block had no IN isochronous endpoint (playback interfaces).
  const candidate: EndpointCandidate = {
    address: state.pendingEndpoint?.address ?? 0,
    maxPacketSize: state.pendingEndpoint?.maxPacketSize ?? 0,
    channels: state.currentChannels,
    bitResolution: state.currentBitResolution,
    sampleRate: state.currentSampleRate,
    sampleRateSettable: (readU8(record, 3) & 0x01) !== 0,
    interfaceNumber: state.currentInterfaceNumber,
    alternateSetting: state.currentAlternateSetting,
  };
  return {
    state: { ...state, pendingEndpoint: null },
    events: [{ type: 'endpointCandidate', offset: record.offset, candidate }],
  };
}

/**
 * Applies one descriptor record to the scan state. Pure: no device access,
 * the input state is left untouched.
 */
export function applyDescriptor(state: ScanState, record: DescriptorRecord): Transition {
  switch (record.type) {
    case DESC_TYPE_INTERFACE:
      return applyInterface(state, record);
    case DESC_TYPE_CS_INTERFACE:
      return applyClassInterface(state, record);
    case DESC_TYPE_ENDPOINT:
      return applyEndpoint(state, record);
    case DESC_TYPE_CS_ENDPOINT:
      return applyClassEndpoint(state, record);
    default:
      return { state, events: [] };
  }
}

function reportEvent(observer: DescriptorObserver, event: ScanEvent): void {
  switch (event.type) {
    case 'header':
      observer({
        level: 'debug',
        event: 'uac_header',
        message: `UAC header bcdADC=${hex16(event.bcdADC)} -> UAC${event.uacVersion}`,
        data: { offset: event.offset, bcdADC: event.bcdADC },
      });
      return;
    case 'clockSource':
      if (event.selected) {
        observer({
          level: 'debug',
          event: 'uac2_clock_source',
          message: `UAC2 clock source id=${event.clockId}`,
          data: { offset: event.offset, clockId: event.clockId },
        });
      }
      return;
    case 'streamFormat':
      observer({
        level: event.pcm ? 'debug' : 'info',
        event: 'as_general',
        message: event.pcm ? 'PCM stream format' : `non-PCM stream format tag ${hex16(event.formatTag)}`,
        data: { offset: event.offset, formatTag: event.formatTag },
      });
      return;
    case 'format':
      observer({
        level: 'debug',
        event: 'format_type_i',
        message: event.range
          ? `UAC${event.uac} continuous rate ${event.range.lower}-${event.range.upper} Hz`
          : `UAC${event.uac} format, ${event.rates.length} discrete rate(s)`,
        data: { offset: event.offset, channels: event.channels, bitResolution: event.bitResolution, rates: event.rates },
      });
      return;
    case 'endpoint':
      observer({
        level: 'debug',
        event: 'endpoint',
        message: `endpoint addr=${hex8(event.address)} maxPacket=${event.maxPacketSize}`,
        data: { offset: event.offset, attributes: event.attributes },
      });
      return;
    case 'truncated':
      observer({
        level: 'warn',
        event: 'descriptor_truncated',
        message: `descriptor at offset ${event.offset} declares length ${event.declaredLength}; scan stopped`,
        data: { offset: event.offset, declaredLength: event.declaredLength },
      });
      return;
    default:
      return;
  }
}

/**
 * Single forward pass over a raw configuration descriptor. Malformed data ends
 * the pass early; it is never an exception.
 */
export function scanDescriptors(raw: Uint8Array, options: ScanOptions = {}): ScanResult {
  const observer = options.observer ?? silentObserver;
  const walk = walkDescriptors(raw);
  const events: ScanEvent[] = [];
  let state = createScanState();

  for (const record of walk.records) {
    const transition = applyDescriptor(state, record);
    state = transition.state;
    for (const event of transition.events) {
      events.push(event);
      reportEvent(observer, event);
    }
  }

  if (walk.truncation) {
    const event: ScanEvent = { type: 'truncated', ...walk.truncation };
    events.push(event);
    reportEvent(observer, event);
  }

  const candidates: EndpointCandidate[] = [];
  const clockQueries: ClockQueryRequest[] = [];
  for (const event of events) {
    if (event.type === 'endpointCandidate') candidates.push(event.candidate);
    if (event.type === 'clockQuery') clockQueries.push(event.request);
  }

  const result: ScanResult = { state, events, candidates, clockQueries, bytesConsumed: walk.consumed };
  if (walk.truncation) result.truncatedAt = walk.truncation.offset;
  return result;
}
