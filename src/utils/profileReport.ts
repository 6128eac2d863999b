import type { CapabilityProfile } from '../types.js';
import { hex8 } from './hex.js';

const formatRate = (rate: number) => (rate % 1000 === 0 ? `${rate / 1000} kHz` : `${(rate / 1000).toFixed(1)} kHz`);

/** Human-readable summary of a capability profile, one fact per line. */
export function formatProfile(profile: CapabilityProfile): string {
  const lines = [
    `UAC version: ${profile.uacVersion}`,
    `Sample rates: ${profile.sampleRates.length > 0 ? profile.sampleRates.map(formatRate).join(', ') : 'unknown'}`,
  ];
  if (profile.endpoints.length === 0) {
    lines.push('Endpoints: none');
    return lines.join('\n');
  }
  lines.push('Endpoints:');
  for (const ep of profile.endpoints) {
    lines.push(
      `  ${hex8(ep.address)} iface ${ep.interfaceNumber} alt ${ep.alternateSetting}: ` +
        `${ep.channels} ch, ${ep.bitResolution} bit, ${formatRate(ep.sampleRate)}` +
        `${ep.sampleRateSettable ? ' (settable)' : ''}, max packet ${ep.maxPacketSize}`
    );
  }
  return lines.join('\n');
}
