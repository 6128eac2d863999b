export class HexParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HexParseError';
  }
}

/**
 * Parses a hex dump such as `09 02 64 00`, `0x09,0x02` or `09026400`.
 * `#` starts a comment that runs to the end of the line.
 */
export function parseHexBytes(text: string): Uint8Array {
  const tokens = text
    .split('\n')
    .map((line) => line.replace(/#.*$/, ''))
    .join(' ')
    .split(/[\s,]+/)
    .filter(Boolean)
    .map((token) => token.replace(/^0x/i, ''));

  const digits: string[] = [];
  for (const token of tokens) {
    if (!/^[0-9a-f]+$/i.test(token)) {
      throw new HexParseError(`invalid hex token: ${token}`);
    }
    if (token.length <= 2) {
      digits.push(token.padStart(2, '0'));
      continue;
    }
    if (token.length % 2 !== 0) {
      throw new HexParseError(`odd number of hex digits in: ${token}`);
    }
    for (let i = 0; i < token.length; i += 2) {
      digits.push(token.slice(i, i + 2));
    }
  }

  return Uint8Array.from(digits, (pair) => Number.parseInt(pair, 16));
}

export function formatHexBytes(bytes: Uint8Array, maxBytes = 256, columns = 16): string {
  const limit = Math.max(0, maxBytes | 0);
  const cols = Math.max(1, columns | 0);
  const head = bytes.subarray(0, Math.min(bytes.byteLength, limit));
  const parts = Array.from(head, (b) => b.toString(16).padStart(2, '0'));

  let hex = '';
  for (let i = 0; i < parts.length; i += 1) {
    if (i !== 0) hex += i % cols === 0 ? '\n' : ' ';
    hex += parts[i];
  }

  if (bytes.byteLength <= limit) return hex;
  const suffix = `… (+${bytes.byteLength - limit} bytes)`;
  return hex ? `${hex}\n${suffix}` : suffix;
}

export function hex8(value: number): string {
  return `0x${(value & 0xff).toString(16).padStart(2, '0')}`;
}

export function hex16(value: number): string {
  return `0x${(value & 0xffff).toString(16).padStart(4, '0')}`;
}
