#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import process from 'node:process';
import { createRecordingObserver } from '../src/usb/observer.js';
import { parseAudioDescriptors } from '../src/usb/resolver.js';
import { formatHexBytes, parseHexBytes } from '../src/utils/hex.js';
import { formatProfile } from '../src/utils/profileReport.js';

type ParsedArgs = {
  help: boolean;
  file?: string;
  hex?: string;
  json: boolean;
  verbose: boolean;
};

const USAGE = `
Offline USB Audio Class descriptor decoder

Usage:
  npx tsx scripts/probe-descriptors.ts (--file <dump> | --hex <bytes>) [options]
  npx tsx scripts/probe-descriptors.ts --file fixtures/uac1-microphone.hex --verbose

Options:
  --file <path>   Hex dump of a configuration descriptor (# starts a comment)
  --hex <bytes>   Descriptor bytes inline, e.g. "09 04 01 01 01 01 02 00 00"
  --json          Print the profile as JSON
  --verbose       Print the dump and every decoder diagnostic
  --help          Show this message

UAC2 clock sources cannot be read without a device, so their rates stay unknown.
`;

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false, json: false, verbose: false };

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index] ?? '';
    if (!raw.startsWith('--')) {
      continue;
    }
    const eq = raw.indexOf('=');
    const flag = eq >= 0 ? raw.slice(0, eq) : raw;
    const inlineValue = eq >= 0 ? raw.slice(eq + 1) : undefined;

    const getValue = () => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${flag} needs a value`);
      }
      index += 1;
      return next;
    };

    switch (flag) {
      case '--help':
        result.help = true;
        break;
      case '--file':
        result.file = getValue();
        break;
      case '--hex':
        result.hex = getValue();
        break;
      case '--json':
        result.json = true;
        break;
      case '--verbose':
        result.verbose = true;
        break;
      default:
        console.warn(`Unknown option: ${flag}`);
        break;
    }
  }

  return result;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || (!args.file && !args.hex)) {
    console.log(USAGE);
    return;
  }

  const text = args.file ? readFileSync(resolve(process.cwd(), args.file), 'utf-8') : (args.hex ?? '');
  const raw = parseHexBytes(text);
  const observer = createRecordingObserver();
  const profile = await parseAudioDescriptors(raw, { observer });

  if (args.verbose) {
    console.log(`${raw.byteLength} bytes:\n${formatHexBytes(raw, raw.byteLength)}\n`);
    for (const diagnostic of observer.diagnostics) {
      console.log(`[${diagnostic.level}] ${diagnostic.event}: ${diagnostic.message}`);
    }
    console.log('');
  }

  console.log(args.json ? JSON.stringify(profile, null, 2) : formatProfile(profile));
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
