import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { loadEnvironment, parseAllowedOrigins, reloadEnvironment, resolvePort } from './env.js';

describe('resolvePort', () => {
  it('prefers a valid PORT', () => {
    expect(resolvePort(4200, { PORT: '8080' })).toBe(8080);
    expect(resolvePort(4200, { PORT: ' 0 ' })).toBe(0);
  });

  it('keeps the configured port otherwise', () => {
    expect(resolvePort(4200, {})).toBe(4200);
    expect(resolvePort(4200, { PORT: '' })).toBe(4200);
    expect(resolvePort(4200, { PORT: 'abc' })).toBe(4200);
    expect(resolvePort(4200, { PORT: '70000' })).toBe(4200);
  });
});

describe('parseAllowedOrigins', () => {
  it('defaults to the local UI origin', () => {
    expect(parseAllowedOrigins({})).toEqual(['http://localhost:4200']);
  });

  it('splits, trims and dedupes', () => {
    expect(parseAllowedOrigins({ ALLOWED_ORIGINS: 'http://a.test, http://b.test,,http://a.test' })).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
  });
});

describe('loadEnvironment', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    delete process.env.USB_AUDIO_TEST_VALUE;
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('loads the file and re-reads it on reload', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'usb-audio-env-'));
    const envPath = path.join(tempDir, '.env');
    await writeFile(envPath, 'USB_AUDIO_TEST_VALUE=first\n', 'utf-8');

    loadEnvironment(envPath);
    expect(process.env.USB_AUDIO_TEST_VALUE).toBe('first');

    await writeFile(envPath, 'USB_AUDIO_TEST_VALUE=second\n', 'utf-8');
    reloadEnvironment();
    expect(process.env.USB_AUDIO_TEST_VALUE).toBe('second');
  });

  it('tolerates a missing file', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'usb-audio-env-'));

    expect(() => loadEnvironment(path.join(tempDir ?? '', '.env'))).not.toThrow();
  });
});
