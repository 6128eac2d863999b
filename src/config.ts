import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { AppConfig } from './types.js';

export type { AppConfig } from './types.js';

const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65_535).default(4200),
    })
    .default({}),
  usb: z
    .object({
      controlTimeoutMs: z.number().int().min(1).max(60_000).default(1_000),
      descriptorTimeoutMs: z.number().int().min(1).max(60_000).default(1_000),
      audioOnly: z.boolean().default(false),
    })
    .default({}),
});

let cachedConfig: AppConfig | null = null;

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw);
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw err;
    }
    raw = '{}';
  }
  cachedConfig = parseConfig(JSON.parse(raw));
  return cachedConfig;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
