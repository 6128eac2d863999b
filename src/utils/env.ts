import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');
const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:4200'];
let loadedEnvPath = DEFAULT_ENV_PATH;

function load(envPath: string) {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  loadedEnvPath = resolved;
  if (result.error && (result.error as NodeJS.ErrnoException).code !== 'ENOENT') {
    throw result.error;
  }
}

export function loadEnvironment(envPath?: string) {
  load(envPath ?? DEFAULT_ENV_PATH);
}

export function reloadEnvironment() {
  load(loadedEnvPath);
}

/** `PORT` wins over the configured port when it holds a valid number. */
export function resolvePort(configuredPort: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.PORT?.trim();
  if (!raw) return configuredPort;
  const fromEnv = Number(raw);
  return Number.isInteger(fromEnv) && fromEnv >= 0 && fromEnv <= 65_535 ? fromEnv : configuredPort;
}

export function parseAllowedOrigins(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env.ALLOWED_ORIGINS;
  const list = raw
    ? raw
        .split(',')
        .map((v) => v.trim())
        .filter(Boolean)
    : DEFAULT_ALLOWED_ORIGINS;
  return Array.from(new Set(list));
}
