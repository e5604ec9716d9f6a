import fs from 'fs';
import path from 'path';
import { IOFailure, Result, fail, ok } from './errors.js';
import { DEFAULT_CHAR_LIMIT } from './quota.js';

export const API_KEY = 'deepl_api_key';

/** Key-value persistence for the provider credential. */
export interface ConfigStore {
  get(key: string): string | undefined;
  set(key: string, value: string): Result<void, IOFailure>;
}

export class MemoryConfigStore implements ConfigStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
  }

  get(key: string) {
    return this.values.get(key);
  }

  set(key: string, value: string): Result<void, IOFailure> {
    this.values.set(key, value);
    return ok(undefined);
  }
}

/**
 * Stores settings as a flat JSON object. A missing file reads as
 * { "deepl_api_key": "" }; an unreadable one as empty.
 */
export class JsonFileConfigStore implements ConfigStore {
  constructor(private readonly filePath: string) {}

  private read(): Record<string, string> {
    if (!fs.existsSync(this.filePath)) {
      return { [API_KEY]: '' };
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const values: Record<string, string> = {};
      if (typeof parsed === 'object' && parsed !== null) {
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string') values[key] = value;
        }
      }
      return values;
    } catch (err) {
      console.error(`[Config] Failed to read ${this.filePath}:`, err instanceof Error ? err.message : err);
      return {};
    }
  }

  get(key: string) {
    return this.read()[key];
  }

  set(key: string, value: string): Result<void, IOFailure> {
    const values = { ...this.read(), [key]: value };
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(values));
      return ok(undefined);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail({ kind: 'IOFailure', message: `Could not write ${this.filePath}: ${message}` });
    }
  }
}

export interface ServerConfig {
  port: number;
  dataDir: string;
  configPath: string;
  charLimit: number;
  deeplApiUrl?: string;
  requestTimeoutMs: number;
  maxRetries: number;
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig {
  return {
    port: readInt(env, 'PORT', 3001, 0),
    dataDir: path.resolve(cwd, env.DATA_DIR || 'data'),
    configPath: path.resolve(cwd, env.CONFIG_PATH || 'config.json'),
    charLimit: readInt(env, 'CHAR_LIMIT', DEFAULT_CHAR_LIMIT, 1),
    deeplApiUrl: env.DEEPL_API_URL || undefined,
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', 30_000, 1),
    maxRetries: readInt(env, 'MAX_RETRIES', 2, 0)
  };
}
