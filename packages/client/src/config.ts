/**
 * Client configuration: per-vendor credentials and endpoints, read from a
 * YAML (or JSON) file and completed from environment variables.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import YAML from 'yaml';
import { LlmError, isVendorId, type VendorId } from '@llm-unify/core';

export interface ProviderSettings {
  apiKey?: string;
  /** Overrides the vendor's default base URL */
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra request headers, e.g. for a gateway in front of the vendor */
  headers?: Record<string, string>;
}

export interface LlmUnifyConfig {
  /** Vendor used when a caller does not name one. Default: openai */
  defaultVendor: VendorId;
  /** Request timeout in milliseconds. Default: 60000 */
  timeoutMs: number;
  /** Log one line per request. Default: false */
  debug: boolean;
  providers: Partial<Record<VendorId, ProviderSettings>>;
}

/** Environment variable holding each vendor's API key */
export const API_KEY_ENV: Readonly<Record<VendorId, string>> = {
  openai: 'OPENAI_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  moonshot: 'MOONSHOT_API_KEY',
  zhipu: 'ZHIPU_API_KEY',
  volcengine: 'ARK_API_KEY',
  ollama: 'OLLAMA_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
  aliyun: 'DASHSCOPE_API_KEY',
};

export const CONFIG_PATH_ENV = 'LLM_UNIFY_CONFIG';

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] || join(homedir(), '.llm-unify', 'config.yaml');
}

export function getDefaultConfig(): LlmUnifyConfig {
  return {
    defaultVendor: 'openai',
    timeoutMs: 60_000,
    debug: false,
    providers: {},
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Validate one provider entry, dropping invalid fields with a warning.
 */
function validateProvider(id: string, raw: unknown): ProviderSettings | undefined {
  if (!isPlainObject(raw)) {
    console.warn(`[config] providers.${id}: must be an object, skipping`);
    return undefined;
  }

  const settings: ProviderSettings = {};

  if (raw.apiKey !== undefined) {
    if (typeof raw.apiKey === 'string' && raw.apiKey.length > 0) {
      settings.apiKey = raw.apiKey;
    } else {
      console.warn(`[config] providers.${id}.apiKey: must be a non-empty string, ignoring`);
    }
  }

  if (raw.baseUrl !== undefined) {
    if (typeof raw.baseUrl === 'string' && /^https?:\/\//.test(raw.baseUrl)) {
      settings.baseUrl = raw.baseUrl;
    } else {
      console.warn(`[config] providers.${id}.baseUrl: must be an http(s) URL, ignoring`);
    }
  }

  if (raw.timeoutMs !== undefined) {
    if (isPositiveNumber(raw.timeoutMs)) {
      settings.timeoutMs = raw.timeoutMs;
    } else {
      console.warn(`[config] providers.${id}.timeoutMs: must be a positive number, ignoring`);
    }
  }

  if (raw.headers !== undefined) {
    if (isPlainObject(raw.headers)) {
      const headers: Record<string, string> = {};
      for (const [name, value] of Object.entries(raw.headers)) {
        if (typeof value === 'string') {
          headers[name] = value;
        } else {
          console.warn(`[config] providers.${id}.headers.${name}: must be a string, ignoring`);
        }
      }
      settings.headers = headers;
    } else {
      console.warn(`[config] providers.${id}.headers: must be an object, ignoring`);
    }
  }

  return settings;
}

/**
 * Merge a parsed configuration document over the defaults. Invalid entries
 * are skipped with a warning; only a document that is not an object at all
 * is an error.
 */
export function parseConfig(raw: unknown, source = 'configuration'): LlmUnifyConfig {
  const config = getDefaultConfig();
  if (raw === null || raw === undefined) return config;

  if (!isPlainObject(raw)) {
    throw new LlmError(`${source}: top level must be a mapping`, 'config');
  }

  if (raw.defaultVendor !== undefined) {
    if (isVendorId(raw.defaultVendor)) {
      config.defaultVendor = raw.defaultVendor;
    } else {
      console.warn(`[config] defaultVendor: unknown vendor ${String(raw.defaultVendor)}, using ${config.defaultVendor}`);
    }
  }

  if (raw.timeoutMs !== undefined) {
    if (isPositiveNumber(raw.timeoutMs)) {
      config.timeoutMs = raw.timeoutMs;
    } else {
      console.warn('[config] timeoutMs: must be a positive number, ignoring');
    }
  }

  if (raw.debug !== undefined) {
    if (typeof raw.debug === 'boolean') {
      config.debug = raw.debug;
    } else {
      console.warn('[config] debug: must be a boolean, ignoring');
    }
  }

  if (raw.providers !== undefined) {
    if (!isPlainObject(raw.providers)) {
      console.warn('[config] providers: must be a mapping, ignoring');
    } else {
      for (const [id, entry] of Object.entries(raw.providers)) {
        if (!isVendorId(id)) {
          console.warn(`[config] providers.${id}: unknown vendor, skipping`);
          continue;
        }
        const settings = validateProvider(id, entry);
        if (settings) config.providers[id] = settings;
      }
    }
  }

  return config;
}

function isMissingFile(err: unknown): boolean {
  return isPlainObject(err) && err.code === 'ENOENT';
}

/**
 * Load configuration from `path` (default: `getConfigPath()`). A missing
 * file yields the defaults. YAML is a superset of JSON, so `.json` files
 * load the same way.
 */
export async function loadConfig(path?: string): Promise<LlmUnifyConfig> {
  const configPath = path ?? getConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      return getDefaultConfig();
    }
    throw new LlmError(`Cannot read configuration ${configPath}`, 'config', { cause: err });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new LlmError(`Cannot parse configuration ${configPath}: ${detail}`, 'config', { cause: err });
  }

  return parseConfig(raw, configPath);
}

/**
 * Fill API keys the file leaves unset from the vendors' environment
 * variables. Keys from the file win. Returns a new config.
 */
export function applyEnvironment(config: LlmUnifyConfig, env: NodeJS.ProcessEnv = process.env): LlmUnifyConfig {
  const providers: Partial<Record<VendorId, ProviderSettings>> = { ...config.providers };

  for (const [id, variable] of Object.entries(API_KEY_ENV)) {
    if (!isVendorId(id)) continue;
    const fromEnv = env[variable];
    if (!fromEnv || providers[id]?.apiKey) continue;
    providers[id] = { ...providers[id], apiKey: fromEnv };
  }

  return { ...config, providers };
}
