/**
 * Configuration loading and management
 */

import { fileExists, readJSON } from './fileio.js';
import { ConfigError } from './errors.js';

export interface PyDocConfig {
  endpoint?: string;
  model?: string;
  apiKey?: string;
  timeoutMs?: number;
  retries?: number;
  concurrency?: number;
  styleTemplate?: string;
  include?: string;
  ignore?: string[];
  docOutputDir?: string;
}

/**
 * Explicit configuration handed to the docstring engine. Every field is
 * resolved before the engine is constructed.
 */
export interface EngineOptions {
  endpoint: string;
  model: string;
  apiKey: string | undefined;
  timeoutMs: number;
  retries: number;
  concurrency: number;
  styleTemplate?: string;
}

export const DEFAULT_CONFIG = {
  endpoint: 'http://localhost:11434/v1',
  model: 'qwen2.5-coder:7b',
  timeoutMs: 60_000,
  retries: 0,
  concurrency: 1,
  include: '**/*.py',
  ignore: ['.venv', 'venv', 'env', '.git', '__pycache__', 'node_modules'],
} satisfies PyDocConfig;

export const CONFIG_FILE_NAMES = ['.pydocsmithrc.json', 'pydocsmith.config.json'];

const STRING_KEYS = ['endpoint', 'model', 'apiKey', 'styleTemplate', 'include', 'docOutputDir'];
const NUMBER_KEYS = ['timeoutMs', 'retries', 'concurrency'];

export async function loadConfig(configPath?: string): Promise<PyDocConfig> {
  const paths = [configPath, ...CONFIG_FILE_NAMES].filter(
    (p): p is string => typeof p === 'string' && p.length > 0,
  );

  for (const p of paths) {
    if (await fileExists(p)) {
      let raw: unknown;
      try {
        raw = await readJSON(p);
      } catch {
        throw new ConfigError(`Invalid config file: ${p}`);
      }
      return { ...DEFAULT_CONFIG, ...validateConfig(raw, p) };
    }
  }

  if (configPath) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  return { ...DEFAULT_CONFIG };
}

export function validateConfig(raw: unknown, source: string): PyDocConfig {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Config in ${source} must be a JSON object`);
  }
  const entries = Object.entries(raw);
  const config: PyDocConfig = {};

  for (const [key, value] of entries) {
    if (value === undefined || value === null) continue;
    if (STRING_KEYS.includes(key)) {
      if (typeof value !== 'string') {
        throw new ConfigError(`"${key}" in ${source} must be a string`);
      }
      Object.assign(config, { [key]: value });
    } else if (NUMBER_KEYS.includes(key)) {
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new ConfigError(`"${key}" in ${source} must be a non-negative number`);
      }
      Object.assign(config, { [key]: value });
    } else if (key === 'ignore') {
      if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
        throw new ConfigError(`"ignore" in ${source} must be an array of strings`);
      }
      config.ignore = value.map(String);
    } else {
      throw new ConfigError(`Unknown option "${key}" in ${source}`);
    }
  }

  if (config.concurrency !== undefined && config.concurrency < 1) {
    throw new ConfigError(`"concurrency" in ${source} must be at least 1`);
  }
  return config;
}

export function resolveApiKey(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (explicit) return explicit;
  const fromEnv = env.OPENAI_API_KEY;
  return fromEnv ? fromEnv : undefined;
}

export function toEngineOptions(config: PyDocConfig): EngineOptions {
  return {
    endpoint: config.endpoint ?? DEFAULT_CONFIG.endpoint,
    model: config.model ?? DEFAULT_CONFIG.model,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    retries: Math.floor(config.retries ?? DEFAULT_CONFIG.retries),
    concurrency: Math.max(1, Math.floor(config.concurrency ?? DEFAULT_CONFIG.concurrency)),
    styleTemplate: config.styleTemplate,
  };
}
