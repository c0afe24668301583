import 'dotenv/config';
import pino from 'pino';
import { ConfigError } from './errors.js';
import type { GenerationParams } from './inference/types.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Application settings
 */
export interface AppConfig {
  discord: {
    token: string;
    /** Longest reply sent inline; anything longer goes out as a file */
    messageLimit: number;
  };
  inference: {
    baseUrl: string;
    apiKey: string;
    model: string;
    generation: GenerationParams;
  };
  output: {
    inferencePath: string;
  };
  log: {
    file: string;
    level: string;
  };
}

const DEFAULT_BASE_URL = 'http://127.0.0.1:8080/v1';
const DISCORD_MESSAGE_LIMIT = 2000;

/**
 * First non-empty value among the given keys
 */
function readEnv(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

function getRequiredEnv(env: Env, key: string, ...aliases: string[]): string {
  const value = readEnv(env, key, ...aliases);
  if (!value) {
    throw new ConfigError(key, `Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnv(env: Env, key: string, defaultValue: string): string {
  return readEnv(env, key) ?? defaultValue;
}

function getNumberEnv(env: Env, key: string, options: { integer?: boolean } = {}): number | undefined {
  const raw = readEnv(env, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || (options.integer && !Number.isInteger(value))) {
    throw new ConfigError(key, `Environment variable ${key} must be ${options.integer ? 'an integer' : 'a number'}, got "${raw}"`);
  }
  return value;
}

function getLogLevelEnv(env: Env, key: string, defaultValue: string): string {
  const level = getOptionalEnv(env, key, defaultValue).toLowerCase();
  if (level !== 'silent' && !(level in pino.levels.values)) {
    const known = [...Object.keys(pino.levels.values), 'silent'].join(', ');
    throw new ConfigError(key, `Environment variable ${key} must be one of ${known}, got "${level}"`);
  }
  return level;
}

function getListEnv(env: Env, key: string): string[] | undefined {
  const raw = readEnv(env, key);
  if (raw === undefined) return undefined;
  const items = raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Load settings from the environment (.env is read on import)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const messageLimit = getNumberEnv(env, 'DISCORD_MESSAGE_LIMIT', { integer: true }) ?? DISCORD_MESSAGE_LIMIT;
  if (messageLimit <= 0) {
    throw new ConfigError('DISCORD_MESSAGE_LIMIT', 'DISCORD_MESSAGE_LIMIT must be positive');
  }

  return {
    discord: {
      token: getRequiredEnv(env, 'DISCORD_TOKEN', 'TOKEN'),
      messageLimit,
    },
    inference: {
      baseUrl: getOptionalEnv(env, 'INFERENCE_BASE_URL', DEFAULT_BASE_URL).replace(/\/completions\/?$/, ''),
      apiKey: getOptionalEnv(env, 'INFERENCE_API_KEY', 'sk-no-key-required'),
      model: readEnv(env, 'MODEL_NAME', 'MODEL_FILE') ?? 'local-model',
      generation: {
        temperature: getNumberEnv(env, 'TEMPERATURE') ?? 0.2,
        repetitionPenalty: getNumberEnv(env, 'REPETITION_PENALTY') ?? 1.1,
        lastNTokens: getNumberEnv(env, 'LAST_N_TOKENS', { integer: true }) ?? 64,
        maxNewTokens: getNumberEnv(env, 'MAX_NEW_TOKENS', { integer: true }) ?? 256 * 10,
        topK: getNumberEnv(env, 'TOP_K', { integer: true }),
        topP: getNumberEnv(env, 'TOP_P'),
        seed: getNumberEnv(env, 'SEED', { integer: true }),
        stop: getListEnv(env, 'STOP'),
      },
    },
    output: {
      inferencePath: getOptionalEnv(env, 'INFERENCE_OUTPUT_PATH', 'inference.md'),
    },
    log: {
      file: getOptionalEnv(env, 'LOG_FILE', 'mime.log'),
      level: getLogLevelEnv(env, 'LOG_LEVEL', 'info'),
    },
  };
}

/**
 * Sanity checks that only warn
 */
export function validateConfig(config: AppConfig): string[] {
  const warnings: string[] = [];

  if (!config.discord.token.match(/^[\w-]+\.[\w-]+\.[\w-]+$/)) {
    warnings.push('DISCORD_TOKEN format may be invalid');
  }

  if (config.discord.messageLimit > DISCORD_MESSAGE_LIMIT) {
    warnings.push(`DISCORD_MESSAGE_LIMIT is above Discord's ${DISCORD_MESSAGE_LIMIT} character limit; long replies will be rejected`);
  }

  const { temperature } = config.inference.generation;
  if (temperature < 0 || temperature > 2) {
    warnings.push(`TEMPERATURE ${temperature} is outside the usual 0-2 range`);
  }

  return warnings;
}
