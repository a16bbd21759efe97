/**
 * Config manager
 *
 * Loads a JSON config file, the .env file and environment overrides, then
 * validates the result with the zod schema (which supplies every default).
 *
 * Precedence, lowest to highest:
 * 1. JSON config file (`--config`, else the first of DEFAULT_CONFIG_PATHS)
 * 2. .env file
 * 3. process environment
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { ConfigSchema, type Config } from '../types/config.js';
import { ConfigError, toError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('ConfigManager');

/** Searched in order when no path is given */
export const DEFAULT_CONFIG_PATHS = [
  'config/config.json',
  'config/default.json',
  'film-agent.config.json',
];

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Base directory for relative paths (default: cwd) */
  cwd?: string;
  /** Read `.env` into the environment first (default: true) */
  loadDotenv?: boolean;
}

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function loadConfigFile(absolutePath: string): Promise<RawConfig> {
  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`, { path: absolutePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(absolutePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Config file could not be parsed: ${absolutePath}`,
      { path: absolutePath },
      { cause: toError(err) },
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`, { path: absolutePath });
  }
  return parsed;
}

/** Load `.env` without overriding variables already set */
function loadEnvFile(cwd: string): void {
  const envPath = resolve(cwd, '.env');
  if (!existsSync(envPath)) {
    log.debug('no .env file, using the process environment');
    return;
  }
  const result = dotenvConfig({ path: envPath });
  if (result.parsed) {
    log.info({ count: Object.keys(result.parsed).length }, '.env loaded');
  }
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Config overrides from the environment:
 * FILM_AGENT_LOG_LEVEL, FILM_AGENT_PROVIDER, FILM_AGENT_MODEL,
 * FILM_AGENT_TEMPERATURE, FILM_AGENT_MEMORY_DB, FILM_AGENT_CATALOG_DB,
 * OPENAI_API_KEY, OPENAI_API_BASE, OLLAMA_API_BASE
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {};

  if (env['FILM_AGENT_LOG_LEVEL']) {
    overrides['logLevel'] = env['FILM_AGENT_LOG_LEVEL'];
  }

  const agent: RawConfig = {};
  if (env['FILM_AGENT_PROVIDER']) agent['provider'] = env['FILM_AGENT_PROVIDER'];
  if (env['FILM_AGENT_MODEL']) agent['model'] = env['FILM_AGENT_MODEL'];
  const temperature = parseNumber(env['FILM_AGENT_TEMPERATURE']);
  if (temperature !== undefined) agent['temperature'] = temperature;
  if (Object.keys(agent).length > 0) overrides['agent'] = agent;

  if (env['FILM_AGENT_MEMORY_DB']) overrides['memory'] = { dbPath: env['FILM_AGENT_MEMORY_DB'] };
  if (env['FILM_AGENT_CATALOG_DB']) overrides['catalog'] = { dbPath: env['FILM_AGENT_CATALOG_DB'] };

  const providers: Record<string, RawConfig> = {};
  if (env['OPENAI_API_KEY']) {
    providers['openai'] = { ...providers['openai'], apiKey: env['OPENAI_API_KEY'] };
  }
  if (env['OPENAI_API_BASE']) {
    providers['openai'] = { ...providers['openai'], apiBase: env['OPENAI_API_BASE'] };
  }
  if (env['OLLAMA_API_BASE']) {
    providers['ollama'] = { apiBase: env['OLLAMA_API_BASE'] };
  }
  if (Object.keys(providers).length > 0) overrides['providers'] = providers;

  return overrides;
}

export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    result[key] = isRecord(sourceVal) && isRecord(targetVal)
      ? deepMerge(targetVal, sourceVal)
      : sourceVal;
  }

  return result;
}

/**
 * Load and validate config.
 *
 * @throws ConfigError when the file is missing or malformed, or validation fails
 */
export async function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.loadDotenv ?? true) {
    loadEnvFile(cwd);
  }

  let rawConfig: RawConfig = {};

  if (configPath) {
    const absolutePath = resolve(cwd, configPath);
    rawConfig = await loadConfigFile(absolutePath);
    log.info({ path: absolutePath }, 'config file loaded');
  } else {
    const found = DEFAULT_CONFIG_PATHS.map((p) => resolve(cwd, p)).find((p) => existsSync(p));
    if (found) {
      rawConfig = await loadConfigFile(found);
      log.info({ path: found }, 'config file loaded');
    } else {
      log.info('no config file found, using defaults');
    }
  }

  const envOverrides = getEnvOverrides(env);
  if (Object.keys(envOverrides).length > 0) {
    rawConfig = deepMerge(rawConfig, envOverrides);
    log.debug({ overrides: Object.keys(envOverrides) }, 'environment overrides applied');
  }

  const parseResult = ConfigSchema.safeParse(rawConfig);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config: ${errors.join('; ')}`, { errors });
  }

  return parseResult.data;
}
