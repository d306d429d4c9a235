import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { AppConfigSchema, type AppConfig } from '../shared/schemas/configSchemas';
import { ValidationError } from '../services/base/ServiceError';
import { getDbPath, getDefaultDataDir } from '../models/db';
import { logger } from './logger';
import { assertTimezone } from './timezone';
import { validatePayload } from './validatePayload';

const APP_DIR_NAME = 'note-taker-pro';
const CONFIG_FILE_NAME = 'config.json';
const KEY_FILE_NAME = 'notes.key';

type ConfigValueKind = 'boolean' | 'integer' | 'string' | 'nullableString';

/** Keys `config <key> <value>` accepts, with how their value is parsed. */
export const CONFIG_KEYS: Record<string, ConfigValueKind> = {
  encrypted: 'boolean',
  cloudSync: 'boolean',
  dropboxToken: 'nullableString',
  timezone: 'string',
  dataDir: 'string',
  'sync.remoteFolder': 'string',
  'sync.maxAttempts': 'integer',
  'sync.baseDelayMs': 'integer',
  'sync.maxDelayMs': 'integer',
  'sync.timeoutMs': 'integer',
};

/** Paths and secrets resolved from config plus environment for one run. */
export interface RuntimeSettings {
  config: AppConfig;
  configPath: string;
  dataDir: string;
  dbPath: string;
  keyFilePath: string;
  dropboxToken: string | null;
  passphrase: string | null;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.NOTETAKER_CONFIG) {
    return path.resolve(env.NOTETAKER_CONFIG);
  }
  const base = process.platform === 'win32'
    ? env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming')
    : env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR_NAME, CONFIG_FILE_NAME);
}

export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Reads the config file. A missing file yields the defaults; a malformed
 * one is a ValidationError naming the file.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<AppConfig> {
  if (!(await fs.pathExists(configPath))) {
    logger.debug(`[Config] No config file at ${configPath}, using defaults`);
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ValidationError(`Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return validatePayload(AppConfigSchema, raw, `config file ${configPath}`);
}

/**
 * Writes the config file owner-only, since it may hold the Dropbox token.
 */
export async function saveConfig(config: AppConfig, configPath: string = getConfigPath()): Promise<void> {
  await fs.ensureDir(path.dirname(configPath));
  await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
  await fs.chmod(configPath, 0o600);
  logger.debug(`[Config] Saved config to ${configPath}`);
}

function parseConfigValue(key: string, kind: ConfigValueKind, input: string): unknown {
  const trimmed = input.trim();
  switch (kind) {
    case 'boolean': {
      const lowered = trimmed.toLowerCase();
      if (['true', 'on', 'yes', '1'].includes(lowered)) return true;
      if (['false', 'off', 'no', '0'].includes(lowered)) return false;
      throw new ValidationError(`${key} expects true or false, got '${input}'`);
    }
    case 'integer': {
      if (!/^-?\d+$/.test(trimmed)) {
        throw new ValidationError(`${key} expects a whole number, got '${input}'`);
      }
      return Number.parseInt(trimmed, 10);
    }
    case 'nullableString':
      return trimmed === '' || trimmed === 'null' ? null : trimmed;
    case 'string':
      return trimmed;
  }
}

/**
 * Returns a copy of `config` with one key changed, validated as a whole.
 */
export function setConfigValue(config: AppConfig, key: string, input: string): AppConfig {
  const kind = CONFIG_KEYS[key];
  if (!kind) {
    throw new ValidationError(`Unknown config key '${key}'. Known keys: ${Object.keys(CONFIG_KEYS).join(', ')}`);
  }
  const value = parseConfigValue(key, kind, input);
  if (key === 'timezone' && typeof value === 'string') {
    assertTimezone(value);
  }

  const [section, field] = key.split('.');
  const candidate: Record<string, unknown> = field
    ? { ...config, [section]: { ...config.sync, [field]: value } }
    : { ...config, [key]: value };
  return validatePayload(AppConfigSchema, candidate, `value for ${key}`);
}

/**
 * `key = value` lines for display. The token is masked.
 */
export function describeConfig(config: AppConfig): string[] {
  const token = config.dropboxToken ? `${config.dropboxToken.slice(0, 4)}…` : '(not set)';
  return [
    `encrypted = ${config.encrypted}`,
    `cloudSync = ${config.cloudSync}`,
    `dropboxToken = ${token}`,
    `timezone = ${config.timezone}`,
    `dataDir = ${config.dataDir ?? '(default)'}`,
    `sync.remoteFolder = ${config.sync.remoteFolder}`,
    `sync.maxAttempts = ${config.sync.maxAttempts}`,
    `sync.baseDelayMs = ${config.sync.baseDelayMs}`,
    `sync.maxDelayMs = ${config.sync.maxDelayMs}`,
    `sync.timeoutMs = ${config.sync.timeoutMs}`,
  ];
}

/**
 * Applies environment overrides on top of the config. Nothing here is
 * written back to the config file.
 */
export function resolveRuntimeSettings(config: AppConfig, configPath: string, env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const dataDir = path.resolve(config.dataDir ?? getDefaultDataDir());
  return {
    config,
    configPath,
    dataDir,
    dbPath: getDbPath(dataDir, env),
    keyFilePath: env.NOTETAKER_KEY_FILE ? path.resolve(env.NOTETAKER_KEY_FILE) : path.join(dataDir, KEY_FILE_NAME),
    dropboxToken: env.DROPBOX_TOKEN || config.dropboxToken,
    passphrase: env.NOTETAKER_PASSPHRASE ?? null,
  };
}
