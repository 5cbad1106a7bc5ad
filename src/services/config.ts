/**
 * Config Service
 * Resolves sshm's settings: ~/.sshm/config.json, then the environment, then
 * explicit overrides. Components receive the result; none reads it globally.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  SSHM_HOME,
  SETTINGS_PATH,
  DEFAULT_SSH_DIR,
  SSH_CONFIG_FILE,
  STATE_FILE,
  BACKUP_DIR,
  DEFAULT_KEY_TYPE,
  DEFAULT_HOST,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_LOG_LEVEL,
  SUPPORTED_KEY_TYPES,
} from '../constants.js';
import { ParseError, toSshmError } from '../errors.js';
import { isLogLevel, logger } from '../utils/logger.js';
import type { SshmConfig, SshmSettings } from '../types/index.js';

export const SETTING_KEYS = ['sshDir', 'defaultKeyType', 'defaultHost', 'probeTimeoutMs', 'logLevel'] as const;

export type SettingKey = typeof SETTING_KEYS[number];

function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some(k => k === key);
}

/**
 * Validate one setting given as text, returning it in its typed form
 */
export function parseSetting(key: string, value: string): SshmSettings {
  if (!isSettingKey(key)) {
    throw new ParseError(key, `Unknown setting. Known settings: ${SETTING_KEYS.join(', ')}`, key);
  }

  switch (key) {
    case 'sshDir':
      if (value.trim() === '') {
        throw new ParseError(key, 'sshDir must not be empty', value);
      }
      return { sshDir: path.resolve(value.replace(/^~(?=$|[\\/])/, os.homedir())) };
    case 'defaultKeyType': {
      const keyType = SUPPORTED_KEY_TYPES.find(t => t === value);
      if (!keyType) {
        throw new ParseError(key, `Unsupported key type. Supported: ${SUPPORTED_KEY_TYPES.join(', ')}`, value);
      }
      return { defaultKeyType: keyType };
    }
    case 'defaultHost':
      if (!/^[A-Za-z0-9.-]+$/.test(value)) {
        throw new ParseError(key, 'defaultHost must be a host name', value);
      }
      return { defaultHost: value };
    case 'probeTimeoutMs': {
      const ms = Number(value);
      if (!Number.isInteger(ms) || ms < 1000) {
        throw new ParseError(key, 'probeTimeoutMs must be an integer of at least 1000', value);
      }
      return { probeTimeoutMs: ms };
    }
    case 'logLevel':
      if (!isLogLevel(value)) {
        throw new ParseError(key, 'logLevel must be one of debug, info, warn, error, silent', value);
      }
      return { logLevel: value };
  }
}

/** Keep only the settings that validate; report the rest */
function sanitizeSettings(data: unknown, source: string): SshmSettings {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    logger.warn(`Ignoring ${source}: expected a JSON object`);
    return {};
  }

  let settings: SshmSettings = {};
  for (const [key, value] of Object.entries(data)) {
    try {
      settings = { ...settings, ...parseSetting(key, String(value)) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Ignoring setting in ${source}: ${message}`);
    }
  }
  return settings;
}

/**
 * Check if a settings file exists
 */
export async function isConfigured(settingsPath: string = SETTINGS_PATH): Promise<boolean> {
  return fs.pathExists(settingsPath);
}

/**
 * Get stored settings; absent or unreadable files yield none
 */
export async function getSettings(settingsPath: string = SETTINGS_PATH): Promise<SshmSettings> {
  if (!(await isConfigured(settingsPath))) {
    return {};
  }

  try {
    return sanitizeSettings(await fs.readJson(settingsPath), settingsPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not read ${settingsPath} (${message}); using defaults`);
    return {};
  }
}

/**
 * Save settings
 */
export async function saveSettings(settings: SshmSettings, settingsPath: string = SETTINGS_PATH): Promise<void> {
  try {
    await fs.ensureDir(path.dirname(settingsPath));
    await fs.writeJson(settingsPath, settings, { spaces: 2 });
  } catch (error) {
    throw toSshmError(error, settingsPath);
  }
}

/**
 * Update settings partially
 */
export async function updateSettings(
  updates: SshmSettings,
  settingsPath: string = SETTINGS_PATH
): Promise<SshmSettings> {
  const current = await getSettings(settingsPath);
  const updated = { ...current, ...updates };
  await saveSettings(updated, settingsPath);
  return updated;
}

/** Settings carried by the environment */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): SshmSettings {
  let settings: SshmSettings = {};
  if (env.SSHM_SSH_DIR) {
    settings = { ...settings, ...parseSetting('sshDir', env.SSHM_SSH_DIR) };
  }
  if (env.SSHM_LOG_LEVEL) {
    settings = { ...settings, ...parseSetting('logLevel', env.SSHM_LOG_LEVEL) };
  }
  return settings;
}

/**
 * Merge settings layers (later wins) and derive the file locations
 */
export function resolveConfig(...layers: SshmSettings[]): SshmConfig {
  const pick = <K extends SettingKey>(key: K): SshmSettings[K] => {
    let value: SshmSettings[K] = undefined;
    for (const layer of layers) {
      if (layer[key] !== undefined) value = layer[key];
    }
    return value;
  };
  const sshDir = pick('sshDir') ?? DEFAULT_SSH_DIR;

  return {
    sshDir,
    configFile: path.join(sshDir, SSH_CONFIG_FILE),
    stateFile: path.join(sshDir, STATE_FILE),
    backupDir: path.join(sshDir, BACKUP_DIR),
    defaultKeyType: pick('defaultKeyType') ?? DEFAULT_KEY_TYPE,
    defaultHost: pick('defaultHost') ?? DEFAULT_HOST,
    probeTimeoutMs: pick('probeTimeoutMs') ?? DEFAULT_PROBE_TIMEOUT_MS,
    logLevel: pick('logLevel') ?? DEFAULT_LOG_LEVEL,
  };
}

/**
 * Load the effective configuration
 */
export async function loadConfig(overrides: SshmSettings = {}): Promise<SshmConfig> {
  const stored = await getSettings();
  const config = resolveConfig(stored, settingsFromEnv(), overrides);
  logger.setLevel(config.logLevel);
  return config;
}

/**
 * Get sshm home path
 */
export function getSshmHome(): string {
  return SSHM_HOME;
}
