import os from 'os';
import path from 'path';
import type { KeyType, KeyTypeSpec, LogLevel } from './types/index.js';

/**
 * sshm Constants
 */

// Base directory for sshm's own settings
export const SSHM_HOME = path.join(os.homedir(), '.sshm');

// Settings file path
export const SETTINGS_PATH = path.join(SSHM_HOME, 'config.json');

// Default SSH directory
export const DEFAULT_SSH_DIR = path.join(os.homedir(), '.ssh');

// File names inside the SSH directory
export const SSH_CONFIG_FILE = 'config';
export const STATE_FILE = '.sshm_state';
export const BACKUP_DIR = 'key_backups';

// Snapshot manifest written inside each backup directory
export const SNAPSHOT_MANIFEST = 'snapshot.json';

// Version
export const VERSION = '2.1.1';

// The unlabeled identity (id_<type> without a tag suffix)
export const DEFAULT_TAG = 'default';

export const PUBLIC_KEY_SUFFIX = '.pub';

export const DEFAULT_KEY_TYPE: KeyType = 'ed25519';

export const DEFAULT_HOST = 'github.com';

export const DEFAULT_GIT_USER = 'git';

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

// Generation parameters per key type. Order is the scan/detection order.
export const KEY_TYPES: Record<KeyType, KeyTypeSpec> = {
  ed25519: { type: 'ed25519' },
  rsa: { type: 'rsa', bits: 4096 },
  ecdsa: { type: 'ecdsa', bits: 521 },
  dsa: { type: 'dsa', bits: 1024 },
};

export const SUPPORTED_KEY_TYPES: readonly KeyType[] = ['ed25519', 'rsa', 'ecdsa', 'dsa'];

// Tag names: lower-case letters, digits, dash and underscore
export const TAG_PATTERN = /^[a-z0-9_-]+$/;

// Platforms recognised from a tag name when no host is given
export const PLATFORM_HOSTS: ReadonlyArray<readonly [string, string]> = [
  ['github', 'github.com'],
  ['gitlab', 'gitlab.com'],
  ['gitee', 'gitee.com'],
  ['bitbucket', 'bitbucket.org'],
];

// CLI styling
export const BRAND = {
  name: 'sshm',
  tagline: 'One machine, many SSH identities.',
  prefix: '◆',
};
