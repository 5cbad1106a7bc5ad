/**
 * State Service
 * Persists which tag is active per host pattern and what sshm knows about
 * each tag. Every write replaces the whole file atomically.
 */

import fs from 'fs-extra';
import { DEFAULT_TAG, SUPPORTED_KEY_TYPES } from '../constants.js';
import { isNodeError, toSshmError } from '../errors.js';
import { writeJsonAtomic } from '../utils/atomic.js';
import { logger } from '../utils/logger.js';
import type { KeyType, StateRecord, StoredIdentity } from '../types/index.js';

export function emptyState(): StateRecord {
  return { version: 1, active: {}, defaultTag: DEFAULT_TAG, identities: {} };
}

/** Own-property lookup, so tags such as "constructor" never hit Object.prototype */
export function getOwn<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Defines an own property even for "__proto__" */
export function setOwn<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKeyType(value: unknown): value is KeyType {
  return typeof value === 'string' && SUPPORTED_KEY_TYPES.some(t => t === value);
}

function toStoredIdentity(value: unknown): StoredIdentity | null {
  if (!isRecord(value) || !isKeyType(value.keyType) || typeof value.hostname !== 'string') {
    return null;
  }
  return {
    keyType: value.keyType,
    hostname: value.hostname,
    comment: typeof value.comment === 'string' ? value.comment : '',
    createdAt: typeof value.createdAt === 'string' ? value.createdAt : '',
  };
}

/**
 * Validate parsed JSON as a state record. Also accepts the older flat layout
 * (`{ "<key type>": "<tag>" }`), whose keys become host patterns.
 */
export function normalizeState(data: unknown): StateRecord | null {
  if (!isRecord(data)) {
    return null;
  }

  const state = emptyState();

  if (data.version === undefined) {
    for (const [pattern, tag] of Object.entries(data)) {
      if (typeof tag !== 'string') {
        return null;
      }
      setOwn(state.active, pattern, tag.toLowerCase());
    }
    return state;
  }

  if (data.version !== 1 || !isRecord(data.active)) {
    return null;
  }

  for (const [pattern, tag] of Object.entries(data.active)) {
    if (typeof tag !== 'string') {
      return null;
    }
    setOwn(state.active, pattern, tag);
  }

  if (typeof data.defaultTag === 'string') {
    state.defaultTag = data.defaultTag;
  }

  if (isRecord(data.identities)) {
    for (const [tag, value] of Object.entries(data.identities)) {
      const identity = toStoredIdentity(value);
      if (identity) {
        setOwn(state.identities, tag, identity);
      } else {
        logger.warn(`Ignoring malformed state entry for tag "${tag}"`);
      }
    }
  }

  return state;
}

export class IdentityState {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /** Last committed state; an absent or corrupt file reads as empty */
  async read(): Promise<StateRecord> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) {
        return emptyState();
      }
      throw toSshmError(error, this.filePath);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`State file ${this.filePath} is corrupt (${reason}); treating it as empty`);
      return emptyState();
    }

    const state = normalizeState(parsed);
    if (!state) {
      logger.warn(`State file ${this.filePath} has an unexpected shape; treating it as empty`);
      return emptyState();
    }
    return state;
  }

  async write(state: StateRecord): Promise<void> {
    try {
      await writeJsonAtomic(this.filePath, state);
    } catch (error) {
      throw toSshmError(error, this.filePath);
    }
  }

  /** Read-modify-write transaction */
  async update(mutate: (state: StateRecord) => void): Promise<StateRecord> {
    const state = await this.read();
    mutate(state);
    await this.write(state);
    return state;
  }

  async updateActive(hostPattern: string, tag: string): Promise<StateRecord> {
    return this.update(state => {
      setOwn(state.active, hostPattern, tag);
    });
  }

  /** Move a tag's metadata and every active binding to a new name */
  async updateLabel(oldTag: string, newTag: string): Promise<StateRecord> {
    return this.update(state => {
      const metadata = getOwn(state.identities, oldTag);
      if (metadata) {
        delete state.identities[oldTag];
        setOwn(state.identities, newTag, metadata);
      }
      for (const [pattern, tag] of Object.entries(state.active)) {
        if (tag === oldTag) {
          setOwn(state.active, pattern, newTag);
        }
      }
    });
  }

  async setIdentity(tag: string, identity: StoredIdentity): Promise<StateRecord> {
    return this.update(state => {
      setOwn(state.identities, tag, identity);
    });
  }

  /** Drop a tag's metadata and any host pattern it is active for */
  async forget(tag: string): Promise<StateRecord> {
    return this.update(state => {
      delete state.identities[tag];
      for (const [pattern, active] of Object.entries(state.active)) {
        if (active === tag) {
          delete state.active[pattern];
        }
      }
    });
  }
}
