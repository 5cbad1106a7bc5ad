/**
 * Registry Service
 * Finds the key pairs on disk and joins them with the state file and the
 * SSH config into one view per tag.
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { DEFAULT_TAG, PUBLIC_KEY_SUFFIX, SUPPORTED_KEY_TYPES } from '../constants.js';
import { toSshmError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { deriveAlias, inferHostname } from './remote.js';
import type { ConfigBlockStore } from './sshconfig.js';
import { getOwn, type IdentityState } from './state.js';
import type {
  ConfigHostBlock,
  IdentityView,
  Inconsistency,
  KeyFileSet,
  KeyRef,
  KeyType,
  RegistryView,
  ScanResult,
  StateRecord,
} from '../types/index.js';

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const KEY_NAME_PATTERN = new RegExp(`^id_(${SUPPORTED_KEY_TYPES.join('|')})(?:\\.([\\w-]+))?$`);

interface ParsedKeyName {
  keyType: KeyType;
  tag: string;
  isPublic: boolean;
}

/** Split `id_<type>[.<tag>][.pub]` into its parts */
export function parseKeyFileName(name: string): ParsedKeyName | null {
  const isPublic = name.endsWith(PUBLIC_KEY_SUFFIX);
  const base = isPublic ? name.slice(0, -PUBLIC_KEY_SUFFIX.length) : name;
  const match = base.match(KEY_NAME_PATTERN);
  if (!match) {
    return null;
  }
  const keyType = SUPPORTED_KEY_TYPES.find(t => t === match[1]);
  if (!keyType) {
    return null;
  }
  return { keyType, tag: match[2] ?? DEFAULT_TAG, isPublic };
}

export function isKeyFileName(name: string): boolean {
  return parseKeyFileName(name) !== null;
}

/** File name of a private key: `id_<type>` for the default identity, `id_<type>.<tag>` otherwise */
export function keyFileName(keyType: KeyType, tag: string): string {
  return tag === DEFAULT_TAG ? `id_${keyType}` : `id_${keyType}.${tag}`;
}

/**
 * Classify file names found in the SSH directory. Pure; the directory only
 * supplies the absolute paths.
 */
export function classifyKeyFiles(dir: string, names: string[]): ScanResult {
  const groups = new Map<string, { keyType: KeyType; tag: string; hasPrivate: boolean; hasPublic: boolean }>();

  for (const name of names) {
    const parsed = parseKeyFileName(name);
    if (!parsed) continue;

    const key = `${parsed.keyType}\u0000${parsed.tag}`;
    const group = groups.get(key) ?? { keyType: parsed.keyType, tag: parsed.tag, hasPrivate: false, hasPublic: false };
    if (parsed.isPublic) {
      group.hasPublic = true;
    } else {
      group.hasPrivate = true;
    }
    groups.set(key, group);
  }

  const result: ScanResult = { keys: [], orphans: [] };

  for (const group of groups.values()) {
    const privatePath = path.join(dir, keyFileName(group.keyType, group.tag));
    const entry = {
      tag: group.tag,
      keyType: group.keyType,
      privatePath,
      publicPath: privatePath + PUBLIC_KEY_SUFFIX,
    };

    if (group.hasPrivate && group.hasPublic) {
      result.keys.push({ ...entry, kind: group.tag === DEFAULT_TAG ? 'default' : 'tagged' });
    } else if (group.hasPublic) {
      result.orphans.push({ ...entry, kind: 'orphan-public' });
    } else {
      result.orphans.push({ ...entry, kind: 'orphan-private' });
    }
  }

  const byTagThenType = (a: KeyFileSet, b: KeyFileSet) =>
    compareText(a.tag, b.tag)
    || SUPPORTED_KEY_TYPES.indexOf(a.keyType) - SUPPORTED_KEY_TYPES.indexOf(b.keyType);
  result.keys.sort(byTagThenType);
  result.orphans.sort(byTagThenType);
  return result;
}

/** Absolute, normalized form of an `IdentityFile` value (`~` expanded) */
export function resolveIdentityPath(filePath: string): string {
  return path.normalize(filePath.replace(/^~(?=$|[\\/])/, os.homedir()));
}

export interface ReconcileInput {
  scan: ScanResult;
  state: StateRecord;
  blocks: ConfigHostBlock[];
  defaultHost?: string;
}

/**
 * Join disk, state and config into one view per tag plus the inconsistencies
 * found between them. Pure: no filesystem access.
 *
 * Sort order: active identities first, then by tag.
 */
export function reconcile(input: ReconcileInput): RegistryView {
  const { scan, state, blocks } = input;
  const issues: Inconsistency[] = [];

  const keysByTag = new Map<string, KeyRef[]>();
  for (const key of scan.keys) {
    const refs = keysByTag.get(key.tag) ?? [];
    refs.push({ keyType: key.keyType, privatePath: key.privatePath, publicPath: key.publicPath });
    keysByTag.set(key.tag, refs);
  }

  const tags = new Set<string>([...keysByTag.keys(), ...Object.keys(state.identities)]);
  const hostBlocks = blocks.filter(b => b.keyword === 'Host');
  const claimed = new Set<string>();
  const identities: IdentityView[] = [];

  for (const tag of tags) {
    const keys = keysByTag.get(tag) ?? [];
    const metadata = getOwn(state.identities, tag);
    const hostname = metadata?.hostname ?? inferHostname(tag, input.defaultHost);
    const privatePaths = new Set(keys.map(k => k.privatePath));

    // Blocks routing to this identity, excluding host-pattern overrides written by switch
    const routing = hostBlocks.filter(b =>
      b.identityFile !== undefined
      && privatePaths.has(resolveIdentityPath(b.identityFile))
      && !Object.hasOwn(state.active, b.alias)
    );
    const expected = deriveAlias(hostname, tag);
    const aliasBlock = routing.find(b => b.alias === expected) ?? routing[0];
    for (const block of routing) claimed.add(block.alias);

    const activeFor = Object.entries(state.active)
      .filter(([, active]) => active === tag)
      .map(([pattern]) => pattern)
      .sort();

    const keyType = metadata?.keyType ?? keys[0]?.keyType;
    if (!keyType) continue;

    if (keys.length === 0) {
      issues.push({
        kind: 'missing-key-files',
        subject: tag,
        detail: `Tag "${tag}" is recorded in the state file but has no key pair on disk`,
      });
    }

    identities.push({
      tag,
      keyType,
      keys,
      metadata,
      alias: aliasBlock?.alias,
      hostname,
      isActive: activeFor.length > 0,
      activeFor,
      existsOnDisk: keys.length > 0,
    });
  }

  for (const orphan of scan.orphans) {
    issues.push({
      kind: orphan.kind === 'orphan-public' ? 'orphan-public' : 'orphan-private',
      subject: orphan.kind === 'orphan-public' ? orphan.publicPath : orphan.privatePath,
      detail: orphan.kind === 'orphan-public'
        ? `Public key without its private key (${orphan.tag}, ${orphan.keyType})`
        : `Private key without its public key (${orphan.tag}, ${orphan.keyType})`,
    });
  }

  const known = new Set(scan.keys.map(k => k.privatePath));
  for (const block of hostBlocks) {
    if (!block.identityFile || claimed.has(block.alias) || Object.hasOwn(state.active, block.alias)) continue;
    const file = resolveIdentityPath(block.identityFile);
    if (isKeyFileName(path.basename(file)) && !known.has(file)) {
      issues.push({
        kind: 'orphan-alias',
        subject: block.alias,
        detail: `Host ${block.alias} points at ${block.identityFile}, which is not a complete key pair`,
      });
    }
  }

  for (const [pattern, tag] of Object.entries(state.active)) {
    if (tag !== state.defaultTag && !keysByTag.has(tag)) {
      issues.push({
        kind: 'dangling-active',
        subject: pattern,
        detail: `Host pattern ${pattern} is bound to "${tag}", which has no key pair`,
      });
    }
  }

  identities.sort((a, b) => {
    if (a.isActive !== b.isActive) return a.isActive ? -1 : 1;
    return compareText(a.tag, b.tag);
  });

  return { identities, issues };
}

export class IdentityRegistry {
  constructor(
    private readonly sshDir: string,
    private readonly state: IdentityState,
    private readonly config: ConfigBlockStore,
    private readonly defaultHost?: string
  ) {}

  async scan(): Promise<ScanResult> {
    if (!(await fs.pathExists(this.sshDir))) {
      return { keys: [], orphans: [] };
    }
    try {
      const entries = await fs.readdir(this.sshDir, { withFileTypes: true });
      const names = entries.filter(e => e.isFile()).map(e => e.name);
      return classifyKeyFiles(this.sshDir, names);
    } catch (error) {
      throw toSshmError(error, this.sshDir);
    }
  }

  /** Merged view; the only source for listing and status */
  async view(): Promise<RegistryView> {
    const scan = await this.scan();
    const state = await this.state.read();
    const blocks = await this.config.list();
    const view = reconcile({ scan, state, blocks, defaultHost: this.defaultHost });
    for (const issue of view.issues) {
      logger.warn(`${issue.kind}: ${issue.detail}`);
    }
    return view;
  }

  async find(tag: string): Promise<IdentityView | undefined> {
    const { identities } = await this.view();
    return identities.find(i => i.tag === tag);
  }
}
