/**
 * Identity Orchestrator
 * The operations behind every command. Mutating operations run in a fixed
 * order: snapshot, key files, SSH config, state. A failing step stops the
 * operation before the next one runs and the error names the step.
 */

import fs from 'fs-extra';
import path from 'path';
import { DEFAULT_GIT_USER, DEFAULT_TAG, PUBLIC_KEY_SUFFIX, TAG_PATTERN } from '../constants.js';
import { ConflictError, NotFoundError, ParseError, toSshmError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { BackupVault } from './backup.js';
import { SimpleGitRemoteClient, type GitRemoteClient } from './git.js';
import { SshKeygen, publicKeyComment, readPublicKey, type KeyGenerator } from './keygen.js';
import { SshProbe, type ConnectivityProbe } from './probe.js';
import { IdentityRegistry, isKeyFileName, keyFileName, resolveIdentityPath } from './registry.js';
import { deriveAlias, inferHostname, parseRemoteUrl, toSshAliasUrl } from './remote.js';
import { ConfigBlockStore, findBlock, removeBlock, renameBlock, upsertBlock } from './sshconfig.js';
import { IdentityState, getOwn } from './state.js';
import type {
  BindingState,
  ConfigHostBlock,
  HostBlockFields,
  Identity,
  IdentityView,
  KeyRef,
  KeyType,
  OperationStep,
  ProbeResult,
  RegistryView,
  RemoteBinding,
  SnapshotFile,
  SnapshotSummary,
  SshConfigDocument,
  SshmConfig,
  UpsertOutcome,
} from '../types/index.js';

export interface OrchestratorDeps {
  config: SshmConfig;
  store: ConfigBlockStore;
  state: IdentityState;
  vault: BackupVault;
  registry: IdentityRegistry;
  keygen: KeyGenerator;
  probe: ConnectivityProbe;
  git: GitRemoteClient;
}

export interface AddOptions {
  tag: string;
  comment?: string;
  keyType?: KeyType;
  /** Platform host; inferred from the tag when omitted */
  host?: string;
  /** Overwrite an existing key pair or alias of the same name */
  force?: boolean;
}

export interface AddResult {
  identity: Identity;
  snapshotId: string;
  configOutcome: UpsertOutcome;
}

export interface RemoveOptions {
  tag: string;
  /** Required when the tag holds keys of several types and is "default" */
  keyType?: KeyType;
  /** Required to remove the default identity */
  confirmed?: boolean;
}

export interface RemoveResult {
  snapshotId: string;
  removedFiles: string[];
  removedAliases: string[];
}

export interface RenameResult {
  snapshotId: string;
  oldAlias: string;
  newAlias: string;
  renamedFiles: string[];
}

export interface SwitchOptions {
  tag: string;
  /** Host pattern to bind; defaults to the identity's host */
  host?: string;
  /** Key pair to route to when the tag has several */
  keyType?: KeyType;
}

export interface SwitchResult {
  snapshotId: string;
  hostPattern: string;
  tag: string;
}

export interface TagOptions {
  newTag: string;
  keyType?: KeyType;
  host?: string;
  force?: boolean;
}

export interface UseOptions {
  tag: string;
  repoPath?: string;
  remote?: string;
  /** Replace an alias that currently routes to another key */
  force?: boolean;
  /** Probe the alias after binding (default true) */
  verify?: boolean;
}

export interface UseResult {
  binding: BindingState;
  previousUrl: string;
  remoteUrl: string;
  /** Whether the remote URL was rewritten */
  changed: boolean;
  alias: string;
  configOutcome: UpsertOutcome;
  snapshotId?: string;
  probe?: ProbeResult;
}

export interface RepoInfo {
  binding: BindingState;
  remote: RemoteBinding;
  block?: ConfigHostBlock;
  identity?: IdentityView;
}

export interface TestResult {
  tag: string;
  alias: string;
  result: ProbeResult;
}

export interface RestoreResult {
  /** Snapshot of the state just before the restore */
  snapshotId: string;
  restored: SnapshotFile[];
}

/** Normalize a user-supplied tag, rejecting names the file layout cannot hold */
export function normalizeTag(tag: string): string {
  const normalized = tag.trim().toLowerCase();
  if (!TAG_PATTERN.test(normalized)) {
    throw new ParseError(tag, 'Tags may only contain letters, digits, "-" and "_"', tag);
  }
  return normalized;
}

/** Block fields for an alias managed by sshm */
export function managedBlockFields(hostname: string, identityFile: string): HostBlockFields {
  return {
    hostname,
    user: DEFAULT_GIT_USER,
    identityFile: identityFile.split(path.sep).join('/'),
    extraLines: ['  IdentitiesOnly yes'],
  };
}

function routesTo(block: ConfigHostBlock | undefined, privatePath: string): boolean {
  return block?.identityFile !== undefined && resolveIdentityPath(block.identityFile) === privatePath;
}

function primaryKey(identity: IdentityView): KeyRef {
  const key = identity.keys.find(k => k.keyType === identity.keyType) ?? identity.keys[0];
  if (!key) {
    throw new NotFoundError(identity.tag, `Identity "${identity.tag}" has no key pair on disk`);
  }
  return key;
}

export class IdentityOrchestrator {
  private readonly config: SshmConfig;
  private readonly store: ConfigBlockStore;
  private readonly state: IdentityState;
  private readonly vault: BackupVault;
  private readonly registry: IdentityRegistry;
  private readonly keygen: KeyGenerator;
  private readonly probe: ConnectivityProbe;
  private readonly git: GitRemoteClient;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.state = deps.state;
    this.vault = deps.vault;
    this.registry = deps.registry;
    this.keygen = deps.keygen;
    this.probe = deps.probe;
    this.git = deps.git;
  }

  private async runStep<T>(step: OperationStep, fn: () => Promise<T>): Promise<T> {
    logger.debug(`step: ${step}`);
    try {
      return await fn();
    } catch (error) {
      const err = toSshmError(error, step);
      if (!err.step) {
        err.step = step;
        err.message = `${step} step failed: ${err.message}`;
      }
      throw err;
    }
  }

  private async snapshot(): Promise<string> {
    return this.runStep('snapshot', async () => (await this.vault.snapshot()).id);
  }

  private async requireIdentity(tag: string): Promise<IdentityView> {
    const identity = await this.registry.find(tag);
    if (!identity || !identity.existsOnDisk) {
      throw new NotFoundError(tag, `No identity tagged "${tag}". Run \`sshm list\` to see available identities.`);
    }
    return identity;
  }

  private keyPath(keyType: KeyType, tag: string): string {
    return path.join(this.config.sshDir, keyFileName(keyType, tag));
  }

  async list(): Promise<RegistryView> {
    return this.registry.view();
  }

  async add(options: AddOptions): Promise<AddResult> {
    const { tag, keyType, hostname, alias, privatePath, publicPath, replaceFiles } = await this.runStep('validate', async () => {
      const tag = normalizeTag(options.tag);
      if (tag === DEFAULT_TAG) {
        throw new ConflictError(tag, `"${DEFAULT_TAG}" is reserved for the unlabeled identity`);
      }
      const keyType = options.keyType ?? this.config.defaultKeyType;
      const hostname = options.host ?? inferHostname(tag, this.config.defaultHost);
      const alias = deriveAlias(hostname, tag);
      const privatePath = this.keyPath(keyType, tag);
      const publicPath = privatePath + PUBLIC_KEY_SUFFIX;

      const existing = await this.registry.find(tag);
      const otherType = existing?.keys.find(k => k.keyType !== keyType);
      if (otherType) {
        throw new ConflictError(tag, `Tag "${tag}" is already used by a ${otherType.keyType} key`);
      }

      const replaceFiles = (await fs.pathExists(privatePath)) || (await fs.pathExists(publicPath));
      if (replaceFiles && !options.force) {
        throw new ConflictError(tag, `Identity "${tag}" (${keyType}) already exists: ${path.basename(privatePath)}`);
      }

      const block = await this.store.get(alias);
      if (block?.identityFile !== undefined && !routesTo(block, privatePath) && !options.force) {
        throw new ConflictError(alias, `Alias ${alias} already routes to ${block.identityFile}`);
      }

      return { tag, keyType, hostname, alias, privatePath, publicPath, replaceFiles };
    });

    const snapshotId = await this.snapshot();
    const comment = options.comment ?? tag;

    await this.runStep('keys', async () => {
      if (replaceFiles) {
        await fs.remove(privatePath);
        await fs.remove(publicPath);
      }
      await this.keygen.generate({ keyType, outputPath: privatePath, comment });
    });

    const configOutcome = await this.runStep('config', () =>
      this.store.upsert(alias, managedBlockFields(hostname, privatePath))
    );

    await this.runStep('state', () =>
      this.state.setIdentity(tag, { keyType, hostname, comment, createdAt: new Date().toISOString() })
    );

    logger.info(`Added identity ${tag} (${keyType}) as ${alias}`);
    return {
      identity: { tag, keyType, privatePath, publicPath, hostAlias: alias, comment },
      snapshotId,
      configOutcome,
    };
  }

  async remove(options: RemoveOptions): Promise<RemoveResult> {
    const { tag, identity, keys } = await this.runStep('validate', async () => {
      const tag = options.tag.trim().toLowerCase();
      const identity = await this.registry.find(tag);
      if (!identity) {
        throw new NotFoundError(tag, `No identity tagged "${tag}"`);
      }

      const keys = options.keyType
        ? identity.keys.filter(k => k.keyType === options.keyType)
        : identity.keys;
      if (options.keyType && keys.length === 0) {
        throw new NotFoundError(tag, `Identity "${tag}" has no ${options.keyType} key`);
      }

      if (tag === DEFAULT_TAG) {
        if (!options.keyType && identity.keys.length > 1) {
          const types = identity.keys.map(k => k.keyType).join(', ');
          throw new ConflictError(tag, `The default identity holds several key types (${types}); name the one to remove`);
        }
        if (!options.confirmed) {
          throw new ConflictError(tag, 'Removing the default identity needs explicit confirmation');
        }
      }

      return { tag, identity, keys };
    });

    const snapshotId = await this.snapshot();

    const removedFiles = await this.runStep('keys', async () => {
      const removed: string[] = [];
      for (const key of keys) {
        for (const file of [key.privatePath, key.publicPath]) {
          if (await fs.pathExists(file)) {
            await fs.remove(file);
            removed.push(path.basename(file));
          }
        }
      }
      return removed;
    });

    const removedPaths = new Set(keys.map(k => k.privatePath));
    const removedAliases = await this.runStep('config', () =>
      this.store.edit(doc => {
        const aliases = doc.blocks
          .filter(b => b.keyword === 'Host' && b.identityFile !== undefined
            && removedPaths.has(resolveIdentityPath(b.identityFile)))
          .map(b => b.alias);
        let next: SshConfigDocument = doc;
        for (const alias of aliases) {
          next = removeBlock(next, alias).doc;
        }
        return { doc: next, result: aliases };
      })
    );

    const remaining = identity.keys.filter(k => !removedPaths.has(k.privatePath));
    await this.runStep('state', async () => {
      if (remaining.length === 0) {
        await this.state.forget(tag);
        return;
      }
      await this.state.update(state => {
        const metadata = getOwn(state.identities, tag);
        if (metadata && !remaining.some(k => k.keyType === metadata.keyType)) {
          metadata.keyType = remaining[0].keyType;
        }
      });
    });

    logger.info(`Removed ${removedFiles.length} file(s) of ${tag}`);
    return { snapshotId, removedFiles, removedAliases };
  }

  async rename(oldTagInput: string, newTagInput: string): Promise<RenameResult> {
    const plan = await this.runStep('validate', async () => {
      const oldTag = oldTagInput.trim().toLowerCase();
      const newTag = normalizeTag(newTagInput);
      if (oldTag === DEFAULT_TAG || newTag === DEFAULT_TAG) {
        throw new ConflictError(DEFAULT_TAG, `The "${DEFAULT_TAG}" tag cannot be renamed to or from`);
      }
      if (oldTag === newTag) {
        throw new ConflictError(newTag, 'Old and new tag are the same');
      }

      const identity = await this.requireIdentity(oldTag);
      if (await this.registry.find(newTag)) {
        throw new ConflictError(newTag, `Tag "${newTag}" already exists`);
      }

      const moves = identity.keys.map(key => ({
        from: key,
        toPrivate: this.keyPath(key.keyType, newTag),
      }));
      for (const move of moves) {
        if (await fs.pathExists(move.toPrivate) || await fs.pathExists(move.toPrivate + PUBLIC_KEY_SUFFIX)) {
          throw new ConflictError(newTag, `Key file already exists: ${path.basename(move.toPrivate)}`);
        }
      }

      const oldAlias = identity.alias ?? deriveAlias(identity.hostname, oldTag);
      const newAlias = deriveAlias(identity.hostname, newTag);
      const taken = await this.store.get(newAlias);
      if (taken) {
        throw new ConflictError(newAlias, `Alias ${newAlias} already exists`);
      }

      return { oldTag, newTag, identity, moves, oldAlias, newAlias };
    });

    const snapshotId = await this.snapshot();

    const renamedFiles = await this.runStep('keys', async () => {
      const renamed: string[] = [];
      for (const move of plan.moves) {
        await fs.move(move.from.privatePath, move.toPrivate, { overwrite: false });
        await fs.move(move.from.publicPath, move.toPrivate + PUBLIC_KEY_SUFFIX, { overwrite: false });
        renamed.push(path.basename(move.toPrivate), path.basename(move.toPrivate) + PUBLIC_KEY_SUFFIX);
      }
      return renamed;
    });

    await this.runStep('config', () =>
      this.store.edit(doc => {
        let next: SshConfigDocument = doc;
        const primary = plan.moves.find(m => m.from.keyType === plan.identity.keyType) ?? plan.moves[0];

        // Every block routing to a moved key follows it
        for (const block of doc.blocks) {
          if (block.keyword !== 'Host' || block.identityFile === undefined) continue;
          const move = plan.moves.find(m => m.from.privatePath === resolveIdentityPath(block.identityFile ?? ''));
          if (!move) continue;
          const identityFile = managedBlockFields(block.hostname ?? plan.identity.hostname, move.toPrivate).identityFile;
          next = block.alias === plan.oldAlias
            ? renameBlock(next, plan.oldAlias, plan.newAlias, { identityFile })
            : upsertBlock(next, block.alias, { identityFile }).doc;
        }

        if (!findBlock(next, plan.newAlias) && primary) {
          next = upsertBlock(next, plan.newAlias, managedBlockFields(plan.identity.hostname, primary.toPrivate)).doc;
        }
        return { doc: next, result: undefined };
      })
    );

    await this.runStep('state', () => this.state.updateLabel(plan.oldTag, plan.newTag));

    logger.info(`Renamed ${plan.oldTag} to ${plan.newTag}`);
    return { snapshotId, oldAlias: plan.oldAlias, newAlias: plan.newAlias, renamedFiles };
  }

  /**
   * Make `tag` the identity used for a host pattern. The pattern's Host block
   * points at the tagged key; "default" drops that override again.
   */
  async switch(options: SwitchOptions): Promise<SwitchResult> {
    const { tag, hostPattern, key } = await this.runStep('validate', async () => {
      const tag = options.tag.trim().toLowerCase();
      const identity = await this.requireIdentity(tag);
      const key = options.keyType ? identity.keys.find(k => k.keyType === options.keyType) : primaryKey(identity);
      if (!key) {
        throw new NotFoundError(tag, `Identity "${tag}" has no ${options.keyType} key`);
      }
      return { tag, hostPattern: options.host ?? identity.hostname, key };
    });

    const snapshotId = await this.snapshot();

    await this.runStep('config', async () => {
      if (tag === DEFAULT_TAG) {
        await this.store.edit(doc => {
          const block = findBlock(doc, hostPattern);
          const managed = block?.identityFile !== undefined
            && isKeyFileName(path.basename(resolveIdentityPath(block.identityFile)));
          return managed ? { doc: removeBlock(doc, hostPattern).doc, result: undefined } : { doc, result: undefined };
        });
        return;
      }
      await this.store.upsert(hostPattern, managedBlockFields(hostPattern, key.privatePath));
    });

    await this.runStep('state', () => this.state.updateActive(hostPattern, tag));

    logger.info(`${hostPattern} now uses ${tag}`);
    return { snapshotId, hostPattern, tag };
  }

  /** Copy the default identity under a new tag */
  async tag(options: TagOptions): Promise<AddResult> {
    const plan = await this.runStep('validate', async () => {
      const tag = normalizeTag(options.newTag);
      if (tag === DEFAULT_TAG) {
        throw new ConflictError(tag, `"${DEFAULT_TAG}" is reserved for the unlabeled identity`);
      }
      const source = await this.requireIdentity(DEFAULT_TAG);
      const key = options.keyType ? source.keys.find(k => k.keyType === options.keyType) : primaryKey(source);
      if (!key) {
        throw new NotFoundError(DEFAULT_TAG, `The default identity has no ${options.keyType} key`);
      }

      const existing = await this.registry.find(tag);
      if (existing?.keys.some(k => k.keyType !== key.keyType)) {
        throw new ConflictError(tag, `Tag "${tag}" is already used by another key type`);
      }

      const privatePath = this.keyPath(key.keyType, tag);
      if ((await fs.pathExists(privatePath)) && !options.force) {
        throw new ConflictError(tag, `Identity "${tag}" already exists: ${path.basename(privatePath)}`);
      }

      const hostname = options.host ?? inferHostname(tag, this.config.defaultHost);
      const publicKey = await readPublicKey(key.publicPath);
      const comment = publicKey ? publicKeyComment(publicKey) : '';
      return { tag, key, privatePath, hostname, alias: deriveAlias(hostname, tag), comment };
    });

    const snapshotId = await this.snapshot();

    await this.runStep('keys', async () => {
      await fs.copy(plan.key.privatePath, plan.privatePath, { overwrite: true, preserveTimestamps: true });
      await fs.copy(plan.key.publicPath, plan.privatePath + PUBLIC_KEY_SUFFIX, { overwrite: true, preserveTimestamps: true });
    });

    const configOutcome = await this.runStep('config', () =>
      this.store.upsert(plan.alias, managedBlockFields(plan.hostname, plan.privatePath))
    );

    await this.runStep('state', () =>
      this.state.setIdentity(plan.tag, {
        keyType: plan.key.keyType,
        hostname: plan.hostname,
        comment: plan.comment,
        createdAt: new Date().toISOString(),
      })
    );

    return {
      identity: {
        tag: plan.tag,
        keyType: plan.key.keyType,
        privatePath: plan.privatePath,
        publicPath: plan.privatePath + PUBLIC_KEY_SUFFIX,
        hostAlias: plan.alias,
        comment: plan.comment,
      },
      snapshotId,
      configOutcome,
    };
  }

  /**
   * Bind a repository to an identity: Unbound -> Bound(alias) -> Verified(alias).
   * A failed probe leaves the binding at Bound and carries the diagnostic.
   */
  async use(options: UseOptions): Promise<UseResult> {
    const repoPath = options.repoPath ?? '.';
    const remoteName = options.remote ?? 'origin';

    const previousUrl = await this.runStep('remote', () => this.git.getRemoteUrl(repoPath, remoteName));

    const plan = await this.runStep('validate', async () => {
      const binding = parseRemoteUrl(previousUrl);
      const tag = options.tag.trim().toLowerCase();
      const identity = await this.requireIdentity(tag);
      const key = primaryKey(identity);

      const doc = await this.store.load();
      const platformHost = findBlock(doc, binding.host)?.hostname ?? binding.host;
      const alias = deriveAlias(platformHost, tag);
      const block = findBlock(doc, alias);
      const collision = block?.identityFile !== undefined && !routesTo(block, key.privatePath);
      if (collision && !options.force) {
        throw new ConflictError(alias, `Alias ${alias} already routes to ${block?.identityFile}; confirm to replace it`);
      }
      const fields = managedBlockFields(platformHost, key.privatePath);
      // Rewriting an existing block is destructive; creating one is not
      const overwrites = block !== undefined && upsertBlock(doc, alias, fields).outcome === 'updated';
      return { binding, tag, alias, fields, overwrites };
    });

    const snapshotId = plan.overwrites ? await this.snapshot() : undefined;

    const configOutcome = await this.runStep('config', () => this.store.upsert(plan.alias, plan.fields));

    const remoteUrl = toSshAliasUrl(plan.binding, plan.alias);
    const changed = remoteUrl !== previousUrl;
    if (changed) {
      await this.runStep('remote', () => this.git.setRemoteUrl(repoPath, remoteName, remoteUrl));
    }

    let binding: BindingState = { status: 'bound', alias: plan.alias, tag: plan.tag, remoteUrl };
    let probe: ProbeResult | undefined;

    if (options.verify ?? true) {
      probe = await this.runStep('probe', () => this.probe.probe(plan.alias));
      if (probe.outcome === 'success') {
        binding = { ...binding, status: 'verified', username: probe.username };
      }
    }

    return { binding, previousUrl, remoteUrl, changed, alias: plan.alias, configOutcome, snapshotId, probe };
  }

  /** Where a repository's remote currently routes */
  async info(repoPath = '.', remoteName = 'origin'): Promise<RepoInfo> {
    const remoteUrl = await this.runStep('remote', () => this.git.getRemoteUrl(repoPath, remoteName));
    const remote = parseRemoteUrl(remoteUrl);
    const block = await this.store.get(remote.host);

    if (!block?.identityFile) {
      return { binding: { status: 'unbound', remoteUrl }, remote, block };
    }

    const { identities } = await this.registry.view();
    const identity = identities.find(i => i.keys.some(k => routesTo(block, k.privatePath)));
    return {
      binding: { status: 'bound', alias: remote.host, tag: identity?.tag, remoteUrl },
      remote,
      block,
      identity,
    };
  }

  async test(tagInput: string): Promise<TestResult> {
    const tag = tagInput.trim().toLowerCase();
    const identity = await this.requireIdentity(tag);
    const alias = identity.alias ?? deriveAlias(identity.hostname, tag);
    const result = await this.runStep('probe', () => this.probe.probe(alias));
    return { tag, alias, result };
  }

  /** Probe every identity on disk, one after another */
  async testAll(): Promise<TestResult[]> {
    const { identities } = await this.registry.view();
    const results: TestResult[] = [];
    for (const identity of identities.filter(i => i.existsOnDisk)) {
      const alias = identity.alias ?? deriveAlias(identity.hostname, identity.tag);
      const result = await this.runStep('probe', () => this.probe.probe(alias));
      results.push({ tag: identity.tag, alias, result });
    }
    return results;
  }

  /** Probe whatever host the repository's remote names */
  async testRepository(repoPath = '.', remoteName = 'origin'): Promise<TestResult> {
    const info = await this.info(repoPath, remoteName);
    const result = await this.runStep('probe', () => this.probe.probe(info.remote.host));
    return { tag: info.identity?.tag ?? '', alias: info.remote.host, result };
  }

  async backup(): Promise<string> {
    return this.snapshot();
  }

  async listBackups(): Promise<SnapshotSummary[]> {
    return this.vault.list();
  }

  /** Restore a snapshot; the current files are snapshotted first */
  async restore(id: string): Promise<RestoreResult> {
    await this.runStep('validate', () => this.vault.get(id));
    const snapshotId = await this.snapshot();
    const restored = await this.runStep('keys', () => this.vault.restore(id));
    return { snapshotId, restored };
  }
}

/** Wire an orchestrator from a resolved config; any collaborator can be replaced */
export function createOrchestrator(
  config: SshmConfig,
  overrides: Partial<Omit<OrchestratorDeps, 'config'>> = {}
): IdentityOrchestrator {
  const store = overrides.store ?? new ConfigBlockStore(config.configFile);
  const state = overrides.state ?? new IdentityState(config.stateFile);

  return new IdentityOrchestrator({
    config,
    store,
    state,
    vault: overrides.vault ?? new BackupVault({
      sshDir: config.sshDir,
      backupDir: config.backupDir,
      extraFiles: [config.configFile, config.stateFile],
    }),
    registry: overrides.registry ?? new IdentityRegistry(config.sshDir, state, store, config.defaultHost),
    keygen: overrides.keygen ?? new SshKeygen(),
    probe: overrides.probe ?? new SshProbe({ timeoutMs: config.probeTimeoutMs }),
    git: overrides.git ?? new SimpleGitRemoteClient(),
  });
}
