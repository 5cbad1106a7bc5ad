/**
 * sshm Type Definitions
 */

export type KeyType = 'ed25519' | 'rsa' | 'ecdsa' | 'dsa';

/** Per-variant key generation parameters */
export type KeyTypeSpec =
  | { type: 'ed25519' }
  | { type: 'rsa'; bits: number }
  | { type: 'ecdsa'; bits: number }
  | { type: 'dsa'; bits: number };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface SshmConfig {
  /** Directory holding the key pairs */
  sshDir: string;
  /** SSH client configuration file */
  configFile: string;
  /** Active-identity state file */
  stateFile: string;
  /** Root of the backup snapshots */
  backupDir: string;
  /** Key type used by `add` when none is given */
  defaultKeyType: KeyType;
  /** Host used when a tag names no known platform */
  defaultHost: string;
  /** Upper bound for one connectivity probe */
  probeTimeoutMs: number;
  logLevel: LogLevel;
}

/** Settings persisted in ~/.sshm/config.json; every field optional */
export type SshmSettings = Partial<Pick<SshmConfig,
  'sshDir' | 'defaultKeyType' | 'defaultHost' | 'probeTimeoutMs' | 'logLevel'
>>;

export interface Identity {
  /** Unique tag, or "default" for the unlabeled identity */
  tag: string;
  keyType: KeyType;
  privatePath: string;
  /** Always privatePath + ".pub" */
  publicPath: string;
  /** SSH config alias routing to this identity, when one is configured */
  hostAlias?: string;
  comment: string;
}

export interface ConfigHostBlock {
  /** `Host` pattern, or the criteria of a `Match` block */
  alias: string;
  keyword: 'Host' | 'Match';
  /** Comment lines directly above the block header */
  comments?: string[];
  hostname?: string;
  user?: string;
  identityFile?: string;
  /** Unmodeled directive and comment lines, kept verbatim and in order */
  extraLines: string[];
}

export interface SshConfigDocument {
  /** Lines before the first block (global directives, comments) */
  preamble: string[];
  blocks: ConfigHostBlock[];
}

/** Fields an upsert may set on a block */
export interface HostBlockFields {
  hostname?: string;
  user?: string;
  identityFile?: string;
  /** Directives appended unless the block already sets the same keyword */
  extraLines?: string[];
}

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';

/** What sshm remembers about a tag beyond its key files */
export interface StoredIdentity {
  keyType: KeyType;
  hostname: string;
  comment: string;
  createdAt: string;
}

export interface StateRecord {
  version: 1;
  /** host pattern -> active tag */
  active: Record<string, string>;
  /** Tag standing for the unlabeled identity */
  defaultTag: string;
  identities: Record<string, StoredIdentity>;
}

export interface SnapshotFile {
  /** File name inside the snapshot directory */
  name: string;
  /** Absolute path the file was copied from */
  source: string;
}

export interface BackupSnapshot {
  id: string;
  createdAt: string;
  files: SnapshotFile[];
}

export interface SnapshotSummary {
  id: string;
  createdAt: string;
  fileCount: number;
  path: string;
}

export type KeyFileKind = 'tagged' | 'default' | 'orphan-public' | 'orphan-private';

export interface KeyFileSet {
  tag: string;
  keyType: KeyType;
  kind: KeyFileKind;
  privatePath: string;
  publicPath: string;
}

export interface ScanResult {
  /** Complete pairs, tagged and default */
  keys: KeyFileSet[];
  /** Half pairs; reported, never repaired */
  orphans: KeyFileSet[];
}

export interface KeyRef {
  keyType: KeyType;
  privatePath: string;
  publicPath: string;
}

/** Merged view of one tag across disk, state and SSH config */
export interface IdentityView {
  tag: string;
  /** Recorded type, or the first type found on disk */
  keyType: KeyType;
  keys: KeyRef[];
  metadata?: StoredIdentity;
  alias?: string;
  hostname: string;
  isActive: boolean;
  /** Host patterns this tag is active for */
  activeFor: string[];
  existsOnDisk: boolean;
}

export type InconsistencyKind =
  | 'orphan-public'
  | 'orphan-private'
  | 'orphan-alias'
  | 'missing-key-files'
  | 'dangling-active';

export interface Inconsistency {
  kind: InconsistencyKind;
  subject: string;
  detail: string;
}

export interface RegistryView {
  identities: IdentityView[];
  issues: Inconsistency[];
}

export type RemoteScheme = 'scp' | 'ssh' | 'https' | 'http';

/** A git remote URL taken apart */
export interface RemoteBinding {
  scheme: RemoteScheme;
  /** Host as written in the URL; may be an SSH config alias */
  host: string;
  user?: string;
  port?: number;
  owner: string;
  repo: string;
  /** Whether the URL ended in ".git" */
  gitSuffix: boolean;
}

export type ProbeOutcome = 'success' | 'authentication-rejected' | 'unreachable' | 'timeout';

export interface ProbeResult {
  outcome: ProbeOutcome;
  /** Account name the server greeted, on success */
  username?: string;
  /** Combined stdout/stderr of the probe, verbatim */
  diagnostic: string;
}

/** Repository binding lifecycle used by `use` */
export type BindingState =
  | { status: 'unbound'; remoteUrl?: string }
  | { status: 'bound'; alias: string; tag?: string; remoteUrl: string }
  | { status: 'verified'; alias: string; tag?: string; remoteUrl: string; username?: string };

export type OperationStep = 'validate' | 'snapshot' | 'keys' | 'config' | 'state' | 'remote' | 'probe';
