/**
 * sshm
 * Several SSH identities on one machine
 *
 * This module exports the core functionality for programmatic usage.
 */

// Types
export type {
  KeyType,
  SshmConfig,
  SshmSettings,
  Identity,
  ConfigHostBlock,
  SshConfigDocument,
  StateRecord,
  BackupSnapshot,
  SnapshotSummary,
  IdentityView,
  Inconsistency,
  RegistryView,
  RemoteBinding,
  ProbeResult,
  BindingState,
} from './types/index.js';

// Constants
export {
  SSHM_HOME,
  DEFAULT_SSH_DIR,
  VERSION,
} from './constants.js';

// Errors
export {
  SshmError,
  ParseError,
  NotFoundError,
  ConflictError,
  ExternalToolError,
  IOError,
} from './errors.js';

// Config management
export {
  getSettings,
  saveSettings,
  updateSettings,
  resolveConfig,
  loadConfig,
  getSshmHome,
} from './services/config.js';

// SSH config
export {
  parseSshConfig,
  serializeSshConfig,
  ConfigBlockStore,
} from './services/sshconfig.js';

// Remote URLs
export {
  parseRemoteUrl,
  buildAliasUrl,
  deriveAlias,
} from './services/remote.js';

// Registry, state and backups
export { reconcile, IdentityRegistry } from './services/registry.js';
export { IdentityState } from './services/state.js';
export { BackupVault } from './services/backup.js';

// Operations
export {
  IdentityOrchestrator,
  createOrchestrator,
} from './services/orchestrator.js';
