/**
 * Command Context
 * Resolves the configuration for a command run and wires the orchestrator.
 */

import { loadConfig, parseSetting } from '../services/config.js';
import { createOrchestrator, type IdentityOrchestrator } from '../services/orchestrator.js';
import type { SshmConfig } from '../types/index.js';

/** Options accepted by every command */
export interface GlobalOptions {
  sshDir?: string;
}

export interface CommandContext {
  config: SshmConfig;
  orchestrator: IdentityOrchestrator;
}

export async function openContext(options: GlobalOptions = {}): Promise<CommandContext> {
  const overrides = options.sshDir ? parseSetting('sshDir', options.sshDir) : {};
  const config = await loadConfig(overrides);
  return { config, orchestrator: createOrchestrator(config) };
}
