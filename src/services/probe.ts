/**
 * Connectivity Probe Service
 * Runs `ssh -T` against an alias and classifies what the server answered.
 */

import fs from 'fs-extra';
import { DEFAULT_GIT_USER, DEFAULT_PROBE_TIMEOUT_MS } from '../constants.js';
import { runTool, type ToolResult, type ToolRunner } from '../utils/exec.js';
import { logger } from '../utils/logger.js';
import type { ProbeResult } from '../types/index.js';

export interface ConnectivityProbe {
  probe(target: string): Promise<ProbeResult>;
}

const GREETINGS: RegExp[] = [
  /Hi ([^!\s]+)! You've successfully authenticated/,
  /Welcome to [^,]+, @?([^!\s]+)!/,
  /logged in as ([^.\s]+)/,
  /Hi ([^!\s]+)!/,
];

const UNREACHABLE_HINTS = [
  'could not resolve hostname',
  'connection refused',
  'network is unreachable',
  'no route to host',
  'connection closed',
];

/**
 * Classify probe output. Git hosts answer `ssh -T` with a greeting and exit
 * status 1, so the text decides, not the status.
 */
export function classifyProbeOutput(result: ToolResult): ProbeResult {
  const diagnostic = [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n');

  if (result.timedOut) {
    return { outcome: 'timeout', diagnostic };
  }

  const lower = diagnostic.toLowerCase();

  // Pre-auth banners may say "Welcome to ...", so a rejection wins.
  if (lower.includes('permission denied')) {
    return { outcome: 'authentication-rejected', diagnostic };
  }

  const username = GREETINGS.map(p => diagnostic.match(p)?.[1]).find(Boolean);
  if (username !== undefined || lower.includes('successfully authenticated')) {
    return { outcome: 'success', username, diagnostic };
  }

  if (lower.includes('timed out')) {
    return { outcome: 'timeout', diagnostic };
  }

  if (result.exitCode === 0) {
    return { outcome: 'success', diagnostic };
  }

  if (!UNREACHABLE_HINTS.some(hint => lower.includes(hint))) {
    logger.debug(`Unrecognised probe output (status ${result.exitCode ?? 'none'}): ${diagnostic}`);
  }
  return { outcome: 'unreachable', diagnostic };
}

function resolveSshBinary(): string {
  if (process.platform !== 'win32') {
    return 'ssh';
  }
  const candidates = [
    'C:\\Program Files\\Git\\usr\\bin\\ssh.exe',
    'C:\\Program Files (x86)\\Git\\usr\\bin\\ssh.exe',
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return 'ssh';
}

export interface SshProbeOptions {
  timeoutMs?: number;
  user?: string;
  run?: ToolRunner;
  binary?: string;
}

export class SshProbe implements ConnectivityProbe {
  private readonly timeoutMs: number;
  private readonly user: string;
  private readonly run: ToolRunner;
  private readonly binary: string;

  constructor(options: SshProbeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.user = options.user ?? DEFAULT_GIT_USER;
    this.run = options.run ?? runTool;
    this.binary = options.binary ?? resolveSshBinary();
  }

  async probe(target: string): Promise<ProbeResult> {
    const connectTimeout = Math.max(1, Math.floor(this.timeoutMs / 1000) - 1);
    const args = [
      '-T',
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=accept-new',
      '-o', `ConnectTimeout=${connectTimeout}`,
      `${this.user}@${target}`,
    ];

    logger.debug(`Probing ${target} (timeout ${this.timeoutMs}ms)`);
    const result = await this.run(this.binary, args, { timeoutMs: this.timeoutMs });
    return classifyProbeOutput(result);
  }
}
