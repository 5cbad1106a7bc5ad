/**
 * Key Generation Service
 * Wraps ssh-keygen. sshm never generates key material itself.
 */

import fs from 'fs-extra';
import path from 'path';
import { KEY_TYPES, PUBLIC_KEY_SUFFIX } from '../constants.js';
import { ConflictError, ExternalToolError } from '../errors.js';
import { runTool, type ToolRunner } from '../utils/exec.js';
import { logger } from '../utils/logger.js';
import type { KeyType } from '../types/index.js';

export interface KeyGenRequest {
  keyType: KeyType;
  /** Private key destination; the public key lands beside it with ".pub" */
  outputPath: string;
  comment: string;
  /** Empty for no passphrase */
  passphrase?: string;
}

export interface GeneratedKeyPair {
  privatePath: string;
  publicPath: string;
}

/**
 * Produces exactly `outputPath` and `outputPath.pub`, or fails leaving
 * neither behind.
 */
export interface KeyGenerator {
  generate(request: KeyGenRequest): Promise<GeneratedKeyPair>;
}

function resolveSshKeygenBinary(): string {
  if (process.platform !== 'win32') {
    return 'ssh-keygen';
  }
  const candidates = [
    'C:\\Program Files\\Git\\usr\\bin\\ssh-keygen.exe',
    'C:\\Program Files (x86)\\Git\\usr\\bin\\ssh-keygen.exe',
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  // Windows 10+ ships OpenSSH
  return 'ssh-keygen';
}

/** Command line for one request */
export function keygenArgs(request: KeyGenRequest): string[] {
  const spec = KEY_TYPES[request.keyType];
  const args = ['-q', '-t', spec.type];
  if ('bits' in spec) {
    args.push('-b', String(spec.bits));
  }
  args.push('-C', request.comment, '-f', request.outputPath, '-N', request.passphrase ?? '');
  return args;
}

export class SshKeygen implements KeyGenerator {
  constructor(
    private readonly run: ToolRunner = runTool,
    private readonly binary: string = resolveSshKeygenBinary()
  ) {}

  async generate(request: KeyGenRequest): Promise<GeneratedKeyPair> {
    const privatePath = request.outputPath;
    const publicPath = privatePath + PUBLIC_KEY_SUFFIX;

    // ssh-keygen would stop and ask before overwriting
    if ((await fs.pathExists(privatePath)) || (await fs.pathExists(publicPath))) {
      throw new ConflictError(privatePath, `Key file already exists: ${path.basename(privatePath)}`);
    }

    await fs.ensureDir(path.dirname(privatePath), 0o700);
    logger.debug(`Generating ${request.keyType} key at ${privatePath}`);

    const result = await this.run(this.binary, keygenArgs(request));

    if (result.exitCode !== 0) {
      await this.discard(privatePath, publicPath);
      throw new ExternalToolError(
        'ssh-keygen',
        privatePath,
        `ssh-keygen failed with status ${result.exitCode ?? 'unknown'}`,
        (result.stderr || result.stdout).trim(),
        result.exitCode ?? undefined
      );
    }

    const complete = (await fs.pathExists(privatePath)) && (await fs.pathExists(publicPath));
    if (!complete) {
      await this.discard(privatePath, publicPath);
      throw new ExternalToolError(
        'ssh-keygen',
        privatePath,
        'ssh-keygen reported success but did not produce both key files',
        (result.stderr || result.stdout).trim(),
        0
      );
    }

    // Keys must not be world-readable or ssh refuses them
    if (process.platform !== 'win32') {
      await fs.chmod(privatePath, 0o600);
      await fs.chmod(publicPath, 0o644);
    }

    return { privatePath, publicPath };
  }

  private async discard(privatePath: string, publicPath: string): Promise<void> {
    await fs.remove(privatePath);
    await fs.remove(publicPath);
  }
}

/** Contents of a public key file, trimmed; null when it cannot be read */
export async function readPublicKey(publicPath: string): Promise<string | null> {
  try {
    const content = await fs.readFile(publicPath, 'utf-8');
    return content.trim();
  } catch {
    return null;
  }
}

/** The comment field of an OpenSSH public key line (`<type> <base64> <comment>`) */
export function publicKeyComment(publicKey: string): string {
  return publicKey.trim().split(/\s+/).slice(2).join(' ');
}
