/**
 * Backup Service
 * Point-in-time copies of the key files, the SSH config and the state file.
 * Snapshots are never modified after they are written.
 */

import fs from 'fs-extra';
import path from 'path';
import { SNAPSHOT_MANIFEST } from '../constants.js';
import { NotFoundError, toSshmError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { isKeyFileName } from './registry.js';
import type { BackupSnapshot, SnapshotFile, SnapshotSummary } from '../types/index.js';

export interface BackupVaultOptions {
  /** Directory scanned for key files */
  sshDir: string;
  /** Directory holding one sub-directory per snapshot */
  backupDir: string;
  /** Extra files captured when present (SSH config, state file) */
  extraFiles?: string[];
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Snapshot id for a point in time, in UTC. Fixed width, so lexical order
 * matches chronological order.
 */
export function createSnapshotId(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `backup_${day}_${time}_${pad(date.getUTCMilliseconds(), 3)}`;
}

function isSnapshotFile(value: unknown): value is SnapshotFile {
  return typeof value === 'object' && value !== null
    && 'name' in value && typeof value.name === 'string'
    && 'source' in value && typeof value.source === 'string';
}

function toSnapshot(value: unknown): BackupSnapshot | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('id' in value) || typeof value.id !== 'string') return null;
  if (!('createdAt' in value) || typeof value.createdAt !== 'string') return null;
  if (!('files' in value) || !Array.isArray(value.files)) return null;

  const files: unknown[] = value.files;
  if (!files.every(isSnapshotFile)) return null;
  return { id: value.id, createdAt: value.createdAt, files: files.filter(isSnapshotFile) };
}

export class BackupVault {
  private readonly sshDir: string;
  private readonly root: string;
  private readonly extraFiles: string[];

  constructor(options: BackupVaultOptions) {
    this.sshDir = options.sshDir;
    this.root = options.backupDir;
    this.extraFiles = options.extraFiles ?? [];
  }

  /** Files a snapshot taken now would capture */
  async collect(): Promise<SnapshotFile[]> {
    const files: SnapshotFile[] = [];

    if (await fs.pathExists(this.sshDir)) {
      const entries = await fs.readdir(this.sshDir, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isFile() && isKeyFileName(entry.name)) {
          files.push({ name: entry.name, source: path.join(this.sshDir, entry.name) });
        }
      }
    }
    files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const extra of this.extraFiles) {
      if (await fs.pathExists(extra)) {
        files.push({ name: path.basename(extra), source: extra });
      }
    }

    return files;
  }

  private async nextId(now: Date): Promise<string> {
    const base = createSnapshotId(now);
    let candidate = base;
    let n = 1;
    while (await fs.pathExists(path.join(this.root, candidate))) {
      candidate = `${base}_${pad(n)}`;
      n += 1;
    }
    return candidate;
  }

  /** Copy every identity file into a new snapshot directory */
  async snapshot(): Promise<BackupSnapshot> {
    let dir = this.root;
    try {
      await fs.ensureDir(this.root, 0o700);
      const id = await this.nextId(new Date());
      dir = path.join(this.root, id);
      await fs.mkdir(dir, { mode: 0o700 });

      const files = await this.collect();
      for (const file of files) {
        await fs.copy(file.source, path.join(dir, file.name), {
          preserveTimestamps: true,
          errorOnExist: true,
          overwrite: false,
        });
      }

      const snapshot: BackupSnapshot = { id, createdAt: new Date().toISOString(), files };
      await fs.writeJson(path.join(dir, SNAPSHOT_MANIFEST), snapshot, { spaces: 2 });
      logger.debug(`Snapshot ${id}: ${files.length} file(s)`);
      return snapshot;
    } catch (error) {
      if (dir !== this.root) {
        await fs.remove(dir);
      }
      throw toSshmError(error, dir);
    }
  }

  async get(id: string): Promise<BackupSnapshot> {
    const dir = path.join(this.root, id);
    if (path.basename(id) !== id || !(await fs.pathExists(dir))) {
      throw new NotFoundError(id, `Backup not found: ${id}`);
    }

    try {
      const manifest = toSnapshot(await fs.readJson(path.join(dir, SNAPSHOT_MANIFEST)));
      if (manifest) {
        return manifest;
      }
      logger.warn(`Backup ${id} has a malformed manifest; using its directory listing`);
    } catch {
      logger.warn(`Backup ${id} has no readable manifest; using its directory listing`);
    }

    // Older snapshots carry no manifest: every file came from the SSH directory
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const files = entries
      .filter(e => e.isFile() && e.name !== SNAPSHOT_MANIFEST)
      .map(e => ({ name: e.name, source: path.join(this.sshDir, e.name) }));
    const stats = await fs.stat(dir);
    return { id, createdAt: stats.mtime.toISOString(), files };
  }

  /**
   * Copy a snapshot's files back where they came from. Files that exist now
   * but are absent from the snapshot are left alone.
   */
  async restore(id: string): Promise<SnapshotFile[]> {
    const snapshot = await this.get(id);
    const dir = path.join(this.root, id);

    for (const file of snapshot.files) {
      try {
        await fs.copy(path.join(dir, file.name), file.source, {
          overwrite: true,
          preserveTimestamps: true,
        });
      } catch (error) {
        throw toSshmError(error, file.source);
      }
    }

    logger.debug(`Restored ${snapshot.files.length} file(s) from ${id}`);
    return snapshot.files;
  }

  /** Snapshots, newest first */
  async list(): Promise<SnapshotSummary[]> {
    if (!(await fs.pathExists(this.root))) {
      return [];
    }

    const entries = await fs.readdir(this.root, { withFileTypes: true });
    const ids = entries
      .filter(e => e.isDirectory() && e.name.startsWith('backup_'))
      .map(e => e.name)
      .sort()
      .reverse();

    const summaries: SnapshotSummary[] = [];
    for (const id of ids) {
      const snapshot = await this.get(id);
      summaries.push({
        id,
        createdAt: snapshot.createdAt,
        fileCount: snapshot.files.length,
        path: path.join(this.root, id),
      });
    }
    return summaries;
  }
}
