import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { BackupVault, createSnapshotId } from './backup.js';
import { NotFoundError } from '../errors.js';
import { logger } from '../utils/logger.js';

describe('BackupVault', () => {
  let dir: string;
  let backupDir: string;
  let vault: BackupVault;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sshm-backup-'));
    backupDir = path.join(dir, 'key_backups');
    vault = new BackupVault({
      sshDir: dir,
      backupDir,
      extraFiles: [path.join(dir, 'config'), path.join(dir, '.sshm_state')],
    });
    logger.setLevel('silent');

    await fs.writeFile(path.join(dir, 'id_ed25519'), 'private-default');
    await fs.writeFile(path.join(dir, 'id_ed25519.pub'), 'public-default');
    await fs.writeFile(path.join(dir, 'known_hosts'), 'github.com ssh-ed25519 AAAA');
    await fs.writeFile(path.join(dir, 'config'), 'Host *\n  User git\n\n');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should format ids from UTC time', () => {
    expect(createSnapshotId(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6)))).toBe('backup_20240102_030405_006');
  });

  it('should capture key files, config and state when present', async () => {
    const files = await vault.collect();

    expect(files.map(f => f.name)).toEqual(['id_ed25519', 'id_ed25519.pub', 'config']);
  });

  it('should copy every captured file into a new directory', async () => {
    const snapshot = await vault.snapshot();
    const snapshotDir = path.join(backupDir, snapshot.id);

    expect((await fs.readdir(snapshotDir)).sort()).toEqual(['config', 'id_ed25519', 'id_ed25519.pub', 'snapshot.json']);
    expect(await fs.readFile(path.join(snapshotDir, 'id_ed25519'), 'utf-8')).toBe('private-default');
  });

  it('should never reuse a snapshot directory', async () => {
    const first = await vault.snapshot();
    const second = await vault.snapshot();

    expect(second.id).not.toBe(first.id);
    expect((await vault.list()).map(s => s.id)).toEqual([second.id, first.id].sort().reverse());
  });

  it('should restore files where they came from', async () => {
    const snapshot = await vault.snapshot();
    await fs.writeFile(path.join(dir, 'id_ed25519'), 'replaced');
    await fs.remove(path.join(dir, 'config'));

    const restored = await vault.restore(snapshot.id);

    expect(restored).toHaveLength(3);
    expect(await fs.readFile(path.join(dir, 'id_ed25519'), 'utf-8')).toBe('private-default');
    expect(await fs.readFile(path.join(dir, 'config'), 'utf-8')).toBe('Host *\n  User git\n\n');
  });

  it('should read snapshots without a manifest from their listing', async () => {
    const legacy = path.join(backupDir, 'backup_20200101_000000');
    await fs.ensureDir(legacy);
    await fs.writeFile(path.join(legacy, 'id_rsa.work'), 'old');

    const snapshot = await vault.get('backup_20200101_000000');

    expect(snapshot.files).toEqual([{ name: 'id_rsa.work', source: path.join(dir, 'id_rsa.work') }]);
  });

  it('should reject unknown ids and path traversal', async () => {
    await expect(vault.get('backup_missing')).rejects.toThrow(NotFoundError);
    await expect(vault.restore('../id_ed25519')).rejects.toThrow(NotFoundError);
  });
});
