import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  IdentityRegistry,
  classifyKeyFiles,
  keyFileName,
  parseKeyFileName,
  reconcile,
} from './registry.js';
import { ConfigBlockStore, parseSshConfig } from './sshconfig.js';
import { IdentityState, emptyState } from './state.js';
import { logger } from '../utils/logger.js';
import type { StateRecord } from '../types/index.js';

const SSH_DIR = path.join(path.sep, 'ssh');
const at = (name: string) => path.join(SSH_DIR, name);

describe('Registry', () => {
  describe('key file names', () => {
    it('should parse tagged, default and public names', () => {
      expect(parseKeyFileName('id_rsa.work')).toEqual({ keyType: 'rsa', tag: 'work', isPublic: false });
      expect(parseKeyFileName('id_ed25519.pub')).toEqual({ keyType: 'ed25519', tag: 'default', isPublic: true });
    });

    it('should ignore files that are not keys', () => {
      expect(parseKeyFileName('known_hosts')).toBeNull();
      expect(parseKeyFileName('id_ed25519.work.bak')).toBeNull();
      expect(parseKeyFileName('id_foo.work')).toBeNull();
    });

    it('should build names from type and tag', () => {
      expect(keyFileName('ecdsa', 'default')).toBe('id_ecdsa');
      expect(keyFileName('ecdsa', 'ci')).toBe('id_ecdsa.ci');
    });
  });

  describe('classifyKeyFiles', () => {
    it('should pair keys and report half pairs', () => {
      const scan = classifyKeyFiles(SSH_DIR, [
        'id_ed25519', 'id_ed25519.pub',
        'id_rsa.work', 'id_rsa.work.pub',
        'id_ecdsa.old.pub',
        'config', 'known_hosts',
      ]);

      expect(scan.keys).toEqual([
        { tag: 'default', keyType: 'ed25519', kind: 'default', privatePath: at('id_ed25519'), publicPath: at('id_ed25519.pub') },
        { tag: 'work', keyType: 'rsa', kind: 'tagged', privatePath: at('id_rsa.work'), publicPath: at('id_rsa.work.pub') },
      ]);
      expect(scan.orphans).toEqual([
        { tag: 'old', keyType: 'ecdsa', kind: 'orphan-public', privatePath: at('id_ecdsa.old'), publicPath: at('id_ecdsa.old.pub') },
      ]);
    });
  });

  describe('reconcile', () => {
    const state: StateRecord = {
      ...emptyState(),
      active: { 'github.com': 'work' },
      identities: {
        work: { keyType: 'rsa', hostname: 'github.com', comment: 'work laptop', createdAt: '2024-05-01T10:00:00.000Z' },
      },
    };
    const config = [
      'Host github-work',
      '  HostName github.com',
      `  IdentityFile ${at('id_rsa.work')}`,
      'Host github.com',
      '  HostName github.com',
      `  IdentityFile ${at('id_rsa.work')}`,
      'Host gitlab-gone',
      '  HostName gitlab.com',
      `  IdentityFile ${at('id_ed25519.gone')}`,
      '',
    ].join('\n');

    const view = reconcile({
      scan: classifyKeyFiles(SSH_DIR, ['id_ed25519', 'id_ed25519.pub', 'id_rsa.work', 'id_rsa.work.pub', 'id_ecdsa.old.pub']),
      state,
      blocks: parseSshConfig(config).blocks,
    });

    it('should list active identities first', () => {
      expect(view.identities.map(i => i.tag)).toEqual(['work', 'default']);
    });

    it('should join disk, state and config for a tag', () => {
      const work = view.identities[0];

      expect(work.alias).toBe('github-work');
      expect(work.keyType).toBe('rsa');
      expect(work.isActive).toBe(true);
      expect(work.activeFor).toEqual(['github.com']);
      expect(work.metadata?.comment).toBe('work laptop');
      expect(work.existsOnDisk).toBe(true);
    });

    it('should describe identities the state file does not know', () => {
      const fallback = view.identities[1];

      expect(fallback.alias).toBeUndefined();
      expect(fallback.hostname).toBe('github.com');
      expect(fallback.isActive).toBe(false);
    });

    it('should report orphan keys and aliases', () => {
      expect(view.issues.map(i => [i.kind, i.subject])).toEqual([
        ['orphan-public', at('id_ecdsa.old.pub')],
        ['orphan-alias', 'gitlab-gone'],
      ]);
    });

    it('should report tags recorded without key files', () => {
      const result = reconcile({
        scan: { keys: [], orphans: [] },
        state: {
          ...emptyState(),
          active: { 'gitlab.com': 'ghost' },
          identities: { ghost: { keyType: 'ed25519', hostname: 'gitlab.com', comment: '', createdAt: '' } },
        },
        blocks: [],
      });

      expect(result.identities).toHaveLength(1);
      expect(result.identities[0].existsOnDisk).toBe(false);
      expect(result.issues.map(i => i.kind)).toEqual(['missing-key-files', 'dangling-active']);
    });
  });

  describe('IdentityRegistry', () => {
    let dir: string;
    let registry: IdentityRegistry;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sshm-registry-'));
      registry = new IdentityRegistry(
        dir,
        new IdentityState(path.join(dir, '.sshm_state')),
        new ConfigBlockStore(path.join(dir, 'config'))
      );
      logger.setLevel('silent');
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('should scan an empty directory', async () => {
      expect(await registry.view()).toEqual({ identities: [], issues: [] });
    });

    it('should find an identity by tag', async () => {
      await fs.writeFile(path.join(dir, 'id_ed25519.personal'), 'private');
      await fs.writeFile(path.join(dir, 'id_ed25519.personal.pub'), 'ssh-ed25519 AAAA personal');

      const identity = await registry.find('personal');

      expect(identity?.keys).toEqual([{
        keyType: 'ed25519',
        privatePath: path.join(dir, 'id_ed25519.personal'),
        publicPath: path.join(dir, 'id_ed25519.personal.pub'),
      }]);
      expect(await registry.find('missing')).toBeUndefined();
    });
  });
});
