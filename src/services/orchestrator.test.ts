import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createOrchestrator, normalizeTag, type IdentityOrchestrator } from './orchestrator.js';
import { resolveConfig } from './config.js';
import { BackupVault } from './backup.js';
import type { GitRemoteClient } from './git.js';
import type { GeneratedKeyPair, KeyGenRequest, KeyGenerator } from './keygen.js';
import { ConflictError, NotFoundError, ParseError, SshmError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { ProbeResult, SshmConfig } from '../types/index.js';

class FakeKeygen implements KeyGenerator {
  readonly requests: KeyGenRequest[] = [];

  async generate(request: KeyGenRequest): Promise<GeneratedKeyPair> {
    this.requests.push(request);
    const publicPath = `${request.outputPath}.pub`;
    await fs.writeFile(request.outputPath, 'test-private-key', { mode: 0o600 });
    await fs.writeFile(publicPath, `ssh-${request.keyType} AAAAtest ${request.comment}\n`);
    return { privatePath: request.outputPath, publicPath };
  }
}

class FakeGit implements GitRemoteClient {
  readonly remotes = new Map<string, string>();

  async isRepository(repoPath: string): Promise<boolean> {
    return this.remotes.has(`${repoPath}#origin`);
  }

  async getRemoteUrl(repoPath: string, remote: string): Promise<string> {
    const url = this.remotes.get(`${repoPath}#${remote}`);
    if (url === undefined) {
      throw new NotFoundError(remote, `Remote "${remote}" not found`);
    }
    return url;
  }

  async setRemoteUrl(repoPath: string, remote: string, url: string): Promise<void> {
    this.remotes.set(`${repoPath}#${remote}`, url);
  }
}

const GREETING: ProbeResult = {
  outcome: 'success',
  username: 'octo-dev',
  diagnostic: "Hi octo-dev! You've successfully authenticated, but GitHub does not provide shell access.",
};

describe('IdentityOrchestrator', () => {
  let dir: string;
  let config: SshmConfig;
  let vault: BackupVault;
  let keygen: FakeKeygen;
  let git: FakeGit;
  let probe: { probe: Mock<[string], Promise<ProbeResult>> };
  let orchestrator: IdentityOrchestrator;

  const file = (name: string) => path.join(dir, name);
  const readConfig = () => fs.readFile(config.configFile, 'utf-8');

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sshm-orchestrator-'));
    config = resolveConfig({ sshDir: dir });
    logger.setLevel('silent');

    vault = new BackupVault({
      sshDir: config.sshDir,
      backupDir: config.backupDir,
      extraFiles: [config.configFile, config.stateFile],
    });
    keygen = new FakeKeygen();
    git = new FakeGit();
    probe = { probe: vi.fn<[string], Promise<ProbeResult>>(async () => GREETING) };
    orchestrator = createOrchestrator(config, { vault, keygen, git, probe });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  async function writeDefaultKey(keyType: string, comment = 'me@laptop'): Promise<void> {
    await fs.writeFile(file(`id_${keyType}`), 'test-default-key');
    await fs.writeFile(file(`id_${keyType}.pub`), `ssh-${keyType} AAAAtest ${comment}\n`);
  }

  describe('add', () => {
    it('should create the identity and its alias', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com', keyType: 'ed25519' });

      const { identities } = await orchestrator.list();
      expect(identities).toHaveLength(1);
      expect(identities[0]).toMatchObject({ tag: 'work', keyType: 'ed25519', isActive: false, alias: 'github-work' });
      expect(await readConfig()).toBe(
        `Host github-work\n  HostName github.com\n  User git\n  IdentityFile ${file('id_ed25519.work')}\n  IdentitiesOnly yes\n\n`
      );
    });

    it('should infer the host and default the comment to the tag', async () => {
      const result = await orchestrator.add({ tag: 'gitlab-acme' });

      expect(result.identity.hostAlias).toBe('gitlab-gitlab-acme');
      expect(keygen.requests).toEqual([
        { keyType: 'ed25519', outputPath: file('id_ed25519.gitlab-acme'), comment: 'gitlab-acme' },
      ]);
    });

    it('should snapshot before generating keys', async () => {
      const { snapshotId } = await orchestrator.add({ tag: 'work' });

      expect((await orchestrator.listBackups()).map(b => b.id)).toEqual([snapshotId]);
    });

    it('should reject reserved and malformed tags', async () => {
      await expect(orchestrator.add({ tag: 'default' })).rejects.toThrow(ConflictError);
      await expect(orchestrator.add({ tag: 'work laptop' })).rejects.toThrow(ParseError);
      expect(keygen.requests).toEqual([]);
    });

    it('should keep metadata for tags named like object members', async () => {
      await orchestrator.add({ tag: '__proto__', host: 'gitlab.com' });
      await orchestrator.add({ tag: 'constructor', host: 'gitee.com' });

      const { identities } = await orchestrator.list();

      expect(identities.map(i => [i.tag, i.hostname, i.alias])).toEqual([
        ['__proto__', 'gitlab.com', 'gitlab-__proto__'],
        ['constructor', 'gitee.com', 'gitee-constructor'],
      ]);
    });

    it('should refuse an existing tag unless forced', async () => {
      await orchestrator.add({ tag: 'work' });

      await expect(orchestrator.add({ tag: 'work' })).rejects.toMatchObject({ kind: 'conflict', step: 'validate' });
      await expect(orchestrator.add({ tag: 'work', keyType: 'rsa' })).rejects.toThrow(/already used by a ed25519 key/);

      await orchestrator.add({ tag: 'work', force: true });
      expect(keygen.requests).toHaveLength(2);
    });
  });

  describe('use', () => {
    beforeEach(async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com', keyType: 'ed25519' });
      git.remotes.set('/repo#origin', 'git@github.com:acme/app.git');
    });

    it('should rewrite the remote to the alias and verify it', async () => {
      const result = await orchestrator.use({ tag: 'work', repoPath: '/repo' });

      expect(git.remotes.get('/repo#origin')).toBe('git@github-work:acme/app.git');
      expect(result.binding).toEqual({
        status: 'verified',
        alias: 'github-work',
        tag: 'work',
        remoteUrl: 'git@github-work:acme/app.git',
        username: 'octo-dev',
      });
      expect(probe.probe).toHaveBeenCalledWith('github-work');
    });

    it('should be a no-op the second time', async () => {
      await orchestrator.use({ tag: 'work', repoPath: '/repo' });
      const configBefore = await readConfig();
      const setRemoteUrl = vi.spyOn(git, 'setRemoteUrl');

      const second = await orchestrator.use({ tag: 'work', repoPath: '/repo' });

      expect(second.changed).toBe(false);
      expect(second.configOutcome).toBe('unchanged');
      expect(second.snapshotId).toBeUndefined();
      expect(setRemoteUrl).not.toHaveBeenCalled();
      expect(git.remotes.get('/repo#origin')).toBe('git@github-work:acme/app.git');
      expect(await readConfig()).toBe(configBefore);
    });

    it('should convert https remotes to the ssh form', async () => {
      git.remotes.set('/repo#origin', 'https://github.com/acme/app');

      const result = await orchestrator.use({ tag: 'work', repoPath: '/repo', verify: false });

      expect(result.remoteUrl).toBe('git@github-work:acme/app.git');
      expect(result.binding.status).toBe('bound');
      expect(probe.probe).not.toHaveBeenCalled();
    });

    it('should stay bound when the probe fails', async () => {
      probe.probe.mockResolvedValueOnce({ outcome: 'authentication-rejected', diagnostic: 'Permission denied (publickey).' });

      const result = await orchestrator.use({ tag: 'work', repoPath: '/repo' });

      expect(result.binding.status).toBe('bound');
      expect(result.probe?.diagnostic).toBe('Permission denied (publickey).');
    });

    it('should not take over an alias routed to another key without force', async () => {
      await fs.writeFile(config.configFile, 'Host github-work\n  HostName github.com\n  IdentityFile /elsewhere/id_rsa\n\n');

      await expect(orchestrator.use({ tag: 'work', repoPath: '/repo' })).rejects.toThrow(ConflictError);
      expect(git.remotes.get('/repo#origin')).toBe('git@github.com:acme/app.git');

      const forced = await orchestrator.use({ tag: 'work', repoPath: '/repo', force: true });
      expect(forced.snapshotId).toBeDefined();
      expect(forced.configOutcome).toBe('updated');
    });

    it('should keep the user\'s own directives when rewriting the alias', async () => {
      await fs.writeFile(
        config.configFile,
        `Host github-work\n  HostName ssh.github.com\n  User git\n  IdentityFile ${file('id_ed25519.work')}\n  Port 443\n  AddKeysToAgent yes\n\n`
      );

      const result = await orchestrator.use({ tag: 'work', repoPath: '/repo' });

      expect(result.configOutcome).toBe('updated');
      expect(result.snapshotId).toBeDefined();
      expect(await readConfig()).toBe(
        `Host github-work\n  HostName github.com\n  User git\n  IdentityFile ${file('id_ed25519.work')}\n`
        + '  Port 443\n  AddKeysToAgent yes\n  IdentitiesOnly yes\n\n'
      );
    });

    it('should report a missing remote with the remote step', async () => {
      await expect(orchestrator.use({ tag: 'work', repoPath: '/repo', remote: 'upstream' }))
        .rejects.toMatchObject({ kind: 'not-found', step: 'remote', subject: 'upstream' });
    });

    it('should describe the binding afterwards', async () => {
      await orchestrator.use({ tag: 'work', repoPath: '/repo' });

      const info = await orchestrator.info('/repo');

      expect(info.binding).toEqual({ status: 'bound', alias: 'github-work', tag: 'work', remoteUrl: 'git@github-work:acme/app.git' });
      expect(info.identity?.tag).toBe('work');
    });
  });

  describe('rename', () => {
    it('should move files, alias and state under one snapshot', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com', keyType: 'ed25519' });
      const before = await orchestrator.listBackups();

      const result = await orchestrator.rename('work', 'work2');

      expect(result.oldAlias).toBe('github-work');
      expect(result.newAlias).toBe('github-work2');
      expect(await readConfig()).toBe(
        `Host github-work2\n  HostName github.com\n  User git\n  IdentityFile ${file('id_ed25519.work2')}\n  IdentitiesOnly yes\n\n`
      );
      expect(await fs.pathExists(file('id_ed25519.work2'))).toBe(true);
      expect(await fs.pathExists(file('id_ed25519.work2.pub'))).toBe(true);
      expect(await fs.pathExists(file('id_ed25519.work'))).toBe(false);

      const state = await fs.readJson(config.stateFile);
      expect(Object.keys(state.identities)).toEqual(['work2']);
      expect((await orchestrator.listBackups()).length).toBe(before.length + 1);
    });

    it('should refuse to rename onto an existing tag', async () => {
      await orchestrator.add({ tag: 'work' });
      await orchestrator.add({ tag: 'home' });

      await expect(orchestrator.rename('work', 'home')).rejects.toThrow(ConflictError);
      await expect(orchestrator.rename('nobody', 'other')).rejects.toThrow(NotFoundError);
    });
  });

  describe('remove', () => {
    it('should delete the key pair, its alias and its state', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com' });

      const result = await orchestrator.remove({ tag: 'work' });

      expect(result.removedFiles).toEqual(['id_ed25519.work', 'id_ed25519.work.pub']);
      expect(result.removedAliases).toEqual(['github-work']);
      expect(await readConfig()).toBe('');
      expect((await fs.readJson(config.stateFile)).identities).toEqual({});
      expect((await orchestrator.list()).identities).toEqual([]);
    });

    it('should abort before any mutation when the snapshot fails', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com' });
      const configBefore = await readConfig();
      const stateBefore = await fs.readFile(config.stateFile, 'utf-8');
      vi.spyOn(vault, 'snapshot').mockRejectedValue(new Error('ENOSPC: no space left on device'));

      const error = await orchestrator.remove({ tag: 'work' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SshmError);
      expect(error).toMatchObject({ kind: 'io', step: 'snapshot' });
      expect(await fs.pathExists(file('id_ed25519.work'))).toBe(true);
      expect(await fs.pathExists(file('id_ed25519.work.pub'))).toBe(true);
      expect(await readConfig()).toBe(configBefore);
      expect(await fs.readFile(config.stateFile, 'utf-8')).toBe(stateBefore);
      expect((await orchestrator.list()).identities.map(i => i.tag)).toEqual(['work']);
    });

    it('should require a key type and confirmation for the default identity', async () => {
      await writeDefaultKey('ed25519');
      await writeDefaultKey('rsa');

      await expect(orchestrator.remove({ tag: 'default', confirmed: true })).rejects.toThrow(/several key types/);
      await expect(orchestrator.remove({ tag: 'default', keyType: 'rsa' })).rejects.toThrow(/explicit confirmation/);

      const result = await orchestrator.remove({ tag: 'default', keyType: 'rsa', confirmed: true });

      expect(result.removedFiles).toEqual(['id_rsa', 'id_rsa.pub']);
      expect(await fs.pathExists(file('id_ed25519'))).toBe(true);
    });
  });

  describe('switch', () => {
    it('should route the host to the tagged key and back', async () => {
      await writeDefaultKey('ed25519');
      await orchestrator.add({ tag: 'work', host: 'github.com', keyType: 'rsa' });

      const result = await orchestrator.switch({ tag: 'work' });

      expect(result.hostPattern).toBe('github.com');
      const work = (await orchestrator.list()).identities[0];
      expect(work).toMatchObject({ tag: 'work', isActive: true, activeFor: ['github.com'], alias: 'github-work' });
      expect(await readConfig()).toContain(`Host github.com\n  HostName github.com\n  User git\n  IdentityFile ${file('id_rsa.work')}\n`);

      await orchestrator.switch({ tag: 'default' });

      expect(await readConfig()).not.toContain('Host github.com\n');
      expect((await fs.readJson(config.stateFile)).active).toEqual({ 'github.com': 'default' });
    });

    it('should route to the requested key type', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com', keyType: 'rsa' });
      await fs.writeFile(file('id_ed25519.work'), 'test-second-key');
      await fs.writeFile(file('id_ed25519.work.pub'), 'ssh-ed25519 AAAAtest work\n');

      await orchestrator.switch({ tag: 'work', keyType: 'ed25519' });

      expect(await readConfig()).toContain(`Host github.com\n  HostName github.com\n  User git\n  IdentityFile ${file('id_ed25519.work')}\n`);
      await expect(orchestrator.switch({ tag: 'work', keyType: 'ecdsa' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('tag', () => {
    it('should copy the default key under a new tag', async () => {
      await writeDefaultKey('ed25519', 'me@laptop');

      const { identity } = await orchestrator.tag({ newTag: 'personal' });

      expect(identity.hostAlias).toBe('github-personal');
      expect(identity.comment).toBe('me@laptop');
      expect(await fs.readFile(file('id_ed25519.personal'), 'utf-8')).toBe('test-default-key');
      expect(await fs.pathExists(file('id_ed25519'))).toBe(true);
    });

    it('should fail without a default key', async () => {
      await expect(orchestrator.tag({ newTag: 'personal' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('test', () => {
    it('should probe every identity in order', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com' });
      await orchestrator.add({ tag: 'gitlab-ci' });
      probe.probe.mockImplementation(async (target: string) =>
        target === 'github-work' ? GREETING : { outcome: 'unreachable', diagnostic: 'Connection refused' }
      );

      const results = await orchestrator.testAll();

      expect(results.map(r => [r.tag, r.alias, r.result.outcome])).toEqual([
        ['gitlab-ci', 'gitlab-gitlab-ci', 'unreachable'],
        ['work', 'github-work', 'success'],
      ]);
    });

    it('should report an unknown tag', async () => {
      await expect(orchestrator.test('nobody')).rejects.toThrow(NotFoundError);
    });
  });

  describe('backup and restore', () => {
    it('should bring back removed identities', async () => {
      await orchestrator.add({ tag: 'work', host: 'github.com' });
      const id = await orchestrator.backup();
      await orchestrator.remove({ tag: 'work' });

      const result = await orchestrator.restore(id);

      expect(result.restored.map(f => f.name)).toEqual(['id_ed25519.work', 'id_ed25519.work.pub', 'config', '.sshm_state']);
      expect(result.snapshotId).not.toBe(id);
      expect((await orchestrator.list()).identities.map(i => i.alias)).toEqual(['github-work']);
    });

    it('should reject an unknown snapshot before taking one', async () => {
      await expect(orchestrator.restore('backup_missing')).rejects.toThrow(NotFoundError);
      expect(await orchestrator.listBackups()).toEqual([]);
    });
  });

  describe('normalizeTag', () => {
    it('should lower-case valid tags', () => {
      expect(normalizeTag(' Work ')).toBe('work');
      expect(() => normalizeTag('a/b')).toThrow(ParseError);
    });
  });
});
