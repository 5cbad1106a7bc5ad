import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { IdentityState, emptyState, normalizeState } from './state.js';
import { logger } from '../utils/logger.js';

describe('IdentityState', () => {
  let dir: string;
  let state: IdentityState;
  let logged: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sshm-state-'));
    state = new IdentityState(path.join(dir, '.sshm_state'));
    logged = [];
    logger.setSink(line => logged.push(line));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe('read', () => {
    it('should read a missing file as empty', async () => {
      expect(await state.read()).toEqual(emptyState());
    });

    it('should treat a corrupt file as empty and warn', async () => {
      await fs.writeFile(state.path, '{not json');

      expect(await state.read()).toEqual(emptyState());
      expect(logged).toHaveLength(1);
      expect(logged[0]).toContain('is corrupt');
    });

    it('should accept the flat legacy layout', async () => {
      await fs.writeJson(state.path, { ed25519: 'Work' });

      const record = await state.read();

      expect(record.active).toEqual({ ed25519: 'work' });
      expect(record.identities).toEqual({});
    });
  });

  describe('normalizeState', () => {
    it('should drop malformed identity entries', () => {
      const record = normalizeState({
        version: 1,
        active: { 'github.com': 'work' },
        defaultTag: 'default',
        identities: {
          work: { keyType: 'ed25519', hostname: 'github.com', comment: 'w', createdAt: '2024-01-01T00:00:00.000Z' },
          broken: { keyType: 'md5', hostname: 'github.com' },
        },
      });

      expect(record?.identities).toEqual({
        work: { keyType: 'ed25519', hostname: 'github.com', comment: 'w', createdAt: '2024-01-01T00:00:00.000Z' },
      });
    });

    it('should reject an unknown version', () => {
      expect(normalizeState({ version: 2, active: {} })).toBeNull();
    });
  });

  describe('updates', () => {
    it('should persist an active tag', async () => {
      await state.updateActive('github.com', 'work');

      expect((await state.read()).active).toEqual({ 'github.com': 'work' });
    });

    it('should move metadata and active bindings on rename', async () => {
      await state.setIdentity('work', { keyType: 'rsa', hostname: 'gitlab.com', comment: 'c', createdAt: 't' });
      await state.updateActive('gitlab.com', 'work');

      const record = await state.updateLabel('work', 'work2');

      expect(record.identities).toEqual({
        work2: { keyType: 'rsa', hostname: 'gitlab.com', comment: 'c', createdAt: 't' },
      });
      expect(record.active).toEqual({ 'gitlab.com': 'work2' });
    });

    it('should forget a tag everywhere', async () => {
      await state.setIdentity('work', { keyType: 'rsa', hostname: 'gitlab.com', comment: '', createdAt: '' });
      await state.updateActive('gitlab.com', 'work');
      await state.updateActive('github.com', 'personal');

      const record = await state.forget('work');

      expect(record.identities).toEqual({});
      expect(record.active).toEqual({ 'github.com': 'personal' });
    });

    it('should write valid JSON without leaving temp files', async () => {
      await state.updateActive('github.com', 'work');

      expect(await fs.readdir(dir)).toEqual(['.sshm_state']);
      expect(await fs.readJson(state.path)).toEqual({
        version: 1,
        active: { 'github.com': 'work' },
        defaultTag: 'default',
        identities: {},
      });
    });
  });
});
