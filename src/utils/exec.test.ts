import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExternalToolError } from '../errors.js';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { execFileMock } = vi.hoisted(() => ({
  execFileMock: vi.fn<[string, string[], unknown, ExecCallback], void>(),
}));

vi.mock('child_process', () => ({ execFile: execFileMock }));

import { runTool } from './exec.js';

describe('runTool', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('should resolve a clean exit', async () => {
    execFileMock.mockImplementation((_tool, _args, _options, callback) => callback(null, 'ok\n', ''));

    expect(await runTool('ssh', ['-V'])).toEqual({ exitCode: 0, stdout: 'ok\n', stderr: '', timedOut: false });
  });

  it('should resolve a nonzero status with its output', async () => {
    execFileMock.mockImplementation((_tool, _args, _options, callback) =>
      callback(Object.assign(new Error('Command failed'), { code: 1, killed: false }), '', 'Hi dev!\n')
    );

    expect(await runTool('ssh', ['-T', 'github-work'])).toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'Hi dev!\n',
      timedOut: false,
    });
  });

  it('should report a timeout when the killed child exits with its own status', async () => {
    execFileMock.mockImplementation((_tool, _args, _options, callback) =>
      callback(Object.assign(new Error('Command failed'), { code: 255, killed: true }), '', '')
    );

    const result = await runTool('ssh', ['-T', 'github-work'], { timeoutMs: 100 });

    expect(result.exitCode).toBe(255);
    expect(result.timedOut).toBe(true);
  });

  it('should reject when the binary is missing', async () => {
    execFileMock.mockImplementation((_tool, _args, _options, callback) =>
      callback(Object.assign(new Error('spawn ssh-keygen ENOENT'), { code: 'ENOENT' }), '', '')
    );

    await expect(runTool('ssh-keygen', [])).rejects.toBeInstanceOf(ExternalToolError);
  });
});
