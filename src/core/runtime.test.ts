import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

const { execaMock } = vi.hoisted(() => ({
  execaMock: vi.fn<(file: string, args: string[], options?: object) => Promise<{ stdout: string }>>(),
}));

vi.mock('execa', () => ({
  execa: execaMock,
  ExecaError: class extends Error {},
}));

import { createRuntime } from './runtime.js';
import { ConfigurationError, NotGitRepoError, TmuxNotFoundError } from '../lib/errors.js';

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'tixmux-runtime-'));
  execaMock.mockReset();
  execaMock.mockResolvedValue({ stdout: 'tmux 3.4' });
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('createRuntime', () => {
  test('given a config file, should wire every component with its settings', async () => {
    await fs.writeFile(path.join(root, 'config.yaml'), 'pollIntervalMs: 500\nsessionPrefix: t-\n');

    const runtime = await createRuntime({ root });

    expect(runtime.root).toBe(root);
    expect(runtime.config.pollIntervalMs).toBe(500);
    expect(runtime.config.sessionPrefix).toBe('t-');
    expect(runtime.createScheduler().running).toBe(false);
    expect(execaMock).toHaveBeenCalledWith('tmux', ['-V'], expect.objectContaining({ timeout: 5000 }));
  });

  test('given no tmux binary, should fail with TmuxNotFoundError', async () => {
    execaMock.mockRejectedValue(new Error('spawn tmux ENOENT'));

    await expect(createRuntime({ root })).rejects.toBeInstanceOf(TmuxNotFoundError);
  });

  test('given an invalid config, should fail before touching tmux', async () => {
    await fs.writeFile(path.join(root, 'config.yaml'), 'pollIntervalMs: -1\n');

    await expect(createRuntime({ root })).rejects.toBeInstanceOf(ConfigurationError);
    expect(execaMock).not.toHaveBeenCalled();
  });

  test('given a directory outside git, should only fail once a ticket needs a worktree', async () => {
    const runtime = await createRuntime({ root, cwd: root });
    execaMock.mockImplementation(async (file, args) => {
      if (file === 'git' && args[0] === 'rev-parse') throw new Error('fatal: not a git repository');
      return { stdout: '' };
    });

    expect(await runtime.orchestrator.listTickets()).toEqual([]);
    await expect(runtime.orchestrator.createTicket({ id: 'IN-1' })).rejects.toBeInstanceOf(NotGitRepoError);
  });
});
