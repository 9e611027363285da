import { describe, test, expect, vi, beforeEach } from 'vitest';

const { execaMock } = vi.hoisted(() => ({
  execaMock: vi.fn<(file: string, args: string[], options?: object) => Promise<{ stdout: string }>>(),
}));

vi.mock('execa', () => ({
  execa: execaMock,
}));

import { GitWorktrees } from './worktree.js';
import { GitNotFoundError, NotGitRepoError } from '../lib/errors.js';

const REPO = '/tmp/repo';

function gitCalls(): string[][] {
  return execaMock.mock.calls.map(([, args]) => args);
}

function fakeGit(options: { branches?: string[]; worktrees?: string[] } = {}): void {
  execaMock.mockImplementation(async (_file, args) => {
    const [cmd, sub] = args;
    if (cmd === '--version') return { stdout: 'git version 2.44.0' };
    if (cmd === 'rev-parse' && sub === '--show-toplevel') return { stdout: `${REPO}\n` };
    if (cmd === 'rev-parse' && sub === '--verify') {
      const ref = args[3] ?? '';
      if ((options.branches ?? []).some((b) => ref === `refs/heads/${b}`)) return { stdout: '' };
      throw new Error('exit code 1');
    }
    if (cmd === 'worktree' && sub === 'list') {
      const lines = [REPO, ...(options.worktrees ?? [])].flatMap((p) => [`worktree ${p}`, 'HEAD abc123', '']);
      return { stdout: lines.join('\n') };
    }
    return { stdout: '' };
  });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('GitWorktrees.create', () => {
  test('given git is missing, should throw GitNotFoundError', async () => {
    execaMock.mockRejectedValue(new Error('spawn git ENOENT'));

    await expect(GitWorktrees.create({ worktreeBase: '/tmp/wt' })).rejects.toBeInstanceOf(GitNotFoundError);
  });

  test('given a directory outside a repository, should throw NotGitRepoError', async () => {
    execaMock
      .mockResolvedValueOnce({ stdout: 'git version 2.44.0' })
      .mockRejectedValueOnce(new Error('fatal: not a git repository'));

    await expect(GitWorktrees.create({ worktreeBase: '/tmp/wt', cwd: '/tmp/nowhere' }))
      .rejects.toBeInstanceOf(NotGitRepoError);
  });

  test('given a repo path, should resolve the root from it', async () => {
    fakeGit();

    const vcs = await GitWorktrees.create({ worktreeBase: '/tmp/wt', repoPath: '/tmp/repo/sub' });

    expect(vcs.repoRoot).toBe(REPO);
    expect(execaMock.mock.calls[1]?.[2]).toMatchObject({ cwd: '/tmp/repo/sub' });
  });
});

describe('createWorktree', () => {
  test('given a new branch, should create it from the base', async () => {
    fakeGit();
    const vcs = await GitWorktrees.create({ worktreeBase: '/tmp/wt' });

    const actual = await vcs.createWorktree('feature/IN-413-bulk', { base: 'main' });

    expect(actual).toBe('/tmp/wt/feature_IN-413-bulk');
    expect(gitCalls()).toContainEqual(['worktree', 'add', '/tmp/wt/feature_IN-413-bulk', '-b', 'feature/IN-413-bulk', 'main']);
  });

  test('given an existing branch, should check it out without -b', async () => {
    fakeGit({ branches: ['feature/IN-413-bulk'] });
    const vcs = await GitWorktrees.create({ worktreeBase: '/tmp/wt' });

    await vcs.createWorktree('feature/IN-413-bulk', { path: '/tmp/elsewhere' });

    expect(gitCalls()).toContainEqual(['worktree', 'add', '/tmp/elsewhere', 'feature/IN-413-bulk']);
  });

  test('given the worktree already exists, should reuse it', async () => {
    fakeGit({ worktrees: ['/tmp/wt/feature_IN-413'] });
    const vcs = await GitWorktrees.create({ worktreeBase: '/tmp/wt' });

    const actual = await vcs.createWorktree('feature/IN-413');

    expect(actual).toBe('/tmp/wt/feature_IN-413');
    expect(gitCalls().some((args) => args[0] === 'worktree' && args[1] === 'add')).toBe(false);
  });
});
