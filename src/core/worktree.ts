import { execa } from 'execa';
import { GitNotFoundError, NotGitRepoError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';
import { defaultWorktreePath, expandHome } from '../lib/paths.js';

// `worktree add` checks out a full tree
const GIT_TIMEOUT_MS = 60_000;

export interface WorktreeOptions {
  /** Start point for a new branch. Ignored when the branch already exists. */
  base?: string;
  path?: string;
}

/** Version-control collaborator of the orchestrator. */
export interface Vcs {
  createWorktree(branch: string, options?: WorktreeOptions): Promise<string>;
}

export interface GitWorktreesOptions {
  worktreeBase: string;
  repoPath?: string;
  cwd?: string;
}

export async function getRepoRoot(cwd?: string): Promise<string> {
  try {
    const result = await execa('git', ['rev-parse', '--show-toplevel'], {
      ...execaEnv,
      cwd: cwd ?? process.cwd(),
      timeout: GIT_TIMEOUT_MS,
    });
    return result.stdout.trim();
  } catch {
    throw new NotGitRepoError(cwd ?? process.cwd());
  }
}

export class GitWorktrees implements Vcs {
  private constructor(
    readonly repoRoot: string,
    private readonly worktreeBase: string,
  ) {}

  static async create(options: GitWorktreesOptions): Promise<GitWorktrees> {
    try {
      await execa('git', ['--version'], { ...execaEnv, timeout: GIT_TIMEOUT_MS });
    } catch {
      throw new GitNotFoundError();
    }
    const repoRoot = await getRepoRoot(options.repoPath ? expandHome(options.repoPath) : options.cwd);
    return new GitWorktrees(repoRoot, options.worktreeBase);
  }

  async createWorktree(branch: string, options: WorktreeOptions = {}): Promise<string> {
    const wtPath = options.path ?? defaultWorktreePath(this.worktreeBase, branch);
    if ((await this.listWorktrees()).includes(wtPath)) {
      return wtPath;
    }

    const args = (await this.branchExists(branch))
      ? ['worktree', 'add', wtPath, branch]
      : ['worktree', 'add', wtPath, '-b', branch, ...(options.base ? [options.base] : [])];
    await execa('git', args, { ...execaEnv, cwd: this.repoRoot, timeout: GIT_TIMEOUT_MS });
    return wtPath;
  }

  private async branchExists(branch: string): Promise<boolean> {
    try {
      await execa('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`], {
        ...execaEnv,
        cwd: this.repoRoot,
        timeout: GIT_TIMEOUT_MS,
      });
      return true;
    } catch {
      return false;
    }
  }

  private async listWorktrees(): Promise<string[]> {
    const result = await execa('git', ['worktree', 'list', '--porcelain'], { ...execaEnv, cwd: this.repoRoot, timeout: GIT_TIMEOUT_MS });
    return result.stdout
      .split('\n')
      .filter((line) => line.startsWith('worktree '))
      .map((line) => line.slice('worktree '.length));
  }
}
