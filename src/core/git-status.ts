import { execa } from 'execa';
import { execaEnv } from '../lib/env.js';
import { describeError } from '../lib/log.js';
import { err, ok, type Result } from '../types/common.js';

const STATUS_TIMEOUT_MS = 10_000;
const DEFAULT_CACHE_MS = 10_000;

export interface GitStatusSummary {
  branch: string;
  upstream?: string;
  ahead: number;
  behind: number;
  /** Tracked paths with staged or unstaged changes. */
  modified: string[];
  untracked: string[];
  lastCommit?: string;
  lastCommitAt?: string;
}

export type GitStatusResult = Result<GitStatusSummary, string>;

export interface GitStatusReaderOptions {
  /** How long a successful read is reused. */
  cacheMs?: number;
  now?: () => Date;
}

/**
 * Branch, divergence and dirty files of a worktree. Successful reads are
 * cached per path for `cacheMs`; failures are not, so a worktree that comes
 * back is picked up on the next read.
 */
export class GitStatusReader {
  private readonly cacheMs: number;
  private readonly now: () => Date;
  private readonly cache = new Map<string, { at: number; summary: GitStatusSummary }>();

  constructor(options: GitStatusReaderOptions = {}) {
    this.cacheMs = options.cacheMs ?? DEFAULT_CACHE_MS;
    this.now = options.now ?? (() => new Date());
  }

  async read(worktreePath: string, options: { refresh?: boolean } = {}): Promise<GitStatusResult> {
    const at = this.now().getTime();
    const cached = this.cache.get(worktreePath);
    if (!options.refresh && cached && at - cached.at < this.cacheMs) {
      return ok(cached.summary);
    }

    let status: string;
    try {
      const result = await execa('git', ['status', '--porcelain=v1', '--branch'], {
        ...execaEnv,
        cwd: worktreePath,
        timeout: STATUS_TIMEOUT_MS,
      });
      status = result.stdout;
    } catch (error) {
      this.cache.delete(worktreePath);
      return err(describeError(error));
    }

    const summary = { ...parsePorcelainStatus(status), ...(await lastCommit(worktreePath)) };
    this.cache.set(worktreePath, { at, summary });
    return ok(summary);
  }

  clear(worktreePath?: string): void {
    if (worktreePath === undefined) this.cache.clear();
    else this.cache.delete(worktreePath);
  }
}

const BRANCH_HEADER = /^## (?:No commits yet on |Initial commit on )?(.+?)(?:\.\.\.(\S+))?(?: \[(.+)\])?$/;

/** Parse `git status --porcelain=v1 --branch` output. */
export function parsePorcelainStatus(stdout: string): Omit<GitStatusSummary, 'lastCommit' | 'lastCommitAt'> {
  const summary: Omit<GitStatusSummary, 'lastCommit' | 'lastCommitAt'> = {
    branch: 'HEAD',
    ahead: 0,
    behind: 0,
    modified: [],
    untracked: [],
  };

  for (const line of stdout.split('\n')) {
    if (line.startsWith('## ')) {
      const m = BRANCH_HEADER.exec(line);
      if (!m) continue;
      summary.branch = m[1] ?? summary.branch;
      summary.upstream = m[2];
      summary.ahead = counter(m[3], 'ahead');
      summary.behind = counter(m[3], 'behind');
    } else if (line.startsWith('?? ')) {
      summary.untracked.push(line.slice(3));
    } else if (line.length > 3) {
      const file = line.slice(3);
      // Renames and copies read `old -> new`
      const arrow = file.indexOf(' -> ');
      summary.modified.push(arrow === -1 ? file : file.slice(arrow + 4));
    }
  }
  return summary;
}

function counter(tracking: string | undefined, name: 'ahead' | 'behind'): number {
  const m = tracking?.match(new RegExp(`${name} (\\d+)`));
  return m?.[1] ? parseInt(m[1], 10) : 0;
}

async function lastCommit(worktreePath: string): Promise<Pick<GitStatusSummary, 'lastCommit' | 'lastCommitAt'>> {
  // Fails on a branch without commits
  const result = await execa('git', ['log', '-1', '--format=%s%x1f%cI'], {
    ...execaEnv,
    cwd: worktreePath,
    timeout: STATUS_TIMEOUT_MS,
    reject: false,
  });
  if (result.exitCode !== 0) return {};
  const [subject, date] = result.stdout.trim().split('\x1f');
  if (!subject) return {};
  return { lastCommit: subject, lastCommitAt: date };
}
