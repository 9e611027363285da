import { createFileLogger, type Logger } from '../lib/log.js';
import { controlDir, logPath } from '../lib/paths.js';
import type { Config } from '../types/config.js';
import { loadConfig } from './config.js';
import { GitStatusReader } from './git-status.js';
import type { Multiplexer } from './multiplexer.js';
import { SessionOrchestrator } from './orchestrator.js';
import { Scheduler, type SchedulerEvent, type TickReport } from './scheduler.js';
import { StatusMonitor } from './status-monitor.js';
import { StateStore } from './store.js';
import { TaskBoard } from './tasks.js';
import { TmuxAdapter } from './tmux.js';
import { GitWorktrees, type GitWorktreesOptions, type Vcs, type WorktreeOptions } from './worktree.js';

export interface RuntimeOptions {
  /** Control directory; defaults to `$TIXMUX_HOME` or `~/.tixmux`. */
  root?: string;
  cwd?: string;
  /** Echo log lines to stdout. */
  verbose?: boolean;
}

export interface SchedulerHooks {
  onEvent?: (event: SchedulerEvent) => void;
  onTick?: (report: TickReport) => void;
}

export interface Runtime {
  root: string;
  config: Config;
  logger: Logger;
  store: StateStore;
  mux: Multiplexer;
  orchestrator: SessionOrchestrator;
  monitor: StatusMonitor;
  tasks: TaskBoard;
  git: GitStatusReader;
  createScheduler(hooks?: SchedulerHooks): Scheduler;
}

/**
 * Wire one set of explicit instances for this process. Fails fast on an
 * invalid config or a missing tmux binary; git is only required once a
 * worktree is actually created.
 */
export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const root = options.root ?? controlDir();
  const config = await loadConfig(root);
  const logger = createFileLogger(logPath(root), { echo: options.verbose });
  const store = new StateStore({ logger, stalenessMs: config.stalenessMs, lock: config.lock });
  const mux = await TmuxAdapter.create({ timeoutMs: config.tmuxTimeoutMs });
  const vcs = new LazyGitWorktrees({ worktreeBase: config.worktreeBase, repoPath: config.repoPath, cwd: options.cwd });

  const tasks = new TaskBoard({ store, logger, root });
  const orchestrator = new SessionOrchestrator({ store, mux, vcs, config, logger, root, tasks });
  const monitor = new StatusMonitor({ store, mux, config, logger, root });

  return {
    root,
    config,
    logger,
    store,
    mux,
    orchestrator,
    monitor,
    tasks,
    git: new GitStatusReader({ cacheMs: config.stalenessMs }),
    createScheduler: (hooks = {}) =>
      new Scheduler({ orchestrator, monitor, logger, intervalMs: config.pollIntervalMs, ...hooks }),
  };
}

class LazyGitWorktrees implements Vcs {
  private git: Promise<GitWorktrees> | null = null;

  constructor(private readonly options: GitWorktreesOptions) {}

  async createWorktree(branch: string, options?: WorktreeOptions): Promise<string> {
    if (!this.git) {
      this.git = GitWorktrees.create(this.options);
      // Retry the git checks on the next call instead of caching the failure
      this.git.catch(() => {
        this.git = null;
      });
    }
    return (await this.git).createWorktree(branch, options);
  }
}
