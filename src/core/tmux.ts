import { execa, ExecaError } from 'execa';
import { SessionNotFoundError, TmuxNotFoundError, WindowNotFoundError } from '../lib/errors.js';
import { execaEnv } from '../lib/env.js';
import { sanitizeTmuxName } from '../lib/name.js';
import { err, ok } from '../types/common.js';
import type { WindowHandle } from '../types/ticket.js';
import {
  windowTarget,
  type Multiplexer,
  type PaneInfo,
  type SessionHandle,
  type WindowInfo,
  type WindowResult,
} from './multiplexer.js';

export interface TmuxAdapterOptions {
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

const PANE_FORMAT = '#{pane_id}|#{pane_pid}|#{pane_current_command}|#{pane_dead}|#{pane_dead_status}';

export class TmuxAdapter implements Multiplexer {
  // Sessions created by this adapter whose bootstrap window has not been claimed yet
  private readonly fresh = new Set<string>();

  private constructor(private readonly options: TmuxAdapterOptions) {}

  /** Fails with `TmuxNotFoundError` when the tmux binary cannot be run. */
  static async create(options: TmuxAdapterOptions): Promise<TmuxAdapter> {
    const adapter = new TmuxAdapter(options);
    try {
      await adapter.tmux(['-V']);
    } catch {
      throw new TmuxNotFoundError();
    }
    return adapter;
  }

  async createSession(name: string, workingDir: string): Promise<SessionHandle> {
    const sessionName = sanitizeTmuxName(name);
    if (!(await this.sessionExists(sessionName))) {
      await this.tmux(['new-session', '-d', '-s', sessionName, '-c', workingDir, '-x', '220', '-y', '50']);
      await this.tmux(['set-option', '-t', `=${sessionName}`, 'history-limit', '50000']);
      this.fresh.add(sessionName);
    }
    return { name: sessionName, workingDir };
  }

  async sessionExists(name: string): Promise<boolean> {
    try {
      await this.tmux(['has-session', '-t', `=${name}`]);
      return true;
    } catch (e) {
      if (e instanceof ExecaError && !e.timedOut && e.exitCode === 1) return false;
      throw e;
    }
  }

  async ensureWindows(session: SessionHandle, names: readonly string[]): Promise<Map<string, WindowHandle>> {
    if (!(await this.sessionExists(session.name))) {
      throw new SessionNotFoundError(session.name, 'tmux session');
    }

    const existing = await this.listWindows(session.name);
    const byName = new Map(existing.map((w) => [w.name, w]));
    const bootstrap = this.fresh.delete(session.name) ? existing[0] : undefined;
    let bootstrapClaimed = false;
    const handles = new Map<string, WindowHandle>();

    for (const name of names) {
      let info = byName.get(name);
      if (!info) {
        if (bootstrap && !bootstrapClaimed) {
          await this.tmux(['rename-window', '-t', windowTarget(session.name, bootstrap.index), name]);
          info = { index: bootstrap.index, name };
          bootstrapClaimed = true;
        } else {
          const result = await this.tmux([
            'new-window',
            '-d',
            '-t', `=${session.name}`,
            '-n', name,
            '-c', session.workingDir,
            '-P', '-F', '#{window_index}',
          ]);
          info = { index: parseInt(result.trim(), 10), name };
        }
        byName.set(name, info);
      }
      handles.set(name, toHandle(session.name, info));
    }
    return handles;
  }

  async listWindows(session: string): Promise<WindowInfo[]> {
    try {
      const stdout = await this.tmux(['list-windows', '-t', `=${session}`, '-F', '#{window_index} #{window_name}']);
      return stdout.split('\n').filter(Boolean).map((line) => {
        const spaceIdx = line.indexOf(' ');
        return {
          index: parseInt(line.slice(0, spaceIdx), 10),
          name: line.slice(spaceIdx + 1),
        };
      });
    } catch (e) {
      if (isTmuxNotFoundError(e)) return [];
      throw e;
    }
  }

  async findWindow(session: string, name: string): Promise<WindowResult<WindowHandle>> {
    const windows = await this.listWindows(session);
    const info = windows.find((w) => w.name === name);
    return info ? ok(toHandle(session, info)) : err(new WindowNotFoundError(session, name));
  }

  async sendKeys(window: WindowHandle, text: string): Promise<WindowResult<void>> {
    return this.onWindow(window, async (target) => {
      // Literal text first, then Enter as a named key: with -l a newline is sent as
      // LF, which full-screen CLIs treat as text rather than submit
      await this.tmux(['send-keys', '-t', target, '-l', text]);
      await this.tmux(['send-keys', '-t', target, 'Enter']);
    });
  }

  async interrupt(window: WindowHandle): Promise<WindowResult<void>> {
    return this.onWindow(window, async (target) => {
      await this.tmux(['send-keys', '-t', target, 'C-c']);
    });
  }

  async capture(window: WindowHandle, lines: number): Promise<WindowResult<string>> {
    return this.onWindow(window, (target) =>
      this.tmux(['capture-pane', '-t', target, '-p', '-J', '-S', `-${lines}`]),
    );
  }

  async paneInfo(window: WindowHandle): Promise<WindowResult<PaneInfo>> {
    return this.onWindow(window, async (target) => {
      const stdout = await this.tmux(['display-message', '-t', target, '-p', PANE_FORMAT]);
      return parsePaneInfo(stdout);
    });
  }

  async focus(window: WindowHandle): Promise<WindowResult<void>> {
    return this.onWindow(window, async (target) => {
      await this.tmux(['select-window', '-t', target]);
      if (this.isInsideSession()) {
        await this.tmux(['switch-client', '-t', target]);
      }
    });
  }

  async killWindow(window: WindowHandle): Promise<void> {
    const located = await this.findWindow(window.session, window.name);
    if (!located.ok) return;
    try {
      await this.tmux(['kill-window', '-t', located.value.target]);
    } catch (e) {
      if (isTmuxNotFoundError(e)) return;
      throw e;
    }
  }

  async destroySession(name: string): Promise<void> {
    this.fresh.delete(name);
    try {
      await this.tmux(['kill-session', '-t', `=${name}`]);
    } catch (e) {
      if (isTmuxNotFoundError(e)) return;
      throw e;
    }
  }

  isInsideSession(): boolean {
    return !!(this.options.env ?? process.env).TMUX;
  }

  /** Resolve the window by name at call time, so an index reused by another window is never hit. */
  private async onWindow<T>(
    window: WindowHandle,
    op: (target: string) => Promise<T>,
  ): Promise<WindowResult<T>> {
    const located = await this.findWindow(window.session, window.name);
    if (!located.ok) return err(located.error);
    try {
      return ok(await op(located.value.target));
    } catch (e) {
      if (isTmuxNotFoundError(e)) return err(new WindowNotFoundError(window.session, window.name));
      throw e;
    }
  }

  private async tmux(args: string[]): Promise<string> {
    const result = await execa('tmux', args, { ...execaEnv, timeout: this.options.timeoutMs });
    return result.stdout.trim();
  }
}

function toHandle(session: string, info: WindowInfo): WindowHandle {
  return { session, name: info.name, index: info.index, target: windowTarget(session, info.index) };
}

export function parsePaneInfo(line: string): PaneInfo {
  const [paneId = '', panePid = '', currentCommand = '', dead = '', deadStatus = ''] = line.split('|');
  return {
    paneId,
    panePid,
    currentCommand,
    isDead: dead === '1',
    deadStatus: deadStatus ? parseInt(deadStatus, 10) : undefined,
  };
}

/**
 * Benign "target is gone" failures, which callers treat as absence rather
 * than an error.
 */
export function isTmuxNotFoundError(e: unknown): boolean {
  if (!(e instanceof ExecaError)) return false;
  const msg = String(e.stderr ?? '').toLowerCase();
  return msg.includes("can't find") ||
    msg.includes('not found') ||
    msg.includes('no such') ||
    msg.includes('no server running') ||
    msg.includes('error connecting to');
}
