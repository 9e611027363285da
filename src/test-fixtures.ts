import { SessionNotFoundError, WindowNotFoundError } from './lib/errors.js';
import { sanitizeTmuxName } from './lib/name.js';
import type { Logger, LogLevel } from './lib/log.js';
import { err, ok } from './types/common.js';
import type { AgentSession, TodoEntry } from './types/agent.js';
import type { ServiceStatus, StatusBar } from './types/status.js';
import type { Task } from './types/task.js';
import type { Ticket, WindowHandle } from './types/ticket.js';
import type { Vcs, WorktreeOptions } from './core/worktree.js';
import {
  windowTarget,
  type Multiplexer,
  type PaneInfo,
  type SessionHandle,
  type WindowInfo,
  type WindowResult,
} from './core/multiplexer.js';

export function makeWindow(overrides?: Partial<WindowHandle>): WindowHandle {
  const session = overrides?.session ?? 'tix-IN-413';
  const index = overrides?.index ?? 0;
  return {
    session,
    name: 'agent',
    index,
    target: windowTarget(session, index),
    ...overrides,
  };
}

export function makeTicket(overrides?: Partial<Ticket>): Ticket {
  const session = 'tix-IN-413';
  return {
    id: 'IN-413',
    title: 'Public API bulk uploads',
    branch: 'feature/IN-413-public-api-bulk-uploads',
    worktreePath: '/tmp/worktrees/feature_IN-413-public-api-bulk-uploads',
    status: 'active',
    session: {
      name: session,
      windows: {
        agent: makeWindow({ session, name: 'agent', index: 0 }),
        server: makeWindow({ session, name: 'server', index: 1 }),
        tests: makeWindow({ session, name: 'tests', index: 2 }),
      },
    },
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeTodo(overrides?: Partial<TodoEntry>): TodoEntry {
  return {
    text: 'Write the handler',
    completed: false,
    blocked: false,
    ...overrides,
  };
}

export function makeTask(overrides?: Partial<Task>): Task {
  return {
    id: 1,
    description: 'Write handler',
    status: 'not_started',
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeAgentSession(overrides?: Partial<AgentSession>): AgentSession {
  return {
    id: 'ag-test1234',
    ticketId: 'IN-413',
    title: 'Bulk upload endpoint',
    status: 'working',
    todos: [],
    progressPercent: 'unknown',
    window: makeWindow({ name: 'ag-test1234', index: 3 }),
    startedAt: '2026-01-01T00:00:00.000Z',
    lastActive: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeServiceStatus(overrides?: Partial<ServiceStatus>): ServiceStatus {
  return {
    state: 'stopped',
    lastCheck: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeStatusBar(overrides?: Partial<StatusBar>): StatusBar {
  return {
    server: makeServiceStatus(),
    database: makeServiceStatus(),
    build: null,
    tests: null,
    ...overrides,
  };
}

export function makePaneInfo(overrides?: Partial<PaneInfo>): PaneInfo {
  return {
    paneId: '%42',
    panePid: '12345',
    currentCommand: 'node',
    isDead: false,
    ...overrides,
  };
}

export interface MemoryLogger extends Logger {
  entries: Array<{ level: LogLevel; message: string }>;
}

export function createMemoryLogger(): MemoryLogger {
  const entries: MemoryLogger['entries'] = [];
  const push = async (level: LogLevel, message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    info: (message) => push('info', message),
    warn: (message) => push('warn', message),
    error: (message, cause) => push('error', cause instanceof Error ? `${message}: ${cause.message}` : message),
  };
}

export interface FakeWindow extends WindowInfo {
  output: string;
  pane: PaneInfo;
  sent: string[];
}

interface FakeSession {
  workingDir: string;
  windows: FakeWindow[];
  nextIndex: number;
}

/**
 * In-process stand-in for tmux. Tests drive pane state and captured output
 * through {@link FakeMultiplexer.window}; closing a window from the "outside"
 * is {@link FakeMultiplexer.closeExternally}.
 */
export class FakeMultiplexer implements Multiplexer {
  readonly sessions = new Map<string, FakeSession>();
  readonly focused: WindowHandle[] = [];

  async createSession(name: string, workingDir: string): Promise<SessionHandle> {
    const sessionName = sanitizeTmuxName(name);
    if (!this.sessions.has(sessionName)) {
      this.sessions.set(sessionName, { workingDir, windows: [], nextIndex: 0 });
    }
    return { name: sessionName, workingDir };
  }

  async sessionExists(name: string): Promise<boolean> {
    return this.sessions.has(name);
  }

  async ensureWindows(session: SessionHandle, names: readonly string[]): Promise<Map<string, WindowHandle>> {
    const state = this.sessions.get(session.name);
    if (!state) throw new SessionNotFoundError(session.name, 'tmux session');

    const handles = new Map<string, WindowHandle>();
    for (const name of names) {
      let win = state.windows.find((w) => w.name === name);
      if (!win) {
        win = {
          index: state.nextIndex++,
          name,
          output: '',
          pane: makePaneInfo({ currentCommand: 'zsh' }),
          sent: [],
        };
        state.windows.push(win);
      }
      handles.set(name, toHandle(session.name, win));
    }
    return handles;
  }

  async listWindows(session: string): Promise<WindowInfo[]> {
    return (this.sessions.get(session)?.windows ?? []).map(({ index, name }) => ({ index, name }));
  }

  async findWindow(session: string, name: string): Promise<WindowResult<WindowHandle>> {
    const win = this.window(session, name);
    return win ? ok(toHandle(session, win)) : err(new WindowNotFoundError(session, name));
  }

  async sendKeys(window: WindowHandle, text: string): Promise<WindowResult<void>> {
    return this.withWindow(window, (win) => {
      win.sent.push(text);
    });
  }

  async interrupt(window: WindowHandle): Promise<WindowResult<void>> {
    return this.withWindow(window, (win) => {
      win.sent.push('C-c');
    });
  }

  async capture(window: WindowHandle, lines: number): Promise<WindowResult<string>> {
    return this.withWindow(window, (win) => win.output.split('\n').slice(-lines).join('\n'));
  }

  async paneInfo(window: WindowHandle): Promise<WindowResult<PaneInfo>> {
    return this.withWindow(window, (win) => ({ ...win.pane }));
  }

  async focus(window: WindowHandle): Promise<WindowResult<void>> {
    return this.withWindow(window, () => {
      this.focused.push(window);
    });
  }

  async killWindow(window: WindowHandle): Promise<void> {
    this.closeExternally(window.session, window.name);
  }

  async destroySession(name: string): Promise<void> {
    this.sessions.delete(name);
  }

  isInsideSession(): boolean {
    return false;
  }

  window(session: string, name: string): FakeWindow | undefined {
    return this.sessions.get(session)?.windows.find((w) => w.name === name);
  }

  closeExternally(session: string, name: string): void {
    const state = this.sessions.get(session);
    if (state) state.windows = state.windows.filter((w) => w.name !== name);
  }

  private withWindow<T>(window: WindowHandle, fn: (win: FakeWindow) => T): WindowResult<T> {
    const win = this.window(window.session, window.name);
    return win ? ok(fn(win)) : err(new WindowNotFoundError(window.session, window.name));
  }
}

function toHandle(session: string, win: WindowInfo): WindowHandle {
  return { session, name: win.name, index: win.index, target: windowTarget(session, win.index) };
}

export class FakeVcs implements Vcs {
  readonly created: Array<{ branch: string; options: WorktreeOptions }> = [];

  async createWorktree(branch: string, options: WorktreeOptions = {}): Promise<string> {
    this.created.push({ branch, options });
    return options.path ?? `/tmp/worktrees/${branch.replace(/\//g, '_')}`;
  }
}
