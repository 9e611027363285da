import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SessionOrchestrator } from './orchestrator.js';
import { StateStore } from './store.js';
import { DEFAULT_CONFIG } from './config.js';
import {
  DuplicateTicketError,
  InvalidArgumentError,
  SessionNotFoundError,
  TaskNotFoundError,
  TicketNotFoundError,
  WindowNotFoundError,
} from '../lib/errors.js';
import { agentSessionsPath, promptFile, statusBarPath, ticketPath } from '../lib/paths.js';
import type { Config } from '../types/config.js';
import { createMemoryLogger, FakeMultiplexer, FakeVcs, type FakeWindow } from '../test-fixtures.js';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');
const iso = (ms: number) => new Date(ms).toISOString();
const SESSION = 'tix-IN-413';

let root: string;
let nowMs: number;
let mux: FakeMultiplexer;
let vcs: FakeVcs;

function makeOrchestrator(config: Partial<Config> = {}) {
  const now = () => new Date(nowMs);
  const logger = createMemoryLogger();
  const store = new StateStore({ logger, now });
  let n = 0;
  const orchestrator = new SessionOrchestrator({
    store,
    mux,
    vcs,
    config: { ...DEFAULT_CONFIG, ...config },
    logger,
    root,
    now,
    newAgentId: () => `ag-test000${++n}`,
  });
  return { orchestrator, logger };
}

function agentWindow(id: string): FakeWindow {
  const win = mux.window(SESSION, id);
  if (!win) throw new Error(`window ${id} missing`);
  return win;
}

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'tixmux-orchestrator-'));
  nowMs = T0;
  mux = new FakeMultiplexer();
  vcs = new FakeVcs();
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('createTicket', () => {
  test('given a new id and title, should create the branch, worktree and three windows', async () => {
    const { orchestrator } = makeOrchestrator();

    const actual = await orchestrator.createTicket({ id: 'IN-413', title: 'Public API bulk uploads' });

    expect(actual.branch).toBe('feature/IN-413-public-api-bulk-uploads');
    expect(actual.worktreePath).toBe('/tmp/worktrees/feature_IN-413-public-api-bulk-uploads');
    expect(actual.status).toBe('active');
    expect(actual.session.name).toBe(SESSION);
    expect(await mux.listWindows(SESSION)).toEqual([
      { index: 0, name: 'agent' },
      { index: 1, name: 'server' },
      { index: 2, name: 'tests' },
    ]);
    expect(actual.session.windows.server).toEqual({ session: SESSION, name: 'server', index: 1, target: '=tix-IN-413:1' });
  });

  test('given a base and explicit worktree, should pass both to the vcs', async () => {
    const { orchestrator } = makeOrchestrator();

    await orchestrator.createTicket({ id: 'IN-413', branch: 'fix/upload', base: 'main', worktree: '/tmp/wt-413' });

    expect(vcs.created).toEqual([{ branch: 'fix/upload', options: { base: 'main', path: '/tmp/wt-413' } }]);
  });

  test('given a created ticket, should persist the ticket, an initial status bar and an empty session list', async () => {
    const { orchestrator } = makeOrchestrator();
    const ticket = await orchestrator.createTicket({ id: 'IN-413', title: 'Uploads' });

    const fetched = await orchestrator.getTicket('IN-413');
    const bar = JSON.parse(await fs.readFile(statusBarPath(root, 'IN-413'), 'utf-8'));
    const sessions = await orchestrator.listAgentSessions('IN-413');

    expect(fetched).toEqual(ticket);
    expect(bar.data.server).toEqual({ state: 'stopped', lastCheck: iso(T0) });
    expect(sessions).toEqual({ sessions: [], stale: false });
  });

  test('given an existing ticket id, should throw DuplicateTicketError', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    await expect(orchestrator.createTicket({ id: 'IN-413' })).rejects.toBeInstanceOf(DuplicateTicketError);
    expect(vcs.created).toHaveLength(1);
  });

  test('given a corrupt ticket file under the same id, should refuse to overwrite it', async () => {
    const { orchestrator } = makeOrchestrator();
    const file = ticketPath(root, 'IN-413');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, ': not: [valid');

    await expect(orchestrator.createTicket({ id: 'IN-413' })).rejects.toBeInstanceOf(DuplicateTicketError);
  });

  test('given an invalid id, should throw InvalidArgumentError', async () => {
    const { orchestrator } = makeOrchestrator();

    await expect(orchestrator.createTicket({ id: '../etc' })).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(orchestrator.createTicket({ id: '-flag' })).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  test('given two concurrent creates of the same id, should create exactly one', async () => {
    const { orchestrator } = makeOrchestrator();

    const results = await Promise.allSettled([
      orchestrator.createTicket({ id: 'IN-413' }),
      orchestrator.createTicket({ id: 'IN-413' }),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    expect(vcs.created).toHaveLength(1);
  });
});

describe('getTicket and listTickets', () => {
  test('given an unknown id, should throw TicketNotFoundError', async () => {
    const { orchestrator } = makeOrchestrator();

    await expect(orchestrator.getTicket('NOPE-1')).rejects.toBeInstanceOf(TicketNotFoundError);
  });

  test('given a corrupt ticket file, should log it and report the ticket as not found', async () => {
    const { orchestrator, logger } = makeOrchestrator();
    const file = ticketPath(root, 'IN-9');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, 'data: 42\nwrittenAt: 2026-01-01T00:00:00.000Z\n');

    await expect(orchestrator.getTicket('IN-9')).rejects.toBeInstanceOf(TicketNotFoundError);
    expect(logger.entries.map((e) => e.level)).toEqual(['warn']);
  });

  test('given no tickets directory, should list nothing', async () => {
    const { orchestrator } = makeOrchestrator();

    expect(await orchestrator.listTickets()).toEqual([]);
  });

  test('given tickets created in order, should list them by creation time excluding archived', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'ZZ-1' });
    nowMs = T0 + 1000;
    await orchestrator.createTicket({ id: 'AA-2' });
    nowMs = T0 + 2000;
    await orchestrator.createTicket({ id: 'MM-3' });
    await orchestrator.archiveTicket('MM-3');

    const active = await orchestrator.listTickets();
    const all = await orchestrator.listTickets({ includeArchived: true });

    expect(active.map((t) => t.id)).toEqual(['ZZ-1', 'AA-2']);
    expect(all.map((t) => t.id)).toEqual(['ZZ-1', 'AA-2', 'MM-3']);
  });

  test('given one corrupt ticket file, should skip it with a warning and list the rest', async () => {
    const { orchestrator, logger } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-1' });
    const bad = ticketPath(root, 'IN-2');
    await fs.mkdir(path.dirname(bad), { recursive: true });
    await fs.writeFile(bad, '{{{');

    const actual = await orchestrator.listTickets();

    expect(actual.map((t) => t.id)).toEqual(['IN-1']);
    expect(logger.entries.filter((e) => e.level === 'warn')).toHaveLength(1);
  });
});

describe('setTicketStatus', () => {
  test('given an active ticket, should update its status and updatedAt', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    nowMs = T0 + 5000;

    const actual = await orchestrator.setTicketStatus('IN-413', 'blocked');

    expect(actual.status).toBe('blocked');
    expect(actual.updatedAt).toBe(iso(T0 + 5000));
    expect((await orchestrator.getTicket('IN-413')).status).toBe('blocked');
  });

  test('given an archived ticket, should refuse to change its status', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    await orchestrator.archiveTicket('IN-413');

    await expect(orchestrator.setTicketStatus('IN-413', 'active')).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});

describe('attachWindow and recreateWindows', () => {
  test('given all windows present, should focus the requested one', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    const actual = await orchestrator.attachWindow('IN-413', 'tests');

    expect(actual).toEqual({ ok: true, value: { session: SESSION, name: 'tests', index: 2, target: '=tix-IN-413:2' } });
    expect(mux.focused.map((w) => w.name)).toEqual(['tests']);
  });

  test('given a window closed outside tixmux, should return WindowNotFoundError', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    mux.closeExternally(SESSION, 'server');

    const actual = await orchestrator.attachWindow('IN-413', 'server');

    expect(actual.ok).toBe(false);
    expect(!actual.ok && actual.error).toBeInstanceOf(WindowNotFoundError);
    expect(mux.focused).toEqual([]);
  });

  test('given a closed window, should recreate only the missing one', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    mux.closeExternally(SESSION, 'server');

    const actual = await orchestrator.recreateWindows('IN-413');

    expect(await mux.listWindows(SESSION)).toEqual([
      { index: 0, name: 'agent' },
      { index: 2, name: 'tests' },
      { index: 3, name: 'server' },
    ]);
    expect(actual.session.windows.server.index).toBe(3);
    expect((await orchestrator.getTicket('IN-413')).session.windows.server.index).toBe(3);
  });

  test('given a destroyed session, should rebuild all three windows', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    await mux.destroySession(SESSION);

    await orchestrator.recreateWindows('IN-413');

    expect((await mux.listWindows(SESSION)).map((w) => w.name)).toEqual(['agent', 'server', 'tests']);
  });
});

describe('archiveTicket', () => {
  test('given an active ticket, should mark it archived and destroy its session', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    nowMs = T0 + 60_000;

    const actual = await orchestrator.archiveTicket('IN-413');

    expect(actual.status).toBe('archived');
    expect(actual.archivedAt).toBe(iso(T0 + 60_000));
    expect(await mux.sessionExists(SESSION)).toBe(false);
  });

  test('given an already archived ticket, should keep the first archivedAt', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    await orchestrator.archiveTicket('IN-413');
    nowMs = T0 + 60_000;

    const actual = await orchestrator.archiveTicket('IN-413');

    expect(actual.archivedAt).toBe(iso(T0));
  });
});

describe('startAgentSession', () => {
  test('given a prompt, should open a window named by the id and launch the agent on the prompt file', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    const actual = await orchestrator.startAgentSession('IN-413', { prompt: 'Add the bulk endpoint\nwith tests' });
    const file = promptFile(root, 'IN-413', 'ag-test0001');

    expect(actual.id).toBe('ag-test0001');
    expect(actual.title).toBe('Add the bulk endpoint');
    expect(actual.status).toBe('working');
    expect(actual.window).toEqual({ session: SESSION, name: 'ag-test0001', index: 3, target: '=tix-IN-413:3' });
    expect(await fs.readFile(file, 'utf-8')).toBe('Add the bulk endpoint\nwith tests');
    expect(agentWindow('ag-test0001').sent).toEqual([`claude "$(cat '${file}')"`]);
  });

  test('given a prompt flag, should place the flag before the prompt', async () => {
    const { orchestrator } = makeOrchestrator({ agent: { ...DEFAULT_CONFIG.agent, promptFlag: '-p' } });
    await orchestrator.createTicket({ id: 'IN-413' });

    await orchestrator.startAgentSession('IN-413', { prompt: 'go' });
    const file = promptFile(root, 'IN-413', 'ag-test0001');

    expect(agentWindow('ag-test0001').sent).toEqual([`claude -p "$(cat '${file}')"`]);
  });

  test('given no prompt, should send the bare agent command', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    const actual = await orchestrator.startAgentSession('IN-413', { title: 'Uploads' });

    expect(agentWindow('ag-test0001').sent).toEqual(['claude']);
    expect(actual.todoId).toBeUndefined();
    expect(actual.title).toBe('Uploads');
  });

  test('given two sessions, should persist both in start order', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    await orchestrator.startAgentSession('IN-413');
    await orchestrator.startAgentSession('IN-413');
    const actual = await orchestrator.listAgentSessions('IN-413');

    expect(actual.sessions.map((s) => s.id)).toEqual(['ag-test0001', 'ag-test0002']);
    expect(actual.stale).toBe(false);
  });

  test('given an archived ticket, should refuse to start a session', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    await orchestrator.archiveTicket('IN-413');

    await expect(orchestrator.startAgentSession('IN-413')).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});

describe('listAgentSessions', () => {
  test('given an old sessions file, should mark the list stale', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    nowMs = T0 + DEFAULT_CONFIG.stalenessMs + 1;

    const actual = await orchestrator.listAgentSessions('IN-413');

    expect(actual).toEqual({ sessions: [], stale: true });
  });

  test('given a corrupt sessions file, should return an empty stale list', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    await fs.writeFile(agentSessionsPath(root, 'IN-413'), 'not json');

    const actual = await orchestrator.listAgentSessions('IN-413');

    expect(actual).toEqual({ sessions: [], stale: true });
  });
});

describe('sampleAgentOutput', () => {
  async function started() {
    const ctx = makeOrchestrator();
    await ctx.orchestrator.createTicket({ id: 'IN-413' });
    const session = await ctx.orchestrator.startAgentSession('IN-413');
    const win = agentWindow(session.id);
    win.pane.currentCommand = 'claude';
    return { ...ctx, session, win };
  }

  test('given a TODO list in the pane, should replace the todos and compute progress', async () => {
    const { orchestrator, session, win } = await started();
    win.output = ['## TODO', '- [x] Parse payload', '- [ ] Validate rows', '- [ ] Write rows'].join('\n');
    nowMs = T0 + 3000;

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok).toBe(true);
    if (!actual.ok) return;
    expect(actual.value.todos).toEqual([
      { text: 'Parse payload', completed: true, blocked: false },
      { text: 'Validate rows', completed: false, blocked: false },
      { text: 'Write rows', completed: false, blocked: false },
    ]);
    expect(actual.value.progressPercent).toBe(33);
    expect(actual.value.status).toBe('working');
    expect(actual.value.lastActive).toBe(iso(T0 + 3000));
    expect((await orchestrator.listAgentSessions('IN-413')).sessions[0]).toEqual(actual.value);
  });

  test('given a later sample with fewer items, should replace the list wholesale', async () => {
    const { orchestrator, session, win } = await started();
    win.output = '- [ ] One\n- [ ] Two';
    await orchestrator.sampleAgentOutput('IN-413', session.id);
    win.output = '- [x] One';

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok && actual.value.todos).toEqual([{ text: 'One', completed: true, blocked: false }]);
    expect(actual.ok && actual.value.progressPercent).toBe(100);
  });

  test('given no TODO lines, should report unknown progress', async () => {
    const { orchestrator, session, win } = await started();
    win.output = 'Thinking...';

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok && actual.value.progressPercent).toBe('unknown');
  });

  test('given a confirmation prompt at the bottom of the pane, should report waiting', async () => {
    const { orchestrator, session, win } = await started();
    win.output = '- [ ] Edit file\nDo you want to make this edit?\n❯ 1. Yes';

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok && actual.value.status).toBe('waiting');
  });

  test('given the pane back at a shell with every todo done, should report completed', async () => {
    const { orchestrator, session, win } = await started();
    win.output = '- [x] One\n- [x] Two';
    win.pane.currentCommand = 'zsh';

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok && actual.value.status).toBe('completed');
  });

  test('given the pane back at a shell with open todos, should report idle', async () => {
    const { orchestrator, session, win } = await started();
    win.output = '- [x] One\n- [ ] Two';
    win.pane.currentCommand = 'bash';

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok && actual.value.status).toBe('idle');
  });

  test('given the agent window closed externally, should record an error state', async () => {
    const { orchestrator, session } = await started();
    mux.closeExternally(SESSION, session.id);

    const actual = await orchestrator.sampleAgentOutput('IN-413', session.id);

    expect(actual.ok && actual.value.status).toBe('error');
    expect(actual.ok && actual.value.error).toBe(`Window '${session.id}' not found in tmux session '${SESSION}'`);
  });

  test('given an unknown session id, should return SessionNotFoundError', async () => {
    const { orchestrator } = await started();

    const actual = await orchestrator.sampleAgentOutput('IN-413', 'ag-missing0');

    expect(!actual.ok && actual.error).toBeInstanceOf(SessionNotFoundError);
  });
});

describe('archiveSession', () => {
  test('given a live session, should remove the record and kill its window', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    const first = await orchestrator.startAgentSession('IN-413');
    const second = await orchestrator.startAgentSession('IN-413');

    const actual = await orchestrator.archiveSession('IN-413', first.id);

    expect(actual).toEqual({ ok: true, value: undefined });
    expect((await orchestrator.listAgentSessions('IN-413')).sessions.map((s) => s.id)).toEqual([second.id]);
    expect(mux.window(SESSION, first.id)).toBeUndefined();
  });

  test('given an archived session, should no longer find it', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    const session = await orchestrator.startAgentSession('IN-413');
    await orchestrator.archiveSession('IN-413', session.id);

    const sampled = await orchestrator.sampleAgentOutput('IN-413', session.id);
    const again = await orchestrator.archiveSession('IN-413', session.id);

    expect(!sampled.ok && sampled.error).toBeInstanceOf(SessionNotFoundError);
    expect(!again.ok && again.error).toBeInstanceOf(SessionNotFoundError);
  });
});

describe('agent sessions and tasks', () => {
  test('given a task id, should assign the session to the task and start it', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    const task = await orchestrator.tasks.add('IN-413', { description: 'Validate rows' });

    const actual = await orchestrator.startAgentSession('IN-413', { todoId: String(task.id) });
    const assigned = await orchestrator.tasks.get('IN-413', task.id);

    expect(actual.todoId).toBe('1');
    expect(assigned.assignedAgent).toBe('ag-test0001');
    expect(assigned.status).toBe('in_progress');
  });

  test('given an unknown task id, should throw TaskNotFoundError without opening a window', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    await expect(orchestrator.startAgentSession('IN-413', { todoId: '4' })).rejects.toBeInstanceOf(TaskNotFoundError);
    expect(mux.window(SESSION, 'ag-test0001')).toBeUndefined();
    expect((await orchestrator.listAgentSessions('IN-413')).sessions).toEqual([]);
  });

  test('given a task id that is not a number, should throw InvalidArgumentError', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });

    await expect(orchestrator.startAgentSession('IN-413', { todoId: 'T-7' })).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
  });

  test('given an archived session, should release its task', async () => {
    const { orchestrator } = makeOrchestrator();
    await orchestrator.createTicket({ id: 'IN-413' });
    const task = await orchestrator.tasks.add('IN-413', { description: 'Validate rows' });
    const session = await orchestrator.startAgentSession('IN-413', { todoId: '1' });

    await orchestrator.archiveSession('IN-413', session.id);
    const actual = await orchestrator.tasks.get('IN-413', task.id);

    expect(actual.assignedAgent).toBeUndefined();
    expect(actual.status).toBe('in_progress');
  });
});
