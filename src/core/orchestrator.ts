import fs from 'node:fs/promises';
import {
  DuplicateTicketError,
  hasErrnoCode,
  InvalidArgumentError,
  SessionNotFoundError,
  TicketNotFoundError,
  WindowNotFoundError,
} from '../lib/errors.js';
import { agentSessionId } from '../lib/id.js';
import type { Logger } from '../lib/log.js';
import { isValidTicketId, ticketBranchName, ticketSessionName } from '../lib/name.js';
import {
  agentSessionsPath,
  expandHome,
  promptFile,
  promptsDir,
  statusBarPath,
  ticketPath,
  ticketsDir,
} from '../lib/paths.js';
import { err, ok, type Result } from '../types/common.js';
import type { Config } from '../types/config.js';
import {
  agentSessionsFileSchema,
  type AgentSession,
  type AgentSessionStatus,
  type AgentSessionsFile,
  type TodoEntry,
} from '../types/agent.js';
import {
  TICKET_ROLES,
  ticketSchema,
  type TerminalSession,
  type Ticket,
  type TicketStatus,
  type WindowHandle,
  type WindowRole,
} from '../types/ticket.js';
import { compilePattern } from './config.js';
import { isShellCommand, type Multiplexer, type PaneInfo, type SessionHandle } from './multiplexer.js';
import { initialStatusBar } from './status-monitor.js';
import type { StateStore } from './store.js';
import { parseTaskId, TaskBoard } from './tasks.js';
import { computeProgress, TodoParser } from './todo-parser.js';
import type { Vcs } from './worktree.js';

export interface OrchestratorDeps {
  store: StateStore;
  mux: Multiplexer;
  vcs: Vcs;
  config: Config;
  logger: Logger;
  root: string;
  parser?: TodoParser;
  tasks?: TaskBoard;
  now?: () => Date;
  newAgentId?: () => string;
}

export interface CreateTicketInput {
  id: string;
  title?: string;
  branch?: string;
  /** Start point for a new branch. */
  base?: string;
  worktree?: string;
}

export interface ListTicketsOptions {
  includeArchived?: boolean;
}

export interface StartAgentOptions {
  /** Id of a task in the ticket's `tasks.json`; the session is assigned to it. */
  todoId?: string;
  prompt?: string;
  title?: string;
}

export interface AgentSessionList {
  sessions: AgentSession[];
  stale: boolean;
}

export type SettableTicketStatus = Exclude<TicketStatus, 'archived'>;

// Waiting prompts sit at the bottom of the pane
const WAITING_TAIL_LINES = 10;
const PROMPT_SNIPPET_LENGTH = 500;
const TITLE_LENGTH = 60;

/**
 * Owns tickets and their agent sessions: the worktree, the tmux session with
 * its fixed `agent` / `server` / `tests` windows, and the records under
 * `tickets/<id>/`. Windows are never trusted to still exist; lookups that can
 * miss return a `Result`.
 */
export class SessionOrchestrator {
  private readonly store: StateStore;
  private readonly mux: Multiplexer;
  private readonly vcs: Vcs;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly root: string;
  private readonly parser: TodoParser;
  readonly tasks: TaskBoard;
  private readonly waitingPatterns: RegExp[];
  private readonly now: () => Date;
  private readonly newAgentId: () => string;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.mux = deps.mux;
    this.vcs = deps.vcs;
    this.config = deps.config;
    this.logger = deps.logger;
    this.root = deps.root;
    this.parser = deps.parser ?? TodoParser.fromConfig(deps.config.todo);
    this.waitingPatterns = deps.config.agent.waitingPatterns.map((p) => compilePattern(p, 'agent.waitingPatterns'));
    this.now = deps.now ?? (() => new Date());
    this.tasks = deps.tasks ?? new TaskBoard({ store: deps.store, logger: deps.logger, root: deps.root, now: this.now });
    this.newAgentId = deps.newAgentId ?? agentSessionId;
  }

  // ---------------------------------------------------------------------------
  // Tickets
  // ---------------------------------------------------------------------------

  async createTicket(input: CreateTicketInput): Promise<Ticket> {
    const { id } = input;
    if (!isValidTicketId(id)) {
      throw new InvalidArgumentError(
        `Invalid ticket id '${id}': use letters, digits, '.', '_' or '-', starting with a letter or digit`,
      );
    }

    const file = ticketPath(this.root, id);
    return this.store.withLock(file, async () => {
      const existing = await this.store.read(file, ticketSchema, { stalenessMs: Infinity });
      if (existing.status !== 'not-found') {
        throw new DuplicateTicketError(id);
      }

      const branch = input.branch ?? ticketBranchName(id, input.title);
      const worktreePath = await this.vcs.createWorktree(branch, {
        base: input.base,
        path: input.worktree ? expandHome(input.worktree) : undefined,
      });
      const session = await this.mux.createSession(ticketSessionName(this.config.sessionPrefix, id), worktreePath);
      const terminal = await this.ensureTicketWindows(session);

      const now = this.now();
      const ticket: Ticket = {
        id,
        title: input.title ?? id,
        branch,
        worktreePath,
        status: 'active',
        session: terminal,
        createdAt: now.toISOString(),
        updatedAt: now.toISOString(),
      };
      await this.store.write(file, ticket);
      await this.store.write(statusBarPath(this.root, id), initialStatusBar(now));
      await this.store.write(agentSessionsPath(this.root, id), { sessions: [] } satisfies AgentSessionsFile);
      await this.logger.info(`Created ticket ${id} on ${branch} (${worktreePath})`);
      return ticket;
    });
  }

  async getTicket(id: string): Promise<Ticket> {
    if (!isValidTicketId(id)) throw new TicketNotFoundError(id);

    const file = ticketPath(this.root, id);
    const result = await this.store.read(file, ticketSchema, { stalenessMs: Infinity });
    if (result.status === 'ok') return result.value;
    if (result.status === 'corrupt') {
      await this.logger.warn(`Unreadable ticket file ${file}: ${result.reason}`);
    }
    throw new TicketNotFoundError(id);
  }

  async listTickets(options: ListTicketsOptions = {}): Promise<Ticket[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(ticketsDir(this.root));
    } catch (e) {
      if (hasErrnoCode(e, 'ENOENT')) return [];
      throw e;
    }

    const tickets: Ticket[] = [];
    for (const id of entries.filter(isValidTicketId).sort()) {
      const file = ticketPath(this.root, id);
      const result = await this.store.read(file, ticketSchema, { stalenessMs: Infinity });
      if (result.status === 'corrupt') {
        await this.logger.warn(`Skipping corrupt ticket file ${file}: ${result.reason}`);
        continue;
      }
      if (result.status === 'not-found') continue;
      if (options.includeArchived || result.value.status !== 'archived') {
        tickets.push(result.value);
      }
    }
    return tickets.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async setTicketStatus(id: string, status: SettableTicketStatus): Promise<Ticket> {
    return this.mutateTicket(id, (ticket) => {
      if (ticket.status === 'archived') {
        throw new InvalidArgumentError(`Ticket ${id} is archived and cannot be marked ${status}`);
      }
      return { ...ticket, status };
    });
  }

  /**
   * Resolve and focus one of the ticket's fixed windows. A window closed
   * outside tixmux comes back as `WindowNotFoundError`; the caller decides
   * whether to {@link recreateWindows}.
   */
  async attachWindow(ticketId: string, role: WindowRole): Promise<Result<WindowHandle, WindowNotFoundError>> {
    const ticket = await this.getTicket(ticketId);
    const found = await this.mux.findWindow(ticket.session.name, role);
    if (!found.ok) return found;

    const focused = await this.mux.focus(found.value);
    return focused.ok ? found : err(focused.error);
  }

  async recreateWindows(ticketId: string): Promise<Ticket> {
    const ticket = await this.getTicket(ticketId);
    if (ticket.status === 'archived') {
      throw new InvalidArgumentError(`Ticket ${ticketId} is archived`);
    }

    const session = await this.mux.createSession(ticket.session.name, ticket.worktreePath);
    const terminal = await this.ensureTicketWindows(session);
    await this.logger.info(`Recreated windows for ${ticketId}`);
    return this.mutateTicket(ticketId, (current) => ({ ...current, session: terminal }));
  }

  /** Terminal: the tmux session goes away, the worktree and records stay. */
  async archiveTicket(id: string): Promise<Ticket> {
    const archived = await this.mutateTicket(id, (ticket) =>
      ticket.status === 'archived'
        ? ticket
        : { ...ticket, status: 'archived', archivedAt: this.now().toISOString() },
    );
    await this.mux.destroySession(archived.session.name);
    await this.logger.info(`Archived ticket ${id}`);
    return archived;
  }

  // ---------------------------------------------------------------------------
  // Agent sessions
  // ---------------------------------------------------------------------------

  async startAgentSession(ticketId: string, options: StartAgentOptions = {}): Promise<AgentSession> {
    const ticket = await this.getTicket(ticketId);
    if (ticket.status === 'archived') {
      throw new InvalidArgumentError(`Ticket ${ticketId} is archived`);
    }
    const taskId = options.todoId === undefined ? undefined : parseTaskId(options.todoId);
    if (taskId !== undefined) await this.tasks.get(ticketId, taskId);

    const id = this.newAgentId();
    const session = await this.mux.createSession(ticket.session.name, ticket.worktreePath);
    const window = (await this.mux.ensureWindows(session, [id])).get(id);
    if (!window) throw new WindowNotFoundError(session.name, id);

    let command = this.config.agent.command;
    if (options.prompt) {
      const file = promptFile(this.root, ticketId, id);
      await fs.mkdir(promptsDir(this.root, ticketId), { recursive: true });
      await fs.writeFile(file, options.prompt, 'utf-8');
      command = buildAgentCommand(this.config.agent.command, this.config.agent.promptFlag, file);
    }

    const sent = await this.mux.sendKeys(window, command);
    if (!sent.ok) throw sent.error;

    const at = this.now().toISOString();
    const record: AgentSession = {
      id,
      ticketId,
      todoId: taskId === undefined ? undefined : String(taskId),
      title: options.title ?? titleFromPrompt(options.prompt) ?? id,
      status: 'working',
      todos: [],
      progressPercent: 'unknown',
      window,
      prompt: options.prompt?.slice(0, PROMPT_SNIPPET_LENGTH),
      startedAt: at,
      lastActive: at,
    };
    await this.store.update(
      agentSessionsPath(this.root, ticketId),
      agentSessionsFileSchema,
      () => ({ sessions: [] }),
      (file) => ({ sessions: [...file.sessions, record] }),
    );
    if (taskId !== undefined) await this.tasks.startWork(ticketId, taskId, id);
    await this.logger.info(`Started agent session ${id} for ${ticketId} in window ${window.target}`);
    return record;
  }

  async listAgentSessions(ticketId: string): Promise<AgentSessionList> {
    if (!isValidTicketId(ticketId)) throw new TicketNotFoundError(ticketId);

    const file = agentSessionsPath(this.root, ticketId);
    const result = await this.store.read(file, agentSessionsFileSchema);
    switch (result.status) {
      case 'ok':
        return { sessions: result.value.sessions, stale: result.stale };
      case 'not-found':
        return { sessions: [], stale: false };
      case 'corrupt':
        await this.logger.warn(`Unreadable agent sessions file ${file}: ${result.reason}`);
        return { sessions: [], stale: true };
    }
  }

  /**
   * Capture the agent's window, re-parse its TODO list (replacing the stored
   * one), and derive its status from the pane.
   */
  async sampleAgentOutput(ticketId: string, sessionId: string): Promise<Result<AgentSession, SessionNotFoundError>> {
    const { sessions } = await this.listAgentSessions(ticketId);
    const current = sessions.find((s) => s.id === sessionId);
    if (!current) return err(new SessionNotFoundError(sessionId));

    const sampled = await this.sample(current);
    return this.withAgentSessions(ticketId, (file) => {
      const index = file.sessions.findIndex((s) => s.id === sessionId);
      if (index === -1) return err(new SessionNotFoundError(sessionId));
      const sessionsNext = [...file.sessions];
      sessionsNext[index] = sampled;
      return ok({ file: { sessions: sessionsNext }, value: sampled });
    });
  }

  /** Remove the session record and close its window. The only way a session goes away. */
  async archiveSession(ticketId: string, sessionId: string): Promise<Result<void, SessionNotFoundError>> {
    if (!isValidTicketId(ticketId)) throw new TicketNotFoundError(ticketId);
    const removed = await this.withAgentSessions(ticketId, (file) => {
      const target = file.sessions.find((s) => s.id === sessionId);
      if (!target) return err(new SessionNotFoundError(sessionId));
      return ok({ file: { sessions: file.sessions.filter((s) => s.id !== sessionId) }, value: target });
    });
    if (!removed.ok) return removed;

    await this.mux.killWindow(removed.value.window);
    await this.tasks.releaseAgent(ticketId, sessionId);
    await this.logger.info(`Archived agent session ${sessionId} of ${ticketId}`);
    return ok(undefined);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async sample(session: AgentSession): Promise<AgentSession> {
    const lastActive = this.now().toISOString();
    const captured = await this.mux.capture(session.window, this.config.agent.sampleLines);
    if (!captured.ok) {
      return { ...session, status: 'error', error: captured.error.message, lastActive };
    }

    const todos = this.parser.parse(captured.value);
    const pane = await this.mux.paneInfo(session.window);
    const status = pane.ok
      ? this.deriveStatus(pane.value, todos, captured.value)
      : 'error';
    return {
      ...session,
      todos,
      progressPercent: computeProgress(todos),
      status,
      error: pane.ok ? undefined : pane.error.message,
      lastActive,
    };
  }

  private deriveStatus(pane: PaneInfo, todos: TodoEntry[], output: string): AgentSessionStatus {
    if (pane.isDead || isShellCommand(pane.currentCommand)) {
      return todos.length > 0 && todos.every((t) => t.completed) ? 'completed' : 'idle';
    }
    const tail = output.split('\n').filter((line) => line.trim()).slice(-WAITING_TAIL_LINES);
    if (tail.some((line) => this.waitingPatterns.some((p) => p.test(line)))) {
      return 'waiting';
    }
    return 'working';
  }

  private async ensureTicketWindows(session: SessionHandle): Promise<TerminalSession> {
    const windows = await this.mux.ensureWindows(session, TICKET_ROLES);
    const pick = (role: WindowRole): WindowHandle => {
      const handle = windows.get(role);
      if (!handle) throw new WindowNotFoundError(session.name, role);
      return handle;
    };
    return {
      name: session.name,
      windows: { agent: pick('agent'), server: pick('server'), tests: pick('tests') },
    };
  }

  private async mutateTicket(id: string, fn: (ticket: Ticket) => Ticket): Promise<Ticket> {
    if (!isValidTicketId(id)) throw new TicketNotFoundError(id);
    const file = ticketPath(this.root, id);
    return this.store.withLock(file, async () => {
      const current = await this.getTicket(id);
      const next = fn(current);
      if (next === current) return current;
      const updated = { ...next, updatedAt: this.now().toISOString() };
      await this.store.write(file, updated);
      return updated;
    });
  }

  private async withAgentSessions<T>(
    ticketId: string,
    fn: (file: AgentSessionsFile) => Result<{ file: AgentSessionsFile; value: T }, SessionNotFoundError>,
  ): Promise<Result<T, SessionNotFoundError>> {
    const path = agentSessionsPath(this.root, ticketId);
    return this.store.withLock(path, async () => {
      const file = await this.store.readOrDefault(path, agentSessionsFileSchema, () => ({ sessions: [] }));
      const result = fn(file);
      if (!result.ok) return result;
      await this.store.write(path, result.value.file);
      return ok(result.value.value);
    });
  }
}

function buildAgentCommand(command: string, promptFlag: string | undefined, promptFilePath: string): string {
  // Single-quote the path inside $(cat ...) so spaces survive the shell
  const catExpr = `"$(cat '${promptFilePath.replace(/'/g, `'\\''`)}')"`;
  return promptFlag ? `${command} ${promptFlag} ${catExpr}` : `${command} ${catExpr}`;
}

function titleFromPrompt(prompt: string | undefined): string | undefined {
  const firstLine = prompt?.split('\n').find((line) => line.trim())?.trim();
  if (!firstLine) return undefined;
  return firstLine.length > TITLE_LENGTH ? `${firstLine.slice(0, TITLE_LENGTH - 1)}…` : firstLine;
}
