import fs from 'node:fs/promises';
import { createRuntime } from '../core/runtime.js';
import { InvalidArgumentError } from '../lib/errors.js';
import {
  formatAgentStatus,
  formatProgress,
  formatTable,
  formatTimeAgo,
  output,
  success,
  warn,
  type Column,
} from '../lib/output.js';
import type { AgentSession } from '../types/agent.js';
import type { GlobalOptions } from '../types/common.js';

export interface AgentStartOptions extends GlobalOptions {
  prompt?: string;
  promptFile?: string;
  todo?: string;
  title?: string;
}

export async function agentStartCommand(ticketId: string, options: AgentStartOptions): Promise<void> {
  if (options.prompt && options.promptFile) {
    throw new InvalidArgumentError('Use either --prompt or --prompt-file, not both');
  }
  const prompt = options.promptFile ? await fs.readFile(options.promptFile, 'utf-8') : options.prompt;

  const { orchestrator } = await createRuntime();
  const session = await orchestrator.startAgentSession(ticketId, {
    prompt,
    todoId: options.todo,
    title: options.title,
  });

  if (options.json) {
    output(session, true);
    return;
  }
  success(`Started agent session ${session.id} in ${session.window.target}`);
}

const now = () => new Date();

const SESSION_COLUMNS: Column<AgentSession>[] = [
  { header: 'ID', value: (s) => s.id },
  { header: 'Status', value: (s) => formatAgentStatus(s.status) },
  { header: 'Progress', value: (s) => formatProgress(s.progressPercent) },
  { header: 'TODOs', value: (s) => `${s.todos.filter((t) => t.completed).length}/${s.todos.length}` },
  { header: 'Active', value: (s) => formatTimeAgo(s.lastActive, now()) },
  { header: 'Title', value: (s) => s.title },
];

export async function agentListCommand(ticketId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator } = await createRuntime();
  const list = await orchestrator.listAgentSessions(ticketId);

  if (options.json) {
    output(list, true);
    return;
  }
  if (list.stale) warn('Agent session data is stale; run `tixmux watch` or `tixmux agent sample` to refresh');
  console.log(formatTable(list.sessions, SESSION_COLUMNS));
}

export async function agentSampleCommand(ticketId: string, sessionId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator } = await createRuntime();
  const result = await orchestrator.sampleAgentOutput(ticketId, sessionId);
  if (!result.ok) throw result.error;
  const session = result.value;

  if (options.json) {
    output(session, true);
    return;
  }
  console.log(`${session.id}  ${formatAgentStatus(session.status)}  ${formatProgress(session.progressPercent)}`);
  for (const todo of session.todos) {
    const mark = todo.completed ? '[x]' : todo.blocked ? '[!]' : '[ ]';
    console.log(`  ${mark} ${todo.text}`);
  }
  if (session.error) warn(session.error);
}

export async function agentArchiveCommand(ticketId: string, sessionId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator } = await createRuntime();
  const result = await orchestrator.archiveSession(ticketId, sessionId);
  if (!result.ok) throw result.error;

  if (options.json) {
    output({ archived: sessionId }, true);
    return;
  }
  success(`Archived agent session ${sessionId}`);
}
