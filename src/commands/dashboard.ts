import type { GitStatusResult } from '../core/git-status.js';
import type { Runtime } from '../core/runtime.js';
import type { AgentSessionList } from '../core/orchestrator.js';
import type { StatusView } from '../core/status-monitor.js';
import { taskProgress, type TaskList } from '../core/tasks.js';
import {
  formatAgentStatus,
  formatProgress,
  formatResult,
  formatServiceStatus,
  formatTable,
  formatTicketStatus,
  formatTimeAgo,
  type Column,
} from '../lib/output.js';
import type { Ticket } from '../types/ticket.js';

export interface TicketView {
  ticket: Ticket;
  status: StatusView;
  agents: AgentSessionList;
  git?: GitStatusResult;
  tasks?: TaskList;
}

export async function collectViews(
  runtime: Pick<Runtime, 'orchestrator' | 'monitor' | 'tasks' | 'git'>,
  tickets: Ticket[],
): Promise<TicketView[]> {
  return Promise.all(
    tickets.map(async (ticket) => ({
      ticket,
      status: await runtime.monitor.readStatus(ticket),
      agents: await runtime.orchestrator.listAgentSessions(ticket.id),
      // Archived tickets may have had their worktree removed
      git: ticket.status === 'archived' ? undefined : await runtime.git.read(ticket.worktreePath),
      tasks: await runtime.tasks.list(ticket.id),
    })),
  );
}

/** JSON shape shared by `status --json` and `list --json`. */
export function viewToJson(view: TicketView): Record<string, unknown> {
  return {
    ...view.ticket,
    statusBar: view.status.bar,
    statusStale: view.status.stale,
    statusState: view.status.state,
    agentSessions: view.agents.sessions,
    agentSessionsStale: view.agents.stale,
    git: view.git?.ok ? view.git.value : null,
    gitError: view.git && !view.git.ok ? view.git.error : undefined,
    tasks: view.tasks?.tasks ?? [],
    tasksCorrupt: view.tasks?.corrupt ?? false,
  };
}

function label(name: string): string {
  return name.padEnd(9);
}

export function renderTicket(view: TicketView, now: Date = new Date()): string {
  const { ticket, status, agents } = view;
  const { bar, stale } = status;
  const lines = [
    `${ticket.id}  ${ticket.title}  ${formatTicketStatus(ticket.status)}`,
    `  ${label('branch')}${ticket.branch}`,
    `  ${label('worktree')}${ticket.worktreePath}`,
  ];
  if (view.git) {
    lines.push(`  ${label('git')}${formatGit(view.git)}`);
  }

  if (status.state === 'corrupt') {
    lines.push(`  ${label('status')}corrupt (status-bar.json could not be read)`);
  } else {
    lines.push(`  ${label('server')}${formatServiceStatus(bar.server, stale)}`);
    lines.push(`  ${label('database')}${formatServiceStatus(bar.database, stale)}`);
    lines.push(`  ${label('build')}${formatResult(bar.build)}`);
    lines.push(`  ${label('tests')}${formatResult(bar.tests)}`);
  }

  const tasks = view.tasks;
  if (tasks?.corrupt) {
    lines.push(`  ${label('tasks')}corrupt (tasks.json could not be read)`);
  } else if (tasks && tasks.tasks.length > 0) {
    const done = tasks.tasks.filter((t) => t.status === 'done').length;
    lines.push(`  ${label('tasks')}${done}/${tasks.tasks.length} done  ${formatProgress(taskProgress(tasks.tasks))}`);
  }

  const heading = agents.stale ? 'agents (stale)' : 'agents';
  if (agents.sessions.length === 0) {
    lines.push(`  ${heading}: none`);
  } else {
    lines.push(`  ${heading}`);
    for (const session of agents.sessions) {
      lines.push(
        `    ${session.id}  ${formatAgentStatus(session.status)}  ${formatProgress(session.progressPercent)}  ${session.title}  (${formatTimeAgo(session.lastActive, now)})`,
      );
    }
  }
  return lines.join('\n');
}

function formatGit(git: GitStatusResult): string {
  if (!git.ok) return `unavailable (${git.error})`;
  const { branch, upstream, ahead, behind, modified, untracked } = git.value;
  const parts = [upstream ? `${branch} ↑${ahead} ↓${behind}` : branch];
  if (modified.length === 0 && untracked.length === 0) {
    parts.push('clean');
  } else {
    parts.push(`${modified.length} modified`, `${untracked.length} untracked`);
  }
  return parts.join('  ');
}

export function renderDashboard(views: TicketView[], now: Date = new Date()): string {
  if (views.length === 0) return 'No tickets. Create one with: tixmux create <id> --title "..."';
  return views.map((view) => renderTicket(view, now)).join('\n\n');
}

const LIST_COLUMNS: Column<TicketView>[] = [
  { header: 'ID', value: (v) => v.ticket.id },
  { header: 'Status', value: (v) => formatTicketStatus(v.ticket.status) },
  { header: 'Server', value: (v) => formatServiceStatus(v.status.bar.server, v.status.stale) },
  { header: 'Tests', value: (v) => formatResult(v.status.bar.tests) },
  { header: 'Agents', value: (v) => String(v.agents.sessions.length) },
  { header: 'Title', value: (v) => v.ticket.title },
];

export function renderTicketTable(views: TicketView[]): string {
  return formatTable(views, LIST_COLUMNS);
}
