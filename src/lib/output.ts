import type { AgentSessionStatus, Progress } from '../types/agent.js';
import type { ResultSummary, ServiceState, ServiceStatus } from '../types/status.js';
import type { TaskStatus } from '../types/task.js';
import type { TicketStatus } from '../types/ticket.js';
import { stripAnsi } from './ansi.js';
import { TixError } from './errors.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const MAGENTA = '\x1b[35m';
const CYAN = '\x1b[36m';
const GRAY = '\x1b[90m';

const SERVICE_COLORS: Record<ServiceState, string> = {
  stopped: GRAY,
  starting: YELLOW,
  healthy: GREEN,
  unhealthy: MAGENTA,
  error: RED,
};

const TICKET_COLORS: Record<TicketStatus, string> = {
  active: GREEN,
  complete: BLUE,
  blocked: RED,
  archived: GRAY,
};

const AGENT_COLORS: Record<AgentSessionStatus, string> = {
  idle: GRAY,
  working: GREEN,
  waiting: CYAN,
  completed: BLUE,
  error: RED,
};

const PROGRESS_WIDTH = 10;

const TASK_COLORS: Record<TaskStatus, string> = {
  not_started: GRAY,
  in_progress: GREEN,
  done: BLUE,
  blocked: RED,
};

function paint(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}

function staleLabel(stale: boolean): string {
  return stale ? ` ${paint(YELLOW, 'stale')}` : '';
}

export function formatTicketStatus(status: TicketStatus): string {
  return paint(TICKET_COLORS[status], status);
}

export function formatAgentStatus(status: AgentSessionStatus): string {
  return paint(AGENT_COLORS[status], status);
}

export function formatTaskStatus(status: TaskStatus): string {
  return paint(TASK_COLORS[status], status.replace('_', ' '));
}

/** `healthy :3000`, `error: EADDRINUSE`, `starting`, ... */
export function formatServiceStatus(status: ServiceStatus, stale = false): string {
  const detail = status.error ? `: ${status.error}` : status.port ? ` :${status.port}` : '';
  return paint(SERVICE_COLORS[status.state], `${status.state}${detail}`) + staleLabel(stale);
}

export function formatProgress(progress: Progress): string {
  if (progress === 'unknown') return paint(DIM, 'unknown');
  const filled = Math.round((progress / 100) * PROGRESS_WIDTH);
  return `${'█'.repeat(filled)}${'░'.repeat(PROGRESS_WIDTH - filled)} ${progress}%`;
}

export function formatResult(summary: ResultSummary | null): string {
  if (!summary) return paint(DIM, 'unknown');
  const stale = staleLabel(summary.stale);
  switch (summary.outcome) {
    case 'passing':
      return paint(GREEN, `✓ ${summary.passed} passed`) + stale;
    case 'failing':
      return paint(RED, `✗ ${summary.failed} failed`) + ` ${summary.passed} passed` + stale;
    case 'unknown':
      return paint(DIM, 'unknown') + stale;
    case 'missing':
      return paint(DIM, 'no results');
    case 'corrupt':
      return paint(RED, 'corrupt');
  }
}

export function formatTimeAgo(iso: string, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - Date.parse(iso)) / 1000));
  if (Number.isNaN(seconds)) return '?';
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}

export interface Column<T> {
  header: string;
  value: (row: T) => string;
  width?: number;
}

export function formatTable<T>(rows: T[], columns: Column<T>[]): string {
  if (rows.length === 0) return 'No results.';

  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    col.width ?? Math.max(col.header.length, ...cells.map((r) => stripAnsi(r[i] ?? '').length)),
  );

  const header = columns.map((col, i) => paint(BOLD, col.header.padEnd(widths[i] ?? 0))).join('  ');
  const separator = widths.map((w) => paint(DIM, '─'.repeat(w))).join('  ');
  const body = cells
    .map((r) =>
      r.map((cell, i) => cell + ' '.repeat(Math.max(0, (widths[i] ?? 0) - stripAnsi(cell).length))).join('  ').trimEnd(),
    )
    .join('\n');

  return `${header}\n${separator}\n${body}`;
}

export function output(data: unknown, json: boolean): void {
  console.log(json ? JSON.stringify(data, null, 2) : data);
}

export function outputError(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    const code = error instanceof TixError ? error.code : 'UNKNOWN';
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`${RED}Error:${RESET} ${message}`);
  }
}

export function info(message: string): void {
  console.log(`${CYAN}▸${RESET} ${message}`);
}

export function success(message: string): void {
  console.log(`${GREEN}✓${RESET} ${message}`);
}

export function warn(message: string): void {
  console.log(`${YELLOW}⚠${RESET} ${message}`);
}
