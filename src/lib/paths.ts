import os from 'node:os';
import path from 'node:path';

const CONTROL_DIR = '.tixmux';

/**
 * Root of the on-disk state tree. Every process (interactive front end,
 * one-shot CLI, monitored subprocesses) resolves the same root.
 */
export function controlDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.TIXMUX_HOME ?? path.join(os.homedir(), CONTROL_DIR);
}

export function configPath(root: string): string {
  return path.join(root, 'config.yaml');
}

export function logsDir(root: string): string {
  return path.join(root, 'logs');
}

export function logPath(root: string): string {
  return path.join(logsDir(root), 'tixmux.log');
}

export function ticketsDir(root: string): string {
  return path.join(root, 'tickets');
}

export function ticketDir(root: string, ticketId: string): string {
  return path.join(ticketsDir(root), ticketId);
}

export function ticketPath(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'ticket.yaml');
}

export function statusBarPath(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'status-bar.json');
}

export function agentSessionsPath(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'agent-sessions.json');
}

export function tasksPath(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'tasks.json');
}

export function buildStatusPath(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'build-status.json');
}

export function testStatusPath(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'test-status.json');
}

export function promptsDir(root: string, ticketId: string): string {
  return path.join(ticketDir(root, ticketId), 'prompts');
}

export function promptFile(root: string, ticketId: string, agentId: string): string {
  return path.join(promptsDir(root, ticketId), `${agentId}.md`);
}

/** Expand a leading `~` the way a shell would. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function defaultWorktreePath(worktreeBase: string, branch: string): string {
  return path.join(expandHome(worktreeBase), branch.replace(/\//g, '_'));
}
