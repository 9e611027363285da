import { createRuntime } from '../core/runtime.js';
import { info, output, success } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';

export interface CreateOptions extends GlobalOptions {
  title?: string;
  branch?: string;
  base?: string;
  worktree?: string;
}

export async function createCommand(id: string, options: CreateOptions): Promise<void> {
  const { orchestrator } = await createRuntime();
  const ticket = await orchestrator.createTicket({
    id,
    title: options.title,
    branch: options.branch,
    base: options.base,
    worktree: options.worktree,
  });

  if (options.json) {
    output(ticket, true);
    return;
  }
  success(`Created ticket ${ticket.id} on ${ticket.branch}`);
  info(`Worktree: ${ticket.worktreePath}`);
  info(`tmux session: ${ticket.session.name} (attach with: tixmux attach ${ticket.id})`);
}
