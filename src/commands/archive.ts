import { createRuntime } from '../core/runtime.js';
import { info, output, success } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';

export async function archiveCommand(ticketId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator } = await createRuntime();
  const ticket = await orchestrator.archiveTicket(ticketId);

  if (options.json) {
    output(ticket, true);
    return;
  }
  success(`Archived ${ticket.id} and closed tmux session ${ticket.session.name}`);
  info(`Worktree kept at ${ticket.worktreePath}`);
}
