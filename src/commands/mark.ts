import { createRuntime } from '../core/runtime.js';
import type { SettableTicketStatus } from '../core/orchestrator.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { output, success, formatTicketStatus } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';

const SETTABLE: readonly SettableTicketStatus[] = ['active', 'complete', 'blocked'];

function isSettable(value: string): value is SettableTicketStatus {
  return SETTABLE.some((s) => s === value);
}

export async function markCommand(ticketId: string, status: string, options: GlobalOptions): Promise<void> {
  if (!isSettable(status)) {
    throw new InvalidArgumentError(`Unknown status '${status}'. Use one of: ${SETTABLE.join(', ')} (or 'tixmux archive')`);
  }

  const { orchestrator } = await createRuntime();
  const ticket = await orchestrator.setTicketStatus(ticketId, status);

  if (options.json) {
    output(ticket, true);
    return;
  }
  success(`${ticket.id} is now ${formatTicketStatus(ticket.status)}`);
}
