import { createRuntime } from '../core/runtime.js';
import { output } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';
import { collectViews, renderDashboard, viewToJson } from './dashboard.js';

export interface StatusOptions extends GlobalOptions {
  /** Run the checks once before printing instead of showing the last recorded state. */
  refresh?: boolean;
}

export async function statusCommand(ticketId: string | undefined, options: StatusOptions): Promise<void> {
  const runtime = await createRuntime();
  const tickets = ticketId
    ? [await runtime.orchestrator.getTicket(ticketId)]
    : await runtime.orchestrator.listTickets();

  if (options.refresh) {
    await runtime.createScheduler().tick();
  }

  const views = await collectViews(runtime, tickets);
  if (options.json) {
    output(views.map(viewToJson), true);
    return;
  }
  console.log(renderDashboard(views));
}
