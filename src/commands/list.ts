import { createRuntime } from '../core/runtime.js';
import { output } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';
import { collectViews, renderTicketTable, viewToJson } from './dashboard.js';

export interface ListOptions extends GlobalOptions {
  all?: boolean;
}

export async function listCommand(options: ListOptions): Promise<void> {
  const runtime = await createRuntime();
  const tickets = await runtime.orchestrator.listTickets({ includeArchived: options.all });
  const views = await collectViews(runtime, tickets);

  if (options.json) {
    output(views.map(viewToJson), true);
    return;
  }
  console.log(renderTicketTable(views));
}
