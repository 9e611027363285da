import { createRuntime } from '../core/runtime.js';
import { formatResult, formatServiceStatus, output, success } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';

export async function serverStartCommand(ticketId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator, monitor } = await createRuntime();
  const status = await monitor.startService(await orchestrator.getTicket(ticketId));

  if (options.json) {
    output(status, true);
    return;
  }
  success(`Server for ${ticketId}: ${formatServiceStatus(status)}`);
}

export async function serverStopCommand(ticketId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator, monitor } = await createRuntime();
  const status = await monitor.stopService(await orchestrator.getTicket(ticketId));

  if (options.json) {
    output(status, true);
    return;
  }
  success(`Server for ${ticketId}: ${formatServiceStatus(status)}`);
}

/** One round of server, database and result checks for a single ticket. */
export async function serverCheckCommand(ticketId: string, options: GlobalOptions): Promise<void> {
  const { orchestrator, monitor } = await createRuntime();
  const ticket = await orchestrator.getTicket(ticketId);
  const [server, database, results] = await Promise.all([
    monitor.checkHealth(ticket),
    monitor.checkDatabase(ticket),
    monitor.refreshResults(ticket),
  ]);

  if (options.json) {
    output({ server, database, ...results }, true);
    return;
  }
  console.log(`server    ${formatServiceStatus(server)}`);
  console.log(`database  ${formatServiceStatus(database)}`);
  console.log(`build     ${formatResult(results.build)}`);
  console.log(`tests     ${formatResult(results.tests)}`);
}
