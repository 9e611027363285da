import { createRuntime } from '../core/runtime.js';
import type { SchedulerEvent } from '../core/scheduler.js';
import { warn } from '../lib/output.js';
import { collectViews, renderDashboard } from './dashboard.js';

export interface WatchOptions {
  verbose?: boolean;
}

/** Run the scheduler in the foreground and redraw after every round of checks. */
export async function watchCommand(options: WatchOptions): Promise<void> {
  const runtime = await createRuntime({ verbose: options.verbose });
  const errors: SchedulerEvent[] = [];

  const redraw = async () => {
    const views = await collectViews(runtime, await runtime.orchestrator.listTickets());
    if (!options.verbose) console.clear();
    console.log(renderDashboard(views));
    for (const event of errors.splice(0)) {
      if (event.type === 'job:error') warn(`${event.job}: ${event.error}`);
    }
  };

  const scheduler = runtime.createScheduler({
    onEvent: (event) => {
      if (event.type === 'job:error') errors.push(event);
    },
    onTick: () => {
      redraw().catch((err) => runtime.logger.error('Dashboard redraw failed', err));
    },
  });

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => {
      scheduler.stop();
      resolve();
    });
    scheduler.start();
  });
}
