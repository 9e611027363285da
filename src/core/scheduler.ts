import { describeError, type Logger } from '../lib/log.js';
import type { AgentSession } from '../types/agent.js';
import type { ServiceName, ServiceStatus } from '../types/status.js';
import type { Ticket } from '../types/ticket.js';
import type { SessionOrchestrator } from './orchestrator.js';
import type { ResultsUpdate, StatusMonitor } from './status-monitor.js';

export type SchedulerEvent =
  | { type: 'service:status'; ticketId: string; service: ServiceName; status: ServiceStatus }
  | { type: 'results:updated'; ticketId: string; results: ResultsUpdate }
  | { type: 'agent:sampled'; ticketId: string; session: AgentSession }
  | { type: 'job:error'; ticketId?: string; job: string; error: string };

export interface TickReport {
  launched: string[];
  /** Jobs whose previous run was still in flight. */
  skipped: string[];
}

export interface SchedulerDeps {
  orchestrator: Pick<SessionOrchestrator, 'listTickets' | 'listAgentSessions' | 'sampleAgentOutput'>;
  monitor: Pick<StatusMonitor, 'checkHealth' | 'checkDatabase' | 'refreshResults'>;
  logger: Logger;
  intervalMs: number;
  onEvent?: (event: SchedulerEvent) => void;
  onTick?: (report: TickReport) => void;
}

/**
 * Drives the periodic work: service health, database reachability, result
 * files and agent sampling for every ticket that is not archived. A job that
 * is still running when its next turn comes around is skipped, so a hung
 * probe never piles up behind itself.
 */
export class Scheduler {
  private readonly deps: SchedulerDeps;
  private readonly inFlight = new Map<string, Promise<void>>();
  private timer: NodeJS.Timeout | null = null;

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.runTick(), this.deps.intervalMs);
    this.runTick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Launch one round of jobs and resolve once every launched job has settled. Never rejects. */
  async tick(): Promise<TickReport> {
    const report: TickReport = { launched: [], skipped: [] };
    const pending: Promise<void>[] = [];
    const launch = (key: string, ticketId: string, job: () => Promise<SchedulerEvent>) => {
      if (this.inFlight.has(key)) {
        report.skipped.push(key);
        return;
      }
      report.launched.push(key);
      const run = job()
        .then((event) => this.emit(event))
        .catch((err: unknown) => this.emit({ type: 'job:error', ticketId, job: key, error: describeError(err) }))
        .finally(() => this.inFlight.delete(key));
      this.inFlight.set(key, run);
      pending.push(run);
    };

    let tickets: Ticket[];
    try {
      tickets = await this.deps.orchestrator.listTickets();
    } catch (err) {
      await this.deps.logger.error('Could not list tickets', err);
      await this.emit({ type: 'job:error', job: 'tickets', error: describeError(err) });
      return report;
    }

    const { orchestrator, monitor } = this.deps;
    for (const ticket of tickets) {
      const id = ticket.id;
      launch(`${id}:server`, id, async () => ({
        type: 'service:status',
        ticketId: id,
        service: 'server',
        status: await monitor.checkHealth(ticket),
      }));
      launch(`${id}:database`, id, async () => ({
        type: 'service:status',
        ticketId: id,
        service: 'database',
        status: await monitor.checkDatabase(ticket),
      }));
      launch(`${id}:results`, id, async () => ({
        type: 'results:updated',
        ticketId: id,
        results: await monitor.refreshResults(ticket),
      }));

      let sessions: AgentSession[];
      try {
        ({ sessions } = await orchestrator.listAgentSessions(id));
      } catch (err) {
        await this.emit({ type: 'job:error', ticketId: id, job: `${id}:agents`, error: describeError(err) });
        continue;
      }
      for (const session of sessions) {
        launch(`${id}:agent:${session.id}`, id, async () => {
          const sampled = await orchestrator.sampleAgentOutput(id, session.id);
          if (!sampled.ok) throw sampled.error;
          return { type: 'agent:sampled', ticketId: id, session: sampled.value };
        });
      }
    }

    await Promise.all(pending);
    return report;
  }

  private runTick(): void {
    this.tick()
      .then((report) => this.deps.onTick?.(report))
      .catch((err: unknown) => this.deps.logger.error('Scheduler tick failed', err));
  }

  private async emit(event: SchedulerEvent): Promise<void> {
    if (event.type === 'job:error') {
      await this.deps.logger.warn(`Job ${event.job} failed: ${event.error}`);
    }
    try {
      this.deps.onEvent?.(event);
    } catch (err) {
      await this.deps.logger.error(`Event handler failed on ${event.type}`, err);
    }
  }
}
