import { WindowNotFoundError } from '../lib/errors.js';
import { describeError, type Logger } from '../lib/log.js';
import { buildStatusPath, statusBarPath, testStatusPath } from '../lib/paths.js';
import type { Config } from '../types/config.js';
import {
  statusBarSchema,
  type ResultSummary,
  type ServiceName,
  type ServiceStatus,
  type StatusBar,
} from '../types/status.js';
import type { Ticket, WindowHandle } from '../types/ticket.js';
import { LogPatternMatcher } from './log-matcher.js';
import { isShellCommand, type Multiplexer } from './multiplexer.js';
import { defaultProbes, parseEndpoint, type ProbeOutcome, type Probes } from './probe.js';
import { readResultSummary } from './results.js';
import type { StateStore } from './store.js';

export interface StatusMonitorDeps {
  store: StateStore;
  mux: Multiplexer;
  config: Config;
  logger: Logger;
  root: string;
  probes?: Probes;
  matcher?: LogPatternMatcher;
  now?: () => Date;
}

export interface StatusView {
  bar: StatusBar;
  stale: boolean;
  state: 'ok' | 'missing' | 'corrupt';
}

export interface ResultsUpdate {
  build: ResultSummary;
  tests: ResultSummary;
}

export function initialStatusBar(now: Date): StatusBar {
  const stopped: ServiceStatus = { state: 'stopped', lastCheck: now.toISOString() };
  return { server: stopped, database: { ...stopped }, build: null, tests: null };
}

const SERVER_WINDOW = 'server';

/**
 * Health of a ticket's dev server and database, plus summaries of the
 * build/test result files. Every check resolves to a fresh `ServiceStatus`
 * that replaces the previous one in `status-bar.json`; failures become
 * `error` or `unhealthy` states, never rejections.
 */
export class StatusMonitor {
  private readonly store: StateStore;
  private readonly mux: Multiplexer;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly root: string;
  private readonly probes: Probes;
  private readonly matcher: LogPatternMatcher;
  private readonly now: () => Date;

  constructor(deps: StatusMonitorDeps) {
    this.store = deps.store;
    this.mux = deps.mux;
    this.config = deps.config;
    this.logger = deps.logger;
    this.root = deps.root;
    this.probes = deps.probes ?? defaultProbes;
    this.matcher = deps.matcher ?? new LogPatternMatcher(deps.config.server.patterns);
    this.now = deps.now ?? (() => new Date());
  }

  async startService(ticket: Ticket): Promise<ServiceStatus> {
    const current = (await this.readStatus(ticket)).bar.server;
    const window = await this.serverWindow(ticket);

    const pane = await this.mux.paneInfo(window);
    if (pane.ok && !pane.value.isDead && !isShellCommand(pane.value.currentCommand)) {
      return current;
    }

    const sent = await this.mux.sendKeys(window, this.config.server.command);
    const at = this.now().toISOString();
    const status: ServiceStatus = sent.ok
      ? { state: 'starting', startedAt: at, lastCheck: at }
      : { state: 'error', error: sent.error.message, lastCheck: at };
    await this.logger.info(`Starting server for ${ticket.id}: ${this.config.server.command}`);
    return this.record(ticket, 'server', status);
  }

  async stopService(ticket: Ticket): Promise<ServiceStatus> {
    const window = await this.mux.findWindow(ticket.session.name, SERVER_WINDOW);
    if (window.ok) {
      await this.mux.interrupt(window.value);
    }
    await this.logger.info(`Stopped server for ${ticket.id}`);
    return this.record(ticket, 'server', { state: 'stopped', lastCheck: this.now().toISOString() });
  }

  /**
   * Evaluate the dev server: pane liveness, then the log scrape, then an HTTP
   * probe bounded by `probeTimeoutMs`. While a start is within its grace
   * window, anything short of healthy or error reads as `starting`.
   */
  async checkHealth(ticket: Ticket): Promise<ServiceStatus> {
    try {
      const previous = (await this.readStatus(ticket)).bar.server;
      let next: ServiceStatus;
      try {
        next = await this.evaluateServer(ticket, previous);
      } catch (err) {
        next = { state: 'error', error: describeError(err), lastCheck: this.now().toISOString() };
      }
      return await this.recordCheck(ticket, previous, this.applyGrace(previous, next));
    } catch (err) {
      await this.logger.error(`Health check failed for ${ticket.id}`, err);
      return { state: 'error', error: describeError(err), lastCheck: this.now().toISOString() };
    }
  }

  async checkDatabase(ticket: Ticket): Promise<ServiceStatus> {
    try {
      return await this.record(ticket, 'database', await this.evaluateDatabase());
    } catch (err) {
      await this.logger.error(`Database check failed for ${ticket.id}`, err);
      return { state: 'error', error: describeError(err), lastCheck: this.now().toISOString() };
    }
  }

  async refreshResults(ticket: Ticket): Promise<ResultsUpdate> {
    const now = this.now();
    const [build, tests] = await Promise.all([
      readResultSummary(this.store, buildStatusPath(this.root, ticket.id), now),
      readResultSummary(this.store, testStatusPath(this.root, ticket.id), now),
    ]);
    await this.store.update(
      statusBarPath(this.root, ticket.id),
      statusBarSchema,
      () => initialStatusBar(now),
      (bar) => ({ ...bar, build, tests }),
    );
    return { build, tests };
  }

  /** Read-only view for front ends; a corrupt file is reported, not repaired. */
  async readStatus(ticket: Ticket): Promise<StatusView> {
    const result = await this.store.read(statusBarPath(this.root, ticket.id), statusBarSchema);
    switch (result.status) {
      case 'ok':
        return { bar: result.value, stale: result.stale, state: 'ok' };
      case 'not-found':
        return { bar: initialStatusBar(this.now()), stale: false, state: 'missing' };
      case 'corrupt':
        return { bar: initialStatusBar(this.now()), stale: true, state: 'corrupt' };
    }
  }

  private async evaluateServer(ticket: Ticket, previous: ServiceStatus): Promise<ServiceStatus> {
    const lastCheck = this.now().toISOString();
    if (previous.state === 'stopped') {
      return { state: 'stopped', lastCheck };
    }
    const startedAt = previous.startedAt;

    const window = await this.mux.findWindow(ticket.session.name, SERVER_WINDOW);
    if (!window.ok) return { state: 'error', error: window.error.message, lastCheck, startedAt };

    const pane = await this.mux.paneInfo(window.value);
    if (!pane.ok) return { state: 'error', error: pane.error.message, lastCheck, startedAt };
    if (pane.value.isDead || isShellCommand(pane.value.currentCommand)) {
      const code = pane.value.deadStatus;
      return code !== undefined && code !== 0
        ? { state: 'error', error: `exited with code ${code}`, lastCheck, startedAt }
        : { state: 'stopped', lastCheck, startedAt };
    }

    const output = await this.mux.capture(window.value, this.config.server.logLines);
    if (!output.ok) return { state: 'error', error: output.error.message, lastCheck, startedAt };

    const event = this.matcher.scan(output.value);
    if (event.kind === 'match' && event.tag === 'error') {
      return { state: 'error', error: event.line, lastCheck, startedAt };
    }

    const scrapedPort = event.kind === 'match' && event.value ? parseInt(event.value, 10) : undefined;
    const port = Number.isNaN(scrapedPort) ? undefined : scrapedPort;
    const url = this.config.server.healthUrl ?? (port ? `http://localhost:${port}` : undefined);
    if (!url) {
      return event.kind === 'match'
        ? { state: 'healthy', lastCheck, startedAt }
        : { state: 'unhealthy', error: 'no readiness signal', lastCheck, startedAt };
    }

    const probe = await this.probes.http(url, this.config.probeTimeoutMs);
    return { ...fromProbe(probe, lastCheck), url, port, startedAt };
  }

  private async evaluateDatabase(): Promise<ServiceStatus> {
    const lastCheck = this.now().toISOString();
    const { probeCommand, connectionString } = this.config.database;

    if (probeCommand) {
      return fromProbe(await this.probes.command(probeCommand, this.config.probeTimeoutMs), lastCheck);
    }
    if (!connectionString) {
      return { state: 'stopped', lastCheck };
    }

    const endpoint = parseEndpoint(connectionString);
    if (!endpoint) {
      return { state: 'error', error: 'unparsable connection string', lastCheck };
    }
    const probe = await this.probes.tcp(endpoint.host, endpoint.port, this.config.probeTimeoutMs);
    return { ...fromProbe(probe, lastCheck), url: `${endpoint.host}:${endpoint.port}`, port: endpoint.port };
  }

  private applyGrace(previous: ServiceStatus, next: ServiceStatus): ServiceStatus {
    if (previous.state !== 'starting' || !previous.startedAt) return next;
    if (next.state === 'healthy' || next.state === 'error') return next;

    const elapsed = this.now().getTime() - new Date(previous.startedAt).getTime();
    if (elapsed >= this.config.startupGraceMs) return next;
    return { state: 'starting', url: next.url, port: next.port, lastCheck: next.lastCheck, startedAt: previous.startedAt };
  }

  private async serverWindow(ticket: Ticket): Promise<WindowHandle> {
    const existing = await this.mux.findWindow(ticket.session.name, SERVER_WINDOW);
    if (existing.ok) return existing.value;

    const session = await this.mux.createSession(ticket.session.name, ticket.worktreePath);
    const windows = await this.mux.ensureWindows(session, [SERVER_WINDOW]);
    const created = windows.get(SERVER_WINDOW);
    if (!created) throw new WindowNotFoundError(session.name, SERVER_WINDOW);
    return created;
  }

  private async record(ticket: Ticket, service: ServiceName, status: ServiceStatus): Promise<ServiceStatus> {
    await this.store.update(
      statusBarPath(this.root, ticket.id),
      statusBarSchema,
      () => initialStatusBar(this.now()),
      (bar) => (service === 'server' ? { ...bar, server: status } : { ...bar, database: status }),
    );
    return status;
  }

  /**
   * Write a health verdict only if the server slot still holds the status it
   * was evaluated against. A start or stop recorded meanwhile wins and is
   * returned instead.
   */
  private async recordCheck(ticket: Ticket, previous: ServiceStatus, status: ServiceStatus): Promise<ServiceStatus> {
    let effective = status;
    await this.store.update(
      statusBarPath(this.root, ticket.id),
      statusBarSchema,
      () => initialStatusBar(this.now()),
      (bar) => {
        if (!sameStatus(bar.server, previous)) {
          effective = bar.server;
          return bar;
        }
        return { ...bar, server: status };
      },
    );
    return effective;
  }
}

function sameStatus(a: ServiceStatus, b: ServiceStatus): boolean {
  return a.state === b.state && a.startedAt === b.startedAt && a.lastCheck === b.lastCheck;
}

function fromProbe(probe: ProbeOutcome, lastCheck: string): ServiceStatus {
  switch (probe.kind) {
    case 'healthy':
      return { state: 'healthy', lastCheck };
    case 'unhealthy':
      return { state: 'unhealthy', error: probe.reason, lastCheck };
    case 'error':
      return { state: 'error', error: probe.reason, lastCheck };
  }
}
