import net from 'node:net';
import { execa, ExecaError } from 'execa';
import { withDeadline } from '../lib/deadline.js';
import { execaEnv } from '../lib/env.js';
import { hasErrnoCode } from '../lib/errors.js';
import { describeError } from '../lib/log.js';

export type ProbeOutcome =
  | { kind: 'healthy' }
  | { kind: 'unhealthy'; reason: string }
  | { kind: 'error'; reason: string };

/** Liveness probes used by the status monitor. None of them throws. */
export interface Probes {
  http(url: string, timeoutMs: number): Promise<ProbeOutcome>;
  tcp(host: string, port: number, timeoutMs: number): Promise<ProbeOutcome>;
  command(argv: readonly string[], timeoutMs: number): Promise<ProbeOutcome>;
}

const TIMEOUT: ProbeOutcome = { kind: 'unhealthy', reason: 'timeout' };

/** 2xx and 3xx are healthy; redirects are not followed. */
export async function probeHttp(
  url: string,
  timeoutMs: number,
  fetchImpl: typeof fetch = fetch,
): Promise<ProbeOutcome> {
  try {
    const outcome = await withDeadline(async (signal) => {
      const response = await fetchImpl(url, { signal, redirect: 'manual' });
      await response.body?.cancel();
      return response.status;
    }, timeoutMs);
    if (outcome.kind === 'timeout') return TIMEOUT;

    const status = outcome.value;
    return status >= 200 && status < 400
      ? { kind: 'healthy' }
      : { kind: 'unhealthy', reason: `HTTP ${status}` };
  } catch (err) {
    return { kind: 'unhealthy', reason: networkReason(err) };
  }
}

export async function probeTcp(host: string, port: number, timeoutMs: number): Promise<ProbeOutcome> {
  const outcome = await withDeadline((signal) => connect(host, port, signal), timeoutMs);
  return outcome.kind === 'timeout' ? TIMEOUT : outcome.value;
}

function connect(host: string, port: number, signal: AbortSignal): Promise<ProbeOutcome> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const finish = (outcome: ProbeOutcome) => {
      socket.destroy();
      resolve(outcome);
    };
    signal.addEventListener('abort', () => socket.destroy(), { once: true });
    socket.once('connect', () => finish({ kind: 'healthy' }));
    socket.once('error', (err) => finish({ kind: 'unhealthy', reason: networkReason(err) }));
  });
}

/**
 * Run a probe command such as `pg_isready`. Exit 0 is healthy; a missing
 * binary is an `error`, since no amount of waiting will fix it.
 */
export async function probeCommand(argv: readonly string[], timeoutMs: number): Promise<ProbeOutcome> {
  const [file, ...args] = argv;
  if (!file) return { kind: 'error', reason: 'empty probe command' };

  try {
    await execa(file, args, { ...execaEnv, timeout: timeoutMs, stdin: 'ignore' });
    return { kind: 'healthy' };
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) {
      return { kind: 'error', reason: `${file} is not installed or not in PATH` };
    }
    if (err instanceof ExecaError) {
      if (err.timedOut) return TIMEOUT;
      return { kind: 'unhealthy', reason: `${file} exited with code ${err.exitCode ?? 'unknown'}` };
    }
    return { kind: 'error', reason: describeError(err) };
  }
}

/** `fetch failed` says nothing; the errno of its cause does. */
function networkReason(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    if ('code' in err && typeof err.code === 'string') return err.code;
  }
  return describeError(err);
}

const DEFAULT_PORTS: Record<string, number> = {
  'postgres:': 5432,
  'postgresql:': 5432,
  'mysql:': 3306,
  'mariadb:': 3306,
  'redis:': 6379,
  'mongodb:': 27017,
};

export interface Endpoint {
  host: string;
  port: number;
}

/** Host and port of a database connection string; `null` when there is none to find. */
export function parseEndpoint(connectionString: string): Endpoint | null {
  const plain = /^([^:/\s]+):(\d+)$/.exec(connectionString.trim());
  if (plain?.[1] && plain[2]) {
    return { host: plain[1], port: parseInt(plain[2], 10) };
  }

  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    return null;
  }
  const port = url.port ? parseInt(url.port, 10) : DEFAULT_PORTS[url.protocol];
  if (!url.hostname || port === undefined) return null;
  return { host: url.hostname.replace(/^\[|\]$/g, ''), port };
}

export const defaultProbes: Probes = {
  http: (url, timeoutMs) => probeHttp(url, timeoutMs),
  tcp: probeTcp,
  command: probeCommand,
};
