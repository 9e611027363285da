import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import lockfile from 'proper-lockfile';
import writeFileAtomic from 'write-file-atomic';
import { hasErrnoCode, StateLockError } from '../lib/errors.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import { describeError, type Logger } from '../lib/log.js';
import { isRecord, type Schema } from '../types/common.js';

export type ReadResult<T> =
  | { status: 'ok'; value: T; writtenAt: Date; stale: boolean }
  | { status: 'not-found' }
  | { status: 'corrupt'; reason: string };

export interface ReadOptions {
  /** Overrides the store default. `Infinity` disables staleness. */
  stalenessMs?: number;
}

export interface LockSettings {
  staleMs: number;
  retries: number;
}

export interface StateStoreOptions {
  logger: Logger;
  stalenessMs?: number;
  lock?: LockSettings;
  now?: () => Date;
}

const DEFAULT_STALENESS_MS = 10_000;
const DEFAULT_LOCK: LockSettings = { staleMs: 10_000, retries: 10 };

/**
 * Crash-safe record storage shared by every tixmux process.
 *
 * Records are written as `{ writtenAt, data }` envelopes through a same-dir
 * temp file and rename, so a reader only ever sees a whole old file or a whole
 * new one. Files dropped by external tools may be bare records; their write
 * time is the file mtime.
 */
export class StateStore {
  private readonly logger: Logger;
  private readonly stalenessMs: number;
  private readonly lock: LockSettings;
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();

  constructor(options: StateStoreOptions) {
    this.logger = options.logger;
    this.stalenessMs = options.stalenessMs ?? DEFAULT_STALENESS_MS;
    this.lock = options.lock ?? DEFAULT_LOCK;
    this.now = options.now ?? (() => new Date());
  }

  async read<T>(filePath: string, schema: Schema<T>, options: ReadOptions = {}): Promise<ReadResult<T>> {
    let raw: string;
    let mtime: Date;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
      mtime = (await fs.stat(filePath)).mtime;
    } catch (err) {
      if (hasErrnoCode(err, 'ENOENT')) return { status: 'not-found' };
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = parseText(filePath, raw);
    } catch (err) {
      return { status: 'corrupt', reason: `unparsable: ${describeError(err)}` };
    }

    const unwrapped = unwrap(parsed, mtime);
    if (!unwrapped) {
      return { status: 'corrupt', reason: 'invalid writtenAt timestamp' };
    }

    const result = schema.safeParse(unwrapped.data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return { status: 'corrupt', reason: `schema mismatch: ${where}${issue?.message ?? 'invalid'}` };
    }

    const threshold = options.stalenessMs ?? this.stalenessMs;
    const age = this.now().getTime() - unwrapped.writtenAt.getTime();
    return {
      status: 'ok',
      value: result.data,
      writtenAt: unwrapped.writtenAt,
      stale: age > threshold,
    };
  }

  /**
   * Read a record, falling back when it is missing or corrupt. A corrupt file
   * is moved aside to `<file>.corrupt` so the next write starts clean.
   */
  async readOrDefault<T>(filePath: string, schema: Schema<T>, fallback: () => T): Promise<T> {
    const result = await this.read(filePath, schema, { stalenessMs: Infinity });
    if (result.status === 'ok') return result.value;

    if (result.status === 'corrupt') {
      await this.logger.warn(`Corrupt state file ${filePath} (${result.reason}); using defaults`);
      await this.quarantine(filePath);
    }
    return fallback();
  }

  async write<T>(filePath: string, value: T): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const envelope = { writtenAt: this.now().toISOString(), data: value };
    const text = isYamlPath(filePath)
      ? YAML.stringify(envelope)
      : JSON.stringify(envelope, null, 2) + '\n';
    await writeFileAtomic(filePath, text);
  }

  /** Run `fn` holding both the in-process mutex and the cross-process lock on `filePath`. */
  async withLock<R>(filePath: string, fn: () => Promise<R>): Promise<R> {
    return this.mutex.run(filePath, async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });

      let release: () => Promise<void>;
      try {
        release = await lockfile.lock(filePath, {
          realpath: false,
          stale: this.lock.staleMs,
          retries: {
            retries: this.lock.retries,
            minTimeout: 50,
            maxTimeout: 1000,
          },
        });
      } catch {
        throw new StateLockError(filePath);
      }

      try {
        return await fn();
      } finally {
        await release();
      }
    });
  }

  async update<T>(
    filePath: string,
    schema: Schema<T>,
    fallback: () => T,
    updater: (current: T) => T | Promise<T>,
  ): Promise<T> {
    return this.withLock(filePath, async () => {
      const current = await this.readOrDefault(filePath, schema, fallback);
      const next = await updater(current);
      await this.write(filePath, next);
      return next;
    });
  }

  private async quarantine(filePath: string): Promise<void> {
    try {
      await fs.rename(filePath, `${filePath}.corrupt`);
    } catch (err) {
      await this.logger.error(`Could not move aside ${filePath}`, err);
    }
  }
}

function isYamlPath(filePath: string): boolean {
  return /\.ya?ml$/i.test(filePath);
}

function parseText(filePath: string, raw: string): unknown {
  return isYamlPath(filePath) ? YAML.parse(raw) : JSON.parse(raw);
}

function unwrap(parsed: unknown, mtime: Date): { data: unknown; writtenAt: Date } | null {
  if (isRecord(parsed) && typeof parsed.writtenAt === 'string' && 'data' in parsed) {
    const writtenAt = new Date(parsed.writtenAt);
    if (Number.isNaN(writtenAt.getTime())) return null;
    return { data: parsed.data, writtenAt };
  }
  return { data: parsed, writtenAt: mtime };
}
