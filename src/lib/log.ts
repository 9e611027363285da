import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string, err?: unknown): Promise<void>;
}

export interface FileLoggerOptions {
  /** Also write each line to stdout (visible when running inside a tmux pane). */
  echo?: boolean;
  now?: () => Date;
}

export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  return `[${at.toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}\n`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createFileLogger(logFile: string, options: FileLoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());

  async function append(level: LogLevel, message: string): Promise<void> {
    const line = formatLogLine(level, message, now());
    if (options.echo) {
      process.stdout.write(line);
    }
    try {
      await fs.appendFile(logFile, line, 'utf-8');
    } catch {
      // Log dir may not exist yet on first call
      try {
        await fs.mkdir(path.dirname(logFile), { recursive: true });
        await fs.appendFile(logFile, line, 'utf-8');
      } catch (err) {
        process.stderr.write(`tixmux: cannot write ${logFile}: ${describeError(err)}\n${line}`);
      }
    }
  }

  return {
    info: (message) => append('info', message),
    warn: (message) => append('warn', message),
    error: (message, err) => append('error', err === undefined ? message : `${message}: ${describeError(err)}`),
  };
}
