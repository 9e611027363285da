import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigurationError, hasErrnoCode } from '../lib/errors.js';
import { configPath } from '../lib/paths.js';
import { isRecord } from '../types/common.js';
import { configSchema, type Config, type LogPattern } from '../types/config.js';

export const DEFAULT_LOG_PATTERNS: LogPattern[] = [
  { tag: 'ready', pattern: 'Server listening on.*:(\\d+)' },
  { tag: 'ready', pattern: 'Ready on https?://.*:(\\d+)' },
  { tag: 'ready', pattern: 'Listening (?:at|on).*:(\\d+)' },
  { tag: 'ready', pattern: 'Started server on.*:(\\d+)' },
  { tag: 'ready', pattern: 'Serving on https?://.*:(\\d+)' },
  { tag: 'ready', pattern: 'Local:\\s+https?://[^\\s:]+:(\\d+)' },
  { tag: 'error', pattern: '^ERROR' },
  { tag: 'error', pattern: 'EADDRINUSE' },
  { tag: 'error', pattern: 'Fatal' },
  { tag: 'error', pattern: 'uncaughtException' },
  { tag: 'error', pattern: 'EACCES' },
];

export const DEFAULT_CONFIG: Config = {
  sessionPrefix: 'tix-',
  worktreeBase: '~/code/worktrees',
  pollIntervalMs: 3000,
  stalenessMs: 10_000,
  probeTimeoutMs: 2000,
  startupGraceMs: 30_000,
  tmuxTimeoutMs: 5000,
  server: {
    command: 'npm run dev',
    logLines: 200,
  },
  database: {},
  agent: {
    command: 'claude',
    sampleLines: 200,
    waitingPatterns: [
      'Do you want to',
      '\\(y/n\\)',
      '\\[Y/n\\]',
      'Esc to cancel',
      'waiting for (?:your )?input',
    ],
  },
  todo: {
    // Lines are trimmed before matching; the last pending entry is the plain-bullet fallback
    completed: [
      '^(?:⎿\\s*)?[✓✅✔☒]\\s+(.+)$',
      '^(?:[-*]\\s+)?\\[x\\]\\s+(.+)$',
    ],
    blocked: [
      '^(?:⎿\\s*)?[✗❌]\\s+(.+)$',
      '^(?:[-*]\\s+)?\\[!\\]\\s+(.+)$',
    ],
    pending: [
      '^(?:[-*]\\s+)?\\[ \\]\\s+(.+)$',
      '^(?:⎿\\s*)?[☐◐⚬○]\\s+(.+)$',
      '^[-*]\\s+(.+)$',
    ],
    sectionHeaders: [
      '^#+\\s*TODO',
      '^#+\\s*Tasks?',
      '^#+\\s*Plan',
      '^TODO:',
      '^Tasks?:',
      '^Plan:',
      '^\\*\\*TODO\\*\\*',
      '^\\*\\*Tasks?\\*\\*',
      '^\\*\\*Plan\\*\\*',
    ],
    minTextLength: 3,
  },
  lock: {
    staleMs: 10_000,
    retries: 10,
  },
};

const SECTIONS = ['server', 'database', 'agent', 'todo', 'lock'] as const;

/**
 * Load `config.yaml` from the control directory, merged over the defaults.
 * A missing file yields the defaults; anything unusable is a `ConfigurationError`.
 */
export async function loadConfig(root: string): Promise<Config> {
  const cfgPath = configPath(root);
  let raw: string;
  try {
    raw = await fs.readFile(cfgPath, 'utf-8');
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return DEFAULT_CONFIG;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${cfgPath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveConfig(parsed ?? {});
}

/** Merge raw overrides over the defaults and validate the result. */
export function resolveConfig(overrides: unknown): Config {
  if (!isRecord(overrides)) {
    throw new ConfigurationError('config.yaml must contain a mapping');
  }

  const result = configSchema.safeParse(mergeConfig(DEFAULT_CONFIG, overrides));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigurationError(`${where}: ${issue?.message ?? 'invalid value'}`);
  }
  assertPatternsCompile(result.data);
  return result.data;
}

function mergeConfig(defaults: Config, overrides: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults, ...overrides };
  for (const key of SECTIONS) {
    const section = overrides[key];
    if (isRecord(section)) {
      merged[key] = { ...defaults[key], ...section };
    }
  }
  return merged;
}

function assertPatternsCompile(config: Config): void {
  const groups: Array<[string, string[]]> = [
    ['server.patterns', (config.server.patterns ?? []).map((p) => p.pattern)],
    ['agent.waitingPatterns', config.agent.waitingPatterns],
    ['todo.completed', config.todo.completed],
    ['todo.blocked', config.todo.blocked],
    ['todo.pending', config.todo.pending],
    ['todo.sectionHeaders', config.todo.sectionHeaders],
  ];
  for (const [where, patterns] of groups) {
    for (const pattern of patterns) {
      compilePattern(pattern, where);
    }
  }
}

/** Compile a case-insensitive pattern, reporting a bad one as a configuration error. */
export function compilePattern(pattern: string, where: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    throw new ConfigurationError(`${where}: invalid regular expression /${pattern}/`);
  }
}

/** Write the defaults to `config.yaml`. Returns false when a config already exists. */
export async function writeDefaultConfig(root: string): Promise<boolean> {
  const cfgPath = configPath(root);
  await fs.mkdir(path.dirname(cfgPath), { recursive: true });
  const content = YAML.stringify({ ...DEFAULT_CONFIG, server: { ...DEFAULT_CONFIG.server, patterns: DEFAULT_LOG_PATTERNS } }, { indent: 2 });
  try {
    await fs.writeFile(cfgPath, content, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (err) {
    if (hasErrnoCode(err, 'EEXIST')) return false;
    throw err;
  }
}
