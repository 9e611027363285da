import { stripAnsi } from '../lib/ansi.js';
import type { Config } from '../types/config.js';
import { UNKNOWN_PROGRESS, type Progress, type TodoEntry } from '../types/agent.js';
import { compilePattern, DEFAULT_CONFIG } from './config.js';

export type TodoFamily = 'completed' | 'blocked' | 'pending';

export type TodoParserOptions = Partial<Pick<Config['todo'], TodoFamily | 'sectionHeaders' | 'minTextLength'>>;

// Blocked before pending: a `[!]` line would otherwise hit the bullet fallback
const FAMILY_ORDER: readonly TodoFamily[] = ['completed', 'blocked', 'pending'];

interface FamilyPattern {
  family: TodoFamily;
  regex: RegExp;
}

/**
 * Extracts TODO entries from free-form agent output.
 *
 * Families not given in the options have no patterns at all, so a parser built
 * with only `completed` and `pending` never reports a blocked entry. Use
 * {@link TodoParser.fromConfig} for the configured defaults.
 */
export class TodoParser {
  private readonly patterns: FamilyPattern[];
  private readonly headers: RegExp[];
  private readonly minTextLength: number;

  constructor(options: TodoParserOptions) {
    this.patterns = FAMILY_ORDER.flatMap((family) =>
      (options[family] ?? []).map((p) => ({ family, regex: compilePattern(p, `todo.${family}`) })),
    );
    this.headers = (options.sectionHeaders ?? []).map((p) => compilePattern(p, 'todo.sectionHeaders'));
    this.minTextLength = options.minTextLength ?? 1;
  }

  static fromConfig(todo: Config['todo'] = DEFAULT_CONFIG.todo): TodoParser {
    return new TodoParser(todo);
  }

  parse(text: string): TodoEntry[] {
    const entries: TodoEntry[] = [];
    for (const line of this.section(stripAnsi(text).split('\n'))) {
      const entry = this.parseLine(line.trim());
      if (entry) entries.push(entry);
    }
    return entries;
  }

  private parseLine(line: string): TodoEntry | null {
    if (!line) return null;
    for (const { family, regex } of this.patterns) {
      const m = regex.exec(line);
      if (!m) continue;
      const text = (m[1] ?? line.slice(m.index + m[0].length)).trim();
      // Too short to be a task; a later pattern may still capture more
      if (text.length < this.minTextLength) continue;
      return { text, completed: family === 'completed', blocked: family === 'blocked' };
    }
    return null;
  }

  /** Lines after the first section header up to the next markdown header, or everything. */
  private section(lines: string[]): string[] {
    const start = lines.findIndex((line) => this.headers.some((h) => h.test(line.trim())));
    if (start === -1) return lines;

    const rest = lines.slice(start + 1);
    const end = rest.findIndex((line) => line.trim().startsWith('#'));
    return end === -1 ? rest : rest.slice(0, end);
  }
}

/**
 * Percent of entries completed, rounded half up (2 of 3 is 67, not a
 * truncated 66); `'unknown'` for an empty list.
 */
export function computeProgress(entries: readonly TodoEntry[]): Progress {
  if (entries.length === 0) return UNKNOWN_PROGRESS;
  const completed = entries.filter((e) => e.completed).length;
  return Math.round((completed / entries.length) * 100);
}
