import { stripAnsi } from '../lib/ansi.js';
import type { LogPattern } from '../types/config.js';
import { compilePattern, DEFAULT_LOG_PATTERNS } from './config.js';

export type LogTag = LogPattern['tag'];

export type LogMatch =
  | { kind: 'match'; tag: LogTag; value?: string; pattern: string; line: string }
  | { kind: 'no-match' };

interface CompiledPattern {
  tag: LogTag;
  source: string;
  regex: RegExp;
}

/**
 * Classifies server log lines against an ordered list of tagged patterns.
 * The first pattern in declaration order wins; `value` is capture group 1
 * (a port, for the default ready patterns).
 */
export class LogPatternMatcher {
  private readonly patterns: CompiledPattern[];

  constructor(patterns: readonly LogPattern[] = DEFAULT_LOG_PATTERNS) {
    this.patterns = patterns.map((p, i) => ({
      tag: p.tag,
      source: p.pattern,
      regex: compilePattern(p.pattern, `server.patterns[${i}]`),
    }));
  }

  match(line: string): LogMatch {
    for (const p of this.patterns) {
      const m = p.regex.exec(line);
      if (m) {
        return { kind: 'match', tag: p.tag, value: m[1], pattern: p.source, line: line.trim() };
      }
    }
    return { kind: 'no-match' };
  }

  /** Most recent event in a block of captured output. */
  scan(text: string): LogMatch {
    const lines = stripAnsi(text).split('\n');
    for (let i = lines.length - 1; i >= 0; i--) {
      const result = this.match(lines[i] ?? '');
      if (result.kind === 'match') return result;
    }
    return { kind: 'no-match' };
  }
}
