import { z } from 'zod';

export const logPatternSchema = z.object({
  tag: z.enum(['ready', 'error']),
  pattern: z.string().min(1),
});

export type LogPattern = z.infer<typeof logPatternSchema>;

const positiveMs = z.number().int().positive();

export const configSchema = z.object({
  sessionPrefix: z.string(),
  worktreeBase: z.string().min(1),
  repoPath: z.string().min(1).optional(),
  pollIntervalMs: positiveMs,
  stalenessMs: positiveMs,
  probeTimeoutMs: positiveMs,
  startupGraceMs: z.number().int().nonnegative(),
  tmuxTimeoutMs: positiveMs,
  server: z.object({
    command: z.string().min(1),
    healthUrl: z.string().url().optional(),
    logLines: positiveMs,
    patterns: z.array(logPatternSchema).optional(),
  }),
  database: z.object({
    connectionString: z.string().min(1).optional(),
    probeCommand: z.array(z.string().min(1)).min(1).optional(),
  }),
  agent: z.object({
    command: z.string().min(1),
    promptFlag: z.string().optional(),
    sampleLines: positiveMs,
    waitingPatterns: z.array(z.string()),
  }),
  todo: z.object({
    completed: z.array(z.string()),
    blocked: z.array(z.string()),
    pending: z.array(z.string()),
    sectionHeaders: z.array(z.string()),
    minTextLength: z.number().int().positive(),
  }),
  lock: z.object({
    staleMs: z.number().int().min(5000),
    retries: z.number().int().nonnegative(),
  }),
});

export type Config = z.infer<typeof configSchema>;
