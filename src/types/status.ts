import { z } from 'zod';

export const serviceStateSchema = z.enum(['stopped', 'starting', 'healthy', 'unhealthy', 'error']);

export type ServiceState = z.infer<typeof serviceStateSchema>;

export const serviceStatusSchema = z.object({
  state: serviceStateSchema,
  url: z.string().optional(),
  port: z.number().int().positive().optional(),
  error: z.string().optional(),
  lastCheck: z.string(),
  startedAt: z.string().optional(),
});

export type ServiceStatus = z.infer<typeof serviceStatusSchema>;

export type ServiceName = 'server' | 'database';

export const failureSchema = z.object({
  name: z.string(),
  message: z.string().default(''),
  file: z.string().optional(),
  line: z.number().int().optional(),
});

export type Failure = z.infer<typeof failureSchema>;

/**
 * Shape of `build-status.json` / `test-status.json`. Written by external
 * build and test tooling; every field is optional on disk.
 */
export const buildTestStatusSchema = z.object({
  passed: z.number().int().nonnegative().default(0),
  failed: z.number().int().nonnegative().default(0),
  skipped: z.number().int().nonnegative().default(0),
  durationSeconds: z.number().nonnegative().default(0),
  finishedAt: z.string().optional(),
  failures: z.array(failureSchema).default([]),
});

export type BuildTestStatus = z.infer<typeof buildTestStatusSchema>;

export const resultOutcomeSchema = z.enum(['passing', 'failing', 'unknown', 'missing', 'corrupt']);

export type ResultOutcome = z.infer<typeof resultOutcomeSchema>;

export const resultSummarySchema = z.object({
  file: z.string(),
  outcome: resultOutcomeSchema,
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  failures: z.array(failureSchema),
  finishedAt: z.string().optional(),
  stale: z.boolean(),
  checkedAt: z.string(),
});

export type ResultSummary = z.infer<typeof resultSummarySchema>;

export const statusBarSchema = z.object({
  server: serviceStatusSchema,
  database: serviceStatusSchema,
  build: resultSummarySchema.nullable(),
  tests: resultSummarySchema.nullable(),
});

export type StatusBar = z.infer<typeof statusBarSchema>;
