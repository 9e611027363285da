import { z } from 'zod';
import { windowHandleSchema } from './ticket.js';

export const todoEntrySchema = z.object({
  text: z.string(),
  completed: z.boolean(),
  blocked: z.boolean(),
});

export type TodoEntry = z.infer<typeof todoEntrySchema>;

export const UNKNOWN_PROGRESS = 'unknown';

export const progressSchema = z.union([
  z.number().int().min(0).max(100),
  z.literal(UNKNOWN_PROGRESS),
]);

/** Percent complete, or `'unknown'` when there is nothing to measure. */
export type Progress = z.infer<typeof progressSchema>;

export const agentSessionStatusSchema = z.enum(['idle', 'working', 'waiting', 'completed', 'error']);

export type AgentSessionStatus = z.infer<typeof agentSessionStatusSchema>;

export const agentSessionSchema = z.object({
  id: z.string().min(1),
  ticketId: z.string().min(1),
  todoId: z.string().optional(),
  title: z.string(),
  status: agentSessionStatusSchema,
  todos: z.array(todoEntrySchema),
  progressPercent: progressSchema,
  // Weak reference: the window may vanish underneath us.
  window: windowHandleSchema,
  prompt: z.string().optional(),
  error: z.string().optional(),
  startedAt: z.string(),
  lastActive: z.string(),
});

export type AgentSession = z.infer<typeof agentSessionSchema>;

export const agentSessionsFileSchema = z.object({
  sessions: z.array(agentSessionSchema),
});

export type AgentSessionsFile = z.infer<typeof agentSessionsFileSchema>;
