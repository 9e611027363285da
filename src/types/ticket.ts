import { z } from 'zod';

export const TICKET_ROLES = ['agent', 'server', 'tests'] as const;

export type WindowRole = (typeof TICKET_ROLES)[number];

export function isWindowRole(value: string): value is WindowRole {
  return (TICKET_ROLES as readonly string[]).includes(value);
}

export const windowHandleSchema = z.object({
  session: z.string().min(1),
  name: z.string().min(1),
  index: z.number().int().nonnegative(),
  target: z.string().min(1),
});

export type WindowHandle = z.infer<typeof windowHandleSchema>;

export const ticketStatusSchema = z.enum(['active', 'complete', 'blocked', 'archived']);

export type TicketStatus = z.infer<typeof ticketStatusSchema>;

export const terminalSessionSchema = z.object({
  name: z.string().min(1),
  windows: z.object({
    agent: windowHandleSchema,
    server: windowHandleSchema,
    tests: windowHandleSchema,
  }),
});

export type TerminalSession = z.infer<typeof terminalSessionSchema>;

export const ticketSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  branch: z.string().min(1),
  worktreePath: z.string().min(1),
  status: ticketStatusSchema,
  session: terminalSessionSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  archivedAt: z.string().optional(),
});

export type Ticket = z.infer<typeof ticketSchema>;
