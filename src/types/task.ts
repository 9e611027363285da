import { z } from 'zod';

export const taskStatusSchema = z.enum(['not_started', 'in_progress', 'done', 'blocked']);

export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const TASK_STATUSES = taskStatusSchema.options;

export function isTaskStatus(value: string): value is TaskStatus {
  return taskStatusSchema.safeParse(value).success;
}

export const taskSchema = z.object({
  id: z.number().int().positive(),
  description: z.string().min(1),
  status: taskStatusSchema,
  /** Agent session working on the task. */
  assignedAgent: z.string().optional(),
  blockedBy: z.number().int().positive().optional(),
  estimatedMinutes: z.number().int().positive().optional(),
  createdAt: z.string(),
  completedAt: z.string().optional(),
});

export type Task = z.infer<typeof taskSchema>;

export const tasksFileSchema = z.object({
  tasks: z.array(taskSchema),
});

export type TasksFile = z.infer<typeof tasksFileSchema>;
