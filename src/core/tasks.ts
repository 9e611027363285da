import { InvalidArgumentError, TaskNotFoundError, TicketNotFoundError } from '../lib/errors.js';
import type { Logger } from '../lib/log.js';
import { isValidTicketId } from '../lib/name.js';
import { tasksPath } from '../lib/paths.js';
import { UNKNOWN_PROGRESS, type Progress } from '../types/agent.js';
import { tasksFileSchema, type Task, type TaskStatus } from '../types/task.js';
import type { StateStore } from './store.js';

export interface TaskBoardDeps {
  store: StateStore;
  logger: Logger;
  root: string;
  now?: () => Date;
}

export interface AddTaskInput {
  description: string;
  blockedBy?: number;
  estimatedMinutes?: number;
  assignedAgent?: string;
}

export interface TaskList {
  tasks: Task[];
  /** `tasks.json` exists but could not be read. */
  corrupt: boolean;
}

interface Mutation<T> {
  tasks: Task[];
  value: T;
}

/**
 * The planned work of a ticket, kept in `tasks.json`. Unlike the TODO
 * entries parsed from agent output, these are authored by the developer and
 * carry stable ids that agent sessions point at.
 */
export class TaskBoard {
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly root: string;
  private readonly now: () => Date;

  constructor(deps: TaskBoardDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.root = deps.root;
    this.now = deps.now ?? (() => new Date());
  }

  async list(ticketId: string): Promise<TaskList> {
    const file = this.path(ticketId);
    // Authored, not polled: never stale
    const result = await this.store.read(file, tasksFileSchema, { stalenessMs: Infinity });
    switch (result.status) {
      case 'ok':
        return { tasks: result.value.tasks, corrupt: false };
      case 'not-found':
        return { tasks: [], corrupt: false };
      case 'corrupt':
        await this.logger.warn(`Unreadable tasks file ${file}: ${result.reason}`);
        return { tasks: [], corrupt: true };
    }
  }

  async get(ticketId: string, taskId: number): Promise<Task> {
    const { tasks } = await this.list(ticketId);
    return findTask(tasks, ticketId, taskId);
  }

  async add(ticketId: string, input: AddTaskInput): Promise<Task> {
    const description = input.description.trim();
    if (!description) throw new InvalidArgumentError('Task description must not be empty');

    return this.mutate(ticketId, (tasks) => {
      const id = tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
      if (input.blockedBy !== undefined) {
        findTask(tasks, ticketId, input.blockedBy);
      }
      const task: Task = {
        id,
        description,
        status: input.blockedBy === undefined ? 'not_started' : 'blocked',
        assignedAgent: input.assignedAgent,
        blockedBy: input.blockedBy,
        estimatedMinutes: input.estimatedMinutes,
        createdAt: this.now().toISOString(),
      };
      return { tasks: [...tasks, task], value: task };
    });
  }

  /** `done` stamps `completedAt`; any other status clears it. */
  async setStatus(ticketId: string, taskId: number, status: TaskStatus): Promise<Task> {
    const completedAt = status === 'done' ? this.now().toISOString() : undefined;
    return this.mutateTask(ticketId, taskId, (task) => ({ ...task, status, completedAt }));
  }

  async assign(ticketId: string, taskId: number, agentId: string | undefined): Promise<Task> {
    return this.mutateTask(ticketId, taskId, (task) => ({ ...task, assignedAgent: agentId }));
  }

  /** Setting a dependency marks the task blocked; clearing it leaves the status alone. */
  async setBlockedBy(ticketId: string, taskId: number, blockedBy: number | undefined): Promise<Task> {
    return this.mutate(ticketId, (tasks) => {
      const task = findTask(tasks, ticketId, taskId);
      if (blockedBy !== undefined) {
        findTask(tasks, ticketId, blockedBy);
        if (createsCycle(tasks, taskId, blockedBy)) {
          throw new InvalidArgumentError(`Task ${taskId} cannot be blocked by ${blockedBy}: circular dependency`);
        }
      }
      const next: Task = blockedBy === undefined
        ? { ...task, blockedBy: undefined }
        : { ...task, blockedBy, status: 'blocked' };
      return { tasks: tasks.map((t) => (t.id === taskId ? next : t)), value: next };
    });
  }

  /** Remove a task; tasks it was blocking lose the dependency. Returns the removed task. */
  async remove(ticketId: string, taskId: number): Promise<Task> {
    return this.mutate(ticketId, (tasks) => {
      const task = findTask(tasks, ticketId, taskId);
      const rest = tasks
        .filter((t) => t.id !== taskId)
        .map((t) => (t.blockedBy === taskId ? { ...t, blockedBy: undefined } : t));
      return { tasks: rest, value: task };
    });
  }

  /** Hand a task to an agent session; an untouched task moves to `in_progress`. */
  async startWork(ticketId: string, taskId: number, agentId: string): Promise<Task> {
    return this.mutateTask(ticketId, taskId, (task) => ({
      ...task,
      assignedAgent: agentId,
      status: task.status === 'not_started' ? 'in_progress' : task.status,
    }));
  }

  /** Unassign every task held by an agent session. Returns the tasks released. */
  async releaseAgent(ticketId: string, agentId: string): Promise<Task[]> {
    const { tasks } = await this.list(ticketId);
    if (!tasks.some((t) => t.assignedAgent === agentId)) return [];

    return this.mutate(ticketId, (current) => {
      const released = current.filter((t) => t.assignedAgent === agentId);
      const next = current.map((t) => (t.assignedAgent === agentId ? { ...t, assignedAgent: undefined } : t));
      return { tasks: next, value: released.map((t) => ({ ...t, assignedAgent: undefined })) };
    });
  }

  private async mutateTask(ticketId: string, taskId: number, fn: (task: Task) => Task): Promise<Task> {
    return this.mutate(ticketId, (tasks) => {
      const next = fn(findTask(tasks, ticketId, taskId));
      return { tasks: tasks.map((t) => (t.id === taskId ? next : t)), value: next };
    });
  }

  private async mutate<T>(ticketId: string, fn: (tasks: Task[]) => Mutation<T>): Promise<T> {
    const file = this.path(ticketId);
    return this.store.withLock(file, async () => {
      const current = await this.store.readOrDefault(file, tasksFileSchema, () => ({ tasks: [] }));
      const { tasks, value } = fn(current.tasks);
      await this.store.write(file, { tasks });
      return value;
    });
  }

  private path(ticketId: string): string {
    if (!isValidTicketId(ticketId)) throw new TicketNotFoundError(ticketId);
    return tasksPath(this.root, ticketId);
  }
}

function findTask(tasks: readonly Task[], ticketId: string, taskId: number): Task {
  const task = tasks.find((t) => t.id === taskId);
  if (!task) throw new TaskNotFoundError(ticketId, taskId);
  return task;
}

/** Would `taskId` waiting on `blockedBy` close a loop in the dependency chain? */
function createsCycle(tasks: readonly Task[], taskId: number, blockedBy: number): boolean {
  const seen = new Set<number>();
  let current: number | undefined = blockedBy;
  while (current !== undefined) {
    if (current === taskId || seen.has(current)) return true;
    seen.add(current);
    const id: number = current;
    current = tasks.find((t) => t.id === id)?.blockedBy;
  }
  return false;
}

/** Share of tasks done, rounded like agent progress; `'unknown'` without tasks. */
export function taskProgress(tasks: readonly Task[]): Progress {
  if (tasks.length === 0) return UNKNOWN_PROGRESS;
  const done = tasks.filter((t) => t.status === 'done').length;
  return Math.round((done / tasks.length) * 100);
}

/** Task ids are positive integers; CLI arguments and `todoId` arrive as text. */
export function parseTaskId(raw: string): number {
  const id = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(id) || id < 1) {
    throw new InvalidArgumentError(`Invalid task id '${raw}'. Task ids are positive integers`);
  }
  return id;
}
