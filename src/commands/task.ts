import { createRuntime } from '../core/runtime.js';
import { parseTaskId, taskProgress, type TaskBoard } from '../core/tasks.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { formatProgress, formatTable, formatTaskStatus, output, success, warn, type Column } from '../lib/output.js';
import type { GlobalOptions } from '../types/common.js';
import { isTaskStatus, TASK_STATUSES, type Task } from '../types/task.js';

export interface TaskAddOptions extends GlobalOptions {
  blockedBy?: string;
  estimate?: string;
}

async function taskBoard(ticketId: string): Promise<TaskBoard> {
  const runtime = await createRuntime();
  // Ticket must exist; tasks.json lives in its directory
  await runtime.orchestrator.getTicket(ticketId);
  return runtime.tasks;
}

function report(task: Task, message: string, options: GlobalOptions): void {
  if (options.json) {
    output(task, true);
    return;
  }
  success(message);
}

export async function taskAddCommand(ticketId: string, description: string, options: TaskAddOptions): Promise<void> {
  const blockedBy = options.blockedBy === undefined ? undefined : parseTaskId(options.blockedBy);
  let estimatedMinutes: number | undefined;
  if (options.estimate !== undefined) {
    estimatedMinutes = Number(options.estimate);
    if (!Number.isInteger(estimatedMinutes) || estimatedMinutes < 1) {
      throw new InvalidArgumentError(`Invalid estimate '${options.estimate}'. Use whole minutes`);
    }
  }

  const tasks = await taskBoard(ticketId);
  const task = await tasks.add(ticketId, { description, blockedBy, estimatedMinutes });
  report(task, `Added task ${task.id} to ${ticketId}`, options);
}

const TASK_COLUMNS: Column<Task>[] = [
  { header: 'ID', value: (t) => String(t.id) },
  { header: 'Status', value: (t) => formatTaskStatus(t.status) },
  { header: 'Agent', value: (t) => t.assignedAgent ?? '-' },
  { header: 'Blocked by', value: (t) => (t.blockedBy === undefined ? '-' : String(t.blockedBy)) },
  { header: 'Description', value: (t) => t.description },
];

export async function taskListCommand(ticketId: string, options: GlobalOptions): Promise<void> {
  const tasks = await taskBoard(ticketId);
  const list = await tasks.list(ticketId);

  if (options.json) {
    output(list, true);
    return;
  }
  if (list.corrupt) warn(`tasks.json of ${ticketId} could not be read; see the log for the reason`);
  if (list.tasks.length === 0) {
    console.log(`No tasks. Add one with: tixmux task add ${ticketId} "..."`);
    return;
  }
  console.log(formatTable(list.tasks, TASK_COLUMNS));
  console.log(`\nProgress: ${formatProgress(taskProgress(list.tasks))}`);
}

export async function taskStatusCommand(ticketId: string, taskId: string, status: string, options: GlobalOptions): Promise<void> {
  if (!isTaskStatus(status)) {
    throw new InvalidArgumentError(`Unknown task status '${status}'. Use one of: ${TASK_STATUSES.join(', ')}`);
  }
  const id = parseTaskId(taskId);
  const tasks = await taskBoard(ticketId);
  const task = await tasks.setStatus(ticketId, id, status);
  report(task, `Task ${id} is now ${formatTaskStatus(task.status)}`, options);
}

export async function taskAssignCommand(
  ticketId: string,
  taskId: string,
  agentId: string | undefined,
  options: GlobalOptions,
): Promise<void> {
  const id = parseTaskId(taskId);
  const tasks = await taskBoard(ticketId);
  const task = await tasks.assign(ticketId, id, agentId);
  report(task, agentId ? `Assigned task ${id} to ${agentId}` : `Unassigned task ${id}`, options);
}

export async function taskBlockCommand(
  ticketId: string,
  taskId: string,
  blockedBy: string | undefined,
  options: GlobalOptions,
): Promise<void> {
  const id = parseTaskId(taskId);
  const dependency = blockedBy === undefined ? undefined : parseTaskId(blockedBy);
  const tasks = await taskBoard(ticketId);
  const task = await tasks.setBlockedBy(ticketId, id, dependency);
  report(task, dependency === undefined ? `Task ${id} no longer waits on another task` : `Task ${id} is blocked by ${dependency}`, options);
}

export async function taskRemoveCommand(ticketId: string, taskId: string, options: GlobalOptions): Promise<void> {
  const id = parseTaskId(taskId);
  const tasks = await taskBoard(ticketId);
  const task = await tasks.remove(ticketId, id);
  report(task, `Removed task ${id} from ${ticketId}`, options);
}
