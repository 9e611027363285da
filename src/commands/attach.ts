import { createInterface } from 'node:readline/promises';
import { execa } from 'execa';
import { createRuntime } from '../core/runtime.js';
import type { SessionOrchestrator } from '../core/orchestrator.js';
import { execaEnv } from '../lib/env.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { info, success } from '../lib/output.js';
import { isWindowRole, TICKET_ROLES, type WindowHandle, type WindowRole } from '../types/ticket.js';

export type Confirm = (question: string) => Promise<boolean>;

export interface AttachOptions {
  /** Recreate a missing window without asking. */
  yes?: boolean;
}

export async function attachCommand(ticketId: string, role: string | undefined, options: AttachOptions): Promise<void> {
  const windowRole = role ?? 'agent';
  if (!isWindowRole(windowRole)) {
    throw new InvalidArgumentError(`Unknown window '${windowRole}'. Use one of: ${TICKET_ROLES.join(', ')}`);
  }

  const { orchestrator, mux } = await createRuntime();
  const confirm: Confirm = options.yes ? async () => true : askYesNo;
  const window = await attachWithRecovery(orchestrator, ticketId, windowRole, confirm);

  if (mux.isInsideSession()) {
    info(`Switched to ${window.target}`);
    return;
  }
  // Interactive client: runs until the user detaches
  await execa('tmux', ['attach-session', '-t', window.target], { ...execaEnv, stdio: 'inherit' });
}

/**
 * Focus a ticket window; when it was closed outside tixmux, offer to recreate
 * the ticket's windows and try once more.
 */
export async function attachWithRecovery(
  orchestrator: Pick<SessionOrchestrator, 'attachWindow' | 'recreateWindows'>,
  ticketId: string,
  role: WindowRole,
  confirm: Confirm,
): Promise<WindowHandle> {
  const first = await orchestrator.attachWindow(ticketId, role);
  if (first.ok) return first.value;

  const recreate = await confirm(`Window '${role}' of ${ticketId} no longer exists. Recreate it? [y/N] `);
  if (!recreate) throw first.error;

  await orchestrator.recreateWindows(ticketId);
  success(`Recreated windows for ${ticketId}`);
  const second = await orchestrator.attachWindow(ticketId, role);
  if (!second.ok) throw second.error;
  return second.value;
}

async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
