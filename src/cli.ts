#!/usr/bin/env node
import { Command } from 'commander';
import { TixError } from './lib/errors.js';
import { outputError } from './lib/output.js';

const program = new Command();

program
  .name('tixmux')
  .description('Ticket-oriented tmux orchestrator: worktrees, agent sessions and service health')
  .version('0.1.0');

program
  .command('init')
  .description('Create the control directory and a default config.yaml')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { initCommand } = await import('./commands/init.js');
    await initCommand(options);
  });

program
  .command('config')
  .description('Print the effective configuration')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { configCommand } = await import('./commands/config.js');
    await configCommand(options);
  });

program
  .command('create')
  .description('Create a ticket: branch, worktree and tmux session with agent/server/tests windows')
  .argument('<id>', 'Ticket id, e.g. IN-413')
  .option('-t, --title <title>', 'Ticket title (also used for the branch slug)')
  .option('-b, --branch <branch>', 'Branch name (default: feature/<id>-<title-slug>)')
  .option('--base <ref>', 'Start point for a new branch')
  .option('-w, --worktree <path>', 'Worktree path (default: <worktreeBase>/<branch>)')
  .option('--json', 'Output as JSON')
  .action(async (id, options) => {
    const { createCommand } = await import('./commands/create.js');
    await createCommand(id, options);
  });

program
  .command('list')
  .description('List tickets')
  .option('-a, --all', 'Include archived tickets')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(options);
  });

program
  .command('status')
  .description('Show service health, results and agent progress')
  .argument('[ticket]', 'Ticket id (default: all active tickets)')
  .option('-r, --refresh', 'Run the checks once before printing')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { statusCommand } = await import('./commands/status.js');
    await statusCommand(ticket, options);
  });

program
  .command('attach')
  .description('Focus a ticket window (agent, server or tests)')
  .argument('<ticket>', 'Ticket id')
  .argument('[window]', 'Window: agent, server or tests', 'agent')
  .option('-y, --yes', 'Recreate a missing window without asking')
  .action(async (ticket, window, options) => {
    const { attachCommand } = await import('./commands/attach.js');
    await attachCommand(ticket, window, options);
  });

program
  .command('mark')
  .description('Set a ticket status')
  .argument('<ticket>', 'Ticket id')
  .argument('<status>', 'active, complete or blocked')
  .option('--json', 'Output as JSON')
  .action(async (ticket, status, options) => {
    const { markCommand } = await import('./commands/mark.js');
    await markCommand(ticket, status, options);
  });

program
  .command('archive')
  .description('Archive a ticket and close its tmux session (worktree is kept)')
  .argument('<ticket>', 'Ticket id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { archiveCommand } = await import('./commands/archive.js');
    await archiveCommand(ticket, options);
  });

const agent = program.command('agent').description('Manage AI agent sessions of a ticket');

agent
  .command('start')
  .description('Start an agent session in its own window')
  .argument('<ticket>', 'Ticket id')
  .option('-p, --prompt <text>', 'Prompt text for the agent')
  .option('-f, --prompt-file <path>', 'File containing the prompt')
  .option('--todo <id>', 'Task this session works on (see tixmux task list)')
  .option('-t, --title <title>', 'Session title (default: first line of the prompt)')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { agentStartCommand } = await import('./commands/agent.js');
    await agentStartCommand(ticket, options);
  });

agent
  .command('list')
  .description('List agent sessions with their progress')
  .argument('<ticket>', 'Ticket id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { agentListCommand } = await import('./commands/agent.js');
    await agentListCommand(ticket, options);
  });

agent
  .command('sample')
  .description('Capture an agent window now and re-parse its TODO list')
  .argument('<ticket>', 'Ticket id')
  .argument('<session>', 'Agent session id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, session, options) => {
    const { agentSampleCommand } = await import('./commands/agent.js');
    await agentSampleCommand(ticket, session, options);
  });

agent
  .command('archive')
  .description('Remove an agent session and close its window')
  .argument('<ticket>', 'Ticket id')
  .argument('<session>', 'Agent session id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, session, options) => {
    const { agentArchiveCommand } = await import('./commands/agent.js');
    await agentArchiveCommand(ticket, session, options);
  });

const task = program.command('task').description('Manage the planned tasks of a ticket');

task
  .command('add')
  .description('Add a task')
  .argument('<ticket>', 'Ticket id')
  .argument('<description>', 'What needs doing')
  .option('-b, --blocked-by <id>', 'Task this one waits on')
  .option('-e, --estimate <minutes>', 'Estimated minutes')
  .option('--json', 'Output as JSON')
  .action(async (ticket, description, options) => {
    const { taskAddCommand } = await import('./commands/task.js');
    await taskAddCommand(ticket, description, options);
  });

task
  .command('list')
  .description('List tasks with their status and assignment')
  .argument('<ticket>', 'Ticket id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { taskListCommand } = await import('./commands/task.js');
    await taskListCommand(ticket, options);
  });

task
  .command('status')
  .description('Set a task status')
  .argument('<ticket>', 'Ticket id')
  .argument('<id>', 'Task id')
  .argument('<status>', 'not_started, in_progress, done or blocked')
  .option('--json', 'Output as JSON')
  .action(async (ticket, id, status, options) => {
    const { taskStatusCommand } = await import('./commands/task.js');
    await taskStatusCommand(ticket, id, status, options);
  });

task
  .command('assign')
  .description('Assign a task to an agent session (omit the session to unassign)')
  .argument('<ticket>', 'Ticket id')
  .argument('<id>', 'Task id')
  .argument('[session]', 'Agent session id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, id, session, options) => {
    const { taskAssignCommand } = await import('./commands/task.js');
    await taskAssignCommand(ticket, id, session, options);
  });

task
  .command('block')
  .description('Make a task wait on another (omit the other to clear)')
  .argument('<ticket>', 'Ticket id')
  .argument('<id>', 'Task id')
  .argument('[blocked-by]', 'Task it waits on')
  .option('--json', 'Output as JSON')
  .action(async (ticket, id, blockedBy, options) => {
    const { taskBlockCommand } = await import('./commands/task.js');
    await taskBlockCommand(ticket, id, blockedBy, options);
  });

task
  .command('remove')
  .description('Remove a task; tasks waiting on it lose the dependency')
  .argument('<ticket>', 'Ticket id')
  .argument('<id>', 'Task id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, id, options) => {
    const { taskRemoveCommand } = await import('./commands/task.js');
    await taskRemoveCommand(ticket, id, options);
  });

const server = program.command('server').description('Control and check the dev server of a ticket');

server
  .command('start')
  .description('Run server.command in the server window')
  .argument('<ticket>', 'Ticket id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { serverStartCommand } = await import('./commands/server.js');
    await serverStartCommand(ticket, options);
  });

server
  .command('stop')
  .description('Interrupt the server window')
  .argument('<ticket>', 'Ticket id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { serverStopCommand } = await import('./commands/server.js');
    await serverStopCommand(ticket, options);
  });

server
  .command('check')
  .description('Check server health, database and build/test results once')
  .argument('<ticket>', 'Ticket id')
  .option('--json', 'Output as JSON')
  .action(async (ticket, options) => {
    const { serverCheckCommand } = await import('./commands/server.js');
    await serverCheckCommand(ticket, options);
  });

program
  .command('watch')
  .description('Poll every ticket and redraw the dashboard until Ctrl-C')
  .option('-v, --verbose', 'Echo log lines instead of clearing the screen')
  .action(async (options) => {
    const { watchCommand } = await import('./commands/watch.js');
    await watchCommand(options);
  });

program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const json = process.argv.includes('--json');
    if (err instanceof TixError) {
      outputError(err, json);
      process.exit(err.exitCode);
    }
    if (err instanceof Error && 'code' in err) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version' || err.code === 'commander.help') {
        process.exit(0);
      }
      if (typeof err.code === 'string' && err.code.startsWith('commander.')) {
        process.exit(1);
      }
    }
    outputError(err, json);
    process.exit(1);
  }
}

void main();
