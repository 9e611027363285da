export { createRuntime, type Runtime, type RuntimeOptions, type SchedulerHooks } from './core/runtime.js';
export {
  SessionOrchestrator,
  type AgentSessionList,
  type CreateTicketInput,
  type ListTicketsOptions,
  type OrchestratorDeps,
  type SettableTicketStatus,
  type StartAgentOptions,
} from './core/orchestrator.js';
export {
  StatusMonitor,
  initialStatusBar,
  type ResultsUpdate,
  type StatusMonitorDeps,
  type StatusView,
} from './core/status-monitor.js';
export { Scheduler, type SchedulerDeps, type SchedulerEvent, type TickReport } from './core/scheduler.js';
export { StateStore, type ReadOptions, type ReadResult, type StateStoreOptions } from './core/store.js';
export { TmuxAdapter, type TmuxAdapterOptions } from './core/tmux.js';
export {
  isShellCommand,
  windowTarget,
  type Multiplexer,
  type PaneInfo,
  type SessionHandle,
  type WindowInfo,
  type WindowResult,
} from './core/multiplexer.js';
export { GitWorktrees, type Vcs, type WorktreeOptions } from './core/worktree.js';
export { LogPatternMatcher, type LogMatch } from './core/log-matcher.js';
export { TodoParser, computeProgress, type TodoParserOptions } from './core/todo-parser.js';
export { TaskBoard, parseTaskId, taskProgress, type AddTaskInput, type TaskBoardDeps, type TaskList } from './core/tasks.js';
export {
  GitStatusReader,
  parsePorcelainStatus,
  type GitStatusReaderOptions,
  type GitStatusResult,
  type GitStatusSummary,
} from './core/git-status.js';
export { probeCommand, probeHttp, probeTcp, parseEndpoint, type ProbeOutcome, type Probes } from './core/probe.js';
export { readResultSummary } from './core/results.js';
export { DEFAULT_CONFIG, DEFAULT_LOG_PATTERNS, loadConfig, resolveConfig, writeDefaultConfig } from './core/config.js';
export * from './lib/errors.js';
export { createFileLogger, type Logger, type LogLevel } from './lib/log.js';
export { controlDir } from './lib/paths.js';
export * from './types/agent.js';
export * from './types/common.js';
export * from './types/config.js';
export * from './types/status.js';
export * from './types/task.js';
export * from './types/ticket.js';
