export class TixError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'TixError';
  }
}

export class ConfigurationError extends TixError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`, 'CONFIG_INVALID', 2);
    this.name = 'ConfigurationError';
  }
}

export class ExternalToolUnavailableError extends TixError {
  constructor(
    public readonly tool: string,
    hint: string,
  ) {
    super(`${tool} is not installed or not in PATH. ${hint}`, 'TOOL_UNAVAILABLE', 3);
    this.name = 'ExternalToolUnavailableError';
  }
}

export class TmuxNotFoundError extends ExternalToolUnavailableError {
  constructor() {
    super('tmux', 'Install it with: brew install tmux (macOS) or apt install tmux (Debian/Ubuntu)');
    this.name = 'TmuxNotFoundError';
  }
}

export class GitNotFoundError extends ExternalToolUnavailableError {
  constructor() {
    super('git', 'Install git and make sure it is on your PATH');
    this.name = 'GitNotFoundError';
  }
}

export class NotGitRepoError extends TixError {
  constructor(dir: string) {
    super(
      `Not a git repository: ${dir}. Run from inside a repository or set repoPath in config.yaml`,
      'NOT_GIT_REPO',
    );
    this.name = 'NotGitRepoError';
  }
}

export class InvalidArgumentError extends TixError {
  constructor(message: string) {
    super(message, 'INVALID_ARGS');
    this.name = 'InvalidArgumentError';
  }
}

export class DuplicateTicketError extends TixError {
  constructor(id: string) {
    super(`Ticket already exists: ${id}`, 'DUPLICATE_TICKET');
    this.name = 'DuplicateTicketError';
  }
}

export class TicketNotFoundError extends TixError {
  constructor(id: string) {
    super(`Ticket not found: ${id}. Run 'tixmux list --all' to see known tickets`, 'TICKET_NOT_FOUND');
    this.name = 'TicketNotFoundError';
  }
}

export class SessionNotFoundError extends TixError {
  constructor(
    public readonly sessionId: string,
    kind: 'agent session' | 'tmux session' = 'agent session',
  ) {
    super(`${kind === 'agent session' ? 'Agent session' : 'tmux session'} not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class TaskNotFoundError extends TixError {
  constructor(
    public readonly ticketId: string,
    public readonly taskId: number,
  ) {
    super(`Task ${taskId} not found on ${ticketId}. Run 'tixmux task list ${ticketId}'`, 'TASK_NOT_FOUND');
    this.name = 'TaskNotFoundError';
  }
}

export class WindowNotFoundError extends TixError {
  constructor(
    public readonly session: string,
    public readonly window: string,
  ) {
    super(`Window '${window}' not found in tmux session '${session}'`, 'WINDOW_NOT_FOUND');
    this.name = 'WindowNotFoundError';
  }
}

export class StateLockError extends TixError {
  constructor(filePath: string) {
    super(
      `Could not acquire lock on ${filePath}. Another tixmux process may be holding it.`,
      'STATE_LOCK',
    );
    this.name = 'StateLockError';
  }
}

export function hasErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
