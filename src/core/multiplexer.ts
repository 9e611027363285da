import type { Result } from '../types/common.js';
import type { WindowHandle } from '../types/ticket.js';
import type { WindowNotFoundError } from '../lib/errors.js';

export interface SessionHandle {
  name: string;
  workingDir: string;
}

export interface WindowInfo {
  index: number;
  name: string;
}

export interface PaneInfo {
  paneId: string;
  panePid: string;
  currentCommand: string;
  isDead: boolean;
  deadStatus?: number;
}

export type WindowResult<T> = Result<T, WindowNotFoundError>;

/**
 * Terminal multiplexer seam. Windows are addressed by session and name; an
 * operation on a window that was closed outside tixmux yields
 * `WindowNotFoundError` as a value.
 */
export interface Multiplexer {
  createSession(name: string, workingDir: string): Promise<SessionHandle>;
  sessionExists(name: string): Promise<boolean>;
  ensureWindows(session: SessionHandle, names: readonly string[]): Promise<Map<string, WindowHandle>>;
  listWindows(session: string): Promise<WindowInfo[]>;
  findWindow(session: string, name: string): Promise<WindowResult<WindowHandle>>;
  sendKeys(window: WindowHandle, text: string): Promise<WindowResult<void>>;
  interrupt(window: WindowHandle): Promise<WindowResult<void>>;
  capture(window: WindowHandle, lines: number): Promise<WindowResult<string>>;
  paneInfo(window: WindowHandle): Promise<WindowResult<PaneInfo>>;
  focus(window: WindowHandle): Promise<WindowResult<void>>;
  killWindow(window: WindowHandle): Promise<void>;
  destroySession(name: string): Promise<void>;
  isInsideSession(): boolean;
}

const SHELL_COMMANDS = new Set(['bash', 'zsh', 'sh', 'fish', 'dash', 'ksh', 'tcsh', 'csh']);

/** True when the pane's foreground process is an interactive shell, i.e. whatever ran there has exited. */
export function isShellCommand(command: string): boolean {
  return SHELL_COMMANDS.has(command.replace(/^-/, ''));
}

export function windowTarget(session: string, index: number): string {
  // '=' forces an exact session match; tmux would otherwise fall back to prefix matching
  return `=${session}:${index}`;
}
