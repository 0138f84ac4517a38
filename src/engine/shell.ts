/**
 * @fileoverview Shell session loop.
 *
 * A ShellSession owns the per-session state (current directory, terminated
 * flag) over a shared, read-only VfsTree, and drives lines through
 * tokenizer → dispatcher → terminal:
 * - Startup scripts are fed with `runLines()`
 * - Interactive input is read from the terminal with `runInteractive()`
 *
 * Every in-core error is caught at the line boundary and reported; only
 * `exit` or the end of input ends the loop.
 *
 * @module engine/shell
 */

import type { TerminalAPI } from '../terminal/api';
import type { VfsTree } from '../vfs/tree';
import { ROOT_PATH } from '../vfs/tree';
import style from '../terminal/style';
import { parseCommandLine } from './parser';
import { executeSimpleCommand } from './executor';
import { ParseError, formatShellError, unterminatedQuote } from './errors';
import type { LineOutcome, SessionResult, SessionState, SimpleCommand } from './types';

/**
 * Configuration options for creating a ShellSession.
 *
 * @property color - Use ANSI colors for errors and directory names
 * @property user - User name shown in the prompt
 * @property host - Host name shown in the prompt
 */
export interface ShellSessionOptions {
  color?: boolean;
  user?: string;
  host?: string;
}

/**
 * Options for one run of the loop over a line source.
 *
 * @property sourceName - Prefix errors with `<sourceName>:<line>: `
 * @property echo - Print `<prompt><line>` before each executed line
 * @property terminateOnEnd - Whether running out of lines ends the session (default: true)
 */
export interface RunOptions {
  sourceName?: string;
  echo?: boolean;
  terminateOnEnd?: boolean;
}

/**
 * Create the initial state of a session, positioned at the root.
 */
export function createSessionState(): SessionState {
  return { cwd: ROOT_PATH, terminated: false, status: 'running' };
}

/**
 * Process one raw line against the session state.
 *
 * Parse failures and command failures come back as an `error` outcome;
 * the state is only changed by a successful `cd` (cwd) or by `exit`
 * (terminated).
 *
 * @example
 * const state = createSessionState();
 * executeLine(tree, state, 'cd dir_1', 1);
 * state.cwd; // '/dir_1'
 */
export function executeLine(
  tree: VfsTree,
  state: SessionState,
  line: string,
  lineNumber: number,
  color = false
): LineOutcome {
  let command: SimpleCommand | null;
  try {
    command = parseCommandLine(line);
  } catch (error) {
    if (error instanceof ParseError) {
      return { kind: 'error', line, lineNumber, error: unterminatedQuote() };
    }
    throw error;
  }

  if (!command) {
    return { kind: 'skipped', line, lineNumber };
  }

  const result = executeSimpleCommand(command, { tree, cwd: state.cwd, color });

  if (result.error) {
    return { kind: 'error', line, lineNumber, error: result.error, command };
  }

  if (result.cwd !== undefined) {
    state.cwd = result.cwd;
  }
  if (result.exitRequested) {
    state.terminated = true;
    state.status = 'exit';
  }

  return { kind: 'ok', line, lineNumber, command, result };
}

/**
 * Interactive shell session over a read-only VFS.
 *
 * @example
 * const session = new ShellSession(tree, terminalApi, { color: true });
 * await session.runLines(scriptLines, { sourceName: 'startup.sh', echo: true });
 * if (!session.state.terminated) {
 *   await session.runInteractive();
 * }
 */
export class ShellSession {
  private tree: VfsTree;
  private term: TerminalAPI;
  private color: boolean;
  private user: string;
  private host: string;
  private errors = 0;
  readonly state: SessionState = createSessionState();

  /**
   * Create a new ShellSession instance.
   *
   * @param tree - VFS to navigate; may be shared with other sessions
   * @param term - Terminal API for input/output
   * @param options - Optional configuration
   */
  constructor(tree: VfsTree, term: TerminalAPI, options?: ShellSessionOptions) {
    this.tree = tree;
    this.term = term;
    this.color = options?.color ?? false;
    this.user = options?.user ?? 'user';
    this.host = options?.host ?? 'vfsh';
  }

  public getPrompt(): string {
    return `${this.user}@${this.host}:${this.state.cwd}$ `;
  }

  /**
   * Run a sequence of lines (a startup script) through the session.
   *
   * Lines are processed strictly one at a time, in order. The loop stops
   * at `exit`; lines after it are never read.
   */
  public async runLines(
    source: Iterable<string> | AsyncIterable<string>,
    options: RunOptions = {}
  ): Promise<SessionResult> {
    let lineNumber = 0;
    if (this.state.terminated) {
      return this.result();
    }

    for await (const line of source) {
      lineNumber++;
      this.execute(line, lineNumber, options);
      if (this.state.terminated) {
        break;
      }
    }

    if (!this.state.terminated && (options.terminateOnEnd ?? true)) {
      this.finish();
    }
    return this.result();
  }

  /**
   * Read lines from the terminal until `exit` or end of input.
   */
  public async runInteractive(): Promise<SessionResult> {
    let lineNumber = 0;

    while (!this.state.terminated) {
      const line = await this.term.readLine(this.getPrompt());
      if (line === null) {
        // Move past the dangling prompt
        this.term.writeln('');
        this.finish();
        break;
      }
      lineNumber++;
      this.execute(line, lineNumber, {});
    }

    return this.result();
  }

  private execute(line: string, lineNumber: number, options: RunOptions): void {
    const prompt = this.getPrompt();
    const outcome = executeLine(this.tree, this.state, line, lineNumber, this.color);

    if (options.echo && outcome.kind !== 'skipped') {
      this.term.writeln(`${prompt}${line.trim()}`);
    }
    this.report(outcome, options);
  }

  private report(outcome: LineOutcome, options: RunOptions): void {
    if (outcome.kind === 'ok') {
      if (outcome.result.stdout) {
        this.term.writeln(outcome.result.stdout);
      }
      return;
    }

    if (outcome.kind === 'error') {
      this.errors++;
      const location = options.sourceName ? `${options.sourceName}:${outcome.lineNumber}: ` : '';
      const message = `${location}${formatShellError(outcome.error)}`;
      this.term.writeln(this.color ? style.red(message) : message);
    }
  }

  private finish(): void {
    this.state.terminated = true;
    this.state.status = 'eof';
  }

  private result(): SessionResult {
    return { status: this.state.status, cwd: this.state.cwd, errors: this.errors };
  }
}
