/**
 * @fileoverview Core type definitions for the vfsh shell engine.
 *
 * This module defines the fundamental types used throughout the shell:
 * - Token types for the lexer
 * - The parsed command shape
 * - Command execution context and results
 * - Session state and per-line outcomes
 *
 * @module engine/types
 */

import type { VfsTree } from '../vfs/tree';
import type { ShellError } from './errors';

/**
 * Token produced by the shell lexer.
 *
 * @property type - 'word' for unquoted text, 'dstring' for a word that
 *   contained at least one double-quoted segment
 * @property value - The token text with quotes removed
 *
 * @example
 * // tokenize('cat "my notes.txt"')
 * [{ type: 'word', value: 'cat' }, { type: 'dstring', value: 'my notes.txt' }]
 */
export type Token = {
  type: 'word' | 'dstring';
  value: string;
};

/**
 * A command line split into a command name and its arguments.
 *
 * @example
 * // ls level1
 * { type: 'Command', command: 'ls', args: ['level1'] }
 */
export interface SimpleCommand {
  type: 'Command';
  command: string;
  args: string[];
}

/**
 * Result returned from command execution.
 *
 * @property stdout - Output produced by the command (no trailing newline)
 * @property stderr - Rendered error message, empty on success
 * @property exitCode - 0 for success, non-zero for failure
 * @property error - Typed error, present exactly when the command failed
 * @property cwd - New working directory requested by `cd`
 * @property exitRequested - Set by `exit`
 *
 * @example
 * // Failed command
 * { stdout: '', stderr: 'cat: notes: Is a directory', exitCode: 1,
 *   error: { kind: 'IsADirectory', command: 'cat', path: 'notes' } }
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  error?: ShellError;
  cwd?: string;
  exitRequested?: boolean;
}

/**
 * Execution context passed to builtins.
 *
 * @property tree - The read-only VFS the session navigates
 * @property cwd - Absolute path of the current working directory
 * @property color - Whether output may contain ANSI colors
 */
export interface ExecutionContext {
  tree: VfsTree;
  cwd: string;
  color?: boolean;
}

/**
 * Function signature for builtin shell commands.
 *
 * Builtins are pure: they read the tree and report state changes
 * (`cwd`, `exitRequested`) through the result instead of mutating the
 * session.
 *
 * @example
 * const pwd: BuiltinCommand = (_args, ctx) => ({ stdout: ctx.cwd, stderr: '', exitCode: 0 });
 */
export type BuiltinCommand = (args: string[], context: ExecutionContext) => CommandResult;

/** How a session ended. */
export type SessionStatus = 'running' | 'exit' | 'eof';

/**
 * Per-session mutable state, threaded explicitly through the loop.
 */
export interface SessionState {
  cwd: string;
  terminated: boolean;
  status: SessionStatus;
}

/**
 * What happened to a single input line.
 */
export type LineOutcome =
  | { kind: 'skipped'; line: string; lineNumber: number }
  | { kind: 'ok'; line: string; lineNumber: number; command: SimpleCommand; result: CommandResult }
  | { kind: 'error'; line: string; lineNumber: number; error: ShellError; command?: SimpleCommand };

/**
 * Summary returned when a session loop finishes.
 */
export interface SessionResult {
  status: SessionStatus;
  cwd: string;
  errors: number;
}
