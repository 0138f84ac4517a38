/**
 * @fileoverview Command dispatcher.
 *
 * Maps a parsed command to its builtin. Names with no builtin produce an
 * `UnknownCommand` result; nothing here throws for user errors.
 *
 * @module engine/executor
 */

import { BUILTIN_COMMANDS, type BuiltinName } from './builtins';
import { formatShellError, unknownCommand } from './errors';
import type { CommandResult, ExecutionContext, SimpleCommand } from './types';

/**
 * Check whether a command name is a builtin.
 */
export function isBuiltin(command: string): command is BuiltinName {
  return Object.hasOwn(BUILTIN_COMMANDS, command);
}

/**
 * Execute a single command against the context.
 *
 * @param command - Parsed command
 * @param ctx - Tree, current directory and output options
 * @returns The builtin's result, or an `UnknownCommand` failure (exit code 127)
 *
 * @example
 * executeSimpleCommand({ type: 'Command', command: 'ls', args: [] }, { tree, cwd: '/' });
 * // { stdout: 'dir_1/', stderr: '', exitCode: 0 }
 */
export function executeSimpleCommand(command: SimpleCommand, ctx: ExecutionContext): CommandResult {
  const { command: commandName, args } = command;

  if (!isBuiltin(commandName)) {
    const error = unknownCommand(commandName);
    return {
      stdout: '',
      stderr: formatShellError(error),
      exitCode: 127,
      error
    };
  }

  const builtin = BUILTIN_COMMANDS[commandName];
  return builtin(args, ctx);
}
