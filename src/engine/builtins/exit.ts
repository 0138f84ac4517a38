import type { BuiltinCommand, CommandResult } from "../types";

/**
 * Exit builtin command.
 *
 * Usage:
 *   exit  - End the session
 *
 * Trailing arguments are ignored. The session loop stops after this
 * command; no further lines are read.
 */
export const exit: BuiltinCommand = (): CommandResult => {
  return {
    stdout: "",
    stderr: "",
    exitCode: 0,
    exitRequested: true,
  };
};
