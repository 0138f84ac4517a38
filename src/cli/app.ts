/**
 * @fileoverview CLI orchestration: load the VFS, run the startup script
 * and/or the interactive loop, and map the outcome to an exit code.
 *
 * @module cli/app
 */

import * as fs from 'node:fs';
import type { TerminalAPI } from '../terminal/api';
import style from '../terminal/style';
import { ShellSession } from '../engine/shell';
import { StartupScriptError, VfsConstructionError, VfsLoadError } from '../engine/errors';
import type { SessionResult } from '../engine/types';
import { loadVfs } from '../vfs/loader';
import type { CLIArgs } from './args';
import { VERSION_STRING } from '../version';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

/**
 * Process-level details the CLI passes in.
 *
 * @property user - User name for the prompt
 * @property host - Host name for the prompt
 * @property color - Whether the output device takes ANSI colors
 */
export interface AppEnvironment {
  user: string;
  host: string;
  color: boolean;
}

/**
 * Read a startup script into lines.
 *
 * @throws StartupScriptError if the file is missing or unreadable
 */
export async function readStartupScript(scriptPath: string): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(scriptPath, 'utf-8');
    return content.split(/\r?\n/);
  } catch (error) {
    throw new StartupScriptError(scriptPath, error);
  }
}

function describeSource(args: CLIArgs): string {
  if (args.vfsDataPath !== undefined) {
    return `image ${args.vfsDataPath}`;
  }
  return `directory ${args.vfsPath ?? ''}`;
}

/**
 * Print the startup parameters, as the emulator shows them at launch.
 */
export function printStartupParameters(term: TerminalAPI, args: CLIArgs): void {
  term.writeln(`--- ${VERSION_STRING} startup parameters ---`);
  term.writeln(`VFS: ${describeSource(args)}`);
  term.writeln(`Startup script: ${args.startupScript ?? 'None'}`);
  term.writeln('---');
}

/**
 * Run the shell for parsed CLI arguments.
 *
 * Fatal conditions (an unloadable VFS, a broken tree, a missing startup
 * script) are printed and mapped to exit status 1. Errors on individual
 * command lines never end the run.
 *
 * @returns The process exit status
 *
 * @example
 * const code = await runShell(parseArgs(process.argv.slice(2), process.env), terminalApi, {
 *   user: 'alice', host: 'box', color: true
 * });
 */
export async function runShell(args: CLIArgs, term: TerminalAPI, environment: AppEnvironment): Promise<number> {
  const color = args.color && environment.color;
  const fatal = (message: string): number => {
    const text = `vfsh: ${message}`;
    term.writeln(color ? style.red(text) : text);
    return EXIT_FATAL;
  };

  if (!args.quiet) {
    printStartupParameters(term, args);
  }

  let result: SessionResult;
  try {
    const tree = await loadVfs({ vfsPath: args.vfsPath, vfsDataPath: args.vfsDataPath });
    const session = new ShellSession(tree, term, {
      color,
      user: environment.user,
      host: environment.host,
    });

    if (args.startupScript !== undefined) {
      const lines = await readStartupScript(args.startupScript);
      result = await session.runLines(lines, {
        sourceName: args.startupScript,
        echo: true,
        terminateOnEnd: !args.interactive,
      });
      if (!session.state.terminated) {
        result = await session.runInteractive();
      }
    } else {
      result = await session.runInteractive();
    }
  } catch (error) {
    if (
      error instanceof VfsLoadError ||
      error instanceof VfsConstructionError ||
      error instanceof StartupScriptError
    ) {
      return fatal(error.message);
    }
    throw error;
  }

  // Ended by `exit` or by running out of input; both are a clean finish
  return result.status === 'running' ? EXIT_FATAL : EXIT_OK;
}
