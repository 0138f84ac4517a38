/**
 * @fileoverview Node.js Terminal API adapter for CLI mode.
 *
 * Implements the line-oriented TerminalAPI on top of node:readline, so
 * the session loop reads from stdin and writes to stdout. Works with a
 * TTY (line editing, Ctrl+C) as well as with piped input.
 *
 * @module cli/terminal
 */

import * as readline from 'node:readline';
import type { TerminalAPI } from '../terminal/api';

/**
 * Streams the terminal is attached to. Defaults to the process stdio.
 */
export interface NodeTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Create a TerminalAPI implementation for Node.js CLI environment.
 *
 * Lines that arrive while nobody is waiting (piped input) are queued, so
 * nothing is lost between two `readLine()` calls. Ctrl+C prints `^C`,
 * discards the current input and shows the prompt again instead of
 * killing the process.
 *
 * @example
 * const terminalApi = createNodeTerminalAPI();
 * const line = await terminalApi.readLine('$ ');
 * terminalApi.dispose();
 */
export const createNodeTerminalAPI = (options: NodeTerminalOptions = {}): TerminalAPI => {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  let rl: readline.Interface | null = null;
  let closed = false;
  const pending: string[] = [];
  const waiters: Array<(line: string | null) => void> = [];

  // Created lazily so that a script-only run never touches stdin
  const getInterface = (): readline.Interface => {
    if (rl) {
      return rl;
    }
    const created = readline.createInterface({
      input,
      output,
      terminal: 'isTTY' in input && input.isTTY === true,
    });

    created.on('line', (line: string) => {
      const waiter = waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        pending.push(line);
      }
    });

    created.on('close', () => {
      closed = true;
      for (const waiter of waiters.splice(0)) {
        waiter(null);
      }
    });

    // Drop the half-typed line so the next Enter does not run it
    created.on('SIGINT', () => {
      output.write('^C\n');
      created.write(null, { ctrl: true, name: 'e' });
      created.write(null, { ctrl: true, name: 'u' });
      created.prompt();
    });

    rl = created;
    return created;
  };

  return {
    write: (data: string) => {
      output.write(data);
    },

    writeln: (data: string) => {
      output.write(data + '\n');
    },

    readLine: (prompt: string) => {
      const iface = getInterface();
      const queued = pending.shift();
      if (queued !== undefined) {
        return Promise.resolve(queued);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      iface.setPrompt(prompt);
      iface.prompt();
      return new Promise<string | null>(resolve => {
        waiters.push(resolve);
      });
    },

    dispose: () => {
      if (rl && !closed) {
        rl.close();
      }
      rl = null;
    },
  };
};
