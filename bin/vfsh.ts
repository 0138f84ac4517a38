#!/usr/bin/env node
/**
 * @fileoverview vfsh CLI entry point.
 *
 * Loads a virtual filesystem and runs the shell emulator over it.
 *
 * Usage:
 *   vfsh --vfs-data-path ./vfs_multi.b64
 *   vfsh --vfs-data-path ./vfs.yaml --startup-script ./commands.sh
 *   vfsh --vfs-path ./some/dir --startup-script ./commands.sh -i
 *
 * @module bin/vfsh
 */

import * as os from 'node:os';
import { createNodeTerminalAPI } from '../src/cli/terminal';
import { HELP_TEXT, UsageError, parseArgs, type CLIArgs } from '../src/cli/args';
import { EXIT_FATAL, EXIT_OK, EXIT_USAGE, runShell } from '../src/cli/app';
import { VERSION_STRING } from '../src/version';

function currentUser(): string {
  if (process.env.VFSH_USER) {
    return process.env.VFSH_USER;
  }
  try {
    return os.userInfo().username;
  } catch {
    // No passwd entry (e.g. arbitrary uid in a container)
    return 'user';
  }
}

/**
 * Main CLI entry point.
 */
async function main(): Promise<number> {
  let args: CLIArgs;
  try {
    args = parseArgs(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`vfsh: ${error.message}`);
      console.error("Try 'vfsh --help' for more information.");
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.version) {
    console.log(VERSION_STRING);
    return EXIT_OK;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  // Create the Node.js terminal API adapter
  const terminalApi = createNodeTerminalAPI();

  try {
    return await runShell(args, terminalApi, {
      user: currentUser(),
      host: os.hostname(),
      color: process.stdout.isTTY === true,
    });
  } finally {
    terminalApi.dispose();
  }
}

// Run the CLI
main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_FATAL;
  });
