/**
 * @fileoverview Command line and environment configuration for the CLI.
 *
 * Flags win over environment variables. Naming either VFS source on the
 * command line ignores both VFS variables from the environment.
 *
 * @module cli/args
 */

/**
 * Parsed command line arguments.
 */
export interface CLIArgs {
  vfsPath?: string;
  vfsDataPath?: string;
  startupScript?: string;
  interactive: boolean;
  color: boolean;
  quiet: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Invalid command line. The CLI prints the message with a usage hint and
 * exits with status 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Environment variables read by the CLI. */
export const ENV_VFS_PATH = 'VFSH_VFS_PATH';
export const ENV_VFS_DATA_PATH = 'VFSH_VFS_DATA_PATH';
export const ENV_STARTUP_SCRIPT = 'VFSH_STARTUP_SCRIPT';
export const ENV_NO_COLOR = 'NO_COLOR';

type Env = Record<string, string | undefined>;

function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parse command line arguments.
 *
 * @param args - Arguments after the program name (`process.argv.slice(2)`)
 * @param env - Environment to read defaults from
 * @throws UsageError on unknown flags, missing values, or a missing or
 *   ambiguous VFS source
 *
 * @example
 * parseArgs(['--vfs-data-path', 'vfs.b64', '--startup-script', 'init.sh']);
 * // { vfsDataPath: 'vfs.b64', startupScript: 'init.sh', interactive: false, ... }
 */
export function parseArgs(args: string[], env: Env = {}): CLIArgs {
  const result: CLIArgs = {
    interactive: false,
    color: envValue(env, ENV_NO_COLOR) === undefined,
    quiet: false,
    help: false,
    version: false
  };

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let inlineValue: string | undefined;

    // --flag=value form
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq !== -1) {
      inlineValue = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`option '${arg}' requires a value`);
      }
      i++;
      return next;
    };

    const takeFlag = (): true => {
      if (inlineValue !== undefined) {
        throw new UsageError(`option '${arg}' does not take a value`);
      }
      return true;
    };

    switch (arg) {
      case '--vfs-path':
        result.vfsPath = takeValue();
        break;
      case '--vfs-data-path':
      case '--vfs-image':
        result.vfsDataPath = takeValue();
        break;
      case '--startup-script':
      case '-s':
        result.startupScript = takeValue();
        break;
      case '--interactive':
      case '-i':
        result.interactive = takeFlag();
        break;
      case '--no-color':
        result.color = !takeFlag();
        break;
      case '--quiet':
      case '-q':
        result.quiet = takeFlag();
        break;
      case '--help':
      case '-h':
        result.help = takeFlag();
        break;
      case '--version':
      case '-v':
        result.version = takeFlag();
        break;
      default:
        throw new UsageError(`unknown option '${arg}'`);
    }
  }

  if (result.vfsPath === undefined && result.vfsDataPath === undefined) {
    result.vfsPath = envValue(env, ENV_VFS_PATH);
    result.vfsDataPath = envValue(env, ENV_VFS_DATA_PATH);
  }
  result.startupScript ??= envValue(env, ENV_STARTUP_SCRIPT);

  if (result.help || result.version) {
    return result;
  }

  if (result.vfsPath !== undefined && result.vfsDataPath !== undefined) {
    throw new UsageError('--vfs-path and --vfs-data-path cannot be used together');
  }
  if (result.vfsPath === undefined && result.vfsDataPath === undefined) {
    throw new UsageError('one of --vfs-path or --vfs-data-path is required');
  }

  return result;
}

export const HELP_TEXT = `vfsh - shell emulator over a read-only virtual filesystem

Usage: vfsh (--vfs-path <dir> | --vfs-data-path <file>) [options]

Options:
  --vfs-path <dir>              Load the VFS from a real directory
  --vfs-data-path <file>        Load the VFS from a disk image (JSON, YAML,
      --vfs-image <file>        or base64-encoded when the name ends in .b64)
  --startup-script, -s <file>   Run the commands in <file> and stop
  --interactive, -i             Continue interactively after the startup script
  --no-color                    Disable ANSI colors
  --quiet, -q                   Do not print the startup parameters
  --help, -h                    Show this help message
  --version, -v                 Show version information

Environment:
  ${ENV_VFS_PATH}, ${ENV_VFS_DATA_PATH}, ${ENV_STARTUP_SCRIPT}
                                Defaults for the options above
  ${ENV_NO_COLOR}                      Disable ANSI colors

Commands:
  ls [path]     List a directory, or show a file name
  cd <path>     Change the current directory
  cat <path>    Print a file
  exit          End the session
`;
