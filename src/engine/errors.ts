/**
 * @fileoverview Error taxonomy for the vfsh shell engine.
 *
 * Per-line errors are plain values (`ShellError`) returned from the parser,
 * resolver and builtins so the session loop can report them and move on.
 * Conditions that must stop the program (a malformed VFS, an unreadable
 * image or startup script) are thrown as Error subclasses.
 *
 * @module engine/errors
 */

/**
 * Error raised by the tokenizer when a line cannot be split into words.
 */
export class ParseError extends Error {
  readonly kind = 'UnterminatedQuote' as const;

  constructor(message = 'unterminated quote') {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Fatal error: the VFS handed to the engine breaks a tree invariant.
 */
export class VfsConstructionError extends Error {
  constructor(message: string, readonly path: string) {
    super(`${message}: ${path}`);
    this.name = 'VfsConstructionError';
  }
}

/**
 * Fatal error: a VFS image or host directory could not be loaded.
 */
export class VfsLoadError extends Error {
  constructor(message: string, readonly source: string) {
    super(`${source}: ${message}`);
    this.name = 'VfsLoadError';
  }
}

/**
 * Fatal error: the startup script is missing or unreadable.
 */
export class StartupScriptError extends Error {
  constructor(readonly scriptPath: string, cause?: unknown) {
    super(`startup script not found or unreadable: ${scriptPath}`, { cause });
    this.name = 'StartupScriptError';
  }
}

export type ResolutionErrorKind = 'NotFound' | 'NotADirectory' | 'IsADirectory';

/**
 * Error produced while handling a single input line.
 */
export type ShellError =
  | { kind: 'UnterminatedQuote' }
  | { kind: ResolutionErrorKind; command: string; path: string }
  | { kind: 'UnknownCommand'; command: string }
  | { kind: 'MissingArgument'; command: string };

export const unterminatedQuote = (): ShellError => ({ kind: 'UnterminatedQuote' });

export const notFound = (command: string, path: string): ShellError =>
  ({ kind: 'NotFound', command, path });

export const notADirectory = (command: string, path: string): ShellError =>
  ({ kind: 'NotADirectory', command, path });

export const isADirectory = (command: string, path: string): ShellError =>
  ({ kind: 'IsADirectory', command, path });

export const unknownCommand = (command: string): ShellError =>
  ({ kind: 'UnknownCommand', command });

export const missingArgument = (command: string): ShellError =>
  ({ kind: 'MissingArgument', command });

/**
 * Render a ShellError the way it is shown to the user.
 *
 * @example
 * formatShellError(notFound('cd', 'docs'))
 * // 'cd: docs: No such file or directory'
 */
export function formatShellError(error: ShellError): string {
  switch (error.kind) {
    case 'UnterminatedQuote':
      return 'syntax error: unterminated quote';
    case 'NotFound':
      return `${error.command}: ${error.path}: No such file or directory`;
    case 'NotADirectory':
      return `${error.command}: ${error.path}: Not a directory`;
    case 'IsADirectory':
      return `${error.command}: ${error.path}: Is a directory`;
    case 'UnknownCommand':
      return `${error.command}: command not found`;
    case 'MissingArgument':
      return `${error.command}: missing operand`;
  }
}
