/**
 * @fileoverview Terminal API abstraction.
 *
 * The shell engine talks to the outside world only through this
 * interface, so the same session loop drives a real terminal
 * (`cli/terminal`) and the in-memory mock used by the tests.
 *
 * @module terminal/api
 */

/**
 * Line-oriented terminal API.
 *
 * - Output: write(), writeln()
 * - Input: readLine()
 * - Cleanup: dispose()
 */
export interface TerminalAPI {
  /** Write text to the terminal (no newline) */
  write: (data: string) => void;
  /** Write text followed by a newline */
  writeln: (data: string) => void;
  /**
   * Show the prompt and wait for the next input line.
   * Resolves to null once input is exhausted (Ctrl+D, closed pipe).
   */
  readLine: (prompt: string) => Promise<string | null>;
  /** Release stdin and any other resources */
  dispose: () => void;
}
