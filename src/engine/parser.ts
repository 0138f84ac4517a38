/**
 * @fileoverview Command line tokenizer.
 *
 * This module turns one raw input line into a command:
 * - `tokenize()`: lexical analysis, splitting on whitespace and honoring
 *   double-quoted segments
 * - `parseCommandLine()`: skips blank and comment lines and builds a
 *   `SimpleCommand` from the tokens
 *
 * Quoting is minimal: double quotes only, no escape
 * character, no nesting, no operators.
 *
 * @module engine/parser
 */

import type { Token, SimpleCommand } from './types';
import { ParseError } from './errors';

/**
 * Tokenize a command line string into an array of tokens.
 *
 * Whitespace outside quotes separates words. A `"` opens a quoted segment
 * that runs to the next `"`, whitespace included. Quoted segments glued to
 * unquoted text belong to the same word.
 *
 * @param input - The raw command line string to tokenize
 * @returns Array of tokens with type and value
 * @throws ParseError if a quoted segment is not terminated
 *
 * @example
 * tokenize('cat "config file.txt"')
 * // Returns: [
 * //   { type: 'word', value: 'cat' },
 * //   { type: 'dstring', value: 'config file.txt' }
 * // ]
 *
 * @example
 * tokenize('ls dir"ectory one"')
 * // Returns: [
 * //   { type: 'word', value: 'ls' },
 * //   { type: 'dstring', value: 'directory one' }
 * // ]
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let current = 0;

  while (current < input.length) {
    if (/\s/.test(input[current])) {
      current++;
      continue;
    }

    let value = '';
    let quoted = false;
    while (current < input.length && !/\s/.test(input[current])) {
      const char = input[current];
      if (char === '"') {
        const closing = input.indexOf('"', current + 1);
        if (closing === -1) {
          throw new ParseError();
        }
        value += input.slice(current + 1, closing);
        quoted = true;
        current = closing + 1;
      } else {
        value += char;
        current++;
      }
    }
    tokens.push({ type: quoted ? 'dstring' : 'word', value });
  }

  return tokens;
}

/**
 * Check whether a line carries no command (blank or `#` comment).
 */
export function isNoopLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Parse one line into a command.
 *
 * @param line - Raw input line
 * @returns The command, or null for blank and comment lines
 * @throws ParseError if the line has an unterminated quote
 *
 * @example
 * parseCommandLine('cd dir_1')
 * // { type: 'Command', command: 'cd', args: ['dir_1'] }
 *
 * parseCommandLine('# list the root')
 * // null
 */
export function parseCommandLine(line: string): SimpleCommand | null {
  if (isNoopLine(line)) {
    return null;
  }

  const [first, ...rest] = tokenize(line);
  if (!first) {
    return null;
  }

  return {
    type: 'Command',
    command: first.value,
    args: rest.map(token => token.value),
  };
}
