import { describe, it, expect } from 'vitest';
import { tokenize, parseCommandLine, isNoopLine } from '../src/engine/parser';
import { ParseError } from '../src/engine/errors';

describe('tokenize', () => {
  describe('basic tokenization', () => {
    it('should tokenize a simple command', () => {
      const tokens = tokenize('ls dir_1');
      expect(tokens).toEqual([
        { type: 'word', value: 'ls' },
        { type: 'word', value: 'dir_1' }
      ]);
    });

    it('should handle empty input', () => {
      expect(tokenize('')).toEqual([]);
    });

    it('should handle whitespace-only input', () => {
      expect(tokenize('   \t  ')).toEqual([]);
    });

    it('should handle multiple spaces and tabs between words', () => {
      const tokens = tokenize('  cd \t  level1   ');
      expect(tokens).toEqual([
        { type: 'word', value: 'cd' },
        { type: 'word', value: 'level1' }
      ]);
    });

    it('should keep other punctuation inside words', () => {
      const tokens = tokenize('unknown_cmd --test a|b');
      expect(tokens.map(t => t.value)).toEqual(['unknown_cmd', '--test', 'a|b']);
    });
  });

  describe('double quotes', () => {
    it('should keep whitespace inside a quoted segment', () => {
      const tokens = tokenize('cat "config file.txt"');
      expect(tokens).toEqual([
        { type: 'word', value: 'cat' },
        { type: 'dstring', value: 'config file.txt' }
      ]);
    });

    it('should produce an empty token for ""', () => {
      expect(tokenize('ls ""')).toEqual([
        { type: 'word', value: 'ls' },
        { type: 'dstring', value: '' }
      ]);
    });

    it('should join quoted segments with adjacent text', () => {
      expect(tokenize('cd a"b c"d')).toEqual([
        { type: 'word', value: 'cd' },
        { type: 'dstring', value: 'ab cd' }
      ]);
    });

    it('should treat backslashes literally', () => {
      expect(tokenize('cat "a\\"')).toEqual([
        { type: 'word', value: 'cat' },
        { type: 'dstring', value: 'a\\' }
      ]);
    });

    it('should treat single quotes as ordinary characters', () => {
      expect(tokenize("cat 'x y'").map(t => t.value)).toEqual(['cat', "'x", "y'"]);
    });

    it('should throw ParseError on an unterminated quote', () => {
      expect(() => tokenize('ls "file with unclosed quote')).toThrow(ParseError);
    });

    it('should report the UnterminatedQuote kind', () => {
      let caught: unknown;
      try {
        tokenize('cd "directory with unclosed quote');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ParseError);
      expect(caught instanceof ParseError && caught.kind).toBe('UnterminatedQuote');
    });
  });
});

describe('isNoopLine', () => {
  it('should recognize blank and comment lines', () => {
    expect(isNoopLine('')).toBe(true);
    expect(isNoopLine('   ')).toBe(true);
    expect(isNoopLine('# comment')).toBe(true);
    expect(isNoopLine('   # indented comment')).toBe(true);
  });

  it('should not treat commands as no-ops', () => {
    expect(isNoopLine('ls # trailing')).toBe(false);
  });
});

describe('parseCommandLine', () => {
  it('should split command name and arguments', () => {
    expect(parseCommandLine('unknown_cmd --test')).toEqual({
      type: 'Command',
      command: 'unknown_cmd',
      args: ['--test']
    });
  });

  it('should keep argument order', () => {
    expect(parseCommandLine('ls c b a')?.args).toEqual(['c', 'b', 'a']);
  });

  it('should return null for comments and blank lines', () => {
    expect(parseCommandLine('# vfs_test_commands.sh')).toBeNull();
    expect(parseCommandLine('')).toBeNull();
  });

  it('should not hide quotes inside a comment', () => {
    expect(parseCommandLine('# "unbalanced')).toBeNull();
  });

  it('should propagate parse errors', () => {
    expect(() => parseCommandLine('ls "oops')).toThrow(ParseError);
  });
});
