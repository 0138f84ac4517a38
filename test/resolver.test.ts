import { describe, it, expect } from 'vitest';
import { resolvePath } from '../src/vfs/resolver';
import { createDeepTree } from './helpers/vfs';

describe('resolvePath', () => {
  const tree = createDeepTree();

  const resolvedPath = (cwd: string, pathText: string): string | undefined => {
    const result = resolvePath(tree, cwd, pathText);
    return result.ok ? result.node.path : undefined;
  };

  describe('absolute paths', () => {
    it('should resolve from the root regardless of cwd', () => {
      expect(resolvedPath('/level1/level2', '/config.txt')).toBe('/config.txt');
      expect(resolvedPath('/level1', '/level1/level2/level3')).toBe('/level1/level2/level3');
    });

    it('should resolve "/" to the root', () => {
      expect(resolvedPath('/level1', '/')).toBe('/');
    });
  });

  describe('relative paths', () => {
    it('should resolve a single segment against cwd', () => {
      expect(resolvedPath('/', 'level1')).toBe('/level1');
      expect(resolvedPath('/level1', 'level2')).toBe('/level1/level2');
    });

    it('should resolve multiple segments', () => {
      expect(resolvedPath('/', 'level1/level2/level3/file.txt')).toBe('/level1/level2/level3/file.txt');
    });

    it('should resolve an empty path to cwd', () => {
      expect(resolvedPath('/level1/level2', '')).toBe('/level1/level2');
    });

    it('should ignore repeated and trailing slashes', () => {
      expect(resolvedPath('/', 'level1//level2/')).toBe('/level1/level2');
    });

    it('should resolve names containing spaces', () => {
      expect(resolvedPath('/', 'my docs/read me.txt')).toBe('/my docs/read me.txt');
    });
  });

  describe('dot segments', () => {
    it('should stay in place on "."', () => {
      expect(resolvedPath('/level1', '.')).toBe('/level1');
      expect(resolvedPath('/level1', './level2/.')).toBe('/level1/level2');
    });

    it('should climb to the parent on ".."', () => {
      expect(resolvedPath('/level1/level2/level3', '..')).toBe('/level1/level2');
      expect(resolvedPath('/level1/level2/level3', '../../empty')).toBe('/level1/empty');
    });

    it('should keep ".." at the root', () => {
      expect(resolvedPath('/', '..')).toBe('/');
      expect(resolvedPath('/', '../../config.txt')).toBe('/config.txt');
    });
  });

  describe('failures', () => {
    it('should report NotFound for a missing name', () => {
      expect(resolvePath(tree, '/', 'nope')).toEqual({ ok: false, reason: 'NotFound' });
      expect(resolvePath(tree, '/', 'level1/nope/level3')).toEqual({ ok: false, reason: 'NotFound' });
    });

    it('should be case-sensitive', () => {
      expect(resolvePath(tree, '/', 'Level1')).toEqual({ ok: false, reason: 'NotFound' });
    });

    it('should report NotADirectory when walking through a file', () => {
      expect(resolvePath(tree, '/', 'config.txt/x')).toEqual({ ok: false, reason: 'NotADirectory' });
      expect(resolvePath(tree, '/', 'config.txt/..')).toEqual({ ok: false, reason: 'NotADirectory' });
    });

    it('should report NotADirectory for a trailing slash after a file', () => {
      expect(resolvePath(tree, '/', 'config.txt/')).toEqual({ ok: false, reason: 'NotADirectory' });
      expect(resolvePath(tree, '/level1/level2', '/level1/level2/level3/file.txt/')).toEqual({
        ok: false,
        reason: 'NotADirectory'
      });
    });

    it('should report NotFound for a cwd outside the tree', () => {
      expect(resolvePath(tree, '/gone', 'x')).toEqual({ ok: false, reason: 'NotFound' });
    });
  });

  it('should give the same node for equivalent paths from different directories', () => {
    const fromRoot = resolvePath(tree, '/', 'level1/level2/level3/file.txt');
    const fromLevel2 = resolvePath(tree, '/level1/level2', 'level3/file.txt');
    const absolute = resolvePath(tree, '/level1/empty', '/level1/level2/level3/file.txt');

    expect(fromRoot.ok && fromRoot.node).toBe(tree.get('/level1/level2/level3/file.txt'));
    expect(fromLevel2.ok && fromLevel2.node).toBe(tree.get('/level1/level2/level3/file.txt'));
    expect(absolute.ok && absolute.node).toBe(tree.get('/level1/level2/level3/file.txt'));
  });
});
