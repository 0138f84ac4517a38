import { describe, it, expect } from 'vitest';
import { VfsTreeBuilder, childPath, splitPath } from '../src/vfs/tree';
import { VfsConstructionError } from '../src/engine/errors';
import { createDeepTree } from './helpers/vfs';

describe('VfsTreeBuilder', () => {
  it('should start with an empty root directory', () => {
    const tree = new VfsTreeBuilder().build();
    expect(tree.size).toBe(1);
    expect(tree.root).toMatchObject({ name: '/', type: 'directory', path: '/', parent: null, children: [] });
  });

  it('should create missing parent directories for files', () => {
    const tree = new VfsTreeBuilder().addFile('/a/b/c.txt', 'x').build();
    expect(tree.get('/a')?.type).toBe('directory');
    expect(tree.get('/a/b')?.type).toBe('directory');
    expect(tree.get('/a/b/c.txt')?.type).toBe('file');
    expect(tree.size).toBe(4);
  });

  it('should record parent paths', () => {
    const tree = new VfsTreeBuilder().addFile('/a/b/c.txt', 'x').build();
    expect(tree.get('/a')?.parent).toBe('/');
    expect(tree.get('/a/b/c.txt')?.parent).toBe('/a/b');
  });

  it('should store text content as UTF-8 bytes', () => {
    const tree = new VfsTreeBuilder().addFile('/greeting.txt', 'héllo').build();
    const node = tree.get('/greeting.txt');
    expect(node?.type === 'file' && Array.from(node.content)).toEqual([104, 195, 169, 108, 108, 111]);
  });

  it('should keep binary content as given', () => {
    const bytes = new Uint8Array([0, 255, 10]);
    const tree = new VfsTreeBuilder().addFile('/blob.bin', bytes).build();
    const node = tree.get('/blob.bin');
    expect(node?.type === 'file' && node.content).toEqual(bytes);
  });

  it('should sort children by name', () => {
    const tree = new VfsTreeBuilder()
      .addFile('/b.txt', '')
      .addDirectory('/C')
      .addFile('/a.txt', '')
      .build();
    expect(tree.root.children).toEqual(['C', 'a.txt', 'b.txt']);
  });

  it('should normalize repeated and trailing slashes', () => {
    const tree = new VfsTreeBuilder().addDirectory('//x///y/').build();
    expect(tree.get('/x/y')?.type).toBe('directory');
  });

  it('should accept the same directory twice', () => {
    const tree = new VfsTreeBuilder().addDirectory('/d').addFile('/d/f', '').addDirectory('/d').build();
    expect(tree.root.children).toEqual(['d']);
  });

  it('should reject duplicate file entries', () => {
    const builder = new VfsTreeBuilder().addFile('/f.txt', 'one');
    expect(() => builder.addFile('/f.txt', 'two')).toThrow(VfsConstructionError);
    expect(() => builder.addFile('/f.txt', 'two')).toThrow('duplicate entry: /f.txt');
  });

  it('should reject a file where a directory exists', () => {
    const builder = new VfsTreeBuilder().addDirectory('/d');
    expect(() => builder.addFile('/d', 'x')).toThrow('duplicate entry: /d');
  });

  it('should reject a file used as a directory', () => {
    const builder = new VfsTreeBuilder().addFile('/f', 'x');
    expect(() => builder.addFile('/f/g', 'y')).toThrow('file used as a directory: /f');
    expect(() => builder.addDirectory('/f')).toThrow('file used as a directory: /f');
  });

  it('should reject reserved names', () => {
    const builder = new VfsTreeBuilder();
    expect(() => builder.addDirectory('/a/../b')).toThrow("reserved name '..': /a/../b");
    expect(() => builder.addFile('/./x', '')).toThrow("reserved name '.': /./x");
  });

  it('should reject relative paths', () => {
    expect(() => new VfsTreeBuilder().addFile('x.txt', '')).toThrow('path must be absolute: x.txt');
  });

  it('should reject a file at the root path', () => {
    expect(() => new VfsTreeBuilder().addFile('/', '')).toThrow('root cannot be a file: /');
  });

  it('should refuse changes after build', () => {
    const builder = new VfsTreeBuilder();
    builder.build();
    expect(() => builder.addDirectory('/late')).toThrow(VfsConstructionError);
    expect(() => builder.build()).toThrow('tree already built: /');
  });

  it('should freeze nodes once built', () => {
    const tree = new VfsTreeBuilder().addFile('/a.txt', 'x').build();
    expect(Object.isFrozen(tree.root)).toBe(true);
    expect(Object.isFrozen(tree.root.children)).toBe(true);
  });
});

describe('VfsTree', () => {
  const tree = createDeepTree();

  it('should look up direct children by name', () => {
    expect(tree.child(tree.root, 'config.txt')?.path).toBe('/config.txt');
    expect(tree.child(tree.root, 'missing')).toBeUndefined();
  });

  it('should list children in order', () => {
    expect(tree.list(tree.root).map(node => `${node.type}:${node.name}`)).toEqual([
      'file:config.txt',
      'directory:level1',
      'directory:my docs'
    ]);
  });

  it('should return the parent directory', () => {
    const level3 = tree.get('/level1/level2/level3');
    expect(level3 && tree.parentOf(level3).path).toBe('/level1/level2');
  });

  it('should treat the root as its own parent', () => {
    expect(tree.parentOf(tree.root)).toBe(tree.root);
  });
});

describe('path helpers', () => {
  it('should split paths into non-empty segments', () => {
    expect(splitPath('/a//b/')).toEqual(['a', 'b']);
    expect(splitPath('a/b')).toEqual(['a', 'b']);
    expect(splitPath('/')).toEqual([]);
  });

  it('should join a directory and a child name', () => {
    expect(childPath('/', 'a')).toBe('/a');
    expect(childPath('/a', 'b')).toBe('/a/b');
  });
});
