/**
 * @fileoverview Read-only in-memory VFS tree.
 *
 * Nodes are kept in a single arena keyed by absolute path. Directories
 * list their children by name; every node records its parent's path as a
 * plain string, so ownership runs strictly from the root down and the
 * back-reference never keeps anything alive.
 *
 * Trees are assembled with `VfsTreeBuilder` and never change afterwards,
 * which lets any number of sessions share one tree.
 *
 * @module vfs/tree
 */

import * as nodePath from 'node:path';
import type { DirectoryNode, FileNode, VfsNode } from '../types';
import { VfsConstructionError } from '../engine/errors';

export const ROOT_PATH = '/';

const RESERVED_NAMES = new Set(['.', '..']);

/**
 * Split an absolute path into its name segments, ignoring empty ones.
 */
export function splitPath(p: string): string[] {
  return p.split('/').filter(segment => segment !== '');
}

/**
 * Join a directory path and a child name.
 */
export function childPath(parent: string, name: string): string {
  return nodePath.posix.join(parent, name);
}

/**
 * Immutable VFS tree.
 *
 * @example
 * const tree = new VfsTreeBuilder()
 *   .addFile('/dir_1/file_a.txt', 'hello')
 *   .build();
 *
 * tree.get('/dir_1')?.type;     // 'directory'
 * tree.list(tree.root);          // [DirectoryNode dir_1]
 */
export class VfsTree {
  private readonly nodes: ReadonlyMap<string, VfsNode>;

  /** @internal use VfsTreeBuilder */
  constructor(nodes: ReadonlyMap<string, VfsNode>) {
    const root = nodes.get(ROOT_PATH);
    if (!root || root.type !== 'directory') {
      throw new VfsConstructionError('missing root directory', ROOT_PATH);
    }
    this.nodes = nodes;
  }

  get root(): DirectoryNode {
    const root = this.nodes.get(ROOT_PATH);
    if (!root || root.type !== 'directory') {
      throw new VfsConstructionError('missing root directory', ROOT_PATH);
    }
    return root;
  }

  /** Number of nodes, root included. */
  get size(): number {
    return this.nodes.size;
  }

  /**
   * Look up a node by its absolute, normalized path.
   */
  public get(p: string): VfsNode | undefined {
    return this.nodes.get(p);
  }

  /**
   * Look up a direct child of a directory by name.
   */
  public child(dir: DirectoryNode, name: string): VfsNode | undefined {
    if (!dir.children.includes(name)) {
      return undefined;
    }
    return this.nodes.get(childPath(dir.path, name));
  }

  /**
   * Parent directory of a node. The root is its own parent.
   */
  public parentOf(node: VfsNode): DirectoryNode {
    if (node.parent === null) {
      return this.root;
    }
    const parent = this.nodes.get(node.parent);
    if (!parent || parent.type !== 'directory') {
      throw new VfsConstructionError('dangling parent reference', node.path);
    }
    return parent;
  }

  /**
   * Children of a directory, in name order.
   */
  public list(dir: DirectoryNode): VfsNode[] {
    return dir.children.map(name => {
      const node = this.child(dir, name);
      if (!node) {
        throw new VfsConstructionError('dangling child reference', childPath(dir.path, name));
      }
      return node;
    });
  }
}

/**
 * Assembles a VfsTree, enforcing the tree invariants as nodes are added:
 * unique names per directory, no reserved or empty names, and no file
 * used as a directory. Violations throw VfsConstructionError.
 *
 * @example
 * const tree = new VfsTreeBuilder()
 *   .addFile('/config.txt', 'debug=true')
 *   .addDirectory('/level1/level2/level3')
 *   .addFile('/level1/level2/level3/file.txt', 'deep')
 *   .build();
 */
export class VfsTreeBuilder {
  private nodes = new Map<string, VfsNode>();
  private built = false;

  constructor() {
    this.nodes.set(ROOT_PATH, {
      name: ROOT_PATH,
      type: 'directory',
      path: ROOT_PATH,
      parent: null,
      children: [],
    });
  }

  /**
   * Add a directory, creating missing ancestors. Adding an existing
   * directory again is a no-op.
   */
  public addDirectory(p: string): this {
    this.ensureDirectory(this.normalize(p));
    return this;
  }

  /**
   * Add a file, creating missing ancestor directories.
   *
   * @param content - File bytes, or text stored as UTF-8
   */
  public addFile(p: string, content: Uint8Array | string): this {
    const normalized = this.normalize(p);
    if (normalized === ROOT_PATH) {
      throw new VfsConstructionError('root cannot be a file', p);
    }
    if (this.nodes.has(normalized)) {
      throw new VfsConstructionError('duplicate entry', normalized);
    }

    const parentPath = nodePath.posix.dirname(normalized);
    const parent = this.ensureDirectory(parentPath);
    const name = nodePath.posix.basename(normalized);

    const file: FileNode = {
      name,
      type: 'file',
      path: normalized,
      parent: parent.path,
      content: typeof content === 'string' ? new TextEncoder().encode(content) : content,
    };
    this.nodes.set(normalized, file);
    parent.children.push(name);
    return this;
  }

  /**
   * Finish construction. The builder cannot be used afterwards.
   */
  public build(): VfsTree {
    if (this.built) {
      throw new VfsConstructionError('tree already built', ROOT_PATH);
    }
    this.built = true;

    for (const node of this.nodes.values()) {
      if (node.type === 'directory') {
        node.children.sort();
        Object.freeze(node.children);
      }
      Object.freeze(node);
    }
    return new VfsTree(this.nodes);
  }

  private normalize(p: string): string {
    if (this.built) {
      throw new VfsConstructionError('tree already built', p);
    }
    if (!p.startsWith('/')) {
      throw new VfsConstructionError('path must be absolute', p);
    }
    const segments = splitPath(p);
    for (const segment of segments) {
      if (RESERVED_NAMES.has(segment)) {
        throw new VfsConstructionError(`reserved name '${segment}'`, p);
      }
    }
    return '/' + segments.join('/');
  }

  private ensureDirectory(p: string): DirectoryNode {
    const existing = this.nodes.get(p);
    if (existing) {
      if (existing.type !== 'directory') {
        throw new VfsConstructionError('file used as a directory', p);
      }
      return existing;
    }

    const parent = this.ensureDirectory(nodePath.posix.dirname(p));
    const name = nodePath.posix.basename(p);
    const dir: DirectoryNode = {
      name,
      type: 'directory',
      path: p,
      parent: parent.path,
      children: [],
    };
    this.nodes.set(p, dir);
    parent.children.push(name);
    return dir;
  }
}
