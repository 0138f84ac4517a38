/**
 * @fileoverview Path resolution against a VfsTree.
 *
 * @module vfs/resolver
 */

import type { VfsNode } from '../types';
import { ROOT_PATH, splitPath, type VfsTree } from './tree';

export type ResolveResult =
  | { ok: true; node: VfsNode }
  | { ok: false; reason: 'NotFound' | 'NotADirectory' };

/**
 * Resolve a path to a node.
 *
 * Absolute paths start at the root, relative ones at `cwd`. Each segment
 * except the last must name a directory; walking through a file fails
 * with `NotADirectory`, as does a trailing `/` after a file name. `.`
 * stays put and `..` climbs to the parent (the root is its own parent).
 * An empty path resolves to `cwd`.
 *
 * @param tree - The VFS to resolve against
 * @param cwd - Absolute path of the current directory
 * @param pathText - Path as typed by the user
 *
 * @example
 * resolvePath(tree, '/level1', 'level2/level3');
 * // { ok: true, node: DirectoryNode /level1/level2/level3 }
 *
 * resolvePath(tree, '/', 'config.txt/x');
 * // { ok: false, reason: 'NotADirectory' }
 */
export function resolvePath(tree: VfsTree, cwd: string, pathText: string): ResolveResult {
  const start = pathText.startsWith('/') ? ROOT_PATH : cwd;
  const startNode = tree.get(start);
  if (!startNode) {
    return { ok: false, reason: 'NotFound' };
  }

  let node: VfsNode = startNode;
  for (const segment of splitPath(pathText)) {
    if (node.type !== 'directory') {
      return { ok: false, reason: 'NotADirectory' };
    }
    if (segment === '.') {
      continue;
    }
    if (segment === '..') {
      node = tree.parentOf(node);
      continue;
    }

    const next = tree.child(node, segment);
    if (!next) {
      return { ok: false, reason: 'NotFound' };
    }
    node = next;
  }

  // A trailing slash names a directory
  if (pathText.endsWith('/') && node.type !== 'directory') {
    return { ok: false, reason: 'NotADirectory' };
  }

  return { ok: true, node };
}
