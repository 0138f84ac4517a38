/**
 * @fileoverview VFS loaders.
 *
 * Builds a read-only VfsTree from one of two sources:
 * - A disk image: JSON or YAML describing every path, optionally wrapped
 *   in base64 when stored in a `.b64` file
 * - A host directory: a snapshot of a real directory, read with node:fs
 *
 * Any problem with the source is fatal and reported as VfsLoadError;
 * a source that breaks the tree invariants surfaces as
 * VfsConstructionError from the builder.
 *
 * @module vfs/loader
 */

import * as fs from 'node:fs';
import * as nodePath from 'node:path';
import yaml from 'js-yaml';
import type { DiskFile, DiskImage } from '../types';
import { VfsLoadError } from '../engine/errors';
import { VfsTree, VfsTreeBuilder, childPath, ROOT_PATH } from './tree';

/** File extension of base64-encoded disk images. */
export const ENCODED_IMAGE_EXTENSION = '.b64';

/**
 * Where to load the VFS from. Exactly one field must be set.
 *
 * @property vfsPath - Real directory to snapshot
 * @property vfsDataPath - Disk image file (JSON, YAML or `.b64`)
 */
export interface VfsSource {
  vfsPath?: string;
  vfsDataPath?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isValidDiskFile(obj: unknown): obj is DiskFile {
  if (typeof obj !== 'object' || obj === null) return false;
  const file = obj as Record<string, unknown>;

  if (file.type !== 'file' && file.type !== 'directory') return false;
  if (file.content !== undefined && typeof file.content !== 'string') return false;
  if (file.encoding !== undefined && file.encoding !== 'utf8' && file.encoding !== 'base64') return false;

  return true;
}

/**
 * Validate a DiskImage structure
 */
export function isValidDiskImage(obj: unknown): obj is DiskImage {
  if (typeof obj !== 'object' || obj === null) return false;
  const img = obj as Record<string, unknown>;

  // Check required top-level fields
  if (img.version !== 1) return false;
  if (img.name !== undefined && typeof img.name !== 'string') return false;

  // Check files object
  if (typeof img.files !== 'object' || img.files === null || Array.isArray(img.files)) return false;

  return Object.values(img.files).every(isValidDiskFile);
}

// Names the first bad entry when only the entries are at fault
function describeInvalidImage(obj: unknown): string {
  if (typeof obj === 'object' && obj !== null) {
    const img = obj as Record<string, unknown>;
    if (img.version === 1 && typeof img.files === 'object' && img.files !== null && !Array.isArray(img.files)) {
      const bad = Object.entries(img.files).find(([, file]) => !isValidDiskFile(file));
      if (bad) {
        return `invalid disk image format: invalid entry ${bad[0]}`;
      }
    }
  }
  return 'invalid disk image format';
}

/**
 * Parse and validate a disk image from JSON or YAML string.
 * JSON is recognized by a leading `{`; anything else goes through js-yaml.
 *
 * @param content - Image text
 * @param source - Name used in error messages (usually the file path)
 * @throws VfsLoadError if the text does not parse or is not a disk image
 */
export function parseDiskImage(content: string, source: string): DiskImage {
  let parsed: unknown;

  if (content.trimStart().startsWith('{')) {
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new VfsLoadError('invalid JSON format', source);
    }
  } else {
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new VfsLoadError(`invalid YAML format: ${errorMessage(e)}`, source);
    }
  }

  if (!isValidDiskImage(parsed)) {
    throw new VfsLoadError(describeInvalidImage(parsed), source);
  }

  return parsed;
}

/**
 * Decode the base64 wrapper of a `.b64` image. Whitespace and line breaks
 * are ignored.
 *
 * @throws VfsLoadError if the text is not base64
 */
export function decodeBase64Image(content: string, source: string): string {
  return decodeBase64(content, 'invalid base64 data', source).toString('utf-8');
}

function decodeBase64(text: string, message: string, source: string): Buffer {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(compact)) {
    throw new VfsLoadError(message, source);
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Build a tree from a parsed disk image. Parent directories that the
 * image does not list are created implicitly.
 *
 * @throws VfsLoadError if a base64-encoded file does not hold base64 text
 */
export function buildTreeFromImage(image: DiskImage): VfsTree {
  const builder = new VfsTreeBuilder();

  for (const [filePath, file] of Object.entries(image.files)) {
    if (file.type === 'directory') {
      builder.addDirectory(filePath);
    } else if (file.encoding === 'base64') {
      builder.addFile(filePath, decodeBase64(file.content ?? '', 'invalid base64 content', filePath));
    } else {
      builder.addFile(filePath, file.content ?? '');
    }
  }

  return builder.build();
}

async function readSource(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new VfsLoadError('no such file', filePath);
    }
    if (code === 'EISDIR') {
      throw new VfsLoadError('is a directory, expected an image file', filePath);
    }
    throw new VfsLoadError(errorMessage(error), filePath);
  }
}

/**
 * Load a tree from a disk image file. Files ending in `.b64` are
 * base64-decoded before parsing.
 *
 * @example
 * const tree = await loadDiskImage('./vfs_multi.b64');
 */
export async function loadDiskImage(filePath: string): Promise<VfsTree> {
  let content = await readSource(filePath);

  if (nodePath.extname(filePath) === ENCODED_IMAGE_EXTENSION) {
    content = decodeBase64Image(content, filePath);
  }

  return buildTreeFromImage(parseDiskImage(content, filePath));
}

/**
 * Snapshot a real directory into a tree.
 *
 * Regular files keep their bytes; directories are walked recursively.
 * Symlinks, sockets and other special entries are skipped with a warning.
 *
 * @throws VfsLoadError if the path is missing or not a directory
 */
export async function loadHostDirectory(hostPath: string): Promise<VfsTree> {
  const root = nodePath.resolve(hostPath);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(root);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new VfsLoadError('no such directory', hostPath);
    }
    throw new VfsLoadError(errorMessage(error), hostPath);
  }
  if (!stat.isDirectory()) {
    throw new VfsLoadError('not a directory', hostPath);
  }

  const builder = new VfsTreeBuilder();

  async function walk(realDir: string, virtualDir: string): Promise<void> {
    const entries = await fs.promises.readdir(realDir, { withFileTypes: true });
    for (const entry of entries) {
      const realPath = nodePath.join(realDir, entry.name);
      const virtualPath = childPath(virtualDir, entry.name);

      if (entry.isDirectory()) {
        builder.addDirectory(virtualPath);
        await walk(realPath, virtualPath);
      } else if (entry.isFile()) {
        builder.addFile(virtualPath, await fs.promises.readFile(realPath));
      } else {
        console.warn(`Skipping ${realPath}: not a regular file or directory`);
      }
    }
  }

  await walk(root, ROOT_PATH);
  return builder.build();
}

/**
 * Load the VFS from whichever source is configured.
 *
 * @throws VfsLoadError unless exactly one of `vfsPath` and `vfsDataPath` is set
 */
export async function loadVfs(source: VfsSource): Promise<VfsTree> {
  if (source.vfsPath !== undefined && source.vfsDataPath !== undefined) {
    throw new VfsLoadError('both a VFS directory and a VFS image were given', 'vfs');
  }
  if (source.vfsDataPath !== undefined) {
    return loadDiskImage(source.vfsDataPath);
  }
  if (source.vfsPath !== undefined) {
    return loadHostDirectory(source.vfsPath);
  }
  throw new VfsLoadError('no VFS directory or VFS image given', 'vfs');
}
