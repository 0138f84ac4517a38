export type FSType = 'file' | 'directory';

export interface FSNode {
  name: string;
  type: FSType;
  path: string;           // absolute path, key into the tree arena
  parent: string | null;  // path of the parent directory (non-owning)
}

export interface FileNode extends FSNode {
  type: 'file';
  content: Uint8Array;
}

export interface DirectoryNode extends FSNode {
  type: 'directory';
  children: string[];     // names of children, sorted
}

export type VfsNode = FileNode | DirectoryNode;

export type DiskFileEncoding = 'utf8' | 'base64';

export interface DiskFile {
  type: FSType;
  content?: string;                    // For files
  encoding?: DiskFileEncoding;         // How `content` is encoded (default: utf8)
}

/**
 * Serialized VFS image, stored as JSON or YAML (optionally base64-wrapped
 * in a `.b64` file).
 */
export interface DiskImage {
  version: 1;
  name?: string;
  files: Record<string, DiskFile>;     // path -> file
}
