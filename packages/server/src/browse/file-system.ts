/**
 * Filesystem capability used by the resolver and renderer.
 *
 * Request handling only ever touches the disk through this interface, so
 * tests can swap in an in-memory tree.
 */

import { readFile, readdir, stat } from "node:fs/promises";

export interface FileStat {
  isDirectory(): boolean;
}

export interface DirectoryChild {
  name: string;
  isDirectory(): boolean;
}

export interface FileSystem {
  stat(path: string): Promise<FileStat>;
  readdir(path: string): Promise<DirectoryChild[]>;
  readFile(path: string): Promise<Buffer>;
}

export const nodeFileSystem: FileSystem = {
  stat: (path) => stat(path),
  readdir: (path) => readdir(path, { withFileTypes: true }),
  readFile: (path) => readFile(path),
};
