/**
 * Node File System Implementation
 */

import { access, mkdir, opendir, readFile, writeFile } from 'node:fs/promises';
import type { Dir } from 'node:fs';
import { dirname } from 'node:path';
import type { DirEntry, FileSystem } from './fs.type.ts';
import { FileSystemError } from './fs.type.ts';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Map Node errors for `path` to FileSystemError; rethrow anything else. */
function translate(error: unknown, path: string): never {
  const code = errorCode(error);
  if (code === 'ENOENT') {
    throw new FileSystemError(`Not found: ${path}`, 'NOT_FOUND');
  }
  if (code === 'EACCES' || code === 'EPERM') {
    throw new FileSystemError(`Permission denied: ${path}`, 'PERMISSION_DENIED');
  }
  throw error;
}

export const nodeFs: FileSystem = {
  async *readDir(path: string): AsyncIterable<DirEntry> {
    let dir: Dir;
    try {
      dir = await opendir(path);
    } catch (error) {
      translate(error, path);
    }
    for await (const entry of dir) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
      };
    }
  },

  async readTextFile(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      translate(error, path);
    }
  },

  async writeTextFile(path: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
    } catch (error) {
      translate(error, path);
    }
  },

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  },
};
