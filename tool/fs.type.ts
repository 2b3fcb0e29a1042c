/**
 * File System Abstraction
 *
 * Lets the site generator and output plugins run against Node's file
 * system or an in-memory fake.
 */

export interface DirEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

export interface FileSystem {
  /** Read directory entries */
  readDir(path: string): AsyncIterable<DirEntry>;

  /** Read a UTF-8 text file */
  readTextFile(path: string): Promise<string>;

  /** Write text to file, creating parent directories */
  writeTextFile(path: string, content: string): Promise<void>;

  /** Check if path exists */
  exists(path: string): Promise<boolean>;
}

export class FileSystemError extends Error {
  constructor(
    message: string,
    public readonly code: 'NOT_FOUND' | 'PERMISSION_DENIED' | 'UNKNOWN',
  ) {
    super(message);
    this.name = 'FileSystemError';
  }
}
