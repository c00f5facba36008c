/**
 * FileSystem backed by Node's fs module
 */

import { access, readFile } from 'fs/promises';
import { resolve } from 'path';
import { FileSystem, FileSystemError, ReadOptions, createFileSystemError } from '../types/file-system';
import { Result, ok, err } from '../types/result';

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

export class RealFileSystem implements FileSystem {
  /**
   * @param cwd - Directory relative paths are resolved against
   */
  constructor(private readonly cwd: string = process.cwd()) {}

  async readFile(path: string, options?: ReadOptions): Promise<Result<string, FileSystemError>> {
    const fullPath = this.resolve(path);
    try {
      return ok(await readFile(fullPath, { encoding: options?.encoding ?? 'utf-8' }));
    } catch (error) {
      switch (errorCode(error)) {
        case 'ENOENT':
          return err(createFileSystemError('NOT_FOUND', path));
        case 'EACCES':
          return err(createFileSystemError('PERMISSION_DENIED', path));
        case 'EISDIR':
          return err(createFileSystemError('NOT_A_FILE', path));
      }
      const cause = error instanceof Error ? error : undefined;
      return err(createFileSystemError('IO_ERROR', path, cause?.message, cause));
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(this.resolve(path));
      return true;
    } catch {
      return false;
    }
  }

  resolve(...paths: string[]): string {
    return resolve(this.cwd, ...paths);
  }
}

export function createRealFileSystem(cwd?: string): RealFileSystem {
  return new RealFileSystem(cwd);
}
