/**
 * In-memory FileSystem
 * For testing - files are held in a map keyed by absolute path
 */

import { dirname, resolve, sep } from 'path';
import { FileSystem, FileSystemError, ReadOptions, createFileSystemError } from '../types/file-system';
import { Result, ok, err } from '../types/result';

export class MemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();

  constructor(private readonly cwd: string = '/') {}

  /**
   * Add or replace a file
   */
  setFile(path: string, content: string): this {
    this.files.set(this.resolve(path), content);
    return this;
  }

  async readFile(path: string, _options?: ReadOptions): Promise<Result<string, FileSystemError>> {
    const fullPath = this.resolve(path);
    const content = this.files.get(fullPath);
    if (content !== undefined) {
      return ok(content);
    }
    if (this.isDirectory(fullPath)) {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return err(createFileSystemError('NOT_FOUND', path));
  }

  async exists(path: string): Promise<boolean> {
    const fullPath = this.resolve(path);
    return this.files.has(fullPath) || this.isDirectory(fullPath);
  }

  resolve(...paths: string[]): string {
    return resolve(this.cwd, ...paths);
  }

  private isDirectory(fullPath: string): boolean {
    const prefix = fullPath.endsWith(sep) ? fullPath : fullPath + sep;
    return [...this.files.keys()].some((file) => dirname(file).startsWith(prefix) || dirname(file) === fullPath);
  }
}

export function createMemoryFileSystem(cwd?: string): MemoryFileSystem {
  return new MemoryFileSystem(cwd);
}
