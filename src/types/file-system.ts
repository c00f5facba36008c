/**
 * FileSystem interface
 * The read side of the file system, abstracted so loaders can be tested in memory
 */

import { Result } from './result';

export interface ReadOptions {
  /** File encoding (default: 'utf-8') */
  encoding?: BufferEncoding;
}

export type FileSystemErrorCode = 'NOT_FOUND' | 'PERMISSION_DENIED' | 'NOT_A_FILE' | 'IO_ERROR';

export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

export interface FileSystem {
  readFile(path: string, options?: ReadOptions): Promise<Result<string, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  /**
   * Resolve a path to absolute form
   */
  resolve(...paths: string[]): string;
}

export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `File not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    IO_ERROR: `Could not read: ${path}`,
  };
  return { code, path, message: message ?? defaultMessages[code], cause };
}
