/**
 * IO module - file system access and sequence loading
 */

export { RealFileSystem, createRealFileSystem } from './real-file-system';
export { MemoryFileSystem, createMemoryFileSystem } from './memory-file-system';

export type { LoadSequenceError, LoadSequenceErrorCode, LoadSequenceOptions } from './load-sequence-file';
export { loadSequenceFile } from './load-sequence-file';
