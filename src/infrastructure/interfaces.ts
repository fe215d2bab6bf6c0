/**
 * Infrastructure interfaces for dependency injection
 *
 * These interfaces define contracts for external dependencies
 * that can be mocked in tests and swapped in production.
 */

import { Result } from '../utils/result';
import { FileSystemError } from '../types/errors';

/**
 * File system operations interface
 * Abstracts fs.promises for testing and flexibility
 */
export interface FileSystem {
  /**
   * Read file contents as text
   */
  readFile(path: string, encoding: BufferEncoding): Promise<Result<string, FileSystemError>>;

  /**
   * Read raw file contents
   */
  readBytes(path: string): Promise<Result<Uint8Array, FileSystemError>>;

  /**
   * Write file contents (text is written as UTF-8)
   */
  writeFile(path: string, data: string | Uint8Array): Promise<Result<void, FileSystemError>>;

  /**
   * Move a file, replacing the destination
   */
  rename(from: string, to: string): Promise<Result<void, FileSystemError>>;

  /**
   * Delete a file
   */
  unlink(path: string): Promise<Result<void, FileSystemError>>;

  /**
   * Create directory
   */
  mkdir(path: string, options?: { recursive?: boolean }): Promise<Result<void, FileSystemError>>;

  /**
   * Check if file/directory exists
   */
  exists(path: string): Promise<Result<boolean, FileSystemError>>;

  /**
   * Read directory contents
   */
  readdir(path: string): Promise<Result<Dirent[], FileSystemError>>;

  /**
   * Get file stats
   */
  stat(path: string): Promise<Result<Stats, FileSystemError>>;
}

/**
 * Directory entry (matches fs.Dirent)
 */
export interface Dirent {
  name: string;
  isFile(): boolean;
  isDirectory(): boolean;
}

/**
 * File stats (matches fs.Stats subset we need)
 */
export interface Stats {
  isFile(): boolean;
  isDirectory(): boolean;
  size: number;
  mtime: Date;
}
