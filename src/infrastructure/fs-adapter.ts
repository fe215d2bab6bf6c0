/**
 * Real file system implementation using fs.promises
 */

import * as fs from 'fs/promises';
import { FileSystem, Dirent, Stats } from './interfaces';
import { Result, Ok, isOk, tryCatchAsync } from '../utils/result';
import { FileSystemError } from '../types/errors';

export class NodeFileSystem implements FileSystem {
  async readFile(path: string, encoding: BufferEncoding): Promise<Result<string, FileSystemError>> {
    return tryCatchAsync(
      () => fs.readFile(path, encoding),
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }

  async readBytes(path: string): Promise<Result<Uint8Array, FileSystemError>> {
    return tryCatchAsync(
      () => fs.readFile(path),
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }

  async writeFile(path: string, data: string | Uint8Array): Promise<Result<void, FileSystemError>> {
    return tryCatchAsync(
      () => (typeof data === 'string' ? fs.writeFile(path, data, 'utf-8') : fs.writeFile(path, data)),
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }

  async rename(from: string, to: string): Promise<Result<void, FileSystemError>> {
    return tryCatchAsync(
      () => fs.rename(from, to),
      (error) => FileSystemError.fromNodeError(error, to)
    );
  }

  async unlink(path: string): Promise<Result<void, FileSystemError>> {
    return tryCatchAsync(
      () => fs.unlink(path),
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<Result<void, FileSystemError>> {
    return tryCatchAsync(
      async () => {
        await fs.mkdir(path, options);
      },
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }

  async exists(path: string): Promise<Result<boolean, FileSystemError>> {
    const result = await tryCatchAsync(
      () => fs.access(path),
      (error) => FileSystemError.fromNodeError(error, path)
    );

    if (isOk(result)) {
      return new Ok(true);
    }

    // If error is ENOENT, file doesn't exist (not an error)
    if (result.error.code === 'ENOENT') {
      return new Ok(false);
    }

    return result;
  }

  async readdir(path: string): Promise<Result<Dirent[], FileSystemError>> {
    return tryCatchAsync(
      () => fs.readdir(path, { withFileTypes: true }),
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }

  async stat(path: string): Promise<Result<Stats, FileSystemError>> {
    return tryCatchAsync(
      () => fs.stat(path),
      (error) => FileSystemError.fromNodeError(error, path)
    );
  }
}
