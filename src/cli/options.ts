/**
 * Commander option parsers and the store every command opens
 */

import { ArchiveStore } from '../core/archive-store';
import { ConfigError, ConfigService } from '../core/config-service';
import { resolveStoreOptions } from '../core/config-core';
import { toDateKey } from '../core/artifact-naming';
import { FileSystem } from '../infrastructure/interfaces';
import { Result, Ok, isErr } from '../utils/result';

/**
 * Options shared by every archive command
 */
export interface ArchiveDirOption {
  dir?: string;
}

/**
 * Validate a --date value, returning its YYYYMMDD key
 */
export function parseDateOption(value: string): string {
  const key = toDateKey(value);
  if (isErr(key)) {
    throw new Error(key.error.message);
  }
  return key.value;
}

/**
 * Load the project config from cwd and open its archive
 */
export async function openStore(
  fs: FileSystem,
  cwd: string,
  options: ArchiveDirOption
): Promise<Result<ArchiveStore, ConfigError>> {
  const config = await new ConfigService(fs).loadConfig(cwd);
  if (isErr(config)) {
    return config;
  }
  return new Ok(new ArchiveStore(fs, resolveStoreOptions(config.value, cwd, options.dir)));
}
