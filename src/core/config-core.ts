/**
 * Config core module - Pure configuration logic
 *
 * All functions are pure - no I/O, no side effects.
 * Path manipulation and validation only.
 */

import * as path from 'path';
import { ArchiveStoreOptions, DeltaVaultConfig } from '../types';
import { DeltaVaultConfigSchema } from '../types/schemas';
import { Result, Ok, Err, tryCatch } from '../utils/result';
import { ParseError, ValidationError } from '../types/errors';
import { DEFAULT_RETENTION } from './retention-policy';

export const CONFIG_DIR = '.deltavault';

export const DEFAULT_CONFIG: DeltaVaultConfig = {
  archiveDir: `${CONFIG_DIR}/archive`,
  layout: 'plain',
  pruneSupersededBases: false,
  retention: DEFAULT_RETENTION,
};

/**
 * Get the .deltavault directory path for a project
 *
 * PURE: Path manipulation only
 */
export function getConfigDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

/**
 * Get the config file path
 *
 * PURE: Path manipulation only
 */
export function getConfigFilePath(cwd: string): string {
  return path.join(getConfigDir(cwd), 'config.json');
}

/**
 * Validate config object structure using Zod schema
 *
 * Missing fields take their defaults.
 */
export function validateConfig(data: unknown): Result<DeltaVaultConfig, ValidationError> {
  const result = DeltaVaultConfigSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.issues;
    const firstError = errors[0];
    const message = firstError
      ? `Invalid config structure: ${firstError.message} at ${firstError.path.join('.')}`
      : 'Invalid config structure';

    return new Err(
      new ValidationError(
        message,
        'INVALID_CONFIG',
        { zodError: errors, receivedData: data }
      )
    );
  }

  return new Ok(result.data);
}

/**
 * Parse JSON string
 *
 * PURE: String parsing only
 */
export function parseJSON(jsonString: string, context: string = 'data'): Result<unknown, ParseError> {
  return tryCatch(
    (): unknown => JSON.parse(jsonString),
    (error) =>
      new ParseError(
        `Failed to parse ${context}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONTENT',
        { jsonString: jsonString.substring(0, 100) }
      )
  );
}

/**
 * Serialize object to JSON string
 *
 * PURE: String serialization only
 */
export function serializeJSON(data: unknown): Result<string, ParseError> {
  return tryCatch(
    () => `${JSON.stringify(data, null, 2)}\n`,
    (error) =>
      new ParseError(
        `Failed to serialize to JSON: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONTENT'
      )
  );
}

/**
 * Store options for a project, with an optional archive directory override
 *
 * Relative directories resolve against cwd.
 */
export function resolveStoreOptions(
  config: DeltaVaultConfig,
  cwd: string,
  dirOverride?: string
): ArchiveStoreOptions {
  return {
    dir: path.resolve(cwd, dirOverride ?? config.archiveDir),
    layout: config.layout,
    retention: config.retention,
    pruneSupersededBases: config.pruneSupersededBases,
  };
}
