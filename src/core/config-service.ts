/**
 * Config service - config persistence with dependency injection
 *
 * Uses FileSystem interface for testability.
 */

import { DeltaVaultConfig } from '../types';
import { FileSystem } from '../infrastructure/interfaces';
import { Result, Ok, isErr } from '../utils/result';
import { FileSystemError, ValidationError, ParseError } from '../types/errors';
import {
  getConfigDir,
  getConfigFilePath,
  validateConfig,
  parseJSON,
  serializeJSON,
  DEFAULT_CONFIG,
} from './config-core';

export type ConfigError = FileSystemError | ValidationError | ParseError;

export class ConfigService {
  constructor(private readonly fs: FileSystem) {}

  /**
   * Create .deltavault/config.json with defaults
   *
   * Returns false when a config file already existed and was left alone.
   */
  async initialize(cwd: string): Promise<Result<boolean, ConfigError>> {
    const mkdirResult = await this.fs.mkdir(getConfigDir(cwd), { recursive: true });
    if (isErr(mkdirResult)) {
      return mkdirResult;
    }

    const configPath = getConfigFilePath(cwd);
    const configExists = await this.fs.exists(configPath);
    if (isErr(configExists)) {
      return configExists;
    }
    if (configExists.value) {
      return new Ok(false);
    }

    const configJson = serializeJSON(DEFAULT_CONFIG);
    if (isErr(configJson)) {
      return configJson;
    }

    const writeResult = await this.fs.writeFile(configPath, configJson.value);
    if (isErr(writeResult)) {
      return writeResult;
    }

    return new Ok(true);
  }

  /**
   * Load configuration from .deltavault/config.json
   */
  async loadConfig(cwd: string): Promise<Result<DeltaVaultConfig, ConfigError>> {
    const readResult = await this.fs.readFile(getConfigFilePath(cwd), 'utf-8');

    // If file doesn't exist, return defaults
    if (isErr(readResult)) {
      if (readResult.error.code === 'ENOENT') {
        return new Ok(DEFAULT_CONFIG);
      }
      return readResult;
    }

    const parseResult = parseJSON(readResult.value, 'config file');
    if (isErr(parseResult)) {
      return parseResult;
    }

    return validateConfig(parseResult.value);
  }
}
