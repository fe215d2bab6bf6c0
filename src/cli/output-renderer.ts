import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { ArtifactEntry } from '../types';
import { isDeltaVaultError } from '../types/errors';
import { formatDateKey } from '../core/artifact-naming';
import { formatBytes } from '../utils/output-formatting';

/**
 * Artifact listing row: an entry and its size on disk, when known
 */
export interface ArtifactRow {
  entry: ArtifactEntry;
  sizeBytes?: number;
}

/**
 * OutputRenderer provides consistent console output for the CLI
 * commands: a spinner for long steps, coloured status lines, and
 * error details on stderr.
 */
export class OutputRenderer {
  private spinner: Ora | null = null;

  /**
   * Start a spinner with a message
   */
  startSpinner(message: string): void {
    this.stopSpinner();
    this.spinner = ora({
      text: message,
      color: 'cyan',
    }).start();
  }

  /**
   * Stop spinner with success
   */
  succeedSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    }
  }

  /**
   * Stop spinner with failure
   */
  failSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
  }

  /**
   * Stop spinner without status
   */
  stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  info(message: string): void {
    this.stopSpinner();
    console.log(chalk.blue(message));
  }

  success(message: string): void {
    this.stopSpinner();
    console.log(chalk.green('✓ ' + message));
  }

  warning(message: string): void {
    this.stopSpinner();
    console.log(chalk.yellow(message));
  }

  debug(message: string): void {
    this.stopSpinner();
    console.log(chalk.gray(message));
  }

  /**
   * Print an error message on stderr, with code and context for domain
   * errors
   */
  error(message: string, error?: unknown): void {
    this.stopSpinner();
    console.error(chalk.red('✗ ' + message));

    if (isDeltaVaultError(error)) {
      console.error(chalk.gray(`  Error: ${error.message}`));
      console.error(chalk.gray(`  Code: ${error.code}`));
      if (error.context && Object.keys(error.context).length > 0) {
        console.error(chalk.gray(`  Context: ${JSON.stringify(error.context, null, 2)}`));
      }
    } else if (error instanceof Error) {
      console.error(chalk.gray(`  ${error.message}`));
    } else if (error !== undefined) {
      console.error(chalk.gray(`  ${String(error)}`));
    }
  }

  /**
   * Print artifacts in date order, one per line
   */
  artifacts(rows: ArtifactRow[]): void {
    this.stopSpinner();
    for (const { entry, sizeBytes } of rows) {
      const kind = entry.kind === 'base' ? chalk.cyan('base ') : chalk.magenta('delta');
      const size = sizeBytes === undefined ? '?' : formatBytes(sizeBytes);
      console.log(`${formatDateKey(entry.dateKey)}  ${kind}  ${size.padStart(10)}  ${chalk.gray(entry.fileName)}`);
    }
  }

  /**
   * Print final summary
   */
  summary(successCount: number, failCount: number): void {
    this.stopSpinner();
    console.log();
    console.log(chalk.white.bold('Summary:'));
    if (successCount > 0) {
      console.log(chalk.green(`  ✓ ${successCount} date(s) restored`));
    }
    if (failCount > 0) {
      console.log(chalk.red(`  ✗ ${failCount} date(s) failed`));
    }
  }
}
