import * as path from 'path';
import { NodeFileSystem } from '../../infrastructure/fs-adapter';
import { ArchiveOutcome } from '../../types';
import { formatDateKey, todayDateKey } from '../../core/artifact-naming';
import { formatBytes, formatRatio } from '../../utils/output-formatting';
import { OutputRenderer } from '../output-renderer';
import { ArchiveDirOption, openStore } from '../options';
import { isErr } from '../../utils/result';

export interface ArchiveCommandOptions extends ArchiveDirOption {
  /** YYYYMMDD, already validated by parseDateOption */
  date?: string;
}

export async function archiveCommand(file: string, options: ArchiveCommandOptions): Promise<void> {
  const output = new OutputRenderer();
  try {
    const dateKey = options.date ?? todayDateKey();
    const fs = new NodeFileSystem();

    const text = await fs.readFile(path.resolve(file), 'utf-8');
    if (isErr(text)) {
      output.error(`Cannot read ${file}`, text.error);
      process.exit(1);
    }

    const store = await openStore(fs, process.cwd(), options);
    if (isErr(store)) {
      output.error('Error loading config', store.error);
      process.exit(1);
    }

    output.startSpinner(`Archiving ${file} as ${formatDateKey(dateKey)} in ${store.value.dir}...`);
    const result = await store.value.archive(text.value, dateKey);
    if (isErr(result)) {
      output.failSpinner('Archive failed');
      output.error(result.error.message, result.error);
      process.exit(1);
    }

    output.succeedSpinner(`Stored ${result.value.fileName}`);
    reportOutcome(output, result.value);
  } catch (error) {
    output.error('Unexpected error', error);
    process.exit(1);
  }
}

function reportOutcome(output: OutputRenderer, outcome: ArchiveOutcome): void {
  const { baseSizeBytes, deltaSizeBytes } = outcome;

  if (baseSizeBytes !== undefined && deltaSizeBytes !== undefined) {
    const sizes = `${formatBytes(deltaSizeBytes)} against a ${formatBytes(baseSizeBytes)} predecessor (${formatRatio(
      deltaSizeBytes,
      baseSizeBytes
    )})`;
    if (outcome.kind === 'delta') {
      output.debug(`  Delta of ${sizes}`);
    } else {
      output.debug(`  Promoted to base: delta would be ${sizes}`);
    }
  } else {
    output.debug('  First snapshot in its chain, stored as base');
  }

  for (const fileName of outcome.pruned) {
    output.debug(`  Pruned ${fileName}`);
  }
  if (outcome.rebased) {
    output.debug(`  Re-encoded ${outcome.rebased.fileName} against the new snapshot`);
  }
}
