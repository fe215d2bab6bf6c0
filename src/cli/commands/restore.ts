import * as path from 'path';
import { NodeFileSystem } from '../../infrastructure/fs-adapter';
import { formatDateKey } from '../../core/artifact-naming';
import { OutputRenderer } from '../output-renderer';
import { ArchiveDirOption, openStore } from '../options';
import { isErr } from '../../utils/result';

export interface RestoreCommandOptions extends ArchiveDirOption {
  output?: string;
}

/**
 * @param dateKey - YYYYMMDD, already validated by parseDateOption
 */
export async function restoreCommand(dateKey: string, options: RestoreCommandOptions): Promise<void> {
  const output = new OutputRenderer();
  try {
    const fs = new NodeFileSystem();
    const store = await openStore(fs, process.cwd(), options);
    if (isErr(store)) {
      output.error('Error loading config', store.error);
      process.exit(1);
    }

    output.info(`Restoring ${formatDateKey(dateKey)} from ${store.value.dir}...`);
    const result = await store.value.restoreWithTrace(dateKey);
    if (isErr(result)) {
      output.error('Restore failed', result.error);
      process.exit(1);
    }

    const trace = result.value;
    if (!trace) {
      output.warning(`No snapshot found for date ${formatDateKey(dateKey)}`);
      return;
    }

    const target = path.resolve(options.output ?? `report_${dateKey}.xml`);
    const written = await fs.writeFile(target, trace.text);
    if (isErr(written)) {
      output.error(`Cannot write ${target}`, written.error);
      process.exit(1);
    }

    output.success(`Restored ${formatDateKey(dateKey)} to ${target}`);
    output.debug(`  Base ${trace.base.fileName} + ${trace.deltas.length} delta(s)`);
  } catch (error) {
    output.error('Unexpected error', error);
    process.exit(1);
  }
}
