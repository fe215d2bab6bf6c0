import { NodeFileSystem } from '../../infrastructure/fs-adapter';
import { formatDateKey } from '../../core/artifact-naming';
import { OutputRenderer } from '../output-renderer';
import { ArchiveDirOption, openStore } from '../options';
import { isErr } from '../../utils/result';

/**
 * Restore every archived date and report the ones that fail
 */
export async function checkCommand(options: ArchiveDirOption): Promise<void> {
  const output = new OutputRenderer();
  try {
    const store = await openStore(new NodeFileSystem(), process.cwd(), options);
    if (isErr(store)) {
      output.error('Error loading config', store.error);
      process.exit(1);
    }

    const entries = await store.value.list();
    if (isErr(entries)) {
      output.error('Error listing artifacts', entries.error);
      process.exit(1);
    }

    output.info(`Checking ${entries.value.length} date(s) in ${store.value.dir}...`);

    let restored = 0;
    let failed = 0;
    for (const entry of entries.value) {
      const result = await store.value.restore(entry.dateKey);
      if (isErr(result)) {
        failed++;
        output.error(`${formatDateKey(entry.dateKey)} (${entry.fileName})`, result.error);
      } else if (result.value === undefined) {
        failed++;
        output.warning(`${formatDateKey(entry.dateKey)} (${entry.fileName}): no base at or before this date`);
      } else {
        restored++;
      }
    }

    output.summary(restored, failed);
    if (failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    output.error('Unexpected error', error);
    process.exit(1);
  }
}
