import { NodeFileSystem } from '../../infrastructure/fs-adapter';
import { OutputRenderer, ArtifactRow } from '../output-renderer';
import { ArchiveDirOption, openStore } from '../options';
import { isErr } from '../../utils/result';

export async function lsCommand(options: ArchiveDirOption): Promise<void> {
  const output = new OutputRenderer();
  try {
    const store = await openStore(new NodeFileSystem(), process.cwd(), options);
    if (isErr(store)) {
      output.error('Error loading config', store.error);
      process.exit(1);
    }

    output.info(`Listing artifacts in ${store.value.dir}...`);
    console.log();

    const entries = await store.value.list();
    if (isErr(entries)) {
      output.error('Error listing artifacts', entries.error);
      process.exit(1);
    }

    if (entries.value.length === 0) {
      output.warning('No artifacts found');
      return;
    }

    const rows: ArtifactRow[] = [];
    for (const entry of entries.value) {
      const stats = await store.value.statArtifact(entry);
      rows.push({ entry, sizeBytes: isErr(stats) ? undefined : stats.value.size });
    }
    output.artifacts(rows);

    const bases = entries.value.filter((entry) => entry.kind === 'base').length;
    console.log();
    console.log(`Total: ${entries.value.length} artifact(s), ${bases} base(s)`);
  } catch (error) {
    output.error('Error listing artifacts', error);
    process.exit(1);
  }
}
