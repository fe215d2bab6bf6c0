import { ConfigService } from '../../core/config-service';
import { NodeFileSystem } from '../../infrastructure/fs-adapter';
import { OutputRenderer } from '../output-renderer';
import { isErr } from '../../utils/result';

export async function initCommand(): Promise<void> {
  const output = new OutputRenderer();
  try {
    output.info('Initializing .deltavault directory...');

    const configService = new ConfigService(new NodeFileSystem());
    const result = await configService.initialize(process.cwd());

    if (isErr(result)) {
      output.error('Error initializing .deltavault', result.error);
      process.exit(1);
    }

    if (result.value) {
      output.success('Created .deltavault/config.json');
    } else {
      output.warning('.deltavault/config.json already exists, left unchanged');
    }
    console.log();
    console.log('Next steps:');
    console.log('  1. Edit .deltavault/config.json to choose the archive directory and layout');
    console.log('  2. Run: deltavault archive <report.xml>');
  } catch (error) {
    output.error('Unexpected error', error);
    process.exit(1);
  }
}
