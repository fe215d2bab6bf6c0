#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init';
import { archiveCommand } from './commands/archive';
import { restoreCommand } from './commands/restore';
import { lsCommand } from './commands/ls';
import { checkCommand } from './commands/check';
import { parseDateOption } from './options';

const DIR_OPTION_DESCRIPTION = 'Archive directory (default: archiveDir from .deltavault/config.json)';

const program = new Command();

program
  .name('deltavault')
  .description('Delta-compressed archive of daily report snapshots')
  .version('0.1.0');

program
  .command('init')
  .description('Create .deltavault/config.json with default settings')
  .action(initCommand);

program
  .command('archive <file>')
  .description('Archive a report file as the snapshot for one date')
  .option('-d, --date <date>', 'Snapshot date, YYYY-MM-DD or YYYYMMDD (default: today, local time)', parseDateOption)
  .option('--dir <path>', DIR_OPTION_DESCRIPTION)
  .action(archiveCommand);

program
  .command('restore')
  .argument('<date>', 'Date to restore, YYYY-MM-DD or YYYYMMDD', parseDateOption)
  .description('Rebuild the snapshot for a date from its base and deltas')
  .option('-o, --output <file>', 'Output file (default: report_YYYYMMDD.xml)')
  .option('--dir <path>', DIR_OPTION_DESCRIPTION)
  .action(restoreCommand);

program
  .command('ls')
  .description('List archived artifacts in date order')
  .option('--dir <path>', DIR_OPTION_DESCRIPTION)
  .action(lsCommand);

program
  .command('check')
  .description('Restore every archived date and report failures')
  .option('--dir <path>', DIR_OPTION_DESCRIPTION)
  .action(checkCommand);

program.parse();
