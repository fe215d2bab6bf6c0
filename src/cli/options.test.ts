import { describe, it, expect, beforeEach } from 'vitest';
import { Command } from 'commander';
import { parseDateOption, openStore } from './options';
import { InMemoryFileSystem } from '../testing/memory-fs';
import { isOk, isErr } from '../utils/result';

describe('CLI options', () => {
  describe('parseDateOption', () => {
    it('returns the date key', () => {
      expect(parseDateOption('2026-01-30')).toBe('20260130');
      expect(parseDateOption('20260130')).toBe('20260130');
    });

    it('throws on impossible dates', () => {
      expect(() => parseDateOption('2026-02-30')).toThrow('Invalid date "2026-02-30": no such day');
    });
  });

  describe('archive flag parsing', () => {
    let program: Command;

    beforeEach(() => {
      // Create a commander program in test mode (don't exit process)
      program = new Command();
      program.exitOverride();

      // Replicate the archive command configuration from src/cli/index.ts
      program
        .name('test-cli')
        .option('-d, --date <date>', 'Snapshot date', parseDateOption)
        .option('--dir <path>', 'Archive directory')
        .argument('<file>', 'Report file');
    });

    it('normalizes --date', () => {
      program.parse(['report.xml', '--date', '2026-01-30'], { from: 'user' });
      expect(program.opts()).toEqual({ date: '20260130' });
    });

    it('rejects a malformed --date', () => {
      expect(() => {
        program.parse(['report.xml', '--date', '30.01.2026'], { from: 'user' });
      }).toThrow('Invalid date "30.01.2026"');
    });

    it('leaves --date unset when omitted', () => {
      program.parse(['report.xml', '--dir', 'vault'], { from: 'user' });
      expect(program.opts()).toEqual({ dir: 'vault' });
    });
  });

  describe('openStore', () => {
    const cwd = '/workspace/reports';
    let fs: InMemoryFileSystem;

    beforeEach(() => {
      fs = new InMemoryFileSystem();
    });

    it('opens the configured archive directory', async () => {
      fs.setFile(`${cwd}/.deltavault/config.json`, '{"archiveDir":"vault"}');
      const store = await openStore(fs, cwd, {});
      expect(isOk(store) && store.value.dir).toBe('/workspace/reports/vault');
    });

    it('prefers --dir', async () => {
      const store = await openStore(fs, cwd, { dir: '/srv/vault' });
      expect(isOk(store) && store.value.dir).toBe('/srv/vault');
    });

    it('fails on an invalid config', async () => {
      fs.setFile(`${cwd}/.deltavault/config.json`, '{"layout":"7z"}');
      const store = await openStore(fs, cwd, {});
      expect(isErr(store) && store.error.code).toBe('INVALID_CONFIG');
    });
  });
});
