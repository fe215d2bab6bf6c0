import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OutputRenderer } from './output-renderer';
import { ArchiveError } from '../types/errors';

function spyOnConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

describe('OutputRenderer', () => {
  let renderer: OutputRenderer;
  let logSpy: ReturnType<typeof spyOnConsole>['log'];
  let errorSpy: ReturnType<typeof spyOnConsole>['error'];

  beforeEach(() => {
    const spies = spyOnConsole();
    logSpy = spies.log;
    errorSpy = spies.error;
    renderer = new OutputRenderer();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints status lines on stdout', () => {
    renderer.info('Listing artifacts');
    renderer.success('Stored delta_20260130.patch');
    renderer.warning('No snapshot found for date 2026-01-01');

    expect(logSpy).toHaveBeenCalledTimes(3);
    expect(logSpy).toHaveBeenNthCalledWith(2, expect.stringContaining('✓ Stored delta_20260130.patch'));
    expect(logSpy).toHaveBeenNthCalledWith(3, expect.stringContaining('No snapshot found for date 2026-01-01'));
  });

  it('prints errors with code and context on stderr', () => {
    const error = new ArchiveError('Archive directory /vault is unavailable', 'ARCHIVE_UNAVAILABLE', {
      dir: '/vault',
    });

    renderer.error('Restore failed', error);

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('✗ Restore failed'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Code: ARCHIVE_UNAVAILABLE'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('"dir": "/vault"'));
  });

  it('prints plain errors by message', () => {
    renderer.error('Unexpected error', new Error('boom'));
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith(expect.stringContaining('boom'));
  });

  it('lists artifacts with date, kind and size', () => {
    renderer.artifacts([
      { entry: { kind: 'base', dateKey: '20260129', fileName: 'base_20260129.xml' }, sizeBytes: 2048 },
      { entry: { kind: 'delta', dateKey: '20260130', fileName: 'delta_20260130.patch' } },
    ]);

    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenNthCalledWith(1, expect.stringContaining('2026-01-29'));
    expect(logSpy).toHaveBeenNthCalledWith(1, expect.stringContaining('2.0 KiB'));
    expect(logSpy).toHaveBeenNthCalledWith(2, expect.stringContaining('delta_20260130.patch'));
  });

  it('summarizes successes and failures', () => {
    renderer.summary(3, 1);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('3 date(s) restored'));
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('1 date(s) failed'));
  });
});
