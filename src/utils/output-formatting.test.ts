import { describe, it, expect } from 'vitest';
import { formatBytes, formatRatio } from './output-formatting';

describe('formatBytes', () => {
  it('prints small sizes exactly', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('scales larger sizes', () => {
    expect(formatBytes(1024)).toBe('1.0 KiB');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MiB');
  });

  it('stops at the largest unit', () => {
    expect(formatBytes(2048 * 1024 * 1024 * 1024)).toBe('2048.0 GiB');
  });
});

describe('formatRatio', () => {
  it('prints the delta share of its predecessor', () => {
    expect(formatRatio(125, 1000)).toBe('12.5%');
    expect(formatRatio(950, 1000)).toBe('95.0%');
  });

  it('has no ratio against an empty predecessor', () => {
    expect(formatRatio(10, 0)).toBe('n/a');
  });
});
