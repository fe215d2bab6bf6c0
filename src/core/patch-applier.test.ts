import { describe, it, expect } from 'vitest';
import { applyPatch, hunkStart } from './patch-applier';
import { parsePatch } from './patch-document';
import { isOk, isErr } from '../utils/result';
import { Hunk, PatchDocument } from '../types';

function patchOf(...hunks: Hunk[]): PatchDocument {
  return { from: 'base_20260101.xml', to: 'delta_20260102.patch', hunks };
}

describe('Patch Applier (Pure Functions)', () => {
  describe('hunkStart', () => {
    it('starts a modification at its first old line', () => {
      expect(hunkStart({ header: { oldStart: 3, oldCount: 2, newStart: 3, newCount: 1 }, lines: [] })).toBe(2);
    });

    it('starts a pure insertion after line oldStart', () => {
      expect(hunkStart({ header: { oldStart: 3, oldCount: 0, newStart: 4, newCount: 1 }, lines: [] })).toBe(3);
    });
  });

  it('replaces a line', () => {
    const result = applyPatch(
      ['a\n', 'b\n', 'c\n'],
      patchOf({
        header: { oldStart: 2, oldCount: 1, newStart: 2, newCount: 1 },
        lines: [
          { kind: 'delete', text: 'b\n' },
          { kind: 'insert', text: 'B\n' },
        ],
      })
    );
    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value).toEqual(['a\n', 'B\n', 'c\n']);
    }
  });

  it('inserts at the top and appends at the end', () => {
    const result = applyPatch(
      ['b\n'],
      patchOf(
        { header: { oldStart: 0, oldCount: 0, newStart: 1, newCount: 1 }, lines: [{ kind: 'insert', text: 'a\n' }] },
        { header: { oldStart: 1, oldCount: 0, newStart: 3, newCount: 1 }, lines: [{ kind: 'insert', text: 'c\n' }] }
      )
    );
    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value).toEqual(['a\n', 'b\n', 'c\n']);
    }
  });

  it('shifts later hunks by the lines earlier hunks added or removed', () => {
    const parsed = parsePatch('@@ -0,0 +1 @@\n+0\n@@ -3 +3,0 @@\n-3\n@@ -4,0 +5 @@\n+5\n');
    expect(isOk(parsed)).toBe(true);
    if (!isOk(parsed)) return;

    const result = applyPatch(['1\n', '2\n', '3\n', '4\n'], parsed.value);
    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value).toEqual(['0\n', '1\n', '2\n', '4\n', '5\n']);
    }
  });

  it('does not mutate its input', () => {
    const lines = ['a\n', 'b\n'];
    applyPatch(
      lines,
      patchOf({ header: { oldStart: 1, oldCount: 1, newStart: 1, newCount: 0 }, lines: [{ kind: 'delete', text: 'a\n' }] })
    );
    expect(lines).toEqual(['a\n', 'b\n']);
  });

  it('reports a conflict when a deleted line does not match', () => {
    const result = applyPatch(
      ['a\n', 'b\n'],
      patchOf({
        header: { oldStart: 2, oldCount: 1, newStart: 2, newCount: 1 },
        lines: [
          { kind: 'delete', text: 'x\n' },
          { kind: 'insert', text: 'y\n' },
        ],
      })
    );
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.code).toBe('PATCH_CONFLICT');
      expect(result.error.context).toMatchObject({ hunk: 1, lineIdx: 1, expected: 'x\n', actual: 'b\n' });
    }
  });

  it('reports a conflict when deleting past the end', () => {
    const result = applyPatch(
      ['a\n'],
      patchOf({
        header: { oldStart: 1, oldCount: 2, newStart: 1, newCount: 0 },
        lines: [
          { kind: 'delete', text: 'a\n' },
          { kind: 'delete', text: 'b\n' },
        ],
      })
    );
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.code).toBe('PATCH_CONFLICT');
    }
  });

  it('reports a conflict when a hunk starts beyond the text', () => {
    const result = applyPatch(
      ['a\n'],
      patchOf({ header: { oldStart: 5, oldCount: 0, newStart: 6, newCount: 1 }, lines: [{ kind: 'insert', text: 'z\n' }] })
    );
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.code).toBe('PATCH_CONFLICT');
      expect(result.error.context).toMatchObject({ lineIdx: 5, length: 1 });
    }
  });

  it('advances over context lines and clamps at the end', () => {
    const result = applyPatch(
      ['a\n'],
      patchOf({
        header: { oldStart: 1, oldCount: 1, newStart: 1, newCount: 2 },
        lines: [
          { kind: 'context', text: 'a\n' },
          { kind: 'context', text: 'synthesized\n' },
          { kind: 'insert', text: 'c\n' },
        ],
      })
    );
    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value).toEqual(['a\n', 'c\n']);
    }
  });

  it('returns the lines unchanged for an empty patch', () => {
    const result = applyPatch(['a\n', 'b'], patchOf());
    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value).toEqual(['a\n', 'b']);
    }
  });
});
