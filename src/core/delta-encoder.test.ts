import { describe, it, expect } from 'vitest';
import { encodeDelta, encodeTextDelta } from './delta-encoder';
import { applyPatch } from './patch-applier';
import { serializePatch, splitLines, joinLines } from './patch-document';
import { isOk } from '../utils/result';

const names = { from: 'base_20260129.xml', to: 'delta_20260130.patch' };

describe('Delta Encoder (Pure Functions)', () => {
  it('produces no hunks for identical input', () => {
    const lines = ['<r>\n', '<a/>\n', '</r>\n'];
    const patch = encodeDelta(lines, lines, names);
    expect(patch.hunks).toEqual([]);
    expect(serializePatch(patch)).toBe('');

    const applied = applyPatch(lines, patch);
    expect(isOk(applied)).toBe(true);
    if (isOk(applied)) {
      expect(applied.value).toEqual(lines);
    }
  });

  it('encodes a replaced line without context', () => {
    const patch = encodeDelta(['a\n', 'b\n', 'c\n'], ['a\n', 'B\n', 'c\n'], names);
    expect(serializePatch(patch)).toBe(
      '--- base_20260129.xml\n+++ delta_20260130.patch\n@@ -2 +2 @@\n-b\n+B\n'
    );
  });

  it('numbers an appended line after the last old line', () => {
    const patch = encodeDelta(['a\n'], ['a\n', 'b\n'], names);
    expect(patch.hunks.map((hunk) => hunk.header)).toEqual([
      { oldStart: 1, oldCount: 0, newStart: 2, newCount: 1 },
    ]);
  });

  it('numbers an insertion at the top as line 0', () => {
    const patch = encodeDelta(['b\n'], ['a\n', 'b\n'], names);
    expect(patch.hunks.map((hunk) => hunk.header)).toEqual([
      { oldStart: 0, oldCount: 0, newStart: 1, newCount: 1 },
    ]);
  });

  it('numbers a deletion on the new side as the preceding line', () => {
    const patch = encodeDelta(['a\n', 'b\n', 'c\n'], ['a\n', 'c\n'], names);
    expect(patch.hunks).toEqual([
      {
        header: { oldStart: 2, oldCount: 1, newStart: 1, newCount: 0 },
        lines: [{ kind: 'delete', text: 'b\n' }],
      },
    ]);
  });

  it('splits separate changes into separate hunks', () => {
    const patch = encodeDelta(['1\n', '2\n', '3\n', '4\n'], ['0\n', '1\n', '2\n', '4\n', '5\n'], names);
    expect(patch.hunks.map((hunk) => hunk.header)).toEqual([
      { oldStart: 0, oldCount: 0, newStart: 1, newCount: 1 },
      { oldStart: 3, oldCount: 1, newStart: 3, newCount: 0 },
      { oldStart: 4, oldCount: 0, newStart: 5, newCount: 1 },
    ]);
  });

  it('lists deletions before insertions within a hunk', () => {
    const patch = encodeDelta(['x\n', 'old\n', 'y\n'], ['x\n', 'new1\n', 'new2\n', 'y\n'], names);
    expect(patch.hunks).toHaveLength(1);
    expect(patch.hunks[0].lines.map((line) => line.kind)).toEqual(['delete', 'insert', 'insert']);
  });

  it('records a change of the final newline', () => {
    const patch = encodeTextDelta('a\nb', 'a\nb\n', names);
    expect(patch.hunks).toEqual([
      {
        header: { oldStart: 2, oldCount: 1, newStart: 2, newCount: 1 },
        lines: [
          { kind: 'delete', text: 'b' },
          { kind: 'insert', text: 'b\n' },
        ],
      },
    ]);
  });

  it('produces patches that rebuild the new text', () => {
    const oldText = '<FlexStatement>\n<Trade id="1"/>\n<Trade id="2"/>\n<Trade id="3"/>\n</FlexStatement>\n';
    const newText = '<FlexStatement>\n<Trade id="2"/>\n<Trade id="3" qty="5"/>\n<Trade id="4"/>\n</FlexStatement>';

    const patch = encodeTextDelta(oldText, newText, names);
    const applied = applyPatch(splitLines(oldText), patch);
    expect(isOk(applied)).toBe(true);
    if (isOk(applied)) {
      expect(joinLines(applied.value)).toBe(newText);
    }
  });

  it('is deterministic', () => {
    const a = serializePatch(encodeTextDelta('x\ny\nz\n', 'y\nz\nw\n', names));
    const b = serializePatch(encodeTextDelta('x\ny\nz\n', 'y\nz\nw\n', names));
    expect(a).toBe(b);
  });
});
