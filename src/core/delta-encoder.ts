/**
 * Delta encoder - zero-context line diff between two snapshots
 *
 * Archived reports are machine-generated XML where nearly every line is
 * unique, so hunks carry only insertions and deletions.
 *
 * PURE: deterministic, no I/O
 */

import { diffArrays } from 'diff';
import { Hunk, PatchDocument } from '../types';
import { emptyPatch, splitLines } from './patch-document';

/**
 * Names written in the `---`/`+++` headers
 */
export interface PatchNames {
  from: string;
  to: string;
}

interface PendingHunk {
  /** Old lines consumed before this hunk */
  oldAt: number;
  /** New lines produced before this hunk */
  newAt: number;
  deleted: string[];
  inserted: string[];
}

/**
 * Encode the change from oldLines to newLines
 *
 * Each run of changes between unchanged lines becomes one hunk, deletions
 * first. Header numbering follows GNU diff: an empty side names the line
 * after which the change sits.
 */
export function encodeDelta(
  oldLines: readonly string[],
  newLines: readonly string[],
  names: PatchNames
): PatchDocument {
  const patch = emptyPatch(names.from, names.to);
  const changes = diffArrays([...oldLines], [...newLines]);

  let oldPos = 0;
  let newPos = 0;
  let pending: PendingHunk | undefined;

  for (const change of changes) {
    const count = change.value.length;

    if (!change.added && !change.removed) {
      if (pending) {
        patch.hunks.push(toHunk(pending));
        pending = undefined;
      }
      oldPos += count;
      newPos += count;
      continue;
    }

    if (!pending) {
      pending = { oldAt: oldPos, newAt: newPos, deleted: [], inserted: [] };
    }
    if (change.removed) {
      pending.deleted.push(...change.value);
      oldPos += count;
    } else {
      pending.inserted.push(...change.value);
      newPos += count;
    }
  }

  if (pending) {
    patch.hunks.push(toHunk(pending));
  }

  return patch;
}

/**
 * Encode the change between two full texts
 */
export function encodeTextDelta(oldText: string, newText: string, names: PatchNames): PatchDocument {
  return encodeDelta(splitLines(oldText), splitLines(newText), names);
}

function toHunk(pending: PendingHunk): Hunk {
  const oldCount = pending.deleted.length;
  const newCount = pending.inserted.length;

  return {
    header: {
      oldStart: oldCount === 0 ? pending.oldAt : pending.oldAt + 1,
      oldCount,
      newStart: newCount === 0 ? pending.newAt : pending.newAt + 1,
      newCount,
    },
    lines: [
      ...pending.deleted.map((text) => ({ kind: 'delete' as const, text })),
      ...pending.inserted.map((text) => ({ kind: 'insert' as const, text })),
    ],
  };
}
