/**
 * Patch applier - positional replay of a patch document
 *
 * PURE: works on a copy of the input lines, no I/O
 */

import { Hunk, PatchDocument } from '../types';
import { PatchError } from '../types/errors';
import { Result, Ok, Err } from '../utils/result';

/**
 * Apply every hunk of `patch` to `lines`, in document order
 *
 * Header numbers refer to the unpatched text, so each hunk's cursor is
 * shifted by the lines inserted minus the lines deleted by earlier hunks.
 * A deletion must match the line under the cursor exactly.
 */
export function applyPatch(
  lines: readonly string[],
  patch: PatchDocument
): Result<string[], PatchError> {
  const result = [...lines];
  let offset = 0;

  for (const [hunkIndex, hunk] of patch.hunks.entries()) {
    let lineIdx = hunkStart(hunk) + offset;
    if (lineIdx < 0 || lineIdx > result.length) {
      return new Err(
        conflict(`Hunk ${hunkIndex + 1} starts outside the text`, patch, hunkIndex, {
          lineIdx,
          length: result.length,
        })
      );
    }

    for (const line of hunk.lines) {
      switch (line.kind) {
        case 'context':
          // Trailing context past the end is tolerated
          lineIdx = Math.min(lineIdx + 1, result.length);
          break;

        case 'delete': {
          const actual = result[lineIdx];
          if (lineIdx >= result.length || actual !== line.text) {
            return new Err(
              conflict(`Deleted line does not match line ${lineIdx + 1}`, patch, hunkIndex, {
                lineIdx,
                expected: line.text,
                actual,
              })
            );
          }
          result.splice(lineIdx, 1);
          offset -= 1;
          break;
        }

        case 'insert':
          if (lineIdx > result.length) {
            return new Err(
              conflict(`Insertion past the end of the text`, patch, hunkIndex, {
                lineIdx,
                length: result.length,
              })
            );
          }
          result.splice(lineIdx, 0, line.text);
          lineIdx += 1;
          offset += 1;
          break;
      }
    }
  }

  return new Ok(result);
}

/**
 * 0-based cursor for a hunk against the unpatched text
 *
 * A modification starts at its first old line; a pure insertion
 * (oldCount 0) goes after line oldStart.
 */
export function hunkStart(hunk: Hunk): number {
  return hunk.header.oldCount > 0 ? hunk.header.oldStart - 1 : hunk.header.oldStart;
}

function conflict(
  message: string,
  patch: PatchDocument,
  hunkIndex: number,
  context: Record<string, unknown>
): PatchError {
  return new PatchError(message, 'PATCH_CONFLICT', {
    from: patch.from,
    to: patch.to,
    hunk: hunkIndex + 1,
    ...context,
  });
}
