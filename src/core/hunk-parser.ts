/**
 * Hunk header parsing and formatting
 *
 * PURE: string manipulation only
 */

import { HunkHeader } from '../types';
import { PatchError } from '../types/errors';
import { Result, Ok, Err } from '../utils/result';

const HUNK_HEADER_PATTERN = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Parse `@@ -<oldStart>[,<oldCount>] +<newStart>[,<newCount>] @@`
 *
 * An omitted count means a single-line range (1). Text after the closing
 * `@@` (a section heading) is ignored.
 */
export function parseHunkHeader(line: string): Result<HunkHeader, PatchError> {
  const match = HUNK_HEADER_PATTERN.exec(line.replace(/\r?\n$/, ''));
  if (!match) {
    return new Err(
      new PatchError(`Malformed hunk header: ${JSON.stringify(line)}`, 'MALFORMED_HUNK_HEADER', {
        line,
      })
    );
  }

  return new Ok({
    oldStart: Number(match[1]),
    oldCount: match[2] === undefined ? 1 : Number(match[2]),
    newStart: Number(match[3]),
    newCount: match[4] === undefined ? 1 : Number(match[4]),
  });
}

/**
 * Format a header, omitting counts equal to 1 (inverse of parseHunkHeader)
 */
export function formatHunkHeader(header: HunkHeader): string {
  return `@@ -${formatRange(header.oldStart, header.oldCount)} +${formatRange(
    header.newStart,
    header.newCount
  )} @@`;
}

function formatRange(start: number, count: number): string {
  return count === 1 ? `${start}` : `${start},${count}`;
}
