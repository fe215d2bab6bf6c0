/**
 * Patch document text format
 *
 * Unified-diff body without context lines. Each operation line is its
 * marker followed by the exact line text; a text without a final newline
 * is followed by the standard `\ No newline at end of file` marker so the
 * newline state round-trips.
 *
 * PURE: string manipulation only
 */

import { Hunk, HunkLine, PatchDocument } from '../types';
import { PatchError } from '../types/errors';
import { Result, Ok, isErr } from '../utils/result';
import { parseHunkHeader, formatHunkHeader } from './hunk-parser';

export const NO_NEWLINE_MARKER = '\\ No newline at end of file';

const LINE_PATTERN = /[^\n]*\n|[^\n]+$/g;

const MARKERS: Record<HunkLine['kind'], string> = {
  context: ' ',
  insert: '+',
  delete: '-',
};

/**
 * Split text into lines, keeping each `\n` terminator
 */
export function splitLines(text: string): string[] {
  return text.match(LINE_PATTERN) ?? [];
}

export function joinLines(lines: readonly string[]): string {
  return lines.join('');
}

/**
 * Create a document with no hunks
 */
export function emptyPatch(from: string, to: string): PatchDocument {
  return { from, to, hunks: [] };
}

/**
 * Serialize a patch document; a document without hunks is the empty string
 */
export function serializePatch(patch: PatchDocument): string {
  if (patch.hunks.length === 0) {
    return '';
  }

  const out: string[] = [`--- ${patch.from}\n`, `+++ ${patch.to}\n`];
  for (const hunk of patch.hunks) {
    out.push(`${formatHunkHeader(hunk.header)}\n`);
    for (const line of hunk.lines) {
      out.push(MARKERS[line.kind] + line.text);
      if (!line.text.endsWith('\n')) {
        out.push(`\n${NO_NEWLINE_MARKER}\n`);
      }
    }
  }
  return out.join('');
}

/**
 * Parse serialized patch text
 *
 * `---`/`+++` lines are headers only before the first hunk; inside a hunk a
 * leading `-` always marks a deletion. Blank unmarked lines are skipped and
 * other unmarked lines are context.
 */
export function parsePatch(text: string): Result<PatchDocument, PatchError> {
  const patch = emptyPatch('', '');
  let current: Hunk | undefined;

  for (const raw of splitLines(text)) {
    if (raw.startsWith('@@')) {
      const header = parseHunkHeader(raw);
      if (isErr(header)) {
        return header;
      }
      current = { header: header.value, lines: [] };
      patch.hunks.push(current);
      continue;
    }

    if (!current) {
      if (raw.startsWith('--- ')) {
        patch.from = stripTerminator(raw.slice(4));
      } else if (raw.startsWith('+++ ')) {
        patch.to = stripTerminator(raw.slice(4));
      }
      continue;
    }

    if (raw.startsWith('\\')) {
      const previous = current.lines[current.lines.length - 1];
      if (previous && previous.text.endsWith('\n')) {
        previous.text = previous.text.slice(0, -1);
      }
      continue;
    }

    const line = toHunkLine(raw);
    if (line) {
      current.lines.push(line);
    }
  }

  return new Ok(patch);
}

function toHunkLine(raw: string): HunkLine | undefined {
  switch (raw[0]) {
    case '+':
      return { kind: 'insert', text: raw.slice(1) };
    case '-':
      return { kind: 'delete', text: raw.slice(1) };
    case ' ':
      return { kind: 'context', text: raw.slice(1) };
    default:
      if (raw.trim() === '') {
        return undefined;
      }
      return { kind: 'context', text: raw };
  }
}

function stripTerminator(value: string): string {
  return value.replace(/\r?\n$/, '');
}
