/**
 * Artifact naming module - date keys and on-disk file names
 *
 * All functions are pure - no I/O, no side effects.
 */

import { ArchiveLayout, ArtifactEntry, ArtifactKind } from '../types';
import { DateInputSchema } from '../types/schemas';
import { ValidationError } from '../types/errors';
import { Result, Ok, Err } from '../utils/result';

interface LayoutNaming {
  separator: string;
  baseSuffix: string;
  deltaSuffix: string;
}

const LAYOUTS: Record<ArchiveLayout, LayoutNaming> = {
  plain: { separator: '_', baseSuffix: '.xml', deltaSuffix: '.patch' },
  zip: { separator: '-', baseSuffix: '.xml.zip', deltaSuffix: '.patch.zip' },
};

/**
 * Normalize a Date (its local calendar day) or a YYYY-MM-DD / YYYYMMDD
 * string into a YYYYMMDD key
 *
 * PURE: validation only
 */
export function toDateKey(input: Date | string): Result<string, ValidationError> {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      return new Err(new ValidationError('Invalid date', 'INVALID_DATE', { input: String(input) }));
    }
    return new Ok(localDateKey(input));
  }

  const parsed = DateInputSchema.safeParse(input);
  if (!parsed.success) {
    return new Err(
      new ValidationError(
        `Invalid date "${input}": ${parsed.error.issues[0]?.message ?? 'unrecognized format'}`,
        'INVALID_DATE',
        { input }
      )
    );
  }

  const key = parsed.data.replace(/-/g, '');
  if (!isCalendarDate(key)) {
    return new Err(new ValidationError(`Invalid date "${input}": no such day`, 'INVALID_DATE', { input }));
  }
  return new Ok(key);
}

/**
 * YYYYMMDD -> YYYY-MM-DD
 */
export function formatDateKey(key: string): string {
  return `${key.slice(0, 4)}-${key.slice(4, 6)}-${key.slice(6, 8)}`;
}

/**
 * Today's date key in the local time zone
 */
export function todayDateKey(now: Date = new Date()): string {
  return localDateKey(now);
}

function localDateKey(date: Date): string {
  return [
    String(date.getFullYear()).padStart(4, '0'),
    String(date.getMonth() + 1).padStart(2, '0'),
    String(date.getDate()).padStart(2, '0'),
  ].join('');
}

function isCalendarDate(key: string): boolean {
  if (!/^\d{8}$/.test(key)) {
    return false;
  }
  const year = Number(key.slice(0, 4));
  const month = Number(key.slice(4, 6));
  const day = Number(key.slice(6, 8));
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * File name for an artifact of the given kind and date
 *
 * PURE: string formatting
 */
export function artifactFileName(kind: ArtifactKind, dateKey: string, layout: ArchiveLayout): string {
  const naming = LAYOUTS[layout];
  const suffix = kind === 'base' ? naming.baseSuffix : naming.deltaSuffix;
  return `${kind}${naming.separator}${dateKey}${suffix}`;
}

/**
 * Recognize an artifact file name; anything else (temporary files,
 * other layouts, impossible dates) is not an artifact
 */
export function parseArtifactFileName(fileName: string, layout: ArchiveLayout): ArtifactEntry | undefined {
  const naming = LAYOUTS[layout];
  const kinds: ArtifactKind[] = ['base', 'delta'];

  for (const kind of kinds) {
    const prefix = `${kind}${naming.separator}`;
    const suffix = kind === 'base' ? naming.baseSuffix : naming.deltaSuffix;
    if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) {
      continue;
    }
    const dateKey = fileName.slice(prefix.length, fileName.length - suffix.length);
    if (!isCalendarDate(dateKey)) {
      return undefined;
    }
    return { kind, dateKey, fileName };
  }

  return undefined;
}

/**
 * Name of the single member inside a zipped artifact
 */
export function zipMemberName(fileName: string): string {
  return fileName.endsWith('.zip') ? fileName.slice(0, -'.zip'.length) : fileName;
}

/**
 * Order entries by date
 */
export function compareEntries(a: ArtifactEntry, b: ArtifactEntry): number {
  return a.dateKey < b.dateKey ? -1 : a.dateKey > b.dateKey ? 1 : 0;
}
