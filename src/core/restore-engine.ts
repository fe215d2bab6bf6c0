/**
 * Restore engine - rebuild a snapshot from its base and delta chain
 */

import { ArtifactEntry, PatchDocument, RestoreTrace } from '../types';
import { ArchiveError, FileSystemError, PatchError, ValidationError } from '../types/errors';
import { Result, Ok, isErr } from '../utils/result';
import { toDateKey } from './artifact-naming';
import { applyPatch } from './patch-applier';
import { joinLines, splitLines } from './patch-document';

export type ArchiveFailure = ArchiveError | FileSystemError | PatchError | ValidationError;

/**
 * Read side of an archive, as the restore engine needs it
 */
export interface ArtifactSource {
  /**
   * Base with the greatest date <= onOrBefore
   */
  findPriorBase(onOrBefore: Date | string): Promise<Result<ArtifactEntry | undefined, ArchiveFailure>>;

  /**
   * Deltas with afterDate < date <= throughDate, ascending
   */
  deltasBetween(afterDate: Date | string, throughDate: Date | string): Promise<Result<ArtifactEntry[], ArchiveFailure>>;

  readBase(entry: ArtifactEntry): Promise<Result<string, ArchiveFailure>>;

  readPatch(entry: ArtifactEntry): Promise<Result<PatchDocument, ArchiveFailure>>;
}

export class RestoreEngine {
  constructor(private readonly source: ArtifactSource) {}

  /**
   * Full text of the snapshot for `date`, or undefined when no base
   * covers it
   */
  async restore(date: Date | string): Promise<Result<string | undefined, ArchiveFailure>> {
    const traced = await this.restoreWithTrace(date);
    if (isErr(traced)) {
      return traced;
    }
    return new Ok(traced.value?.text);
  }

  /**
   * Like restore(), also naming the artifacts that were read
   */
  async restoreWithTrace(date: Date | string): Promise<Result<RestoreTrace | undefined, ArchiveFailure>> {
    const key = toDateKey(date);
    if (isErr(key)) {
      return key;
    }

    const base = await this.source.findPriorBase(key.value);
    if (isErr(base)) {
      return base;
    }
    if (!base.value) {
      return new Ok(undefined);
    }

    const baseText = await this.source.readBase(base.value);
    if (isErr(baseText)) {
      return baseText;
    }

    // Lower bound is exclusive: a date holds either a base or a delta
    const deltas = await this.source.deltasBetween(base.value.dateKey, key.value);
    if (isErr(deltas)) {
      return deltas;
    }

    let lines = splitLines(baseText.value);
    for (const delta of deltas.value) {
      const patch = await this.source.readPatch(delta);
      if (isErr(patch)) {
        return patch;
      }

      const applied = applyPatch(lines, patch.value);
      if (isErr(applied)) {
        return applied.mapErr(
          (error) =>
            new PatchError(`${delta.fileName}: ${error.message}`, error.code, {
              ...error.context,
              fileName: delta.fileName,
            })
        );
      }
      lines = applied.value;
    }

    return new Ok({ text: joinLines(lines), base: base.value, deltas: deltas.value });
  }
}
