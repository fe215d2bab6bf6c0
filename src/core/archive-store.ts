/**
 * Archive store - on-disk layout, artifact index and archive()
 *
 * Owns one archive directory. The artifact index is built from a single
 * directory listing the first time it is needed and kept current by this
 * instance's own writes. The store assumes a single writer: concurrent
 * archive() calls on one directory, or a restore running alongside an
 * archive(), have undefined results.
 */

import * as path from 'path';
import {
  ArchiveOutcome,
  ArchiveStoreOptions,
  ArtifactEntry,
  ArtifactKind,
  PatchDocument,
  RestoreTrace,
} from '../types';
import { ArchiveError, FileSystemError, PatchError } from '../types/errors';
import { FileSystem, Stats } from '../infrastructure/interfaces';
import { Result, Ok, Err, isErr } from '../utils/result';
import {
  artifactFileName,
  compareEntries,
  parseArtifactFileName,
  toDateKey,
  zipMemberName,
} from './artifact-naming';
import { ArtifactCodec, createCodec } from './artifact-codec';
import { encodeTextDelta } from './delta-encoder';
import { parsePatch, serializePatch } from './patch-document';
import { shouldPromoteToBase } from './retention-policy';
import { ArchiveFailure, ArtifactSource, RestoreEngine } from './restore-engine';

const TEMP_SUFFIX = '.tmp';

/**
 * Artifact to write for one date, and the artifact it replaces
 */
interface SnapshotPlan {
  entry: ArtifactEntry;
  body: string;
  baseSizeBytes?: number;
  deltaSizeBytes?: number;
  replaces?: ArtifactEntry;
}

/**
 * Bytes of an artifact before a commit; no data means it did not exist
 */
interface Backup {
  fileName: string;
  data?: Uint8Array;
}

export class ArchiveStore implements ArtifactSource {
  private index: ArtifactEntry[] | undefined;
  private readonly codec: ArtifactCodec;
  private readonly restorer: RestoreEngine;

  constructor(
    private readonly fs: FileSystem,
    private readonly options: ArchiveStoreOptions
  ) {
    this.codec = createCodec(options.layout);
    this.restorer = new RestoreEngine(this);
  }

  get dir(): string {
    return this.options.dir;
  }

  /**
   * All artifacts in date order
   */
  async list(): Promise<Result<ArtifactEntry[], ArchiveError>> {
    const index = await this.loadIndex();
    if (isErr(index)) {
      return index;
    }
    return new Ok([...index.value]);
  }

  /**
   * Drop the cached index and list the directory again
   */
  async refresh(): Promise<Result<ArtifactEntry[], ArchiveError>> {
    this.index = undefined;
    return this.list();
  }

  async findPriorBase(onOrBefore: Date | string): Promise<Result<ArtifactEntry | undefined, ArchiveFailure>> {
    const key = toDateKey(onOrBefore);
    if (isErr(key)) {
      return key;
    }
    const index = await this.loadIndex();
    if (isErr(index)) {
      return index;
    }

    const limit = key.value;
    const bases = index.value.filter((entry) => entry.kind === 'base' && entry.dateKey <= limit);
    return new Ok(bases[bases.length - 1]);
  }

  async deltasBetween(
    afterDate: Date | string,
    throughDate: Date | string
  ): Promise<Result<ArtifactEntry[], ArchiveFailure>> {
    const after = toDateKey(afterDate);
    if (isErr(after)) {
      return after;
    }
    const through = toDateKey(throughDate);
    if (isErr(through)) {
      return through;
    }
    const index = await this.loadIndex();
    if (isErr(index)) {
      return index;
    }

    const lower = after.value;
    const upper = through.value;
    return new Ok(
      index.value.filter((entry) => entry.kind === 'delta' && entry.dateKey > lower && entry.dateKey <= upper)
    );
  }

  async readBase(entry: ArtifactEntry): Promise<Result<string, ArchiveFailure>> {
    return this.readArtifact(entry);
  }

  async readPatch(entry: ArtifactEntry): Promise<Result<PatchDocument, ArchiveFailure>> {
    const text = await this.readArtifact(entry);
    if (isErr(text)) {
      return text;
    }

    const patch = parsePatch(text.value);
    if (isErr(patch)) {
      return new Err(
        new PatchError(`${entry.fileName}: ${patch.error.message}`, patch.error.code, {
          ...patch.error.context,
          fileName: entry.fileName,
        })
      );
    }
    return patch;
  }

  async statArtifact(entry: ArtifactEntry): Promise<Result<Stats, FileSystemError>> {
    return this.fs.stat(this.pathOf(entry.fileName));
  }

  /**
   * Full text for `date`, or undefined when no base covers it
   */
  async restore(date: Date | string): Promise<Result<string | undefined, ArchiveFailure>> {
    return this.restorer.restore(date);
  }

  async restoreWithTrace(date: Date | string): Promise<Result<RestoreTrace | undefined, ArchiveFailure>> {
    return this.restorer.restoreWithTrace(date);
  }

  /**
   * Store `text` as the snapshot for `date`, replacing any snapshot already
   * stored for that date
   *
   * The snapshot becomes a delta against the latest artifact dated before
   * it, unless the retention policy promotes it to a base. A delta dated
   * after it is re-encoded against the new snapshot so its own date still
   * restores. Both writes land together or not at all.
   */
  async archive(text: string, date: Date | string): Promise<Result<ArchiveOutcome, ArchiveFailure>> {
    const key = toDateKey(date);
    if (isErr(key)) {
      return key;
    }

    const mkdirResult = await this.fs.mkdir(this.options.dir, { recursive: true });
    if (isErr(mkdirResult)) {
      return new Err(unavailable(this.options.dir, mkdirResult.error));
    }

    const index = await this.loadIndex();
    if (isErr(index)) {
      return index;
    }
    const entries = index.value;
    const dateKey = key.value;

    const successor = entries.find((entry) => entry.dateKey > dateKey);
    let successorText: string | undefined;
    if (successor && successor.kind === 'delta') {
      const restored = await this.restorer.restore(successor.dateKey);
      if (isErr(restored)) {
        return restored;
      }
      successorText = restored.value;
    }

    const predecessor = entries.filter((entry) => entry.dateKey < dateKey).pop();
    let previousText: string | undefined;
    if (predecessor) {
      const restored = await this.restorer.restore(predecessor.dateKey);
      if (isErr(restored)) {
        return restored;
      }
      previousText = restored.value;
    }

    const planned = this.planSnapshot(dateKey, text, predecessor, previousText);
    const restacked =
      successor && successorText !== undefined
        ? this.planSnapshot(successor.dateKey, successorText, planned.entry, text)
        : undefined;
    const plans = restacked ? [planned, restacked] : [planned];

    const committed = await this.commit(plans);
    if (isErr(committed)) {
      return committed;
    }

    const pruned: string[] = [];
    if (planned.entry.kind === 'base' && this.options.pruneSupersededBases) {
      const pruneResult = await this.pruneBasesBefore(dateKey);
      if (isErr(pruneResult)) {
        this.index = undefined;
        return pruneResult;
      }
      pruned.push(...pruneResult.value);
    }

    return new Ok({
      dateKey,
      kind: planned.entry.kind,
      fileName: planned.entry.fileName,
      baseSizeBytes: planned.baseSizeBytes,
      deltaSizeBytes: planned.deltaSizeBytes,
      pruned,
      rebased: restacked?.entry,
    });
  }

  /**
   * Encode the artifact for `dateKey` without touching the disk
   */
  private planSnapshot(
    dateKey: string,
    text: string,
    predecessor: ArtifactEntry | undefined,
    previousText: string | undefined
  ): SnapshotPlan {
    let kind: ArtifactKind = 'base';
    let body = text;
    let baseSizeBytes: number | undefined;
    let deltaSizeBytes: number | undefined;

    if (predecessor && previousText !== undefined) {
      const deltaName = artifactFileName('delta', dateKey, this.options.layout);
      const patchText = serializePatch(
        encodeTextDelta(previousText, text, {
          from: zipMemberName(predecessor.fileName),
          to: zipMemberName(deltaName),
        })
      );
      baseSizeBytes = Buffer.byteLength(previousText, 'utf-8');
      deltaSizeBytes = Buffer.byteLength(patchText, 'utf-8');

      if (!shouldPromoteToBase(baseSizeBytes, deltaSizeBytes, this.options.retention)) {
        kind = 'delta';
        body = patchText;
      }
    }

    const entry: ArtifactEntry = {
      kind,
      dateKey,
      fileName: artifactFileName(kind, dateKey, this.options.layout),
    };
    const replaces = this.indexEntries().find(
      (existing) => existing.dateKey === dateKey && existing.fileName !== entry.fileName
    );
    return { entry, body, baseSizeBytes, deltaSizeBytes, replaces };
  }

  /**
   * Apply every plan, or none of them
   *
   * Replaced artifacts are removed before the new ones are written. On
   * failure every touched file is put back from its backup and the index
   * is dropped so the next call lists the directory again.
   */
  private async commit(plans: SnapshotPlan[]): Promise<Result<void, ArchiveError>> {
    const backups = await this.backUp(plans);
    if (isErr(backups)) {
      return backups;
    }

    const applied = await this.applyPlans(plans);
    if (isErr(applied)) {
      const rolledBack = await this.rollBack(backups.value);
      this.index = undefined;
      if (isErr(rolledBack)) {
        return new Err(
          new ArchiveError(
            `${applied.error.message}; rollback failed: ${rolledBack.error.message}`,
            applied.error.code,
            { ...applied.error.context, rollback: rolledBack.error.toJSON() }
          )
        );
      }
      return applied;
    }

    const dates = new Set(plans.map((plan) => plan.entry.dateKey));
    this.index = [
      ...this.indexEntries().filter((existing) => !dates.has(existing.dateKey)),
      ...plans.map((plan) => plan.entry),
    ].sort(compareEntries);
    return new Ok(undefined);
  }

  private async backUp(plans: SnapshotPlan[]): Promise<Result<Backup[], ArchiveError>> {
    const fileNames = new Set<string>();
    for (const plan of plans) {
      fileNames.add(plan.entry.fileName);
      if (plan.replaces) {
        fileNames.add(plan.replaces.fileName);
      }
    }

    const backups: Backup[] = [];
    for (const fileName of fileNames) {
      if (!this.indexEntries().some((existing) => existing.fileName === fileName)) {
        backups.push({ fileName });
        continue;
      }
      const data = await this.fs.readBytes(this.pathOf(fileName));
      if (isErr(data)) {
        return new Err(
          new ArchiveError(`Cannot read artifact ${fileName}: ${data.error.message}`, 'ARCHIVE_UNAVAILABLE', {
            fileName,
            cause: data.error.toJSON(),
          })
        );
      }
      backups.push({ fileName, data: data.value });
    }
    return new Ok(backups);
  }

  private async applyPlans(plans: SnapshotPlan[]): Promise<Result<void, ArchiveError>> {
    for (const plan of plans) {
      if (!plan.replaces) {
        continue;
      }
      const removed = await this.fs.unlink(this.pathOf(plan.replaces.fileName));
      if (isErr(removed)) {
        return new Err(writeFailed(plan.replaces.fileName, removed.error));
      }
    }

    for (const plan of plans) {
      const written = await this.writeArtifact(plan.entry, plan.body);
      if (isErr(written)) {
        return written;
      }
    }
    return new Ok(undefined);
  }

  /**
   * Put every backed-up file back, newest change first
   */
  private async rollBack(backups: Backup[]): Promise<Result<void, FileSystemError>> {
    for (const backup of [...backups].reverse()) {
      const target = this.pathOf(backup.fileName);
      if (backup.data) {
        const restored = await this.fs.writeFile(target, backup.data);
        if (isErr(restored)) {
          return restored;
        }
        continue;
      }

      const present = await this.fs.exists(target);
      if (isErr(present)) {
        return present;
      }
      if (present.value) {
        const removed = await this.fs.unlink(target);
        if (isErr(removed)) {
          return removed;
        }
      }
    }
    return new Ok(undefined);
  }

  private async pruneBasesBefore(dateKey: string): Promise<Result<string[], ArchiveError>> {
    const pruned: string[] = [];
    for (const entry of this.indexEntries()) {
      if (entry.kind !== 'base' || entry.dateKey >= dateKey) {
        continue;
      }
      const removed = await this.removeArtifact(entry);
      if (isErr(removed)) {
        return removed;
      }
      pruned.push(entry.fileName);
    }
    return new Ok(pruned);
  }

  /**
   * Write to a temporary file and rename it into place
   */
  private async writeArtifact(entry: ArtifactEntry, text: string): Promise<Result<void, ArchiveError>> {
    const target = this.pathOf(entry.fileName);
    const temp = target + TEMP_SUFFIX;
    const data = await this.codec.encode(entry.fileName, text);

    const written = await this.fs.writeFile(temp, data);
    if (isErr(written)) {
      return new Err(writeFailed(entry.fileName, written.error));
    }
    const renamed = await this.fs.rename(temp, target);
    if (isErr(renamed)) {
      const failure = writeFailed(entry.fileName, renamed.error);
      const cleaned = await this.fs.unlink(temp);
      if (isErr(cleaned)) {
        return new Err(
          new ArchiveError(failure.message, failure.code, { ...failure.context, leftoverTempFile: temp })
        );
      }
      return new Err(failure);
    }
    return new Ok(undefined);
  }

  private async removeArtifact(entry: ArtifactEntry): Promise<Result<void, ArchiveError>> {
    const removed = await this.fs.unlink(this.pathOf(entry.fileName));
    if (isErr(removed)) {
      return new Err(writeFailed(entry.fileName, removed.error));
    }
    this.index = this.indexEntries().filter((existing) => existing.fileName !== entry.fileName);
    return new Ok(undefined);
  }

  private async readArtifact(entry: ArtifactEntry): Promise<Result<string, ArchiveError>> {
    const data = await this.fs.readBytes(this.pathOf(entry.fileName));
    if (isErr(data)) {
      return new Err(
        new ArchiveError(`Cannot read artifact ${entry.fileName}: ${data.error.message}`, 'ARCHIVE_UNAVAILABLE', {
          fileName: entry.fileName,
          cause: data.error.toJSON(),
        })
      );
    }
    return this.codec.decode(entry.fileName, data.value);
  }

  private async loadIndex(): Promise<Result<ArtifactEntry[], ArchiveError>> {
    if (this.index) {
      return new Ok(this.index);
    }

    const listing = await this.fs.readdir(this.options.dir);
    if (isErr(listing)) {
      return new Err(unavailable(this.options.dir, listing.error));
    }

    const entries: ArtifactEntry[] = [];
    for (const dirent of listing.value) {
      if (!dirent.isFile()) {
        continue;
      }
      const entry = parseArtifactFileName(dirent.name, this.options.layout);
      if (entry) {
        entries.push(entry);
      }
    }
    entries.sort(compareEntries);

    for (let i = 1; i < entries.length; i++) {
      if (entries[i].dateKey === entries[i - 1].dateKey) {
        return new Err(
          new ArchiveError(
            `Archive ${this.options.dir} holds two artifacts for one date: ${entries[i - 1].fileName}, ${entries[i].fileName}`,
            'CORRUPTED',
            { dir: this.options.dir, files: [entries[i - 1].fileName, entries[i].fileName] }
          )
        );
      }
    }

    this.index = entries;
    return new Ok(entries);
  }

  private indexEntries(): ArtifactEntry[] {
    return this.index ?? [];
  }

  private pathOf(fileName: string): string {
    return path.join(this.options.dir, fileName);
  }
}

function unavailable(dir: string, cause: FileSystemError): ArchiveError {
  return new ArchiveError(`Archive directory ${dir} is unavailable: ${cause.message}`, 'ARCHIVE_UNAVAILABLE', {
    dir,
    cause: cause.toJSON(),
  });
}

function writeFailed(fileName: string, cause: FileSystemError): ArchiveError {
  return new ArchiveError(`Cannot write artifact ${fileName}: ${cause.message}`, 'WRITE_FAILED', {
    fileName,
    cause: cause.toJSON(),
  });
}
