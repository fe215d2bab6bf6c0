/**
 * Core type definitions for deltavault
 */

/**
 * Parsed `@@ -a,b +c,d @@` hunk header
 */
export interface HunkHeader {
  /** 1-based first old line, or the line after which to insert when oldCount is 0 */
  oldStart: number;

  oldCount: number;

  /** Same convention as oldStart, on the new side */
  newStart: number;

  newCount: number;
}

/**
 * One operation inside a hunk.
 *
 * `text` is the exact line including its `\n` terminator; only the final
 * line of a text may lack one.
 */
export type HunkLine =
  | { kind: 'context'; text: string }
  | { kind: 'insert'; text: string }
  | { kind: 'delete'; text: string };

export interface Hunk {
  header: HunkHeader;
  lines: HunkLine[];
}

/**
 * A zero-context line patch between two artifacts
 */
export interface PatchDocument {
  /** File name in the `---` header (metadata only) */
  from: string;

  /** File name in the `+++` header (metadata only) */
  to: string;

  hunks: Hunk[];
}

export type ArtifactKind = 'base' | 'delta';

/**
 * On-disk naming scheme, fixed per archive
 *
 * plain: base_YYYYMMDD.xml / delta_YYYYMMDD.patch
 * zip:   base-YYYYMMDD.xml.zip / delta-YYYYMMDD.patch.zip
 */
export type ArchiveLayout = 'plain' | 'zip';

/**
 * Index entry for one stored artifact
 */
export interface ArtifactEntry {
  kind: ArtifactKind;

  /** Calendar date as YYYYMMDD */
  dateKey: string;

  /** File name inside the archive directory */
  fileName: string;
}

/**
 * Size-driven delta-vs-base thresholds
 */
export interface RetentionOptions {
  /** Predecessor snapshots smaller than this use smallFileRatio */
  smallFileThresholdBytes: number;

  smallFileRatio: number;

  largeFileRatio: number;
}

/**
 * Options for one ArchiveStore instance
 */
export interface ArchiveStoreOptions {
  /** Archive directory (absolute or relative to the process cwd) */
  dir: string;

  layout: ArchiveLayout;

  retention: RetentionOptions;

  /** Delete older bases when a new base is written */
  pruneSupersededBases: boolean;
}

/**
 * What archive() wrote
 */
export interface ArchiveOutcome {
  dateKey: string;

  kind: ArtifactKind;

  fileName: string;

  /** UTF-8 size of the predecessor snapshot, absent when there was none */
  baseSizeBytes?: number;

  /** UTF-8 size of the candidate patch, absent when there was no predecessor */
  deltaSizeBytes?: number;

  /** File names of bases deleted by pruning */
  pruned: string[];

  /** Artifact re-encoded against the new snapshot, when one followed it */
  rebased?: ArtifactEntry;
}

/**
 * A restored snapshot and the artifacts it was built from
 */
export interface RestoreTrace {
  text: string;
  base: ArtifactEntry;
  deltas: ArtifactEntry[];
}

/**
 * Project configuration (.deltavault/config.json)
 */
export interface DeltaVaultConfig {
  /** Archive directory, relative to the project root */
  archiveDir: string;

  layout: ArchiveLayout;

  pruneSupersededBases: boolean;

  retention: RetentionOptions;
}

// Export Zod schemas for validation
export * from './schemas';
