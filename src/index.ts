/**
 * deltavault library entry point
 */

export * from './types';
export * from './types/errors';
export * from './utils/result';
export * from './infrastructure';

export { parseHunkHeader, formatHunkHeader } from './core/hunk-parser';
export { parsePatch, serializePatch, splitLines, joinLines, emptyPatch, NO_NEWLINE_MARKER } from './core/patch-document';
export { encodeDelta, encodeTextDelta, type PatchNames } from './core/delta-encoder';
export { applyPatch } from './core/patch-applier';
export { shouldPromoteToBase, deltaThresholdRatio, DEFAULT_RETENTION } from './core/retention-policy';
export { toDateKey, formatDateKey, todayDateKey, artifactFileName, parseArtifactFileName } from './core/artifact-naming';
export { type ArtifactCodec, PlainCodec, ZipCodec, createCodec } from './core/artifact-codec';
export { ArchiveStore } from './core/archive-store';
export { RestoreEngine, type ArtifactSource, type ArchiveFailure } from './core/restore-engine';
export { ConfigService, type ConfigError } from './core/config-service';
export { DEFAULT_CONFIG, resolveStoreOptions, validateConfig } from './core/config-core';
