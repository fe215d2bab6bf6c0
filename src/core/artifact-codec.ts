/**
 * Artifact codecs - bytes on disk <-> artifact text
 */

import JSZip from 'jszip';
import { ArchiveLayout } from '../types';
import { ArchiveError } from '../types/errors';
import { Result, Ok, Err, tryCatchAsync, isErr } from '../utils/result';
import { zipMemberName } from './artifact-naming';

export interface ArtifactCodec {
  /**
   * Encode artifact text for the file `fileName`
   */
  encode(fileName: string, text: string): Promise<Uint8Array>;

  /**
   * Decode the bytes read from `fileName`
   */
  decode(fileName: string, data: Uint8Array): Promise<Result<string, ArchiveError>>;
}

/**
 * UTF-8 text stored as-is
 */
export class PlainCodec implements ArtifactCodec {
  async encode(_fileName: string, text: string): Promise<Uint8Array> {
    return Buffer.from(text, 'utf-8');
  }

  async decode(_fileName: string, data: Uint8Array): Promise<Result<string, ArchiveError>> {
    return new Ok(Buffer.from(data).toString('utf-8'));
  }
}

/**
 * One DEFLATE member per file, named like the file without `.zip`
 */
export class ZipCodec implements ArtifactCodec {
  async encode(fileName: string, text: string): Promise<Uint8Array> {
    const zip = new JSZip();
    zip.file(zipMemberName(fileName), text);
    return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  }

  async decode(fileName: string, data: Uint8Array): Promise<Result<string, ArchiveError>> {
    const loaded = await tryCatchAsync(
      () => JSZip.loadAsync(data),
      (error) => corrupted(fileName, `unreadable zip: ${errorMessage(error)}`)
    );
    if (isErr(loaded)) {
      return loaded;
    }

    const member = Object.values(loaded.value.files).find((entry) => !entry.dir);
    if (!member) {
      return new Err(corrupted(fileName, 'zip has no members'));
    }

    return tryCatchAsync(
      () => member.async('string'),
      (error) => corrupted(fileName, `unreadable member ${member.name}: ${errorMessage(error)}`)
    );
  }
}

export function createCodec(layout: ArchiveLayout): ArtifactCodec {
  return layout === 'zip' ? new ZipCodec() : new PlainCodec();
}

function corrupted(fileName: string, reason: string): ArchiveError {
  return new ArchiveError(`Cannot read artifact ${fileName}: ${reason}`, 'CORRUPTED', { fileName });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
