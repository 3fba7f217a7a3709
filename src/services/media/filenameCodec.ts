import path from 'path';
import { FILENAME_TAG, VIDEO_EXTENSIONS } from '../../config/constants.js';
import { InputValidationError } from '../../errors/index.js';
import { MetadataTriple } from '../../types/video.js';

/**
 * Filename Metadata Codec
 *
 * Pure encode/decode of the `_[WxH][Dmin][HHHHHHHH]` suffix that marks a
 * video as processed. No I/O; every function works on the final path segment.
 *
 * Classification is anchored on the suffix, while hash extraction takes the
 * last bracketed 8-hex-digit token anywhere in the name, so cosmetic tokens
 * such as `[2019]` or `[S02E03]` added to a tagged name do not hide it.
 */

/**
 * True if the extension is one of the recognised video containers (case-insensitive)
 */
export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * True iff the filename ends, right before its extension, with the tag suffix
 */
export function isTagged(filePath: string): boolean {
  return FILENAME_TAG.SUFFIX.test(path.basename(filePath));
}

/**
 * Build the tagged path for a file
 *
 * @example
 * ```typescript
 * encodeFilename('/videos/clip.mp4', { resolution: '1280x720', durationMinutes: 33, hash: '996a868b' });
 * // '/videos/clip_[1280x720][33min][996A868B].mp4'
 * ```
 */
export function encodeFilename(filePath: string, triple: MetadataTriple): string {
  if (!FILENAME_TAG.RESOLUTION.test(triple.resolution)) {
    throw new InputValidationError('resolution', `invalid resolution format: ${triple.resolution}`);
  }
  if (!Number.isFinite(triple.durationMinutes) || triple.durationMinutes < 0) {
    throw new InputValidationError('durationMinutes', `invalid duration: ${triple.durationMinutes}`);
  }
  if (!FILENAME_TAG.HASH.test(triple.hash)) {
    throw new InputValidationError('hash', `invalid hash: ${triple.hash}`);
  }

  const ext = path.extname(filePath);
  const stem = filePath.slice(0, filePath.length - ext.length);
  const minutes = Math.round(triple.durationMinutes);

  return `${stem}_[${triple.resolution}][${minutes}min][${triple.hash.toUpperCase()}]${ext}`;
}

/**
 * Hash embedded in a tagged filename, or undefined when the name is not tagged
 */
export function extractHash(filePath: string): string | undefined {
  const filename = path.basename(filePath);
  if (!FILENAME_TAG.SUFFIX.test(filename)) {
    return undefined;
  }

  const matches = [...filename.matchAll(FILENAME_TAG.HASH_TOKEN)];
  const last = matches[matches.length - 1];
  return last?.[1];
}

/**
 * Full triple from the anchored suffix
 */
export function decodeFilename(filePath: string): MetadataTriple | undefined {
  const match = FILENAME_TAG.SUFFIX.exec(path.basename(filePath));
  if (!match) {
    return undefined;
  }

  const [, resolution, minutes, suffixHash] = match;
  const hash = extractHash(filePath) ?? suffixHash;
  if (resolution === undefined || minutes === undefined || hash === undefined) {
    return undefined;
  }

  return {
    resolution,
    durationMinutes: parseInt(minutes, 10),
    hash,
  };
}

/**
 * Case-insensitive hash comparison
 */
export function hashesEqual(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}
