/**
 * Video Domain Types
 */

/**
 * Resolution, duration and checksum embedded in a tagged filename.
 * Immutable once written into a name.
 */
export interface MetadataTriple {
  /** "WxH", e.g. "1920x1080" */
  readonly resolution: string;
  /** Rounded, non-negative whole minutes */
  readonly durationMinutes: number;
  /** 8 hex digits, compared case-insensitively */
  readonly hash: string;
}

/**
 * What the prober and hasher report before the duration is rounded for the name
 */
export interface ExtractedMetadata {
  resolution: string;
  durationMinutes: number;
  hash: string;
}

/**
 * Why a path was passed over without an attempt to tag it
 */
export type SkipReason = 'already-tagged' | 'not-a-video-file' | 'directory';

/**
 * hash -> paths, restricted to hashes shared by at least two files
 */
export type DuplicateIndex = Map<string, string[]>;
