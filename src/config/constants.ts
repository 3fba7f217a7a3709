/**
 * Application-wide Constants
 *
 * Values that are part of the on-disk naming contract or of the detection
 * heuristics, and therefore not configurable.
 */

/**
 * Recognised video containers (lower-case, with the leading dot)
 */
export const VIDEO_EXTENSIONS: readonly string[] = [
  '.mp4',
  '.webm',
  '.mov',
  '.flv',
  '.mkv',
  '.avi',
  '.wmv',
  '.mpg',
];

/**
 * Filename metadata grammar: `<base>_[<W>x<H>][<D>min][<HHHHHHHH>]<.ext>`
 */
export const FILENAME_TAG = {
  /** Anchored suffix; a name is tagged only if it ends this way */
  SUFFIX: /_\[(\d+x\d+)\]\[(\d+)min\]\[([a-fA-F0-9]{8})\]\.[^.]*$/,
  /** Any bracketed 8-digit hex token; the last one in a name is the hash */
  HASH_TOKEN: /\[([a-fA-F0-9]{8})\]/g,
  RESOLUTION: /^\d+x\d+$/,
  HASH: /^[a-fA-F0-9]{8}$/,
} as const;

/**
 * Network mount heuristics used by the worker-count policy
 */
export const NETWORK_DRIVE = {
  /** Mount roots for NFS/SMB shares on Linux and macOS */
  MOUNT_PREFIXES: ['/mnt/', '/media/', '/Volumes/'],
  /** Filesystem type fragments that show up in share mount paths */
  INDICATORS: ['nfs', 'cifs', 'smb', 'webdav', 'ftp', 'sftp'],
  /** UNC prefixes, checked before the path is resolved */
  UNC_PREFIXES: ['//', '\\\\'],
} as const;

/**
 * Timeouts for helper processes in milliseconds
 */
export const TIMEOUTS = {
  /** `<tool> --version` during dependency checks */
  VERSION_CHECK: 5000,
  /** Whole-tree listing by the accelerated enumerator */
  ENUMERATION: 120000,
} as const;

/**
 * Buffer ceiling for captured child process output
 */
export const MAX_TOOL_OUTPUT_BYTES = 64 * 1024 * 1024;

export const APP_NAME = 'reeltag';
export const APP_VERSION = '1.0.0';
