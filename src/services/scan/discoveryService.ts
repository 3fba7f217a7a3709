import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { FILENAME_TAG, VIDEO_EXTENSIONS } from '../../config/constants.js';
import { isTagged, isVideoFile } from '../media/filenameCodec.js';
import { AcceleratedEnumerator } from './fdEnumerator.js';

/**
 * Discovery Service
 *
 * Lists tagged or untagged videos under a root. When an accelerated
 * enumerator is configured it is tried first; if it is missing or fails the
 * portable walk runs instead. Both strategies return absolute, sorted paths
 * filtered by the same predicates, so callers cannot tell which one ran.
 */

type TagState = 'tagged' | 'untagged';

const UNTAGGED_PATTERN = `\\.(${VIDEO_EXTENSIONS.map(ext => ext.slice(1)).join('|')})$`;
const TAGGED_PATTERN = FILENAME_TAG.SUFFIX.source;

export class DiscoveryService {
  constructor(private readonly enumerator?: AcceleratedEnumerator) {}

  /**
   * Video files under root whose names carry no metadata suffix
   */
  async findUntagged(root: string): Promise<string[]> {
    return this.find(root, 'untagged');
  }

  /**
   * Video files under root whose names end with the metadata suffix
   */
  async findTagged(root: string): Promise<string[]> {
    return this.find(root, 'tagged');
  }

  private async find(root: string, state: TagState): Promise<string[]> {
    const absRoot = path.resolve(root);
    const accept = (filePath: string): boolean =>
      isVideoFile(filePath) && isTagged(filePath) === (state === 'tagged');

    if (this.enumerator) {
      const pattern = state === 'tagged' ? TAGGED_PATTERN : UNTAGGED_PATTERN;
      try {
        const listed = await this.enumerator.list(absRoot, pattern);
        const files = listed.filter(accept).sort();
        logger.debug(`Found ${files.length} ${state} files with ${this.enumerator.name}`, {
          service: 'discovery',
          root: absRoot,
        });
        return files;
      } catch (error) {
        logger.debug('Accelerated enumeration unavailable, walking the tree', {
          service: 'discovery',
          enumerator: this.enumerator.name,
          error: getErrorMessage(error),
        });
      }
    }

    const files = (await walkFiles(absRoot)).filter(accept).sort();
    logger.debug(`Found ${files.length} ${state} files by walking`, {
      service: 'discovery',
      root: absRoot,
    });
    return files;
  }
}

/**
 * Every regular file below dir (symlinks are not followed)
 */
export async function walkFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(
      `cannot read directory ${dir}: ${getErrorMessage(error)}`,
      ErrorCode.FS_READ_FAILED,
      dir,
      false,
      { service: 'discovery', operation: 'walk' },
      toError(error)
    );
  }

  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }

  return files;
}
