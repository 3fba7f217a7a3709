import { logger } from '../../middleware/logging.js';
import { DuplicateIndex } from '../../types/video.js';
import { extractHash } from '../media/filenameCodec.js';
import { DiscoveryService } from '../scan/discoveryService.js';

/**
 * Group tagged videos under root by their embedded hash.
 *
 * Only hashes shared by two or more files are kept. Keys are upper-cased so
 * hash letter case never splits a group. Files inside a group keep discovery
 * order. A tagged-looking name without an extractable hash is left out.
 */
export async function buildDuplicateIndex(root: string, discovery: DiscoveryService): Promise<DuplicateIndex> {
  const tagged = await discovery.findTagged(root);
  const hashToFiles: DuplicateIndex = new Map();

  for (const filePath of tagged) {
    const hash = extractHash(filePath);
    if (hash === undefined) {
      continue;
    }
    const key = hash.toUpperCase();
    const files = hashToFiles.get(key);
    if (files) {
      files.push(filePath);
    } else {
      hashToFiles.set(key, [filePath]);
    }
  }

  const duplicates: DuplicateIndex = new Map();
  for (const [hash, files] of hashToFiles) {
    if (files.length > 1) {
      duplicates.set(hash, files);
    }
  }

  logger.info(`Found ${duplicates.size} duplicate groups among ${tagged.length} tagged files`, {
    service: 'duplicates',
    root,
  });

  return duplicates;
}
