import { logger } from '../../middleware/logging.js';
import { calculateCrc32, HashProgress } from '../../utils/fileHash.js';
import { toError } from '../../utils/errorHandling.js';
import { HashComputationError, MetadataExtractionError } from '../../errors/index.js';
import { ExtractedMetadata } from '../../types/video.js';
import { MetadataProber } from './ffprobeService.js';

export interface ExtractOptions {
  /** Known file size, saves a stat before hashing */
  size?: number;
  onHashProgress?: (progress: HashProgress) => void;
}

/**
 * Gather resolution, duration and CRC-32 for one file.
 *
 * Steps run in order (resolution, duration, hash) and the first failure is
 * returned as a MetadataExtractionError naming its stage. Duration is minutes
 * as a float; rounding happens when the filename is encoded. No retries.
 */
export async function extractVideoMetadata(
  filePath: string,
  prober: MetadataProber,
  options: ExtractOptions = {}
): Promise<ExtractedMetadata> {
  const startTime = Date.now();

  let resolution: string;
  try {
    resolution = await prober.getResolution(filePath);
  } catch (error) {
    throw new MetadataExtractionError('resolution', filePath, toError(error), { service: 'metadataExtractor' });
  }

  let durationSeconds: number;
  try {
    durationSeconds = await prober.getDurationSeconds(filePath);
  } catch (error) {
    throw new MetadataExtractionError('duration', filePath, toError(error), { service: 'metadataExtractor' });
  }

  let hash: string;
  try {
    hash = await calculateCrc32(filePath, {
      ...(options.size !== undefined && { totalBytes: options.size }),
      ...(options.onHashProgress && { onProgress: options.onHashProgress }),
    });
  } catch (error) {
    throw new HashComputationError(filePath, toError(error), { service: 'metadataExtractor' });
  }

  const metadata: ExtractedMetadata = {
    resolution,
    durationMinutes: durationSeconds / 60,
    hash,
  };

  logger.debug('Extracted video metadata', {
    service: 'metadataExtractor',
    filePath,
    ...metadata,
    timeMs: Date.now() - startTime,
  });

  return metadata;
}
