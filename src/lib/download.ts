/**
 * Save a finished export to disk
 */

import axios from 'axios';
import fs from 'fs';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import { NetworkError, ValidationError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Stream a presigned export URL into a local file
 * Refuses to overwrite an existing file
 */
export async function downloadToFile(url: string, outputPath: string): Promise<void> {
  if (fs.existsSync(outputPath)) {
    throw new ValidationError(
      `Rename existing file or choose new directory, file already exists: ${outputPath}`,
      'outputPath'
    );
  }

  const logger = getLogger();
  logger.debug('Downloading export', { outputPath });

  let body: Readable;
  try {
    const response = await axios.get<Readable>(url, { responseType: 'stream' });
    body = response.data;
  } catch (error) {
    throw new NetworkError(
      `Export download failed: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  // 'wx' fails rather than clobbering a file created since the check above
  await pipeline(body, fs.createWriteStream(outputPath, { flags: 'wx' }));
}
