/**
 * Base64 helpers for direct uploads
 */

import fs from 'fs/promises';
import { ValidationError, errorMessage } from './errors.js';

/**
 * Read a local file and return its contents base64 encoded
 */
export async function encodeFileBase64(filePath: string): Promise<string> {
  try {
    const buffer = await fs.readFile(filePath);
    return buffer.toString('base64');
  } catch (error) {
    throw new ValidationError(`Could not read ${filePath}: ${errorMessage(error)}`, 'path');
  }
}

/**
 * Drain a byte stream (e.g. process.stdin) and return it base64 encoded
 */
export async function encodeStreamBase64(
  stream: AsyncIterable<Uint8Array | string>
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('base64');
}
