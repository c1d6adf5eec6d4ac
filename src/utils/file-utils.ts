/**
 * File Utilities
 *
 * Temp directory handling for extracted textures and archive reads.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BridgeErrorFactory } from '../errors';

/**
 * Create a fresh temp directory under the OS temp root
 */
export async function createTempDirectory(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a directory tree; missing directories are fine
 */
export async function removeDirectory(dirPath: string): Promise<void> {
  await fs.promises.rm(dirPath, { recursive: true, force: true });
}

/**
 * Read a whole archive file into memory
 */
export async function readArchiveFile(filePath: string): Promise<Uint8Array> {
  const resolved = path.resolve(filePath);
  try {
    const buffer = await fs.promises.readFile(resolved);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    throw BridgeErrorFactory.fileSystemError(
      `Cannot read archive: ${resolved}`,
      resolved,
      'read',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
}

/**
 * Lower-cased extension of a declared asset path, including the dot
 */
export function getExtension(assetPath: string): string {
  return path.posix.extname(assetPath).toLowerCase();
}

export function getBasename(assetPath: string): string {
  return path.posix.basename(assetPath);
}
