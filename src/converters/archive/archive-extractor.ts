/**
 * Archive Extractor
 *
 * Decodes a gzip-compressed tar bundle keyed by asset identifiers into an
 * AssetIndex. Entries are collected first and resolved afterwards, so the
 * member order inside the archive does not matter.
 */

import * as fs from 'fs';
import * as path from 'path';
import { gunzipSync } from 'fflate';
import { ARCHIVE_MEMBERS, ERROR_MESSAGES, GZIP_MAGIC, IDENTIFIER_PATTERN } from '../../constants';
import { AssetIndex } from '../../core/asset-index';
import { DiagnosticCollector } from '../../core/diagnostics';
import { BridgeErrorFactory, isBridgeError } from '../../errors';
import { ExtractionOptionsSchema, type ExtractionOptionsInput } from '../../schemas';
import { createTempDirectory, getBasename, getExtension, removeDirectory } from '../../utils/file-utils';
import { Logger, LoggerFactory } from '../../utils/logger';
import { readTarEntries } from '../shared/tar-reader';

export interface ExtractArchiveOptions extends ExtractionOptionsInput {
  logger?: Logger;
  diagnostics?: DiagnosticCollector;
}

interface PendingGroup {
  pathname?: Uint8Array;
  asset?: Uint8Array;
}

/**
 * Gunzip when the input carries the gzip magic, otherwise read as plain tar
 */
function decompress(bytes: Uint8Array): Uint8Array {
  if (bytes.length < 2 || bytes[0] !== GZIP_MAGIC[0] || bytes[1] !== GZIP_MAGIC[1]) {
    return bytes;
  }
  try {
    return gunzipSync(bytes);
  } catch (error) {
    throw BridgeErrorFactory.extractionError(ERROR_MESSAGES.GZIP_FAILED, 'gzip', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * First line of a pathname member, NULs removed
 */
function decodePathname(bytes: Uint8Array): string {
  const text = new TextDecoder('utf-8').decode(bytes).replace(/\0/g, '');
  return text.split(/\r?\n/, 1)[0].trim();
}

/**
 * Collect archive members by identifier directory
 */
function collectGroups(data: Uint8Array, logger: Logger): Map<string, PendingGroup> {
  const groups = new Map<string, PendingGroup>();

  for (const entry of readTarEntries(data)) {
    const parts = entry.name.replace(/^\.\//, '').split('/').filter(part => part.length > 0);
    if (parts.length !== 2) continue;

    const [directory, member] = parts;
    if (!IDENTIFIER_PATTERN.test(directory)) {
      logger.debug('Skipping entry outside an identifier directory', { entry: entry.name });
      continue;
    }

    const identifier = directory.toLowerCase();
    const group = groups.get(identifier) ?? {};
    if (member === ARCHIVE_MEMBERS.PATHNAME) {
      group.pathname = entry.data;
    } else if (member === ARCHIVE_MEMBERS.ASSET) {
      group.asset = entry.data;
    }
    groups.set(identifier, group);
  }

  return groups;
}

/**
 * Extract an archive into an AssetIndex.
 * Texture assets are written to a fresh temp directory the index owns.
 */
export async function extractArchive(bytes: Uint8Array, options: ExtractArchiveOptions = {}): Promise<AssetIndex> {
  const { logger = LoggerFactory.forExtraction(), diagnostics, ...rest } = options;
  const validatedOptions = ExtractionOptionsSchema.parse(rest);

  if (bytes.length === 0) {
    throw BridgeErrorFactory.extractionError(ERROR_MESSAGES.TAR_EMPTY, 'read');
  }

  const groups = collectGroups(decompress(bytes), logger);

  const pathnames = new Map<string, string>();
  const contents = new Map<string, Uint8Array>();
  const texturePaths = new Map<string, string>();
  const textureNames = new Map<string, string>();
  let tempDir: string | undefined;

  try {
    for (const [identifier, group] of groups) {
      const pathname = group.pathname ? decodePathname(group.pathname) : '';
      if (!pathname) {
        diagnostics?.warning('missing-pathname', 'Archive entry has no pathname', identifier);
        continue;
      }
      pathnames.set(identifier, pathname);

      if (!group.asset) {
        continue;
      }

      const extension = getExtension(pathname);
      if (validatedOptions.textureExtensions.includes(extension)) {
        if (tempDir === undefined) {
          tempDir = await createTempDirectory(validatedOptions.tempDirPrefix);
        }
        const texturePath = path.join(tempDir, `${identifier}${extension}`);
        await fs.promises.writeFile(texturePath, group.asset);
        texturePaths.set(identifier, texturePath);
        textureNames.set(identifier, getBasename(pathname));
        continue;
      }

      if (group.asset.length > validatedOptions.maxRetainedContentBytes) {
        diagnostics?.info('oversized-entry', `Asset exceeds ${validatedOptions.maxRetainedContentBytes} bytes: ${pathname}`, identifier);
        continue;
      }
      contents.set(identifier, group.asset);
    }
  } catch (error) {
    if (tempDir !== undefined) {
      await removeDirectory(tempDir);
    }
    if (isBridgeError(error)) throw error;
    throw BridgeErrorFactory.extractionError('Failed to write extracted texture', 'write', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  logger.info('Archive extracted', {
    operation: 'extract',
    entries: pathnames.size,
    textures: texturePaths.size,
    retained: contents.size,
  });

  return new AssetIndex({ pathnames, contents, texturePaths, textureNames, tempDir });
}

/**
 * Run fn against an extracted index and release it afterwards, on both paths
 */
export async function withExtractedArchive<T>(
  bytes: Uint8Array,
  options: ExtractArchiveOptions,
  fn: (index: AssetIndex) => Promise<T> | T
): Promise<T> {
  const index = await extractArchive(bytes, options);
  try {
    return await fn(index);
  } finally {
    await index.release();
  }
}
