/**
 * Asset Index
 *
 * Identifier-keyed view of an extracted archive. Owns the temp directory
 * holding texture files until released.
 */

import { FILE_EXTENSIONS } from '../constants/config';
import { getBasename, getExtension, removeDirectory } from '../utils/file-utils';

export interface AssetIndexData {
  pathnames: Map<string, string>;
  contents: Map<string, Uint8Array>;
  texturePaths: Map<string, string>;
  textureNames: Map<string, string>;
  tempDir?: string | undefined;
}

export class AssetIndex {
  readonly pathnames: ReadonlyMap<string, string>;
  readonly contents: ReadonlyMap<string, Uint8Array>;
  readonly texturePaths: ReadonlyMap<string, string>;
  readonly textureNames: ReadonlyMap<string, string>;
  readonly tempDir: string | undefined;
  private released = false;

  constructor(data: AssetIndexData) {
    this.pathnames = data.pathnames;
    this.contents = data.contents;
    this.texturePaths = data.texturePaths;
    this.textureNames = data.textureNames;
    this.tempDir = data.tempDir;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Identifiers whose declared path is a material file, in archive order
   */
  materialIdentifiers(): string[] {
    return this.identifiersWithExtension([FILE_EXTENSIONS.MATERIAL]);
  }

  /**
   * Identifiers of model files, for collaborators that copy them out
   */
  modelIdentifiers(): string[] {
    return this.identifiersWithExtension(FILE_EXTENSIONS.MODELS);
  }

  /**
   * Declared path of each model, keyed by identifier
   */
  modelPaths(): Map<string, string> {
    const result = new Map<string, string>();
    for (const identifier of this.modelIdentifiers()) {
      const pathname = this.pathnames.get(identifier);
      if (pathname !== undefined) {
        result.set(identifier, pathname);
      }
    }
    return result;
  }

  /**
   * Texture file name for an identifier, undefined when it is not an extracted texture
   */
  resolveTextureName(identifier: string): string | undefined {
    return this.textureNames.get(identifier.toLowerCase());
  }

  assetName(identifier: string): string | undefined {
    const pathname = this.pathnames.get(identifier);
    return pathname === undefined ? undefined : getBasename(pathname);
  }

  /**
   * Remove the temp directory. Safe to call more than once.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    if (this.tempDir) {
      await removeDirectory(this.tempDir);
    }
  }

  private identifiersWithExtension(extensions: readonly string[]): string[] {
    const result: string[] = [];
    for (const [identifier, pathname] of this.pathnames) {
      if (extensions.includes(getExtension(pathname))) {
        result.push(identifier);
      }
    }
    return result;
  }
}
