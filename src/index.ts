/**
 * Material Bridge
 *
 * Converts materials from asset archives into Godot ShaderMaterial resources.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'tres-material-bridge';
 *
 * const bridge = defineConfig({
 *   shaderBasePath: 'res://shaders',
 *   textureBasePath: 'res://textures'
 * });
 *
 * const result = await bridge.convert({
 *   archive: './Nature.unitypackage',
 *   manifests: [materialListText]
 * });
 *
 * for (const [fileName, text] of result.resources) {
 *   await fs.promises.writeFile(path.join(outDir, fileName), text);
 * }
 * ```
 */

import { ZodError } from 'zod';
import {
  convertMaterialArchive,
  type ConversionConsumer,
  type ConversionInput,
  type ConversionResult
} from './converters/material-converter';
import { getDefaultShaderTables, type ShaderTables } from './core/shader-tables';
import { BridgeErrorFactory } from './errors';
import { BridgeConfigSchema, type BridgeConfig, type BridgeConfigInput } from './schemas';
import { LoggerFactory, LogLevel } from './utils/logger';

/**
 * Main bridge class
 */
export class MaterialBridge {
  private config: BridgeConfig;
  private tables: ShaderTables;

  constructor(config: BridgeConfigInput = {}, tables: ShaderTables = getDefaultShaderTables()) {
    try {
      this.config = BridgeConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw BridgeErrorFactory.configError(
          'Invalid configuration',
          'BridgeConfig',
          { zodError: error }
        );
      }
      throw error;
    }
    this.tables = tables;

    LoggerFactory.forConversion(this.config.debug ? LogLevel.DEBUG : this.config.logLevel)
      .logConfig({ ...this.config });
  }

  /**
   * Convert every material in an archive
   *
   * @param consume - Called with the result while extracted texture files still exist
   *
   * @example
   * ```typescript
   * await bridge.convert({ archive: bytes }, async result => {
   *   for (const texture of result.textures.values()) {
   *     await fs.promises.copyFile(texture.tempPath, path.join(textureDir, texture.filename));
   *   }
   * });
   * ```
   */
  async convert(input: ConversionInput, consume?: ConversionConsumer): Promise<ConversionResult> {
    return convertMaterialArchive(input, this.config, consume, this.tables);
  }

  /**
   * Get current configuration
   */
  getConfig(): BridgeConfig {
    return { ...this.config, textureExtensions: [...this.config.textureExtensions] };
  }
}

/**
 * Create bridge instance with configuration
 */
export function defineConfig(config: BridgeConfigInput = {}): MaterialBridge {
  return new MaterialBridge(config);
}

/**
 * TypeScript type exports
 */
export type { BridgeConfig, BridgeConfigInput, ShaderFamily } from './schemas';
export type {
  ColorValue,
  DecisionBasis,
  MappedMaterial,
  MaterialRecord,
  MaterialSlot,
  MeshMaterials,
  PrefabGroup,
  PrefabMaterials,
  ShaderCache,
  ShaderDecision,
  ShaderReference,
  TextureBinding,
  TextureReference,
  UniformValue
} from './core/material-model';
export type { Diagnostic, DiagnosticKind, DiagnosticSeverity } from './core/diagnostics';
export type {
  ConversionConsumer,
  ConversionInput,
  ConversionResult,
  ExtractedTexture
} from './converters/material-converter';

/**
 * Component exports
 */
export { convertMaterialArchive } from './converters/material-converter';
export { AssetIndex } from './core/asset-index';
export { DiagnosticCollector } from './core/diagnostics';
export {
  getDefaultShaderTables,
  getKnownShaderIdentifiers,
  getShaderFile,
  getShaderForIdentifier,
  loadShaderTables,
  type ShaderTables
} from './core/shader-tables';
export { extractArchive, withExtractedArchive } from './converters/archive/archive-extractor';
export { readTarEntries } from './converters/shared/tar-reader';
export { parseMaterialDocument, parseMaterialDocuments } from './converters/parsers/material-dialect';
export { parseMaterialRecord } from './converters/parsers/material-record-parser';
export {
  getAllMaterialNames,
  getCustomShaderMaterials,
  getTextureHints,
  groupPrefabs,
  parseMaterialList,
  parseMaterialLists,
  type ManifestParseResult
} from './converters/parsers/material-list-parser';
export { buildShaderCache } from './converters/classification/shader-cache';
export { classifyByName, classifyMaterial, scoreName, scoreSignatures } from './converters/classification/shader-classifier';
export { collectRequiredTextures, mapMaterial, type RequiredTextures } from './converters/mapping/property-mapper';
export { createPlaceholderMaterial } from './converters/mapping/placeholder-material';
export { serializeMaterialResource } from './converters/resources/tres-serializer';
export {
  buildMeshMaterialMapping,
  mergeMeshMaterialMappings,
  parseMeshMaterialMapping,
  serializeMeshMaterialMapping,
  type MeshMaterialMapping
} from './converters/resources/mesh-material-mapping';
export { sanitizeResourceFilename } from './utils/name-utils';
export * from './errors';
export { Logger, LogLevel, createLogger, logger } from './utils/logger';
