/**
 * Material Converter
 *
 * Runs one conversion: extract the archive, parse materials and material
 * lists, classify, map, serialize. The asset index is released when the
 * run ends, after the optional consumer has seen the result.
 */

import { FILE_EXTENSIONS } from '../constants';
import { AssetIndex } from '../core/asset-index';
import { DiagnosticCollector, type Diagnostic } from '../core/diagnostics';
import type {
  MappedMaterial,
  MaterialRecord,
  PrefabGroup,
  PrefabMaterials,
  ShaderCache
} from '../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../core/shader-tables';
import { isBridgeError } from '../errors';
import type { BridgeConfig } from '../schemas';
import { readArchiveFile } from '../utils/file-utils';
import { Logger, LoggerFactory, LogLevel } from '../utils/logger';
import { sanitizeResourceFilename, UniqueNameRegistry } from '../utils/name-utils';
import { extractArchive } from './archive/archive-extractor';
import { buildShaderCache } from './classification/shader-cache';
import { collectRequiredTextures, mapMaterial, type RequiredTextures } from './mapping/property-mapper';
import { createPlaceholderMaterial } from './mapping/placeholder-material';
import { getAllMaterialNames, groupPrefabs, parseMaterialLists } from './parsers/material-list-parser';
import { parseMaterialRecord } from './parsers/material-record-parser';
import { buildMeshMaterialMapping, type MeshMaterialMapping } from './resources/mesh-material-mapping';
import { serializeMaterialResource } from './resources/tres-serializer';

/**
 * Conversion Stage Names
 */
const CONVERSION_STAGES = {
  START: 'conversion_start',
  EXTRACTION: 'archive_extraction',
  PARSING: 'material_parsing',
  MANIFESTS: 'manifest_parsing',
  CLASSIFICATION: 'shader_classification',
  MAPPING: 'property_mapping',
  SERIALIZATION: 'resource_serialization',
  COMPLETE: 'conversion_complete',
} as const;

export interface ConversionInput {
  /** Archive bytes or a path to the archive file */
  archive: Uint8Array | ArrayBuffer | string;
  /** Material list texts */
  manifests?: readonly string[];
}

export interface ExtractedTexture {
  filename: string;
  tempPath: string;
}

export interface ConversionResult {
  records: MaterialRecord[];
  prefabs: PrefabMaterials[];
  groups: PrefabGroup[];
  cache: ShaderCache;
  unmatched: string[];
  materials: MappedMaterial[];
  /** Resource file name to .tres text */
  resources: Map<string, string>;
  requiredTextures: RequiredTextures;
  meshMaterialMapping: MeshMaterialMapping;
  /** Extracted textures by identifier; temp paths are valid only inside the consumer */
  textures: Map<string, ExtractedTexture>;
  /** Model files by identifier, declared archive path */
  modelPaths: Map<string, string>;
  diagnostics: Diagnostic[];
}

export type ConversionConsumer = (result: ConversionResult) => Promise<void> | void;

async function toArchiveBytes(archive: ConversionInput['archive']): Promise<Uint8Array> {
  if (typeof archive === 'string') return readArchiveFile(archive);
  return archive instanceof Uint8Array ? archive : new Uint8Array(archive);
}

function parseRecords(
  index: AssetIndex,
  config: BridgeConfig,
  tables: ShaderTables,
  diagnostics: DiagnosticCollector,
  logger: Logger
): MaterialRecord[] {
  const records: MaterialRecord[] = [];

  for (const identifier of index.materialIdentifiers()) {
    const content = index.contents.get(identifier);
    if (!content) {
      diagnostics.warning('missing-asset', `Material ${index.pathnames.get(identifier) ?? identifier} has no content`, identifier);
      continue;
    }

    try {
      records.push(parseMaterialRecord(content, {
        colorClampEpsilon: config.colorClampEpsilon,
        tables,
        identifier,
        logger,
      }));
    } catch (error) {
      if (!isBridgeError(error)) throw error;
      diagnostics.fromError('material-parse', error, identifier);
    }
  }

  return records;
}

/**
 * First record per material name; repeats still get mapped under unique file names
 */
function indexRecordsByName(records: readonly MaterialRecord[]): Map<string, MaterialRecord> {
  const byName = new Map<string, MaterialRecord>();
  for (const record of records) {
    if (!byName.has(record.name)) byName.set(record.name, record);
  }
  return byName;
}

function mapRecords(
  records: readonly MaterialRecord[],
  cache: ShaderCache,
  index: AssetIndex,
  tables: ShaderTables,
  diagnostics: DiagnosticCollector,
  logger: Logger
): MappedMaterial[] {
  const materials: MappedMaterial[] = [];

  for (const record of records) {
    if (record.shader.status === 'unresolved' && record.shader.identifier !== undefined) {
      diagnostics.info('unresolved-shader', `Unknown shader ${record.shader.identifier} on '${record.name}'`, record.name);
    }

    const decision = cache.get(record.name);
    if (decision?.basis === 'default') {
      diagnostics.info('classification-fallback', `No family matched '${record.name}', using generic-opaque`, record.name);
    }

    try {
      const mapped = mapMaterial(record, { tables, textures: index, logger }, decision);
      for (const [uniform, binding] of mapped.textures) {
        if (binding.status === 'missing') {
          diagnostics.info('missing-texture', `Texture ${binding.identifier} for ${uniform} is not in the archive`, record.name);
        }
      }
      materials.push(mapped);
    } catch (error) {
      if (!isBridgeError(error)) throw error;
      diagnostics.fromError('mapping', error, record.name);
    }
  }

  return materials;
}

function serializeResources(
  materials: readonly MappedMaterial[],
  config: BridgeConfig,
  tables: ShaderTables
): Map<string, string> {
  const registry = new UniqueNameRegistry();
  const resources = new Map<string, string>();

  for (const material of materials) {
    const fileName = `${registry.claim(sanitizeResourceFilename(material.name))}${FILE_EXTENSIONS.RESOURCE}`;
    resources.set(fileName, serializeMaterialResource(material, {
      shaderBasePath: config.shaderBasePath,
      textureBasePath: config.textureBasePath,
      missingTexturePath: config.missingTexturePath,
      tables,
    }));
  }

  return resources;
}

/**
 * Run one conversion with a validated config
 */
export async function convertMaterialArchive(
  input: ConversionInput,
  config: BridgeConfig,
  consume?: ConversionConsumer,
  tables: ShaderTables = getDefaultShaderTables()
): Promise<ConversionResult> {
  const level = config.debug ? LogLevel.DEBUG : config.logLevel;
  const logger = LoggerFactory.forConversion(level);
  const diagnostics = new DiagnosticCollector(logger);

  logger.logConversionStage(CONVERSION_STAGES.START);
  const bytes = await toArchiveBytes(input.archive);

  logger.logConversionStage(CONVERSION_STAGES.EXTRACTION);
  const index = await extractArchive(bytes, {
    maxRetainedContentBytes: config.maxRetainedContentBytes,
    tempDirPrefix: config.tempDirPrefix,
    textureExtensions: config.textureExtensions,
    logger: LoggerFactory.forExtraction(level),
    diagnostics,
  });

  try {
    logger.logConversionStage(CONVERSION_STAGES.PARSING);
    const records = parseRecords(index, config, tables, diagnostics, LoggerFactory.forParsing(level));

    logger.logConversionStage(CONVERSION_STAGES.MANIFESTS);
    const manifestResult = parseMaterialLists(input.manifests ?? [], { logger: LoggerFactory.forParsing(level) });
    diagnostics.merge(manifestResult.diagnostics);
    const groups = groupPrefabs(manifestResult.prefabs);

    logger.logConversionStage(CONVERSION_STAGES.CLASSIFICATION);
    const shaderLogger = LoggerFactory.forShaders(level);
    const { cache, unmatched } = buildShaderCache(indexRecordsByName(records), groups, { tables, logger: shaderLogger });

    logger.logConversionStage(CONVERSION_STAGES.MAPPING);
    const materials = mapRecords(records, cache, index, tables, diagnostics, shaderLogger);

    if (config.generatePlaceholders) {
      const known = new Set(records.map(record => record.name));
      for (const name of getAllMaterialNames(manifestResult.prefabs)) {
        if (known.has(name)) continue;
        diagnostics.warning('missing-material', `Material '${name}' is listed but not in the archive; writing a placeholder`, name);
        materials.push(createPlaceholderMaterial(name, tables, cache.get(name)));
      }
    }

    logger.logConversionStage(CONVERSION_STAGES.SERIALIZATION);
    const resources = serializeResources(materials, config, tables);

    const textures = new Map<string, ExtractedTexture>();
    for (const [identifier, tempPath] of index.texturePaths) {
      textures.set(identifier, { filename: index.textureNames.get(identifier) ?? identifier, tempPath });
    }

    const result: ConversionResult = {
      records,
      prefabs: manifestResult.prefabs,
      groups,
      cache,
      unmatched,
      materials,
      resources,
      requiredTextures: collectRequiredTextures(materials),
      meshMaterialMapping: buildMeshMaterialMapping(groups),
      textures,
      modelPaths: index.modelPaths(),
      diagnostics: diagnostics.toArray(),
    };

    if (consume) {
      await consume(result);
    }

    logger.logConversionStage(CONVERSION_STAGES.COMPLETE, {
      materials: materials.length,
      resources: resources.size,
      diagnostics: result.diagnostics.length,
    });

    return result;
  } finally {
    await index.release();
  }
}
