/**
 * Material Record Parser
 *
 * Decodes one material file into a frozen MaterialRecord. Tolerates
 * type tags, duplicate keys and the older first/second property layout.
 */

import { DEFAULT_CONFIG, ERROR_MESSAGES, NULL_IDENTIFIER } from '../../constants';
import type {
  ColorValue,
  MaterialRecord,
  ShaderReference,
  TextureReference,
  Vec2
} from '../../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../../core/shader-tables';
import { BridgeErrorFactory } from '../../errors';
import { Logger, LoggerFactory } from '../../utils/logger';
import {
  isDialectMapping,
  parseMaterialDocument,
  type DialectMapping,
  type DialectValue
} from './material-dialect';

export interface ParseMaterialOptions {
  colorClampEpsilon?: number;
  tables?: ShaderTables;
  /** Archive identifier of the record, attached to errors */
  identifier?: string;
  logger?: Logger;
}

type PropertyEntry = [string, DialectValue];

/**
 * Number from a scalar, undefined when it is not numeric
 */
function toNumber(value: DialectValue | undefined): number | undefined {
  if (typeof value !== 'string' || value.trim().length === 0) return undefined;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readVec2(value: DialectValue | undefined, fallback: Vec2): Vec2 {
  if (!isDialectMapping(value)) return fallback;
  return [toNumber(value.x) ?? fallback[0], toNumber(value.y) ?? fallback[1]];
}

/**
 * Clamp a channel only when it leaves [0, 1] by more than epsilon
 */
export function clampColorChannel(value: number, epsilon: number): number {
  if (value < -epsilon) return 0;
  if (value > 1 + epsilon) return 1;
  return value;
}

/**
 * Property entries of one saved-properties section.
 * Accepts "- _Slot: value" items, "- first: {name}" / "second:" items and
 * a "data:" wrapper around either.
 */
function sectionEntries(section: DialectValue | undefined): PropertyEntry[] {
  if (section === undefined || typeof section === 'string') return [];

  if (isDialectMapping(section)) {
    if ('data' in section) return sectionEntries(toSequence(section.data));
    if ('first' in section) return sectionEntries([section]);
    return Object.entries(section);
  }

  const entries: PropertyEntry[] = [];
  for (const item of section) {
    if (!isDialectMapping(item)) continue;

    if ('first' in item) {
      const first = item.first;
      const name = isDialectMapping(first) ? first.name : first;
      if (typeof name === 'string' && name.length > 0) {
        entries.push([name, item.second ?? '']);
      }
      continue;
    }

    entries.push(...Object.entries(item));
  }
  return entries;
}

function toSequence(value: DialectValue): DialectValue[] {
  return Array.isArray(value) ? value : [value];
}

function parseShader(material: DialectMapping, tables: ShaderTables): ShaderReference {
  const shader = material.m_Shader;
  const guid = isDialectMapping(shader) && typeof shader.guid === 'string' ? shader.guid.trim().toLowerCase() : '';
  if (guid.length === 0) {
    return { status: 'unresolved' };
  }

  const known = tables.identifiers.get(guid);
  return known
    ? { status: 'resolved', identifier: guid, shaderName: known.name, family: known.family }
    : { status: 'unresolved', identifier: guid };
}

function isEmptyTextureIdentifier(guid: string): boolean {
  return guid.length < NULL_IDENTIFIER.length || /^0+$/.test(guid);
}

function parseTextures(section: DialectValue | undefined): Map<string, TextureReference> {
  const textures = new Map<string, TextureReference>();

  for (const [slot, value] of sectionEntries(section)) {
    if (!isDialectMapping(value)) continue;
    const texture = value.m_Texture;
    const guid = isDialectMapping(texture) && typeof texture.guid === 'string' ? texture.guid.trim().toLowerCase() : '';
    if (isEmptyTextureIdentifier(guid)) continue;

    textures.set(slot, {
      identifier: guid,
      scale: readVec2(value.m_Scale, [1, 1]),
      offset: readVec2(value.m_Offset, [0, 0]),
    });
  }

  return textures;
}

function parseScalars(
  sections: Array<DialectValue | undefined>,
  logger: Logger,
  materialName: string
): Map<string, number> {
  const floats = new Map<string, number>();

  // Earlier sections win across sections; within one section the last entry wins.
  for (const section of sections) {
    const current = new Map<string, number>();
    for (const [slot, value] of sectionEntries(section)) {
      const parsed = toNumber(value);
      if (parsed === undefined) {
        logger.debug('Skipping non-numeric scalar', { material: materialName, slot });
        continue;
      }
      current.set(slot, parsed);
    }
    for (const [slot, value] of current) {
      if (!floats.has(slot)) floats.set(slot, value);
    }
  }

  return floats;
}

function parseColors(
  section: DialectValue | undefined,
  epsilon: number,
  logger: Logger,
  materialName: string
): Map<string, ColorValue> {
  const colors = new Map<string, ColorValue>();

  for (const [slot, value] of sectionEntries(section)) {
    if (!isDialectMapping(value)) {
      logger.debug('Skipping malformed color', { material: materialName, slot });
      continue;
    }
    const channel = (key: string, fallback: number): number =>
      clampColorChannel(toNumber(value[key]) ?? fallback, epsilon);

    colors.set(slot, [channel('r', 0), channel('g', 0), channel('b', 0), channel('a', 1)]);
  }

  return colors;
}

/**
 * Parse one material from raw bytes or text
 */
export function parseMaterialRecord(input: Uint8Array | string, options: ParseMaterialOptions = {}): MaterialRecord {
  const {
    colorClampEpsilon = DEFAULT_CONFIG.COLOR_CLAMP_EPSILON,
    tables = getDefaultShaderTables(),
    identifier,
    logger = LoggerFactory.forParsing(),
  } = options;

  const text = typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);
  const material = parseMaterialDocument(text);
  if (!material) {
    throw BridgeErrorFactory.materialParseError(ERROR_MESSAGES.NOT_A_MATERIAL, identifier);
  }

  const name = material.m_Name;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw BridgeErrorFactory.materialParseError(ERROR_MESSAGES.MISSING_NAME, identifier);
  }

  const saved = material.m_SavedProperties;
  const properties: DialectMapping = isDialectMapping(saved) ? saved : {};

  const record: MaterialRecord = Object.freeze({
    name,
    shader: Object.freeze(parseShader(material, tables)),
    textures: parseTextures(properties.m_TexEnvs),
    floats: parseScalars([properties.m_Floats, properties.m_Ints], logger, name),
    colors: parseColors(properties.m_Colors, colorClampEpsilon, logger, name),
    sourceIdentifier: identifier,
  });

  logger.debug(`Parsed material '${name}'`, {
    material: name,
    identifier,
    shader: record.shader.status,
    textures: record.textures.size,
    floats: record.floats.size,
    colors: record.colors.size,
  });

  return record;
}
