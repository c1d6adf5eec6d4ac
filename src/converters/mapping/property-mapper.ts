/**
 * Property Mapper
 *
 * Rewrites a MaterialRecord into a MappedMaterial for its shader family.
 * Family tables are layered over the generic-opaque tables; a target
 * uniform is claimed by the first matching table entry.
 */

import type {
  ColorValue,
  MappedMaterial,
  MaterialRecord,
  ShaderDecision,
  TextureBinding,
  UniformValue
} from '../../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../../core/shader-tables';
import { BridgeErrorFactory } from '../../errors';
import type { ShaderFamily } from '../../schemas/base-schemas';
import type { FamilyPropertyTable, MappingEntry } from '../../schemas/shader-tables';
import { Logger, LoggerFactory } from '../../utils/logger';
import { normalizeSourceKey, toUniformName } from '../../utils/name-utils';
import { classifyMaterial } from '../classification/shader-classifier';

/**
 * Resolves texture identifiers to extracted file names
 */
export interface TextureLookup {
  resolveTextureName(identifier: string): string | undefined;
}

export interface MappingContext {
  tables?: ShaderTables;
  textures?: TextureLookup;
  logger?: Logger;
}

export interface MissingTexture {
  material: string;
  uniform: string;
  identifier: string;
}

export interface RequiredTextures {
  /** Resolved file names plus identifiers of missing textures, sorted */
  names: string[];
  missing: MissingTexture[];
}

type TableKind = 'textures' | 'floats' | 'colors';

/**
 * Family entries first, then generic entries the family does not override
 */
function layeredTable(tables: ShaderTables, family: ShaderFamily, kind: TableKind): Map<string, MappingEntry> {
  const layered = new Map<string, MappingEntry>(Object.entries(tables.properties[family][kind]));
  if (family !== 'generic-opaque') {
    for (const [key, entry] of Object.entries(tables.properties['generic-opaque'][kind])) {
      if (!layered.has(key)) layered.set(key, entry);
    }
  }
  return layered;
}

/**
 * Source properties keyed by their underscore-normalized name, first wins
 */
function normalizedProperties<T>(properties: ReadonlyMap<string, T>): Map<string, T> {
  const normalized = new Map<string, T>();
  for (const [key, value] of properties) {
    const normalizedKey = normalizeSourceKey(key);
    if (!normalized.has(normalizedKey)) normalized.set(normalizedKey, value);
  }
  return normalized;
}

export function entryUniform(entry: MappingEntry): string {
  return typeof entry === 'string' ? entry : entry.uniform;
}

export function srgbToLinear(channel: number): number {
  return channel <= 0.04045 ? channel / 12.92 : Math.pow((channel + 0.055) / 1.055, 2.4);
}

function convertFloat(value: number, entry: MappingEntry): number {
  if (typeof entry === 'string') return value;
  return value * (entry.scale ?? 1) + (entry.offset ?? 0);
}

function convertColor(color: ColorValue, entry: MappingEntry): UniformValue {
  const [r, g, b, a] = color;
  const converted: ColorValue =
    typeof entry !== 'string' && entry.colorSpace === 'srgb-to-linear'
      ? [srgbToLinear(r), srgbToLinear(g), srgbToLinear(b), a]
      : color;

  if (typeof entry !== 'string' && entry.type === 'vector') {
    return { type: 'vector', value: converted.slice(0, entry.components ?? 4) };
  }
  return { type: 'color', value: converted };
}

/**
 * Colors written with alpha 0 by mistake: opaque unless the material is transparent
 */
function applyAlphaFix(color: ColorValue, transparent: boolean): ColorValue {
  const [r, g, b, a] = color;
  if (transparent || a !== 0 || (r === 0 && g === 0 && b === 0)) return color;
  return [r, g, b, 1];
}

function defaultValue(value: number | boolean): UniformValue {
  return typeof value === 'boolean' ? { type: 'bool', value } : { type: 'float', value };
}

function applyDefaults(
  uniforms: Map<string, UniformValue>,
  textures: ReadonlyMap<string, TextureBinding>,
  table: FamilyPropertyTable
): void {
  for (const [uniform, value] of Object.entries(table.defaults)) {
    if (!uniforms.has(uniform) && !textures.has(uniform)) {
      uniforms.set(uniform, defaultValue(value));
    }
  }
}

/**
 * Map one material to target uniforms
 */
export function mapMaterial(
  material: MaterialRecord,
  context: MappingContext = {},
  decisionOverride?: ShaderDecision
): MappedMaterial {
  const { tables = getDefaultShaderTables(), textures: lookup, logger = LoggerFactory.forShaders() } = context;

  if (
    material.textures.size === 0 &&
    material.floats.size === 0 &&
    material.colors.size === 0 &&
    material.shader.status === 'unresolved'
  ) {
    throw BridgeErrorFactory.mappingError(
      `Material '${material.name}' has no properties and no known shader`,
      material.name
    );
  }

  const decision = decisionOverride ?? classifyMaterial(material, tables);
  const family = decision.family;
  const rules = tables.rules;
  const booleanFloats = new Set(rules.booleanFloats);
  const alphaFixColors = new Set(rules.alphaFixColors);

  const sourceTextures = normalizedProperties(material.textures);
  const sourceFloats = normalizedProperties(material.floats);
  const sourceColors = normalizedProperties(material.colors);

  const textures = new Map<string, TextureBinding>();
  for (const [key, entry] of layeredTable(tables, family, 'textures')) {
    const reference = sourceTextures.get(key);
    const uniform = entryUniform(entry);
    if (!reference || textures.has(uniform)) continue;

    const filename = lookup?.resolveTextureName(reference.identifier);
    textures.set(uniform, filename
      ? { status: 'resolved', identifier: reference.identifier, filename }
      : { status: 'missing', identifier: reference.identifier });
  }

  const uniforms = new Map<string, UniformValue>();
  const floatTable = layeredTable(tables, family, 'floats');
  for (const [key, entry] of floatTable) {
    const value = sourceFloats.get(key);
    const uniform = entryUniform(entry);
    if (value === undefined || uniforms.has(uniform)) continue;

    uniforms.set(uniform, booleanFloats.has(key)
      ? { type: 'bool', value: value !== 0 }
      : { type: 'float', value: convertFloat(value, entry) });
  }

  // Toggles with no table entry still reach the shader under their snake_case name
  for (const [key, value] of sourceFloats) {
    if (!booleanFloats.has(key) || floatTable.has(key)) continue;
    const uniform = toUniformName(key);
    if (!uniforms.has(uniform)) {
      uniforms.set(uniform, { type: 'bool', value: value !== 0 });
    }
  }

  const transparent = (sourceFloats.get(rules.transparencyModeFloat) ?? 0) >= 1;
  for (const [key, entry] of layeredTable(tables, family, 'colors')) {
    const color = sourceColors.get(key);
    const uniform = entryUniform(entry);
    if (!color || uniforms.has(uniform)) continue;

    const fixed = alphaFixColors.has(key) ? applyAlphaFix(color, transparent) : color;
    uniforms.set(uniform, convertColor(fixed, entry));
  }

  applyDefaults(uniforms, textures, tables.properties[family]);

  logger.debug(`Mapped material '${material.name}'`, {
    material: material.name,
    family,
    basis: decision.basis,
    textures: textures.size,
    uniforms: uniforms.size,
  });

  return Object.freeze({
    name: material.name,
    family,
    shaderFile: decision.shaderFile,
    decision,
    textures,
    uniforms,
  });
}

/**
 * Texture files every mapped material needs, plus the missing ones
 */
export function collectRequiredTextures(materials: readonly MappedMaterial[]): RequiredTextures {
  const names = new Set<string>();
  const missing: MissingTexture[] = [];

  for (const material of materials) {
    for (const [uniform, binding] of material.textures) {
      if (binding.status === 'resolved') {
        names.add(binding.filename);
      } else {
        names.add(binding.identifier);
        missing.push({ material: material.name, uniform, identifier: binding.identifier });
      }
    }
  }

  return { names: [...names].sort(), missing };
}
