/**
 * Shader Tables
 *
 * Loads the static JSON tables under src/data, validates them once and
 * exposes them as frozen lookup structures.
 */

import { ZodError, ZodType, ZodTypeDef } from 'zod';
import familySignaturesData from '../data/family-signatures.json';
import mappingRulesData from '../data/mapping-rules.json';
import namePatternsData from '../data/name-patterns.json';
import propertyTablesData from '../data/property-tables.json';
import shaderIdentifiersData from '../data/shader-identifiers.json';
import { BridgeErrorFactory } from '../errors';
import { ShaderFamily, ShaderFamilySchema } from '../schemas/base-schemas';
import {
  FamilyPropertyTable,
  FamilySignatureTableSchema,
  MappingRules,
  MappingRulesSchema,
  NamePatternTableSchema,
  PropertyTableSchema,
  ShaderIdentifierTableSchema,
} from '../schemas/shader-tables';

export interface KnownShader {
  readonly identifier: string;
  readonly name: string;
  readonly family: ShaderFamily;
  readonly shaderFile: string;
}

export interface NamePattern {
  readonly regex: RegExp;
  readonly family: ShaderFamily;
  readonly score: number;
}

export interface FamilySignature {
  readonly textures: ReadonlySet<string>;
  readonly floats: ReadonlySet<string>;
  readonly colors: ReadonlySet<string>;
}

/**
 * Validated lookup tables shared by the classifier, mapper and serializer
 */
export interface ShaderTables {
  readonly identifiers: ReadonlyMap<string, KnownShader>;
  readonly namePatterns: readonly NamePattern[];
  readonly nameThreshold: number;
  readonly priority: readonly ShaderFamily[];
  readonly signatures: Readonly<Record<ShaderFamily, FamilySignature>>;
  readonly properties: Readonly<Record<ShaderFamily, FamilyPropertyTable>>;
  readonly rules: MappingRules;
}

/**
 * Raw table sources, each validated on load
 */
export interface ShaderTableSources {
  shaderIdentifiers: unknown;
  namePatterns: unknown;
  familySignatures: unknown;
  propertyTables: unknown;
  mappingRules: unknown;
}

const BUNDLED_SOURCES: ShaderTableSources = {
  shaderIdentifiers: shaderIdentifiersData,
  namePatterns: namePatternsData,
  familySignatures: familySignaturesData,
  propertyTables: propertyTablesData,
  mappingRules: mappingRulesData,
};

function parseTable<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, table: string): T {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw BridgeErrorFactory.dataTableError(`Invalid data table: ${table}`, table, error);
    }
    throw error;
  }
}

/**
 * Zod infers enum-keyed records as partial; every family must be present
 */
function requireFamilies<T>(entries: Partial<Record<ShaderFamily, T>>, table: string): Record<ShaderFamily, T> {
  const pick = (family: ShaderFamily): T => {
    const entry = entries[family];
    if (entry === undefined) {
      throw BridgeErrorFactory.dataTableError(`Data table ${table} has no entry for family ${family}`, table);
    }
    return entry;
  };

  return {
    vegetation: pick('vegetation'),
    water: pick('water'),
    crystal: pick('crystal'),
    clouds: pick('clouds'),
    particles: pick('particles'),
    'sky-dome': pick('sky-dome'),
    'generic-opaque': pick('generic-opaque'),
  };
}

/**
 * Validate table sources and build the lookup structures
 */
export function loadShaderTables(sources: Partial<ShaderTableSources> = {}): ShaderTables {
  const raw = { ...BUNDLED_SOURCES, ...sources };

  const identifierTable = parseTable(ShaderIdentifierTableSchema, raw.shaderIdentifiers, 'shader-identifiers');
  const patternTable = parseTable(NamePatternTableSchema, raw.namePatterns, 'name-patterns');
  const signatureTable = parseTable(FamilySignatureTableSchema, raw.familySignatures, 'family-signatures');
  const propertyTable = parseTable(PropertyTableSchema, raw.propertyTables, 'property-tables');
  const rules = parseTable(MappingRulesSchema, raw.mappingRules, 'mapping-rules');

  const priority = signatureTable.priority;
  if (new Set(priority).size !== ShaderFamilySchema.options.length) {
    throw BridgeErrorFactory.dataTableError('Family priority must list every family once', 'family-signatures');
  }

  const properties = requireFamilies(propertyTable.families, 'property-tables');
  const signatures = requireFamilies(signatureTable.families, 'family-signatures');

  const identifiers = new Map<string, KnownShader>();
  for (const [identifier, entry] of Object.entries(identifierTable.identifiers)) {
    const key = identifier.toLowerCase();
    identifiers.set(key, Object.freeze({
      identifier: key,
      name: entry.name,
      family: entry.family,
      shaderFile: properties[entry.family].shaderFile,
    }));
  }

  const namePatterns = patternTable.patterns.map(entry => Object.freeze({
    regex: new RegExp(entry.pattern, 'i'),
    family: entry.family,
    score: entry.score,
  }));

  const toSignature = (family: ShaderFamily): FamilySignature => {
    const signature = signatures[family];
    return Object.freeze({
      textures: new Set(signature.textures),
      floats: new Set(signature.floats),
      colors: new Set(signature.colors),
    });
  };

  return Object.freeze({
    identifiers,
    namePatterns: Object.freeze(namePatterns),
    nameThreshold: patternTable.threshold,
    priority: Object.freeze([...priority]),
    signatures: Object.freeze({
      vegetation: toSignature('vegetation'),
      water: toSignature('water'),
      crystal: toSignature('crystal'),
      clouds: toSignature('clouds'),
      particles: toSignature('particles'),
      'sky-dome': toSignature('sky-dome'),
      'generic-opaque': toSignature('generic-opaque'),
    }),
    properties: Object.freeze(properties),
    rules: Object.freeze(rules),
  });
}

let defaultTables: ShaderTables | undefined;

/**
 * Bundled tables, loaded on first use
 */
export function getDefaultShaderTables(): ShaderTables {
  if (!defaultTables) {
    defaultTables = loadShaderTables();
  }
  return defaultTables;
}

export function getShaderForIdentifier(
  identifier: string,
  tables: ShaderTables = getDefaultShaderTables()
): KnownShader | undefined {
  return tables.identifiers.get(identifier.toLowerCase());
}

/**
 * All known shader identifiers, sorted
 */
export function getKnownShaderIdentifiers(tables: ShaderTables = getDefaultShaderTables()): string[] {
  return [...tables.identifiers.keys()].sort();
}

export function getShaderFile(family: ShaderFamily, tables: ShaderTables = getDefaultShaderTables()): string {
  return tables.properties[family].shaderFile;
}
