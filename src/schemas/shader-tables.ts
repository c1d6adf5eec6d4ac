/**
 * Shader Table Schemas
 *
 * Shapes of the static JSON tables under src/data. Tables are parsed once
 * at load and frozen.
 */

import { z } from 'zod';
import { IdentifierSchema, ShaderFamilySchema } from './base-schemas';

const ColorTupleSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * Known shader identifiers
 */
export const ShaderIdentifierTableSchema = z.object({
  identifiers: z.record(IdentifierSchema, z.object({
    name: z.string().min(1),
    family: ShaderFamilySchema,
  })),
});

/**
 * Weighted material name patterns
 */
export const NamePatternTableSchema = z.object({
  threshold: z.number().min(0),
  patterns: z.array(z.object({
    pattern: z.string().min(1),
    family: ShaderFamilySchema,
    score: z.number().int().positive(),
  })),
});

const SignatureSchema = z.object({
  textures: z.array(z.string()),
  floats: z.array(z.string()),
  colors: z.array(z.string()),
});

/**
 * Per-family property signatures
 */
export const FamilySignatureTableSchema = z.object({
  priority: z.array(ShaderFamilySchema).length(ShaderFamilySchema.options.length),
  families: z.record(ShaderFamilySchema, SignatureSchema),
});

/**
 * One mapping entry: a bare uniform name or a uniform plus conversion
 */
export const MappingEntrySchema = z.union([
  z.string().min(1),
  z.object({
    uniform: z.string().min(1),
    scale: z.number().optional(),
    offset: z.number().optional(),
    colorSpace: z.enum(['srgb-to-linear']).optional(),
    type: z.enum(['color', 'vector']).optional(),
    components: z.number().int().min(2).max(4).optional(),
  }),
]);

const DefaultValueSchema = z.union([z.number(), z.boolean()]);
const PlaceholderValueSchema = z.union([z.number(), z.boolean(), ColorTupleSchema]);

/**
 * Per-family rename tables, declared order and defaults
 */
export const FamilyPropertyTableSchema = z.object({
  shaderFile: z.string().regex(/\.gdshader$/),
  textures: z.record(z.string(), MappingEntrySchema),
  floats: z.record(z.string(), MappingEntrySchema),
  colors: z.record(z.string(), MappingEntrySchema),
  uniformOrder: z.array(z.string()),
  defaults: z.record(z.string(), DefaultValueSchema),
  placeholder: z.record(z.string(), PlaceholderValueSchema),
});

export const PropertyTableSchema = z.object({
  families: z.record(ShaderFamilySchema, FamilyPropertyTableSchema),
});

/**
 * Cross-family mapping rules
 */
export const MappingRulesSchema = z.object({
  booleanFloats: z.array(z.string()),
  alphaFixColors: z.array(z.string()),
  transparencyModeFloat: z.string().min(1),
  autoEnable: z.record(z.string(), z.string()),
  autoEnablePrefixes: z.record(z.string(), z.string()),
});

export type ShaderIdentifierTable = z.infer<typeof ShaderIdentifierTableSchema>;
export type NamePatternTable = z.infer<typeof NamePatternTableSchema>;
export type FamilySignatureTable = z.infer<typeof FamilySignatureTableSchema>;
export type MappingEntry = z.infer<typeof MappingEntrySchema>;
export type FamilyPropertyTable = z.infer<typeof FamilyPropertyTableSchema>;
export type PropertyTable = z.infer<typeof PropertyTableSchema>;
export type MappingRules = z.infer<typeof MappingRulesSchema>;
