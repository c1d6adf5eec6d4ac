/**
 * Zod Schemas for the Material Bridge
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG, FILE_EXTENSIONS } from '../constants/config';
import { LogLevel } from '../utils/logger';
import { LogLevelSchema } from './base-schemas';

/**
 * Texture Extension Schema
 */
export const TextureExtensionSchema = z.string()
  .regex(/^\.[a-z0-9]+$/i, 'Extension must start with a dot')
  .transform(ext => ext.toLowerCase());

/**
 * Material Bridge Configuration Schema
 */
export const BridgeConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  logLevel: LogLevelSchema.optional().default(LogLevel.INFO),
  shaderBasePath: z.string().min(1).optional().default(DEFAULT_CONFIG.SHADER_BASE_PATH),
  textureBasePath: z.string().min(1).optional().default(DEFAULT_CONFIG.TEXTURE_BASE_PATH),
  missingTexturePath: z.string().min(1).optional().default(DEFAULT_CONFIG.MISSING_TEXTURE_PATH),
  maxRetainedContentBytes: z.number().int().positive().optional().default(DEFAULT_CONFIG.MAX_RETAINED_CONTENT_BYTES),
  tempDirPrefix: z.string()
    .min(1)
    .regex(/^[a-zA-Z0-9_\-]+$/, 'Temp dir prefix contains invalid characters')
    .optional()
    .default(DEFAULT_CONFIG.TEMP_DIR_PREFIX),
  colorClampEpsilon: z.number().min(0).optional().default(DEFAULT_CONFIG.COLOR_CLAMP_EPSILON),
  generatePlaceholders: z.boolean().optional().default(DEFAULT_CONFIG.GENERATE_PLACEHOLDERS),
  textureExtensions: z.array(TextureExtensionSchema).min(1).optional().default([...FILE_EXTENSIONS.TEXTURES]),
});

/**
 * Archive Extraction Options Schema
 */
export const ExtractionOptionsSchema = z.object({
  maxRetainedContentBytes: z.number().int().positive().optional().default(DEFAULT_CONFIG.MAX_RETAINED_CONTENT_BYTES),
  tempDirPrefix: z.string().min(1).optional().default(DEFAULT_CONFIG.TEMP_DIR_PREFIX),
  textureExtensions: z.array(TextureExtensionSchema).min(1).optional().default([...FILE_EXTENSIONS.TEXTURES]),
});

/**
 * Resource Serialization Options Schema
 */
export const SerializeOptionsSchema = z.object({
  shaderBasePath: z.string().min(1).optional().default(DEFAULT_CONFIG.SHADER_BASE_PATH),
  textureBasePath: z.string().min(1).optional().default(DEFAULT_CONFIG.TEXTURE_BASE_PATH),
  missingTexturePath: z.string().min(1).optional().default(DEFAULT_CONFIG.MISSING_TEXTURE_PATH),
});

/**
 * Type exports for TypeScript inference
 */
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;
export type ExtractionOptions = z.infer<typeof ExtractionOptionsSchema>;
export type ExtractionOptionsInput = z.input<typeof ExtractionOptionsSchema>;
export type SerializeOptions = z.infer<typeof SerializeOptionsSchema>;
export type SerializeOptionsInput = z.input<typeof SerializeOptionsSchema>;

// Re-export base schemas
export { ShaderFamilySchema, IdentifierSchema, LogLevelSchema, type ShaderFamily } from './base-schemas';
