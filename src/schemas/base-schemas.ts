/**
 * Base Schemas
 *
 * Common validation schemas shared by config and data tables.
 */

import { z } from 'zod';
import { LogLevel } from '../utils/logger';

/**
 * Shader Families Schema
 *
 * Declared in tie-break priority order.
 */
export const ShaderFamilySchema = z.enum([
  'vegetation',
  'water',
  'crystal',
  'clouds',
  'particles',
  'sky-dome',
  'generic-opaque',
]);

/**
 * Archive Identifier Schema (32 hex digits)
 */
export const IdentifierSchema = z.string().regex(/^[0-9a-fA-F]{32}$/, 'Identifier must be 32 hex digits');

/**
 * Log Level Schema
 */
export const LogLevelSchema = z.nativeEnum(LogLevel);

export type ShaderFamily = z.infer<typeof ShaderFamilySchema>;
