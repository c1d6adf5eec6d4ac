/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  SHADER_BASE_PATH: 'res://shaders',
  TEXTURE_BASE_PATH: 'res://textures',
  MISSING_TEXTURE_PATH: 'res://textures/missing_texture.png',
  MAX_RETAINED_CONTENT_BYTES: 1024 * 1024,
  TEMP_DIR_PREFIX: 'material_textures_',
  COLOR_CLAMP_EPSILON: 1e-4,
  GENERATE_PLACEHOLDERS: true,
  MAPPING_INDENT: 2,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  MATERIAL: '.mat',
  RESOURCE: '.tres',
  TEXTURES: ['.png', '.tga', '.jpg', '.jpeg'],
  MODELS: ['.fbx', '.obj', '.blend'],
} as const;

/**
 * Archive member names inside one identifier group
 */
export const ARCHIVE_MEMBERS = {
  ASSET: 'asset',
  PATHNAME: 'pathname',
} as const;

/**
 * Identifiers are 32 hex digits
 */
export const IDENTIFIER_PATTERN = /^[0-9a-fA-F]{32}$/;

export const NULL_IDENTIFIER = '00000000000000000000000000000000';

export const FALLBACK_MATERIAL_FILENAME = 'unnamed_material';
