/**
 * Resource Format Constants
 *
 * Text layout of Godot 4 ShaderMaterial resources.
 */

export const RESOURCE_FORMAT = {
  FORMAT_VERSION: 3,
  RESOURCE_TYPE: 'ShaderMaterial',
  SHADER_TYPE: 'Shader',
  TEXTURE_TYPE: 'Texture2D',
  SHADER_RESOURCE_ID: '1',
  FIRST_TEXTURE_ID: 2,
  PARAMETER_PREFIX: 'shader_parameter/',
} as const;

/**
 * Decimal places used for every float written to a resource
 */
export const RESOURCE_FLOAT_PRECISION = 6;

/**
 * LOD suffix on mesh and prefab names, e.g. SM_Tree_01_LOD2
 */
export const LOD_SUFFIX_PATTERN = /_LOD(\d+)$/i;
