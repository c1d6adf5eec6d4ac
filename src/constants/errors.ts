/**
 * Error Constants for the Material Bridge
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  EXTRACTION_ERROR: 'BRIDGE_EXTRACTION_ERROR',
  MATERIAL_PARSE_ERROR: 'BRIDGE_MATERIAL_PARSE_ERROR',
  MANIFEST_PARSE_ERROR: 'BRIDGE_MANIFEST_PARSE_ERROR',
  MAPPING_ERROR: 'BRIDGE_MAPPING_ERROR',
  CONFIG_VALIDATION_ERROR: 'BRIDGE_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'BRIDGE_FILE_SYSTEM_ERROR',
  DATA_TABLE_ERROR: 'BRIDGE_DATA_TABLE_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  EXTRACTION_ERROR: 'Archive could not be extracted',
  MATERIAL_PARSE_ERROR: 'Material record could not be parsed',
  MANIFEST_PARSE_ERROR: 'Material list could not be parsed',
  MAPPING_ERROR: 'Material has no mappable properties',
  CONFIG_VALIDATION_ERROR: 'Configuration validation failed',
  FILE_SYSTEM_ERROR: 'File system operation failed',
  DATA_TABLE_ERROR: 'Shader data table is invalid',
  GZIP_FAILED: 'Gzip stream could not be decompressed',
  TAR_TRUNCATED: 'Tar stream ended inside an entry',
  TAR_CHECKSUM: 'Tar header checksum mismatch',
  TAR_EMPTY: 'Archive contains no entries',
  MISSING_NAME: 'Material record has no name',
  NOT_A_MATERIAL: 'Content is not a material document',
} as const;
