/**
 * Custom Error Classes for Material Bridge Operations
 *
 * Tagged union errors. Only extraction and file system errors abort a run;
 * the rest are recorded as diagnostics by the pipeline.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Bridge Error Class
 */
export abstract class BaseBridgeError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Extraction Error
 *
 * The archive is unreadable or corrupt. No partial index is usable.
 */
export class ExtractionError extends BaseBridgeError {
  readonly _tag = 'ExtractionError' as const;
  readonly code = ERROR_CODES.EXTRACTION_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * Material Parse Error
 *
 * One material record could not be decoded. Recoverable per record.
 */
export class MaterialParseError extends BaseBridgeError {
  readonly _tag = 'MaterialParseError' as const;
  readonly code = ERROR_CODES.MATERIAL_PARSE_ERROR;
  readonly identifier: string | undefined;

  constructor(message: string, identifier?: string, context?: Record<string, unknown>) {
    super(message, { identifier, ...context });
    this.identifier = identifier;
  }
}

/**
 * Manifest Parse Error
 *
 * A material list line (or a whole manifest) could not be read.
 */
export class ManifestParseError extends BaseBridgeError {
  readonly _tag = 'ManifestParseError' as const;
  readonly code = ERROR_CODES.MANIFEST_PARSE_ERROR;
  readonly line: number | undefined;

  constructor(message: string, line?: number, context?: Record<string, unknown>) {
    super(message, { line, ...context });
    this.line = line;
  }
}

/**
 * Mapping Error
 *
 * The material carries nothing that could be mapped.
 */
export class MappingError extends BaseBridgeError {
  readonly _tag = 'MappingError' as const;
  readonly code = ERROR_CODES.MAPPING_ERROR;
  readonly materialName: string;

  constructor(message: string, materialName: string, context?: Record<string, unknown>) {
    super(message, { materialName, ...context });
    this.materialName = materialName;
  }
}

/**
 * Bridge Configuration Error
 */
export class BridgeConfigError extends BaseBridgeError {
  readonly _tag = 'BridgeConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Bridge File System Error
 */
export class BridgeFileSystemError extends BaseBridgeError {
  readonly _tag = 'BridgeFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Data Table Error
 *
 * A bundled or caller-supplied shader table failed schema validation.
 */
export class DataTableError extends BaseBridgeError {
  readonly _tag = 'DataTableError' as const;
  readonly code = ERROR_CODES.DATA_TABLE_ERROR;
  readonly table: string;
  readonly zodError?: ZodError;

  constructor(message: string, table: string, zodError?: ZodError) {
    super(message, { table, zodError });
    this.table = table;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Union type for all bridge errors
 */
export type BridgeError =
  | ExtractionError
  | MaterialParseError
  | ManifestParseError
  | MappingError
  | BridgeConfigError
  | BridgeFileSystemError
  | DataTableError;

/**
 * Error factory functions
 */
export const BridgeErrorFactory = {
  /**
   * Create extraction error
   */
  extractionError(message: string, stage: string, context?: Record<string, unknown>): ExtractionError {
    return new ExtractionError(message, stage, context);
  },

  /**
   * Create material parse error
   */
  materialParseError(message: string, identifier?: string, context?: Record<string, unknown>): MaterialParseError {
    return new MaterialParseError(message, identifier, context);
  },

  /**
   * Create manifest parse error
   */
  manifestParseError(message: string, line?: number, context?: Record<string, unknown>): ManifestParseError {
    return new ManifestParseError(message, line, context);
  },

  /**
   * Create mapping error
   */
  mappingError(message: string, materialName: string, context?: Record<string, unknown>): MappingError {
    return new MappingError(message, materialName, context);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): BridgeConfigError {
    return new BridgeConfigError(message, configKey, context);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): BridgeFileSystemError {
    return new BridgeFileSystemError(message, filePath, operation, context);
  },

  /**
   * Create data table error
   */
  dataTableError(message: string, table: string, zodError?: ZodError): DataTableError {
    return new DataTableError(message, table, zodError);
  },
};

/**
 * Narrow an unknown thrown value to a bridge error
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BaseBridgeError;
}
