import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  BridgeConfigError,
  BridgeErrorFactory,
  DataTableError,
  defineConfig,
  ExtractionError,
  isBridgeError,
  LogLevel,
  MaterialBridge
} from '../src';

describe('configuration', () => {
  it('fills every default', () => {
    expect(defineConfig().getConfig()).toEqual({
      debug: false,
      logLevel: LogLevel.INFO,
      shaderBasePath: 'res://shaders',
      textureBasePath: 'res://textures',
      missingTexturePath: 'res://textures/missing_texture.png',
      maxRetainedContentBytes: 1048576,
      tempDirPrefix: 'material_textures_',
      colorClampEpsilon: 0.0001,
      generatePlaceholders: true,
      textureExtensions: ['.png', '.tga', '.jpg', '.jpeg'],
    });
  });

  it('lower-cases texture extensions', () => {
    const bridge = new MaterialBridge({ logLevel: LogLevel.SILENT, textureExtensions: ['.PNG', '.Tga'] });

    expect(bridge.getConfig().textureExtensions).toEqual(['.png', '.tga']);
  });

  it('rejects an invalid configuration', () => {
    const create = () => new MaterialBridge({ tempDirPrefix: 'bad/prefix' });

    expect(create).toThrow(BridgeConfigError);
    expect(create).toThrow('Invalid configuration');
  });

  it('reports the failing key on a configuration error', () => {
    try {
      new MaterialBridge({ shaderBasePath: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BridgeConfigError);
      if (error instanceof BridgeConfigError) {
        expect(error.configKey).toBe('BridgeConfig');
        expect(error.code).toBe('BRIDGE_CONFIG_VALIDATION_ERROR');
        expect(error._tag).toBe('BridgeConfigError');
      }
    }
  });

  it('hands out copies of its configuration', () => {
    const bridge = new MaterialBridge({ logLevel: LogLevel.SILENT });
    bridge.getConfig().textureExtensions.push('.bmp');

    expect(bridge.getConfig().textureExtensions).toEqual(['.png', '.tga', '.jpg', '.jpeg']);
  });
});

describe('errors', () => {
  it('carries code, tag and context in its details', () => {
    const error = BridgeErrorFactory.extractionError('Tar entry has an invalid size', 'tar', { offset: 512 });

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error.stage).toBe('tar');
    expect(error.getDetails()).toMatchObject({
      name: 'ExtractionError',
      message: 'Tar entry has an invalid size',
      code: 'BRIDGE_EXTRACTION_ERROR',
      tag: 'ExtractionError',
      context: { stage: 'tar', offset: 512 },
    });
  });

  it('formats the validation issues of a data table error', () => {
    const parsed = z.object({ threshold: z.number() }).safeParse({ threshold: 'high' });
    const error = BridgeErrorFactory.dataTableError(
      'Invalid data table: name-patterns',
      'name-patterns',
      parsed.success ? undefined : parsed.error
    );

    expect(error).toBeInstanceOf(DataTableError);
    expect(error.getFormattedErrors()).toEqual(['threshold: Expected number, received string']);
    expect(error.getValidationIssues()).toHaveLength(1);
  });

  it('tells bridge errors from other errors', () => {
    expect(isBridgeError(BridgeErrorFactory.mappingError('Nothing to map', 'Empty'))).toBe(true);
    expect(isBridgeError(new Error('plain'))).toBe(false);
    expect(isBridgeError('text')).toBe(false);
  });
});
