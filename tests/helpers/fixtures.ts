/**
 * Shared test fixtures: material text, records and identifiers
 */
import type { ColorValue, MaterialRecord, ShaderReference, TextureReference } from '../../src/core/material-model';
import { createLogger, LogLevel } from '../../src/utils/logger';

export const silentLogger = createLogger({ level: LogLevel.SILENT });

/** Known shader identifiers from the bundled table */
export const SHADER_IDS = {
  polygon: '0730dae39bc73f34796280af9875ce14',
  foliage: '9b98a126c8d4d7a4baeb81b16e4f7b97',
  water: '436db39b4e2ae5e46a17e21865226b19',
  crystal: '5808064c5204e554c89f589a7059c558',
} as const;

/** Placeholder identifiers: 32 hex digits */
export function testId(n: number): string {
  return n.toString(16).padStart(32, 'a');
}

export interface RecordInput {
  name: string;
  shader?: ShaderReference;
  textures?: Record<string, string>;
  floats?: Record<string, number>;
  colors?: Record<string, ColorValue>;
}

export function makeRecord(input: RecordInput): MaterialRecord {
  const textures = new Map<string, TextureReference>();
  for (const [slot, identifier] of Object.entries(input.textures ?? {})) {
    textures.set(slot, { identifier, scale: [1, 1], offset: [0, 0] });
  }
  return {
    name: input.name,
    shader: input.shader ?? { status: 'unresolved' },
    textures,
    floats: new Map(Object.entries(input.floats ?? {})),
    colors: new Map(Object.entries(input.colors ?? {})),
  };
}

export interface MaterialTextInput {
  name: string;
  shaderGuid?: string;
  textures?: Record<string, string>;
  floats?: Record<string, number | string>;
  colors?: Record<string, string>;
}

/**
 * Material file text in the serialized layout, colors given as flow maps
 */
export function materialText(input: MaterialTextInput): string {
  const lines = [
    '%YAML 1.1',
    '%TAG !u! tag:unity3d.com,2011:',
    '--- !u!21 &2100000',
    'Material:',
    '  serializedVersion: 8',
    '  m_ObjectHideFlags: 0',
    `  m_Name: ${input.name}`,
    input.shaderGuid === undefined
      ? '  m_Shader: {fileID: 0}'
      : `  m_Shader: {fileID: 4800000, guid: ${input.shaderGuid}, type: 3}`,
    '  m_SavedProperties:',
    '    serializedVersion: 3',
    '    m_TexEnvs:',
  ];
  for (const [slot, guid] of Object.entries(input.textures ?? {})) {
    lines.push(
      `    - ${slot}:`,
      `        m_Texture: {fileID: 2800000, guid: ${guid}, type: 3}`,
      '        m_Scale: {x: 1, y: 1}',
      '        m_Offset: {x: 0, y: 0}'
    );
  }
  lines.push('    m_Floats:');
  for (const [slot, value] of Object.entries(input.floats ?? {})) {
    lines.push(`    - ${slot}: ${value}`);
  }
  lines.push('    m_Colors:');
  for (const [slot, value] of Object.entries(input.colors ?? {})) {
    lines.push(`    - ${slot}: ${value}`);
  }
  lines.push('  m_BuildTextureStacks: []');
  return `${lines.join('\n')}\n`;
}
