/**
 * Placeholder Material
 *
 * Stand-in for a material named by a material list but absent from the
 * archive. Carries family defaults and a recognizable tint, no textures.
 */

import type { MappedMaterial, ShaderDecision, TextureBinding, UniformValue } from '../../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../../core/shader-tables';
import { classifyByName } from '../classification/shader-classifier';

export function createPlaceholderMaterial(
  name: string,
  tables: ShaderTables = getDefaultShaderTables(),
  decision: ShaderDecision = classifyByName(name, tables)
): MappedMaterial {
  const table = tables.properties[decision.family];
  const uniforms = new Map<string, UniformValue>();

  for (const [uniform, value] of Object.entries(table.defaults)) {
    uniforms.set(uniform, typeof value === 'boolean' ? { type: 'bool', value } : { type: 'float', value });
  }

  for (const [uniform, value] of Object.entries(table.placeholder)) {
    if (Array.isArray(value)) {
      uniforms.set(uniform, { type: 'color', value });
    } else if (typeof value === 'boolean') {
      uniforms.set(uniform, { type: 'bool', value });
    } else {
      uniforms.set(uniform, { type: 'float', value });
    }
  }

  return Object.freeze({
    name,
    family: decision.family,
    shaderFile: decision.shaderFile,
    decision,
    textures: new Map<string, TextureBinding>(),
    uniforms,
  });
}
