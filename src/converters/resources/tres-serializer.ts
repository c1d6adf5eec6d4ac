/**
 * Resource Serializer
 *
 * Renders a MappedMaterial as a Godot 4 ShaderMaterial text resource.
 * Output is byte-stable for the same input and base paths.
 */

import { RESOURCE_FORMAT } from '../../constants';
import type { MappedMaterial, TextureBinding, UniformValue } from '../../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../../core/shader-tables';
import { SerializeOptionsSchema, type SerializeOptionsInput } from '../../schemas';
import type { MappingRules } from '../../schemas/shader-tables';
import {
  formatResourceBool,
  formatResourceColor,
  formatResourceFloat,
  formatResourceVector,
  joinResourcePath
} from '../../utils/tres-formatter';

export interface SerializeResourceOptions extends SerializeOptionsInput {
  tables?: ShaderTables;
}

type ResourceParameter =
  | { kind: 'texture'; uniform: string; binding: TextureBinding }
  | { kind: 'value'; uniform: string; value: UniformValue };

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Enable flags implied by the textures present; explicit values win
 */
export function resolveAutoEnabled(mapped: MappedMaterial, rules: MappingRules): Map<string, UniformValue> {
  const uniforms = new Map(mapped.uniforms);

  for (const uniform of mapped.textures.keys()) {
    const targets: string[] = [];
    const direct = rules.autoEnable[uniform];
    if (direct !== undefined) targets.push(direct);
    for (const [prefix, target] of Object.entries(rules.autoEnablePrefixes)) {
      if (uniform.startsWith(prefix)) targets.push(target);
    }

    for (const target of targets) {
      if (!uniforms.has(target)) {
        uniforms.set(target, { type: 'bool', value: true });
      }
    }
  }

  return uniforms;
}

/**
 * Declared uniforms first, then undeclared ones grouped by kind and sorted
 */
export function orderParameters(
  textures: ReadonlyMap<string, TextureBinding>,
  uniforms: ReadonlyMap<string, UniformValue>,
  uniformOrder: readonly string[]
): ResourceParameter[] {
  const parameters: ResourceParameter[] = [];
  const emitted = new Set<string>();

  const emit = (uniform: string): void => {
    if (emitted.has(uniform)) return;
    const binding = textures.get(uniform);
    if (binding) {
      parameters.push({ kind: 'texture', uniform, binding });
      emitted.add(uniform);
      return;
    }
    const value = uniforms.get(uniform);
    if (value) {
      parameters.push({ kind: 'value', uniform, value });
      emitted.add(uniform);
    }
  };

  uniformOrder.forEach(emit);

  const remaining = (names: Iterable<string>): string[] =>
    [...names].filter(name => !emitted.has(name)).sort(compareCodePoints);
  const valuesOfType = (...types: Array<UniformValue['type']>): string[] =>
    [...uniforms].filter(([, value]) => types.includes(value.type)).map(([uniform]) => uniform);

  remaining(textures.keys()).forEach(emit);
  remaining(valuesOfType('bool')).forEach(emit);
  remaining(valuesOfType('float')).forEach(emit);
  remaining(valuesOfType('color', 'vector')).forEach(emit);

  return parameters;
}

export function formatUniformValue(value: UniformValue): string {
  switch (value.type) {
    case 'bool':
      return formatResourceBool(value.value);
    case 'float':
      return formatResourceFloat(value.value);
    case 'color':
      return formatResourceColor(value.value);
    case 'vector':
      return formatResourceVector(value.value);
  }
}

/**
 * Serialize one mapped material
 */
export function serializeMaterialResource(mapped: MappedMaterial, options: SerializeResourceOptions = {}): string {
  const { tables = getDefaultShaderTables(), ...rest } = options;
  const { shaderBasePath, textureBasePath, missingTexturePath } = SerializeOptionsSchema.parse(rest);

  const uniforms = resolveAutoEnabled(mapped, tables.rules);
  const parameters = orderParameters(mapped.textures, uniforms, tables.properties[mapped.family].uniformOrder);

  const extResources: string[] = [
    `[ext_resource type="${RESOURCE_FORMAT.SHADER_TYPE}" path="${joinResourcePath(shaderBasePath, mapped.shaderFile)}" id="${RESOURCE_FORMAT.SHADER_RESOURCE_ID}"]`,
  ];
  const parameterLines: string[] = [];
  let nextId = RESOURCE_FORMAT.FIRST_TEXTURE_ID;

  for (const parameter of parameters) {
    const key = `${RESOURCE_FORMAT.PARAMETER_PREFIX}${parameter.uniform}`;
    if (parameter.kind === 'texture') {
      const id = String(nextId++);
      const texturePath = parameter.binding.status === 'resolved'
        ? joinResourcePath(textureBasePath, parameter.binding.filename)
        : missingTexturePath;
      extResources.push(`[ext_resource type="${RESOURCE_FORMAT.TEXTURE_TYPE}" path="${texturePath}" id="${id}"]`);
      parameterLines.push(`${key} = ExtResource("${id}")`);
    } else {
      parameterLines.push(`${key} = ${formatUniformValue(parameter.value)}`);
    }
  }

  const lines = [
    `[gd_resource type="${RESOURCE_FORMAT.RESOURCE_TYPE}" load_steps=${extResources.length + 1} format=${RESOURCE_FORMAT.FORMAT_VERSION}]`,
    '',
    ...extResources,
    '',
    '[resource]',
    `shader = ExtResource("${RESOURCE_FORMAT.SHADER_RESOURCE_ID}")`,
    ...parameterLines,
  ];

  return `${lines.join('\n')}\n`;
}
