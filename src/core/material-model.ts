/**
 * Material Model
 *
 * Plain data shapes passed between the parser, classifier, mapper and
 * serializer. Records are frozen once built.
 */

import type { ShaderFamily } from '../schemas/base-schemas';

export type Vec2 = readonly [number, number];
export type ColorValue = readonly [number, number, number, number];

/**
 * Shader reference of a material, resolved against the known identifier table
 */
export type ShaderReference =
  | { readonly status: 'resolved'; readonly identifier: string; readonly shaderName: string; readonly family: ShaderFamily }
  | { readonly status: 'unresolved'; readonly identifier?: string | undefined };

export interface TextureReference {
  readonly identifier: string;
  readonly scale: Vec2;
  readonly offset: Vec2;
}

/**
 * One source material
 */
export interface MaterialRecord {
  readonly name: string;
  readonly shader: ShaderReference;
  readonly textures: ReadonlyMap<string, TextureReference>;
  readonly floats: ReadonlyMap<string, number>;
  readonly colors: ReadonlyMap<string, ColorValue>;
  /** Archive identifier the record was decoded from, when known */
  readonly sourceIdentifier?: string | undefined;
}

export interface MaterialSlot {
  readonly index: number;
  readonly materialName?: string | undefined;
  readonly textureHint?: string | undefined;
  readonly usesCustomShader: boolean;
}

export interface MeshMaterials {
  readonly meshName: string;
  readonly lod: number;
  readonly slots: readonly MaterialSlot[];
}

/**
 * One prefab entry of a material list
 */
export interface PrefabMaterials {
  readonly prefabName: string;
  /** Prefab name with any LOD suffix stripped */
  readonly groupKey: string;
  readonly meshes: readonly MeshMaterials[];
}

/**
 * All manifest entries sharing a group key, meshes ordered by LOD
 */
export interface PrefabGroup {
  readonly groupKey: string;
  readonly prefabNames: readonly string[];
  readonly meshes: readonly MeshMaterials[];
}

export type DecisionBasis = 'explicit-reference' | 'signature-match' | 'name-heuristic' | 'default';

export interface ShaderDecision {
  readonly family: ShaderFamily;
  readonly shaderFile: string;
  readonly basis: DecisionBasis;
  /** LOD-0 material this decision was copied from */
  readonly inheritedFrom?: string | undefined;
}

export type ShaderCache = ReadonlyMap<string, ShaderDecision>;

export type TextureBinding =
  | { readonly status: 'resolved'; readonly identifier: string; readonly filename: string }
  | { readonly status: 'missing'; readonly identifier: string };

export type UniformValue =
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'color'; readonly value: ColorValue }
  | { readonly type: 'vector'; readonly value: readonly number[] };

/**
 * Target-ready material, consumed once by the serializer
 */
export interface MappedMaterial {
  readonly name: string;
  readonly family: ShaderFamily;
  readonly shaderFile: string;
  readonly decision: ShaderDecision;
  readonly textures: ReadonlyMap<string, TextureBinding>;
  readonly uniforms: ReadonlyMap<string, UniformValue>;
}
