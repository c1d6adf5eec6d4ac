/**
 * Mesh Material Mapping
 *
 * Mesh name to per-slot material names, written as JSON next to the
 * generated resources so an importer can reassign materials.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../../constants';
import type { PrefabGroup } from '../../core/material-model';
import { BridgeErrorFactory } from '../../errors';

export type MeshMaterialMapping = Map<string, Array<string | null>>;

export const MeshMaterialMappingSchema = z.record(z.string(), z.array(z.string().nullable()));

/**
 * Mapping in group order, then LOD, then slot order
 */
export function buildMeshMaterialMapping(groups: readonly PrefabGroup[]): MeshMaterialMapping {
  const mapping: MeshMaterialMapping = new Map();
  for (const group of groups) {
    for (const mesh of group.meshes) {
      mapping.set(mesh.meshName, mesh.slots.map(slot => slot.materialName ?? null));
    }
  }
  return mapping;
}

export function serializeMeshMaterialMapping(
  mapping: MeshMaterialMapping,
  indent: number = DEFAULT_CONFIG.MAPPING_INDENT
): string {
  return `${JSON.stringify(Object.fromEntries(mapping), null, indent)}\n`;
}

/**
 * Read a previously written mapping document
 */
export function parseMeshMaterialMapping(text: string): MeshMaterialMapping {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw BridgeErrorFactory.manifestParseError('Mesh material mapping is not valid JSON', undefined, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = MeshMaterialMappingSchema.safeParse(data);
  if (!result.success) {
    throw BridgeErrorFactory.manifestParseError('Mesh material mapping has an invalid shape', undefined, {
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return new Map(Object.entries(result.data));
}

/**
 * Entries of next replace those of existing; existing order is kept
 */
export function mergeMeshMaterialMappings(
  existing: MeshMaterialMapping,
  next: MeshMaterialMapping
): MeshMaterialMapping {
  const merged: MeshMaterialMapping = new Map(existing);
  for (const [mesh, materials] of next) {
    merged.set(mesh, [...materials]);
  }
  return merged;
}
