/**
 * Shader Cache
 *
 * Builds the per-run material name to decision map. Within a prefab
 * group the LOD-0 mesh decides, and every LOD inherits its decision slot
 * by slot.
 */

import type { MaterialRecord, PrefabGroup, ShaderCache, ShaderDecision } from '../../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../../core/shader-tables';
import { Logger, LoggerFactory } from '../../utils/logger';
import { classifyMaterial } from './shader-classifier';

export interface ShaderCacheResult {
  cache: ShaderCache;
  /** Materials classified on their own, sorted */
  unmatched: string[];
}

export interface BuildShaderCacheOptions {
  tables?: ShaderTables;
  logger?: Logger;
}

/**
 * Classify every material, applying LOD inheritance within each group.
 * The first group to claim a material name keeps it.
 */
export function buildShaderCache(
  materials: ReadonlyMap<string, MaterialRecord>,
  groups: readonly PrefabGroup[],
  options: BuildShaderCacheOptions = {}
): ShaderCacheResult {
  const { tables = getDefaultShaderTables(), logger = LoggerFactory.forShaders() } = options;
  const cache = new Map<string, ShaderDecision>();

  for (const group of groups) {
    const meshes = [...group.meshes].sort((a, b) => a.lod - b.lod);
    if (meshes.length === 0) continue;
    const [baseMesh] = meshes;

    for (const baseSlot of baseMesh.slots) {
      const baseName = baseSlot.materialName;
      if (baseName === undefined) continue;
      const record = materials.get(baseName);
      if (!record) continue;

      const decision = cache.get(baseName) ?? classifyMaterial(record, tables);
      if (!cache.has(baseName)) {
        cache.set(baseName, decision);
      }

      for (const mesh of meshes.slice(1)) {
        const slot = mesh.slots.find(candidate => candidate.index === baseSlot.index);
        const name = slot?.materialName;
        if (name === undefined || cache.has(name)) continue;

        cache.set(name, { ...decision, inheritedFrom: baseName });
        logger.debug('Inherited LOD-0 shader decision', {
          material: name,
          inheritedFrom: baseName,
          family: decision.family,
          group: group.groupKey,
        });
      }
    }
  }

  const unmatched: string[] = [];
  for (const [name, record] of [...materials].sort(([a], [b]) => compareCodePoints(a, b))) {
    if (cache.has(name)) continue;
    cache.set(name, classifyMaterial(record, tables));
    unmatched.push(name);
  }

  logger.info('Shader cache built', {
    operation: 'classify',
    materials: cache.size,
    groups: groups.length,
    unmatched: unmatched.length,
  });

  return { cache, unmatched };
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
