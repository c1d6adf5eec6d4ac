/**
 * Material List Parser
 *
 * Reads plain-text material lists:
 *
 *   Prefab Name: SM_Env_Tree_01
 *       Mesh Name: SM_Env_Tree_01_LOD0
 *           Slot: Foliage_Mat (Uses custom shader)
 *           Slot: Trunk_Mat (Bark_01)
 *           Slot: Bark_Mat
 *
 * Lines that fit no pattern are skipped and reported.
 */

import type { MaterialSlot, MeshMaterials, PrefabGroup, PrefabMaterials } from '../../core/material-model';
import { DiagnosticCollector, type Diagnostic } from '../../core/diagnostics';
import { Logger, LoggerFactory } from '../../utils/logger';
import { parseLodIndex, stripLodSuffix } from '../../utils/name-utils';

const PREFAB_PATTERN = /^\s*Prefab Name:\s*(.+?)\s*$/;
const MESH_PATTERN = /^\s*Mesh Name:\s*(.+?)\s*$/;
const SLOT_PATTERN = /^\s*Slot:\s*(.+?)\s*\((.+?)\)\s*$/;
const SLOT_HINT_ONLY_PATTERN = /^\s*Slot:\s*\((.+?)\)\s*$/;
const SLOT_NAME_ONLY_PATTERN = /^\s*Slot:\s*(\S[^()]*?)\s*$/;
const SLOT_EMPTY_PATTERN = /^\s*Slot:\s*$/;
const COMMENT_PATTERN = /^\s*(#|\/\/)/;
const CUSTOM_SHADER_HINT = /^uses custom shader$/i;

export interface ParseMaterialListOptions {
  /** Name used in diagnostics, e.g. the manifest file name */
  source?: string;
  logger?: Logger;
}

export interface ManifestParseResult {
  prefabs: PrefabMaterials[];
  diagnostics: Diagnostic[];
}

interface MutablePrefab {
  prefabName: string;
  meshes: Array<{ meshName: string; lod: number; slots: MaterialSlot[] }>;
}

function createSlot(index: number, materialName: string | undefined, hint: string | undefined): MaterialSlot {
  const usesCustomShader = hint !== undefined && CUSTOM_SHADER_HINT.test(hint.trim());
  return {
    index,
    materialName,
    textureHint: hint !== undefined && !usesCustomShader ? hint.trim() : undefined,
    usesCustomShader,
  };
}

/**
 * Slot line into [materialName, hint], undefined when the line is no slot
 */
function matchSlot(line: string): [string | undefined, string | undefined] | undefined {
  const full = SLOT_PATTERN.exec(line);
  if (full) return [full[1], full[2]];
  const hintOnly = SLOT_HINT_ONLY_PATTERN.exec(line);
  if (hintOnly) return [undefined, hintOnly[1]];
  const nameOnly = SLOT_NAME_ONLY_PATTERN.exec(line);
  if (nameOnly) return [nameOnly[1], undefined];
  if (SLOT_EMPTY_PATTERN.test(line)) return [undefined, undefined];
  return undefined;
}

/**
 * Parse one material list
 */
export function parseMaterialList(text: unknown, options: ParseMaterialListOptions = {}): ManifestParseResult {
  const { source = 'material list', logger = LoggerFactory.forParsing() } = options;
  const diagnostics = new DiagnosticCollector(logger);

  if (typeof text !== 'string') {
    diagnostics.add('manifest-parse', 'error', 'Material list is not text', source);
    return { prefabs: [], diagnostics: diagnostics.toArray() };
  }

  const prefabs: MutablePrefab[] = [];
  let currentPrefab: MutablePrefab | undefined;
  let currentMesh: MutablePrefab['meshes'][number] | undefined;

  const lines = text.split(/\r?\n/);
  lines.forEach((line, offset) => {
    const lineNumber = offset + 1;
    if (line.trim().length === 0 || COMMENT_PATTERN.test(line)) return;

    const prefabMatch = PREFAB_PATTERN.exec(line);
    if (prefabMatch) {
      currentPrefab = { prefabName: prefabMatch[1], meshes: [] };
      currentMesh = undefined;
      prefabs.push(currentPrefab);
      return;
    }

    const meshMatch = MESH_PATTERN.exec(line);
    if (meshMatch) {
      if (!currentPrefab) {
        diagnostics.info('manifest-line', `Mesh before any prefab at line ${lineNumber}`, `${source}:${lineNumber}`);
        return;
      }
      currentMesh = { meshName: meshMatch[1], lod: parseLodIndex(meshMatch[1]), slots: [] };
      currentPrefab.meshes.push(currentMesh);
      return;
    }

    const slotMatch = matchSlot(line);
    if (slotMatch) {
      if (!currentMesh) {
        diagnostics.info('manifest-line', `Slot before any mesh at line ${lineNumber}`, `${source}:${lineNumber}`);
        return;
      }
      const [materialName, hint] = slotMatch;
      currentMesh.slots.push(createSlot(currentMesh.slots.length, materialName, hint));
      return;
    }

    diagnostics.info('manifest-line', `Unrecognized line ${lineNumber}: ${line.trim()}`, `${source}:${lineNumber}`);
  });

  logger.debug('Material list parsed', { operation: 'parse-manifest', source, prefabs: prefabs.length });

  return {
    prefabs: prefabs.map(prefab => ({
      prefabName: prefab.prefabName,
      groupKey: stripLodSuffix(prefab.prefabName),
      meshes: prefab.meshes,
    })),
    diagnostics: diagnostics.toArray(),
  };
}

/**
 * Parse several material lists independently and concatenate the results
 */
export function parseMaterialLists(texts: readonly string[], options: ParseMaterialListOptions = {}): ManifestParseResult {
  const prefabs: PrefabMaterials[] = [];
  const diagnostics: Diagnostic[] = [];

  texts.forEach((text, index) => {
    const result = parseMaterialList(text, {
      ...options,
      source: texts.length > 1 ? `${options.source ?? 'material list'} #${index + 1}` : options.source,
    });
    prefabs.push(...result.prefabs);
    diagnostics.push(...result.diagnostics);
  });

  return { prefabs, diagnostics };
}

/**
 * Group entries sharing a group key. Groups keep first-seen order and their
 * meshes are sorted by LOD (stable).
 */
export function groupPrefabs(prefabs: readonly PrefabMaterials[]): PrefabGroup[] {
  const groups = new Map<string, { prefabNames: string[]; meshes: MeshMaterials[] }>();

  for (const prefab of prefabs) {
    const group = groups.get(prefab.groupKey) ?? { prefabNames: [], meshes: [] };
    group.prefabNames.push(prefab.prefabName);
    group.meshes.push(...prefab.meshes);
    groups.set(prefab.groupKey, group);
  }

  return [...groups].map(([groupKey, group]) => ({
    groupKey,
    prefabNames: group.prefabNames,
    meshes: [...group.meshes].sort((a, b) => a.lod - b.lod),
  }));
}

/**
 * Every material name referenced by any slot, sorted
 */
export function getAllMaterialNames(prefabs: readonly PrefabMaterials[]): string[] {
  const names = new Set<string>();
  for (const prefab of prefabs) {
    for (const mesh of prefab.meshes) {
      for (const slot of mesh.slots) {
        if (slot.materialName !== undefined) names.add(slot.materialName);
      }
    }
  }
  return [...names].sort();
}

/**
 * Materials whose slots are marked as using a custom shader, sorted
 */
export function getCustomShaderMaterials(prefabs: readonly PrefabMaterials[]): string[] {
  const names = new Set<string>();
  for (const prefab of prefabs) {
    for (const mesh of prefab.meshes) {
      for (const slot of mesh.slots) {
        if (slot.usesCustomShader && slot.materialName !== undefined) names.add(slot.materialName);
      }
    }
  }
  return [...names].sort();
}

/**
 * Material name to texture hint, first hint wins
 */
export function getTextureHints(prefabs: readonly PrefabMaterials[]): Map<string, string> {
  const hints = new Map<string, string>();
  for (const prefab of prefabs) {
    for (const mesh of prefab.meshes) {
      for (const slot of mesh.slots) {
        if (slot.materialName !== undefined && slot.textureHint !== undefined && !hints.has(slot.materialName)) {
          hints.set(slot.materialName, slot.textureHint);
        }
      }
    }
  }
  return hints;
}
