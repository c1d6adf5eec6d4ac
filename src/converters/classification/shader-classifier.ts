/**
 * Shader Classifier
 *
 * Decides the shader family of a material. Steps run in order and the
 * first that matches wins: explicit shader reference, property signature,
 * weighted name patterns, then the generic-opaque default.
 */

import type { MaterialRecord, ShaderDecision } from '../../core/material-model';
import { getDefaultShaderTables, type ShaderTables } from '../../core/shader-tables';
import type { ShaderFamily } from '../../schemas/base-schemas';
import { normalizeSourceKey } from '../../utils/name-utils';

export type FamilyScores = Map<ShaderFamily, number>;

/**
 * Highest score, ties broken by priority order. Undefined when nothing scored.
 */
function pickBest(scores: FamilyScores, priority: readonly ShaderFamily[], minimum: number): ShaderFamily | undefined {
  let best: ShaderFamily | undefined;
  let bestScore = -Infinity;

  for (const family of priority) {
    const score = scores.get(family);
    if (score === undefined || score < minimum) continue;
    // Strictly greater: earlier families keep ties
    if (score > bestScore) {
      best = family;
      bestScore = score;
    }
  }

  return best;
}

/**
 * Count of signature keys present per family; families with none are absent
 */
export function scoreSignatures(material: MaterialRecord, tables: ShaderTables = getDefaultShaderTables()): FamilyScores {
  const textures = new Set([...material.textures.keys()].map(normalizeSourceKey));
  const floats = new Set([...material.floats.keys()].map(normalizeSourceKey));
  const colors = new Set([...material.colors.keys()].map(normalizeSourceKey));
  const scores: FamilyScores = new Map();

  for (const family of tables.priority) {
    const signature = tables.signatures[family];
    let score = 0;
    for (const key of signature.textures) if (textures.has(key)) score++;
    for (const key of signature.floats) if (floats.has(key)) score++;
    for (const key of signature.colors) if (colors.has(key)) score++;
    if (score > 0) {
      scores.set(family, score);
    }
  }

  return scores;
}

/**
 * Summed pattern weights per family for a material name
 */
export function scoreName(name: string, tables: ShaderTables = getDefaultShaderTables()): FamilyScores {
  const scores: FamilyScores = new Map();
  for (const pattern of tables.namePatterns) {
    if (pattern.regex.test(name)) {
      scores.set(pattern.family, (scores.get(pattern.family) ?? 0) + pattern.score);
    }
  }
  return scores;
}

function decide(family: ShaderFamily, basis: ShaderDecision['basis'], tables: ShaderTables): ShaderDecision {
  return { family, shaderFile: tables.properties[family].shaderFile, basis };
}

/**
 * Classify by name alone, used for materials with no record
 */
export function classifyByName(name: string, tables: ShaderTables = getDefaultShaderTables()): ShaderDecision {
  const family = pickBest(scoreName(name, tables), tables.priority, tables.nameThreshold);
  return family ? decide(family, 'name-heuristic', tables) : decide('generic-opaque', 'default', tables);
}

/**
 * Classify one material. Pure.
 */
export function classifyMaterial(material: MaterialRecord, tables: ShaderTables = getDefaultShaderTables()): ShaderDecision {
  if (material.shader.status === 'resolved') {
    const known = tables.identifiers.get(material.shader.identifier);
    if (known) {
      return decide(known.family, 'explicit-reference', tables);
    }
  }

  const bySignature = pickBest(scoreSignatures(material, tables), tables.priority, 1);
  if (bySignature) {
    return decide(bySignature, 'signature-match', tables);
  }

  return classifyByName(material.name, tables);
}
