/**
 * Name Utilities
 *
 * Utilities for sanitizing material names and converting property names.
 */

import { FALLBACK_MATERIAL_FILENAME } from '../constants/config';
import { LOD_SUFFIX_PATTERN } from '../constants/resource';

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

/**
 * Sanitizes a material name for use as a resource file name
 *
 * Characters that are invalid on common file systems become underscores,
 * runs of underscores collapse, and an empty result falls back to a
 * fixed name.
 */
export function sanitizeResourceFilename(name: string): string {
  const sanitized = name
    .replace(INVALID_FILENAME_CHARS, '_')
    .replace(/_+/g, '_')
    .replace(/^[_\s]+|[_\s]+$/g, '');

  return sanitized || FALLBACK_MATERIAL_FILENAME;
}

/**
 * Converts a source property name to a snake_case uniform name
 * Example: '_Enable_Breeze' -> 'enable_breeze', '_BaseColor' -> 'base_color'
 */
export function toUniformName(sourceName: string): string {
  return sourceName
    .replace(/^_+/, '')
    .replace(/(?<!^)(?=[A-Z])/g, '_')
    .toLowerCase()
    .replace(/_+/g, '_');
}

/**
 * Source property names carry a leading underscore; accept them without it
 */
export function normalizeSourceKey(name: string): string {
  return name.startsWith('_') ? name : `_${name}`;
}

/**
 * LOD index encoded in a mesh or prefab name, 0 when absent
 */
export function parseLodIndex(name: string): number {
  const match = LOD_SUFFIX_PATTERN.exec(name);
  return match ? Number.parseInt(match[1], 10) : 0;
}

export function stripLodSuffix(name: string): string {
  return name.replace(LOD_SUFFIX_PATTERN, '');
}

/**
 * Hands out unique names, suffixing repeats with _2, _3, ...
 */
export class UniqueNameRegistry {
  private counts = new Map<string, number>();
  private taken = new Set<string>();

  claim(name: string): string {
    if (!this.taken.has(name)) {
      this.taken.add(name);
      this.counts.set(name, 1);
      return name;
    }

    let count = this.counts.get(name) ?? 1;
    let candidate: string;
    do {
      count += 1;
      candidate = `${name}_${count}`;
    } while (this.taken.has(candidate));

    this.counts.set(name, count);
    this.taken.add(candidate);
    return candidate;
  }
}
