/**
 * Resource Formatter
 *
 * Formats numbers, colors and vectors into Godot resource syntax.
 * Every float in a resource goes through here so output stays byte-stable.
 */

import { RESOURCE_FLOAT_PRECISION } from '../constants/resource';

/**
 * Formats a float with fixed precision, trailing zeros stripped.
 * Always keeps one decimal place.
 * Example: 0.5 -> "0.5", 1 -> "1.0", 0.1234567 -> "0.123457"
 */
export function formatResourceFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return '0.0';
  }
  // toFixed turns exponential from 1e21 on; such doubles are always integral
  if (Math.abs(value) >= 1e21) {
    return `${BigInt(value).toString()}.0`;
  }
  let fixed = value.toFixed(RESOURCE_FLOAT_PRECISION).replace(/0+$/, '').replace(/\.$/, '');
  if (fixed === '-0') {
    fixed = '0';
  }
  return fixed.includes('.') ? fixed : `${fixed}.0`;
}

/**
 * Formats an RGBA color.
 * Example: [1, 0.5, 0.25, 1] -> 'Color(1.0, 0.5, 0.25, 1.0)'
 */
export function formatResourceColor(color: readonly [number, number, number, number]): string {
  return `Color(${color.map(formatResourceFloat).join(', ')})`;
}

/**
 * Formats a 2 to 4 component vector.
 * Example: [1, 0] -> 'Vector2(1.0, 0.0)'
 */
export function formatResourceVector(components: readonly number[]): string {
  return `Vector${components.length}(${components.map(formatResourceFloat).join(', ')})`;
}

export function formatResourceBool(value: boolean): string {
  return value ? 'true' : 'false';
}

/**
 * Joins a resource base path and a file name with exactly one slash
 */
export function joinResourcePath(basePath: string, fileName: string): string {
  const base = basePath.replace(/\/+$/, '');
  const name = fileName.replace(/^\/+/, '');
  return base.length > 0 ? `${base}/${name}` : name;
}
