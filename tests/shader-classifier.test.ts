import { describe, expect, it } from 'vitest';
import { classifyByName, classifyMaterial, scoreName, scoreSignatures } from '../src/converters/classification/shader-classifier';
import {
  getKnownShaderIdentifiers,
  getShaderFile,
  getShaderForIdentifier,
  loadShaderTables
} from '../src/core/shader-tables';
import { DataTableError } from '../src/errors';
import { makeRecord, SHADER_IDS, testId } from './helpers/fixtures';

describe('classifyMaterial', () => {
  it('uses an explicit shader reference when the identifier is known', () => {
    const record = makeRecord({
      name: 'Anything',
      shader: { status: 'resolved', identifier: SHADER_IDS.foliage, shaderName: 'Foliage', family: 'vegetation' },
    });

    expect(classifyMaterial(record)).toEqual({
      family: 'vegetation',
      shaderFile: 'foliage.gdshader',
      basis: 'explicit-reference',
    });
  });

  it('keeps a generic explicit reference over a specialized signature', () => {
    const record = makeRecord({
      name: 'Pond_Surface',
      shader: { status: 'resolved', identifier: SHADER_IDS.polygon, shaderName: 'PolygonLit', family: 'generic-opaque' },
      textures: { _Caustics_Flipbook: testId(1) },
    });

    expect(classifyMaterial(record)).toEqual({
      family: 'generic-opaque',
      shaderFile: 'polygon.gdshader',
      basis: 'explicit-reference',
    });
  });

  it('matches a property signature when the shader is unknown', () => {
    const record = makeRecord({ name: 'Mat_01', floats: { _Wind_Direction: 0.5 } });

    expect(classifyMaterial(record)).toEqual({
      family: 'vegetation',
      shaderFile: 'foliage.gdshader',
      basis: 'signature-match',
    });
  });

  it('accepts signature keys written without the leading underscore', () => {
    const record = makeRecord({ name: 'Mat_01', textures: { Leaf_Texture: testId(2) } });

    expect(classifyMaterial(record).family).toBe('vegetation');
  });

  it('prefers the higher signature score', () => {
    const record = makeRecord({
      name: 'Mat_01',
      textures: { _Caustics_Flipbook: testId(1), _Foam_Texture: testId(2) },
      floats: { _Enable_Breeze: 1 },
    });

    expect(classifyMaterial(record).family).toBe('water');
  });

  it.each([
    ['vegetation first', { _Enable_Breeze: 1 }, { _Caustics_Flipbook: testId(1) }],
    ['water first', { _Enable_Caustics: 1 }, { _Leaf_Texture: testId(1) }],
  ])('breaks signature ties by family priority (%s)', (_label, floats, textures) => {
    const record = makeRecord({ name: 'Mat_01', floats, textures });

    expect(classifyMaterial(record).family).toBe('vegetation');
  });

  it('falls back to the name heuristic', () => {
    const record = makeRecord({ name: 'Crystal_Mat_01', floats: { _Metallic: 0 } });

    expect(classifyMaterial(record)).toEqual({
      family: 'crystal',
      shaderFile: 'crystal.gdshader',
      basis: 'name-heuristic',
    });
  });

  it('uses the name heuristic for an unknown shader identifier', () => {
    const record = makeRecord({
      name: 'River_Bed',
      shader: { status: 'unresolved', identifier: testId(9) },
      floats: { _Metallic: 0 },
    });

    expect(classifyMaterial(record)).toEqual({
      family: 'water',
      shaderFile: 'water.gdshader',
      basis: 'name-heuristic',
    });
  });

  it('defaults to generic-opaque when nothing matches', () => {
    const record = makeRecord({ name: 'Mat_01', floats: { _Metallic: 0 } });

    expect(classifyMaterial(record)).toEqual({
      family: 'generic-opaque',
      shaderFile: 'polygon.gdshader',
      basis: 'default',
    });
  });
});

describe('name heuristic', () => {
  it('sums the weights of every matching pattern', () => {
    expect(scoreName('Ice_Crystal')).toEqual(new Map([['crystal', 80]]));
  });

  it('matches case-insensitively', () => {
    expect(scoreName('OCEAN_floor')).toEqual(new Map([['water', 45]]));
  });

  it('breaks name ties by family priority', () => {
    expect(scoreName('Pond_Fog')).toEqual(new Map([['water', 35], ['clouds', 35]]));
    expect(classifyByName('Pond_Fog').family).toBe('water');
  });

  it('ignores scores below the threshold', () => {
    expect(scoreName('Moss_Rock')).toEqual(new Map([['generic-opaque', 15]]));
    expect(classifyByName('Moss_Rock')).toEqual({
      family: 'generic-opaque',
      shaderFile: 'polygon.gdshader',
      basis: 'default',
    });
  });

  it('accepts a score exactly at the threshold', () => {
    expect(classifyByName('Leaf_01')).toEqual({
      family: 'vegetation',
      shaderFile: 'foliage.gdshader',
      basis: 'name-heuristic',
    });
  });
});

describe('scoreSignatures', () => {
  it('counts the signature keys present for each family', () => {
    const record = makeRecord({
      name: 'Mat_01',
      textures: { _Caustics_Flipbook: testId(1), _Foam_Texture: testId(2) },
      floats: { _Enable_Breeze: 1, _Metallic: 0 },
    });

    expect(scoreSignatures(record)).toEqual(new Map([['vegetation', 1], ['water', 2]]));
  });

  it('returns no scores for a material without signature keys', () => {
    expect(scoreSignatures(makeRecord({ name: 'Mat_01', floats: { _Metallic: 0 } })).size).toBe(0);
  });
});

describe('shader tables', () => {
  it('looks up identifiers case-insensitively', () => {
    expect(getShaderForIdentifier(SHADER_IDS.foliage.toUpperCase())).toEqual({
      identifier: SHADER_IDS.foliage,
      name: 'Foliage',
      family: 'vegetation',
      shaderFile: 'foliage.gdshader',
    });
    expect(getShaderForIdentifier(testId(3))).toBeUndefined();
  });

  it('lists known identifiers in sorted order', () => {
    const identifiers = getKnownShaderIdentifiers();

    expect(identifiers).toHaveLength(56);
    expect(identifiers).toEqual([...identifiers].sort());
    expect(identifiers).toContain(SHADER_IDS.water);
  });

  it('maps each family to its shader file', () => {
    expect(getShaderFile('sky-dome')).toBe('skydome.gdshader');
    expect(getShaderFile('generic-opaque')).toBe('polygon.gdshader');
  });

  it('rejects a name pattern with an unknown family', () => {
    const load = () => loadShaderTables({
      namePatterns: { threshold: 20, patterns: [{ pattern: 'lava', family: 'magma', score: 5 }] },
    });

    expect(load).toThrow(DataTableError);
    expect(load).toThrow('Invalid data table: name-patterns');
  });

  it('rejects a priority list that repeats a family', () => {
    const load = () => loadShaderTables({
      familySignatures: {
        priority: ['water', 'water', 'crystal', 'clouds', 'particles', 'sky-dome', 'generic-opaque'],
        families: {},
      },
    });

    expect(load).toThrow(DataTableError);
  });
});
