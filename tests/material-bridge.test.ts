import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  BridgeFileSystemError,
  ExtractionError,
  LogLevel,
  MaterialBridge,
  type ConversionResult
} from '../src';
import { buildPackage, type PackageAsset } from './helpers/archive-builder';
import { materialText, SHADER_IDS, testId } from './helpers/fixtures';

const ALBEDO = testId(20);
const MISSING_NORMAL = testId(21);

const TREE_ASSETS: PackageAsset[] = [
  {
    identifier: testId(1),
    pathname: 'Assets/Materials/Leaf_Bark_01.mat',
    asset: materialText({
      name: 'Leaf_Bark_01',
      shaderGuid: testId(99),
      textures: { _Albedo: ALBEDO, _Normal: MISSING_NORMAL },
      floats: { _Wind_Direction: 0.5 },
    }),
  },
  {
    identifier: testId(2),
    pathname: 'Assets/Materials/Broken.mat',
    asset: 'not a material',
  },
  {
    identifier: ALBEDO,
    pathname: 'Assets/Textures/Leaf_Albedo.png',
    asset: new Uint8Array([137, 80, 78, 71]),
  },
  {
    identifier: testId(4),
    pathname: 'Assets/Models/SM_Tree_01.fbx',
    asset: 'model',
  },
];

const TREE_LIST = [
  'Prefab Name: SM_Tree_01',
  '    Mesh Name: SM_Tree_01_LOD0',
  '        Slot: Leaf_Bark_01 (Leaf_Albedo)',
  '    Mesh Name: SM_Tree_01_LOD1',
  '        Slot: Tree_Far_Mat (Leaf_Albedo)',
].join('\n');

const LEAF_RESOURCE = [
  '[gd_resource type="ShaderMaterial" load_steps=4 format=3]',
  '',
  '[ext_resource type="Shader" path="res://shaders/foliage.gdshader" id="1"]',
  '[ext_resource type="Texture2D" path="res://textures/Leaf_Albedo.png" id="2"]',
  '[ext_resource type="Texture2D" path="res://textures/missing_texture.png" id="3"]',
  '',
  '[resource]',
  'shader = ExtResource("1")',
  'shader_parameter/base_texture = ExtResource("2")',
  'shader_parameter/normal_texture = ExtResource("3")',
  'shader_parameter/leaf_smoothness = 0.1',
  'shader_parameter/leaf_metallic = 0.0',
  'shader_parameter/trunk_smoothness = 0.15',
  'shader_parameter/trunk_metallic = 0.0',
  'shader_parameter/wind_direction = 0.5',
  'shader_parameter/enable_normal_texture = true',
  '',
].join('\n');

const PLACEHOLDER_RESOURCE = [
  '[gd_resource type="ShaderMaterial" load_steps=2 format=3]',
  '',
  '[ext_resource type="Shader" path="res://shaders/foliage.gdshader" id="1"]',
  '',
  '[resource]',
  'shader = ExtResource("1")',
  'shader_parameter/leaf_smoothness = 0.1',
  'shader_parameter/leaf_metallic = 0.0',
  'shader_parameter/trunk_smoothness = 0.15',
  'shader_parameter/trunk_metallic = 0.0',
  'shader_parameter/leaf_base_color = Color(0.2, 0.5, 0.2, 1.0)',
  '',
].join('\n');

function bridge(config: ConstructorParameters<typeof MaterialBridge>[0] = {}): MaterialBridge {
  return new MaterialBridge({ logLevel: LogLevel.SILENT, ...config });
}

describe('MaterialBridge.convert', () => {
  const scratch: string[] = [];

  afterEach(async () => {
    await Promise.all(scratch.splice(0).map(dir => fs.promises.rm(dir, { recursive: true, force: true })));
  });

  it('converts a package with a material list', async () => {
    const result = await bridge().convert({ archive: buildPackage(TREE_ASSETS), manifests: [TREE_LIST] });

    expect(result.records.map(record => record.name)).toEqual(['Leaf_Bark_01']);
    expect([...result.resources.keys()]).toEqual(['Leaf_Bark_01.tres', 'Tree_Far_Mat.tres']);
    expect(result.resources.get('Leaf_Bark_01.tres')).toBe(LEAF_RESOURCE);
    expect(result.resources.get('Tree_Far_Mat.tres')).toBe(PLACEHOLDER_RESOURCE);
    expect(result.cache.get('Tree_Far_Mat')).toEqual({
      family: 'vegetation',
      shaderFile: 'foliage.gdshader',
      basis: 'signature-match',
      inheritedFrom: 'Leaf_Bark_01',
    });
    expect(result.unmatched).toEqual([]);
    expect([...result.meshMaterialMapping]).toEqual([
      ['SM_Tree_01_LOD0', ['Leaf_Bark_01']],
      ['SM_Tree_01_LOD1', ['Tree_Far_Mat']],
    ]);
    expect(result.requiredTextures).toEqual({
      names: ['Leaf_Albedo.png', MISSING_NORMAL],
      missing: [{ material: 'Leaf_Bark_01', uniform: 'normal_texture', identifier: MISSING_NORMAL }],
    });
    expect([...result.modelPaths]).toEqual([[testId(4), 'Assets/Models/SM_Tree_01.fbx']]);
  });

  it('reports recoverable problems as diagnostics', async () => {
    const result = await bridge().convert({ archive: buildPackage(TREE_ASSETS), manifests: [TREE_LIST] });

    expect(result.diagnostics.map(diagnostic => [diagnostic.kind, diagnostic.severity, diagnostic.subject])).toEqual([
      ['material-parse', 'error', testId(2)],
      ['unresolved-shader', 'info', 'Leaf_Bark_01'],
      ['missing-texture', 'info', 'Leaf_Bark_01'],
      ['missing-material', 'warning', 'Tree_Far_Mat'],
    ]);
    expect(result.diagnostics[0].message).toBe('Content is not a material document');
  });

  it('keeps converting when one material cannot be mapped', async () => {
    const assets: PackageAsset[] = [
      { identifier: testId(5), pathname: 'Assets/Materials/Hollow.mat', asset: materialText({ name: 'Hollow', shaderGuid: testId(98) }) },
      {
        identifier: testId(6),
        pathname: 'Assets/Materials/Stone.mat',
        asset: materialText({ name: 'Stone', shaderGuid: SHADER_IDS.polygon, floats: { _Metallic: 0.2 } }),
      },
    ];

    const result = await bridge().convert({ archive: buildPackage(assets) });

    expect([...result.resources.keys()]).toEqual(['Stone.tres']);
    expect(result.unmatched).toEqual(['Hollow', 'Stone']);
    expect(result.diagnostics.map(diagnostic => diagnostic.kind)).toEqual([
      'unresolved-shader',
      'classification-fallback',
      'mapping',
    ]);
  });

  it('writes repeated material names under unique file names', async () => {
    const stone = materialText({ name: 'Stone', shaderGuid: SHADER_IDS.polygon, floats: { _Metallic: 0.2 } });
    const assets: PackageAsset[] = [
      { identifier: testId(7), pathname: 'Assets/A/Stone.mat', asset: stone },
      { identifier: testId(8), pathname: 'Assets/B/Stone.mat', asset: stone },
    ];

    const result = await bridge().convert({ archive: buildPackage(assets) });

    const expected = [
      '[gd_resource type="ShaderMaterial" load_steps=2 format=3]',
      '',
      '[ext_resource type="Shader" path="res://shaders/polygon.gdshader" id="1"]',
      '',
      '[resource]',
      'shader = ExtResource("1")',
      'shader_parameter/smoothness = 0.5',
      'shader_parameter/metallic = 0.2',
      '',
    ].join('\n');
    expect([...result.resources]).toEqual([
      ['Stone.tres', expected],
      ['Stone_2.tres', expected],
    ]);
  });

  it('skips placeholders when they are turned off', async () => {
    const result = await bridge({ generatePlaceholders: false }).convert({
      archive: buildPackage(TREE_ASSETS),
      manifests: [TREE_LIST],
    });

    expect([...result.resources.keys()]).toEqual(['Leaf_Bark_01.tres']);
    expect(result.diagnostics.some(diagnostic => diagnostic.kind === 'missing-material')).toBe(false);
  });

  it('uses the configured resource paths', async () => {
    const result = await bridge({
      shaderBasePath: 'res://materials/shaders',
      textureBasePath: 'res://materials/textures/',
      missingTexturePath: 'res://materials/missing.png',
    }).convert({ archive: buildPackage(TREE_ASSETS) });

    expect(result.resources.get('Leaf_Bark_01.tres')?.split('\n').slice(2, 5)).toEqual([
      '[ext_resource type="Shader" path="res://materials/shaders/foliage.gdshader" id="1"]',
      '[ext_resource type="Texture2D" path="res://materials/textures/Leaf_Albedo.png" id="2"]',
      '[ext_resource type="Texture2D" path="res://materials/missing.png" id="3"]',
    ]);
  });

  it('hands extracted textures to the consumer before cleaning up', async () => {
    const seen: { texture?: string; bytes?: number[] } = {};

    const result = await bridge().convert({ archive: buildPackage(TREE_ASSETS) }, async (current: ConversionResult) => {
      const texture = current.textures.get(ALBEDO);
      seen.texture = texture?.filename;
      if (texture) {
        seen.bytes = [...(await fs.promises.readFile(texture.tempPath))];
      }
    });

    expect(seen).toEqual({ texture: 'Leaf_Albedo.png', bytes: [137, 80, 78, 71] });
    const tempPath = result.textures.get(ALBEDO)?.tempPath;
    expect(tempPath).toBeDefined();
    expect(fs.existsSync(tempPath ?? '')).toBe(false);
  });

  it('cleans up when the consumer fails', async () => {
    const holder: { tempPath?: string } = {};

    await expect(bridge().convert({ archive: buildPackage(TREE_ASSETS) }, current => {
      holder.tempPath = current.textures.get(ALBEDO)?.tempPath;
      throw new Error('consumer failed');
    })).rejects.toThrow('consumer failed');

    expect(holder.tempPath).toBeDefined();
    expect(fs.existsSync(holder.tempPath ?? '')).toBe(false);
  });

  it('reads the archive from a path or an ArrayBuffer', async () => {
    const bytes = buildPackage(TREE_ASSETS);
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'bridge-test-'));
    scratch.push(dir);
    const archivePath = path.join(dir, 'Nature.unitypackage');
    await fs.promises.writeFile(archivePath, bytes);

    const buffer = new ArrayBuffer(bytes.length);
    new Uint8Array(buffer).set(bytes);

    const fromPath = await bridge().convert({ archive: archivePath });
    const fromBuffer = await bridge().convert({ archive: buffer });

    expect([...fromPath.resources.keys()]).toEqual(['Leaf_Bark_01.tres']);
    expect(fromBuffer.resources).toEqual(fromPath.resources);
  });

  it('fails on an archive file that does not exist', async () => {
    const missing = path.join(os.tmpdir(), 'bridge-test-missing', 'None.unitypackage');

    await expect(bridge().convert({ archive: missing })).rejects.toThrow(BridgeFileSystemError);
  });

  it('fails on a corrupt archive', async () => {
    await expect(bridge().convert({ archive: new Uint8Array([1, 2, 3]) })).rejects.toThrow(ExtractionError);
  });
});
