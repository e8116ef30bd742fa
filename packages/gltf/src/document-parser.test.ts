/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { FormatError, PrimitiveMode, UnsupportedFeatureError } from '@meshport/data';
import { parseDocument } from './document-parser.js';
import { AccessorType, ComponentType, GltfAlphaMode, WrapMode } from './types.js';

const asset = { version: '2.0' };

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('parseDocument', () => {
  it('accepts a document with only an asset', () => {
    const doc = parseDocument({ asset });
    expect(doc.asset.version).toBe('2.0');
    expect(doc.meshes).toBeUndefined();
    expect(doc.scene).toBeUndefined();
    expect(doc.animationCount).toBe(0);
  });

  it('requires asset and its version', () => {
    expect(() => parseDocument({})).toThrow('document: missing required field "asset"');
    expect(() => parseDocument({ asset: {} })).toThrow('asset: missing required field "version"');
  });

  it('rejects a root that is not an object', () => {
    expect(() => parseDocument([1, 2])).toThrow(FormatError);
    expect(() => parseDocument(null)).toThrow('document: expected a JSON object');
  });

  it('applies accessor defaults', () => {
    const doc = parseDocument({
      asset,
      buffers: [{ byteLength: 16 }],
      bufferViews: [{ buffer: 0, byteLength: 16 }],
      accessors: [{ bufferView: 0, componentType: 5126, count: 1, type: 'VEC4' }],
    });
    expect(doc.accessors?.[0]).toMatchObject({
      bufferView: 0,
      byteOffset: 0,
      componentType: ComponentType.Float,
      type: AccessorType.Vec4,
      normalized: false,
      count: 1,
    });
    expect(doc.bufferViews?.[0]).toMatchObject({ byteOffset: 0, byteLength: 16, byteStride: undefined });
  });

  it('names the accessor and field for unknown codes', () => {
    const error = catchError(() =>
      parseDocument({ asset, accessors: [{ componentType: 5126, count: 1, type: 'VEC3' }, { componentType: 1, count: 1, type: 'VEC3' }] })
    );
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toMatchObject({ entity: 'accessors', index: 1, field: 'componentType' });
    expect(error).toHaveProperty('message', 'accessors[1]: unrecognized componentType code 1');
  });

  it('reports missing required fields with their location', () => {
    const error = catchError(() => parseDocument({ asset, accessors: [{ componentType: 5126, type: 'VEC3' }] }));
    expect(error).toMatchObject({ entity: 'accessors', index: 0, field: 'count' });
    expect(error).toHaveProperty('message', 'accessors[0]: missing required field "count"');
  });

  it('rejects negative or fractional counts', () => {
    expect(() => parseDocument({ asset, accessors: [{ componentType: 5126, count: -1, type: 'VEC3' }] })).toThrow(
      'accessors[0]: field "count" must be a non-negative integer'
    );
    expect(() => parseDocument({ asset, accessors: [{ componentType: 5126, count: 1.5, type: 'VEC3' }] })).toThrow(
      FormatError
    );
  });

  it('treats sparse accessors as unsupported', () => {
    const error = catchError(() =>
      parseDocument({ asset, accessors: [{ componentType: 5126, count: 1, type: 'VEC3', sparse: { count: 1 } }] })
    );
    expect(error).toBeInstanceOf(UnsupportedFeatureError);
    expect(error).toHaveProperty('feature', 'sparse-accessor');
  });

  it('treats required extensions as unsupported', () => {
    const error = catchError(() =>
      parseDocument({ asset, extensionsUsed: ['KHR_draco_mesh_compression'], extensionsRequired: ['KHR_draco_mesh_compression'] })
    );
    expect(error).toBeInstanceOf(UnsupportedFeatureError);
    expect(error).toHaveProperty('feature', 'extensionsRequired');
  });

  it('accepts used but not required extensions', () => {
    const doc = parseDocument({ asset, extensionsUsed: ['KHR_materials_unlit'], extensionsRequired: [] });
    expect(doc.extensionsUsed).toEqual(['KHR_materials_unlit']);
  });

  it('fills material defaults', () => {
    const doc = parseDocument({ asset, materials: [{}] });
    const material = doc.materials?.[0];
    expect(material?.pbrMetallicRoughness).toEqual({
      baseColorFactor: [1, 1, 1, 1],
      baseColorTexture: undefined,
      metallicFactor: 1,
      roughnessFactor: 1,
      metallicRoughnessTexture: undefined,
    });
    expect(material?.emissiveFactor).toEqual([0, 0, 0]);
    expect(material?.alphaMode).toBe(GltfAlphaMode.Opaque);
    expect(material?.alphaCutoff).toBe(0.5);
    expect(material?.doubleSided).toBe(false);
  });

  it('reads texture info and the shared scale/strength slot', () => {
    const doc = parseDocument({
      asset,
      images: [{ uri: 'a.png' }],
      textures: [{ source: 0 }],
      materials: [
        {
          normalTexture: { index: 0, scale: 0.5 },
          occlusionTexture: { index: 0, texCoord: 0, strength: 0.25 },
          pbrMetallicRoughness: { baseColorTexture: { index: 0 } },
        },
      ],
    });
    const material = doc.materials?.[0];
    expect(material?.normalTexture).toEqual({ index: 0, texCoord: 0, scale: 0.5 });
    expect(material?.occlusionTexture).toEqual({ index: 0, texCoord: 0, scale: 0.25 });
    expect(material?.pbrMetallicRoughness.baseColorTexture).toEqual({ index: 0, texCoord: 0, scale: undefined });
  });

  it('rejects texture info carrying both scale and strength', () => {
    const error = catchError(() =>
      parseDocument({ asset, textures: [{}], materials: [{ normalTexture: { index: 0, scale: 1, strength: 1 } }] })
    );
    expect(error).toMatchObject({ entity: 'materials', index: 0, field: 'normalTexture.scale' });
  });

  it('checks fixed-length number arrays', () => {
    expect(() => parseDocument({ asset, materials: [{ emissiveFactor: [1, 1] }] })).toThrow(
      'materials[0]: field "emissiveFactor" must be an array of 3 numbers'
    );
    expect(() => parseDocument({ asset, nodes: [{ matrix: [1, 0, 0] }] })).toThrow(
      'nodes[0]: field "matrix" must be an array of 16 numbers'
    );
  });

  it('decodes sampler codes with repeat as the wrap default', () => {
    const doc = parseDocument({ asset, samplers: [{ magFilter: 9728, wrapT: 33071 }] });
    expect(doc.samplers?.[0]).toMatchObject({ wrapS: WrapMode.Repeat, wrapT: WrapMode.ClampToEdge, minFilter: undefined });
  });

  it('defaults primitive mode to triangles and keeps attribute names', () => {
    const doc = parseDocument({
      asset,
      accessors: [
        { componentType: 5126, count: 3, type: 'VEC3' },
        { componentType: 5126, count: 3, type: 'VEC2' },
      ],
      meshes: [{ primitives: [{ attributes: { POSITION: 0, TEXCOORD_0: 1 } }, { attributes: { POSITION: 0 }, mode: 1 }] }],
    });
    const [first, second] = doc.meshes?.[0].primitives ?? [];
    expect(first.mode).toBe(PrimitiveMode.Triangles);
    expect([...first.attributes.entries()]).toEqual([
      ['POSITION', 0],
      ['TEXCOORD_0', 1],
    ]);
    expect(second.mode).toBe(PrimitiveMode.Lines);
  });

  it('rejects meshes without primitives', () => {
    expect(() => parseDocument({ asset, meshes: [{ primitives: [] }] })).toThrow(
      'meshes[0]: "primitives" must not be empty'
    );
    expect(() => parseDocument({ asset, meshes: [{}] })).toThrow('meshes[0]: missing required field "primitives"');
  });

  it('stores node matrices row-major', () => {
    const doc = parseDocument({ asset, nodes: [{ matrix: [0, 1, 0, 0, -1, 0, 0, 0, 0, 0, 1, 0, 5, 6, 7, 1] }, {}] });
    const [withMatrix, plain] = doc.nodes ?? [];
    expect(withMatrix.hasMatrix).toBe(true);
    expect(withMatrix.matrix[0]).toEqual([0, -1, 0, 5]);
    expect(withMatrix.matrix[1]).toEqual([1, 0, 0, 6]);
    expect(plain.hasMatrix).toBe(false);
    expect(plain.translation).toEqual([0, 0, 0]);
    expect(plain.rotation).toEqual([0, 0, 0, 1]);
    expect(plain.scale).toEqual([1, 1, 1]);
  });

  it('counts animations, cameras and skins', () => {
    const doc = parseDocument({ asset, animations: [{}, {}], cameras: [{}], skins: [] });
    expect(doc.animationCount).toBe(2);
    expect(doc.cameraCount).toBe(1);
    expect(doc.skinCount).toBe(0);
  });
});

describe('reference validation', () => {
  it('rejects an accessor pointing past bufferViews', () => {
    const error = catchError(() =>
      parseDocument({ asset, accessors: [{ bufferView: 0, componentType: 5126, count: 1, type: 'SCALAR' }] })
    );
    expect(error).toBeInstanceOf(FormatError);
    expect(error).toHaveProperty('message', 'accessors[0]: "bufferView" references bufferViews[0] but only 0 exist');
  });

  it('rejects primitive attributes pointing past accessors', () => {
    const error = catchError(() => parseDocument({ asset, meshes: [{ primitives: [{ attributes: { POSITION: 3 } }] }] }));
    expect(error).toMatchObject({ entity: 'meshes', index: 0, field: 'primitives[0].attributes.POSITION' });
  });

  it('rejects material texture references past textures', () => {
    const error = catchError(() =>
      parseDocument({ asset, materials: [{ pbrMetallicRoughness: { metallicRoughnessTexture: { index: 2 } } }] })
    );
    expect(error).toMatchObject({
      entity: 'materials',
      index: 0,
      field: 'pbrMetallicRoughness.metallicRoughnessTexture.index',
    });
  });

  it('rejects node children and scene roots past nodes', () => {
    expect(() => parseDocument({ asset, nodes: [{ children: [1] }] })).toThrow(
      'nodes[0]: "children" references nodes[1] but only 1 exist'
    );
    expect(() => parseDocument({ asset, nodes: [{}], scenes: [{ nodes: [0, 4] }] })).toThrow(
      'scenes[0]: "nodes" references nodes[4] but only 1 exist'
    );
  });

  it('rejects a default scene past scenes', () => {
    expect(() => parseDocument({ asset, scenes: [{}], scene: 1 })).toThrow(
      '"scene" references scenes[1] but only 1 exist'
    );
  });
});
