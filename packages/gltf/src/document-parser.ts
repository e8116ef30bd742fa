/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * glTF document parser
 *
 * Turns the generic value tree produced by JSON.parse into a GltfDocument.
 * The result is either complete and validated or a thrown ImportError.
 */

import {
  FormatError,
  PrimitiveMode,
  UnsupportedFeatureError,
  identityMatrix,
  type Vec3,
  type Vec4,
} from '@meshport/data';
import {
  ACCESSOR_TYPES,
  ALPHA_MODES,
  BUFFER_TARGETS,
  COMPONENT_TYPES,
  MAG_FILTERS,
  MIN_FILTERS,
  PRIMITIVE_MODES,
  WRAP_S,
  WRAP_T,
} from './codes.js';
import { EntityReader } from './json-reader.js';
import { columnMajorToRowMajor } from './matrix.js';
import {
  GltfAlphaMode,
  WrapMode,
  type Accessor,
  type Asset,
  type Buffer,
  type BufferView,
  type GltfDocument,
  type GltfScene,
  type Image,
  type Material,
  type Mesh,
  type MeshPrimitive,
  type Node,
  type Sampler,
  type Texture,
  type TextureInfo,
} from './types.js';

/**
 * Parse a JSON value tree into a validated document
 * @throws FormatError for malformed input, UnsupportedFeatureError for unhandled features
 */
export function parseDocument(tree: unknown): GltfDocument {
  const root = EntityReader.of(tree, 'document');

  const asset = parseAsset(root.requiredMember('asset'));

  const extensionsRequired = root.optionalStringArray('extensionsRequired');
  if (extensionsRequired && extensionsRequired.length > 0) {
    throw new UnsupportedFeatureError('extensionsRequired', `required extensions: ${extensionsRequired.join(', ')}`);
  }

  const document: GltfDocument = {
    asset,
    accessors: collection(root, 'accessors', parseAccessor),
    buffers: collection(root, 'buffers', parseBuffer),
    bufferViews: collection(root, 'bufferViews', parseBufferView),
    images: collection(root, 'images', parseImage),
    materials: collection(root, 'materials', parseMaterial),
    meshes: collection(root, 'meshes', parseMesh),
    nodes: collection(root, 'nodes', parseNode),
    samplers: collection(root, 'samplers', parseSampler),
    scenes: collection(root, 'scenes', parseScene),
    textures: collection(root, 'textures', parseTexture),
    scene: root.optionalUnsigned('scene'),
    animationCount: root.optionalArray('animations')?.length ?? 0,
    cameraCount: root.optionalArray('cameras')?.length ?? 0,
    skinCount: root.optionalArray('skins')?.length ?? 0,
    extensionsUsed: root.optionalStringArray('extensionsUsed'),
    extensionsRequired,
  };

  validateReferences(document);
  return document;
}

function collection<T>(
  root: EntityReader,
  name: string,
  parse: (reader: EntityReader) => T
): T[] | undefined {
  const raw = root.optionalArray(name);
  if (raw === undefined) return undefined;
  return raw.map((item, index) => parse(EntityReader.of(item, name, index)));
}

function parseAsset(r: EntityReader): Asset {
  return {
    version: r.requiredString('version'),
    copyright: r.optionalString('copyright'),
    generator: r.optionalString('generator'),
    minVersion: r.optionalString('minVersion'),
  };
}

function parseAccessor(r: EntityReader): Accessor {
  if (r.has('sparse')) {
    throw new UnsupportedFeatureError('sparse-accessor', `${r.entity}[${r.index}] uses sparse storage`);
  }
  return {
    bufferView: r.optionalUnsigned('bufferView'),
    byteOffset: r.unsigned('byteOffset', 0),
    componentType: r.requiredCode(COMPONENT_TYPES),
    count: r.requiredUnsigned('count'),
    type: r.requiredCode(ACCESSOR_TYPES),
    normalized: r.boolean('normalized', false),
    min: r.optionalNumberArray('min'),
    max: r.optionalNumberArray('max'),
    name: r.optionalString('name'),
  };
}

function parseBuffer(r: EntityReader): Buffer {
  return {
    uri: r.optionalString('uri'),
    byteLength: r.requiredUnsigned('byteLength'),
    name: r.optionalString('name'),
  };
}

function parseBufferView(r: EntityReader): BufferView {
  return {
    buffer: r.requiredUnsigned('buffer'),
    byteOffset: r.unsigned('byteOffset', 0),
    byteLength: r.requiredUnsigned('byteLength'),
    byteStride: r.optionalUnsigned('byteStride'),
    target: r.optionalCode(BUFFER_TARGETS),
    name: r.optionalString('name'),
  };
}

function parseImage(r: EntityReader): Image {
  return {
    uri: r.optionalString('uri'),
    mimeType: r.optionalString('mimeType'),
    bufferView: r.optionalUnsigned('bufferView'),
    name: r.optionalString('name'),
  };
}

function parseSampler(r: EntityReader): Sampler {
  return {
    magFilter: r.optionalCode(MAG_FILTERS),
    minFilter: r.optionalCode(MIN_FILTERS),
    wrapS: r.code(WRAP_S, WrapMode.Repeat),
    wrapT: r.code(WRAP_T, WrapMode.Repeat),
    name: r.optionalString('name'),
  };
}

function parseTexture(r: EntityReader): Texture {
  return {
    sampler: r.optionalUnsigned('sampler'),
    source: r.optionalUnsigned('source'),
    name: r.optionalString('name'),
  };
}

/**
 * "scale" (normal maps) and "strength" (occlusion maps) share one slot
 */
function parseTextureInfo(r: EntityReader | undefined): TextureInfo | undefined {
  if (r === undefined) return undefined;
  const scale = r.optionalNumber('scale');
  const strength = r.optionalNumber('strength');
  if (scale !== undefined && strength !== undefined) {
    throw r.fail(`"${r.fieldName('scale')}" and "${r.fieldName('strength')}" are mutually exclusive`, 'scale');
  }
  return {
    index: r.requiredUnsigned('index'),
    texCoord: r.unsigned('texCoord', 0),
    scale: scale ?? strength,
  };
}

function parseMaterial(r: EntityReader): Material {
  const pbr = r.optionalObject('pbrMetallicRoughness');
  return {
    name: r.optionalString('name'),
    pbrMetallicRoughness: {
      baseColorFactor: vec4(pbr?.optionalNumberArray('baseColorFactor', 4), [1, 1, 1, 1]),
      baseColorTexture: parseTextureInfo(pbr?.optionalObject('baseColorTexture')),
      metallicFactor: pbr?.number('metallicFactor', 1) ?? 1,
      roughnessFactor: pbr?.number('roughnessFactor', 1) ?? 1,
      metallicRoughnessTexture: parseTextureInfo(pbr?.optionalObject('metallicRoughnessTexture')),
    },
    normalTexture: parseTextureInfo(r.optionalObject('normalTexture')),
    occlusionTexture: parseTextureInfo(r.optionalObject('occlusionTexture')),
    emissiveTexture: parseTextureInfo(r.optionalObject('emissiveTexture')),
    emissiveFactor: vec3(r.optionalNumberArray('emissiveFactor', 3), [0, 0, 0]),
    alphaMode: r.code(ALPHA_MODES, GltfAlphaMode.Opaque),
    alphaCutoff: r.number('alphaCutoff', 0.5),
    doubleSided: r.boolean('doubleSided', false),
  };
}

function parseMesh(r: EntityReader): Mesh {
  const raw = r.optionalArray('primitives');
  if (raw === undefined) {
    throw r.fail('missing required field "primitives"', 'primitives');
  }
  if (raw.length === 0) {
    throw r.fail('"primitives" must not be empty', 'primitives');
  }
  return {
    name: r.optionalString('name'),
    primitives: raw.map((item) => parsePrimitive(EntityReader.of(item, r.entity, r.index))),
  };
}

function parsePrimitive(r: EntityReader): MeshPrimitive {
  const attributesReader = r.requiredObject('attributes');
  const attributes = new Map<string, number>();
  for (const name of attributesReader.keys()) {
    attributes.set(name, attributesReader.requiredUnsigned(name));
  }
  return {
    attributes,
    indices: r.optionalUnsigned('indices'),
    material: r.optionalUnsigned('material'),
    mode: r.code(PRIMITIVE_MODES, PrimitiveMode.Triangles),
  };
}

function parseNode(r: EntityReader): Node {
  const matrix = r.optionalNumberArray('matrix', 16);
  return {
    name: r.optionalString('name'),
    camera: r.optionalUnsigned('camera'),
    mesh: r.optionalUnsigned('mesh'),
    skin: r.optionalUnsigned('skin'),
    children: r.optionalIndexArray('children'),
    hasMatrix: matrix !== undefined,
    matrix: matrix ? columnMajorToRowMajor(matrix) : identityMatrix(),
    translation: vec3(r.optionalNumberArray('translation', 3), [0, 0, 0]),
    rotation: vec4(r.optionalNumberArray('rotation', 4), [0, 0, 0, 1]),
    scale: vec3(r.optionalNumberArray('scale', 3), [1, 1, 1]),
  };
}

function parseScene(r: EntityReader): GltfScene {
  return {
    name: r.optionalString('name'),
    nodes: r.optionalIndexArray('nodes'),
  };
}

function vec3(values: number[] | undefined, fallback: Vec3): Vec3 {
  return values ? [values[0], values[1], values[2]] : fallback;
}

function vec4(values: number[] | undefined, fallback: Vec4): Vec4 {
  return values ? [values[0], values[1], values[2], values[3]] : fallback;
}

// ============================================================================
// Cross-reference validation
// ============================================================================

function checkRef(
  ref: number | undefined,
  length: number,
  target: string,
  entity: string,
  index: number | undefined,
  field: string
): void {
  if (ref !== undefined && ref >= length) {
    throw new FormatError(`"${field}" references ${target}[${ref}] but only ${length} exist`, {
      entity,
      index,
      field,
    });
  }
}

function checkTextureInfo(
  info: TextureInfo | undefined,
  textureCount: number,
  index: number,
  field: string
): void {
  checkRef(info?.index, textureCount, 'textures', 'materials', index, `${field}.index`);
}

/**
 * Every cross-reference must point inside its sibling collection
 */
export function validateReferences(doc: GltfDocument): void {
  const len = (items: readonly unknown[] | undefined): number => items?.length ?? 0;

  doc.accessors?.forEach((accessor, i) => {
    checkRef(accessor.bufferView, len(doc.bufferViews), 'bufferViews', 'accessors', i, 'bufferView');
  });

  doc.bufferViews?.forEach((view, i) => {
    checkRef(view.buffer, len(doc.buffers), 'buffers', 'bufferViews', i, 'buffer');
  });

  doc.images?.forEach((image, i) => {
    checkRef(image.bufferView, len(doc.bufferViews), 'bufferViews', 'images', i, 'bufferView');
  });

  doc.textures?.forEach((texture, i) => {
    checkRef(texture.sampler, len(doc.samplers), 'samplers', 'textures', i, 'sampler');
    checkRef(texture.source, len(doc.images), 'images', 'textures', i, 'source');
  });

  const textureCount = len(doc.textures);
  doc.materials?.forEach((material, i) => {
    const pbr = material.pbrMetallicRoughness;
    checkTextureInfo(pbr.baseColorTexture, textureCount, i, 'pbrMetallicRoughness.baseColorTexture');
    checkTextureInfo(pbr.metallicRoughnessTexture, textureCount, i, 'pbrMetallicRoughness.metallicRoughnessTexture');
    checkTextureInfo(material.normalTexture, textureCount, i, 'normalTexture');
    checkTextureInfo(material.occlusionTexture, textureCount, i, 'occlusionTexture');
    checkTextureInfo(material.emissiveTexture, textureCount, i, 'emissiveTexture');
  });

  doc.meshes?.forEach((mesh, i) => {
    mesh.primitives.forEach((primitive, p) => {
      for (const [name, accessor] of primitive.attributes) {
        checkRef(accessor, len(doc.accessors), 'accessors', 'meshes', i, `primitives[${p}].attributes.${name}`);
      }
      checkRef(primitive.indices, len(doc.accessors), 'accessors', 'meshes', i, `primitives[${p}].indices`);
      checkRef(primitive.material, len(doc.materials), 'materials', 'meshes', i, `primitives[${p}].material`);
    });
  });

  doc.nodes?.forEach((node, i) => {
    checkRef(node.mesh, len(doc.meshes), 'meshes', 'nodes', i, 'mesh');
    checkRef(node.camera, doc.cameraCount, 'cameras', 'nodes', i, 'camera');
    checkRef(node.skin, doc.skinCount, 'skins', 'nodes', i, 'skin');
    node.children?.forEach((child) => {
      checkRef(child, len(doc.nodes), 'nodes', 'nodes', i, 'children');
    });
  });

  doc.scenes?.forEach((scene, i) => {
    scene.nodes?.forEach((node) => {
      checkRef(node, len(doc.nodes), 'nodes', 'scenes', i, 'nodes');
    });
  });

  if (doc.scene !== undefined && doc.scene >= len(doc.scenes)) {
    throw new FormatError(`"scene" references scenes[${doc.scene}] but only ${len(doc.scenes)} exist`, {
      field: 'scene',
    });
  }
}
