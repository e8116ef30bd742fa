/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene assembler - builds the flat output Scene from a parsed document
 *
 * Each mesh primitive becomes one output mesh with interleaved vertices.
 * The resulting Scene shares no objects with the document.
 */

import {
  AlphaMode,
  FormatError,
  UnsupportedFeatureError,
  COLOR_OFFSET,
  NORMAL_OFFSET,
  TEXCOORD_OFFSET,
  VERTEX_BYTE_STRIDE,
  VERTEX_STRIDE,
  createLogger,
  createVertexBuffer,
  type Image,
  type Logger,
  type Material,
  type Mesh,
  type Scene,
  type SceneNode,
} from '@meshport/data';
import { MAX_ARRAY_BYTES, oversized, type AccessorReader } from './accessor-reader.js';
import { classifyAttribute } from './attributes.js';
import { composeTrs } from './matrix.js';
import {
  AccessorType,
  GltfAlphaMode,
  type GltfDocument,
  type Image as GltfImage,
  type Material as GltfMaterial,
  type MeshPrimitive,
  type Node,
  type TextureInfo,
} from './types.js';
import { imageDataType, resolveUri } from './uri.js';

const defaultLogger = createLogger('Assembler');

/**
 * Build the output Scene
 * @throws FormatError, UnsupportedFeatureError, IOError
 */
export function assembleScene(document: GltfDocument, reader: AccessorReader, log: Logger = defaultLogger): Scene {
  rejectUnsupported(document);

  const images = document.images?.map((image, i) => assembleImage(image, i));
  const materials = document.materials?.map((material, i) => assembleMaterial(document, material, i));

  const meshes: Mesh[] = [];
  // Output meshes produced by each document mesh
  const meshOutputs: number[][] = [];
  document.meshes?.forEach((mesh, i) => {
    const outputs: number[] = [];
    mesh.primitives.forEach((primitive, p) => {
      outputs.push(meshes.length);
      meshes.push(assemblePrimitive(reader, primitive, i, p, mesh.name, log));
    });
    meshOutputs.push(outputs);
  });

  const nodes = document.nodes?.map((node) => assembleNode(node, meshOutputs));

  const scene: Scene = { meshes };
  if (materials) scene.materials = materials;
  if (images) scene.images = images;
  if (nodes) scene.nodes = nodes;
  if (document.scenes && document.scenes.length > 0) {
    scene.rootNodes = [...(document.scenes[document.scene ?? 0].nodes ?? [])];
  }

  log.info(`Assembled ${meshes.length} meshes`, {
    operation: 'assembleScene',
    data: { materials: materials?.length ?? 0, images: images?.length ?? 0, nodes: nodes?.length ?? 0 },
  });
  return scene;
}

function rejectUnsupported(document: GltfDocument): void {
  if (document.animationCount > 0) {
    throw new UnsupportedFeatureError('animation', `${document.animationCount} animations declared`);
  }
  document.nodes?.forEach((node, i) => {
    if (node.skin !== undefined) {
      throw new UnsupportedFeatureError('skinning', `nodes[${i}] references skins[${node.skin}]`);
    }
    if (node.camera !== undefined) {
      throw new UnsupportedFeatureError('camera', `nodes[${i}] references cameras[${node.camera}]`);
    }
  });
}

// ============================================================================
// Meshes
// ============================================================================

function assemblePrimitive(
  reader: AccessorReader,
  primitive: MeshPrimitive,
  meshIndex: number,
  primitiveIndex: number,
  name: string | undefined,
  log: Logger
): Mesh {
  const where = { entity: 'meshes', index: meshIndex };
  let position: number | undefined;
  let normal: number | undefined;
  let texcoord: number | undefined;

  for (const [attribute, accessor] of primitive.attributes) {
    switch (classifyAttribute(attribute)) {
      case 'position':
        position = accessor;
        break;
      case 'normal':
        normal = accessor;
        break;
      case 'texcoord0':
        texcoord = accessor;
        break;
      default:
        log.warn(`Ignoring attribute ${attribute}`, { ...where, operation: 'assemblePrimitive' });
    }
  }

  if (position === undefined) {
    throw new FormatError(`primitive ${primitiveIndex} has no POSITION attribute`, {
      ...where,
      field: `primitives[${primitiveIndex}].attributes.POSITION`,
    });
  }

  const vertexCount = reader.accessor(position).count;
  for (const [semantic, accessor] of [['NORMAL', normal], ['TEXCOORD_0', texcoord]] as const) {
    if (accessor === undefined) continue;
    const count = reader.accessor(accessor).count;
    if (count !== vertexCount) {
      throw new FormatError(
        `primitive ${primitiveIndex} has ${vertexCount} positions but ${count} ${semantic} values`,
        { ...where, field: `primitives[${primitiveIndex}].attributes.${semantic}` }
      );
    }
  }

  if (vertexCount * VERTEX_BYTE_STRIDE > MAX_ARRAY_BYTES) {
    throw oversized(position, vertexCount, vertexCount * VERTEX_BYTE_STRIDE);
  }

  const positions = reader.readFloats(position, AccessorType.Vec3);
  const normals = normal !== undefined ? reader.readFloats(normal, AccessorType.Vec3) : undefined;
  const texcoords = texcoord !== undefined ? reader.readFloats(texcoord, AccessorType.Vec2) : undefined;

  // Copied as raw words so every float keeps its exact bit pattern (NaN payloads included)
  const vertices = createVertexBuffer(vertexCount);
  const target = words(vertices);
  const positionWords = words(positions);
  const normalWords = normals ? words(normals) : undefined;
  const texcoordWords = texcoords ? words(texcoords) : undefined;
  for (let v = 0; v < vertexCount; v++) {
    const base = v * VERTEX_STRIDE;
    target.set(positionWords.subarray(v * 3, v * 3 + 3), base);
    if (texcoordWords) {
      target.set(texcoordWords.subarray(v * 2, v * 2 + 2), base + TEXCOORD_OFFSET);
    }
    // Opaque white; vertex colors are not imported
    vertices.fill(1, base + COLOR_OFFSET, base + COLOR_OFFSET + 4);
    if (normalWords) {
      target.set(normalWords.subarray(v * 3, v * 3 + 3), base + NORMAL_OFFSET);
    }
    // Tangent stays zero
  }

  const mesh: Mesh = { name, vertices, vertexCount, material: primitive.material, mode: primitive.mode };

  if (primitive.indices !== undefined) {
    const indices = reader.readIndices(primitive.indices);
    for (let i = 0; i < indices.length; i++) {
      if (indices[i] >= vertexCount) {
        throw new FormatError(
          `primitive ${primitiveIndex} index ${indices[i]} at position ${i} is out of range for ${vertexCount} vertices`,
          { ...where, field: `primitives[${primitiveIndex}].indices` }
        );
      }
    }
    mesh.indices = indices;
  }

  return mesh;
}

function words(floats: Float32Array): Uint32Array {
  return new Uint32Array(floats.buffer, floats.byteOffset, floats.length);
}

// ============================================================================
// Materials
// ============================================================================

function assembleMaterial(document: GltfDocument, material: GltfMaterial, index: number): Material {
  const pbr = material.pbrMetallicRoughness;
  const image = (info: TextureInfo | undefined, slot: string): number | undefined => {
    if (info === undefined) return undefined;
    if (info.texCoord !== 0) {
      throw new UnsupportedFeatureError('multiple-uv-sets', `materials[${index}].${slot} uses TEXCOORD_${info.texCoord}`);
    }
    return document.textures?.[info.index]?.source;
  };

  // Metallic (B) and roughness (G) are packed in one texture; both slots point at it
  const metallicRoughness = image(pbr.metallicRoughnessTexture, 'metallicRoughnessTexture');

  return {
    name: material.name,
    albedoColor: [...pbr.baseColorFactor],
    albedoTexture: image(pbr.baseColorTexture, 'baseColorTexture'),
    normalTexture: image(material.normalTexture, 'normalTexture'),
    normalScale: material.normalTexture?.scale ?? 1,
    metallic: pbr.metallicFactor,
    metallicTexture: metallicRoughness,
    roughness: pbr.roughnessFactor,
    roughnessTexture: metallicRoughness,
    occlusionTexture: image(material.occlusionTexture, 'occlusionTexture'),
    occlusionStrength: material.occlusionTexture?.scale ?? 1,
    emissiveColor: [...material.emissiveFactor],
    emissiveTexture: image(material.emissiveTexture, 'emissiveTexture'),
    alphaMode: convertAlphaMode(material.alphaMode),
    alphaCutoff: material.alphaCutoff,
    doubleSided: material.doubleSided,
  };
}

export function convertAlphaMode(mode: GltfAlphaMode): AlphaMode {
  switch (mode) {
    case GltfAlphaMode.Opaque:
      return AlphaMode.Opaque;
    case GltfAlphaMode.Mask:
      return AlphaMode.Cutoff;
    case GltfAlphaMode.Blend:
      return AlphaMode.Blend;
  }
}

// ============================================================================
// Images and nodes
// ============================================================================

function assembleImage(image: GltfImage, index: number): Image {
  if (image.uri === undefined) {
    if (image.bufferView !== undefined) {
      throw new UnsupportedFeatureError('buffer-view-image', `images[${index}] is stored in bufferViews[${image.bufferView}]`);
    }
    throw new FormatError('image has neither "uri" nor "bufferView"', { entity: 'images', index, field: 'uri' });
  }
  const path = resolveUri(image.uri, { entity: 'images', index });
  return { path, dataType: imageDataType(image.mimeType, path) };
}

function assembleNode(node: Node, meshOutputs: number[][]): SceneNode {
  const m = node.matrix;
  return {
    name: node.name,
    meshes: node.mesh !== undefined ? [...meshOutputs[node.mesh]] : [],
    children: node.children ? [...node.children] : [],
    transform: node.hasMatrix
      ? [[...m[0]], [...m[1]], [...m[2]], [...m[3]]]
      : composeTrs(node.translation, node.rotation, node.scale),
  };
}
