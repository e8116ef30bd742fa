/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * glTF 2.0 document model
 *
 * Output of parseDocument: every default applied, every enumerated code
 * decoded and every cross-reference checked against its collection.
 */

import type { Mat4, PrimitiveMode, Vec3, Vec4 } from '@meshport/data';

export enum ComponentType {
  Byte = 5120,
  UnsignedByte = 5121,
  Short = 5122,
  UnsignedShort = 5123,
  UnsignedInt = 5125,
  Float = 5126,
}

export enum AccessorType {
  Scalar = 'SCALAR',
  Vec2 = 'VEC2',
  Vec3 = 'VEC3',
  Vec4 = 'VEC4',
  Mat2 = 'MAT2',
  Mat3 = 'MAT3',
  Mat4 = 'MAT4',
}

export enum BufferTarget {
  ArrayBuffer = 34962,
  ElementArrayBuffer = 34963,
}

export enum TextureFilter {
  Nearest = 9728,
  Linear = 9729,
  NearestMipmapNearest = 9984,
  LinearMipmapNearest = 9985,
  NearestMipmapLinear = 9986,
  LinearMipmapLinear = 9987,
}

export enum WrapMode {
  ClampToEdge = 33071,
  MirroredRepeat = 33648,
  Repeat = 10497,
}

export enum GltfAlphaMode {
  Opaque = 'OPAQUE',
  Mask = 'MASK',
  Blend = 'BLEND',
}

export interface Asset {
  readonly version: string;
  readonly copyright?: string;
  readonly generator?: string;
  readonly minVersion?: string;
}

export interface Accessor {
  readonly bufferView?: number;
  readonly byteOffset: number;
  readonly componentType: ComponentType;
  readonly type: AccessorType;
  readonly count: number;
  readonly normalized: boolean;
  /** Informational only */
  readonly min?: readonly number[];
  readonly max?: readonly number[];
  readonly name?: string;
}

export interface BufferView {
  readonly buffer: number;
  readonly byteOffset: number;
  readonly byteLength: number;
  readonly byteStride?: number;
  readonly target?: BufferTarget;
  readonly name?: string;
}

export interface Buffer {
  /** Absent for the GLB binary chunk */
  readonly uri?: string;
  readonly byteLength: number;
  readonly name?: string;
}

export interface Image {
  readonly uri?: string;
  readonly mimeType?: string;
  readonly bufferView?: number;
  readonly name?: string;
}

export interface Sampler {
  readonly magFilter?: TextureFilter;
  readonly minFilter?: TextureFilter;
  readonly wrapS: WrapMode;
  readonly wrapT: WrapMode;
  readonly name?: string;
}

export interface Texture {
  readonly sampler?: number;
  readonly source?: number;
  readonly name?: string;
}

export interface TextureInfo {
  readonly index: number;
  readonly texCoord: number;
  /** `scale` for normal maps, `strength` for occlusion maps */
  readonly scale?: number;
}

export interface PbrMetallicRoughness {
  readonly baseColorFactor: Vec4;
  readonly baseColorTexture?: TextureInfo;
  readonly metallicFactor: number;
  readonly roughnessFactor: number;
  readonly metallicRoughnessTexture?: TextureInfo;
}

export interface Material {
  readonly name?: string;
  readonly pbrMetallicRoughness: PbrMetallicRoughness;
  readonly normalTexture?: TextureInfo;
  readonly occlusionTexture?: TextureInfo;
  readonly emissiveTexture?: TextureInfo;
  readonly emissiveFactor: Vec3;
  readonly alphaMode: GltfAlphaMode;
  readonly alphaCutoff: number;
  readonly doubleSided: boolean;
}

export interface MeshPrimitive {
  /** Attribute semantic → accessor index, in document order */
  readonly attributes: ReadonlyMap<string, number>;
  readonly indices?: number;
  readonly material?: number;
  readonly mode: PrimitiveMode;
}

export interface Mesh {
  readonly name?: string;
  readonly primitives: readonly MeshPrimitive[];
}

export interface Node {
  readonly name?: string;
  readonly camera?: number;
  readonly mesh?: number;
  readonly skin?: number;
  readonly children?: readonly number[];
  /** True when the source used `matrix` rather than TRS */
  readonly hasMatrix: boolean;
  /** Row-major; converted from the column-major source at decode */
  readonly matrix: Mat4;
  readonly translation: Vec3;
  readonly rotation: Vec4;
  readonly scale: Vec3;
}

export interface GltfScene {
  readonly name?: string;
  readonly nodes?: readonly number[];
}

export interface GltfDocument {
  readonly asset: Asset;
  readonly accessors?: readonly Accessor[];
  readonly buffers?: readonly Buffer[];
  readonly bufferViews?: readonly BufferView[];
  readonly images?: readonly Image[];
  readonly materials?: readonly Material[];
  readonly meshes?: readonly Mesh[];
  readonly nodes?: readonly Node[];
  readonly samplers?: readonly Sampler[];
  readonly scenes?: readonly GltfScene[];
  readonly textures?: readonly Texture[];
  readonly scene?: number;
  /** Collections this importer rejects when referenced */
  readonly animationCount: number;
  readonly cameraCount: number;
  readonly skinCount: number;
  readonly extensionsUsed?: readonly string[];
  readonly extensionsRequired?: readonly string[];
  /** Embedded binary chunk; only a GLB container carries one */
  readonly bin?: Uint8Array;
}
