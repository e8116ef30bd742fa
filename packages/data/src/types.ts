/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Output scene model
 *
 * The flat, renderer-agnostic result of an import. A Scene owns all of its
 * arrays outright and holds no reference to the document it came from.
 */

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
export type Vec4 = [number, number, number, number];

/** 4x4 matrix as four rows */
export type Mat4 = [Vec4, Vec4, Vec4, Vec4];

export enum PrimitiveMode {
  Points = 0,
  Lines = 1,
  LineLoop = 2,
  LineStrip = 3,
  Triangles = 4,
  TriangleStrip = 5,
  TriangleFan = 6,
}

export enum AlphaMode {
  Opaque = 0,
  Cutoff = 1,
  Blend = 2,
}

export enum ImageDataType {
  Unknown = 0,
  Png = 1,
  Jpeg = 2,
  Bmp = 3,
}

export interface Mesh {
  name?: string;
  /** Interleaved vertex records, VERTEX_STRIDE floats each */
  vertices: Float32Array;
  vertexCount: number;
  indices?: Uint32Array;
  /** Index into Scene.materials */
  material?: number;
  mode: PrimitiveMode;
}

export interface Material {
  name?: string;
  albedoColor: Vec4;
  albedoTexture?: number;
  normalTexture?: number;
  normalScale: number;
  metallic: number;
  metallicTexture?: number;
  roughness: number;
  roughnessTexture?: number;
  occlusionTexture?: number;
  occlusionStrength: number;
  emissiveColor: Vec3;
  emissiveTexture?: number;
  alphaMode: AlphaMode;
  alphaCutoff: number;
  doubleSided: boolean;
}

export interface Image {
  /** Percent-decoded path relative to the document directory */
  path?: string;
  /** Raw encoded bytes; never filled eagerly by the importer */
  data?: Uint8Array;
  dataType?: ImageDataType;
}

export interface SceneNode {
  name?: string;
  /** Output meshes drawn by this node (one per source primitive) */
  meshes: number[];
  children: number[];
  /** Row-major local transform */
  transform: Mat4;
}

export interface Scene {
  meshes: Mesh[];
  materials?: Material[];
  images?: Image[];
  nodes?: SceneNode[];
  /** Nodes of the default scene */
  rootNodes?: number[];
}

export function identityMatrix(): Mat4 {
  return [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1],
  ];
}
