/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Interleaved vertex layout
 * Format: [px,py,pz, u,v, r,g,b,a, nx,ny,nz, tx,ty,tz] per vertex
 */

import type { Vec2, Vec3, Vec4 } from './types.js';

export const POSITION_OFFSET = 0;
export const TEXCOORD_OFFSET = 3;
export const COLOR_OFFSET = 5;
export const NORMAL_OFFSET = 9;
export const TANGENT_OFFSET = 12;

/** Floats per vertex */
export const VERTEX_STRIDE = 15;
export const VERTEX_BYTE_STRIDE = VERTEX_STRIDE * 4;

export interface Vertex {
  position: Vec3;
  texCoord: Vec2;
  color: Vec4;
  normal: Vec3;
  tangent: Vec3;
}

export const WHITE: Readonly<Vec4> = [1, 1, 1, 1];

export function createVertexBuffer(vertexCount: number): Float32Array {
  return new Float32Array(vertexCount * VERTEX_STRIDE);
}

export function readVertex(vertices: Float32Array, index: number): Vertex {
  const b = index * VERTEX_STRIDE;
  return {
    position: [vertices[b], vertices[b + 1], vertices[b + 2]],
    texCoord: [vertices[b + TEXCOORD_OFFSET], vertices[b + TEXCOORD_OFFSET + 1]],
    color: [
      vertices[b + COLOR_OFFSET],
      vertices[b + COLOR_OFFSET + 1],
      vertices[b + COLOR_OFFSET + 2],
      vertices[b + COLOR_OFFSET + 3],
    ],
    normal: [vertices[b + NORMAL_OFFSET], vertices[b + NORMAL_OFFSET + 1], vertices[b + NORMAL_OFFSET + 2]],
    tangent: [vertices[b + TANGENT_OFFSET], vertices[b + TANGENT_OFFSET + 1], vertices[b + TANGENT_OFFSET + 2]],
  };
}

export function writeVertex(vertices: Float32Array, index: number, vertex: Vertex): void {
  const b = index * VERTEX_STRIDE;
  vertices.set(vertex.position, b + POSITION_OFFSET);
  vertices.set(vertex.texCoord, b + TEXCOORD_OFFSET);
  vertices.set(vertex.color, b + COLOR_OFFSET);
  vertices.set(vertex.normal, b + NORMAL_OFFSET);
  vertices.set(vertex.tangent, b + TANGENT_OFFSET);
}

/** Build a vertex buffer from records; mostly useful for tests and host tooling */
export function packVertices(list: Vertex[]): Float32Array {
  const vertices = createVertexBuffer(list.length);
  list.forEach((vertex, i) => writeVertex(vertices, i, vertex));
  return vertices;
}
