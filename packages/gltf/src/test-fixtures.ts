/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Builders for small in-memory glTF assets used by the tests
 */

import type { BufferSource } from './buffer-resolver.js';

type TypedArray = Float32Array | Uint32Array | Uint16Array | Int16Array | Uint8Array | Int8Array;

export interface AccessorFields {
  componentType: number;
  type: string;
  count: number;
  normalized?: boolean;
  byteOffset?: number;
}

export type JsonDocument = { [key: string]: unknown };

/**
 * Packs typed arrays into one binary buffer and records views/accessors for them
 */
export class GltfBuilder {
  private readonly parts: Uint8Array[] = [];
  private byteLength = 0;
  readonly bufferViews: JsonDocument[] = [];
  readonly accessors: JsonDocument[] = [];

  /** Append raw bytes as a new buffer view, 4-byte aligned */
  addView(data: TypedArray | number[], extra: JsonDocument = {}): number {
    const bytes = Array.isArray(data) ? new Uint8Array(data) : new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    const padding = (4 - (this.byteLength % 4)) % 4;
    if (padding > 0) {
      this.parts.push(new Uint8Array(padding));
      this.byteLength += padding;
    }
    this.bufferViews.push({ buffer: 0, byteOffset: this.byteLength, byteLength: bytes.byteLength, ...extra });
    this.parts.push(bytes);
    this.byteLength += bytes.byteLength;
    return this.bufferViews.length - 1;
  }

  addAccessor(view: number | undefined, fields: AccessorFields): number {
    this.accessors.push(view === undefined ? { ...fields } : { bufferView: view, ...fields });
    return this.accessors.length - 1;
  }

  /** View + accessor in one go */
  add(data: TypedArray | number[], fields: AccessorFields): number {
    return this.addAccessor(this.addView(data), fields);
  }

  bin(): Uint8Array {
    const out = new Uint8Array(this.byteLength);
    let offset = 0;
    for (const part of this.parts) {
      out.set(part, offset);
      offset += part.byteLength;
    }
    return out;
  }

  document(uri: string, extra: JsonDocument = {}): JsonDocument {
    return {
      asset: { version: '2.0' },
      buffers: [{ uri, byteLength: this.byteLength }],
      bufferViews: this.bufferViews,
      accessors: this.accessors,
      ...extra,
    };
  }
}

export const FLOAT = 5126;
export const UNSIGNED_INT = 5125;
export const UNSIGNED_SHORT = 5123;
export const SHORT = 5122;
export const UNSIGNED_BYTE = 5121;
export const BYTE = 5120;

/**
 * Non-planar quad: face (0,1,2) faces +Z, face (0,2,3) faces (1,-1,1)
 */
export const QUAD_POSITIONS = [0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 1];
export const QUAD_UVS = [0, 0, 1, 0, 1, 1, 0, 1];
export const QUAD_INDICES = [0, 1, 2, 0, 2, 3];

export function quadBuilder(options: { normals?: boolean; indices?: boolean } = {}): {
  builder: GltfBuilder;
  attributes: JsonDocument;
  indices?: number;
} {
  const builder = new GltfBuilder();
  const attributes: JsonDocument = {
    POSITION: builder.add(new Float32Array(QUAD_POSITIONS), { componentType: FLOAT, type: 'VEC3', count: 4 }),
    TEXCOORD_0: builder.add(new Float32Array(QUAD_UVS), { componentType: FLOAT, type: 'VEC2', count: 4 }),
  };
  if (options.normals) {
    attributes.NORMAL = builder.add(new Float32Array(12), { componentType: FLOAT, type: 'VEC3', count: 4 });
  }
  const indices =
    options.indices === false
      ? undefined
      : builder.add(new Uint16Array(QUAD_INDICES), { componentType: UNSIGNED_SHORT, type: 'SCALAR', count: 6 });
  return { builder, attributes, indices };
}

/**
 * Buffer source over fixed byte arrays
 */
export class StaticBufferSource implements BufferSource {
  constructor(private readonly buffers: Uint8Array[]) {}

  getBuffer(index: number): Uint8Array {
    const buffer = this.buffers[index];
    if (!buffer) throw new Error(`no buffer ${index}`);
    return buffer;
  }
}
