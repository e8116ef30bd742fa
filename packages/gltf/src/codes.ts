/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Closed code tables for every enumerated glTF field
 *
 * Each table maps the raw JSON code to its variant; decodeCode is the only
 * place a raw code becomes an enum value.
 */

import { FormatError, PrimitiveMode, type FormatErrorLocation } from '@meshport/data';
import {
  AccessorType,
  BufferTarget,
  ComponentType,
  GltfAlphaMode,
  TextureFilter,
  WrapMode,
} from './types.js';

export interface CodeTable<T> {
  /** Field name used in error messages */
  readonly field: string;
  readonly entries: ReadonlyMap<number | string, T>;
}

function table<T>(field: string, entries: Array<[number | string, T]>): CodeTable<T> {
  return { field, entries: new Map(entries) };
}

export const COMPONENT_TYPES = table<ComponentType>('componentType', [
  [5120, ComponentType.Byte],
  [5121, ComponentType.UnsignedByte],
  [5122, ComponentType.Short],
  [5123, ComponentType.UnsignedShort],
  [5125, ComponentType.UnsignedInt],
  [5126, ComponentType.Float],
]);

export const ACCESSOR_TYPES = table<AccessorType>('type', [
  ['SCALAR', AccessorType.Scalar],
  ['VEC2', AccessorType.Vec2],
  ['VEC3', AccessorType.Vec3],
  ['VEC4', AccessorType.Vec4],
  ['MAT2', AccessorType.Mat2],
  ['MAT3', AccessorType.Mat3],
  ['MAT4', AccessorType.Mat4],
]);

export const BUFFER_TARGETS = table<BufferTarget>('target', [
  [34962, BufferTarget.ArrayBuffer],
  [34963, BufferTarget.ElementArrayBuffer],
]);

export const PRIMITIVE_MODES = table<PrimitiveMode>('mode', [
  [0, PrimitiveMode.Points],
  [1, PrimitiveMode.Lines],
  [2, PrimitiveMode.LineLoop],
  [3, PrimitiveMode.LineStrip],
  [4, PrimitiveMode.Triangles],
  [5, PrimitiveMode.TriangleStrip],
  [6, PrimitiveMode.TriangleFan],
]);

const FILTERS: Array<[number, TextureFilter]> = [
  [9728, TextureFilter.Nearest],
  [9729, TextureFilter.Linear],
  [9984, TextureFilter.NearestMipmapNearest],
  [9985, TextureFilter.LinearMipmapNearest],
  [9986, TextureFilter.NearestMipmapLinear],
  [9987, TextureFilter.LinearMipmapLinear],
];

// magFilter only takes the two non-mipmap codes
export const MAG_FILTERS = table<TextureFilter>('magFilter', FILTERS.slice(0, 2));
export const MIN_FILTERS = table<TextureFilter>('minFilter', FILTERS);

const WRAP_MODES: Array<[number, WrapMode]> = [
  [33071, WrapMode.ClampToEdge],
  [33648, WrapMode.MirroredRepeat],
  [10497, WrapMode.Repeat],
];

export const WRAP_S = table<WrapMode>('wrapS', WRAP_MODES);
export const WRAP_T = table<WrapMode>('wrapT', WRAP_MODES);

export const ALPHA_MODES = table<GltfAlphaMode>('alphaMode', [
  ['OPAQUE', GltfAlphaMode.Opaque],
  ['MASK', GltfAlphaMode.Mask],
  ['BLEND', GltfAlphaMode.Blend],
]);

/**
 * Look a raw code up in its table
 * @throws FormatError naming the field and the offending code
 */
export function decodeCode<T>(codes: CodeTable<T>, raw: unknown, location: FormatErrorLocation = {}): T {
  if (typeof raw === 'number' || typeof raw === 'string') {
    const value = codes.entries.get(raw);
    if (value !== undefined) {
      return value;
    }
  }
  throw new FormatError(`unrecognized ${codes.field} code ${JSON.stringify(raw)}`, {
    ...location,
    field: codes.field,
  });
}

/** Bytes per component */
export function componentSize(type: ComponentType): number {
  switch (type) {
    case ComponentType.Byte:
    case ComponentType.UnsignedByte:
      return 1;
    case ComponentType.Short:
    case ComponentType.UnsignedShort:
      return 2;
    case ComponentType.UnsignedInt:
    case ComponentType.Float:
      return 4;
  }
}

/** Components per element */
export function componentCount(type: AccessorType): number {
  switch (type) {
    case AccessorType.Scalar:
      return 1;
    case AccessorType.Vec2:
      return 2;
    case AccessorType.Vec3:
      return 3;
    case AccessorType.Vec4:
    case AccessorType.Mat2:
      return 4;
    case AccessorType.Mat3:
      return 9;
    case AccessorType.Mat4:
      return 16;
  }
}

/** Natural size in bytes of one tightly packed element */
export function elementSize(componentType: ComponentType, type: AccessorType): number {
  return componentSize(componentType) * componentCount(type);
}
