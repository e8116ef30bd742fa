/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Accessor decoding
 *
 * Resolves accessor → bufferView → buffer and copies the referenced
 * elements into owned typed arrays. All multi-byte reads are explicit
 * little-endian DataView reads with the window bounds checked first; the
 * only bulk copies are 4-byte types on little-endian hosts.
 */

import { FormatError, UnsupportedFeatureError } from '@meshport/data';
import { componentCount, elementSize } from './codes.js';
import type { BufferSource } from './buffer-resolver.js';
import { AccessorType, ComponentType, type Accessor } from './types.js';
import type { GltfDocument } from './types.js';

const IS_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

/** Largest array the importer allocates for one accessor or vertex buffer */
export const MAX_ARRAY_BYTES = 0x7fffffff;

export function oversized(index: number, count: number, byteLength: number): UnsupportedFeatureError {
  return new UnsupportedFeatureError(
    'oversized-accessor',
    `accessors[${index}].count ${count} needs ${byteLength} bytes, more than ${MAX_ARRAY_BYTES}`
  );
}

export interface AccessorWindow {
  accessor: Accessor;
  /** Exactly `count × elementSize` bytes */
  bytes: Uint8Array;
  view: DataView;
}

export class AccessorReader {
  constructor(
    private readonly document: GltfDocument,
    private readonly buffers: BufferSource
  ) {}

  accessor(index: number): Accessor {
    const accessor = this.document.accessors?.[index];
    if (!accessor) {
      throw new FormatError(`accessor ${index} does not exist`, { entity: 'accessors', index });
    }
    return accessor;
  }

  /**
   * Byte range of a tightly packed accessor
   *
   * start = bufferView.byteOffset + accessor.byteOffset; the elements must
   * fit inside both the buffer view and the buffer.
   */
  window(index: number): AccessorWindow {
    const accessor = this.accessor(index);
    const size = elementSize(accessor.componentType, accessor.type);
    const byteLength = accessor.count * size;
    if (byteLength > MAX_ARRAY_BYTES) {
      throw oversized(index, accessor.count, byteLength);
    }

    // No buffer view: every element is zero
    if (accessor.bufferView === undefined) {
      const bytes = new Uint8Array(byteLength);
      return { accessor, bytes, view: new DataView(bytes.buffer) };
    }

    const bufferView = this.document.bufferViews?.[accessor.bufferView];
    if (!bufferView) {
      throw new FormatError(`bufferView ${accessor.bufferView} does not exist`, {
        entity: 'accessors',
        index,
        field: 'bufferView',
      });
    }

    const stride = bufferView.byteStride ?? 0;
    if (stride !== 0 && stride !== size) {
      throw new UnsupportedFeatureError(
        'interleaved-buffer-view',
        `accessors[${index}] uses byteStride ${stride}, element size is ${size}`
      );
    }

    const start = bufferView.byteOffset + accessor.byteOffset;
    const end = start + byteLength;
    const viewEnd = bufferView.byteOffset + bufferView.byteLength;
    if (end > viewEnd) {
      throw new FormatError(
        `${accessor.count} elements at offset ${accessor.byteOffset} overrun bufferViews[${accessor.bufferView}] (${bufferView.byteLength} bytes)`,
        { entity: 'accessors', index, field: 'count' }
      );
    }

    const buffer = this.buffers.getBuffer(bufferView.buffer);
    if (viewEnd > buffer.byteLength) {
      throw new FormatError(
        `bufferViews[${accessor.bufferView}] ends at byte ${viewEnd} past the end of buffers[${bufferView.buffer}] (${buffer.byteLength} bytes)`,
        { entity: 'bufferViews', index: accessor.bufferView, field: 'byteLength' }
      );
    }

    const bytes = buffer.subarray(start, end);
    return { accessor, bytes, view: new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength) };
  }

  /**
   * Decode an index accessor, widening every integer type to u32
   */
  readIndices(index: number): Uint32Array {
    const { accessor, bytes, view } = this.window(index);
    if (accessor.type !== AccessorType.Scalar) {
      throw new FormatError(`index accessor must be SCALAR, got ${accessor.type}`, {
        entity: 'accessors',
        index,
        field: 'type',
      });
    }

    const count = accessor.count;
    const out = new Uint32Array(count);

    switch (accessor.componentType) {
      case ComponentType.UnsignedByte:
        for (let i = 0; i < count; i++) out[i] = bytes[i];
        return out;
      case ComponentType.Byte:
        // Sign-extended, so -1 becomes 0xFFFFFFFF
        for (let i = 0; i < count; i++) out[i] = view.getInt8(i);
        return out;
      case ComponentType.UnsignedShort:
        for (let i = 0; i < count; i++) out[i] = view.getUint16(i * 2, true);
        return out;
      case ComponentType.Short:
        for (let i = 0; i < count; i++) out[i] = view.getInt16(i * 2, true);
        return out;
      case ComponentType.UnsignedInt:
        if (IS_LITTLE_ENDIAN) {
          // slice() copies into a fresh, aligned ArrayBuffer
          return new Uint32Array(bytes.slice().buffer);
        }
        for (let i = 0; i < count; i++) out[i] = view.getUint32(i * 4, true);
        return out;
      case ComponentType.Float:
        throw new UnsupportedFeatureError('float-indices', `accessors[${index}] stores indices as FLOAT`);
    }
  }

  /**
   * Decode a vertex attribute to floats
   *
   * FLOAT is read as-is; normalized integer types are dequantized.
   */
  readFloats(index: number, expectedType: AccessorType): Float32Array {
    const { accessor, bytes, view } = this.window(index);
    if (accessor.type !== expectedType) {
      throw new FormatError(`expected ${expectedType}, got ${accessor.type}`, {
        entity: 'accessors',
        index,
        field: 'type',
      });
    }

    const n = accessor.count * componentCount(accessor.type);
    if (accessor.componentType === ComponentType.Float) {
      if (IS_LITTLE_ENDIAN) {
        return new Float32Array(bytes.slice().buffer);
      }
      // Swapped as words so NaN payloads survive
      const out = new Uint32Array(n);
      for (let i = 0; i < n; i++) out[i] = view.getUint32(i * 4, true);
      return new Float32Array(out.buffer);
    }

    if (!accessor.normalized) {
      throw new UnsupportedFeatureError(
        'integer-attribute',
        `accessors[${index}] stores ${ComponentType[accessor.componentType]} values without normalization`
      );
    }

    const out = new Float32Array(n);
    switch (accessor.componentType) {
      case ComponentType.UnsignedByte:
        for (let i = 0; i < n; i++) out[i] = view.getUint8(i) / 255;
        break;
      case ComponentType.Byte:
        for (let i = 0; i < n; i++) out[i] = Math.max(view.getInt8(i) / 127, -1);
        break;
      case ComponentType.UnsignedShort:
        for (let i = 0; i < n; i++) out[i] = view.getUint16(i * 2, true) / 65535;
        break;
      case ComponentType.Short:
        for (let i = 0; i < n; i++) out[i] = Math.max(view.getInt16(i * 2, true) / 32767, -1);
        break;
      case ComponentType.UnsignedInt:
        throw new FormatError('UNSIGNED_INT cannot be normalized', {
          entity: 'accessors',
          index,
          field: 'normalized',
        });
    }
    return out;
  }
}
