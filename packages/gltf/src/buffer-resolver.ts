/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Buffer loading
 *
 * Buffers are read on first use from files next to the document. Loaded
 * bytes live only as long as the resolver, i.e. one import.
 */

import { join } from 'path';
import { FormatError, UnsupportedFeatureError, createLogger } from '@meshport/data';
import type { FileSource } from './file-source.js';
import type { GltfDocument } from './types.js';
import { resolveUri } from './uri.js';

const log = createLogger('BufferResolver');

export interface BufferSource {
  /** Bytes of buffer `index`, exactly `byteLength` long */
  getBuffer(index: number): Uint8Array;
}

export class BufferResolver implements BufferSource {
  private readonly loaded = new Map<number, Uint8Array>();

  constructor(
    private readonly document: GltfDocument,
    private readonly baseDirectory: string,
    private readonly files: FileSource
  ) {}

  getBuffer(index: number): Uint8Array {
    const cached = this.loaded.get(index);
    if (cached) return cached;

    const buffer = this.document.buffers?.[index];
    if (!buffer) {
      throw new FormatError(`buffer ${index} does not exist`, { entity: 'buffers', index });
    }
    if (buffer.uri === undefined) {
      throw new UnsupportedFeatureError('glb-buffer', `buffers[${index}] refers to an embedded binary chunk`);
    }

    const path = join(this.baseDirectory, resolveUri(buffer.uri, { entity: 'buffers', index }));
    const data = this.files.readFile(path);
    if (data.byteLength < buffer.byteLength) {
      throw new FormatError(`"${path}" holds ${data.byteLength} bytes but byteLength is ${buffer.byteLength}`, {
        entity: 'buffers',
        index,
        field: 'byteLength',
      });
    }

    log.debug(`Loaded ${path}`, { byteLength: buffer.byteLength }, { operation: 'getBuffer', entity: 'buffers', index });
    const bytes = data.subarray(0, buffer.byteLength);
    this.loaded.set(index, bytes);
    return bytes;
  }
}
