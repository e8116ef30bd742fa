/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Blocking file access used by the importer
 *
 * Imports are synchronous end to end, so reads block. Hosts that keep files
 * somewhere else (archives, asset bundles, tests) supply their own source.
 */

import { readFileSync } from 'fs';
import { normalize } from 'path';
import { IOError } from '@meshport/data';

export interface FileSource {
  /**
   * Read a whole file
   * @throws IOError when the file is missing or unreadable
   */
  readFile(path: string): Uint8Array;
}

/**
 * File source backed by the local file system
 */
export const nodeFileSource: FileSource = {
  readFile(path: string): Uint8Array {
    try {
      const data = readFileSync(path);
      return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    } catch (error) {
      throw new IOError(path, error);
    }
  },
};

/**
 * File source over an in-memory map of path → contents
 */
export class MemoryFileSource implements FileSource {
  private readonly files = new Map<string, Uint8Array>();

  constructor(files: Record<string, Uint8Array | string> = {}) {
    for (const [path, contents] of Object.entries(files)) {
      this.set(path, contents);
    }
  }

  set(path: string, contents: Uint8Array | string): this {
    this.files.set(normalize(path), typeof contents === 'string' ? new TextEncoder().encode(contents) : contents);
    return this;
  }

  readFile(path: string): Uint8Array {
    const data = this.files.get(normalize(path));
    if (data === undefined) {
      const cause = Object.assign(new Error('no such file or directory'), { code: 'ENOENT' });
      throw new IOError(path, cause);
    }
    return data;
  }
}
