/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * glTF importer - file → Document → Scene → post-processing
 *
 * Everything runs synchronously inside one call. Nothing is cached between
 * calls: each import owns its document and buffers and drops them once the
 * Scene is built.
 */

import { dirname, extname } from 'path';
import {
  FormatError,
  LoadOptions,
  UnsupportedFeatureError,
  createLogger,
  isImportError,
  type Logger,
  type Scene,
} from '@meshport/data';
import { postProcess } from '@meshport/geometry';
import { AccessorReader } from './accessor-reader.js';
import { BufferResolver } from './buffer-resolver.js';
import { parseDocument } from './document-parser.js';
import { nodeFileSource, type FileSource } from './file-source.js';
import { assembleScene } from './scene-assembler.js';
import type { GltfDocument } from './types.js';

const GLB_MAGIC = 0x46546c67; // 'glTF'

export interface ImportConfig {
  /** Where document, buffer and image files are read from (default: local disk) */
  fileSource?: FileSource;
  logger?: Logger;
}

/**
 * A format importer: read a file into the format's own model, then flatten it
 */
export interface Importer<T> {
  fromPath(path: string): T;
  toScene(imported: T, options?: LoadOptions): Scene;
}

export interface LoadedGltf {
  document: GltfDocument;
  /** Directory relative URIs resolve against */
  baseDirectory: string;
}

/**
 * Decode document text into a Document
 * @throws UnsupportedFeatureError for GLB containers, FormatError for bad JSON
 */
export function parseGltf(data: Uint8Array | string): GltfDocument {
  let text: string;
  if (typeof data === 'string') {
    text = data;
  } else {
    if (data.byteLength >= 4 && new DataView(data.buffer, data.byteOffset, 4).getUint32(0, true) === GLB_MAGIC) {
      throw new UnsupportedFeatureError('glb', 'binary glTF containers are not supported');
    }
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(data);
    } catch (error) {
      throw new FormatError('document is not valid UTF-8', {}, { cause: error });
    }
  }

  // Strip a byte order mark
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  let tree: unknown;
  try {
    tree = JSON.parse(text);
  } catch (error) {
    throw new FormatError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {}, { cause: error });
  }
  return parseDocument(tree);
}

export class GltfImporter implements Importer<LoadedGltf> {
  private readonly files: FileSource;
  private readonly log: Logger;

  constructor(config: ImportConfig = {}) {
    this.files = config.fileSource ?? nodeFileSource;
    this.log = config.logger ?? createLogger('Importer');
  }

  fromPath(path: string): LoadedGltf {
    if (extname(path).toLowerCase() === '.glb') {
      throw new UnsupportedFeatureError('glb', `"${path}" is a binary glTF container`);
    }
    const data = this.files.readFile(path);
    const document = parseGltf(data);
    this.log.info(`Parsed ${path}`, {
      operation: 'fromPath',
      data: {
        version: document.asset.version,
        meshes: document.meshes?.length ?? 0,
        accessors: document.accessors?.length ?? 0,
      },
    });
    return { document, baseDirectory: dirname(path) };
  }

  toScene(loaded: LoadedGltf, options: LoadOptions = LoadOptions.None): Scene {
    const buffers = new BufferResolver(loaded.document, loaded.baseDirectory, this.files);
    const scene = assembleScene(loaded.document, new AccessorReader(loaded.document, buffers), this.log);
    return postProcess(scene, options, this.log);
  }

  /**
   * Import a .gltf file and run the requested post-processing
   * @throws ImportError
   */
  import(path: string, options: LoadOptions = LoadOptions.None): Scene {
    try {
      return this.toScene(this.fromPath(path), options);
    } catch (error) {
      if (isImportError(error)) {
        this.log.error(`Import of ${path} failed`, error, { operation: 'import', data: { kind: error.kind } });
      }
      throw error;
    }
  }
}

/**
 * Import a .gltf file with the default importer configuration
 */
export function importScene(path: string, options: LoadOptions = LoadOptions.None, config: ImportConfig = {}): Scene {
  return new GltfImporter(config).import(path, options);
}
