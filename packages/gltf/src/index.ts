/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshport/gltf - glTF 2.0 document parsing and scene import
 */

export { GltfImporter, importScene, parseGltf } from './importer.js';
export type { ImportConfig, Importer, LoadedGltf } from './importer.js';
export { parseDocument, validateReferences } from './document-parser.js';
export { AccessorReader, MAX_ARRAY_BYTES } from './accessor-reader.js';
export type { AccessorWindow } from './accessor-reader.js';
export { BufferResolver } from './buffer-resolver.js';
export type { BufferSource } from './buffer-resolver.js';
export { assembleScene, convertAlphaMode } from './scene-assembler.js';
export { classifyAttribute } from './attributes.js';
export type { AttributeSemantic } from './attributes.js';
export { nodeFileSource, MemoryFileSource } from './file-source.js';
export type { FileSource } from './file-source.js';
export { columnMajorToRowMajor, composeTrs } from './matrix.js';
export { resolveUri, isDataUri, imageDataType } from './uri.js';
export { decodeCode, componentSize, componentCount, elementSize } from './codes.js';
export type { CodeTable } from './codes.js';
export * from './types.js';
