/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Relative URI handling for buffers and images
 */

import { FormatError, ImageDataType, UnsupportedFeatureError, type FormatErrorLocation } from '@meshport/data';

export function isDataUri(uri: string): boolean {
  return /^data:/i.test(uri);
}

/**
 * Turn a relative glTF URI into a file path relative to the document
 * directory, decoding percent escapes such as %20.
 */
export function resolveUri(uri: string, location: FormatErrorLocation = {}): string {
  if (isDataUri(uri)) {
    throw new UnsupportedFeatureError('data-uri', `embedded data in ${describe(location)} is not supported`);
  }
  try {
    return decodeURIComponent(uri);
  } catch (error) {
    throw new FormatError(`malformed percent-encoding in uri "${uri}"`, { ...location, field: 'uri' }, { cause: error });
  }
}

const MIME_TYPES: ReadonlyMap<string, ImageDataType> = new Map([
  ['image/png', ImageDataType.Png],
  ['image/jpeg', ImageDataType.Jpeg],
  ['image/bmp', ImageDataType.Bmp],
]);

const EXTENSIONS: ReadonlyMap<string, ImageDataType> = new Map([
  ['png', ImageDataType.Png],
  ['jpg', ImageDataType.Jpeg],
  ['jpeg', ImageDataType.Jpeg],
  ['bmp', ImageDataType.Bmp],
]);

/**
 * Image format from the declared mime type, falling back to the file extension
 */
export function imageDataType(mimeType: string | undefined, path: string | undefined): ImageDataType {
  if (mimeType !== undefined) {
    const fromMime = MIME_TYPES.get(mimeType.toLowerCase());
    if (fromMime !== undefined) return fromMime;
  }
  if (path !== undefined) {
    const dot = path.lastIndexOf('.');
    if (dot >= 0) {
      const fromExtension = EXTENSIONS.get(path.slice(dot + 1).toLowerCase());
      if (fromExtension !== undefined) return fromExtension;
    }
  }
  return ImageDataType.Unknown;
}

function describe(location: FormatErrorLocation): string {
  if (location.entity === undefined) return 'uri';
  return location.index !== undefined ? `${location.entity}[${location.index}]` : location.entity;
}
