/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshport/data - Scene model, vertex layout, errors and logging
 */

export * from './types.js';
export * from './vertex.js';
export { LoadOptions, hasOption, parseLoadOptions, combineOptions } from './load-options.js';
export {
  ImportError,
  IOError,
  FormatError,
  UnsupportedFeatureError,
  isImportError,
} from './errors.js';
export type { ImportErrorKind, FormatErrorLocation } from './errors.js';
export { createLogger, formatContext, isDebugEnabled } from './logger.js';
export type { Logger, LogContext } from './logger.js';
