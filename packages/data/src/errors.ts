/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Import error kinds
 *
 * Every fallible step of an import throws one of these. Hosts switch on
 * `kind` (or use the guards below) to tell a missing file, a corrupt file
 * and a valid file using a feature this importer does not handle apart.
 */

export type ImportErrorKind = 'io' | 'format' | 'unsupported';

export abstract class ImportError extends Error {
  abstract readonly kind: ImportErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** File missing or unreadable */
export class IOError extends ImportError {
  readonly kind = 'io' as const;

  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Cannot read "${path}": ${describeCause(cause)}`, { cause });
  }

  /** OS error code such as ENOENT, when the cause carries one */
  get code(): string | undefined {
    const cause = this.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
      return cause.code;
    }
    return undefined;
  }
}

export interface FormatErrorLocation {
  /** glTF collection name, e.g. 'accessors' */
  entity?: string;
  /** Position inside the collection */
  index?: number;
  /** JSON property name, e.g. 'componentType' */
  field?: string;
}

/** Malformed JSON, missing field, bad reference or unknown code */
export class FormatError extends ImportError {
  readonly kind = 'format' as const;
  readonly entity?: string;
  readonly index?: number;
  readonly field?: string;

  constructor(message: string, location: FormatErrorLocation = {}, options?: { cause?: unknown }) {
    super(withLocation(message, location), options);
    this.entity = location.entity;
    this.index = location.index;
    this.field = location.field;
  }
}

/** Valid input that relies on something this importer does not implement */
export class UnsupportedFeatureError extends ImportError {
  readonly kind = 'unsupported' as const;

  constructor(
    public readonly feature: string,
    detail?: string
  ) {
    super(detail ? `Unsupported feature "${feature}": ${detail}` : `Unsupported feature "${feature}"`);
  }
}

export function isImportError(error: unknown): error is ImportError {
  return error instanceof ImportError;
}

function withLocation(message: string, location: FormatErrorLocation): string {
  if (location.entity === undefined) {
    return message;
  }
  const where = location.index !== undefined ? `${location.entity}[${location.index}]` : location.entity;
  return `${where}: ${message}`;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
