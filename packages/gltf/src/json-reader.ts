/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Typed field access over a generic JSON value tree
 *
 * Every read either returns a value of the requested shape or throws a
 * FormatError naming the field and the entity it belongs to.
 */

import { FormatError } from '@meshport/data';
import { decodeCode, type CodeTable } from './codes.js';

export type JsonObject = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class EntityReader {
  private constructor(
    private readonly value: JsonObject,
    readonly entity: string,
    readonly index: number | undefined,
    private readonly path: string
  ) {}

  /**
   * Wrap a raw collection element or top-level member
   */
  static of(raw: unknown, entity: string, index?: number): EntityReader {
    if (!isJsonObject(raw)) {
      throw new FormatError('expected a JSON object', { entity, index });
    }
    return new EntityReader(raw, entity, index, '');
  }

  has(field: string): boolean {
    return this.value[field] !== undefined;
  }

  /** Fully qualified field name used in errors, e.g. "pbrMetallicRoughness.metallicFactor" */
  fieldName(field: string): string {
    return this.path ? `${this.path}.${field}` : field;
  }

  fail(message: string, field?: string): FormatError {
    return new FormatError(message, {
      entity: this.entity,
      index: this.index,
      field: field === undefined ? undefined : this.fieldName(field),
    });
  }

  private missing(field: string): FormatError {
    return this.fail(`missing required field "${this.fieldName(field)}"`, field);
  }

  private wrongType(field: string, expected: string): FormatError {
    return this.fail(`field "${this.fieldName(field)}" must be ${expected}`, field);
  }

  optionalString(field: string): string | undefined {
    const raw = this.value[field];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'string') throw this.wrongType(field, 'a string');
    return raw;
  }

  requiredString(field: string): string {
    const value = this.optionalString(field);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  optionalNumber(field: string): number | undefined {
    const raw = this.value[field];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'number' || !Number.isFinite(raw)) throw this.wrongType(field, 'a number');
    return raw;
  }

  number(field: string, fallback: number): number {
    return this.optionalNumber(field) ?? fallback;
  }

  /** Non-negative integer (counts, offsets, lengths and references) */
  optionalUnsigned(field: string): number | undefined {
    const raw = this.value[field];
    if (raw === undefined) return undefined;
    if (typeof raw !== 'number' || !Number.isSafeInteger(raw) || raw < 0) {
      throw this.wrongType(field, 'a non-negative integer');
    }
    return raw;
  }

  requiredUnsigned(field: string): number {
    const value = this.optionalUnsigned(field);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  unsigned(field: string, fallback: number): number {
    return this.optionalUnsigned(field) ?? fallback;
  }

  boolean(field: string, fallback: boolean): boolean {
    const raw = this.value[field];
    if (raw === undefined) return fallback;
    if (typeof raw !== 'boolean') throw this.wrongType(field, 'a boolean');
    return raw;
  }

  optionalArray(field: string): unknown[] | undefined {
    const raw = this.value[field];
    if (raw === undefined) return undefined;
    if (!Array.isArray(raw)) throw this.wrongType(field, 'an array');
    return raw;
  }

  optionalNumberArray(field: string, length?: number): number[] | undefined {
    const raw = this.optionalArray(field);
    if (raw === undefined) return undefined;
    if (length !== undefined && raw.length !== length) {
      throw this.wrongType(field, `an array of ${length} numbers`);
    }
    const values: number[] = [];
    for (const item of raw) {
      if (typeof item !== 'number' || !Number.isFinite(item)) throw this.wrongType(field, 'an array of numbers');
      values.push(item);
    }
    return values;
  }

  optionalIndexArray(field: string): number[] | undefined {
    const raw = this.optionalArray(field);
    if (raw === undefined) return undefined;
    const values: number[] = [];
    for (const item of raw) {
      if (typeof item !== 'number' || !Number.isSafeInteger(item) || item < 0) {
        throw this.wrongType(field, 'an array of non-negative integers');
      }
      values.push(item);
    }
    return values;
  }

  optionalStringArray(field: string): string[] | undefined {
    const raw = this.optionalArray(field);
    if (raw === undefined) return undefined;
    const values: string[] = [];
    for (const item of raw) {
      if (typeof item !== 'string') throw this.wrongType(field, 'an array of strings');
      values.push(item);
    }
    return values;
  }

  /** Nested object read with the same entity location */
  optionalObject(field: string): EntityReader | undefined {
    const raw = this.value[field];
    if (raw === undefined) return undefined;
    if (!isJsonObject(raw)) throw this.wrongType(field, 'an object');
    return new EntityReader(raw, this.entity, this.index, this.fieldName(field));
  }

  requiredObject(field: string): EntityReader {
    const value = this.optionalObject(field);
    if (value === undefined) throw this.missing(field);
    return value;
  }

  /**
   * Top-level member read as an entity of its own, e.g. "asset"
   */
  requiredMember(field: string): EntityReader {
    const raw = this.value[field];
    if (raw === undefined) throw this.missing(field);
    return EntityReader.of(raw, field);
  }

  /** Own keys of this object, in document order */
  keys(): string[] {
    return Object.keys(this.value);
  }

  optionalCode<T>(codes: CodeTable<T>): T | undefined {
    const raw = this.value[codes.field];
    if (raw === undefined) return undefined;
    return decodeCode(codes, raw, { entity: this.entity, index: this.index });
  }

  requiredCode<T>(codes: CodeTable<T>): T {
    const value = this.optionalCode(codes);
    if (value === undefined) throw this.missing(codes.field);
    return value;
  }

  code<T>(codes: CodeTable<T>, fallback: T): T {
    return this.optionalCode(codes) ?? fallback;
  }
}
