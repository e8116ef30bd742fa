/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Post-processing flags, combined with bitwise OR
 */
export enum LoadOptions {
  None = 0,
  GenerateIndices = 0b01,
  GenerateNormals = 0b10,
}

const ALL_OPTIONS = LoadOptions.GenerateIndices | LoadOptions.GenerateNormals;

export function hasOption(flags: number, option: LoadOptions): boolean {
  return (flags & option) === option && option !== LoadOptions.None;
}

/**
 * Validate a raw bitmask coming from a host or the command line
 */
export function parseLoadOptions(flags: number): LoadOptions {
  if (!Number.isInteger(flags) || flags < 0 || (flags & ~ALL_OPTIONS) !== 0) {
    throw new RangeError(`Unknown load option bits: ${flags}`);
  }
  return flags;
}

export function combineOptions(...options: LoadOptions[]): LoadOptions {
  return options.reduce<number>((acc, option) => acc | option, LoadOptions.None);
}
