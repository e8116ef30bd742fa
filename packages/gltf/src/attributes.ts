/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Vertex attribute semantics understood by the assembler
 */

import { UnsupportedFeatureError } from '@meshport/data';

export type AttributeSemantic = 'position' | 'normal' | 'texcoord0';

const SEMANTICS: ReadonlyMap<string, AttributeSemantic> = new Map([
  ['position', 'position'],
  ['normal', 'normal'],
  ['texcoord_0', 'texcoord0'],
]);

/**
 * Classify an attribute name, case-insensitively
 *
 * Returns undefined for names that are skipped (custom `_FOO` attributes,
 * COLOR_n, TANGENT). Extra UV sets and skinning attributes throw.
 */
export function classifyAttribute(name: string): AttributeSemantic | undefined {
  const lower = name.toLowerCase();
  const semantic = SEMANTICS.get(lower);
  if (semantic) return semantic;

  if (/^texcoord_\d+$/.test(lower)) {
    throw new UnsupportedFeatureError('multiple-uv-sets', `attribute ${name}`);
  }
  if (/^(joints|weights)_\d+$/.test(lower)) {
    throw new UnsupportedFeatureError('skinning', `attribute ${name}`);
  }
  return undefined;
}
