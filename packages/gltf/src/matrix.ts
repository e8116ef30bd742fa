/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Node transform helpers
 *
 * glTF stores matrices column-major; the output scene is row-major.
 */

import type { Mat4, Vec3, Vec4 } from '@meshport/data';

/**
 * Exact transpose of a 16-element column-major array:
 * row i = (m[i], m[4+i], m[8+i], m[12+i])
 */
export function columnMajorToRowMajor(m: ArrayLike<number>): Mat4 {
  if (m.length !== 16) {
    throw new RangeError(`Expected 16 matrix elements, got ${m.length}`);
  }
  const row = (i: number): Vec4 => [m[i], m[4 + i], m[8 + i], m[12 + i]];
  return [row(0), row(1), row(2), row(3)];
}

/**
 * Row-major T * R * S for a translation, unit quaternion (x, y, z, w) and scale
 */
export function composeTrs(translation: Vec3, rotation: Vec4, scale: Vec3): Mat4 {
  const [x, y, z, w] = rotation;
  const [sx, sy, sz] = scale;
  const [tx, ty, tz] = translation;

  const xx = x * x;
  const yy = y * y;
  const zz = z * z;
  const xy = x * y;
  const xz = x * z;
  const yz = y * z;
  const wx = w * x;
  const wy = w * y;
  const wz = w * z;

  return [
    [(1 - 2 * (yy + zz)) * sx, 2 * (xy - wz) * sy, 2 * (xz + wy) * sz, tx],
    [2 * (xy + wz) * sx, (1 - 2 * (xx + zz)) * sy, 2 * (yz - wx) * sz, ty],
    [2 * (xz - wy) * sx, 2 * (yz + wx) * sy, (1 - 2 * (xx + yy)) * sz, tz],
    [0, 0, 0, 1],
  ];
}
