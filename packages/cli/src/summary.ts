/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Human and JSON summaries of an imported scene
 */

import type { Scene, Vec3 } from '@meshport/data';
import { getSceneStats, type SceneStats } from '@meshport/geometry';

export interface SceneSummary extends SceneStats {
  file: string;
}

export function summarizeScene(file: string, scene: Scene): SceneSummary {
  return { file, ...getSceneStats(scene) };
}

function formatVec3(v: Vec3): string {
  return `(${v.join(', ')})`;
}

export function formatSummary(summary: SceneSummary): string[] {
  const rows: Array<[string, string | number]> = [
    ['meshes', summary.meshCount],
    ['vertices', summary.totalVertices],
    ['indices', summary.totalIndices],
    ['triangles', summary.totalTriangles],
    ['materials', summary.materialCount],
    ['images', summary.imageCount],
    ['nodes', summary.nodeCount],
    ['bounds', summary.bounds ? `${formatVec3(summary.bounds.min)} .. ${formatVec3(summary.bounds.max)}` : 'empty'],
  ];
  return [summary.file, ...rows.map(([label, value]) => `  ${`${label}:`.padEnd(11)}${value}`)];
}
