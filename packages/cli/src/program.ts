/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * meshport command definition
 */

import { Command } from 'commander';
import { LoadOptions, combineOptions, isImportError } from '@meshport/data';
import { importScene, type ImportConfig } from '@meshport/gltf';
import { formatSummary, summarizeScene } from './summary.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  exit(code: number): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  exit: (code) => {
    process.exitCode = code;
  },
};

interface CliOptions {
  generateIndices: boolean;
  generateNormals: boolean;
  json: boolean;
}

export function describeFailure(error: unknown): string {
  if (isImportError(error)) {
    return `Error (${error.kind}): ${error.message}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export function createProgram(io: CliIO = consoleIO, config: ImportConfig = {}): Command {
  const program = new Command();

  program
    .name('meshport')
    .description('Import a glTF 2.0 scene and print what it contains')
    .version('0.1.0')
    .argument('<file>', 'Path to a .gltf document')
    .option('--generate-indices', 'Weld identical vertices into an index buffer', false)
    .option('--generate-normals', 'Rebuild missing normals from triangle geometry', false)
    .option('--json', 'Print the summary as JSON', false)
    .action((file: string, options: CliOptions) => {
      const flags = combineOptions(
        options.generateIndices ? LoadOptions.GenerateIndices : LoadOptions.None,
        options.generateNormals ? LoadOptions.GenerateNormals : LoadOptions.None
      );
      try {
        const summary = summarizeScene(file, importScene(file, flags, config));
        if (options.json) {
          io.out(JSON.stringify(summary, null, 2));
        } else {
          formatSummary(summary).forEach((line) => io.out(line));
        }
      } catch (error) {
        io.err(describeFailure(error));
        io.exit(1);
      }
    });

  return program;
}
