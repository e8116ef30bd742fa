/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, formatContext, isDebugEnabled } from './logger.js';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('formatContext', () => {
  it('builds the prefix from component, operation and entity', () => {
    expect(formatContext({ component: 'Parser' })).toBe('[Parser]');
    expect(formatContext({ component: 'Parser', operation: 'readIndices' })).toBe('[Parser] readIndices');
    expect(formatContext({ component: 'Assembler', entity: 'meshes', index: 2 })).toBe('[Assembler] meshes[2]');
    expect(formatContext({ component: 'Assembler', entity: 'asset' })).toBe('[Assembler] asset');
    expect(formatContext({ component: 'Native', index: 4 })).toBe('[Native] #4');
  });
});

describe('createLogger', () => {
  it('always prints warnings', () => {
    vi.stubEnv('MESHPORT_DEBUG', '');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('PostProcess').warn('Skipping normals', { operation: 'generateNormals', entity: 'meshes', index: 1 });
    expect(warn).toHaveBeenCalledWith('[PostProcess] generateNormals meshes[1] Skipping normals');
  });

  it('prints info and debug only with MESHPORT_DEBUG=true', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    vi.stubEnv('MESHPORT_DEBUG', '');
    expect(isDebugEnabled()).toBe(false);
    createLogger('Importer').info('Parsed');
    createLogger('Importer').debug('Detail', { n: 1 });
    expect(log).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv('MESHPORT_DEBUG', 'true');
    expect(isDebugEnabled()).toBe(true);
    createLogger('Importer').info('Parsed', { data: { meshes: 2 } });
    createLogger('Importer').debug('Detail', { n: 1 });
    expect(log).toHaveBeenCalledWith('[Importer] Parsed', { meshes: 2 });
    expect(debug).toHaveBeenCalledWith('[Importer] Detail', { n: 1 });
  });

  it('formats errors with their name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('boom');
    cause.stack = undefined;
    createLogger('Importer').error('Import failed', cause);
    expect(error).toHaveBeenCalledWith('[Importer] Import failed:', 'Error: boom');
  });
});
