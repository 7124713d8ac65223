/**
 * Modweave Mod Loader — ImportScriptHost Tests
 *
 *   SH-U1: an object default export is the script instance
 *   SH-U2: a factory default export is called
 *   SH-U3: import failures and non-instance exports yield null and an event
 *   SH-U4: initializeScript forwards to onInitialize
 */

import { describe, it, expect } from 'vitest';
import { LoadLogger, MemoryLogSink } from '@modweave/kernel';
import type { ModManifest, ScriptContext } from '@modweave/kernel';
import { ImportScriptHost, isScriptInstance } from '../src/script-host.js';
import { makeTempDir, writeFiles } from './fixtures.js';

const CONTEXT_MANIFEST: ModManifest = {
  id: 'scripted',
  name: 'Scripted',
  author: '',
  version: '1.0.0',
  description: '',
  dependencies: [],
  loadBefore: [],
  loadAfter: [],
  priority: 0,
  scripts: ['main.mjs'],
  permissions: [],
  patches: [],
  contentFolders: {},
  directory: '/mods/scripted',
};

describe('isScriptInstance', () => {
  it('accepts objects whose hooks are functions or absent', () => {
    expect(isScriptInstance({})).toBe(true);
    expect(isScriptInstance({ onUnload: () => undefined })).toBe(true);
    expect(isScriptInstance({ onInitialize: 'no' })).toBe(false);
    expect(isScriptInstance(null)).toBe(false);
  });
});

describe('ImportScriptHost', () => {
  it('SH-U1: loads an object default export', async () => {
    const modsDir = makeTempDir('scripts');
    writeFiles(modsDir, { 'scripted/main.mjs': 'export default { name: "object-export" };\n' });
    const host = new ImportScriptHost(modsDir);

    const instance = await host.loadScript('scripted/main.mjs');
    expect(instance).toEqual({ name: 'object-export' });
  });

  it('SH-U2: calls a factory default export', async () => {
    const modsDir = makeTempDir('scripts');
    writeFiles(modsDir, {
      'scripted/factory.mjs': 'export default async () => ({ made: true });\n',
    });
    const host = new ImportScriptHost(modsDir);

    expect(await host.loadScript('scripted/factory.mjs')).toEqual({ made: true });
  });

  it('SH-U3: returns null for a missing module', async () => {
    const sink = new MemoryLogSink();
    const host = new ImportScriptHost(makeTempDir('scripts'), new LoadLogger(sink));

    expect(await host.loadScript('nowhere/main.mjs')).toBeNull();
    expect(sink.named('script.import_failed')[0]?.fields).toEqual({ script: 'nowhere/main.mjs' });
  });

  it('SH-U3b: returns null for a module without an instance export', async () => {
    const modsDir = makeTempDir('scripts');
    writeFiles(modsDir, { 'scripted/plain.mjs': 'export const value = 1;\n' });
    const sink = new MemoryLogSink();
    const host = new ImportScriptHost(modsDir, new LoadLogger(sink));

    expect(await host.loadScript('scripted/plain.mjs')).toBeNull();
    expect(sink.named('script.invalid_export')).toHaveLength(1);
  });

  it('SH-U4: forwards the context to onInitialize', async () => {
    const seen: ScriptContext[] = [];
    const host = new ImportScriptHost('/unused');
    const context: ScriptContext = { modId: 'scripted', manifest: CONTEXT_MANIFEST, scriptPath: 'main.mjs' };

    await host.initializeScript({ onInitialize: (ctx) => void seen.push(ctx) }, context);
    await host.initializeScript({}, context);

    expect(seen).toEqual([context]);
  });
});
