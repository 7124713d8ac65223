/**
 * Modweave CLI — Command Tests
 *
 *   CMD-I1: order prints the resolved order and exits 1 on a missing dependency
 *   CMD-I2: validate reports invalid manifests with exit 1
 *   CMD-I3: load writes last-load.json and the patched documents
 *   CMD-I4: status reads back the last load
 *   CMD-I5: log filters the event log and reports skipped lines
 *   CMD-I6: patch applies one patch file to one document
 *
 * Every test uses its own temp home and mods directory and passes --home
 * explicitly, so the user's environment is never read or written.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { stripVTControlCharacters } from 'node:util';
import { runLoad } from '../src/commands/load.js';
import { runLog } from '../src/commands/log.js';
import { runOrder } from '../src/commands/order.js';
import { runPatch } from '../src/commands/patch.js';
import { runStatus } from '../src/commands/status.js';
import { runValidate } from '../src/commands/validate.js';
import { isLastLoadRecord } from '../src/last-load.js';
import { BufferPrinter } from '../src/output.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function write(root: string, files: Readonly<Record<string, unknown>>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  }
}

function workspace(): { root: string; options: { home: string; mods: string; content: string; logLevel: string; cwd: string } } {
  const root = realpathSync(mkdtempSync(`${tmpdir()}/modweave-cli-`));
  return {
    root,
    options: {
      home: join(root, 'home'),
      mods: join(root, 'Mods'),
      content: join(root, 'Content'),
      logLevel: 'error',
      cwd: root,
    },
  };
}

function plain(lines: ReadonlyArray<string>): string[] {
  return lines.map((l) => stripVTControlCharacters(l));
}

/** core ships items/sword; buff depends on core and raises its damage. */
function writeSwordMods(root: string): void {
  write(root, {
    'Mods/core/mod.json': { id: 'core', name: 'Core', version: '1.0.0', contentFolders: { items: 'Items' } },
    'Mods/core/Items/sword.json': { damage: 5 },
    'Mods/buff/mod.json': {
      id: 'buff',
      name: 'Buff',
      version: '1.0.0',
      dependencies: ['core >= 1.0.0'],
      patches: ['sword.json'],
    },
    'Mods/buff/sword.json': { target: 'items/sword', operations: [{ op: 'replace', path: '/damage', value: 8 }] },
  });
}

// ---------------------------------------------------------------------------
// order / validate
// ---------------------------------------------------------------------------

describe('modweave order', () => {
  it('CMD-I1: prints dependencies first', async () => {
    const { root, options } = workspace();
    writeSwordMods(root);
    const printer = new BufferPrinter();

    expect(await runOrder({ ...options, json: true }, printer)).toBe(0);

    expect(JSON.parse(printer.stdout.join('\n'))).toEqual([
      { id: 'core', version: '1.0.0', priority: 0, directory: join(root, 'Mods', 'core') },
      { id: 'buff', version: '1.0.0', priority: 0, directory: join(root, 'Mods', 'buff') },
    ]);
  });

  it('CMD-I1b: exits 1 on a missing dependency', async () => {
    const { root, options } = workspace();
    write(root, { 'Mods/lonely/mod.json': { id: 'lonely', name: 'Lonely', version: '1.0.0', dependencies: ['ghost'] } });
    const printer = new BufferPrinter();

    expect(await runOrder(options, printer)).toBe(1);
    expect(plain(printer.stderr).at(-1)).toBe(
      "Resolution failed: Mod 'lonely' depends on 'ghost' which is not installed",
    );
  });
});

describe('modweave validate', () => {
  it('CMD-I2: lists valid and invalid manifests', async () => {
    const { root, options } = workspace();
    write(root, {
      'Mods/good/mod.json': { id: 'good', name: 'Good', version: '2.0.0' },
      'Mods/bad/mod.json': { id: 'bad', name: 'Bad', version: 'latest' },
    });
    const printer = new BufferPrinter();

    expect(await runValidate(options, printer)).toBe(1);
    expect(plain(printer.stdout)).toEqual([
      `✓ good@2.0.0  ${join(root, 'Mods', 'good')}`,
      `✗ ${join(root, 'Mods', 'bad')}`,
      '    Field \'version\' must start with major.minor.patch, got "latest"',
      '1 valid, 1 invalid',
    ]);
  });
});

// ---------------------------------------------------------------------------
// load / status / log
// ---------------------------------------------------------------------------

describe('modweave load', () => {
  it('CMD-I3: records the run and writes patched documents', async () => {
    const { root, options } = workspace();
    writeSwordMods(root);
    write(root, { 'Content/misc/note.json': { text: 'hi' } });
    const printer = new BufferPrinter();

    expect(await runLoad({ ...options, out: 'Out' }, printer)).toBe(0);

    expect(plain(printer.stdout)[0]).toBe('Loaded 2 mod(s)  core, buff');
    expect(readFileSync(join(root, 'Out', 'items', 'sword.json'), 'utf-8')).toBe('{\n  "damage": 8\n}\n');
    expect(readFileSync(join(root, 'Out', 'misc', 'note.json'), 'utf-8')).toBe('{\n  "text": "hi"\n}\n');

    const record: unknown = JSON.parse(readFileSync(join(root, 'home', 'state', 'last-load.json'), 'utf-8'));
    expect(isLastLoadRecord(record)).toBe(true);
    expect(record).toMatchObject({
      mods_dir: join(root, 'Mods'),
      order: ['core', 'buff'],
      loaded: ['core', 'buff'],
      skipped: [],
      rejected: [],
      patches: { applied: 1, failed: 0, target_missing: 0 },
      documents: 2,
    });
  });

  it('CMD-I3b: exits 1 and records nothing when resolution fails', async () => {
    const { root, options } = workspace();
    write(root, { 'Mods/lonely/mod.json': { id: 'lonely', name: 'Lonely', version: '1.0.0', dependencies: ['ghost'] } });
    const printer = new BufferPrinter();

    expect(await runLoad(options, printer)).toBe(1);

    const status = new BufferPrinter();
    runStatus({ home: options.home }, status);
    expect(plain(status.stdout)).toEqual(['No load recorded yet. Run `modweave load` first.']);
  });
});

describe('modweave status', () => {
  it('CMD-I4: summarizes the last load', async () => {
    const { root, options } = workspace();
    writeSwordMods(root);
    await runLoad(options, new BufferPrinter());
    const printer = new BufferPrinter();

    expect(runStatus({ home: options.home }, printer)).toBe(0);

    const lines = plain(printer.stdout);
    expect(lines).toContain(`Mods dir:   ${join(root, 'Mods')}`);
    expect(lines).toContain('Loaded:     core, buff');
    expect(lines).toContain('Patches:    1 applied, 0 failed, 0 target missing');
    expect(lines).toContain('Documents:  1');
  });
});

describe('modweave log', () => {
  it('CMD-I5: filters the events a load wrote', async () => {
    const { root, options } = workspace();
    writeSwordMods(root);
    await runLoad(options, new BufferPrinter());
    const printer = new BufferPrinter();

    expect(runLog({ home: options.home, event: 'mod.loaded', mod: 'buff', json: true }, printer)).toBe(0);

    const events: unknown = JSON.parse(printer.stdout.join('\n'));
    expect(events).toEqual([
      expect.objectContaining({
        level: 'info',
        event: 'mod.loaded',
        mod_id: 'buff',
        message: 'Mod loaded: Buff (buff@1.0.0)',
        fields: { patches: 1, contentFolders: 0, scripts: 0 },
      }),
    ]);
  });

  it('CMD-I5b: reports duplicate and unreadable lines', () => {
    const { root, options } = workspace();
    const line = JSON.stringify({
      event_id: '01HZZZZZZZZZZZZZZZZZZZZZZZ',
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'warn',
      event: 'patch.target_missing',
      mod_id: 'm',
      message: "Patch target 'x' not found",
      fields: {},
    });
    write(root, { 'home/logs/load-events.jsonl': `${line}\n${line}\nnot json\n` });
    const printer = new BufferPrinter();

    expect(runLog({ home: options.home }, printer)).toBe(0);

    expect(plain(printer.stdout)).toEqual([
      `2026-01-01T00:00:00.000Z ${'patch.target_missing'.padEnd(28)} WARN  [m] Patch target 'x' not found`,
    ]);
    expect(plain(printer.stderr)).toEqual(['1 duplicate(s), 1 unreadable line(s) skipped']);
  });

  it('rejects a bad --limit', () => {
    const { options } = workspace();
    const printer = new BufferPrinter();
    expect(runLog({ home: options.home, limit: 'many' }, printer)).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// patch
// ---------------------------------------------------------------------------

describe('modweave patch', () => {
  it('CMD-I6: prints the patched document', async () => {
    const { root } = workspace();
    write(root, {
      'doc.json': { name: 'shield', tags: ['wood'] },
      'p.json': {
        target: 'doc',
        operations: [
          { op: 'add', path: '/tags/0', value: 'iron' },
          { op: 'copy', from: '/name', path: '/label' },
        ],
      },
    });
    const printer = new BufferPrinter();

    expect(await runPatch('doc.json', 'p.json', { cwd: root }, printer)).toBe(0);

    expect(JSON.parse(printer.stdout.join('\n'))).toEqual({ name: 'shield', tags: ['iron', 'wood'], label: 'shield' });
  });

  it('CMD-I6b: writes nothing when an operation fails', async () => {
    const { root } = workspace();
    write(root, {
      'doc.json': { name: 'shield' },
      'p.json': { target: 'doc', operations: [{ op: 'remove', path: '/missing' }] },
    });
    const printer = new BufferPrinter();

    expect(await runPatch('doc.json', 'p.json', { cwd: root, out: 'out.json' }, printer)).toBe(1);

    expect(plain(printer.stderr).at(-1)?.startsWith('Operation 0 failed: ')).toBe(true);
    expect(() => readFileSync(join(root, 'out.json'))).toThrow();
  });

  it('CMD-I6c: reports a malformed patch file', async () => {
    const { root } = workspace();
    write(root, { 'doc.json': {}, 'p.json': { operations: [] } });
    const printer = new BufferPrinter();

    expect(await runPatch('doc.json', 'p.json', { cwd: root }, printer)).toBe(1);
    expect(plain(printer.stderr)).toEqual([
      `${join(root, 'p.json')}: Field 'target' is required and must be a non-empty string`,
    ]);
  });
});
