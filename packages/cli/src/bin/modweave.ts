#!/usr/bin/env node
/**
 * bin/modweave.ts — Entry point for the `modweave` CLI command.
 *
 *   modweave order --mods ./Mods
 *   modweave load --out ./Patched
 *   MODWEAVE_LOG_LEVEL=debug modweave load
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
