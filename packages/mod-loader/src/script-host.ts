/**
 * Modweave Mod Loader — Import Script Host
 *
 * A ScriptHost that loads mod scripts as ES modules with dynamic import().
 *
 * A script module's default export is either a ScriptInstance object or a
 * factory function returning one (sync or async). initializeScript forwards
 * to the instance's own `onInitialize` hook when it has one.
 *
 * Embedding applications with their own scripting runtime supply a
 * different ScriptHost; the loader only depends on the kernel interface.
 */

import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { LoadLogger, errorMessage } from '@modweave/kernel';
import type { ScriptContext, ScriptHost, ScriptInstance } from '@modweave/kernel';

function isOptionalFunction(value: unknown): boolean {
  return value === undefined || typeof value === 'function';
}

export function isScriptInstance(value: unknown): value is ScriptInstance {
  return (
    typeof value === 'object' &&
    value !== null &&
    isOptionalFunction(Reflect.get(value, 'onInitialize')) &&
    isOptionalFunction(Reflect.get(value, 'onUnload'))
  );
}

export class ImportScriptHost implements ScriptHost {
  /**
   * @param modsDir - Root the relative script paths are resolved against
   */
  constructor(
    private readonly modsDir: string,
    private readonly logger: LoadLogger = new LoadLogger(),
  ) {}

  async loadScript(relativePath: string): Promise<ScriptInstance | null> {
    const url = pathToFileURL(join(this.modsDir, relativePath)).href;
    let exported: unknown;
    try {
      const module: unknown = await import(url);
      exported = typeof module === 'object' && module !== null ? Reflect.get(module, 'default') : undefined;
      if (typeof exported === 'function') {
        exported = await Reflect.apply(exported, undefined, []);
      }
    } catch (err: unknown) {
      this.logger.error('script.import_failed', `Cannot import ${relativePath}: ${errorMessage(err)}`, {
        fields: { script: relativePath },
      });
      return null;
    }

    if (!isScriptInstance(exported)) {
      this.logger.warn('script.invalid_export', `${relativePath} does not export a script instance`, {
        fields: { script: relativePath },
      });
      return null;
    }
    return exported;
  }

  async initializeScript(instance: ScriptInstance, context: ScriptContext): Promise<void> {
    await instance.onInitialize?.(context);
  }
}
