/**
 * Modweave Mod Loader — Manifest and Patch File Validator
 *
 * Turns raw JSON text from disk into the kernel's typed records:
 *
 *   parseManifest()  — mod.json text → ModManifest
 *   parsePatchFile() — patch file text → ModPatch
 *
 * Both return ValidationResult values. Every failure here is per-item: the
 * caller skips the one mod or patch file and reports the errors.
 *
 * Manifest field names match case-insensitively and unknown fields are
 * ignored, so `{"ID": "core", "LoadAfter": []}` is accepted.
 */

import {
  MANIFEST_VERSION_PATTERN,
  errorMessage,
  parseDependency,
  parseOperation,
  type ModManifest,
  type ModPatch,
  type PatchOperation,
  type ValidationError,
  type ValidationResult,
} from '@modweave/kernel';

type RawObject = Readonly<Record<string, unknown>>;

function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Lower-cased field lookup. The first spelling of a field wins. */
function fieldsOf(raw: RawObject): Map<string, unknown> {
  const fields = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    const lower = key.toLowerCase();
    if (!fields.has(lower)) fields.set(lower, value);
  }
  return fields;
}

function parseJson(text: string, context: string): ValidationResult<unknown> {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err: unknown) {
    return { ok: false, errors: [{ message: `Invalid JSON: ${errorMessage(err)}`, context }] };
  }
}

/**
 * Typed field readers. A field present with the wrong type records an error
 * and reads as the default.
 */
class FieldReader {
  readonly errors: ValidationError[] = [];

  constructor(
    private readonly fields: Map<string, unknown>,
    private readonly context: string,
  ) {}

  requiredString(name: string): string {
    const value = this.fields.get(name.toLowerCase());
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail(`Field '${name}' is required and must be a non-empty string`);
      return '';
    }
    return value;
  }

  optionalString(name: string): string {
    const value = this.fields.get(name.toLowerCase());
    if (value === undefined || value === null) return '';
    if (typeof value !== 'string') {
      this.fail(`Field '${name}' must be a string`);
      return '';
    }
    return value;
  }

  stringArray(name: string): string[] {
    const value = this.fields.get(name.toLowerCase());
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      this.fail(`Field '${name}' must be an array of strings`);
      return [];
    }
    const strings = value.filter((item): item is string => typeof item === 'string');
    if (strings.length !== value.length) {
      this.fail(`Field '${name}' must be an array of strings`);
      return [];
    }
    return strings;
  }

  integer(name: string, fallback: number): number {
    const value = this.fields.get(name.toLowerCase());
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      this.fail(`Field '${name}' must be an integer`);
      return fallback;
    }
    return value;
  }

  stringRecord(name: string): Record<string, string> {
    const value = this.fields.get(name.toLowerCase());
    const out: Record<string, string> = {};
    if (value === undefined || value === null) return out;
    if (!isRawObject(value)) {
      this.fail(`Field '${name}' must be an object of strings`);
      return out;
    }
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        this.fail(`Field '${name}.${key}' must be a string`);
        continue;
      }
      out[key] = entry;
    }
    return out;
  }

  fail(message: string): void {
    this.errors.push({ message, context: this.context });
  }
}

// ---------------------------------------------------------------------------
// ManifestValidator
// ---------------------------------------------------------------------------

export class ManifestValidator {
  /**
   * Parse and validate mod.json text.
   *
   * @param directory - Absolute mod directory, stamped onto the manifest
   */
  parseManifest(text: string, directory: string): ValidationResult<ModManifest> {
    const parsed = parseJson(text, directory);
    if (!parsed.ok) return parsed;
    return this.validateManifest(parsed.value, directory);
  }

  /**
   * The `id` a manifest text declares, if it has a readable one. Used to
   * track a mod before its manifest has passed validation.
   */
  peekId(text: string): string | undefined {
    const parsed = parseJson(text, '');
    if (!parsed.ok || !isRawObject(parsed.value)) return undefined;
    const id = fieldsOf(parsed.value).get('id');
    return typeof id === 'string' && id.trim() !== '' ? id : undefined;
  }

  /**
   * Validate an already-parsed manifest value.
   *
   * Required: `id`, `name`, and a `version` starting with major.minor.patch.
   * Optional arrays default to `[]`, optional strings to `''`, `priority`
   * to 0 and `contentFolders` to `{}`. Every dependency entry must match
   * the dependency grammar (`<id>` or `<id> <op> <version>`).
   */
  validateManifest(raw: unknown, directory: string): ValidationResult<ModManifest> {
    if (!isRawObject(raw)) {
      return { ok: false, errors: [{ message: 'Manifest must be a JSON object', context: directory }] };
    }

    const reader = new FieldReader(fieldsOf(raw), directory);
    const id = reader.requiredString('id');
    const name = reader.requiredString('name');
    const version = reader.requiredString('version');
    if (version !== '' && !MANIFEST_VERSION_PATTERN.test(version)) {
      reader.fail(`Field 'version' must start with major.minor.patch, got "${version}"`);
    }

    const dependencies = reader.stringArray('dependencies');
    for (const entry of dependencies) {
      if (parseDependency(entry) === undefined) {
        reader.fail(`Invalid dependency entry "${entry}" (expected "<id>" or "<id> <op> <version>")`);
      }
    }

    const manifest: ModManifest = {
      id,
      name,
      author: reader.optionalString('author'),
      version,
      description: reader.optionalString('description'),
      dependencies,
      loadBefore: reader.stringArray('loadBefore'),
      loadAfter: reader.stringArray('loadAfter'),
      priority: reader.integer('priority', 0),
      scripts: reader.stringArray('scripts'),
      permissions: reader.stringArray('permissions'),
      patches: reader.stringArray('patches'),
      contentFolders: reader.stringRecord('contentFolders'),
      directory,
    };

    if (reader.errors.length > 0) {
      return { ok: false, errors: reader.errors };
    }
    return { ok: true, value: manifest };
  }

  /**
   * Parse a patch file: `{ "target": string, "description"?: string, "operations": [...] }`.
   *
   * Any malformed operation rejects the whole file, so a partially
   * understood patch never runs.
   *
   * @param source - Patch file path, used as error context and stored on the patch
   */
  parsePatchFile(text: string, source: string): ValidationResult<ModPatch> {
    const parsed = parseJson(text, source);
    if (!parsed.ok) return parsed;
    if (!isRawObject(parsed.value)) {
      return { ok: false, errors: [{ message: 'Patch file must be a JSON object', context: source }] };
    }

    const fields = fieldsOf(parsed.value);
    const reader = new FieldReader(fields, source);
    const target = reader.requiredString('target');
    const description = reader.optionalString('description');

    const rawOperations = fields.get('operations');
    const operations: PatchOperation[] = [];
    if (!Array.isArray(rawOperations)) {
      reader.fail("Field 'operations' is required and must be an array");
    } else {
      for (const [index, rawOperation] of rawOperations.entries()) {
        const result = parseOperation(rawOperation, `${source} operations[${index}]`);
        if (result.ok) {
          operations.push(result.value);
        } else {
          reader.errors.push(...result.errors);
        }
      }
    }

    if (reader.errors.length > 0) {
      return { ok: false, errors: reader.errors };
    }
    return { ok: true, value: { target, description, operations, source } };
  }
}
