import { readFile, writeFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { emitDefaults } from './engine/emit.js';
import { validate } from './engine/inject.js';
import { parseConfigText } from './io/parse.js';
import type { ProvenanceTracker } from './provenance/tracker.js';
import { serializeJson } from './io/json.js';
import { serializeYaml } from './io/yaml.js';
import { ConfigError } from './types/errors.js';
import {
  DUMP_FORMATS,
  resolveOptions,
  type DumpFormat,
  type EngineOptions,
} from './types/options.js';
import { toBase } from './util/base-types.js';

// Node API facades over the engine. Anything touching the filesystem lives
// here; the engine itself never does I/O.

/** A file path, a file URL, or config text held in memory */
export type ConfigSource = string | URL | { text: string; source?: string };

export interface LoadConfigOptions extends Pick<EngineOptions, 'validateFormats'> {
  /** Receives a record of every mapping filled in from a schema default */
  provenance?: ProvenanceTracker;
}

export interface DumpOptions {
  /** Indent step; JSON defaults to 4, YAML to 2 */
  indent?: number;
}

export type DumpDefaultOptions = DumpOptions &
  Pick<EngineOptions, 'validateFormats'>;

/**
 * Load a config, fill in every missing setting from the schema's defaults and
 * validate the result.
 *
 * A setting that is missing and has no default in the schema is reported in
 * the thrown ValidationError. An empty document loads as `{}`. Pass a
 * `provenance` tracker to tell synthesized mappings from user-supplied ones.
 */
export async function loadConfig(
  source: ConfigSource,
  schema: unknown,
  options: LoadConfigOptions = {}
): Promise<unknown> {
  const { text, origin } = await readSource(source);
  const parsed = parseConfigText(text, origin);
  const config = parsed === null || parsed === undefined ? {} : parsed;

  return validate(config, schema, {
    validateFormats: options.validateFormats,
    injectDefaults: true,
    provenance: options.provenance,
  }).instance;
}

/**
 * Serialize a config tree. `yaml` writes plain block YAML; `yaml-with-comments`
 * keeps the comments and flow marks carried by the tree's YAML nodes.
 */
export function dumpConfig(
  value: unknown,
  format: DumpFormat,
  options: DumpOptions = {}
): string {
  switch (format) {
    case 'json':
      return serializeJson(value, options.indent ?? 4);
    case 'yaml':
      return serializeYaml(toBase(value), { indent: options.indent ?? 2 });
    case 'yaml-with-comments':
      return serializeYaml(value, { indent: options.indent ?? 2 });
    default:
      throw unknownFormat(format);
  }
}

/**
 * Text of the default config for a schema. Settings without a default hold
 * the `{{NO_DEFAULT}}` placeholder.
 */
export function dumpDefaultConfig(
  schema: unknown,
  format: DumpFormat = 'yaml',
  options: DumpDefaultOptions = {}
): string {
  if (!DUMP_FORMATS.includes(format)) throw unknownFormat(format);

  const { indent, validateFormats } = resolveOptions({
    indent: options.indent ?? (format === 'json' ? 4 : 2),
    validateFormats: options.validateFormats,
  });
  const includeComments = format === 'yaml-with-comments';
  const defaults = emitDefaults(schema, { includeComments, indent, validateFormats });
  return dumpConfig(defaults, format, { indent });
}

export async function writeDefaultConfig(
  schema: unknown,
  path: string | URL,
  format: DumpFormat = 'yaml',
  options: DumpDefaultOptions = {}
): Promise<void> {
  const text = dumpDefaultConfig(schema, format, options);
  try {
    await writeFile(path, text, 'utf8');
  } catch (err) {
    throw new ConfigError({
      message: `Could not write ${displayPath(path)}`,
      context: { setting: 'path' },
      cause: err instanceof Error ? err : undefined,
    });
  }
}

async function readSource(
  source: ConfigSource
): Promise<{ text: string; origin: string }> {
  if (typeof source === 'object' && !(source instanceof URL)) {
    return { text: source.text, origin: source.source ?? 'config text' };
  }

  const origin = displayPath(source);
  try {
    return { text: await readFile(source, 'utf8'), origin };
  } catch (err) {
    throw new ConfigError({
      message: `Could not read config file ${origin}`,
      context: { setting: 'path', file: origin },
      cause: err instanceof Error ? err : undefined,
    });
  }
}

function displayPath(path: string | URL): string {
  if (!(path instanceof URL)) return path;
  return path.protocol === 'file:' ? fileURLToPath(path) : path.href;
}

function unknownFormat(format: unknown): ConfigError {
  return new ConfigError({
    message: `Unknown format ${JSON.stringify(format)}; expected one of ${DUMP_FORMATS.join(', ')}`,
    context: { setting: 'format', value: format },
  });
}
