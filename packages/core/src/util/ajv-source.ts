import { createRequire } from 'node:module';
import type { Options as AjvOptions } from 'ajv';
import Ajv from 'ajv';
import type AjvCore from 'ajv/dist/core.js';
import Ajv2019 from 'ajv/dist/2019.js';
import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';

import type { KnownDialect } from '../dialect/detectDialect.js';

const requireForDraft = createRequire(import.meta.url);

/** Dialects an Ajv class ships a meta-schema for */
export type AjvDialect = 'draft-06' | 'draft-07' | '2019-09' | '2020-12';

export interface SourceAjvOptions {
  dialect: AjvDialect;
  validateFormats: boolean;
}

export type AjvLike = AjvCore;

const ajvByKey = new Map<string, AjvLike>();

/**
 * Draft-04 has no Ajv class of its own here; draft-07 is the closest
 * vocabulary Ajv understands natively.
 */
export function toAjvDialect(dialect: KnownDialect): AjvDialect {
  return dialect === 'draft-04' ? 'draft-07' : dialect;
}

/**
 * Shared Ajv instance for a dialect and flag set. Instances are reused
 * across calls; compiled validators are cached separately per schema object.
 */
export function getSourceAjv(options: SourceAjvOptions): AjvLike {
  const key = `${options.dialect}|formats=${options.validateFormats}`;
  const hit = ajvByKey.get(key);
  if (hit) return hit;
  const ajv = createSourceAjv(options);
  ajvByKey.set(key, ajv);
  return ajv;
}

/**
 * Create an AJV instance for validating config instances against their
 * source schema.
 */
export function createSourceAjv(options: SourceAjvOptions): AjvLike {
  const baseFlags: AjvOptions = {
    strictSchema: false,
    strictTypes: false,
    allowUnionTypes: true,
    unicodeRegExp: true,
    // Defaults are injected by the engine, never by Ajv
    useDefaults: false,
    removeAdditional: false,
    coerceTypes: false,
    allErrors: true,
    validateFormats: options.validateFormats,
  };

  const ajv = createAjvByDialect(options.dialect, baseFlags);

  if (options.validateFormats) {
    addFormats(ajv);
  }
  return ajv;
}

function createAjvByDialect(dialect: AjvDialect, flags: AjvOptions): AjvLike {
  switch (dialect) {
    case 'draft-06': {
      const ajv = new Ajv({
        ...flags,
        // Disable default draft-07 meta and set draft-06 as default meta
        meta: false,
        defaultMeta: 'http://json-schema.org/draft-06/schema#',
      });
      ajv.addMetaSchema(
        requireForDraft('ajv/dist/refs/json-schema-draft-06.json')
      );
      return ajv;
    }
    case 'draft-07':
      return new Ajv(flags);
    case '2019-09':
      return new Ajv2019(flags);
    case '2020-12':
      return new Ajv2020(flags);
  }
}

/**
 * Root `$schema` is dropped before handing a schema to Ajv: the dialect is
 * already carried by the Ajv class, and Ajv only knows the exact URIs it
 * registered (no https or trailing-slash variants).
 */
export function prepareSchemaForAjv(schema: object): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...schema };
  delete copy.$schema;
  return copy;
}
