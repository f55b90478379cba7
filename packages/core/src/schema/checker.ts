import type { ErrorObject, ValidateFunction } from 'ajv';

import {
  LATEST_DIALECT,
  detectDialect,
  type KnownDialect,
} from '../dialect/detectDialect.js';
import { ErrorCode } from '../errors/codes.js';
import { SchemaError } from '../types/errors.js';
import { isSchemaNode, type Schema } from '../types/schema.js';
import {
  getSourceAjv,
  prepareSchemaForAjv,
  toAjvDialect,
  type AjvLike,
} from '../util/ajv-source.js';

export interface CheckerOptions {
  validateFormats?: boolean;
}

let unknownDialectWarned = false;

/**
 * Dialect that applies to a schema: the announced or sniffed one, otherwise
 * the latest supported one.
 */
export function resolveDialect(schema: unknown): KnownDialect {
  const detected = detectDialect(schema);
  if (detected !== 'unknown') return detected;

  if (
    isSchemaNode(schema) &&
    typeof schema.$schema === 'string' &&
    !unknownDialectWarned
  ) {
    console.warn(
      `[confsmith] warning: unrecognised $schema "${schema.$schema}"; ` +
        `validating as ${LATEST_DIALECT}`
    );
    unknownDialectWarned = true;
  }
  return LATEST_DIALECT;
}

/**
 * Ajv instance for the dialect of the given schema.
 */
export function validatorFor(
  schema: Schema,
  options: CheckerOptions = {}
): AjvLike {
  return getSourceAjv({
    dialect: toAjvDialect(resolveDialect(schema)),
    validateFormats: options.validateFormats ?? true,
  });
}

/**
 * Verify the schema document is self-consistent per its dialect.
 * Throws SchemaError before any instance is looked at.
 */
export function checkSchema(
  schema: unknown,
  options: CheckerOptions = {}
): asserts schema is Schema {
  if (typeof schema === 'boolean') return;
  if (!isSchemaNode(schema)) {
    throw new SchemaError({
      message: `Schema must be an object or a boolean, got ${describe(schema)}`,
      context: { schemaPath: '#', value: schema },
    });
  }

  const ajv = validatorFor(schema, options);
  const valid = ajv.validateSchema(prepareSchemaForAjv(schema));
  if (valid !== true) {
    throw schemaErrorFrom(ajv.errors ?? []);
  }
}

const compiledBySchema = new WeakMap<AjvLike, WeakMap<object, ValidateFunction>>();

/**
 * Compile (once per schema object and Ajv instance) the validator for a schema.
 */
export function compileSchema(
  schema: Schema,
  options: CheckerOptions = {}
): ValidateFunction {
  const ajv = validatorFor(schema, options);
  if (typeof schema === 'boolean') {
    return ajv.compile(schema);
  }

  let perAjv = compiledBySchema.get(ajv);
  if (!perAjv) {
    perAjv = new WeakMap();
    compiledBySchema.set(ajv, perAjv);
  }
  const hit = perAjv.get(schema);
  if (hit) return hit;

  // Ajv refuses a second schema under an `$id` it already holds
  if (typeof schema.$id === 'string' && ajv.getSchema(schema.$id)) {
    ajv.removeSchema(schema.$id);
  }

  let validateFn: ValidateFunction;
  try {
    validateFn = ajv.compile(prepareSchemaForAjv(schema));
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new SchemaError({
      message: `Schema could not be compiled: ${cause.message}`,
      errorCode: ErrorCode.SCHEMA_COMPILE_FAILED,
      context: { schemaPath: '#' },
      cause,
    });
  }
  perAjv.set(schema, validateFn);
  return validateFn;
}

function schemaErrorFrom(errors: ErrorObject[]): SchemaError {
  const [first] = errors;
  const schemaPath = first ? `#${first.instancePath}` : '#';
  const reason = first?.message ?? 'does not match its meta-schema';
  return new SchemaError({
    message: `Invalid schema at ${schemaPath}: ${reason}`,
    context: {
      schemaPath,
      metaErrors: errors.map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()),
    },
  });
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}
