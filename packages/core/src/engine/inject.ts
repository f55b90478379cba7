import type { ErrorObject } from 'ajv';
import { isMap } from 'yaml';

import { ProvenanceTracker } from '../provenance/tracker.js';
import { checkSchema, compileSchema } from '../schema/checker.js';
import {
  isMapping,
  isSequence,
  mappingGet,
  mappingHas,
  mappingSet,
  sequenceItems,
  sequenceSet,
} from '../schema/type-compat.js';
import {
  ShapeError,
  ValidationError,
  createValidationFailure,
  type ValidationFailure,
} from '../types/errors.js';
import { resolveOptions, type EngineOptions } from '../types/options.js';
import { hasDefault, isObjectTyped, isSchemaNode } from '../types/schema.js';
import { validationView } from '../util/base-types.js';
import {
  ROOT_LOCATION,
  childLocation,
  descend,
  type KeywordHandler,
  type KeywordTable,
  type WalkContext,
} from './context.js';
import { NO_DEFAULT, mergeItemDefault, synthesize } from './defaults.js';
import { BASE_KEYWORDS, extraKeys, propertySchemas } from './keywords.js';

/**
 * Fill every declared property that is missing and has a `default`, then
 * descend as usual. The emitter also fills the rest with the placeholder.
 */
export function withPropertyDefaults(base: KeywordHandler): KeywordHandler {
  return (ctx, value, instance, schema, location) => {
    if (!isMapping(instance)) return base(ctx, value, instance, schema, location);

    for (const [name, sub] of propertySchemas(value)) {
      if (!isSchemaNode(sub)) continue;
      if (!mappingHas(instance, name)) {
        if (hasDefault(sub)) {
          mappingSet(instance, name, synthesize(ctx, sub, instance));
        } else if (ctx.mode === 'emit') {
          mappingSet(instance, name, NO_DEFAULT);
        }
      }
      if (
        ctx.annotator &&
        isMap(instance) &&
        typeof sub.description === 'string' &&
        mappingHas(instance, name)
      ) {
        ctx.annotator.attachComment(instance, name, sub.description);
      }
    }

    return base(ctx, value, instance, schema, location);
  };
}

/**
 * Treat every extra key of a mapping as a property declared with the
 * `additionalProperties` schema, so its own defaults get filled in.
 * Only object-typed schemas take part; anything else is checked as usual.
 */
export function withAdditionalPropertyDefaults(base: KeywordHandler): KeywordHandler {
  return (ctx, value, instance, schema, location) => {
    if (!isMapping(instance) || !isSchemaNode(value) || !isObjectTyped(value)) {
      return base(ctx, value, instance, schema, location);
    }

    const failures: ValidationFailure[] = [];
    for (const key of extraKeys(instance, schema, location)) {
      const loc = childLocation(location, key, 'additionalProperties');
      const entry = mappingGet(instance, key);
      if (!isMapping(entry)) {
        throw new ShapeError({
          message: `Expected a mapping at ${loc.instancePath}, got ${describeValue(entry)}`,
          context: { path: loc.instancePath, schemaPath: loc.schemaPath, value: entry },
        });
      }
      failures.push(...descend(ctx, entry, value, loc));
    }
    return failures;
  };
}

/**
 * With an object `default` on `items`, complete each mapping element from it:
 * empty elements become a copy of the default, others are overlaid onto one.
 */
export function withItemDefaults(base: KeywordHandler): KeywordHandler {
  return (ctx, value, instance, schema, location) => {
    if (
      isSequence(instance) &&
      isSchemaNode(value) &&
      hasDefault(value) &&
      isMapping(value.default)
    ) {
      sequenceItems(instance).forEach((element, index) => {
        if (!isMapping(element)) return;
        const merged = mergeItemDefault(ctx, value, element, instance);
        if (merged !== undefined) sequenceSet(instance, index, merged);
      });
    }
    return base(ctx, value, instance, schema, location);
  };
}

/**
 * A required property is only an error when it is absent and its schema
 * offers no default to fall back on.
 */
export const requiredUnlessDefaulted: KeywordHandler = (
  _ctx,
  value,
  instance,
  schema,
  location
) => {
  if (!isMapping(instance) || !Array.isArray(value)) return [];

  const declared = new Map(propertySchemas(schema.properties));
  const failures: ValidationFailure[] = [];
  for (const name of value) {
    if (typeof name !== 'string' || mappingHas(instance, name)) continue;
    const sub = declared.get(name);
    if (isSchemaNode(sub) && hasDefault(sub)) continue;
    failures.push(
      createValidationFailure(
        location.instancePath,
        `missing required property "${name}" (no default in schema)`,
        'required',
        `${location.schemaPath}/required`,
        { missingProperty: name }
      )
    );
  }
  return failures;
};

export const INJECTING_KEYWORDS = {
  properties: withPropertyDefaults(BASE_KEYWORDS.properties),
  additionalProperties: withAdditionalPropertyDefaults(
    BASE_KEYWORDS.additionalProperties
  ),
  items: withItemDefaults(BASE_KEYWORDS.items),
  allOf: BASE_KEYWORDS.allOf,
  $ref: BASE_KEYWORDS.$ref,
  required: requiredUnlessDefaulted,
} as const satisfies KeywordTable;

export interface ValidateOptions extends Partial<EngineOptions> {
  /** Receives a record of every mapping synthesized from a default */
  provenance?: ProvenanceTracker;
}

export interface ValidateResult<T> {
  /** The same object that was passed in, completed in place */
  instance: T;
  provenance: ProvenanceTracker;
}

/**
 * Validate `instance` against `schema`. With `injectDefaults` the instance is
 * completed from schema defaults first, in place, and the result is validated.
 *
 * @throws SchemaError when the schema is malformed
 * @throws ShapeError when an object-typed `additionalProperties` meets a non-mapping
 * @throws ValidationError carrying every failure found
 */
export function validate<T>(
  instance: T,
  schema: unknown,
  options: ValidateOptions = {}
): ValidateResult<T> {
  const resolved = resolveOptions(options);
  checkSchema(schema, resolved);

  const provenance = options.provenance ?? new ProvenanceTracker();
  const ctx: WalkContext = {
    mode: 'inject',
    rootSchema: schema,
    handlers: resolved.injectDefaults ? INJECTING_KEYWORDS : BASE_KEYWORDS,
    provenance,
    refDepth: 0,
  };

  const walkFailures = descend(ctx, instance, schema, ROOT_LOCATION);
  const validateFn = compileSchema(schema, resolved);
  const valid = validateFn(validationView(instance));
  const ajvFailures = valid ? [] : (validateFn.errors ?? []).map(toFailure);

  const failures = mergeFailures(walkFailures, ajvFailures);
  if (failures.length > 0) {
    throw new ValidationError({ failures });
  }
  return { instance, provenance };
}

function toFailure(error: ErrorObject): ValidationFailure {
  return createValidationFailure(
    error.instancePath,
    error.message ?? `failed "${error.keyword}"`,
    error.keyword,
    error.schemaPath,
    { ...error.params }
  );
}

/**
 * Walk failures first, then Ajv's, minus Ajv `required` reports the walk
 * already made for the same property.
 */
export function mergeFailures(
  walk: ValidationFailure[],
  ajv: ValidationFailure[]
): ValidationFailure[] {
  const reported = new Set(
    walk
      .filter((f) => f.keyword === 'required')
      .map((f) => requiredKey(f.path, f.params?.missingProperty))
  );
  return [
    ...walk,
    ...ajv.filter(
      (f) =>
        f.keyword !== 'required' ||
        !reported.has(requiredKey(f.path, f.params?.missingProperty))
    ),
  ];
}

function requiredKey(path: string, missing: unknown): string {
  return `${path}\u0000${String(missing)}`;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value) || isSequence(value)) return 'a sequence';
  if (typeof value === 'string') return `the string ${JSON.stringify(value)}`;
  return typeof value;
}
