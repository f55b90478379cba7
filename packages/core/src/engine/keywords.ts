import { ErrorCode } from '../errors/codes.js';
import {
  isMapping,
  isSequence,
  mappingGet,
  mappingHas,
  mappingKeys,
  sequenceItems,
  type Mapping,
} from '../schema/type-compat.js';
import { SchemaError, createValidationFailure } from '../types/errors.js';
import type { ValidationFailure } from '../types/errors.js';
import {
  isSchemaNode,
  unescapePointerToken,
  type Schema,
  type SchemaNode,
} from '../types/schema.js';
import {
  childLocation,
  descend,
  type KeywordHandler,
  type KeywordTable,
  type Location,
  type WalkContext,
} from './context.js';

/** `$ref` hops allowed on one branch before the schema is deemed to loop */
export const MAX_REF_DEPTH = 64;

function isSchema(value: unknown): value is Schema {
  return typeof value === 'boolean' || isSchemaNode(value);
}

/** Declared property schemas, ignoring entries that are not schemas */
export function propertySchemas(value: unknown): Array<[string, Schema]> {
  if (!isSchemaNode(value)) return [];
  const out: Array<[string, Schema]> = [];
  for (const [name, sub] of Object.entries(value)) {
    if (isSchema(sub)) out.push([name, sub]);
  }
  return out;
}

/**
 * Keys of `instance` not covered by `properties` or `patternProperties`.
 */
export function extraKeys(
  instance: Mapping,
  schema: SchemaNode,
  location: Location
): string[] {
  const named = isSchemaNode(schema.properties)
    ? new Set(Object.keys(schema.properties))
    : new Set<string>();
  const patterns = isSchemaNode(schema.patternProperties)
    ? Object.keys(schema.patternProperties).map((source) =>
        compilePattern(source, location)
      )
    : [];

  return mappingKeys(instance).filter(
    (key) => !named.has(key) && !patterns.some((pattern) => pattern.test(key))
  );
}

function compilePattern(source: string, location: Location): RegExp {
  try {
    return new RegExp(source, 'u');
  } catch (err) {
    throw new SchemaError({
      message: `Invalid patternProperties regex ${JSON.stringify(source)}`,
      context: { schemaPath: `${location.schemaPath}/patternProperties` },
      cause: err instanceof Error ? err : undefined,
    });
  }
}

/**
 * Resolve a document-local JSON pointer reference (`#`, `#/a/b`).
 * Other reference forms are not followed and yield undefined.
 */
export function resolveLocalRef(
  root: Schema,
  ref: string,
  location: Location
): Schema | undefined {
  if (ref !== '#' && !ref.startsWith('#/')) return undefined;

  let node: unknown = root;
  const tokens = ref === '#' ? [] : ref.slice(2).split('/');
  for (const raw of tokens) {
    const token = unescapePointerToken(decodeURIComponent(raw));
    if (Array.isArray(node)) {
      node = /^\d+$/.test(token) ? node[Number(token)] : undefined;
    } else if (isSchemaNode(node) && Object.prototype.hasOwnProperty.call(node, token)) {
      node = node[token];
    } else {
      node = undefined;
    }
    if (node === undefined) break;
  }

  if (!isSchema(node)) {
    throw new SchemaError({
      message: `Unresolved $ref "${ref}"`,
      errorCode: ErrorCode.UNRESOLVED_REFERENCE,
      context: { schemaPath: `${location.schemaPath}/$ref`, ref },
    });
  }
  return node;
}

const properties: KeywordHandler = (ctx, value, instance, _schema, location) => {
  if (!isMapping(instance)) return [];

  const failures: ValidationFailure[] = [];
  for (const [name, sub] of propertySchemas(value)) {
    if (!mappingHas(instance, name)) continue;
    failures.push(
      ...descend(
        ctx,
        mappingGet(instance, name),
        sub,
        childLocation(location, name, 'properties', name)
      )
    );
  }
  return failures;
};

const additionalProperties: KeywordHandler = (
  ctx,
  value,
  instance,
  schema,
  location
) => {
  if (!isMapping(instance) || !isSchemaNode(value)) return [];

  const failures: ValidationFailure[] = [];
  for (const key of extraKeys(instance, schema, location)) {
    failures.push(
      ...descend(
        ctx,
        mappingGet(instance, key),
        value,
        childLocation(location, key, 'additionalProperties')
      )
    );
  }
  return failures;
};

const items: KeywordHandler = (ctx, value, instance, _schema, location) => {
  if (!isSequence(instance)) return [];

  const elements = sequenceItems(instance);
  const failures: ValidationFailure[] = [];
  elements.forEach((element, index) => {
    // Tuple form (draft-07 and earlier)
    const sub = Array.isArray(value) ? value[index] : value;
    if (!isSchema(sub)) return;
    const loc = Array.isArray(value)
      ? childLocation(location, index, 'items', index)
      : childLocation(location, index, 'items');
    failures.push(...descend(ctx, element, sub, loc));
  });
  return failures;
};

const allOf: KeywordHandler = (ctx, value, instance, _schema, location) => {
  if (!Array.isArray(value)) return [];

  const failures: ValidationFailure[] = [];
  value.forEach((sub, index) => {
    if (!isSchema(sub)) return;
    failures.push(
      ...descend(ctx, instance, sub, childLocation(location, undefined, 'allOf', index))
    );
  });
  return failures;
};

const ref: KeywordHandler = (ctx, value, instance, _schema, location) => {
  if (typeof value !== 'string') return [];

  const target = resolveLocalRef(ctx.rootSchema, value, location);
  if (target === undefined) return [];

  if (ctx.refDepth >= MAX_REF_DEPTH) {
    throw new SchemaError({
      message: `$ref "${value}" nests deeper than ${MAX_REF_DEPTH} levels; the schema appears to recurse without end`,
      errorCode: ErrorCode.UNRESOLVED_REFERENCE,
      context: { schemaPath: `${location.schemaPath}/$ref`, ref: value },
    });
  }

  return descend(
    { ...ctx, refDepth: ctx.refDepth + 1 },
    instance,
    target,
    { instancePath: location.instancePath, schemaPath: value }
  );
};

const required: KeywordHandler = (_ctx, value, instance, _schema, location) => {
  if (!isMapping(instance) || !Array.isArray(value)) return [];

  return value
    .filter((name): name is string => typeof name === 'string')
    .filter((name) => !mappingHas(instance, name))
    .map((name) =>
      createValidationFailure(
        location.instancePath,
        `missing required property "${name}"`,
        'required',
        `${location.schemaPath}/required`,
        { missingProperty: name }
      )
    );
};

/**
 * Plain validating walk. Order matters: `required` is checked last, after
 * every keyword that may fill values in.
 */
export const BASE_KEYWORDS = {
  properties,
  additionalProperties,
  items,
  allOf,
  $ref: ref,
  required,
} as const satisfies KeywordTable;
