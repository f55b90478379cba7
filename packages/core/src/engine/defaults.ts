import { isMap, isScalar, isSeq } from 'yaml';

import { isFlowStyle, markFlow } from '../presentation/flow-style.js';
import {
  defineEntry,
  isMapping,
  isPlainMapping,
  isSequence,
  mappingEntries,
  mappingHas,
  mappingSet,
  type Mapping,
  type PlainMapping,
} from '../schema/type-compat.js';
import { isSchemaNode, type SchemaNode } from '../types/schema.js';
import type { WalkContext } from './context.js';

/** Stands in for a property whose schema has no `default` */
export const NO_DEFAULT = '{{NO_DEFAULT}}';

/**
 * Deep copy of a `default` payload. YAML collections keep their node type
 * (and with it any flow mark); everything else is rebuilt from plain objects,
 * arrays and Maps.
 */
export function cloneDefault(value: unknown): unknown {
  if (isScalar(value)) return value.value;
  if (isMap(value) || isSeq(value)) return value.clone();

  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    for (const [key, item] of value) copy.set(key, cloneDefault(item));
    return copy;
  }
  if (Array.isArray(value)) return value.map(cloneDefault);
  if (isPlainMapping(value)) {
    const copy: PlainMapping = {};
    for (const [key, item] of Object.entries(value)) {
      defineEntry(copy, key, cloneDefault(item));
    }
    return copy;
  }
  return value;
}

function isNumericType(type: unknown): boolean {
  return type === 'integer' || type === 'number';
}

/**
 * Lists of numbers, and lists of lists of numbers (bounding boxes such as
 * `[[0, 0, 0], [1, 2, 3]]`), read better on one line.
 */
export function isNumericArraySchema(schema: SchemaNode): boolean {
  const { items } = schema;
  if (!isSchemaNode(items)) return false;
  if (isNumericType(items.type)) return true;
  return (
    items.type === 'array' &&
    isSchemaNode(items.items) &&
    isNumericType(items.items.type)
  );
}

/**
 * Fresh copy of `schema.default`, ready to be placed under `parent`.
 * Mapping copies are recorded as synthesized.
 */
export function synthesize(
  ctx: WalkContext,
  schema: SchemaNode,
  parent: object
): unknown {
  let value = cloneDefault(schema.default);

  const { annotator } = ctx;
  if (annotator && (isMapping(value) || isSequence(value))) {
    if (isSequence(value) && !isFlowStyle(value) && isNumericArraySchema(schema)) {
      value = markFlow(value);
    }
    value = annotator.adopt(value, parent);
  }

  if (isMapping(value)) ctx.provenance.markFromDefault(value);
  return value;
}

/**
 * Overlay a user-supplied array element onto a copy of the item default.
 * Returns undefined when a non-empty element already carries every default
 * key. Empty elements are always replaced by a copy.
 */
export function mergeItemDefault(
  ctx: WalkContext,
  itemSchema: SchemaNode,
  element: Mapping,
  sequence: object
): unknown {
  const fallback = cloneDefault(itemSchema.default);
  if (!isMapping(fallback)) return undefined;

  const startedEmpty = mappingEntries(element).length === 0;
  const defaults = mappingEntries(fallback);
  if (!startedEmpty && defaults.every(([key]) => mappingHas(element, key))) {
    return undefined;
  }

  for (const [key, item] of mappingEntries(element)) {
    mappingSet(fallback, key, item);
  }

  const merged = ctx.annotator ? ctx.annotator.adopt(fallback, sequence) : fallback;
  if (startedEmpty && isMapping(merged)) ctx.provenance.markFromDefault(merged);
  return merged;
}
