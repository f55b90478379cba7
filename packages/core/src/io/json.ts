import { types } from 'node:util';

import {
  isMapping,
  isPlainMapping,
  isSequence,
  mappingEntries,
  sequenceItems,
  defineEntry,
  type PlainMapping,
} from '../schema/type-compat.js';

/**
 * JSON.stringify replacer for values the built-in encoder cannot handle:
 * non-plain mappings and sequences, typed arrays and bigints.
 */
export function extendedReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (types.isTypedArray(value)) {
    return [...value];
  }
  if (isSequence(value) && !Array.isArray(value)) {
    return sequenceItems(value);
  }
  if (isMapping(value) && !isPlainMapping(value)) {
    const out: PlainMapping = {};
    for (const [key, item] of mappingEntries(value)) defineEntry(out, key, item);
    return out;
  }
  return value;
}

/** Encode with the extended replacer; the text ends with a newline */
export function serializeJson(value: unknown, indent = 4): string {
  return `${JSON.stringify(value, extendedReplacer, indent)}\n`;
}
