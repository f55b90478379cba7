import { isScalar } from 'yaml';

import {
  defineEntry,
  isMapping,
  isPlainMapping,
  isSequence,
  mappingEntries,
  sequenceItems,
  type PlainMapping,
} from '../schema/type-compat.js';

/**
 * Recursively demote every mapping to a plain object and every sequence to a
 * plain array, for consumers that check exact container types.
 *
 * Pure: the input is never mutated. A subtree that is already made of plain
 * containers is returned as the same reference.
 */
export function toBase(value: unknown): unknown {
  if (isScalar(value)) return toBase(value.value);

  if (Array.isArray(value) && Object.getPrototypeOf(value) === Array.prototype) {
    let changed = false;
    const items = value.map((item) => {
      const next = toBase(item);
      if (next !== item) changed = true;
      return next;
    });
    return changed ? items : value;
  }

  if (isPlainMapping(value)) {
    let changed = false;
    const out: PlainMapping = {};
    for (const [key, item] of Object.entries(value)) {
      const next = toBase(item);
      if (next !== item) changed = true;
      defineEntry(out, key, next);
    }
    return changed ? out : value;
  }

  if (isMapping(value)) {
    const out: PlainMapping = {};
    for (const [key, item] of mappingEntries(value)) {
      defineEntry(out, key, toBase(item));
    }
    return out;
  }

  if (isSequence(value)) {
    return sequenceItems(value).map(toBase);
  }

  return value;
}

/** The bare-container view of an instance that Ajv validates */
export function validationView(instance: unknown): unknown {
  return toBase(instance);
}

/**
 * In-place variant used on trees the engine owns: plain containers keep their
 * identity and only non-plain descendants are replaced. `onReplace` sees every
 * replacement so side tables keyed by identity can follow it.
 */
export function stripToBase(
  value: unknown,
  onReplace?: (from: object, to: object) => void
): unknown {
  if (isScalar(value)) return value.value;

  if (Array.isArray(value) && Object.getPrototypeOf(value) === Array.prototype) {
    value.forEach((item, index) => {
      value[index] = stripToBase(item, onReplace);
    });
    return value;
  }

  if (isPlainMapping(value)) {
    for (const [key, item] of Object.entries(value)) {
      defineEntry(value, key, stripToBase(item, onReplace));
    }
    return value;
  }

  if (isMapping(value) || isSequence(value)) {
    const replacement = toBase(value);
    if (onReplace && replacement !== null && typeof replacement === 'object') {
      onReplace(value, replacement);
    }
    return stripToBase(replacement, onReplace);
  }

  return value;
}
