/**
 * The engine's notion of JSON Schema `object` and `array`.
 *
 * Besides plain objects and arrays, config trees may hold `Map`s and the
 * `yaml` library's YAMLMap/YAMLSeq nodes (e.g. a document loaded with
 * `parseDocument`, or a value marked for flow layout). Every read and write
 * the engine does goes through these adapters.
 */

import { isMap, isScalar, isSeq, type YAMLMap, type YAMLSeq } from 'yaml';

export type PlainMapping = Record<string, unknown>;
export type Mapping = PlainMapping | Map<unknown, unknown> | YAMLMap;
export type Sequence = unknown[] | YAMLSeq;

export function isPlainMapping(value: unknown): value is PlainMapping {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isMapping(value: unknown): value is Mapping {
  return isMap(value) || value instanceof Map || isPlainMapping(value);
}

/** Strings, Buffers and typed arrays are scalars here, never sequences */
export function isSequence(value: unknown): value is Sequence {
  return Array.isArray(value) || isSeq(value);
}

function keyText(key: unknown): string {
  return String(isScalar(key) ? key.value : key);
}

export function mappingKeys(mapping: Mapping): string[] {
  if (isMap(mapping)) return mapping.items.map((pair) => keyText(pair.key));
  if (mapping instanceof Map) return Array.from(mapping.keys(), keyText);
  return Object.keys(mapping);
}

export function mappingSize(mapping: Mapping): number {
  if (isMap(mapping)) return mapping.items.length;
  if (mapping instanceof Map) return mapping.size;
  return Object.keys(mapping).length;
}

export function mappingHas(mapping: Mapping, key: string): boolean {
  if (isMap(mapping) || mapping instanceof Map) return mapping.has(key);
  return Object.prototype.hasOwnProperty.call(mapping, key);
}

/** YAML scalar nodes are unwrapped to their value */
export function mappingGet(mapping: Mapping, key: string): unknown {
  if (isMap(mapping)) return mapping.get(key, false);
  if (mapping instanceof Map) return mapping.get(key);
  return Object.prototype.hasOwnProperty.call(mapping, key)
    ? mapping[key]
    : undefined;
}

export function mappingSet(mapping: Mapping, key: string, value: unknown): void {
  if (isMap(mapping) || mapping instanceof Map) {
    mapping.set(key, value);
    return;
  }
  defineEntry(mapping, key, value);
}

/** `__proto__` is a legal config key; plain assignment would set the prototype */
export function defineEntry(
  target: PlainMapping,
  key: string,
  value: unknown
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function mappingEntries(mapping: Mapping): Array<[string, unknown]> {
  return mappingKeys(mapping).map((key) => [key, mappingGet(mapping, key)]);
}

export function sequenceItems(sequence: Sequence): unknown[] {
  if (isSeq(sequence)) {
    return sequence.items.map((item) => (isScalar(item) ? item.value : item));
  }
  return Array.from(sequence);
}

export function sequenceSet(
  sequence: Sequence,
  index: number,
  value: unknown
): void {
  if (isSeq(sequence)) {
    sequence.set(index, value);
    return;
  }
  sequence[index] = value;
}
