import {
  isMap,
  isSeq,
  parseDocument,
  stringify,
  type YAMLMap,
  type YAMLSeq,
} from 'yaml';

import {
  isMapping,
  isSequence,
  type Mapping,
  type Sequence,
} from '../schema/type-compat.js';

/**
 * Mark a sequence or mapping for inline (`[a, b, c]`) rather than block layout.
 *
 * The value is round-tripped through the YAML serializer once and the parsed
 * collection gets its `flow` flag set. The result is still read as the same
 * sequence/mapping by the engine's container adapters. Scalars pass through.
 */
export function markFlow(value: Sequence): YAMLSeq;
export function markFlow(value: Mapping): YAMLMap;
export function markFlow(value: unknown): unknown;
export function markFlow(value: unknown): unknown {
  if (!isMapping(value) && !isSequence(value)) return value;

  const node = parseDocument(stringify(value)).contents;
  if (isSeq(node) || isMap(node)) {
    node.flow = true;
    return node;
  }
  return value;
}

export function isFlowStyle(value: unknown): boolean {
  return (isSeq(value) || isMap(value)) && value.flow === true;
}
