import type { YAMLMap } from 'yaml';

import { PresentationAnnotator } from '../presentation/annotator.js';
import { ProvenanceTracker } from '../provenance/tracker.js';
import { checkSchema } from '../schema/checker.js';
import type { PlainMapping } from '../schema/type-compat.js';
import { resolveOptions, type EngineOptions } from '../types/options.js';
import { stripToBase } from '../util/base-types.js';
import {
  ROOT_LOCATION,
  descend,
  type KeywordHandler,
  type KeywordTable,
  type WalkContext,
} from './context.js';
import {
  withAdditionalPropertyDefaults,
  withItemDefaults,
  withPropertyDefaults,
} from './inject.js';
import { BASE_KEYWORDS } from './keywords.js';

const ignoreRequired: KeywordHandler = () => [];

export const EMITTING_KEYWORDS = {
  properties: withPropertyDefaults(BASE_KEYWORDS.properties),
  additionalProperties: withAdditionalPropertyDefaults(
    BASE_KEYWORDS.additionalProperties
  ),
  items: withItemDefaults(BASE_KEYWORDS.items),
  allOf: BASE_KEYWORDS.allOf,
  $ref: BASE_KEYWORDS.$ref,
  required: ignoreRequired,
} as const satisfies KeywordTable;

export interface EmitOptions
  extends Pick<EngineOptions, 'includeComments' | 'indent' | 'validateFormats'> {
  /** Receives a record of every mapping synthesized from a default */
  provenance?: ProvenanceTracker;
}

/**
 * Build a fully defaulted config from `schema` alone. Properties without a
 * default get the `{{NO_DEFAULT}}` placeholder. Nothing is validated.
 *
 * With `includeComments` the result is a tree of YAML nodes with each
 * property's `description` above its key and numeric lists in flow layout;
 * otherwise plain objects and arrays.
 */
export function emitDefaults(
  schema: unknown,
  options: EmitOptions & { includeComments: true }
): YAMLMap;
export function emitDefaults(
  schema: unknown,
  options?: EmitOptions & { includeComments?: false }
): PlainMapping;
export function emitDefaults(
  schema: unknown,
  options?: EmitOptions
): PlainMapping | YAMLMap;
export function emitDefaults(
  schema: unknown,
  options: EmitOptions = {}
): PlainMapping | YAMLMap {
  const resolved = resolveOptions(options);
  checkSchema(schema, resolved);

  const provenance = options.provenance ?? new ProvenanceTracker();
  const annotator = resolved.includeComments
    ? new PresentationAnnotator(resolved.indent)
    : undefined;

  const ctx: WalkContext = {
    mode: 'emit',
    rootSchema: schema,
    handlers: EMITTING_KEYWORDS,
    provenance,
    annotator,
    refDepth: 0,
  };

  if (annotator) {
    const root = annotator.root();
    descend(ctx, root, schema, ROOT_LOCATION);
    return root;
  }

  const root: PlainMapping = {};
  descend(ctx, root, schema, ROOT_LOCATION);
  stripToBase(root, (from, to) => provenance.transfer(from, to));
  return root;
}
