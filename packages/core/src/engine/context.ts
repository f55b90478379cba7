import type { PresentationAnnotator } from '../presentation/annotator.js';
import type { ProvenanceTracker } from '../provenance/tracker.js';
import type { ValidationFailure } from '../types/errors.js';
import {
  escapePointerToken,
  isSchemaNode,
  joinPointer,
  type Schema,
  type SchemaNode,
} from '../types/schema.js';

export interface Location {
  /** JSON Pointer into the instance ('' is the root) */
  instancePath: string;
  /** JSON Pointer into the schema ('#' is the root) */
  schemaPath: string;
}

export const ROOT_LOCATION: Location = { instancePath: '', schemaPath: '#' };

/**
 * One keyword's behaviour: look at `value` (the keyword's payload in
 * `schema`), act on `instance`, report failures.
 */
export type KeywordHandler = (
  ctx: WalkContext,
  value: unknown,
  instance: unknown,
  schema: SchemaNode,
  location: Location
) => ValidationFailure[];

/**
 * Keyword → handler table. Handlers run in the table's key order, so keywords
 * that fill values (`properties`) come before those that check them
 * (`required`).
 */
export type KeywordTable = Readonly<Record<string, KeywordHandler>>;

export type WalkMode = 'inject' | 'emit';

export interface WalkContext {
  readonly mode: WalkMode;
  readonly rootSchema: Schema;
  readonly handlers: KeywordTable;
  readonly provenance: ProvenanceTracker;
  /** Present only for annotated emission */
  readonly annotator?: PresentationAnnotator;
  /** `$ref` hops taken on the current branch */
  readonly refDepth: number;
}

/**
 * Apply every handler of the table whose keyword the schema carries.
 */
export function descend(
  ctx: WalkContext,
  instance: unknown,
  schema: Schema,
  location: Location
): ValidationFailure[] {
  if (!isSchemaNode(schema)) return [];

  const failures: ValidationFailure[] = [];
  for (const [keyword, handler] of Object.entries(ctx.handlers)) {
    if (!Object.prototype.hasOwnProperty.call(schema, keyword)) continue;
    failures.push(...handler(ctx, schema[keyword], instance, schema, location));
  }
  return failures;
}

export function childLocation(
  location: Location,
  instanceToken: string | number | undefined,
  ...schemaTokens: Array<string | number>
): Location {
  return {
    instancePath:
      instanceToken === undefined
        ? location.instancePath
        : joinPointer(location.instancePath, instanceToken),
    schemaPath: schemaTokens.reduce<string>(
      (path, token) => `${path}/${escapePointerToken(String(token))}`,
      location.schemaPath
    ),
  };
}
