/**
 * Schema node types for the keywords the engine reads.
 * Any other keyword is carried through untouched and left to Ajv.
 */

export type SchemaType =
  | 'object'
  | 'array'
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'null';

export interface SchemaNode {
  $schema?: string;
  $id?: string;
  $ref?: string;
  $defs?: Record<string, Schema>;
  definitions?: Record<string, Schema>;

  type?: SchemaType | SchemaType[];
  title?: string;
  description?: string;
  default?: unknown;

  properties?: Record<string, Schema>;
  additionalProperties?: Schema | null;
  required?: string[];

  /** An array of schemas is the positional (tuple) form */
  items?: Schema | Schema[];

  allOf?: Schema[];

  [keyword: string]: unknown;
}

export type Schema = SchemaNode | boolean;

export function isSchemaNode(value: unknown): value is SchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasDefault(schema: SchemaNode): boolean {
  return Object.prototype.hasOwnProperty.call(schema, 'default');
}

/**
 * True when the schema declares `type: object`, alone or in a type union.
 */
export function isObjectTyped(schema: Schema | null | undefined): boolean {
  if (!isSchemaNode(schema)) return false;
  const { type } = schema;
  return Array.isArray(type) ? type.includes('object') : type === 'object';
}

/**
 * Escape one JSON Pointer reference token (RFC 6901).
 */
export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function unescapePointerToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function joinPointer(base: string, token: string | number): string {
  return `${base}/${escapePointerToken(String(token))}`;
}
