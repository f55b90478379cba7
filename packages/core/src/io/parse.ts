import { parseDocument } from 'yaml';

import { ParseError } from '../types/errors.js';

/**
 * Parse config text (YAML 1.2, and therefore JSON too) into plain data.
 * An empty document parses to null.
 */
export function parseConfigText(text: string, source?: string): unknown {
  const doc = parseDocument(text);

  const [first] = doc.errors;
  if (first) {
    const line = first.linePos?.[0].line;
    const where = source ?? 'config text';
    throw new ParseError({
      message: `Could not parse ${where}${line === undefined ? '' : ` (line ${line})`}: ${first.message}`,
      context: { source, line },
      cause: first,
    });
  }

  const value: unknown = doc.toJS();
  return value;
}
