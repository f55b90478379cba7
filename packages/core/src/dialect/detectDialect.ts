export type Dialect =
  | 'draft-04'
  | 'draft-06'
  | 'draft-07'
  | '2019-09'
  | '2020-12'
  | 'unknown';

export type KnownDialect = Exclude<Dialect, 'unknown'>;

/** Dialect used when a schema does not announce or imply one */
export const LATEST_DIALECT: KnownDialect = '2020-12';

const DIALECT_CANONICAL_META: Record<KnownDialect, string> = {
  'draft-04': 'http://json-schema.org/draft-04/schema',
  'draft-06': 'http://json-schema.org/draft-06/schema',
  'draft-07': 'http://json-schema.org/draft-07/schema',
  '2019-09': 'https://json-schema.org/draft/2019-09/schema',
  '2020-12': 'https://json-schema.org/draft/2020-12/schema',
};

const URI_DIALECT_BY_NORMALIZED = new Map<string, KnownDialect>();

function normalizeForIndex(uri: string): string {
  const trimmed = uri.trim();
  if (!trimmed) return '';
  const withoutFragment = trimmed.split('#')[0] ?? trimmed;
  const lower = withoutFragment.toLowerCase();
  const normalizedScheme = lower.startsWith('https://')
    ? `http://${lower.slice('https://'.length)}`
    : lower;
  return normalizedScheme.endsWith('/')
    ? normalizedScheme.slice(0, -1)
    : normalizedScheme;
}

for (const [dialect, canonical] of Object.entries(DIALECT_CANONICAL_META)) {
  if (isKnownDialect(dialect)) {
    URI_DIALECT_BY_NORMALIZED.set(normalizeForIndex(canonical), dialect);
  }
}

function isKnownDialect(value: string): value is KnownDialect {
  return Object.prototype.hasOwnProperty.call(DIALECT_CANONICAL_META, value);
}

export function getCanonicalMetaUri(dialect: KnownDialect): string {
  return DIALECT_CANONICAL_META[dialect];
}

/**
 * Map a `$schema` URI onto a dialect. http/https, a trailing slash and a
 * trailing `#` are all accepted.
 */
export function normalizeDialectUri(uri: string): Dialect {
  return URI_DIALECT_BY_NORMALIZED.get(normalizeForIndex(uri)) ?? 'unknown';
}

interface FeatureFlags {
  hasPrefixItems: boolean;
  hasDefs: boolean;
  hasIfThenElseOrConst: boolean;
}

function scanFeatureFlags(schema: object): FeatureFlags {
  const flags: FeatureFlags = {
    hasPrefixItems: false,
    hasDefs: false,
    hasIfThenElseOrConst: false,
  };

  const seen = new WeakSet<object>();
  const visit = (node: unknown): void => {
    if (!node || typeof node !== 'object') return;
    if (seen.has(node)) return;
    seen.add(node);
    if (Array.isArray(node)) {
      for (const entry of node) visit(entry);
      return;
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === 'default' || key === 'examples' || key === 'const') {
        if (key === 'const') flags.hasIfThenElseOrConst = true;
        // Payloads are data, not subschemas
        continue;
      }
      if (key === 'prefixItems') flags.hasPrefixItems = true;
      if (key === '$defs' && value && typeof value === 'object') {
        flags.hasDefs = true;
      }
      if (key === 'if' || key === 'then' || key === 'else') {
        flags.hasIfThenElseOrConst = true;
      }
      visit(value);
    }
  };

  visit(schema);
  return flags;
}

/**
 * Sniff the dialect of a schema: `$schema` first, then keywords that only
 * exist in some drafts. Returns 'unknown' when nothing points anywhere.
 */
export function detectDialect(schema: unknown): Dialect {
  if (!schema || typeof schema !== 'object' || Array.isArray(schema)) {
    return 'unknown';
  }

  const rawSchema = '$schema' in schema ? schema.$schema : undefined;
  if (typeof rawSchema === 'string') {
    const dialect = normalizeDialectUri(rawSchema);
    if (dialect !== 'unknown') return dialect;
    const lowered = rawSchema.trim().toLowerCase();
    if (lowered.includes('2020-12')) return '2020-12';
    if (lowered.includes('2019-09')) return '2019-09';
    if (lowered.includes('draft-07')) return 'draft-07';
    if (lowered.includes('draft-06')) return 'draft-06';
    if (lowered.includes('draft-04')) return 'draft-04';
    return 'unknown';
  }

  const flags = scanFeatureFlags(schema);
  if (flags.hasPrefixItems) return '2020-12';
  if (flags.hasDefs) return '2019-09';
  if (flags.hasIfThenElseOrConst) return 'draft-07';
  return 'unknown';
}
