import {
  ConfigError,
  DUMP_FORMATS,
  didYouMean,
  isDumpFormat,
  type DumpFormat,
} from '@confsmith/core';

/**
 * Options of `confsmith defaults`, as Commander hands them over
 */
export interface DefaultsCliOptions {
  schema?: string;
  format?: string;
  out?: string;
  indent?: string;
}

/**
 * Options of `confsmith validate`
 */
export interface ValidateCliOptions {
  schema?: string;
  config?: string;
  print?: boolean;
  printFormat?: string;
}

export function resolveDumpFormat(value: string | undefined): DumpFormat {
  if (value === undefined) return 'yaml';
  if (isDumpFormat(value)) return value;

  const error = new ConfigError({
    message: `Unknown format "${value}"; expected one of ${DUMP_FORMATS.join(', ')}`,
    context: { setting: 'format', value },
  });
  const close = didYouMean(value, DUMP_FORMATS);
  if (close.length > 0) {
    error.suggestions = close.map((option) => `Did you mean --format ${option}?`);
  }
  throw error;
}

export function resolveIndent(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 1) {
    throw new ConfigError({
      message: `--indent must be a positive integer, got "${value}"`,
      context: { setting: 'indent', value },
    });
  }
  return indent;
}

export function requireFlag(value: string | undefined, flag: string): string {
  if (!value) {
    throw new ConfigError({
      message: `Missing ${flag}`,
      context: { setting: flag },
    });
  }
  return value;
}
