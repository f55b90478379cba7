/**
 * Configuration options for validation, default injection and emission
 *
 * All options are optional with conservative defaults.
 */

import { ConfigError } from './errors.js';

export type DumpFormat = 'json' | 'yaml' | 'yaml-with-comments';

export const DUMP_FORMATS: readonly DumpFormat[] = [
  'json',
  'yaml',
  'yaml-with-comments',
];

export interface EngineOptions {
  /** Attach ajv-formats and validate `format` keywords (default: true) */
  validateFormats?: boolean;
  /**
   * Indent step the emitted YAML will be printed with (default: 2).
   * Drives key indentation of presentation containers.
   */
  indent?: number;
  /**
   * Build YAML presentation containers carrying a comment above every key
   * whose schema has a description (default: false)
   */
  includeComments?: boolean;
  /** Fill missing properties from schema defaults before validating (default: false) */
  injectDefaults?: boolean;
}

export type ResolvedOptions = Required<EngineOptions>;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  validateFormats: true,
  indent: 2,
  includeComments: false,
  injectDefaults: false,
};

export function resolveOptions(
  userOptions: Partial<EngineOptions> = {}
): ResolvedOptions {
  // Explicit undefined keeps the default
  const resolved: ResolvedOptions = {
    validateFormats:
      userOptions.validateFormats ?? DEFAULT_OPTIONS.validateFormats,
    indent: userOptions.indent ?? DEFAULT_OPTIONS.indent,
    includeComments:
      userOptions.includeComments ?? DEFAULT_OPTIONS.includeComments,
    injectDefaults: userOptions.injectDefaults ?? DEFAULT_OPTIONS.injectDefaults,
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  if (!Number.isInteger(options.indent) || options.indent < 1) {
    throw new ConfigError({
      message: 'indent must be a positive integer',
      context: { setting: 'indent', value: options.indent },
    });
  }
  if (options.indent > 10) {
    throw new ConfigError({
      message: 'indent must be at most 10',
      context: { setting: 'indent', value: options.indent },
    });
  }
}

export function isDumpFormat(value: unknown): value is DumpFormat {
  return (
    typeof value === 'string' &&
    (DUMP_FORMATS as readonly string[]).includes(value)
  );
}
