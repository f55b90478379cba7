/**
 * ErrorPresenter - pure presentation layer for ConfsmithError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import { suggestFor } from './suggestions.js';
import {
  ValidationError,
  type ConfsmithError,
  type ErrorContext,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  /** Failures listed before the rest are summarised (default: 10) */
  maxFailures?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  /** One line per validation failure: `<path>: <message>` */
  failures: string[];
  /** Failures not listed */
  omittedFailures: number;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ConfsmithError): CLIErrorView {
    const limit = this.options.maxFailures ?? 10;
    const failures =
      error instanceof ValidationError
        ? error.failures.map(
            (failure) => `${failure.path || '(root)'}: ${failure.message}`
          )
        : [];

    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      failures: failures.slice(0, limit),
      omittedFailures: Math.max(0, failures.length - limit),
      workaround: suggestFor(error)[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.path || ctx.schemaPath;
    if (loc) return `Location: ${loc}`;
    return typeof ctx.file === 'string' ? `File: ${ctx.file}` : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
