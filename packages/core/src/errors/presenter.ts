/**
 * ErrorPresenter - pure presentation layer for ProbeError instances
 * - No business logic; formats into view objects the CLI renders
 */

import type { ErrorCode } from './codes.js';
import {
  ConfigurationError,
  type ErrorContext,
  type ProbeError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  details?: string[];
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ProbeError): CLIErrorView {
    const failures =
      error instanceof ConfigurationError ? [...error.failures] : [];
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt:
        typeof error.context?.valueExcerpt === 'string'
          ? error.context.valueExcerpt
          : undefined,
      workaround: this.#formatWorkaround(error.context),
      details: failures.length > 0 ? failures : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth:
        this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx || typeof ctx.path !== 'string') return undefined;
    return typeof ctx.position === 'number'
      ? `Location: ${ctx.path} (at ${ctx.position})`
      : `Location: ${ctx.path}`;
  }

  #formatWorkaround(ctx?: ErrorContext): string | undefined {
    return typeof ctx?.suggestion === 'string' ? ctx.suggestion : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
