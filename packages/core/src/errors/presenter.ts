/**
 * ErrorPresenter - pure presentation layer for HyperEnumError instances
 * - No business logic; formats into view objects for the CLI
 */

import type { ErrorCode } from './codes.js';
import type { ErrorContext, HyperEnumError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  cause?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: HyperEnumError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      cause: error.cause?.message,
      workaround: error.context?.suggestion,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const parts: string[] = [];
    if (ctx.entity) parts.push(`game "${ctx.entity}"`);
    if (ctx.option) parts.push(`option "${ctx.option}"`);
    if (ctx.path) parts.push(ctx.path);
    return parts.length > 0 ? `Location: ${parts.join(', ')}` : undefined;
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
