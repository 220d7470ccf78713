/**
 * ErrorPresenter - pure presentation layer for TaxoforgeError instances
 * - No business logic; formats into environment-specific view objects
 */

import { shouldUseColors } from '@taxoforge/shared';

import type { ErrorCode } from './codes.js';
import type { SerializedError, TaxoforgeError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  env?: NodeJS.ProcessEnv;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  target?: string;
  operation?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: TaxoforgeError): CLIErrorView {
    const context = error.context;
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: context?.path ? `Location: ${context.path}` : undefined,
      target:
        context?.target && context.target !== context.path
          ? context.target
          : undefined,
      operation: context?.operation,
      cause:
        error.cause && !error.message.includes(error.cause.message)
          ? error.cause.message
          : undefined,
      colors: shouldUseColors(this.options.colors, this.options.env),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  formatForProduction(error: TaxoforgeError): SerializedError {
    return error.toJSON(this._env);
  }
}
