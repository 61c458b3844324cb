/**
 * ErrorPresenter - pure presentation layer for PlatcheckError instances
 * - No harness logic; formats errors into view objects the CLI renders
 */

import { ErrorCode } from './codes.js';
import type { PlatcheckError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  /** Message lines after the first one, rendered verbatim. */
  details: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

const WORKAROUNDS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.GENERATOR_EXHAUSTED]:
    'Most candidates were rejected as expected; raise --max-discards or --max-consecutive-discards.',
  [ErrorCode.CONFIGURATION_ERROR]:
    'Check the value of the flag named above; run with --help to list the accepted flags.',
};

export class ErrorPresenter {
  constructor(private readonly options: PresenterOptions = {}) {}

  formatForCLI(error: PlatcheckError): CLIErrorView {
    const [headline = '', ...details] = error.message.split('\n');
    return {
      title: `Error ${error.errorCode}: ${headline}`,
      code: error.errorCode,
      details,
      workaround: WORKAROUNDS[error.errorCode],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForJSON(error: PlatcheckError): SerializedError {
    return error.toJSON(false);
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return process.stdout.isTTY === true;
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout.columns || 80;
  }
}
