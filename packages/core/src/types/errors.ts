/**
 * Error hierarchy for platcheck
 * Every finding the harness surfaces is a PlatcheckError with a stable code,
 * a typed context and an exit code.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/** String and debug forms of one descriptor. */
export interface DescriptorView {
  text: string;
  debug: string;
}

export interface ErrorContext {
  candidate?: string; // Generated platform string under test
  serialized?: string; // String form produced by the codec
  reason?: string; // Codec rejection message
  expected?: DescriptorView; // Descriptor parsed from the candidate
  actual?: DescriptorView; // Descriptor parsed from the string form
  setting?: string; // Offending configuration key
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface PlatcheckErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all platcheck errors
 */
export abstract class PlatcheckError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: PlatcheckErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging; the stack is left out unless asked for.
   */
  toJSON(includeStack = false): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (includeStack) {
      base.stack = this.stack;
    }
    return base;
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * A parse failure other than the tolerated empty-cpu rejection, either on the
 * candidate itself or on the string form of its descriptor.
 */
export class UnexpectedParseError extends PlatcheckError {
  constructor(params: {
    candidate: string;
    reason: string;
    serialized?: string;
    cause?: Error;
  }) {
    const { candidate, reason, serialized, cause } = params;
    const message =
      serialized === undefined
        ? `Unexpected parse error for ${JSON.stringify(candidate)}: ${reason}`
        : `Re-parsing ${JSON.stringify(serialized)} (from ${JSON.stringify(candidate)}) failed: ${reason}`;
    super({
      message,
      errorCode: ErrorCode.UNEXPECTED_PARSE_ERROR,
      context: { candidate, reason, serialized },
      cause,
    });
  }
}

/**
 * The descriptor parsed from a candidate differs from the one parsed from its
 * own string form.
 */
export class RoundTripMismatchError extends PlatcheckError {
  constructor(params: {
    candidate: string;
    expected: DescriptorView;
    actual: DescriptorView;
  }) {
    const { candidate, expected, actual } = params;
    const message = [
      'Round trip changed the platform',
      `From      ${JSON.stringify(candidate)}`,
      `Expected: ${expected.debug}`,
      `          ${expected.text}`,
      `Got:      ${actual.debug}`,
      `          ${actual.text}`,
    ].join('\n');
    super({
      message,
      errorCode: ErrorCode.ROUND_TRIP_MISMATCH,
      context: { candidate, serialized: expected.text, expected, actual },
    });
  }
}

/**
 * Too many candidates were discarded before the pass quota was reached.
 * Points at the generator vocabulary, not at the codec.
 */
export class GeneratorExhaustedError extends PlatcheckError {
  public readonly discards: number;
  public readonly consecutiveDiscards: number;

  constructor(params: {
    passes: number;
    numRuns: number;
    discards: number;
    consecutiveDiscards: number;
  }) {
    const { passes, numRuns, discards, consecutiveDiscards } = params;
    super({
      message: `Gave up after ${discards} discarded candidates (${consecutiveDiscards} in a row) with ${passes} of ${numRuns} trials passing`,
      errorCode: ErrorCode.GENERATOR_EXHAUSTED,
      context: { passes, numRuns, discards, consecutiveDiscards },
    });
    this.discards = discards;
    this.consecutiveDiscards = consecutiveDiscards;
  }
}

export class ConfigurationError extends PlatcheckError {
  constructor(message: string, setting?: string) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: setting === undefined ? undefined : { setting },
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Wraps anything thrown during a trial that is not already a PlatcheckError.
 */
export class InternalError extends PlatcheckError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isPlatcheckError(error: unknown): error is PlatcheckError {
  return error instanceof PlatcheckError;
}

/**
 * Normalizes a thrown value into a PlatcheckError.
 */
export function toPlatcheckError(error: unknown): PlatcheckError {
  if (isPlatcheckError(error)) return error;
  if (error instanceof Error) {
    return new InternalError(`${error.name}: ${error.message}`, error);
  }
  return new InternalError(`Non-error value thrown: ${String(error)}`);
}
