/**
 * Error hierarchy for semregex
 * Every failure carries the offending input and a stable error code.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  input?: string; // Offending constraint or version literal
  component?: string; // 'major' | 'minor' | 'patch' | 'component 4' ...
  valueExcerpt?: string; // Offending substring within input
  operator?: string;
  dialect?: string;
  feature?: string;
  setting?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  suggestions?: string[];
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  input?: string;
}

interface BaseErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all semregex errors
 */
export abstract class SemregexError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  // Populated after construction by the stage that knows the fix
  public suggestions?: string[];

  constructor(params: BaseErrorParams) {
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
   * Serialize error to JSON
   * - dev: includes stack
   * - prod: stack omitted
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      suggestions: this.suggestions,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      input: this.context?.input,
    };
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Malformed version literal or bracketed range.
 */
export class ParseError extends SemregexError {
  constructor(params: {
    message: string;
    input: string;
    component?: string;
    valueExcerpt?: string;
    errorCode?: ErrorCode.VERSION_PARSE_FAILED | ErrorCode.RANGE_PARSE_FAILED;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.VERSION_PARSE_FAILED,
      context: {
        input: params.input,
        component: params.component,
        valueExcerpt: params.valueExcerpt,
      },
      cause: params.cause,
    });
  }

  get input(): string | undefined {
    return this.context?.input;
  }
  get component(): string | undefined {
    return this.context?.component;
  }
}

/**
 * Operator tag outside the closed operator set.
 */
export class UnsupportedOperatorError extends SemregexError {
  constructor(params: { operator: string; input: string }) {
    super({
      message: `unsupported operator: ${params.operator}`,
      errorCode: ErrorCode.UNSUPPORTED_OPERATOR,
      context: {
        input: params.input,
        operator: params.operator,
        valueExcerpt: params.operator,
      },
    });
  }

  get operator(): string | undefined {
    return this.context?.operator;
  }
}

/**
 * The generated pattern needs a regex feature the target dialect lacks.
 */
export class DialectUnsupportedError extends SemregexError {
  constructor(params: {
    message: string;
    input: string;
    dialect: string;
    feature: string;
    operator?: string;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.DIALECT_FEATURE_UNSUPPORTED,
      context: {
        input: params.input,
        dialect: params.dialect,
        feature: params.feature,
        operator: params.operator,
      },
    });
  }

  get dialect(): string | undefined {
    return this.context?.dialect;
  }
  get feature(): string | undefined {
    return this.context?.feature;
  }
}

/**
 * Invalid compile options.
 */
export class ConfigError extends SemregexError {
  constructor(params: { message: string; setting: string; value?: unknown }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: {
        setting: params.setting,
        input: String(params.value),
        value: params.value,
      },
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * A generated pattern the host engine refused to compile.
 */
export class InternalError extends SemregexError {
  constructor(params: { message: string; input?: string; cause?: Error }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INTERNAL_ERROR,
      context: { input: params.input },
      cause: params.cause,
    });
  }
}

export function isSemregexError(error: unknown): error is SemregexError {
  return error instanceof SemregexError;
}
