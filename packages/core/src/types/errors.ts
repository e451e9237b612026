/**
 * Error hierarchy for Sluice
 *
 * These errors describe misuse of the engine (malformed paths, bad options,
 * filters breaking the context contract). Failures raised by user filters
 * are never wrapped in them: they travel through dispatch as opaque values.
 */

import {
  ErrorCode,
  type Severity,
  getDefaultSeverity,
} from '../errors/codes.js';

export interface ErrorContext {
  combinator?: string; // edge kind involved in the failure
  filter?: string; // structural key of the filter involved
  setting?: string; // option name for configuration errors
  keys?: string[]; // offending context keys
  value?: unknown; // problematic value (may contain PII)
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

interface SluiceErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: unknown;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

export function redactValue(val: unknown, keys: ReadonlySet<string> = SENSITIVE_KEYS): unknown {
  if (val && typeof val === 'object') {
    if (Array.isArray(val)) return val.map((item: unknown) => redactValue(item, keys));
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactValue(v, keys);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all Sluice errors
 */
export abstract class SluiceError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;

  constructor(params: SluiceErrorParams) {
    const { message, errorCode, severity, context, cause } = params;
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity ?? getDefaultSeverity(errorCode);
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const cause = this.cause;
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause:
        cause instanceof Error
          ? { name: cause.name, message: cause.message }
          : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * Malformed path steps handed to DispatchNode.extend / PathBuilder
 */
export class PathError extends SluiceError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext & { step: number };
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.INVALID_PATH_FILTER,
      context: params.context,
    });
  }

  get step(): number | undefined {
    const step = this.context?.step;
    return typeof step === 'number' ? step : undefined;
  }
}

/**
 * A filter returned `event` or `error` in its delta while the
 * reservedKeyPolicy is 'fail'
 */
export class ReservedContextKeyError extends SluiceError {
  public readonly keys: readonly string[];

  constructor(params: { filter: string; keys: string[] }) {
    super({
      message: `Filter ${params.filter} tried to set reserved context key(s): ${params.keys.join(', ')}`,
      errorCode: ErrorCode.RESERVED_CONTEXT_KEY,
      context: { filter: params.filter, keys: params.keys },
    });
    this.keys = params.keys;
  }
}

/**
 * A user function filter resolved to something other than an Outcome
 */
export class InvalidOutcomeError extends SluiceError {
  constructor(params: { filter: string; value: unknown }) {
    super({
      message: `Filter ${params.filter} returned a value that is not an Outcome`,
      errorCode: ErrorCode.INVALID_FILTER_OUTCOME,
      context: { filter: params.filter, value: params.value },
    });
  }
}

/**
 * JSON Schema handed to SchemaFilter does not compile
 */
export class SchemaFilterError extends SluiceError {
  constructor(params: { message: string; schema: unknown; cause?: unknown }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INVALID_EVENT_SCHEMA,
      context: { value: params.schema },
      cause: params.cause,
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends SluiceError {
  constructor(params: {
    message: string;
    setting?: string;
    context?: ErrorContext;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting: params.setting, ...(params.context ?? {}) },
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

export function isSluiceError(value: unknown): value is SluiceError {
  return value instanceof SluiceError;
}
