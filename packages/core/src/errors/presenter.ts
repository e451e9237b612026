/**
 * ErrorPresenter - pure presentation layer for values that reach the
 * uncaught-error sink or the debug trace
 * - Accepts anything a filter may have failed with, not only Error instances
 */

import type { ErrorCode } from './codes.js';
import {
  isSluiceError,
  redactValue,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  redactKeys?: string[];
  maxMessageLength?: number;
}

export interface LogErrorView {
  name: string;
  message: string;
  code?: ErrorCode;
}

export type ProductionView =
  | SerializedError
  | { name: string; message: string; value?: unknown };

const DEFAULT_REDACT_KEYS = [
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
];

const DEFAULT_MAX_MESSAGE_LENGTH = 200;

export class ErrorPresenter {
  constructor(private readonly options: PresenterOptions = {}) {}

  formatForLog(error: unknown): LogErrorView {
    if (isSluiceError(error)) {
      return {
        name: error.name,
        message: this.#truncate(error.message),
        code: error.errorCode,
      };
    }
    if (error instanceof Error) {
      return { name: error.name, message: this.#truncate(error.message) };
    }
    return { name: typeof error, message: this.#truncate(this.#describe(error)) };
  }

  /** One line, e.g. `TypeError: bad input` or `E200 ReservedContextKeyError: ...`. */
  formatLine(error: unknown): string {
    const view = this.formatForLog(error);
    const prefix = view.code ? `${view.code} ` : '';
    return `${prefix}${view.name}: ${view.message}`;
  }

  formatForProduction(error: unknown): ProductionView {
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    if (isSluiceError(error)) {
      const base = error.toJSON('prod');
      if (base.context && 'value' in base.context) {
        return {
          ...base,
          context: { ...base.context, value: redactValue(base.context.value, keys) },
        };
      }
      return base;
    }
    if (error instanceof Error) {
      return { name: error.name, message: error.message };
    }
    return {
      name: typeof error,
      message: this.#describe(error),
      value: redactValue(error, keys),
    };
  }

  #describe(value: unknown): string {
    if (typeof value === 'string') return value;
    try {
      const json = JSON.stringify(value);
      return json === undefined ? String(value) : json;
    } catch {
      return String(value);
    }
  }

  #truncate(text: string): string {
    const max = this.options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
    return text.length > max ? `${text.slice(0, max - 1)}…` : text;
  }
}

export default ErrorPresenter;
