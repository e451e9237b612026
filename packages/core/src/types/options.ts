/**
 * Configuration options for a Sluice facade
 *
 * All options are optional with conservative defaults.
 */

import { ConfigError } from './errors.js';

/**
 * How the engine treats a filter delta that carries `event` or `error`
 * - 'drop': the reserved keys are removed from the delta
 * - 'fail': the outcome becomes a Failure(ReservedContextKeyError)
 */
export type ReservedKeyPolicy = 'drop' | 'fail';

export type LogWriter = (line: string) => void;

/**
 * Metrics collection configuration
 */
export interface MetricsOptions {
  /** Collect dispatch counters and timings (default: true) */
  enabled?: boolean;
}

export interface SluiceOptions {
  /** Reserved context key handling (default: 'drop') */
  reservedKeyPolicy?: ReservedKeyPolicy;
  /** Emit a dispatch trace (default: false) */
  debug?: boolean;
  /** Trace sink; defaults to process.stderr */
  log?: LogWriter;
  metrics?: MetricsOptions;
}

export interface ResolvedOptions {
  reservedKeyPolicy: ReservedKeyPolicy;
  debug: boolean;
  log?: LogWriter;
  metrics: Required<MetricsOptions>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  reservedKeyPolicy: 'drop',
  debug: false,
  metrics: {
    enabled: true,
  },
};

const RESERVED_KEY_POLICIES: readonly ReservedKeyPolicy[] = ['drop', 'fail'];

/**
 * Resolves user options against the defaults
 *
 * @throws {ConfigError} When an option has an invalid value
 */
export function resolveOptions(
  userOptions: SluiceOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...userOptions,
    reservedKeyPolicy:
      userOptions.reservedKeyPolicy ?? DEFAULT_OPTIONS.reservedKeyPolicy,
    debug: userOptions.debug ?? DEFAULT_OPTIONS.debug,
    metrics: { ...DEFAULT_OPTIONS.metrics, ...userOptions.metrics },
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedOptions): void {
  if (!RESERVED_KEY_POLICIES.includes(options.reservedKeyPolicy)) {
    throw new ConfigError({
      message: `reservedKeyPolicy must be one of ${RESERVED_KEY_POLICIES.join(', ')}`,
      setting: 'reservedKeyPolicy',
      context: { value: options.reservedKeyPolicy },
    });
  }

  if (typeof options.debug !== 'boolean') {
    throw new ConfigError({
      message: 'debug must be a boolean',
      setting: 'debug',
      context: { value: options.debug },
    });
  }

  if (options.log !== undefined && typeof options.log !== 'function') {
    throw new ConfigError({
      message: 'log must be a function',
      setting: 'log',
    });
  }

  if (typeof options.metrics.enabled !== 'boolean') {
    throw new ConfigError({
      message: 'metrics.enabled must be a boolean',
      setting: 'metrics.enabled',
      context: { value: options.metrics.enabled },
    });
  }

  // A custom writer without debug would never be called
  if (options.log !== undefined && !options.debug) {
    throw new ConfigError({
      message: 'log requires debug to be enabled',
      setting: 'log',
    });
  }
}
