import { ErrorPresenter } from '../errors/presenter.js';
import type { LogWriter, ResolvedOptions } from '../types/options.js';
import type { Outcome } from '../types/outcome.js';

const PREFIX = '[sluice]';

export interface DebugLogger {
  readonly enabled: boolean;
  publish(event: unknown): void;
  outcome(depth: number, filter: string, outcome: Outcome): void;
  pushed(depth: number, size: number): void;
  popped(depth: number, size: number): void;
  uncaught(error: unknown): void;
  done(uncaught: number): void;
}

export const NOOP_LOGGER: DebugLogger = {
  enabled: false,
  publish: () => undefined,
  outcome: () => undefined,
  pushed: () => undefined,
  popped: () => undefined,
  uncaught: () => undefined,
  done: () => undefined,
};

function stderrWriter(line: string): void {
  process.stderr.write(`${line}\n`);
}

function describeEvent(event: unknown): string {
  if (event === null) return 'null';
  if (Array.isArray(event)) return `Array(${event.length})`;
  if (typeof event === 'object') return event.constructor?.name ?? 'Object';
  return typeof event;
}

/**
 * Dispatch trace, one `[sluice] ...` line per step. A no-op unless the
 * options enable debug.
 */
export function createDebugLogger(options: ResolvedOptions): DebugLogger {
  if (!options.debug) {
    return NOOP_LOGGER;
  }
  const write: LogWriter = options.log ?? stderrWriter;
  const presenter = new ErrorPresenter();
  const indent = (depth: number): string => '  '.repeat(depth);

  return {
    enabled: true,
    publish(event) {
      write(`${PREFIX} publish(${describeEvent(event)})`);
    },
    outcome(depth, filter, outcome) {
      const detail =
        outcome._tag === 'Failure'
          ? ` ${presenter.formatLine(outcome.error)}`
          : outcome._tag === 'Continue'
            ? ` +${Object.keys(outcome.delta).join(',') || '{}'}`
            : '';
      write(`${PREFIX} ${indent(depth)}${filter} -> ${outcome._tag}${detail}`);
    },
    pushed(depth, size) {
      write(`${PREFIX} ${indent(depth)}caught.push (size ${size})`);
    },
    popped(depth, size) {
      write(`${PREFIX} ${indent(depth)}caught.pop (size ${size})`);
    },
    uncaught(error) {
      write(`${PREFIX} uncaught ${presenter.formatLine(error)}`);
    },
    done(uncaught) {
      write(`${PREFIX} done (${uncaught} uncaught)`);
    },
  };
}
