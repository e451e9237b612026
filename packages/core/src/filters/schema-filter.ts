import type { ValidateFunction } from 'ajv';

import type { Context } from '../core/context.js';
import { Filter } from '../core/filter.js';
import { SchemaFilterError } from '../types/errors.js';
import { noMatch, proceed, type Outcome } from '../types/outcome.js';
import { getValidator, type EventSchema } from '../util/validator-cache.js';

export interface SchemaFilterOptions {
  /** Validate `format` keywords through ajv-formats (default: false) */
  formats?: boolean;
}

/**
 * Continues when the event validates against a JSON Schema.
 *
 * The schema is compiled when the filter is built; structurally equal
 * schemas share one compiled validator and one tree edge.
 */
export class SchemaFilter extends Filter {
  readonly kind = 'SchemaFilter';
  readonly formats: boolean;
  readonly #validate: ValidateFunction;

  constructor(
    public readonly schema: EventSchema,
    options: SchemaFilterOptions = {}
  ) {
    super();
    this.formats = options.formats ?? false;
    this.#validate = compile(schema, this.formats);
  }

  protected fields(): readonly unknown[] {
    return [this.schema, this.formats];
  }

  evaluate(ctx: Context): Outcome {
    return this.#validate(ctx.event) ? proceed() : noMatch();
  }

  override describe(): string {
    const title =
      typeof this.schema === 'object' && typeof this.schema.title === 'string'
        ? this.schema.title
        : undefined;
    return title ? `SchemaFilter(${title})` : 'SchemaFilter';
  }
}

function compile(eventSchema: EventSchema, formats: boolean): ValidateFunction {
  try {
    return getValidator(eventSchema, { formats });
  } catch (error) {
    throw new SchemaFilterError({
      message: `Invalid event schema: ${error instanceof Error ? error.message : String(error)}`,
      schema: eventSchema,
      cause: error,
    });
  }
}

export function schema(
  eventSchema: EventSchema,
  options?: SchemaFilterOptions
): SchemaFilter {
  return new SchemaFilter(eventSchema, options);
}
