import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

import { canonicalize } from './canonical-json.js';

export type EventSchema = SchemaObject | boolean;

export interface ValidatorFlags {
  formats: boolean;
}

interface CacheEntry {
  validate: ValidateFunction;
  schema: EventSchema;
  ajv: Ajv;
}

const MAX_VALIDATOR_CACHE_ENTRIES = 64;
const validatorCache = new Map<string, CacheEntry>();
const ajvByFlags = new Map<string, Ajv>();

function makeCacheKey(schema: EventSchema, flags: ValidatorFlags): string {
  return canonicalize([schema, flags.formats]);
}

function getAjv(flags: ValidatorFlags): Ajv {
  const flagsKey = flags.formats ? 'formats' : 'plain';
  const existing = ajvByFlags.get(flagsKey);
  if (existing) {
    return existing;
  }
  const ajv = new Ajv({ allErrors: false, validateFormats: flags.formats });
  if (flags.formats) {
    addFormats(ajv);
  }
  ajvByFlags.set(flagsKey, ajv);
  return ajv;
}

/**
 * Compiled validator for a schema, shared by every structurally equal schema
 * compiled with the same flags. Least recently used entries are evicted and
 * removed from their Ajv instance, so a schema with an `$id` can be compiled
 * again later.
 *
 * @throws {Error} When Ajv rejects the schema
 */
export function getValidator(
  schema: EventSchema,
  flags: ValidatorFlags
): ValidateFunction {
  const key = makeCacheKey(schema, flags);
  const hit = validatorCache.get(key);
  if (hit !== undefined) {
    validatorCache.delete(key);
    validatorCache.set(key, hit);
    return hit.validate;
  }

  const ajv = getAjv(flags);
  const validate = ajv.compile(schema);
  validatorCache.set(key, { validate, schema, ajv });
  if (validatorCache.size > MAX_VALIDATOR_CACHE_ENTRIES) {
    const oldest = validatorCache.entries().next();
    if (!oldest.done) {
      const [oldestKey, entry] = oldest.value;
      validatorCache.delete(oldestKey);
      release(entry);
    }
  }
  return validate;
}

function release(entry: CacheEntry): void {
  // boolean schemas carry no id and Ajv rejects them in removeSchema
  if (typeof entry.schema === 'object') {
    entry.ajv.removeSchema(entry.schema);
  }
}

export function validatorCacheSize(): number {
  return validatorCache.size;
}

export function clearValidatorCache(): void {
  for (const entry of validatorCache.values()) {
    release(entry);
  }
  validatorCache.clear();
}
