import { referenceToken } from './reference-ids.js';

type CanonicalJSONValue =
  | null
  | boolean
  | number
  | string
  | CanonicalJSONValue[]
  | { [key: string]: CanonicalJSONValue };

function normalizeNumber(value: number): CanonicalJSONValue {
  if (Object.is(value, -0)) return 0;
  // NaN and the infinities have no JSON form; keep them distinct from null
  if (!Number.isFinite(value)) return { $number: String(value) };
  return value;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const UNDEFINED: CanonicalJSONValue = { $undefined: true };

/**
 * Keys starting with `$` are reserved for the markers below (`$ref`,
 * `$number`, `$bigint`, `$undefined`); a data key of that shape gets one more
 * `$` so it can never read as a marker.
 */
function escapeKey(key: string): string {
  return key.startsWith('$') ? `$${key}` : key;
}

/**
 * Convert a value into a JSON-compatible tree. Plain data is kept by value;
 * anything else (functions, classes, symbols, class instances) is replaced by
 * its reference token, so it only ever equals itself. Object properties set
 * to `undefined` are left out, as JSON.stringify does.
 */
function toCanonicalValue(value: unknown): CanonicalJSONValue {
  if (value === null) return null;
  switch (typeof value) {
    case 'undefined':
      return UNDEFINED;
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      return normalizeNumber(value);
    case 'bigint':
      return { $bigint: value.toString() };
    case 'symbol':
    case 'function':
      return { $ref: referenceToken(value) };
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toCanonicalValue(item));
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    const out: { [key: string]: CanonicalJSONValue } = {};
    for (const [k, v] of Object.entries(value)) {
      if (v === undefined) continue;
      out[escapeKey(k)] = toCanonicalValue(v);
    }
    return out;
  }
  return { $ref: referenceToken(value) };
}

function canonicalizeParsed(value: CanonicalJSONValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return JSON.stringify(value);
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalizeParsed(item)).join(',')}]`;
  }

  const entries = Object.keys(value)
    .sort()
    .map((key) => {
      const v = value[key] ?? null;
      return `${JSON.stringify(key)}:${canonicalizeParsed(v)}`;
    });
  return `{${entries.join(',')}}`;
}

export function canonicalize(value: unknown): string {
  return canonicalizeParsed(toCanonicalValue(value));
}
