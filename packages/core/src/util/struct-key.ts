import { canonicalize } from './canonical-json.js';

/**
 * Structural identity key of a value object: its kind plus the canonical form
 * of the fields that define it. Equal keys mean interchangeable objects.
 */
export function structuralKey(kind: string, fields: readonly unknown[]): string {
  return `${kind}${canonicalize(fields)}`;
}
