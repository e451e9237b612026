// Process-local ids for values that compare by reference (functions, classes,
// symbols, class instances). Ids are handed out on first sight and never reused.

const objectIds = new WeakMap<object, number>();
const symbolIds = new Map<symbol, number>();
let nextId = 1;

export function referenceToken(value: object | symbol): number {
  if (typeof value === 'symbol') {
    const known = symbolIds.get(value);
    if (known !== undefined) return known;
    const id = nextId++;
    symbolIds.set(value, id);
    return id;
  }
  const known = objectIds.get(value);
  if (known !== undefined) return known;
  const id = nextId++;
  objectIds.set(value, id);
  return id;
}
