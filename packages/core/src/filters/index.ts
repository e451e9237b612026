export { UnitFilter, unit } from './unit.js';
export { TypeFilter, typeIs, isInstanceOf, type EventType } from './type-filter.js';
export { ErrorTypeFilter, errorIs } from './error-type-filter.js';
export { FuncFilter, func, type FilterFunction } from './func-filter.js';
export {
  PredicateFilter,
  predicate,
  type ContextPredicate,
} from './predicate-filter.js';
export { RaiseFilter, raise } from './raise-filter.js';
export {
  SchemaFilter,
  schema,
  type SchemaFilterOptions,
} from './schema-filter.js';
