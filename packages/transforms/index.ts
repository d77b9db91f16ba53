/**
 * transforms package - row-set transforms (filter, aggregate, sort, bin)
 */

export type {
  Transform,
  TransformKind,
  FilterTransform,
  AggregateTransform,
  SortTransform,
  BinTransform,
} from './transform.js';
export { resolveTransform } from './transform.js';

export { compileTransform, compileTransforms, executeTransforms } from './pipeline.js';
export type { CompiledTransform } from './pipeline.js';

export { compileFilter, filterRows, predicateFor, type RowPredicate } from './filter.js';

export {
  aggregateRows,
  computeAggregate,
  normalizeAggregateOp,
  aggregateOutputField,
  groupRows,
  groupKey,
  median,
  GROUP_KEY_DELIMITER,
  type AggregateOp,
} from './aggregate.js';

export { sortRows, compareRows, toSortKeys, type SortKey } from './sort.js';

export {
  binRows,
  computeBinExtent,
  binFieldNames,
  DEFAULT_MAXBINS,
  type BinOptions,
  type BinExtent,
} from './bin.js';
