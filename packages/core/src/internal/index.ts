/**
 * Internal modules barrel export
 */

// Constants
export {
  BITS,
  BRANCH_FACTOR,
  MASK,
  HASH_BITS,
  MAX_DEPTH,
  ORDER_COMPACT_RATIO,
  ORDER_COMPACT_MIN,
  FORMAT_MAX_LENGTH,
} from './constants';

// Utils
export { popcount, mix32, formatSeq, show } from './utils';

// Hashing
export {
  hashKey,
  keyEquals,
  isHashable,
  defaultKeyOps,
  indexKeyOps,
  hashUnordered,
  hashOrdered,
} from './hash';

// HAMT
export {
  EMPTY,
  hamtEmpty,
  hamtFind,
  hamtGet,
  hamtHas,
  hamtSet,
  hamtUpdate,
  hamtDelete,
  hamtIter,
  hamtToEntries,
  nodeFind,
  nodeAssoc,
  nodeDissoc,
  nodeEntries,
  type HEntry,
  type HBucket,
  type HBranch,
  type HEmpty,
  type HChild,
  type HNode,
  type HMap,
  type AssocResult,
  type DissocResult,
} from './hamt';

// Order Index
export {
  orderEmpty,
  orderAppend,
  orderDelete,
  orderCompact,
  orderIter,
  orderedEmpty,
  orderedSet,
  orderedUpdate,
  orderedDelete,
  orderedEntries,
  type OrderIndex,
  type Ordered,
} from './order';

// Types
export { Edit } from './types';
export type { Owner, KeyOps, Hashable } from './types';
