export { ScapegoatTree } from './ScapegoatTree';
export type { ScapegoatTreeDependencies } from './ScapegoatTree';

export { TreeDebugPrinter } from './TreeDebugPrinter';
export type { Traversable, KeyFormatter } from './TreeDebugPrinter';

export { NodeArena, NIL } from './NodeArena';
export type { NodeId } from './NodeArena';

export { RebalanceEngine } from './RebalanceEngine';
export type { Scapegoat } from './RebalanceEngine';
export { DeletionEngine } from './DeletionEngine';
export { InvariantChecker } from './InvariantChecker';
export type { SubtreeReport } from './InvariantChecker';

export { defaultIsLessThan, integerLessThan, lessThanFrom } from '../common/Ordering';
export {
  TreeError,
  InvalidAlphaError,
  IncomparableKeyError,
  TreeCorruptionError,
} from '../common/Errors';
export { MIN_ALPHA, MAX_ALPHA, DEFAULT_ALPHA, assertValidAlpha } from '../common/Config';
export type {
  TreeKey,
  LessThan,
  Comparator,
  RebuildEvent,
  RebuildListener,
  RebuildTrigger,
  TreeStats,
  TraversalEntry,
  TreeVisitor,
  VisitedNode,
  ChildSide,
} from '../common/Types';
export type { IOrderedSet } from '../interfaces/OrderedSet';
