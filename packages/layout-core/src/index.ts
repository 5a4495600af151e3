export {
  createNodeId,
  createPaneId,
  createSequentialIdGenerator,
  defaultIdGenerator,
  type IdGenerator,
  type NodeId,
  type PaneId,
  type WidgetId
} from "./ids";

export {
  constraintsEqual,
  emptyLayoutTree,
  isLeafNode,
  isSplitNode,
  isSplitPosition,
  positionToSplit,
  rectsEqual,
  sizeConstraints,
  type Direction,
  type LayoutTree,
  type LeafNode,
  type NodePath,
  type Orientation,
  type PaneNode,
  type Rect,
  type Size,
  type SizeConstraints,
  type SplitNode,
  type SplitPlacement,
  type SplitPosition,
  type WherePosition
} from "./types";

export {
  ConfigError,
  LayoutEngineError,
  TransactionError,
  describeLayoutError,
  err,
  invalidRatios,
  ok,
  paneNotFound,
  type LayoutError,
  type LayoutResult,
  type TreeViolation
} from "./errors";

export {
  DEFAULT_ENGINE_CONFIG,
  readEngineConfigFromEnv,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type MaximizeFocusPolicy
} from "./config";

export { createConsoleLogger, createNoopLogger, type Logger } from "./logger";

export {
  areNodesEqual,
  collectLeaves,
  collectPaneIds,
  collectSplits,
  createLeaf,
  findLeaf,
  findLeafPath,
  findSplit,
  findSplitPath,
  firstLeaf,
  getNodeAtPath,
  getTreeDepth,
  replaceAtPath
} from "./tree/nodes";
export {
  RATIO_TOLERANCE,
  checkRatios,
  equalRatios,
  isValidSplitRatio,
  normalizeRatios,
  removeRatioAt
} from "./tree/ratios";
export {
  insertSiblingInTree,
  removeLeafFromTree,
  replaceLeafInTree,
  restoreLeafInTree,
  setLeafConstraintsInTree,
  setSplitRatiosInTree,
  splitLeafInTree,
  type InsertSiblingRequest,
  type InsertedSibling,
  type RemovedLeaf,
  type SplitLeafRequest
} from "./tree/mutations";
export { checkConstraints, validateTree } from "./tree/validation";

export { createSignalBus, type SignalBus, type SignalSubscriber } from "./model/signals";
export {
  createPaneModel,
  type BatchOutcome,
  type CreatePaneModelOptions,
  type FocusState,
  type InsertPaneOutcome,
  type InsertPaneRequest,
  type InsertSplitRequest,
  type LayoutSignalMap,
  type PaneModel,
  type ReplacePaneRequest,
  type SplitOutcome
} from "./model/paneModel";

export {
  calculateLayout,
  coveredArea,
  partitionExtent,
  type DividerRect,
  type LayoutGeometry,
  type LayoutOptions
} from "./geometry/calculate";
export { findAdjacentPane, nextPaneId, previousPaneId } from "./geometry/navigation";

export {
  reconcile,
  reconcileRoots,
  type ReconcileOperation,
  type ReconcileOptions
} from "./reconcile/reconciler";
export {
  createViewHost,
  type ViewHost,
  type ViewHostOptions,
  type WidgetProvider
} from "./reconcile/viewHost";

export {
  LAYOUT_SCHEMA_VERSION,
  fromSerializedLayout,
  parseLayout,
  serializeLayout,
  toSerializedLayout,
  type ParseLayoutOptions,
  type SerializedConstraints,
  type SerializedLayout,
  type SerializedLeaf,
  type SerializedNode,
  type SerializedSplit
} from "./persistence/serialization";
export {
  createFileLayoutStorageAdapter,
  createLayoutPersistence,
  createMemoryLayoutStorageAdapter,
  type CreateLayoutPersistenceOptions,
  type LayoutPersistence,
  type LayoutStorageAdapter
} from "./persistence/storage";
