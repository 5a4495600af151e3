/**
 * The pane model owns one layout tree and is the only place it changes. Every successful mutation
 * is validated before it lands and is announced as aboutToChange -> (mutation) -> changed ->
 * layoutChanged, followed by nodeChanged / maximizeChanged when focus or maximize moved.
 *
 * Batches (opened by commands and transactions) collapse those announcements: aboutToChange fires
 * before the first mutation in the batch and the remaining signals fire once when the outermost
 * batch commits. A discarded batch puts back the tree it started from and emits nothing further.
 */
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from "../config";
import { LayoutEngineError, err, ok, paneNotFound, type LayoutResult, type TreeViolation } from "../errors";
import { defaultIdGenerator, type IdGenerator, type NodeId, type PaneId, type WidgetId } from "../ids";
import {
  emptyLayoutTree,
  isSplitPosition,
  positionToSplit,
  type LayoutTree,
  type LeafNode,
  type Orientation,
  type PaneNode,
  type SizeConstraints,
  type SplitNode,
  type SplitPlacement,
  type WherePosition
} from "../types";
import { collectLeaves, collectPaneIds, createLeaf, findLeaf, findSplit, firstLeaf } from "../tree/nodes";
import {
  insertSiblingInTree,
  removeLeafFromTree,
  replaceLeafInTree,
  restoreLeafInTree,
  setLeafConstraintsInTree,
  setSplitRatiosInTree,
  splitLeafInTree,
  type RemovedLeaf
} from "../tree/mutations";
import { checkConstraints, validateTree } from "../tree/validation";
import { createSignalBus, type SignalSubscriber } from "./signals";

export type LayoutSignalMap = {
  aboutToChange: [];
  changed: [];
  layoutChanged: [];
  nodeChanged: [paneId: PaneId];
  maximizeChanged: [paneId: PaneId | null];
};

export interface InsertSplitRequest {
  readonly targetPaneId: PaneId;
  readonly orientation: Orientation;
  readonly widgetId: WidgetId;
  readonly ratio?: number;
  readonly placement?: SplitPlacement;
  /** Reuse a previously issued id, e.g. when a command is redone. */
  readonly paneId?: PaneId;
  readonly nodeId?: NodeId;
}

export interface SplitOutcome {
  readonly paneId: PaneId;
  readonly nodeId: NodeId;
}

export interface InsertPaneRequest {
  readonly targetPaneId: PaneId;
  readonly widgetId: WidgetId;
  readonly placement: SplitPlacement;
  readonly paneId?: PaneId;
}

export interface InsertPaneOutcome {
  readonly paneId: PaneId;
  /** The split that received the pane. */
  readonly nodeId: NodeId;
  readonly previousRatios: readonly number[];
}

export interface ReplacePaneRequest {
  readonly targetPaneId: PaneId;
  readonly widgetId: WidgetId;
  readonly paneId?: PaneId;
}

export interface FocusState {
  readonly focusedPaneId: PaneId | null;
  readonly maximizedPaneId: PaneId | null;
}

export type BatchOutcome = "commit" | "discard";

export interface PaneModel {
  readonly config: EngineConfig;
  readonly signals: SignalSubscriber<LayoutSignalMap>;
  getTree(): LayoutTree;
  getRoot(): PaneNode | null;
  getFocusedPaneId(): PaneId | null;
  getMaximizedPaneId(): PaneId | null;
  getFocusState(): FocusState;
  isMaximized(): boolean;
  isEmpty(): boolean;
  getLeaf(paneId: PaneId): LeafNode | null;
  getSplit(nodeId: NodeId): SplitNode | null;
  getPaneIds(): PaneId[];
  initialize(widgetId: WidgetId, paneId?: PaneId): LayoutResult<PaneId>;
  teardown(): void;
  replaceTree(tree: LayoutTree): LayoutResult<void>;
  insertSplit(request: InsertSplitRequest): LayoutResult<SplitOutcome>;
  insertPane(request: InsertPaneRequest): LayoutResult<InsertPaneOutcome>;
  /** Swaps a leaf for `leaf`; focus and maximize follow it. Returns the displaced leaf. */
  replaceLeaf(targetPaneId: PaneId, leaf: LeafNode): LayoutResult<LeafNode>;
  /** Puts a new pane in the target's place and returns the displaced leaf with the new id. */
  replacePane(request: ReplacePaneRequest): LayoutResult<{ readonly paneId: PaneId; readonly replaced: LeafNode }>;
  /** Places a new pane relative to the target and returns its id. */
  splitPane(targetPaneId: PaneId, position: WherePosition, widgetId: WidgetId, ratio?: number): LayoutResult<PaneId>;
  removeLeaf(paneId: PaneId): LayoutResult<RemovedLeaf>;
  restoreLeaf(removed: RemovedLeaf): LayoutResult<void>;
  setRatios(nodeId: NodeId, ratios: readonly number[]): LayoutResult<readonly number[]>;
  /** Returns the constraints the pane had before; `null` clears them. */
  setConstraints(paneId: PaneId, constraints: SizeConstraints | null): LayoutResult<SizeConstraints | null>;
  setFocus(paneId: PaneId): LayoutResult<void>;
  toggleMaximize(paneId: PaneId): LayoutResult<PaneId | null>;
  setMaximized(paneId: PaneId | null): LayoutResult<void>;
  restoreFocusState(state: FocusState): LayoutResult<void>;
  validate(): TreeViolation[];
  beginBatch(): void;
  endBatch(outcome: BatchOutcome): void;
  isBatching(): boolean;
}

export interface CreatePaneModelOptions {
  readonly config?: EngineConfigOverrides;
  readonly ids?: IdGenerator;
  readonly initialTree?: LayoutTree;
}

/** Picks the leaf that inherits focus when `paneId` goes away: the one before it, else after. */
const neighbourForFocus = (root: PaneNode | null, paneId: PaneId): PaneId | null => {
  const leaves = collectLeaves(root);
  const index = leaves.findIndex((leaf) => leaf.paneId === paneId);
  if (index === -1) {
    return null;
  }
  const neighbour = leaves[index - 1] ?? leaves[index + 1] ?? null;
  return neighbour ? neighbour.paneId : null;
};

export const createPaneModel = (options: CreatePaneModelOptions = {}): PaneModel => {
  const config = resolveEngineConfig(options.config);
  const ids = options.ids ?? defaultIdGenerator;
  const bus = createSignalBus<LayoutSignalMap>();

  let tree: LayoutTree = emptyLayoutTree();
  let batchDepth = 0;
  let batchAnnounced = false;
  let batchStart: LayoutTree = tree;

  if (options.initialTree) {
    const violations = validateTree(options.initialTree, config.ratioTolerance);
    if (violations.length > 0) {
      throw new LayoutEngineError(`Initial layout tree is invalid: ${violations.map((v) => v.message).join("; ")}`);
    }
    tree = withDefaultFocus(options.initialTree);
  }

  const emitSettled = (previous: LayoutTree, next: LayoutTree) => {
    bus.emit("changed");
    bus.emit("layoutChanged");
    if (next.focusedPaneId !== previous.focusedPaneId && next.focusedPaneId !== null) {
      bus.emit("nodeChanged", next.focusedPaneId);
    }
    if (next.maximizedPaneId !== previous.maximizedPaneId) {
      bus.emit("maximizeChanged", next.maximizedPaneId);
    }
  };

  const commit = (next: LayoutTree): LayoutResult<void> => {
    const violations = validateTree(next, config.ratioTolerance);
    if (violations.length > 0) {
      return err({ type: "invalid-structure", violations });
    }
    if (batchDepth > 0) {
      if (!batchAnnounced) {
        batchAnnounced = true;
        bus.emit("aboutToChange");
      }
      tree = next;
      return ok(undefined);
    }
    const previous = tree;
    bus.emit("aboutToChange");
    tree = next;
    emitSettled(previous, next);
    return ok(undefined);
  };

  const getTree = (): LayoutTree => tree;

  const getFocusState = (): FocusState => ({
    focusedPaneId: tree.focusedPaneId,
    maximizedPaneId: tree.maximizedPaneId
  });

  const hasLeaf = (paneId: PaneId): boolean => findLeaf(tree.root, paneId) !== null;

  const initialize = (widgetId: WidgetId, paneId?: PaneId): LayoutResult<PaneId> => {
    if (tree.root) {
      return err({ type: "command-state", message: "Model already has panes; tear it down first" });
    }
    const leaf = createLeaf(paneId ?? ids.paneId(), widgetId);
    const result = commit({ root: leaf, focusedPaneId: leaf.paneId, maximizedPaneId: null });
    return result.ok ? ok(leaf.paneId) : result;
  };

  const teardown = (): void => {
    if (!tree.root) {
      return;
    }
    // An empty tree always validates.
    commit(emptyLayoutTree());
  };

  const replaceTree = (next: LayoutTree): LayoutResult<void> =>
    commit(withDefaultFocus({ ...next, maximizedPaneId: null }));

  const insertSplit = (request: InsertSplitRequest): LayoutResult<SplitOutcome> => {
    const paneId = request.paneId ?? ids.paneId();
    const nodeId = request.nodeId ?? ids.nodeId();
    const split = splitLeafInTree(tree.root, {
      targetPaneId: request.targetPaneId,
      orientation: request.orientation,
      placement: request.placement ?? "after",
      ratio: request.ratio ?? config.defaultSplitRatio,
      newLeaf: createLeaf(paneId, request.widgetId),
      nodeId
    });
    if (!split.ok) {
      return split;
    }
    const result = commit({ ...tree, root: split.value });
    return result.ok ? ok({ paneId, nodeId }) : result;
  };

  const insertPane = (request: InsertPaneRequest): LayoutResult<InsertPaneOutcome> => {
    const paneId = request.paneId ?? ids.paneId();
    const insert = insertSiblingInTree(tree.root, {
      targetPaneId: request.targetPaneId,
      placement: request.placement,
      newLeaf: createLeaf(paneId, request.widgetId)
    });
    if (!insert.ok) {
      return insert;
    }
    const result = commit({ ...tree, root: insert.value.root });
    return result.ok
      ? ok({ paneId, nodeId: insert.value.parentNodeId, previousRatios: insert.value.previousRatios })
      : result;
  };

  const replaceLeaf = (targetPaneId: PaneId, leaf: LeafNode): LayoutResult<LeafNode> => {
    const swap = replaceLeafInTree(tree.root, targetPaneId, leaf);
    if (!swap.ok) {
      return swap;
    }
    const follow = (paneId: PaneId | null) => (paneId === targetPaneId ? leaf.paneId : paneId);
    const result = commit({
      root: swap.value.root,
      focusedPaneId: follow(tree.focusedPaneId),
      maximizedPaneId: follow(tree.maximizedPaneId)
    });
    return result.ok ? ok(swap.value.replaced) : result;
  };

  const replacePane = (
    request: ReplacePaneRequest
  ): LayoutResult<{ readonly paneId: PaneId; readonly replaced: LeafNode }> => {
    const leaf = createLeaf(request.paneId ?? ids.paneId(), request.widgetId);
    const result = replaceLeaf(request.targetPaneId, leaf);
    return result.ok ? ok({ paneId: leaf.paneId, replaced: result.value }) : result;
  };

  const splitPane = (
    targetPaneId: PaneId,
    position: WherePosition,
    widgetId: WidgetId,
    ratio?: number
  ): LayoutResult<PaneId> => {
    if (isSplitPosition(position)) {
      const { orientation, placement } = positionToSplit(position);
      const result = insertSplit({ targetPaneId, orientation, placement, widgetId, ratio });
      return result.ok ? ok(result.value.paneId) : result;
    }
    if (position === "replace") {
      const result = replacePane({ targetPaneId, widgetId });
      return result.ok ? ok(result.value.paneId) : result;
    }
    const result = insertPane({ targetPaneId, widgetId, placement: position });
    return result.ok ? ok(result.value.paneId) : result;
  };

  const removeLeaf = (paneId: PaneId): LayoutResult<RemovedLeaf> => {
    const removal = removeLeafFromTree(tree.root, paneId);
    if (!removal.ok) {
      return removal;
    }
    const focusedPaneId =
      tree.focusedPaneId === paneId ? neighbourForFocus(tree.root, paneId) : tree.focusedPaneId;
    const maximizedPaneId = tree.maximizedPaneId === paneId ? null : tree.maximizedPaneId;
    const result = commit({ root: removal.value.root, focusedPaneId, maximizedPaneId });
    return result.ok ? ok(removal.value.removed) : result;
  };

  const restoreLeaf = (removed: RemovedLeaf): LayoutResult<void> => {
    const restored = restoreLeafInTree(tree.root, removed);
    if (!restored.ok) {
      return restored;
    }
    return commit({ ...tree, root: restored.value });
  };

  const setRatios = (nodeId: NodeId, ratios: readonly number[]): LayoutResult<readonly number[]> => {
    const update = setSplitRatiosInTree(tree.root, nodeId, ratios, config.ratioTolerance);
    if (!update.ok) {
      return update;
    }
    const result = commit({ ...tree, root: update.value.root });
    return result.ok ? ok(update.value.previousRatios) : result;
  };

  const setConstraints = (
    paneId: PaneId,
    constraints: SizeConstraints | null
  ): LayoutResult<SizeConstraints | null> => {
    const reason = constraints ? checkConstraints(constraints) : null;
    if (reason) {
      return err({ type: "invalid-constraints", paneId, reason });
    }
    const update = setLeafConstraintsInTree(tree.root, paneId, constraints);
    if (!update.ok) {
      return update;
    }
    const result = commit({ ...tree, root: update.value.root });
    return result.ok ? ok(update.value.previous) : result;
  };

  const setFocus = (paneId: PaneId): LayoutResult<void> => {
    if (!hasLeaf(paneId)) {
      return paneNotFound(paneId);
    }
    if (tree.focusedPaneId === paneId) {
      return ok(undefined);
    }
    const maximized = tree.maximizedPaneId;
    if (maximized !== null && maximized !== paneId) {
      if (config.maximizeFocusPolicy === "lock") {
        return err({ type: "focus-locked", paneId, maximizedPaneId: maximized });
      }
      return commit({ ...tree, focusedPaneId: paneId, maximizedPaneId: null });
    }
    return commit({ ...tree, focusedPaneId: paneId });
  };

  const toggleMaximize = (paneId: PaneId): LayoutResult<PaneId | null> => {
    if (!hasLeaf(paneId)) {
      return paneNotFound(paneId);
    }
    const maximized = tree.maximizedPaneId;
    if (maximized === null) {
      const result = commit({ ...tree, focusedPaneId: paneId, maximizedPaneId: paneId });
      return result.ok ? ok(paneId) : result;
    }
    if (maximized === paneId) {
      const result = commit({ ...tree, maximizedPaneId: null });
      return result.ok ? ok(null) : result;
    }
    return err({ type: "maximize-conflict", paneId, maximizedPaneId: maximized });
  };

  const setMaximized = (paneId: PaneId | null): LayoutResult<void> => {
    if (tree.maximizedPaneId === paneId) {
      return ok(undefined);
    }
    if (paneId !== null && !hasLeaf(paneId)) {
      return paneNotFound(paneId);
    }
    return commit({ ...tree, maximizedPaneId: paneId });
  };

  const restoreFocusState = (state: FocusState): LayoutResult<void> => {
    if (
      tree.focusedPaneId === state.focusedPaneId
      && tree.maximizedPaneId === state.maximizedPaneId
    ) {
      return ok(undefined);
    }
    return commit({
      ...tree,
      focusedPaneId: state.focusedPaneId,
      maximizedPaneId: state.maximizedPaneId
    });
  };

  const beginBatch = (): void => {
    if (batchDepth === 0) {
      batchStart = tree;
      batchAnnounced = false;
    }
    batchDepth += 1;
  };

  const endBatch = (outcome: BatchOutcome): void => {
    if (batchDepth === 0) {
      return;
    }
    batchDepth -= 1;
    if (batchDepth > 0) {
      return;
    }
    const announced = batchAnnounced;
    batchAnnounced = false;
    if (outcome === "discard") {
      tree = batchStart;
      return;
    }
    if (announced && tree !== batchStart) {
      emitSettled(batchStart, tree);
    }
  };

  return {
    config,
    signals: { on: bus.on },
    getTree,
    getRoot: () => tree.root,
    getFocusedPaneId: () => tree.focusedPaneId,
    getMaximizedPaneId: () => tree.maximizedPaneId,
    getFocusState,
    isMaximized: () => tree.maximizedPaneId !== null,
    isEmpty: () => tree.root === null,
    getLeaf: (paneId) => findLeaf(tree.root, paneId),
    getSplit: (nodeId) => findSplit(tree.root, nodeId),
    getPaneIds: () => collectPaneIds(tree.root),
    initialize,
    teardown,
    replaceTree,
    insertSplit,
    insertPane,
    replaceLeaf,
    replacePane,
    splitPane,
    removeLeaf,
    restoreLeaf,
    setRatios,
    setConstraints,
    setFocus,
    toggleMaximize,
    setMaximized,
    restoreFocusState,
    validate: () => validateTree(tree, config.ratioTolerance),
    beginBatch,
    endBatch,
    isBatching: () => batchDepth > 0
  };
};

function withDefaultFocus(tree: LayoutTree): LayoutTree {
  if (!tree.root) {
    return { root: null, focusedPaneId: null, maximizedPaneId: null };
  }
  if (tree.focusedPaneId !== null && findLeaf(tree.root, tree.focusedPaneId)) {
    return tree;
  }
  return { ...tree, focusedPaneId: firstLeaf(tree.root)?.paneId ?? null };
}
