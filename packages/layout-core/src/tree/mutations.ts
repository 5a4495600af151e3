/**
 * Pure structural edits. Each function takes a root and returns a new root (or a typed failure);
 * focus, maximize and signal emission are the model's concern.
 */
import { err, invalidRatios, ok, paneNotFound, type LayoutResult } from "../errors";
import type { NodeId, PaneId } from "../ids";
import type {
  LeafNode,
  NodePath,
  Orientation,
  PaneNode,
  SizeConstraints,
  SplitNode,
  SplitPlacement
} from "../types";
import { findLeafPath, findSplitPath, getNodeAtPath, replaceAtPath } from "./nodes";
import { RATIO_TOLERANCE, checkRatios, equalRatios, isValidSplitRatio, removeRatioAt } from "./ratios";

export interface SplitLeafRequest {
  readonly targetPaneId: PaneId;
  readonly orientation: Orientation;
  readonly placement: SplitPlacement;
  /** Share of the new split given to `newLeaf`; the target keeps the rest. */
  readonly ratio: number;
  readonly newLeaf: LeafNode;
  readonly nodeId: NodeId;
}

export interface InsertSiblingRequest {
  readonly targetPaneId: PaneId;
  readonly placement: SplitPlacement;
  readonly newLeaf: LeafNode;
}

export interface InsertedSibling {
  readonly root: PaneNode;
  readonly parentNodeId: NodeId;
  /** Ratios of the parent before the insert; every child shares equally afterwards. */
  readonly previousRatios: readonly number[];
}

/**
 * Everything needed to put a removed leaf back exactly where it was. `parentPath` addresses the
 * parent split before removal; when `collapsed` is set that slot now holds the surviving sibling.
 */
export interface RemovedLeaf {
  readonly leaf: LeafNode;
  readonly parentPath: NodePath;
  readonly index: number;
  readonly parentNodeId: NodeId;
  readonly orientation: Orientation;
  readonly previousRatios: readonly number[];
  readonly collapsed: boolean;
}

export const splitLeafInTree = (
  root: PaneNode | null,
  request: SplitLeafRequest
): LayoutResult<PaneNode> => {
  const path = findLeafPath(root, request.targetPaneId);
  const target = root && path ? getNodeAtPath(root, path) : null;
  if (!root || !path || !target || target.type !== "leaf") {
    return paneNotFound(request.targetPaneId);
  }
  if (!isValidSplitRatio(request.ratio)) {
    return invalidRatios([request.ratio], "split ratio must lie strictly between 0 and 1");
  }

  const newShare = request.ratio;
  const targetShare = 1 - request.ratio;
  const split: SplitNode =
    request.placement === "before"
      ? {
          type: "split",
          nodeId: request.nodeId,
          orientation: request.orientation,
          ratios: [newShare, targetShare],
          children: [request.newLeaf, target]
        }
      : {
          type: "split",
          nodeId: request.nodeId,
          orientation: request.orientation,
          ratios: [targetShare, newShare],
          children: [target, request.newLeaf]
        };

  const nextRoot = replaceAtPath(root, path, split);
  return nextRoot ? ok(nextRoot) : paneNotFound(request.targetPaneId);
};

/** Adds `newLeaf` to the target's parent split next to the target. The root leaf has no parent. */
export const insertSiblingInTree = (
  root: PaneNode | null,
  request: InsertSiblingRequest
): LayoutResult<InsertedSibling> => {
  const path = findLeafPath(root, request.targetPaneId);
  if (!root || !path) {
    return paneNotFound(request.targetPaneId);
  }
  if (path.length === 0) {
    return err({ type: "no-parent-split", paneId: request.targetPaneId });
  }
  const parentPath = path.slice(0, -1);
  const parent = getNodeAtPath(root, parentPath);
  if (!parent || parent.type !== "split") {
    return paneNotFound(request.targetPaneId);
  }

  const index = path[path.length - 1] + (request.placement === "after" ? 1 : 0);
  const children = parent.children.slice();
  children.splice(index, 0, request.newLeaf);
  const nextRoot = replaceAtPath(root, parentPath, {
    ...parent,
    children,
    ratios: equalRatios(children.length)
  });
  if (!nextRoot) {
    return paneNotFound(request.targetPaneId);
  }
  return ok({ root: nextRoot, parentNodeId: parent.nodeId, previousRatios: [...parent.ratios] });
};

/** Puts `leaf` where the target leaf was and hands back the leaf it displaced. */
export const replaceLeafInTree = (
  root: PaneNode | null,
  targetPaneId: PaneId,
  leaf: LeafNode
): LayoutResult<{ readonly root: PaneNode; readonly replaced: LeafNode }> => {
  const path = findLeafPath(root, targetPaneId);
  const target = root && path ? getNodeAtPath(root, path) : null;
  if (!root || !path || !target || target.type !== "leaf") {
    return paneNotFound(targetPaneId);
  }
  const nextRoot = replaceAtPath(root, path, leaf);
  return nextRoot ? ok({ root: nextRoot, replaced: target }) : paneNotFound(targetPaneId);
};

export const setLeafConstraintsInTree = (
  root: PaneNode | null,
  paneId: PaneId,
  constraints: SizeConstraints | null
): LayoutResult<{ readonly root: PaneNode; readonly previous: SizeConstraints | null }> => {
  const path = findLeafPath(root, paneId);
  const target = root && path ? getNodeAtPath(root, path) : null;
  if (!root || !path || !target || target.type !== "leaf") {
    return paneNotFound(paneId);
  }
  const { constraints: previous, ...rest } = target;
  const next: LeafNode = constraints ? { ...rest, constraints: { ...constraints } } : rest;
  const nextRoot = replaceAtPath(root, path, next);
  return nextRoot ? ok({ root: nextRoot, previous: previous ?? null }) : paneNotFound(paneId);
};

export const removeLeafFromTree = (
  root: PaneNode | null,
  paneId: PaneId
): LayoutResult<{ readonly root: PaneNode; readonly removed: RemovedLeaf }> => {
  const path = findLeafPath(root, paneId);
  if (!root || !path) {
    return paneNotFound(paneId);
  }
  if (path.length === 0) {
    return err({ type: "last-pane", paneId });
  }

  const parentPath = path.slice(0, -1);
  const index = path[path.length - 1];
  const parent = getNodeAtPath(root, parentPath);
  const leaf = getNodeAtPath(root, path);
  if (!parent || parent.type !== "split" || !leaf || leaf.type !== "leaf") {
    return paneNotFound(paneId);
  }

  const survivors = parent.children.filter((_, candidate) => candidate !== index);
  // A split left with one child collapses into it. The grandparent keeps its child count, so the
  // collapse never has to continue further up the spine.
  const collapsed = survivors.length === 1;
  const replacement: PaneNode = collapsed
    ? survivors[0]
    : {
        ...parent,
        children: survivors,
        ratios: removeRatioAt(parent.ratios, index)
      };

  const nextRoot = replaceAtPath(root, parentPath, replacement);
  if (!nextRoot) {
    return paneNotFound(paneId);
  }

  return ok({
    root: nextRoot,
    removed: {
      leaf,
      parentPath,
      index,
      parentNodeId: parent.nodeId,
      orientation: parent.orientation,
      previousRatios: [...parent.ratios],
      collapsed
    }
  });
};

export const restoreLeafInTree = (root: PaneNode | null, removed: RemovedLeaf): LayoutResult<PaneNode> => {
  const slot = root ? getNodeAtPath(root, removed.parentPath) : null;
  if (!root || !slot) {
    return paneNotFound(removed.parentNodeId);
  }

  let restored: SplitNode;
  if (removed.collapsed) {
    restored = {
      type: "split",
      nodeId: removed.parentNodeId,
      orientation: removed.orientation,
      ratios: [...removed.previousRatios],
      children: removed.index === 0 ? [removed.leaf, slot] : [slot, removed.leaf]
    };
  } else {
    if (slot.type !== "split" || slot.nodeId !== removed.parentNodeId) {
      return paneNotFound(removed.parentNodeId);
    }
    const children = slot.children.slice();
    children.splice(removed.index, 0, removed.leaf);
    restored = {
      ...slot,
      children,
      ratios: [...removed.previousRatios]
    };
  }

  if (restored.children.length !== restored.ratios.length) {
    return invalidRatios(restored.ratios, "captured ratios no longer match the split");
  }

  const nextRoot = replaceAtPath(root, removed.parentPath, restored);
  return nextRoot ? ok(nextRoot) : paneNotFound(removed.parentNodeId);
};

export const setSplitRatiosInTree = (
  root: PaneNode | null,
  nodeId: NodeId,
  ratios: readonly number[],
  tolerance = RATIO_TOLERANCE
): LayoutResult<{ readonly root: PaneNode; readonly previousRatios: readonly number[] }> => {
  const path = findSplitPath(root, nodeId);
  const split = root && path ? getNodeAtPath(root, path) : null;
  if (!root || !path || !split || split.type !== "split") {
    return paneNotFound(nodeId);
  }
  const reason = checkRatios(ratios, split.children.length, tolerance);
  if (reason) {
    return invalidRatios(ratios, reason);
  }
  const nextRoot = replaceAtPath(root, path, { ...split, ratios: [...ratios] });
  if (!nextRoot) {
    return paneNotFound(nodeId);
  }
  return ok({ root: nextRoot, previousRatios: [...split.ratios] });
};
