/**
 * Read-only traversal helpers and the path-copy primitive every tree mutation is built on.
 */
import type { NodeId, PaneId, WidgetId } from "../ids";
import { constraintsEqual, type LeafNode, type NodePath, type PaneNode, type SplitNode } from "../types";

export const createLeaf = (paneId: PaneId, widgetId: WidgetId): LeafNode => ({
  type: "leaf",
  paneId,
  widgetId
});

/** Leaves in document order: depth first, children left to right. */
export const collectLeaves = (root: PaneNode | null): LeafNode[] => {
  const leaves: LeafNode[] = [];
  const visit = (node: PaneNode) => {
    if (node.type === "leaf") {
      leaves.push(node);
      return;
    }
    node.children.forEach(visit);
  };
  if (root) {
    visit(root);
  }
  return leaves;
};

export const collectSplits = (root: PaneNode | null): SplitNode[] => {
  const splits: SplitNode[] = [];
  const visit = (node: PaneNode) => {
    if (node.type === "leaf") {
      return;
    }
    splits.push(node);
    node.children.forEach(visit);
  };
  if (root) {
    visit(root);
  }
  return splits;
};

export const collectPaneIds = (root: PaneNode | null): PaneId[] =>
  collectLeaves(root).map((leaf) => leaf.paneId);

export const firstLeaf = (root: PaneNode | null): LeafNode | null => {
  let node = root;
  while (node && node.type === "split") {
    node = node.children[0] ?? null;
  }
  return node;
};

const findPath = (
  root: PaneNode | null,
  predicate: (node: PaneNode) => boolean
): NodePath | null => {
  if (!root) {
    return null;
  }
  const search = (node: PaneNode, path: number[]): number[] | null => {
    if (predicate(node)) {
      return path;
    }
    if (node.type === "leaf") {
      return null;
    }
    for (let index = 0; index < node.children.length; index += 1) {
      const found = search(node.children[index], [...path, index]);
      if (found) {
        return found;
      }
    }
    return null;
  };
  return search(root, []);
};

export const findLeafPath = (root: PaneNode | null, paneId: PaneId): NodePath | null =>
  findPath(root, (node) => node.type === "leaf" && node.paneId === paneId);

export const findSplitPath = (root: PaneNode | null, nodeId: NodeId): NodePath | null =>
  findPath(root, (node) => node.type === "split" && node.nodeId === nodeId);

export const getNodeAtPath = (root: PaneNode | null, path: NodePath): PaneNode | null => {
  let node = root;
  for (const index of path) {
    if (!node || node.type === "leaf") {
      return null;
    }
    node = node.children[index] ?? null;
  }
  return node;
};

export const findLeaf = (root: PaneNode | null, paneId: PaneId): LeafNode | null => {
  const path = findLeafPath(root, paneId);
  if (!path) {
    return null;
  }
  const node = getNodeAtPath(root, path);
  return node && node.type === "leaf" ? node : null;
};

export const findSplit = (root: PaneNode | null, nodeId: NodeId): SplitNode | null => {
  const path = findSplitPath(root, nodeId);
  if (!path) {
    return null;
  }
  const node = getNodeAtPath(root, path);
  return node && node.type === "split" ? node : null;
};

/**
 * Returns a new root where the node at `path` is replaced. Only the spine from the root to the
 * replaced node is copied; untouched siblings keep their identity.
 */
export const replaceAtPath = (root: PaneNode, path: NodePath, replacement: PaneNode): PaneNode | null => {
  if (path.length === 0) {
    return replacement;
  }
  if (root.type === "leaf") {
    return null;
  }
  const [index, ...rest] = path;
  const child = root.children[index];
  if (!child) {
    return null;
  }
  const nextChild = replaceAtPath(child, rest, replacement);
  if (!nextChild) {
    return null;
  }
  const children = root.children.slice();
  children[index] = nextChild;
  return { ...root, children } satisfies SplitNode;
};

export const getTreeDepth = (root: PaneNode | null): number => {
  if (!root) {
    return 0;
  }
  if (root.type === "leaf") {
    return 1;
  }
  return 1 + Math.max(...root.children.map(getTreeDepth));
};

/** Structural equality; ratios compare within `tolerance`. */
export const areNodesEqual = (a: PaneNode | null, b: PaneNode | null, tolerance = 1e-9): boolean => {
  if (a === b) {
    return true;
  }
  if (!a || !b) {
    return false;
  }
  if (a.type === "leaf" || b.type === "leaf") {
    return (
      a.type === "leaf"
      && b.type === "leaf"
      && a.paneId === b.paneId
      && a.widgetId === b.widgetId
      && constraintsEqual(a.constraints, b.constraints)
    );
  }
  if (
    a.nodeId !== b.nodeId
    || a.orientation !== b.orientation
    || a.children.length !== b.children.length
    || a.ratios.length !== b.ratios.length
  ) {
    return false;
  }
  for (let index = 0; index < a.ratios.length; index += 1) {
    if (Math.abs(a.ratios[index] - b.ratios[index]) > tolerance) {
      return false;
    }
  }
  for (let index = 0; index < a.children.length; index += 1) {
    if (!areNodesEqual(a.children[index], b.children[index], tolerance)) {
      return false;
    }
  }
  return true;
};
