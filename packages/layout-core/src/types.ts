/**
 * Layout tree contracts. Nodes are immutable values: every mutation path-copies the spine it
 * touches, so a subtree is never reachable from two places.
 */
import type { NodeId, PaneId, WidgetId } from "./ids";

export type Orientation = "horizontal" | "vertical";

/** Positions that nest the target in a new two-way split. */
export type SplitPosition = "left" | "right" | "top" | "bottom";

/**
 * Placement vocabulary accepted by high-level operations. `before` and `after` add a sibling to the
 * target's own split; `replace` puts a new pane where the target was.
 */
export type WherePosition = SplitPosition | "before" | "after" | "replace";

export type Direction = "left" | "right" | "up" | "down";

/** Whether the new leaf of a split lands before or after the leaf being split. */
export type SplitPlacement = "before" | "after";

/** Per-pane size limits in pixels. A `null` maximum leaves that axis unbounded. */
export interface SizeConstraints {
  readonly minWidth: number;
  readonly minHeight: number;
  readonly maxWidth: number | null;
  readonly maxHeight: number | null;
}

export interface LeafNode {
  readonly type: "leaf";
  readonly paneId: PaneId;
  readonly widgetId: WidgetId;
  readonly constraints?: SizeConstraints;
}

export interface SplitNode {
  readonly type: "split";
  readonly nodeId: NodeId;
  readonly orientation: Orientation;
  readonly ratios: readonly number[];
  readonly children: readonly PaneNode[];
}

export type PaneNode = SplitNode | LeafNode;

export interface LayoutTree {
  readonly root: PaneNode | null;
  readonly focusedPaneId: PaneId | null;
  readonly maximizedPaneId: PaneId | null;
}

/** Child indices from the root down to a node. The root itself has the empty path. */
export type NodePath = readonly number[];

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export const emptyLayoutTree = (): LayoutTree => ({
  root: null,
  focusedPaneId: null,
  maximizedPaneId: null
});

export const isLeafNode = (node: PaneNode): node is LeafNode => node.type === "leaf";

export const isSplitNode = (node: PaneNode): node is SplitNode => node.type === "split";

export const isSplitPosition = (position: WherePosition): position is SplitPosition =>
  position === "left" || position === "right" || position === "top" || position === "bottom";

export const sizeConstraints = (overrides: Partial<SizeConstraints> = {}): SizeConstraints => ({
  minWidth: overrides.minWidth ?? 0,
  minHeight: overrides.minHeight ?? 0,
  maxWidth: overrides.maxWidth ?? null,
  maxHeight: overrides.maxHeight ?? null
});

export const constraintsEqual = (a: SizeConstraints | undefined, b: SizeConstraints | undefined): boolean => {
  if (!a || !b) {
    return a === b;
  }
  return (
    a.minWidth === b.minWidth
    && a.minHeight === b.minHeight
    && a.maxWidth === b.maxWidth
    && a.maxHeight === b.maxHeight
  );
};

export const positionToSplit = (
  position: SplitPosition
): { readonly orientation: Orientation; readonly placement: SplitPlacement } => {
  switch (position) {
    case "left":
      return { orientation: "horizontal", placement: "before" };
    case "right":
      return { orientation: "horizontal", placement: "after" };
    case "top":
      return { orientation: "vertical", placement: "before" };
    case "bottom":
      return { orientation: "vertical", placement: "after" };
  }
};

export const rectsEqual = (a: Rect, b: Rect): boolean =>
  a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
