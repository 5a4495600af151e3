/**
 * Tree reconciliation. Leaves are matched by PaneId only, so a pane that moves to a different
 * position in the tree keeps its widget; only panes that appear or disappear cause churn.
 */
import type { PaneId, WidgetId } from "../ids";
import { rectsEqual, type LayoutTree, type LeafNode, type PaneNode, type Rect } from "../types";
import { collectLeaves } from "../tree/nodes";
import { calculateLayout, type LayoutGeometry, type LayoutOptions } from "../geometry/calculate";

export type ReconcileOperation =
  | { readonly type: "destroy"; readonly paneId: PaneId }
  | { readonly type: "create"; readonly paneId: PaneId; readonly widgetId: WidgetId }
  | { readonly type: "replaceWidget"; readonly paneId: PaneId; readonly widgetId: WidgetId }
  | { readonly type: "move"; readonly paneId: PaneId; readonly rect: Rect }
  | { readonly type: "updateRect"; readonly paneId: PaneId; readonly rect: Rect };

export interface ReconcileOptions {
  /** Bounds of the next layout. Without them only create, destroy and replaceWidget are produced. */
  readonly bounds?: Rect;
  /** Bounds the previous layout was rendered at; defaults to `bounds`. */
  readonly previousBounds?: Rect;
  readonly layout?: LayoutOptions;
}

const indexLeaves = (root: PaneNode | null): Map<PaneId, LeafNode> => {
  const leaves = new Map<PaneId, LeafNode>();
  for (const leaf of collectLeaves(root)) {
    leaves.set(leaf.paneId, leaf);
  }
  return leaves;
};

export const reconcileRoots = (
  previousRoot: PaneNode | null,
  nextRoot: PaneNode | null,
  options: ReconcileOptions = {}
): ReconcileOperation[] => {
  const previousLeaves = indexLeaves(previousRoot);
  const nextLeaves = indexLeaves(nextRoot);

  const destroys: ReconcileOperation[] = [];
  const creates: ReconcileOperation[] = [];
  const moves: ReconcileOperation[] = [];
  const updates: ReconcileOperation[] = [];

  previousLeaves.forEach((leaf, paneId) => {
    if (!nextLeaves.has(paneId)) {
      destroys.push({ type: "destroy", paneId: leaf.paneId });
    }
  });

  nextLeaves.forEach((leaf, paneId) => {
    const previous = previousLeaves.get(paneId);
    if (!previous) {
      creates.push({ type: "create", paneId, widgetId: leaf.widgetId });
    } else if (previous.widgetId !== leaf.widgetId) {
      creates.push({ type: "replaceWidget", paneId, widgetId: leaf.widgetId });
    }
  });

  if (options.bounds) {
    const nextGeometry = calculateLayout(nextRoot, options.bounds, options.layout);
    const previousGeometry: LayoutGeometry = calculateLayout(
      previousRoot,
      options.previousBounds ?? options.bounds,
      options.layout
    );

    nextGeometry.panes.forEach((rect, paneId) => {
      const before = previousLeaves.has(paneId) ? previousGeometry.panes.get(paneId) : undefined;
      if (!before) {
        updates.push({ type: "updateRect", paneId, rect });
        return;
      }
      if (before.x !== rect.x || before.y !== rect.y) {
        moves.push({ type: "move", paneId, rect });
      }
      if (!rectsEqual(before, rect)) {
        updates.push({ type: "updateRect", paneId, rect });
      }
    });
  }

  return [...destroys, ...creates, ...moves, ...updates];
};

/** Reconciles two layout snapshots. Focus and maximize never produce operations. */
export const reconcile = (
  previous: LayoutTree,
  next: LayoutTree,
  options: ReconcileOptions = {}
): ReconcileOperation[] => reconcileRoots(previous.root, next.root, options);
