/**
 * Ratio-to-pixel conversion. The calculator is pure: a root, the bounds it fills and a few sizing
 * options in, a set of rectangles out.
 *
 * Along a split's axis every child but the last gets `round(ratio * extent)` and the last child
 * takes whatever is left, so the children always tile the extent exactly. Dividers are carved out
 * of the extent before it is partitioned. Per-pane size constraints pin children along the
 * split's axis; the root always fills the bounds it is given.
 */
import type { NodeId, PaneId } from "../ids";
import type { LeafNode, Orientation, PaneNode, Rect, Size } from "../types";

export interface LayoutOptions {
  readonly dividerWidth?: number;
  readonly minimumPaneSize?: Size;
}

export interface DividerRect {
  readonly nodeId: NodeId;
  /** The divider sits between child `index` and child `index + 1`. */
  readonly index: number;
  readonly orientation: Orientation;
  readonly rect: Rect;
}

export interface LayoutGeometry {
  readonly bounds: Rect;
  readonly panes: ReadonlyMap<PaneId, Rect>;
  readonly splits: ReadonlyMap<NodeId, Rect>;
  readonly dividers: readonly DividerRect[];
}

const ZERO_SIZE: Size = { width: 0, height: 0 };

const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

/**
 * Splits `extent` into integer lengths proportional to `ratios`. A child whose share falls below
 * its minimum or above its maximum is pinned to that limit and the rest is shared among the
 * others. When the minimums alone do not fit, every child gets its minimum and the result
 * overflows `extent`; when every child is pinned and space is left over, the last child takes it.
 */
export const partitionExtent = (
  extent: number,
  ratios: readonly number[],
  minimums: readonly number[] = [],
  maximums: readonly number[] = []
): number[] => {
  const count = ratios.length;
  if (count === 0) {
    return [];
  }
  const mins = ratios.map((_, index) => Math.max(0, minimums[index] ?? 0));
  const maxs = ratios.map((_, index) => Math.max(mins[index], maximums[index] ?? Infinity));
  if (sum(mins) >= extent && sum(mins) > 0) {
    return mins;
  }

  const pinned = new Array<number | null>(count).fill(null);
  let sizes: number[] = [];

  for (let pass = 0; pass <= count; pass += 1) {
    const open = ratios.map((_, index) => index).filter((index) => pinned[index] === null);
    if (open.length === 0) {
      break;
    }
    const free = extent - sum(pinned.map((size) => size ?? 0));
    const openRatioSum = sum(open.map((index) => ratios[index]));
    const lastOpen = open[open.length - 1];

    sizes = ratios.map((ratio, index) => {
      const fixed = pinned[index];
      if (fixed !== null) {
        return fixed;
      }
      if (index === lastOpen) {
        return 0;
      }
      const share = open.length === count ? ratio * extent : (ratio / openRatioSum) * free;
      return Math.round(share);
    });
    sizes[lastOpen] = free - sum(open.filter((index) => index !== lastOpen).map((index) => sizes[index]));

    let changed = false;
    for (const index of open) {
      if (sizes[index] < mins[index]) {
        pinned[index] = mins[index];
        changed = true;
      } else if (sizes[index] > maxs[index]) {
        pinned[index] = maxs[index];
        changed = true;
      }
    }
    if (!changed) {
      return sizes;
    }
  }

  sizes = pinned.map((size, index) => size ?? mins[index]);
  sizes[count - 1] += extent - sum(sizes);
  return sizes;
};

const leafLimit = (node: LeafNode, axis: Orientation, bound: "min" | "max"): number => {
  const constraints = node.constraints;
  if (!constraints) {
    return bound === "min" ? 0 : Infinity;
  }
  if (bound === "min") {
    return axis === "horizontal" ? constraints.minWidth : constraints.minHeight;
  }
  return (axis === "horizontal" ? constraints.maxWidth : constraints.maxHeight) ?? Infinity;
};

const minimumExtent = (
  node: PaneNode,
  axis: Orientation,
  minimumPaneSize: Size,
  dividerWidth: number
): number => {
  if (node.type === "leaf") {
    const global = axis === "horizontal" ? minimumPaneSize.width : minimumPaneSize.height;
    return Math.max(global, leafLimit(node, axis, "min"));
  }
  const childMinimums = node.children.map((child) =>
    minimumExtent(child, axis, minimumPaneSize, dividerWidth)
  );
  if (node.orientation === axis) {
    return sum(childMinimums) + dividerWidth * (node.children.length - 1);
  }
  return Math.max(0, ...childMinimums);
};

/** Largest extent a subtree can use along `axis`; `Infinity` when nothing in it is bounded. */
const maximumExtent = (node: PaneNode, axis: Orientation, dividerWidth: number): number => {
  if (node.type === "leaf") {
    return leafLimit(node, axis, "max");
  }
  const childMaximums = node.children.map((child) => maximumExtent(child, axis, dividerWidth));
  if (node.orientation === axis) {
    return sum(childMaximums) + dividerWidth * (node.children.length - 1);
  }
  return Math.min(...childMaximums);
};

export const calculateLayout = (
  root: PaneNode | null,
  bounds: Rect,
  options: LayoutOptions = {}
): LayoutGeometry => {
  const dividerWidth = Math.max(0, options.dividerWidth ?? 0);
  const minimumPaneSize = options.minimumPaneSize ?? ZERO_SIZE;
  const panes = new Map<PaneId, Rect>();
  const splits = new Map<NodeId, Rect>();
  const dividers: DividerRect[] = [];

  const place = (node: PaneNode, rect: Rect) => {
    if (node.type === "leaf") {
      panes.set(node.paneId, rect);
      return;
    }
    splits.set(node.nodeId, rect);

    const horizontal = node.orientation === "horizontal";
    const gaps = dividerWidth * (node.children.length - 1);
    const extent = Math.max(0, (horizontal ? rect.width : rect.height) - gaps);
    const minimums = node.children.map((child) =>
      minimumExtent(child, node.orientation, minimumPaneSize, dividerWidth)
    );
    const maximums = node.children.map((child) => maximumExtent(child, node.orientation, dividerWidth));
    const sizes = partitionExtent(extent, node.ratios, minimums, maximums);

    let offset = horizontal ? rect.x : rect.y;
    node.children.forEach((child, index) => {
      const size = sizes[index];
      const childRect: Rect = horizontal
        ? { x: offset, y: rect.y, width: size, height: rect.height }
        : { x: rect.x, y: offset, width: rect.width, height: size };
      place(child, childRect);
      offset += size;

      if (index < node.children.length - 1) {
        dividers.push({
          nodeId: node.nodeId,
          index,
          orientation: node.orientation,
          rect: horizontal
            ? { x: offset, y: rect.y, width: dividerWidth, height: rect.height }
            : { x: rect.x, y: offset, width: rect.width, height: dividerWidth }
        });
        offset += dividerWidth;
      }
    });
  };

  if (root) {
    place(root, bounds);
  }

  return { bounds, panes, splits, dividers };
};

/** Total area covered by leaf rectangles. Equals the root area minus dividers when nothing overflows. */
export const coveredArea = (geometry: LayoutGeometry): number => {
  let area = 0;
  geometry.panes.forEach((rect) => {
    area += rect.width * rect.height;
  });
  return area;
};
