import type { PaneId } from "../ids";
import type { Direction, PaneNode, Rect } from "../types";
import { collectPaneIds } from "../tree/nodes";
import type { LayoutGeometry } from "./calculate";

interface Candidate {
  readonly paneId: PaneId;
  readonly order: number;
  readonly distance: number;
  readonly overlap: number;
  readonly offset: number;
}

const overlapLength = (startA: number, endA: number, startB: number, endB: number): number =>
  Math.min(endA, endB) - Math.max(startA, startB);

const measure = (source: Rect, target: Rect, direction: Direction) => {
  const horizontal = direction === "left" || direction === "right";
  const overlap = horizontal
    ? overlapLength(source.y, source.y + source.height, target.y, target.y + target.height)
    : overlapLength(source.x, source.x + source.width, target.x, target.x + target.width);
  const offset = horizontal ? Math.abs(target.y - source.y) : Math.abs(target.x - source.x);

  switch (direction) {
    case "left":
      return { distance: source.x - (target.x + target.width), overlap, offset };
    case "right":
      return { distance: target.x - (source.x + source.width), overlap, offset };
    case "up":
      return { distance: source.y - (target.y + target.height), overlap, offset };
    case "down":
      return { distance: target.y - (source.y + source.height), overlap, offset };
  }
};

const compareCandidates = (a: Candidate, b: Candidate): number =>
  a.distance - b.distance || b.overlap - a.overlap || a.offset - b.offset || a.order - b.order;

/**
 * Finds the pane that focus should move to from `paneId` in `direction`: the nearest pane beyond
 * the facing edge that shares some span on the cross axis. Returns null at the layout's edge.
 */
export const findAdjacentPane = (
  geometry: LayoutGeometry,
  paneId: PaneId,
  direction: Direction
): PaneId | null => {
  const source = geometry.panes.get(paneId);
  if (!source) {
    return null;
  }

  const candidates: Candidate[] = [];
  let order = 0;
  geometry.panes.forEach((rect, candidateId) => {
    order += 1;
    if (candidateId === paneId) {
      return;
    }
    const { distance, overlap, offset } = measure(source, rect, direction);
    if (distance < 0 || overlap <= 0) {
      return;
    }
    candidates.push({ paneId: candidateId, order, distance, overlap, offset });
  });

  candidates.sort(compareCandidates);
  return candidates[0]?.paneId ?? null;
};

const cycle = (root: PaneNode | null, paneId: PaneId | null, step: 1 | -1): PaneId | null => {
  const paneIds = collectPaneIds(root);
  if (paneIds.length === 0) {
    return null;
  }
  const index = paneId === null ? -1 : paneIds.indexOf(paneId);
  if (index === -1) {
    return paneIds[0];
  }
  return paneIds[(index + step + paneIds.length) % paneIds.length];
};

/** The leaf after `paneId` in document order, wrapping to the first. */
export const nextPaneId = (root: PaneNode | null, paneId: PaneId | null): PaneId | null =>
  cycle(root, paneId, 1);

export const previousPaneId = (root: PaneNode | null, paneId: PaneId | null): PaneId | null =>
  cycle(root, paneId, -1);
