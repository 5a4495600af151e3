import { describe, expect, it } from "vitest";

import type { PaneNode } from "../../types";
import { createLeaf } from "../../tree/nodes";
import { calculateLayout } from "../calculate";
import { findAdjacentPane, nextPaneId, previousPaneId } from "../navigation";

// A fills the left half; B sits above C on the right.
const root: PaneNode = {
  type: "split",
  nodeId: "outer",
  orientation: "horizontal",
  ratios: [0.5, 0.5],
  children: [
    createLeaf("A", "editor"),
    {
      type: "split",
      nodeId: "right",
      orientation: "vertical",
      ratios: [0.5, 0.5],
      children: [createLeaf("B", "terminal"), createLeaf("C", "preview")]
    }
  ]
};

const geometry = calculateLayout(root, { x: 0, y: 0, width: 1000, height: 800 });

describe("findAdjacentPane", () => {
  it("prefers the neighbour aligned with the source", () => {
    expect(findAdjacentPane(geometry, "A", "right")).toBe("B");
  });

  it("moves across and along splits", () => {
    expect(findAdjacentPane(geometry, "C", "left")).toBe("A");
    expect(findAdjacentPane(geometry, "B", "down")).toBe("C");
    expect(findAdjacentPane(geometry, "C", "up")).toBe("B");
  });

  it("returns null at the edge of the layout", () => {
    expect(findAdjacentPane(geometry, "A", "left")).toBeNull();
    expect(findAdjacentPane(geometry, "B", "up")).toBeNull();
    expect(findAdjacentPane(geometry, "missing", "up")).toBeNull();
  });
});

describe("pane cycling", () => {
  it("walks leaves in document order and wraps", () => {
    expect(nextPaneId(root, "A")).toBe("B");
    expect(nextPaneId(root, "C")).toBe("A");
    expect(previousPaneId(root, "A")).toBe("C");
  });

  it("starts from the first leaf without a current pane", () => {
    expect(nextPaneId(root, null)).toBe("A");
    expect(previousPaneId(null, "A")).toBeNull();
  });
});
