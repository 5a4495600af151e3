import { describe, expect, it } from "vitest";

import type { EngineConfigOverrides } from "../../config";
import type { LayoutResult } from "../../errors";
import { createSequentialIdGenerator } from "../../ids";
import type { LayoutTree } from "../../types";
import { createLeaf } from "../../tree/nodes";
import { createPaneModel, type PaneModel } from "../paneModel";

const unwrap = <T>(result: LayoutResult<T>): T => {
  if (!result.ok) {
    throw new Error(`expected ok result, received ${result.error.type}`);
  }
  return result.value;
};

const recordSignals = (model: PaneModel): string[] => {
  const events: string[] = [];
  model.signals.on("aboutToChange", () => events.push("aboutToChange"));
  model.signals.on("changed", () => events.push("changed"));
  model.signals.on("layoutChanged", () => events.push("layoutChanged"));
  model.signals.on("nodeChanged", (paneId) => events.push(`nodeChanged:${paneId}`));
  model.signals.on("maximizeChanged", (paneId) => events.push(`maximizeChanged:${paneId ?? "none"}`));
  return events;
};

/** pane-1 | pane-2 | pane-3 side by side, focus on pane-1. */
const createThreePaneModel = (config?: EngineConfigOverrides): PaneModel => {
  const model = createPaneModel({ ids: createSequentialIdGenerator(), config });
  unwrap(model.initialize("editor"));
  unwrap(model.insertSplit({ targetPaneId: "pane-1", orientation: "horizontal", widgetId: "terminal" }));
  unwrap(model.insertSplit({ targetPaneId: "pane-2", orientation: "horizontal", widgetId: "preview" }));
  return model;
};

describe("pane model", () => {
  it("creates the first leaf and focuses it", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    const events = recordSignals(model);

    expect(unwrap(model.initialize("editor"))).toBe("pane-1");
    expect(model.getTree()).toEqual({
      root: { type: "leaf", paneId: "pane-1", widgetId: "editor" },
      focusedPaneId: "pane-1",
      maximizedPaneId: null
    });
    expect(events).toEqual(["aboutToChange", "changed", "layoutChanged", "nodeChanged:pane-1"]);
  });

  it("refuses to initialise twice", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));

    const result = model.initialize("terminal");

    expect(result.ok).toBe(false);
    expect(model.getPaneIds()).toEqual(["pane-1"]);
  });

  it("splits a leaf and announces the change in order", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));
    const events = recordSignals(model);

    const outcome = unwrap(
      model.insertSplit({ targetPaneId: "pane-1", orientation: "vertical", widgetId: "terminal" })
    );

    expect(outcome).toEqual({ paneId: "pane-2", nodeId: "split-1" });
    expect(model.getRoot()).toEqual({
      type: "split",
      nodeId: "split-1",
      orientation: "vertical",
      ratios: [0.5, 0.5],
      children: [
        { type: "leaf", paneId: "pane-1", widgetId: "editor" },
        { type: "leaf", paneId: "pane-2", widgetId: "terminal" }
      ]
    });
    expect(model.getFocusedPaneId()).toBe("pane-1");
    expect(events).toEqual(["aboutToChange", "changed", "layoutChanged"]);
  });

  it("maps positions onto orientation and placement", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));

    unwrap(model.splitPane("pane-1", "top", "terminal", 0.25));

    expect(model.getRoot()).toEqual({
      type: "split",
      nodeId: "split-1",
      orientation: "vertical",
      ratios: [0.25, 0.75],
      children: [
        { type: "leaf", paneId: "pane-2", widgetId: "terminal" },
        { type: "leaf", paneId: "pane-1", widgetId: "editor" }
      ]
    });
  });

  it("emits nothing when an operation fails", () => {
    const model = createThreePaneModel();
    const before = model.getTree();
    const events = recordSignals(model);

    expect(model.insertSplit({ targetPaneId: "ghost", orientation: "vertical", widgetId: "x" })).toEqual({
      ok: false,
      error: { type: "pane-not-found", paneId: "ghost" }
    });
    expect(model.setRatios("split-1", [0.9, 0.9]).ok).toBe(false);
    expect(model.getTree()).toBe(before);
    expect(events).toEqual([]);
  });

  it("rejects removing the last pane and leaves the tree alone", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));
    const before = model.getTree();

    expect(model.removeLeaf("pane-1")).toEqual({
      ok: false,
      error: { type: "last-pane", paneId: "pane-1" }
    });
    expect(model.getTree()).toBe(before);
  });

  it("moves focus to the previous leaf when the focused pane is removed", () => {
    const model = createThreePaneModel();
    unwrap(model.setFocus("pane-3"));
    const events = recordSignals(model);

    unwrap(model.removeLeaf("pane-3"));

    expect(model.getFocusedPaneId()).toBe("pane-2");
    expect(events).toEqual(["aboutToChange", "changed", "layoutChanged", "nodeChanged:pane-2"]);
  });

  it("moves focus to the next leaf when the first pane is removed", () => {
    const model = createThreePaneModel();

    unwrap(model.removeLeaf("pane-1"));

    expect(model.getFocusedPaneId()).toBe("pane-2");
    expect(model.getPaneIds()).toEqual(["pane-2", "pane-3"]);
  });

  it("keeps focus when another pane is removed", () => {
    const model = createThreePaneModel();

    unwrap(model.removeLeaf("pane-2"));

    expect(model.getFocusedPaneId()).toBe("pane-1");
  });

  it("returns the previous ratios from setRatios", () => {
    const model = createThreePaneModel();

    expect(unwrap(model.setRatios("split-1", [0.3, 0.7]))).toEqual([0.5, 0.5]);
    expect(model.getSplit("split-1")?.ratios).toEqual([0.3, 0.7]);
  });

  it("treats focusing the focused pane as a no-op", () => {
    const model = createThreePaneModel();
    const before = model.getTree();
    const events = recordSignals(model);

    expect(model.setFocus("pane-1")).toEqual({ ok: true, value: undefined });
    expect(model.getTree()).toBe(before);
    expect(events).toEqual([]);
  });

  it("rejects an invalid replacement tree without touching state", () => {
    const model = createThreePaneModel();
    const before = model.getTree();
    const invalid: LayoutTree = {
      root: {
        type: "split",
        nodeId: "dup",
        orientation: "horizontal",
        ratios: [0.5, 0.5],
        children: [createLeaf("same", "a"), createLeaf("same", "b")]
      },
      focusedPaneId: null,
      maximizedPaneId: null
    };

    const result = model.replaceTree(invalid);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe("invalid-structure");
    }
    expect(model.getTree()).toBe(before);
  });

  it("tears down to an empty tree", () => {
    const model = createThreePaneModel();

    model.teardown();

    expect(model.isEmpty()).toBe(true);
    expect(model.getTree()).toEqual({ root: null, focusedPaneId: null, maximizedPaneId: null });
  });
});

describe("pane placement", () => {
  const createTwoPaneModel = (): PaneModel => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));
    unwrap(model.insertSplit({ targetPaneId: "pane-1", orientation: "horizontal", widgetId: "terminal" }));
    return model;
  };

  it("inserts a sibling into the parent split and evens its ratios", () => {
    const model = createTwoPaneModel();

    const outcome = unwrap(model.insertPane({ targetPaneId: "pane-1", widgetId: "preview", placement: "after" }));

    expect(outcome).toEqual({ paneId: "pane-3", nodeId: "split-1", previousRatios: [0.5, 0.5] });
    expect(model.getRoot()).toEqual({
      type: "split",
      nodeId: "split-1",
      orientation: "horizontal",
      ratios: [1 / 3, 1 / 3, 1 / 3],
      children: [
        { type: "leaf", paneId: "pane-1", widgetId: "editor" },
        { type: "leaf", paneId: "pane-3", widgetId: "preview" },
        { type: "leaf", paneId: "pane-2", widgetId: "terminal" }
      ]
    });
    expect(model.getFocusedPaneId()).toBe("pane-1");
  });

  it("refuses a sibling for a pane with no parent split", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));
    const events = recordSignals(model);

    expect(model.splitPane("pane-1", "before", "terminal")).toEqual({
      ok: false,
      error: { type: "no-parent-split", paneId: "pane-1" }
    });
    expect(events).toEqual([]);
  });

  it("moves focus onto the leaf that replaces the focused one", () => {
    const model = createTwoPaneModel();

    const replaced = unwrap(model.replaceLeaf("pane-1", createLeaf("fresh", "preview")));

    expect(replaced).toEqual({ type: "leaf", paneId: "pane-1", widgetId: "editor" });
    expect(model.getPaneIds()).toEqual(["fresh", "pane-2"]);
    expect(model.getFocusedPaneId()).toBe("fresh");
  });

  it("replaces a root leaf through splitPane", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));

    expect(unwrap(model.splitPane("pane-1", "replace", "terminal"))).toBe("pane-2");
    expect(model.getTree()).toEqual({
      root: { type: "leaf", paneId: "pane-2", widgetId: "terminal" },
      focusedPaneId: "pane-2",
      maximizedPaneId: null
    });
  });
});

describe("size constraints", () => {
  const limits = { minWidth: 100, minHeight: 0, maxWidth: 400, maxHeight: null };

  it("stores constraints on the leaf and returns the previous ones", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));

    expect(unwrap(model.setConstraints("pane-1", limits))).toBeNull();
    expect(model.getRoot()).toEqual({ type: "leaf", paneId: "pane-1", widgetId: "editor", constraints: limits });
    expect(unwrap(model.setConstraints("pane-1", null))).toEqual(limits);
    expect(model.getRoot()).toEqual({ type: "leaf", paneId: "pane-1", widgetId: "editor" });
  });

  it("rejects unusable constraints without announcing anything", () => {
    const model = createPaneModel({ ids: createSequentialIdGenerator() });
    unwrap(model.initialize("editor"));
    const before = model.getTree();
    const events = recordSignals(model);

    expect(model.setConstraints("pane-1", { ...limits, minWidth: -1 })).toEqual({
      ok: false,
      error: {
        type: "invalid-constraints",
        paneId: "pane-1",
        reason: "minimum sizes must be non-negative numbers"
      }
    });
    expect(model.getTree()).toBe(before);
    expect(events).toEqual([]);
  });
});

describe("maximize state", () => {
  it("maximizes and focuses a pane, then toggles back", () => {
    const model = createThreePaneModel();
    const events = recordSignals(model);

    expect(unwrap(model.toggleMaximize("pane-2"))).toBe("pane-2");
    expect(model.getFocusState()).toEqual({ focusedPaneId: "pane-2", maximizedPaneId: "pane-2" });
    expect(unwrap(model.toggleMaximize("pane-2"))).toBeNull();
    expect(model.isMaximized()).toBe(false);
    expect(events).toEqual([
      "aboutToChange",
      "changed",
      "layoutChanged",
      "nodeChanged:pane-2",
      "maximizeChanged:pane-2",
      "aboutToChange",
      "changed",
      "layoutChanged",
      "maximizeChanged:none"
    ]);
  });

  it("refuses to maximize a second pane", () => {
    const model = createThreePaneModel();
    unwrap(model.toggleMaximize("pane-2"));

    expect(model.toggleMaximize("pane-3")).toEqual({
      ok: false,
      error: { type: "maximize-conflict", paneId: "pane-3", maximizedPaneId: "pane-2" }
    });
  });

  it("restores the layout when focus moves away under auto-restore", () => {
    const model = createThreePaneModel();
    unwrap(model.toggleMaximize("pane-2"));

    unwrap(model.setFocus("pane-3"));

    expect(model.getFocusState()).toEqual({ focusedPaneId: "pane-3", maximizedPaneId: null });
  });

  it("locks focus to the maximized pane under the lock policy", () => {
    const model = createThreePaneModel({ maximizeFocusPolicy: "lock" });
    unwrap(model.toggleMaximize("pane-2"));

    expect(model.setFocus("pane-3")).toEqual({
      ok: false,
      error: { type: "focus-locked", paneId: "pane-3", maximizedPaneId: "pane-2" }
    });
    expect(model.getFocusState()).toEqual({ focusedPaneId: "pane-2", maximizedPaneId: "pane-2" });
  });

  it("clears maximize when the maximized pane is removed", () => {
    const model = createThreePaneModel();
    unwrap(model.toggleMaximize("pane-3"));

    unwrap(model.removeLeaf("pane-3"));

    expect(model.getFocusState()).toEqual({ focusedPaneId: "pane-2", maximizedPaneId: null });
  });
});

describe("batches", () => {
  it("announces once at the outermost commit", () => {
    const model = createThreePaneModel();
    const events = recordSignals(model);

    model.beginBatch();
    model.beginBatch();
    unwrap(model.setRatios("split-1", [0.4, 0.6]));
    model.endBatch("commit");
    unwrap(model.setFocus("pane-3"));
    expect(events).toEqual(["aboutToChange"]);
    model.endBatch("commit");

    expect(model.isBatching()).toBe(false);
    expect(events).toEqual(["aboutToChange", "changed", "layoutChanged", "nodeChanged:pane-3"]);
  });

  it("puts the starting tree back when discarded", () => {
    const model = createThreePaneModel();
    const before = model.getTree();
    const events = recordSignals(model);

    model.beginBatch();
    unwrap(model.removeLeaf("pane-2"));
    model.endBatch("discard");

    expect(model.getTree()).toBe(before);
    expect(events).toEqual(["aboutToChange"]);
  });

  it("stays silent when a batch changes nothing", () => {
    const model = createThreePaneModel();
    const events = recordSignals(model);

    model.beginBatch();
    model.endBatch("commit");

    expect(events).toEqual([]);
  });
});
