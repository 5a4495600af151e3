import { describe, expect, it } from "vitest";

import {
  LayoutEngineError,
  createPaneModel,
  createSequentialIdGenerator,
  sizeConstraints,
  type LayoutResult,
  type PaneModel
} from "@multisplit/layout-core";

import { InsertPaneCommand } from "../commands/insertPane";
import { createPlacementCommand } from "../commands/placement";
import { RemoveCommand } from "../commands/remove";
import { ReplacePaneCommand } from "../commands/replacePane";
import { SetConstraintsCommand } from "../commands/setConstraints";
import { SetFocusCommand } from "../commands/setFocus";
import { SetRatiosCommand } from "../commands/setRatios";
import { SplitCommand } from "../commands/split";
import { ToggleMaximizeCommand } from "../commands/toggleMaximize";

const unwrap = <T>(result: LayoutResult<T>): T => {
  if (!result.ok) {
    throw new Error(`expected ok result, received ${result.error.type}`);
  }
  return result.value;
};

const createModel = (): PaneModel => {
  const model = createPaneModel({ ids: createSequentialIdGenerator() });
  unwrap(model.initialize("editor"));
  return model;
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

describe("split command", () => {
  it("reuses its pane and split ids when replayed", () => {
    const model = createModel();
    const command = SplitCommand.fromPosition("pane-1", "right", "terminal");

    unwrap(command.execute(model));
    unwrap(command.undo(model));
    unwrap(command.execute(model));

    expect(command.paneId).toBe("pane-2");
    expect(command.nodeId).toBe("split-1");
    expect(model.getPaneIds()).toEqual(["pane-1", "pane-2"]);
    expect(unwrap(model.insertSplit({ targetPaneId: "pane-1", orientation: "vertical", widgetId: "x" })).paneId).toBe(
      "pane-3"
    );
  });

  it("leaves a maximized layout alone when the split is rejected", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    unwrap(model.toggleMaximize("pane-2"));
    const before = model.getTree();

    const result = SplitCommand.fromPosition("pane-1", "left", "preview", 1.2).execute(model);

    expect(result).toEqual({
      ok: false,
      error: {
        type: "invalid-ratios",
        ratios: [1.2],
        reason: "split ratio must lie strictly between 0 and 1"
      }
    });
    expect(model.getTree()).toBe(before);
  });

  it("settles with one signal round when it restores a maximized layout", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    unwrap(model.toggleMaximize("pane-2"));
    const events = recordSignals(model);

    unwrap(SplitCommand.fromPosition("pane-1", "bottom", "preview").execute(model));

    expect(events).toEqual(["aboutToChange", "changed", "layoutChanged", "maximizeChanged:none"]);
  });

  it("describes itself by target and axis", () => {
    expect(SplitCommand.fromPosition("pane-1", "top", "terminal").description()).toBe("Split pane-1 vertically");
  });
});

describe("insert pane command", () => {
  it("adds a sibling with equal shares and undoes back to the old ratios", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    unwrap(model.setRatios("split-1", [0.3, 0.7]));
    const before = model.getTree();
    const command = new InsertPaneCommand("pane-1", "preview", "after");

    unwrap(command.execute(model));
    expect(command.paneId).toBe("pane-3");
    expect(model.getPaneIds()).toEqual(["pane-1", "pane-3", "pane-2"]);
    expect(model.getSplit("split-1")?.ratios).toEqual([1 / 3, 1 / 3, 1 / 3]);

    unwrap(command.undo(model));
    expect(model.getTree()).toEqual(before);
    unwrap(command.execute(model));
    expect(model.getPaneIds()).toEqual(["pane-1", "pane-3", "pane-2"]);
  });

  it("needs a parent split and touches nothing without one", () => {
    const model = createModel();
    unwrap(model.toggleMaximize("pane-1"));
    const before = model.getTree();
    const events = recordSignals(model);

    expect(new InsertPaneCommand("pane-1", "preview", "before").execute(model)).toEqual({
      ok: false,
      error: { type: "no-parent-split", paneId: "pane-1" }
    });
    expect(model.getTree()).toBe(before);
    expect(events).toEqual([]);
  });
});

describe("replace pane command", () => {
  it("moves focus to the new pane and back on undo", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    const before = model.getTree();
    const command = new ReplacePaneCommand("pane-1", "preview");

    unwrap(command.execute(model));
    expect(model.getLeaf("pane-3")).toEqual({ type: "leaf", paneId: "pane-3", widgetId: "preview" });
    expect(model.getLeaf("pane-1")).toBeNull();
    expect(model.getFocusedPaneId()).toBe("pane-3");

    unwrap(command.undo(model));
    expect(model.getTree()).toEqual(before);
  });
});

describe("placement commands", () => {
  it("picks the command for each position", () => {
    expect(createPlacementCommand("pane-1", "left", "x")).toBeInstanceOf(SplitCommand);
    expect(createPlacementCommand("pane-1", "after", "x")).toBeInstanceOf(InsertPaneCommand);
    expect(createPlacementCommand("pane-1", "replace", "x")).toBeInstanceOf(ReplacePaneCommand);
  });
});

describe("set constraints command", () => {
  it("restores the constraints a pane had before", () => {
    const model = createModel();
    const narrow = sizeConstraints({ maxWidth: 120 });
    unwrap(model.setConstraints("pane-1", sizeConstraints({ minWidth: 40 })));
    const command = new SetConstraintsCommand("pane-1", narrow);

    unwrap(command.execute(model));
    expect(model.getLeaf("pane-1")?.constraints).toEqual({
      minWidth: 0,
      minHeight: 0,
      maxWidth: 120,
      maxHeight: null
    });

    unwrap(command.undo(model));
    expect(model.getLeaf("pane-1")?.constraints).toEqual({
      minWidth: 40,
      minHeight: 0,
      maxWidth: null,
      maxHeight: null
    });
  });

  it("clears constraints on undo when the pane had none", () => {
    const model = createModel();
    const command = new SetConstraintsCommand("pane-1", sizeConstraints({ minHeight: 30 }));

    unwrap(command.execute(model));
    unwrap(command.undo(model));

    expect(model.getLeaf("pane-1")).toEqual({ type: "leaf", paneId: "pane-1", widgetId: "editor" });
  });
});

describe("command lifecycle", () => {
  it("refuses to execute twice or undo before executing", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    const command = new SetFocusCommand("pane-2");

    expect(command.undo(model)).toEqual({
      ok: false,
      error: { type: "command-state", message: "Focus pane-2 has not been executed" }
    });
    unwrap(command.execute(model));
    expect(command.execute(model)).toEqual({
      ok: false,
      error: { type: "command-state", message: "Focus pane-2 has already been executed" }
    });
  });

  it("stays unexecuted after a failure", () => {
    const model = createModel();
    const command = new RemoveCommand("pane-1");

    expect(command.execute(model).ok).toBe(false);
    expect(command.isExecuted()).toBe(false);
  });

  it("throws when asked to merge commands that do not merge", () => {
    const remove = new RemoveCommand("pane-1");
    const focus = new SetFocusCommand("pane-1");

    expect(remove.canMerge(focus)).toBe(false);
    expect(() => remove.merge(focus)).toThrow(LayoutEngineError);
  });
});

describe("set ratios command", () => {
  it("merges only continuous steps on the same split", () => {
    const drag = new SetRatiosCommand("split-1", [0.4, 0.6], { continuous: true });

    expect(drag.canMerge(new SetRatiosCommand("split-1", [0.3, 0.7], { continuous: true }))).toBe(true);
    expect(drag.canMerge(new SetRatiosCommand("split-2", [0.3, 0.7], { continuous: true }))).toBe(false);
    expect(drag.canMerge(new SetRatiosCommand("split-1", [0.3, 0.7]))).toBe(false);
  });

  it("keeps the first previous ratios and the last target ratios", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    const first = new SetRatiosCommand("split-1", [0.4, 0.6], { continuous: true });
    const second = new SetRatiosCommand("split-1", [0.2, 0.8], { continuous: true });
    unwrap(first.execute(model));
    unwrap(second.execute(model));

    first.merge(second);

    expect(first.ratios).toEqual([0.2, 0.8]);
    unwrap(first.undo(model));
    expect(model.getSplit("split-1")?.ratios).toEqual([0.5, 0.5]);
  });
});

describe("toggle maximize command", () => {
  it("remembers the pane it resolved from focus", () => {
    const model = createModel();
    unwrap(SplitCommand.fromPosition("pane-1", "right", "terminal").execute(model));
    const command = new ToggleMaximizeCommand();

    unwrap(command.execute(model));
    unwrap(model.setFocus("pane-2"));
    unwrap(command.undo(model));
    unwrap(command.execute(model));

    expect(command.paneId).toBe("pane-1");
    expect(model.getFocusState()).toEqual({ focusedPaneId: "pane-1", maximizedPaneId: "pane-1" });
  });

  it("fails without a focused pane", () => {
    const model = createPaneModel();

    expect(new ToggleMaximizeCommand().execute(model)).toEqual({
      ok: false,
      error: { type: "command-state", message: "No focused pane to maximize" }
    });
  });
});
