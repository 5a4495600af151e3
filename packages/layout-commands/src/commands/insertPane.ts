import {
  err,
  ok,
  paneNotFound,
  type FocusState,
  type LayoutResult,
  type NodeId,
  type PaneId,
  type PaneModel,
  type SplitPlacement,
  type WidgetId
} from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

interface InsertedPane {
  readonly nodeId: NodeId;
  readonly previousRatios: readonly number[];
  readonly prior: FocusState;
}

/**
 * Adds a pane beside the target inside the target's own split; every child of that split then
 * shares it equally. Like a split, it restores a maximized layout first.
 */
export class InsertPaneCommand extends BaseLayoutCommand {
  readonly kind = "insert-pane";
  private createdPaneId: PaneId | null = null;
  private inserted: InsertedPane | null = null;

  constructor(
    readonly targetPaneId: PaneId,
    readonly widgetId: WidgetId,
    readonly placement: SplitPlacement
  ) {
    super();
  }

  get paneId(): PaneId | null {
    return this.createdPaneId;
  }

  description(): string {
    return `Insert pane ${this.placement} ${this.targetPaneId}`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    if (!model.getLeaf(this.targetPaneId)) {
      return paneNotFound(this.targetPaneId);
    }
    if (model.getRoot()?.type === "leaf") {
      return err({ type: "no-parent-split", paneId: this.targetPaneId });
    }
    const prior = model.getFocusState();
    if (prior.maximizedPaneId !== null) {
      const restored = model.setMaximized(null);
      if (!restored.ok) {
        return restored;
      }
    }

    const result = model.insertPane({
      targetPaneId: this.targetPaneId,
      widgetId: this.widgetId,
      placement: this.placement,
      paneId: this.createdPaneId ?? undefined
    });
    if (!result.ok) {
      const restored = model.restoreFocusState(prior);
      return restored.ok ? result : restored;
    }

    this.createdPaneId = result.value.paneId;
    this.inserted = { nodeId: result.value.nodeId, previousRatios: result.value.previousRatios, prior };
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    if (this.createdPaneId === null || this.inserted === null) {
      return ok(undefined);
    }
    // The receiving split held at least two panes before the insert, so removal never collapses it.
    const removed = model.removeLeaf(this.createdPaneId);
    if (!removed.ok) {
      return removed;
    }
    const ratios = model.setRatios(this.inserted.nodeId, this.inserted.previousRatios);
    if (!ratios.ok) {
      return ratios;
    }
    return model.restoreFocusState(this.inserted.prior);
  }
}
