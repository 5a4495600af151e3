import {
  ok,
  type FocusState,
  type LayoutResult,
  type LeafNode,
  type PaneId,
  type PaneModel,
  type WidgetId
} from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

/** Swaps a pane for a new one showing `widgetId`. Focus and maximize move to the new pane. */
export class ReplacePaneCommand extends BaseLayoutCommand {
  readonly kind = "replace-pane";
  private createdPaneId: PaneId | null = null;
  private replaced: LeafNode | null = null;
  private prior: FocusState | null = null;

  constructor(readonly targetPaneId: PaneId, readonly widgetId: WidgetId) {
    super();
  }

  get paneId(): PaneId | null {
    return this.createdPaneId;
  }

  description(): string {
    return `Replace ${this.targetPaneId}`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const prior = model.getFocusState();
    const result = model.replacePane({
      targetPaneId: this.targetPaneId,
      widgetId: this.widgetId,
      paneId: this.createdPaneId ?? undefined
    });
    if (!result.ok) {
      return result;
    }
    this.createdPaneId = result.value.paneId;
    this.replaced = result.value.replaced;
    this.prior = prior;
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    if (this.createdPaneId === null || this.replaced === null || this.prior === null) {
      return ok(undefined);
    }
    const restored = model.replaceLeaf(this.createdPaneId, this.replaced);
    if (!restored.ok) {
      return restored;
    }
    return model.restoreFocusState(this.prior);
  }
}
