import {
  invalidRatios,
  isValidSplitRatio,
  ok,
  paneNotFound,
  positionToSplit,
  type FocusState,
  type LayoutResult,
  type NodeId,
  type Orientation,
  type PaneId,
  type PaneModel,
  type SplitPlacement,
  type SplitPosition,
  type WidgetId
} from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

export interface SplitCommandInput {
  readonly targetPaneId: PaneId;
  readonly orientation: Orientation;
  readonly widgetId: WidgetId;
  readonly placement?: SplitPlacement;
  /** Share given to the new pane; the model's default split ratio when omitted. */
  readonly ratio?: number;
}

/**
 * Splits a pane in two. A maximized layout is restored first, as part of the same command, so
 * undo brings the maximize back.
 */
export class SplitCommand extends BaseLayoutCommand {
  readonly kind = "split";
  private createdPaneId: PaneId | null = null;
  private createdNodeId: NodeId | null = null;
  private prior: FocusState | null = null;

  constructor(private readonly input: SplitCommandInput) {
    super();
  }

  static fromPosition(targetPaneId: PaneId, position: SplitPosition, widgetId: WidgetId, ratio?: number): SplitCommand {
    const { orientation, placement } = positionToSplit(position);
    return new SplitCommand({ targetPaneId, orientation, placement, widgetId, ratio });
  }

  /** The pane created by the last successful execution. Stable across undo and redo. */
  get paneId(): PaneId | null {
    return this.createdPaneId;
  }

  get nodeId(): NodeId | null {
    return this.createdNodeId;
  }

  description(): string {
    return `Split ${this.input.targetPaneId} ${this.input.orientation}ly`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const { targetPaneId } = this.input;
    if (!model.getLeaf(targetPaneId)) {
      return paneNotFound(targetPaneId);
    }
    const ratio = this.input.ratio ?? model.config.defaultSplitRatio;
    if (!isValidSplitRatio(ratio)) {
      return invalidRatios([ratio], "split ratio must lie strictly between 0 and 1");
    }

    const prior = model.getFocusState();
    if (prior.maximizedPaneId !== null) {
      const restored = model.setMaximized(null);
      if (!restored.ok) {
        return restored;
      }
    }

    const result = model.insertSplit({
      targetPaneId,
      orientation: this.input.orientation,
      placement: this.input.placement,
      widgetId: this.input.widgetId,
      ratio,
      paneId: this.createdPaneId ?? undefined,
      nodeId: this.createdNodeId ?? undefined
    });
    if (!result.ok) {
      const restored = model.restoreFocusState(prior);
      return restored.ok ? result : restored;
    }

    this.createdPaneId = result.value.paneId;
    this.createdNodeId = result.value.nodeId;
    this.prior = prior;
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    if (this.createdPaneId === null || this.prior === null) {
      return ok(undefined);
    }
    const removed = model.removeLeaf(this.createdPaneId);
    if (!removed.ok) {
      return removed;
    }
    return model.restoreFocusState(this.prior);
  }
}
