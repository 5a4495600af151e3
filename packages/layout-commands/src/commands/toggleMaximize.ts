import { err, ok, type FocusState, type LayoutResult, type PaneId, type PaneModel } from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

export class ToggleMaximizeCommand extends BaseLayoutCommand {
  readonly kind = "toggle-maximize";
  private target: PaneId | null;
  private prior: FocusState | null = null;

  /** Without a pane the command acts on whichever pane has focus when it first executes. */
  constructor(paneId?: PaneId) {
    super();
    this.target = paneId ?? null;
  }

  get paneId(): PaneId | null {
    return this.target;
  }

  description(): string {
    return this.target === null ? "Toggle maximize" : `Toggle maximize ${this.target}`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const target = this.target ?? model.getFocusedPaneId();
    if (target === null) {
      return err({ type: "command-state", message: "No focused pane to maximize" });
    }
    const prior = model.getFocusState();
    const result = model.toggleMaximize(target);
    if (!result.ok) {
      return result;
    }
    this.target = target;
    this.prior = prior;
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    return this.prior === null ? ok(undefined) : model.restoreFocusState(this.prior);
  }
}
