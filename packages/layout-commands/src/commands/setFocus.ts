import { ok, type FocusState, type LayoutResult, type PaneId, type PaneModel } from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

/** Moves focus. Leaving a maximized pane follows the model's maximize focus policy. */
export class SetFocusCommand extends BaseLayoutCommand {
  readonly kind = "set-focus";
  private prior: FocusState | null = null;

  constructor(readonly paneId: PaneId) {
    super();
  }

  description(): string {
    return `Focus ${this.paneId}`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const prior = model.getFocusState();
    const result = model.setFocus(this.paneId);
    if (!result.ok) {
      return result;
    }
    this.prior = prior;
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    return this.prior === null ? ok(undefined) : model.restoreFocusState(this.prior);
  }
}
