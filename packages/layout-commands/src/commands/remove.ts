import {
  ok,
  type FocusState,
  type LayoutResult,
  type PaneId,
  type PaneModel,
  type RemovedLeaf
} from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

export class RemoveCommand extends BaseLayoutCommand {
  readonly kind = "remove";
  private removed: RemovedLeaf | null = null;
  private prior: FocusState | null = null;

  constructor(readonly paneId: PaneId) {
    super();
  }

  description(): string {
    return `Remove ${this.paneId}`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const prior = model.getFocusState();
    const result = model.removeLeaf(this.paneId);
    if (!result.ok) {
      return result;
    }
    this.removed = result.value;
    this.prior = prior;
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    if (this.removed === null || this.prior === null) {
      return ok(undefined);
    }
    const restored = model.restoreLeaf(this.removed);
    if (!restored.ok) {
      return restored;
    }
    return model.restoreFocusState(this.prior);
  }
}
