import { ok, type LayoutResult, type PaneId, type PaneModel, type SizeConstraints } from "@multisplit/layout-core";

import { BaseLayoutCommand } from "../command";

export class SetConstraintsCommand extends BaseLayoutCommand {
  readonly kind = "set-constraints";
  private previous: { readonly constraints: SizeConstraints | null } | null = null;

  /** `null` clears the pane's constraints. */
  constructor(readonly paneId: PaneId, readonly constraints: SizeConstraints | null) {
    super();
  }

  description(): string {
    return `Set constraints for ${this.paneId}`;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const result = model.setConstraints(this.paneId, this.constraints);
    if (!result.ok) {
      return result;
    }
    this.previous ??= { constraints: result.value };
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    if (this.previous === null) {
      return ok(undefined);
    }
    const result = model.setConstraints(this.paneId, this.previous.constraints);
    return result.ok ? ok(undefined) : result;
  }
}
