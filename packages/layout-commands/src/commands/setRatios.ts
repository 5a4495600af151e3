import { ok, type LayoutResult, type NodeId, type PaneModel } from "@multisplit/layout-core";

import { BaseLayoutCommand, type LayoutCommand } from "../command";

export interface SetRatiosOptions {
  /** Marks one step of an ongoing drag. Continuous steps on a split undo together until the drag ends. */
  readonly continuous?: boolean;
}

export class SetRatiosCommand extends BaseLayoutCommand {
  readonly kind = "set-ratios";
  readonly continuous: boolean;
  private nextRatios: readonly number[];
  private previousRatios: readonly number[] | null = null;

  constructor(readonly nodeId: NodeId, ratios: readonly number[], options: SetRatiosOptions = {}) {
    super();
    this.nextRatios = [...ratios];
    this.continuous = options.continuous ?? false;
  }

  get ratios(): readonly number[] {
    return this.nextRatios;
  }

  description(): string {
    return `Resize ${this.nodeId}`;
  }

  canMerge(other: LayoutCommand): boolean {
    return (
      other instanceof SetRatiosCommand
      && other.nodeId === this.nodeId
      && this.continuous
      && other.continuous
    );
  }

  merge(other: LayoutCommand): void {
    if (!(other instanceof SetRatiosCommand) || !this.canMerge(other)) {
      super.merge(other);
      return;
    }
    this.nextRatios = other.ratios;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const result = model.setRatios(this.nodeId, this.nextRatios);
    if (!result.ok) {
      return result;
    }
    // A redo sees the ratios the undo put back, so only the first execution records them.
    this.previousRatios ??= result.value;
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    if (this.previousRatios === null) {
      return ok(undefined);
    }
    const result = model.setRatios(this.nodeId, this.previousRatios);
    return result.ok ? ok(undefined) : result;
  }
}
