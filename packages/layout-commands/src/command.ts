/**
 * Commands are the only sanctioned way to change a layout that should be undoable. Each command
 * records, while executing, exactly the state its undo needs, so it can be replayed after an
 * undo without consulting anything but the model.
 */
import { LayoutEngineError, err, type LayoutResult, type PaneModel } from "@multisplit/layout-core";

export type CommandKind =
  | "split"
  | "insert-pane"
  | "replace-pane"
  | "remove"
  | "set-ratios"
  | "set-constraints"
  | "set-focus"
  | "toggle-maximize"
  | "transaction";

export interface LayoutCommand {
  readonly kind: CommandKind;
  execute(model: PaneModel): LayoutResult<void>;
  undo(model: PaneModel): LayoutResult<void>;
  canMerge(other: LayoutCommand): boolean;
  /** Folds `other` (already executed) into this command so both undo as one step. */
  merge(other: LayoutCommand): void;
  description(): string;
}

/**
 * Runs `action` as one model batch: its mutations settle with a single round of signals, and a
 * failure discards them when no outer batch is open.
 */
export const runBatched = (model: PaneModel, action: () => LayoutResult<void>): LayoutResult<void> => {
  model.beginBatch();
  let result: LayoutResult<void> = err({ type: "command-state", message: "Command did not run" });
  try {
    result = action();
  } finally {
    model.endBatch(result.ok ? "commit" : "discard");
  }
  return result;
};

export abstract class BaseLayoutCommand implements LayoutCommand {
  abstract readonly kind: CommandKind;
  private executed = false;

  execute(model: PaneModel): LayoutResult<void> {
    if (this.executed) {
      return err({ type: "command-state", message: `${this.description()} has already been executed` });
    }
    const result = runBatched(model, () => this.apply(model));
    if (result.ok) {
      this.executed = true;
    }
    return result;
  }

  undo(model: PaneModel): LayoutResult<void> {
    if (!this.executed) {
      return err({ type: "command-state", message: `${this.description()} has not been executed` });
    }
    const result = runBatched(model, () => this.revert(model));
    if (result.ok) {
      this.executed = false;
    }
    return result;
  }

  isExecuted(): boolean {
    return this.executed;
  }

  /** For commands assembled from parts that have already run, such as a committed transaction. */
  protected markExecuted(): void {
    this.executed = true;
  }

  canMerge(_other: LayoutCommand): boolean {
    return false;
  }

  merge(other: LayoutCommand): void {
    throw new LayoutEngineError(`${this.description()} cannot absorb ${other.description()}`);
  }

  abstract description(): string;

  protected abstract apply(model: PaneModel): LayoutResult<void>;

  protected abstract revert(model: PaneModel): LayoutResult<void>;
}
