/**
 * The layout controller is the single entry point an application drives. It executes commands
 * against the pane model, keeps the undo and redo stacks, and hosts at most one open transaction.
 */
import {
  calculateLayout,
  createNoopLogger,
  createSignalBus,
  describeLayoutError,
  err,
  findAdjacentPane,
  nextPaneId,
  ok,
  previousPaneId,
  TransactionError,
  type Direction,
  type LayoutError,
  type LayoutResult,
  type Logger,
  type NodeId,
  type PaneId,
  type PaneModel,
  type Rect,
  type SignalSubscriber,
  type SizeConstraints,
  type WherePosition,
  type WidgetId
} from "@multisplit/layout-core";

import { runBatched, type LayoutCommand } from "./command";
import { RemoveCommand } from "./commands/remove";
import { SetFocusCommand } from "./commands/setFocus";
import { SetRatiosCommand, type SetRatiosOptions } from "./commands/setRatios";
import { createPlacementCommand } from "./commands/placement";
import { SetConstraintsCommand } from "./commands/setConstraints";
import { ToggleMaximizeCommand } from "./commands/toggleMaximize";
import { createTransaction, type Transaction } from "./transaction";

export interface HistoryState {
  readonly canUndo: boolean;
  readonly canRedo: boolean;
}

export type ControllerSignalMap = {
  commandExecuted: [description: string];
  commandUndone: [description: string];
  commandRedone: [description: string];
  historyChanged: [state: HistoryState];
};

export interface LayoutController {
  readonly model: PaneModel;
  readonly signals: SignalSubscriber<ControllerSignalMap>;
  execute(command: LayoutCommand): LayoutResult<void>;
  undo(): LayoutResult<void>;
  redo(): LayoutResult<void>;
  canUndo(): boolean;
  canRedo(): boolean;
  clearHistory(): void;
  /** Descriptions on the undo stack, oldest first. */
  undoDescriptions(): string[];
  redoDescriptions(): string[];
  beginTransaction(description: string): Transaction;
  runTransaction(description: string, commands: readonly LayoutCommand[]): LayoutResult<void>;
  isInTransaction(): boolean;
  /** Places a new pane showing `widgetId` relative to `paneId` and returns the new pane's id. */
  splitPane(paneId: PaneId, position: WherePosition, widgetId: WidgetId, ratio?: number): LayoutResult<PaneId>;
  removePane(paneId: PaneId): LayoutResult<void>;
  setRatios(nodeId: NodeId, ratios: readonly number[], options?: SetRatiosOptions): LayoutResult<void>;
  /** Ends the current drag: the next continuous resize starts a new undo step. */
  endDrag(): void;
  setConstraints(paneId: PaneId, constraints: SizeConstraints | null): LayoutResult<void>;
  focusPane(paneId: PaneId): LayoutResult<void>;
  /** Moves focus to the neighbour in `direction`; `ok(null)` when there is none. */
  navigateFocus(direction: Direction, bounds: Rect): LayoutResult<PaneId | null>;
  focusNext(): LayoutResult<PaneId | null>;
  focusPrevious(): LayoutResult<PaneId | null>;
  /** Maximizes the focused pane, or restores the layout when it already is. */
  toggleMaximize(): LayoutResult<void>;
}

export interface CreateLayoutControllerOptions {
  readonly logger?: Logger;
  /** Overrides the model's configured undo depth. */
  readonly maxUndoLevels?: number;
}

export const createLayoutController = (
  model: PaneModel,
  options: CreateLayoutControllerOptions = {}
): LayoutController => {
  const logger = options.logger ?? createNoopLogger();
  const maxUndoLevels = options.maxUndoLevels ?? model.config.maxUndoLevels;
  const bus = createSignalBus<ControllerSignalMap>();
  const undoStack: LayoutCommand[] = [];
  const redoStack: LayoutCommand[] = [];
  let activeTransaction: Transaction | null = null;
  // The entry later commands may no longer merge into.
  let sealed: LayoutCommand | null = null;

  const historyState = (): HistoryState => ({
    canUndo: undoStack.length > 0,
    canRedo: redoStack.length > 0
  });

  const emitHistory = () => {
    bus.emit("historyChanged", historyState());
  };

  const reportFailure = (action: string, command: LayoutCommand, error: LayoutError) => {
    const context = { command: command.description(), error: error.type };
    if (error.type === "invalid-structure") {
      logger.error(`${action} produced an invalid tree: ${describeLayoutError(error)}`, context);
      return;
    }
    logger.debug(`${action} failed: ${describeLayoutError(error)}`, context);
  };

  const record = (command: LayoutCommand) => {
    const top = undoStack[undoStack.length - 1];
    if (top && top !== sealed && top.canMerge(command)) {
      top.merge(command);
    } else {
      undoStack.push(command);
      if (undoStack.length > maxUndoLevels) {
        undoStack.splice(0, undoStack.length - maxUndoLevels);
      }
    }
    redoStack.length = 0;
    bus.emit("commandExecuted", command.description());
    emitHistory();
  };

  const sealTop = () => {
    sealed = undoStack[undoStack.length - 1] ?? null;
  };

  const execute = (command: LayoutCommand): LayoutResult<void> => {
    if (activeTransaction) {
      return activeTransaction.execute(command);
    }
    const before = model.getTree();
    const result = runBatched(model, () => command.execute(model));
    if (!result.ok) {
      reportFailure("Command", command, result.error);
      return result;
    }
    logger.debug("Executed command", { command: command.description() });
    if (model.getTree() !== before) {
      record(command);
    }
    return result;
  };

  const transactionBlocked = (action: string): LayoutResult<void> | null =>
    activeTransaction
      ? err({ type: "command-state", message: `Cannot ${action} while transaction "${activeTransaction.description}" is open` })
      : null;

  const undo = (): LayoutResult<void> => {
    const blocked = transactionBlocked("undo");
    if (blocked) {
      return blocked;
    }
    const command = undoStack.pop();
    if (!command) {
      return err({ type: "command-state", message: "Nothing to undo" });
    }
    const result = runBatched(model, () => command.undo(model));
    if (!result.ok) {
      undoStack.push(command);
      reportFailure("Undo", command, result.error);
      return result;
    }
    redoStack.push(command);
    sealTop();
    logger.debug("Undid command", { command: command.description() });
    bus.emit("commandUndone", command.description());
    emitHistory();
    return result;
  };

  const redo = (): LayoutResult<void> => {
    const blocked = transactionBlocked("redo");
    if (blocked) {
      return blocked;
    }
    const command = redoStack.pop();
    if (!command) {
      return err({ type: "command-state", message: "Nothing to redo" });
    }
    const result = runBatched(model, () => command.execute(model));
    if (!result.ok) {
      redoStack.push(command);
      reportFailure("Redo", command, result.error);
      return result;
    }
    undoStack.push(command);
    sealTop();
    logger.debug("Redid command", { command: command.description() });
    bus.emit("commandRedone", command.description());
    emitHistory();
    return result;
  };

  const clearHistory = () => {
    if (undoStack.length === 0 && redoStack.length === 0) {
      return;
    }
    undoStack.length = 0;
    redoStack.length = 0;
    sealed = null;
    emitHistory();
  };

  const beginTransaction = (description: string): Transaction => {
    if (activeTransaction) {
      throw new TransactionError(
        `Cannot begin "${description}" while transaction "${activeTransaction.description}" is open`
      );
    }
    const transaction = createTransaction(model, description, {
      onCommit: (command) => {
        activeTransaction = null;
        logger.debug("Committed transaction", { transaction: description, commands: command.size });
        if (command.size > 0) {
          record(command);
        }
      },
      onAbort: (status, error) => {
        activeTransaction = null;
        logger.warn(`Rolled back transaction "${description}"`, {
          status,
          error: error ? describeLayoutError(error) : null
        });
        if (error?.type === "invalid-structure") {
          logger.error(`Transaction "${description}" produced an invalid tree`, {
            error: describeLayoutError(error)
          });
        }
      }
    });
    activeTransaction = transaction;
    return transaction;
  };

  const runTransaction = (description: string, commands: readonly LayoutCommand[]): LayoutResult<void> => {
    const transaction = beginTransaction(description);
    for (const command of commands) {
      const result = transaction.execute(command);
      if (!result.ok) {
        return result;
      }
    }
    return transaction.commit();
  };

  const splitPane = (
    paneId: PaneId,
    position: WherePosition,
    widgetId: WidgetId,
    ratio?: number
  ): LayoutResult<PaneId> => {
    const command = createPlacementCommand(paneId, position, widgetId, ratio);
    const result = execute(command);
    if (!result.ok) {
      return result;
    }
    return command.paneId === null
      ? err({ type: "command-state", message: "No pane was created" })
      : ok(command.paneId);
  };

  const focusResolved = (target: PaneId | null): LayoutResult<PaneId | null> => {
    if (target === null || target === model.getFocusedPaneId()) {
      return ok(null);
    }
    const result = execute(new SetFocusCommand(target));
    return result.ok ? ok(target) : result;
  };

  const navigateFocus = (direction: Direction, bounds: Rect): LayoutResult<PaneId | null> => {
    const focused = model.getFocusedPaneId();
    if (focused === null) {
      return ok(null);
    }
    const geometry = calculateLayout(model.getRoot(), bounds, {
      dividerWidth: model.config.dividerWidth,
      minimumPaneSize: model.config.minimumPaneSize
    });
    return focusResolved(findAdjacentPane(geometry, focused, direction));
  };

  return {
    model,
    signals: { on: bus.on },
    execute,
    undo,
    redo,
    canUndo: () => undoStack.length > 0,
    canRedo: () => redoStack.length > 0,
    clearHistory,
    undoDescriptions: () => undoStack.map((command) => command.description()),
    redoDescriptions: () => redoStack.map((command) => command.description()),
    beginTransaction,
    runTransaction,
    isInTransaction: () => activeTransaction !== null,
    splitPane,
    removePane: (paneId) => execute(new RemoveCommand(paneId)),
    setRatios: (nodeId, ratios, ratioOptions) => execute(new SetRatiosCommand(nodeId, ratios, ratioOptions)),
    endDrag: sealTop,
    setConstraints: (paneId, constraints) => execute(new SetConstraintsCommand(paneId, constraints)),
    focusPane: (paneId) => execute(new SetFocusCommand(paneId)),
    navigateFocus,
    focusNext: () => focusResolved(nextPaneId(model.getRoot(), model.getFocusedPaneId())),
    focusPrevious: () => focusResolved(previousPaneId(model.getRoot(), model.getFocusedPaneId())),
    toggleMaximize: () => execute(new ToggleMaximizeCommand())
  };
};
