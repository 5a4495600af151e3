/**
 * Transactions group several commands into one atomic, single-undo-step change. While one is open
 * the model batches its signals; a failure in any command, or an exception thrown by one, undoes
 * the ones before it.
 */
import {
  TransactionError,
  err,
  ok,
  type LayoutError,
  type LayoutResult,
  type PaneModel
} from "@multisplit/layout-core";

import { BaseLayoutCommand, type LayoutCommand } from "./command";

export type TransactionStatus = "open" | "committed" | "rolled-back" | "failed";

export interface Transaction {
  readonly description: string;
  status(): TransactionStatus;
  /** Commands already executed in this transaction, oldest first. */
  commands(): readonly LayoutCommand[];
  execute(command: LayoutCommand): LayoutResult<void>;
  commit(): LayoutResult<void>;
  rollback(): void;
}

export interface TransactionHooks {
  onCommit(command: TransactionCommand): void;
  onAbort(status: "rolled-back" | "failed", error: LayoutError | null): void;
}

/**
 * Undoes `commands` newest first. Returns the first error met; the remaining commands are still
 * attempted so as much state as possible is put back.
 */
const undoAll = (model: PaneModel, commands: readonly LayoutCommand[]): LayoutError | null => {
  let failure: LayoutError | null = null;
  for (let index = commands.length - 1; index >= 0; index -= 1) {
    const result = commands[index].undo(model);
    if (!result.ok && failure === null) {
      failure = result.error;
    }
  }
  return failure;
};

/** A committed transaction as it sits on the undo stack. */
export class TransactionCommand extends BaseLayoutCommand {
  readonly kind = "transaction";

  constructor(
    private readonly label: string,
    private readonly parts: readonly LayoutCommand[],
    alreadyExecuted = false
  ) {
    super();
    if (alreadyExecuted) {
      this.markExecuted();
    }
  }

  get size(): number {
    return this.parts.length;
  }

  description(): string {
    return this.label;
  }

  protected apply(model: PaneModel): LayoutResult<void> {
    const done: LayoutCommand[] = [];
    for (const command of this.parts) {
      const result = command.execute(model);
      if (!result.ok) {
        undoAll(model, done);
        return result;
      }
      done.push(command);
    }
    return ok(undefined);
  }

  protected revert(model: PaneModel): LayoutResult<void> {
    const failure = undoAll(model, this.parts);
    return failure === null ? ok(undefined) : err(failure);
  }
}

export const createTransaction = (
  model: PaneModel,
  description: string,
  hooks: TransactionHooks
): Transaction => {
  const executed: LayoutCommand[] = [];
  let status: TransactionStatus = "open";

  model.beginBatch();

  const assertOpen = (action: string) => {
    if (status !== "open") {
      throw new TransactionError(`Cannot ${action} transaction "${description}": it is ${status}`);
    }
  };

  const abort = (nextStatus: "rolled-back" | "failed", error: LayoutError | null) => {
    undoAll(model, executed);
    executed.length = 0;
    status = nextStatus;
    model.endBatch("discard");
    hooks.onAbort(nextStatus, error);
  };

  const execute = (command: LayoutCommand): LayoutResult<void> => {
    assertOpen("execute in");
    let completed = false;
    try {
      const result = command.execute(model);
      completed = true;
      if (!result.ok) {
        abort("failed", result.error);
        return result;
      }
      executed.push(command);
      return ok(undefined);
    } finally {
      if (!completed) {
        abort("failed", { type: "command-state", message: `${command.description()} threw` });
      }
    }
  };

  const commit = (): LayoutResult<void> => {
    assertOpen("commit");
    status = "committed";
    model.endBatch("commit");
    hooks.onCommit(new TransactionCommand(description, [...executed], true));
    return ok(undefined);
  };

  const rollback = (): void => {
    assertOpen("roll back");
    abort("rolled-back", null);
  };

  return {
    description,
    status: () => status,
    commands: () => [...executed],
    execute,
    commit,
    rollback
  };
};
