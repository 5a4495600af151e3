export { BaseLayoutCommand, runBatched, type CommandKind, type LayoutCommand } from "./command";
export { SplitCommand, type SplitCommandInput } from "./commands/split";
export { InsertPaneCommand } from "./commands/insertPane";
export { ReplacePaneCommand } from "./commands/replacePane";
export { createPlacementCommand, type PlacementCommand } from "./commands/placement";
export { RemoveCommand } from "./commands/remove";
export { SetRatiosCommand, type SetRatiosOptions } from "./commands/setRatios";
export { SetConstraintsCommand } from "./commands/setConstraints";
export { SetFocusCommand } from "./commands/setFocus";
export { ToggleMaximizeCommand } from "./commands/toggleMaximize";
export {
  TransactionCommand,
  createTransaction,
  type Transaction,
  type TransactionHooks,
  type TransactionStatus
} from "./transaction";
export {
  createLayoutController,
  type ControllerSignalMap,
  type CreateLayoutControllerOptions,
  type HistoryState,
  type LayoutController
} from "./controller";
