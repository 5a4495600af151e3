import { isSplitPosition, type PaneId, type WherePosition, type WidgetId } from "@multisplit/layout-core";

import { InsertPaneCommand } from "./insertPane";
import { ReplacePaneCommand } from "./replacePane";
import { SplitCommand } from "./split";

/** A command that brings a new pane into the layout and reports its id once executed. */
export type PlacementCommand = SplitCommand | InsertPaneCommand | ReplacePaneCommand;

export const createPlacementCommand = (
  targetPaneId: PaneId,
  position: WherePosition,
  widgetId: WidgetId,
  ratio?: number
): PlacementCommand => {
  if (isSplitPosition(position)) {
    return SplitCommand.fromPosition(targetPaneId, position, widgetId, ratio);
  }
  if (position === "replace") {
    return new ReplacePaneCommand(targetPaneId, widgetId);
  }
  return new InsertPaneCommand(targetPaneId, widgetId, position);
};
