/**
 * Identifier utilities for the layout tree. Pane and split ids are ULIDs so they sort by creation
 * time and stay collision-resistant when several trees are built side by side.
 */
import { ulid } from "ulidx";

export type PaneId = string;
export type NodeId = string;
export type WidgetId = string;

/**
 * Produces fresh identifiers. Models accept a custom generator so tests can assert exact ids.
 */
export interface IdGenerator {
  readonly paneId: () => PaneId;
  readonly nodeId: () => NodeId;
}

export const createPaneId = (): PaneId => ulid();

export const createNodeId = (): NodeId => ulid();

export const defaultIdGenerator: IdGenerator = {
  paneId: createPaneId,
  nodeId: createNodeId
};

/**
 * Deterministic generator that hands out `${prefix}1`, `${prefix}2`, ... for panes and splits.
 */
export const createSequentialIdGenerator = (
  panePrefix = "pane-",
  nodePrefix = "split-"
): IdGenerator => {
  let paneCounter = 0;
  let nodeCounter = 0;
  return {
    paneId: () => {
      paneCounter += 1;
      return `${panePrefix}${paneCounter}`;
    },
    nodeId: () => {
      nodeCounter += 1;
      return `${nodePrefix}${nodeCounter}`;
    }
  };
};

export const isSamePane = (a: PaneId | null, b: PaneId | null): boolean => a === b;
