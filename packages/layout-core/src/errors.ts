/**
 * Error contracts for layout operations. Anticipated failures travel as `LayoutResult` values;
 * only programming errors (misused transactions, bad configuration) are thrown.
 */
import type { NodeId, PaneId } from "./ids";

export interface TreeViolation {
  readonly code:
    | "ratio-count"
    | "ratio-non-positive"
    | "ratio-sum"
    | "too-few-children"
    | "duplicate-pane-id"
    | "duplicate-node-id"
    | "empty-pane-id"
    | "focus-missing"
    | "maximized-missing"
    | "invalid-constraints"
    | "malformed";
  readonly message: string;
  readonly path: readonly number[];
}

export type LayoutError =
  | { readonly type: "pane-not-found"; readonly paneId: PaneId | NodeId }
  | { readonly type: "invalid-ratios"; readonly ratios: readonly number[]; readonly reason: string }
  | { readonly type: "last-pane"; readonly paneId: PaneId }
  | { readonly type: "no-parent-split"; readonly paneId: PaneId }
  | { readonly type: "invalid-constraints"; readonly paneId: PaneId; readonly reason: string }
  | { readonly type: "invalid-structure"; readonly violations: readonly TreeViolation[] }
  | { readonly type: "maximize-conflict"; readonly paneId: PaneId; readonly maximizedPaneId: PaneId }
  | { readonly type: "focus-locked"; readonly paneId: PaneId; readonly maximizedPaneId: PaneId }
  | { readonly type: "command-state"; readonly message: string };

export type LayoutResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: LayoutError };

export const ok = <T>(value: T): LayoutResult<T> => ({ ok: true, value });

export const err = <T = never>(error: LayoutError): LayoutResult<T> => ({ ok: false, error });

export const paneNotFound = <T = never>(paneId: PaneId | NodeId): LayoutResult<T> =>
  err({ type: "pane-not-found", paneId });

export const invalidRatios = <T = never>(ratios: readonly number[], reason: string): LayoutResult<T> =>
  err({ type: "invalid-ratios", ratios: [...ratios], reason });

export const describeLayoutError = (error: LayoutError): string => {
  switch (error.type) {
    case "pane-not-found":
      return `Pane not found: ${error.paneId}`;
    case "invalid-ratios":
      return `Invalid ratios [${error.ratios.join(", ")}]: ${error.reason}`;
    case "last-pane":
      return `Cannot remove the last pane: ${error.paneId}`;
    case "no-parent-split":
      return `Pane ${error.paneId} is not inside a split`;
    case "invalid-constraints":
      return `Invalid constraints for pane ${error.paneId}: ${error.reason}`;
    case "invalid-structure":
      return `Invalid tree structure: ${error.violations.map((violation) => violation.message).join("; ")}`;
    case "maximize-conflict":
      return `Pane ${error.paneId} cannot be maximized while ${error.maximizedPaneId} is maximized`;
    case "focus-locked":
      return `Focus is locked to maximized pane ${error.maximizedPaneId}; cannot focus ${error.paneId}`;
    case "command-state":
      return error.message;
  }
};

export class LayoutEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LayoutEngineError";
  }
}

export class TransactionError extends LayoutEngineError {
  constructor(message: string) {
    super(message);
    this.name = "TransactionError";
  }
}

export class ConfigError extends LayoutEngineError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}
