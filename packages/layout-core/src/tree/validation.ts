/**
 * Structural self-check for layout trees. It never mutates; callers decide whether a violation
 * aborts an operation.
 */
import type { TreeViolation } from "../errors";
import type { LayoutTree, PaneNode, SizeConstraints } from "../types";
import { RATIO_TOLERANCE, checkRatios } from "./ratios";

const isSize = (value: number): boolean => Number.isFinite(value) && value >= 0;

/** Returns the reason the constraints are unusable, or null. */
export const checkConstraints = (constraints: SizeConstraints): string | null => {
  if (!isSize(constraints.minWidth) || !isSize(constraints.minHeight)) {
    return "minimum sizes must be non-negative numbers";
  }
  if (constraints.maxWidth !== null && !(isSize(constraints.maxWidth) && constraints.maxWidth >= constraints.minWidth)) {
    return "maximum width must be at least the minimum width";
  }
  if (constraints.maxHeight !== null && !(isSize(constraints.maxHeight) && constraints.maxHeight >= constraints.minHeight)) {
    return "maximum height must be at least the minimum height";
  }
  return null;
};

export const validateTree = (tree: LayoutTree, tolerance = RATIO_TOLERANCE): TreeViolation[] => {
  const violations: TreeViolation[] = [];
  const paneIds = new Set<string>();
  const nodeIds = new Set<string>();

  const visit = (node: PaneNode, path: number[]) => {
    if (node.type === "leaf") {
      if (node.paneId.length === 0) {
        violations.push({ code: "empty-pane-id", message: "Leaf has an empty pane id", path });
      }
      if (paneIds.has(node.paneId)) {
        violations.push({
          code: "duplicate-pane-id",
          message: `Pane id ${node.paneId} appears more than once`,
          path
        });
      }
      paneIds.add(node.paneId);
      const reason = node.constraints ? checkConstraints(node.constraints) : null;
      if (reason) {
        violations.push({
          code: "invalid-constraints",
          message: `Pane ${node.paneId}: ${reason}`,
          path
        });
      }
      return;
    }

    if (nodeIds.has(node.nodeId)) {
      violations.push({
        code: "duplicate-node-id",
        message: `Split id ${node.nodeId} appears more than once`,
        path
      });
    }
    nodeIds.add(node.nodeId);

    if (node.children.length < 2) {
      violations.push({
        code: "too-few-children",
        message: `Split ${node.nodeId} has ${node.children.length} children (minimum 2)`,
        path
      });
    }
    if (node.ratios.length !== node.children.length) {
      violations.push({
        code: "ratio-count",
        message: `Split ${node.nodeId} has ${node.ratios.length} ratios for ${node.children.length} children`,
        path
      });
    } else if (node.ratios.some((ratio) => !(ratio > 0))) {
      violations.push({
        code: "ratio-non-positive",
        message: `Split ${node.nodeId} has a non-positive ratio`,
        path
      });
    } else {
      const reason = checkRatios(node.ratios, node.children.length, tolerance);
      if (reason) {
        violations.push({ code: "ratio-sum", message: `Split ${node.nodeId}: ${reason}`, path });
      }
    }

    node.children.forEach((child, index) => visit(child, [...path, index]));
  };

  if (tree.root) {
    visit(tree.root, []);
  }

  if (tree.focusedPaneId !== null && !paneIds.has(tree.focusedPaneId)) {
    violations.push({
      code: "focus-missing",
      message: `Focused pane ${tree.focusedPaneId} is not in the tree`,
      path: []
    });
  }
  if (tree.maximizedPaneId !== null && !paneIds.has(tree.maximizedPaneId)) {
    violations.push({
      code: "maximized-missing",
      message: `Maximized pane ${tree.maximizedPaneId} is not in the tree`,
      path: []
    });
  }

  return violations;
};
