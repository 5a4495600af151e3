/**
 * JSON schema for saved layouts. Keys are snake_case on disk. Maximize state is runtime-only and
 * never written; a loaded layout always starts un-maximized. Leaves carry `constraints` only when
 * they have some.
 */
import { err, ok, type LayoutResult, type TreeViolation } from "../errors";
import { defaultIdGenerator, type IdGenerator } from "../ids";
import type { LayoutTree, LeafNode, Orientation, PaneNode, SizeConstraints } from "../types";
import { firstLeaf, findLeaf } from "../tree/nodes";
import { RATIO_TOLERANCE } from "../tree/ratios";
import { validateTree } from "../tree/validation";

export const LAYOUT_SCHEMA_VERSION = "1.0.0";

export interface SerializedConstraints {
  readonly min_width: number;
  readonly min_height: number;
  readonly max_width: number | null;
  readonly max_height: number | null;
}

export interface SerializedLeaf {
  readonly type: "leaf";
  readonly pane_id: string;
  readonly widget_id: string;
  readonly constraints?: SerializedConstraints;
}

export interface SerializedSplit {
  readonly type: "split";
  readonly node_id?: string;
  readonly orientation: Orientation;
  readonly ratios: readonly number[];
  readonly children: readonly SerializedNode[];
}

export type SerializedNode = SerializedLeaf | SerializedSplit;

export interface SerializedLayout {
  readonly version: string;
  readonly root: SerializedNode | null;
  readonly focused_pane_id: string | null;
}

export interface ParseLayoutOptions {
  /** Supplies split ids for nodes saved without one. */
  readonly ids?: IdGenerator;
  readonly ratioTolerance?: number;
}

const toSerializedNode = (node: PaneNode): SerializedNode => {
  if (node.type === "leaf") {
    const leaf: SerializedLeaf = { type: "leaf", pane_id: node.paneId, widget_id: node.widgetId };
    if (!node.constraints) {
      return leaf;
    }
    const { minWidth, minHeight, maxWidth, maxHeight } = node.constraints;
    return {
      ...leaf,
      constraints: { min_width: minWidth, min_height: minHeight, max_width: maxWidth, max_height: maxHeight }
    };
  }
  return {
    type: "split",
    node_id: node.nodeId,
    orientation: node.orientation,
    ratios: [...node.ratios],
    children: node.children.map(toSerializedNode)
  };
};

export const toSerializedLayout = (tree: LayoutTree): SerializedLayout => ({
  version: LAYOUT_SCHEMA_VERSION,
  root: tree.root ? toSerializedNode(tree.root) : null,
  focused_pane_id: tree.focusedPaneId
});

export const serializeLayout = (tree: LayoutTree): string =>
  JSON.stringify(toSerializedLayout(tree), null, 2);

class MalformedLayout {
  constructor(readonly message: string, readonly path: readonly number[]) {}
}

const malformed = <T = never>(message: string, path: readonly number[] = []): LayoutResult<T> => {
  const violation: TreeViolation = { code: "malformed", message, path };
  return err({ type: "invalid-structure", violations: [violation] });
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isOrientation = (value: unknown): value is Orientation =>
  value === "horizontal" || value === "vertical";

const readLimit = (value: unknown, name: string, path: readonly number[]): number | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "number") {
    throw new MalformedLayout(`constraints.${name} must be a number`, path);
  }
  return value;
};

const readConstraints = (value: unknown, path: readonly number[]): SizeConstraints => {
  if (!isRecord(value)) {
    throw new MalformedLayout("constraints must be an object", path);
  }
  return {
    minWidth: readLimit(value.min_width, "min_width", path) ?? 0,
    minHeight: readLimit(value.min_height, "min_height", path) ?? 0,
    maxWidth: readLimit(value.max_width, "max_width", path),
    maxHeight: readLimit(value.max_height, "max_height", path)
  };
};

const readNode = (value: unknown, path: number[], ids: IdGenerator): PaneNode => {
  if (!isRecord(value)) {
    throw new MalformedLayout("node must be an object", path);
  }
  if (value.type === "leaf") {
    const { pane_id: paneId, widget_id: widgetId, constraints } = value;
    if (typeof paneId !== "string" || typeof widgetId !== "string") {
      throw new MalformedLayout("leaf requires string pane_id and widget_id", path);
    }
    const leaf: LeafNode = { type: "leaf", paneId, widgetId };
    return constraints === undefined ? leaf : { ...leaf, constraints: readConstraints(constraints, path) };
  }
  if (value.type !== "split") {
    throw new MalformedLayout(`unknown node type ${String(value.type)}`, path);
  }
  const orientation = value.orientation;
  if (!isOrientation(orientation)) {
    throw new MalformedLayout(`unknown orientation ${String(orientation)}`, path);
  }
  const rawRatios = value.ratios;
  const rawChildren = value.children;
  if (!Array.isArray(rawRatios) || !Array.isArray(rawChildren)) {
    throw new MalformedLayout("split requires ratios and children arrays", path);
  }
  const ratios = rawRatios.map((ratio: unknown) => {
    if (typeof ratio !== "number") {
      throw new MalformedLayout("ratios must be numbers", path);
    }
    return ratio;
  });
  const savedNodeId = value.node_id;
  if (savedNodeId !== undefined && typeof savedNodeId !== "string") {
    throw new MalformedLayout("node_id must be a string", path);
  }
  return {
    type: "split",
    nodeId: savedNodeId ? savedNodeId : ids.nodeId(),
    orientation,
    ratios,
    children: rawChildren.map((child: unknown, index) => readNode(child, [...path, index], ids))
  };
};

const isSupportedVersion = (version: string): boolean => version.split(".")[0] === "1";

/**
 * Builds a validated tree from an already-decoded value. Structural problems come back as
 * `invalid-structure`; a focus id that does not name a leaf falls back to the first leaf.
 */
export const fromSerializedLayout = (
  value: unknown,
  options: ParseLayoutOptions = {}
): LayoutResult<LayoutTree> => {
  if (!isRecord(value)) {
    return malformed("layout must be an object");
  }
  const { version, focused_pane_id: savedFocus } = value;
  if (typeof version !== "string") {
    return malformed("layout version is missing");
  }
  if (!isSupportedVersion(version)) {
    return malformed(`unsupported layout version ${version}`);
  }
  if (savedFocus !== undefined && savedFocus !== null && typeof savedFocus !== "string") {
    return malformed("focused_pane_id must be a string or null");
  }

  let root: PaneNode | null = null;
  if (value.root !== null && value.root !== undefined) {
    try {
      root = readNode(value.root, [], options.ids ?? defaultIdGenerator);
    } catch (error) {
      if (error instanceof MalformedLayout) {
        return malformed(error.message, error.path);
      }
      throw error;
    }
  }

  const focusedPaneId =
    typeof savedFocus === "string" && findLeaf(root, savedFocus) ? savedFocus : firstLeaf(root)?.paneId ?? null;
  const tree: LayoutTree = { root, focusedPaneId, maximizedPaneId: null };

  const violations = validateTree(tree, options.ratioTolerance ?? RATIO_TOLERANCE);
  if (violations.length > 0) {
    return err({ type: "invalid-structure", violations });
  }
  return ok(tree);
};

export const parseLayout = (json: string, options: ParseLayoutOptions = {}): LayoutResult<LayoutTree> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch (error) {
    return malformed(`layout is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return fromSerializedLayout(decoded, options);
};
