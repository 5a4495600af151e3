import type { PaneId, WidgetId } from "../ids";
import { emptyLayoutTree, type LayoutTree, type Rect } from "../types";
import type { LayoutOptions } from "../geometry/calculate";
import { reconcile, type ReconcileOperation } from "./reconciler";

/**
 * Supplies and disposes the widgets that live inside panes. The engine never looks inside a handle.
 */
export interface WidgetProvider<THandle> {
  provideWidget(widgetId: WidgetId, paneId: PaneId): THandle;
  widgetClosing(widgetId: WidgetId, paneId: PaneId, handle: THandle): void;
  paneMoved?(paneId: PaneId, rect: Rect, handle: THandle): void;
  paneResized?(paneId: PaneId, rect: Rect, handle: THandle): void;
}

export interface ViewHost<THandle> {
  apply(operations: readonly ReconcileOperation[]): void;
  /** Reconciles against the last rendered tree and applies the difference. */
  render(tree: LayoutTree, bounds?: Rect): ReconcileOperation[];
  getHandle(paneId: PaneId): THandle | undefined;
  getRect(paneId: PaneId): Rect | undefined;
  getPaneIds(): PaneId[];
  /** Closes every widget still held. */
  dispose(): void;
}

export interface ViewHostOptions {
  readonly layout?: LayoutOptions;
}

interface MountedPane<THandle> {
  widgetId: WidgetId;
  handle: THandle;
  rect?: Rect;
}

export const createViewHost = <THandle>(
  provider: WidgetProvider<THandle>,
  options: ViewHostOptions = {}
): ViewHost<THandle> => {
  const mounted = new Map<PaneId, MountedPane<THandle>>();
  let lastTree: LayoutTree = emptyLayoutTree();
  let lastBounds: Rect | undefined;

  const close = (paneId: PaneId) => {
    const pane = mounted.get(paneId);
    if (!pane) {
      return;
    }
    provider.widgetClosing(pane.widgetId, paneId, pane.handle);
    mounted.delete(paneId);
  };

  const apply = (operations: readonly ReconcileOperation[]) => {
    for (const operation of operations) {
      switch (operation.type) {
        case "destroy":
          close(operation.paneId);
          break;
        case "create":
          mounted.set(operation.paneId, {
            widgetId: operation.widgetId,
            handle: provider.provideWidget(operation.widgetId, operation.paneId)
          });
          break;
        case "replaceWidget": {
          const rect = mounted.get(operation.paneId)?.rect;
          close(operation.paneId);
          mounted.set(operation.paneId, {
            widgetId: operation.widgetId,
            handle: provider.provideWidget(operation.widgetId, operation.paneId),
            rect
          });
          break;
        }
        case "move": {
          const pane = mounted.get(operation.paneId);
          if (pane) {
            provider.paneMoved?.(operation.paneId, operation.rect, pane.handle);
          }
          break;
        }
        case "updateRect": {
          const pane = mounted.get(operation.paneId);
          if (pane) {
            pane.rect = operation.rect;
            provider.paneResized?.(operation.paneId, operation.rect, pane.handle);
          }
          break;
        }
      }
    }
  };

  const render = (tree: LayoutTree, bounds?: Rect): ReconcileOperation[] => {
    const operations = reconcile(lastTree, tree, {
      bounds,
      previousBounds: lastBounds,
      layout: options.layout
    });
    apply(operations);
    lastTree = tree;
    lastBounds = bounds;
    return operations;
  };

  const dispose = () => {
    for (const paneId of [...mounted.keys()]) {
      close(paneId);
    }
    lastTree = emptyLayoutTree();
    lastBounds = undefined;
  };

  return {
    apply,
    render,
    getHandle: (paneId) => mounted.get(paneId)?.handle,
    getRect: (paneId) => mounted.get(paneId)?.rect,
    getPaneIds: () => [...mounted.keys()],
    dispose
  };
};
