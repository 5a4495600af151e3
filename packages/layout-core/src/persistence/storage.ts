/**
 * Storage wiring for saved layouts. Adapters only move strings; the persistence controller owns
 * parsing, the load guard and write de-duplication.
 */
import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { ok, type LayoutResult } from "../errors";
import type { PaneModel } from "../model/paneModel";
import { parseLayout, serializeLayout } from "./serialization";

export interface LayoutStorageAdapter {
  read(): string | null;
  write(value: string): void;
  clear(): void;
}

export interface LayoutPersistence {
  /** Outcome of the load performed at creation; `ok(false)` when nothing was stored. */
  readonly restored: LayoutResult<boolean>;
  load(): LayoutResult<boolean>;
  save(): void;
  clear(): void;
  dispose(): void;
}

export interface CreateLayoutPersistenceOptions {
  /** Write after every `layoutChanged`. Defaults to true. */
  readonly autoSave?: boolean;
  /** Load from the adapter when created. Defaults to true. */
  readonly restoreOnCreate?: boolean;
}

export const createMemoryLayoutStorageAdapter = (initialValue: string | null = null): LayoutStorageAdapter => {
  let value = initialValue;
  return {
    read() {
      return value;
    },
    write(next) {
      value = next;
    },
    clear() {
      value = null;
    }
  };
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const createFileLayoutStorageAdapter = (filePath: string): LayoutStorageAdapter => ({
  read() {
    try {
      return readFileSync(filePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  },
  write(value) {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, value, "utf8");
  },
  clear() {
    rmSync(filePath, { force: true });
  }
});

export const createLayoutPersistence = (
  model: PaneModel,
  adapter: LayoutStorageAdapter,
  options: CreateLayoutPersistenceOptions = {}
): LayoutPersistence => {
  let loading = false;
  let lastWritten: string | null = adapter.read();

  const save = () => {
    const serialized = serializeLayout(model.getTree());
    if (serialized === lastWritten) {
      return;
    }
    adapter.write(serialized);
    lastWritten = serialized;
  };

  const load = (): LayoutResult<boolean> => {
    const raw = adapter.read();
    if (raw === null) {
      return ok(false);
    }
    const parsed = parseLayout(raw, { ratioTolerance: model.config.ratioTolerance });
    if (!parsed.ok) {
      return parsed;
    }
    loading = true;
    try {
      const replaced = model.replaceTree(parsed.value);
      if (!replaced.ok) {
        return replaced;
      }
    } finally {
      loading = false;
    }
    lastWritten = raw;
    return ok(true);
  };

  const unsubscribe =
    options.autoSave === false
      ? () => undefined
      : model.signals.on("layoutChanged", () => {
          if (!loading) {
            save();
          }
        });

  const restored = options.restoreOnCreate === false ? ok(false) : load();

  return {
    restored,
    load,
    save,
    clear() {
      adapter.clear();
      lastWritten = null;
    },
    dispose() {
      unsubscribe();
    }
  };
};
