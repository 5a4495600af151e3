/**
 * Engine configuration. Callers pass partial overrides; everything is validated up front so the
 * model and calculators can trust their inputs.
 */
import { ConfigError } from "./errors";
import type { Size } from "./types";

export type MaximizeFocusPolicy = "auto-restore" | "lock";

export interface EngineConfig {
  readonly ratioTolerance: number;
  readonly defaultSplitRatio: number;
  readonly maxUndoLevels: number;
  readonly maximizeFocusPolicy: MaximizeFocusPolicy;
  readonly minimumPaneSize: Size;
  readonly dividerWidth: number;
}

export type EngineConfigOverrides = Partial<EngineConfig>;

interface RawEnv {
  readonly [key: string]: string | undefined;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  ratioTolerance: 1e-3,
  defaultSplitRatio: 0.5,
  maxUndoLevels: 100,
  maximizeFocusPolicy: "auto-restore",
  minimumPaneSize: { width: 0, height: 0 },
  dividerWidth: 0
};

const assertNonNegativeInteger = (key: string, value: number): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(key, `expected a non-negative integer, received ${value}`);
  }
};

export const resolveEngineConfig = (overrides: EngineConfigOverrides = {}): EngineConfig => {
  const config: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    minimumPaneSize: {
      ...DEFAULT_ENGINE_CONFIG.minimumPaneSize,
      ...overrides.minimumPaneSize
    }
  };

  if (!(config.ratioTolerance > 0 && config.ratioTolerance < 1)) {
    throw new ConfigError("ratioTolerance", `expected a value in (0, 1), received ${config.ratioTolerance}`);
  }
  if (!(config.defaultSplitRatio > 0 && config.defaultSplitRatio < 1)) {
    throw new ConfigError(
      "defaultSplitRatio",
      `expected a value in (0, 1), received ${config.defaultSplitRatio}`
    );
  }
  if (!Number.isInteger(config.maxUndoLevels) || config.maxUndoLevels < 1) {
    throw new ConfigError("maxUndoLevels", `expected a positive integer, received ${config.maxUndoLevels}`);
  }
  if (config.maximizeFocusPolicy !== "auto-restore" && config.maximizeFocusPolicy !== "lock") {
    throw new ConfigError("maximizeFocusPolicy", `unknown policy ${String(config.maximizeFocusPolicy)}`);
  }
  assertNonNegativeInteger("minimumPaneSize.width", config.minimumPaneSize.width);
  assertNonNegativeInteger("minimumPaneSize.height", config.minimumPaneSize.height);
  assertNonNegativeInteger("dividerWidth", config.dividerWidth);

  return config;
};

const toInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toPolicy = (value: string | undefined, fallback: MaximizeFocusPolicy): MaximizeFocusPolicy => {
  if (value === "auto-restore" || value === "lock") {
    return value;
  }
  return fallback;
};

/**
 * Reads `MULTISPLIT_*` variables. Values that do not parse fall back to the defaults; values that
 * parse but are out of range still fail validation.
 */
export const readEngineConfigFromEnv = (env: RawEnv): EngineConfig => {
  const defaults = DEFAULT_ENGINE_CONFIG;
  return resolveEngineConfig({
    ratioTolerance: toFloat(env.MULTISPLIT_RATIO_TOLERANCE, defaults.ratioTolerance),
    defaultSplitRatio: toFloat(env.MULTISPLIT_DEFAULT_SPLIT_RATIO, defaults.defaultSplitRatio),
    maxUndoLevels: toInt(env.MULTISPLIT_MAX_UNDO_LEVELS, defaults.maxUndoLevels),
    maximizeFocusPolicy: toPolicy(env.MULTISPLIT_MAXIMIZE_FOCUS_POLICY, defaults.maximizeFocusPolicy),
    minimumPaneSize: {
      width: toInt(env.MULTISPLIT_MIN_PANE_WIDTH, defaults.minimumPaneSize.width),
      height: toInt(env.MULTISPLIT_MIN_PANE_HEIGHT, defaults.minimumPaneSize.height)
    },
    dividerWidth: toInt(env.MULTISPLIT_DIVIDER_WIDTH, defaults.dividerWidth)
  });
};
