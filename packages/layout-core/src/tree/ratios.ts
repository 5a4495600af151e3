export const RATIO_TOLERANCE = 1e-3;

const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

/**
 * Returns the reason the ratios are unusable, or null when they are valid for `expectedCount`
 * children.
 */
export const checkRatios = (
  ratios: readonly number[],
  expectedCount: number,
  tolerance = RATIO_TOLERANCE
): string | null => {
  if (ratios.length !== expectedCount) {
    return `expected ${expectedCount} ratios, received ${ratios.length}`;
  }
  if (ratios.some((ratio) => !Number.isFinite(ratio))) {
    return "ratios must be finite numbers";
  }
  if (ratios.some((ratio) => ratio <= 0)) {
    return "ratios must be positive";
  }
  const total = sum(ratios);
  if (Math.abs(total - 1) > tolerance) {
    return `ratios must sum to 1 (sum is ${total})`;
  }
  return null;
};

export const isValidSplitRatio = (ratio: number): boolean =>
  Number.isFinite(ratio) && ratio > 0 && ratio < 1;

export const normalizeRatios = (ratios: readonly number[]): number[] => {
  if (ratios.length === 0) {
    return [];
  }
  const total = sum(ratios);
  if (!(total > 0)) {
    return ratios.map(() => 1 / ratios.length);
  }
  return ratios.map((ratio) => ratio / total);
};

export const equalRatios = (count: number): number[] =>
  Array.from({ length: count }, () => 1 / count);

/** Drops the ratio at `index` and renormalises the survivors to sum to 1. */
export const removeRatioAt = (ratios: readonly number[], index: number): number[] =>
  normalizeRatios(ratios.filter((_, candidate) => candidate !== index));
