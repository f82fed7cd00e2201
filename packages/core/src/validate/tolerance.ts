import type { ToleranceSetting } from "../schemas/pipeline-config.js";

/**
 * Decides the lowest observed count that still passes an expected-count
 * check. Observed counts in `[floor(E), E)` pass with a warning.
 */
export interface TolerancePolicy {
  readonly mode: ToleranceSetting["mode"];
  /** The configured value, reported on each check. */
  readonly value: number;
  floor(expected: number): number;
  describe(): string;
}

/**
 * `ceil(E·(1−t))`. The product carries a few ulps of rounding error
 * (10 * (1 - 0.3) is 6.999999999999999), so a slack of four ulps of E is
 * taken off before the ceiling; any real excess is far larger than that.
 */
function fractionFloor(expected: number, fraction: number): number {
  const slack = 4 * Number.EPSILON * Math.max(1, Math.abs(expected));
  return Math.max(0, Math.ceil(expected * (1 - fraction) - slack));
}

/** `floor = ceil(E·(1−t))` for `t ∈ [0, 1)`. */
export function fractionTolerance(fraction: number): TolerancePolicy {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction >= 1) {
    throw new RangeError(`Tolerance fraction must be in [0, 1), got ${fraction}`);
  }
  return {
    mode: "fraction",
    value: fraction,
    floor: (expected) => fractionFloor(expected, fraction),
    describe: () => `fraction ${fraction}`,
  };
}

/** `floor = max(0, E − n)`: up to `n` entities may be missing per group. */
export function absoluteTolerance(missing: number): TolerancePolicy {
  if (!Number.isInteger(missing) || missing < 0) {
    throw new RangeError(`Absolute tolerance must be a non-negative integer, got ${missing}`);
  }
  return {
    mode: "absolute",
    value: missing,
    floor: (expected) => Math.max(0, expected - missing),
    describe: () => `absolute ${missing}`,
  };
}

export function toleranceFromConfig(setting: ToleranceSetting): TolerancePolicy {
  switch (setting.mode) {
    case "fraction":
      return fractionTolerance(setting.value);
    case "absolute":
      return absoluteTolerance(setting.value);
  }
}

export function resolveTolerance(tolerance: number | TolerancePolicy): TolerancePolicy {
  return typeof tolerance === "number" ? fractionTolerance(tolerance) : tolerance;
}
