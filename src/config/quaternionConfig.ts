import type { RotationOrder } from "@/types";

/**
 * Library-wide tolerance used for near-zero tests.
 */
export const EPSILON = 1e-6;

/**
 * Tunable numeric options.
 */
export interface QuaternionOptions {
  /**
   * Gimbal-lock test threshold for the XYZ Euler extraction.
   * The other five orders test against 0.5 - EPSILON.
   */
  readonly gimbalThresholdXYZ: number;
  /** Rotation order used when none is given */
  readonly defaultRotationOrder: RotationOrder;
  /** Seed used by the random generator when none is given */
  readonly defaultSeed: number;
}

/**
 * Default quaternion options
 */
export const DEFAULT_QUATERNION_OPTIONS: QuaternionOptions = Object.freeze({
  gimbalThresholdXYZ: 0.499999,
  defaultRotationOrder: "XYZ",
  defaultSeed: 1,
});
