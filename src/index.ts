/**
 * rotation-quaternion - unit quaternion rotations for games, simulations and robotics
 */

export * from "./quaternion";
export { Vec3 } from "./math/Vec3";
export { Transform } from "./math/Transform";
export * from "./errors";
export {
  EPSILON,
  DEFAULT_QUATERNION_OPTIONS,
  type QuaternionOptions,
} from "./config/quaternionConfig";
export {
  RotationDebugLogger,
  type FallbackKind,
  type RotationDebugLog,
} from "./debug/RotationDebugLogger";
export * from "./types";
