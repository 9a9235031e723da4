/**
 * Deconstructors: axis-angle, rotation matrices, Euler angles, transforms.
 *
 * Rotation conversions normalize the quaternion first.
 */

import { DEFAULT_QUATERNION_OPTIONS, EPSILON } from "@/config/quaternionConfig";
import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { Transform } from "@/math/Transform";
import { Vec3 } from "@/math/Vec3";
import type {
  AxisAngle,
  EulerAngles,
  Matrix3,
  MatrixVectors,
  RigidTransform,
  RotationOrder,
  Vector3,
} from "@/types";
import { normalize } from "./algebra";
import { Quaternion, type QuaternionComponents } from "./Quaternion";

// =============================================================================
// AXIS-ANGLE / MATRIX
// =============================================================================

/**
 * Axis and angle (radians, in [0, 2π]) of the rotation.
 * For near-zero rotations the raw imaginary part is returned as the axis.
 */
export function toAxisAngle(q: Quaternion): AxisAngle {
  const { x, y, z, w } = normalize(q);
  const angle = 2 * Math.acos(w);
  const s = Math.sqrt(1 - w * w);

  if (s < EPSILON) {
    RotationDebugLogger.logFallback("axis_small_angle", "toAxisAngle", q.components());
    return { axis: Vec3.create(x, y, z), angle };
  }
  return { axis: Vec3.create(x / s, y / s, z / s), angle };
}

/**
 * Rotation matrix, row-major: m00, m01, m02, m10, m11, m12, m20, m21, m22.
 */
export function toMatrix(q: Quaternion): Matrix3 {
  const { x, y, z, w } = normalize(q);

  const sqX = x * x;
  const sqY = y * y;
  const sqZ = z * z;
  const sqW = w * w;

  const xy = x * y;
  const zw = z * w;
  const xz = x * z;
  const yw = y * w;
  const yz = y * z;
  const xw = x * w;

  // biome-ignore format: matrix rows
  return [
    sqX - sqY - sqZ + sqW, 2 * (xy - zw), 2 * (xz + yw),
    2 * (xy + zw), -sqX + sqY - sqZ + sqW, 2 * (yz - xw),
    2 * (xz - yw), 2 * (yz + xw), -sqX - sqY + sqZ + sqW,
  ];
}

/**
 * Rotation matrix as its columns: right, up and back.
 */
export function toMatrixVectors(q: Quaternion): MatrixVectors {
  const [m00, m01, m02, m10, m11, m12, m20, m21, m22] = toMatrix(q);
  return {
    right: Vec3.create(m00, m10, m20),
    up: Vec3.create(m01, m11, m21),
    back: Vec3.create(m02, m12, m22),
  };
}

/**
 * Rigid transform at `position` with the quaternion's rotation.
 */
export function toTransform(q: Quaternion, position: Vector3 = Vec3.zero()): RigidTransform {
  const { x, y, z, w } = normalize(q);
  return Transform.fromQuaternionComponents(position, x, y, z, w);
}

// =============================================================================
// EULER ANGLES
// =============================================================================
// Each order has its own singularity test, sign convention and recombination.
// Keep them separate.

export function toEulerAnglesXYZ(q: Quaternion): EulerAngles {
  const { x, y, z, w } = normalize(q);

  const test = y * w + x * z;
  if (Math.abs(test) > DEFAULT_QUATERNION_OPTIONS.gimbalThresholdXYZ) {
    RotationDebugLogger.logFallback("gimbal_lock", "toEulerAnglesXYZ", q.components());
    const sign = test > 0 ? 1 : -1;
    return { x: sign * 2 * Math.atan2(z, w), y: (sign * Math.PI) / 2, z: 0 };
  }

  const sqy = y * y;
  return {
    x: Math.atan2(2 * (x * w - y * z), 1 - 2 * (x * x + sqy)),
    y: Math.asin(2 * test),
    z: Math.atan2(2 * (z * w - x * y), 1 - 2 * (z * z + sqy)),
  };
}

export function toEulerAnglesXZY(q: Quaternion): EulerAngles {
  const { x, y, z, w } = normalize(q);

  const test = z * w - x * y;
  if (Math.abs(test) > 0.5 - EPSILON) {
    RotationDebugLogger.logFallback("gimbal_lock", "toEulerAnglesXZY", q.components());
    const sign = test >= 0 ? 1 : -1;
    return { x: sign * 2 * -Math.atan2(y, w), y: 0, z: (sign * Math.PI) / 2 };
  }

  const sqz = z * z;
  return {
    x: Math.atan2(2 * (x * w + y * z), 1 - 2 * (x * x + sqz)),
    y: Math.atan2(2 * (x * z + y * w), 1 - 2 * (y * y + sqz)),
    z: Math.asin(2 * test),
  };
}

export function toEulerAnglesYXZ(q: Quaternion): EulerAngles {
  const { x, y, z, w } = normalize(q);

  const test = x * w - y * z;
  if (Math.abs(test) > 0.5 - EPSILON) {
    RotationDebugLogger.logFallback("gimbal_lock", "toEulerAnglesYXZ", q.components());
    const sign = test >= 0 ? 1 : -1;
    return { x: (sign * Math.PI) / 2, y: sign * 2 * -Math.atan2(z, w), z: 0 };
  }

  const sqx = x * x;
  return {
    x: Math.asin(2 * test),
    y: Math.atan2(2 * (x * z + y * w), 1 - 2 * (y * y + sqx)),
    z: Math.atan2(2 * (x * y + z * w), 1 - 2 * (z * z + sqx)),
  };
}

export function toEulerAnglesYZX(q: Quaternion): EulerAngles {
  const { x, y, z, w } = normalize(q);

  const test = z * w + x * y;
  if (Math.abs(test) > 0.5 - EPSILON) {
    RotationDebugLogger.logFallback("gimbal_lock", "toEulerAnglesYZX", q.components());
    const sign = test >= 0 ? 1 : -1;
    return { x: 0, y: sign * 2 * Math.atan2(x, w), z: (sign * Math.PI) / 2 };
  }

  const sqz = z * z;
  return {
    x: Math.atan2(2 * (x * w - y * z), 1 - 2 * (x * x + sqz)),
    y: Math.atan2(2 * (y * w - x * z), 1 - 2 * (y * y + sqz)),
    z: Math.asin(2 * test),
  };
}

export function toEulerAnglesZXY(q: Quaternion): EulerAngles {
  const { x, y, z, w } = normalize(q);

  const test = x * w + y * z;
  if (Math.abs(test) > 0.5 - EPSILON) {
    RotationDebugLogger.logFallback("gimbal_lock", "toEulerAnglesZXY", q.components());
    const sign = test >= 0 ? 1 : -1;
    return { x: (sign * Math.PI) / 2, y: 0, z: sign * 2 * Math.atan2(y, w) };
  }

  const sqx = x * x;
  return {
    x: Math.asin(2 * test),
    y: Math.atan2(2 * (y * w - x * z), 1 - 2 * (y * y + sqx)),
    z: Math.atan2(2 * (z * w - x * y), 1 - 2 * (z * z + sqx)),
  };
}

export function toEulerAnglesZYX(q: Quaternion): EulerAngles {
  const { x, y, z, w } = normalize(q);

  const test = y * w - x * z;
  if (Math.abs(test) > 0.5 - EPSILON) {
    RotationDebugLogger.logFallback("gimbal_lock", "toEulerAnglesZYX", q.components());
    const sign = test >= 0 ? 1 : -1;
    return { x: 0, y: (sign * Math.PI) / 2, z: sign * 2 * -Math.atan2(x, w) };
  }

  const sqy = y * y;
  return {
    x: Math.atan2(2 * (x * w + y * z), 1 - 2 * (x * x + sqy)),
    y: Math.asin(2 * test),
    z: Math.atan2(2 * (x * y + z * w), 1 - 2 * (z * z + sqy)),
  };
}

const TO_EULER_ANGLES: Record<RotationOrder, (q: Quaternion) => EulerAngles> = {
  XYZ: toEulerAnglesXYZ,
  XZY: toEulerAnglesXZY,
  YXZ: toEulerAnglesYXZ,
  YZX: toEulerAnglesYZX,
  ZXY: toEulerAnglesZXY,
  ZYX: toEulerAnglesZYX,
};

/**
 * Euler angles for the given rotation order (default "XYZ").
 */
export function toEulerAngles(
  q: Quaternion,
  order: RotationOrder = DEFAULT_QUATERNION_OPTIONS.defaultRotationOrder
): EulerAngles {
  return TO_EULER_ANGLES[order](q);
}

/** Alias of `toEulerAnglesYXZ` */
export const toOrientation = toEulerAnglesYXZ;

// =============================================================================
// PROJECTIONS
// =============================================================================

/** Imaginary part as a vector */
export function vector(q: Quaternion): Vector3 {
  return Vec3.create(q.x, q.y, q.z);
}

/** (0, 0, 0, w) */
export function real(q: Quaternion): Quaternion {
  return new Quaternion(0, 0, 0, q.w);
}

/** (x, y, z, 0) */
export function imaginary(q: Quaternion): Quaternion {
  return new Quaternion(q.x, q.y, q.z, 0);
}

export function getComponents(q: Quaternion): QuaternionComponents {
  return q.components();
}

/**
 * "x, y, z, w", each rounded to `decimalPlaces` when given.
 */
export function toString(q: Quaternion, decimalPlaces?: number): string {
  return q.toString(decimalPlaces);
}
